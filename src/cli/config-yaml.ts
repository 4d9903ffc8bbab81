/**
 * YAML secrets file for plugin-secrets
 * Loads the scope -> key -> value store that injectors resolve against
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { type RawSecrets, type SecretDescription, SecretError, SecretErrorCode, sortSecretDescriptions } from '../secrets';

/**
 * Get config directory path (dynamically computed for testability)
 */
export function getConfigDir(): string {
  return process.env.PLUGIN_SECRETS_DIR || path.join(os.homedir(), '.plugin-secrets');
}

/**
 * Get default secrets file path
 */
export function getSecretsFile(): string {
  return path.join(getConfigDir(), 'secrets.yaml');
}

/**
 * Check if a secrets file exists
 */
export function hasSecretsFile(file: string = getSecretsFile()): boolean {
  return fs.existsSync(file);
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse secrets YAML into raw secrets.
 *
 * Empty entries count as absent. Values must be strings: an unquoted
 * number or boolean is rejected rather than converted, since YAML would
 * already have rounded or normalized it.
 * @throws SecretError with CONFIG_ERROR code on malformed content
 */
export function parseRawSecrets(content: string, source: string = 'secrets file'): RawSecrets {
  let parsed: unknown;
  try {
    parsed = yaml.load(content, { schema: yaml.JSON_SCHEMA, filename: source });
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    throw new SecretError(
      SecretErrorCode.CONFIG_ERROR,
      `Failed to parse ${source}: ${cause.message}`,
      { cause }
    );
  }

  // An empty file parses as undefined
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isMapping(parsed)) {
    throw new SecretError(
      SecretErrorCode.CONFIG_ERROR,
      `${source} must be a mapping of scope names to keys`
    );
  }

  return Object.fromEntries(
    Object.entries(parsed).map(([scope, entries]) => [scope, parseScope(scope, entries, source)])
  );
}

function parseScope(scope: string, entries: unknown, source: string): Record<string, string> {
  // A scope whose keys are all commented out parses as null
  if (entries === null) {
    return {};
  }
  if (!isMapping(entries)) {
    throw new SecretError(
      SecretErrorCode.CONFIG_ERROR,
      `${source}: scope "${scope}" must be a mapping of keys to values`,
      { scope }
    );
  }

  const values: [string, string][] = [];
  for (const [key, value] of Object.entries(entries)) {
    if (value === null) {
      continue;
    }
    if (typeof value === 'string') {
      values.push([key, value]);
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      throw new SecretError(
        SecretErrorCode.CONFIG_ERROR,
        `${source}: value for key "${key}" in scope "${scope}" must be quoted, e.g. ${key}: "..."`,
        { scope, key }
      );
    } else {
      throw new SecretError(
        SecretErrorCode.CONFIG_ERROR,
        `${source}: value for key "${key}" in scope "${scope}" must be a string`,
        { scope, key }
      );
    }
  }
  return Object.fromEntries(values);
}

/**
 * Load raw secrets from a YAML file
 */
export function loadRawSecrets(file: string = getSecretsFile()): RawSecrets {
  if (!hasSecretsFile(file)) {
    throw new SecretError(
      SecretErrorCode.CONFIG_ERROR,
      `No secrets file found at ${file}. Run \`plugin-secrets init\` first.`
    );
  }

  const content = fs.readFileSync(file, 'utf8');
  return parseRawSecrets(content, file);
}

const SIMPLE_NAME = /^[A-Za-z0-9_-]+$/;

function yamlName(name: string): string {
  return SIMPLE_NAME.test(name) ? name : JSON.stringify(name);
}

/**
 * Render a secrets file template listing every description, grouped by scope.
 * Keys are commented out until the user fills them in.
 */
export function renderSecretsTemplate(descriptions: readonly SecretDescription[]): string {
  const lines = [
    '# plugin-secrets',
    '# Uncomment a key and fill in its value. Instructions for obtaining each',
    '# value are in the comment above it.',
  ];

  let currentScope: string | undefined;
  for (const description of sortSecretDescriptions(descriptions)) {
    if (description.scope !== currentScope) {
      currentScope = description.scope;
      lines.push('', `${yamlName(description.scope)}:`);
    }
    for (const line of description.instructions.split('\n')) {
      lines.push(`  # ${line}`.trimEnd());
    }
    lines.push(`  # ${yamlName(description.key)}: ""`);
  }

  return lines.join('\n') + '\n';
}

/**
 * Write a secrets template. Refuses to overwrite an existing file.
 */
export function initSecretsFile(descriptions: readonly SecretDescription[], file: string = getSecretsFile()): string {
  if (hasSecretsFile(file)) {
    throw new SecretError(
      SecretErrorCode.CONFIG_ERROR,
      `Secrets file already exists at ${file}`
    );
  }

  const dir = path.dirname(file);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { mode: 0o700, recursive: true });
  }

  fs.writeFileSync(file, renderSecretsTemplate(descriptions), { mode: 0o600 });
  return file;
}
