/**
 * Secret Kind Types
 *
 * Shared data model for declaring and resolving plugin secrets:
 * descriptions, the raw store shape, and the error taxonomy.
 */

// --- Error Taxonomy --------------------------------------

/**
 * Error codes for categorizing secret declaration and resolution failures.
 * Enables callers to handle errors programmatically without message matching.
 */
export enum SecretErrorCode {
  /** One or more required secrets are absent from the store */
  MISSING_SECRETS = 'MISSING_SECRETS',
  /** A kind's description has an empty or malformed scope, key or instructions */
  INVALID_DESCRIPTION = 'INVALID_DESCRIPTION',
  /** A kind did not override description() */
  NOT_IMPLEMENTED = 'NOT_IMPLEMENTED',
  /** A kind with the same name is already registered */
  DUPLICATE_KIND = 'DUPLICATE_KIND',
  /** No kind is registered under the requested name */
  UNKNOWN_KIND = 'UNKNOWN_KIND',
  /** Caller passed an argument that violates a precondition */
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  /** Secrets file is unreadable or malformed */
  CONFIG_ERROR = 'CONFIG_ERROR',
  /** Generic internal error */
  INTERNAL = 'INTERNAL',
}

/**
 * Typed error for secret operations.
 * Enables programmatic error handling without message parsing.
 */
export class SecretError extends Error {
  readonly code: SecretErrorCode;
  readonly kind?: string;
  readonly scope?: string;
  readonly key?: string;

  constructor(
    code: SecretErrorCode,
    message: string,
    options?: { kind?: string; scope?: string; key?: string; cause?: Error }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'SecretError';
    this.code = code;
    this.kind = options?.kind;
    this.scope = options?.scope;
    this.key = options?.key;
  }
}

// --- Core Types ------------------------------------------

/**
 * How to look up a secret and how to get the value if you don't have it.
 */
export interface SecretDescription {
  /** Namespace in the store, usually the provider (e.g., "openai") */
  readonly scope: string;
  /** Key within the scope (e.g., "api_key") */
  readonly key: string;
  /** What a human has to do to obtain the value */
  readonly instructions: string;
}

/**
 * Secrets as read from the secrets file: scope -> key -> value.
 */
export type RawSecrets = Readonly<Record<string, Readonly<Record<string, string>>>>;

/**
 * Pointer to a secret's kind in serializable form. Never carries the value.
 */
export interface SerializedSecret {
  kind: string;
}

// --- Validation ------------------------------------------

/** Maximum length of a scope or key */
const MAX_NAME_LENGTH = 128;

/**
 * Validate a description returned by a kind.
 *
 * @throws SecretError with INVALID_DESCRIPTION code on validation failure
 */
export function validateSecretDescription(description: SecretDescription, kind?: string): void {
  const label = kind ? `Secret kind "${kind}"` : 'Secret description';

  for (const field of ['scope', 'key'] as const) {
    const value: unknown = description[field];
    if (typeof value !== 'string' || value.length === 0) {
      throw new SecretError(
        SecretErrorCode.INVALID_DESCRIPTION,
        `${label}: ${field} must be a non-empty string`,
        { kind }
      );
    }
    if (value.trim() !== value) {
      throw new SecretError(
        SecretErrorCode.INVALID_DESCRIPTION,
        `${label}: ${field} must not have leading or trailing whitespace: "${value}"`,
        { kind }
      );
    }
    if (value.length > MAX_NAME_LENGTH) {
      throw new SecretError(
        SecretErrorCode.INVALID_DESCRIPTION,
        `${label}: ${field} exceeds maximum length of ${MAX_NAME_LENGTH} characters`,
        { kind }
      );
    }
  }

  const instructions: unknown = description.instructions;
  if (typeof instructions !== 'string' || instructions.trim().length === 0) {
    throw new SecretError(
      SecretErrorCode.INVALID_DESCRIPTION,
      `${label}: instructions must be a non-empty string`,
      { kind, scope: description.scope, key: description.key }
    );
  }
}

/**
 * Read raw[scope][key], looking only at own properties.
 * Returns undefined when either level is absent.
 */
export function lookupSecretValue(raw: RawSecrets, description: SecretDescription): string | undefined {
  if (!Object.prototype.hasOwnProperty.call(raw, description.scope)) {
    return undefined;
  }
  const scoped = raw[description.scope];
  if (!Object.prototype.hasOwnProperty.call(scoped, description.key)) {
    return undefined;
  }
  return scoped[description.key];
}

/**
 * One-line rendering of a description: where it lives and how to get it.
 */
export function formatSecretDescription(description: SecretDescription): string {
  return `scope "${description.scope}", key "${description.key}": ${description.instructions}`;
}
