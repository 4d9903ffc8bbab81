/**
 * Batch resolution
 *
 * Resolves many injectors against one store and reports every missing
 * secret in a single MissingSecretValues instead of stopping at the first.
 */

import type { RawSecrets, SecretDescription } from './types';
import { MissingSecretValues } from './errors';
import { InjectSecret, Injector } from './injector';
import { type SecretKind, makeSecret } from './secret';

export type SecretResolution<T> =
  | { ok: true; value: T }
  | { ok: false; error: MissingSecretValues };

/**
 * Inject without throwing for missing secrets. Any other error propagates.
 */
export function tryInject<T>(injector: Injector<T>, raw: RawSecrets): SecretResolution<T> {
  try {
    return { ok: true, value: injector.inject(raw) };
  } catch (err) {
    if (err instanceof MissingSecretValues) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

/**
 * Unwrap every resolution, or throw one error listing all failures in order.
 */
export function combineResolutions<T>(resolutions: readonly SecretResolution<T>[]): T[] {
  const values: T[] = [];
  const errors: MissingSecretValues[] = [];

  for (const resolution of resolutions) {
    if (resolution.ok) {
      values.push(resolution.value);
    } else {
      errors.push(resolution.error);
    }
  }

  if (errors.length > 0) {
    throw MissingSecretValues.combine(errors);
  }
  return values;
}

/**
 * Inject every injector, in order.
 * @throws MissingSecretValues covering all missing secrets
 */
export function injectAll<T>(injectors: readonly Injector<T>[], raw: RawSecrets): T[] {
  return combineResolutions(injectors.map(injector => tryInject(injector, raw)));
}

/**
 * Inject a named set of injectors.
 * @throws MissingSecretValues covering all missing secrets
 */
export function resolveSecrets<T>(
  injectors: Readonly<Record<string, Injector<T>>>,
  raw: RawSecrets
): Record<string, T> {
  const names = Object.keys(injectors);
  const values = injectAll(names.map(name => injectors[name]), raw);

  const resolved: Record<string, T> = {};
  names.forEach((name, i) => {
    resolved[name] = values[i];
  });
  return resolved;
}

/**
 * Replace every Injector among a plugin's constructor arguments with its
 * injected value. Other arguments are passed through unchanged.
 * @throws MissingSecretValues covering all missing secrets
 */
export function injectDependencies(args: readonly unknown[], raw: RawSecrets): unknown[] {
  const resolutions = args.map((arg): SecretResolution<unknown> =>
    arg instanceof Injector ? tryInject(arg, raw) : { ok: true, value: arg }
  );
  return combineResolutions(resolutions);
}

export interface SecretCheckReport {
  missingRequired: SecretDescription[];
  missingOptional: SecretDescription[];
}

/**
 * Resolve each kind and report which descriptions are absent.
 * Never throws for missing secrets; used by setup tooling.
 */
export function checkSecretKinds(kinds: readonly SecretKind[], raw: RawSecrets): SecretCheckReport {
  const report: SecretCheckReport = { missingRequired: [], missingOptional: [] };

  for (const kind of kinds) {
    if (kind.requirement === 'required') {
      const resolution = tryInject(new InjectSecret(kind), raw);
      if (!resolution.ok) {
        report.missingRequired.push(...resolution.error.descriptions);
      }
    } else if (makeSecret(kind, raw).value === null) {
      report.missingOptional.push(kind.description());
    }
  }

  return report;
}
