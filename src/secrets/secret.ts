/**
 * Secret kinds
 *
 * A kind is a class extending RequiredSecret or OptionalSecret that
 * overrides the static description(). Instances are resolved values.
 *
 *   export class OpenAIApiKey extends RequiredSecret {
 *     static description(): SecretDescription {
 *       return { scope: 'openai', key: 'api_key', instructions: '...' };
 *     }
 *   }
 *   registerSecretKind('openai.OpenAIApiKey', OpenAIApiKey);
 *
 *   OpenAIApiKey.make(raw).value; // string, or throws MissingSecretValues
 */

import { type RawSecrets, type SecretDescription, SecretError, SecretErrorCode, type SerializedSecret, lookupSecretValue } from './types';
import { MissingSecretValues } from './errors';
import { serializeSecret } from './registry';

export type SecretRequirement = 'required' | 'optional';

/**
 * Base class for all secrets.
 */
export abstract class BaseSecret {
  abstract readonly value: string | null;

  static description(): SecretDescription {
    throw new SecretError(
      SecretErrorCode.NOT_IMPLEMENTED,
      `Secret kind "${this.name}" must override static description()`,
      { kind: this.name }
    );
  }

  /**
   * Serializes as a pointer to the kind's registered id so values never
   * end up in JSON.
   * @throws SecretError with UNKNOWN_KIND if the kind was never registered
   */
  toJSON(): SerializedSecret {
    return serializeSecret(this);
  }

  toString(): string {
    return `${this.constructor.name}(${this.value === null ? 'unset' : '***'})`;
  }
}

/**
 * Base class for secrets the system cannot run without.
 */
export abstract class RequiredSecret extends BaseSecret {
  static readonly requirement = 'required' as const;

  constructor(readonly value: string) {
    super();
  }

  /**
   * Read the secret from raw secrets.
   * @throws MissingSecretValues if scope or key is absent
   */
  static make<T extends RequiredSecret>(this: RequiredSecretKind<T>, raw: RawSecrets): T {
    return makeRequired(this, raw);
  }
}

/**
 * Base class for secrets whose absence only degrades behavior.
 */
export abstract class OptionalSecret extends BaseSecret {
  static readonly requirement = 'optional' as const;

  constructor(readonly value: string | null) {
    super();
  }

  /** Read the secret from raw secrets, or null if it wasn't provided. */
  static make<T extends OptionalSecret>(this: OptionalSecretKind<T>, raw: RawSecrets): T {
    return makeOptional(this, raw);
  }
}

export interface RequiredSecretKind<T extends RequiredSecret = RequiredSecret> {
  readonly name: string;
  readonly requirement: 'required';
  new (value: string): T;
  description(): SecretDescription;
}

export interface OptionalSecretKind<T extends OptionalSecret = OptionalSecret> {
  readonly name: string;
  readonly requirement: 'optional';
  new (value: string | null): T;
  description(): SecretDescription;
}

/** Any concrete secret kind, tagged by its requirement. */
export type SecretKind = RequiredSecretKind | OptionalSecretKind;

function makeRequired<T extends RequiredSecret>(kind: RequiredSecretKind<T>, raw: RawSecrets): T {
  const description = kind.description();
  const value = lookupSecretValue(raw, description);
  if (value === undefined) {
    throw new MissingSecretValues([description]);
  }
  return new kind(value);
}

function makeOptional<T extends OptionalSecret>(kind: OptionalSecretKind<T>, raw: RawSecrets): T {
  const value = lookupSecretValue(raw, kind.description());
  return new kind(value ?? null);
}

/**
 * Resolve any kind against raw secrets; same as kind.make(raw).
 */
export function makeSecret<K extends SecretKind>(kind: K, raw: RawSecrets): InstanceType<K>;
export function makeSecret(kind: SecretKind, raw: RawSecrets): BaseSecret {
  return kind.requirement === 'required' ? makeRequired(kind, raw) : makeOptional(kind, raw);
}
