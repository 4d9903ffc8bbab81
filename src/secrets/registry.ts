/**
 * Secret Kind Registry
 *
 * Process-wide registry of every declared secret kind. Plugins register
 * their kinds when their module loads, so discovery needs no central list.
 *
 * Kinds are tracked by class identity. Each one is registered under an
 * explicit id (conventionally `<plugin>.<name>`) that serialized secrets
 * point at, so two plugins may both declare a class called `ApiKey`.
 */

import { type SecretDescription, SecretError, SecretErrorCode, type SerializedSecret, validateSecretDescription } from './types';
import type { BaseSecret, SecretKind } from './secret';

export interface RegisteredSecretKind {
  id: string;
  kind: SecretKind;
}

const KIND_ID = /^[A-Za-z0-9_.\/-]+$/;

/**
 * Registered kinds by id, in registration order.
 */
const kindsById = new Map<string, SecretKind>();

/**
 * Ids by kind class. Keyed by `object` so a secret's constructor can be
 * looked up directly.
 */
const idsByKind = new Map<object, string>();

/**
 * Register a concrete secret kind under a stable id.
 *
 * Calls description() once so a kind that forgot to override it, or
 * returns a malformed description, fails at load time.
 */
export function registerSecretKind(id: string, kind: SecretKind): void {
  if (!KIND_ID.test(id)) {
    throw new SecretError(
      SecretErrorCode.INVALID_ARGUMENT,
      `Invalid secret kind id "${id}": use letters, digits, "_", "-", "." or "/"`,
      { kind: id }
    );
  }

  const existingId = idsByKind.get(kind);
  if (existingId !== undefined) {
    throw new SecretError(
      SecretErrorCode.DUPLICATE_KIND,
      `Secret kind "${kind.name}" is already registered as "${existingId}"`,
      { kind: existingId }
    );
  }
  if (kindsById.has(id)) {
    throw new SecretError(
      SecretErrorCode.DUPLICATE_KIND,
      `A different secret kind is already registered as "${id}"`,
      { kind: id }
    );
  }

  validateSecretDescription(kind.description(), id);
  kindsById.set(id, kind);
  idsByKind.set(kind, id);
}

/**
 * Get a registered kind by id.
 */
export function getSecretKind(id: string): SecretKind | undefined {
  return kindsById.get(id);
}

/**
 * Get the id a kind was registered under.
 */
export function getSecretKindId(kind: SecretKind): string | undefined {
  return idsByKind.get(kind);
}

/**
 * All registered kinds, in registration order.
 */
export function listSecretKinds(): SecretKind[] {
  return Array.from(kindsById.values());
}

/**
 * All registered kinds with their ids, in registration order.
 */
export function listRegisteredSecretKinds(): RegisteredSecretKind[] {
  return Array.from(kindsById, ([id, kind]) => ({ id, kind }));
}

/**
 * Return the descriptions of all possible secrets.
 */
export function getAllSecrets(): SecretDescription[] {
  return listSecretKinds().map(kind => kind.description());
}

/**
 * Stable sort by scope, then key. Registration order is not meaningful,
 * so anything shown to a user goes through here.
 */
export function sortSecretDescriptions<T extends SecretDescription>(descriptions: readonly T[]): T[] {
  return [...descriptions].sort(
    (a, b) => compareStrings(a.scope, b.scope) || compareStrings(a.key, b.key)
  );
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Pointer to the secret's kind, suitable for storing in plugin configs.
 * @throws SecretError with UNKNOWN_KIND if the kind was never registered
 */
export function serializeSecret(secret: BaseSecret): SerializedSecret {
  const id = idsByKind.get(secret.constructor);
  if (id === undefined) {
    throw new SecretError(
      SecretErrorCode.UNKNOWN_KIND,
      `Secret kind "${secret.constructor.name}" is not registered`
    );
  }
  return { kind: id };
}

/**
 * Look up the kind a serialized secret points to.
 */
export function deserializeSecretKind(serialized: SerializedSecret): SecretKind {
  const kind = kindsById.get(serialized.kind);
  if (!kind) {
    const available = Array.from(kindsById.keys()).join(', ') || '(none)';
    throw new SecretError(
      SecretErrorCode.UNKNOWN_KIND,
      `Unknown secret kind "${serialized.kind}". Registered kinds: ${available}`,
      { kind: serialized.kind }
    );
  }
  return kind;
}

/**
 * Forget every registered kind.
 */
export function resetSecretKinds(): void {
  kindsById.clear();
  idsByKind.clear();
}
