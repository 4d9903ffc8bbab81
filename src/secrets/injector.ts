import type { RawSecrets } from './types';
import { type SecretKind, makeSecret } from './secret';

/**
 * Base class for delayed injection of a value.
 */
export abstract class Injector<T> {
  abstract inject(raw: RawSecrets): T;
}

/**
 * Declares that a secret of `kind` is needed, before any secrets are loaded.
 * Holds the kind only; every inject() call performs a fresh lookup.
 */
export class InjectSecret<K extends SecretKind> extends Injector<InstanceType<K>> {
  constructor(readonly kind: K) {
    super();
  }

  /**
   * @throws MissingSecretValues if the kind is required and absent
   */
  inject(raw: RawSecrets): InstanceType<K> {
    return makeSecret(this.kind, raw);
  }

  toString(): string {
    return `InjectSecret(${this.kind.name})`;
  }
}
