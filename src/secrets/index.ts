/**
 * Plugin Secrets
 *
 * Typed declaration, discovery and deferred resolution of the secrets
 * plugins need at runtime.
 *
 * Usage:
 *   import { RequiredSecret, InjectSecret, registerSecretKind } from './secrets';
 *
 *   class TogetherApiKey extends RequiredSecret {
 *     static description() {
 *       return { scope: 'together', key: 'api_key', instructions: '...' };
 *     }
 *   }
 *   registerSecretKind('together.TogetherApiKey', TogetherApiKey);
 *
 *   const pending = new InjectSecret(TogetherApiKey);   // at plugin registration
 *   const key = pending.inject(raw).value;               // once secrets are loaded
 */

export {
  registerSecretKind,
  getSecretKind,
  getSecretKindId,
  listSecretKinds,
  listRegisteredSecretKinds,
  getAllSecrets,
  sortSecretDescriptions,
  serializeSecret,
  deserializeSecretKind,
  resetSecretKinds,
} from './registry';

export {
  BaseSecret,
  RequiredSecret,
  OptionalSecret,
  makeSecret,
} from './secret';

export type {
  RequiredSecretKind,
  OptionalSecretKind,
  SecretKind,
  SecretRequirement,
} from './secret';

export { MissingSecretValues } from './errors';
export { Injector, InjectSecret } from './injector';

export {
  tryInject,
  combineResolutions,
  injectAll,
  resolveSecrets,
  injectDependencies,
  checkSecretKinds,
} from './resolution';

export type { RegisteredSecretKind } from './registry';
export type { SecretResolution, SecretCheckReport } from './resolution';

export type {
  SecretDescription,
  RawSecrets,
  SerializedSecret,
} from './types';

export {
  SecretError,
  SecretErrorCode,
  validateSecretDescription,
  lookupSecretValue,
  formatSecretDescription,
} from './types';
