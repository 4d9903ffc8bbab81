import { type SecretDescription, SecretError, SecretErrorCode, formatSecretDescription } from './types';

/**
 * One or more required secrets are missing from the store.
 *
 * Errors from independent lookups can be merged with combine() so a
 * single report lists everything that needs to be configured.
 */
export class MissingSecretValues extends SecretError {
  readonly descriptions: readonly SecretDescription[];

  constructor(descriptions: readonly SecretDescription[]) {
    if (descriptions.length === 0) {
      throw new SecretError(
        SecretErrorCode.INVALID_ARGUMENT,
        'Must have at least 1 description to raise an error.'
      );
    }
    super(SecretErrorCode.MISSING_SECRETS, renderMissing(descriptions));
    this.name = 'MissingSecretValues';
    this.descriptions = [...descriptions];
  }

  /**
   * Merge several errors into one. Descriptions keep input order and
   * duplicates are preserved.
   */
  static combine(errors: readonly MissingSecretValues[]): MissingSecretValues {
    return new MissingSecretValues(errors.flatMap(error => error.descriptions));
  }
}

function renderMissing(descriptions: readonly SecretDescription[]): string {
  const lines = descriptions.map(d => `- ${formatSecretDescription(d)}`);
  return ['Missing the following secrets:', ...lines].join('\n');
}
