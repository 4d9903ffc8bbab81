import { RequiredSecret, type SecretDescription, registerSecretKind } from '../secrets';

export class PerspectiveDeveloperKey extends RequiredSecret {
  static description(): SecretDescription {
    return {
      scope: 'perspective_api',
      key: 'api_key',
      instructions: 'First request access https://developers.perspectiveapi.com/s/docs-get-started, then you can generate a key with https://developers.perspectiveapi.com/s/docs-enable-the-api',
    };
  }
}

registerSecretKind('perspective.PerspectiveDeveloperKey', PerspectiveDeveloperKey);
