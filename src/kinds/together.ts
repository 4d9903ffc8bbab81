import { RequiredSecret, type SecretDescription, registerSecretKind } from '../secrets';

export class TogetherApiKey extends RequiredSecret {
  static description(): SecretDescription {
    return {
      scope: 'together',
      key: 'api_key',
      instructions: 'See https://api.together.xyz/settings/api-keys',
    };
  }
}

registerSecretKind('together.TogetherApiKey', TogetherApiKey);
