import { OptionalSecret, RequiredSecret, type SecretDescription, registerSecretKind } from '../secrets';

export class OpenAIApiKey extends RequiredSecret {
  static description(): SecretDescription {
    return {
      scope: 'openai',
      key: 'api_key',
      instructions: 'See https://platform.openai.com/api-keys',
    };
  }
}

export class OpenAIOrgId extends OptionalSecret {
  static description(): SecretDescription {
    return {
      scope: 'openai',
      key: 'org_id',
      instructions: 'Only needed for accounts in more than one organization. See https://platform.openai.com/account/organization',
    };
  }
}

registerSecretKind('openai.OpenAIApiKey', OpenAIApiKey);
registerSecretKind('openai.OpenAIOrgId', OpenAIOrgId);
