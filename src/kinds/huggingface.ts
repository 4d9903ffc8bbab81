import { RequiredSecret, type SecretDescription, registerSecretKind } from '../secrets';

/** Token used to download gated models and call inference endpoints. */
export class HuggingFaceToken extends RequiredSecret {
  static description(): SecretDescription {
    return {
      scope: 'hugging_face',
      key: 'token',
      instructions: 'You can create tokens at https://huggingface.co/settings/tokens.',
    };
  }
}

registerSecretKind('huggingface.HuggingFaceToken', HuggingFaceToken);
