/**
 * Secret kinds of the bundled plugins.
 * Importing this module registers all of them.
 */

export { OpenAIApiKey, OpenAIOrgId } from './openai';
export { TogetherApiKey } from './together';
export { HuggingFaceToken } from './huggingface';
export { PerspectiveDeveloperKey } from './perspective';
