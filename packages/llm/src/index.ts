export { EchoCompletionModel } from './echo';
export type { Completion, EchoCompletionModelOptions } from './echo';
export { MockCompletionModel, DEFAULT_NUM_OUTPUTS } from './mock';
export type { MockCompletionModelOptions } from './mock';
export { OpenAICompletionModel } from './openai';
export type { OpenAICompletionModelOptions } from './openai';
export { countTokens, extractKeywords } from './tokens';
