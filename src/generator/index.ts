export { buildReplyPrompt } from './prompt';
export { ReplyGenerator } from './ReplyGenerator';
export type { TextGenerationClient } from './ReplyGenerator';
export { GeminiClient } from './GeminiClient';
