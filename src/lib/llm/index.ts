/**
 * LLM Module
 */

export * from './llm.types';
export { ChatLLMClient, createLLMClientFromEnv } from './llm.client';
export type { LLMClientSettings } from './llm.client';
export { OpenAIChatTransport } from './openai.transport';
export { truncateContent, MAX_ANALYSIS_CONTENT_LENGTH } from './llm.prompts';
