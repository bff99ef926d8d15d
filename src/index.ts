export * from './types';
export * from './errors';
export { loadConfig } from './config';
export type { AppConfig } from './config';
export { getLogger } from './logger';
export { DEFAULT_PROMPTS, buildPrompt, getPrompts } from './prompts';
export type { PromptConfig } from './prompts';
export { LLMProviderManager, createDefaultFactories, DEFAULT_MAX_TOKENS } from './llm/provider';
export type { ProviderFactories } from './llm/provider';
export { OpenAIProvider } from './llm/openai';
export { GeminiProvider } from './llm/gemini';
export { ClaudeProvider } from './llm/claude';
export { BookGenerator, CHAPTER_MAX_TOKENS, OUTLINE_CONTEXT_CHARS, FULL_BOOK_CHAPTER_LIMIT } from './generator';
export type { BookGeneratorOptions, DelayFn } from './generator';
export * from './handlers';
export { createApp } from './app';
