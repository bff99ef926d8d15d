/**
 * Core types for Bookwright
 */

export const PROVIDER_NAMES = ['openai', 'gemini', 'anthropic'] as const;

export type ProviderName = typeof PROVIDER_NAMES[number];

export function isProviderName(value: string): value is ProviderName {
  return (PROVIDER_NAMES as readonly string[]).includes(value);
}

/**
 * API keys as posted to /configure-apis
 */
export interface ProviderCredentials {
  openai_key?: string;
  gemini_key?: string;
  anthropic_key?: string;
}

export const CREDENTIAL_KEYS: Record<ProviderName, keyof ProviderCredentials> = {
  openai: 'openai_key',
  gemini: 'gemini_key',
  anthropic: 'anthropic_key',
};

export interface LLMProvider {
  readonly name: ProviderName;
  readonly model: string;
  generate(prompt: string, maxTokens: number): Promise<string>;
}

export type ProviderFactory = (apiKey: string) => LLMProvider;

/**
 * Field values are rendered into prompts as-is; only their presence is checked.
 */
export type BookField = string | number | boolean;

export interface BookSpec {
  title: BookField;
  genre: BookField;
  target_audience: BookField;
  theme: BookField;
  length: BookField;
  num_chapters: number;
  additional_details?: BookField;
  chapter_length?: BookField;
  tone?: BookField;
}

export interface ChapterSpec {
  number: BookField;
  title: BookField;
  description: BookField;
}

export interface GeneratedChapter {
  number: number;
  title: string;
  content: string;
}

export interface FullBook {
  outline: string;
  chapters: GeneratedChapter[];
}
