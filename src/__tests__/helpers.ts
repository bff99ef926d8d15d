import { vi } from 'vitest';
import type { Mock } from 'vitest';
import { LLMProvider, ProviderName } from '../types';
import { ProviderFactories } from '../llm/provider';

export interface FakeProvider extends LLMProvider {
  generate: Mock<(prompt: string, maxTokens: number) => Promise<string>>;
}

export function createFakeProvider(name: ProviderName, reply: (prompt: string) => string = () => `${name} reply`): FakeProvider {
  return {
    name,
    model: `${name}-test-model`,
    generate: vi.fn(async (prompt: string, _maxTokens: number) => reply(prompt)),
  };
}

export interface FakeFactories {
  factories: ProviderFactories;
  providers: Record<ProviderName, FakeProvider>;
  keys: Partial<Record<ProviderName, string>>;
}

/**
 * Factories that hand out deterministic providers and remember the key used
 */
export function createFakeFactories(reply?: (prompt: string) => string): FakeFactories {
  const providers: Record<ProviderName, FakeProvider> = {
    openai: createFakeProvider('openai', reply),
    gemini: createFakeProvider('gemini', reply),
    anthropic: createFakeProvider('anthropic', reply),
  };
  const keys: Partial<Record<ProviderName, string>> = {};

  const factories: ProviderFactories = {
    openai: apiKey => {
      keys.openai = apiKey;
      return providers.openai;
    },
    gemini: apiKey => {
      keys.gemini = apiKey;
      return providers.gemini;
    },
    anthropic: apiKey => {
      keys.anthropic = apiKey;
      return providers.anthropic;
    },
  };

  return { factories, providers, keys };
}

export const sampleBookData = {
  title: 'The Lighthouse Keeper',
  genre: 'mystery',
  target_audience: 'young adults',
  theme: 'trust and isolation',
  length: 60000,
  num_chapters: 12,
};
