/**
 * LLM Provider abstraction
 */
import {
  CREDENTIAL_KEYS,
  LLMProvider,
  PROVIDER_NAMES,
  ProviderCredentials,
  ProviderFactory,
  ProviderName,
  isProviderName,
} from '../types';
import { NotConfiguredError, UnsupportedProviderError, errorMessage } from '../errors';
import { getLogger } from '../logger';
import { OpenAIProvider } from './openai';
import { GeminiProvider } from './gemini';
import { ClaudeProvider } from './claude';

const logger = getLogger('llm.provider');

export const DEFAULT_MAX_TOKENS = 4000;

const PROVIDER_LABELS: Record<ProviderName, string> = {
  openai: 'OpenAI',
  gemini: 'Gemini',
  anthropic: 'Anthropic',
};

export type ProviderFactories = Record<ProviderName, ProviderFactory>;

export function createDefaultFactories(models: Partial<Record<ProviderName, string>> = {}): ProviderFactories {
  return {
    openai: apiKey => new OpenAIProvider(apiKey, models.openai),
    gemini: apiKey => new GeminiProvider(apiKey, models.gemini),
    anthropic: apiKey => new ClaudeProvider(apiKey, models.anthropic),
  };
}

/**
 * Holds the configured provider clients of one generator instance
 */
export class LLMProviderManager {
  private providers: Map<ProviderName, LLMProvider> = new Map();
  private readonly factories: ProviderFactories;

  constructor(factories: ProviderFactories = createDefaultFactories()) {
    this.factories = factories;
  }

  /**
   * Build a client for every supplied key. Each provider is attempted on its
   * own; the result is false if any of them failed.
   */
  public configure(credentials: ProviderCredentials): boolean {
    let ok = true;

    for (const name of PROVIDER_NAMES) {
      const apiKey = credentials[CREDENTIAL_KEYS[name]];
      if (!apiKey) continue;

      try {
        this.providers.set(name, this.factories[name](apiKey));
        logger.info(`${PROVIDER_LABELS[name]} configured successfully`);
      } catch (error) {
        ok = false;
        logger.error(`Error configuring ${PROVIDER_LABELS[name]}: ${errorMessage(error)}`);
      }
    }

    return ok;
  }

  public getProvider(name: string): LLMProvider {
    if (!isProviderName(name)) {
      throw new UnsupportedProviderError(name);
    }

    const provider = this.providers.get(name);
    if (!provider) {
      throw new NotConfiguredError(name);
    }

    return provider;
  }

  public getAvailableProviders(): ProviderName[] {
    return PROVIDER_NAMES.filter(name => this.providers.has(name));
  }

  public async generate(providerName: string, prompt: string, maxTokens: number = DEFAULT_MAX_TOKENS): Promise<string> {
    const provider = this.getProvider(providerName);
    return provider.generate(prompt, maxTokens);
  }
}
