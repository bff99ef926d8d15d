import { describe, it, expect, beforeEach } from 'vitest';
import { LLMProviderManager } from '../llm/provider';
import { NotConfiguredError, UnsupportedProviderError } from '../errors';
import { PROVIDER_NAMES } from '../types';
import { FakeFactories, createFakeFactories } from './helpers';

describe('LLMProviderManager', () => {
  let fakes: FakeFactories;
  let manager: LLMProviderManager;

  beforeEach(() => {
    fakes = createFakeFactories();
    manager = new LLMProviderManager(fakes.factories);
  });

  it.each(PROVIDER_NAMES)('rejects %s with NotConfiguredError before a key is supplied', async name => {
    await expect(manager.generate(name, 'hello')).rejects.toBeInstanceOf(NotConfiguredError);
    expect(fakes.providers[name].generate).not.toHaveBeenCalled();
  });

  it.each(['', 'cohere', 'OpenAI', 'claude'])('rejects unknown provider %j', async name => {
    manager.configure({ openai_key: 'k1', gemini_key: 'k2', anthropic_key: 'k3' });

    await expect(manager.generate(name, 'any prompt')).rejects.toBeInstanceOf(UnsupportedProviderError);
    await expect(manager.generate(name, 'another prompt')).rejects.toThrow(`Unsupported provider: ${name}`);
  });

  it('returns the provider reply unchanged once configured', async () => {
    fakes.providers.openai.generate.mockResolvedValueOnce('  raw text\n');

    expect(manager.configure({ openai_key: 'k1' })).toBe(true);

    await expect(manager.generate('openai', 'hello')).resolves.toBe('  raw text\n');
    expect(fakes.keys.openai).toBe('k1');
    expect(fakes.providers.openai.generate).toHaveBeenCalledWith('hello', 4000);
  });

  it('passes an explicit token cap through', async () => {
    manager.configure({ anthropic_key: 'k3' });

    await manager.generate('anthropic', 'hello', 3000);

    expect(fakes.providers.anthropic.generate).toHaveBeenCalledWith('hello', 3000);
  });

  it('treats an empty configuration as success and leaves gemini unconfigured', async () => {
    expect(manager.configure({})).toBe(true);

    await expect(manager.generate('gemini', 'hello')).rejects.toThrow(
      "Provider 'gemini' is not configured. Supply its API key first."
    );
  });

  it('ignores empty keys', () => {
    manager.configure({ openai_key: '', gemini_key: 'k2' });

    expect(manager.getAvailableProviders()).toEqual(['gemini']);
    expect(fakes.keys.openai).toBeUndefined();
  });

  it('keeps configuring the others when one provider fails, and reports false', async () => {
    const factories = {
      ...fakes.factories,
      openai: () => {
        throw new Error('bad key format');
      },
    };
    manager = new LLMProviderManager(factories);

    const ok = manager.configure({ openai_key: 'k1', gemini_key: 'k2', anthropic_key: 'k3' });

    expect(ok).toBe(false);
    expect(manager.getAvailableProviders()).toEqual(['gemini', 'anthropic']);
    await expect(manager.generate('anthropic', 'hello')).resolves.toBe('anthropic reply');
  });

  it('keeps earlier providers when a later call configures another', () => {
    manager.configure({ openai_key: 'k1' });
    manager.configure({ anthropic_key: 'k3' });

    expect(manager.getAvailableProviders()).toEqual(['openai', 'anthropic']);
  });

  it('does not share credentials between instances', async () => {
    manager.configure({ gemini_key: 'k2' });
    const other = new LLMProviderManager(createFakeFactories().factories);

    await expect(other.generate('gemini', 'hello')).rejects.toBeInstanceOf(NotConfiguredError);
  });
});
