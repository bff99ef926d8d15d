/**
 * Anthropic Claude provider
 */
import Anthropic from '@anthropic-ai/sdk';
import { LLMProvider } from '../types';
import { GenerationFailedError } from '../errors';
import { getLogger } from '../logger';

const logger = getLogger('llm.anthropic');

export const ANTHROPIC_DEFAULT_MODEL = 'claude-3-sonnet-20240229';

export class ClaudeProvider implements LLMProvider {
  public readonly name = 'anthropic';
  public readonly model: string;
  private client: Anthropic;

  constructor(apiKey: string, model: string = ANTHROPIC_DEFAULT_MODEL) {
    this.client = new Anthropic({ apiKey });
    this.model = model;
  }

  public async generate(prompt: string, maxTokens: number): Promise<string> {
    try {
      const message = await this.client.messages.create({
        model: this.model,
        max_tokens: maxTokens,
        temperature: 0.7,
        messages: [
          {
            role: 'user',
            content: prompt,
          },
        ],
      });

      const textContent = message.content.find(block => block.type === 'text');
      if (!textContent || textContent.type !== 'text') {
        throw new Error('No text content in Claude response');
      }

      return textContent.text;
    } catch (error) {
      const failure = new GenerationFailedError(this.name, 'Anthropic', error);
      logger.error(failure.message, { provider: this.name });
      throw failure;
    }
  }
}
