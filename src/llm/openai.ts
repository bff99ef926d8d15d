/**
 * OpenAI chat completions provider
 */
import OpenAI from 'openai';
import { LLMProvider } from '../types';
import { GenerationFailedError } from '../errors';
import { getLogger } from '../logger';

const logger = getLogger('llm.openai');

export const OPENAI_DEFAULT_MODEL = 'gpt-4';

export const SYSTEM_PROMPT = 'You are a professional book writer. Create engaging, well-structured content.';

export class OpenAIProvider implements LLMProvider {
  public readonly name = 'openai';
  public readonly model: string;
  private client: OpenAI;

  constructor(apiKey: string, model: string = OPENAI_DEFAULT_MODEL) {
    this.client = new OpenAI({ apiKey });
    this.model = model;
  }

  public async generate(prompt: string, maxTokens: number): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        max_tokens: maxTokens,
        temperature: 0.7,
      });

      const content = completion.choices[0]?.message.content;
      if (content === null || content === undefined) {
        throw new Error('No text content in OpenAI response');
      }

      return content;
    } catch (error) {
      const failure = new GenerationFailedError(this.name, 'OpenAI', error);
      logger.error(failure.message, { provider: this.name });
      throw failure;
    }
  }
}
