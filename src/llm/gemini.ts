/**
 * Google Gemini provider
 */
import { GoogleGenerativeAI } from '@google/generative-ai';
import { LLMProvider } from '../types';
import { GenerationFailedError } from '../errors';
import { getLogger } from '../logger';

const logger = getLogger('llm.gemini');

export const GEMINI_DEFAULT_MODEL = 'gemini-pro';

export class GeminiProvider implements LLMProvider {
  public readonly name = 'gemini';
  public readonly model: string;
  private genAI: GoogleGenerativeAI;

  constructor(apiKey: string, model: string = GEMINI_DEFAULT_MODEL) {
    this.genAI = new GoogleGenerativeAI(apiKey);
    this.model = model;
  }

  public async generate(prompt: string, maxTokens: number): Promise<string> {
    const model = this.genAI.getGenerativeModel({
      model: this.model,
      generationConfig: {
        maxOutputTokens: maxTokens,
      },
    });

    try {
      const result = await model.generateContent(prompt);
      const text = result.response.text();
      logger.debug(`Gemini text() result length: ${text.length}`);
      return text;
    } catch (error) {
      const failure = new GenerationFailedError(this.name, 'Gemini', error);
      logger.error(failure.message, { provider: this.name });
      throw failure;
    }
  }
}
