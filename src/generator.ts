/**
 * Outline and chapter generation on top of the provider manager
 */
import { setTimeout as sleep } from 'node:timers/promises';
import { BookSpec, ChapterSpec, FullBook, GeneratedChapter, ProviderCredentials, ProviderName } from './types';
import { DEFAULT_MAX_TOKENS, LLMProviderManager } from './llm/provider';
import { buildPrompt, getPrompts } from './prompts';
import { getLogger } from './logger';

const logger = getLogger('generator');

export const CHAPTER_MAX_TOKENS = 3000;
export const OUTLINE_CONTEXT_CHARS = 1000;
export const FULL_BOOK_CHAPTER_LIMIT = 3;
export const CHAPTER_PAUSE_MS = 1000;

export const DEFAULT_CHAPTER_LENGTH = 2000;
export const DEFAULT_TONE = 'Engaging and appropriate for the genre';

export type DelayFn = (ms: number) => Promise<void>;

export interface BookGeneratorOptions {
  providers?: LLMProviderManager;
  credentials?: ProviderCredentials;
  delay?: DelayFn;
}

export const defaultDelay: DelayFn = async ms => {
  await sleep(ms);
};

export class BookGenerator {
  private readonly providers: LLMProviderManager;
  private readonly delay: DelayFn;

  constructor(options: BookGeneratorOptions = {}) {
    this.providers = options.providers ?? new LLMProviderManager();
    this.delay = options.delay ?? defaultDelay;

    if (options.credentials) {
      this.configure(options.credentials);
    }
  }

  public configure(credentials: ProviderCredentials): boolean {
    return this.providers.configure(credentials);
  }

  public getAvailableProviders(): ProviderName[] {
    return this.providers.getAvailableProviders();
  }

  public generate(providerName: string, prompt: string, maxTokens: number = DEFAULT_MAX_TOKENS): Promise<string> {
    return this.providers.generate(providerName, prompt, maxTokens);
  }

  public createOutline(providerName: string, book: BookSpec): Promise<string> {
    const prompt = buildPrompt(getPrompts().outline, {
      genre: String(book.genre),
      title: String(book.title),
      target_audience: String(book.target_audience),
      theme: String(book.theme),
      length: String(book.length),
      additional_details: String(book.additional_details ?? ''),
      num_chapters: String(book.num_chapters),
    });

    logger.info(`Creating outline for "${book.title}" with ${providerName}`);
    return this.generate(providerName, prompt);
  }

  public generateChapter(providerName: string, book: BookSpec, chapter: ChapterSpec, outline: string): Promise<string> {
    const prompt = buildPrompt(getPrompts().chapter, {
      chapter_number: String(chapter.number),
      chapter_title: String(chapter.title),
      chapter_description: String(chapter.description),
      title: String(book.title),
      genre: String(book.genre),
      target_audience: String(book.target_audience),
      theme: String(book.theme),
      chapter_length: String(book.chapter_length ?? DEFAULT_CHAPTER_LENGTH),
      tone: String(book.tone ?? DEFAULT_TONE),
      // whole code points, so a surrogate pair is never split
      outline: Array.from(outline).slice(0, OUTLINE_CONTEXT_CHARS).join(''),
    });

    logger.info(`Generating chapter ${chapter.number} of "${book.title}" with ${providerName}`);
    return this.generate(providerName, prompt, CHAPTER_MAX_TOKENS);
  }

  /**
   * Outline plus the first few chapters, generated one after another.
   * Chapter titles and descriptions are placeholders; the outline text is
   * passed as context but not parsed.
   */
  public async generateFullBook(providerName: string, book: BookSpec): Promise<FullBook> {
    const outline = await this.createOutline(providerName, book);

    const chapters: GeneratedChapter[] = [];
    const count = Math.trunc(Math.min(FULL_BOOK_CHAPTER_LIMIT, book.num_chapters));

    for (let i = 1; i <= count; i++) {
      if (i > 1) {
        await this.delay(CHAPTER_PAUSE_MS);
      }

      const chapter: ChapterSpec = {
        number: i,
        title: `Chapter ${i}`,
        description: `Chapter ${i} content based on the outline`,
      };

      const content = await this.generateChapter(providerName, book, chapter, outline);
      chapters.push({ number: i, title: `Chapter ${i}`, content });
    }

    logger.info(`Generated outline and ${chapters.length} chapter(s) for "${book.title}"`);
    return { outline, chapters };
  }
}
