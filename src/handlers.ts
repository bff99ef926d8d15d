/**
 * Request handlers: JSON body in, `{ success, ... }` payload out.
 * Failures never throw; they come back as `success: false` with a message.
 */
import { BookField, BookSpec, ChapterSpec, GeneratedChapter, ProviderCredentials, ProviderName } from './types';
import { MissingFieldError, errorMessage } from './errors';
import { BookGenerator } from './generator';
import { getLogger } from './logger';

const logger = getLogger('handlers');

export const DEFAULT_NUM_CHAPTERS = 10;

export interface FailureResponse {
  success: false;
  message: string;
}

export interface ConfigureResponse {
  success: boolean;
  message: string;
}

export interface OutlineResponse {
  success: true;
  outline: string;
  timestamp: string;
}

export interface ChapterResponse {
  success: true;
  content: string;
  chapter_number: BookField;
  timestamp: string;
}

export interface FullBookResponse {
  success: true;
  outline: string;
  chapters: GeneratedChapter[];
  total_chapters: number;
  timestamp: string;
}

export interface HealthResponse {
  status: 'healthy';
  timestamp: string;
  providers: ProviderName[];
}

type Body = Record<string, unknown>;

function asBody(value: unknown): Body {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

function requireValue(body: Body, key: string, path: string = key): unknown {
  const value = body[key];
  if (value === undefined || value === null) {
    throw new MissingFieldError(path);
  }
  return value;
}

function toField(value: unknown): BookField {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return JSON.stringify(value);
}

function optionalField(body: Body, key: string): BookField | undefined {
  const value = body[key];
  return value === undefined || value === null ? undefined : toField(value);
}

/**
 * Absent, null and blank values fall back, as does anything that is not a finite number.
 */
function toNumber(value: unknown, fallback: number): number {
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'string' && value.trim() === '') return fallback;

  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function readBookSpec(value: unknown): BookSpec {
  const data = asBody(value);
  const field = (key: string): BookField => toField(requireValue(data, key, `book_data.${key}`));

  return {
    title: field('title'),
    genre: field('genre'),
    target_audience: field('target_audience'),
    theme: field('theme'),
    length: field('length'),
    num_chapters: toNumber(data.num_chapters, DEFAULT_NUM_CHAPTERS),
    additional_details: optionalField(data, 'additional_details'),
    chapter_length: optionalField(data, 'chapter_length'),
    tone: optionalField(data, 'tone'),
  };
}

export function readChapterSpec(value: unknown): ChapterSpec {
  const data = asBody(value);
  return {
    number: toField(requireValue(data, 'number', 'chapter_info.number')),
    title: toField(requireValue(data, 'title', 'chapter_info.title')),
    description: toField(requireValue(data, 'description', 'chapter_info.description')),
  };
}

export function readCredentials(value: unknown): ProviderCredentials {
  const data = asBody(value);
  const credentials: ProviderCredentials = {};

  if (typeof data.openai_key === 'string') credentials.openai_key = data.openai_key;
  if (typeof data.gemini_key === 'string') credentials.gemini_key = data.gemini_key;
  if (typeof data.anthropic_key === 'string') credentials.anthropic_key = data.anthropic_key;

  return credentials;
}

function readProvider(body: Body): string {
  return String(requireValue(body, 'provider'));
}

function timestamp(): string {
  return new Date().toISOString();
}

export async function handleConfigureApis(
  generator: BookGenerator,
  payload: unknown
): Promise<ConfigureResponse> {
  try {
    const success = generator.configure(readCredentials(payload));

    if (success) {
      return { success: true, message: 'APIs configured successfully' };
    }
    return { success: false, message: 'Failed to configure APIs' };
  } catch (error) {
    return { success: false, message: `Error: ${errorMessage(error)}` };
  }
}

export async function handleCreateOutline(
  generator: BookGenerator,
  payload: unknown
): Promise<OutlineResponse | FailureResponse> {
  try {
    const body = asBody(payload);
    const provider = readProvider(body);
    const book = readBookSpec(requireValue(body, 'book_data'));

    const outline = await generator.createOutline(provider, book);

    return { success: true, outline, timestamp: timestamp() };
  } catch (error) {
    logger.error(`Outline creation error: ${errorMessage(error)}`);
    return { success: false, message: `Error creating outline: ${errorMessage(error)}` };
  }
}

export async function handleGenerateChapter(
  generator: BookGenerator,
  payload: unknown
): Promise<ChapterResponse | FailureResponse> {
  try {
    const body = asBody(payload);
    const provider = readProvider(body);
    const book = readBookSpec(requireValue(body, 'book_data'));
    const chapter = readChapterSpec(requireValue(body, 'chapter_info'));
    const outline = typeof body.outline === 'string' ? body.outline : '';

    const content = await generator.generateChapter(provider, book, chapter, outline);

    return {
      success: true,
      content,
      chapter_number: chapter.number,
      timestamp: timestamp(),
    };
  } catch (error) {
    logger.error(`Chapter generation error: ${errorMessage(error)}`);
    return { success: false, message: `Error generating chapter: ${errorMessage(error)}` };
  }
}

export async function handleGenerateFullBook(
  generator: BookGenerator,
  payload: unknown
): Promise<FullBookResponse | FailureResponse> {
  try {
    const body = asBody(payload);
    const provider = readProvider(body);
    const book = readBookSpec(requireValue(body, 'book_data'));

    const { outline, chapters } = await generator.generateFullBook(provider, book);

    return {
      success: true,
      outline,
      chapters,
      total_chapters: chapters.length,
      timestamp: timestamp(),
    };
  } catch (error) {
    logger.error(`Full book generation error: ${errorMessage(error)}`);
    return { success: false, message: `Error generating book: ${errorMessage(error)}` };
  }
}

export function handleHealth(generator: BookGenerator): HealthResponse {
  return {
    status: 'healthy',
    timestamp: timestamp(),
    providers: generator.getAvailableProviders(),
  };
}
