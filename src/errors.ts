import { ProviderName } from './types';

export type BookGenErrorCode =
  | 'NOT_CONFIGURED'
  | 'UNSUPPORTED_PROVIDER'
  | 'GENERATION_FAILED'
  | 'MISSING_FIELD';

export interface BookGenErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class BookGenError extends Error {
  readonly code: BookGenErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(name: string, code: BookGenErrorCode, message: string, options: BookGenErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = name;
    this.code = code;
    this.details = options.details;
  }
}

/**
 * Provider is known but no API key has been supplied for it
 */
export class NotConfiguredError extends BookGenError {
  readonly provider: ProviderName;

  constructor(provider: ProviderName) {
    super('NotConfiguredError', 'NOT_CONFIGURED', `Provider '${provider}' is not configured. Supply its API key first.`, {
      details: { provider },
    });
    this.provider = provider;
  }
}

export class UnsupportedProviderError extends BookGenError {
  readonly provider: string;

  constructor(provider: string) {
    super('UnsupportedProviderError', 'UNSUPPORTED_PROVIDER', `Unsupported provider: ${provider}`, {
      details: { provider },
    });
    this.provider = provider;
  }
}

/**
 * Any failure reported by a provider SDK, wrapped so callers only see one type
 */
export class GenerationFailedError extends BookGenError {
  readonly provider: ProviderName;

  constructor(provider: ProviderName, label: string, cause: unknown) {
    super('GenerationFailedError', 'GENERATION_FAILED', `${label} API error: ${errorMessage(cause)}`, {
      details: { provider },
      cause,
    });
    this.provider = provider;
  }
}

export class MissingFieldError extends BookGenError {
  readonly field: string;

  constructor(field: string) {
    super('MissingFieldError', 'MISSING_FIELD', `Missing required field: ${field}`, { details: { field } });
    this.field = field;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
