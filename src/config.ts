/**
 * Environment configuration
 */
import dotenv from 'dotenv';
import { ProviderCredentials, ProviderName } from './types';

export interface AppConfig {
  port: number;
  credentials: ProviderCredentials;
  models: Partial<Record<ProviderName, string>>;
}

/**
 * Load `.env` and read the keys and model overrides it may define.
 * Empty values count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) {
    dotenv.config();
  }

  const credentials: ProviderCredentials = {};
  if (env.OPENAI_API_KEY) credentials.openai_key = env.OPENAI_API_KEY;
  if (env.GEMINI_API_KEY) credentials.gemini_key = env.GEMINI_API_KEY;
  if (env.ANTHROPIC_API_KEY) credentials.anthropic_key = env.ANTHROPIC_API_KEY;

  const models: Partial<Record<ProviderName, string>> = {};
  if (env.OPENAI_MODEL) models.openai = env.OPENAI_MODEL;
  if (env.GEMINI_MODEL) models.gemini = env.GEMINI_MODEL;
  if (env.ANTHROPIC_MODEL) models.anthropic = env.ANTHROPIC_MODEL;

  const port = Number(env.PORT);

  return {
    port: Number.isInteger(port) && port > 0 ? port : 5000,
    credentials,
    models,
  };
}
