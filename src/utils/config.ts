/**
 * Environment-driven configuration
 * The service entry loads .env through dotenv before calling loadConfig()
 */

import { DEFAULT_MIN_PARAGRAPH_LENGTH, type ParserOptions } from '../latex/types';
import { DEFAULT_DISPATCHER_SETTINGS } from './translation/types';

export interface AppConfig {
  parser: Required<ParserOptions>;
  dispatch: {
    concurrency: number;
    maxRetries: number;
    retryDelayMs: number;
  };
  checkpointFile: string;
  port: number;
}

export const DEFAULT_CONFIG: AppConfig = {
  parser: {
    extraProtectedEnvironments: [],
    extraTranslatableEnvironments: [],
    preserveTerms: [],
    minParagraphLength: DEFAULT_MIN_PARAGRAPH_LENGTH,
  },
  dispatch: {
    concurrency: DEFAULT_DISPATCHER_SETTINGS.concurrency,
    maxRetries: DEFAULT_DISPATCHER_SETTINGS.maxRetries,
    retryDelayMs: DEFAULT_DISPATCHER_SETTINGS.retryDelayMs,
  },
  checkpointFile: 'translation_checkpoint.jsonl',
  port: 3000,
};

export type Env = Record<string, string | undefined>;

/**
 * Split a comma list, dropping empty entries
 */
export function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Read a non-negative integer, warning and falling back on anything else
 */
export function parseInteger(
  name: string,
  value: string | undefined,
  fallback: number,
  min: number = 0
): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < min) {
    console.warn(`⚠️  Invalid ${name}="${value}", using default ${fallback}`);
    return fallback;
  }
  return parsed;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const defaults = DEFAULT_CONFIG;

  return {
    parser: {
      extraProtectedEnvironments: parseList(env.LATEX_EXTRA_PROTECTED_ENVS),
      extraTranslatableEnvironments: parseList(env.LATEX_EXTRA_TRANSLATABLE_ENVS),
      preserveTerms: parseList(env.LATEX_PRESERVE_TERMS),
      minParagraphLength: parseInteger(
        'LATEX_MIN_PARAGRAPH_LENGTH',
        env.LATEX_MIN_PARAGRAPH_LENGTH,
        defaults.parser.minParagraphLength
      ),
    },
    dispatch: {
      concurrency: parseInteger(
        'TRANSLATION_CONCURRENCY',
        env.TRANSLATION_CONCURRENCY,
        defaults.dispatch.concurrency,
        1
      ),
      maxRetries: parseInteger(
        'TRANSLATION_MAX_RETRIES',
        env.TRANSLATION_MAX_RETRIES,
        defaults.dispatch.maxRetries
      ),
      retryDelayMs: parseInteger(
        'TRANSLATION_RETRY_DELAY_MS',
        env.TRANSLATION_RETRY_DELAY_MS,
        defaults.dispatch.retryDelayMs
      ),
    },
    checkpointFile: env.CHECKPOINT_FILE?.trim() || defaults.checkpointFile,
    port: parseInteger('PORT', env.PORT, defaults.port, 1),
  };
}
