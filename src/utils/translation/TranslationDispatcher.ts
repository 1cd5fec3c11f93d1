/**
 * Translation Dispatcher
 * Feeds the translatable chunks of a parsed document to an injected
 * translate function with bounded concurrency, retries, per-chunk
 * validation and optional checkpointing.
 */

import type { LaTeXDocument } from '../../latex/LaTeXDocument';
import { validate } from '../../validator/structural-validator';
import type { ValidateOptions, ValidationResult } from '../../validator/types';
import type { AppConfig } from '../config';
import { withRetry } from '../retry';
import { estimateTokens } from '../token-counter';
import { CheckpointManager } from './CheckpointManager';
import { ContextManager } from './ContextManager';
import {
  DEFAULT_DISPATCHER_SETTINGS,
  type ChunkTranslator,
  type DispatchOptions,
  type DispatchReport,
  type DispatcherSettings,
  type FailedChunk,
} from './types';

export interface DispatcherConfig extends Partial<DispatcherSettings> {
  /** Passed to validate() for every translated chunk */
  validation?: ValidateOptions;
}

export class TranslationDispatcher {
  private translator: ChunkTranslator;
  private settings: DispatcherSettings;
  private validation: ValidateOptions;

  constructor(translator: ChunkTranslator, config: DispatcherConfig = {}) {
    const { validation, ...settings } = config;
    this.translator = translator;
    this.settings = { ...DEFAULT_DISPATCHER_SETTINGS, ...settings };
    this.settings.concurrency = Math.max(1, Math.floor(this.settings.concurrency));
    this.validation = validation ?? {};
  }

  getSettings(): DispatcherSettings {
    return { ...this.settings };
  }

  /**
   * Translate every non-protected chunk. Never rejects because of a chunk:
   * failures are logged and listed in `failed`, and those chunks are absent
   * from `translations`.
   */
  async dispatch(document: LaTeXDocument, options: DispatchOptions = {}): Promise<DispatchReport> {
    const { checkpoint, onProgress } = options;
    const chunks = document.getTranslatableChunks();
    const context = new ContextManager(
      chunks,
      this.settings.contextBefore,
      this.settings.contextAfter
    );

    const failed: FailedChunk[] = [];
    const validation: Record<string, ValidationResult> = {};
    const skipped = checkpoint
      ? context.loadExistingTranslations(checkpoint.getTranslationsDict())
      : [];
    const pending: number[] = [];
    chunks.forEach((chunk, index) => {
      if (!context.hasTranslation(chunk.id)) {
        pending.push(index);
      }
    });

    const total = context.getTotalCount();
    let completed = skipped.length;
    const tokens = estimateTokens(pending.map((index) => chunks[index].content));
    const restored = checkpoint
      ? `, ${skipped.length} of ${checkpoint.getCompletedCount()} checkpointed results reused`
      : '';
    console.log(`🚀 Dispatching ${pending.length} chunks (~${tokens} tokens)${restored}`);

    const report = (): void => {
      completed++;
      onProgress?.(completed, total);
    };

    let cursor = 0;
    const workers = Array.from(
      { length: Math.min(this.settings.concurrency, pending.length) },
      async () => {
        while (true) {
          const current = cursor++;
          if (current >= pending.length) break;

          const index = pending[current];
          const chunk = chunks[index];

          let translated: string;
          try {
            translated = await withRetry(
              async () => {
                const result = await this.translator({
                  id: chunk.id,
                  content: chunk.content,
                  context: chunk.context,
                  neighbours: context.getContext(index),
                });
                if (!result.trim()) {
                  throw new Error('Empty translation');
                }
                return result;
              },
              {
                maxRetries: this.settings.maxRetries,
                retryDelayMs: this.settings.retryDelayMs,
                onRetry: (attempt, delay, error) => {
                  console.warn(
                    `⚠️  Chunk ${chunk.id} failed (${error.message}), retry ${attempt}/${this.settings.maxRetries} in ${delay}ms`
                  );
                },
              }
            );
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`❌ Chunk ${chunk.id} failed after retries: ${message}`);
            failed.push({ id: chunk.id, error: message });
            report();
            continue;
          }

          const result = validate(
            document.expandChunkText(chunk.content),
            document.expandChunkText(translated),
            this.validation
          );
          validation[chunk.id] = result;

          if (!result.passed) {
            const summary = result.errors.map((issue) => issue.message).join('; ');
            console.warn(`⚠️  Validation errors for chunk ${chunk.id}: ${summary}`);
            if (this.settings.dropInvalid) {
              failed.push({ id: chunk.id, error: `Validation failed: ${summary}` });
              report();
              continue;
            }
          }

          context.addTranslation(chunk.id, translated);

          if (checkpoint) {
            try {
              checkpoint.save({
                id: chunk.id,
                context: chunk.context,
                original: chunk.content,
                translated,
              });
            } catch (error) {
              const message = error instanceof Error ? error.message : String(error);
              console.error(`❌ Failed to save checkpoint for ${chunk.id}: ${message}`);
            }
          }

          report();
        }
      }
    );

    await Promise.all(workers);

    // Document order
    const translations: Record<string, string> = {};
    for (const chunk of chunks) {
      const translated = context.getTranslation(chunk.id);
      if (translated !== undefined) {
        translations[chunk.id] = translated;
      }
    }

    console.log(
      `✅ Dispatch finished: ${context.getCompletedCount()}/${total} translated, ${failed.length} failed`
    );

    return { translations, failed, validation, skipped };
  }
}

/**
 * Dispatcher plus file checkpoint from loaded configuration
 */
export function createDispatcher(
  translator: ChunkTranslator,
  config: Pick<AppConfig, 'dispatch' | 'checkpointFile'>,
  validation?: ValidateOptions
): { dispatcher: TranslationDispatcher; checkpoint: CheckpointManager } {
  return {
    dispatcher: new TranslationDispatcher(translator, { ...config.dispatch, validation }),
    checkpoint: new CheckpointManager(config.checkpointFile),
  };
}
