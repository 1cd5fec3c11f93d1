/**
 * Translation Dispatch Types
 */

import type { ChunkContext } from '../../latex/types';
import type { ValidationResult } from '../../validator/types';

/**
 * Translation result persisted per chunk
 */
export interface TranslationResult {
  id: string; // chunk id
  context: ChunkContext;
  original: string; // Source chunk content
  translated: string;
  checkpointTime?: string; // ISO timestamp
}

/**
 * Neighbouring chunk offered to the translator
 */
export interface ContextItem {
  id: string;
  original: string;
  translated?: string; // Only available for preceding chunks
}

/**
 * Context window for translation
 */
export interface TranslationContext {
  before: ContextItem[]; // Preceding chunks (with translations)
  after: ContextItem[]; // Following chunks (original only)
}

/**
 * One request handed to the injected translator
 */
export interface TranslationRequest {
  id: string;
  content: string;
  context: ChunkContext;
  neighbours: TranslationContext;
}

/**
 * Provider-agnostic translate function
 */
export type ChunkTranslator = (request: TranslationRequest) => Promise<string>;

/**
 * Where the dispatcher records finished chunks
 */
export interface CheckpointStore {
  save(result: TranslationResult): void;
  getTranslationsDict(): Record<string, string>;
  getCompletedCount(): number;
}

export interface DispatcherSettings {
  concurrency: number;
  maxRetries: number;
  retryDelayMs: number;
  /** Leave a chunk untranslated when validation reports errors */
  dropInvalid: boolean;
  contextBefore: number;
  contextAfter: number;
}

export const DEFAULT_DISPATCHER_SETTINGS: DispatcherSettings = {
  concurrency: 8,
  maxRetries: 3,
  retryDelayMs: 1000,
  dropInvalid: false,
  contextBefore: 2,
  contextAfter: 2,
};

export interface DispatchOptions {
  checkpoint?: CheckpointStore;
  onProgress?: (completed: number, total: number) => void;
}

export interface FailedChunk {
  id: string;
  error: string;
}

export interface DispatchReport {
  /** chunk id -> translation; failed chunks are absent */
  translations: Record<string, string>;
  failed: FailedChunk[];
  /** chunk id -> validation of the expanded source against the expanded translation */
  validation: Record<string, ValidationResult>;
  /** Ids taken from the checkpoint without calling the translator */
  skipped: string[];
}
