/**
 * Context Manager for Translation Dispatch
 * Maintains a sliding window of neighbouring chunks for coherent translation
 */

import type { Chunk } from '../../latex/types';
import type { ContextItem, TranslationContext } from './types';

export class ContextManager {
  private chunks: readonly Chunk[];
  private translations: Map<string, string>;
  private contextBefore: number;
  private contextAfter: number;

  constructor(chunks: readonly Chunk[], contextBefore: number = 2, contextAfter: number = 2) {
    this.chunks = chunks;
    this.translations = new Map();
    this.contextBefore = contextBefore;
    this.contextAfter = contextAfter;
  }

  /**
   * Add a translation for a chunk
   */
  addTranslation(chunkId: string, translation: string): void {
    this.translations.set(chunkId, translation);
  }

  hasTranslation(chunkId: string): boolean {
    return this.translations.has(chunkId);
  }

  getTranslation(chunkId: string): string | undefined {
    return this.translations.get(chunkId);
  }

  /**
   * Get context for the chunk at the given index
   */
  getContext(index: number): TranslationContext {
    const before: ContextItem[] = [];
    const after: ContextItem[] = [];

    // Preceding chunks with their translations when known
    const startBefore = Math.max(0, index - this.contextBefore);
    for (let i = startBefore; i < index; i++) {
      const chunk = this.chunks[i];
      const translated = this.translations.get(chunk.id);
      before.push({
        id: chunk.id,
        original: chunk.content,
        ...(translated !== undefined ? { translated } : {}),
      });
    }

    // Following chunks (original only)
    const endAfter = Math.min(this.chunks.length, index + 1 + this.contextAfter);
    for (let i = index + 1; i < endAfter; i++) {
      const chunk = this.chunks[i];
      after.push({ id: chunk.id, original: chunk.content });
    }

    return { before, after };
  }

  /**
   * Load existing translations (for resume from checkpoint).
   * Ids of other documents are ignored; returns the loaded ids in chunk order.
   */
  loadExistingTranslations(translations: Readonly<Record<string, string>>): string[] {
    const loaded: string[] = [];
    for (const chunk of this.chunks) {
      if (Object.hasOwn(translations, chunk.id)) {
        this.translations.set(chunk.id, translations[chunk.id]);
        loaded.push(chunk.id);
      }
    }
    return loaded;
  }

  getCompletedCount(): number {
    return this.translations.size;
  }

  getTotalCount(): number {
    return this.chunks.length;
  }
}
