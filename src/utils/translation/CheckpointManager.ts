/**
 * Checkpoint Manager for Translation Dispatch
 * Uses JSONL format for crash-resistant, append-only storage
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { isChunkContext } from '../../latex/types';
import type { CheckpointStore, TranslationResult } from './types';

/**
 * Narrow one parsed JSONL line to a TranslationResult
 */
export function parseCheckpointLine(line: string): TranslationResult | null {
  const data: unknown = JSON.parse(line);
  if (typeof data !== 'object' || data === null) {
    return null;
  }

  const id: unknown = Reflect.get(data, 'id');
  const context: unknown = Reflect.get(data, 'context');
  const original: unknown = Reflect.get(data, 'original');
  const translated: unknown = Reflect.get(data, 'translated');
  const checkpointTime: unknown = Reflect.get(data, 'checkpointTime');

  if (
    typeof id !== 'string' ||
    !id ||
    !isChunkContext(context) ||
    typeof original !== 'string' ||
    typeof translated !== 'string'
  ) {
    return null;
  }

  return {
    id,
    context,
    original,
    translated,
    ...(typeof checkpointTime === 'string' ? { checkpointTime } : {}),
  };
}

export class CheckpointManager implements CheckpointStore {
  private checkpointFile: string;
  private completed: Map<string, TranslationResult>;

  constructor(checkpointFile: string) {
    this.checkpointFile = path.resolve(process.cwd(), checkpointFile);
    this.completed = new Map();
    this.load();
  }

  /**
   * Load existing checkpoint data from JSONL file
   */
  private load(): void {
    if (!fs.existsSync(this.checkpointFile)) {
      return;
    }

    const content = fs.readFileSync(this.checkpointFile, 'utf8');
    const lines = content.split('\n').filter((line) => line.trim());

    for (const line of lines) {
      let result: TranslationResult | null = null;
      try {
        result = parseCheckpointLine(line);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`⚠️  Skipping unparsable checkpoint line (${message}): ${line.substring(0, 50)}...`);
        continue;
      }
      if (!result) {
        console.warn(`⚠️  Skipping invalid checkpoint line: ${line.substring(0, 50)}...`);
        continue;
      }
      this.completed.set(result.id, result);
    }

    if (this.completed.size > 0) {
      console.log(`📂 Loaded ${this.completed.size} translations from checkpoint`);
    }
  }

  /**
   * Save a translation result to checkpoint (append to JSONL)
   */
  save(result: TranslationResult): void {
    const resultWithTime: TranslationResult = {
      ...result,
      checkpointTime: new Date().toISOString(),
    };

    this.completed.set(result.id, resultWithTime);

    const dir = path.dirname(this.checkpointFile);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.appendFileSync(this.checkpointFile, JSON.stringify(resultWithTime) + '\n', 'utf8');
  }

  /**
   * Get all translations as a dictionary (id -> translation)
   */
  getTranslationsDict(): Record<string, string> {
    const dict: Record<string, string> = {};
    this.completed.forEach((result, id) => {
      dict[id] = result.translated;
    });
    return dict;
  }

  getCompletedCount(): number {
    return this.completed.size;
  }
}

/**
 * Checkpoint store that keeps results for the lifetime of the process only
 */
export class InMemoryCheckpointManager implements CheckpointStore {
  private completed: Map<string, TranslationResult>;

  constructor() {
    this.completed = new Map();
  }

  save(result: TranslationResult): void {
    this.completed.set(result.id, {
      ...result,
      checkpointTime: new Date().toISOString(),
    });
  }

  getTranslationsDict(): Record<string, string> {
    const dict: Record<string, string> = {};
    this.completed.forEach((result, id) => {
      dict[id] = result.translated;
    });
    return dict;
  }

  getCompletedCount(): number {
    return this.completed.size;
  }
}
