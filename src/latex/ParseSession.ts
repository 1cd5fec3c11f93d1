/**
 * Parse Session
 * Owns the mutable state of exactly one parse call: the placeholder
 * counter, the placeholder registry and the chunk drafts.
 */

import { v5 as uuidv5 } from 'uuid';
import { PlaceholderCollisionError } from './errors';
import { makeChunkToken, makePlaceholder } from './tokens';
import { ChunkContext, type Chunk, type ParserConfig } from './types';

/** Namespace for name-based chunk ids */
export const CHUNK_ID_NAMESPACE = '6f1c2b9e-3d4a-5e8f-9a0b-7c6d5e4f3a21';

export interface ChunkDraft {
  id: string;
  content: string;
  context: ChunkContext;
  preservedElements: Record<string, string>;
}

export class ParseSession {
  readonly config: ParserConfig;
  private counter = 0;
  private reserved: ReadonlySet<string>;
  private sequence = 0;
  private drafts: ChunkDraft[] = [];
  private owners = new Map<string, string>();
  private ids = new Set<string>();

  /**
   * @param reserved - placeholder strings already present in the source
   */
  constructor(config: ParserConfig, reserved: ReadonlySet<string> = new Set()) {
    this.config = config;
    this.reserved = reserved;
  }

  /**
   * Replace a construct with a fresh [[KIND_n]] placeholder owned by a new
   * protected chunk, and return the placeholder.
   */
  protect(kind: string, original: string): string {
    let placeholder: string;
    do {
      this.counter++;
      placeholder = makePlaceholder(kind, this.counter);
    } while (this.reserved.has(placeholder));

    if (this.owners.has(placeholder)) {
      throw new PlaceholderCollisionError(placeholder, 'issued twice in one session');
    }

    const draft = this.addDraft(placeholder, ChunkContext.PROTECTED, {
      [placeholder]: original,
    });
    this.owners.set(placeholder, draft.id);
    return placeholder;
  }

  /**
   * Register translatable text and return its {{CHUNK_id}} token
   */
  extract(content: string, context: ChunkContext): string {
    const draft = this.addDraft(content, context, {});
    return makeChunkToken(draft.id);
  }

  /**
   * Run a rewrite over the content of every translatable chunk created so far
   */
  rewriteTranslatable(rewrite: (content: string) => string): void {
    for (const draft of this.drafts.slice()) {
      if (draft.context !== ChunkContext.PROTECTED) {
        draft.content = rewrite(draft.content);
      }
    }
  }

  get placeholderCount(): number {
    return this.owners.size;
  }

  /**
   * Freeze the drafts. The session must not be used afterwards.
   */
  finish(): Chunk[] {
    return this.drafts.map((draft) => ({
      id: draft.id,
      content: draft.content,
      context: draft.context,
      preservedElements: Object.freeze({ ...draft.preservedElements }),
    }));
  }

  private addDraft(
    content: string,
    context: ChunkContext,
    preservedElements: Record<string, string>
  ): ChunkDraft {
    this.sequence++;
    // Ordinal + context + content keeps ids unique and stable across
    // parses of byte-identical input.
    const id = uuidv5(`${this.sequence}\u0000${context}\u0000${content}`, CHUNK_ID_NAMESPACE);

    if (this.ids.has(id)) {
      throw new PlaceholderCollisionError(makeChunkToken(id), 'chunk id issued twice');
    }
    this.ids.add(id);

    const draft: ChunkDraft = { id, content, context, preservedElements };
    this.drafts.push(draft);
    return draft;
  }
}
