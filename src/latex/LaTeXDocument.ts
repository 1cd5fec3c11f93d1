/**
 * Parsed LaTeX document: preamble, body template and chunk list.
 * Rebuilds the source in two strict phases, chunk tokens first and
 * placeholders second.
 */

import { PlaceholderCollisionError } from './errors';
import { anyTokenPattern, chunkTokenPattern, makeChunkToken, placeholderPattern } from './tokens';
import {
  ChunkContext,
  type Chunk,
  type SerializedDocument,
  type TranslationMap,
} from './types';

function lookupTranslation(translations: TranslationMap | undefined, id: string): string | undefined {
  if (!translations) {
    return undefined;
  }
  if (translations instanceof Map) {
    return translations.get(id);
  }
  return Object.prototype.hasOwnProperty.call(translations, id) ? translations[id] : undefined;
}

export class LaTeXDocument {
  readonly preamble: string;
  readonly bodyTemplate: string;
  readonly chunks: readonly Chunk[];
  private byId: Map<string, Chunk>;
  private originals: Map<string, string>;

  /**
   * @throws PlaceholderCollisionError when an id or placeholder is owned twice
   */
  constructor(preamble: string, bodyTemplate: string, chunks: readonly Chunk[]) {
    this.preamble = preamble;
    this.bodyTemplate = bodyTemplate;
    this.chunks = chunks;
    this.byId = new Map();
    this.originals = new Map();

    for (const chunk of chunks) {
      if (this.byId.has(chunk.id)) {
        throw new PlaceholderCollisionError(makeChunkToken(chunk.id), 'chunk id owned twice');
      }
      this.byId.set(chunk.id, chunk);

      for (const [placeholder, original] of Object.entries(chunk.preservedElements)) {
        if (this.originals.has(placeholder)) {
          throw new PlaceholderCollisionError(placeholder, 'owned by more than one chunk');
        }
        this.originals.set(placeholder, original);
      }
    }
  }

  /**
   * Rebuild the full document (preamble + body)
   */
  reconstruct(translations?: TranslationMap): string {
    return this.preamble + this.reconstructBody(translations);
  }

  /**
   * Rebuild the body. A chunk uses, in order: the supplied translation, the
   * attached translation, its own content.
   */
  reconstructBody(translations?: TranslationMap): string {
    const textFor = (chunk: Chunk): string =>
      lookupTranslation(translations, chunk.id) ?? chunk.translation ?? chunk.content;

    // Phase 1: chunk tokens, in the template and in recorded originals
    // (a masked float may hold its caption's token).
    const body = this.resolveChunkTokens(this.bodyTemplate, textFor, new Set());
    const resolvedOriginals = new Map<string, string>();
    for (const [placeholder, original] of this.originals) {
      resolvedOriginals.set(placeholder, this.resolveChunkTokens(original, textFor, new Set()));
    }

    // Phase 2: placeholders, only once every chunk token is gone
    return this.expandPlaceholders(body, resolvedOriginals, new Set());
  }

  /**
   * Restore placeholders inside one piece of chunk text
   */
  expandChunkText(text: string): string {
    return this.expandPlaceholders(text, this.originals, new Set());
  }

  /**
   * Chunks to send out for translation, in document order
   */
  getTranslatableChunks(): Chunk[] {
    return this.chunks.filter((chunk) => chunk.context !== ChunkContext.PROTECTED);
  }

  /**
   * Attach translations to chunks; unknown ids are ignored.
   * Returns how many chunks received one.
   */
  attachTranslations(translations: TranslationMap): number {
    let attached = 0;
    for (const chunk of this.chunks) {
      const translation = lookupTranslation(translations, chunk.id);
      if (translation !== undefined && chunk.context !== ChunkContext.PROTECTED) {
        chunk.translation = translation;
        attached++;
      }
    }
    return attached;
  }

  /**
   * Every placeholder the document owns
   */
  get placeholders(): string[] {
    return Array.from(this.originals.keys());
  }

  toJSON(): SerializedDocument {
    return {
      preamble: this.preamble,
      bodyTemplate: this.bodyTemplate,
      chunks: this.chunks.map((chunk) => ({
        id: chunk.id,
        content: chunk.content,
        context: chunk.context,
        preservedElements: { ...chunk.preservedElements },
        ...(chunk.translation !== undefined ? { translation: chunk.translation } : {}),
      })),
    };
  }

  static fromJSON(data: SerializedDocument): LaTeXDocument {
    return new LaTeXDocument(
      data.preamble,
      data.bodyTemplate,
      data.chunks.map((chunk) => ({
        id: chunk.id,
        content: chunk.content,
        context: chunk.context,
        preservedElements: Object.freeze({ ...chunk.preservedElements }),
        ...(chunk.translation !== undefined ? { translation: chunk.translation } : {}),
      }))
    );
  }

  private resolveChunkTokens(
    text: string,
    textFor: (chunk: Chunk) => string,
    active: Set<string>
  ): string {
    return text.replace(chunkTokenPattern(), (token: string, id: string) => {
      const chunk = this.byId.get(id);
      if (!chunk || active.has(id)) {
        return token;
      }
      active.add(id);
      const resolved = this.resolveChunkTokens(textFor(chunk), textFor, active);
      active.delete(id);
      return resolved;
    });
  }

  private expandPlaceholders(
    text: string,
    originals: ReadonlyMap<string, string>,
    active: Set<string>
  ): string {
    return text.replace(placeholderPattern(), (placeholder: string) => {
      const original = originals.get(placeholder);
      if (original === undefined || active.has(placeholder)) {
        return placeholder;
      }
      active.add(placeholder);
      const expanded = this.expandPlaceholders(original, originals, active);
      active.delete(placeholder);
      return expanded;
    });
  }
}

/**
 * Order chunks by where their tokens are first reached when the template is
 * read left to right, descending into chunk text and placeholder originals.
 * Chunks never reached keep their relative order at the end.
 */
export function orderChunksByDocument(bodyTemplate: string, chunks: readonly Chunk[]): Chunk[] {
  const byId = new Map(chunks.map((chunk) => [chunk.id, chunk]));
  const ownerOf = new Map<string, Chunk>();
  for (const chunk of chunks) {
    for (const placeholder of Object.keys(chunk.preservedElements)) {
      ownerOf.set(placeholder, chunk);
    }
  }

  const ordered: Chunk[] = [];
  const seen = new Set<string>();

  const visit = (text: string): void => {
    for (const match of text.matchAll(anyTokenPattern())) {
      const chunk = match[3] !== undefined ? byId.get(match[3]) : ownerOf.get(match[0]);
      if (!chunk || seen.has(chunk.id)) {
        continue;
      }
      seen.add(chunk.id);
      ordered.push(chunk);
      if (chunk.context === ChunkContext.PROTECTED) {
        for (const original of Object.values(chunk.preservedElements)) {
          visit(original);
        }
      } else {
        visit(chunk.content);
      }
    }
  };

  visit(bodyTemplate);
  for (const chunk of chunks) {
    if (!seen.has(chunk.id)) {
      ordered.push(chunk);
    }
  }
  return ordered;
}
