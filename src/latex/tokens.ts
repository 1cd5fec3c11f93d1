/**
 * Placeholder and chunk-token vocabulary shared by the parser,
 * the document model and the validator.
 *
 * Patterns are built per call so no lastIndex state leaks between callers.
 */

const PLACEHOLDER_SOURCE = String.raw`\[\[([A-Z][A-Z0-9]*)_(\d+)\]\]`;
const CHUNK_TOKEN_SOURCE = String.raw`\{\{CHUNK_([0-9a-f-]+)\}\}`;

export function placeholderPattern(): RegExp {
  return new RegExp(PLACEHOLDER_SOURCE, 'g');
}

export function chunkTokenPattern(): RegExp {
  return new RegExp(CHUNK_TOKEN_SOURCE, 'g');
}

export function anyTokenPattern(): RegExp {
  return new RegExp(`${PLACEHOLDER_SOURCE}|${CHUNK_TOKEN_SOURCE}`, 'g');
}

export function makePlaceholder(kind: string, index: number): string {
  return `[[${kind}_${index}]]`;
}

export function makeChunkToken(id: string): string {
  return `{{CHUNK_${id}}}`;
}

/**
 * Literal [[KIND_n]] tokens already in the text; a session never issues these
 */
export function literalPlaceholders(text: string): Set<string> {
  return new Set(Array.from(text.matchAll(placeholderPattern()), (match) => match[0]));
}

/**
 * All placeholder and chunk tokens in order of appearance
 */
export function collectTokens(text: string): string[] {
  return Array.from(text.matchAll(anyTokenPattern()), (match) => match[0]);
}

export function stripTokens(text: string): string {
  return text.replace(anyTokenPattern(), '');
}

/**
 * True when the text holds nothing but tokens and whitespace
 */
export function isTokensOnly(text: string): boolean {
  return text.trim().length > 0 && stripTokens(text).trim().length === 0;
}

/**
 * Apply fn to the stretches of text between tokens, leaving tokens untouched
 */
export function mapOutsideTokens(text: string, fn: (segment: string) => string): string {
  let out = '';
  let last = 0;
  for (const match of text.matchAll(anyTokenPattern())) {
    const start = match.index ?? 0;
    out += fn(text.slice(last, start));
    out += match[0];
    last = start + match[0].length;
  }
  out += fn(text.slice(last));
  return out;
}
