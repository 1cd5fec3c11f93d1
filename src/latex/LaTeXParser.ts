/**
 * LaTeX Parser
 * Splits off the preamble, then runs protection and extraction over the
 * body inside a fresh ParseSession. Instances hold no per-document state,
 * so independent documents can be parsed concurrently.
 */

import { ContentExtractor } from './ContentExtractor';
import { ElementProtector } from './ElementProtector';
import { LaTeXDocument, orderChunksByDocument } from './LaTeXDocument';
import { ParseSession } from './ParseSession';
import { isEscaped } from './span-scanner';
import { literalPlaceholders } from './tokens';
import { resolveParserConfig, type ParserConfig, type ParserOptions } from './types';

/**
 * Split at the end of the first uncommented \begin{document}.
 * Without one, the whole source is body.
 */
export function splitPreamble(source: string): { preamble: string; body: string } {
  const pattern = /\\begin\s*\{document\}/g;

  for (const match of source.matchAll(pattern)) {
    const index = match.index ?? 0;
    const lineStart = source.lastIndexOf('\n', index - 1) + 1;
    const linePrefix = source.slice(lineStart, index);
    const commented = Array.from(linePrefix).some(
      (ch, offset) => ch === '%' && !isEscaped(linePrefix, offset)
    );
    if (isEscaped(source, index) || commented) {
      continue;
    }
    const end = index + match[0].length;
    return { preamble: source.slice(0, end), body: source.slice(end) };
  }

  return { preamble: '', body: source };
}

export class LaTeXParser {
  private config: ParserConfig;
  private protector: ElementProtector;
  private extractor: ContentExtractor;

  constructor(options: ParserOptions = {}) {
    this.config = resolveParserConfig(options);
    this.protector = new ElementProtector();
    this.extractor = new ContentExtractor();
  }

  parse(source: string): LaTeXDocument {
    const { preamble, body } = splitPreamble(source);
    const session = new ParseSession(this.config, literalPlaceholders(body));

    const protectedBody = this.protector.protect(body, session);
    const bodyTemplate = this.extractor.extract(protectedBody, session);

    const chunks = orderChunksByDocument(bodyTemplate, session.finish());
    return new LaTeXDocument(preamble, bodyTemplate, chunks);
  }

  getConfig(): ParserConfig {
    return this.config;
  }
}

/**
 * Parse a flattened LaTeX source into a LaTeXDocument
 */
export function parse(source: string, options: ParserOptions = {}): LaTeXDocument {
  return new LaTeXParser(options).parse(source);
}
