/**
 * Content Extractor
 * Splits protected body text into translatable chunks: whole translatable
 * environments, section-like titles and residual paragraphs.
 */

import { UnbalancedDelimiterError } from './errors';
import { readArgumentsLeniently } from './ElementProtector';
import type { ParseSession } from './ParseSession';
import {
  findCommands,
  findEnvironmentEnd,
  isEscaped,
  lastMandatory,
  type CommandHead,
} from './span-scanner';
import { isTokensOnly, stripTokens } from './tokens';
import { ChunkContext } from './types';

export const SECTION_COMMANDS: readonly string[] = [
  'title',
  'part',
  'chapter',
  'section',
  'subsection',
  'subsubsection',
  'paragraph',
  'subparagraph',
];

/**
 * Lines that never join a paragraph
 */
const STRUCTURAL_LINE = new RegExp(
  [
    String.raw`^\\(?:begin|end)\s*\{`,
    String.raw`^\\(?:${SECTION_COMMANDS.join('|')})(?![A-Za-z])`,
    String.raw`^\\item(?![A-Za-z])`,
    String.raw`^\\(?:maketitle|tableofcontents|listoffigures|listoftables|appendix|newpage|clearpage|cleardoublepage|centering|bibliography|bibliographystyle|printbibliography|balance)(?![A-Za-z])`,
    '^%',
  ].join('|')
);

export interface SectionExtraction {
  text: string;
  /** Offsets in `text` where a paragraph must start (inline continuation) */
  boundaries: number[];
}

interface LinePiece {
  start: number;
  end: number;
  isText: boolean;
  /** Starts at a synthesized boundary after a section-like command */
  continuation: boolean;
}

export function isStructuralLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length === 0 || STRUCTURAL_LINE.test(trimmed) || isTokensOnly(trimmed);
}

/**
 * Length of a paragraph's translatable text: trimmed, tokens removed
 */
export function translatableLength(text: string): number {
  return stripTokens(text).trim().length;
}

export class ContentExtractor {
  /**
   * Run the three extraction steps and return the body template
   */
  extract(text: string, session: ParseSession): string {
    const withEnvironments = this.extractEnvironments(text, session);
    const { text: withSections, boundaries } = this.extractSections(withEnvironments, session);
    return this.splitParagraphs(withSections, boundaries, session);
  }

  /**
   * One chunk per translatable environment; \begin and \end stay outside it
   */
  extractEnvironments(text: string, session: ParseSession): string {
    const { translatableEnvironments } = session.config;
    const begin = /\\begin\s*\{([^{}]+)\}/g;

    let out = '';
    let last = 0;
    let match: RegExpExecArray | null;

    while ((match = begin.exec(text)) !== null) {
      const name = match[1];
      if (isEscaped(text, match.index) || !translatableEnvironments.has(name)) {
        continue;
      }

      const bodyStart = match.index + match[0].length;
      let bodyEnd: number;
      let envEnd: number;
      try {
        const end = findEnvironmentEnd(text, bodyStart, name);
        bodyEnd = end.start;
        envEnd = end.end;
      } catch (error) {
        if (error instanceof UnbalancedDelimiterError) {
          console.debug(`[extract:environment] left as literal text: ${error.message}`);
          continue;
        }
        throw error;
      }

      const inner = text.slice(bodyStart, bodyEnd);
      const content = inner.trim();
      if (!content || isTokensOnly(content)) {
        continue;
      }

      const contentStart = bodyStart + (inner.length - inner.trimStart().length);
      const context = name === 'abstract' ? ChunkContext.ABSTRACT : ChunkContext.ENVIRONMENT;
      out += text.slice(last, contentStart);
      out += session.extract(content, context);
      last = contentStart + content.length;
      begin.lastIndex = envEnd;
    }

    return out + text.slice(last);
  }

  /**
   * One chunk per section-like title, holding its last mandatory argument.
   * Text after the closing brace on the same line gets a paragraph boundary.
   */
  extractSections(text: string, session: ParseSession): SectionExtraction {
    const heads: CommandHead[] = SECTION_COMMANDS.flatMap((name) => findCommands(text, name)).sort(
      (a, b) => a.start - b.start
    );

    let out = '';
    let last = 0;
    let consumed = 0;
    const boundaries: number[] = [];

    for (const head of heads) {
      if (head.start < consumed) {
        continue;
      }
      const parsed = readArgumentsLeniently(text, head.end, ['o', 'm'], 'section');
      const arg = parsed ? lastMandatory(parsed.args) : undefined;
      if (!parsed || !arg) {
        continue;
      }
      consumed = parsed.end;

      const inner = text.slice(arg.start, arg.end);
      const content = inner.trim();
      if (content && !isTokensOnly(content)) {
        const contentStart = arg.start + (inner.length - inner.trimStart().length);
        const context = head.name === 'title' ? ChunkContext.TITLE : ChunkContext.SECTION;
        out += text.slice(last, contentStart);
        out += session.extract(content, context);
        last = contentStart + content.length;
      }

      const lineEnd = text.indexOf('\n', parsed.end);
      const rest = text.slice(parsed.end, lineEnd === -1 ? text.length : lineEnd);
      if (rest.trim().length > 0) {
        // offset of parsed.end once the untouched tail is copied over
        boundaries.push(out.length + (parsed.end - last));
      }
    }

    return { text: out + text.slice(last), boundaries };
  }

  /**
   * Group text lines into paragraphs split on blank and structural lines and
   * on synthesized boundaries. Paragraphs whose translatable length exceeds
   * the configured minimum become chunks; the rest stay as filler. Body text
   * continuing a heading's line is always chunked when it has any text.
   */
  splitParagraphs(text: string, boundaries: readonly number[], session: ParseSession): string {
    const pieces = this.linePieces(text, boundaries);

    let out = '';
    let last = 0;
    let i = 0;

    while (i < pieces.length) {
      if (!pieces[i].isText) {
        i++;
        continue;
      }

      const start = pieces[i].start;
      const minimum = pieces[i].continuation ? 0 : session.config.minParagraphLength;
      let end = pieces[i].end;
      i++;
      while (i < pieces.length && pieces[i].isText && pieces[i].start === end + 1) {
        end = pieces[i].end;
        i++;
      }

      const raw = text.slice(start, end);
      const content = raw.trim();
      if (translatableLength(content) <= minimum) {
        continue;
      }

      const contentStart = start + (raw.length - raw.trimStart().length);
      out += text.slice(last, contentStart);
      out += session.extract(content, ChunkContext.PARAGRAPH);
      last = contentStart + content.length;
    }

    return out + text.slice(last);
  }

  /**
   * Lines (without their newline) classified as text or break; a line that
   * holds a boundary is split in two at it.
   */
  private linePieces(text: string, boundaries: readonly number[]): LinePiece[] {
    const sorted = [...boundaries].sort((a, b) => a - b);
    const pieces: LinePiece[] = [];
    let lineStart = 0;
    let b = 0;

    while (lineStart <= text.length) {
      const newline = text.indexOf('\n', lineStart);
      const lineEnd = newline === -1 ? text.length : newline;

      let cursor = lineStart;
      while (b < sorted.length && sorted[b] <= lineEnd) {
        const boundary = sorted[b];
        b++;
        if (boundary <= cursor) {
          continue;
        }
        pieces.push({ start: cursor, end: boundary, isText: false, continuation: false });
        cursor = boundary;
      }

      const tail = text.slice(cursor, lineEnd);
      pieces.push({
        start: cursor,
        end: lineEnd,
        isText: !isStructuralLine(tail),
        continuation: cursor !== lineStart,
      });

      if (newline === -1) {
        break;
      }
      lineStart = newline + 1;
    }

    return pieces;
  }
}
