/**
 * Element Protector
 * Ordered passes that swap never-translate constructs for [[KIND_n]]
 * placeholders. Each pass is a function (text, session) => text and
 * assumes the passes before it already consumed their targets.
 */

import { UnbalancedDelimiterError } from './errors';
import type { ParseSession } from './ParseSession';
import {
  type ArgumentKind,
  type ArgumentList,
  findCommands,
  findEnvironmentEnd,
  isEscaped,
  lastMandatory,
  readArguments,
} from './span-scanner';
import { isTokensOnly, mapOutsideTokens } from './tokens';
import { ChunkContext } from './types';

export interface ProtectionPass {
  name: string;
  run: (text: string, session: ParseSession) => string;
  /** Also rewrite the translatable chunks created by earlier passes */
  coversChunks: boolean;
}

export interface ProtectedCommand {
  name: string;
  kind: string;
  signature: readonly ArgumentKind[];
}

const CITE_SIGNATURE: readonly ArgumentKind[] = ['o', 'o', 'm'];

/**
 * Masked in this order; numbering follows command order, not position.
 */
export const PROTECTED_COMMANDS: readonly ProtectedCommand[] = [
  { name: 'cite', kind: 'CITE', signature: CITE_SIGNATURE },
  { name: 'citep', kind: 'CITE', signature: CITE_SIGNATURE },
  { name: 'citet', kind: 'CITE', signature: CITE_SIGNATURE },
  { name: 'citealp', kind: 'CITE', signature: CITE_SIGNATURE },
  { name: 'citeauthor', kind: 'CITE', signature: CITE_SIGNATURE },
  { name: 'citeyear', kind: 'CITE', signature: CITE_SIGNATURE },
  { name: 'parencite', kind: 'CITE', signature: CITE_SIGNATURE },
  { name: 'textcite', kind: 'CITE', signature: CITE_SIGNATURE },
  { name: 'autocite', kind: 'CITE', signature: CITE_SIGNATURE },
  { name: 'ref', kind: 'REF', signature: ['m'] },
  { name: 'autoref', kind: 'REF', signature: ['m'] },
  { name: 'cref', kind: 'REF', signature: ['m'] },
  { name: 'Cref', kind: 'REF', signature: ['m'] },
  { name: 'pageref', kind: 'REF', signature: ['m'] },
  { name: 'eqref', kind: 'EQREF', signature: ['m'] },
  { name: 'label', kind: 'LABEL', signature: ['m'] },
  { name: 'url', kind: 'URL', signature: ['m'] },
  { name: 'footnote', kind: 'FOOTNOTE', signature: ['o', 'm'] },
  { name: 'href', kind: 'HREF', signature: ['o', 'm', 'm'] },
  { name: 'includegraphics', kind: 'GRAPHICS', signature: ['o', 'm'] },
];

function noteRecovery(pass: string, error: UnbalancedDelimiterError): void {
  console.debug(`[protect:${pass}] left as literal text: ${error.message}`);
}

/**
 * readArguments, but an unbalanced argument yields null instead of throwing
 */
export function readArgumentsLeniently(
  text: string,
  start: number,
  signature: readonly ArgumentKind[],
  pass: string
): ArgumentList | null {
  try {
    return readArguments(text, start, signature);
  } catch (error) {
    if (error instanceof UnbalancedDelimiterError) {
      noteRecovery(pass, error);
      return null;
    }
    throw error;
  }
}

/**
 * Mask every complete invocation of one command as a single placeholder
 */
function protectInvocations(
  text: string,
  session: ParseSession,
  command: ProtectedCommand,
  pass: string
): string {
  let out = '';
  let last = 0;

  for (const head of findCommands(text, command.name)) {
    if (head.start < last) {
      continue;
    }
    const parsed = readArgumentsLeniently(text, head.end, command.signature, pass);
    if (!parsed) {
      continue;
    }
    out += text.slice(last, head.start);
    out += session.protect(command.kind, text.slice(head.start, parsed.end));
    last = parsed.end;
  }

  return out + text.slice(last);
}

// ---------------------------------------------------------------------------
// 1. Author blocks
// ---------------------------------------------------------------------------

export function protectAuthorBlocks(text: string, session: ParseSession): string {
  let result = text;
  for (const name of session.config.authorCommands) {
    result = protectInvocations(
      result,
      session,
      { name, kind: 'AUTHOR', signature: ['o', 'm'] },
      'author'
    );
  }
  return result;
}

// ---------------------------------------------------------------------------
// 2. Captions
// ---------------------------------------------------------------------------

/**
 * [start, end) of every closed verbatim-like environment
 */
export function findVerbatimSpans(text: string, session: ParseSession): Array<[number, number]> {
  const begin = /\\begin\s*\{([^{}]+)\}/g;
  const spans: Array<[number, number]> = [];
  let match: RegExpExecArray | null;

  while ((match = begin.exec(text)) !== null) {
    const name = match[1];
    if (isEscaped(text, match.index) || !session.config.verbatimEnvironments.has(name)) {
      continue;
    }
    try {
      const end = findEnvironmentEnd(text, match.index + match[0].length, name, {
        nested: false,
      }).end;
      spans.push([match.index, end]);
      begin.lastIndex = end;
    } catch (error) {
      if (error instanceof UnbalancedDelimiterError) {
        noteRecovery('caption', error);
        continue;
      }
      throw error;
    }
  }

  return spans;
}

/**
 * True when an unescaped % precedes index on its line
 */
export function isCommentedOut(text: string, index: number): boolean {
  const lineStart = text.lastIndexOf('\n', index - 1) + 1;
  for (let i = lineStart; i < index; i++) {
    if (text[i] === '%' && !isEscaped(text, i)) {
      return true;
    }
  }
  return false;
}

/**
 * Only the caption's long argument becomes a chunk; the command, its short
 * title and the surrounding whitespace stay in place.
 */
export function extractCaptions(text: string, session: ParseSession): string {
  const verbatim = findVerbatimSpans(text, session);
  let out = '';
  let last = 0;

  for (const head of findCommands(text, 'caption')) {
    if (
      head.start < last ||
      isCommentedOut(text, head.start) ||
      verbatim.some(([start, end]) => head.start >= start && head.start < end)
    ) {
      continue;
    }
    const parsed = readArgumentsLeniently(text, head.end, ['o', 'm'], 'caption');
    const arg = parsed ? lastMandatory(parsed.args) : undefined;
    if (!arg) {
      continue;
    }

    const inner = text.slice(arg.start, arg.end);
    const content = inner.trim();
    if (!content || isTokensOnly(content)) {
      continue;
    }

    const contentStart = arg.start + (inner.length - inner.trimStart().length);
    out += text.slice(last, contentStart);
    out += session.extract(content, ChunkContext.CAPTION);
    last = contentStart + content.length;
  }

  return out + text.slice(last);
}

// ---------------------------------------------------------------------------
// 3. Protected environments
// ---------------------------------------------------------------------------

/**
 * One left-to-right scan. A masked span is skipped whole, so a protected
 * environment nested in another protected one is never masked on its own.
 */
export function protectEnvironments(text: string, session: ParseSession): string {
  const { protectedEnvironments, verbatimEnvironments } = session.config;
  const begin = /\\begin\s*\{([^{}]+)\}/g;

  let out = '';
  let last = 0;
  let match: RegExpExecArray | null;

  while ((match = begin.exec(text)) !== null) {
    const name = match[1];
    if (isEscaped(text, match.index) || !protectedEnvironments.has(name)) {
      continue;
    }

    let endIndex: number;
    try {
      endIndex = findEnvironmentEnd(text, match.index + match[0].length, name, {
        nested: !verbatimEnvironments.has(name),
      }).end;
    } catch (error) {
      if (error instanceof UnbalancedDelimiterError) {
        noteRecovery('environment', error);
        continue;
      }
      throw error;
    }

    out += text.slice(last, match.index);
    out += session.protect('ENV', text.slice(match.index, endIndex));
    last = endIndex;
    begin.lastIndex = endIndex;
  }

  return out + text.slice(last);
}

// ---------------------------------------------------------------------------
// 4. Inline math
// ---------------------------------------------------------------------------

type MathFrame = 'dollar' | 'ddollar' | 'paren' | 'bracket' | 'brace';

function isParagraphBreak(text: string, index: number): boolean {
  if (text[index] !== '\n') {
    return false;
  }
  let i = index + 1;
  while (i < text.length && (text[i] === ' ' || text[i] === '\t' || text[i] === '\r')) {
    i++;
  }
  return text[i] === '\n';
}

/**
 * Scan a math span with an explicit delimiter stack.
 * Returns the index just past the closer, or null when the span never closes
 * before a paragraph break or the end of input.
 */
export function scanMathSpan(text: string, start: number, opener: MathFrame): number | null {
  const stack: MathFrame[] = [opener];
  let i = start + (opener === 'dollar' ? 1 : 2);

  while (i < text.length) {
    const ch = text[i];
    const top = stack[stack.length - 1];

    if (isParagraphBreak(text, i)) {
      return null;
    }

    if (ch === '\\') {
      const next = text[i + 1];
      if ((next === ')' && top === 'paren') || (next === ']' && top === 'bracket')) {
        stack.pop();
        i += 2;
        if (stack.length === 0) {
          return i;
        }
        continue;
      }
      i += 2;
      continue;
    }

    if (ch === '{') {
      stack.push('brace');
    } else if (ch === '}') {
      if (top === 'brace') {
        stack.pop();
      }
    } else if (ch === '$') {
      if (top === 'ddollar') {
        if (text[i + 1] !== '$') {
          return null;
        }
        stack.pop();
        i += 2;
        if (stack.length === 0) {
          return i;
        }
        continue;
      }
      if (top === 'dollar') {
        stack.pop();
        i++;
        if (stack.length === 0) {
          return i;
        }
        continue;
      }
      if (top === 'brace') {
        // text-mode math nested in \text{...}
        stack.push('dollar');
      } else {
        return null;
      }
    }

    i++;
  }

  return null;
}

/**
 * `\verb|...|` (or `\verb*`): the delimiter must close on the same line
 */
function scanVerb(text: string, start: number): number | null {
  let i = start + '\\verb'.length;
  if (/[A-Za-z]/.test(text[i] ?? '')) {
    return null;
  }
  if (text[i] === '*') {
    i++;
  }
  const delimiter = text[i];
  if (!delimiter || /[\sA-Za-z]/.test(delimiter)) {
    return null;
  }
  const close = text.indexOf(delimiter, i + 1);
  const lineEnd = text.indexOf('\n', i + 1);
  if (close === -1 || (lineEnd !== -1 && close > lineEnd)) {
    return null;
  }
  return close + 1;
}

export function protectInlineMath(text: string, session: ParseSession): string {
  let out = '';
  let last = 0;
  let i = 0;

  const mask = (kind: string, start: number, end: number) => {
    out += text.slice(last, start);
    out += session.protect(kind, text.slice(start, end));
    last = end;
  };

  while (i < text.length) {
    const ch = text[i];

    if (ch === '%') {
      const lineEnd = text.indexOf('\n', i);
      i = lineEnd === -1 ? text.length : lineEnd;
      continue;
    }

    if (ch === '\\') {
      const next = text[i + 1];

      if (next === '(' || next === '[') {
        const end = scanMathSpan(text, i, next === '(' ? 'paren' : 'bracket');
        if (end !== null) {
          mask('MATH', i, end);
          i = end;
        } else {
          i += 2;
        }
        continue;
      }

      if (text.startsWith('verb', i + 1)) {
        const end = scanVerb(text, i);
        if (end !== null) {
          mask('VERB', i, end);
          i = end;
          continue;
        }
      }

      i += 2;
      while (i < text.length && /[A-Za-z]/.test(text[i])) {
        i++;
      }
      continue;
    }

    if (ch === '$') {
      const double = text[i + 1] === '$';
      const end = scanMathSpan(text, i, double ? 'ddollar' : 'dollar');
      if (end !== null) {
        mask('MATH', i, end);
        i = end;
      } else {
        i += double ? 2 : 1;
      }
      continue;
    }

    i++;
  }

  return out + text.slice(last);
}

// ---------------------------------------------------------------------------
// 5. Protected commands
// ---------------------------------------------------------------------------

export function protectCommands(text: string, session: ParseSession): string {
  let result = text;
  for (const command of PROTECTED_COMMANDS) {
    result = protectInvocations(result, session, command, 'command');
  }
  return result;
}

// ---------------------------------------------------------------------------
// 6. Never-translate terms
// ---------------------------------------------------------------------------

function escapeRegExp(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Environment names inside \begin{...} and \end{...} are never terms */
const ENVIRONMENT_NAME_PREFIX = /\\(?:begin|end)\s*\{\s*$/;

export function protectTerms(text: string, session: ParseSession): string {
  const terms = [...session.config.preserveTerms].sort((a, b) => b.length - a.length);
  if (terms.length === 0) {
    return text;
  }

  const pattern = new RegExp(
    String.raw`(?<![\\\w])(?:${terms.map(escapeRegExp).join('|')})(?!\w)`,
    'g'
  );

  return mapOutsideTokens(text, (segment) =>
    segment.replace(pattern, (term: string, offset: number) =>
      ENVIRONMENT_NAME_PREFIX.test(segment.slice(Math.max(0, offset - 40), offset))
        ? term
        : session.protect('TERM', term)
    )
  );
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export const PROTECTION_PASSES: readonly ProtectionPass[] = [
  { name: 'author', run: protectAuthorBlocks, coversChunks: false },
  { name: 'caption', run: extractCaptions, coversChunks: false },
  { name: 'environment', run: protectEnvironments, coversChunks: true },
  { name: 'inline-math', run: protectInlineMath, coversChunks: true },
  { name: 'command', run: protectCommands, coversChunks: true },
  { name: 'term', run: protectTerms, coversChunks: true },
];

export class ElementProtector {
  private passes: readonly ProtectionPass[];

  constructor(passes: readonly ProtectionPass[] = PROTECTION_PASSES) {
    this.passes = passes;
  }

  /**
   * Run every pass in order over the body, and over caption chunks from
   * the environment pass onwards.
   */
  protect(text: string, session: ParseSession): string {
    let result = text;
    for (const pass of this.passes) {
      result = pass.run(result, session);
      if (pass.coversChunks) {
        session.rewriteTranslatable((content) => pass.run(content, session));
      }
    }
    return result;
  }
}
