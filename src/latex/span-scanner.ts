/**
 * Balanced-delimiter matching over raw LaTeX source.
 *
 * Every pass above this module locates its spans through these helpers,
 * so they never guess at structure with regex alternation.
 */

import { UnbalancedDelimiterError } from './errors';

/** 'o' = optional [..], 'm' = mandatory {..} */
export type ArgumentKind = 'o' | 'm';

export interface ArgumentSpan {
  optional: boolean;
  /** Index of the first character inside the delimiters */
  start: number;
  /** Index of the closing delimiter */
  end: number;
}

export interface ArgumentList {
  args: ArgumentSpan[];
  /** Index just past the last consumed delimiter */
  end: number;
}

export interface CommandHead {
  name: string;
  /** Index of the backslash */
  start: number;
  /** Index just past the name (and star, if any) */
  end: number;
  starred: boolean;
}

export interface EnvironmentEnd {
  /** Index of the backslash of \end */
  start: number;
  /** Index just past the closing brace of \end{name} */
  end: number;
}

/**
 * True when the character at index is preceded by an odd run of backslashes
 */
export function isEscaped(text: string, index: number): boolean {
  let count = 0;
  let cursor = index - 1;
  while (cursor >= 0 && text[cursor] === '\\') {
    count++;
    cursor--;
  }
  return count % 2 === 1;
}

/**
 * Find the closer matching an opener that sits just before `start`.
 * Escaped delimiters are skipped; while matching brackets, brace groups
 * are skipped whole so `[{a]b}]` closes at the last bracket.
 */
export function findClosingDelimiter(
  text: string,
  start: number,
  open: string,
  close: string
): number {
  let depth = 1;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (ch === '\\') {
      i++;
      continue;
    }

    if (open !== '{' && ch === '{') {
      i = findClosingDelimiter(text, i + 1, '{', '}');
      continue;
    }

    if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }

  throw new UnbalancedDelimiterError(open, start - 1);
}

function escapeRegExp(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Find the \end{name} that closes a \begin{name} ending just before `start`.
 * Only identical names are counted. With nested=false the first \end closes.
 */
export function findEnvironmentEnd(
  text: string,
  start: number,
  name: string,
  options: { nested?: boolean } = {}
): EnvironmentEnd {
  const nested = options.nested ?? true;
  const pattern = new RegExp(String.raw`\\(begin|end)\s*\{${escapeRegExp(name)}\}`, 'g');
  pattern.lastIndex = start;

  let depth = 1;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    if (isEscaped(text, match.index)) {
      continue;
    }

    if (match[1] === 'begin') {
      if (nested) {
        depth++;
      }
      continue;
    }

    depth--;
    if (depth === 0 || !nested) {
      return { start: match.index, end: match.index + match[0].length };
    }
  }

  throw new UnbalancedDelimiterError(`\\begin{${name}}`, start);
}

/**
 * Locate unescaped `\name` heads not followed by another letter
 */
export function findCommands(text: string, name: string): CommandHead[] {
  const pattern = new RegExp(String.raw`\\${escapeRegExp(name)}(?![A-Za-z])(\*)?`, 'g');
  const heads: CommandHead[] = [];

  for (const match of text.matchAll(pattern)) {
    const index = match.index ?? 0;
    if (isEscaped(text, index)) {
      continue;
    }
    heads.push({
      name,
      start: index,
      end: index + match[0].length,
      starred: match[1] === '*',
    });
  }

  return heads;
}

/**
 * Skip spaces and tabs plus at most one line break (a blank line ends
 * an argument list in LaTeX).
 */
export function skipArgumentWhitespace(text: string, pos: number): number {
  let i = pos;
  let newlines = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === ' ' || ch === '\t' || ch === '\r') {
      i++;
    } else if (ch === '\n' && newlines === 0) {
      newlines++;
      i++;
    } else {
      break;
    }
  }
  return i;
}

/**
 * Read an argument list described by a signature such as ['o', 'm'].
 * Returns null when a mandatory argument is absent; throws
 * UnbalancedDelimiterError when one is opened but never closed.
 */
export function readArguments(
  text: string,
  start: number,
  signature: readonly ArgumentKind[]
): ArgumentList | null {
  const args: ArgumentSpan[] = [];
  let pos = start;

  for (const kind of signature) {
    const next = skipArgumentWhitespace(text, pos);

    if (kind === 'o') {
      if (text[next] !== '[') {
        continue;
      }
      const close = findClosingDelimiter(text, next + 1, '[', ']');
      args.push({ optional: true, start: next + 1, end: close });
      pos = close + 1;
      continue;
    }

    if (text[next] !== '{') {
      return null;
    }
    const close = findClosingDelimiter(text, next + 1, '{', '}');
    args.push({ optional: false, start: next + 1, end: close });
    pos = close + 1;
  }

  return { args, end: pos };
}

/**
 * The last mandatory argument: for `\section[short]{long}` that is `long`
 */
export function lastMandatory(args: readonly ArgumentSpan[]): ArgumentSpan | undefined {
  for (let i = args.length - 1; i >= 0; i--) {
    if (!args[i].optional) {
      return args[i];
    }
  }
  return undefined;
}
