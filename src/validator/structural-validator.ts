/**
 * Structural Validator
 * Stateless checks comparing a source chunk with its candidate translation.
 * Results are returned, never thrown.
 */

import { PROTECTED_COMMANDS } from '../latex/ElementProtector';
import { UnbalancedDelimiterError } from '../latex/errors';
import { findCommands, isEscaped, readArguments } from '../latex/span-scanner';
import { collectTokens } from '../latex/tokens';
import { checkRules } from './rules';
import {
  DEFAULT_MAX_LENGTH_RATIO,
  DEFAULT_MIN_LENGTH_RATIO,
  type ValidateOptions,
  type ValidationIssue,
  type ValidationResult,
} from './types';

// ---------------------------------------------------------------------------
// Bracket balance
// ---------------------------------------------------------------------------

export interface BracketProblem {
  kind: 'unmatched-open' | 'unmatched-close' | 'mismatch';
  char: string;
  position: number;
}

const PAIRS: Record<string, string> = { '}': '{', ']': '[', ')': '(' };

/**
 * Explicit-stack balance check over {}, [] and (). Escaped characters and
 * the \( \) \[ \] math delimiters are ignored.
 */
export function checkBrackets(text: string): BracketProblem[] {
  const stack: Array<{ char: string; position: number }> = [];
  const problems: BracketProblem[] = [];

  let i = 0;
  while (i < text.length) {
    const ch = text[i];

    if (ch === '\\') {
      i += 2;
      while (i < text.length && /[A-Za-z]/.test(text[i]) && /[A-Za-z]/.test(text[i - 1])) {
        i++;
      }
      continue;
    }

    if (ch === '{' || ch === '[' || ch === '(') {
      stack.push({ char: ch, position: i });
    } else if (ch === '}' || ch === ']' || ch === ')') {
      const open = stack.pop();
      if (!open) {
        problems.push({ kind: 'unmatched-close', char: ch, position: i });
      } else if (open.char !== PAIRS[ch]) {
        problems.push({ kind: 'mismatch', char: ch, position: i });
      }
    }
    i++;
  }

  for (const open of stack) {
    problems.push({ kind: 'unmatched-open', char: open.char, position: open.position });
  }
  return problems;
}

function describeBracketProblem(problem: BracketProblem): string {
  switch (problem.kind) {
    case 'unmatched-open':
      return `Unmatched opening '${problem.char}' at position ${problem.position}`;
    case 'unmatched-close':
      return `Unmatched closing '${problem.char}' at position ${problem.position}`;
    default:
      return `Mismatched closing '${problem.char}' at position ${problem.position}`;
  }
}

// ---------------------------------------------------------------------------
// Brace structure
// ---------------------------------------------------------------------------

type BraceToken = { kind: '{' | '}' | 'T'; offset: number };

function braceTokens(text: string): BraceToken[] {
  const tokens: BraceToken[] = [];
  let inText = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if ((ch === '{' || ch === '}') && !isEscaped(text, i)) {
      inText = false;
      tokens.push({ kind: ch, offset: i });
    } else if (!inText) {
      inText = true;
      tokens.push({ kind: 'T', offset: i });
    }
  }
  return tokens;
}

function lineSnippet(text: string, offset: number, window: number = 30): string {
  const bounded = Math.max(0, Math.min(offset, text.length));
  const lineNo = text.slice(0, bounded).split('\n').length;
  const lineStart = text.lastIndexOf('\n', bounded - 1) + 1;
  const newline = text.indexOf('\n', bounded);
  const line = text.slice(lineStart, newline === -1 ? text.length : newline);
  const col = bounded - lineStart + 1;

  const from = Math.max(0, col - 1 - window);
  const to = Math.min(line.length, col + window);
  const snippet = `${from > 0 ? '...' : ''}${line.slice(from, to)}${to < line.length ? '...' : ''}`;
  return `line ${lineNo}, col ${col}: ${snippet}`;
}

/**
 * First divergence between the {, } and text-run sequences, or null
 */
export function findBraceStructureMismatch(source: string, translated: string): string | null {
  const a = braceTokens(source);
  const b = braceTokens(translated);

  let idx = 0;
  while (idx < a.length && idx < b.length && a[idx].kind === b[idx].kind) {
    idx++;
  }
  if (idx === a.length && idx === b.length) {
    return null;
  }

  const sourceKind = a[idx]?.kind ?? '<EOF>';
  const translatedKind = b[idx]?.kind ?? '<EOF>';
  const sourceOffset = a[idx]?.offset ?? source.length;
  const translatedOffset = b[idx]?.offset ?? translated.length;

  return (
    `Brace structure mismatch (source token ${sourceKind}, translation token ${translatedKind})\n` +
    `source ${lineSnippet(source, sourceOffset)}\n` +
    `translation ${lineSnippet(translated, translatedOffset)}`
  );
}

// ---------------------------------------------------------------------------
// Citation / reference keys
// ---------------------------------------------------------------------------

const CITATION_COMMANDS = PROTECTED_COMMANDS.filter((command) => command.kind === 'CITE');
const REFERENCE_COMMANDS = PROTECTED_COMMANDS.filter(
  (command) => command.kind === 'REF' || command.kind === 'EQREF' || command.kind === 'LABEL'
);

/**
 * Keys from the last mandatory argument of the given commands,
 * comma lists split
 */
export function extractKeys(
  text: string,
  commands: ReadonlyArray<{ name: string; signature: readonly ('o' | 'm')[] }>
): Set<string> {
  const keys = new Set<string>();

  for (const command of commands) {
    for (const head of findCommands(text, command.name)) {
      let parsed;
      try {
        parsed = readArguments(text, head.end, command.signature);
      } catch (error) {
        if (error instanceof UnbalancedDelimiterError) {
          continue;
        }
        throw error;
      }
      const arg = parsed?.args.filter((span) => !span.optional).pop();
      if (!arg) {
        continue;
      }
      for (const key of text.slice(arg.start, arg.end).split(',')) {
        const trimmed = key.trim();
        if (trimmed) {
          keys.add(trimmed);
        }
      }
    }
  }

  return keys;
}

export function extractCitationKeys(text: string): Set<string> {
  return extractKeys(text, CITATION_COMMANDS);
}

export function extractReferenceKeys(text: string): Set<string> {
  return extractKeys(text, REFERENCE_COMMANDS);
}

function compareSets(
  source: Set<string>,
  translated: Set<string>,
  code: ValidationIssue['code'],
  label: string
): ValidationIssue[] {
  const missing = [...source].filter((key) => !translated.has(key)).sort();
  const unexpected = [...translated].filter((key) => !source.has(key)).sort();
  const issues: ValidationIssue[] = [];

  if (missing.length > 0) {
    issues.push({ code, message: `Missing ${label}: ${missing.join(', ')}` });
  }
  if (unexpected.length > 0) {
    issues.push({ code, message: `Unexpected ${label}: ${unexpected.join(', ')}` });
  }
  return issues;
}

// ---------------------------------------------------------------------------
// Math delimiters
// ---------------------------------------------------------------------------

export interface MathDelimiterCounts {
  dollar: number;
  doubleDollar: number;
  parenOpen: number;
  parenClose: number;
  bracketOpen: number;
  bracketClose: number;
}

export function countMathDelimiters(text: string): MathDelimiterCounts {
  const counts: MathDelimiterCounts = {
    dollar: 0,
    doubleDollar: 0,
    parenOpen: 0,
    parenClose: 0,
    bracketOpen: 0,
    bracketClose: 0,
  };

  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      const next = text[i + 1];
      if (next === '(') counts.parenOpen++;
      else if (next === ')') counts.parenClose++;
      else if (next === '[') counts.bracketOpen++;
      else if (next === ']') counts.bracketClose++;
      i += 2;
      continue;
    }
    if (ch === '$') {
      if (text[i + 1] === '$') {
        counts.doubleDollar++;
        i += 2;
        continue;
      }
      counts.dollar++;
    }
    i++;
  }

  return counts;
}

function checkMath(source: string, translated: string): ValidationIssue[] {
  const a = countMathDelimiters(source);
  const b = countMathDelimiters(translated);
  const issues: ValidationIssue[] = [];

  if (a.dollar % 2 !== b.dollar % 2) {
    issues.push({
      code: 'math-delimiters',
      message: `Inline '$' parity differs: source ${a.dollar}, translation ${b.dollar}`,
    });
  }

  const paired: Array<[keyof MathDelimiterCounts, string]> = [
    ['doubleDollar', '$$'],
    ['parenOpen', '\\('],
    ['parenClose', '\\)'],
    ['bracketOpen', '\\['],
    ['bracketClose', '\\]'],
  ];
  for (const [key, label] of paired) {
    if (a[key] !== b[key]) {
      issues.push({
        code: 'math-delimiters',
        message: `Math delimiter '${label}' count mismatch: source ${a[key]}, translation ${b[key]}`,
      });
    }
  }

  return issues;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Compare a source chunk with a candidate translation
 */
export function validate(
  source: string,
  translated: string,
  options: ValidateOptions = {}
): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  // Imbalance already present in the source is only a warning
  const sourceBrackets = checkBrackets(source).map((p) => `${p.kind}:${p.char}`).join('|');
  const translatedProblems = checkBrackets(translated);
  if (translatedProblems.length > 0) {
    const target =
      translatedProblems.map((p) => `${p.kind}:${p.char}`).join('|') === sourceBrackets
        ? warnings
        : errors;
    for (const problem of translatedProblems) {
      target.push({ code: 'unbalanced-brackets', message: describeBracketProblem(problem) });
    }
  }

  const mismatch = findBraceStructureMismatch(source, translated);
  if (mismatch) {
    errors.push({ code: 'brace-structure', message: mismatch });
  }

  errors.push(
    ...compareSets(
      extractCitationKeys(source),
      extractCitationKeys(translated),
      'citation-keys',
      'citations'
    ),
    ...compareSets(
      extractReferenceKeys(source),
      extractReferenceKeys(translated),
      'reference-keys',
      'references'
    ),
    ...compareSets(
      new Set(collectTokens(source)),
      new Set(collectTokens(translated)),
      'placeholders',
      'placeholders'
    ),
    ...checkMath(source, translated)
  );

  if (source.trim().length > 0) {
    const ratio = translated.length / source.length;
    const min = options.minLengthRatio ?? DEFAULT_MIN_LENGTH_RATIO;
    const max = options.maxLengthRatio ?? DEFAULT_MAX_LENGTH_RATIO;
    if (ratio < min) {
      warnings.push({
        code: 'length-ratio',
        message: `Translation suspiciously short (ratio ${ratio.toFixed(2)})`,
      });
    } else if (ratio > max) {
      warnings.push({
        code: 'length-ratio',
        message: `Translation suspiciously long (ratio ${ratio.toFixed(2)})`,
      });
    }
  }

  if (options.rules && options.rules.length > 0) {
    const custom = checkRules(translated, options.rules);
    errors.push(...custom.errors);
    warnings.push(...custom.warnings);
  }

  return { passed: errors.length === 0, errors, warnings };
}
