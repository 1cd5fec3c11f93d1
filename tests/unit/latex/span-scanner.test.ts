import { describe, it, expect } from 'vitest';
import {
  findClosingDelimiter,
  findCommands,
  findEnvironmentEnd,
  isEscaped,
  lastMandatory,
  readArguments,
} from '../../../src/latex/span-scanner';
import { UnbalancedDelimiterError } from '../../../src/latex/errors';
import {
  collectTokens,
  isTokensOnly,
  literalPlaceholders,
  mapOutsideTokens,
} from '../../../src/latex/tokens';

describe('span-scanner', () => {
  describe('isEscaped', () => {
    it('counts the backslash run before a character', () => {
      expect(isEscaped('\\{', 1)).toBe(true);
      expect(isEscaped('\\\\{', 2)).toBe(false);
      expect(isEscaped('a{', 1)).toBe(false);
    });
  });

  describe('findClosingDelimiter', () => {
    it('matches nested braces', () => {
      expect(findClosingDelimiter('{a{b}c}d', 1, '{', '}')).toBe(6);
    });

    it('skips escaped braces', () => {
      expect(findClosingDelimiter('{a\\}b}', 1, '{', '}')).toBe(5);
    });

    it('skips brace groups while matching brackets', () => {
      expect(findClosingDelimiter('[{a]b}]', 1, '[', ']')).toBe(6);
    });

    it('throws UnbalancedDelimiterError when input ends first', () => {
      expect(() => findClosingDelimiter('{abc', 1, '{', '}')).toThrow(UnbalancedDelimiterError);
    });
  });

  describe('findEnvironmentEnd', () => {
    const text = '\\begin{a}x\\begin{a}y\\end{a}z\\end{a}';

    it('counts identically named environments', () => {
      expect(findEnvironmentEnd(text, 9, 'a')).toEqual({ start: 28, end: 35 });
    });

    it('closes at the first end when nesting is off', () => {
      expect(findEnvironmentEnd(text, 9, 'a', { nested: false })).toEqual({ start: 20, end: 27 });
    });

    it('ignores differently named environments', () => {
      const mixed = '\\begin{table}\\begin{tabular}{c}x\\end{tabular}\\end{table}';
      expect(findEnvironmentEnd(mixed, 13, 'table').end).toBe(mixed.length);
    });

    it('throws on a missing end', () => {
      expect(() => findEnvironmentEnd('\\begin{a} text', 9, 'a')).toThrow(UnbalancedDelimiterError);
    });
  });

  describe('findCommands', () => {
    it('matches whole command names only and skips escaped heads', () => {
      const heads = findCommands('\\cite{a} \\citep{b} \\\\cite', 'cite');
      expect(heads).toEqual([{ name: 'cite', start: 0, end: 5, starred: false }]);
    });

    it('reports starred forms', () => {
      expect(findCommands('\\section*{X}', 'section')).toEqual([
        { name: 'section', start: 0, end: 9, starred: true },
      ]);
    });
  });

  describe('readArguments', () => {
    it('reads optional and mandatory arguments by signature', () => {
      expect(readArguments('\\cite[p.~3]{key}', 5, ['o', 'o', 'm'])).toEqual({
        args: [
          { optional: true, start: 6, end: 10 },
          { optional: false, start: 12, end: 15 },
        ],
        end: 16,
      });
    });

    it('returns null when a mandatory argument is missing', () => {
      expect(readArguments('\\ref x', 4, ['m'])).toBeNull();
    });

    it('does not look past a blank line', () => {
      expect(readArguments('\\section\n\n{X}', 8, ['m'])).toBeNull();
    });

    it('throws when a mandatory argument never closes', () => {
      expect(() => readArguments('\\ref{abc', 4, ['m'])).toThrow(UnbalancedDelimiterError);
    });

    it('picks the last mandatory argument', () => {
      const parsed = readArguments('\\section[Short]{Long}', 8, ['o', 'm']);
      expect(parsed && lastMandatory(parsed.args)).toEqual({ optional: false, start: 16, end: 20 });
    });
  });
});

describe('tokens', () => {
  it('collects literal placeholders whatever their index', () => {
    expect(literalPlaceholders('a [[NOTE_5]] b [[MATH_1000000000000000000000]] c [[NOTE_5]]')).toEqual(
      new Set(['[[NOTE_5]]', '[[MATH_1000000000000000000000]]'])
    );
    expect(literalPlaceholders('no tokens').size).toBe(0);
  });

  it('collects placeholders and chunk tokens in order', () => {
    expect(collectTokens('x {{CHUNK_ab-12}} y [[CITE_3]]')).toEqual([
      '{{CHUNK_ab-12}}',
      '[[CITE_3]]',
    ]);
  });

  it('detects token-only text', () => {
    expect(isTokensOnly('  [[ENV_1]] {{CHUNK_ff}} ')).toBe(true);
    expect(isTokensOnly('[[ENV_1]] text')).toBe(false);
    expect(isTokensOnly('   ')).toBe(false);
  });

  it('maps only the text between tokens', () => {
    expect(mapOutsideTokens('ab[[X_1]]cd', (s) => s.toUpperCase())).toBe('AB[[X_1]]CD');
  });
});
