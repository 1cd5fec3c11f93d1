import { describe, it, expect, vi } from 'vitest';
import {
  checkBrackets,
  countMathDelimiters,
  extractCitationKeys,
  extractReferenceKeys,
  findBraceStructureMismatch,
  validate,
} from '../../../src/validator/structural-validator';
import { applyFixes, checkRules } from '../../../src/validator/rules';
import type { ValidationRule } from '../../../src/validator/types';

describe('validate', () => {
  it('passes a text validated against itself', () => {
    const source = 'See \\cite{a,b} and \\ref{sec:x} with $x$ and \\(y\\).';

    expect(validate(source, source)).toEqual({ passed: true, errors: [], warnings: [] });
  });

  it('reports a missing citation key', () => {
    const result = validate('As shown in \\cite{smith,jones}.', 'Comme montré dans \\cite{smith}.');

    expect(result.passed).toBe(false);
    expect(result.errors).toEqual([{ code: 'citation-keys', message: 'Missing citations: jones' }]);
  });

  it('reports an invented reference key', () => {
    const result = validate('See \\ref{a}.', 'Voir \\ref{a} et \\ref{b}.');

    expect(result.errors).toContainEqual({
      code: 'reference-keys',
      message: 'Unexpected references: b',
    });
  });

  it('treats labels and eqref as reference keys', () => {
    expect([...extractReferenceKeys('\\label{eq:1} \\eqref{eq:2} \\cref{s1, s2}')].sort()).toEqual([
      'eq:1',
      'eq:2',
      's1',
      's2',
    ]);
  });

  it('reads citation keys across citation commands', () => {
    expect([...extractCitationKeys('\\citep[see][p.~2]{a, b} \\textcite{c}')].sort()).toEqual([
      'a',
      'b',
      'c',
    ]);
  });

  it('reports differing inline math parity', () => {
    const result = validate('Value $x$ here.', 'Valeur $x here.');

    expect(result.errors).toEqual([
      { code: 'math-delimiters', message: "Inline '$' parity differs: source 2, translation 1" },
    ]);
  });

  it('reports placeholder loss', () => {
    const result = validate('Keep [[MATH_1]] here', 'Garder ici');

    expect(result.errors).toContainEqual({
      code: 'placeholders',
      message: 'Missing placeholders: [[MATH_1]]',
    });
  });

  it('warns on a suspicious length ratio without failing', () => {
    const result = validate('This is a reasonably long sentence.', 'Court.');

    expect(result.passed).toBe(true);
    expect(result.warnings).toEqual([
      { code: 'length-ratio', message: 'Translation suspiciously short (ratio 0.17)' },
    ]);
  });

  it('skips the length ratio for a blank source', () => {
    expect(validate('  ', 'Something').warnings).toEqual([]);
  });

  it('downgrades an imbalance that the source already had', () => {
    const result = validate('Open { brace', 'Ouvre { accolade');

    expect(result.passed).toBe(true);
    expect(result.warnings).toEqual([
      { code: 'unbalanced-brackets', message: "Unmatched opening '{' at position 6" },
    ]);
  });

  it('fails a newly introduced imbalance', () => {
    const result = validate('Balanced {x}', 'Balanced {x');

    expect(result.passed).toBe(false);
    expect(result.errors.map((issue) => issue.code)).toEqual(['unbalanced-brackets', 'brace-structure']);
  });

  it('runs custom rules', () => {
    const rules: ValidationRule[] = [
      { id: 'no-marker', pattern: 'TODO', severity: 'error', description: 'Leftover marker' },
    ];

    expect(validate('Done here', 'Done TODO', { rules }).errors).toEqual([
      { code: 'custom-rule', message: 'Leftover marker (rule no-marker at 5)' },
    ]);
  });
});

describe('checkBrackets', () => {
  it('ignores escaped characters and math delimiters', () => {
    expect(checkBrackets('\\{ \\( x \\] (a[b]{c})')).toEqual([]);
  });

  it('reports mismatched and unmatched closers', () => {
    expect(checkBrackets('(a] b)')).toEqual([
      { kind: 'mismatch', char: ']', position: 2 },
      { kind: 'unmatched-close', char: ')', position: 5 },
    ]);
  });
});

describe('findBraceStructureMismatch', () => {
  it('locates the first divergence by line and column', () => {
    expect(findBraceStructureMismatch('x {y}', 'x y}')).toBe(
      'Brace structure mismatch (source token {, translation token })\n' +
        'source line 1, col 3: x {y}\n' +
        'translation line 1, col 4: x y}'
    );
  });

  it('returns null for matching structure', () => {
    expect(findBraceStructureMismatch('a {b} c', 'x {yy} zz')).toBeNull();
  });
});

describe('countMathDelimiters', () => {
  it('counts every delimiter kind', () => {
    expect(countMathDelimiters('$a$ $$b$$ \\(c\\) \\[d\\] \\$')).toEqual({
      dollar: 2,
      doubleDollar: 2,
      parenOpen: 1,
      parenClose: 1,
      bracketOpen: 1,
      bracketClose: 1,
    });
  });
});

describe('rules', () => {
  it('reports an invalid pattern as a warning', () => {
    const rules: ValidationRule[] = [{ id: 'bad', pattern: '(', severity: 'error' }];

    expect(checkRules('anything', rules)).toEqual({
      errors: [],
      warnings: [{ code: 'custom-rule', message: 'Rule bad has an invalid pattern: (' }],
    });
  });

  it('applies replacements in order', () => {
    const rules: ValidationRule[] = [
      { id: 'spaces', pattern: ' {2,}', severity: 'warning', replacement: ' ' },
      { id: 'quote', pattern: '``', severity: 'warning', replacement: '"' },
      { id: 'report-only', pattern: 'x', severity: 'warning' },
    ];

    expect(applyFixes('a   b ``x', rules)).toBe('a b "x');
  });

  it('skips rules with invalid patterns when fixing', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(applyFixes('abc', [{ id: 'bad', pattern: '[', severity: 'error', replacement: '' }])).toBe(
      'abc'
    );
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});
