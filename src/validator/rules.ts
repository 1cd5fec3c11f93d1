/**
 * User-defined validation rules and auto-fixes
 */

import type { ValidationIssue, ValidationRule } from './types';

function compile(rule: ValidationRule): RegExp | null {
  try {
    const flags = rule.flags ?? '';
    return new RegExp(rule.pattern, flags.includes('g') ? flags : `${flags}g`);
  } catch {
    return null;
  }
}

/**
 * Run every rule against the text. An invalid pattern is reported as a
 * warning naming the rule.
 */
export function checkRules(
  text: string,
  rules: readonly ValidationRule[]
): { errors: ValidationIssue[]; warnings: ValidationIssue[] } {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  for (const rule of rules) {
    const pattern = compile(rule);
    if (!pattern) {
      warnings.push({
        code: 'custom-rule',
        message: `Rule ${rule.id} has an invalid pattern: ${rule.pattern}`,
      });
      continue;
    }

    for (const match of text.matchAll(pattern)) {
      if (match[0].length === 0) {
        continue;
      }
      const issue: ValidationIssue = {
        code: 'custom-rule',
        message: `${rule.description ?? `Matched pattern ${rule.pattern}`} (rule ${rule.id} at ${match.index ?? 0})`,
      };
      if (rule.severity === 'error') {
        errors.push(issue);
      } else {
        warnings.push(issue);
      }
    }
  }

  return { errors, warnings };
}

/**
 * Apply the replacement of every rule that has one, in order
 */
export function applyFixes(text: string, rules: readonly ValidationRule[]): string {
  let fixed = text;

  for (const rule of rules) {
    if (rule.replacement === undefined) {
      continue;
    }
    const pattern = compile(rule);
    if (!pattern) {
      console.warn(`⚠️  Skipping rule ${rule.id}: invalid pattern ${rule.pattern}`);
      continue;
    }
    fixed = fixed.replace(pattern, rule.replacement);
  }

  return fixed;
}
