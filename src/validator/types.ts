/**
 * Validation Types
 */

export type IssueSeverity = 'error' | 'warning';

export type ValidationCode =
  | 'unbalanced-brackets'
  | 'brace-structure'
  | 'citation-keys'
  | 'reference-keys'
  | 'placeholders'
  | 'math-delimiters'
  | 'length-ratio'
  | 'custom-rule';

export interface ValidationIssue {
  code: ValidationCode;
  message: string;
}

export interface ValidationResult {
  /** False when any error was found; warnings never fail */
  passed: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/**
 * User-defined regex rule run against the translated text
 */
export interface ValidationRule {
  id: string;
  pattern: string;
  flags?: string;
  description?: string;
  severity: IssueSeverity;
  /** Used by applyFixes() */
  replacement?: string;
}

export interface ValidateOptions {
  rules?: readonly ValidationRule[];
  minLengthRatio?: number;
  maxLengthRatio?: number;
}

export const DEFAULT_MIN_LENGTH_RATIO = 0.2;
export const DEFAULT_MAX_LENGTH_RATIO = 1.5;
