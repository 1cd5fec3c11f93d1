/**
 * Error taxonomy for the LaTeX pipeline
 */

export class LatexBridgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Input ended before a delimiter's nesting depth returned to zero.
 * Recoverable: callers degrade the span to literal text.
 */
export class UnbalancedDelimiterError extends LatexBridgeError {
  readonly delimiter: string;
  readonly position: number;

  constructor(delimiter: string, position: number) {
    super(`Unbalanced delimiter '${delimiter}' opened at position ${position}`);
    this.delimiter = delimiter;
    this.position = position;
  }
}

/**
 * A placeholder or chunk id was issued or owned twice. Never repaired.
 */
export class PlaceholderCollisionError extends LatexBridgeError {
  readonly token: string;

  constructor(token: string, detail?: string) {
    super(`Placeholder collision on ${token}${detail ? `: ${detail}` : ''}`);
    this.token = token;
  }
}
