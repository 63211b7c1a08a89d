/** 1-based line and column of a position in stylesheet source. */
export interface SourceLocation {
  line: number;
  column: number;
}

/**
 * Why a grammar rejected its input.
 *
 * - `var-function`: a `var()` call was met; the caller defers the whole value
 * - `invalid-value`: well-formed but out of range (negative widths, negative blur)
 * - `unsupported-value`: recognized CSS this dialect does not implement
 * - `syntax`: anything else
 */
export type CssParseErrorKind = 'var-function' | 'invalid-value' | 'unsupported-value' | 'syntax';

export class CssParseError extends Error {
  readonly kind: CssParseErrorKind;
  readonly location: SourceLocation;

  constructor(kind: CssParseErrorKind, message: string, location: SourceLocation) {
    super(message);
    this.name = 'CssParseError';
    this.kind = kind;
    this.location = location;
  }
}

export function isVarSignal(error: unknown): error is CssParseError {
  return error instanceof CssParseError && error.kind === 'var-function';
}
