// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/** Location used for synthesized nodes that have no source text */
export const NO_LOCATION: SourceLocation = { line: 0, column: 0, offset: 0 };

export const NO_SPAN: SourceSpan = { start: NO_LOCATION, end: NO_LOCATION };
