/**
 * Error Taxonomy
 *
 * Lookup, extraction and write failures carry a `kind` so handlers can pick
 * a specific reply or status code for each one.
 *
 * FILE LOCATION: functions/src/errors.ts
 */

// ============================================
// VALIDATION RULES
// ============================================

export type ValidationRule =
  | 'score-not-integer'
  | 'score-negative'
  | 'frames-exceed-best-of'
  | 'frames-exceed-winning-total'
  | 'break-unknown-player'
  | 'break-not-integer'
  | 'break-negative';

export interface RuleViolation {
  rule: ValidationRule;
  message: string;
}

// ============================================
// LOOKUP
// ============================================

export type LookupErrorKind = 'not_found' | 'ambiguous';

export class LookupError extends Error {
  readonly kind: LookupErrorKind;
  /** Fixture ids the message could refer to (ambiguous only) */
  readonly candidates: string[];

  constructor(kind: LookupErrorKind, message: string, candidates: string[] = []) {
    super(message);
    this.name = 'LookupError';
    this.kind = kind;
    this.candidates = candidates;
  }
}

// ============================================
// EXTRACTION
// ============================================

export type ExtractionErrorKind =
  | 'model_output_invalid'
  | 'inconsistent_with_format'
  | 'timeout'
  | 'model_unavailable';

export class ExtractionError extends Error {
  readonly kind: ExtractionErrorKind;
  readonly violation?: RuleViolation;

  constructor(kind: ExtractionErrorKind, message: string, violation?: RuleViolation) {
    super(message);
    this.name = 'ExtractionError';
    this.kind = kind;
    this.violation = violation;
  }

  static inconsistent(violation: RuleViolation): ExtractionError {
    return new ExtractionError('inconsistent_with_format', violation.message, violation);
  }
}

// ============================================
// STORE / WRITE
// ============================================

export class StoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

export type WriteErrorKind = 'already_complete' | 'fixture_not_found' | 'store_unavailable';

export class WriteError extends Error {
  readonly kind: WriteErrorKind;
  readonly fixtureId: string;

  constructor(kind: WriteErrorKind, fixtureId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WriteError';
    this.kind = kind;
    this.fixtureId = fixtureId;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
