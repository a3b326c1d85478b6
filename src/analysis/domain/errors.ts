export type ReportEngineErrorCode =
  | "VALIDATION"
  | "INVARIANT_VIOLATION"
  | "INSUFFICIENT_DATA"
  | "INCOMPLETE_REPORT";

export abstract class ReportEngineError extends Error {
  abstract readonly code: ReportEngineErrorCode;
  /** Fatal errors point at a programming defect and must not be retried. */
  abstract readonly fatal: boolean;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed or missing mandatory input. Aborts the run for one ticker.
 */
export class ValidationError extends ReportEngineError {
  readonly code = "VALIDATION" as const;
  readonly fatal = false;

  constructor(
    message: string,
    readonly field?: string
  ) {
    super(message);
  }
}

/**
 * A scorer produced a value or weight outside its allowed range.
 */
export class InvariantViolation extends ReportEngineError {
  readonly code = "INVARIANT_VIOLATION" as const;
  readonly fatal = true;
}

/**
 * Aggregation has no effective weight left to build a composite from.
 */
export class InsufficientDataError extends ReportEngineError {
  readonly code = "INSUFFICIENT_DATA" as const;
  readonly fatal = false;
}

/**
 * Assembly was invoked before the pipeline filled in a required field.
 */
export class IncompleteReportError extends ReportEngineError {
  readonly code = "INCOMPLETE_REPORT" as const;
  readonly fatal = true;

  constructor(readonly missingFields: string[]) {
    super(`Report draft is missing required fields: ${missingFields.join(", ")}`);
  }
}

export function isReportEngineError(err: unknown): err is ReportEngineError {
  return err instanceof ReportEngineError;
}
