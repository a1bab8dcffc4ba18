/**
 * Analysis Errors
 *
 * Fatal configuration and data errors raised by the analysis pipeline.
 * Per-intensity detection failures are not errors: features report them as
 * NaN rows instead.
 */

// ============================================================================
// FAILURE REASONS
// ============================================================================

/**
 * Reason an analysis step could not run.
 */
export type AnalysisFailureReason =
  | { type: 'missingParameter'; component: string; parameter: string }
  | { type: 'invalidParameter'; component: string; detail: string }
  | { type: 'shapeMismatch'; expected: number; found: number; detail: string }
  | { type: 'dataInconsistency'; component: string; detail: string }
  | { type: 'missingDependency'; component: string; dependency: string }
  | { type: 'unknownComponent'; kind: 'transform' | 'feature'; name: string; available: string[] };

export type AnalysisFailureType = AnalysisFailureReason['type'];

/**
 * Get human-readable description of failure reason.
 */
export function getFailureDescription(reason: AnalysisFailureReason): string {
  switch (reason.type) {
    case 'missingParameter':
      return `${reason.component}: missing required parameter '${reason.parameter}'`;
    case 'invalidParameter':
      return `${reason.component}: ${reason.detail}`;
    case 'shapeMismatch':
      return `Expected ${reason.expected} sweeps, found ${reason.found} (${reason.detail})`;
    case 'dataInconsistency':
      return `${reason.component}: ${reason.detail}`;
    case 'missingDependency':
      return `${reason.component} requires a non-empty '${reason.dependency}' result`;
    case 'unknownComponent':
      return `Unknown ${reason.kind} '${reason.name}'. Available: ${reason.available.join(', ')}`;
  }
}

// ============================================================================
// ERROR CLASS
// ============================================================================

export class AnalysisError extends Error {
  readonly reason: AnalysisFailureReason;

  constructor(reason: AnalysisFailureReason) {
    super(getFailureDescription(reason));
    this.name = 'AnalysisError';
    this.reason = reason;
  }

  get type(): AnalysisFailureType {
    return this.reason.type;
  }
}

/**
 * Narrow an unknown thrown value to an AnalysisError, optionally of one type.
 */
export function isAnalysisError(error: unknown, type?: AnalysisFailureType): error is AnalysisError {
  if (!(error instanceof AnalysisError)) return false;
  return type === undefined || error.reason.type === type;
}

/**
 * Shorthand for the most common failure: a numeric setting out of range.
 */
export function invalidParameter(component: string, detail: string): AnalysisError {
  return new AnalysisError({ type: 'invalidParameter', component, detail });
}
