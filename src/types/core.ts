/**
 * Core type definitions for image-factory.
 * Result type used by every fallible operation.
 */

/**
 * Structured error information with actionable guidance
 */
export interface ErrorGuidance {
  /** Primary error message */
  message: string;
  /** Actionable hint for the operator (what went wrong in user terms) */
  hint?: string;
  /** Specific resolution steps to fix the issue */
  resolution?: string;
  /** Additional context or details */
  details?: Record<string, unknown>;
}

/**
 * Result type for functional error handling
 *
 * Tools never throw across their boundary; callers branch on `ok`.
 *
 * @example
 * ```typescript
 * const result = await resolveImage(workspace, config, 'python-distroless');
 * if (!result.ok) {
 *   console.error(result.error);
 *   if (result.guidance?.resolution) console.error(result.guidance.resolution);
 * }
 * ```
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

/** Create a success result */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result with optional guidance
 * @param error - Error message
 * @param guidance - Optional structured guidance for operators
 */
export const Failure = <T>(error: string, guidance?: ErrorGuidance): Result<T> => {
  // Always create a new guidance object to avoid mutating the input parameter
  const resultGuidance = guidance ? { ...guidance, message: guidance.message || error } : undefined;
  return resultGuidance ? { ok: false, error, guidance: resultGuidance } : { ok: false, error };
};

