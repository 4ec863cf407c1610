/**
 * Pattern-matched error guidance.
 *
 * A builder walks an ordered list of patterns and returns the guidance of the
 * first one that matches, so the most specific patterns must come first.
 */

import type { ErrorGuidance } from '@/types/core';
import { errorCode, extractErrorMessage } from './error-utils';

export interface ErrorPattern {
  match: (error: unknown) => boolean;
  guidance: (error: unknown) => ErrorGuidance;
}

export function createErrorGuidanceBuilder(
  patterns: ErrorPattern[],
  defaultGuidance?: (error: unknown) => ErrorGuidance,
): (error: unknown) => ErrorGuidance {
  return function extractGuidance(error: unknown): ErrorGuidance {
    const pattern = patterns.find((candidate) => candidate.match(error));
    if (pattern) {
      return pattern.guidance(error);
    }
    if (defaultGuidance) {
      return defaultGuidance(error);
    }
    return {
      message: extractErrorMessage(error),
      hint: 'An unexpected error occurred',
      resolution: 'Check the error message and logs for more details',
    };
  };
}

/**
 * Matches when the error message contains `substring` (case-insensitive)
 */
export function messagePattern(
  substring: string,
  guidance: ErrorGuidance | ((error: unknown) => ErrorGuidance),
): ErrorPattern {
  const needle = substring.toLowerCase();
  return customPattern((error) => extractErrorMessage(error).toLowerCase().includes(needle), guidance);
}

/**
 * Matches a Node system error code such as ECONNREFUSED
 */
export function codePattern(
  code: string,
  guidance: ErrorGuidance | ((error: unknown) => ErrorGuidance),
): ErrorPattern {
  return customPattern((error) => errorCode(error) === code, guidance);
}

export function customPattern(
  matchFn: (error: unknown) => boolean,
  guidance: ErrorGuidance | ((error: unknown) => ErrorGuidance),
): ErrorPattern {
  return {
    match: matchFn,
    guidance: typeof guidance === 'function' ? guidance : () => guidance,
  };
}
