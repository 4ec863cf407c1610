/**
 * Centralized error formatting for CLI commands
 * Ensures consistent error messages and exit behavior
 */

import { isErrorLike } from '@/lib/error-utils';
import type { ErrorGuidance, Result } from '@/types/core';

/**
 * Standard error formatting for CLI commands
 */
export function formatError(message: string, error?: unknown): string {
  const prefix = '❌';
  const baseMessage = `${prefix} ${message}`;

  if (!error) {
    return baseMessage;
  }

  if (typeof error === 'string') {
    return `${baseMessage}: ${error}`;
  }

  if (isErrorLike(error)) {
    return `${baseMessage}: ${error.message}`;
  }

  return `${baseMessage}: ${String(error)}`;
}

/**
 * Hint and resolution lines printed under the error
 */
export function formatGuidance(guidance?: ErrorGuidance): string[] {
  if (!guidance) return [];
  const lines: string[] = [];
  if (guidance.hint) lines.push(`   Hint: ${guidance.hint}`);
  if (guidance.resolution) lines.push(`   Fix:  ${guidance.resolution}`);
  return lines;
}

/**
 * Print a failed Result to stderr and mark the process as failed.
 *
 * The exit code is set rather than exiting immediately so that stdout written
 * earlier in the command is flushed.
 */
export function handleResultError<T>(result: Result<T>, message: string): void {
  if (result.ok) {
    throw new Error('Called handleResultError on successful result');
  }

  console.error(formatError(message, result.error));
  for (const line of formatGuidance(result.guidance)) {
    console.error(line);
  }
  process.exitCode = 1;
}

/**
 * Handle generic errors consistently across CLI commands
 */
export function handleGenericError(message: string, error?: unknown): void {
  console.error(formatError(message, error));
  process.exitCode = 1;
}
