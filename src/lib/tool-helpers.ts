/**
 * Common helper utilities for tools to reduce code duplication
 */

import { createTimer, type Logger, type Timer } from './logger';
import type { ToolContext } from '@/types/context';

// Re-export Timer type for use by consumers
export type { Timer };

/**
 * Child logger scoped to a tool.
 * Invariant: Always returns a valid logger instance
 */
export function getToolLogger(context: ToolContext, toolName: string): Logger {
  return context.logger.child({ tool: toolName });
}

/**
 * Creates a timer that ignores a second end/error call, so a handler can end
 * it in a finally-style path without double-logging.
 */
export function createToolTimer(logger: Logger, toolName: string): Timer {
  const timer = createTimer(logger, toolName);
  let completed = false;

  return {
    end(additionalContext?: Record<string, unknown>): void {
      if (completed) return;
      completed = true;
      timer.end(additionalContext);
    },

    error(error: unknown, additionalContext?: Record<string, unknown>): void {
      if (completed) return;
      completed = true;
      timer.error(error, additionalContext);
    },

    checkpoint(label: string, additionalContext?: Record<string, unknown>): number {
      // Checkpoints are allowed even after completion for debugging
      return timer.checkpoint(label, additionalContext);
    },
  };
}

/**
 * Combined logger and timer for tool execution
 */
export interface ToolExecutionContext {
  logger: Logger;
  timer: Timer;
}

/**
 * Set up standardized logger and timer for tool execution
 *
 * @example
 * ```typescript
 * async function handleMatrix(input: MatrixParams, ctx: ToolContext) {
 *   const { logger, timer } = setupToolContext(ctx, 'matrix');
 *   // ... tool logic
 *   timer.end({ entries: include.length });
 * }
 * ```
 */
export function setupToolContext(context: ToolContext, toolName: string): ToolExecutionContext {
  const logger = getToolLogger(context, toolName);
  return { logger, timer: createToolTimer(logger, toolName) };
}
