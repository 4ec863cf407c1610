/**
 * Tool execution: parameter validation, timing log and the guarantee that a
 * thrown error comes back as a Failure.
 */

import type { z } from 'zod';

import { ERROR_MESSAGES } from '@/lib/error-messages';
import { extractErrorMessage } from '@/lib/error-utils';
import type { ToolContext } from '@/types/context';
import { Failure, Success, type Result } from '@/types/core';
import type { FactoryTool } from '@/types/tool';

/**
 * Validate parameters against schema using safeParse
 */
export function validateParams<T extends z.ZodTypeAny>(params: unknown, schema: T): Result<z.infer<T>> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    return Failure(ERROR_MESSAGES.VALIDATION_FAILED(issues));
  }
  return Success(parsed.data);
}

export async function executeTool<TSchema extends z.ZodTypeAny, TOut>(
  tool: FactoryTool<TSchema, TOut>,
  params: unknown,
  context: ToolContext,
): Promise<Result<TOut>> {
  const validation = validateParams(params, tool.schema);
  if (!validation.ok) return validation;

  const startTime = Date.now();
  try {
    const result = await tool.handler(validation.value, context);
    context.logger.debug(
      { tool: tool.name, ok: result.ok, durationMs: Date.now() - startTime },
      'Tool execution finished',
    );
    return result;
  } catch (error) {
    context.logger.error({ tool: tool.name, err: error }, 'Tool execution failed');
    return Failure(ERROR_MESSAGES.TOOL_CRASHED(tool.name, extractErrorMessage(error)));
  }
}
