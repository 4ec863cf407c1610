import type { z } from 'zod';
import type { Result } from './core';
import type { ToolContext } from './context';

/**
 * Tool categories for grouping in help output
 */
export type ToolCategory =
  | 'build' // Image builds and publishing
  | 'security' // Scan gating
  | 'maintenance' // Dependency and version upkeep
  | 'reporting' // Notifications and report formatting
  | 'utility';

/**
 * Unified interface for every factory operation exposed through the CLI
 */
export interface FactoryTool<TSchema extends z.ZodTypeAny = z.ZodTypeAny, TOut = unknown> {
  /** Unique tool identifier, also the CLI command name */
  name: string;

  /** Human-readable description */
  description: string;

  category: ToolCategory;

  /** Zod schema for validation */
  schema: TSchema;

  /** Tool handler with pre-validated, strongly-typed input */
  handler: (input: z.infer<TSchema>, context: ToolContext) => Promise<Result<TOut>>;
}

/**
 * Lightweight helper to create tools with reduced boilerplate
 */
export function tool<TSchema extends z.ZodTypeAny, TOut>(config: {
  name: string;
  description: string;
  category: ToolCategory;
  schema: TSchema;
  handler: (input: z.infer<TSchema>, context: ToolContext) => Promise<Result<TOut>>;
}): FactoryTool<TSchema, TOut> {
  return { ...config };
}

/**
 * What listings need from a tool, independent of its input and output types
 */
export type ToolSummary = Pick<FactoryTool, 'name' | 'description' | 'category'>;
