/**
 * Shared type definitions: Result type, tool interface and tool context.
 */

export * from './core';
export * from './tool';
export type { ToolContext } from './context';
