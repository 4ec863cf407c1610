/**
 * Shared Zod schemas for tool parameters
 * Common building blocks to reduce duplication across tools
 */

import { z } from 'zod';

// Catalog image directory name
export const imageName = z
  .string()
  .min(1)
  .regex(/^[a-z0-9]+(?:[._-][a-z0-9]+)*$/, 'Image names are lowercase directory names under images/')
  .describe('Image directory name under images/');

// Paths
export const filePath = z.string().min(1).describe('Path to a file, relative to the working directory');
export const rootPath = z.string().min(1).optional().describe('Directory to scan (defaults to the workspace)');

// Registry
export const imageTag = z
  .string()
  .min(1)
  .regex(/^[\w][\w.-]{0,127}$/, 'Invalid image tag')
  .describe('Image tag');
export const platform = z.string().optional().describe('Target platform (e.g., linux/amd64)');
