/**
 * Centralized Error Messages
 *
 * Provides consistent error message templates across the application.
 * Uses template functions for parameterized messages.
 */

export const ERROR_MESSAGES = {
  // Tool-related errors
  VALIDATION_FAILED: (issues: string) => `Validation failed: ${issues}`,
  TOOL_CRASHED: (name: string, error: string) => `${name} failed unexpectedly: ${error}`,

  // Configuration errors
  CONFIG_INVALID: (issues: string) =>
    `Invalid configuration: ${issues}\n` +
    `Tip: Check NEXUS_REGISTRY, BUILD_PLATFORMS and the other factory environment variables.`,
} as const;
