/**
 * Environment Variable Parsing Utilities
 *
 * Standardized utilities for parsing environment variables with type safety
 * and consistent default handling.
 */

/**
 * Parse string from environment variable with default
 *
 * @example
 * parseStringEnv('NEXUS_NAMESPACE', 'docker-hosted') // 'docker-hosted' if unset
 */
export function parseStringEnv(
  key: string,
  defaultValue: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const value = env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

/**
 * Parse boolean from environment variable with default
 *
 * Recognizes common boolean string representations:
 * - true: 'true', '1', 'yes'
 * - false: 'false', '0', 'no'
 *
 * @example
 * parseBoolEnv('PUSH_IMAGES', false) // true if PUSH_IMAGES=true
 */
export function parseBoolEnv(
  key: string,
  defaultValue: boolean,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  const value = env[key];
  if (value === undefined) return defaultValue;
  const lower = value.toLowerCase();
  if (lower === 'false' || lower === '0' || lower === 'no') return false;
  if (lower === 'true' || lower === '1' || lower === 'yes') return true;
  return defaultValue;
}

/**
 * Parse comma-separated list from environment variable
 *
 * Trims whitespace from each item and filters out empty strings.
 *
 * @example
 * parseListEnv('BUILD_PLATFORMS') // ['linux/amd64', 'linux/arm64']
 */
export function parseListEnv(
  key: string,
  delimiter = ',',
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  const value = env[key];
  if (!value) return [];
  return splitList(value, delimiter);
}

/**
 * Split a delimited string, trimming items and dropping empty ones
 */
export function splitList(value: string, delimiter = ','): string[] {
  return value
    .split(delimiter)
    .map((s) => s.trim())
    .filter(Boolean);
}
