/**
 * Application Constants and Defaults
 */

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  toolVersionCheck: 10000, // 10 seconds
  registryLookup: 30000, // 30 seconds (crane digest, gh api)
  daemonHealthCheck: 3000,
  webhook: 10000,
} as const;

export const LIMITS = {
  /** stdout/stderr capture for captured (non-streamed) commands */
  MAX_OUTPUT_BUFFER: 10 * 1024 * 1024,
} as const;

/**
 * Platform used for pre-flight verification builds; a single arch is required to `--load`
 */
export const VERIFICATION_PLATFORM = 'linux/amd64';

export const LOCAL_SCAN_TAG_PREFIX = 'local-scan-';

export const LATEST_TAG = 'latest';

/** Build argument every Dockerfile receives with the variant being built */
export const VERSION_BUILD_ARG = 'VERSION';

export const VARIANTS_FILE = 'VARIANTS';
export const VERSION_FILE = 'VERSION';
export const DOCKERFILE = 'Dockerfile';
export const SMOKE_TEST_SCRIPT = 'test.sh';

/**
 * Branch and commit identity used when opening dependency update pull requests
 */
export const UPDATE_PR = {
  branch: 'auto-update/pinned-deps',
  base: 'main',
  commitMessage: 'update: pinned dependency digests/SHAs',
  authorName: 'github-actions[bot]',
  authorEmail: '41898282+github-actions[bot]@users.noreply.github.com',
} as const;

export const NOTIFIER_USERNAME = 'Image Factory';

/** Advisory-ID prefixes that are never treated as path globs in ignore files */
export const ADVISORY_ID_PREFIXES = ['CVE-', 'GHSA-', 'RUSTSEC-'] as const;
