/**
 * Unified Application Configuration
 *
 * Single source of truth for all configuration with Zod validation.
 * Environment variables provide the base layer; CLI flags override them.
 */

import { z } from 'zod';
import { parseBoolEnv, parseListEnv, parseStringEnv, splitList } from './env-utils';

/**
 * Flattened configuration defaults
 */
const DEFAULT_CONFIG = {
  REGISTRY: 'registry.local',
  NAMESPACE: 'docker-hosted',
  IMAGE_GROUP: 'base',
  PLATFORMS: ['linux/amd64', 'linux/arm64'],
  BUILDER: 'factory-builder',
  IMAGES_DIR: 'images',
  TESTS_DIR: 'tests',
  TRIVY_SEVERITY: ['HIGH', 'CRITICAL'],
  TRIVY_IGNORE_FILE: '.trivyignore',
} as const;

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const PlatformSchema = z
  .string()
  .regex(/^[a-z0-9]+\/[a-z0-9_]+(\/[a-z0-9]+)?$/, 'Platform must look like os/arch[/variant]');

const RegistryHostSchema = z
  .string()
  .min(1)
  .regex(/^[a-zA-Z0-9.-]+(:\d+)?$/, 'Registry must be a bare host[:port] without scheme or path');

const PathSegmentSchema = z
  .string()
  .min(1)
  .regex(/^[a-z0-9]+(?:[._-][a-z0-9]+)*$/, 'Must be a lowercase registry path segment');

export const FactoryConfigSchema = z.object({
  workspaceDir: z.string().min(1),
  /** Unset lets the logger pick its environment default */
  logLevel: LogLevelSchema.optional(),
  registry: z.object({
    host: RegistryHostSchema.default(DEFAULT_CONFIG.REGISTRY),
    namespace: PathSegmentSchema.default(DEFAULT_CONFIG.NAMESPACE),
    group: PathSegmentSchema.default(DEFAULT_CONFIG.IMAGE_GROUP),
  }),
  /** Credentials for direct pushes from a workstation (bootstrap images) */
  publish: z.object({
    username: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
  }),
  build: z.object({
    platforms: z.array(PlatformSchema).min(1).default([...DEFAULT_CONFIG.PLATFORMS]),
    builder: z.string().min(1).default(DEFAULT_CONFIG.BUILDER),
    push: z.boolean().default(false),
    scan: z.boolean().default(false),
  }),
  layout: z.object({
    imagesDir: z.string().min(1).default(DEFAULT_CONFIG.IMAGES_DIR),
    testsDir: z.string().min(1).default(DEFAULT_CONFIG.TESTS_DIR),
  }),
  security: z.object({
    severities: z
      .array(z.enum(['UNKNOWN', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL']))
      .min(1)
      .default([...DEFAULT_CONFIG.TRIVY_SEVERITY]),
    ignoreFile: z.string().min(1).default(DEFAULT_CONFIG.TRIVY_IGNORE_FILE),
  }),
  notifications: z.object({
    /** Checked when a notification is sent, so a bad value only affects delivery */
    discordWebhook: z.string().optional(),
  }),
});

export type FactoryConfig = z.infer<typeof FactoryConfigSchema>;

/**
 * Values the CLI may override on top of the environment
 */
export interface ConfigOverrides {
  workspaceDir?: string;
  logLevel?: string;
  registry?: string;
  namespace?: string;
  platforms?: string;
  push?: boolean;
  scan?: boolean;
}

/**
 * Create configuration with environment variable overrides and validation.
 *
 * Pushing always implies scanning: nothing reaches the registry unverified.
 */
export function createFactoryConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): FactoryConfig {
  const platformsFromEnv = parseListEnv('BUILD_PLATFORMS', ',', env);
  const severitiesFromEnv = parseListEnv('TRIVY_SEVERITY', ',', env).map((s) => s.toUpperCase());

  // Empty variables mean "use the default", which zod only applies to undefined
  const fromEnv = (key: string): string | undefined => env[key] || undefined;

  const push = overrides.push ?? parseBoolEnv('PUSH_IMAGES', false, env);
  const scan = push || (overrides.scan ?? parseBoolEnv('SCAN_IMAGES', false, env));

  const rawConfig = {
    workspaceDir: overrides.workspaceDir ?? parseStringEnv('WORKSPACE_DIR', process.cwd(), env),
    logLevel: overrides.logLevel ?? fromEnv('LOG_LEVEL'),
    registry: {
      host: overrides.registry ?? fromEnv('NEXUS_REGISTRY'),
      namespace: overrides.namespace ?? fromEnv('NEXUS_NAMESPACE'),
      group: fromEnv('IMAGE_GROUP'),
    },
    publish: {
      username: fromEnv('NEXUS_PUBLISH_USERNAME'),
      password: fromEnv('NEXUS_PUBLISH_PASSWORD'),
    },
    build: {
      platforms: overrides.platforms
        ? splitList(overrides.platforms)
        : platformsFromEnv.length > 0
          ? platformsFromEnv
          : undefined,
      builder: fromEnv('BUILDX_BUILDER'),
      push,
      scan,
    },
    layout: {
      imagesDir: fromEnv('IMAGES_DIR'),
      testsDir: fromEnv('TESTS_DIR'),
    },
    security: {
      severities: severitiesFromEnv.length > 0 ? severitiesFromEnv : undefined,
      ignoreFile: fromEnv('TRIVY_IGNORE_FILE'),
    },
    notifications: {
      discordWebhook: fromEnv('DISCORD_WEBHOOK'),
    },
  };

  return FactoryConfigSchema.parse(rawConfig);
}

/**
 * Fully qualified repository (without tag) for a catalog image
 */
export function imageRepository(config: FactoryConfig, imageName: string): string {
  const { host, namespace, group } = config.registry;
  return `${host}/${namespace}/${group}/${imageName}`;
}
