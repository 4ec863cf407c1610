/**
 * Dependency update report exchanged between the checkers, the pull request
 * creator and the Discord formatter. Field names are snake_case because the
 * report is a CI artifact read by workflow steps.
 */

import { z } from 'zod';

const DockerDigestUpdateSchema = z.object({
  type: z.literal('docker_digest'),
  file: z.string(),
  image: z.string(),
  tag: z.string(),
  current_digest: z.string(),
  latest_digest: z.string(),
  raw_ref: z.string(),
});

const DockerUnpinnedUpdateSchema = z.object({
  type: z.literal('docker_unpinned'),
  file: z.string(),
  image: z.string(),
  tag: z.string(),
  current_digest: z.null(),
  latest_digest: z.string(),
  raw_ref: z.string(),
});

const ActionPinnedUpdateSchema = z.object({
  type: z.literal('action_pinned'),
  file: z.string(),
  action: z.string(),
  tag: z.string(),
  current_sha: z.string(),
  latest_sha: z.string(),
  raw_ref: z.string(),
});

const ActionUnpinnedUpdateSchema = z.object({
  type: z.literal('action_unpinned'),
  file: z.string(),
  action: z.string(),
  tag: z.string(),
  current_sha: z.null(),
  latest_sha: z.string(),
  raw_ref: z.string(),
});

const VariantUpdateSchema = z.object({
  type: z.literal('variant_update'),
  file: z.string(),
  current_version: z.string(),
  latest_version: z.string(),
  raw_ref: z.string(),
});

export const DependencyUpdateSchema = z.discriminatedUnion('type', [
  DockerDigestUpdateSchema,
  DockerUnpinnedUpdateSchema,
  ActionPinnedUpdateSchema,
  ActionUnpinnedUpdateSchema,
  VariantUpdateSchema,
]);

export const DependencyWarningSchema = z
  .object({
    type: z.string(),
    file: z.string(),
    reason: z.string(),
    image: z.string().optional(),
    tag: z.string().optional(),
    action: z.string().optional(),
    ref: z.string().optional(),
    current_sha: z.string().optional(),
  })
  .passthrough();

export const UpToDateEntrySchema = z
  .object({
    type: z.string(),
    file: z.string(),
    raw_ref: z.string(),
  })
  .passthrough();

export const DependencyReportSchema = z.object({
  updates: z.array(DependencyUpdateSchema).default([]),
  warnings: z.array(DependencyWarningSchema).default([]),
  up_to_date: z.array(UpToDateEntrySchema).default([]),
});

export type DependencyUpdate = z.infer<typeof DependencyUpdateSchema>;
export type DependencyWarning = z.infer<typeof DependencyWarningSchema>;
export type UpToDateEntry = z.infer<typeof UpToDateEntrySchema>;
export type DependencyReport = z.infer<typeof DependencyReportSchema>;

/** Digests are shown as `sha256:` plus the first 12 hex characters */
export const shortDigest = (digest: string): string => digest.slice(0, 19);
export const shortSha = (sha: string): string => sha.slice(0, 12);
