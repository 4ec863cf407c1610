/**
 * Schema definition for check-upstream-versions tool
 */

import { z } from 'zod';

export const checkUpstreamVersionsSchema = z.object({
  config: z
    .string()
    .min(1)
    .default('ci/upstream_config.json')
    .describe('Upstream source mapping (JSON or YAML), relative to the workspace'),
});

export type CheckUpstreamVersionsParams = z.infer<typeof checkUpstreamVersionsSchema>;

export const UpstreamSourceSchema = z.discriminatedUnion('source', [
  z.object({
    source: z.literal('github_release'),
    repo: z.string().regex(/^[\w.-]+\/[\w.-]+$/, 'repo must be owner/name'),
    prefix: z.string().default('v'),
    tag_template: z.string().optional(),
  }),
  z.object({
    source: z.literal('docker_hub'),
    image: z.string().min(1),
    tag_template: z.string().optional(),
  }),
]);

/** Variant file path (relative to the workspace) to the upstream it follows */
export const UpstreamConfigSchema = z.record(z.string(), UpstreamSourceSchema);

export type UpstreamSource = z.infer<typeof UpstreamSourceSchema>;
export type UpstreamConfig = z.infer<typeof UpstreamConfigSchema>;
