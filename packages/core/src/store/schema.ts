/**
 * Snapshot file schema
 *
 * One JSON document per (profile, account). Validated on load; anything
 * that does not match is rejected rather than partially read.
 */

import { z } from 'zod';

export const SNAPSHOT_FORMAT = 'iamgraph-snapshot';
export const SNAPSHOT_FORMAT_VERSION = 1;

const PatternSetSchema = z.object({
  patterns: z.array(z.string()),
  negated: z.boolean(),
});

const ConditionBlockSchema = z.record(z.string(), z.record(z.string(), z.array(z.string())));

const EffectiveGrantSchema = z.object({
  allowed: z.boolean(),
  actions: PatternSetSchema,
  resources: PatternSetSchema,
  conditions: ConditionBlockSchema,
  origin: z.string(),
});

export const EffectivePermissionsSchema = z.object({
  principalArn: z.string(),
  policyHash: z.string(),
  grants: z.array(EffectiveGrantSchema),
  boundary: z.array(EffectiveGrantSchema).nullable(),
  session: z.array(EffectiveGrantSchema).nullable(),
  variables: z.record(z.string(), z.string()),
});

export const GraphNodeSchema = z.object({
  arn: z.string().min(1),
  type: z.enum(['user', 'role', 'group']),
  name: z.string(),
  searchableName: z.string(),
  isAdmin: z.boolean(),
  hasBoundary: z.boolean(),
});

export const GraphEdgeSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
  label: z.object({
    ruleId: z.string().min(1),
    kind: z.enum(['access', 'escalation']),
    technique: z.string(),
    preconditions: z.array(z.string()),
    selfEscalation: z.boolean(),
  }),
});

export const GraphWarningSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('partial-ingestion'),
    principalArn: z.string(),
    operation: z.string(),
    message: z.string(),
  }),
  z.object({
    kind: z.literal('dangling-reference'),
    source: z.string(),
    reference: z.string(),
    message: z.string(),
  }),
]);

export const SnapshotMetadataSchema = z.object({
  accountId: z.string().min(1),
  profile: z.string().min(1),
  generatedAt: z.string().datetime(),
  toolVersion: z.string(),
  ruleIds: z.array(z.string()),
});

export const SnapshotFileSchema = z.object({
  format: z.literal(SNAPSHOT_FORMAT),
  formatVersion: z.literal(SNAPSHOT_FORMAT_VERSION),
  metadata: SnapshotMetadataSchema,
  nodes: z.array(GraphNodeSchema),
  edges: z.array(GraphEdgeSchema),
  warnings: z.array(GraphWarningSchema),
  resolutionCache: z.array(EffectivePermissionsSchema),
});

/** Only the header, read first to give a precise error for other formats */
export const SnapshotHeaderSchema = z.object({
  format: z.string(),
  formatVersion: z.number(),
});

export type SnapshotMetadata = z.infer<typeof SnapshotMetadataSchema>;
export type SnapshotFile = z.infer<typeof SnapshotFileSchema>;
