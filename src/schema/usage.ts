/**
 * Usage Tracking Schemas
 *
 * Shapes for the two persisted record types:
 * - UsageRecord: cumulative counters per tracked tool/prompt/resource
 * - MetadataEntry: tags and descriptions used by the catalog
 *
 * The two have independent lifecycles: a name can carry metadata with
 * zero usage, or usage with no metadata.
 *
 * @module schema/usage
 */

import { z } from 'zod';

/**
 * MCP primitive classification of a tracked entity
 */
export const PrimitiveKindSchema = z.enum(['tool', 'prompt', 'resource']);

export type PrimitiveKind = z.infer<typeof PrimitiveKindSchema>;

export const PRIMITIVE_KINDS: readonly PrimitiveKind[] = PrimitiveKindSchema.options;

const Counter = z.number().int().nonnegative();

/**
 * Name of a tracked entity; also the primary key of both tables
 */
export const EntityNameSchema = z.string().min(1);

/**
 * Optional per-invocation metrics accepted by record()
 */
export const RecordMetricsSchema = z.object({
    success: z.boolean().default(true),
    errorMsg: z.string().nullish(),
    responseChars: Counter.nullish(),
    inputTokens: Counter.nullish(),
    outputTokens: Counter.nullish(),
    durationMs: Counter.nullish()
});

export type RecordMetrics = z.input<typeof RecordMetricsSchema>;

export const UsageRecordSchema = z.object({
    name: EntityNameSchema,
    kind: PrimitiveKindSchema,
    callCount: Counter,
    lastAccessed: z.string().nullable(),
    createdAt: z.string().nullable(),
    totalInputTokens: Counter,
    totalOutputTokens: Counter,
    totalResponseChars: Counter,
    estimatedTokens: Counter,
    totalDurationMs: Counter,
    minDurationMs: Counter.nullable(),
    maxDurationMs: Counter.nullable()
});

export type UsageRecord = z.infer<typeof UsageRecordSchema>;

export const MetadataEntrySchema = z.object({
    name: EntityNameSchema,
    tags: z.array(z.string()),
    shortDescription: z.string(),
    fullDescription: z.string(),
    schemaVersion: z.number().int(),
    updatedAt: z.string()
});

export type MetadataEntry = z.infer<typeof MetadataEntrySchema>;

/**
 * Closed input shape for metadata synchronization.
 * `description` becomes the stored full description.
 */
export const MetadataSyncEntrySchema = z.object({
    name: EntityNameSchema,
    description: z.string().nullish(),
    tags: z.array(z.string()),
    shortDescription: z.string().default('')
});

export type MetadataSyncEntry = z.input<typeof MetadataSyncEntrySchema>;

export const MetadataUpdateSchema = z.object({
    tags: z.array(z.string()),
    shortDescription: z.string(),
    fullDescription: z.string().nullish()
});

export type MetadataUpdate = z.input<typeof MetadataUpdateSchema>;
