import { z } from 'zod';

export const DEFAULT_DB_PATH = './usage_stats.sqlite';
export const DEFAULT_LOG_PATH = './usage_stats.log';

export const ENV_DB_PATH = 'USAGE_STATS_DB_PATH';
export const ENV_LOG_PATH = 'USAGE_STATS_LOG_PATH';
export const ENV_LOG_ENABLED = 'USAGE_STATS_LOG_ENABLED';

export const MetadataPresetSchema = z.object({
    tags: z.array(z.string()).default([]),
    short: z.string().optional()
});

export type MetadataPreset = z.input<typeof MetadataPresetSchema>;

export const UsageStatsOptionsSchema = z.object({
    dbPath: z.string().min(1).optional(),
    logPath: z.string().min(1).optional(),
    logEnabled: z.boolean().optional(),
    metadataPresets: z.record(MetadataPresetSchema).default({}),
    cleanupOrphans: z.boolean().default(true)
});

export type UsageStatsOptions = z.input<typeof UsageStatsOptionsSchema>;

export interface UsageStatsConfig {
    dbPath: string;
    logPath: string;
    logEnabled: boolean;
    metadataPresets: Record<string, z.infer<typeof MetadataPresetSchema>>;
    cleanupOrphans: boolean;
}

/** `true/1/yes` or `false/0/no`, any case; anything else is unset. */
export function parseBooleanFlag(value: string | undefined): boolean | undefined {
    const normalized = (value ?? '').trim().toLowerCase();
    if (['true', '1', 'yes'].includes(normalized)) return true;
    if (['false', '0', 'no'].includes(normalized)) return false;
    return undefined;
}

/**
 * Merge constructor options with defaults. Environment variables, when set,
 * override what the caller passed.
 *
 * Priority:
 * 1. USAGE_STATS_* environment variables
 * 2. Explicit options
 * 3. Defaults (./usage_stats.sqlite, ./usage_stats.log, log disabled)
 */
export function resolveConfig(
    options: UsageStatsOptions = {},
    env: NodeJS.ProcessEnv = process.env
): UsageStatsConfig {
    const parsed = UsageStatsOptionsSchema.parse(options);

    return {
        dbPath: env[ENV_DB_PATH] || parsed.dbPath || DEFAULT_DB_PATH,
        logPath: env[ENV_LOG_PATH] || parsed.logPath || DEFAULT_LOG_PATH,
        logEnabled: parseBooleanFlag(env[ENV_LOG_ENABLED]) ?? parsed.logEnabled ?? false,
        metadataPresets: parsed.metadataPresets,
        cleanupOrphans: parsed.cleanupOrphans
    };
}
