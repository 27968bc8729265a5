import { z } from 'zod';
import type { PrimitiveKind, RecordMetrics } from '../schema/usage.js';
import { errorMessage, UsageStatsDatabase, type SyncResult } from '../storage/index.js';
import { UsageAuditLog } from './audit-log.js';
import { resolveConfig, type MetadataPreset, type UsageStatsConfig, type UsageStatsOptions } from './config.js';
import { deriveShortDescription, normalizeTags, tagsFromName } from './tags.js';
import { wrapHandler, type TrackOptions, type UsageRecorder } from './tracking.js';
import type { ByTypeReport, CatalogOptions, CatalogReport, StatsOptions, StatsReport } from './types.js';

/** What callers hand over when syncing: the name and description of an MCP primitive. */
export const EntityDescriptorSchema = z.object({
    name: z.string().min(1),
    description: z.string().nullish()
});

export type EntityDescriptor = z.input<typeof EntityDescriptorSchema>;

/** Resources may be identified by URI alone. */
export const ResourceDescriptorSchema = z.object({
    name: z.string().nullish(),
    uri: z.string().nullish(),
    description: z.string().nullish()
});

export type ResourceDescriptor = z.input<typeof ResourceDescriptorSchema>;

interface ResolvedMetadata {
    tags: string[];
    shortDescription: string;
}

/**
 * Usage tracking entry point for an MCP server.
 *
 * Recording never throws: storage failures are reported on stderr and
 * dropped so an instrumented handler behaves the same with or without
 * tracking. Queries and metadata sync do throw.
 */
export class UsageStats implements UsageRecorder {
    readonly serverName: string;
    readonly config: UsageStatsConfig;
    readonly db: UsageStatsDatabase;
    private readonly auditLog: UsageAuditLog;

    constructor(serverName: string, options: UsageStatsOptions = {}, env: NodeJS.ProcessEnv = process.env) {
        this.serverName = serverName;
        this.config = resolveConfig(options, env);
        this.db = new UsageStatsDatabase(this.config.dbPath);
        this.auditLog = new UsageAuditLog(this.config.logEnabled ? this.config.logPath : null);
    }

    /**
     * Record one invocation. Call it from every handler, or use {@link wrapHandler}.
     */
    async record(name: string, kind: PrimitiveKind = 'tool', metrics: RecordMetrics = {}): Promise<void> {
        this.auditLog.log({ name, kind, success: metrics.success ?? true, errorMsg: metrics.errorMsg });

        try {
            await this.db.record(name, kind, metrics);
        } catch (e) {
            console.error(`[UsageStats] Tracking failed for ${name}: ${errorMessage(e)}`);
        }
    }

    /**
     * Add token counts that became known after the call was recorded.
     * Does not count a call. A name that was never recorded is left alone.
     */
    async reportTokens(name: string, inputTokens: number, outputTokens: number): Promise<void> {
        try {
            await this.db.reportTokens(name, inputTokens, outputTokens);
        } catch (e) {
            console.error(`[UsageStats] Token reporting failed for ${name}: ${errorMessage(e)}`);
        }
    }

    getStats(options: StatsOptions = {}): Promise<StatsReport> {
        return this.db.getStats(options);
    }

    getByType(): Promise<ByTypeReport> {
        return this.db.getByType();
    }

    getCatalog(options: CatalogOptions = {}): Promise<CatalogReport> {
        return this.db.getCatalog(options);
    }

    /**
     * Replace tool metadata with the given tool list. Presets win over generated
     * tags; orphaned tools are removed when `cleanupOrphans` is on.
     */
    async syncTools(tools: EntityDescriptor[]): Promise<SyncResult> {
        const entries = tools.map(tool => {
            const { name, description } = EntityDescriptorSchema.parse(tool);
            const resolved = this.resolveMetadata(name, description, tagsFromName(name));
            return { name, description: description ?? '', ...resolved };
        });

        return this.db.syncMetadata(entries, { cleanupOrphans: this.config.cleanupOrphans });
    }

    async syncPrompts(prompts: EntityDescriptor[]): Promise<void> {
        for (const prompt of prompts) {
            const { name, description } = EntityDescriptorSchema.parse(prompt);
            const resolved = this.resolveMetadata(name, description, normalizeTags([name, 'prompt'], { filterStopwords: true }));
            await this.db.updateMetadata(name, { ...resolved, fullDescription: description });
        }
    }

    async syncResources(resources: ResourceDescriptor[]): Promise<void> {
        for (const resource of resources) {
            const parsed = ResourceDescriptorSchema.parse(resource);
            const name = parsed.name || parsed.uri || 'unknown';
            const resolved = this.resolveMetadata(name, parsed.description, normalizeTags([name, 'resource'], { filterStopwords: true }));
            await this.db.updateMetadata(name, { ...resolved, fullDescription: parsed.description });
        }
    }

    /**
     * Register metadata by hand, for primitives that never go through a sync.
     */
    async registerMetadata(
        name: string,
        metadata: { tags: string[]; shortDescription: string; fullDescription?: string | null }
    ): Promise<void> {
        await this.db.updateMetadata(name, { ...metadata, tags: normalizeTags(metadata.tags) });
    }

    /** Preset applied on the next sync of `name`. */
    addPreset(name: string, preset: MetadataPreset): void {
        this.config.metadataPresets[name] = { tags: preset.tags ?? [], short: preset.short };
    }

    wrapHandler<A extends unknown[], T>(
        name: string,
        handler: (...args: A) => Promise<T> | T,
        kind: PrimitiveKind = 'tool',
        options: TrackOptions<T> = {}
    ): (...args: A) => Promise<T> {
        return wrapHandler(this, name, handler, kind, options);
    }

    /** Release the audit log and the store. Idempotent. */
    async close(): Promise<void> {
        this.auditLog.close();
        await this.db.close();
    }

    private resolveMetadata(name: string, description: string | null | undefined, generatedTags: string[]): ResolvedMetadata {
        const preset = this.config.metadataPresets[name];

        let tags = preset ? normalizeTags(preset.tags) : generatedTags;
        if (tags.length === 0) {
            tags = [name.toLowerCase()];
        }

        return {
            tags,
            shortDescription: preset?.short || deriveShortDescription(description, name)
        };
    }
}
