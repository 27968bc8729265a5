import type Database from 'better-sqlite3';
import { isAbsolute, join } from 'path';
import {
    EntityNameSchema,
    MetadataSyncEntrySchema,
    MetadataUpdateSchema,
    PrimitiveKindSchema,
    RecordMetricsSchema,
    type MetadataSyncEntry,
    type MetadataUpdate,
    type PrimitiveKind,
    type RecordMetrics,
    type UsageRecord,
    type MetadataEntry
} from '../schema/usage.js';
import { buildCatalog, buildStatsReport, estimateTokens, groupByKind } from '../stats/query.js';
import { normalizeTags, tagsToString } from '../stats/tags.js';
import type { ByTypeReport, CatalogOptions, CatalogReport, StatsOptions, StatsReport } from '../stats/types.js';
import { ConnectionSource, ensureDbDirectory, MEMORY_DB_PATH, utcTimestamp } from './db.js';
import { errorMessage, QueryError, StorageError } from './errors.js';
import { CURRENT_SCHEMA_VERSION, migrate } from './migrations.js';
import { AsyncMutex } from './mutex.js';
import { MetadataRepository, metadataChanged, type MetadataContent } from './repos/metadata.repo.js';
import { UsageRepository } from './repos/usage.repo.js';

export interface SyncOptions {
    /** Delete metadata (and tool usage) for names absent from the supplied set. */
    cleanupOrphans?: boolean;
}

export interface SyncResult {
    inserted: number;
    updated: number;
    unchanged: number;
    removedMetadata: number;
    removedUsage: number;
}

/**
 * Make relative paths absolute based on CWD; `:memory:` is kept as-is.
 */
export function resolveDbPath(path: string): string {
    if (path === MEMORY_DB_PATH || isAbsolute(path)) {
        return path;
    }
    return join(process.cwd(), path);
}

/**
 * SQLite-backed usage store.
 *
 * Every operation, reads included, runs behind one mutex and on its own
 * connection. Schema creation happens on first use, inside the same mutex.
 * Storage errors propagate from here; {@link UsageStats} is the layer that
 * swallows them on the recording path.
 */
export class UsageStatsDatabase {
    readonly dbPath: string;
    private readonly connections: ConnectionSource;
    private readonly mutex = new AsyncMutex();
    private initialized = false;
    private closed = false;

    constructor(dbPath: string) {
        this.dbPath = resolveDbPath(dbPath);
        this.connections = new ConnectionSource(this.dbPath);
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Create the directory, tables, indexes and missing columns. Idempotent;
     * only the first successful call per instance touches the database.
     */
    async ensureSchema(): Promise<void> {
        await this.mutex.runExclusive(() => this.initializeOnce());
    }

    async record(name: string, kind: PrimitiveKind = 'tool', metrics: RecordMetrics = {}): Promise<void> {
        const validName = EntityNameSchema.parse(name);
        const validKind = PrimitiveKindSchema.parse(kind);
        const parsed = RecordMetricsSchema.parse(metrics);
        const now = utcTimestamp();

        await this.write('record', db => {
            new UsageRepository(db).upsert(validName, validKind, {
                responseChars: parsed.responseChars ?? 0,
                inputTokens: parsed.inputTokens ?? 0,
                outputTokens: parsed.outputTokens ?? 0,
                estimatedTokens: estimateTokens(parsed.responseChars),
                durationMs: parsed.durationMs ?? null
            }, now);
        });
    }

    /**
     * Adds tokens to an already recorded name without counting a call.
     * Returns false when the name has never been recorded (nothing written).
     */
    async reportTokens(name: string, inputTokens: number, outputTokens: number): Promise<boolean> {
        const validName = EntityNameSchema.parse(name);
        const tokens = RecordMetricsSchema.pick({ inputTokens: true, outputTokens: true })
            .parse({ inputTokens, outputTokens });

        const changes = await this.write('reportTokens', db =>
            new UsageRepository(db).addTokens(validName, tokens.inputTokens ?? 0, tokens.outputTokens ?? 0)
        );
        return changes > 0;
    }

    async updateMetadata(name: string, update: MetadataUpdate): Promise<void> {
        const validName = EntityNameSchema.parse(name);
        const parsed = MetadataUpdateSchema.parse(update);
        const content: MetadataContent = {
            tags: tagsToString(normalizeTags(parsed.tags)),
            shortDescription: parsed.shortDescription,
            fullDescription: parsed.fullDescription ?? '',
            schemaVersion: CURRENT_SCHEMA_VERSION
        };
        const now = utcTimestamp();

        await this.write('updateMetadata', db => {
            new MetadataRepository(db).upsert(validName, content, now);
        });
    }

    /**
     * Reconcile stored metadata with the supplied entity set in one transaction.
     * Rows are rewritten only when their content or schema version differs.
     */
    async syncMetadata(entries: MetadataSyncEntry[], options: SyncOptions = {}): Promise<SyncResult> {
        // Later entries for the same name win
        const parsed = new Map(entries
            .map(entry => MetadataSyncEntrySchema.parse(entry))
            .map(entry => [entry.name, entry] as const));
        const cleanupOrphans = options.cleanupOrphans ?? true;
        const now = utcTimestamp();

        return this.write('syncMetadata', db => {
            const metadata = new MetadataRepository(db);
            const usage = new UsageRepository(db);
            const result: SyncResult = { inserted: 0, updated: 0, unchanged: 0, removedMetadata: 0, removedUsage: 0 };

            const sync = db.transaction(() => {
                const existing = metadata.findAllRows();

                for (const entry of parsed.values()) {
                    const content: MetadataContent = {
                        tags: tagsToString(normalizeTags(entry.tags)),
                        shortDescription: entry.shortDescription,
                        fullDescription: entry.description ?? '',
                        schemaVersion: CURRENT_SCHEMA_VERSION
                    };
                    const current = existing.get(entry.name);

                    if (!current) {
                        metadata.insert(entry.name, content, now);
                        result.inserted++;
                    } else if (metadataChanged(current, content)) {
                        metadata.update(entry.name, content, now);
                        result.updated++;
                    } else {
                        result.unchanged++;
                    }
                }

                if (cleanupOrphans) {
                    const orphans = [...existing.keys()].filter(name => !parsed.has(name));
                    result.removedMetadata = metadata.deleteByNames(orphans);
                    // Tool identity is bound to its metadata; prompt/resource history is kept
                    result.removedUsage = usage.deleteToolsByName(orphans);
                }
            });
            sync();

            return result;
        });
    }

    async getStats(options: StatsOptions = {}): Promise<StatsReport> {
        const rows = await this.read('getStats', db => new UsageRepository(db).listWithMetadata({
            includeZero: options.includeZero ?? true,
            limit: options.limit,
            typeFilter: options.typeFilter
        }));
        return buildStatsReport(rows);
    }

    async getByType(): Promise<ByTypeReport> {
        const records = await this.read('getByType', db => new UsageRepository(db).findAll());
        return groupByKind(records);
    }

    async getCatalog(options: CatalogOptions = {}): Promise<CatalogReport> {
        const rows = await this.read('getCatalog', db => new MetadataRepository(db).listCatalogRows());
        return buildCatalog(rows, options);
    }

    async getUsage(name: string): Promise<UsageRecord | null> {
        return this.read('getUsage', db => new UsageRepository(db).findByName(name));
    }

    async getMetadata(name: string): Promise<MetadataEntry | null> {
        return this.read('getMetadata', db => new MetadataRepository(db).findByName(name));
    }

    /**
     * Release the in-memory connection, if any, and refuse further work. Idempotent.
     */
    async close(): Promise<void> {
        await this.mutex.runExclusive(() => {
            if (this.closed) return;
            this.closed = true;
            this.connections.close();
            console.error(`[Database] Closed: ${this.dbPath}`);
        });
    }

    private initializeOnce(): void {
        if (this.closed) {
            throw new StorageError('database is closed');
        }
        if (this.initialized) return;

        try {
            ensureDbDirectory(this.dbPath);
            this.connections.use(db => migrate(db));
        } catch (e) {
            throw new StorageError(`Failed to initialize database at ${this.dbPath}: ${errorMessage(e)}`, e);
        }

        this.initialized = true;
        console.error(`[Database] Schema ready at: ${this.dbPath}`);
    }

    private async write<T>(operation: string, work: (db: Database.Database) => T): Promise<T> {
        return this.mutex.runExclusive(() => {
            this.initializeOnce();
            try {
                return this.connections.use(work);
            } catch (e) {
                throw new StorageError(`${operation} failed: ${errorMessage(e)}`, e);
            }
        });
    }

    private async read<T>(operation: string, work: (db: Database.Database) => T): Promise<T> {
        return this.mutex.runExclusive(() => {
            this.initializeOnce();
            try {
                return this.connections.use(work);
            } catch (e) {
                throw new QueryError(operation, e);
            }
        });
    }
}

export * from './db.js';
export * from './errors.js';
export * from './migrations.js';
export * from './mutex.js';
