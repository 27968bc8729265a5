import Database from 'better-sqlite3';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { CURRENT_SCHEMA_VERSION, listColumns, migrate, StorageError, UsageStatsDatabase } from '../../src/storage/index.js';
import { createTempDir } from '../fixtures.js';

const USAGE_COLUMNS = [
    'name', 'kind', 'call_count', 'last_accessed', 'created_at',
    'total_input_tokens', 'total_output_tokens', 'total_response_chars',
    'estimated_tokens', 'total_duration_ms', 'min_duration_ms', 'max_duration_ms'
];

const METADATA_COLUMNS = ['name', 'tags', 'short_description', 'full_description', 'schema_version', 'updated_at'];

function snapshotSchema(path: string) {
    const raw = new Database(path);
    try {
        return {
            usage: listColumns(raw, 'usage_stats'),
            metadata: listColumns(raw, 'usage_metadata'),
            indexes: (raw.prepare(
                "SELECT name FROM sqlite_master WHERE type = 'index' AND name LIKE 'idx_%' ORDER BY name"
            ).all() as { name: string }[]).map(row => row.name),
            rows: raw.prepare('SELECT * FROM usage_stats ORDER BY name').all()
        };
    } finally {
        raw.close();
    }
}

describe('migrate', () => {
    it('should create both tables with the current column set', () => {
        const db = new Database(':memory:');
        migrate(db);

        expect(listColumns(db, 'usage_stats')).toEqual(USAGE_COLUMNS);
        expect(listColumns(db, 'usage_metadata')).toEqual(METADATA_COLUMNS);
        db.close();
    });

    it('should be safe to run repeatedly', () => {
        const db = new Database(':memory:');
        migrate(db);
        migrate(db);
        migrate(db);

        expect(listColumns(db, 'usage_stats')).toEqual(USAGE_COLUMNS);
        db.close();
    });

    it('should add missing columns to a version 1 table without touching its rows', () => {
        const db = new Database(':memory:');
        db.exec(`
            CREATE TABLE usage_stats (
                name TEXT PRIMARY KEY,
                kind TEXT NOT NULL DEFAULT 'tool',
                call_count INTEGER NOT NULL DEFAULT 0,
                last_accessed TEXT NOT NULL,
                created_at TEXT NOT NULL
            );
            INSERT INTO usage_stats (name, kind, call_count, last_accessed, created_at)
            VALUES ('legacy_tool', 'tool', 7, '2025-06-01T00:00:00Z', '2025-05-01T00:00:00Z');
        `);

        migrate(db);

        expect(listColumns(db, 'usage_stats')).toEqual(USAGE_COLUMNS);
        const row = db.prepare('SELECT * FROM usage_stats WHERE name = ?').get('legacy_tool');
        expect(row).toEqual({
            name: 'legacy_tool',
            kind: 'tool',
            call_count: 7,
            last_accessed: '2025-06-01T00:00:00Z',
            created_at: '2025-05-01T00:00:00Z',
            total_input_tokens: 0,
            total_output_tokens: 0,
            total_response_chars: 0,
            estimated_tokens: 0,
            total_duration_ms: 0,
            min_duration_ms: null,
            max_duration_ms: null
        });
        db.close();
    });
});

describe('UsageStatsDatabase.ensureSchema', () => {
    let temp: ReturnType<typeof createTempDir>;

    beforeEach(() => {
        temp = createTempDir();
    });

    afterEach(() => {
        temp.cleanup();
    });

    it('should create the storage directory', async () => {
        const path = join(temp.dir, 'nested', 'dir', 'stats.sqlite');
        const db = new UsageStatsDatabase(path);

        await db.ensureSchema();

        expect(snapshotSchema(path).usage).toEqual(USAGE_COLUMNS);
        await db.close();
    });

    it('should produce the same schema and data however often it runs', async () => {
        const path = join(temp.dir, 'stats.sqlite');
        const first = new UsageStatsDatabase(path);
        await first.record('lookup', 'tool', { durationMs: 4 });
        const once = snapshotSchema(path);

        await first.ensureSchema();
        await first.ensureSchema();
        const second = new UsageStatsDatabase(path);
        await second.ensureSchema();

        expect(snapshotSchema(path)).toEqual(once);
        expect(once.indexes).toEqual(['idx_usage_stats_calls', 'idx_usage_stats_kind']);
        await first.close();
        await second.close();
    });

    it('should carry old counters forward after an upgrade', async () => {
        const path = join(temp.dir, 'stats.sqlite');
        const raw = new Database(path);
        raw.exec(`
            CREATE TABLE usage_stats (
                name TEXT PRIMARY KEY,
                kind TEXT NOT NULL DEFAULT 'tool',
                call_count INTEGER NOT NULL DEFAULT 0,
                last_accessed TEXT NOT NULL,
                created_at TEXT NOT NULL
            );
            INSERT INTO usage_stats VALUES ('legacy_tool', 'tool', 7, '2025-06-01T00:00:00Z', '2025-05-01T00:00:00Z');
        `);
        raw.close();

        const db = new UsageStatsDatabase(path);
        await db.record('legacy_tool', 'tool', { durationMs: 9, inputTokens: 3 });

        const usage = await db.getUsage('legacy_tool');
        expect(usage).toMatchObject({
            callCount: 8,
            createdAt: '2025-05-01T00:00:00Z',
            totalInputTokens: 3,
            totalDurationMs: 9,
            minDurationMs: 9,
            maxDurationMs: 9
        });
        await db.close();
    });

    it('should stamp metadata with the current schema version', async () => {
        const db = new UsageStatsDatabase(join(temp.dir, 'stats.sqlite'));
        await db.updateMetadata('lookup', { tags: ['a'], shortDescription: 'Lookup' });

        expect((await db.getMetadata('lookup'))?.schemaVersion).toBe(CURRENT_SCHEMA_VERSION);
        await db.close();
    });

    it('should raise StorageError when the location is unusable', async () => {
        const blocker = join(temp.dir, 'not-a-directory');
        writeFileSync(blocker, 'x');
        const db = new UsageStatsDatabase(join(blocker, 'stats.sqlite'));

        await expect(db.ensureSchema()).rejects.toThrow(StorageError);
        await db.close();
    });
});
