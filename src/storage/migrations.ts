import Database from 'better-sqlite3';

/**
 * Version stamped on metadata rows written by this build.
 * v1: call counts only. v2: token, response size and latency columns.
 */
export const CURRENT_SCHEMA_VERSION = 2;

interface ColumnMigration {
    table: 'usage_stats' | 'usage_metadata';
    column: string;
    definition: string;
}

// Ordered by the schema version that introduced them. Additive only.
const MIGRATIONS: { version: number; columns: ColumnMigration[] }[] = [
    {
        version: 2,
        columns: [
            { table: 'usage_stats', column: 'total_input_tokens', definition: 'INTEGER NOT NULL DEFAULT 0' },
            { table: 'usage_stats', column: 'total_output_tokens', definition: 'INTEGER NOT NULL DEFAULT 0' },
            { table: 'usage_stats', column: 'total_response_chars', definition: 'INTEGER NOT NULL DEFAULT 0' },
            { table: 'usage_stats', column: 'estimated_tokens', definition: 'INTEGER NOT NULL DEFAULT 0' },
            { table: 'usage_stats', column: 'total_duration_ms', definition: 'INTEGER NOT NULL DEFAULT 0' },
            { table: 'usage_stats', column: 'min_duration_ms', definition: 'INTEGER' },
            { table: 'usage_stats', column: 'max_duration_ms', definition: 'INTEGER' }
        ]
    }
];

export function migrate(db: Database.Database) {
    // Fresh databases get the full current column set up front
    db.exec(`
    CREATE TABLE IF NOT EXISTS usage_stats(
    name TEXT PRIMARY KEY,
    kind TEXT NOT NULL DEFAULT 'tool',
    call_count INTEGER NOT NULL DEFAULT 0,
    last_accessed TEXT NOT NULL,
    created_at TEXT NOT NULL,
    total_input_tokens INTEGER NOT NULL DEFAULT 0,
    total_output_tokens INTEGER NOT NULL DEFAULT 0,
    total_response_chars INTEGER NOT NULL DEFAULT 0,
    estimated_tokens INTEGER NOT NULL DEFAULT 0,
    total_duration_ms INTEGER NOT NULL DEFAULT 0,
    min_duration_ms INTEGER,
    max_duration_ms INTEGER
  );

    CREATE TABLE IF NOT EXISTS usage_metadata(
    name TEXT PRIMARY KEY,
    tags TEXT NOT NULL DEFAULT '',
    short_description TEXT NOT NULL DEFAULT '',
    full_description TEXT NOT NULL DEFAULT '',
    schema_version INTEGER NOT NULL DEFAULT 1,
    updated_at TEXT NOT NULL
  );
  `);

    // Existing databases from older versions pick up missing columns here.
    // This MUST happen before creating indexes.
    runMigrations(db);

    createIndexes(db);
}

export function listColumns(db: Database.Database, table: string): string[] {
    const columns = db.prepare(`PRAGMA table_info(${table})`).all() as { name: string }[];
    return columns.map(col => col.name);
}

function runMigrations(db: Database.Database) {
    for (const migration of MIGRATIONS) {
        for (const { table, column, definition } of migration.columns) {
            if (listColumns(db, table).includes(column)) continue;

            console.error(`[Migration] v${migration.version}: adding ${column} column to ${table} table`);
            db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition};`);
        }
    }
}

function createIndexes(db: Database.Database) {
    db.exec(`
    CREATE INDEX IF NOT EXISTS idx_usage_stats_kind ON usage_stats(kind);
    CREATE INDEX IF NOT EXISTS idx_usage_stats_calls ON usage_stats(call_count DESC);
  `);
}
