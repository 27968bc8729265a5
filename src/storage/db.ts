import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export const MEMORY_DB_PATH = ':memory:';

// Writers wait this long on a locked file before SQLITE_BUSY
const BUSY_TIMEOUT_MS = 30_000;

/**
 * Create the directory holding the database file if it does not exist yet.
 */
export function ensureDbDirectory(path: string): void {
    if (path === MEMORY_DB_PATH) return;

    const dir = dirname(path);
    if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
        console.error(`[Database] Created data directory: ${dir}`);
    }
}

export function openDB(path: string): Database.Database {
    const db = new Database(path, { timeout: BUSY_TIMEOUT_MS });

    if (path !== MEMORY_DB_PATH) {
        db.pragma('journal_mode = WAL');
    }

    return db;
}

/**
 * Hands out one connection per operation.
 *
 * File databases are opened and closed around every operation. An in-memory
 * database only lives as long as its connection, so that one is opened once
 * and kept until {@link ConnectionSource.close}.
 */
export class ConnectionSource {
    private shared: Database.Database | null = null;

    constructor(readonly path: string) { }

    get isMemory(): boolean {
        return this.path === MEMORY_DB_PATH;
    }

    use<T>(operation: (db: Database.Database) => T): T {
        if (this.isMemory) {
            if (!this.shared) {
                this.shared = openDB(this.path);
            }
            return operation(this.shared);
        }

        const db = openDB(this.path);
        try {
            return operation(db);
        } finally {
            db.close();
        }
    }

    close(): void {
        if (this.shared) {
            this.shared.close();
            this.shared = null;
        }
    }
}

/**
 * UTC timestamp with second precision, e.g. `2026-01-01T10:30:45Z`.
 */
export function utcTimestamp(date: Date = new Date()): string {
    return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
