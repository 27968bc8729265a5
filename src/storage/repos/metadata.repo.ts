import Database from 'better-sqlite3';
import { MetadataEntrySchema, type MetadataEntry } from '../../schema/usage.js';
import { parseTagsString } from '../../stats/tags.js';

export interface MetadataRow {
    name: string;
    tags: string | null;
    short_description: string | null;
    full_description: string | null;
    schema_version: number | null;
    updated_at: string;
}

/** Metadata row left-joined with its usage counters, if any. */
export interface CatalogRow extends MetadataRow {
    kind: string | null;
    call_count: number | null;
    last_accessed: string | null;
}

/** Storage-ready content: tags already normalized and comma-joined. */
export interface MetadataContent {
    tags: string;
    shortDescription: string;
    fullDescription: string;
    schemaVersion: number;
}

export class MetadataRepository {
    constructor(private db: Database.Database) { }

    findAllRows(): Map<string, MetadataRow> {
        const stmt = this.db.prepare('SELECT * FROM usage_metadata');
        const rows = stmt.all() as MetadataRow[];
        return new Map(rows.map(row => [row.name, row]));
    }

    findByName(name: string): MetadataEntry | null {
        const stmt = this.db.prepare('SELECT * FROM usage_metadata WHERE name = ?');
        const row = stmt.get(name) as MetadataRow | undefined;

        if (!row) return null;
        return this.rowToEntry(row);
    }

    insert(name: string, content: MetadataContent, now: string): void {
        const stmt = this.db.prepare(`
            INSERT INTO usage_metadata (name, tags, short_description, full_description, schema_version, updated_at)
            VALUES (@name, @tags, @shortDescription, @fullDescription, @schemaVersion, @updatedAt)
        `);
        stmt.run({ name, ...content, updatedAt: now });
    }

    update(name: string, content: MetadataContent, now: string): void {
        const stmt = this.db.prepare(`
            UPDATE usage_metadata
            SET tags = @tags,
                short_description = @shortDescription,
                full_description = @fullDescription,
                schema_version = @schemaVersion,
                updated_at = @updatedAt
            WHERE name = @name
        `);
        stmt.run({ name, ...content, updatedAt: now });
    }

    upsert(name: string, content: MetadataContent, now: string): void {
        const stmt = this.db.prepare(`
            INSERT INTO usage_metadata (name, tags, short_description, full_description, schema_version, updated_at)
            VALUES (@name, @tags, @shortDescription, @fullDescription, @schemaVersion, @updatedAt)
            ON CONFLICT(name) DO UPDATE SET
                tags = excluded.tags,
                short_description = excluded.short_description,
                full_description = excluded.full_description,
                schema_version = excluded.schema_version,
                updated_at = excluded.updated_at
        `);
        stmt.run({ name, ...content, updatedAt: now });
    }

    deleteByNames(names: readonly string[]): number {
        if (names.length === 0) return 0;

        const placeholders = names.map(() => '?').join(',');
        const stmt = this.db.prepare(`DELETE FROM usage_metadata WHERE name IN (${placeholders})`);
        return stmt.run(...names).changes;
    }

    listCatalogRows(): CatalogRow[] {
        const stmt = this.db.prepare(`
            SELECT m.*, u.kind, u.call_count, u.last_accessed
            FROM usage_metadata m
            LEFT JOIN usage_stats u ON m.name = u.name
        `);
        return stmt.all() as CatalogRow[];
    }

    rowToEntry(row: MetadataRow): MetadataEntry {
        return MetadataEntrySchema.parse({
            name: row.name,
            tags: parseTagsString(row.tags),
            shortDescription: row.short_description ?? '',
            fullDescription: row.full_description ?? '',
            schemaVersion: row.schema_version ?? 0,
            updatedAt: row.updated_at
        });
    }
}

/** True when the stored row differs from the incoming content in any field. */
export function metadataChanged(row: MetadataRow, content: MetadataContent): boolean {
    return row.tags !== content.tags
        || (row.short_description ?? '') !== content.shortDescription
        || (row.full_description ?? '') !== content.fullDescription
        || (row.schema_version ?? 0) !== content.schemaVersion;
}
