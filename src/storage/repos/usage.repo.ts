import Database from 'better-sqlite3';
import { PrimitiveKindSchema, UsageRecordSchema, type PrimitiveKind, type UsageRecord } from '../../schema/usage.js';

export interface UsageRow {
    name: string;
    kind: string;
    call_count: number | null;
    last_accessed: string | null;
    created_at: string | null;
    total_input_tokens: number | null;
    total_output_tokens: number | null;
    total_response_chars: number | null;
    estimated_tokens: number | null;
    total_duration_ms: number | null;
    min_duration_ms: number | null;
    max_duration_ms: number | null;
}

/** Usage row left-joined with its metadata, if any. */
export interface UsageWithMetadataRow extends UsageRow {
    tags: string | null;
    short_description: string | null;
    full_description: string | null;
}

/** Per-invocation deltas. Absent metrics are 0; an absent duration is null. */
export interface UsageDelta {
    responseChars: number;
    inputTokens: number;
    outputTokens: number;
    estimatedTokens: number;
    durationMs: number | null;
}

export interface UsageListFilter {
    includeZero: boolean;
    limit?: number | null;
    typeFilter?: PrimitiveKind | null;
}

export class UsageRepository {
    constructor(private db: Database.Database) { }

    /**
     * Insert-or-increment in a single statement.
     * Duration extrema: untouched when the call has no duration, seeded when
     * no extrema exist yet, otherwise narrowed with MIN/MAX.
     */
    upsert(name: string, kind: PrimitiveKind, delta: UsageDelta, now: string): void {
        const stmt = this.db.prepare(`
            INSERT INTO usage_stats (
                name, kind, call_count, last_accessed, created_at,
                total_input_tokens, total_output_tokens, total_response_chars,
                estimated_tokens, total_duration_ms, min_duration_ms, max_duration_ms
            )
            VALUES (
                @name, @kind, 1, @now, @now,
                @inputTokens, @outputTokens, @responseChars,
                @estimatedTokens, @durationTotal, @durationMs, @durationMs
            )
            ON CONFLICT(name) DO UPDATE SET
                call_count = call_count + 1,
                last_accessed = excluded.last_accessed,
                kind = excluded.kind,
                total_input_tokens = total_input_tokens + excluded.total_input_tokens,
                total_output_tokens = total_output_tokens + excluded.total_output_tokens,
                total_response_chars = total_response_chars + excluded.total_response_chars,
                estimated_tokens = estimated_tokens + excluded.estimated_tokens,
                total_duration_ms = total_duration_ms + excluded.total_duration_ms,
                min_duration_ms = CASE
                    WHEN excluded.min_duration_ms IS NULL THEN min_duration_ms
                    WHEN min_duration_ms IS NULL THEN excluded.min_duration_ms
                    ELSE MIN(min_duration_ms, excluded.min_duration_ms)
                END,
                max_duration_ms = CASE
                    WHEN excluded.max_duration_ms IS NULL THEN max_duration_ms
                    WHEN max_duration_ms IS NULL THEN excluded.max_duration_ms
                    ELSE MAX(max_duration_ms, excluded.max_duration_ms)
                END
        `);

        stmt.run({
            name,
            kind,
            now,
            inputTokens: delta.inputTokens,
            outputTokens: delta.outputTokens,
            responseChars: delta.responseChars,
            estimatedTokens: delta.estimatedTokens,
            durationTotal: delta.durationMs ?? 0,
            durationMs: delta.durationMs
        });
    }

    /**
     * Adds to the token sums without counting a call.
     * Returns the number of rows touched (0 for a never-recorded name).
     */
    addTokens(name: string, inputTokens: number, outputTokens: number): number {
        const stmt = this.db.prepare(`
            UPDATE usage_stats
            SET total_input_tokens = total_input_tokens + ?,
                total_output_tokens = total_output_tokens + ?
            WHERE name = ?
        `);
        return stmt.run(inputTokens, outputTokens, name).changes;
    }

    findByName(name: string): UsageRecord | null {
        const stmt = this.db.prepare('SELECT * FROM usage_stats WHERE name = ?');
        const row = stmt.get(name) as UsageRow | undefined;

        if (!row) return null;
        return this.rowToRecord(row);
    }

    /** All rows, most-called first. */
    findAll(): UsageRecord[] {
        const stmt = this.db.prepare('SELECT * FROM usage_stats ORDER BY call_count DESC');
        const rows = stmt.all() as UsageRow[];
        return rows.map(row => this.rowToRecord(row));
    }

    listWithMetadata(filter: UsageListFilter): UsageWithMetadataRow[] {
        const conditions: string[] = [];
        const params: (string | number)[] = [];

        if (filter.typeFilter) {
            conditions.push('u.kind = ?');
            params.push(filter.typeFilter);
        }
        if (!filter.includeZero) {
            conditions.push('u.call_count > 0');
        }

        const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
        let query = `
            SELECT u.*, m.tags, m.short_description, m.full_description
            FROM usage_stats u
            LEFT JOIN usage_metadata m ON u.name = m.name
            ${where}
            ORDER BY u.call_count DESC, u.last_accessed DESC
        `;

        if (filter.limit && filter.limit > 0) {
            query += ' LIMIT ?';
            params.push(filter.limit);
        }

        return this.db.prepare(query).all(...params) as UsageWithMetadataRow[];
    }

    /** Removes usage rows for the given names, restricted to tools. */
    deleteToolsByName(names: readonly string[]): number {
        if (names.length === 0) return 0;

        const placeholders = names.map(() => '?').join(',');
        const stmt = this.db.prepare(`DELETE FROM usage_stats WHERE name IN (${placeholders}) AND kind = 'tool'`);
        return stmt.run(...names).changes;
    }

    rowToRecord(row: UsageRow): UsageRecord {
        return UsageRecordSchema.parse({
            name: row.name,
            kind: parseKind(row.kind),
            callCount: row.call_count ?? 0,
            lastAccessed: row.last_accessed,
            createdAt: row.created_at,
            totalInputTokens: row.total_input_tokens ?? 0,
            totalOutputTokens: row.total_output_tokens ?? 0,
            totalResponseChars: row.total_response_chars ?? 0,
            estimatedTokens: row.estimated_tokens ?? 0,
            totalDurationMs: row.total_duration_ms ?? 0,
            minDurationMs: row.min_duration_ms,
            maxDurationMs: row.max_duration_ms
        });
    }
}

/** Rows written by foreign tooling may carry an unknown kind; they count as tools. */
export function parseKind(value: string | null | undefined): PrimitiveKind {
    const parsed = PrimitiveKindSchema.safeParse(value);
    return parsed.success ? parsed.data : 'tool';
}
