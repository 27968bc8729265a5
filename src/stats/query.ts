/**
 * Aggregation over rows already read from the store.
 *
 * Everything here is pure: the database layer fetches rows under its lock
 * and hands them over, so sorting and summarising never hold the store.
 */

import type { PrimitiveKind, UsageRecord } from '../schema/usage.js';
import type { CatalogRow } from '../storage/repos/metadata.repo.js';
import { parseKind, type UsageWithMetadataRow } from '../storage/repos/usage.repo.js';
import { normalizeTags, parseTagsString } from './tags.js';
import type {
    ByTypeEntry,
    ByTypeReport,
    CatalogEntry,
    CatalogOptions,
    CatalogReport,
    KindSummary,
    StatsEntry,
    StatsReport
} from './types.js';

const CHARS_PER_TOKEN = 3.5;

/**
 * Rough token count for a response of `chars` characters, used only when the
 * caller has no real token counts. Any non-empty response is at least 1 token.
 */
export function estimateTokens(chars: number | null | undefined): number {
    if (!chars || chars <= 0) return 0;
    return Math.max(1, Math.floor(chars / CHARS_PER_TOKEN));
}

export function averageTokensPerCall(
    callCount: number,
    inputTokens: number,
    outputTokens: number,
    estimatedTokens: number
): number | null {
    if (callCount <= 0) return null;
    const actual = inputTokens + outputTokens;
    return Math.floor((actual > 0 ? actual : estimatedTokens) / callCount);
}

/** `hasDurations`: at least one call carried a duration, even a 0 ms one. */
export function averageLatencyMs(callCount: number, totalDurationMs: number, hasDurations: boolean): number | null {
    if (callCount <= 0 || !hasDurations) return null;
    return Math.floor(totalDurationMs / callCount);
}

export function buildStatsReport(rows: UsageWithMetadataRow[]): StatsReport {
    const stats: StatsEntry[] = rows.map(row => {
        const callCount = row.call_count ?? 0;
        const totalInputTokens = row.total_input_tokens ?? 0;
        const totalOutputTokens = row.total_output_tokens ?? 0;
        const estimatedTokens = row.estimated_tokens ?? 0;
        const totalDurationMs = row.total_duration_ms ?? 0;

        return {
            name: row.name,
            kind: parseKind(row.kind),
            callCount,
            lastAccessed: row.last_accessed,
            createdAt: row.created_at,
            totalInputTokens,
            totalOutputTokens,
            totalResponseChars: row.total_response_chars ?? 0,
            estimatedTokens,
            totalDurationMs,
            minDurationMs: row.min_duration_ms,
            maxDurationMs: row.max_duration_ms,
            avgTokensPerCall: averageTokensPerCall(callCount, totalInputTokens, totalOutputTokens, estimatedTokens),
            avgLatencyMs: averageLatencyMs(callCount, totalDurationMs, row.min_duration_ms !== null),
            tags: parseTagsString(row.tags),
            shortDescription: row.short_description,
            fullDescription: row.full_description
        };
    });

    let totalCalls = 0;
    let zeroCount = 0;
    let totalInputTokens = 0;
    let totalOutputTokens = 0;
    let totalEstimatedTokens = 0;
    let totalResponseChars = 0;
    let totalDurationMs = 0;
    let latestAccess: string | null = null;

    for (const entry of stats) {
        totalCalls += entry.callCount;
        if (entry.callCount === 0) zeroCount++;
        totalInputTokens += entry.totalInputTokens;
        totalOutputTokens += entry.totalOutputTokens;
        totalEstimatedTokens += entry.estimatedTokens;
        totalResponseChars += entry.totalResponseChars;
        totalDurationMs += entry.totalDurationMs;
        if (entry.lastAccessed && (latestAccess === null || entry.lastAccessed > latestAccess)) {
            latestAccess = entry.lastAccessed;
        }
    }

    return {
        trackedCount: stats.length,
        totalCalls,
        zeroCount,
        latestAccess,
        totalInputTokens,
        totalOutputTokens,
        totalEstimatedTokens,
        totalResponseChars,
        totalDurationMs,
        avgLatencyMs: averageLatencyMs(totalCalls, totalDurationMs, stats.some(entry => entry.minDurationMs !== null)),
        stats
    };
}

/**
 * Buckets records by kind. Input is expected most-called first; bucket order
 * follows input order.
 */
export function groupByKind(records: UsageRecord[]): ByTypeReport {
    const byType: Record<PrimitiveKind, ByTypeEntry[]> = { tool: [], resource: [], prompt: [] };
    const summary: Partial<Record<PrimitiveKind, KindSummary>> = {};
    let totalCalls = 0;

    for (const record of records) {
        byType[record.kind].push({
            name: record.name,
            kind: record.kind,
            callCount: record.callCount,
            lastAccessed: record.lastAccessed
        });

        const bucket = summary[record.kind] ?? { count: 0, totalCalls: 0 };
        bucket.count++;
        bucket.totalCalls += record.callCount;
        summary[record.kind] = bucket;

        totalCalls += record.callCount;
    }

    return { byType, summary, totalCalls, totalItems: records.length };
}

/** Lowercases and collapses runs of whitespace; empty input yields ''. */
export function normalizeQuery(query: string | null | undefined): string {
    return (query ?? '').trim().split(/\s+/).join(' ').toLowerCase();
}

function matchesQuery(entry: CatalogEntry, queryText: string): boolean {
    const haystack = [
        entry.name,
        entry.tags.join(' '),
        entry.shortDescription,
        entry.fullDescription
    ].join(' ').toLowerCase();
    return haystack.includes(queryText);
}

/**
 * Final order: call count descending, then most recent access, then name.
 * Three stable passes, applied least significant key first.
 */
export function sortCatalogEntries(entries: CatalogEntry[]): CatalogEntry[] {
    const sorted = [...entries];
    sorted.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    sorted.sort((a, b) => {
        const left = a.lastAccessed ?? '';
        const right = b.lastAccessed ?? '';
        return left < right ? 1 : left > right ? -1 : 0;
    });
    sorted.sort((a, b) => (b.callCount ?? 0) - (a.callCount ?? 0));
    return sorted;
}

export function buildCatalog(rows: CatalogRow[], options: CatalogOptions = {}): CatalogReport {
    const includeUsage = options.includeUsage ?? true;
    const tagFilters = normalizeTags(options.tags ?? []);
    const queryText = normalizeQuery(options.query);
    const limit = options.limit ?? null;

    const allTags = new Set<string>();
    let totalCalls = 0;
    let results: CatalogEntry[] = [];

    for (const row of rows) {
        const tags = parseTagsString(row.tags);
        tags.forEach(tag => allTags.add(tag));

        const callCount = row.call_count ?? 0;
        totalCalls += callCount;

        const entry: CatalogEntry = {
            name: row.name,
            kind: row.kind === null ? null : parseKind(row.kind),
            shortDescription: row.short_description ?? '',
            fullDescription: row.full_description ?? '',
            tags,
            schemaVersion: row.schema_version ?? 0,
            updatedAt: row.updated_at,
            callCount: includeUsage ? callCount : null,
            lastAccessed: includeUsage ? row.last_accessed : null
        };

        if (tagFilters.length > 0 && !tagFilters.every(tag => tags.includes(tag))) continue;
        if (queryText && !matchesQuery(entry, queryText)) continue;

        results.push(entry);
    }

    results = sortCatalogEntries(results);
    if (limit !== null && limit > 0) {
        results = results.slice(0, limit);
    }

    return {
        totalTracked: rows.length,
        matched: results.length,
        allTags: [...allTags].sort(),
        filters: { tags: tagFilters, query: queryText || null },
        includeUsage,
        limit,
        totalCalls: includeUsage ? totalCalls : null,
        results
    };
}
