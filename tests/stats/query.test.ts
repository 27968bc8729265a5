import {
    averageLatencyMs,
    averageTokensPerCall,
    buildCatalog,
    buildStatsReport,
    estimateTokens,
    groupByKind,
    normalizeQuery,
    sortCatalogEntries
} from '../../src/stats/query.js';
import type { CatalogRow } from '../../src/storage/repos/metadata.repo.js';
import type { UsageWithMetadataRow } from '../../src/storage/repos/usage.repo.js';
import type { CatalogEntry } from '../../src/stats/types.js';

function usageRow(overrides: Partial<UsageWithMetadataRow> & { name: string }): UsageWithMetadataRow {
    return {
        kind: 'tool',
        call_count: 0,
        last_accessed: null,
        created_at: '2026-01-01T00:00:00Z',
        total_input_tokens: 0,
        total_output_tokens: 0,
        total_response_chars: 0,
        estimated_tokens: 0,
        total_duration_ms: 0,
        min_duration_ms: null,
        max_duration_ms: null,
        tags: null,
        short_description: null,
        full_description: null,
        ...overrides
    };
}

function catalogEntry(name: string, callCount: number | null, lastAccessed: string | null): CatalogEntry {
    return {
        name,
        kind: 'tool',
        shortDescription: '',
        fullDescription: '',
        tags: [],
        schemaVersion: 2,
        updatedAt: '2026-01-01T00:00:00Z',
        callCount,
        lastAccessed
    };
}

describe('estimateTokens', () => {
    it('should divide characters by 3.5 and floor', () => {
        expect(estimateTokens(1000)).toBe(285);
        expect(estimateTokens(7)).toBe(2);
    });

    it('should count any non-empty response as at least one token', () => {
        expect(estimateTokens(1)).toBe(1);
    });

    it('should return 0 for absent or empty responses', () => {
        expect(estimateTokens(0)).toBe(0);
        expect(estimateTokens(null)).toBe(0);
        expect(estimateTokens(undefined)).toBe(0);
    });
});

describe('averages', () => {
    it('should prefer actual tokens over the estimate', () => {
        expect(averageTokensPerCall(4, 100, 60, 30)).toBe(40);
        expect(averageTokensPerCall(3, 0, 0, 10)).toBe(3);
        expect(averageTokensPerCall(0, 100, 0, 0)).toBeNull();
    });

    it('should only report latency when durations were recorded', () => {
        expect(averageLatencyMs(4, 50, true)).toBe(12);
        expect(averageLatencyMs(4, 0, false)).toBeNull();
        expect(averageLatencyMs(0, 10, true)).toBeNull();
    });

    it('should report zero latency for calls that took 0 ms', () => {
        expect(averageLatencyMs(2, 0, true)).toBe(0);
    });
});

describe('buildStatsReport', () => {
    it('should compute per-row averages and totals', () => {
        const report = buildStatsReport([
            usageRow({
                name: 'search', call_count: 4, last_accessed: '2026-01-01T10:00:00Z',
                total_input_tokens: 100, total_output_tokens: 60, estimated_tokens: 30, total_duration_ms: 50,
                min_duration_ms: 5, max_duration_ms: 20,
                tags: 'api,search', short_description: 'Search'
            }),
            usageRow({ name: 'fetch', call_count: 3, last_accessed: '2026-01-01T11:00:00Z', estimated_tokens: 10 }),
            usageRow({ name: 'idle', call_count: 0 })
        ]);

        expect(report.trackedCount).toBe(3);
        expect(report.totalCalls).toBe(7);
        expect(report.zeroCount).toBe(1);
        expect(report.latestAccess).toBe('2026-01-01T11:00:00Z');
        expect(report.totalInputTokens).toBe(100);
        expect(report.totalOutputTokens).toBe(60);
        expect(report.totalEstimatedTokens).toBe(40);
        expect(report.totalDurationMs).toBe(50);
        expect(report.avgLatencyMs).toBe(7);

        expect(report.stats[0]).toMatchObject({
            name: 'search',
            avgTokensPerCall: 40,
            avgLatencyMs: 12,
            tags: ['api', 'search'],
            shortDescription: 'Search'
        });
        expect(report.stats[1]).toMatchObject({ name: 'fetch', avgTokensPerCall: 3, avgLatencyMs: null, tags: [] });
        expect(report.stats[2]).toMatchObject({ name: 'idle', avgTokensPerCall: null, avgLatencyMs: null });
    });

    it('should report latency for a row whose only call took 0 ms', () => {
        const report = buildStatsReport([
            usageRow({ name: 'instant', call_count: 1, total_duration_ms: 0, min_duration_ms: 0, max_duration_ms: 0 })
        ]);

        expect(report.stats[0].avgLatencyMs).toBe(0);
        expect(report.avgLatencyMs).toBe(0);
    });

    it('should report no latest access for an empty store', () => {
        const report = buildStatsReport([]);
        expect(report.latestAccess).toBeNull();
        expect(report.avgLatencyMs).toBeNull();
    });
});

describe('groupByKind', () => {
    it('should keep all three buckets even when empty', () => {
        const report = groupByKind([]);
        expect(report.byType).toEqual({ tool: [], resource: [], prompt: [] });
        expect(report.summary).toEqual({});
        expect(report.totalItems).toBe(0);
    });
});

describe('normalizeQuery', () => {
    it('should collapse whitespace and lowercase', () => {
        expect(normalizeQuery('  CURRENT   Weather ')).toBe('current weather');
        expect(normalizeQuery(undefined)).toBe('');
    });
});

describe('sortCatalogEntries', () => {
    it('should order by call count, then recency, then name', () => {
        const sorted = sortCatalogEntries([
            catalogEntry('alpha', 2, '2026-01-01T10:00:00Z'),
            catalogEntry('beta', 5, '2026-01-01T09:00:00Z'),
            catalogEntry('gamma', 2, '2026-01-01T11:00:00Z'),
            catalogEntry('delta', 2, '2026-01-01T10:00:00Z'),
            catalogEntry('epsilon', 0, null),
            catalogEntry('zeta', 0, '2026-01-01T08:00:00Z')
        ]);

        expect(sorted.map(e => e.name)).toEqual(['beta', 'gamma', 'alpha', 'delta', 'zeta', 'epsilon']);
    });
});

describe('buildCatalog', () => {
    const rows: CatalogRow[] = [
        {
            name: 'get_weather', tags: 'api,weather', short_description: 'Weather',
            full_description: 'Fetch the current weather', schema_version: 2, updated_at: '2026-01-01T00:00:00Z',
            kind: 'tool', call_count: 3, last_accessed: '2026-01-01T10:05:00Z'
        },
        {
            name: 'get_news', tags: 'api,news', short_description: 'News',
            full_description: '', schema_version: 2, updated_at: '2026-01-01T00:00:00Z',
            kind: null, call_count: null, last_accessed: null
        }
    ];

    it('should require every requested tag', () => {
        expect(buildCatalog(rows, { tags: ['weather'] }).results.map(r => r.name)).toEqual(['get_weather']);
        expect(buildCatalog(rows, { tags: ['API', ' News '] }).results.map(r => r.name)).toEqual(['get_news']);
        expect(buildCatalog(rows, { tags: ['weather', 'news'] }).matched).toBe(0);
    });

    it('should search names, tags and descriptions case-insensitively', () => {
        const result = buildCatalog(rows, { query: '  CURRENT   weather ' });
        expect(result.results.map(r => r.name)).toEqual(['get_weather']);
        expect(result.filters).toEqual({ tags: [], query: 'current weather' });
    });

    it('should list tags across all entries, not only matches', () => {
        const result = buildCatalog(rows, { tags: ['weather'] });
        expect(result.allTags).toEqual(['api', 'news', 'weather']);
        expect(result.totalTracked).toBe(2);
    });

    it('should hide usage when includeUsage is false', () => {
        const result = buildCatalog(rows, { includeUsage: false });
        expect(result.totalCalls).toBeNull();
        expect(result.results.every(r => r.callCount === null && r.lastAccessed === null)).toBe(true);
    });

    it('should report zero calls for entries that were never invoked', () => {
        const result = buildCatalog(rows);
        expect(result.totalCalls).toBe(3);
        expect(result.results.map(r => [r.name, r.callCount, r.kind])).toEqual([
            ['get_weather', 3, 'tool'],
            ['get_news', 0, null]
        ]);
    });

    it('should truncate only for positive limits', () => {
        expect(buildCatalog(rows, { limit: 1 }).results.map(r => r.name)).toEqual(['get_weather']);
        expect(buildCatalog(rows, { limit: 0 }).matched).toBe(2);
    });
});
