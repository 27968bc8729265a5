import type { PrimitiveKind } from '../schema/usage.js';

export interface StatsOptions {
    /** Include entities that were synced but never invoked. Default true. */
    includeZero?: boolean;
    limit?: number | null;
    typeFilter?: PrimitiveKind | null;
}

export interface StatsEntry {
    name: string;
    kind: PrimitiveKind;
    callCount: number;
    lastAccessed: string | null;
    createdAt: string | null;
    totalInputTokens: number;
    totalOutputTokens: number;
    totalResponseChars: number;
    estimatedTokens: number;
    totalDurationMs: number;
    minDurationMs: number | null;
    maxDurationMs: number | null;
    /** Actual tokens when any were reported, otherwise the estimate. */
    avgTokensPerCall: number | null;
    avgLatencyMs: number | null;
    tags: string[];
    shortDescription: string | null;
    fullDescription: string | null;
}

export interface StatsReport {
    trackedCount: number;
    totalCalls: number;
    zeroCount: number;
    latestAccess: string | null;
    totalInputTokens: number;
    totalOutputTokens: number;
    totalEstimatedTokens: number;
    totalResponseChars: number;
    totalDurationMs: number;
    avgLatencyMs: number | null;
    stats: StatsEntry[];
}

export interface ByTypeEntry {
    name: string;
    kind: PrimitiveKind;
    callCount: number;
    lastAccessed: string | null;
}

export interface KindSummary {
    count: number;
    totalCalls: number;
}

export interface ByTypeReport {
    byType: Record<PrimitiveKind, ByTypeEntry[]>;
    /** Only kinds present in the store appear here. */
    summary: Partial<Record<PrimitiveKind, KindSummary>>;
    totalCalls: number;
    totalItems: number;
}

export interface CatalogOptions {
    /** Entry must carry every one of these tags. */
    tags?: string[] | null;
    query?: string | null;
    includeUsage?: boolean;
    limit?: number | null;
}

export interface CatalogEntry {
    name: string;
    kind: PrimitiveKind | null;
    shortDescription: string;
    fullDescription: string;
    tags: string[];
    schemaVersion: number;
    updatedAt: string;
    callCount: number | null;
    lastAccessed: string | null;
}

export interface CatalogReport {
    totalTracked: number;
    matched: number;
    allTags: string[];
    filters: { tags: string[]; query: string | null };
    includeUsage: boolean;
    limit: number | null;
    totalCalls: number | null;
    results: CatalogEntry[];
}
