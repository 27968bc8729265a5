import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { PrimitiveKindSchema } from '../schema/usage.js';
import type { UsageStats } from '../stats/usage-stats.js';

export const UsageStatsInputSchema = z.object({
    include_zero_usage: z.boolean().optional().default(true)
        .describe('Include items that have never been invoked'),
    type_filter: PrimitiveKindSchema.optional()
        .describe('Filter by primitive type (omit for all types)'),
    limit: z.number().int().positive().optional()
        .describe('Maximum number of items to return (sorted by usage)')
});

export const ToolCatalogInputSchema = z.object({
    tags: z.array(z.string()).optional()
        .describe('Filter to tools containing all provided tags'),
    query: z.string().optional()
        .describe('Text search across names, descriptions, and tags'),
    include_usage: z.boolean().optional().default(true)
        .describe('Include usage counts and timestamps'),
    limit: z.number().int().positive().optional()
        .describe('Maximum entries to return')
});

export interface StatsToolOptions {
    /** `get` -> `get_tool_usage_stats`, `get_tool_catalog` */
    prefix?: string;
}

// Tool Definitions
export function buildStatsTools(prefix: string = 'get', serverName: string = 'MCP server') {
    return {
        USAGE_STATS: {
            name: `${prefix}_tool_usage_stats`,
            description: `Get usage statistics for ${serverName} (call counts, tokens, latency and timestamps)`,
            inputSchema: UsageStatsInputSchema
        },
        TOOL_CATALOG: {
            name: `${prefix}_tool_catalog`,
            description: `List ${serverName} tools with tags, usage statistics, and text search`,
            inputSchema: ToolCatalogInputSchema
        }
    } as const;
}

function jsonContent(data: unknown) {
    return {
        content: [
            {
                type: 'text' as const,
                text: JSON.stringify(data, null, 2)
            }
        ]
    };
}

// Handlers

export async function handleUsageStats(stats: UsageStats, args: z.input<typeof UsageStatsInputSchema>) {
    const parsed = UsageStatsInputSchema.parse(args);
    const report = await stats.getStats({
        includeZero: parsed.include_zero_usage,
        limit: parsed.limit,
        typeFilter: parsed.type_filter
    });
    return jsonContent(report);
}

export async function handleToolCatalog(stats: UsageStats, args: z.input<typeof ToolCatalogInputSchema>) {
    const parsed = ToolCatalogInputSchema.parse(args);
    const catalog = await stats.getCatalog({
        tags: parsed.tags,
        query: parsed.query,
        includeUsage: parsed.include_usage,
        limit: parsed.limit
    });
    return jsonContent(catalog);
}

/**
 * Register the built-in stats tools. Calls to them are recorded like any other tool.
 * Returns the registered tool names.
 */
export function registerStatsTools(server: McpServer, stats: UsageStats, options: StatsToolOptions = {}): string[] {
    const tools = buildStatsTools(options.prefix, stats.serverName);

    server.tool(
        tools.USAGE_STATS.name,
        tools.USAGE_STATS.description,
        tools.USAGE_STATS.inputSchema.shape,
        stats.wrapHandler(tools.USAGE_STATS.name, (args: z.input<typeof UsageStatsInputSchema>) => handleUsageStats(stats, args))
    );

    server.tool(
        tools.TOOL_CATALOG.name,
        tools.TOOL_CATALOG.description,
        tools.TOOL_CATALOG.inputSchema.shape,
        stats.wrapHandler(tools.TOOL_CATALOG.name, (args: z.input<typeof ToolCatalogInputSchema>) => handleToolCatalog(stats, args))
    );

    return [tools.USAGE_STATS.name, tools.TOOL_CATALOG.name];
}
