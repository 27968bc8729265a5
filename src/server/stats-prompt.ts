import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PrimitiveKind } from '../schema/usage.js';
import type { ByTypeEntry } from '../stats/types.js';
import type { UsageStats } from '../stats/usage-stats.js';

const TOP_LIMIT = 5;

const SECTIONS: { kind: PrimitiveKind; title: string }[] = [
    { kind: 'tool', title: 'Tools' },
    { kind: 'resource', title: 'Resources' },
    { kind: 'prompt', title: 'Prompts' }
];

export const StatsPromptArgsSchema = z.object({
    period: z.string().optional()
        .describe("Time period description (e.g., 'past week', 'since deployment')"),
    type: z.string().optional()
        .describe("Filter by type: 'all' (default), 'tool', 'resource', or 'prompt'"),
    include_recommendations: z.string().optional()
        .describe('Include adoption recommendations (yes/no, default: yes)')
});

export interface StatsPromptOptions {
    period?: string;
    typeFilter?: 'all' | PrimitiveKind | string;
    includeRecommendations?: boolean;
}

function formatTop(items: ByTypeEntry[]): string {
    const used = items.filter(item => item.callCount > 0).slice(0, TOP_LIMIT);
    if (used.length === 0) return '(None used yet)';
    return used.map((item, i) => `${i + 1}. \`${item.name}\` - **${item.callCount} calls**`).join('\n');
}

function formatUnused(items: ByTypeEntry[]): string {
    const unused = items.filter(item => item.callCount === 0);
    if (unused.length === 0) return '(All have been used)';
    return unused.map(item => `- \`${item.name}\``).join('\n');
}

/**
 * Markdown usage report grouped by primitive kind, written for an LLM reader.
 */
export async function generateStatsPrompt(stats: UsageStats, options: StatsPromptOptions = {}): Promise<string> {
    const period = options.period ?? 'all time';
    const typeFilter = (options.typeFilter ?? 'all').toLowerCase();
    const includeRecommendations = options.includeRecommendations ?? true;

    const { byType, summary, totalCalls } = await stats.getByType();

    const parts: string[] = [];
    for (const { kind } of SECTIONS) {
        const kindSummary = summary[kind];
        if (kindSummary) {
            parts.push(`${kindSummary.count} ${kind}s (${kindSummary.totalCalls} calls)`);
        }
    }
    const summaryLine = parts.length > 0 ? parts.join(', ') : 'No data';

    const sections = SECTIONS
        .filter(({ kind }) => typeFilter === 'all' || typeFilter === kind)
        .map(({ kind, title }) => {
            const kindSummary = summary[kind] ?? { count: 0, totalCalls: 0 };
            return [
                `### ${title} (${kindSummary.count} tracked, ${kindSummary.totalCalls} calls)`,
                '',
                '**Top 5:**',
                formatTop(byType[kind]),
                '',
                '**Unused:**',
                formatUnused(byType[kind])
            ].join('\n');
        });

    const lines = [
        `## MCP Usage Statistics${typeFilter !== 'all' ? ` (filtered: ${typeFilter})` : ''}`,
        '',
        `**Summary:** ${summaryLine}`,
        `**Total:** ${totalCalls} calls across all primitives`,
        '',
        sections.join('\n\n')
    ];

    if (includeRecommendations) {
        lines.push(
            '',
            '---',
            '**Recommendations:**',
            '1. High-usage tools represent key workflows - ensure robust error handling',
            '2. Unused items may need better documentation or deprecation',
            '3. Consider promoting underused tools that provide value'
        );
    }

    lines.push('', '---', `_Period: ${period}_`);
    return lines.join('\n');
}

export async function handleStatsPrompt(stats: UsageStats, args: z.infer<typeof StatsPromptArgsSchema> = {}) {
    const period = args.period ?? 'all time';
    const text = await generateStatsPrompt(stats, {
        period,
        typeFilter: args.type ?? 'all',
        includeRecommendations: (args.include_recommendations ?? 'yes').toLowerCase() !== 'no'
    });

    return {
        description: `MCP usage statistics for ${period}`,
        messages: [
            {
                role: 'user' as const,
                content: { type: 'text' as const, text }
            }
        ]
    };
}

export function registerStatsPrompt(server: McpServer, stats: UsageStats, promptName: string = 'usage_stats'): string {
    server.prompt(
        promptName,
        `Generate ${stats.serverName} usage statistics summary with sections for tools, resources, and prompts`,
        StatsPromptArgsSchema.shape,
        stats.wrapHandler(promptName, (args: z.infer<typeof StatsPromptArgsSchema>) => handleStatsPrompt(stats, args), 'prompt')
    );
    return promptName;
}
