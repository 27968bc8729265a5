import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { UsageStats } from '../stats/usage-stats.js';
import { registerStatsTools } from './stats-tools.js';
import { registerStatsPrompt } from './stats-prompt.js';

const SERVER_NAME = 'temp-converter';

// Tool Definitions
export const ConverterTools = {
    CELSIUS_TO_FAHRENHEIT: {
        name: 'celsius_to_fahrenheit',
        description: 'Convert temperature from Celsius to Fahrenheit',
        inputSchema: z.object({
            celsius: z.number().describe('Temperature in Celsius')
        })
    },
    FAHRENHEIT_TO_CELSIUS: {
        name: 'fahrenheit_to_celsius',
        description: 'Convert temperature from Fahrenheit to Celsius',
        inputSchema: z.object({
            fahrenheit: z.number().describe('Temperature in Fahrenheit')
        })
    }
} as const;

const round2 = (value: number) => Math.round(value * 100) / 100;

// Handlers

export async function handleCelsiusToFahrenheit(args: z.infer<typeof ConverterTools.CELSIUS_TO_FAHRENHEIT.inputSchema>) {
    const { celsius } = ConverterTools.CELSIUS_TO_FAHRENHEIT.inputSchema.parse(args);
    const fahrenheit = round2(celsius * 9 / 5 + 32);
    return {
        content: [{ type: 'text' as const, text: JSON.stringify({ celsius, fahrenheit }) }]
    };
}

export async function handleFahrenheitToCelsius(args: z.infer<typeof ConverterTools.FAHRENHEIT_TO_CELSIUS.inputSchema>) {
    const { fahrenheit } = ConverterTools.FAHRENHEIT_TO_CELSIUS.inputSchema.parse(args);
    const celsius = round2((fahrenheit - 32) * 5 / 9);
    return {
        content: [{ type: 'text' as const, text: JSON.stringify({ fahrenheit, celsius }) }]
    };
}

/**
 * Close the store on termination signals so the WAL is released cleanly.
 */
function setupShutdownHandlers(stats: UsageStats): void {
    let isShuttingDown = false;

    const shutdown = (signal: string) => {
        if (isShuttingDown) return;
        isShuttingDown = true;

        console.error(`[Server] Received ${signal}, shutting down gracefully...`);

        stats.close()
            .then(() => {
                console.error('[Server] Shutdown complete');
                process.exit(0);
            })
            .catch((e: unknown) => {
                console.error('[Server] Error during shutdown:', e);
                process.exit(1);
            });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGHUP', () => shutdown('SIGHUP'));

    process.on('uncaughtException', (error) => {
        console.error('[Server] Uncaught exception:', error);
        shutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason) => {
        console.error('[Server] Unhandled rejection:', reason);
        shutdown('unhandledRejection');
    });
}

export async function main() {
    const stats = new UsageStats(SERVER_NAME);
    setupShutdownHandlers(stats);

    // Schema errors are fatal: fail before accepting traffic
    await stats.db.ensureSchema();
    console.error(`[Server] Usage database: ${stats.db.dbPath}`);

    const server = new McpServer({
        name: SERVER_NAME,
        version: '1.0.0'
    });

    server.tool(
        ConverterTools.CELSIUS_TO_FAHRENHEIT.name,
        ConverterTools.CELSIUS_TO_FAHRENHEIT.description,
        ConverterTools.CELSIUS_TO_FAHRENHEIT.inputSchema.shape,
        stats.wrapHandler(ConverterTools.CELSIUS_TO_FAHRENHEIT.name, handleCelsiusToFahrenheit)
    );

    server.tool(
        ConverterTools.FAHRENHEIT_TO_CELSIUS.name,
        ConverterTools.FAHRENHEIT_TO_CELSIUS.description,
        ConverterTools.FAHRENHEIT_TO_CELSIUS.inputSchema.shape,
        stats.wrapHandler(ConverterTools.FAHRENHEIT_TO_CELSIUS.name, handleFahrenheitToCelsius)
    );

    const statsToolNames = registerStatsTools(server, stats);
    const promptName = registerStatsPrompt(server, stats);

    await stats.syncTools([
        ...Object.values(ConverterTools).map(({ name, description }) => ({ name, description })),
        ...statsToolNames.map(name => ({ name }))
    ]);
    await stats.syncPrompts([{ name: promptName, description: 'Usage statistics summary for this server.' }]);

    const transport = new StdioServerTransport();
    await server.connect(transport);
    console.error(`${SERVER_NAME} MCP server running on stdio`);
}
