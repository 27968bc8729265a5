#!/usr/bin/env node
// Demo MCP server with usage tracking over stdio
import { main } from './server/index.js';

main().catch((error) => {
    console.error('Server error:', error);
    process.exit(1);
});
