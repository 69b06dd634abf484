#!/usr/bin/env node

// Standalone stats server: exposes the usage tools and prompt for an existing
// stats file (TALLY_DB_PATH or the default data directory) over stdio.

import { registerTallyTools } from './mcp/register.js';
import { createServer, startServer } from './mcp/server.js';
import { debug } from './shared/debug.js';
import { errorMessage } from './shared/errors.js';
import { Tally } from './tally.js';

const tally = new Tally({ serverName: process.env.TALLY_SERVER_NAME || 'MCP server' });
const server = createServer();
registerTallyTools(server, tally, {
  prefix: process.env.TALLY_TOOL_PREFIX || 'get',
  serverName: tally.config.serverName,
});

function shutdown(code: number): void {
  tally.close();
  process.exit(code);
}

process.on('SIGINT', () => shutdown(0));
process.on('SIGTERM', () => shutdown(0));

startServer(server).catch((err: unknown) => {
  debug('mcp', 'Fatal: failed to start server', { error: errorMessage(err) });
  shutdown(1);
});
