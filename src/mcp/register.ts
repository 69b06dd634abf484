import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { debug } from '../shared/debug.js';
import { registerStatsPrompt, type ByTypeSource } from './prompts/stats-prompt.js';
import { registerToolCatalog, toolCatalogToolName, type CatalogSource } from './tools/tool-catalog.js';
import { registerUsageStats, usageStatsToolName, type StatsSource } from './tools/usage-stats.js';

export type TallySource = StatsSource & CatalogSource & ByTypeSource;

export interface RegisterOptions {
  /** Tool name prefix: `get` gives `get_tool_usage_stats` and `get_tool_catalog`. */
  prefix?: string;
  /** Used in tool and prompt descriptions. */
  serverName?: string;
  /** Name of the stats prompt. Set to null to skip registering it. */
  promptName?: string | null;
}

/**
 * Registers the built-in stats tools (and the stats prompt) on `server`.
 *
 * @returns the names of the registered tools, for hosts that exclude them
 * from their own tracking
 */
export function registerTallyTools(
  server: McpServer,
  source: TallySource,
  options: RegisterOptions = {},
): string[] {
  const prefix = options.prefix ?? 'get';
  const serverName = options.serverName ?? 'MCP server';
  const promptName = options.promptName === undefined ? 'usage_stats' : options.promptName;

  registerUsageStats(server, source, { prefix, serverName });
  registerToolCatalog(server, source, { prefix, serverName });
  if (promptName !== null) {
    registerStatsPrompt(server, source, { name: promptName, serverName });
  }

  const names = [usageStatsToolName(prefix), toolCatalogToolName(prefix)];
  debug('mcp', 'Registered stats tools', { tools: names, prompt: promptName });
  return names;
}
