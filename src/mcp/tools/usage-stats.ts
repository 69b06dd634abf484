/**
 * MCP tool exposing usage statistics: `<prefix>_tool_usage_stats`.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import { debug } from '../../shared/debug.js';
import { errorMessage } from '../../shared/errors.js';
import { PRIMITIVE_TYPES, type StatsQuery, type StatsResponse } from '../../shared/types.js';
import { describeError, errorResponse, jsonResponse } from '../responses.js';

export interface StatsSource {
  getStats(query?: StatsQuery): StatsResponse;
}

export interface UsageStatsArgs {
  include_zero_usage?: boolean;
  type_filter?: (typeof PRIMITIVE_TYPES)[number];
  limit?: number;
}

export function usageStatsToolName(prefix: string): string {
  return `${prefix}_tool_usage_stats`;
}

export function handleUsageStats(source: StatsSource, args: UsageStatsArgs) {
  try {
    debug('mcp', 'usage_stats: request', { ...args });
    const stats = source.getStats({
      includeZero: args.include_zero_usage ?? true,
      typeFilter: args.type_filter,
      limit: args.limit,
    });
    debug('mcp', 'usage_stats: returning', { rows: stats.stats.length });
    return jsonResponse(stats);
  } catch (err) {
    debug('mcp', 'usage_stats: error', { error: errorMessage(err) });
    return errorResponse(describeError('Usage stats error', err));
  }
}

export function registerUsageStats(
  server: McpServer,
  source: StatsSource,
  options: { prefix: string; serverName: string },
): void {
  server.registerTool(
    usageStatsToolName(options.prefix),
    {
      title: 'Usage Statistics',
      description: `Get usage statistics for ${options.serverName} (call counts, timestamps, tokens and latency)`,
      inputSchema: {
        include_zero_usage: z
          .boolean()
          .default(true)
          .describe('Include items that have never been invoked'),
        type_filter: z
          .enum(PRIMITIVE_TYPES)
          .optional()
          .describe('Filter by primitive type (omit for all types)'),
        limit: z
          .number()
          .int()
          .min(1)
          .optional()
          .describe('Maximum number of items to return (sorted by usage)'),
      },
    },
    async (args) => handleUsageStats(source, args),
  );
}
