/**
 * MCP tool for browsing the tagged catalog: `<prefix>_tool_catalog`.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import { debug } from '../../shared/debug.js';
import { errorMessage } from '../../shared/errors.js';
import type { CatalogQuery, CatalogResponse } from '../../shared/types.js';
import { describeError, errorResponse, jsonResponse } from '../responses.js';

export interface CatalogSource {
  getCatalog(query?: CatalogQuery): CatalogResponse;
}

export interface ToolCatalogArgs {
  tags?: string[];
  query?: string;
  include_usage?: boolean;
  limit?: number;
}

export function toolCatalogToolName(prefix: string): string {
  return `${prefix}_tool_catalog`;
}

export function handleToolCatalog(source: CatalogSource, args: ToolCatalogArgs) {
  try {
    debug('mcp', 'tool_catalog: request', { ...args });
    const catalog = source.getCatalog({
      tags: args.tags,
      query: args.query,
      includeUsage: args.include_usage ?? true,
      limit: args.limit,
    });
    debug('mcp', 'tool_catalog: returning', { matched: catalog.matched });
    return jsonResponse(catalog);
  } catch (err) {
    debug('mcp', 'tool_catalog: error', { error: errorMessage(err) });
    return errorResponse(describeError('Catalog error', err));
  }
}

export function registerToolCatalog(
  server: McpServer,
  source: CatalogSource,
  options: { prefix: string; serverName: string },
): void {
  server.registerTool(
    toolCatalogToolName(options.prefix),
    {
      title: 'Tool Catalog',
      description: `List ${options.serverName} tools with tags, usage statistics, and text search`,
      inputSchema: {
        tags: z
          .array(z.string())
          .optional()
          .describe('Filter to tools containing all provided tags'),
        query: z
          .string()
          .optional()
          .describe('Text search across names, descriptions, and tags'),
        include_usage: z
          .boolean()
          .default(true)
          .describe('Include usage counts and timestamps'),
        limit: z
          .number()
          .int()
          .min(1)
          .optional()
          .describe('Maximum entries to return'),
      },
    },
    async (args) => handleToolCatalog(source, args),
  );
}
