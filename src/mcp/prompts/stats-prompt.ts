/**
 * MCP prompt rendering usage statistics as markdown for an LLM to read.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import { debug } from '../../shared/debug.js';
import { ValidationError } from '../../shared/errors.js';
import type { ByTypeResponse, PrimitiveType, TypeEntry } from '../../shared/types.js';

export interface ByTypeSource {
  getByType(): ByTypeResponse;
}

export type PromptTypeFilter = PrimitiveType | 'all';

export interface StatsPromptOptions {
  period?: string;
  typeFilter?: string;
  includeRecommendations?: boolean;
}

const TOP_N = 5;

// Display order of the per-type sections.
const SECTIONS: ReadonlyArray<{ type: PrimitiveType; title: string; plural: string }> = [
  { type: 'tool', title: 'Tools', plural: 'tools' },
  { type: 'resource', title: 'Resources', plural: 'resources' },
  { type: 'prompt', title: 'Prompts', plural: 'prompts' },
];

function parseTypeFilter(value: string): PromptTypeFilter {
  const normalized = value.trim().toLowerCase();
  if (
    normalized === 'all' ||
    normalized === 'tool' ||
    normalized === 'resource' ||
    normalized === 'prompt'
  ) {
    return normalized;
  }
  throw new ValidationError(
    `Unknown type filter "${value}" (expected all, tool, resource or prompt)`,
  );
}

function formatTop(entries: TypeEntry[]): string[] {
  const used = entries.filter((entry) => entry.call_count > 0).slice(0, TOP_N);
  if (used.length === 0) return ['(None used yet)'];
  return used.map((entry, i) => `${i + 1}. \`${entry.name}\` - **${entry.call_count} calls**`);
}

function formatUnused(entries: TypeEntry[]): string[] {
  const unused = entries.filter((entry) => entry.call_count === 0);
  if (unused.length === 0) return ['(All have been used)'];
  return unused.map((entry) => `- \`${entry.name}\``);
}

/**
 * Renders the usage report. Sections follow getByType ordering, so "Top 5"
 * is the five most-called primitives of each type.
 *
 * @throws ValidationError for an unknown type filter
 */
export function generateStatsPrompt(source: ByTypeSource, options: StatsPromptOptions = {}): string {
  const period = options.period || 'all time';
  const typeFilter = parseTypeFilter(options.typeFilter ?? 'all');
  const data = source.getByType();

  const summaryLine = SECTIONS.map(
    ({ type, plural }) =>
      `${data.summary[type].count} ${plural} (${data.summary[type].total_calls} calls)`,
  ).join(', ');

  const lines: string[] = [];
  lines.push(`## MCP Usage Statistics${typeFilter === 'all' ? '' : ` (filtered: ${typeFilter})`}`);
  lines.push('');
  lines.push(`**Summary:** ${summaryLine}`);
  lines.push(`**Total:** ${data.total_calls} calls across all primitives`);

  for (const { type, title } of SECTIONS) {
    if (typeFilter !== 'all' && typeFilter !== type) continue;
    const summary = data.summary[type];
    lines.push('');
    lines.push(`### ${title} (${summary.count} tracked, ${summary.total_calls} calls)`);
    lines.push('');
    lines.push('**Top 5:**');
    lines.push(...formatTop(data.by_type[type]));
    lines.push('');
    lines.push('**Unused:**');
    lines.push(...formatUnused(data.by_type[type]));
  }

  if (options.includeRecommendations ?? true) {
    lines.push('');
    lines.push('---');
    lines.push('**Recommendations:**');
    lines.push('1. High-usage tools represent key workflows - keep their error handling tight');
    lines.push('2. Unused items may need better documentation or deprecation');
    lines.push('3. Consider promoting underused tools that provide value');
  }

  lines.push('');
  lines.push('---');
  lines.push(`_Period: ${period}_`);

  return lines.join('\n');
}

export function registerStatsPrompt(
  server: McpServer,
  source: ByTypeSource,
  options: { name: string; serverName: string },
): void {
  server.registerPrompt(
    options.name,
    {
      title: 'Usage Statistics Report',
      description: `Generate ${options.serverName} usage statistics summary with sections for tools, resources, and prompts`,
      argsSchema: {
        period: z
          .string()
          .optional()
          .describe("Time period description (e.g., 'past week', 'since deployment')"),
        type: z
          .string()
          .optional()
          .describe("Filter by type: 'all' (default), 'tool', 'resource', or 'prompt'"),
        include_recommendations: z
          .string()
          .optional()
          .describe('Include adoption recommendations (yes/no, default: yes)'),
      },
    },
    (args) => {
      debug('mcp', 'stats prompt: request', { type: args.type ?? 'all' });
      const text = generateStatsPrompt(source, {
        period: args.period,
        typeFilter: args.type,
        includeRecommendations: (args.include_recommendations ?? 'yes').toLowerCase() !== 'no',
      });
      return {
        description: `MCP usage statistics for ${args.period || 'all time'}`,
        messages: [{ role: 'user' as const, content: { type: 'text' as const, text } }],
      };
    },
  );
}
