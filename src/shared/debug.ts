import { isDebugEnabled } from './config.js';

/**
 * Where a log line comes from:
 * - `db`, `usage`: connection, migrations and repository writes
 * - `tracker`: dropped records and ignored metrics
 * - `catalog`: metadata syncs
 * - `audit`: audit-file failures
 * - `mcp`: tool and prompt requests
 * - `tally`: instance startup
 */
export type DebugCategory = 'db' | 'usage' | 'tracker' | 'catalog' | 'audit' | 'mcp' | 'tally';

let enabledFlag: boolean | null = null;

function enabled(): boolean {
  enabledFlag ??= isDebugEnabled();
  return enabledFlag;
}

/**
 * `[2026-01-01T00:00:00.000Z] [TALLY:tracker] Usage record dropped {"name":"x"}`
 */
export function formatDebugLine(
  at: Date,
  category: DebugCategory,
  message: string,
  data?: Record<string, unknown>,
): string {
  const suffix = data === undefined ? '' : ` ${JSON.stringify(data)}`;
  return `[${at.toISOString()}] [TALLY:${category}] ${message}${suffix}`;
}

/**
 * Writes one line to stderr when TALLY_DEBUG (or `debug` in config.json) is
 * on. Stdout carries the MCP stdio transport and is never written.
 *
 * Write paths that swallow errors (`record`, `reportTokens`, the audit log)
 * report them only through here.
 */
export function debug(
  category: DebugCategory,
  message: string,
  data?: Record<string, unknown>,
): void {
  if (!enabled()) return;
  process.stderr.write(formatDebugLine(new Date(), category, message, data) + '\n');
}

/**
 * Runs `fn` and logs how long it took. Untimed when debug is off.
 */
export function debugTimed<T>(category: DebugCategory, message: string, fn: () => T): T {
  if (!enabled()) return fn();

  const start = performance.now();
  const result = fn();
  debug(category, message, { ms: Number((performance.now() - start).toFixed(2)) });
  return result;
}
