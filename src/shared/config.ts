import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

import { ValidationError } from './errors.js';
import type { DatabaseConfig } from './types.js';

/**
 * Cached debug-enabled flag.
 * Resolved once per process -- debug mode does not change at runtime.
 */
let _debugCached: boolean | null = null;

/**
 * Returns whether debug logging is enabled for this process.
 *
 * Resolution order:
 * 1. `TALLY_DEBUG` env var -- `"1"` or `"true"` enables debug mode
 * 2. `<dataDir>/config.json` -- `{ "debug": true }` enables debug mode
 * 3. Default: disabled
 *
 * The result is cached after the first call.
 */
export function isDebugEnabled(): boolean {
  if (_debugCached !== null) {
    return _debugCached;
  }

  const envVal = process.env.TALLY_DEBUG;
  if (envVal === '1' || envVal === 'true') {
    _debugCached = true;
    return true;
  }

  try {
    const raw = readFileSync(join(dataDirPath(), 'config.json'), 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === 'object' && parsed !== null && 'debug' in parsed && parsed.debug === true) {
      _debugCached = true;
      return true;
    }
  } catch {
    // Missing or unreadable config.json means debug stays off
  }

  _debugCached = false;
  return false;
}

/**
 * Default busy timeout in milliseconds.
 * Must be >= 5000ms to prevent SQLITE_BUSY when several server processes
 * share one stats file.
 */
export const DEFAULT_BUSY_TIMEOUT = 5000;

/**
 * Returns the data directory path.
 * Default: ~/.mcp-tally/ ; `TALLY_DATA_DIR` redirects it (tests use this).
 */
export function dataDirPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.TALLY_DATA_DIR || join(homedir(), '.mcp-tally');
}

// The database and log writers create their own parent directories.
export function getDbPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(dataDirPath(env), 'usage.sqlite');
}

export function getLogPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(dataDirPath(env), 'usage.log');
}

// =============================================================================
// Tally options
// =============================================================================

export const MetadataPresetSchema = z.object({
  tags: z.array(z.string()).default([]),
  short: z.string().optional(),
});

export type MetadataPreset = z.input<typeof MetadataPresetSchema>;

export const TallyOptionsSchema = z.object({
  serverName: z.string().min(1).default('MCP server'),
  dbPath: z.string().min(1).optional(),
  logPath: z.string().min(1).optional(),
  logEnabled: z.boolean().optional(),
  busyTimeout: z.number().int().nonnegative().default(DEFAULT_BUSY_TIMEOUT),
  metadataPresets: z.record(MetadataPresetSchema).default({}),
  cleanupOrphans: z.boolean().default(true),
});

export type TallyOptions = z.input<typeof TallyOptionsSchema>;

export interface TallyConfig {
  serverName: string;
  database: DatabaseConfig;
  logPath: string;
  logEnabled: boolean;
  metadataPresets: Record<string, { tags: string[]; short?: string }>;
  cleanupOrphans: boolean;
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  const normalized = (value ?? '').trim().toLowerCase();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true;
  if (normalized === 'false' || normalized === '0' || normalized === 'no') return false;
  return undefined;
}

/**
 * Resolves constructor options into a full config.
 *
 * Environment variables win over options:
 *   TALLY_DB_PATH, TALLY_LOG_PATH, TALLY_LOG_ENABLED (true/1/yes, false/0/no)
 * File logging is off unless enabled by one of them.
 *
 * @throws ValidationError for malformed options
 */
export function resolveTallyConfig(
  options: TallyOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): TallyConfig {
  const result = TallyOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ValidationError('Invalid tally options', {
      cause: result.error,
      details: { issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
    });
  }
  const parsed = result.data;

  const dbPath = env.TALLY_DB_PATH || parsed.dbPath || getDbPath(env);
  const logPath = env.TALLY_LOG_PATH || parsed.logPath || getLogPath(env);
  const logEnabled = parseBooleanEnv(env.TALLY_LOG_ENABLED) ?? parsed.logEnabled ?? false;

  return {
    serverName: parsed.serverName,
    database: { dbPath, busyTimeout: parsed.busyTimeout },
    logPath,
    logEnabled,
    metadataPresets: parsed.metadataPresets,
    cleanupOrphans: parsed.cleanupOrphans,
  };
}
