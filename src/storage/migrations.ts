import type BetterSqlite3 from 'better-sqlite3';

import { debug } from '../shared/debug.js';
import { MigrationError, TallyError, errorMessage } from '../shared/errors.js';

/**
 * A versioned schema migration.
 * Migrations are applied in order and tracked in the _migrations table.
 */
export interface Migration {
  version: number;
  name: string;
  up: string; // SQL to execute
}

/**
 * All schema migrations in order. Steps after the first two only add
 * columns; existing rows pick up the column default (0 or NULL).
 *
 * Migration 001: usage_stats with call counts and access timestamps.
 * Migration 002: primitive_metadata catalog (tags as a JSON array).
 * Migration 003: Cumulative token and response-size columns.
 * Migration 004: Latency columns (sum, min, max).
 */
export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'create_usage_stats',
    up: `
      CREATE TABLE usage_stats (
        name TEXT PRIMARY KEY,
        type TEXT NOT NULL DEFAULT 'tool',
        call_count INTEGER NOT NULL DEFAULT 0,
        last_accessed TEXT,
        created_at TEXT NOT NULL
      );

      CREATE INDEX idx_usage_stats_type ON usage_stats(type);
      CREATE INDEX idx_usage_stats_count ON usage_stats(call_count DESC);
    `,
  },
  {
    version: 2,
    name: 'create_primitive_metadata',
    up: `
      CREATE TABLE primitive_metadata (
        name TEXT PRIMARY KEY,
        tags TEXT NOT NULL DEFAULT '[]',
        short_description TEXT NOT NULL DEFAULT '',
        full_description TEXT,
        schema_version INTEGER NOT NULL DEFAULT 1,
        updated_at TEXT NOT NULL
      );
    `,
  },
  {
    version: 3,
    name: 'add_token_columns',
    up: `
      ALTER TABLE usage_stats ADD COLUMN total_input_tokens INTEGER NOT NULL DEFAULT 0;
      ALTER TABLE usage_stats ADD COLUMN total_output_tokens INTEGER NOT NULL DEFAULT 0;
      ALTER TABLE usage_stats ADD COLUMN total_response_chars INTEGER NOT NULL DEFAULT 0;
      ALTER TABLE usage_stats ADD COLUMN estimated_tokens INTEGER NOT NULL DEFAULT 0;
    `,
  },
  {
    version: 4,
    name: 'add_latency_columns',
    up: `
      ALTER TABLE usage_stats ADD COLUMN total_duration_ms INTEGER NOT NULL DEFAULT 0;
      ALTER TABLE usage_stats ADD COLUMN min_duration_ms INTEGER;
      ALTER TABLE usage_stats ADD COLUMN max_duration_ms INTEGER;
    `,
  },
];

/**
 * Applies unapplied schema migrations in order.
 *
 * Creates a _migrations tracking table if it does not exist, then applies
 * each migration whose version exceeds the current max applied version.
 *
 * The version check and every pending step run in one IMMEDIATE
 * transaction: a second process opening the same file waits on the write
 * lock, then sees the migrations already recorded and applies nothing.
 * Any failure rolls back the whole run.
 *
 * @param db - An open better-sqlite3 database connection
 * @param migrations - Migration list (defaults to MIGRATIONS)
 * @returns The number of migrations applied by this call
 * @throws MigrationError if the file was written by a newer schema, or a step fails
 */
export function runMigrations(
  db: BetterSqlite3.Database,
  migrations: readonly Migration[] = MIGRATIONS,
): number {
  const latest = migrations.reduce((max, m) => Math.max(max, m.version), 0);

  const migrate = db.transaction((): number => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS _migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);

    const maxVersion: unknown = db
      .prepare('SELECT COALESCE(MAX(version), 0) FROM _migrations')
      .pluck()
      .get();
    const current = typeof maxVersion === 'number' ? maxVersion : 0;

    if (current > latest) {
      throw new MigrationError(
        `Database schema version ${current} is newer than supported version ${latest}`,
        { details: { current, latest } },
      );
    }

    const insertMigration = db.prepare(
      'INSERT INTO _migrations (version, name) VALUES (?, ?)',
    );

    let applied = 0;
    for (const migration of migrations) {
      if (migration.version <= current) {
        continue;
      }
      db.exec(migration.up);
      insertMigration.run(migration.version, migration.name);
      applied++;
      debug('db', 'Applied migration', { version: migration.version, name: migration.name });
    }
    return applied;
  });

  try {
    return migrate.immediate();
  } catch (err) {
    if (err instanceof TallyError) throw err;
    throw new MigrationError(`Schema migration failed: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Returns the highest applied migration version, or 0 for a fresh file.
 */
export function getSchemaVersion(db: BetterSqlite3.Database): number {
  const hasTable = db
    .prepare("SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = '_migrations'")
    .get();
  if (!hasTable) return 0;
  const version: unknown = db
    .prepare('SELECT COALESCE(MAX(version), 0) FROM _migrations')
    .pluck()
    .get();
  return typeof version === 'number' ? version : 0;
}
