import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { openDatabase } from '../database.js';
import type { TallyDatabase } from '../database.js';
import { MIGRATIONS, getSchemaVersion, runMigrations } from '../migrations.js';
import { MigrationError, StorageError } from '../../shared/errors.js';
import type { DatabaseConfig } from '../../shared/types.js';
import { createTempDb } from './test-utils.js';

function schemaDump(db: Database.Database): unknown[] {
  return db
    .prepare("SELECT type, name, sql FROM sqlite_master WHERE name NOT LIKE 'sqlite_%' ORDER BY name")
    .all();
}

describe('openDatabase', () => {
  let config: DatabaseConfig;
  let dir: string;
  let cleanup: () => void;
  let tdb: TallyDatabase | null = null;

  beforeEach(() => {
    ({ config, dir, cleanup } = createTempDb());
  });

  afterEach(() => {
    tdb?.close();
    tdb = null;
    cleanup();
  });

  it('opens database with WAL mode', () => {
    tdb = openDatabase(config);
    expect(tdb.db.pragma('journal_mode', { simple: true })).toBe('wal');
  });

  it('sets busy_timeout to configured value', () => {
    tdb = openDatabase({ ...config, busyTimeout: 7000 });
    expect(tdb.db.pragma('busy_timeout', { simple: true })).toBe(7000);
  });

  it('sets synchronous to NORMAL (1)', () => {
    tdb = openDatabase(config);
    expect(tdb.db.pragma('synchronous', { simple: true })).toBe(1);
  });

  it('creates missing parent directories', () => {
    const nested = { ...config, dbPath: join(dir, 'a', 'b', 'usage.sqlite') };
    tdb = openDatabase(nested);
    expect(existsSync(nested.dbPath)).toBe(true);
  });

  it('applies every migration on a fresh file', () => {
    tdb = openDatabase(config);
    expect(getSchemaVersion(tdb.db)).toBe(MIGRATIONS.length);

    const columns = tdb.db
      .prepare('SELECT name FROM pragma_table_info(?) ORDER BY cid')
      .pluck()
      .all('usage_stats');
    expect(columns).toEqual([
      'name',
      'type',
      'call_count',
      'last_accessed',
      'created_at',
      'total_input_tokens',
      'total_output_tokens',
      'total_response_chars',
      'estimated_tokens',
      'total_duration_ms',
      'min_duration_ms',
      'max_duration_ms',
    ]);
  });

  it('close is idempotent and reports isOpen', () => {
    tdb = openDatabase(config);
    expect(tdb.isOpen).toBe(true);
    tdb.close();
    tdb.close();
    expect(tdb.isOpen).toBe(false);
  });

  it('throws StorageError when the path is not a database', () => {
    writeFileSync(config.dbPath, 'not a database\n'.repeat(200));
    expect(() => openDatabase(config)).toThrow(StorageError);
  });
});

describe('runMigrations', () => {
  let config: DatabaseConfig;
  let cleanup: () => void;
  let db: Database.Database;

  beforeEach(() => {
    ({ config, cleanup } = createTempDb());
    db = new Database(config.dbPath);
  });

  afterEach(() => {
    db.close();
    cleanup();
  });

  it('is idempotent: a second run applies nothing and changes nothing', () => {
    expect(runMigrations(db)).toBe(4);
    db.prepare(
      "INSERT INTO usage_stats (name, type, call_count, created_at) VALUES ('alpha', 'tool', 3, '2026-01-01T00:00:00.000Z')",
    ).run();
    const schemaBefore = schemaDump(db);
    const rowsBefore = db.prepare('SELECT * FROM usage_stats').all();

    expect(runMigrations(db)).toBe(0);

    expect(schemaDump(db)).toEqual(schemaBefore);
    expect(db.prepare('SELECT * FROM usage_stats').all()).toEqual(rowsBefore);
    expect(db.prepare('SELECT COUNT(*) FROM _migrations').pluck().get()).toBe(4);
  });

  it('upgrades an older schema and defaults the new columns', () => {
    runMigrations(db, MIGRATIONS.slice(0, 2));
    db.prepare(
      "INSERT INTO usage_stats (name, type, call_count, last_accessed, created_at) VALUES ('legacy', 'prompt', 7, '2026-01-02T00:00:00.000Z', '2026-01-01T00:00:00.000Z')",
    ).run();

    expect(runMigrations(db)).toBe(2);

    const row = db.prepare('SELECT * FROM usage_stats WHERE name = ?').get('legacy');
    expect(row).toEqual({
      name: 'legacy',
      type: 'prompt',
      call_count: 7,
      last_accessed: '2026-01-02T00:00:00.000Z',
      created_at: '2026-01-01T00:00:00.000Z',
      total_input_tokens: 0,
      total_output_tokens: 0,
      total_response_chars: 0,
      estimated_tokens: 0,
      total_duration_ms: 0,
      min_duration_ms: null,
      max_duration_ms: null,
    });
  });

  it('refuses a schema newer than it knows', () => {
    runMigrations(db);
    db.prepare("INSERT INTO _migrations (version, name) VALUES (99, 'from_the_future')").run();
    const schemaBefore = schemaDump(db);

    expect(() => runMigrations(db)).toThrow(MigrationError);
    expect(schemaDump(db)).toEqual(schemaBefore);
  });

  it('rolls back every step when one fails', () => {
    const broken = [
      ...MIGRATIONS.slice(0, 2),
      { version: 3, name: 'broken_step', up: 'ALTER TABLE no_such_table ADD COLUMN x INTEGER' },
    ];

    expect(() => runMigrations(db, broken)).toThrow(MigrationError);
    expect(getSchemaVersion(db)).toBe(0);
    expect(
      db.prepare("SELECT COUNT(*) FROM sqlite_master WHERE name = 'usage_stats'").pluck().get(),
    ).toBe(0);
  });

  it('openDatabase surfaces MigrationError for a newer file', () => {
    runMigrations(db);
    db.prepare("INSERT INTO _migrations (version, name) VALUES (5, 'unknown_step')").run();
    db.close();
    db = new Database(':memory:');

    expect(() => openDatabase(config)).toThrow(MigrationError);
  });
});
