import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import type { DatabaseConfig } from '../shared/types.js';
import { debug, debugTimed } from '../shared/debug.js';
import { StorageError, TallyError, errorMessage } from '../shared/errors.js';
import { runMigrations } from './migrations.js';

/**
 * Wrapper around a configured better-sqlite3 database instance.
 * `close` checkpoints the WAL and is safe to call twice; `isOpen` reports
 * whether the handle is still usable.
 */
export interface TallyDatabase {
  db: Database.Database;
  readonly isOpen: boolean;
  close(): void;
}

function connect(config: DatabaseConfig): Database.Database {
  let db: Database.Database | undefined;
  try {
    mkdirSync(dirname(config.dbPath), { recursive: true });
    // timeout covers the WAL switch below when another process holds the file
    db = new Database(config.dbPath, { timeout: config.busyTimeout });

    // WAL first -- synchronous = NORMAL is only safe with WAL
    const journalMode: unknown = db.pragma('journal_mode = WAL', { simple: true });
    if (journalMode !== 'wal') {
      debug('db', 'WAL mode not active', { journalMode: String(journalMode) });
    }

    // busy_timeout is per-connection, must be set every time
    db.pragma(`busy_timeout = ${config.busyTimeout}`);
    db.pragma('synchronous = NORMAL');
    return db;
  } catch (err) {
    db?.close();
    throw new StorageError(`Cannot open database at ${config.dbPath}: ${errorMessage(err)}`, {
      cause: err,
      details: { dbPath: config.dbPath },
    });
  }
}

/**
 * Opens a SQLite database with WAL mode, sets PRAGMAs, and brings the schema
 * up to date before returning.
 *
 * One connection per process. better-sqlite3 is synchronous,
 * so every statement on this handle runs to completion before the next one
 * starts. That makes the handle the process-wide lock for the usage tables.
 *
 * @param config - Database path and busy timeout configuration
 * @throws StorageError if the file cannot be opened
 * @throws MigrationError if the schema cannot be brought up to date
 */
export function openDatabase(config: DatabaseConfig): TallyDatabase {
  const db = connect(config);

  try {
    debugTimed('db', 'Schema migrations checked', () => runMigrations(db));
  } catch (err) {
    db.close();
    if (err instanceof TallyError) throw err;
    throw new StorageError(`Schema setup failed: ${errorMessage(err)}`, { cause: err });
  }

  debug('db', 'Database opened', { dbPath: config.dbPath });

  let open = true;

  return {
    db,

    get isOpen(): boolean {
      return open;
    },

    close(): void {
      if (!open) return;
      open = false;
      try {
        // Flush WAL before shutdown
        db.pragma('wal_checkpoint(PASSIVE)');
      } catch (err) {
        debug('db', 'Checkpoint on close failed', { error: errorMessage(err) });
      }
      db.close();
      debug('db', 'Database closed', { dbPath: config.dbPath });
    },
  };
}
