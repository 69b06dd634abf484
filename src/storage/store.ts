import type { DatabaseConfig } from '../shared/types.js';
import { StorageError } from '../shared/errors.js';
import { openDatabase, type TallyDatabase } from './database.js';
import { MetadataRepository } from './metadata.js';
import { UsageRepository } from './usage.js';

/**
 * The open database plus the repositories prepared against it.
 * One store per Tally instance; the aggregator and the catalog share it.
 */
export interface TallyStore {
  database: TallyDatabase;
  usage: UsageRepository;
  metadata: MetadataRepository;
}

export function openStore(config: DatabaseConfig): TallyStore {
  const database = openDatabase(config);
  return {
    database,
    usage: new UsageRepository(database.db),
    metadata: new MetadataRepository(database.db),
  };
}

/**
 * @throws StorageError once the store has been closed
 */
export function assertOpen(store: TallyStore): void {
  if (!store.database.isOpen) {
    throw new StorageError('Usage store is closed');
  }
}

/**
 * Runs `fn` inside one transaction so reads spanning both tables see a
 * single snapshot, even while another process writes to the same file.
 */
export function withSnapshot<T>(store: TallyStore, fn: () => T): T {
  assertOpen(store);
  return store.database.db.transaction(fn)();
}

/**
 * Runs `fn` inside one IMMEDIATE (write) transaction.
 */
export function withWriteTransaction<T>(store: TallyStore, fn: () => T): T {
  assertOpen(store);
  return store.database.db.transaction(fn).immediate();
}
