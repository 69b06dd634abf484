import type BetterSqlite3 from 'better-sqlite3';

import { debug } from '../shared/debug.js';
import { wrapStorage } from '../shared/errors.js';
import {
  MetadataRowSchema,
  rowToMetadata,
  type MetadataRecord,
} from '../shared/types.js';

/** Version of the metadata row shape written by this build. */
export const METADATA_SCHEMA_VERSION = 1;

export interface MetadataWrite {
  name: string;
  tags: string[];
  shortDescription: string;
  fullDescription: string | null;
  updatedAt: string;
}

/**
 * Repository for the `primitive_metadata` catalog.
 *
 * Writes replace a row wholesale (last write wins, tags are not merged).
 * Rows are independent of usage_stats: deleting metadata never touches usage.
 */
export class MetadataRepository {
  private readonly stmtUpsert: BetterSqlite3.Statement;
  private readonly stmtGetByName: BetterSqlite3.Statement;
  private readonly stmtList: BetterSqlite3.Statement;
  private readonly stmtDeleteNotIn: BetterSqlite3.Statement;
  private readonly stmtCount: BetterSqlite3.Statement;

  constructor(db: BetterSqlite3.Database) {
    this.stmtUpsert = db.prepare(`
      INSERT INTO primitive_metadata
        (name, tags, short_description, full_description, schema_version, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT (name) DO UPDATE SET
        tags = excluded.tags,
        short_description = excluded.short_description,
        full_description = excluded.full_description,
        schema_version = excluded.schema_version,
        updated_at = excluded.updated_at
    `);

    this.stmtGetByName = db.prepare(`
      SELECT * FROM primitive_metadata WHERE name = ?
    `);

    this.stmtList = db.prepare(`
      SELECT * FROM primitive_metadata ORDER BY name ASC
    `);

    // keepNames is bound as one JSON array so the statement stays prepared
    // whatever the batch size.
    this.stmtDeleteNotIn = db.prepare(`
      DELETE FROM primitive_metadata
      WHERE name NOT IN (SELECT value FROM json_each(?))
    `);

    this.stmtCount = db.prepare(`
      SELECT COUNT(*) AS count FROM primitive_metadata
    `).pluck();

    debug('catalog', 'MetadataRepository initialized');
  }

  upsert(record: MetadataWrite): void {
    wrapStorage('metadata upsert', () =>
      this.stmtUpsert.run(
        record.name,
        JSON.stringify(record.tags),
        record.shortDescription,
        record.fullDescription,
        METADATA_SCHEMA_VERSION,
        record.updatedAt,
      ),
    );
  }

  get(name: string): MetadataRecord | null {
    return wrapStorage('metadata read', () => {
      const row: unknown = this.stmtGetByName.get(name);
      return row === undefined ? null : rowToMetadata(MetadataRowSchema.parse(row));
    });
  }

  /**
   * Lists every metadata row ordered by name.
   */
  list(): MetadataRecord[] {
    return wrapStorage('metadata read', () =>
      this.stmtList.all().map((row) => rowToMetadata(MetadataRowSchema.parse(row))),
    );
  }

  /**
   * Deletes metadata rows whose name is not in `keepNames`.
   *
   * @returns the number of rows deleted
   */
  deleteNotIn(keepNames: Iterable<string>): number {
    const keep = JSON.stringify([...new Set(keepNames)]);
    const result = wrapStorage('metadata cleanup', () => this.stmtDeleteNotIn.run(keep));
    if (result.changes > 0) {
      debug('catalog', 'Removed orphaned metadata', { removed: result.changes });
    }
    return result.changes;
  }

  count(): number {
    return wrapStorage('metadata count', () => {
      const count: unknown = this.stmtCount.get();
      return typeof count === 'number' ? count : 0;
    });
  }
}
