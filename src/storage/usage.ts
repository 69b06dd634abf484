import type BetterSqlite3 from 'better-sqlite3';

import { debug } from '../shared/debug.js';
import { wrapStorage } from '../shared/errors.js';
import {
  UsageRowSchema,
  rowToUsage,
  type PrimitiveType,
  type UsageDelta,
  type UsageRecord,
} from '../shared/types.js';

/**
 * Repository for the per-primitive `usage_stats` aggregates.
 *
 * Counters only ever grow: the upsert adds deltas and no statement here
 * subtracts or resets them. Rows are never deleted.
 */
export class UsageRepository {
  // Prepared once, reused for every call
  private readonly stmtUpsert: BetterSqlite3.Statement;
  private readonly stmtSeed: BetterSqlite3.Statement;
  private readonly stmtAddTokens: BetterSqlite3.Statement;
  private readonly stmtGetByName: BetterSqlite3.Statement;
  private readonly stmtList: BetterSqlite3.Statement;
  private readonly stmtListByType: BetterSqlite3.Statement;
  private readonly stmtCount: BetterSqlite3.Statement;

  constructor(db: BetterSqlite3.Database) {
    // The type of an existing row is never rewritten: a name denotes one
    // primitive kind from its first record on.
    this.stmtUpsert = db.prepare(`
      INSERT INTO usage_stats (
        name, type, call_count, last_accessed, created_at,
        total_input_tokens, total_output_tokens, total_response_chars, estimated_tokens,
        total_duration_ms, min_duration_ms, max_duration_ms
      )
      VALUES (
        @name, @type, @callCount, @timestamp, @timestamp,
        @inputTokens, @outputTokens, @responseChars, @estimatedTokens,
        @durationTotal, @durationMs, @durationMs
      )
      ON CONFLICT (name) DO UPDATE SET
        call_count = usage_stats.call_count + excluded.call_count,
        last_accessed = excluded.last_accessed,
        total_input_tokens = usage_stats.total_input_tokens + excluded.total_input_tokens,
        total_output_tokens = usage_stats.total_output_tokens + excluded.total_output_tokens,
        total_response_chars = usage_stats.total_response_chars + excluded.total_response_chars,
        estimated_tokens = usage_stats.estimated_tokens + excluded.estimated_tokens,
        total_duration_ms = usage_stats.total_duration_ms + excluded.total_duration_ms,
        min_duration_ms = CASE
          WHEN excluded.min_duration_ms IS NULL THEN usage_stats.min_duration_ms
          WHEN usage_stats.min_duration_ms IS NULL THEN excluded.min_duration_ms
          ELSE MIN(usage_stats.min_duration_ms, excluded.min_duration_ms)
        END,
        max_duration_ms = CASE
          WHEN excluded.max_duration_ms IS NULL THEN usage_stats.max_duration_ms
          WHEN usage_stats.max_duration_ms IS NULL THEN excluded.max_duration_ms
          ELSE MAX(usage_stats.max_duration_ms, excluded.max_duration_ms)
        END
    `);

    this.stmtSeed = db.prepare(`
      INSERT INTO usage_stats (name, type, call_count, last_accessed, created_at)
      VALUES (?, ?, 0, NULL, ?)
      ON CONFLICT (name) DO NOTHING
    `);

    this.stmtAddTokens = db.prepare(`
      UPDATE usage_stats
      SET total_input_tokens = total_input_tokens + ?,
          total_output_tokens = total_output_tokens + ?
      WHERE name = ?
    `);

    this.stmtGetByName = db.prepare(`
      SELECT * FROM usage_stats WHERE name = ?
    `);

    this.stmtList = db.prepare(`
      SELECT * FROM usage_stats
      ORDER BY call_count DESC, name ASC
    `);

    this.stmtListByType = db.prepare(`
      SELECT * FROM usage_stats
      WHERE type = ?
      ORDER BY call_count DESC, name ASC
    `);

    this.stmtCount = db.prepare(`
      SELECT COUNT(*) AS count FROM usage_stats
    `).pluck();

    debug('usage', 'UsageRepository initialized');
  }

  /**
   * Inserts the row with the deltas as initial values, or adds the deltas to
   * an existing row. A duration sample also folds into min/max; a null bound
   * adopts the sample.
   *
   * One statement, so the read-modify-write is atomic in SQLite itself.
   */
  upsert(name: string, type: PrimitiveType, delta: UsageDelta): void {
    wrapStorage('usage upsert', () =>
      this.stmtUpsert.run({
        name,
        type,
        callCount: delta.callCount,
        timestamp: delta.timestamp,
        inputTokens: delta.inputTokens,
        outputTokens: delta.outputTokens,
        responseChars: delta.responseChars,
        estimatedTokens: delta.estimatedTokens,
        durationTotal: delta.durationMs ?? 0,
        durationMs: delta.durationMs,
      }),
    );
  }

  /**
   * Creates a zero-call row for a primitive that has not been invoked yet.
   * Leaves an existing row untouched.
   *
   * @returns true if a row was created
   */
  seed(name: string, type: PrimitiveType, timestamp: string): boolean {
    const result = wrapStorage('usage seed', () => this.stmtSeed.run(name, type, timestamp));
    return result.changes > 0;
  }

  /**
   * Adds token counts to an existing row without counting a call.
   *
   * @returns false when no row exists for the name
   */
  addTokens(name: string, inputTokens: number, outputTokens: number): boolean {
    const result = wrapStorage('token report', () =>
      this.stmtAddTokens.run(inputTokens, outputTokens, name),
    );
    return result.changes > 0;
  }

  get(name: string): UsageRecord | null {
    return wrapStorage('usage read', () => {
      const row: unknown = this.stmtGetByName.get(name);
      return row === undefined ? null : rowToUsage(UsageRowSchema.parse(row));
    });
  }

  /**
   * Lists rows ordered by call_count DESC, then name, optionally of one type.
   */
  list(type?: PrimitiveType): UsageRecord[] {
    return wrapStorage('usage read', () => {
      const rows: unknown[] = type ? this.stmtListByType.all(type) : this.stmtList.all();
      return rows.map((row) => rowToUsage(UsageRowSchema.parse(row)));
    });
  }

  count(): number {
    return wrapStorage('usage count', () => {
      const count: unknown = this.stmtCount.get();
      return typeof count === 'number' ? count : 0;
    });
  }
}
