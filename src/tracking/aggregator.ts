import { debug } from '../shared/debug.js';
import { ValidationError, errorMessage } from '../shared/errors.js';
import { estimateTokensFromChars } from '../shared/tags.js';
import {
  MetricSchema,
  PRIMITIVE_TYPES,
  PrimitiveTypeSchema,
  RECORD_METRICS,
  StatsQuerySchema,
  TokenReportSchema,
  type ByTypeResponse,
  type MetadataRecord,
  type PrimitiveType,
  type RecordMetric,
  type RecordOptions,
  type StatsEntry,
  type StatsQuery,
  type StatsResponse,
  type TypeEntry,
  type TypeSummary,
  type UsageRecord,
} from '../shared/types.js';
import { assertOpen, withSnapshot, type TallyStore } from '../storage/store.js';

/**
 * Validates a caller-supplied primitive type.
 *
 * @throws ValidationError for anything other than tool, prompt or resource
 */
export function parsePrimitiveType(value: string): PrimitiveType {
  const parsed = PrimitiveTypeSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(
      `Unknown primitive type "${value}" (expected one of ${PRIMITIVE_TYPES.join(', ')})`,
      { details: { type: value } },
    );
  }
  return parsed.data;
}

/**
 * Keeps the usable metrics of one call, floored. Anything else is logged
 * and left out so the call itself still counts.
 */
function readMetrics(name: string, options: RecordOptions): Partial<Record<RecordMetric, number>> {
  const metrics: Partial<Record<RecordMetric, number>> = {};
  for (const field of RECORD_METRICS) {
    const value = options[field];
    if (value === undefined) continue;
    const parsed = MetricSchema.safeParse(value);
    if (parsed.success) {
      metrics[field] = parsed.data;
    } else {
      debug('tracker', 'Metric ignored', { name, field, value: String(value) });
    }
  }
  return metrics;
}

function perCall(total: number, calls: number): number {
  return calls > 0 ? Math.floor(total / calls) : 0;
}

function toStatsEntry(row: UsageRecord, meta: MetadataRecord | undefined): StatsEntry {
  const actualTokens = row.totalInputTokens + row.totalOutputTokens;
  return {
    name: row.name,
    type: row.type,
    call_count: row.callCount,
    last_accessed: row.lastAccessed,
    created_at: row.createdAt,
    tags: meta?.tags ?? [],
    short_description: meta?.shortDescription ?? null,
    full_description: meta?.fullDescription ?? null,
    total_input_tokens: row.totalInputTokens,
    total_output_tokens: row.totalOutputTokens,
    total_response_chars: row.totalResponseChars,
    estimated_tokens: row.estimatedTokens,
    avg_tokens_per_call: perCall(actualTokens > 0 ? actualTokens : row.estimatedTokens, row.callCount),
    total_duration_ms: row.totalDurationMs,
    min_duration_ms: row.minDurationMs,
    max_duration_ms: row.maxDurationMs,
    avg_latency_ms: perCall(row.totalDurationMs, row.callCount),
  };
}

function toTypeEntry(row: UsageRecord): TypeEntry {
  return {
    name: row.name,
    type: row.type,
    call_count: row.callCount,
    last_accessed: row.lastAccessed,
  };
}

function summarize(entries: TypeEntry[]): TypeSummary {
  return {
    count: entries.length,
    total_calls: entries.reduce((sum, entry) => sum + entry.call_count, 0),
  };
}

/**
 * Turns invocation observations into usage_stats increments and derives the
 * stats views from them.
 *
 * Write methods (`record`, `reportTokens`) never throw: every failure is
 * logged under the `tracker` debug category and the observation is dropped.
 * Read methods throw ValidationError for bad queries and StorageError when
 * the store is unusable.
 */
export class Aggregator {
  private readonly store: TallyStore;
  private readonly now: () => Date;

  constructor(store: TallyStore, now: () => Date = () => new Date()) {
    this.store = store;
    this.now = now;
  }

  /**
   * Counts one invocation of `name`. Failed invocations count the same as
   * successful ones; `success` and `errorMessage` only matter to the audit log.
   * Only an empty name, an unknown type or an unusable store drop the call;
   * a bad metric is ignored on its own.
   */
  record(
    name: string,
    primitiveType: string = 'tool',
    options: RecordOptions = {},
    at: Date = this.now(),
  ): void {
    try {
      if (!name) {
        throw new ValidationError('Primitive name must not be empty');
      }
      const type = parsePrimitiveType(primitiveType);
      const metrics = readMetrics(name, options);

      assertOpen(this.store);
      const responseChars = metrics.responseChars ?? 0;
      this.store.usage.upsert(name, type, {
        callCount: 1,
        timestamp: at.toISOString(),
        inputTokens: metrics.inputTokens ?? 0,
        outputTokens: metrics.outputTokens ?? 0,
        responseChars,
        estimatedTokens: estimateTokensFromChars(responseChars),
        durationMs: metrics.durationMs ?? null,
      });
    } catch (err) {
      debug('tracker', 'Usage record dropped', {
        name,
        type: primitiveType,
        error: errorMessage(err),
      });
    }
  }

  /**
   * Adds real token counts to a primitive that already has a usage row,
   * for hosts that learn token usage after the call has been recorded.
   */
  reportTokens(name: string, inputTokens: number, outputTokens: number): void {
    try {
      const parsed = TokenReportSchema.safeParse({ inputTokens, outputTokens });
      if (!parsed.success) {
        throw new ValidationError(`Invalid token counts for "${name}"`, { cause: parsed.error });
      }

      assertOpen(this.store);
      const updated = this.store.usage.addTokens(
        name,
        parsed.data.inputTokens,
        parsed.data.outputTokens,
      );
      if (!updated) {
        throw new ValidationError(`No usage recorded for "${name}"`, { details: { name } });
      }
    } catch (err) {
      debug('tracker', 'Token report dropped', { name, error: errorMessage(err) });
    }
  }

  /**
   * Per-primitive statistics joined with catalog metadata.
   *
   * `zero_count` counts the never-called rows of the type-filtered set, so with
   * `includeZero: false` it reports how many rows were left out. The other
   * summaries cover every returned row; `limit` shortens only `stats`.
   *
   * @throws ValidationError if `typeFilter` or `limit` is invalid
   */
  getStats(query: StatsQuery = {}): StatsResponse {
    const parsed = StatsQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new ValidationError('Invalid stats query', {
        cause: parsed.error,
        details: { issues: parsed.error.issues.map((issue) => issue.message) },
      });
    }
    const { includeZero, limit, typeFilter } = parsed.data;

    const { rows, metadata } = withSnapshot(this.store, () => ({
      rows: this.store.usage.list(typeFilter),
      metadata: this.store.metadata.list(),
    }));

    const metaByName = new Map(metadata.map((meta) => [meta.name, meta]));
    const zeroCount = rows.filter((row) => row.callCount === 0).length;
    const visible = includeZero ? rows : rows.filter((row) => row.callCount > 0);

    let totalCalls = 0;
    let latestAccess: string | null = null;
    let totalInput = 0;
    let totalOutput = 0;
    let totalEstimated = 0;
    let totalChars = 0;
    let totalDuration = 0;
    let hasActualTokens = false;

    for (const row of visible) {
      totalCalls += row.callCount;
      if (row.lastAccessed !== null && (latestAccess === null || row.lastAccessed > latestAccess)) {
        latestAccess = row.lastAccessed;
      }
      totalInput += row.totalInputTokens;
      totalOutput += row.totalOutputTokens;
      totalEstimated += row.estimatedTokens;
      totalChars += row.totalResponseChars;
      totalDuration += row.totalDurationMs;
      if (row.totalInputTokens + row.totalOutputTokens > 0) {
        hasActualTokens = true;
      }
    }

    const listed = limit === undefined ? visible : visible.slice(0, limit);

    return {
      tracked_count: visible.length,
      total_calls: totalCalls,
      zero_count: zeroCount,
      latest_access: latestAccess,
      token_summary: {
        total_input_tokens: totalInput,
        total_output_tokens: totalOutput,
        total_estimated_tokens: totalEstimated,
        total_response_chars: totalChars,
        has_actual_tokens: hasActualTokens,
      },
      latency_summary: {
        total_duration_ms: totalDuration,
        has_latency_data: totalDuration > 0,
      },
      stats: listed.map((row) => toStatsEntry(row, metaByName.get(row.name))),
    };
  }

  /**
   * Usage grouped by primitive type. All three types are always present.
   */
  getByType(): ByTypeResponse {
    const rows = withSnapshot(this.store, () => this.store.usage.list());

    const byType: Record<PrimitiveType, TypeEntry[]> = { tool: [], prompt: [], resource: [] };
    for (const row of rows) {
      byType[row.type].push(toTypeEntry(row));
    }

    const summary: Record<PrimitiveType, TypeSummary> = {
      tool: summarize(byType.tool),
      prompt: summarize(byType.prompt),
      resource: summarize(byType.resource),
    };

    return {
      by_type: byType,
      summary,
      total_calls: summary.tool.total_calls + summary.prompt.total_calls + summary.resource.total_calls,
      total_items: rows.length,
    };
  }
}
