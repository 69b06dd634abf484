import { z } from 'zod';

// =============================================================================
// Primitive Types
// =============================================================================

export const PRIMITIVE_TYPES = ['tool', 'prompt', 'resource'] as const;

export const PrimitiveTypeSchema = z.enum(PRIMITIVE_TYPES);

export type PrimitiveType = z.infer<typeof PrimitiveTypeSchema>;

// =============================================================================
// Database Layer Types (snake_case, matches SQL columns)
// =============================================================================

/**
 * UsageRow -- the raw `usage_stats` row.
 * Uses snake_case to match SQL column names directly.
 */
export const UsageRowSchema = z.object({
  name: z.string(),
  type: PrimitiveTypeSchema,
  call_count: z.number().int(),
  last_accessed: z.string().nullable(),
  total_input_tokens: z.number().int(),
  total_output_tokens: z.number().int(),
  total_response_chars: z.number().int(),
  estimated_tokens: z.number().int(),
  total_duration_ms: z.number().int(),
  min_duration_ms: z.number().int().nullable(),
  max_duration_ms: z.number().int().nullable(),
  created_at: z.string(),
});

export type UsageRow = z.infer<typeof UsageRowSchema>;

/**
 * MetadataRow -- the raw `primitive_metadata` row. `tags` is a JSON array.
 */
export const MetadataRowSchema = z.object({
  name: z.string(),
  tags: z.string(),
  short_description: z.string(),
  full_description: z.string().nullable(),
  schema_version: z.number().int(),
  updated_at: z.string(),
});

export type MetadataRow = z.infer<typeof MetadataRowSchema>;

const TagListSchema = z.array(z.string());

// =============================================================================
// Application Layer Types (camelCase)
// =============================================================================

export interface UsageRecord {
  name: string;
  type: PrimitiveType;
  callCount: number;
  lastAccessed: string | null;
  totalInputTokens: number;
  totalOutputTokens: number;
  totalResponseChars: number;
  estimatedTokens: number;
  totalDurationMs: number;
  minDurationMs: number | null;
  maxDurationMs: number | null;
  createdAt: string;
}

export interface MetadataRecord {
  name: string;
  tags: string[];
  shortDescription: string;
  fullDescription: string | null;
  schemaVersion: number;
  updatedAt: string;
}

/**
 * Increments applied by a single upsert. Absent counters add zero.
 */
export interface UsageDelta {
  callCount: number;
  timestamp: string;
  inputTokens: number;
  outputTokens: number;
  responseChars: number;
  estimatedTokens: number;
  durationMs: number | null;
}

// =============================================================================
// Input Types (validated with Zod)
// =============================================================================

const CountSchema = z.number().int().nonnegative();

/**
 * A single per-call measurement. Fractions are floored; negative, NaN and
 * infinite values are rejected.
 */
export const MetricSchema = z
  .number()
  .finite()
  .nonnegative()
  .transform((value) => Math.floor(value));

export const RECORD_METRICS = ['responseChars', 'inputTokens', 'outputTokens', 'durationMs'] as const;

export type RecordMetric = (typeof RECORD_METRICS)[number];

/**
 * Optional per-call observations passed to `record`. Each metric is checked
 * on its own: an unusable one is ignored and the call is still counted.
 */
export interface RecordOptions {
  success?: boolean;
  errorMessage?: string;
  responseChars?: number;
  inputTokens?: number;
  outputTokens?: number;
  durationMs?: number;
}

export const TokenReportSchema = z.object({
  inputTokens: CountSchema,
  outputTokens: CountSchema,
});

export const StatsQuerySchema = z.object({
  includeZero: z.boolean().default(true),
  limit: z.number().int().positive().optional(),
  typeFilter: PrimitiveTypeSchema.optional(),
});

/**
 * `typeFilter` is checked at run time: an unknown type is a ValidationError.
 */
export interface StatsQuery {
  includeZero?: boolean;
  limit?: number;
  typeFilter?: string;
}

export const CatalogQuerySchema = z.object({
  tags: z.array(z.string()).optional(),
  query: z.string().optional(),
  includeUsage: z.boolean().default(true),
  limit: z.number().int().positive().optional(),
});

export type CatalogQuery = z.input<typeof CatalogQuerySchema>;

export const MetadataInputSchema = z.object({
  tags: z.array(z.string()),
  shortDescription: z.string().optional(),
  fullDescription: z.string().nullable().optional(),
});

export type MetadataInput = z.input<typeof MetadataInputSchema>;

/**
 * A primitive definition as supplied by the host server (an MCP Tool,
 * Prompt or Resource reduced to the fields the catalog needs).
 */
export const PrimitiveDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().nullable().optional(),
  tags: z.array(z.string()).optional(),
});

export type PrimitiveDefinition = z.input<typeof PrimitiveDefinitionSchema>;

export interface SyncOptions {
  /** Seeds a zero-call usage row of this type for every synced name. */
  primitiveType?: PrimitiveType;
  /** Deletes metadata for names absent from the batch. Defaults to the config value. */
  cleanupOrphans?: boolean;
}

// =============================================================================
// Response Types (snake_case, returned as tool JSON)
// =============================================================================

export interface StatsEntry {
  name: string;
  type: PrimitiveType;
  call_count: number;
  last_accessed: string | null;
  created_at: string;
  tags: string[];
  short_description: string | null;
  full_description: string | null;
  total_input_tokens: number;
  total_output_tokens: number;
  total_response_chars: number;
  estimated_tokens: number;
  avg_tokens_per_call: number;
  total_duration_ms: number;
  min_duration_ms: number | null;
  max_duration_ms: number | null;
  avg_latency_ms: number;
}

export interface TokenSummary {
  total_input_tokens: number;
  total_output_tokens: number;
  total_estimated_tokens: number;
  total_response_chars: number;
  has_actual_tokens: boolean;
}

export interface LatencySummary {
  total_duration_ms: number;
  has_latency_data: boolean;
}

export interface StatsResponse {
  tracked_count: number;
  total_calls: number;
  zero_count: number;
  latest_access: string | null;
  token_summary: TokenSummary;
  latency_summary: LatencySummary;
  stats: StatsEntry[];
}

export interface TypeEntry {
  name: string;
  type: PrimitiveType;
  call_count: number;
  last_accessed: string | null;
}

export interface TypeSummary {
  count: number;
  total_calls: number;
}

export interface ByTypeResponse {
  by_type: Record<PrimitiveType, TypeEntry[]>;
  summary: Record<PrimitiveType, TypeSummary>;
  total_calls: number;
  total_items: number;
}

export interface CatalogEntry {
  name: string;
  tags: string[];
  short_description: string;
  full_description: string | null;
  schema_version: number;
  updated_at: string;
  /** Present only when usage was requested. */
  call_count?: number;
  last_accessed?: string | null;
}

export interface CatalogResponse {
  total_tracked: number;
  matched: number;
  all_tags: string[];
  filters: { tags: string[]; query: string | null };
  include_usage: boolean;
  limit: number | null;
  total_calls: number | null;
  results: CatalogEntry[];
}

// =============================================================================
// Configuration Types
// =============================================================================

export interface DatabaseConfig {
  dbPath: string;
  busyTimeout: number;
}

// =============================================================================
// Mapping Helpers
// =============================================================================

export function rowToUsage(row: UsageRow): UsageRecord {
  return {
    name: row.name,
    type: row.type,
    callCount: row.call_count,
    lastAccessed: row.last_accessed,
    totalInputTokens: row.total_input_tokens,
    totalOutputTokens: row.total_output_tokens,
    totalResponseChars: row.total_response_chars,
    estimatedTokens: row.estimated_tokens,
    totalDurationMs: row.total_duration_ms,
    minDurationMs: row.min_duration_ms,
    maxDurationMs: row.max_duration_ms,
    createdAt: row.created_at,
  };
}

/**
 * Maps a MetadataRow to a MetadataRecord, decoding the JSON tag list.
 * A tag column that does not hold a string array decodes as no tags.
 */
export function rowToMetadata(row: MetadataRow): MetadataRecord {
  let tags: string[] = [];
  try {
    const decoded = TagListSchema.safeParse(JSON.parse(row.tags));
    if (decoded.success) tags = decoded.data;
  } catch {
    // Not JSON -- treated as untagged
  }

  return {
    name: row.name,
    tags,
    shortDescription: row.short_description,
    fullDescription: row.full_description,
    schemaVersion: row.schema_version,
    updatedAt: row.updated_at,
  };
}
