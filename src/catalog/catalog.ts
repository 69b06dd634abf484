import { MetadataPresetSchema, type MetadataPreset } from '../shared/config.js';
import { debug } from '../shared/debug.js';
import { ValidationError } from '../shared/errors.js';
import { deriveShortDescription, extractTags, normalizeTags } from '../shared/tags.js';
import {
  CatalogQuerySchema,
  MetadataInputSchema,
  PrimitiveDefinitionSchema,
  type CatalogEntry,
  type CatalogQuery,
  type CatalogResponse,
  type MetadataInput,
  type MetadataRecord,
  type PrimitiveDefinition,
  type SyncOptions,
  type UsageRecord,
} from '../shared/types.js';
import type { MetadataWrite } from '../storage/metadata.js';
import { assertOpen, withSnapshot, withWriteTransaction, type TallyStore } from '../storage/store.js';

export interface CatalogOptions {
  metadataPresets: Record<string, { tags: string[]; short?: string }>;
  cleanupOrphans: boolean;
  now?: () => Date;
}

export interface SyncResult {
  synced: number;
  /** Zero-call usage rows created for names that had none. */
  seeded: number;
  /** Metadata rows removed by orphan cleanup. */
  removed: number;
}

function collapseQuery(query: string | undefined): string {
  return (query ?? '').split(/\s+/).filter(Boolean).join(' ').toLowerCase();
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

function matchesQuery(meta: MetadataRecord, needle: string): boolean {
  const fields = [meta.name, meta.shortDescription, meta.fullDescription ?? '', ...meta.tags];
  return fields.some((field) => field.toLowerCase().includes(needle));
}

/**
 * Tag-annotated index of the host's primitives.
 *
 * Metadata lives in its own table and never implies a usage row; the catalog
 * joins the two on read.
 */
export class Catalog {
  private readonly store: TallyStore;
  private readonly presets = new Map<string, { tags: string[]; short?: string }>();
  private readonly cleanupOrphans: boolean;
  private readonly now: () => Date;

  constructor(store: TallyStore, options: CatalogOptions) {
    this.store = store;
    this.cleanupOrphans = options.cleanupOrphans;
    this.now = options.now ?? (() => new Date());
    for (const [name, preset] of Object.entries(options.metadataPresets)) {
      this.presets.set(name, preset);
    }
  }

  /**
   * Registers tags and a short description that override derived metadata
   * for `name` on every later sync.
   */
  addPreset(name: string, preset: MetadataPreset): void {
    if (!name) {
      throw new ValidationError('Preset name must not be empty');
    }
    const parsed = MetadataPresetSchema.safeParse(preset);
    if (!parsed.success) {
      throw new ValidationError(`Invalid metadata preset for "${name}"`, { cause: parsed.error });
    }
    this.presets.set(name, parsed.data);
  }

  /**
   * Stores metadata for one primitive, replacing whatever was there.
   *
   * @throws ValidationError for an empty name or malformed input
   */
  registerMetadata(name: string, input: MetadataInput): void {
    if (!name) {
      throw new ValidationError('Primitive name must not be empty');
    }
    const parsed = MetadataInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(`Invalid metadata for "${name}"`, { cause: parsed.error });
    }

    assertOpen(this.store);
    const fullDescription = parsed.data.fullDescription ?? null;
    this.store.metadata.upsert({
      name,
      tags: normalizeTags(parsed.data.tags),
      shortDescription:
        parsed.data.shortDescription ?? deriveShortDescription(fullDescription, name),
      fullDescription,
      updatedAt: this.now().toISOString(),
    });
  }

  /**
   * Rebuilds catalog metadata from the host's own primitive definitions.
   *
   * The whole batch is one write transaction. With cleanup on, the batch is
   * authoritative: metadata for names outside it is deleted. Usage rows are
   * never deleted. With `primitiveType`, each name without a usage row gets
   * a zero-call row of that type.
   */
  syncFromDefinitions(
    definitions: readonly PrimitiveDefinition[],
    options: SyncOptions = {},
  ): SyncResult {
    const timestamp = this.now().toISOString();
    const writes = definitions.map((definition) => this.buildMetadata(definition, timestamp));
    const cleanup = options.cleanupOrphans ?? this.cleanupOrphans;
    const primitiveType = options.primitiveType;

    const result = withWriteTransaction(this.store, () => {
      let seeded = 0;
      for (const write of writes) {
        this.store.metadata.upsert(write);
        if (primitiveType && this.store.usage.seed(write.name, primitiveType, timestamp)) {
          seeded++;
        }
      }
      const removed = cleanup ? this.store.metadata.deleteNotIn(writes.map((w) => w.name)) : 0;
      return { synced: writes.length, seeded, removed };
    });

    debug('catalog', 'Synced definitions', { ...result, type: primitiveType ?? null });
    return result;
  }

  /**
   * Filters the catalog by tags (all must be present) and a substring query.
   *
   * @throws ValidationError for a malformed query
   */
  getCatalog(query: CatalogQuery = {}): CatalogResponse {
    const parsed = CatalogQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new ValidationError('Invalid catalog query', {
        cause: parsed.error,
        details: { issues: parsed.error.issues.map((issue) => issue.message) },
      });
    }
    const { includeUsage, limit } = parsed.data;
    const requiredTags = normalizeTags(parsed.data.tags ?? []);
    const needle = collapseQuery(parsed.data.query);

    const { metadata, usage } = withSnapshot(this.store, () => ({
      metadata: this.store.metadata.list(),
      usage: includeUsage ? this.store.usage.list() : [],
    }));

    const usageByName = new Map<string, UsageRecord>(usage.map((row) => [row.name, row]));
    const allTags = normalizeTags(metadata.flatMap((meta) => meta.tags));

    const matched = metadata.filter(
      (meta) =>
        requiredTags.every((tag) => meta.tags.includes(tag)) &&
        (!needle || matchesQuery(meta, needle)),
    );

    const entries = matched.map((meta): CatalogEntry => {
      const entry: CatalogEntry = {
        name: meta.name,
        tags: meta.tags,
        short_description: meta.shortDescription,
        full_description: meta.fullDescription,
        schema_version: meta.schemaVersion,
        updated_at: meta.updatedAt,
      };
      if (includeUsage) {
        const row = usageByName.get(meta.name);
        entry.call_count = row?.callCount ?? 0;
        entry.last_accessed = row?.lastAccessed ?? null;
      }
      return entry;
    });

    if (includeUsage) {
      // Busiest first, then most recently used, then by name
      entries.sort(
        (a, b) =>
          (b.call_count ?? 0) - (a.call_count ?? 0) ||
          compareNames(b.last_accessed ?? '', a.last_accessed ?? '') ||
          compareNames(a.name, b.name),
      );
    }

    return {
      total_tracked: metadata.length,
      matched: entries.length,
      all_tags: allTags,
      filters: { tags: requiredTags, query: needle || null },
      include_usage: includeUsage,
      limit: limit ?? null,
      total_calls: includeUsage
        ? entries.reduce((sum, entry) => sum + (entry.call_count ?? 0), 0)
        : null,
      results: limit === undefined ? entries : entries.slice(0, limit),
    };
  }

  private buildMetadata(definition: PrimitiveDefinition, updatedAt: string): MetadataWrite {
    const parsed = PrimitiveDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      throw new ValidationError('Invalid primitive definition', {
        cause: parsed.error,
        details: { issues: parsed.error.issues.map((issue) => issue.message) },
      });
    }
    const { name, description, tags } = parsed.data;
    const fullDescription = description ?? null;
    const preset = this.presets.get(name);

    let tagList = preset
      ? normalizeTags(preset.tags)
      : normalizeTags([...extractTags(name), ...normalizeTags(tags ?? [])]);
    if (tagList.length === 0) {
      tagList = [name.toLowerCase()];
    }

    return {
      name,
      tags: tagList,
      shortDescription: preset?.short ?? deriveShortDescription(fullDescription, name),
      fullDescription,
      updatedAt,
    };
  }
}
