import { AuditLog } from './audit/audit-log.js';
import { Catalog, type SyncResult } from './catalog/catalog.js';
import {
  resolveTallyConfig,
  type MetadataPreset,
  type TallyConfig,
  type TallyOptions,
} from './shared/config.js';
import { debug } from './shared/debug.js';
import type {
  ByTypeResponse,
  CatalogQuery,
  CatalogResponse,
  MetadataInput,
  PrimitiveDefinition,
  PrimitiveType,
  RecordOptions,
  StatsQuery,
  StatsResponse,
  SyncOptions,
} from './shared/types.js';
import { openStore, type TallyStore } from './storage/store.js';
import { Aggregator } from './tracking/aggregator.js';
import { track, tracking, type UsageRecorder } from './tracking/track.js';

export interface TallyDeps {
  /** Clock for last_accessed, created_at, updated_at and audit lines. */
  now?: () => Date;
}

function withTag(definitions: readonly PrimitiveDefinition[], tag: string): PrimitiveDefinition[] {
  return definitions.map((definition) => ({
    ...definition,
    tags: [...(definition.tags ?? []), tag],
  }));
}

/**
 * Usage tracking for one MCP server.
 *
 * Construct once at startup and pass the instance to every handler. The
 * constructor opens the SQLite file and brings its schema up to date, so it
 * throws StorageError or MigrationError when the store cannot be used.
 *
 * @example
 * const tally = new Tally({ serverName: 'weather' });
 * tally.syncTools([{ name: 'get_forecast', description: 'Forecast for a city.' }]);
 * const getForecast = tally.track('get_forecast', 'tool', fetchForecast);
 */
export class Tally implements UsageRecorder {
  readonly config: TallyConfig;

  private readonly store: TallyStore;
  private readonly audit: AuditLog;
  private readonly aggregator: Aggregator;
  private readonly catalog: Catalog;
  private readonly now: () => Date;

  constructor(options: TallyOptions = {}, deps: TallyDeps = {}) {
    this.config = resolveTallyConfig(options);
    this.now = deps.now ?? (() => new Date());
    this.store = openStore(this.config.database);
    this.audit = new AuditLog(this.config.logPath, this.config.logEnabled);
    this.aggregator = new Aggregator(this.store, this.now);
    this.catalog = new Catalog(this.store, {
      metadataPresets: this.config.metadataPresets,
      cleanupOrphans: this.config.cleanupOrphans,
      now: this.now,
    });

    debug('tally', 'Usage tracking ready', {
      serverName: this.config.serverName,
      dbPath: this.config.database.dbPath,
      auditLog: this.audit.isEnabled ? this.audit.path : null,
    });
  }

  /**
   * Records one invocation. Never throws.
   */
  record(name: string, primitiveType: string = 'tool', options: RecordOptions = {}): void {
    const at = this.now();
    this.audit.write({
      timestamp: at,
      name,
      primitiveType,
      success: options.success ?? true,
      errorMessage: options.errorMessage,
    });
    this.aggregator.record(name, primitiveType, options, at);
  }

  /**
   * Adds real token counts to an already recorded primitive. Never throws.
   */
  reportTokens(name: string, inputTokens: number, outputTokens: number): void {
    this.aggregator.reportTokens(name, inputTokens, outputTokens);
  }

  getStats(query: StatsQuery = {}): StatsResponse {
    return this.aggregator.getStats(query);
  }

  getByType(): ByTypeResponse {
    return this.aggregator.getByType();
  }

  getCatalog(query: CatalogQuery = {}): CatalogResponse {
    return this.catalog.getCatalog(query);
  }

  registerMetadata(name: string, input: MetadataInput): void {
    this.catalog.registerMetadata(name, input);
  }

  syncFromDefinitions(
    definitions: readonly PrimitiveDefinition[],
    options: SyncOptions = {},
  ): SyncResult {
    return this.catalog.syncFromDefinitions(definitions, options);
  }

  /**
   * Syncs the server's tool list. The tool list is authoritative for the
   * catalog unless `cleanupOrphans` was turned off.
   */
  syncTools(tools: readonly PrimitiveDefinition[]): SyncResult {
    return this.catalog.syncFromDefinitions(tools, { primitiveType: 'tool' });
  }

  /**
   * Adds prompts to the catalog, tagged `prompt`. Never removes metadata.
   */
  syncPrompts(prompts: readonly PrimitiveDefinition[]): SyncResult {
    return this.catalog.syncFromDefinitions(withTag(prompts, 'prompt'), {
      primitiveType: 'prompt',
      cleanupOrphans: false,
    });
  }

  /**
   * Adds resources to the catalog, tagged `resource`. Never removes metadata.
   */
  syncResources(resources: readonly PrimitiveDefinition[]): SyncResult {
    return this.catalog.syncFromDefinitions(withTag(resources, 'resource'), {
      primitiveType: 'resource',
      cleanupOrphans: false,
    });
  }

  addPreset(name: string, preset: MetadataPreset): void {
    this.catalog.addPreset(name, preset);
  }

  track<A extends unknown[], R>(
    name: string,
    primitiveType: PrimitiveType,
    fn: (...args: A) => R | Promise<R>,
  ): (...args: A) => Promise<R> {
    return track(this, name, primitiveType, fn);
  }

  tracking<R>(name: string, primitiveType: PrimitiveType, fn: () => R | Promise<R>): Promise<R> {
    return tracking(this, name, primitiveType, fn);
  }

  /**
   * Flushes and closes the database. Later records are dropped and later
   * queries throw StorageError. Safe to call more than once.
   */
  close(): void {
    this.audit.close();
    this.store.database.close();
  }
}
