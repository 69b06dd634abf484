// Library entry point
export { Tally, type TallyDeps } from './tally.js';
export type { SyncResult } from './catalog/catalog.js';
export { track, tracking, type UsageRecorder } from './tracking/track.js';
export { formatAuditLine, type AuditEvent } from './audit/audit-log.js';
export { registerTallyTools, type RegisterOptions, type TallySource } from './mcp/register.js';
export { generateStatsPrompt, type StatsPromptOptions } from './mcp/prompts/stats-prompt.js';
export { createServer, startServer } from './mcp/server.js';
export { deriveShortDescription, extractTags, normalizeTags } from './shared/tags.js';
export {
  TallyError,
  StorageError,
  ValidationError,
  MigrationError,
  type TallyErrorCode,
} from './shared/errors.js';
export type { MetadataPreset, TallyConfig, TallyOptions } from './shared/config.js';
export type {
  ByTypeResponse,
  CatalogEntry,
  CatalogQuery,
  CatalogResponse,
  LatencySummary,
  MetadataInput,
  PrimitiveDefinition,
  PrimitiveType,
  RecordOptions,
  StatsEntry,
  StatsQuery,
  StatsResponse,
  SyncOptions,
  TokenSummary,
  TypeEntry,
  TypeSummary,
} from './shared/types.js';
