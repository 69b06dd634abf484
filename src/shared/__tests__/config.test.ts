import { describe, it, expect } from 'vitest';
import { join } from 'node:path';

import { DEFAULT_BUSY_TIMEOUT, resolveTallyConfig } from '../config.js';
import { ValidationError } from '../errors.js';

describe('resolveTallyConfig', () => {
  it('fills defaults under the data directory', () => {
    const config = resolveTallyConfig({}, { TALLY_DATA_DIR: '/tmp/tally-data' });

    expect(config).toEqual({
      serverName: 'MCP server',
      database: { dbPath: join('/tmp/tally-data', 'usage.sqlite'), busyTimeout: DEFAULT_BUSY_TIMEOUT },
      logPath: join('/tmp/tally-data', 'usage.log'),
      logEnabled: false,
      metadataPresets: {},
      cleanupOrphans: true,
    });
  });

  it('uses explicit options', () => {
    const config = resolveTallyConfig(
      {
        serverName: 'weather',
        dbPath: '/srv/stats.sqlite',
        logPath: '/srv/usage.log',
        logEnabled: true,
        busyTimeout: 8000,
        metadataPresets: { forecast: { tags: ['weather'] } },
        cleanupOrphans: false,
      },
      {},
    );

    expect(config.serverName).toBe('weather');
    expect(config.database).toEqual({ dbPath: '/srv/stats.sqlite', busyTimeout: 8000 });
    expect(config.logPath).toBe('/srv/usage.log');
    expect(config.logEnabled).toBe(true);
    expect(config.metadataPresets).toEqual({ forecast: { tags: ['weather'] } });
    expect(config.cleanupOrphans).toBe(false);
  });

  it('lets environment variables override options', () => {
    const config = resolveTallyConfig(
      { dbPath: '/srv/stats.sqlite', logPath: '/srv/usage.log', logEnabled: false },
      {
        TALLY_DB_PATH: '/env/stats.sqlite',
        TALLY_LOG_PATH: '/env/usage.log',
        TALLY_LOG_ENABLED: 'YES',
      },
    );

    expect(config.database.dbPath).toBe('/env/stats.sqlite');
    expect(config.logPath).toBe('/env/usage.log');
    expect(config.logEnabled).toBe(true);
  });

  it('reads false-like TALLY_LOG_ENABLED values and ignores unknown ones', () => {
    expect(resolveTallyConfig({ logEnabled: true }, { TALLY_LOG_ENABLED: '0' }).logEnabled).toBe(false);
    expect(resolveTallyConfig({ logEnabled: true }, { TALLY_LOG_ENABLED: 'no' }).logEnabled).toBe(false);
    expect(resolveTallyConfig({ logEnabled: true }, { TALLY_LOG_ENABLED: 'maybe' }).logEnabled).toBe(true);
  });

  it('rejects invalid options', () => {
    expect(() => resolveTallyConfig({ busyTimeout: -1 }, {})).toThrow(ValidationError);
    expect(() => resolveTallyConfig({ serverName: '' }, {})).toThrow(ValidationError);
  });
});
