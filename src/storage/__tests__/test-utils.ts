import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { DatabaseConfig } from '../../shared/types.js';

/**
 * Creates a temporary directory and returns a DatabaseConfig pointing into
 * it, along with a cleanup function.
 *
 * Each test should use its own temp directory to avoid cross-test interference.
 */
export function createTempDb(): {
  dir: string;
  config: DatabaseConfig;
  cleanup: () => void;
} {
  const dir = mkdtempSync(join(tmpdir(), 'tally-test-'));
  const config: DatabaseConfig = {
    dbPath: join(dir, 'usage.sqlite'),
    busyTimeout: 5000,
  };

  const cleanup = () => {
    rmSync(dir, { recursive: true, force: true });
  };

  return { dir, config, cleanup };
}

/**
 * A clock that returns `start` and then advances one second per call.
 */
export function steppingClock(start: string = '2026-01-01T00:00:00.000Z'): () => Date {
  let tick = 0;
  const base = Date.parse(start);
  return () => new Date(base + 1000 * tick++);
}
