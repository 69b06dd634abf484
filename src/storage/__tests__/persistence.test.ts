import { describe, it, expect, afterEach } from 'vitest';

import { Tally } from '../../tally.js';
import { createTempDb, steppingClock } from './test-utils.js';

describe('Persistence: Cross-session data survival', () => {
  let cleanup: () => void;

  afterEach(() => {
    cleanup?.();
  });

  it('usage and metadata survive close/reopen', () => {
    const temp = createTempDb();
    cleanup = temp.cleanup;

    // Session 1: record and catalog
    const first = new Tally({ dbPath: temp.config.dbPath }, { now: steppingClock() });
    first.syncTools([{ name: 'get_forecast', description: 'Forecast for a city. Uses a cache.' }]);
    first.record('get_forecast', 'tool', { durationMs: 120, inputTokens: 40, outputTokens: 60 });
    first.record('get_forecast', 'tool', { durationMs: 80 });
    first.close();

    // Session 2: reopen and verify
    const second = new Tally({ dbPath: temp.config.dbPath });
    const stats = second.getStats();
    const catalog = second.getCatalog();
    second.close();

    expect(stats.stats).toEqual([
      {
        name: 'get_forecast',
        type: 'tool',
        call_count: 2,
        // clock: sync at +0s, records at +1s and +2s
        last_accessed: '2026-01-01T00:00:02.000Z',
        created_at: '2026-01-01T00:00:00.000Z',
        tags: ['forecast'],
        short_description: 'Forecast for a city.',
        full_description: 'Forecast for a city. Uses a cache.',
        total_input_tokens: 40,
        total_output_tokens: 60,
        total_response_chars: 0,
        estimated_tokens: 0,
        avg_tokens_per_call: 50,
        total_duration_ms: 200,
        min_duration_ms: 80,
        max_duration_ms: 120,
        avg_latency_ms: 100,
      },
    ]);
    expect(catalog.total_tracked).toBe(1);
    expect(catalog.results[0].call_count).toBe(2);
  });
});
