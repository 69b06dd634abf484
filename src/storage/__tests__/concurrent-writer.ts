/**
 * Standalone script forked by concurrency tests for true multi-process testing.
 *
 * Receives dbPath, primitive name, and count via process.argv.
 * Opens its own Tally, records `count` invocations of the name,
 * then closes and exits with code 0.
 *
 * On any error: logs to stderr and exits with code 1.
 *
 * This file is NOT a test -- it is forked by concurrency.test.ts.
 */

import { Tally } from '../../tally.js';

const args = process.argv.slice(2);
const dbPath = args[0];
const name = args[1];
const count = parseInt(args[2], 10);

if (!dbPath || !name || isNaN(count)) {
  console.error('Usage: concurrent-writer.ts <dbPath> <name> <count>');
  process.exit(1);
}

try {
  const tally = new Tally({ dbPath, serverName: 'concurrency-test' });

  for (let i = 0; i < count; i++) {
    tally.record(name, 'tool', { durationMs: i % 7, responseChars: 35 });
  }

  tally.close();
  process.exit(0);
} catch (err) {
  console.error('concurrent-writer error:', err);
  process.exit(1);
}
