import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { AuditLog, formatAuditLine } from '../audit-log.js';

const AT = new Date('2026-02-03T04:05:06.789Z');

describe('formatAuditLine', () => {
  it('formats a success', () => {
    expect(
      formatAuditLine({ timestamp: AT, name: 'get_forecast', primitiveType: 'tool', success: true }),
    ).toBe('2026-02-03T04:05:06.789Z|tool:get_forecast|OK');
  });

  it('appends the error of a failure', () => {
    expect(
      formatAuditLine({
        timestamp: AT,
        name: 'docs',
        primitiveType: 'resource',
        success: false,
        errorMessage: 'not found',
      }),
    ).toBe('2026-02-03T04:05:06.789Z|resource:docs|FAIL|not found');
  });

  it('flattens line breaks and truncates the error to 100 characters', () => {
    const line = formatAuditLine({
      timestamp: AT,
      name: 'x',
      primitiveType: 'tool',
      success: false,
      errorMessage: 'first\r\nsecond\n' + 'e'.repeat(200),
    });

    const error = line.split('|')[3];
    expect(error).toBe('first second ' + 'e'.repeat(87));
    expect(error).toHaveLength(100);
  });

  it('omits an empty error', () => {
    expect(
      formatAuditLine({ timestamp: AT, name: 'x', primitiveType: 'prompt', success: false, errorMessage: '' }),
    ).toBe('2026-02-03T04:05:06.789Z|prompt:x|FAIL');
  });
});

describe('AuditLog', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tally-audit-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('appends one line per event, creating parent directories', () => {
    const path = join(dir, 'logs', 'usage.log');
    const log = new AuditLog(path, true);

    log.write({ timestamp: AT, name: 'a', primitiveType: 'tool', success: true });
    log.write({ timestamp: AT, name: 'b', primitiveType: 'tool', success: false, errorMessage: 'bad' });

    expect(readFileSync(path, 'utf-8')).toBe(
      '2026-02-03T04:05:06.789Z|tool:a|OK\n2026-02-03T04:05:06.789Z|tool:b|FAIL|bad\n',
    );
  });

  it('writes nothing when disabled', () => {
    const path = join(dir, 'usage.log');
    const log = new AuditLog(path, false);
    log.write({ timestamp: AT, name: 'a', primitiveType: 'tool', success: true });
    expect(existsSync(path)).toBe(false);
    expect(log.isEnabled).toBe(false);
  });

  it('stops writing after close', () => {
    const path = join(dir, 'usage.log');
    const log = new AuditLog(path, true);
    log.write({ timestamp: AT, name: 'a', primitiveType: 'tool', success: true });
    log.close();
    log.close();
    log.write({ timestamp: AT, name: 'b', primitiveType: 'tool', success: true });

    expect(readFileSync(path, 'utf-8')).toBe('2026-02-03T04:05:06.789Z|tool:a|OK\n');
  });

  it('swallows write failures', () => {
    // The log path is an existing directory, so appending fails
    const log = new AuditLog(dir, true);
    expect(() =>
      log.write({ timestamp: AT, name: 'a', primitiveType: 'tool', success: true }),
    ).not.toThrow();
  });
});
