import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { debug } from '../shared/debug.js';
import { errorMessage } from '../shared/errors.js';

/** Longest error text kept on an audit line. */
export const AUDIT_ERROR_MAX = 100;

export interface AuditEvent {
  timestamp: Date;
  name: string;
  primitiveType: string;
  success: boolean;
  errorMessage?: string;
}

/**
 * Formats one audit line (no trailing newline):
 * `2026-01-01T00:00:00.000Z|tool:get_forecast|FAIL|upstream timeout`
 */
export function formatAuditLine(event: AuditEvent): string {
  let line = `${event.timestamp.toISOString()}|${event.primitiveType}:${event.name}|${event.success ? 'OK' : 'FAIL'}`;
  if (event.errorMessage) {
    line += `|${event.errorMessage.replace(/[\r\n]+/g, ' ').slice(0, AUDIT_ERROR_MAX)}`;
  }
  return line;
}

/**
 * Append-only text log with one line per invocation.
 *
 * When disabled every call is a no-op. Write failures are logged under the
 * `audit` debug category and never reach the caller.
 */
export class AuditLog {
  readonly path: string;
  private enabled: boolean;
  private dirReady = false;

  constructor(path: string, enabled: boolean) {
    this.path = path;
    this.enabled = enabled;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  write(event: AuditEvent): void {
    if (!this.enabled) return;
    try {
      if (!this.dirReady) {
        mkdirSync(dirname(this.path), { recursive: true });
        this.dirReady = true;
      }
      appendFileSync(this.path, formatAuditLine(event) + '\n', 'utf-8');
    } catch (err) {
      debug('audit', 'Audit write failed', { path: this.path, error: errorMessage(err) });
    }
  }

  close(): void {
    this.enabled = false;
  }
}
