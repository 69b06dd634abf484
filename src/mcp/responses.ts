import { errorMessage } from '../shared/errors.js';

export function textResponse(text: string) {
  return { content: [{ type: 'text' as const, text }] };
}

export function jsonResponse(payload: unknown) {
  return textResponse(JSON.stringify(payload, null, 2));
}

export function errorResponse(text: string) {
  return { content: [{ type: 'text' as const, text }], isError: true };
}

/**
 * Error text for a failed handler: `<prefix>: <message>`.
 */
export function describeError(prefix: string, err: unknown): string {
  return `${prefix}: ${errorMessage(err)}`;
}
