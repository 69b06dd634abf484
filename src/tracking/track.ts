import { errorMessage } from '../shared/errors.js';
import type { PrimitiveType, RecordOptions } from '../shared/types.js';

/**
 * Anything that accepts invocation records. `Tally` satisfies it.
 */
export interface UsageRecorder {
  record(name: string, primitiveType?: string, options?: RecordOptions): void;
}

function elapsedMs(start: number): number {
  return Math.floor(performance.now() - start);
}

/**
 * Runs `fn` and records one invocation of `name` with its duration, whether
 * `fn` resolves or throws. A thrown error is recorded as a failure and
 * rethrown unchanged.
 *
 * @example
 * const forecast = await tracking(tally, 'get_forecast', 'tool', () => fetchForecast(city));
 */
export async function tracking<R>(
  recorder: UsageRecorder,
  name: string,
  primitiveType: PrimitiveType,
  fn: () => R | Promise<R>,
): Promise<R> {
  const start = performance.now();
  try {
    const result = await fn();
    recorder.record(name, primitiveType, { durationMs: elapsedMs(start) });
    return result;
  } catch (err) {
    recorder.record(name, primitiveType, {
      success: false,
      errorMessage: errorMessage(err),
      durationMs: elapsedMs(start),
    });
    throw err;
  }
}

/**
 * Wraps a handler so every call goes through {@link tracking}.
 *
 * @example
 * const handler = track(tally, 'get_forecast', 'tool', async (args: ForecastArgs) => ...);
 */
export function track<A extends unknown[], R>(
  recorder: UsageRecorder,
  name: string,
  primitiveType: PrimitiveType,
  fn: (...args: A) => R | Promise<R>,
): (...args: A) => Promise<R> {
  return (...args: A) => tracking(recorder, name, primitiveType, () => fn(...args));
}
