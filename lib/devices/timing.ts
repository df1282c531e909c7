import type { Result } from '../../shared/types.js';
import { Err } from '../../shared/types.js';
import type { InstrumentError } from './errors.js';

export const delay = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

/**
 * Resolve with `operation`, or with the error from `onTimeout` if it has not
 * settled within `ms`. The operation itself is not cancelled.
 */
export function withDeadline<T>(
  operation: Promise<Result<T, InstrumentError>>,
  ms: number,
  onTimeout: () => InstrumentError
): Promise<Result<T, InstrumentError>> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<Result<T, InstrumentError>>(resolve => {
    timeoutId = setTimeout(() => resolve(Err(onTimeout())), ms);
  });
  return Promise.race([operation, timeout]).finally(() => clearTimeout(timeoutId));
}
