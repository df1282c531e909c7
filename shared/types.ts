// Shared types for the transport, communicator and property layers

// ============ Result Type ============
// Use Result<T, E> instead of throwing exceptions.
// Try/catch only at boundaries (transport layer wrapping external libs).

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// Helper constructors
export function Ok(): Result<void, never>;
export function Ok<T>(value: T): Result<T, never>;
export function Ok<T>(value?: T): Result<T | undefined, never> {
  return { ok: true, value };
}
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// Result utilities for ergonomic chaining
export const Result = {
  /** Transform the success value */
  map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
    return result.ok ? Ok(fn(result.value)) : result;
  },

  /** Chain operations that return Result (flatMap) */
  andThen<T, U, E>(result: Result<T, E>, fn: (value: T) => Result<U, E>): Result<U, E> {
    return result.ok ? fn(result.value) : result;
  },

  /** Get value or return default */
  unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
    return result.ok ? result.value : defaultValue;
  },

  /** Combine multiple Results - returns first error or all values */
  all<T, E>(results: Result<T, E>[]): Result<T[], E> {
    const values: T[] = [];
    for (const result of results) {
      if (!result.ok) return result;
      values.push(result.value);
    }
    return Ok(values);
  },

  /** Map error type */
  mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
    return result.ok ? result : Err(fn(result.error));
  },
};

// ============ Transport Types ============

export type TransportKind =
  | 'serial'
  | 'gpib-usb'
  | 'socket'
  | 'visa'
  | 'usbtmc'
  | 'usb'
  | 'file'
  | 'loopback';

/**
 * How a `\n` embedded in an outgoing payload is written.
 * - preserve: sent as-is
 * - translate: replaced by the output terminator
 * - strip: removed
 */
export type NewlinePolicy = 'preserve' | 'translate' | 'strip';

export type TextEncoding = 'ascii' | 'latin1' | 'utf8';

// ============ Quantity Types ============

export interface Quantity {
  value: number;
  unit: string;
}

export type Dimension =
  | 'dimensionless'
  | 'voltage'
  | 'current'
  | 'power'
  | 'frequency'
  | 'time'
  | 'resistance'
  | 'capacitance'
  | 'inductance'
  | 'length'
  | 'mass'
  | 'temperature'
  | 'angle'
  | 'magnetic-field'
  | 'pressure'
  | 'energy'
  | 'charge'
  | 'ratio-db'
  | 'power-db';
