/**
 * Instrument Errors
 *
 * Every failure surfaced by the transport, communicator and property layers
 * is an InstrumentError. The `kind` field lets callers branch without
 * instanceof checks; subclasses add the context needed to diagnose a
 * protocol mismatch (command text, transport, address).
 */

import type { TransportKind } from '../../shared/types.js';

export type InstrumentErrorKind =
  | 'connection'
  | 'transport'
  | 'timeout'
  | 'framing'
  | 'decode'
  | 'validation'
  | 'index'
  | 'acknowledgement'
  | 'prompt';

export interface ErrorContext {
  command?: string;
  transport?: TransportKind;
  address?: string;
  cause?: unknown;
}

export class InstrumentError extends Error {
  readonly kind: InstrumentErrorKind;
  /** Filled in by the communicator when the failing exchange is known */
  command?: string;
  readonly transport?: TransportKind;
  readonly address?: string;

  constructor(kind: InstrumentErrorKind, message: string, context: ErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.command = context.command;
    this.transport = context.transport;
    this.address = context.address;
  }
}

/** Backend open/close failure. */
export class ConnectionError extends InstrumentError {
  constructor(message: string, context: ErrorContext = {}) {
    super('connection', message, context);
  }
}

/** Write failure, use after close, or unexpected disconnect. */
export class TransportError extends InstrumentError {
  constructor(message: string, context: ErrorContext = {}) {
    super('transport', message, context);
  }
}

/**
 * A read or write did not finish before the deadline.
 * No terminator arrived before the deadline.
 * `reusable` is false for USB-class transports and for stalled writes, which need `reset()` first.
 */
export class TimeoutError extends InstrumentError {
  readonly timeoutMs: number;
  readonly reusable: boolean;

  constructor(message: string, timeoutMs: number, reusable: boolean, context: ErrorContext = {}) {
    super('timeout', message, context);
    this.timeoutMs = timeoutMs;
    this.reusable = reusable;
  }
}

/** Stream closed mid-read, or a malformed/truncated response. */
export class FramingError extends InstrumentError {
  readonly partial?: string;

  constructor(message: string, context: ErrorContext & { partial?: string } = {}) {
    super('framing', message, context);
    this.partial = context.partial;
  }
}

/** Response text does not match the declared value kind. */
export class DecodeError extends InstrumentError {
  readonly response: string;

  constructor(message: string, response: string, context: ErrorContext = {}) {
    super('decode', message, context);
    this.response = response;
  }
}

/** Input rejected before any I/O. */
export class ValidationError extends InstrumentError {
  constructor(message: string, context: ErrorContext = {}) {
    super('validation', message, context);
  }
}

/** Invalid logical index into a sub-device collection. */
export class IndexError extends InstrumentError {
  readonly index: string | number;

  constructor(message: string, index: string | number) {
    super('index', message);
    this.index = index;
  }
}

export class AcknowledgementError extends InstrumentError {
  constructor(expected: string, received: string, context: ErrorContext = {}) {
    super('acknowledgement', `Incorrect ACK message received: got "${received}" expected "${expected}"`, context);
  }
}

export class PromptError extends InstrumentError {
  constructor(expected: string, received: string, context: ErrorContext = {}) {
    super('prompt', `Incorrect prompt message received: got "${received}" expected "${expected}"`, context);
  }
}

/** Normalize anything thrown by an external library into an Error. */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
