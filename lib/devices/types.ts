// Re-export shared types
export * from '../../shared/types.js';

import type {
  Result,
  TransportKind,
  NewlinePolicy,
  TextEncoding,
} from '../../shared/types.js';
import type { InstrumentError } from './errors.js';

export type IoResult<T = void> = Promise<Result<T, InstrumentError>>;

/**
 * Raw duplex byte channel. Only the owning communicator touches it.
 */
export interface Transport {
  readonly kind: TransportKind;
  readonly address: string;

  open(): IoResult;
  close(): IoResult;
  write(data: Buffer): IoResult;
  /** Read up to and including `terminator`; the returned bytes exclude it. */
  readUntil(terminator: Buffer, timeoutMs: number): IoResult<Buffer>;
  readExactly(length: number, timeoutMs: number): IoResult<Buffer>;
  /** Discard anything already received. */
  flushInput(): IoResult;
  isOpen(): boolean;
  /** Clear a stalled transfer so the transport can be reused after a timeout. */
  reset?(): IoResult;
}

export interface CommunicatorOptions {
  /** Input terminator, e.g. "\n", "\r\n" or a custom multi-byte sequence (default "\n") */
  terminator?: string;
  /** Output terminator (default: same as input) */
  outputTerminator?: string;
  newline?: NewlinePolicy;
  timeoutMs?: number;
  encoding?: TextEncoding;
  /** Log every exchanged line with console.debug */
  debug?: boolean;
}

/**
 * Transport-agnostic line contract.
 *
 * `query` and `sendcmd` hold the exclusive lock for their whole exchange.
 * The `*Unlocked` primitives exist for multi-step transactions run inside
 * `withLock` and must not be called outside it.
 */
export interface Communicator {
  readonly kind: TransportKind;
  readonly address: string;

  readonly terminator: string;
  readonly outputTerminator: string;
  readonly timeoutMs: number;
  debug: boolean;

  /** Change the input terminator (and optionally a distinct output one). */
  setTerminator(input: string, output?: string): Result<void, InstrumentError>;
  setTimeout(ms: number): Result<void, InstrumentError>;

  sendcmd(text: string): IoResult;
  query(text: string): IoResult<string>;
  /** Read one line under the lock (e.g. an acknowledgement or prompt). */
  readLine(): IoResult<string>;
  readBytes(length: number): IoResult<Buffer>;

  withLock<T>(fn: () => Promise<T>): Promise<T>;
  sendLineUnlocked(text: string): IoResult;
  readLineUnlocked(): IoResult<string>;
  readBytesUnlocked(length: number): IoResult<Buffer>;

  flushInput(): IoResult;
  /** Reset the underlying transport after a non-reusable timeout. */
  reset(): IoResult;
  close(): IoResult;
  isOpen(): boolean;
}

/** Serial line settings shared by the serial backend and the URI factory. */
export interface SerialSettings {
  baudRate: number;
  dataBits?: 5 | 6 | 7 | 8;
  parity?: 'none' | 'even' | 'odd' | 'mark' | 'space';
  stopBits?: 1 | 1.5 | 2;
}
