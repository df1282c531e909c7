/**
 * Byte Queue
 * Buffers bytes pushed by a stream backend until a reader asks for a
 * terminated line or an exact number of bytes.
 */

import type { Result, TransportKind } from '../types.js';
import { Ok, Err } from '../types.js';
import { FramingError, TimeoutError, TransportError } from '../errors.js';
import type { InstrumentError } from '../errors.js';

export interface ByteQueueOptions {
  kind: TransportKind;
  address: string;
  /** Whether a read timeout leaves the queue usable (stream backends: yes) */
  reusableTimeout?: boolean;
}

export interface ByteQueue {
  push(chunk: Buffer): void;
  /** No more data will arrive. Pending and later reads fail once the buffer is drained. */
  end(error?: InstrumentError): void;
  readUntil(terminator: Buffer, timeoutMs: number): Promise<Result<Buffer, InstrumentError>>;
  readExactly(length: number, timeoutMs: number): Promise<Result<Buffer, InstrumentError>>;
  clear(): void;
  readonly length: number;
  readonly ended: boolean;
}

export function createByteQueue(options: ByteQueueOptions): ByteQueue {
  const { kind, address, reusableTimeout = true } = options;
  let buffer = Buffer.alloc(0);
  let ended = false;
  let endError: InstrumentError | null = null;
  let waiter: (() => void) | null = null;

  function take(length: number, skip: number): Buffer {
    const out = Buffer.from(buffer.subarray(0, length));
    buffer = buffer.subarray(length + skip);
    return out;
  }

  function waitFor(
    extract: () => Buffer | null,
    timeoutMs: number,
    describe: string
  ): Promise<Result<Buffer, InstrumentError>> {
    return new Promise(resolve => {
      if (waiter) {
        resolve(Err(new TransportError('Another read is already pending', { transport: kind, address })));
        return;
      }

      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const settle = (result: Result<Buffer, InstrumentError>) => {
        clearTimeout(timeoutId);
        waiter = null;
        resolve(result);
      };

      const attempt = (): boolean => {
        const value = extract();
        if (value !== null) {
          settle(Ok(value));
          return true;
        }
        if (ended) {
          const partial = buffer.toString('latin1');
          settle(Err(endError ?? new FramingError(`Stream ended while waiting for ${describe}`, {
            transport: kind,
            address,
            partial,
          })));
          return true;
        }
        return false;
      };

      if (attempt()) return;

      waiter = () => { attempt(); };
      timeoutId = setTimeout(() => {
        waiter = null;
        resolve(Err(new TimeoutError(
          `Timeout after ${timeoutMs}ms waiting for ${describe}`,
          timeoutMs,
          reusableTimeout,
          { transport: kind, address }
        )));
      }, timeoutMs);
    });
  }

  return {
    push(chunk: Buffer): void {
      if (ended || chunk.length === 0) return;
      buffer = buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([buffer, chunk]);
      waiter?.();
    },

    end(error?: InstrumentError): void {
      if (ended) return;
      ended = true;
      endError = error ?? null;
      waiter?.();
    },

    readUntil(terminator: Buffer, timeoutMs: number) {
      if (terminator.length === 0) {
        return Promise.resolve(Err(new TransportError('Empty read terminator', { transport: kind, address })));
      }
      return waitFor(() => {
        const index = buffer.indexOf(terminator);
        return index === -1 ? null : take(index, terminator.length);
      }, timeoutMs, 'terminator');
    },

    readExactly(length: number, timeoutMs: number) {
      return waitFor(
        () => (buffer.length >= length ? take(length, 0) : null),
        timeoutMs,
        `${length} bytes`
      );
    },

    clear(): void {
      buffer = Buffer.alloc(0);
    },

    get length() {
      return buffer.length;
    },

    get ended() {
      return ended;
    },
  };
}
