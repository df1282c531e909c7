/**
 * File Transport
 * Character-device channel (e.g. /dev/usbtmc0). Writes go through a
 * read/write handle; reads come from a separate read stream into a byte
 * queue, so a stalled read can be abandoned by destroying the stream.
 */

import { createReadStream } from 'node:fs';
import type { ReadStream } from 'node:fs';
import { open as openFile } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { Transport, IoResult, Result } from '../types.js';
import { Ok, Err } from '../types.js';
import { ConnectionError, TransportError, toError } from '../errors.js';
import { createByteQueue } from './byte-queue.js';
import type { ByteQueue } from './byte-queue.js';

export interface FileConfig {
  path: string;
}

interface OpenFile {
  handle: FileHandle;
  stream: ReadStream;
  queue: ByteQueue;
}

function openReadStream(path: string, queue: ByteQueue): Promise<ReadStream> {
  return new Promise((resolve, reject) => {
    const stream = createReadStream(path);
    stream.once('ready', () => {
      stream.removeAllListeners('error');
      resolve(stream);
    });
    stream.once('error', (err) => {
      stream.destroy();
      reject(err);
    });
    stream.on('data', (chunk) => {
      if (Buffer.isBuffer(chunk)) queue.push(chunk);
    });
  });
}

export function createFileTransport(config: FileConfig): Transport & { reset(): IoResult } {
  const { path } = config;
  const context = { transport: 'file' as const, address: path };
  let current: OpenFile | null = null;

  function ready(): Result<OpenFile, TransportError> {
    if (!current) return Err(new TransportError('File not open', context));
    return Ok(current);
  }

  const transport: Transport & { reset(): IoResult } = {
    kind: 'file',
    address: path,

    async open(): IoResult {
      if (current) return Ok();

      // Opened read/write first so that opening the read side of a FIFO does not block
      let handle: FileHandle;
      try {
        handle = await openFile(path, 'r+');
      } catch (e) {
        const cause = toError(e);
        return Err(new ConnectionError(`Failed to open ${path}: ${cause.message}`, { ...context, cause }));
      }

      const queue = createByteQueue({ kind: 'file', address: path });
      let stream: ReadStream;
      try {
        stream = await openReadStream(path, queue);
      } catch (e) {
        const cause = toError(e);
        await handle.close();
        return Err(new ConnectionError(`Failed to open ${path} for reading: ${cause.message}`, { ...context, cause }));
      }

      stream.on('error', (err) => {
        queue.end(new TransportError(`Read failed: ${err.message}`, { ...context, cause: err }));
      });
      // Reads still pending after the buffer drains fail with FramingError
      stream.on('end', () => queue.end());

      current = { handle, stream, queue };
      return Ok();
    },

    async close(): IoResult {
      const state = current;
      if (!state) return Ok();
      current = null;

      state.queue.end(new TransportError('File closed', context));
      state.stream.removeAllListeners('data');
      state.stream.destroy();
      try {
        await state.handle.close();
      } catch (e) {
        const cause = toError(e);
        return Err(new ConnectionError(`Failed to close ${path}: ${cause.message}`, { ...context, cause }));
      }
      return Ok();
    },

    async write(data: Buffer): IoResult {
      const state = ready();
      if (!state.ok) return state;
      try {
        await state.value.handle.write(data, 0, data.length, null);
      } catch (e) {
        const cause = toError(e);
        return Err(new TransportError(`Write failed: ${cause.message}`, { ...context, cause }));
      }
      return Ok();
    },

    async readUntil(terminator: Buffer, timeoutMs: number) {
      const state = ready();
      if (!state.ok) return state;
      return state.value.queue.readUntil(terminator, timeoutMs);
    },

    async readExactly(length: number, timeoutMs: number) {
      const state = ready();
      if (!state.ok) return state;
      return state.value.queue.readExactly(length, timeoutMs);
    },

    async flushInput(): IoResult {
      const state = ready();
      if (!state.ok) return state;
      state.value.queue.clear();
      return Ok();
    },

    isOpen(): boolean {
      return current !== null;
    },

    async reset(): IoResult {
      const closed = await transport.close();
      if (!closed.ok) return closed;
      return transport.open();
    },
  };

  return transport;
}
