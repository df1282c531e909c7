/**
 * Loopback Transport
 * In-memory channel with fixed inbound bytes and recorded outbound bytes.
 * Used by the protocol harness and by tests that inspect exchange order.
 */

import type { Transport, IoResult } from '../types.js';
import { Ok, Err } from '../types.js';
import { TransportError } from '../errors.js';
import { createByteQueue } from './byte-queue.js';
import { delay } from '../timing.js';

export type ProtocolDirection = 'out' | 'in';

export interface ProtocolEntry {
  direction: ProtocolDirection;
  data: Buffer;
}

export type ProtocolTranscript = readonly ProtocolEntry[];

export interface LoopbackConfig {
  /** Bytes the "instrument" will send, in order */
  input?: Buffer | string;
  name?: string;
  /** Simulated latency applied to every write and read (ms) */
  latency?: number;
}

export interface LoopbackTransport extends Transport {
  /** Everything written so far, concatenated */
  output(): Buffer;
  transcript(): ProtocolTranscript;
  /** Inbound bytes not consumed yet */
  remaining(): number;
}

export function createLoopbackTransport(config: LoopbackConfig = {}): LoopbackTransport {
  const { input = '', name = 'loopback', latency = 0 } = config;
  const context = { transport: 'loopback' as const, address: name };
  const queue = createByteQueue({ kind: 'loopback', address: name });
  const written: Buffer[] = [];
  const transcript: ProtocolEntry[] = [];
  let opened = false;

  queue.push(typeof input === 'string' ? Buffer.from(input, 'latin1') : input);
  queue.end();

  async function settle(): Promise<void> {
    if (latency > 0) await delay(latency);
  }

  function notOpen() {
    return Err(new TransportError('Loopback transport is closed', context));
  }

  return {
    kind: 'loopback',
    address: name,

    async open(): IoResult {
      opened = true;
      return Ok();
    },

    async close(): IoResult {
      opened = false;
      return Ok();
    },

    async write(data: Buffer): IoResult {
      if (!opened) return notOpen();
      await settle();
      const copy = Buffer.from(data);
      written.push(copy);
      transcript.push({ direction: 'out', data: copy });
      return Ok();
    },

    async readUntil(terminator: Buffer, timeoutMs: number) {
      if (!opened) return notOpen();
      await settle();
      const result = await queue.readUntil(terminator, timeoutMs);
      if (result.ok) transcript.push({ direction: 'in', data: result.value });
      return result;
    },

    async readExactly(length: number, timeoutMs: number) {
      if (!opened) return notOpen();
      await settle();
      const result = await queue.readExactly(length, timeoutMs);
      if (result.ok) transcript.push({ direction: 'in', data: result.value });
      return result;
    },

    async flushInput(): IoResult {
      if (!opened) return notOpen();
      return Ok();
    },

    isOpen(): boolean {
      return opened;
    },

    output(): Buffer {
      return Buffer.concat(written);
    },

    transcript(): ProtocolTranscript {
      return transcript;
    },

    remaining(): number {
      return queue.length;
    },
  };
}
