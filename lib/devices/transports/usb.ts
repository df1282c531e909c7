/**
 * Raw USB Transport
 * Plain bulk endpoints without USBTMC framing
 */

import type { Device } from 'usb';
import type { Transport, IoResult, Result } from '../types.js';
import { Ok, Err } from '../types.js';
import { TransportError } from '../errors.js';
import type { InstrumentError } from '../errors.js';
import {
  claimBulkEndpoints,
  releaseBulkEndpoints,
  transferOut,
  transferIn,
  clearHalts,
  transferError,
  formatUsbAddress,
  remainingMs,
} from './usb-endpoints.js';
import type { BulkEndpoints } from './usb-endpoints.js';

export interface RawUsbConfig {
  address?: string;
}

export function createRawUsbTransport(device: Device, config: RawUsbConfig = {}): Transport {
  const { address = formatUsbAddress(device) } = config;
  const context = { transport: 'usb' as const, address };
  let endpoints: BulkEndpoints | null = null;
  let pending = Buffer.alloc(0);

  function ready(): Result<BulkEndpoints, TransportError> {
    return endpoints ? Ok(endpoints) : Err(new TransportError('Device not opened', context));
  }

  // Reads whole max-packet-size chunks and appends them to `pending`.
  // `timeoutMs` covers the whole read, not each packet.
  async function readPacket(ep: BulkEndpoints, deadline: number, timeoutMs: number): Promise<Result<void, InstrumentError>> {
    const left = remainingMs(deadline);
    if (left === 0) return Err(transferError('timeout', 'usb', address, timeoutMs));
    const packetSize = ep.bulkIn.descriptor.wMaxPacketSize;
    const chunk = await transferIn(ep.bulkIn, packetSize, left);
    if (!chunk.ok) return Err(transferError(chunk.error, 'usb', address, timeoutMs));
    pending = Buffer.concat([pending, chunk.value]);
    return Ok();
  }

  return {
    kind: 'usb',
    address,

    async open(): IoResult {
      if (endpoints) return Ok();
      const claimed = claimBulkEndpoints(device, 'usb', address);
      if (!claimed.ok) return claimed;
      endpoints = claimed.value;
      pending = Buffer.alloc(0);
      return Ok();
    },

    async close(): IoResult {
      if (!endpoints) return Ok();
      const released = releaseBulkEndpoints(device, endpoints, 'usb', address);
      endpoints = null;
      return released;
    },

    async write(data: Buffer): IoResult {
      const state = ready();
      if (!state.ok) return state;
      const sent = await transferOut(state.value.bulkOut, data);
      return sent.ok ? sent : Err(transferError(sent.error, 'usb', address, 0));
    },

    async readUntil(terminator: Buffer, timeoutMs: number) {
      const state = ready();
      if (!state.ok) return state;
      const deadline = Date.now() + timeoutMs;
      let index = pending.indexOf(terminator);
      while (index === -1) {
        const read = await readPacket(state.value, deadline, timeoutMs);
        if (!read.ok) return read;
        index = pending.indexOf(terminator);
      }
      const line = Buffer.from(pending.subarray(0, index));
      pending = pending.subarray(index + terminator.length);
      return Ok(line);
    },

    async readExactly(length: number, timeoutMs: number) {
      const state = ready();
      if (!state.ok) return state;
      const deadline = Date.now() + timeoutMs;
      while (pending.length < length) {
        const read = await readPacket(state.value, deadline, timeoutMs);
        if (!read.ok) return read;
      }
      const data = Buffer.from(pending.subarray(0, length));
      pending = pending.subarray(length);
      return Ok(data);
    },

    async flushInput(): IoResult {
      pending = Buffer.alloc(0);
      return Ok();
    },

    isOpen(): boolean {
      return endpoints !== null;
    },

    async reset(): IoResult {
      const state = ready();
      if (!state.ok) return state;
      pending = Buffer.alloc(0);
      const cleared = await clearHalts(state.value);
      if (!cleared.ok) {
        return Err(new TransportError(`Failed to clear endpoint halt: ${cleared.error.message}`, {
          ...context,
          cause: cleared.error,
        }));
      }
      return Ok();
    },
  };
}
