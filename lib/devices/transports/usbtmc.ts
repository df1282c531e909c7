/**
 * USB-TMC (Test & Measurement Class) Transport
 * Frames bytes into DEV_DEP_MSG_OUT / REQUEST_DEV_DEP_MSG_IN bulk messages
 */

import type { Device } from 'usb';
import type { Transport, IoResult, Result } from '../types.js';
import { Ok, Err } from '../types.js';
import { FramingError, TransportError } from '../errors.js';
import type { InstrumentError } from '../errors.js';
import {
  claimBulkEndpoints,
  releaseBulkEndpoints,
  transferOut,
  transferIn,
  clearHalts,
  transferError,
  isFatalError,
  formatUsbAddress,
  remainingMs,
} from './usb-endpoints.js';
import type { BulkEndpoints } from './usb-endpoints.js';

// USB-TMC Message IDs
export const DEV_DEP_MSG_OUT = 1;
export const REQUEST_DEV_DEP_MSG_IN = 2;

const HEADER_SIZE = 12;
const EOM = 0x01;

export interface USBTMCConfig {
  /** Largest message requested per REQUEST_DEV_DEP_MSG_IN (default: 64 KiB) */
  maxTransferSize?: number;
  /** USB packet read size (default: 512) */
  packetSize?: number;
  address?: string;
}

export function buildDevDepMsgOut(message: Buffer | string, bTag: number): Buffer {
  const msgBytes = typeof message === 'string' ? Buffer.from(message, 'ascii') : message;

  // Header: 12 bytes + message + padding to 4-byte boundary
  const paddedLen = Math.ceil((HEADER_SIZE + msgBytes.length) / 4) * 4;
  const buf = Buffer.alloc(paddedLen);

  buf[0] = DEV_DEP_MSG_OUT;      // MsgID
  buf[1] = bTag;                  // bTag
  buf[2] = ~bTag & 0xFF;         // bTagInverse
  buf[3] = 0;                     // Reserved
  buf.writeUInt32LE(msgBytes.length, 4);  // TransferSize
  buf[8] = EOM;                   // bmTransferAttributes
  msgBytes.copy(buf, HEADER_SIZE);

  return buf;
}

export function buildRequestDevDepMsgIn(maxLength: number, bTag: number): Buffer {
  const buf = Buffer.alloc(HEADER_SIZE);

  buf[0] = REQUEST_DEV_DEP_MSG_IN;  // MsgID
  buf[1] = bTag;                     // bTag
  buf[2] = ~bTag & 0xFF;            // bTagInverse
  buf[3] = 0;                        // Reserved
  buf.writeUInt32LE(maxLength, 4);   // TransferSize
  buf[8] = 0;                        // bmTransferAttributes
  buf[9] = 0;                        // TermChar

  return buf;
}

export interface DevDepMsgIn {
  data: Buffer;
  eom: boolean;
}

export function parseDevDepMsgIn(response: Buffer): Result<DevDepMsgIn, FramingError> {
  if (response.length < HEADER_SIZE) {
    return Err(new FramingError(
      `USBTMC response too short: ${response.length} bytes (need at least ${HEADER_SIZE})`,
      { transport: 'usbtmc' }
    ));
  }
  const transferSize = response.readUInt32LE(4);
  const eom = (response[8] & EOM) !== 0;
  const data = response.subarray(HEADER_SIZE, HEADER_SIZE + transferSize);
  return Ok({ data, eom });
}

// Tag generator - cycles 1-255
export function createTagGenerator(): () => number {
  let bTag = 0;
  return () => {
    bTag = (bTag % 255) + 1;
    return bTag;
  };
}

export function createUSBTMCTransport(device: Device, config: USBTMCConfig = {}): Transport {
  const {
    maxTransferSize = 64 * 1024,
    packetSize = 512,
    address = formatUsbAddress(device),
  } = config;
  const context = { transport: 'usbtmc' as const, address };
  const nextTag = createTagGenerator();
  let endpoints: BulkEndpoints | null = null;
  let disconnected = false;
  let disconnectError: TransportError | null = null;
  // Bytes received past the terminator of the previous read
  let pending = Buffer.alloc(0);

  function ready(): Result<BulkEndpoints, TransportError> {
    if (disconnected) {
      return Err(disconnectError ?? new TransportError('USB device disconnected', context));
    }
    if (!endpoints) return Err(new TransportError('Device not opened', context));
    return Ok(endpoints);
  }

  function fail(failure: Error | 'timeout', timeoutMs: number): InstrumentError {
    const error = transferError(failure, 'usbtmc', address, timeoutMs);
    if (failure !== 'timeout' && isFatalError(failure) && error instanceof TransportError) {
      disconnected = true;
      disconnectError = error;
    }
    return error;
  }

  async function send(ep: BulkEndpoints, packet: Buffer, timeoutMs: number): Promise<Result<void, InstrumentError>> {
    const sent = await transferOut(ep.bulkOut, packet);
    return sent.ok ? sent : Err(fail(sent.error, timeoutMs));
  }

  // Request one device-dependent message and read it, possibly over several
  // packets. Every packet must arrive before `deadline`.
  async function readMessage(
    ep: BulkEndpoints,
    maxLength: number,
    deadline: number,
    timeoutMs: number
  ): Promise<Result<DevDepMsgIn, InstrumentError>> {
    if (remainingMs(deadline) === 0) return Err(fail('timeout', timeoutMs));
    const requested = await send(ep, buildRequestDevDepMsgIn(maxLength, nextTag()), timeoutMs);
    if (!requested.ok) return requested;

    const chunks: Buffer[] = [];
    let received = 0;
    let transferSize = -1;

    while (transferSize < 0 || received < HEADER_SIZE + transferSize) {
      const left = remainingMs(deadline);
      if (left === 0) return Err(fail('timeout', timeoutMs));
      const chunk = await transferIn(ep.bulkIn, packetSize, left);
      if (!chunk.ok) return Err(fail(chunk.error, timeoutMs));
      if (chunk.value.length === 0) break;
      chunks.push(chunk.value);
      received += chunk.value.length;

      if (transferSize < 0 && received >= HEADER_SIZE) {
        transferSize = Buffer.concat(chunks).readUInt32LE(4);
      }
    }

    const parsed = parseDevDepMsgIn(Buffer.concat(chunks));
    if (!parsed.ok) return Err(new FramingError(parsed.error.message, context));
    return parsed;
  }

  return {
    kind: 'usbtmc',
    address,

    async open(): IoResult {
      if (endpoints) return Ok();
      const claimed = claimBulkEndpoints(device, 'usbtmc', address);
      if (!claimed.ok) return claimed;
      endpoints = claimed.value;
      disconnected = false;
      disconnectError = null;
      pending = Buffer.alloc(0);
      return Ok();
    },

    async close(): IoResult {
      if (!endpoints && !disconnected) return Ok();
      const released = releaseBulkEndpoints(device, endpoints, 'usbtmc', address);
      endpoints = null;
      disconnected = false;
      disconnectError = null;
      return released;
    },

    async write(data: Buffer): IoResult {
      const state = ready();
      if (!state.ok) return state;
      return send(state.value, buildDevDepMsgOut(data, nextTag()), 0);
    },

    // Messages are requested until the terminator shows up or the device flags
    // EOM; an EOM without terminator ends the line as well.
    async readUntil(terminator: Buffer, timeoutMs: number) {
      const state = ready();
      if (!state.ok) return state;

      const deadline = Date.now() + timeoutMs;
      let data = pending;
      for (;;) {
        const index = data.indexOf(terminator);
        if (index !== -1) {
          pending = data.subarray(index + terminator.length);
          return Ok(Buffer.from(data.subarray(0, index)));
        }
        const message = await readMessage(state.value, maxTransferSize, deadline, timeoutMs);
        if (!message.ok) return message;
        data = Buffer.concat([data, message.value.data]);
        if (message.value.eom && data.indexOf(terminator) === -1) {
          pending = Buffer.alloc(0);
          return Ok(data);
        }
      }
    },

    async readExactly(length: number, timeoutMs: number) {
      const state = ready();
      if (!state.ok) return state;

      const deadline = Date.now() + timeoutMs;
      let data = pending;
      while (data.length < length) {
        const message = await readMessage(
          state.value,
          Math.min(maxTransferSize, length - data.length),
          deadline,
          timeoutMs
        );
        if (!message.ok) return message;
        if (message.value.data.length === 0 && message.value.eom) {
          return Err(new FramingError(`Message ended after ${data.length} of ${length} bytes`, {
            ...context,
            partial: data.toString('latin1'),
          }));
        }
        data = Buffer.concat([data, message.value.data]);
      }
      pending = data.subarray(length);
      return Ok(Buffer.from(data.subarray(0, length)));
    },

    async flushInput(): IoResult {
      pending = Buffer.alloc(0);
      return Ok();
    },

    isOpen(): boolean {
      return endpoints !== null && !disconnected;
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
