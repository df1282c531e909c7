/**
 * VISA Session Transport
 * Maps VISA resource strings onto the native socket, serial and USBTMC backends.
 */

import type { Device } from 'usb';
import type { Transport, IoResult, Result } from '../types.js';
import { Ok, Err } from '../types.js';
import { ConnectionError, TransportError } from '../errors.js';
import { createSocketTransport } from './socket.js';
import { createSerialTransport } from './serial.js';
import { createUSBTMCTransport } from './usbtmc.js';
import { findUsbDevice } from './usb-endpoints.js';

export type VisaResource =
  | { type: 'socket'; host: string; port: number }
  | { type: 'serial'; path: string }
  | { type: 'usb'; vendorId: number; productId: number; serialNumber?: string };

export interface VisaConfig {
  baudRate: number;
  connectTimeout?: number;
  /** Device lookup (defaults to the `usb` package's findByIds) */
  findDevice?: (vendorId: number, productId: number) => Device | null;
}

const SOCKET_RESOURCE = /^TCPIP\d*::([^:]+)::(\d+)::SOCKET$/i;
const INSTR_RESOURCE = /^TCPIP\d*::([^:]+)(::[^:]+)?::INSTR$/i;
const SERIAL_RESOURCE = /^ASRL(.+)::INSTR$/i;
const USB_RESOURCE = /^USB\d*::(0x[0-9a-f]+|\d+)::(0x[0-9a-f]+|\d+)(?:::([^:]+))?(?:::(\d+))?::INSTR$/i;

function parseId(text: string): number {
  return text.toLowerCase().startsWith('0x') ? parseInt(text.slice(2), 16) : parseInt(text, 10);
}

export function parseVisaResource(resource: string): Result<VisaResource, ConnectionError> {
  const context = { transport: 'visa' as const, address: resource };

  const socket = SOCKET_RESOURCE.exec(resource);
  if (socket) {
    return Ok({ type: 'socket', host: socket[1], port: parseInt(socket[2], 10) });
  }

  if (INSTR_RESOURCE.test(resource)) {
    return Err(new ConnectionError('VXI-11 INSTR resources are not supported; use a ::SOCKET resource', context));
  }

  const serial = SERIAL_RESOURCE.exec(resource);
  if (serial) {
    const port = serial[1];
    // ASRL3::INSTR names COM3
    return Ok({ type: 'serial', path: /^\d+$/.test(port) ? `COM${port}` : port });
  }

  const usbMatch = USB_RESOURCE.exec(resource);
  if (usbMatch) {
    return Ok({
      type: 'usb',
      vendorId: parseId(usbMatch[1]),
      productId: parseId(usbMatch[2]),
      serialNumber: usbMatch[3],
    });
  }

  return Err(new ConnectionError(`Unrecognized VISA resource string: ${resource}`, context));
}

/**
 * The backend is chosen from the resource string up front; a USB device is
 * looked up when the session opens.
 */
export function createVisaTransport(resource: string, config: VisaConfig): Result<Transport, ConnectionError> {
  const parsed = parseVisaResource(resource);
  if (!parsed.ok) return parsed;
  const target = parsed.value;
  const { baudRate, connectTimeout, findDevice = findUsbDevice } = config;
  const context = { transport: 'visa' as const, address: resource };

  let inner: Transport | null = null;

  function createInner(): Result<Transport, ConnectionError> {
    switch (target.type) {
      case 'socket':
        return Ok(createSocketTransport({ host: target.host, port: target.port, connectTimeout }));
      case 'serial':
        return Ok(createSerialTransport({ path: target.path, baudRate }));
      case 'usb': {
        const device = findDevice(target.vendorId, target.productId);
        if (!device) {
          return Err(new ConnectionError('No USB device matches the resource', context));
        }
        return Ok(createUSBTMCTransport(device, { address: resource }));
      }
    }
  }

  function resolveInner(): Result<Transport, ConnectionError> {
    if (inner) return Ok(inner);
    const created = createInner();
    if (created.ok) inner = created.value;
    return created;
  }

  function opened(): Result<Transport, TransportError> {
    return inner ? Ok(inner) : Err(new TransportError('VISA session not open', context));
  }

  const transport: Transport = {
    kind: 'visa',
    address: resource,

    async open(): IoResult {
      const backend = resolveInner();
      if (!backend.ok) return backend;
      return backend.value.open();
    },

    async close(): IoResult {
      return inner ? inner.close() : Ok();
    },

    async write(data: Buffer): IoResult {
      const backend = opened();
      return backend.ok ? backend.value.write(data) : backend;
    },

    async readUntil(terminator: Buffer, timeoutMs: number) {
      const backend = opened();
      return backend.ok ? backend.value.readUntil(terminator, timeoutMs) : backend;
    },

    async readExactly(length: number, timeoutMs: number) {
      const backend = opened();
      return backend.ok ? backend.value.readExactly(length, timeoutMs) : backend;
    },

    async flushInput(): IoResult {
      const backend = opened();
      return backend.ok ? backend.value.flushInput() : backend;
    },

    isOpen(): boolean {
      return inner?.isOpen() ?? false;
    },

    async reset(): IoResult {
      const backend = opened();
      if (!backend.ok) return backend;
      return backend.value.reset ? backend.value.reset() : Ok();
    },
  };

  return Ok(transport);
}
