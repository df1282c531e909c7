/**
 * Serial Transport
 * Raw byte channel over a serial port
 */

import { SerialPort } from 'serialport';
import type { Transport, SerialSettings, IoResult, Result } from '../types.js';
import { Ok, Err } from '../types.js';
import { ConnectionError, TransportError, toError } from '../errors.js';
import { createByteQueue } from './byte-queue.js';
import type { ByteQueue } from './byte-queue.js';
import { delay } from '../timing.js';

export interface SerialConfig extends SerialSettings {
  path: string;
  commandDelay?: number;  // ms delay after each write (default: 0)
}

export function createSerialTransport(config: SerialConfig): Transport {
  const {
    path,
    baudRate,
    dataBits = 8,
    parity = 'none',
    stopBits = 1,
    commandDelay = 0,
  } = config;
  const context = { transport: 'serial' as const, address: path };

  let port: SerialPort | null = null;
  let queue: ByteQueue | null = null;
  let opened = false;
  let disconnected = false;
  let disconnectError: TransportError | null = null;

  function markDisconnected(error: TransportError): void {
    disconnected = true;
    disconnectError = error;
    opened = false;
    queue?.end(error);
  }

  function ready(): Result<{ port: SerialPort; queue: ByteQueue }, TransportError> {
    if (disconnected) {
      return Err(disconnectError ?? new TransportError('SERIAL_PORT_DISCONNECTED', context));
    }
    if (!port || !queue || !opened) {
      return Err(new TransportError('Port not opened', context));
    }
    return Ok({ port, queue });
  }

  return {
    kind: 'serial',
    address: path,

    async open(): IoResult {
      if (opened) return Ok();

      const newPort = new SerialPort({
        path,
        baudRate,
        dataBits,
        parity,
        stopBits,
        autoOpen: false,
      });
      const newQueue = createByteQueue({ kind: 'serial', address: path });

      newPort.on('data', (chunk: Buffer) => newQueue.push(chunk));

      // Listen for port disconnection events
      newPort.on('close', () => {
        markDisconnected(new TransportError('SERIAL_PORT_DISCONNECTED: Port closed', context));
      });

      newPort.on('error', (err: Error) => {
        markDisconnected(new TransportError(`SERIAL_PORT_ERROR: ${err.message}`, { ...context, cause: err }));
      });

      try {
        await new Promise<void>((resolve, reject) => {
          newPort.open((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      } catch (e) {
        newPort.removeAllListeners();
        const cause = toError(e);
        return Err(new ConnectionError(`Failed to open ${path}: ${cause.message}`, { ...context, cause }));
      }

      port = newPort;
      queue = newQueue;
      opened = true;
      disconnected = false;
      disconnectError = null;
      return Ok();
    },

    async close(): IoResult {
      const current = port;
      if (!current) return Ok();

      current.removeAllListeners();
      queue?.end(new TransportError('Port closed', context));

      if (opened && !disconnected) {
        await new Promise<void>((resolve) => {
          current.close(() => resolve());
        });
      }

      port = null;
      queue = null;
      opened = false;
      disconnected = false;
      disconnectError = null;
      return Ok();
    },

    async write(data: Buffer): IoResult {
      const state = ready();
      if (!state.ok) return state;

      try {
        await new Promise<void>((resolve, reject) => {
          state.value.port.write(data, (err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      } catch (e) {
        const cause = toError(e);
        return Err(new TransportError(`Write failed: ${cause.message}`, { ...context, cause }));
      }

      // Give slow devices time to process before the next command
      if (commandDelay > 0) await delay(commandDelay);
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
      try {
        await new Promise<void>((resolve, reject) => {
          state.value.port.flush((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      } catch (e) {
        const cause = toError(e);
        return Err(new TransportError(`Flush failed: ${cause.message}`, { ...context, cause }));
      }
      return Ok();
    },

    isOpen(): boolean {
      return opened && !disconnected;
    },
  };
}

// Helper to list available serial ports
export async function listSerialPorts(): Promise<Array<{ path: string; manufacturer?: string }>> {
  const ports = await SerialPort.list();
  return ports.map(p => ({
    path: p.path,
    manufacturer: p.manufacturer,
  }));
}

// Helper to find a serial port matching a pattern
export async function findSerialPort(pattern: RegExp): Promise<string | null> {
  const ports = await SerialPort.list();
  const match = ports.find(p => pattern.test(p.path));
  return match?.path ?? null;
}
