/**
 * Serial Manager
 * Shares one serial communicator per port path, so every GPIB instrument
 * behind the same adapter goes through the same lock.
 */

import type { Communicator, CommunicatorOptions, IoResult, SerialSettings, Transport } from '../types.js';
import { Ok, Result } from '../types.js';
import { openTransport } from '../communicator.js';
import { createSerialTransport } from './serial.js';

export interface SerialManager {
  /** Open the port on first use, otherwise return the shared communicator. */
  acquire(path: string, settings: SerialSettings, options?: CommunicatorOptions): IoResult<Communicator>;
  /** Drop one reference; the port closes when the last user releases it. */
  release(path: string): IoResult;
  closeAll(): IoResult;
  /** Paths with at least one user */
  openPorts(): string[];
}

export interface SerialManagerOptions {
  /** Transport factory (tests substitute an in-memory transport) */
  createTransport?: (path: string, settings: SerialSettings) => Transport;
}

interface SharedPort {
  /** The first acquire's open; later callers await the same promise */
  opening: IoResult<Communicator>;
  users: number;
}

export function createSerialManager(options: SerialManagerOptions = {}): SerialManager {
  const createTransport = options.createTransport
    ?? ((path: string, settings: SerialSettings) => createSerialTransport({ path, ...settings }));
  const ports = new Map<string, SharedPort>();

  // Registered before the open settles so concurrent acquires share it
  function openPort(path: string, settings: SerialSettings, communicatorOptions: CommunicatorOptions): SharedPort {
    const port: SharedPort = {
      users: 1,
      opening: openTransport(createTransport(path, settings), communicatorOptions).then(opened => {
        if (opened.ok) {
          console.log(`[SerialManager] Opened ${path} at ${settings.baudRate} baud`);
        } else if (ports.get(path) === port) {
          ports.delete(path);
        }
        return opened;
      }),
    };
    ports.set(path, port);
    return port;
  }

  return {
    async acquire(path, settings, communicatorOptions = {}) {
      const existing = ports.get(path);
      if (!existing) return openPort(path, settings, communicatorOptions).opening;

      existing.users++;
      const shared = await existing.opening;
      if (!shared.ok || shared.value.isOpen()) return shared;

      // The port went away underneath its users; start over
      if (ports.get(path) === existing) ports.delete(path);
      return openPort(path, settings, communicatorOptions).opening;
    },

    async release(path) {
      const shared = ports.get(path);
      if (!shared) return Ok();
      shared.users--;
      if (shared.users > 0) return Ok();
      ports.delete(path);
      const opened = await shared.opening;
      if (!opened.ok) return Ok();
      console.log(`[SerialManager] Closing ${path}`);
      return opened.value.close();
    },

    async closeAll() {
      const entries = [...ports.entries()];
      ports.clear();
      const results = [];
      for (const [path, shared] of entries) {
        const opened = await shared.opening;
        if (!opened.ok) continue;
        const closed = await opened.value.close();
        if (closed.ok) console.log(`[SerialManager] Closed ${path}`);
        results.push(closed);
      }
      // Every port gets closed; the first failure is reported
      return Result.map(Result.all(results), () => undefined);
    },

    openPorts() {
      return [...ports.keys()];
    },
  };
}
