/**
 * Socket Transport
 * TCP byte channel for LAN instruments and serial-to-Ethernet bridges
 */

import net from 'node:net';
import type { Transport, IoResult, Result } from '../types.js';
import { Ok, Err } from '../types.js';
import { ConnectionError, TransportError, toError } from '../errors.js';
import { createByteQueue } from './byte-queue.js';
import type { ByteQueue } from './byte-queue.js';

export interface SocketConfig {
  host: string;
  port: number;
  connectTimeout?: number;  // ms (default: 3000)
}

export function createSocketTransport(config: SocketConfig): Transport {
  const { host, port, connectTimeout = 3000 } = config;
  const address = `${host}:${port}`;
  const context = { transport: 'socket' as const, address };

  let socket: net.Socket | null = null;
  let queue: ByteQueue | null = null;
  let closedByPeer = false;

  function ready(): Result<{ socket: net.Socket; queue: ByteQueue }, TransportError> {
    if (!socket || !queue) {
      return Err(new TransportError('Socket not connected', context));
    }
    if (closedByPeer) {
      return Err(new TransportError('Socket closed by peer', context));
    }
    return Ok({ socket, queue });
  }

  return {
    kind: 'socket',
    address,

    async open(): IoResult {
      if (socket) return Ok();

      const newQueue = createByteQueue({ kind: 'socket', address });
      let newSocket: net.Socket;
      try {
        newSocket = await new Promise<net.Socket>((resolve, reject) => {
          const s = net.createConnection({ host, port });
          const timeoutId = setTimeout(() => {
            s.destroy();
            reject(new Error(`Connect timeout after ${connectTimeout}ms`));
          }, connectTimeout);
          s.once('connect', () => {
            clearTimeout(timeoutId);
            s.removeAllListeners('error');
            resolve(s);
          });
          s.once('error', (err) => {
            clearTimeout(timeoutId);
            s.destroy();
            reject(err);
          });
        });
      } catch (e) {
        const cause = toError(e);
        return Err(new ConnectionError(`Failed to connect to ${address}: ${cause.message}`, { ...context, cause }));
      }

      newSocket.setNoDelay(true);
      newSocket.on('data', (chunk: Buffer) => newQueue.push(chunk));
      newSocket.on('error', (err) => {
        newQueue.end(new TransportError(`Socket error: ${err.message}`, { ...context, cause: err }));
      });
      newSocket.on('close', () => {
        closedByPeer = true;
        // Reads still pending after the buffer drains fail with FramingError
        newQueue.end();
      });

      socket = newSocket;
      queue = newQueue;
      closedByPeer = false;
      return Ok();
    },

    async close(): IoResult {
      const current = socket;
      if (!current) return Ok();

      current.removeAllListeners();
      queue?.end(new TransportError('Socket closed', context));
      if (!closedByPeer && !current.destroyed) {
        await new Promise<void>((resolve) => {
          current.end(() => resolve());
        });
      }
      current.destroy();

      socket = null;
      queue = null;
      closedByPeer = false;
      return Ok();
    },

    async write(data: Buffer): IoResult {
      const state = ready();
      if (!state.ok) return state;

      try {
        await new Promise<void>((resolve, reject) => {
          state.value.socket.write(data, (err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      } catch (e) {
        const cause = toError(e);
        return Err(new TransportError(`Write failed: ${cause.message}`, { ...context, cause }));
      }
      return Ok();
    },

    // Buffered complete lines are still readable after the peer closes
    async readUntil(terminator: Buffer, timeoutMs: number) {
      if (!socket || !queue) return Err(new TransportError('Socket not connected', context));
      return queue.readUntil(terminator, timeoutMs);
    },

    async readExactly(length: number, timeoutMs: number) {
      if (!socket || !queue) return Err(new TransportError('Socket not connected', context));
      return queue.readExactly(length, timeoutMs);
    },

    async flushInput(): IoResult {
      const state = ready();
      if (!state.ok) return state;
      state.value.queue.clear();
      return Ok();
    },

    isOpen(): boolean {
      return socket !== null && !closedByPeer;
    },
  };
}
