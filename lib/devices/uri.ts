/**
 * URI factory
 *
 * Opens a communicator from a connection string:
 *
 *   serial:///dev/ttyUSB0?baud=9600
 *   tcpip://192.168.0.20:5025
 *   gpib+usb:///dev/ttyUSB0/5          (adapter port, then bus address)
 *   gpib+serial://COM4/12?terminator=eoi
 *   visa://TCPIP0::10.0.0.5::5025::SOCKET
 *   usbtmc://1ab1:0588
 *   usb://0403:6001
 *   file:///dev/usbtmc0
 *   loopback://bench
 *
 * Query parameters: baud, timeout (ms), terminator (lf, cr, crlf; GPIB also eoi),
 * version (GPIB adapter firmware).
 */

import type { Device } from 'usb';
import type { Communicator, CommunicatorOptions, IoResult, Result, Transport } from './types.js';
import { Ok, Err } from './types.js';
import { ConnectionError } from './errors.js';
import { openTransport } from './communicator.js';
import { defaults } from '../config.js';
import { createSerialTransport } from './transports/serial.js';
import { createSocketTransport } from './transports/socket.js';
import { createFileTransport } from './transports/file.js';
import { createLoopbackTransport } from './transports/loopback.js';
import { createUSBTMCTransport } from './transports/usbtmc.js';
import { createRawUsbTransport } from './transports/usb.js';
import { createVisaTransport } from './transports/visa.js';
import { findUsbDevice } from './transports/usb-endpoints.js';
import { createGpibCommunicator } from './transports/gpib-usb.js';
import type { GpibTerminator } from './transports/gpib-usb.js';
import { createSerialManager } from './transports/serial-manager.js';
import type { SerialManager } from './transports/serial-manager.js';

export interface OpenOptions extends CommunicatorOptions {
  /** Shares GPIB adapters between instruments. Without one, each call opens its adapter privately; a registry passes its own. */
  serialManager?: SerialManager;
  /** USB device lookup (defaults to the `usb` package) */
  findDevice?: (vendorId: number, productId: number) => Device | null;
  /** Bytes a loopback:// communicator answers with */
  loopbackInput?: string | Buffer;
}

export interface ParsedUri {
  scheme: string;
  target: string;
  params: URLSearchParams;
}

const URI = /^([a-z][a-z0-9+.-]*):\/\/([^?]*)(?:\?(.*))?$/i;
const KNOWN_PARAMS = ['baud', 'timeout', 'terminator', 'version'];
const TERMINATORS: Record<string, string> = { lf: '\n', cr: '\r', crlf: '\r\n' };

export function parseUri(uri: string): Result<ParsedUri, ConnectionError> {
  const match = URI.exec(uri.trim());
  if (!match) {
    return Err(new ConnectionError(`Not a connection URI: ${uri}`, { address: uri }));
  }
  const params = new URLSearchParams(match[3] ?? '');
  for (const key of params.keys()) {
    if (!KNOWN_PARAMS.includes(key)) {
      return Err(new ConnectionError(`Unknown URI parameter "${key}" in ${uri}`, { address: uri }));
    }
  }
  return Ok({ scheme: match[1].toLowerCase(), target: match[2], params });
}

function positiveInt(params: URLSearchParams, key: string, uri: string): Result<number | undefined, ConnectionError> {
  const raw = params.get(key);
  if (raw === null) return Ok(undefined);
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    return Err(new ConnectionError(`URI parameter ${key} must be a positive integer, got "${raw}"`, { address: uri }));
  }
  return Ok(value);
}

function terminatorParam(params: URLSearchParams, uri: string, allowEoi: boolean): Result<string | undefined, ConnectionError> {
  const raw = params.get('terminator');
  if (raw === null) return Ok(undefined);
  const name = raw.toLowerCase();
  if (allowEoi && name === 'eoi') return Ok('eoi');
  const terminator = TERMINATORS[name];
  if (terminator === undefined) {
    const choices = allowEoi ? 'lf, cr, crlf or eoi' : 'lf, cr or crlf';
    return Err(new ConnectionError(`URI parameter terminator must be ${choices}, got "${raw}"`, { address: uri }));
  }
  return Ok(terminator);
}

function isGpibTerminator(value: string): value is GpibTerminator {
  return value === 'eoi' || value === '\n' || value === '\r' || value === '\r\n';
}

function parseHostPort(target: string, uri: string): Result<{ host: string; port: number }, ConnectionError> {
  const match = /^(.+):(\d+)$/.exec(target);
  if (!match) {
    return Err(new ConnectionError(`Expected host:port, got "${target}"`, { address: uri }));
  }
  return Ok({ host: match[1].replace(/^\[|\]$/g, ''), port: parseInt(match[2], 10) });
}

function parseUsbIds(target: string, uri: string): Result<{ vendorId: number; productId: number }, ConnectionError> {
  const match = /^(?:0x)?([0-9a-f]{1,4}):(?:0x)?([0-9a-f]{1,4})$/i.exec(target);
  if (!match) {
    return Err(new ConnectionError(`Expected vendor:product in hex, got "${target}"`, { address: uri }));
  }
  return Ok({ vendorId: parseInt(match[1], 16), productId: parseInt(match[2], 16) });
}

async function openGpib(
  target: string,
  params: URLSearchParams,
  uri: string,
  options: OpenOptions,
  timeoutMs: number | undefined
): IoResult<Communicator> {
  const split = /^(.+)\/(\d+)$/.exec(target);
  if (!split) {
    return Err(new ConnectionError(`Expected <adapter port>/<bus address>, got "${target}"`, { address: uri }));
  }
  const [, path, busAddress] = split;

  const baud = positiveInt(params, 'baud', uri);
  if (!baud.ok) return baud;
  const version = positiveInt(params, 'version', uri);
  if (!version.ok) return version;
  const terminator = terminatorParam(params, uri, true);
  if (!terminator.ok) return terminator;

  const manager = options.serialManager ?? createSerialManager();
  const adapter = await manager.acquire(path, { baudRate: baud.value ?? defaults().gpibBaud }, {
    terminator: '\r',
    timeoutMs,
    debug: options.debug,
  });
  if (!adapter.ok) return adapter;

  const gpibTerminator = terminator.value !== undefined && isGpibTerminator(terminator.value)
    ? terminator.value
    : undefined;
  const gpib = await createGpibCommunicator(adapter.value, {
    address: parseInt(busAddress, 10),
    version: version.value,
    terminator: gpibTerminator,
    timeoutMs,
    debug: options.debug,
    onClose: () => manager.release(path),
  });
  if (!gpib.ok) {
    const released = await manager.release(path);
    if (!released.ok) console.warn(`[URI] Releasing ${path} failed: ${released.error.message}`);
  }
  return gpib;
}

function transportFor(parsed: ParsedUri, uri: string, options: OpenOptions, baudRate: number): Result<Transport, ConnectionError> {
  const { scheme, target } = parsed;
  const findDevice = options.findDevice ?? findUsbDevice;

  switch (scheme) {
    case 'serial':
      return Ok(createSerialTransport({ path: target, baudRate }));
    case 'tcpip': {
      const hostPort = parseHostPort(target, uri);
      if (!hostPort.ok) return hostPort;
      return Ok(createSocketTransport(hostPort.value));
    }
    case 'visa':
      return createVisaTransport(target, { baudRate, findDevice });
    case 'usbtmc':
    case 'usb': {
      const ids = parseUsbIds(target, uri);
      if (!ids.ok) return ids;
      const device = findDevice(ids.value.vendorId, ids.value.productId);
      if (!device) {
        return Err(new ConnectionError(`No USB device ${target} found`, { transport: scheme === 'usbtmc' ? 'usbtmc' : 'usb', address: target }));
      }
      return Ok(scheme === 'usbtmc'
        ? createUSBTMCTransport(device, { address: target })
        : createRawUsbTransport(device, { address: target }));
    }
    case 'file':
      return Ok(createFileTransport({ path: target }));
    case 'loopback':
      return Ok(createLoopbackTransport({ input: options.loopbackInput, name: target || 'loopback' }));
    default:
      return Err(new ConnectionError(`Unknown URI scheme "${scheme}"`, { address: uri }));
  }
}

/** Open a communicator for a connection URI. */
export async function openCommunicator(uri: string, options: OpenOptions = {}): IoResult<Communicator> {
  const parsed = parseUri(uri);
  if (!parsed.ok) return parsed;
  const { scheme, params } = parsed.value;

  const timeout = positiveInt(params, 'timeout', uri);
  if (!timeout.ok) return timeout;
  const timeoutMs = timeout.value ?? options.timeoutMs;

  if (scheme === 'gpib+usb' || scheme === 'gpib+serial') {
    return openGpib(parsed.value.target, params, uri, options, timeoutMs);
  }

  const baud = positiveInt(params, 'baud', uri);
  if (!baud.ok) return baud;
  const terminator = terminatorParam(params, uri, false);
  if (!terminator.ok) return terminator;

  const transport = transportFor(parsed.value, uri, options, baud.value ?? defaults().serialBaud);
  if (!transport.ok) return transport;

  return openTransport(transport.value, {
    terminator: terminator.value ?? options.terminator,
    outputTerminator: options.outputTerminator,
    newline: options.newline,
    encoding: options.encoding,
    debug: options.debug,
    timeoutMs,
  });
}
