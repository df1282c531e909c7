/**
 * GPIB-USB Adapter Communicator
 *
 * Talks to one GPIB instrument through a USB/serial GPIB adapter. The
 * adapter link is itself a communicator (CR-terminated); each transaction
 * runs under the adapter's lock and first re-asserts the bus address, EOI,
 * timeout and EOS settings, so several instruments can share one adapter.
 *
 * Firmware 4 and older uses `+a:N`-style commands; 5 and newer the `++addr N`
 * family. By default EOI is asserted and LF is the EOS character.
 */

import type { Communicator, IoResult, Result } from '../types.js';
import { Ok, Err } from '../types.js';
import { DecodeError, ValidationError } from '../errors.js';
import type { InstrumentError } from '../errors.js';
import { delay } from '../timing.js';
import { defaults } from '../../config.js';

export type GpibEos = '\n' | '\r' | '\r\n';
export type GpibTerminator = 'eoi' | GpibEos;

/** How the instrument marks the end of a message on the bus */
export interface GpibBusSettings {
  /** EOI asserted with the last byte */
  eoi: boolean;
  /** End-of-string character, or null for none */
  eos: GpibEos | null;
}

export interface GpibOptions {
  /** Bus address, 1-30 */
  address: number;
  /** Adapter firmware version; queried with `+ver` when omitted */
  version?: number;
  /**
   * Shorthand for the bus settings: "eoi" means EOI without an EOS character,
   * a character turns EOI off and uses it as EOS.
   */
  terminator?: GpibTerminator;
  /** Default true; overrides `terminator` */
  eoi?: boolean;
  /** Default "\n"; overrides `terminator` */
  eos?: GpibEos | null;
  timeoutMs?: number;
  /** Number of trailing characters removed from every response */
  strip?: number;
  /** Discard a response line that repeats the command just sent */
  echo?: boolean;
  /** Pause between adapter commands (ms) */
  commandDelayMs?: number;
  debug?: boolean;
  /** Called once when this communicator is closed (e.g. to release a shared adapter) */
  onClose?: () => IoResult;
}

const ADAPTER_TERMINATOR = '\r';

const EOS_CODES: Record<GpibEos, number> = {
  '\r\n': 0,
  '\r': 1,
  '\n': 2,
};

function isGpibTerminator(value: string): value is GpibTerminator {
  return value === 'eoi' || value === '\n' || value === '\r' || value === '\r\n';
}

export function busSettingsFor(terminator: GpibTerminator): GpibBusSettings {
  return terminator === 'eoi' ? { eoi: true, eos: null } : { eoi: false, eos: terminator };
}

export function validateGpibAddress(address: number): Result<number, ValidationError> {
  if (!Number.isInteger(address) || address < 1 || address > 30) {
    return Err(new ValidationError(`GPIB address must be between 1 and 30, got ${address}`));
  }
  return Ok(address);
}

/** Ask the adapter for its firmware version (`+ver`). */
export async function queryAdapterVersion(adapter: Communicator): IoResult<number> {
  const reply = await adapter.query('+ver');
  if (!reply.ok) return reply;
  const version = parseInt(reply.value.trim(), 10);
  if (Number.isNaN(version)) {
    return Err(new DecodeError('Unrecognized GPIB adapter version', reply.value, {
      command: '+ver',
      transport: 'gpib-usb',
      address: adapter.address,
    }));
  }
  return Ok(version);
}

/**
 * Adapter commands that put the bus into the state this instrument expects.
 */
export function setupCommands(
  version: number,
  address: number,
  bus: GpibBusSettings,
  timeoutMs: number
): string[] {
  const { eoi, eos } = bus;
  if (version <= 4) {
    const commands = [`+a:${address}`, `+eoi:${eoi ? 1 : 0}`, `+t:${Math.max(1, Math.round(timeoutMs / 1000))}`];
    if (eos !== null) commands.push(`+eos:${eos.charCodeAt(eos.length - 1)}`);
    return commands;
  }
  return [
    `++addr ${address}`,
    `++eoi ${eoi ? 1 : 0}`,
    `++read_tmo_ms ${timeoutMs}`,
    `++eos ${eos === null ? 3 : EOS_CODES[eos]}`,
  ];
}

export function readCommand(version: number): string {
  return version <= 4 ? '+read' : '++read eoi';
}

export async function createGpibCommunicator(
  adapter: Communicator,
  options: GpibOptions
): IoResult<Communicator> {
  const config = defaults();
  const address = validateGpibAddress(options.address);
  if (!address.ok) return address;

  const adapterTerminator = adapter.setTerminator(ADAPTER_TERMINATOR);
  if (!adapterTerminator.ok) return adapterTerminator;

  let version: number;
  if (options.version !== undefined) {
    version = options.version;
  } else {
    const queried = await queryAdapterVersion(adapter);
    if (!queried.ok) return queried;
    version = queried.value;
  }

  const initial = options.terminator === undefined ? { eoi: true, eos: '\n' as const } : busSettingsFor(options.terminator);
  let bus: GpibBusSettings = {
    eoi: options.eoi ?? initial.eoi,
    eos: options.eos === undefined ? initial.eos : options.eos,
  };
  if (!bus.eoi && bus.eos === null) {
    return Err(new ValidationError('GPIB messages need EOI or an EOS character', {
      transport: 'gpib-usb',
      address: `${adapter.address}/${address.value}`,
    }));
  }
  let timeoutMs = options.timeoutMs ?? adapter.timeoutMs;
  const strip = options.strip ?? 0;
  const echo = options.echo ?? false;
  const commandDelayMs = options.commandDelayMs ?? config.commandDelayMs;
  const gpibAddress = `${adapter.address}/${address.value}`;
  const tag = `[Communicator gpib-usb:${gpibAddress}]`;
  const context = { transport: 'gpib-usb' as const, address: gpibAddress };
  let closed = false;
  let lastCommand: string | null = null;

  async function adapterSend(text: string): IoResult {
    const sent = await adapter.sendLineUnlocked(text);
    if (commandDelayMs > 0) await delay(commandDelayMs);
    return sent;
  }

  async function selectInstrument(): IoResult {
    const timeoutSet = adapter.setTimeout(timeoutMs);
    if (!timeoutSet.ok) return timeoutSet;
    for (const command of setupCommands(version, options.address, bus, timeoutMs)) {
      const sent = await adapterSend(command);
      if (!sent.ok) return sent;
    }
    return Ok();
  }

  // With EOI on, the bus terminator reads as "eoi" even when an EOS character is also set
  function currentTerminator(): GpibTerminator {
    return bus.eoi || bus.eos === null ? 'eoi' : bus.eos;
  }

  function clean(line: string): string {
    const stripped = strip > 0 ? line.slice(0, Math.max(0, line.length - strip)) : line;
    return stripped.trim();
  }

  async function readResponse(): IoResult<string> {
    let line = await adapter.readLineUnlocked();
    if (line.ok && echo && lastCommand !== null && line.value.trim() === lastCommand) {
      line = await adapter.readLineUnlocked();
    }
    if (!line.ok) return line;
    const value = clean(line.value);
    if (communicator.debug) console.debug(`${tag} <- ${JSON.stringify(value)}`);
    return Ok(value);
  }

  const communicator: Communicator = {
    kind: 'gpib-usb',
    address: gpibAddress,
    debug: options.debug ?? config.debug,

    get terminator() {
      return currentTerminator();
    },

    get outputTerminator() {
      return currentTerminator();
    },

    get timeoutMs() {
      return timeoutMs;
    },

    setTerminator(input: string): Result<void, InstrumentError> {
      if (!isGpibTerminator(input)) {
        return Err(new ValidationError(`GPIB terminator must be "eoi", "\\n", "\\r" or "\\r\\n"`, context));
      }
      bus = busSettingsFor(input);
      return Ok();
    },

    setTimeout(ms: number): Result<void, InstrumentError> {
      if (!Number.isFinite(ms) || ms <= 0) {
        return Err(new ValidationError(`Timeout must be a positive number of milliseconds, got ${ms}`, context));
      }
      timeoutMs = ms;
      return Ok();
    },

    // One lock per adapter: all instruments on the bus share it
    withLock<T>(fn: () => Promise<T>): Promise<T> {
      return adapter.withLock(fn);
    },

    async sendLineUnlocked(text: string): IoResult {
      const selected = await selectInstrument();
      if (!selected.ok) return selected;
      if (communicator.debug) console.debug(`${tag} -> ${JSON.stringify(text)}`);
      lastCommand = text;
      return adapterSend(text);
    },

    async readLineUnlocked(): IoResult<string> {
      const triggered = await adapterSend(readCommand(version));
      if (!triggered.ok) return triggered;
      return readResponse();
    },

    readBytesUnlocked(length: number): IoResult<Buffer> {
      return adapter.readBytesUnlocked(length);
    },

    sendcmd(text: string): IoResult {
      if (text === '') return Promise.resolve(Ok());
      return adapter.withLock(() => communicator.sendLineUnlocked(text));
    },

    // Queries containing '?' make the instrument talk; others need an explicit read
    query(text: string): IoResult<string> {
      return adapter.withLock(async () => {
        const sent = await communicator.sendLineUnlocked(text);
        if (!sent.ok) return sent;
        if (!text.includes('?')) {
          const triggered = await adapterSend(readCommand(version));
          if (!triggered.ok) return triggered;
        }
        const response = await readResponse();
        if (!response.ok && response.error.command === undefined) response.error.command = text;
        return response;
      });
    },

    readLine(): IoResult<string> {
      return adapter.withLock(() => communicator.readLineUnlocked());
    },

    readBytes(length: number): IoResult<Buffer> {
      return adapter.withLock(() => adapter.readBytesUnlocked(length));
    },

    flushInput(): IoResult {
      return adapter.flushInput();
    },

    reset(): IoResult {
      return adapter.reset();
    },

    async close(): IoResult {
      if (closed) return Ok();
      closed = true;
      return options.onClose ? options.onClose() : Ok();
    },

    isOpen(): boolean {
      return !closed && adapter.isOpen();
    },
  };

  return Ok(communicator);
}
