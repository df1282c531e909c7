/**
 * Instrument
 *
 * The object device definitions build on. Wraps a communicator with the
 * per-instrument conventions some devices need: a bus-address prefix on
 * every command, an acknowledgement line after each command, a prompt after
 * each exchange, and IEEE 488.2 binary block reads.
 */

import type { Communicator, IoResult, Result, TransportKind } from './types.js';
import { Ok, Err } from './types.js';
import { AcknowledgementError, FramingError, PromptError } from './errors.js';
import type { InstrumentError } from './errors.js';
import type { PropertyTarget } from './property-factory.js';
import { ScpiParser } from './scpi-parser.js';

export interface InstrumentOptions {
  /** Prepended to every command, e.g. "#3:" for an addressed RS-485 bus */
  addressPrefix?: string;
  /** Expected acknowledgement line for a command, or null when none is sent */
  ackExpected?: (command: string) => string | null;
  /** Characters the instrument sends after completing each command */
  prompt?: string;
  /** Identity query used by name() (default "*IDN?") */
  identityCommand?: string;
}

export interface Instrument extends PropertyTarget {
  readonly communicator: Communicator;
  readonly kind: TransportKind;
  readonly address: string;
  readonly terminator: string;
  readonly timeoutMs: number;

  sendcmd(command: string): IoResult;
  query(command: string): IoResult<string>;
  /** Read one line without sending anything */
  read(): IoResult<string>;
  /** Identity string, queried once and cached */
  name(): IoResult<string>;
  /** Read a definite-length block ("#NLLLL<data>") and return the data bytes */
  readBinaryBlock(): IoResult<Buffer>;

  setTimeout(ms: number): Result<void, InstrumentError>;
  setTerminator(input: string, output?: string): Result<void, InstrumentError>;
  close(): IoResult;
}

export function createInstrument(communicator: Communicator, options: InstrumentOptions = {}): Instrument {
  const prefix = options.addressPrefix ?? '';
  const identityCommand = options.identityCommand ?? '*IDN?';
  const { ackExpected, prompt } = options;
  const simple = ackExpected === undefined && prompt === undefined;
  let cachedName: string | null = null;

  async function checkAck(command: string): IoResult {
    const expected = ackExpected?.(command) ?? null;
    if (expected === null) return Ok();
    const ack = await communicator.readLineUnlocked();
    if (!ack.ok) return ack;
    if (ack.value !== expected) {
      return Err(new AcknowledgementError(expected, ack.value, { command, transport: communicator.kind, address: communicator.address }));
    }
    return Ok();
  }

  async function checkPrompt(command: string): IoResult {
    if (prompt === undefined) return Ok();
    const received = await communicator.readBytesUnlocked(Buffer.byteLength(prompt, 'latin1'));
    if (!received.ok) return received;
    const text = received.value.toString('latin1');
    if (text !== prompt) {
      return Err(new PromptError(prompt, text, { command, transport: communicator.kind, address: communicator.address }));
    }
    return Ok();
  }

  const instrument: Instrument = {
    communicator,
    kind: communicator.kind,
    address: communicator.address,

    get terminator() {
      return communicator.terminator;
    },

    get timeoutMs() {
      return communicator.timeoutMs;
    },

    sendcmd(command) {
      if (simple) return communicator.sendcmd(prefix + command);
      return communicator.withLock(async () => {
        const sent = await communicator.sendLineUnlocked(prefix + command);
        if (!sent.ok) return sent;
        const acked = await checkAck(command);
        if (!acked.ok) return acked;
        return checkPrompt(command);
      });
    },

    query(command) {
      if (simple) return communicator.query(prefix + command);
      return communicator.withLock(async (): IoResult<string> => {
        const sent = await communicator.sendLineUnlocked(prefix + command);
        if (!sent.ok) return sent;
        const acked = await checkAck(command);
        if (!acked.ok) return acked;
        const value = await communicator.readLineUnlocked();
        if (!value.ok) return value;
        const prompted = await checkPrompt(command);
        if (!prompted.ok) return prompted;
        return value;
      });
    },

    read() {
      return communicator.readLine();
    },

    async name() {
      if (cachedName !== null) return Ok(cachedName);
      const reply = await instrument.query(identityCommand);
      if (!reply.ok) return reply;
      cachedName = reply.value.trim();
      return Ok(cachedName);
    },

    readBinaryBlock() {
      return communicator.withLock(async (): IoResult<Buffer> => {
        const context = { transport: communicator.kind, address: communicator.address };
        const header = await communicator.readBytesUnlocked(2);
        if (!header.ok) return header;
        const digits = ScpiParser.parseBlockPrefix(header.value);
        if (!digits.ok) {
          return Err(new FramingError(`Bad binary block header: ${digits.error}`, { ...context, partial: header.value.toString('latin1') }));
        }

        const lengthField = await communicator.readBytesUnlocked(digits.value);
        if (!lengthField.ok) return lengthField;
        const length = ScpiParser.parseBlockLength(lengthField.value);
        if (!length.ok) {
          return Err(new FramingError(`Bad binary block header: ${length.error}`, { ...context, partial: lengthField.value.toString('latin1') }));
        }

        return communicator.readBytesUnlocked(length.value);
      });
    },

    setTimeout(ms) {
      return communicator.setTimeout(ms);
    },

    setTerminator(input, output) {
      return communicator.setTerminator(input, output);
    },

    close() {
      return communicator.close();
    },
  };

  return instrument;
}
