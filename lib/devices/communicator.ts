/**
 * Communicator
 *
 * Owns one transport and turns it into a line-oriented command channel:
 * output framing, newline policy, input terminator stripping, timeouts and
 * an exclusive lock so a query's command and response are never split by
 * another caller.
 */

import type {
  Transport,
  Communicator,
  CommunicatorOptions,
  IoResult,
  Result,
  NewlinePolicy,
  TextEncoding,
} from './types.js';
import { Ok, Err } from './types.js';
import { TimeoutError, TransportError, ValidationError } from './errors.js';
import type { InstrumentError } from './errors.js';
import { createCommandLock } from './command-lock.js';
import { withDeadline } from './timing.js';
import { defaults } from '../config.js';

export function applyNewlinePolicy(text: string, policy: NewlinePolicy, outputTerminator: string): string {
  switch (policy) {
    case 'preserve':
      return text;
    case 'translate':
      return text.split('\n').join(outputTerminator);
    case 'strip':
      return text.split('\n').join('');
  }
}

// Attach the exchange to an error raised below the communicator
function annotate<T>(result: Result<T, InstrumentError>, command: string): Result<T, InstrumentError> {
  if (!result.ok && result.error.command === undefined) {
    result.error.command = command;
  }
  return result;
}

export function createCommunicator(transport: Transport, options: CommunicatorOptions = {}): Communicator {
  const config = defaults();
  const newline = options.newline ?? 'preserve';
  const encoding: TextEncoding = options.encoding ?? 'latin1';
  let terminator = options.terminator ?? '\n';
  let outputTerminator = options.outputTerminator ?? terminator;
  let timeoutMs = options.timeoutMs ?? config.timeoutMs;
  const withLock = createCommandLock();
  const tag = `[Communicator ${transport.kind}:${transport.address}]`;
  const context = { transport: transport.kind, address: transport.address };

  const communicator: Communicator = {
    kind: transport.kind,
    address: transport.address,
    debug: options.debug ?? config.debug,

    get terminator() {
      return terminator;
    },

    get outputTerminator() {
      return outputTerminator;
    },

    get timeoutMs() {
      return timeoutMs;
    },

    setTerminator(input: string, output: string = input): Result<void, InstrumentError> {
      if (input.length === 0 || output.length === 0) {
        return Err(new ValidationError('Terminator must not be empty', context));
      }
      terminator = input;
      outputTerminator = output;
      return Ok();
    },

    setTimeout(ms: number): Result<void, InstrumentError> {
      if (!Number.isFinite(ms) || ms <= 0) {
        return Err(new ValidationError(`Timeout must be a positive number of milliseconds, got ${ms}`, context));
      }
      timeoutMs = ms;
      return Ok();
    },

    withLock,

    async sendLineUnlocked(text: string): IoResult {
      if (!transport.isOpen()) {
        return Err(new TransportError('Transport is closed', { ...context, command: text }));
      }
      if (communicator.debug) console.debug(`${tag} -> ${JSON.stringify(text)}`);

      const payload = Buffer.from(applyNewlinePolicy(text, newline, outputTerminator) + outputTerminator, encoding);
      // The abandoned write may still complete later, so the channel needs a reset first
      const written = await withDeadline(
        transport.write(payload),
        timeoutMs,
        () => new TimeoutError(`Write did not complete within ${timeoutMs}ms`, timeoutMs, false, context)
      );
      return annotate(written, text);
    },

    async readLineUnlocked(): IoResult<string> {
      const read = await transport.readUntil(Buffer.from(terminator, encoding), timeoutMs);
      if (!read.ok) return read;
      const line = read.value.toString(encoding);
      if (communicator.debug) console.debug(`${tag} <- ${JSON.stringify(line)}`);
      return Ok(line);
    },

    async readBytesUnlocked(length: number): IoResult<Buffer> {
      if (!Number.isInteger(length) || length < 0) {
        return Err(new ValidationError(`Invalid byte count: ${length}`, context));
      }
      if (length === 0) return Ok(Buffer.alloc(0));
      const read = await transport.readExactly(length, timeoutMs);
      if (read.ok && communicator.debug) console.debug(`${tag} <- ${read.value.length} bytes`);
      return read;
    },

    sendcmd(text: string): IoResult {
      if (text === '') return Promise.resolve(Ok());
      return withLock(() => communicator.sendLineUnlocked(text));
    },

    query(text: string): IoResult<string> {
      return withLock(async () => {
        const sent = await communicator.sendLineUnlocked(text);
        if (!sent.ok) return sent;
        return annotate(await communicator.readLineUnlocked(), text);
      });
    },

    readLine(): IoResult<string> {
      return withLock(() => communicator.readLineUnlocked());
    },

    readBytes(length: number): IoResult<Buffer> {
      return withLock(() => communicator.readBytesUnlocked(length));
    },

    flushInput(): IoResult {
      return withLock(() => transport.flushInput());
    },

    reset(): IoResult {
      return withLock(async () => (transport.reset ? transport.reset() : Ok()));
    },

    // Waits for in-flight exchanges before closing
    close(): IoResult {
      return withLock(() => transport.close());
    },

    isOpen(): boolean {
      return transport.isOpen();
    },
  };

  return communicator;
}

/** Open the transport and wrap it. */
export async function openTransport(
  transport: Transport,
  options: CommunicatorOptions = {}
): IoResult<Communicator> {
  const opened = await transport.open();
  if (!opened.ok) return opened;
  return Ok(createCommunicator(transport, options));
}
