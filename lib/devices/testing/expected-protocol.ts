/**
 * Protocol test harness
 *
 * Runs device code against a loopback communicator and checks the exact
 * command lines it sent. Device definitions are tested without hardware:
 *
 *   await expectedProtocol(
 *     communicator => createDg645(communicator),
 *     ['LAMP? 1'],
 *     ['3.2'],
 *     async dg => { ... }
 *   );
 */

import { deepStrictEqual, strictEqual } from 'node:assert';
import type { Communicator, CommunicatorOptions } from '../types.js';
import { createCommunicator } from '../communicator.js';
import { createLoopbackTransport } from '../transports/loopback.js';
import type { LoopbackTransport, ProtocolDirection } from '../transports/loopback.js';

export interface ExpectedProtocolOptions {
  /** Line separator on both sides (default "\n") */
  sep?: string;
  /** Run the exchange this many times (the body is called once per repeat) */
  repeat?: number;
}

export interface ProtocolLine {
  direction: ProtocolDirection;
  line: string;
}

export interface RecordingCommunicator {
  communicator: Communicator;
  transport: LoopbackTransport;
  /** Every line exchanged so far, in order, without terminators */
  transcript(): ProtocolLine[];
}

function toLines(text: string, sep: string): string[] {
  const lines = text.split(sep);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function framed(lines: readonly string[], sep: string, repeat: number): string {
  return lines.map(line => line + sep).join('').repeat(repeat);
}

/** A communicator over an opened loopback transport preloaded with `input`. */
export async function recordingCommunicator(
  input: string | Buffer = '',
  options: CommunicatorOptions = {}
): Promise<RecordingCommunicator> {
  const transport = createLoopbackTransport({ input });
  const opened = await transport.open();
  if (!opened.ok) throw opened.error;
  const communicator = createCommunicator(transport, options);
  const outputTerminator = communicator.outputTerminator;

  return {
    communicator,
    transport,
    transcript() {
      return transport.transcript().map(entry => {
        const text = entry.data.toString('latin1');
        const line = entry.direction === 'out' && text.endsWith(outputTerminator)
          ? text.slice(0, text.length - outputTerminator.length)
          : text;
        return { direction: entry.direction, line };
      });
    },
  };
}

/**
 * Assert that `body` sends exactly `hostToIns` while the instrument answers
 * with `insToHost`. Fails with a line diff on mismatch, and when the
 * instrument's answers are not all consumed.
 */
export async function expectedProtocol<D>(
  createDevice: (communicator: Communicator) => D,
  hostToIns: readonly string[],
  insToHost: readonly string[],
  body: (device: D) => void | Promise<void>,
  options: ExpectedProtocolOptions = {}
): Promise<void> {
  const sep = options.sep ?? '\n';
  const repeat = options.repeat ?? 1;
  const { communicator, transport } = await recordingCommunicator(
    framed(insToHost, sep, repeat),
    { terminator: sep }
  );
  const device = createDevice(communicator);

  for (let i = 0; i < repeat; i++) {
    await body(device);
  }

  const sent = toLines(transport.output().toString('latin1'), sep);
  deepStrictEqual(sent, toLines(framed(hostToIns, sep, repeat), sep));
  strictEqual(transport.remaining(), 0, `${transport.remaining()} bytes of instrument output were never read`);
}
