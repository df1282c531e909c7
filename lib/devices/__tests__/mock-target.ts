import type { PropertyTarget } from '../property-factory.js';
import type { IoResult } from '../types.js';
import { Ok, Err } from '../types.js';
import { TimeoutError } from '../errors.js';

export interface MockTargetOptions {
  responses?: Record<string, string>;
}

export interface MockTarget extends PropertyTarget {
  /** Every command in send order, queries included */
  sentCommands: string[];
  responses: Record<string, string>;
  reset(): void;
}

/** Command target answering queries from a table; unknown queries time out. */
export function createMockTarget(options: MockTargetOptions = {}): MockTarget {
  const responses: Record<string, string> = { ...options.responses };
  const sentCommands: string[] = [];

  return {
    sentCommands,
    responses,

    async sendcmd(command: string): IoResult {
      sentCommands.push(command);
      return Ok();
    },

    async query(command: string): IoResult<string> {
      sentCommands.push(command);
      if (Object.prototype.hasOwnProperty.call(responses, command)) {
        return Ok(responses[command]);
      }
      return Err(new TimeoutError(`No response to ${command}`, 100, true, { command }));
    },

    reset(): void {
      sentCommands.length = 0;
    },
  };
}
