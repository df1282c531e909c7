/**
 * Instrument Registry
 * Maps class names to device factories and opens them from connection URIs
 */

import type { Communicator, CommunicatorOptions, IoResult, Result } from './types.js';
import { Ok, Err } from './types.js';
import { ValidationError } from './errors.js';
import { openCommunicator } from './uri.js';
import type { OpenOptions } from './uri.js';
import { createSerialManager } from './transports/serial-manager.js';
import type { SerialManager } from './transports/serial-manager.js';

export type { OpenOptions };

/** What every device definition returns. */
export interface Device {
  close(): IoResult;
}

export type InstrumentFactory<D extends Device = Device> = (communicator: Communicator) => D;

export interface InstrumentRegistration<D extends Device = Device> {
  name: string;
  create: InstrumentFactory<D>;
  /** Communicator settings the device needs (e.g. a CRLF terminator); URI parameters and caller options override them */
  defaults: CommunicatorOptions;
}

export interface InstrumentRegistryOptions {
  /** Shared by every GPIB instrument this registry opens (default: a new manager) */
  serialManager?: SerialManager;
}

export interface InstrumentRegistry {
  /** GPIB adapters opened through this registry */
  readonly serialManager: SerialManager;
  register<D extends Device>(name: string, create: InstrumentFactory<D>, defaults?: CommunicatorOptions): Result<void, ValidationError>;
  lookup(name: string): InstrumentRegistration | undefined;
  names(): string[];
  /** Open a communicator for `uri` and build the named device on it */
  open(name: string, uri: string, options?: OpenOptions): IoResult<Device>;
}

export function createInstrumentRegistry(options: InstrumentRegistryOptions = {}): InstrumentRegistry {
  const registrations = new Map<string, InstrumentRegistration>();
  const serialManager = options.serialManager ?? createSerialManager();

  return {
    serialManager,

    register(name, create, defaults = {}) {
      if (registrations.has(name)) {
        return Err(new ValidationError(`Instrument class "${name}" is already registered`));
      }
      registrations.set(name, { name, create, defaults });
      return Ok();
    },

    lookup(name) {
      return registrations.get(name);
    },

    names() {
      return [...registrations.keys()];
    },

    async open(name, uri, openOptions = {}) {
      const registration = registrations.get(name);
      if (!registration) {
        return Err(new ValidationError(`Unknown instrument class "${name}"`));
      }

      const communicator = await openCommunicator(uri, { serialManager, ...registration.defaults, ...openOptions });
      if (!communicator.ok) return communicator;
      console.log(`[Registry] Opened ${name} at ${uri}`);
      return Ok(registration.create(communicator.value));
    },
  };
}

