/**
 * Generic SCPI Instrument
 * IEEE 488.2 common commands and the SCPI system subsystem. Device
 * definitions for SCPI instruments build on this.
 */

import type { Communicator, IoResult } from '../types.js';
import { Ok, Err } from '../types.js';
import { DecodeError } from '../errors.js';
import { createInstrument } from '../instrument.js';
import type { Instrument, InstrumentOptions } from '../instrument.js';
import {
  bindProperties,
  boolProperty,
  boundedUnitfulProperty,
  stringProperty,
  unitfulProperty,
} from '../property-factory.js';
import type { BoundProperties } from '../property-factory.js';
import { formatDecimal } from '../format.js';
import { ScpiParser } from '../scpi-parser.js';

export const SCPI_PROPERTIES = {
  scpiVersion: stringProperty({ command: 'SYST:VERS', access: 'readonly', bookmark: '' }),
  powerOnStatus: boolProperty({ command: '*PSC', trueToken: '1', falseToken: '0' }),
  lineFrequency: unitfulProperty({ command: 'SYST:LFR', unit: 'Hz', format: formatDecimal }),
  displayBrightness: boundedUnitfulProperty({
    command: 'DISP:BRIG',
    unit: 'dimensionless',
    format: formatDecimal,
    validRange: { min: 0, max: 1 },
  }),
  displayContrast: boundedUnitfulProperty({
    command: 'DISP:CONT',
    unit: 'dimensionless',
    format: formatDecimal,
    validRange: { min: 0, max: 1 },
  }),
};

export interface ScpiIdentity {
  manufacturer: string;
  model: string;
  serialNumber: string;
  firmware: string;
}

export interface ScpiErrorEntry {
  code: number;
  message: string;
}

export interface ScpiCommands {
  readonly instrument: Instrument;
  /** Raw *IDN? response, cached */
  name(): IoResult<string>;
  identity(): IoResult<ScpiIdentity>;
  /** *OPC? */
  opComplete(): IoResult<boolean>;
  /** *TST?; true when the self test reports 0 */
  selfTestOk(): IoResult<boolean>;
  reset(): IoResult;
  clear(): IoResult;
  trigger(): IoResult;
  waitToContinue(): IoResult;
  /** Oldest entry of the error queue, or null when it is empty */
  nextError(): IoResult<ScpiErrorEntry | null>;
  /** Every queued error code (SYST:ERR:CODE:ALL?), oldest first */
  errorQueue(): IoResult<number[]>;
  close(): IoResult;
}

export type ScpiInstrument = ScpiCommands & BoundProperties<typeof SCPI_PROPERTIES>;

function decodeError(command: string, response: string, message: string): DecodeError {
  return new DecodeError(`${command}: ${message}`, response, { command });
}

export function parseIdentity(response: string): ScpiIdentity | null {
  const parts = ScpiParser.parseCsv(response);
  if (parts.length < 4) return null;
  const [manufacturer, model, serialNumber, ...firmware] = parts;
  return { manufacturer, model, serialNumber, firmware: firmware.join(',') };
}

/** Parse a SYST:ERR? response such as `-113,"Undefined header"`. */
export function parseErrorEntry(response: string): ScpiErrorEntry | null {
  const [codeText, ...rest] = ScpiParser.parseCsv(response);
  const code = ScpiParser.parseInteger(codeText ?? '');
  if (!code.ok) return null;
  return { code: code.value, message: rest.join(',').replace(/^"|"$/g, '') };
}

export function createScpiCommands(instrument: Instrument): ScpiInstrument {
  const properties = bindProperties(instrument, SCPI_PROPERTIES);

  return {
    ...properties,
    instrument,

    name() {
      return instrument.name();
    },

    async identity() {
      const name = await instrument.name();
      if (!name.ok) return name;
      const identity = parseIdentity(name.value);
      if (!identity) {
        return Err(decodeError('*IDN?', name.value, 'expected manufacturer,model,serial,firmware'));
      }
      return Ok(identity);
    },

    async opComplete() {
      const reply = await instrument.query('*OPC?');
      if (!reply.ok) return reply;
      const value = ScpiParser.parseInteger(reply.value);
      if (!value.ok) return Err(decodeError('*OPC?', reply.value, value.error));
      return Ok(value.value === 1);
    },

    async selfTestOk() {
      const reply = await instrument.query('*TST?');
      if (!reply.ok) return reply;
      const value = ScpiParser.parseInteger(reply.value);
      if (!value.ok) return Err(decodeError('*TST?', reply.value, value.error));
      return Ok(value.value === 0);
    },

    reset() {
      return instrument.sendcmd('*RST');
    },

    clear() {
      return instrument.sendcmd('*CLS');
    },

    trigger() {
      return instrument.sendcmd('*TRG');
    },

    waitToContinue() {
      return instrument.sendcmd('*WAI');
    },

    async nextError() {
      const reply = await instrument.query('SYST:ERR?');
      if (!reply.ok) return reply;
      if (ScpiParser.isErrorResponseOk(reply.value)) return Ok(null);
      const entry = parseErrorEntry(reply.value);
      if (!entry) return Err(decodeError('SYST:ERR?', reply.value, 'expected <code>,"<message>"'));
      return Ok(entry);
    },

    async errorQueue() {
      const reply = await instrument.query('SYST:ERR:CODE:ALL?');
      if (!reply.ok) return reply;
      const codes: number[] = [];
      for (const part of ScpiParser.parseCsv(reply.value)) {
        const code = ScpiParser.parseInteger(part);
        if (!code.ok) return Err(decodeError('SYST:ERR:CODE:ALL?', reply.value, code.error));
        if (code.value !== 0) codes.push(code.value);
      }
      return Ok(codes);
    },

    close() {
      return instrument.close();
    },
  };
}

export function createScpiInstrument(communicator: Communicator, options: InstrumentOptions = {}): ScpiInstrument {
  return createScpiCommands(createInstrument(communicator, options));
}
