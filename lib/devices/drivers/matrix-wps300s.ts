/**
 * Matrix WPS300S Power Supply
 *
 * Simple SCPI-like commands over USB-serial (CH340), 115200 baud.
 * Does not answer *IDN?; a numeric reply to VOLT? identifies it.
 * Mode (CV/CC) follows the load and cannot be queried, so status() infers it.
 */

import type { Communicator, IoResult } from '../types.js';
import { Ok } from '../types.js';
import { createInstrument } from '../instrument.js';
import type { Instrument, InstrumentOptions } from '../instrument.js';
import { bindProperties, boolProperty, boundedUnitfulProperty, unitfulProperty } from '../property-factory.js';
import type { BoundProperties } from '../property-factory.js';
import { formatDecimal } from '../format.js';
import { ScpiParser } from '../scpi-parser.js';

export const WPS300S_PROPERTIES = {
  voltage: boundedUnitfulProperty({ command: 'VOLT', unit: 'V', format: formatDecimal, validRange: { min: 0, max: 80 } }),
  current: boundedUnitfulProperty({ command: 'CURR', unit: 'A', format: formatDecimal, validRange: { min: 0, max: 10 } }),
  // Reads back "0"/"1", but is set with ON/OFF
  output: boolProperty({ command: 'OUTP', acceptTrue: ['1'], acceptFalse: ['0'] }),
  measuredVoltage: unitfulProperty({ command: 'MEAS:VOLT', unit: 'V', access: 'readonly' }),
  measuredCurrent: unitfulProperty({ command: 'MEAS:CURR', unit: 'A', access: 'readonly' }),
};

export type RegulationMode = 'CV' | 'CC';

export interface PowerSupplyStatus {
  mode: RegulationMode;
  outputEnabled: boolean;
  setpoints: { voltage: number; current: number };
  measurements: { voltage: number; current: number; power: number };
}

export type MatrixWps300s = BoundProperties<typeof WPS300S_PROPERTIES> & {
  readonly instrument: Instrument;
  /** True when the instrument answers VOLT? with a number */
  probe(): IoResult<boolean>;
  /** Setpoints, output state and measurements in one pass */
  status(): IoResult<PowerSupplyStatus>;
  close(): IoResult;
};

/**
 * CC when the current sits at its limit while the voltage droops below its
 * setpoint; CV otherwise.
 */
export function inferMode(status: Omit<PowerSupplyStatus, 'mode'>): RegulationMode {
  const { outputEnabled, setpoints, measurements } = status;
  if (outputEnabled && setpoints.current > 0.001 && setpoints.voltage > 0.001) {
    const currentAtLimit = measurements.current >= setpoints.current * 0.98;
    const voltageAtSetpoint = measurements.voltage >= setpoints.voltage * 0.98;
    if (currentAtLimit && !voltageAtSetpoint) return 'CC';
  }
  return 'CV';
}

export function createMatrixWps300s(communicator: Communicator, options: InstrumentOptions = {}): MatrixWps300s {
  const instrument = createInstrument(communicator, options);
  const properties = bindProperties(instrument, WPS300S_PROPERTIES);

  return {
    ...properties,
    instrument,

    async probe() {
      const reply = await instrument.query('VOLT?');
      if (!reply.ok) return reply;
      return Ok(ScpiParser.parseNumber(reply.value).ok);
    },

    async status() {
      const voltage = await properties.voltage.get();
      if (!voltage.ok) return voltage;
      const current = await properties.current.get();
      if (!current.ok) return current;
      const output = await properties.output.get();
      if (!output.ok) return output;
      const measuredVoltage = await properties.measuredVoltage.get();
      if (!measuredVoltage.ok) return measuredVoltage;
      const measuredCurrent = await properties.measuredCurrent.get();
      if (!measuredCurrent.ok) return measuredCurrent;

      const reading = {
        outputEnabled: output.value,
        setpoints: { voltage: voltage.value.value, current: current.value.value },
        measurements: {
          voltage: measuredVoltage.value.value,
          current: measuredCurrent.value.value,
          power: measuredVoltage.value.value * measuredCurrent.value.value,
        },
      };
      return Ok({ ...reading, mode: inferMode(reading) });
    },

    close() {
      return instrument.close();
    },
  };
}
