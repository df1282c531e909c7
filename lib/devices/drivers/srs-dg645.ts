/**
 * SRS DG645 Digital Delay Generator
 *
 * Outputs (T0, AB, CD, EF, GH) and delay channels (T0, T1, A-H) are indexed
 * collections; their commands take the native index as the first argument,
 * e.g. `LAMP? 1` / `LAMP 1,4.0` for output AB.
 *
 * Over a GPIB adapter this instrument needs `strip=2` on the bus.
 */

import type { Communicator, IoResult, Quantity } from '../types.js';
import { Ok, Err } from '../types.js';
import { DecodeError, ValidationError } from '../errors.js';
import type { InstrumentOptions } from '../instrument.js';
import { createInstrument } from '../instrument.js';
import {
  bindProperties,
  boolProperty,
  enumProperty,
  intProperty,
  unitfulProperty,
} from '../property-factory.js';
import type { BoundProperties } from '../property-factory.js';
import { createProxyList } from '../proxy-list.js';
import type { ProxyKey, ProxyList } from '../proxy-list.js';
import { formatDecimal } from '../format.js';
import { magnitudeIn, quantity } from '../units.js';
import { ScpiParser } from '../scpi-parser.js';
import { createScpiCommands } from './scpi-instrument.js';
import type { ScpiInstrument } from './scpi-instrument.js';

export const LEVEL_POLARITY = { positive: 1, negative: 0 } as const;

export const OUTPUTS = { T0: 0, AB: 1, CD: 2, EF: 3, GH: 4 } as const;

export const CHANNELS = { T0: 0, T1: 1, A: 2, B: 3, C: 4, D: 5, E: 6, F: 7, G: 8, H: 9 } as const;

export const TRIGGER_SOURCE = {
  internal: 0,
  external_rising: 1,
  external_falling: 2,
  ss_external_rising: 3,
  ss_external_falling: 4,
  single_shot: 5,
  line: 6,
} as const;

export const DISPLAY_MODE = {
  trigger_rate: 0,
  trigger_threshold: 1,
  trigger_single_shot: 2,
  trigger_line: 3,
  adv_triggering_enable: 4,
  trigger_holdoff: 5,
  prescale_config: 6,
  burst_mode: 7,
  burst_delay: 8,
  burst_count: 9,
  burst_period: 10,
  channel_delay: 11,
  channel_levels: 12,
  channel_polarity: 13,
  burst_T0_config: 14,
} as const;

export type ChannelName = keyof typeof CHANNELS;
export type DisplayMode = keyof typeof DISPLAY_MODE;

const indexed = { getFormat: '{cmd}? {idx}', setFormat: '{cmd} {idx},{value}' };

export const OUTPUT_PROPERTIES = {
  levelAmplitude: unitfulProperty({ command: 'LAMP', unit: 'V', format: formatDecimal, ...indexed }),
  levelOffset: unitfulProperty({ command: 'LOFF', unit: 'V', format: formatDecimal, ...indexed }),
  polarity: enumProperty({ command: 'LPOL', table: LEVEL_POLARITY, ...indexed }),
};

export const DG645_PROPERTIES = {
  enableAdvTriggering: boolProperty({ command: 'ADVT', trueToken: '1', falseToken: '0' }),
  triggerRate: unitfulProperty({ command: 'TRAT', unit: 'Hz', format: formatDecimal }),
  triggerSource: enumProperty({ command: 'TSRC', table: TRIGGER_SOURCE }),
  triggerLevel: unitfulProperty({ command: 'TLVL', unit: 'V', format: formatDecimal }),
  holdoff: unitfulProperty({ command: 'HOLD', unit: 's', format: formatDecimal }),
  enableBurstMode: boolProperty({ command: 'BURM', trueToken: '1', falseToken: '0' }),
  enableBurstT0First: boolProperty({ command: 'BURT', trueToken: '1', falseToken: '0' }),
  burstCount: intProperty({ command: 'BURC' }),
  burstPeriod: unitfulProperty({ command: 'BURP', unit: 's', format: formatDecimal }),
  burstDelay: unitfulProperty({ command: 'BURD', unit: 's', format: formatDecimal }),
};

export type Dg645Output = BoundProperties<typeof OUTPUT_PROPERTIES>;

export interface ChannelDelay {
  reference: ChannelName;
  delay: Quantity;
}

export interface Dg645Channel {
  readonly idx: number;
  /** Delay relative to a reference channel */
  delay(): IoResult<ChannelDelay>;
  /** Bare numbers are seconds */
  setDelay(reference: ChannelName, delay: number | Quantity): IoResult;
}

export interface DisplaySetting {
  mode: DisplayMode;
  channel: ChannelName;
}

export type Dg645 = ScpiInstrument & BoundProperties<typeof DG645_PROPERTIES> & {
  readonly output: ProxyList<Dg645Output>;
  readonly channel: ProxyList<Dg645Channel>;
  display(): IoResult<DisplaySetting>;
  setDisplay(mode: DisplayMode, channel: ChannelName): IoResult;
};

function nameOf<K extends string>(table: Readonly<Record<K, number>>, value: number): K | undefined {
  for (const key in table) {
    if (table[key] === value) return key;
  }
  return undefined;
}

function isChannelName(key: ProxyKey): key is ChannelName {
  return typeof key === 'string' && Object.prototype.hasOwnProperty.call(CHANNELS, key);
}

export function createDg645(communicator: Communicator, options: InstrumentOptions = {}): Dg645 {
  const instrument = createInstrument(communicator, options);
  const scpi = createScpiCommands(instrument);

  function channelName(value: string, command: string, response: string): ChannelName | DecodeError {
    const code = ScpiParser.parseInteger(value);
    const name = code.ok ? nameOf(CHANNELS, code.value) : undefined;
    return name ?? new DecodeError(`${command}: unknown channel "${value}"`, response, { command });
  }

  const output = createProxyList(
    instrument,
    (parent, native) => bindProperties(parent, OUTPUT_PROPERTIES, { idx: native }),
    OUTPUTS
  );

  const channel = createProxyList(
    instrument,
    (parent, native): Dg645Channel => {
      const idx = Number(native);
      return {
        idx,

        async delay() {
          const command = `DLAY?${idx}`;
          const reply = await parent.query(command);
          if (!reply.ok) return reply;
          const [refText, delayText] = ScpiParser.parseCsv(reply.value);
          const reference = channelName(refText ?? '', command, reply.value);
          if (reference instanceof DecodeError) return Err(reference);
          const seconds = ScpiParser.parseNumber(delayText ?? '');
          if (!seconds.ok) return Err(new DecodeError(`${command}: ${seconds.error}`, reply.value, { command }));
          return Ok({ reference, delay: quantity(seconds.value, 's') });
        },

        async setDelay(reference, delay) {
          if (!isChannelName(reference)) {
            return Err(new ValidationError(`Unknown reference channel ${String(reference)}`, { command: 'DLAY' }));
          }
          const seconds = magnitudeIn(delay, 's');
          if (!seconds.ok) return seconds;
          return parent.sendcmd(`DLAY ${idx},${CHANNELS[reference]},${formatDecimal(seconds.value)}`);
        },
      };
    },
    CHANNELS
  );

  return {
    ...scpi,
    ...bindProperties(instrument, DG645_PROPERTIES),
    output,
    channel,

    async display() {
      const reply = await instrument.query('DISP?');
      if (!reply.ok) return reply;
      const [modeText, channelText] = ScpiParser.parseCsv(reply.value);
      const modeCode = ScpiParser.parseInteger(modeText ?? '');
      const mode = modeCode.ok ? nameOf(DISPLAY_MODE, modeCode.value) : undefined;
      if (mode === undefined) {
        return Err(new DecodeError(`DISP?: unknown display mode "${modeText}"`, reply.value, { command: 'DISP?' }));
      }
      const shown = channelName(channelText ?? '', 'DISP?', reply.value);
      if (shown instanceof DecodeError) return Err(shown);
      return Ok({ mode, channel: shown });
    },

    setDisplay(mode, shown) {
      if (!Object.prototype.hasOwnProperty.call(DISPLAY_MODE, mode) || !isChannelName(shown)) {
        return Promise.resolve(Err(new ValidationError(`Invalid display setting ${mode}, ${shown}`, { command: 'DISP' })));
      }
      return instrument.sendcmd(`DISP ${DISPLAY_MODE[mode]},${CHANNELS[shown]}`);
    },
  };
}
