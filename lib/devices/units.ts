/**
 * Units
 *
 * Physical quantities as `{ value, unit }` pairs. The unit table lives in
 * units.json: base units carry a dimension, a scale factor to the SI base
 * and (for temperatures) an offset; SI prefixes are stored as powers of ten.
 */

import { readFileSync } from 'node:fs';
import type { Dimension, Quantity, Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { DecodeError, ValidationError } from './errors.js';

export interface UnitInfo {
  /** Name as written, e.g. "mV" */
  name: string;
  /** Unprefixed unit, e.g. "V" */
  base: string;
  dimension: Dimension;
  factor: number;
  offset: number;
  /** Power of ten contributed by the prefix */
  exponent: number;
}

interface UnitDefinition {
  dimension: Dimension;
  factor: number;
  offset: number;
  prefixable: boolean;
}

interface UnitTable {
  prefixes: Map<string, number>;
  units: Map<string, UnitDefinition>;
  aliases: Map<string, string>;
}

const DIMENSIONS: readonly Dimension[] = [
  'dimensionless', 'voltage', 'current', 'power', 'frequency', 'time',
  'resistance', 'capacitance', 'inductance', 'length', 'mass', 'temperature',
  'angle', 'magnetic-field', 'pressure', 'energy', 'charge', 'ratio-db', 'power-db',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDimension(value: unknown): value is Dimension {
  return DIMENSIONS.some(d => d === value);
}

function parseTable(raw: unknown): UnitTable {
  if (!isRecord(raw) || !isRecord(raw.prefixes) || !isRecord(raw.units) || !isRecord(raw.aliases)) {
    throw new Error('units.json: expected "prefixes", "units" and "aliases" objects');
  }

  const prefixes = new Map<string, number>();
  for (const [prefix, exponent] of Object.entries(raw.prefixes)) {
    if (typeof exponent !== 'number') throw new Error(`units.json: bad prefix ${prefix}`);
    prefixes.set(prefix, exponent);
  }

  const units = new Map<string, UnitDefinition>();
  for (const [name, def] of Object.entries(raw.units)) {
    if (!isRecord(def) || !isDimension(def.dimension) || typeof def.factor !== 'number') {
      throw new Error(`units.json: bad unit ${name}`);
    }
    units.set(name, {
      dimension: def.dimension,
      factor: def.factor,
      offset: typeof def.offset === 'number' ? def.offset : 0,
      prefixable: def.prefixable === true,
    });
  }

  const aliases = new Map<string, string>();
  for (const [alias, target] of Object.entries(raw.aliases)) {
    if (typeof target !== 'string' || !units.has(target)) {
      throw new Error(`units.json: alias ${alias} points at unknown unit`);
    }
    aliases.set(alias, target);
  }

  return { prefixes, units, aliases };
}

const table = parseTable(JSON.parse(readFileSync(new URL('./units.json', import.meta.url), 'utf8')));

// Longest prefixes first so "da" wins over "d"
const prefixesBySize = [...table.prefixes.keys()].sort((a, b) => b.length - a.length);

function info(name: string, base: string, def: UnitDefinition, exponent: number): UnitInfo {
  return { name, base, dimension: def.dimension, factor: def.factor, offset: def.offset, exponent };
}

/** Resolve a unit name: exact name, then alias, then prefix + prefixable unit. */
export function parseUnit(name: string): UnitInfo | null {
  const exact = table.units.get(name);
  if (exact) return info(name, name, exact, 0);

  const alias = table.aliases.get(name);
  if (alias !== undefined) {
    const def = table.units.get(alias);
    if (def) return info(name, alias, def, 0);
  }

  for (const prefix of prefixesBySize) {
    if (!name.startsWith(prefix) || name.length === prefix.length) continue;
    const base = name.slice(prefix.length);
    const def = table.units.get(base);
    const exponent = table.prefixes.get(prefix);
    if (def && def.prefixable && exponent !== undefined) {
      return info(name, base, def, exponent);
    }
  }
  return null;
}

export function quantity(value: number, unit: string): Quantity {
  return { value, unit };
}

export function isQuantity(value: unknown): value is Quantity {
  return isRecord(value) && typeof value.value === 'number' && typeof value.unit === 'string';
}

/** Bare numbers take `unit`; quantities are returned unchanged. */
export function assumeUnits(value: number | Quantity, unit: string): Quantity {
  return typeof value === 'number' ? quantity(value, unit) : value;
}

function scaleByPowerOfTen(value: number, exponent: number): number {
  // Exact powers of ten up to 1e22; dividing keeps 3200 mV -> 3.2 V exact
  return exponent >= 0 ? value * 10 ** exponent : value / 10 ** -exponent;
}

export function dimensionOf(unit: string): Dimension | null {
  return parseUnit(unit)?.dimension ?? null;
}

/** Convert to `unit`. Units of different dimensions are rejected. */
export function convert(q: Quantity, unit: string): Result<Quantity, ValidationError> {
  if (q.unit === unit) return Ok(q);

  const from = parseUnit(q.unit);
  const to = parseUnit(unit);
  if (!from) return Err(new ValidationError(`Unknown unit "${q.unit}"`));
  if (!to) return Err(new ValidationError(`Unknown unit "${unit}"`));
  if (from.dimension !== to.dimension) {
    return Err(new ValidationError(
      `Cannot convert ${q.unit} (${from.dimension}) to ${unit} (${to.dimension})`
    ));
  }

  if (from.base === to.base && from.offset === 0) {
    return Ok(quantity(scaleByPowerOfTen(q.value, from.exponent - to.exponent), unit));
  }

  const inBase = scaleByPowerOfTen(q.value * from.factor, from.exponent) + from.offset;
  const value = scaleByPowerOfTen((inBase - to.offset) / to.factor, -to.exponent);
  return Ok(quantity(value, unit));
}

/** Magnitude of `value` expressed in `unit` (bare numbers are taken as already in `unit`). */
export function magnitudeIn(value: number | Quantity, unit: string): Result<number, ValidationError> {
  const converted = convert(assumeUnits(value, unit), unit);
  return converted.ok ? Ok(converted.value.value) : converted;
}

const UNIT_STRING = /^([-+]?[0-9]*\.?[0-9]+)([eE][-+]?[0-9]+)?\s*([a-zA-Zµμ°Ω%]+)?$/;

/**
 * Split an instrument response such as "12 C", "14.7GHz", "1e-3" or
 * "+5.0E+00 V" into a quantity. A response without a unit takes
 * `defaultUnit`.
 */
export function splitUnitString(text: string, defaultUnit = 'dimensionless'): Result<Quantity, DecodeError> {
  const trimmed = text.trim();
  const match = UNIT_STRING.exec(trimmed);
  if (!match) {
    return Err(new DecodeError(`Could not split "${trimmed}" into value and unit`, text));
  }
  const [, mantissa, exponent = '', unit] = match;
  const value = parseFloat(mantissa + exponent);
  if (unit === undefined) return Ok(quantity(value, defaultUnit));
  if (!parseUnit(unit)) {
    return Err(new DecodeError(`Unknown unit "${unit}" in response`, text));
  }
  return Ok(quantity(value, unit));
}

export function formatQuantity(q: Quantity): string {
  return q.unit === 'dimensionless' ? String(q.value) : `${q.value} ${q.unit}`;
}
