/**
 * Property Factory Engine
 *
 * Device definitions describe their settings as binding tables: each entry
 * says how a typed value maps onto a command template and a response
 * format. `bindProperty` / `bindProperties` turn a table into typed
 * `get()` / `set()` accessors over any command target.
 *
 * Bindings are plain frozen data plus pure encode/decode functions, so one
 * table can be shared by every instance of a device and every indexed view.
 */

import type { IoResult, Quantity, Result } from './types.js';
import { Ok, Err } from './types.js';
import { DecodeError, ValidationError } from './errors.js';
import type { InstrumentError } from './errors.js';
import { ScpiParser } from './scpi-parser.js';
import { convert, isQuantity, magnitudeIn, parseUnit, quantity, splitUnitString } from './units.js';
import { formatInteger, formatScientific, formatTemplate, templateFields } from './format.js';
import type { TemplateValues } from './format.js';

// ============ Descriptor Types ============

export type PropertyAccess = 'readwrite' | 'readonly' | 'writeonly';

/** Text transform applied to a raw response (input) or an encoded value (output) */
export type Decoration = (text: string) => string;

export type PropertyKind = 'bool' | 'enum' | 'int' | 'unitless' | 'unitful' | 'bounded' | 'string';

/** Pure conversion between wire text and typed values. Errors are plain messages. */
export interface Codec<TGet, TSet> {
  decode(text: string): Result<TGet, string>;
  encode(value: TSet): Result<string, string>;
}

/** Anything that can issue commands: an instrument, or a fake in tests. */
export interface PropertyTarget {
  sendcmd(command: string): IoResult;
  query(command: string): IoResult<string>;
}

export type BoundResolver = (target: PropertyTarget) => IoResult<number | null>;

/** A range end: a constant, no limit, or computed per call */
export type RangeBound = number | null | BoundResolver;

/** Bounded ranges may also be read from the instrument via MIN?/MAX? queries */
export type QueriedRangeBound = RangeBound | 'query';

interface BindingCommon<A extends PropertyAccess> {
  readonly command: string;
  readonly setCommand: string;
  readonly getFormat: string;
  readonly setFormat: string;
  readonly access: A;
  readonly inputDecoration?: Decoration;
  readonly outputDecoration?: Decoration;
  readonly doc?: string;
}

export interface BoolBinding<A extends PropertyAccess = PropertyAccess> extends BindingCommon<A> {
  readonly kind: 'bool';
  readonly trueToken: string;
  readonly falseToken: string;
  readonly codec: Codec<boolean, boolean>;
}

export interface EnumBinding<K extends string = string, A extends PropertyAccess = PropertyAccess> extends BindingCommon<A> {
  readonly kind: 'enum';
  readonly table: Readonly<Record<K, string | number>>;
  readonly codec: Codec<K, K>;
}

export interface IntBinding<A extends PropertyAccess = PropertyAccess> extends BindingCommon<A> {
  readonly kind: 'int';
  readonly validSet?: readonly number[];
  readonly codec: Codec<number, number>;
}

export interface UnitlessBinding<A extends PropertyAccess = PropertyAccess> extends BindingCommon<A> {
  readonly kind: 'unitless';
  readonly codec: Codec<number, number>;
}

export interface UnitfulBinding<A extends PropertyAccess = PropertyAccess> extends BindingCommon<A> {
  readonly kind: 'unitful';
  readonly unit: string;
  readonly range: { readonly min: RangeBound; readonly max: RangeBound };
  /** Encodes a quantity already expressed in `unit` */
  readonly codec: Codec<Quantity, Quantity>;
}

export interface BoundedBinding<A extends PropertyAccess = PropertyAccess> extends BindingCommon<A> {
  readonly kind: 'bounded';
  readonly unit: string;
  readonly range: { readonly min: QueriedRangeBound; readonly max: QueriedRangeBound };
  readonly minFormat: string;
  readonly maxFormat: string;
  /** Also check readbacks against bounds that need I/O */
  readonly checkReadback: boolean;
  readonly codec: Codec<Quantity, Quantity>;
}

export interface StringBinding<A extends PropertyAccess = PropertyAccess> extends BindingCommon<A> {
  readonly kind: 'string';
  readonly bookmark: string;
  readonly codec: Codec<string, string>;
}

export type AnyBinding =
  | BoolBinding
  | EnumBinding
  | IntBinding
  | UnitlessBinding
  | UnitfulBinding
  | BoundedBinding
  | StringBinding;

export type BindingTable = Readonly<Record<string, AnyBinding>>;

// ============ Value Types ============

export type GetValue<B> =
  B extends BoolBinding ? boolean :
  B extends EnumBinding<infer K> ? K :
  B extends IntBinding | UnitlessBinding ? number :
  B extends UnitfulBinding | BoundedBinding ? Quantity :
  B extends StringBinding ? string :
  never;

export type SetValue<B> =
  B extends UnitfulBinding | BoundedBinding | UnitlessBinding ? number | Quantity :
  GetValue<B>;

export interface Getter<T> {
  get(): IoResult<T>;
}

export interface Setter<T> {
  set(value: T): IoResult;
}

export interface RangeAccessors {
  /** Lower limit in the binding's unit, or null when unbounded */
  min(): IoResult<Quantity | null>;
  max(): IoResult<Quantity | null>;
}

type Nothing = Record<never, never>;

export type BoundProperty<B extends AnyBinding> =
  (B['access'] extends 'writeonly' ? Nothing : Getter<GetValue<B>>) &
  (B['access'] extends 'readonly' ? Nothing : Setter<SetValue<B>>) &
  (B extends BoundedBinding ? RangeAccessors : Nothing);

export type BoundProperties<T extends BindingTable> = { [K in keyof T]: BoundProperty<T[K]> };

/** Context supplied by an indexed view: `{idx}` in templates expands to `idx`. */
export interface BindContext {
  idx?: string | number;
}

// ============ Factory Options ============

export interface CommonOptions {
  /** Command stem, e.g. "LAMP" or ":SOUR:VOLT" */
  command: string;
  /** Stem used by set when it differs from `command` */
  setCommand?: string;
  /** Query template (default "{cmd}?") */
  getFormat?: string;
  /** Set template (default "{cmd} {value}") */
  setFormat?: string;
  access?: PropertyAccess;
  inputDecoration?: Decoration;
  outputDecoration?: Decoration;
  doc?: string;
}

type AccessOf<O> = O extends { access: infer A extends PropertyAccess } ? A : 'readwrite';

export interface BoolOptions extends CommonOptions {
  trueToken?: string;
  falseToken?: string;
  /** Extra responses read as true / false, e.g. ["ON"] next to "1" */
  acceptTrue?: readonly string[];
  acceptFalse?: readonly string[];
}

export interface EnumOptions<K extends string = string> extends CommonOptions {
  /** Value name to wire token */
  table: Readonly<Record<K, string | number>>;
}

export interface IntOptions extends CommonOptions {
  validSet?: readonly number[];
  format?: (value: number) => string;
}

export interface UnitlessOptions extends CommonOptions {
  format?: (value: number) => string;
}

export interface UnitfulOptions extends CommonOptions {
  unit: string;
  /** Number formatter for set (default: scientific, "1.000000e+00") */
  format?: (value: number) => string;
  validRange?: { min?: RangeBound; max?: RangeBound };
}

export interface BoundedOptions extends CommonOptions {
  unit: string;
  format?: (value: number) => string;
  /** Constant bounds, resolvers, or 'query' (the default) */
  validRange?: { min?: QueriedRangeBound; max?: QueriedRangeBound };
  /** Template for the MIN query (default "{cmd}:MIN?") */
  minFormat?: string;
  maxFormat?: string;
  /**
   * Check readbacks against queried bounds too, at the cost of the MIN and
   * MAX queries on every read (default false). Constant bounds are always checked.
   */
  checkReadback?: boolean;
}

export interface StringOptions extends CommonOptions {
  /** Quote character around the value (default '"') */
  bookmark?: string;
}

// ============ Construction ============

const ACCESS_VALUES: readonly PropertyAccess[] = ['readwrite', 'readonly', 'writeonly'];

function invalid(command: string, message: string): never {
  throw new ValidationError(`Invalid binding for "${command}": ${message}`, { command });
}

function checkTemplate(command: string, template: string, allowed: readonly string[]): void {
  for (const field of templateFields(template)) {
    if (!allowed.includes(field)) {
      invalid(command, `template "${template}" uses unknown field {${field}}`);
    }
  }
}

function common(options: CommonOptions): BindingCommon<PropertyAccess> {
  const { command } = options;
  if (typeof command !== 'string' || command.trim() === '') {
    invalid(String(command), 'command must be a non-empty string');
  }
  const access = options.access ?? 'readwrite';
  if (!ACCESS_VALUES.includes(access)) {
    invalid(command, `access must be one of ${ACCESS_VALUES.join(', ')}`);
  }
  const getFormat = options.getFormat ?? '{cmd}?';
  const setFormat = options.setFormat ?? '{cmd} {value}';
  checkTemplate(command, getFormat, ['cmd', 'idx']);
  checkTemplate(command, setFormat, ['cmd', 'value', 'idx']);

  return {
    command,
    setCommand: options.setCommand ?? command,
    getFormat,
    setFormat,
    access,
    inputDecoration: options.inputDecoration,
    outputDecoration: options.outputDecoration,
    doc: options.doc,
  };
}

function checkFinite(value: number): Result<number, string> {
  return Number.isFinite(value) ? Ok(value) : Err(`value must be a finite number, got ${value}`);
}

function checkUnit(command: string, unit: string): void {
  if (!parseUnit(unit)) invalid(command, `unknown unit "${unit}"`);
}

function checkConstantRange(command: string, min: QueriedRangeBound, max: QueriedRangeBound): void {
  if (typeof min === 'number' && typeof max === 'number' && min > max) {
    invalid(command, `min ${min} is greater than max ${max}`);
  }
}

function quantityCodec(unit: string, format: (value: number) => string): Codec<Quantity, Quantity> {
  return {
    decode(text) {
      const split = splitUnitString(text, unit);
      if (!split.ok) return Err(split.error.message);
      const converted = convert(split.value, unit);
      return converted.ok ? converted : Err(converted.error.message);
    },
    encode(value) {
      const finite = checkFinite(value.value);
      return finite.ok ? Ok(format(finite.value)) : finite;
    },
  };
}

/** Boolean setting, e.g. `OUTP 1` / `OUTP?` -> "1". Tokens default to ON/OFF. */
export function boolProperty<O extends BoolOptions>(options: O): BoolBinding<AccessOf<O>>;
export function boolProperty(options: BoolOptions): BoolBinding {
  const base = common(options);
  const trueToken = options.trueToken ?? 'ON';
  const falseToken = options.falseToken ?? 'OFF';
  if (trueToken === falseToken) invalid(base.command, 'true and false tokens must differ');

  const trueTokens = [trueToken, ...(options.acceptTrue ?? [])].map(t => t.toUpperCase());
  const falseTokens = [falseToken, ...(options.acceptFalse ?? [])].map(t => t.toUpperCase());

  const binding: BoolBinding = {
    ...base,
    kind: 'bool',
    trueToken,
    falseToken,
    codec: {
      decode(text: string): Result<boolean, string> {
        const token = text.trim().toUpperCase();
        if (trueTokens.includes(token)) return Ok(true);
        if (falseTokens.includes(token)) return Ok(false);
        return Err(`expected "${trueToken}" or "${falseToken}", got "${text.trim()}"`);
      },
      encode(value: boolean): Result<string, string> {
        return Ok(value ? trueToken : falseToken);
      },
    },
  };
  return Object.freeze(binding);
}

/** Enumerated setting. The typed value is the table key; the wire form is its token. */
export function enumProperty<O extends EnumOptions>(
  options: O
): EnumBinding<Extract<keyof O['table'], string>, AccessOf<O>>;
export function enumProperty(options: EnumOptions): EnumBinding {
  const base = common(options);
  const entries = Object.entries(options.table);
  if (entries.length === 0) invalid(base.command, 'enum table is empty');

  const byToken: Record<string, string> = {};
  for (const [name, token] of entries) {
    const key = String(token);
    if (Object.prototype.hasOwnProperty.call(byToken, key)) {
      invalid(base.command, `token "${key}" is used by both ${byToken[key]} and ${name}`);
    }
    byToken[key] = name;
  }
  const table = Object.freeze({ ...options.table });

  const binding: EnumBinding = {
    ...base,
    kind: 'enum',
    table,
    codec: {
      decode(text: string): Result<string, string> {
        const named = ScpiParser.parseEnum(text, byToken);
        if (named.ok) return named;
        // Numeric tokens also match "+1", "01" and "1.0"
        const numeric = ScpiParser.parseNumber(text);
        if (numeric.ok) {
          const hit = entries.find(([, token]) => typeof token === 'number' && token === numeric.value);
          if (hit) return Ok(hit[0]);
        }
        return named;
      },
      encode(value: string): Result<string, string> {
        if (!Object.prototype.hasOwnProperty.call(table, value)) {
          return Err(`unknown value "${value}", expected one of: ${Object.keys(table).join(', ')}`);
        }
        return Ok(String(table[value]));
      },
    },
  };
  return Object.freeze(binding);
}

/** Integer setting, optionally restricted to a set of allowed values. */
export function intProperty<O extends IntOptions>(options: O): IntBinding<AccessOf<O>>;
export function intProperty(options: IntOptions): IntBinding {
  const base = common(options);
  const format = options.format ?? formatInteger;
  const validSet = options.validSet ? Object.freeze([...options.validSet]) : undefined;
  if (validSet && !validSet.every(Number.isInteger)) {
    invalid(base.command, 'validSet must contain only integers');
  }

  const binding: IntBinding = {
    ...base,
    kind: 'int',
    validSet,
    codec: {
      decode(text: string): Result<number, string> {
        return ScpiParser.parseInteger(text);
      },
      encode(value: number): Result<string, string> {
        if (!Number.isInteger(value)) return Err(`value must be an integer, got ${value}`);
        if (validSet && !validSet.includes(value)) {
          return Err(`value ${value} is not one of: ${validSet.join(', ')}`);
        }
        return Ok(format(value));
      },
    },
  };
  return Object.freeze(binding);
}

/** Plain floating-point setting. */
export function unitlessProperty<O extends UnitlessOptions>(options: O): UnitlessBinding<AccessOf<O>>;
export function unitlessProperty(options: UnitlessOptions): UnitlessBinding {
  const base = common(options);
  const format = options.format ?? formatScientific;

  const binding: UnitlessBinding = {
    ...base,
    kind: 'unitless',
    codec: {
      decode(text: string): Result<number, string> {
        return ScpiParser.parseNumber(text);
      },
      encode(value: number): Result<string, string> {
        const finite = checkFinite(value);
        return finite.ok ? Ok(format(finite.value)) : finite;
      },
    },
  };
  return Object.freeze(binding);
}

/** Physical quantity in a declared unit. Responses may carry their own unit suffix. */
export function unitfulProperty<O extends UnitfulOptions>(options: O): UnitfulBinding<AccessOf<O>>;
export function unitfulProperty(options: UnitfulOptions): UnitfulBinding {
  const base = common(options);
  checkUnit(base.command, options.unit);
  const min = options.validRange?.min ?? null;
  const max = options.validRange?.max ?? null;
  checkConstantRange(base.command, min, max);

  const binding: UnitfulBinding = {
    ...base,
    kind: 'unitful',
    unit: options.unit,
    range: Object.freeze({ min, max }),
    codec: quantityCodec(options.unit, options.format ?? formatScientific),
  };
  return Object.freeze(binding);
}

/**
 * Quantity with limits. Values are checked against the limits before
 * anything is sent; by default the limits are read from the instrument
 * with "{cmd}:MIN?" / "{cmd}:MAX?".
 */
export function boundedUnitfulProperty<O extends BoundedOptions>(options: O): BoundedBinding<AccessOf<O>>;
export function boundedUnitfulProperty(options: BoundedOptions): BoundedBinding {
  const base = common(options);
  checkUnit(base.command, options.unit);
  const min = options.validRange?.min ?? 'query';
  const max = options.validRange?.max ?? 'query';
  checkConstantRange(base.command, min, max);
  const minFormat = options.minFormat ?? '{cmd}:MIN?';
  const maxFormat = options.maxFormat ?? '{cmd}:MAX?';
  checkTemplate(base.command, minFormat, ['cmd', 'idx']);
  checkTemplate(base.command, maxFormat, ['cmd', 'idx']);

  const binding: BoundedBinding = {
    ...base,
    kind: 'bounded',
    unit: options.unit,
    range: Object.freeze({ min, max }),
    minFormat,
    maxFormat,
    checkReadback: options.checkReadback ?? false,
    codec: quantityCodec(options.unit, options.format ?? formatScientific),
  };
  return Object.freeze(binding);
}

/** Free-text setting wrapped in a bookmark character (default '"'). */
export function stringProperty<O extends StringOptions>(options: O): StringBinding<AccessOf<O>>;
export function stringProperty(options: StringOptions): StringBinding {
  const base = common(options);
  const bookmark = options.bookmark ?? '"';

  const binding: StringBinding = {
    ...base,
    kind: 'string',
    bookmark,
    codec: {
      decode(text: string): Result<string, string> {
        const trimmed = text.trim();
        if (
          bookmark !== '' &&
          trimmed.length >= 2 * bookmark.length &&
          trimmed.startsWith(bookmark) &&
          trimmed.endsWith(bookmark)
        ) {
          return Ok(trimmed.slice(bookmark.length, trimmed.length - bookmark.length));
        }
        return Ok(trimmed);
      },
      encode(value: string): Result<string, string> {
        return Ok(`${bookmark}${value}${bookmark}`);
      },
    },
  };
  return Object.freeze(binding);
}

// ============ Binding ============

type PropertyValue = boolean | string | number | Quantity;

interface LooseBoundProperty {
  get?: () => IoResult<unknown>;
  set?: (value: never) => IoResult;
  min?: () => IoResult<Quantity | null>;
  max?: () => IoResult<Quantity | null>;
}

function usesIdx(binding: AnyBinding): boolean {
  const templates = [binding.getFormat, binding.setFormat];
  if (binding.kind === 'bounded') templates.push(binding.minFormat, binding.maxFormat);
  return templates.some(t => templateFields(t).includes('idx'));
}

/**
 * Bind one descriptor to a command target. Read-only bindings get no `set`,
 * write-only bindings no `get`; bounded bindings also get `min()`/`max()`.
 */
export function bindProperty<B extends AnyBinding>(
  target: PropertyTarget,
  binding: B,
  context?: BindContext
): BoundProperty<B>;
export function bindProperty(
  target: PropertyTarget,
  binding: AnyBinding,
  context: BindContext = {}
): LooseBoundProperty {
  if (usesIdx(binding) && context.idx === undefined) {
    invalid(binding.command, 'templates use {idx} but no index was supplied');
  }
  const fields: TemplateValues = context.idx === undefined ? {} : { idx: String(context.idx) };

  async function resolveBound(which: 'min' | 'max'): IoResult<number | null> {
    if (binding.kind !== 'unitful' && binding.kind !== 'bounded') return Ok(null);
    const bound = binding.range[which];
    if (bound === null || typeof bound === 'number') return Ok(bound);
    if (typeof bound === 'function') return bound(target);
    if (binding.kind !== 'bounded') return Ok(null);

    const template = which === 'min' ? binding.minFormat : binding.maxFormat;
    const command = formatTemplate(template, { ...fields, cmd: binding.command });
    const reply = await target.query(command);
    if (!reply.ok) return reply;
    const decoded = binding.codec.decode(reply.value);
    if (!decoded.ok) {
      return Err(new DecodeError(`Bad ${which} limit for ${binding.command}: ${decoded.error}`, reply.value, { command }));
    }
    return Ok(decoded.value.value);
  }

  async function checkRange(magnitude: number, unit: string): IoResult {
    const min = await resolveBound('min');
    if (!min.ok) return min;
    const max = await resolveBound('max');
    if (!max.ok) return max;
    if ((min.value !== null && magnitude < min.value) || (max.value !== null && magnitude > max.value)) {
      const low = min.value === null ? '-inf' : String(min.value);
      const high = max.value === null ? 'inf' : String(max.value);
      return Err(new ValidationError(
        `${magnitude} ${unit} is outside the range [${low}, ${high}] ${unit} for ${binding.command}`,
        { command: binding.setCommand }
      ));
    }
    return Ok();
  }

  // Bounded readbacks are reported, never clamped
  async function warnIfOutOfRange(value: Quantity): Promise<void> {
    if (binding.kind !== 'bounded') return;
    const fixed = (bound: QueriedRangeBound) => bound === null || typeof bound === 'number';
    if (!binding.checkReadback && !(fixed(binding.range.min) && fixed(binding.range.max))) return;
    const inRange = await checkRange(value.value, value.unit);
    if (!inRange.ok) {
      console.warn(`[Property] ${binding.command} read back out of range: ${inRange.error.message}`);
    }
  }

  async function encode(value: PropertyValue): Promise<Result<string, InstrumentError>> {
    const errorContext = { command: binding.setCommand };
    const wrap = (result: Result<string, string>): Result<string, InstrumentError> =>
      result.ok ? result : Err(new ValidationError(`${binding.setCommand}: ${result.error}`, errorContext));
    const wrongType = (expected: string) =>
      Err(new ValidationError(`${binding.setCommand} expects ${expected}, got ${typeof value}`, errorContext));

    switch (binding.kind) {
      case 'bool':
        return typeof value === 'boolean' ? wrap(binding.codec.encode(value)) : wrongType('a boolean');
      case 'enum':
        return typeof value === 'string' ? wrap(binding.codec.encode(value)) : wrongType('an enum name');
      case 'string':
        return typeof value === 'string' ? wrap(binding.codec.encode(value)) : wrongType('a string');
      case 'int':
        return typeof value === 'number' ? wrap(binding.codec.encode(value)) : wrongType('an integer');
      case 'unitless': {
        if (typeof value !== 'number' && !isQuantity(value)) return wrongType('a number');
        const magnitude = magnitudeIn(value, 'dimensionless');
        if (!magnitude.ok) return magnitude;
        return wrap(binding.codec.encode(magnitude.value));
      }
      case 'unitful':
      case 'bounded': {
        if (typeof value !== 'number' && !isQuantity(value)) return wrongType(`a number or quantity in ${binding.unit}`);
        const magnitude = magnitudeIn(value, binding.unit);
        if (!magnitude.ok) return magnitude;
        const inRange = await checkRange(magnitude.value, binding.unit);
        if (!inRange.ok) return inRange;
        return wrap(binding.codec.encode(quantity(magnitude.value, binding.unit)));
      }
    }
  }

  const accessors: LooseBoundProperty = {};

  if (binding.access !== 'writeonly') {
    accessors.get = async (): IoResult<PropertyValue> => {
      const command = formatTemplate(binding.getFormat, { ...fields, cmd: binding.command });
      const reply = await target.query(command);
      if (!reply.ok) return reply;
      const text = binding.inputDecoration ? binding.inputDecoration(reply.value) : reply.value;
      const decoded = binding.codec.decode(text);
      if (!decoded.ok) {
        return Err(new DecodeError(`${command}: ${decoded.error}`, reply.value, { command }));
      }
      if (isQuantity(decoded.value)) await warnIfOutOfRange(decoded.value);
      return decoded;
    };
  }

  if (binding.access !== 'readonly') {
    accessors.set = async (value: PropertyValue): IoResult => {
      const encoded = await encode(value);
      if (!encoded.ok) return encoded;
      const text = binding.outputDecoration ? binding.outputDecoration(encoded.value) : encoded.value;
      return target.sendcmd(formatTemplate(binding.setFormat, { ...fields, cmd: binding.setCommand, value: text }));
    };
  }

  if (binding.kind === 'bounded') {
    const unit = binding.unit;
    const limit = async (which: 'min' | 'max'): IoResult<Quantity | null> => {
      const resolved = await resolveBound(which);
      if (!resolved.ok) return resolved;
      return Ok(resolved.value === null ? null : quantity(resolved.value, unit));
    };
    accessors.min = () => limit('min');
    accessors.max = () => limit('max');
  }

  return accessors;
}

/** Bind every entry of a table. */
export function bindProperties<T extends BindingTable>(
  target: PropertyTarget,
  table: T,
  context?: BindContext
): BoundProperties<T>;
export function bindProperties(
  target: PropertyTarget,
  table: BindingTable,
  context: BindContext = {}
): Record<string, LooseBoundProperty> {
  const bound: Record<string, LooseBoundProperty> = {};
  for (const [name, binding] of Object.entries(table)) {
    bound[name] = bindProperty(target, binding, context);
  }
  return bound;
}
