/**
 * Configuration
 *
 * Defaults come from the environment, falling back to built-in values.
 * `loadInstruments` opens every instrument listed in a JSON file.
 */

import { readFile } from 'node:fs/promises';
import type { Result } from '../shared/types.js';
import { Ok, Err } from '../shared/types.js';
import { ValidationError, toError } from './devices/errors.js';
import type { Device, InstrumentRegistry, OpenOptions } from './devices/registry.js';

export interface Defaults {
  timeoutMs: number;
  serialBaud: number;
  gpibBaud: number;
  commandDelayMs: number;
  debug: boolean;
}

function envInt(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || String(fallback), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function envFlag(name: string): boolean {
  const value = (process.env[name] ?? '').trim().toLowerCase();
  return value === '1' || value === 'true' || value === 'yes' || value === 'on';
}

// Read on every call so tests and long-running hosts see changes
export function defaults(): Defaults {
  return {
    timeoutMs: envInt('BENCHLINK_TIMEOUT_MS', 3000),
    serialBaud: envInt('BENCHLINK_SERIAL_BAUD', 115200),
    gpibBaud: envInt('BENCHLINK_GPIB_BAUD', 460800),
    commandDelayMs: envInt('BENCHLINK_COMMAND_DELAY_MS', 10),
    debug: envFlag('BENCHLINK_DEBUG'),
  };
}

export interface InstrumentEntry {
  class: string;
  uri: string;
}

type ConfigTree = { [key: string]: unknown };

function isConfigTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isInstrumentEntry(value: unknown): value is InstrumentEntry {
  return isConfigTree(value) && typeof value.class === 'string' && typeof value.uri === 'string';
}

/** Walk a `/`-separated path ("" or "/" is the root). */
export function walkConfig(tree: ConfigTree, path: string): Result<ConfigTree, ValidationError> {
  let node: ConfigTree = tree;
  for (const key of path.split('/').filter(part => part.length > 0)) {
    const next = node[key];
    if (!isConfigTree(next)) {
      return Err(new ValidationError(`Config section not found: ${path}`));
    }
    node = next;
  }
  return Ok(node);
}

/**
 * Parse an instrument table, returning each entry by name.
 * Every entry must name a class the registry knows.
 */
export function parseInstrumentConfig(
  text: string,
  registry: InstrumentRegistry,
  section = '/'
): Result<Map<string, InstrumentEntry>, ValidationError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    return Err(new ValidationError(`Malformed instrument config: ${toError(e).message}`, { cause: e }));
  }
  if (!isConfigTree(parsed)) {
    return Err(new ValidationError('Instrument config must be a JSON object'));
  }

  const sectionResult = walkConfig(parsed, section);
  if (!sectionResult.ok) return sectionResult;

  const entries = new Map<string, InstrumentEntry>();
  for (const [name, value] of Object.entries(sectionResult.value)) {
    if (!isInstrumentEntry(value)) {
      return Err(new ValidationError(`Instrument "${name}" needs string "class" and "uri" fields`));
    }
    if (!registry.lookup(value.class)) {
      return Err(new ValidationError(`Instrument "${name}" names unknown class "${value.class}"`));
    }
    entries.set(name, value);
  }
  return Ok(entries);
}

/**
 * Open every instrument in the config file section. An entry that fails to
 * open is logged and recorded as null; the others are still opened.
 */
export async function loadInstruments(
  path: string,
  registry: InstrumentRegistry,
  options: OpenOptions & { section?: string } = {}
): Promise<Result<Map<string, Device | null>, ValidationError>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (e) {
    return Err(new ValidationError(`Cannot read instrument config ${path}: ${toError(e).message}`, { cause: e }));
  }

  const { section = '/', ...openOptions } = options;
  const entries = parseInstrumentConfig(text, registry, section);
  if (!entries.ok) return entries;

  const instruments = new Map<string, Device | null>();
  for (const [name, entry] of entries.value) {
    const opened = await registry.open(entry.class, entry.uri, openOptions);
    if (opened.ok) {
      console.log(`[Config] Opened ${name} (${entry.class}) at ${entry.uri}`);
      instruments.set(name, opened.value);
    } else {
      console.warn(`[Config] Failed to open ${name} (${entry.class}) at ${entry.uri}: ${opened.error.message}`);
      instruments.set(name, null);
    }
  }
  return Ok(instruments);
}
