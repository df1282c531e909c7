/**
 * Indexed sub-devices
 *
 * Channels, outputs and sensors are exposed as a ProxyList: a lazily built,
 * cached view per native index. The valid set maps the index a caller uses
 * onto the index the instrument expects:
 *
 * - `{ count, base }`: zero-based positions, native index is `position + base`
 * - `{ AB: 1, CD: 2 }`: labels (or their native values) mapped to native indices
 * - `['X', 'Y']`: labels passed through unchanged
 */

import type { Result } from './types.js';
import { Ok, Err } from './types.js';
import { IndexError } from './errors.js';

export type ProxyKey = number | string;

export interface IndexRange {
  count: number;
  base?: number;
}

export type LabelTable = Readonly<Record<string, number | string>>;

export type ValidSet = IndexRange | LabelTable | readonly string[];

export type ViewFactory<P, V> = (parent: P, native: ProxyKey, key: ProxyKey) => V;

export interface ProxyList<V> extends Iterable<V> {
  readonly length: number;
  get(index: ProxyKey): Result<V, IndexError>;
  /** External keys in declared order */
  keys(): ProxyKey[];
}

interface Slot {
  key: ProxyKey;
  native: ProxyKey;
}

function isLabelList(validSet: ValidSet): validSet is readonly string[] {
  return Array.isArray(validSet);
}

function isIndexRange(validSet: ValidSet): validSet is IndexRange {
  if (isLabelList(validSet)) return false;
  return 'count' in validSet && typeof validSet.count === 'number' &&
    Object.keys(validSet).every(k => k === 'count' || k === 'base');
}

function slotsOf(validSet: ValidSet): Slot[] {
  if (isIndexRange(validSet)) {
    const base = validSet.base ?? 0;
    if (!Number.isInteger(validSet.count) || validSet.count < 0 || !Number.isInteger(base)) {
      throw new RangeError(`Invalid index range: count ${validSet.count}, base ${base}`);
    }
    return Array.from({ length: validSet.count }, (_, i) => ({ key: i, native: i + base }));
  }
  if (isLabelList(validSet)) {
    return validSet.map(label => ({ key: label, native: label }));
  }
  return Object.entries(validSet).map(([label, native]) => ({ key: label, native }));
}

export function createProxyList<P, V>(
  parent: P,
  createView: ViewFactory<P, V>,
  validSet: ValidSet
): ProxyList<V> {
  const slots = slotsOf(validSet);
  const views = new Map<string, V>();

  function viewFor(slot: Slot): V {
    const cacheKey = `${typeof slot.native}:${slot.native}`;
    let view = views.get(cacheKey);
    if (view === undefined) {
      view = createView(parent, slot.native, slot.key);
      views.set(cacheKey, view);
    }
    return view;
  }

  function find(index: ProxyKey): Slot | undefined {
    // Labels first, then native values ("AB" or 1 both reach output AB)
    return slots.find(s => s.key === index) ?? (isIndexRange(validSet) ? undefined : slots.find(s => s.native === index));
  }

  return {
    get length() {
      return slots.length;
    },

    get(index) {
      const slot = find(index);
      if (!slot) {
        const valid = isIndexRange(validSet)
          ? `0..${slots.length - 1}`
          : slots.map(s => String(s.key)).join(', ');
        return Err(new IndexError(`Index ${JSON.stringify(index)} is not valid; expected one of ${valid}`, index));
      }
      return Ok(viewFor(slot));
    },

    keys() {
      return slots.map(s => s.key);
    },

    *[Symbol.iterator]() {
      for (const slot of slots) {
        yield viewFor(slot);
      }
    },
  };
}
