/**
 * Sample device definitions
 */

import type { InstrumentRegistry } from '../registry.js';
import { Result } from '../types.js';
import type { ValidationError } from '../errors.js';
import { createScpiInstrument } from './scpi-instrument.js';
import { createDg645 } from './srs-dg645.js';
import { createMatrixWps300s } from './matrix-wps300s.js';

export * from './scpi-instrument.js';
export * from './srs-dg645.js';
export * from './matrix-wps300s.js';

/** Register the bundled definitions under their class names. */
export function registerSampleInstruments(registry: InstrumentRegistry): Result<void, ValidationError> {
  const registered = Result.all([
    registry.register('scpi', communicator => createScpiInstrument(communicator)),
    registry.register('srs-dg645', communicator => createDg645(communicator)),
    registry.register('matrix-wps300s', communicator => createMatrixWps300s(communicator)),
  ]);
  return Result.map(registered, () => undefined);
}
