import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { createInstrumentRegistry } from '../registry.js';
import { createSerialManager } from '../transports/serial-manager.js';
import { createLoopbackTransport } from '../transports/loopback.js';
import { ConnectionError } from '../errors.js';
import { Err } from '../types.js';
import { registerSampleInstruments, createScpiInstrument } from '../drivers/index.js';
import type { Communicator, CommunicatorOptions } from '../types.js';

describe('Instrument Registry', () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  function meterRegistry(defaults: CommunicatorOptions = {}) {
    const registry = createInstrumentRegistry();
    const created: Communicator[] = [];
    registry.register('meter', communicator => {
      created.push(communicator);
      return { close: () => communicator.close() };
    }, defaults);
    return { registry, created };
  }

  it('should list registered names in order', () => {
    const registry = createInstrumentRegistry();
    registry.register('b', createScpiInstrument);
    registry.register('a', createScpiInstrument);
    expect(registry.names()).toEqual(['b', 'a']);
    expect(registry.lookup('a')?.name).toBe('a');
    expect(registry.lookup('c')).toBeUndefined();
  });

  it('should refuse a duplicate class name', () => {
    const registry = createInstrumentRegistry();
    registry.register('scpi', createScpiInstrument);
    const again = registry.register('scpi', createScpiInstrument);
    expect(again.ok).toBe(false);
    if (!again.ok) expect(again.error.message).toBe('Instrument class "scpi" is already registered');
  });

  it('should fail to open an unknown class', async () => {
    const registry = createInstrumentRegistry();
    const result = await registry.open('nope', 'loopback://x');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Unknown instrument class "nope"');
  });

  it('should open a device over a URI and log it', async () => {
    const { registry, created } = meterRegistry();
    const device = await registry.open('meter', 'loopback://bench');
    expect(device.ok).toBe(true);
    expect(created).toHaveLength(1);
    expect(logSpy).toHaveBeenCalledWith('[Registry] Opened meter at loopback://bench');
    if (device.ok) expect((await device.value.close()).ok).toBe(true);
  });

  it('should let caller options override registration defaults', async () => {
    const { registry, created } = meterRegistry({ terminator: '\r' });
    await registry.open('meter', 'loopback://a');
    await registry.open('meter', 'loopback://b', { terminator: '\r\n' });
    expect(created.map(c => c.terminator)).toEqual(['\r', '\r\n']);
  });

  it('should let URI parameters override caller options', async () => {
    const { registry, created } = meterRegistry({ terminator: '\r' });
    await registry.open('meter', 'loopback://a?terminator=lf', { terminator: '\r\n' });
    expect(created[0].terminator).toBe('\n');
  });

  it('should pass URI failures through without building the device', async () => {
    const { registry, created } = meterRegistry();
    const result = await registry.open('meter', 'ftp://x');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Unknown URI scheme "ftp"');
    expect(created).toHaveLength(0);
  });

  describe('GPIB adapters', () => {
    it('should share one adapter between bus addresses', async () => {
      const createTransport = vi.fn((path: string) => createLoopbackTransport({ name: path }));
      const serialManager = createSerialManager({ createTransport });
      const registry = createInstrumentRegistry({ serialManager });
      const created: Communicator[] = [];
      registry.register('meter', communicator => {
        created.push(communicator);
        return { close: () => communicator.close() };
      });
      expect(registry.serialManager).toBe(serialManager);

      await registry.open('meter', 'gpib+usb:///dev/ttyUSB0/7?version=5');
      await registry.open('meter', 'gpib+usb:///dev/ttyUSB0/9?version=5');
      expect(createTransport).toHaveBeenCalledTimes(1);
      expect(created.map(c => c.address)).toEqual(['/dev/ttyUSB0/7', '/dev/ttyUSB0/9']);

      await created[0].close();
      expect(serialManager.openPorts()).toEqual(['/dev/ttyUSB0']);
      await created[1].close();
      expect(serialManager.openPorts()).toEqual([]);
    });

    it('should use its own manager when none is given', async () => {
      const registry = createInstrumentRegistry();
      registry.register('meter', communicator => ({ close: () => communicator.close() }));
      const acquire = vi.spyOn(registry.serialManager, 'acquire').mockImplementation(async path =>
        Err(new ConnectionError(`Failed to open ${path}`, { transport: 'serial', address: path }))
      );

      await registry.open('meter', 'gpib+usb://COM3/1?version=5');
      const second = await registry.open('meter', 'gpib+usb://COM3/2?version=5');
      expect(acquire).toHaveBeenCalledTimes(2);
      expect(!second.ok && second.error.message).toBe('Failed to open COM3');
    });
  });

  describe('registerSampleInstruments', () => {
    it('should register the bundled definitions', () => {
      const registry = createInstrumentRegistry();
      expect(registerSampleInstruments(registry).ok).toBe(true);
      expect(registry.names()).toEqual(['scpi', 'srs-dg645', 'matrix-wps300s']);
    });

    it('should fail when a name is already taken', () => {
      const registry = createInstrumentRegistry();
      registerSampleInstruments(registry);
      expect(registerSampleInstruments(registry).ok).toBe(false);
    });

    it('should open a bundled instrument over loopback', async () => {
      const registry = createInstrumentRegistry();
      registerSampleInstruments(registry);
      const opened = await registry.open('scpi', 'loopback://dmm', { loopbackInput: 'ACME,X1,SN1,1.0\n' });
      expect(opened.ok).toBe(true);
    });
  });
});
