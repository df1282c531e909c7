import { describe, it, expect } from 'vitest';
import { createVisaTransport, parseVisaResource } from '../transports/visa.js';
import { createMockUsbDevice } from './mock-usb.js';

describe('VISA', () => {
  describe('parseVisaResource', () => {
    it('should parse raw socket resources', () => {
      expect(parseVisaResource('TCPIP0::10.0.0.5::5025::SOCKET')).toEqual({
        ok: true,
        value: { type: 'socket', host: '10.0.0.5', port: 5025 },
      });
    });

    it('should map numbered serial resources to COM ports', () => {
      expect(parseVisaResource('ASRL3::INSTR')).toEqual({ ok: true, value: { type: 'serial', path: 'COM3' } });
      expect(parseVisaResource('ASRL/dev/ttyUSB0::INSTR')).toEqual({
        ok: true,
        value: { type: 'serial', path: '/dev/ttyUSB0' },
      });
    });

    it('should parse USB resources with hex ids', () => {
      expect(parseVisaResource('USB0::0x1AB1::0x0588::DS1ZA123::INSTR')).toEqual({
        ok: true,
        value: { type: 'usb', vendorId: 0x1ab1, productId: 0x0588, serialNumber: 'DS1ZA123' },
      });
    });

    it('should reject VXI-11 resources', () => {
      const result = parseVisaResource('TCPIP::10.0.0.5::INSTR');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('connection');
        expect(result.error.message).toBe('VXI-11 INSTR resources are not supported; use a ::SOCKET resource');
      }
    });

    it('should reject unknown resources', () => {
      const result = parseVisaResource('GPIB0::5::INSTR');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Unrecognized VISA resource string: GPIB0::5::INSTR');
    });
  });

  describe('createVisaTransport', () => {
    it('should fail to open when no USB device matches', async () => {
      const created = createVisaTransport('USB0::0x1AB1::0x0588::INSTR', { baudRate: 9600, findDevice: () => null });
      if (!created.ok) throw created.error;
      const result = await created.value.open();
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('No USB device matches the resource');
    });

    it('should route USB sessions through USBTMC framing', async () => {
      const mock = createMockUsbDevice();
      const created = createVisaTransport('USB0::0x1AB1::0x0588::INSTR', {
        baudRate: 9600,
        findDevice: (vendorId, productId) => (vendorId === 0x1ab1 && productId === 0x0588 ? mock.device : null),
      });
      if (!created.ok) throw created.error;
      const transport = created.value;

      expect((await transport.open()).ok).toBe(true);
      expect(transport.kind).toBe('visa');
      expect(transport.isOpen()).toBe(true);
      await transport.write(Buffer.from('*IDN?\n'));
      expect(mock.sent[0][0]).toBe(1);
      expect(mock.sent[0].subarray(12, 18).toString()).toBe('*IDN?\n');
    });

    it('should reject I/O before open', async () => {
      const created = createVisaTransport('TCPIP0::127.0.0.1::5025::SOCKET', { baudRate: 9600 });
      if (!created.ok) throw created.error;
      const result = await created.value.write(Buffer.from('x'));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('VISA session not open');
    });
  });
});
