import { describe, it, expect } from 'vitest';
import { expectedProtocol } from '../testing/expected-protocol.js';
import { createScpiInstrument, parseErrorEntry, parseIdentity } from '../drivers/scpi-instrument.js';

describe('SCPI Instrument', () => {
  describe('parseIdentity', () => {
    it('should split the four fields and keep commas in the firmware', () => {
      expect(parseIdentity('ACME,X1,SN1,1.0,2.0')).toEqual({
        manufacturer: 'ACME',
        model: 'X1',
        serialNumber: 'SN1',
        firmware: '1.0,2.0',
      });
    });

    it('should return null for short responses', () => {
      expect(parseIdentity('ACME,X1')).toBeNull();
    });
  });

  describe('parseErrorEntry', () => {
    it('should parse code and message', () => {
      expect(parseErrorEntry('-113,"Undefined header"')).toEqual({ code: -113, message: 'Undefined header' });
    });
  });

  describe('common commands', () => {
    it('should send the IEEE 488.2 commands', async () => {
      await expectedProtocol(createScpiInstrument, ['*RST', '*CLS', '*TRG', '*WAI'], [], async scpi => {
        await scpi.reset();
        await scpi.clear();
        await scpi.trigger();
        await scpi.waitToContinue();
      });
    });

    it('should decode *OPC? and *TST?', async () => {
      await expectedProtocol(createScpiInstrument, ['*OPC?', '*TST?'], ['1', '0'], async scpi => {
        expect(await scpi.opComplete()).toEqual({ ok: true, value: true });
        expect(await scpi.selfTestOk()).toEqual({ ok: true, value: true });
      });
    });

    it('should cache the identity', async () => {
      await expectedProtocol(createScpiInstrument, ['*IDN?'], ['ACME,X1,SN1,1.0'], async scpi => {
        await scpi.name();
        expect(await scpi.name()).toEqual({ ok: true, value: 'ACME,X1,SN1,1.0' });
      });
    });

    it('should reject a malformed identity', async () => {
      await expectedProtocol(createScpiInstrument, ['*IDN?'], ['ACME'], async scpi => {
        const result = await scpi.identity();
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.message).toBe('*IDN?: expected manufacturer,model,serial,firmware');
      });
    });
  });

  describe('error queue', () => {
    it('should return null when the queue is empty', async () => {
      await expectedProtocol(createScpiInstrument, ['SYST:ERR?'], ['0,"No error"'], async scpi => {
        expect(await scpi.nextError()).toEqual({ ok: true, value: null });
      });
    });

    it('should return the oldest error', async () => {
      await expectedProtocol(createScpiInstrument, ['SYST:ERR?'], ['-222,"Data out of range"'], async scpi => {
        expect(await scpi.nextError()).toEqual({ ok: true, value: { code: -222, message: 'Data out of range' } });
      });
    });

    it('should list all queued codes', async () => {
      await expectedProtocol(
        createScpiInstrument,
        ['SYST:ERR:CODE:ALL?', 'SYST:ERR:CODE:ALL?'],
        ['-113,-222', '0'],
        async scpi => {
          expect(await scpi.errorQueue()).toEqual({ ok: true, value: [-113, -222] });
          expect(await scpi.errorQueue()).toEqual({ ok: true, value: [] });
        }
      );
    });
  });

  describe('system properties', () => {
    it('should read the SCPI version as text', async () => {
      await expectedProtocol(createScpiInstrument, ['SYST:VERS?'], ['1999.0'], async scpi => {
        expect(await scpi.scpiVersion.get()).toEqual({ ok: true, value: '1999.0' });
      });
    });

    it('should set the power-on status flag', async () => {
      await expectedProtocol(createScpiInstrument, ['*PSC 0'], [], async scpi => {
        await scpi.powerOnStatus.set(false);
      });
    });

    it('should read and set the line frequency', async () => {
      await expectedProtocol(createScpiInstrument, ['SYST:LFR?', 'SYST:LFR 60.0'], ['50'], async scpi => {
        expect(await scpi.lineFrequency.get()).toEqual({ ok: true, value: { value: 50, unit: 'Hz' } });
        await scpi.lineFrequency.set(60);
      });
    });

    it('should keep display brightness within 0-1', async () => {
      await expectedProtocol(createScpiInstrument, ['DISP:BRIG 0.5'], [], async scpi => {
        await scpi.displayBrightness.set(0.5);
        const result = await scpi.displayBrightness.set(1.5);
        expect(result.ok).toBe(false);
        if (!result.ok) {
          expect(result.error.message).toBe(
            '1.5 dimensionless is outside the range [0, 1] dimensionless for DISP:BRIG'
          );
        }
      });
    });
  });
});
