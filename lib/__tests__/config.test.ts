import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { defaults, loadInstruments, parseInstrumentConfig, walkConfig } from '../config.js';
import { createInstrumentRegistry } from '../devices/registry.js';
import { registerSampleInstruments } from '../devices/drivers/index.js';

function sampleRegistry() {
  const registry = createInstrumentRegistry();
  registerSampleInstruments(registry);
  return registry;
}

describe('Config', () => {
  describe('defaults', () => {
    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it('should fall back to built-in values', () => {
      vi.stubEnv('BENCHLINK_TIMEOUT_MS', '');
      vi.stubEnv('BENCHLINK_SERIAL_BAUD', '');
      vi.stubEnv('BENCHLINK_GPIB_BAUD', '');
      vi.stubEnv('BENCHLINK_COMMAND_DELAY_MS', '');
      vi.stubEnv('BENCHLINK_DEBUG', '');
      expect(defaults()).toEqual({
        timeoutMs: 3000,
        serialBaud: 115200,
        gpibBaud: 460800,
        commandDelayMs: 10,
        debug: false,
      });
    });

    it('should read the environment on every call', () => {
      vi.stubEnv('BENCHLINK_TIMEOUT_MS', '1500');
      vi.stubEnv('BENCHLINK_DEBUG', 'yes');
      expect(defaults().timeoutMs).toBe(1500);
      expect(defaults().debug).toBe(true);
    });

    it('should ignore values that are not numbers', () => {
      vi.stubEnv('BENCHLINK_SERIAL_BAUD', 'fast');
      expect(defaults().serialBaud).toBe(115200);
    });
  });

  describe('walkConfig', () => {
    const tree = { lab: { bench: { psu: { class: 'scpi', uri: 'loopback://psu' } } } };

    it('should return the root for "/"', () => {
      expect(walkConfig(tree, '/')).toEqual({ ok: true, value: tree });
    });

    it('should descend through nested sections', () => {
      expect(walkConfig(tree, '/lab/bench')).toEqual({ ok: true, value: tree.lab.bench });
    });

    it('should report a missing section', () => {
      const result = walkConfig(tree, '/lab/shelf');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Config section not found: /lab/shelf');
    });
  });

  describe('parseInstrumentConfig', () => {
    function errorOf(text: string, section?: string): string {
      const result = parseInstrumentConfig(text, sampleRegistry(), section);
      return result.ok ? '' : result.error.message;
    }

    it('should return entries by name', () => {
      const result = parseInstrumentConfig(
        '{"psu": {"class": "matrix-wps300s", "uri": "loopback://psu"}}',
        sampleRegistry()
      );
      expect(result.ok && [...result.value.entries()]).toEqual([
        ['psu', { class: 'matrix-wps300s', uri: 'loopback://psu' }],
      ]);
    });

    it('should reject malformed JSON', () => {
      expect(errorOf('{').startsWith('Malformed instrument config: ')).toBe(true);
    });

    it('should reject a top level that is not an object', () => {
      expect(errorOf('[]')).toBe('Instrument config must be a JSON object');
    });

    it('should require class and uri', () => {
      expect(errorOf('{"psu": {"class": "scpi"}}')).toBe('Instrument "psu" needs string "class" and "uri" fields');
    });

    it('should reject unknown classes', () => {
      expect(errorOf('{"psu": {"class": "foo", "uri": "loopback://psu"}}')).toBe(
        'Instrument "psu" names unknown class "foo"'
      );
    });

    it('should read only the named section', () => {
      const text = '{"bench": {"dmm": {"class": "scpi", "uri": "loopback://dmm"}}, "other": 1}';
      const result = parseInstrumentConfig(text, sampleRegistry(), '/bench');
      expect(result.ok && [...result.value.keys()]).toEqual(['dmm']);
    });
  });

  describe('loadInstruments', () => {
    let dir: string;
    let logSpy: MockInstance<typeof console.log>;
    let warnSpy: MockInstance<typeof console.warn>;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'benchlink-config-'));
      logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(async () => {
      logSpy.mockRestore();
      warnSpy.mockRestore();
      await rm(dir, { recursive: true, force: true });
    });

    it('should open every entry and record failures as null', async () => {
      const path = join(dir, 'instruments.json');
      await writeFile(path, JSON.stringify({
        bench: {
          psu: { class: 'matrix-wps300s', uri: 'loopback://psu' },
          bad: { class: 'scpi', uri: 'ftp://x' },
        },
      }));

      const result = await loadInstruments(path, sampleRegistry(), { section: '/bench' });
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.get('psu')).not.toBeNull();
      expect(result.value.get('bad')).toBeNull();
      expect(logSpy).toHaveBeenCalledWith('[Config] Opened psu (matrix-wps300s) at loopback://psu');
      expect(warnSpy).toHaveBeenCalledWith('[Config] Failed to open bad (scpi) at ftp://x: Unknown URI scheme "ftp"');
    });

    it('should report a missing file', async () => {
      const path = join(dir, 'missing.json');
      const result = await loadInstruments(path, sampleRegistry());
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message.startsWith(`Cannot read instrument config ${path}: `)).toBe(true);
    });
  });
});
