import { describe, it, expect, vi } from 'vitest';
import { createProxyList } from '../proxy-list.js';
import type { ProxyKey } from '../proxy-list.js';

interface ChannelView {
  native: ProxyKey;
  key: ProxyKey;
}

const parent = { name: 'scope' };

function view(_parent: typeof parent, native: ProxyKey, key: ProxyKey): ChannelView {
  return { native, key };
}

describe('ProxyList', () => {
  describe('index ranges', () => {
    it('yields one view per index in ascending order', () => {
      const channels = createProxyList(parent, view, { count: 4, base: 1 });
      expect(channels.length).toBe(4);
      expect([...channels].map(c => c.native)).toEqual([1, 2, 3, 4]);
      expect(channels.keys()).toEqual([0, 1, 2, 3]);
    });

    it('maps positions onto native indices', () => {
      const channels = createProxyList(parent, view, { count: 4, base: 1 });
      expect(channels.get(0)).toEqual({ ok: true, value: { native: 1, key: 0 } });
    });

    it('rejects indices outside the range', () => {
      const channels = createProxyList(parent, view, { count: 4, base: 1 });
      const result = channels.get(4);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('index');
        expect(result.error.message).toBe('Index 4 is not valid; expected one of 0..3');
        expect(result.error.index).toBe(4);
      }
    });

    it('does not accept native values for ranges', () => {
      const channels = createProxyList(parent, view, { count: 2, base: 1 });
      expect(channels.get(2).ok).toBe(false);
    });

    it('rejects a negative count', () => {
      expect(() => createProxyList(parent, view, { count: -1 })).toThrow('Invalid index range: count -1, base 0');
    });
  });

  describe('label tables', () => {
    const OUTPUTS = { T0: 0, AB: 1, CD: 2 } as const;

    it('looks up by label', () => {
      const outputs = createProxyList(parent, view, OUTPUTS);
      expect(outputs.get('AB')).toEqual({ ok: true, value: { native: 1, key: 'AB' } });
    });

    it('looks up by native value', () => {
      const outputs = createProxyList(parent, view, OUTPUTS);
      const byLabel = outputs.get('CD');
      const byNative = outputs.get(2);
      expect(byLabel.ok && byNative.ok && byLabel.value === byNative.value).toBe(true);
    });

    it('lists the labels on failure', () => {
      const outputs = createProxyList(parent, view, OUTPUTS);
      const result = outputs.get('EF');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Index "EF" is not valid; expected one of T0, AB, CD');
    });
  });

  describe('label lists', () => {
    it('passes labels through unchanged', () => {
      const axes = createProxyList(parent, view, ['X', 'Y', 'Z']);
      expect([...axes].map(a => a.native)).toEqual(['X', 'Y', 'Z']);
      expect(axes.get('Y')).toEqual({ ok: true, value: { native: 'Y', key: 'Y' } });
    });
  });

  describe('caching', () => {
    it('builds each view once', () => {
      const createView = vi.fn(view);
      const channels = createProxyList(parent, createView, { count: 3 });
      const first = channels.get(1);
      const second = channels.get(1);
      [...channels];
      expect(first.ok && second.ok && first.value === second.value).toBe(true);
      expect(createView).toHaveBeenCalledTimes(3);
    });

    it('hands the parent to the view factory', () => {
      const createView = vi.fn(view);
      createProxyList(parent, createView, ['A']).get('A');
      expect(createView).toHaveBeenCalledWith(parent, 'A', 'A');
    });
  });
});
