import { describe, it, expect } from 'vitest';
import { createByteQueue } from '../transports/byte-queue.js';

describe('ByteQueue', () => {
  it('returns a line without its terminator and keeps the rest', async () => {
    const queue = createByteQueue({ kind: 'socket', address: 'test:1' });
    queue.push(Buffer.from('OK\nNEXT'));
    const result = await queue.readUntil(Buffer.from('\n'), 100);
    expect(result.ok && result.value.toString()).toBe('OK');
    expect(queue.length).toBe(4);
  });

  it('waits for a terminator split across chunks', async () => {
    const queue = createByteQueue({ kind: 'socket', address: 'test:1' });
    const pending = queue.readUntil(Buffer.from('\r\n'), 1000);
    queue.push(Buffer.from('OK\r'));
    queue.push(Buffer.from('\n'));
    const result = await pending;
    expect(result.ok && result.value.toString()).toBe('OK');
  });

  it('reads an exact number of bytes', async () => {
    const queue = createByteQueue({ kind: 'serial', address: '/dev/ttyUSB0' });
    queue.push(Buffer.from([1, 2, 3, 4]));
    const result = await queue.readExactly(3, 100);
    expect(result.ok && [...result.value]).toEqual([1, 2, 3]);
    expect(queue.length).toBe(1);
  });

  it('times out and stays usable', async () => {
    const queue = createByteQueue({ kind: 'socket', address: 'test:1' });
    const result = await queue.readUntil(Buffer.from('\n'), 20);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('timeout');
      expect(result.error.message).toBe('Timeout after 20ms waiting for terminator');
    }

    queue.push(Buffer.from('late\n'));
    const next = await queue.readUntil(Buffer.from('\n'), 20);
    expect(next.ok && next.value.toString()).toBe('late');
  });

  it('marks timeouts as not reusable when configured', async () => {
    const queue = createByteQueue({ kind: 'file', address: 'in.txt', reusableTimeout: false });
    const result = await queue.readExactly(2, 10);
    expect(result.ok).toBe(false);
    if (!result.ok && result.error.kind === 'timeout') {
      expect(result.error).toMatchObject({ reusable: false, timeoutMs: 10 });
    }
  });

  it('fails with the partial data when the stream ends', async () => {
    const queue = createByteQueue({ kind: 'socket', address: 'test:1' });
    queue.push(Buffer.from('half'));
    queue.end();
    const result = await queue.readUntil(Buffer.from('\n'), 100);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('framing');
      expect(result.error).toMatchObject({ partial: 'half' });
    }
  });

  it('rejects a second concurrent read', async () => {
    const queue = createByteQueue({ kind: 'socket', address: 'test:1' });
    const first = queue.readUntil(Buffer.from('\n'), 1000);
    const second = await queue.readUntil(Buffer.from('\n'), 1000);
    expect(second.ok).toBe(false);
    if (!second.ok) expect(second.error.message).toBe('Another read is already pending');
    queue.push(Buffer.from('x\n'));
    expect((await first).ok).toBe(true);
  });

  it('rejects an empty terminator', async () => {
    const queue = createByteQueue({ kind: 'socket', address: 'test:1' });
    const result = await queue.readUntil(Buffer.alloc(0), 100);
    expect(result.ok).toBe(false);
  });
});
