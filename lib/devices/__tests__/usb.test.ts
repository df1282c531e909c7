import { describe, it, expect } from 'vitest';
import { createRawUsbTransport } from '../transports/usb.js';
import { createMockUsbDevice } from './mock-usb.js';

describe('Raw USB Transport', () => {
  it('should write bytes without framing', async () => {
    const mock = createMockUsbDevice();
    const transport = createRawUsbTransport(mock.device);
    await transport.open();
    await transport.write(Buffer.from('MEAS?\r'));
    expect(mock.sent.map(b => b.toString())).toEqual(['MEAS?\r']);
  });

  it('should assemble a line across packets', async () => {
    const mock = createMockUsbDevice();
    mock.inbox.push(Buffer.from('12.'), Buffer.from('5\rnext'));
    const transport = createRawUsbTransport(mock.device);
    await transport.open();
    const line = await transport.readUntil(Buffer.from('\r'), 100);
    expect(line.ok && line.value.toString()).toBe('12.5');
    const rest = await transport.readExactly(4, 100);
    expect(rest.ok && rest.value.toString()).toBe('next');
  });

  it('should discard buffered bytes on flush', async () => {
    const mock = createMockUsbDevice();
    mock.inbox.push(Buffer.from('old\rnew'), Buffer.from('\r'));
    const transport = createRawUsbTransport(mock.device);
    await transport.open();
    await transport.readUntil(Buffer.from('\r'), 100);
    await transport.flushInput();
    const line = await transport.readUntil(Buffer.from('\r'), 100);
    expect(line.ok && line.value.toString()).toBe('');
  });

  it('should time out with a non-reusable error', async () => {
    const mock = createMockUsbDevice();
    const transport = createRawUsbTransport(mock.device);
    await transport.open();
    const result = await transport.readExactly(1, 20);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toMatchObject({ kind: 'timeout', reusable: false });
  });

  it('should time out when bytes keep arriving without a terminator', async () => {
    const mock = createMockUsbDevice({ trickle: Buffer.from('x') });
    const transport = createRawUsbTransport(mock.device);
    await transport.open();
    const started = Date.now();
    const result = await transport.readUntil(Buffer.from('\n'), 50);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toMatchObject({ kind: 'timeout', reusable: false });
    expect(Date.now() - started).toBeLessThan(500);
  });

  it('should time out on zero-length packets', async () => {
    const mock = createMockUsbDevice({ trickle: Buffer.alloc(0) });
    const transport = createRawUsbTransport(mock.device);
    await transport.open();
    const result = await transport.readExactly(4, 50);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('timeout');
  });

  it('should reject I/O before open', async () => {
    const transport = createRawUsbTransport(createMockUsbDevice().device);
    const result = await transport.write(Buffer.from('x'));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Device not opened');
  });
});
