import { describe, it, expect, afterEach } from 'vitest';
import net from 'node:net';
import { createSocketTransport } from '../transports/socket.js';
import type { Transport } from '../types.js';

interface TestServer {
  server: net.Server;
  port: number;
  received: Buffer[];
}

function listen(onConnection: (socket: net.Socket) => void): Promise<TestServer> {
  const received: Buffer[] = [];
  const server = net.createServer(socket => {
    socket.on('data', chunk => received.push(chunk));
    onConnection(socket);
  });
  return new Promise(resolve => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = address !== null && typeof address === 'object' ? address.port : 0;
      resolve({ server, port, received });
    });
  });
}

function closeServer(server: net.Server): Promise<void> {
  return new Promise(resolve => server.close(() => resolve()));
}

describe('Socket Transport', () => {
  let transport: Transport | null = null;
  let server: net.Server | null = null;

  afterEach(async () => {
    if (transport) await transport.close();
    if (server) await closeServer(server);
    transport = null;
    server = null;
  });

  it('should assemble a line split across packets', async () => {
    const test = await listen(socket => {
      socket.write('OK');
      setTimeout(() => socket.write('\n'), 20);
    });
    server = test.server;
    transport = createSocketTransport({ host: '127.0.0.1', port: test.port });
    expect((await transport.open()).ok).toBe(true);

    const line = await transport.readUntil(Buffer.from('\n'), 1000);
    expect(line.ok && line.value.toString()).toBe('OK');
  });

  it('should send bytes to the peer', async () => {
    const test = await listen(() => {});
    server = test.server;
    transport = createSocketTransport({ host: '127.0.0.1', port: test.port });
    await transport.open();
    expect((await transport.write(Buffer.from('*IDN?\n'))).ok).toBe(true);

    await new Promise(resolve => setTimeout(resolve, 50));
    expect(Buffer.concat(test.received).toString()).toBe('*IDN?\n');
  });

  it('should time out when no terminator arrives', async () => {
    const test = await listen(() => {});
    server = test.server;
    transport = createSocketTransport({ host: '127.0.0.1', port: test.port });
    await transport.open();
    const result = await transport.readUntil(Buffer.from('\n'), 30);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('timeout');
  });

  it('should report a peer that closes mid-line', async () => {
    const test = await listen(socket => {
      socket.end('parti');
    });
    server = test.server;
    transport = createSocketTransport({ host: '127.0.0.1', port: test.port });
    await transport.open();
    const result = await transport.readUntil(Buffer.from('\n'), 1000);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('framing');
      expect(result.error).toMatchObject({ partial: 'parti' });
    }
    expect(transport.isOpen()).toBe(false);
  });

  it('should fail to connect to a closed port', async () => {
    const test = await listen(() => {});
    await closeServer(test.server);
    const closed = createSocketTransport({ host: '127.0.0.1', port: test.port, connectTimeout: 500 });
    const result = await closed.open();
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('connection');
      expect(result.error.message.startsWith(`Failed to connect to 127.0.0.1:${test.port}`)).toBe(true);
    }
  });
});
