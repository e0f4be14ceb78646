import { once } from 'node:events';
import net from 'node:net';
import { Duplex, type Readable } from 'node:stream';

import { createLogger, type Logger } from '../src/logger.js';

export const silentLogger: Logger = createLogger('silent', 'test');

export async function waitFor(predicate: () => boolean, timeoutMs = 3_000, label = 'condition'): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error(`timed out waiting for ${label}`);
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

export async function listen(server: net.Server, host = '127.0.0.1'): Promise<number> {
  server.listen(0, host);
  await once(server, 'listening');
  const addr = server.address();
  if (addr && typeof addr === 'object') return addr.port;
  throw new Error('Expected server to bind to an ephemeral port');
}

export async function closeServer(server: net.Server): Promise<void> {
  if (!server.listening) return;
  await new Promise<void>((resolve) => server.close(() => resolve()));
}

/** Echo service that tracks its sockets so tests can tear them down. */
export async function startEchoServer(): Promise<{ server: net.Server; port: number; sockets: Set<net.Socket> }> {
  const sockets = new Set<net.Socket>();
  const server = net.createServer({ allowHalfOpen: true }, (socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
    socket.on('error', () => socket.destroy());
    socket.pipe(socket);
  });
  const port = await listen(server);
  return { server, port, sockets };
}

export async function stopEchoServer(echo: { server: net.Server; sockets: Set<net.Socket> }): Promise<void> {
  for (const socket of echo.sockets) socket.destroy();
  await closeServer(echo.server);
}

/** A port nothing listens on, found by binding and releasing an ephemeral port. */
export async function unusedPort(): Promise<number> {
  const server = net.createServer();
  const port = await listen(server);
  await closeServer(server);
  return port;
}

/** Reads from `socket` until `expected` bytes arrived. */
export async function readBytes(socket: Readable, expected: number, timeoutMs = 3_000): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;
  return await new Promise<Buffer>((resolve, reject) => {
    const timer = setTimeout(() => {
      cleanup();
      reject(new Error(`read ${total}/${expected} bytes before timing out`));
    }, timeoutMs);
    const onData = (chunk: Buffer) => {
      chunks.push(chunk);
      total += chunk.length;
      if (total >= expected) {
        cleanup();
        resolve(Buffer.concat(chunks));
      }
    };
    const onClose = () => {
      cleanup();
      reject(new Error(`socket closed after ${total}/${expected} bytes`));
    };
    const cleanup = () => {
      clearTimeout(timer);
      socket.removeListener('data', onData);
      socket.removeListener('close', onClose);
    };
    socket.on('data', onData);
    socket.once('close', onClose);
  });
}

export async function connectTcp(port: number, host = '127.0.0.1'): Promise<net.Socket> {
  const socket = net.createConnection({ host, port, allowHalfOpen: true });
  await once(socket, 'connect');
  // A relay tearing the connection down may reset it; tests observe that through 'close'.
  socket.on('error', () => socket.destroy());
  return socket;
}

/** In-memory duplex whose writes come out of its peer; `end()` becomes the peer's EOF. */
export class MemoryDuplex extends Duplex {
  peer: MemoryDuplex | null = null;

  constructor() {
    super({ allowHalfOpen: true });
  }

  override _read(): void {}

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (err?: Error | null) => void): void {
    this.peer?.push(chunk);
    callback();
  }

  override _final(callback: (err?: Error | null) => void): void {
    this.peer?.push(null);
    callback();
  }
}

export function memoryDuplexPair(): [MemoryDuplex, MemoryDuplex] {
  const a = new MemoryDuplex();
  const b = new MemoryDuplex();
  a.peer = b;
  b.peer = a;
  return [a, b];
}
