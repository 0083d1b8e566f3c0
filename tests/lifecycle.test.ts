import { describe, it, expect, afterEach } from 'vitest';
import { EventEmitter } from 'node:events';
import https from 'node:https';
import net from 'node:net';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { buildConfig, type RawConfig } from '../src/config.js';
import { ListenError, TlsLoadError } from '../src/errors.js';
import { MetricsServer, SHUTDOWN_SIGNALS, waitForShutdownSignal } from '../src/lifecycle.js';
import { silentLogger } from './helpers/logger.js';
import { isPortFree, occupyPort } from './helpers/port-allocator.js';

const TLS_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures', 'tls');
const CERT = path.join(TLS_DIR, 'cert.pem');
const KEY = path.join(TLS_DIR, 'key.pem');
const OTHER_KEY = path.join(TLS_DIR, 'other-key.pem');

function httpsGet(url: string): Promise<{ status: number; body: string }> {
  return new Promise((resolve, reject) => {
    https.get(url, { rejectUnauthorized: false }, (res) => {
      let body = '';
      res.setEncoding('utf8');
      res.on('data', (chunk: string) => { body += chunk; });
      res.on('end', () => resolve({ status: res.statusCode ?? 0, body }));
    }).on('error', reject);
  });
}

const servers: MetricsServer[] = [];
afterEach(async () => {
  await Promise.all(servers.splice(0).map((s) => s.shutdown()));
});

function newServer(raw: RawConfig = {}): MetricsServer {
  const server = new MetricsServer(buildConfig({ listenAddress: '127.0.0.1:0', ...raw }), { logger: silentLogger() });
  servers.push(server);
  return server;
}

describe('MetricsServer', () => {
  it('moves created -> listening -> stopped', async () => {
    const server = newServer({ minCount: 1, maxCount: 1 });
    expect(server.state).toBe('created');

    const addr = await server.start();
    expect(server.state).toBe('listening');
    expect(addr.port).toBeGreaterThan(0);

    const res = await fetch(`http://127.0.0.1:${addr.port}/metrics`);
    expect(res.status).toBe(200);
    expect(await res.json()).toHaveLength(1);

    const health = await fetch(`http://127.0.0.1:${addr.port}/health`);
    expect(await health.json()).toMatchObject({ status: 'ok', state: 'listening' });

    await server.shutdown();
    expect(server.state).toBe('stopped');
    expect(await isPortFree(addr.port)).toBe(true);
  });

  it('shares one shutdown across concurrent callers', async () => {
    const server = newServer();
    await server.start();
    const first = server.shutdown();
    const second = server.shutdown();
    expect(second).toBe(first);
    await first;
    expect(server.state).toBe('stopped');
  });

  it('cannot be restarted', async () => {
    const server = newServer();
    await server.start();
    await server.shutdown();
    await expect(server.start()).rejects.toThrow('cannot start server in state stopped');
  });

  it('stops without ever listening', async () => {
    const server = newServer();
    await server.shutdown();
    expect(server.state).toBe('stopped');
  });

  it('fails to start on an occupied port', async () => {
    const held = await occupyPort();
    try {
      const server = newServer({ listenAddress: `127.0.0.1:${held.port}` });
      await expect(server.start()).rejects.toBeInstanceOf(ListenError);
      expect(server.state).toBe('created');
      expect(server.address).toBeUndefined();
    } finally {
      await held.release();
    }
  });

  it('fails to start when TLS material cannot be read', async () => {
    const server = newServer({ tlsCert: '/nonexistent/cert.pem', tlsKey: '/nonexistent/key.pem' });
    const err = await server.start().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TlsLoadError);
    expect(err).toMatchObject({ kind: 'TLS_LOAD' });
    expect(server.state).toBe('created');
  });

  it('rejects a second start while the first is still binding', async () => {
    const server = newServer();
    const first = server.start();
    await expect(server.start()).rejects.toThrow('server start already in progress or failed');
    await expect(first).resolves.toMatchObject({ address: '127.0.0.1' });
    expect(server.state).toBe('listening');
  });

  it('waits for an in-progress start before shutting down', async () => {
    const server = newServer();
    const started = server.start();
    await server.shutdown();
    const { port } = await started;
    expect(server.state).toBe('stopped');
    expect(await isPortFree(port)).toBe(true);
  });

  it('serves metrics over TLS when cert and key are both given', async () => {
    const server = newServer({ tlsCert: CERT, tlsKey: KEY, minCount: 2, maxCount: 2 });
    const { port } = await server.start();
    const res = await httpsGet(`https://127.0.0.1:${port}/metrics`);
    expect(res.status).toBe(200);
    expect(JSON.parse(res.body)).toHaveLength(2);
  });

  it('fails to start when the key does not match the certificate', async () => {
    const server = newServer({ tlsCert: CERT, tlsKey: OTHER_KEY });
    await expect(server.start()).rejects.toBeInstanceOf(TlsLoadError);
    expect(server.state).toBe('created');
  });

  it('fails to start when the certificate is given as the key', async () => {
    const server = newServer({ tlsCert: CERT, tlsKey: CERT });
    await expect(server.start()).rejects.toBeInstanceOf(TlsLoadError);
  });

  it('bounds shutdown by the grace period when a client holds a connection', async () => {
    const server = newServer({ shutdownGraceMs: 100 });
    const { port } = await server.start();

    const socket = net.connect({ port, host: '127.0.0.1' });
    socket.on('error', () => { /* reset by the server during shutdown */ });
    await new Promise<void>((resolve) => socket.once('connect', () => resolve()));
    // Headers never finish, so the request stays in flight
    socket.write('GET /metrics HTTP/1.1\r\nHost: 127.0.0.1\r\n');

    const began = Date.now();
    await server.shutdown();
    expect(server.state).toBe('stopped');
    expect(Date.now() - began).toBeLessThan(3000);
    socket.destroy();
  });
});

describe('waitForShutdownSignal', () => {
  it('resolves with the first signal and detaches its listeners', async () => {
    const source = new EventEmitter();
    const waiting = waitForShutdownSignal(source);
    for (const sig of SHUTDOWN_SIGNALS) expect(source.listenerCount(sig)).toBe(1);

    source.emit('SIGHUP');
    source.emit('SIGINT');
    await expect(waiting).resolves.toBe('SIGHUP');
    for (const sig of SHUTDOWN_SIGNALS) expect(source.listenerCount(sig)).toBe(0);
  });

  it('detaches without resolving when cancelled', async () => {
    const source = new EventEmitter();
    const cancel = new AbortController();
    let resolved = false;
    void waitForShutdownSignal(source, SHUTDOWN_SIGNALS, cancel.signal).then(() => { resolved = true; });
    expect(source.listenerCount('SIGINT')).toBe(1);
    cancel.abort();
    for (const sig of SHUTDOWN_SIGNALS) expect(source.listenerCount(sig)).toBe(0);
    source.emit('SIGINT');
    await new Promise((r) => setTimeout(r, 10));
    expect(resolved).toBe(false);
  });

  it('listens only to the requested signals', async () => {
    const source = new EventEmitter();
    const waiting = waitForShutdownSignal(source, ['SIGINT']);
    expect(source.listenerCount('SIGHUP')).toBe(0);
    source.emit('SIGINT');
    await expect(waiting).resolves.toBe('SIGINT');
  });
});
