/**
 * Prober Tests
 *
 * Runs against in-process TCP servers on the loopback interface.
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import { createServer } from 'net';
import type { Server } from 'net';
import { probeTarget, describeProbeError } from './prober.js';

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address && typeof address === 'object') {
        resolve(address.port);
      } else {
        reject(new Error('server has no TCP address'));
      }
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe('probeTarget', () => {
  const servers: Server[] = [];

  afterEach(async () => {
    await Promise.all(servers.filter((s) => s.listening).map(close));
    servers.length = 0;
  });

  it('reports online with the security assessment when the port accepts', async () => {
    const server = createServer((socket) => socket.end());
    servers.push(server);
    const port = await listen(server);

    const result = await probeTarget({ host: '127.0.0.1', port, auth: { type: 'password' } }, 2_000);

    expect(result.health).toBe('online');
    expect(result.security).toBe('secure');
    expect(result.error).toBeNull();
    expect(result.latencyMs).toEqual(expect.any(Number));
  });

  it('reports offline with the elapsed latency when the port refuses', async () => {
    const server = createServer();
    const port = await listen(server);
    await close(server);

    const result = await probeTarget({ host: '127.0.0.1', port, auth: { type: 'agent' } }, 2_000);

    expect(result.health).toBe('offline');
    expect(result.security).toBe('unknown');
    expect(result.error).toBe(`SSH port closed/refused (127.0.0.1:${port})`);
    expect(result.latencyMs).toEqual(expect.any(Number));
  });

  it('never rejects on an invalid port', async () => {
    const result = await probeTarget({ host: '127.0.0.1', port: 70_000, auth: { type: 'agent' } }, 500);
    expect(result.health).toBe('offline');
    expect(result.error).toEqual(expect.any(String));
  });
});

describe('describeProbeError', () => {
  const target = { host: 'db.internal', port: 2222 };

  it('recognizes DNS failures', () => {
    expect(describeProbeError(new Error('getaddrinfo ENOTFOUND db.internal'), target))
      .toBe('DNS lookup failed for db.internal');
  });

  it('recognizes timeouts', () => {
    expect(describeProbeError(new Error('connect ETIMEDOUT 10.0.0.1:2222'), target))
      .toBe('Health check timed out (db.internal:2222)');
  });

  it('recognizes unreachable networks', () => {
    expect(describeProbeError(new Error('connect EHOSTUNREACH 10.0.0.1:2222'), target))
      .toBe('Host/network unreachable (db.internal)');
  });

  it('passes other messages through', () => {
    expect(describeProbeError(new Error('socket hang up'), target)).toBe('socket hang up');
  });
});
