/**
 * Prober timeout tests
 *
 * net.Socket is replaced with a socket that never connects.
 */

import { jest, describe, it, expect } from '@jest/globals';
import { EventEmitter } from 'events';

const destroyed: string[] = [];

class SilentSocket extends EventEmitter {
  private endpoint = '';

  connect(port: number, host: string): this {
    this.endpoint = `${host}:${port}`;
    return this;
  }

  destroy(): this {
    destroyed.push(this.endpoint);
    return this;
  }
}

jest.unstable_mockModule('net', () => ({
  Socket: SilentSocket,
}));

const { probeTarget } = await import('./prober.js');

describe('probeTarget timeout', () => {
  it('gives up after the timeout and reports it', async () => {
    const started = Date.now();
    const result = await probeTarget({ host: '10.255.0.1', port: 22, auth: { type: 'agent' } }, 50);
    const elapsed = Date.now() - started;

    expect(result).toEqual({
      health: 'offline',
      security: 'unknown',
      latencyMs: expect.any(Number),
      error: 'Health check timed out (10.255.0.1:22)',
    });
    expect(elapsed).toBeGreaterThanOrEqual(45);
    expect(elapsed).toBeLessThan(1_000);
    expect(destroyed).toEqual(['10.255.0.1:22']);
  });
});
