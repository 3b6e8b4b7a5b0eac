/**
 * Health Monitor Tests
 *
 * The probe is injected so ticks resolve instantly or on demand.
 */

import { jest, describe, it, expect, afterEach } from '@jest/globals';
import { createTarget } from '@hostwarden/core';
import type { HealthUpdateMessage, ProbeResult, Target } from '@hostwarden/core';
import { HealthMonitor } from './health-monitor.js';
import type { ProbeFn } from './prober.js';

function makeTarget(id: string, port = 22): Target {
  return createTarget({
    id,
    name: id,
    host: `${id}.internal`,
    port,
    user: 'deploy',
    auth: { type: 'agent' },
    description: null,
    tags: [],
    createdAt: 0,
    updatedAt: 0,
  });
}

const ONLINE: ProbeResult = { health: 'online', security: 'secure', latencyMs: 3, error: null };

async function waitFor(condition: () => boolean, timeoutMs = 1_000): Promise<void> {
  const started = Date.now();
  while (!condition()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error('condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

describe('HealthMonitor', () => {
  const monitors: HealthMonitor[] = [];

  function createMonitor(probe: ProbeFn, intervalMs = 20) {
    const monitor = new HealthMonitor({ intervalMs, timeoutMs: 100, probe });
    monitors.push(monitor);
    return monitor;
  }

  afterEach(async () => {
    for (const monitor of monitors) {
      monitor.stop();
      await monitor.join();
    }
    monitors.length = 0;
  });

  it('probes immediately and queues results in target order', async () => {
    const delays: Record<string, number> = { 'a.internal': 30, 'b.internal': 0, 'c.internal': 10 };
    const probe = jest.fn<ProbeFn>(async (target) => {
      await new Promise((resolve) => setTimeout(resolve, delays[target.host]));
      return ONLINE;
    });
    const monitor = createMonitor(probe, 10_000);

    monitor.start([makeTarget('a'), makeTarget('b'), makeTarget('c')]);
    const received: string[] = [];
    await waitFor(() => {
      received.push(...monitor.drainUpdates().map((m) => m.targetId));
      return received.length >= 3;
    });

    expect(received).toEqual(['a', 'b', 'c']);
  });

  it('passes the configured timeout to every probe', async () => {
    const probe = jest.fn<ProbeFn>(async () => ONLINE);
    const monitor = createMonitor(probe, 10_000);

    monitor.start([makeTarget('a')]);
    await waitFor(() => probe.mock.calls.length === 1);

    expect(probe.mock.calls[0][1]).toBe(100);
  });

  it('keeps probing every interval while running', async () => {
    const probe = jest.fn<ProbeFn>(async () => ONLINE);
    const monitor = createMonitor(probe, 10);

    monitor.start([makeTarget('a')]);
    await waitFor(() => probe.mock.calls.length >= 3);

    expect(monitor.isRunning).toBe(true);
  });

  it('ignores a second start while running', async () => {
    const probe = jest.fn<ProbeFn>(async () => ONLINE);
    const monitor = createMonitor(probe, 10_000);

    expect(monitor.start([makeTarget('a')])).toBe(true);
    expect(monitor.start([makeTarget('b')])).toBe(false);
  });

  it('produces nothing after stop has been observed', async () => {
    const probe = jest.fn<ProbeFn>(async () => ONLINE);
    const monitor = createMonitor(probe, 10);

    monitor.start([makeTarget('a')]);
    await waitFor(() => probe.mock.calls.length >= 1);
    monitor.stop();
    await monitor.join();
    monitor.drainUpdates();

    const callsAtStop = probe.mock.calls.length;
    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(monitor.isRunning).toBe(false);
    expect(probe.mock.calls.length).toBe(callsAtStop);
    expect(monitor.tryRecvUpdate()).toBeNull();
  });

  it('discards results of a tick that finishes after stop', async () => {
    let release: () => void = () => {};
    const probe = jest.fn<ProbeFn>(() => new Promise<ProbeResult>((resolve) => {
      release = () => resolve(ONLINE);
    }));
    const monitor = createMonitor(probe, 10);

    monitor.start([makeTarget('a')]);
    await waitFor(() => probe.mock.calls.length === 1);
    monitor.stop();
    release();
    await monitor.join();

    expect(monitor.drainUpdates()).toEqual([]);
  });

  it('reads a live provider at every tick', async () => {
    const targets: Target[] = [makeTarget('a')];
    const probe = jest.fn<ProbeFn>(async () => ONLINE);
    const monitor = createMonitor(probe, 10);

    monitor.start(() => targets);
    await waitFor(() => probe.mock.calls.length >= 1);
    targets.push(makeTarget('late'));

    await waitFor(() => monitor.drainUpdates().some((m) => m.targetId === 'late'));
  });

  it('uses a snapshot when given an array', async () => {
    const targets: Target[] = [makeTarget('a')];
    const probe = jest.fn<ProbeFn>(async () => ONLINE);
    const monitor = createMonitor(probe, 10);

    monitor.start(targets);
    targets.push(makeTarget('late'));
    await waitFor(() => probe.mock.calls.length >= 4);

    const ids = new Set(monitor.drainUpdates().map((m) => m.targetId));
    expect(ids).toEqual(new Set(['a']));
  });

  it('turns a throwing probe into an unknown result', async () => {
    const probe = jest.fn<ProbeFn>(async () => {
      throw new Error('resolver crashed');
    });
    const monitor = createMonitor(probe, 10_000);

    monitor.start([makeTarget('a')]);
    const received: HealthUpdateMessage[] = [];
    await waitFor(() => {
      const message = monitor.tryRecvUpdate();
      if (message) received.push(message);
      return received.length === 1;
    });

    expect(received[0].result).toEqual({
      health: 'unknown',
      security: 'unknown',
      latencyMs: null,
      error: 'Health check error: resolver crashed',
    });
  });

  it('exits when the receiving end is closed', async () => {
    const probe = jest.fn<ProbeFn>(async () => ONLINE);
    const monitor = createMonitor(probe, 10);

    monitor.close();
    expect(monitor.start([makeTarget('a')])).toBe(false);

    const other = createMonitor(probe, 10);
    other.start([makeTarget('a')]);
    await waitFor(() => probe.mock.calls.length >= 1);
    other.close();
    await other.join();
    expect(other.isRunning).toBe(false);
  });

  it('abort returns immediately and drops in-flight results', async () => {
    const probe = jest.fn<ProbeFn>(() => new Promise<ProbeResult>((resolve) => setTimeout(() => resolve(ONLINE), 30)));
    const monitor = createMonitor(probe, 10);

    monitor.start([makeTarget('a')]);
    await waitFor(() => probe.mock.calls.length === 1);
    monitor.abort();
    await monitor.join();
    await new Promise((resolve) => setTimeout(resolve, 60));

    expect(monitor.drainUpdates()).toEqual([]);
  });

  it('checkNow probes out of band', async () => {
    const probe = jest.fn<ProbeFn>(async () => ONLINE);
    const monitor = createMonitor(probe);

    await expect(monitor.checkNow(makeTarget('a'))).resolves.toEqual(ONLINE);
    expect(monitor.isRunning).toBe(false);
  });
});
