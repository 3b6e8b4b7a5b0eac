/**
 * Orchestrator Tests
 *
 * The launcher is faked, the monitor runs on an injected probe and
 * process detection is mocked so no process is ever signalled.
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type { ProbeResult, TargetSpec } from '@hostwarden/core';
import type { ProbeFn } from './health/prober.js';
import type { LaunchResult } from './launcher/connection-launcher.js';
import type { Launcher, Notification, Orchestrator as OrchestratorType } from './orchestrator.js';

// ─── MOCKS (must be before module-under-test import) ──────────

const mockIsProcessRunning = jest.fn<(pid: number) => Promise<boolean>>();
const mockKillProcess = jest.fn<(pid: number) => Promise<{ success: boolean; error?: string }>>();

jest.unstable_mockModule('./connection/process-detection.js', () => ({
  isProcessRunning: mockIsProcessRunning,
  killProcess: mockKillProcess,
  isCommandOnPath: jest.fn(async () => false),
  isProcessNamed: jest.fn(async () => false),
}));

// ─── IMPORTS (after mocks) ────────────────────────────────────

const { Orchestrator } = await import('./orchestrator.js');
const { HealthMonitor } = await import('./health/health-monitor.js');

// ─── HELPERS ──────────────────────────────────────────────────

const ONLINE: ProbeResult = { health: 'online', security: 'secure', latencyMs: 4, error: null };
const OFFLINE: ProbeResult = {
  health: 'offline',
  security: 'unknown',
  latencyMs: null,
  error: 'SSH port closed/refused (web.internal:22)',
};

const NEW_WINDOW: LaunchResult = { success: true, method: 'new-window', terminal: 'kitty', pid: 4321, probe: ONLINE };

function opened(pid: number): LaunchResult {
  return { success: true, method: 'new-window', terminal: 'kitty', pid, probe: ONLINE };
}

/** A launch whose completion the test controls. */
function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

function spec(id: string, name: string, host = `${name}.internal`): TargetSpec {
  return {
    id,
    name,
    host,
    port: 22,
    user: 'deploy',
    auth: { type: 'agent' },
    description: null,
    tags: [],
    createdAt: 0,
    updatedAt: 0,
  };
}

async function waitFor(condition: () => boolean | Promise<boolean>, timeoutMs = 2_000): Promise<void> {
  const started = Date.now();
  while (!(await condition())) {
    if (Date.now() - started > timeoutMs) {
      throw new Error('condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

let running: OrchestratorType[] = [];

function setup(specs: TargetSpec[] = [spec('t1', 'web')]) {
  const probe = jest.fn<ProbeFn>(async () => ONLINE);
  const monitor = new HealthMonitor({ intervalMs: 20, probe });
  const launcher = {
    decideAndLaunch: jest.fn<Launcher['decideAndLaunch']>(async () => NEW_WINDOW),
    setSuspender: jest.fn<Launcher['setSuspender']>(),
  };
  const orchestrator = new Orchestrator({ targets: specs, monitor, launcher });
  const notes: Notification[] = [];
  orchestrator.on('notification', (n) => notes.push(n));
  running.push(orchestrator);

  const messages = () => notes.map((n) => [n.level, n.message]);
  return { orchestrator, probe, launcher, notes, messages };
}

// ─── TESTS ────────────────────────────────────────────────────

describe('Orchestrator', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    mockIsProcessRunning.mockResolvedValue(true);
    mockKillProcess.mockResolvedValue({ success: true });
  });

  afterEach(async () => {
    await Promise.all(running.map((o) => o.stop()));
    running = [];
  });

  describe('connect', () => {
    it('tracks a session opened in a new window', async () => {
      const { orchestrator, launcher, messages } = setup();

      const result = await orchestrator.connect('t1');

      expect(result).toEqual(NEW_WINDOW);
      expect(launcher.decideAndLaunch.mock.calls[0][1]).toBe('auto');
      expect(orchestrator.snapshot().sessions).toEqual([
        { pid: 4321, targetId: 't1', label: 'SSH: web', startedAt: expect.any(Number) },
      ]);
      expect(orchestrator.targets.get('t1')?.health).toBe('online');
      expect(orchestrator.targets.get('t1')?.stats.successCount).toBe(1);
      expect(messages()).toEqual([['success', 'Opened web in Kitty (PID 4321)']]);
    });

    it('passes an explicit mode through', async () => {
      const { orchestrator, launcher } = setup();
      await orchestrator.connect('t1', 'direct');
      expect(launcher.decideAndLaunch.mock.calls[0][1]).toBe('direct');
    });

    it('shows the target as connecting while the launch runs', async () => {
      const { orchestrator, launcher } = setup();
      let seen: string | undefined;
      launcher.decideAndLaunch.mockImplementation(async (target) => {
        seen = target.health;
        return NEW_WINDOW;
      });

      await orchestrator.connect('t1');

      expect(seen).toBe('connecting');
    });

    it('marks an unreachable target offline', async () => {
      const { orchestrator, launcher, messages } = setup();
      launcher.decideAndLaunch.mockResolvedValue({
        success: false,
        error: { kind: 'unreachable', message: 'Cannot connect: SSH port closed/refused (web.internal:22)' },
        probe: OFFLINE,
      });

      await orchestrator.connect('t1');

      expect(orchestrator.targets.get('t1')?.health).toBe('offline');
      expect(orchestrator.snapshot().sessions).toEqual([]);
      expect(messages()).toEqual([['error', 'Cannot connect: SSH port closed/refused (web.internal:22)']]);
    });

    it('keeps the verified health when the spawn fails', async () => {
      const { orchestrator, launcher, messages } = setup();
      launcher.decideAndLaunch.mockResolvedValue({
        success: false,
        error: { kind: 'spawn-failed', message: 'Failed to launch Kitty: spawn kitty ENOENT' },
        probe: ONLINE,
      });

      await orchestrator.connect('t1');

      expect(orchestrator.targets.get('t1')?.health).toBe('online');
      expect(messages()).toEqual([['error', 'Failed to launch Kitty: spawn kitty ENOENT']]);
    });

    it('reports the exit code of a direct session', async () => {
      const { orchestrator, launcher, messages } = setup();
      launcher.decideAndLaunch.mockResolvedValue({ success: true, method: 'direct', exitCode: 0, probe: ONLINE });

      await orchestrator.connect('t1');

      expect(orchestrator.snapshot().sessions).toEqual([]);
      expect(messages()).toEqual([['info', 'Disconnected from web (exit code 0)']]);
    });

    it('turns a thrown launch into a notification and restores health', async () => {
      const { orchestrator, launcher, messages } = setup();
      launcher.decideAndLaunch.mockRejectedValue(new Error('EAGAIN'));

      expect(await orchestrator.connect('t1')).toBeNull();
      expect(orchestrator.targets.get('t1')?.health).toBe('unknown');
      expect(messages()).toEqual([['error', 'Failed to connect to web: EAGAIN']]);
    });

    it('reports unknown targets without launching', async () => {
      const { orchestrator, launcher, messages } = setup();

      expect(await orchestrator.connect('nope')).toBeNull();
      expect(launcher.decideAndLaunch).not.toHaveBeenCalled();
      expect(messages()).toEqual([['error', 'Unknown target: nope']]);
    });

    it('does not track a session for a target removed during the launch', async () => {
      const { orchestrator, launcher } = setup();
      launcher.decideAndLaunch.mockImplementation(async () => {
        orchestrator.removeTarget('t1');
        return NEW_WINDOW;
      });

      await orchestrator.connect('t1');

      expect(orchestrator.snapshot()).toMatchObject({ targets: [], sessions: [] });
    });

    it('keeps every session well-formed when two connects overlap', async () => {
      const { orchestrator, launcher } = setup();
      const first = deferred<LaunchResult>();
      const second = deferred<LaunchResult>();
      launcher.decideAndLaunch.mockReturnValueOnce(first.promise).mockReturnValueOnce(second.promise);

      const firstConnect = orchestrator.connect('t1');
      const secondConnect = orchestrator.connect('t1');
      expect(orchestrator.targets.get('t1')?.health).toBe('connecting');

      second.resolve(opened(5002));
      await secondConnect;
      expect(orchestrator.snapshot().sessions.map((s) => s.pid)).toEqual([5002]);

      first.resolve(opened(5001));
      await firstConnect;

      const sessions = [...orchestrator.snapshot().sessions].sort((a, b) => a.pid - b.pid);
      expect(sessions).toEqual([
        { pid: 5001, targetId: 't1', label: 'SSH: web', startedAt: expect.any(Number) },
        { pid: 5002, targetId: 't1', label: 'SSH: web', startedAt: expect.any(Number) },
      ]);
      expect(orchestrator.targets.get('t1')?.health).toBe('online');
      expect(orchestrator.targets.get('t1')?.stats.successCount).toBe(2);
    });

    it('restores the last observed health when an overlapping launch throws', async () => {
      const { orchestrator, launcher } = setup();
      await orchestrator.probeNow('t1');
      const first = deferred<LaunchResult>();
      const second = deferred<LaunchResult>();
      launcher.decideAndLaunch.mockReturnValueOnce(first.promise).mockReturnValueOnce(second.promise);

      const firstConnect = orchestrator.connect('t1');
      const secondConnect = orchestrator.connect('t1');

      first.reject(new Error('EAGAIN'));
      expect(await firstConnect).toBeNull();
      expect(orchestrator.targets.get('t1')?.health).toBe('online');

      second.resolve(opened(5003));
      await secondConnect;
      expect(orchestrator.targets.get('t1')?.health).toBe('online');
      expect(orchestrator.snapshot().sessions.map((s) => s.pid)).toEqual([5003]);
    });
  });

  describe('history', () => {
    it('records every finished attempt, newest first', async () => {
      const { orchestrator, launcher } = setup();
      launcher.decideAndLaunch
        .mockResolvedValueOnce(NEW_WINDOW)
        .mockResolvedValueOnce({ success: true, method: 'direct', exitCode: 255, probe: ONLINE })
        .mockResolvedValueOnce({
          success: false,
          error: { kind: 'unreachable', message: 'Cannot connect: SSH port closed/refused (web.internal:22)' },
          probe: OFFLINE,
        })
        .mockRejectedValueOnce(new Error('EAGAIN'));

      await orchestrator.connect('t1');
      await orchestrator.connect('t1', 'direct');
      await orchestrator.connect('t1', 'new-window');
      await orchestrator.connect('t1');

      expect(orchestrator.snapshot().history.map((e) => [e.targetName, e.mode, e.outcome, e.detail])).toEqual([
        ['web', 'auto', 'failed', 'EAGAIN'],
        ['web', 'new-window', 'failed', 'Cannot connect: SSH port closed/refused (web.internal:22)'],
        ['web', 'direct', 'completed', 'exit code 255'],
        ['web', 'auto', 'opened', 'Kitty (PID 4321)'],
      ]);
    });

    it('does not record unknown targets', async () => {
      const { orchestrator } = setup();
      await orchestrator.connect('nope');
      expect(orchestrator.snapshot().history).toEqual([]);
    });

    it('summarises stats, history and sessions', async () => {
      const { orchestrator, launcher } = setup([spec('t1', 'web'), spec('t2', 'db')]);
      launcher.decideAndLaunch.mockResolvedValueOnce(opened(7001)).mockResolvedValueOnce(opened(7002));

      await orchestrator.connect('t1');
      await orchestrator.connect('t1');

      expect(orchestrator.analytics()).toMatchObject({
        targetCount: 2,
        onlineCount: 1,
        activeSessions: 2,
        totalChecks: 2,
        checkSuccessRate: 100,
        averageLatencyMs: 4,
        connectAttempts: 2,
        connectFailures: 0,
        mostUsed: [{ targetId: 't1', name: 'web', connections: 2 }],
      });
    });
  });

  describe('health', () => {
    it('probes one target on demand', async () => {
      const { orchestrator, probe } = setup();

      expect(await orchestrator.probeNow('t1')).toEqual(ONLINE);
      expect(probe.mock.calls[0][1]).toBe(5_000);
      expect(orchestrator.targets.get('t1')?.health).toBe('online');
    });

    it('refreshes every target', async () => {
      const { orchestrator, probe, messages } = setup([spec('t1', 'web'), spec('t2', 'db')]);
      probe.mockImplementation(async (target) => (target.host === 'web.internal' ? ONLINE : OFFLINE));

      await orchestrator.refreshAll();

      expect(orchestrator.targets.get('t1')?.health).toBe('online');
      expect(orchestrator.targets.get('t2')?.health).toBe('offline');
      expect(messages()).toEqual([['info', 'Refreshed 2 target(s): 1 online']]);
    });

    it('notifies only when reachability flips', async () => {
      const { orchestrator, probe, messages } = setup();
      let current = ONLINE;
      probe.mockImplementation(async () => current);
      orchestrator.startMonitor();

      const settleOn = async (health: string) => {
        await waitFor(async () => {
          await orchestrator.tick();
          return orchestrator.targets.get('t1')?.health === health;
        });
      };

      await settleOn('online');
      expect(messages()).toEqual([]);

      current = OFFLINE;
      await settleOn('offline');
      current = ONLINE;
      await settleOn('online');

      expect(messages()).toEqual([
        ['warning', 'web went offline: SSH port closed/refused (web.internal:22)'],
        ['success', 'web is back online'],
      ]);
    });

    it('monitors targets added after the monitor started', async () => {
      const { orchestrator, probe } = setup();
      orchestrator.startMonitor();

      orchestrator.addTarget(spec('t2', 'db'));

      await waitFor(() => probe.mock.calls.some(([target]) => target.host === 'db.internal'));
      await waitFor(async () => {
        await orchestrator.tick();
        return orchestrator.targets.get('t2')?.health === 'online';
      });
    });

    it('reports whether the monitor is running', async () => {
      const { orchestrator } = setup();

      expect(orchestrator.startMonitor()).toBe(true);
      expect(orchestrator.startMonitor()).toBe(false);
      expect(orchestrator.snapshot().monitorRunning).toBe(true);

      await orchestrator.stopMonitor();
      expect(orchestrator.snapshot().monitorRunning).toBe(false);
    });
  });

  describe('sessions', () => {
    it('drops sessions whose window was closed on the next tick', async () => {
      const { orchestrator, messages } = setup();
      await orchestrator.connect('t1');
      mockIsProcessRunning.mockResolvedValue(false);

      await orchestrator.tick();

      expect(orchestrator.snapshot().sessions).toEqual([]);
      expect(messages()).toContainEqual(['info', 'SSH: web ended']);
    });

    it('kills a single session', async () => {
      const { orchestrator, messages } = setup();
      await orchestrator.connect('t1');

      const result = await orchestrator.killSession(4321);

      expect(result).toEqual({ pid: 4321, success: true });
      expect(mockKillProcess).toHaveBeenCalledWith(4321);
      expect(orchestrator.snapshot().sessions).toEqual([]);
      expect(messages()).toContainEqual(['success', 'Killed SSH: web (PID 4321)']);
    });

    it('kills every session and summarises', async () => {
      const { orchestrator, launcher, messages } = setup();
      await orchestrator.connect('t1');
      launcher.decideAndLaunch.mockResolvedValue({ ...NEW_WINDOW, pid: 5555 });
      await orchestrator.connect('t1');

      const summary = await orchestrator.killAllSessions();

      expect(summary).toEqual({ killed: 2, failed: 0, failures: [] });
      expect(messages()).toContainEqual(['success', 'Killed 2 SSH sessions']);
    });

    it('says so when there is nothing to kill', async () => {
      const { orchestrator, messages } = setup();

      await orchestrator.killAllSessions();

      expect(mockKillProcess).not.toHaveBeenCalled();
      expect(messages()).toEqual([['info', 'No active sessions']]);
    });

    it('forgets sessions of a removed target', async () => {
      const { orchestrator } = setup();
      await orchestrator.connect('t1');

      orchestrator.removeTarget('t1');

      expect(orchestrator.snapshot().sessions).toEqual([]);
      expect(mockKillProcess).not.toHaveBeenCalled();
    });
  });

  describe('tick', () => {
    it('services queued requests on the next tick only', async () => {
      const { orchestrator, launcher } = setup();

      orchestrator.request({ type: 'connect', targetId: 't1' });
      expect(launcher.decideAndLaunch).not.toHaveBeenCalled();

      await orchestrator.tick();
      expect(launcher.decideAndLaunch).toHaveBeenCalledTimes(1);

      orchestrator.request({ type: 'kill', pid: 4321 });
      await orchestrator.tick();
      expect(mockKillProcess).toHaveBeenCalledWith(4321);
      expect(orchestrator.snapshot().sessions).toEqual([]);
    });

    it('does not overlap', async () => {
      const { orchestrator, launcher } = setup();
      let release: (result: LaunchResult) => void = () => {};
      launcher.decideAndLaunch.mockImplementation(() => new Promise((resolve) => {
        release = resolve;
      }));
      orchestrator.request({ type: 'connect', targetId: 't1' });

      const first = orchestrator.tick();
      await orchestrator.tick();
      await waitFor(() => launcher.decideAndLaunch.mock.calls.length === 1);
      release(NEW_WINDOW);
      await first;

      expect(launcher.decideAndLaunch).toHaveBeenCalledTimes(1);
      expect(orchestrator.snapshot().sessions).toHaveLength(1);
    });

    it('emits change when updates are applied', async () => {
      const { orchestrator } = setup();
      let changes = 0;
      const off = orchestrator.on('change', () => { changes++; });

      orchestrator.startMonitor();
      const afterStart = changes;
      await waitFor(async () => {
        await orchestrator.tick();
        return orchestrator.targets.get('t1')?.health === 'online';
      });
      expect(changes).toBeGreaterThan(afterStart);

      off();
      const settled = changes;
      orchestrator.addTarget(spec('t2', 'db'));
      expect(changes).toBe(settled);
    });
  });

  it('hands the suspender to the launcher', () => {
    const { orchestrator, launcher } = setup();
    const suspender = { suspend: () => {}, resume: () => {} };

    orchestrator.setTerminalSuspender(suspender);

    expect(launcher.setSuspender).toHaveBeenCalledWith(suspender);
  });
});
