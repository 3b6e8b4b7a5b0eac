/**
 * Health Prober
 *
 * Raw TCP reachability check against a target's SSH port. A successful
 * connect means "online"; nothing is spoken over the socket.
 */

import { Socket } from 'net';
import { assessSecurity, getErrorCode, getErrorMessage } from '@hostwarden/core';
import type { ProbeResult, Target } from '@hostwarden/core';

type ProbeEndpoint = Pick<Target, 'host' | 'port' | 'auth'>;

export type ProbeFn = (target: ProbeEndpoint, timeoutMs: number) => Promise<ProbeResult>;

class ProbeTimeoutError extends Error {
  constructor() {
    super('timeout');
    this.name = 'ProbeTimeoutError';
  }
}

/**
 * Turn a socket error into a short, host-specific description.
 */
export function describeProbeError(err: unknown, target: Pick<Target, 'host' | 'port'>): string {
  const message = getErrorMessage(err);
  const code = getErrorCode(err);

  if (code === 'ENOTFOUND' || code === 'EAI_AGAIN' || /ENOTFOUND|EAI_AGAIN|getaddrinfo/i.test(message)) {
    return `DNS lookup failed for ${target.host}`;
  }
  if (err instanceof ProbeTimeoutError || code === 'ETIMEDOUT' || /ETIMEDOUT/i.test(message)) {
    return `Health check timed out (${target.host}:${target.port})`;
  }
  if (code === 'ECONNREFUSED' || /ECONNREFUSED|connection refused/i.test(message)) {
    return `SSH port closed/refused (${target.host}:${target.port})`;
  }
  if (/EHOSTUNREACH|ENETUNREACH|unreachable/i.test(message)) {
    return `Host/network unreachable (${target.host})`;
  }
  return message;
}

function connectOnce(host: string, port: number, timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const socket = new Socket();
    let settled = false;

    const finalize = (handler: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.removeAllListeners();
      socket.destroy();
      handler();
    };

    const timer = setTimeout(() => {
      finalize(() => reject(new ProbeTimeoutError()));
    }, timeoutMs);

    socket.once('connect', () => finalize(resolve));
    socket.once('error', (err) => finalize(() => reject(err)));

    try {
      socket.connect(port, host);
    } catch (err) {
      // invalid port ranges throw synchronously
      finalize(() => reject(err));
    }
  });
}

/**
 * Probe a target once. Never rejects: failures come back as an
 * offline result with the elapsed time recorded as latency.
 */
export async function probeTarget(target: ProbeEndpoint, timeoutMs: number): Promise<ProbeResult> {
  const started = Date.now();

  try {
    await connectOnce(target.host, target.port, timeoutMs);
    return {
      health: 'online',
      security: assessSecurity(target.auth, target.port),
      latencyMs: Date.now() - started,
      error: null,
    };
  } catch (err) {
    return {
      health: 'offline',
      security: 'unknown',
      latencyMs: Date.now() - started,
      error: describeProbeError(err, target),
    };
  }
}
