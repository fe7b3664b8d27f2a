/**
 * Readiness probe
 * Observes whether the runner has bound its port; never binds anything itself
 */

import * as net from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';
import type { BindConfiguration } from '../core/types.js';

export const DEFAULT_PROBE_INTERVAL_MS = 250;

export type PortConnector = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

export interface WaitForPortOptions {
  intervalMs?: number;
  signal: AbortSignal;
  connect?: PortConnector;
}

/**
 * Map a wildcard bind address to the loopback address to probe
 */
export function probeHostFor(bindHost: string): string {
  if (bindHost === '0.0.0.0') return '127.0.0.1';
  if (bindHost === '::') return '::1';
  return bindHost;
}

/**
 * Single TCP connection attempt
 */
export const connectOnce: PortConnector = (host, port, timeoutMs) =>
  new Promise((resolve) => {
    const socket = net.createConnection({ host, port });
    const finish = (connected: boolean) => {
      socket.destroy();
      resolve(connected);
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
  });

/**
 * Poll until the port accepts a connection. Resolves false if aborted first.
 */
export async function waitForPort(bind: BindConfiguration, options: WaitForPortOptions): Promise<boolean> {
  const { signal } = options;
  const intervalMs = options.intervalMs ?? DEFAULT_PROBE_INTERVAL_MS;
  const connect = options.connect ?? connectOnce;
  const host = probeHostFor(bind.host);

  while (!signal.aborted) {
    if (await connect(host, bind.port, intervalMs)) {
      return !signal.aborted;
    }

    try {
      await sleep(intervalMs, undefined, { signal });
    } catch (err) {
      if (signal.aborted) return false;
      throw err;
    }
  }

  return false;
}
