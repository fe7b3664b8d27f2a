/**
 * Service Process Launcher
 * Runs the ASGI runner as the container's foreground service and propagates its exit status
 */

import { spawn } from 'node:child_process';
import type { SpawnOptions } from 'node:child_process';
import * as os from 'node:os';
import type {
  LaunchOutcome,
  LaunchPlan,
  LauncherState,
  ServiceLauncher,
} from '../core/types.js';
import {
  EXIT_FAILURE,
  EXIT_NOT_EXECUTABLE,
  EXIT_NOT_FOUND,
  LaunchError,
} from '../core/errors.js';
import { logger } from '../core/logger.js';
import { connectOnce, probeHostFor, waitForPort, type PortConnector } from './readiness.js';
import { redactRunnerArgs } from './runner-command.js';

/**
 * The parts of a child process the launcher relies on
 */
export interface ServiceProcess {
  readonly pid?: number | undefined;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'error', listener: (err: Error) => void): this;
  once(event: 'spawn', listener: () => void): this;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ServiceProcess;

export type SignalListener = (signal: NodeJS.Signals) => void;

/**
 * Where termination signals come from; `process` in production
 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
}

export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGHUP'];

export interface ProcessLauncherOptions {
  spawnProcess?: SpawnFn;
  signals?: SignalSource;
  connect?: PortConnector;
  onStateChange?: (state: LauncherState) => void;
}

interface ExitResult {
  code: number | null;
  signal: NodeJS.Signals | null;
}

const defaultSpawn: SpawnFn = (command, args, options) => spawn(command, args, options);

/**
 * Conventional shell status for a process killed by a signal
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return 128 + (entry ? entry[1] : 0);
}

function spawnFailureExitCode(err: Error): number {
  if ('code' in err) {
    if (err.code === 'ENOENT') return EXIT_NOT_FOUND;
    if (err.code === 'EACCES') return EXIT_NOT_EXECUTABLE;
  }
  return EXIT_FAILURE;
}

export class ProcessLauncher implements ServiceLauncher {
  private state: LauncherState = 'STARTING';
  private readonly spawnProcess: SpawnFn;
  private readonly signals: SignalSource;
  private readonly connect: PortConnector;
  private readonly onStateChange?: (state: LauncherState) => void;
  private terminationSignal: NodeJS.Signals | null = null;

  constructor(options: ProcessLauncherOptions = {}) {
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
    this.signals = options.signals ?? process;
    this.connect = options.connect ?? connectOnce;
    this.onStateChange = options.onStateChange;
  }

  getState(): LauncherState {
    return this.state;
  }

  private setState(next: LauncherState): void {
    if (this.state === next) return;
    logger.debug('Launcher state change', { from: this.state, to: next });
    this.state = next;
    this.onStateChange?.(next);
  }

  /**
   * Refuse to start when something already accepts connections on the port.
   * Connecting binds nothing.
   */
  private async assertPortFree(plan: LaunchPlan): Promise<void> {
    const { bind } = plan;
    const inUse = await this.connect(probeHostFor(bind.host), bind.port, plan.probeIntervalMs);
    if (inUse) {
      this.setState('FAILED');
      throw new LaunchError(`Port ${bind.port} is already in use`, {
        exitCode: EXIT_FAILURE,
        details: { host: bind.host, port: bind.port },
      });
    }
  }

  /**
   * Spawn the runner and wait for it to exit
   */
  async run(plan: LaunchPlan): Promise<LaunchOutcome> {
    const { runner, bind } = plan;
    const startTime = Date.now();

    this.state = 'STARTING';
    this.terminationSignal = null;

    await this.assertPortFree(plan);

    logger.info('Starting service', {
      entryPoint: plan.entryPoint.ref,
      host: bind.host,
      port: bind.port,
      command: runner.command,
      args: redactRunnerArgs(runner.args),
    });

    // Own process group: a terminal Ctrl-C reaches the runner once, through forwarding
    const child = this.spawnProcess(runner.command, runner.args, {
      env: { ...plan.env },
      stdio: 'inherit',
      detached: true,
    });

    const forward: SignalListener = (signal) => {
      logger.info(`${signal} received, forwarding to service`, { pid: child.pid });
      this.terminationSignal = signal;
      child.kill(signal);
    };
    for (const signal of FORWARDED_SIGNALS) {
      this.signals.on(signal, forward);
    }

    const probeController = new AbortController();
    const readiness = waitForPort(bind, {
      intervalMs: plan.probeIntervalMs,
      signal: probeController.signal,
      connect: this.connect,
    }).then(
      (ready) => {
        if (ready && this.state === 'STARTING') {
          this.setState('RUNNING');
          logger.info('Service listening', {
            host: bind.host,
            port: bind.port,
            elapsed: Date.now() - startTime,
          });
        }
      },
      (err: unknown) => {
        logger.warn('Readiness probe failed', {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    );

    let exit: ExitResult;
    try {
      exit = await this.waitForExit(child, runner.command);
    } catch (err) {
      this.setState('FAILED');
      throw err;
    } finally {
      probeController.abort();
      await readiness;
      for (const signal of FORWARDED_SIGNALS) {
        this.signals.off(signal, forward);
      }
    }

    return this.settle(exit, plan, startTime);
  }

  private waitForExit(child: ServiceProcess, command: string): Promise<ExitResult> {
    return new Promise((resolve, reject) => {
      let spawned = false;

      child.once('spawn', () => {
        spawned = true;
        logger.debug('Service process spawned', { pid: child.pid });
      });

      child.on('error', (err: Error) => {
        if (spawned) {
          logger.error('Service process error', { pid: child.pid, error: err.message });
          return;
        }
        reject(
          new LaunchError(`Failed to start runner "${command}": ${err.message}`, {
            exitCode: spawnFailureExitCode(err),
            cause: err,
            details: { command },
          })
        );
      });

      child.once('exit', (code, signal) => {
        resolve({ code, signal });
      });
    });
  }

  private settle(exit: ExitResult, plan: LaunchPlan, startTime: number): LaunchOutcome {
    const reachedRunning = this.state === 'RUNNING';
    const exitCode = exit.code ?? (exit.signal ? signalExitCode(exit.signal) : EXIT_FAILURE);
    const elapsed = Date.now() - startTime;

    if (!reachedRunning && exitCode !== 0 && this.terminationSignal === null) {
      this.setState('FAILED');
      throw new LaunchError(
        `Service "${plan.entryPoint.ref}" exited with status ${exitCode} before binding ${plan.bind.host}:${plan.bind.port}`,
        {
          exitCode,
          details: { code: exit.code, signal: exit.signal, elapsed },
        }
      );
    }

    this.setState('EXITED');
    logger.info('Service exited', {
      code: exit.code,
      signal: exit.signal,
      exitCode,
      elapsed,
    });

    return { exitCode, code: exit.code, signal: exit.signal, reachedRunning };
  }
}
