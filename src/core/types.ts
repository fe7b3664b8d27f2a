/**
 * Core type definitions for the bootstrap
 */

// ============================================================================
// Configuration
// ============================================================================

/**
 * Read-only key/value view of the hosting platform's environment.
 * `process.env` satisfies it; tests pass plain objects.
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;

export interface BindConfiguration {
  readonly host: string;
  readonly port: number;
}

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

// ============================================================================
// Entry point and runner
// ============================================================================

/**
 * `<module>:<attribute>` reference to the ASGI application object
 */
export interface EntryPointRef {
  readonly module: string;
  readonly attribute: string;
  readonly ref: string;
}

export interface RunnerCommand {
  command: string;
  args: string[];
}

export interface LaunchPlan {
  entryPoint: EntryPointRef;
  bind: BindConfiguration;
  runner: RunnerCommand;
  env: EnvSource;
  /** Readiness probe polling interval in milliseconds */
  probeIntervalMs: number;
}

// ============================================================================
// Launcher lifecycle
// ============================================================================

export type LauncherState = 'STARTING' | 'RUNNING' | 'FAILED' | 'EXITED';

export interface LaunchOutcome {
  /** Exit code the bootstrap terminates with */
  exitCode: number;
  /** Runner exit code, null when it died from a signal */
  code: number | null;
  signal: NodeJS.Signals | null;
  /** True when the runner was observed listening before it exited */
  reachedRunning: boolean;
}

/**
 * Anything that can run a launch plan to completion
 */
export interface ServiceLauncher {
  run(plan: LaunchPlan): Promise<LaunchOutcome>;
}
