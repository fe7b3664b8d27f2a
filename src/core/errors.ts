/**
 * Bootstrap error taxonomy
 *
 * Every failure carries the exit code the container terminates with.
 */

export const EXIT_FAILURE = 1;
export const EXIT_NOT_EXECUTABLE = 126;
export const EXIT_NOT_FOUND = 127;
export const EXIT_USAGE = 64;
export const EXIT_CONFIG = 78;

export type BootstrapErrorCode = 'USAGE' | 'CONFIGURATION' | 'LAUNCH';

export interface BootstrapErrorOptions {
  exitCode?: number;
  cause?: unknown;
  details?: Record<string, unknown>;
}

export abstract class BootstrapError extends Error {
  abstract readonly code: BootstrapErrorCode;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  protected constructor(message: string, defaultExitCode: number, options: BootstrapErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.exitCode = options.exitCode ?? defaultExitCode;
    if (options.details && typeof options.details === 'object' && !Array.isArray(options.details)) {
      this.details = options.details;
    }
  }
}

/**
 * Command line could not be understood
 */
export class UsageError extends BootstrapError {
  readonly code = 'USAGE';

  constructor(message: string, options?: BootstrapErrorOptions) {
    super(message, EXIT_USAGE, options);
  }
}

/**
 * Environment-supplied value is malformed
 */
export class ConfigurationError extends BootstrapError {
  readonly code = 'CONFIGURATION';

  constructor(message: string, options?: BootstrapErrorOptions) {
    super(message, EXIT_CONFIG, options);
  }
}

/**
 * Runner could not be started, or died before binding
 */
export class LaunchError extends BootstrapError {
  readonly code = 'LAUNCH';

  constructor(message: string, options?: BootstrapErrorOptions) {
    super(message, EXIT_FAILURE, options);
  }
}

export function isBootstrapError(err: unknown): err is BootstrapError {
  return err instanceof BootstrapError;
}
