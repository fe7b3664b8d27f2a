/**
 * Runner invocation
 * Builds the argv handed to the ASGI runner
 */

import type { BindConfiguration, EntryPointRef, RunnerCommand } from '../core/types.js';
import { UsageError } from '../core/errors.js';

export const DEFAULT_RUNNER = 'uvicorn';

/**
 * Runner flags that would move the service off the resolved bind
 */
const RESERVED_RUNNER_FLAGS = ['--host', '--port', '--uds', '--fd'];

export interface RunnerOptions {
  /** Runner command line, split on whitespace (e.g. `python -m uvicorn`) */
  runner?: string;
  extraArgs?: readonly string[];
}

const SECRET_FLAG = /password|secret|token/i;
const MASKED = '[MASKED]';

/**
 * Copy of the runner args safe to log: values of secret-looking flags are masked
 */
export function redactRunnerArgs(args: readonly string[]): string[] {
  const redacted: string[] = [];
  let maskNext = false;

  for (const arg of args) {
    if (maskNext) {
      redacted.push(MASKED);
      maskNext = false;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    if (flag.startsWith('-') && SECRET_FLAG.test(flag)) {
      if (eq === -1) {
        redacted.push(arg);
        maskNext = true;
      } else {
        redacted.push(`${flag}=${MASKED}`);
      }
      continue;
    }
    redacted.push(arg);
  }

  return redacted;
}

function reservedFlagIn(arg: string): string | undefined {
  return RESERVED_RUNNER_FLAGS.find((flag) => arg === flag || arg.startsWith(`${flag}=`));
}

/**
 * Reject passthrough arguments that would re-bind the service
 */
export function assertNoBindOverrides(extraArgs: readonly string[]): void {
  for (const arg of extraArgs) {
    const flag = reservedFlagIn(arg);
    if (flag) {
      throw new UsageError(`Runner argument "${arg}" is not allowed; ${flag} is set by the bootstrap`, {
        details: { argument: arg },
      });
    }
  }
}

export function buildRunnerCommand(
  entryPoint: EntryPointRef,
  bind: BindConfiguration,
  options: RunnerOptions = {}
): RunnerCommand {
  const runnerWords = (options.runner ?? DEFAULT_RUNNER).trim().split(/\s+/).filter(Boolean);
  const [command, ...prefixArgs] = runnerWords;
  if (!command) {
    throw new UsageError('Runner command must not be empty');
  }

  const extraArgs = options.extraArgs ?? [];
  assertNoBindOverrides(extraArgs);

  return {
    command,
    args: [
      ...prefixArgs,
      entryPoint.ref,
      '--host',
      bind.host,
      '--port',
      String(bind.port),
      ...extraArgs,
    ],
  };
}
