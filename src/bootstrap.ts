/**
 * Bootstrap
 * CLI -> environment -> entry point -> runner command -> launcher
 */

import type { EnvSource, LaunchPlan, ServiceLauncher } from './core/types.js';
import { EXIT_FAILURE, isBootstrapError } from './core/errors.js';
import { logger, setLogLevel } from './core/logger.js';
import { resolveBindConfiguration, resolveLogLevel } from './core/config.js';
import { parseEntryPoint } from './core/entry-point.js';
import { parseCliArgs, USAGE } from './launcher/cli-args.js';
import { buildRunnerCommand } from './launcher/runner-command.js';
import { ProcessLauncher } from './launcher/process-launcher.js';

export interface BootstrapDeps {
  launcher?: ServiceLauncher;
  /** Where help text goes */
  print?: (text: string) => void;
}

/**
 * Build the launch plan. Throws before anything is spawned.
 */
export function planLaunch(argv: readonly string[], env: EnvSource): LaunchPlan | null {
  const options = parseCliArgs(argv);
  if (options.help || options.entryPoint === undefined) {
    return null;
  }

  const bind = resolveBindConfiguration(env, {
    portEnvVar: options.portEnvVar,
    defaultPort: options.defaultPort,
  });
  const entryPoint = parseEntryPoint(options.entryPoint);
  const runner = buildRunnerCommand(entryPoint, bind, {
    runner: options.runner,
    extraArgs: options.runnerArgs,
  });

  return { entryPoint, bind, runner, env, probeIntervalMs: options.probeIntervalMs };
}

/**
 * Run the bootstrap and return the exit code for the container
 */
export async function main(argv: readonly string[], env: EnvSource, deps: BootstrapDeps = {}): Promise<number> {
  setLogLevel(resolveLogLevel(env));

  try {
    const plan = planLaunch(argv, env);
    if (!plan) {
      const print = deps.print ?? ((text: string) => {
        process.stdout.write(text);
      });
      print(USAGE);
      return 0;
    }

    const launcher = deps.launcher ?? new ProcessLauncher();
    const outcome = await launcher.run(plan);
    return outcome.exitCode;
  } catch (err) {
    if (isBootstrapError(err)) {
      logger.error(err.message, { code: err.code, exitCode: err.exitCode, ...err.details });
      return err.exitCode;
    }

    const e = err instanceof Error ? err : new Error(String(err));
    logger.error('Unexpected bootstrap failure', { error: e.message, stack: e.stack });
    return EXIT_FAILURE;
  }
}

export default main;
