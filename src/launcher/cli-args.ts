/**
 * Command line parsing
 */

import { parseArgs } from 'node:util';
import { UsageError } from '../core/errors.js';
import { DEFAULT_PORT, PORT_ENV_VAR, portSchema } from '../core/config.js';
import { DEFAULT_RUNNER } from './runner-command.js';
import { DEFAULT_PROBE_INTERVAL_MS } from './readiness.js';

export interface CliOptions {
  help: boolean;
  entryPoint?: string;
  runner: string;
  portEnvVar: string;
  defaultPort: number;
  probeIntervalMs: number;
  /** Everything after `--`, handed to the runner untouched */
  runnerArgs: string[];
}

export const USAGE = `Usage: service-bootstrap [options] <module:attribute> [-- <runner args...>]

Resolves the listening port from the environment and runs the ASGI service
bound to 0.0.0.0 on that port.

Options:
  --runner <cmd>          Runner command (default: ${DEFAULT_RUNNER})
  --port-env <NAME>       Variable holding the port (default: ${PORT_ENV_VAR})
  --default-port <n>      Port used when the variable is unset (default: ${DEFAULT_PORT})
  --probe-interval <ms>   Readiness probe interval (default: ${DEFAULT_PROBE_INTERVAL_MS})
  -h, --help              Show this help

Environment:
  PORT                    Listening port (default: ${DEFAULT_PORT})
  LOG_LEVEL               DEBUG | INFO | WARN | ERROR (default: INFO)
`;

// Largest delay setTimeout honours
export const MAX_PROBE_INTERVAL_MS = 2_147_483_647;

const ENV_VAR_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function parsePositiveInt(flag: string, raw: string): number {
  const result = portSchema.safeParse(raw);
  if (!result.success) {
    throw new UsageError(`Invalid ${flag} "${raw}": ${result.error.issues[0]?.message ?? 'invalid value'}`);
  }
  return result.data;
}

function parseInterval(raw: string): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || value < 1) {
    throw new UsageError(`Invalid --probe-interval "${raw}": must be a positive integer`);
  }
  if (value > MAX_PROBE_INTERVAL_MS) {
    throw new UsageError(`Invalid --probe-interval "${raw}": must not exceed ${MAX_PROBE_INTERVAL_MS}`);
  }
  return value;
}

function parseOwnArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      allowPositionals: true,
      strict: true,
      options: {
        runner: { type: 'string', default: DEFAULT_RUNNER },
        'port-env': { type: 'string', default: PORT_ENV_VAR },
        'default-port': { type: 'string', default: String(DEFAULT_PORT) },
        'probe-interval': { type: 'string', default: String(DEFAULT_PROBE_INTERVAL_MS) },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err), { cause: err });
  }
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const separator = argv.indexOf('--');
  const own = separator === -1 ? [...argv] : argv.slice(0, separator);
  const runnerArgs = separator === -1 ? [] : argv.slice(separator + 1);

  const { values, positionals } = parseOwnArgs(own);
  const help = values.help ?? false;

  if (help) {
    return {
      help,
      runner: DEFAULT_RUNNER,
      portEnvVar: PORT_ENV_VAR,
      defaultPort: DEFAULT_PORT,
      probeIntervalMs: DEFAULT_PROBE_INTERVAL_MS,
      runnerArgs,
    };
  }

  if (positionals.length === 0) {
    throw new UsageError('Missing entry point (expected <module:attribute>)');
  }
  if (positionals.length > 1) {
    throw new UsageError(`Expected one entry point, got ${positionals.length}: ${positionals.join(' ')}`);
  }

  const portEnvVar = values['port-env'] ?? PORT_ENV_VAR;
  if (!ENV_VAR_NAME.test(portEnvVar)) {
    throw new UsageError(`Invalid --port-env "${portEnvVar}": not a variable name`);
  }

  return {
    help,
    entryPoint: positionals[0],
    runner: values.runner ?? DEFAULT_RUNNER,
    portEnvVar,
    defaultPort: parsePositiveInt('--default-port', values['default-port'] ?? String(DEFAULT_PORT)),
    probeIntervalMs: parseInterval(values['probe-interval'] ?? String(DEFAULT_PROBE_INTERVAL_MS)),
    runnerArgs,
  };
}
