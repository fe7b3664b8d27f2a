/**
 * Tests for the bootstrap flow
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { main, planLaunch } from '../src/bootstrap.js';
import { ConfigurationError, LaunchError, UsageError } from '../src/core/errors.js';
import { getLogLevel } from '../src/core/logger.js';
import type { LaunchOutcome, LaunchPlan, ServiceLauncher } from '../src/core/types.js';
import { captureLogs } from './setup.js';

function createLauncher(result: LaunchOutcome | Error = { exitCode: 0, code: 0, signal: null, reachedRunning: true }) {
  const plans: LaunchPlan[] = [];
  const launcher: ServiceLauncher = {
    run: vi.fn(async (plan: LaunchPlan) => {
      plans.push(plan);
      if (result instanceof Error) throw result;
      return result;
    }),
  };
  return { launcher, plans };
}

describe('planLaunch', () => {
  it('should bind 0.0.0.0:8000 when PORT is unset', () => {
    const plan = planLaunch(['main:app'], {});

    expect(plan?.bind).toEqual({ host: '0.0.0.0', port: 8000 });
    expect(plan?.runner).toEqual({
      command: 'uvicorn',
      args: ['main:app', '--host', '0.0.0.0', '--port', '8000'],
    });
  });

  it('should bind 0.0.0.0:3000 when PORT=3000', () => {
    const plan = planLaunch(['main:app'], { PORT: '3000' });

    expect(plan?.runner.args).toEqual(['main:app', '--host', '0.0.0.0', '--port', '3000']);
  });

  it('should hand the same environment to the runner', () => {
    const env = { PORT: '3000', TELEGRAM_CHAT_ID: 'test-chat' };

    expect(planLaunch(['bot:app'], env)?.env).toBe(env);
  });

  it('should apply CLI options', () => {
    const plan = planLaunch(
      ['--runner', 'python -m uvicorn', '--port-env', 'APP_PORT', '--default-port', '9000', 'bot:app', '--', '--proxy-headers'],
      { PORT: '3000' }
    );

    expect(plan?.runner).toEqual({
      command: 'python',
      args: ['-m', 'uvicorn', 'bot:app', '--host', '0.0.0.0', '--port', '9000', '--proxy-headers'],
    });
  });

  it('should return null for help', () => {
    expect(planLaunch(['--help'], {})).toBeNull();
  });

  it('should throw the matching error kind', () => {
    expect(() => planLaunch(['main:app'], { PORT: 'abc' })).toThrow(ConfigurationError);
    expect(() => planLaunch(['main'], {})).toThrow(LaunchError);
    expect(() => planLaunch(['main:app', '--', '--port', '1'], {})).toThrow(UsageError);
  });
});

describe('main', () => {
  let logs: ReturnType<typeof captureLogs>;

  beforeEach(() => {
    logs = captureLogs('DEBUG');
  });

  afterEach(() => {
    logs.restore();
  });

  it('should launch and return the service exit code', async () => {
    const { launcher, plans } = createLauncher({ exitCode: 0, code: 0, signal: null, reachedRunning: true });

    const code = await main(['main:app'], { PORT: '3000' }, { launcher });

    expect(code).toBe(0);
    expect(plans).toHaveLength(1);
    expect(plans[0]?.bind).toEqual({ host: '0.0.0.0', port: 3000 });
    expect(plans[0]?.probeIntervalMs).toBe(250);
  });

  it('should propagate a non-zero service status', async () => {
    const { launcher } = createLauncher({ exitCode: 143, code: null, signal: 'SIGTERM', reachedRunning: true });

    await expect(main(['main:app'], {}, { launcher })).resolves.toBe(143);
  });

  it('should fail with 78 before launching when PORT is malformed', async () => {
    const { launcher } = createLauncher();

    for (const value of ['abc', '0', '-1']) {
      await expect(main(['main:app'], { PORT: value }, { launcher })).resolves.toBe(78);
    }
    expect(launcher.run).not.toHaveBeenCalled();

    const errors = logs.lines.filter((entry) => entry.level === 'ERROR');
    expect(errors[0]?.line).toContain(
      'Invalid PORT "abc": must be a positive integer {"code":"CONFIGURATION","exitCode":78,"variable":"PORT","value":"abc"}'
    );
  });

  it('should fail with 64 on bad usage', async () => {
    const { launcher } = createLauncher();

    await expect(main([], {}, { launcher })).resolves.toBe(64);
    await expect(main(['main:app', '--', '--host=127.0.0.1'], {}, { launcher })).resolves.toBe(64);
    expect(launcher.run).not.toHaveBeenCalled();
  });

  it('should fail with 1 for a malformed entry point without launching', async () => {
    const { launcher } = createLauncher();

    await expect(main(['not-a-ref'], {}, { launcher })).resolves.toBe(1);
    expect(launcher.run).not.toHaveBeenCalled();
  });

  it('should return the status carried by a launch error', async () => {
    const { launcher } = createLauncher(
      new LaunchError('Service "main:missing" exited with status 1 before binding 0.0.0.0:8000', { exitCode: 1 })
    );

    await expect(main(['main:missing'], {}, { launcher })).resolves.toBe(1);
    expect(logs.lines.some((entry) => entry.level === 'ERROR' && entry.line.includes('main:missing'))).toBe(true);
  });

  it('should exit 1 on unexpected errors', async () => {
    const { launcher } = createLauncher(new TypeError('boom'));

    await expect(main(['main:app'], {}, { launcher })).resolves.toBe(1);
    const errors = logs.lines.filter((entry) => entry.level === 'ERROR');
    expect(errors).toHaveLength(1);
    expect(errors[0]?.line).toContain('Unexpected bootstrap failure {"error":"boom"');
  });

  it('should print usage for --help without launching', async () => {
    const { launcher } = createLauncher();
    const print = vi.fn();

    await expect(main(['--help'], {}, { launcher, print })).resolves.toBe(0);
    expect(print).toHaveBeenCalledTimes(1);
    expect(print.mock.calls[0]?.[0]).toContain('Usage: service-bootstrap [options] <module:attribute>');
    expect(launcher.run).not.toHaveBeenCalled();
  });

  it('should apply LOG_LEVEL from the environment', async () => {
    const { launcher } = createLauncher();

    await main(['main:app'], { LOG_LEVEL: 'warn' }, { launcher });

    expect(getLogLevel()).toBe('WARN');
  });
});
