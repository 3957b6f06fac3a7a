import { tmpdir } from 'node:os';
import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { buildConfig } from '../../tests/helpers/env.js';
import { fakeRunExec } from '../../tests/helpers/fakes.js';
import {
  exitCodeForChild,
  launchEnvironment,
  launchSupervisedChild,
  resolveLaunchAccount,
} from './processSupervisor.js';

const runnerSwitch = { user: 'runner', uid: 1001, gid: 1002, home: '/home/runner' };

describe('exitCodeForChild', () => {
  it('passes through a normal exit code', () => {
    expect(exitCodeForChild({ code: 7, signal: null })).toBe(7);
    expect(exitCodeForChild({ code: 0, signal: null })).toBe(0);
  });

  it('maps a terminating signal to 128 plus its number', () => {
    expect(exitCodeForChild({ code: null, signal: 'SIGTERM' })).toBe(143);
    expect(exitCodeForChild({ code: null, signal: 'SIGKILL' })).toBe(137);
  });

  it('reports a failure when neither code nor signal is known', () => {
    expect(exitCodeForChild({ code: null, signal: null })).toBe(1);
  });
});

describe('launchSupervisedChild', () => {
  it('resolves the exit of the supervised process', async () => {
    const child = await launchSupervisedChild({
      command: process.execPath,
      args: ['-e', 'process.exit(7)'],
      cwd: tmpdir(),
    });

    expect(child.pid).toEqual(expect.any(Number));
    expect(await child.exited).toEqual({ code: 7, signal: null });
  });

  it('forwards signals to the child', async () => {
    const child = await launchSupervisedChild({
      command: process.execPath,
      args: ['-e', 'setInterval(() => {}, 1000)'],
      cwd: tmpdir(),
    });

    expect(child.signal('SIGTERM')).toBe(true);
    expect(exitCodeForChild(await child.exited)).toBe(143);
  });

  it('starts a switched child with the home directory of its account', async () => {
    const uid = process.getuid?.();
    const gid = process.getgid?.();
    if (uid === undefined || gid === undefined) return;
    process.env.HOME = '/root';

    const child = await launchSupervisedChild({
      command: process.execPath,
      args: [
        '-e',
        "process.exit(process.env.HOME === '/srv/runner-home' && process.env.USER === 'runner' ? 0 : 9)",
      ],
      cwd: tmpdir(),
      account: {
        mode: 'unprivileged',
        switchTo: { user: 'runner', uid, gid, home: '/srv/runner-home' },
      },
    });

    expect(await child.exited).toEqual({ code: 0, signal: null });
  });

  it('rejects when the command cannot be started', async () => {
    await expect(
      launchSupervisedChild({ command: '/nonexistent/run.sh', cwd: tmpdir() }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('launchEnvironment', () => {
  it('replaces the identity variables of a switched account', () => {
    process.env.HOME = '/root';
    process.env.USER = 'root';

    const env = launchEnvironment({ mode: 'unprivileged', switchTo: runnerSwitch }, { A: '1' });

    expect(env).toMatchObject({
      HOME: '/home/runner',
      USER: 'runner',
      LOGNAME: 'runner',
      A: '1',
    });
  });

  it('keeps the manager environment without a switch', () => {
    process.env.HOME = '/root';

    expect(launchEnvironment({ mode: 'privileged' }).HOME).toBe('/root');
    expect(launchEnvironment({ mode: 'unprivileged' }).HOME).toBe('/root');
  });
});

describe('resolveLaunchAccount', () => {
  it('keeps the manager identity in privileged mode', async () => {
    const runExec = fakeRunExec();
    const account = await resolveLaunchAccount(buildConfig({ runAsPrivileged: true }), {
      currentUid: () => 0,
      runExec,
    });

    expect(account).toEqual({ mode: 'privileged' });
    expect(runExec).not.toHaveBeenCalled();
  });

  it('keeps an already unprivileged identity', async () => {
    const account = await resolveLaunchAccount(buildConfig(), {
      currentUid: () => 1000,
      runExec: fakeRunExec(),
    });

    expect(account).toEqual({ mode: 'unprivileged' });
  });

  it('drops an elevated manager to the unprivileged user', async () => {
    const config = buildConfig();
    const runExec = fakeRunExec({
      'id -u runner': { stdout: '1001\n' },
      'id -g runner': { stdout: '1002\n' },
      'getent passwd runner': { stdout: 'runner:x:1001:1002::/home/runner:/bin/sh\n' },
    });

    const account = await resolveLaunchAccount(config, { currentUid: () => 0, runExec });

    expect(account).toEqual({ mode: 'unprivileged', switchTo: runnerSwitch });
    expect(runExec).toHaveBeenCalledWith('getent', ['passwd', 'runner'], { allowFailure: true });
    expect(runExec).toHaveBeenCalledWith('chown', ['-R', 'runner:runner', config.runnerHome], {
      allowFailure: true,
    });
  });

  it('falls back to /home/<user> without a passwd entry', async () => {
    const runExec = fakeRunExec({
      'id -u runner': { stdout: '1001\n' },
      'id -g runner': { stdout: '1002\n' },
      'getent passwd runner': { exitCode: 2 },
    });

    const account = await resolveLaunchAccount(buildConfig(), { currentUid: () => 0, runExec });

    expect(account).toEqual({ mode: 'unprivileged', switchTo: runnerSwitch });
  });

  it('fails when the unprivileged user cannot be resolved', async () => {
    const runExec = fakeRunExec({ 'id -u runner': { stdout: 'no such user' } });

    await expect(
      resolveLaunchAccount(buildConfig(), { currentUid: () => 0, runExec }),
    ).rejects.toThrow(
      'Cannot switch to unprivileged user "runner": Unexpected output from id -u runner: no such user',
    );
  });
});
