import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import type { WorkerConfig } from '../config/types.js';
import { ConfigurationError, EXIT_FAILURE, stringifyError } from '../errors.js';
import { logger } from '../logger.js';
import { runCommand, type CommandRunner } from '../runner/commandRunner.js';
import { RUN_SCRIPT, runnerScriptPath } from '../runner/runnerFiles.js';

export type AccountSwitch = {
  user: string;
  uid: number;
  gid: number;
  home: string;
};

export type LaunchAccount =
  | { mode: 'privileged' }
  | { mode: 'unprivileged'; switchTo?: AccountSwitch };

export type ChildExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
};

export type SupervisedChild = {
  pid: number | undefined;
  exited: Promise<ChildExit>;
  signal(signal: NodeJS.Signals): boolean;
};

export type AccountProbe = {
  currentUid: () => number | undefined;
  runExec: CommandRunner;
};

const defaultProbe: AccountProbe = {
  currentUid: () => process.getuid?.(),
  runExec: runCommand,
};

const signalNumbers: Readonly<Record<string, number>> = { ...constants.signals };

export function exitCodeForChild(exit: ChildExit): number {
  if (exit.code !== null) return exit.code;
  if (exit.signal) return 128 + (signalNumbers[exit.signal] ?? 0);
  return EXIT_FAILURE;
}

async function resolveNumericId(
  probe: AccountProbe,
  flag: '-u' | '-g',
  user: string,
): Promise<number> {
  const result = await probe.runExec('id', [flag, user]);
  const value = result.stdout.trim();
  if (!/^\d+$/.test(value)) {
    throw new Error(`Unexpected output from id ${flag} ${user}: ${value}`);
  }
  return Number.parseInt(value, 10);
}

/** Home directory from the passwd entry, `/home/<user>` when there is none. */
async function resolveHomeDirectory(probe: AccountProbe, user: string): Promise<string> {
  const fallback = `/home/${user}`;
  const result = await probe
    .runExec('getent', ['passwd', user], { allowFailure: true })
    .catch((err: unknown) => {
      logger.warn({ err, user }, 'Could not read passwd entry');
      return undefined;
    });
  const home = result?.exitCode === 0 ? result.stdout.trim().split(':')[5] : undefined;
  if (!home) {
    logger.warn({ user, home: fallback }, 'No home directory found for user, using default');
    return fallback;
  }
  return home;
}

/**
 * Decides which account runs the job process. An elevated manager in
 * unprivileged mode drops to `unprivilegedUser`; otherwise the child keeps the
 * manager's own identity.
 */
export async function resolveLaunchAccount(
  config: WorkerConfig,
  probe: AccountProbe = defaultProbe,
): Promise<LaunchAccount> {
  if (config.runAsPrivileged) {
    logger.warn('Running runner with the manager identity (not recommended for production)');
    return { mode: 'privileged' };
  }

  if (probe.currentUid() !== 0) {
    logger.info('Running runner with the current unprivileged identity');
    return { mode: 'unprivileged' };
  }

  const user = config.unprivilegedUser;
  let uid: number;
  let gid: number;
  try {
    uid = await resolveNumericId(probe, '-u', user);
    gid = await resolveNumericId(probe, '-g', user);
  } catch (err) {
    throw new ConfigurationError(
      `Cannot switch to unprivileged user "${user}": ${stringifyError(err)}`,
      err,
    );
  }

  const home = await resolveHomeDirectory(probe, user);

  const chown = await probe
    .runExec('chown', ['-R', `${user}:${user}`, config.runnerHome], { allowFailure: true })
    .catch((err: unknown) => {
      logger.warn({ err }, 'Could not change ownership of runner home');
      return undefined;
    });
  if (chown && chown.exitCode !== 0) {
    logger.warn({ stderr: chown.stderr.trim() }, 'Could not change ownership of runner home');
  }

  logger.info({ user, uid, gid, home }, 'Switching to unprivileged user for runner execution');
  return { mode: 'unprivileged', switchTo: { user, uid, gid, home } };
}

/**
 * Environment of the supervised child. A switched account gets its own
 * `HOME`, `USER` and `LOGNAME`. Supplementary groups are not carried over.
 */
export function launchEnvironment(
  account: LaunchAccount | undefined,
  env: NodeJS.ProcessEnv = {},
): NodeJS.ProcessEnv {
  const switchTo = account?.mode === 'unprivileged' ? account.switchTo : undefined;
  return {
    ...process.env,
    ...env,
    ...(switchTo ? { HOME: switchTo.home, USER: switchTo.user, LOGNAME: switchTo.user } : {}),
  };
}

export function launchSupervisedChild(options: {
  command: string;
  args?: string[];
  cwd: string;
  env?: NodeJS.ProcessEnv;
  account?: LaunchAccount;
}): Promise<SupervisedChild> {
  const { command, args = [], cwd, account } = options;
  const switchTo = account?.mode === 'unprivileged' ? account.switchTo : undefined;
  const env = launchEnvironment(account, options.env);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      env,
      stdio: 'inherit',
      ...(switchTo ? { uid: switchTo.uid, gid: switchTo.gid } : {}),
    });

    const exited = new Promise<ChildExit>((resolveExit) => {
      child.once('exit', (code, signal) => resolveExit({ code, signal }));
    });

    child.once('error', (err) => {
      reject(new ConfigurationError(`Failed to start ${command}: ${err.message}`, err));
    });
    child.once('spawn', () => {
      resolve({
        pid: child.pid,
        exited,
        signal: (signal) => child.kill(signal),
      });
    });
  });
}

export async function launchRunner(
  config: WorkerConfig,
  account: LaunchAccount,
): Promise<SupervisedChild> {
  const command = runnerScriptPath(config.runnerHome, RUN_SCRIPT);
  const child = await launchSupervisedChild({ command, cwd: config.runnerHome, account });
  logger.info({ pid: child.pid, mode: account.mode }, 'Runner process started');
  return child;
}
