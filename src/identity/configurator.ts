import type { WorkerConfig } from '../config/types.js';
import { ConfigurationError, stringifyError } from '../errors.js';
import type { RegistrationToken, TokenExchanger } from '../github/tokenExchanger.js';
import { logger } from '../logger.js';
import { runCommand, type CommandRunner } from '../runner/commandRunner.js';
import { CONFIG_SCRIPT, runnerScriptPath } from '../runner/runnerFiles.js';
import type { IdentityRecord } from './record.js';
import {
  hasIdentityRecord,
  readIdentityRecord,
  removeIdentityRecord,
  writeIdentityRecord,
} from './record.js';

export type ConfigureArgs = {
  config: WorkerConfig;
  token: RegistrationToken;
  signal?: AbortSignal;
};

/** Local procedure that registers the runner with a fresh registration token. */
export type ConfigureProcedure = (args: ConfigureArgs) => Promise<void>;

export type EnsureIdentityResult =
  | { status: 'skipped'; record: IdentityRecord | null }
  | { status: 'configured'; record: IdentityRecord };

export function scopeUrl(config: WorkerConfig): string {
  const { scope } = config;
  const path = scope.kind === 'repository' ? `${scope.owner}/${scope.name}` : scope.name;
  return `${config.serverUrl}/${path}`;
}

export function buildConfigureArgs(config: WorkerConfig, token: RegistrationToken): string[] {
  const args = [
    '--unattended',
    '--url',
    scopeUrl(config),
    '--token',
    token.value,
    '--name',
    config.identityName,
    '--labels',
    config.labels.join(','),
    '--runnergroup',
    config.group,
    '--work',
    config.workDir,
  ];
  if (config.replaceExisting) args.push('--replace');
  if (config.ephemeral) args.push('--ephemeral');
  return args;
}

export function createConfigScriptProcedure(runExec: CommandRunner = runCommand): ConfigureProcedure {
  return async ({ config, token, signal }) => {
    const script = runnerScriptPath(config.runnerHome, CONFIG_SCRIPT);
    await runExec(script, buildConfigureArgs(config, token), {
      cwd: config.runnerHome,
      echo: true,
      redact: [token.value],
      timeoutMs: config.configureTimeoutMs,
      ...(signal ? { signal } : {}),
    });
  };
}

/**
 * Registers the runner unless an identity record already exists. An existing
 * record short-circuits before any control-plane call.
 */
export async function ensureIdentity(options: {
  config: WorkerConfig;
  tokenExchanger: TokenExchanger;
  configure: ConfigureProcedure;
  signal?: AbortSignal;
}): Promise<EnsureIdentityResult> {
  const { config, tokenExchanger, configure, signal } = options;

  if (hasIdentityRecord(config.runnerHome)) {
    logger.info({ name: config.identityName }, 'Runner already configured, skipping configuration');
    const record = await readIdentityRecord(config.runnerHome).catch((err: unknown) => {
      logger.warn({ err }, 'Existing identity record could not be parsed');
      return null;
    });
    return { status: 'skipped', record };
  }

  signal?.throwIfAborted();
  const token = await tokenExchanger.exchange(signal);
  logger.info('Registration token generated');

  logger.info(
    {
      name: config.identityName,
      labels: config.labels.join(','),
      group: config.group,
      workDir: config.workDir,
      replace: config.replaceExisting,
    },
    'Configuring runner',
  );
  try {
    await configure({ config, token, ...(signal ? { signal } : {}) });
  } catch (err) {
    if (err instanceof ConfigurationError) throw err;
    throw new ConfigurationError(`Runner configuration failed: ${stringifyError(err)}`, err);
  }

  let record = await readIdentityRecord(config.runnerHome).catch(() => null);
  if (!record) {
    record = {
      agentName: config.identityName,
      serverUrl: scopeUrl(config),
      workFolder: config.workDir,
      labels: [...config.labels],
      configuredAt: new Date().toISOString(),
    };
    await writeIdentityRecord(config.runnerHome, record);
  }
  logger.info({ name: record.agentName }, 'Runner configured successfully');
  return { status: 'configured', record };
}

/**
 * Forced removal of an existing registration before configuring again. Remote
 * removal is best effort; the local record is always deleted.
 */
export async function cleanupExistingIdentity(options: {
  config: WorkerConfig;
  tokenExchanger: TokenExchanger;
  runExec?: CommandRunner;
  signal?: AbortSignal;
}): Promise<boolean> {
  const { config, tokenExchanger, runExec = runCommand, signal } = options;
  if (!hasIdentityRecord(config.runnerHome)) return false;
  // An interrupted cleanup keeps the record so shutdown can still deregister.
  signal?.throwIfAborted();

  logger.warn('Found existing runner configuration, removing it');
  try {
    const token = await tokenExchanger.removalToken(signal);
    const script = runnerScriptPath(config.runnerHome, CONFIG_SCRIPT);
    await runExec(script, ['remove', '--token', token.value], {
      cwd: config.runnerHome,
      echo: true,
      redact: [token.value],
      timeoutMs: config.shutdownTimeoutMs,
      ...(signal ? { signal } : {}),
    });
  } catch (err) {
    if (signal?.aborted) throw err;
    logger.warn({ err }, 'Could not unregister existing runner; removing local configuration');
  }

  const removed = await removeIdentityRecord(config.runnerHome);
  logger.info({ removed }, 'Cleaned up existing configuration');
  return true;
}
