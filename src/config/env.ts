import os from 'node:os';
import { isAbsolute, resolve } from 'node:path';
import { ValidationError } from '../errors.js';
import type { TomlTable } from './toml.js';
import { getTomlTable, loadTomlConfig } from './toml.js';
import {
  resolveOptionalFlagFromSources,
  resolvePathValue,
  resolvePositiveIntegerFromSources,
  resolveStringArrayFromSources,
  resolveStringValue,
} from './resolve.js';
import type { RunnerScope, WorkerConfig } from './types.js';
import {
  CONFIG_PATH_ENV,
  DEFAULT_API_BASE_URL,
  DEFAULT_CHILD_GRACE_MS,
  DEFAULT_CONFIGURE_TIMEOUT_MS,
  DEFAULT_CONFIG_PATH,
  DEFAULT_GROUP,
  DEFAULT_LABELS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RUNNER_DIST_DIR,
  DEFAULT_RUNNER_HOME,
  DEFAULT_RUNNER_USER,
  DEFAULT_SERVER_URL,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  DEFAULT_WORK_DIR,
  describeScope,
} from './types.js';

export type { RunnerScope, WorkerConfig } from './types.js';

const repositoryPattern = /^[^/\s]+\/[^/\s]+$/;

type IssueCollector = <T>(read: () => T) => T | undefined;

function createCollector(issues: string[]): IssueCollector {
  return <T>(read: () => T): T | undefined => {
    try {
      return read();
    } catch (err) {
      issues.push(err instanceof Error ? err.message : String(err));
      return undefined;
    }
  };
}

function resolveScope(
  runnerToml: TomlTable | undefined,
  collect: IssueCollector,
  issues: string[],
): RunnerScope | undefined {
  const repository = collect(() => resolveStringValue('GITHUB_REPOSITORY', runnerToml?.repository));
  const organization = collect(() =>
    resolveStringValue('GITHUB_OWNER', runnerToml?.organization),
  );

  if (repository && organization) {
    issues.push('Set only one of GITHUB_REPOSITORY or GITHUB_OWNER, not both.');
    return undefined;
  }
  if (!repository && !organization) {
    issues.push('Missing required config: GITHUB_REPOSITORY or GITHUB_OWNER');
    return undefined;
  }
  if (repository) {
    if (!repositoryPattern.test(repository)) {
      issues.push(`Invalid GITHUB_REPOSITORY: ${repository}. Expected owner/repo.`);
      return undefined;
    }
    const [owner = '', name = ''] = repository.split('/');
    return { kind: 'repository', owner, name };
  }
  if (organization && organization.includes('/')) {
    issues.push(`Invalid GITHUB_OWNER: ${organization}. Expected an organization name.`);
    return undefined;
  }
  return organization ? { kind: 'organization', name: organization } : undefined;
}

function resolveLabels(runnerToml: TomlTable | undefined, collect: IssueCollector): string[] {
  const labels = collect(() => resolveStringArrayFromSources('RUNNER_LABELS', runnerToml?.labels));
  const unique = [...new Set(labels ?? [])];
  return unique.length ? unique : [...DEFAULT_LABELS];
}

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

/**
 * Builds the immutable runner config from the environment and the optional
 * TOML file. Every missing or malformed field is reported in a single
 * `ValidationError`.
 */
export function loadWorkerConfig(): WorkerConfig {
  const issues: string[] = [];
  const collect = createCollector(issues);

  const toml = collect(() => loadTomlConfig(CONFIG_PATH_ENV, DEFAULT_CONFIG_PATH, 'runner')) ?? {};
  const runnerToml = collect(() => getTomlTable(toml.runner, 'runner'));
  const githubToml = collect(() => getTomlTable(toml.github, 'github'));

  const credential = collect(() =>
    resolveStringValue('GITHUB_TOKEN', githubToml?.token, { required: true }),
  );
  const scope = resolveScope(runnerToml, collect, issues);
  const identityName =
    collect(() => resolveStringValue('RUNNER_NAME', runnerToml?.name)) ?? os.hostname();
  const labels = resolveLabels(runnerToml, collect);
  const group =
    collect(() =>
      resolveStringValue('RUNNER_GROUP', runnerToml?.group, { defaultValue: DEFAULT_GROUP }),
    ) ?? DEFAULT_GROUP;
  const runnerHome = resolve(
    collect(() =>
      resolvePathValue('RUNNER_HOME', runnerToml?.home, { defaultValue: DEFAULT_RUNNER_HOME }),
    ) ?? DEFAULT_RUNNER_HOME,
  );
  const rawWorkDir =
    collect(() =>
      resolvePathValue('RUNNER_WORKDIR', runnerToml?.work_dir, { defaultValue: DEFAULT_WORK_DIR }),
    ) ?? DEFAULT_WORK_DIR;
  const runnerDistDir =
    collect(() =>
      resolvePathValue('RUNNER_DIST_DIR', runnerToml?.dist_dir, {
        defaultValue: DEFAULT_RUNNER_DIST_DIR,
      }),
    ) ?? DEFAULT_RUNNER_DIST_DIR;
  const unprivilegedUser =
    collect(() =>
      resolveStringValue('RUNNER_USER', runnerToml?.user, { defaultValue: DEFAULT_RUNNER_USER }),
    ) ?? DEFAULT_RUNNER_USER;

  const runAsPrivileged = collect(() =>
    resolveOptionalFlagFromSources('RUNNER_AS_ROOT', runnerToml?.as_root),
  );
  const replaceExisting = collect(() =>
    resolveOptionalFlagFromSources('RUNNER_REPLACE_EXISTING', runnerToml?.replace_existing),
  );
  const ephemeral = collect(() =>
    resolveOptionalFlagFromSources('RUNNER_EPHEMERAL', runnerToml?.ephemeral),
  );
  const cleanupExisting = collect(() =>
    resolveOptionalFlagFromSources('CLEANUP_EXISTING', runnerToml?.cleanup_existing),
  );

  const apiBaseUrl =
    collect(() =>
      resolveStringValue('GITHUB_API_BASE_URL', githubToml?.api_base_url, {
        defaultValue: DEFAULT_API_BASE_URL,
      }),
    ) ?? DEFAULT_API_BASE_URL;
  const serverUrl =
    collect(() =>
      resolveStringValue('GITHUB_SERVER_URL', githubToml?.server_url, {
        defaultValue: DEFAULT_SERVER_URL,
      }),
    ) ?? DEFAULT_SERVER_URL;
  const requestTimeoutMs = collect(() =>
    resolvePositiveIntegerFromSources(
      'CONTROL_PLANE_TIMEOUT_MS',
      githubToml?.timeout_ms,
      DEFAULT_REQUEST_TIMEOUT_MS,
    ),
  );
  const configureTimeoutMs = collect(() =>
    resolvePositiveIntegerFromSources(
      'RUNNER_CONFIGURE_TIMEOUT_MS',
      runnerToml?.configure_timeout_ms,
      DEFAULT_CONFIGURE_TIMEOUT_MS,
    ),
  );
  const shutdownTimeoutMs = collect(() =>
    resolvePositiveIntegerFromSources(
      'SHUTDOWN_TIMEOUT_MS',
      runnerToml?.shutdown_timeout_ms,
      DEFAULT_SHUTDOWN_TIMEOUT_MS,
    ),
  );
  const childGraceMs = collect(() =>
    resolvePositiveIntegerFromSources(
      'CHILD_GRACE_MS',
      runnerToml?.child_grace_ms,
      DEFAULT_CHILD_GRACE_MS,
    ),
  );

  if (
    issues.length ||
    !credential ||
    !scope ||
    runAsPrivileged === undefined ||
    replaceExisting === undefined ||
    ephemeral === undefined ||
    cleanupExisting === undefined ||
    requestTimeoutMs === undefined ||
    configureTimeoutMs === undefined ||
    shutdownTimeoutMs === undefined ||
    childGraceMs === undefined
  ) {
    throw new ValidationError(issues);
  }

  return Object.freeze({
    credential,
    scope,
    identityName,
    labels: Object.freeze(labels),
    group,
    workDir: isAbsolute(rawWorkDir) ? rawWorkDir : resolve(runnerHome, rawWorkDir),
    runAsPrivileged,
    replaceExisting,
    ephemeral,
    cleanupExisting,
    runnerHome,
    runnerDistDir: resolve(runnerDistDir),
    unprivilegedUser,
    apiBaseUrl: trimTrailingSlash(apiBaseUrl),
    serverUrl: trimTrailingSlash(serverUrl),
    requestTimeoutMs,
    configureTimeoutMs,
    shutdownTimeoutMs,
    childGraceMs,
  });
}

/** Loggable view of the config; the credential is left out. */
export function describeWorkerConfig(config: WorkerConfig) {
  return {
    scope: `${config.scope.kind}:${describeScope(config.scope)}`,
    name: config.identityName,
    labels: config.labels.join(','),
    group: config.group,
    workDir: config.workDir,
    runnerHome: config.runnerHome,
    runAsPrivileged: config.runAsPrivileged,
    replaceExisting: config.replaceExisting,
    ephemeral: config.ephemeral,
  };
}
