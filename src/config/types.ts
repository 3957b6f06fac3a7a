export type RunnerScope =
  | { kind: 'repository'; owner: string; name: string }
  | { kind: 'organization'; name: string };

export type WorkerConfig = {
  readonly credential: string;
  readonly scope: RunnerScope;
  readonly identityName: string;
  readonly labels: readonly string[];
  readonly group: string;
  /** Absolute job work directory, resolved against `runnerHome`. */
  readonly workDir: string;
  readonly runAsPrivileged: boolean;
  readonly replaceExisting: boolean;
  readonly ephemeral: boolean;
  readonly cleanupExisting: boolean;
  /** Directory holding config.sh, run.sh and the identity record. */
  readonly runnerHome: string;
  readonly runnerDistDir: string;
  readonly unprivilegedUser: string;
  readonly apiBaseUrl: string;
  readonly serverUrl: string;
  readonly requestTimeoutMs: number;
  /** Upper bound for one `config.sh` registration run. */
  readonly configureTimeoutMs: number;
  readonly shutdownTimeoutMs: number;
  readonly childGraceMs: number;
};

export const CONFIG_PATH_ENV = 'RUNNERKEEPER_CONFIG_PATH';
export const DEFAULT_CONFIG_PATH = './runnerkeeper.toml';

export const DEFAULT_LABELS = ['linux'] as const;
export const DEFAULT_GROUP = 'default';
export const DEFAULT_WORK_DIR = '_work';
export const DEFAULT_RUNNER_HOME = '/actions-runner';
export const DEFAULT_RUNNER_DIST_DIR = '/opt/actions-runner';
export const DEFAULT_RUNNER_USER = 'runner';
export const DEFAULT_API_BASE_URL = 'https://api.github.com';
export const DEFAULT_SERVER_URL = 'https://github.com';
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
export const DEFAULT_CONFIGURE_TIMEOUT_MS = 120_000;
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 20_000;
export const DEFAULT_CHILD_GRACE_MS = 10_000;

export function describeScope(scope: RunnerScope): string {
  return scope.kind === 'repository' ? `${scope.owner}/${scope.name}` : scope.name;
}
