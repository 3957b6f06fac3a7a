import { AuthError, NetworkError } from '../errors.js';
import type { RunnerScope } from '../config/types.js';

export type GitHubConfig = {
  apiBaseUrl: string;
  token: string;
  timeoutMs: number;
};

export type RunnerToken = {
  value: string;
  expiresAt?: string;
};

type GitHubRequest = {
  method: 'POST' | 'DELETE';
  path: string;
  action: string;
  signal?: AbortSignal;
};

export function runnersPath(scope: RunnerScope): string {
  const base =
    scope.kind === 'repository'
      ? `/repos/${encodeURIComponent(scope.owner)}/${encodeURIComponent(scope.name)}`
      : `/orgs/${encodeURIComponent(scope.name)}`;
  return `${base}/actions/runners`;
}

function pickString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/**
 * GitHub answers errors in a few shapes; walk the known fields in order. A
 * body that is not JSON is reported as text.
 */
export function extractErrorMessage(body: unknown, rawText = ''): string {
  if (body && typeof body === 'object' && !Array.isArray(body)) {
    const record = body as Record<string, unknown>;
    const direct =
      pickString(record.message) ?? pickString(record.detail) ?? pickString(record.error);
    if (direct) return direct;
    if (Array.isArray(record.errors)) {
      const first: unknown = record.errors[0];
      if (first && typeof first === 'object') {
        const nested = pickString((first as Record<string, unknown>).message);
        if (nested) return nested;
      }
    }
  }
  if (body === undefined) return pickString(rawText) ?? 'Unknown error';
  return 'Unknown error';
}

function parseJson(text: string): unknown {
  if (!text.trim()) return undefined;
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}

function requestSignal(config: GitHubConfig, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(config.timeoutMs);
  return signal ? AbortSignal.any([timeout, signal]) : timeout;
}

type GitHubResponse = {
  status: number;
  body: unknown;
};

async function requestGitHub(
  config: GitHubConfig,
  request: GitHubRequest,
): Promise<GitHubResponse> {
  let response: Response;
  let text: string;
  try {
    response = await fetch(`${config.apiBaseUrl.replace(/\/$/, '')}${request.path}`, {
      method: request.method,
      headers: {
        Authorization: `Bearer ${config.token}`,
        'X-GitHub-Api-Version': '2022-11-28',
        Accept: 'application/vnd.github+json',
      },
      signal: requestSignal(config, request.signal),
    });
    text = await response.text();
  } catch (err) {
    throw new NetworkError(request.action, err);
  }

  const body = parseJson(text);
  if (!response.ok) {
    throw new AuthError(request.action, response.status, extractErrorMessage(body, text));
  }
  return { status: response.status, body };
}

async function requestRunnerToken(
  config: GitHubConfig,
  scope: RunnerScope,
  kind: 'registration-token' | 'remove-token',
  signal?: AbortSignal,
): Promise<RunnerToken> {
  const action =
    kind === 'registration-token' ? 'Registration token request' : 'Remove token request';
  const { status, body } = await requestGitHub(config, {
    method: 'POST',
    path: `${runnersPath(scope)}/${kind}`,
    action,
    ...(signal ? { signal } : {}),
  });

  const data = (body && typeof body === 'object' ? body : {}) as {
    token?: unknown;
    expires_at?: unknown;
  };
  const value = pickString(data.token);
  if (!value) {
    throw new AuthError(
      action,
      status,
      `Response did not include a token: ${extractErrorMessage(body)}`,
    );
  }
  const expiresAt = pickString(data.expires_at);
  return { value, ...(expiresAt ? { expiresAt } : {}) };
}

export function createRegistrationToken(
  config: GitHubConfig,
  scope: RunnerScope,
  signal?: AbortSignal,
): Promise<RunnerToken> {
  return requestRunnerToken(config, scope, 'registration-token', signal);
}

export function createRemoveToken(
  config: GitHubConfig,
  scope: RunnerScope,
  signal?: AbortSignal,
): Promise<RunnerToken> {
  return requestRunnerToken(config, scope, 'remove-token', signal);
}

export async function deleteRunner(
  config: GitHubConfig,
  scope: RunnerScope,
  runnerId: number,
  signal?: AbortSignal,
): Promise<void> {
  await requestGitHub(config, {
    method: 'DELETE',
    path: `${runnersPath(scope)}/${runnerId}`,
    action: `Runner ${runnerId} removal`,
    ...(signal ? { signal } : {}),
  });
}
