export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid runner configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class AuthError extends Error {
  readonly status: number;
  readonly detail: string;

  constructor(action: string, status: number, detail: string) {
    super(`${action} failed (HTTP ${status}): ${detail}`);
    this.name = 'AuthError';
    this.status = status;
    this.detail = detail;
  }
}

export class NetworkError extends Error {
  constructor(action: string, cause: unknown) {
    super(`${action} failed: ${describeCause(cause)}`, { cause });
    this.name = 'NetworkError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ConfigurationError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    if (cause.name === 'TimeoutError') return 'request timed out';
    if (cause.name === 'AbortError') return 'request aborted';
    const nested = cause.cause;
    if (nested instanceof Error && nested.message) {
      return `${cause.message} (${nested.message})`;
    }
    return cause.message;
  }
  return String(cause);
}

export function stringifyError(err: unknown): string {
  if (err && typeof err === 'object') {
    const withStderr = err as { stderr?: unknown; message?: unknown };
    if (typeof withStderr.stderr === 'string' && withStderr.stderr.trim()) {
      return withStderr.stderr.trim();
    }
    if (typeof withStderr.message === 'string' && withStderr.message.trim()) {
      return withStderr.message.trim();
    }
  }
  return String(err);
}
