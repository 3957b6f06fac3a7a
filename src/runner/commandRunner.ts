import { spawn } from 'node:child_process';

export type RunOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  echo?: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
  redact?: Array<string | RegExp>;
  allowFailure?: boolean;
};

export type RunResult = {
  cmd: string;
  args: string[];
  cwd?: string;
  durationMs: number;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
};

export type CommandRunner = (cmd: string, args: string[], opts?: RunOptions) => Promise<RunResult>;

export class CommandError extends Error {
  readonly result: RunResult;

  constructor(message: string, result: RunResult) {
    super(message);
    this.name = 'CommandError';
    this.result = result;
  }
}

const KILL_GRACE_MS = 2000;

const githubTokenPatterns: RegExp[] = [
  /gh[pousr]_[A-Za-z0-9]{20,}/g,
  /github_pat_[A-Za-z0-9_]{20,}/g,
];

export function redactText(text: string, patterns: Array<string | RegExp>): string {
  if (!text) return text;
  let out = text;
  for (const pattern of patterns) {
    if (typeof pattern === 'string') {
      if (!pattern) continue;
      out = out.split(pattern).join('[REDACTED]');
    } else {
      out = out.replace(pattern, '[REDACTED]');
    }
  }
  return out;
}

export function formatCommand(cmd: string, args: string[], redact: Array<string | RegExp> = []) {
  return redactText(`${cmd} ${args.join(' ')}`.trim(), [...githubTokenPatterns, ...redact]);
}

export async function runCommand(
  cmd: string,
  args: string[],
  opts: RunOptions = {},
): Promise<RunResult> {
  const start = Date.now();
  const {
    cwd,
    env,
    echo = false,
    timeoutMs = 0,
    signal,
    redact = [],
    allowFailure = false,
  } = opts;

  const redactionPatterns: Array<string | RegExp> = [...githubTokenPatterns, ...redact];

  let timedOut = false;
  let aborted = false;

  const child = spawn(cmd, args, {
    cwd,
    env: env ? { ...process.env, ...env } : process.env,
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  const terminate = () => {
    try {
      child.kill('SIGTERM');
    } catch {
      // already gone
    }
    setTimeout(() => {
      try {
        child.kill('SIGKILL');
      } catch {
        // already gone
      }
    }, KILL_GRACE_MS).unref();
  };

  const onAbort = () => {
    aborted = true;
    terminate();
  };

  if (signal) {
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
  }

  let timeout: NodeJS.Timeout | undefined;
  if (timeoutMs > 0) {
    timeout = setTimeout(() => {
      timedOut = true;
      terminate();
    }, timeoutMs);
    timeout.unref();
  }

  let stdoutBuf = '';
  let stderrBuf = '';

  const handleChunk = (chunk: Buffer, isErr: boolean) => {
    const redacted = redactText(chunk.toString('utf8'), redactionPatterns);

    if (isErr) stderrBuf += redacted;
    else stdoutBuf += redacted;

    if (echo) {
      if (isErr) process.stderr.write(redacted);
      else process.stdout.write(redacted);
    }
  };

  child.stdout?.on('data', (chunk: Buffer) => handleChunk(chunk, false));
  child.stderr?.on('data', (chunk: Buffer) => handleChunk(chunk, true));

  const result = await new Promise<RunResult>((resolve, reject) => {
    child.on('error', (err) => {
      if (timeout) clearTimeout(timeout);
      if (signal) signal.removeEventListener('abort', onAbort);
      reject(err);
    });

    child.on('close', (exitCode, sig) => {
      if (timeout) clearTimeout(timeout);
      if (signal) signal.removeEventListener('abort', onAbort);

      const base: RunResult = {
        cmd,
        args,
        durationMs: Date.now() - start,
        exitCode,
        signal: sig,
        stdout: stdoutBuf,
        stderr: stderrBuf,
        timedOut,
        aborted,
      };
      if (cwd) base.cwd = cwd;
      resolve(base);
    });
  });

  if (!allowFailure && (result.exitCode ?? 1) !== 0) {
    const msg =
      `Command failed (${result.exitCode ?? 'null'}): ${formatCommand(cmd, args, redact)}\n` +
      `cwd=${cwd ?? process.cwd()}\n` +
      (result.timedOut ? 'Reason: timed out\n' : '') +
      (result.aborted ? 'Reason: aborted\n' : '');
    throw new CommandError(msg, result);
  }

  return result;
}
