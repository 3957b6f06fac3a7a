export class DeadlineExceededError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} did not finish within ${ms}ms`);
    this.name = 'DeadlineExceededError';
  }
}

/** Rejects with `DeadlineExceededError` when `work` outlives `ms`. */
export function withDeadline<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new DeadlineExceededError(label, ms)), ms);
    timer.unref();
    work.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

/** Waits up to `ms` for `work`; resolves `undefined` on timeout instead of failing. */
export async function settleWithin<T>(work: Promise<T>, ms: number): Promise<T | undefined> {
  try {
    return await withDeadline(work, ms, 'wait');
  } catch (err) {
    if (err instanceof DeadlineExceededError) return undefined;
    throw err;
  }
}
