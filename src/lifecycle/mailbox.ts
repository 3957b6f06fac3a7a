type Waiter<T> = (message: T) => void;

/** Unbounded single-consumer queue feeding the lifecycle control loop. */
export class Mailbox<T> {
  readonly #pending: Array<{ message: T }> = [];
  readonly #waiters: Waiter<T>[] = [];

  post(message: T): void {
    const waiter = this.#waiters.shift();
    if (waiter) {
      waiter(message);
      return;
    }
    this.#pending.push({ message });
  }

  next(): Promise<T> {
    const item = this.#pending.shift();
    if (item) return Promise.resolve(item.message);
    return new Promise<T>((resolve) => {
      this.#waiters.push(resolve);
    });
  }

  get size(): number {
    return this.#pending.length;
  }
}
