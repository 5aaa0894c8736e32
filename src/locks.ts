import { CollaboratorTimeoutError, ConcurrencyConflictError } from "./errors.js";

/**
 * Per-key async mutex. Work for one key runs strictly one at a time in
 * arrival order; different keys never wait on each other.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => T | Promise<T>, timeoutMs?: number): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => gate);
    this.tails.set(key, tail);

    try {
      await waitFor(previous, timeoutMs, key);
    } catch (err) {
      // Give the slot up. `tail` still waits for `previous`, so it stays the
      // key's tail until the holder ahead of us is done.
      release();
      void tail.then(() => this.forget(key, tail));
      throw err;
    }

    try {
      return await fn();
    } finally {
      release();
      this.forget(key, tail);
    }
  }

  /** Keys with queued or running work */
  activeKeys(): string[] {
    return [...this.tails.keys()];
  }

  private forget(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) this.tails.delete(key);
  }
}

function waitFor(previous: Promise<void>, timeoutMs: number | undefined, key: string): Promise<void> {
  if (timeoutMs === undefined) return previous;
  return new Promise<void>((resolve, reject) => {
    const started = Date.now();
    const timer = setTimeout(() => {
      reject(new ConcurrencyConflictError(key, Date.now() - started));
    }, timeoutMs);
    // gates only ever resolve, so `previous` cannot reject
    void previous.then(() => {
      clearTimeout(timer);
      resolve();
    });
  });
}

export interface RetryOptions {
  timeoutMs: number;
  retries: number;
}

/**
 * Acquire with bounded waits. Conflicts are retried; once retries run out
 * the failure is reported as a timeout of the owner lock.
 */
export async function runWithRetry<T>(
  mutex: KeyedMutex,
  key: string,
  fn: () => T | Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  let lastConflict: ConcurrencyConflictError | undefined;
  for (let attempt = 0; attempt <= opts.retries; attempt++) {
    try {
      return await mutex.runExclusive(key, fn, opts.timeoutMs);
    } catch (err) {
      if (!(err instanceof ConcurrencyConflictError)) throw err;
      lastConflict = err;
    }
  }
  throw new CollaboratorTimeoutError("owner-lock", opts.timeoutMs * (opts.retries + 1), {
    cause: lastConflict,
  });
}
