import { setImmediate, setTimeout as sleep } from 'node:timers/promises';

/** Longest single timer Node accepts; longer ones fire after 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Sleep that rejects as soon as `signal` aborts. Non-positive durations only
 * check the signal.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  signal?.throwIfAborted();
  let remaining = ms;
  while (remaining > 0) {
    const chunk = Math.min(remaining, MAX_TIMER_MS);
    await sleep(chunk, undefined, { signal });
    remaining -= chunk;
  }
}

/**
 * Blocks callers of `wait()` while closed. Opening releases every waiter;
 * an abort on the waiter's signal rejects it.
 */
export class PauseGate {
  private waiters = new Set<() => void>();
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    this.closed = true;
  }

  open(): void {
    this.closed = false;
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const release of waiters) release();
  }

  async wait(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (!this.closed) return;

    await new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiters.delete(release);
        reject(signal?.reason);
      };
      const release = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      this.waiters.add(release);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/** Give other tasks a turn on the event loop. */
export async function yieldTurn(signal?: AbortSignal): Promise<void> {
  await setImmediate(undefined, { signal });
}
