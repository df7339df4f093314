/**
 * Unbounded FIFO queue with an awaitable, optionally timeout-bound receive.
 *
 * Feeds the agent's single-consumer processing loop and the conformance
 * harness's "await next message" primitive. A timeout is a normal outcome.
 */

import { performance } from "node:perf_hooks";

export type QueueReceive<T> =
  | { readonly kind: "item"; readonly item: T }
  | { readonly kind: "timeout"; readonly elapsedMs: number }
  | { readonly kind: "closed" };

interface Waiter<T> {
  resolve: (outcome: QueueReceive<T>) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

export class AsyncQueue<T> {
  private _items: T[] = [];
  private _waiters: Waiter<T>[] = [];
  private _closed: boolean = false;

  get size(): number {
    return this._items.length;
  }

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Enqueue an item, handing it straight to the oldest waiting receiver.
   * Returns false once the queue is closed.
   */
  put(item: T): boolean {
    if (this._closed) return false;
    const waiter = this._waiters.shift();
    if (waiter !== undefined) {
      if (waiter.timer !== null) clearTimeout(waiter.timer);
      waiter.resolve({ kind: "item", item });
    } else {
      this._items.push(item);
    }
    return true;
  }

  /**
   * Wait for the next item. With `timeoutMs`, resolves with a timeout outcome
   * once at least that long has elapsed without an arrival.
   */
  receive(timeoutMs?: number): Promise<QueueReceive<T>> {
    if (this._items.length > 0) {
      const [item] = this._items.splice(0, 1);
      return Promise.resolve<QueueReceive<T>>({ kind: "item", item });
    }
    if (this._closed) {
      return Promise.resolve<QueueReceive<T>>({ kind: "closed" });
    }

    return new Promise<QueueReceive<T>>((resolve) => {
      const waiter: Waiter<T> = { resolve, timer: null };
      this._waiters.push(waiter);
      if (timeoutMs === undefined) return;

      const started = performance.now();
      const deadline = started + timeoutMs;
      const arm = (delay: number): void => {
        waiter.timer = setTimeout(() => {
          const now = performance.now();
          // Timers may fire a fraction of a millisecond early.
          if (now < deadline) {
            arm(Math.ceil(deadline - now));
            return;
          }
          this._removeWaiter(waiter);
          resolve({ kind: "timeout", elapsedMs: now - started });
        }, delay);
      };
      arm(timeoutMs);
    });
  }

  /**
   * Close the queue. Pending receivers resolve as closed; items already
   * queued can still be received.
   */
  close(): void {
    this._closed = true;
    const waiters = this._waiters;
    this._waiters = [];
    for (const waiter of waiters) {
      if (waiter.timer !== null) clearTimeout(waiter.timer);
      waiter.resolve({ kind: "closed" });
    }
  }

  private _removeWaiter(waiter: Waiter<T>): void {
    const i = this._waiters.indexOf(waiter);
    if (i >= 0) this._waiters.splice(i, 1);
  }
}
