/**
 * packages/core/src/app/inbox.ts — Ordered message inbox.
 *
 * Why: The loop's only synchronization point. Producers (backend polling,
 * setters, async effects, exit requests) push; the loop drains everything
 * available in enqueue order. Items stay queued until drained, so `size()`
 * reports work the loop has not picked up yet.
 */

export type Inbox<T> = Readonly<{
  /** Enqueue. Returns false (and drops the item) once closed. */
  push: (item: T) => boolean;
  /** Remove and return all queued items in enqueue order. */
  drain: () => T[];
  /** Resolves when at least one item is queued or the inbox is closed. */
  wait: () => Promise<void>;
  size: () => number;
  close: () => void;
  isClosed: () => boolean;
}>;

export function createInbox<T>(): Inbox<T> {
  let items: T[] = [];
  let closed = false;
  let waiters: Array<() => void> = [];

  function wake(): void {
    if (waiters.length === 0) return;
    const pending = waiters;
    waiters = [];
    for (const resolve of pending) resolve();
  }

  return Object.freeze({
    push(item: T): boolean {
      if (closed) return false;
      items.push(item);
      wake();
      return true;
    },

    drain(): T[] {
      if (items.length === 0) return [];
      const out = items;
      items = [];
      return out;
    },

    wait(): Promise<void> {
      if (items.length > 0 || closed) return Promise.resolve();
      return new Promise<void>((resolve) => {
        waiters.push(resolve);
      });
    },

    size(): number {
      return items.length;
    },

    close(): void {
      if (closed) return;
      closed = true;
      items = [];
      wake();
    },

    isClosed(): boolean {
      return closed;
    },
  });
}
