interface Waiter<T> {
  /** Returns false once the wait this waiter belongs to has been decided */
  claim(): boolean;
  deliver(item: T): void;
}

interface PendingItem<T> {
  item: T;
  delivered: () => void;
}

/**
 * Unbuffered hand-off queue between one producer task and one consumer.
 *
 * `push` settles only after a consumer took the item, so a producer never
 * runs ahead of the consumer by more than the item it is holding.
 */
export class HandoffQueue<T extends object> {
  private readonly pending: PendingItem<T>[] = [];
  private readonly waiters: Waiter<T>[] = [];

  /** Number of producers blocked with an item nobody has taken yet */
  get size(): number {
    return this.pending.length;
  }

  /**
   * Offer an item and wait until it is taken
   * @param signal - Aborting withdraws the item and rejects with the abort reason
   */
  push(item: T, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    while (this.waiters.length > 0) {
      const waiter = this.waiters.shift();
      if (waiter?.claim()) {
        waiter.deliver(item);
        return Promise.resolve();
      }
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.pending.indexOf(entry);
        if (index >= 0) {
          this.pending.splice(index, 1);
          reject(signal?.reason);
        }
      };
      const entry: PendingItem<T> = {
        item,
        delivered: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.pending.push(entry);
    });
  }

  /**
   * Take the oldest pending item without waiting
   */
  tryTake(): T | undefined {
    const entry = this.pending.shift();
    if (!entry) {
      return undefined;
    }
    entry.delivered();
    return entry.item;
  }

  addWaiter(waiter: Waiter<T>): void {
    this.waiters.push(waiter);
  }

  removeWaiter(waiter: Waiter<T>): void {
    const index = this.waiters.indexOf(waiter);
    if (index >= 0) {
      this.waiters.splice(index, 1);
    }
  }
}

/**
 * Wait for the first item offered on any of the queues, or for the timer.
 *
 * Queues are checked in order for items already pending. Exactly one
 * outcome wins; waits that lose never consume an item.
 *
 * @param timeoutMs - One-shot timer for this wait
 * @returns The item, or undefined when the timer fired first
 */
export function receive<T extends object>(
  queues: readonly HandoffQueue<T>[],
  timeoutMs: number
): Promise<T | undefined> {
  for (const queue of queues) {
    const item = queue.tryTake();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
  }

  return new Promise<T | undefined>((resolve) => {
    let decided = false;
    const registered: Array<[HandoffQueue<T>, Waiter<T>]> = [];

    const claim = (): boolean => {
      if (decided) {
        return false;
      }
      decided = true;
      return true;
    };

    const finish = (item: T | undefined): void => {
      clearTimeout(timer);
      for (const [queue, waiter] of registered) {
        queue.removeWaiter(waiter);
      }
      resolve(item);
    };

    const timer = setTimeout(() => {
      if (claim()) {
        finish(undefined);
      }
    }, timeoutMs);

    for (const queue of queues) {
      const waiter: Waiter<T> = { claim, deliver: (item) => finish(item) };
      registered.push([queue, waiter]);
      queue.addWaiter(waiter);
    }
  });
}
