/**
 * Unbounded FIFO handoff between requesters and the single worker.
 * push() never blocks; pop() waits for the next item or for the signal to abort.
 */

interface Waiter<T> {
  resolve: (item: T | undefined) => void;
  onTake?: (item: T) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class WorkQueue<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    if (this.handOff(item)) return;
    this.items.push(item);
  }

  /** Puts an item back at the head, ahead of everything queued. */
  unshift(item: T): void {
    if (this.handOff(item)) return;
    this.items.unshift(item);
  }

  /**
   * Resolves with the oldest item, waiting until one is pushed.
   * Resolves with undefined (consuming nothing) once the signal aborts.
   *
   * onTake runs synchronously at the moment the item leaves the queue, before the returned
   * promise settles.
   */
  pop(signal?: AbortSignal, onTake?: (item: T) => void): Promise<T | undefined> {
    if (signal?.aborted) return Promise.resolve(undefined);
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      onTake?.(item);
      return Promise.resolve(item);
    }

    return new Promise<T | undefined>((resolve) => {
      const waiter: Waiter<T> = { resolve, signal, onTake };
      if (signal) {
        waiter.onAbort = () => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(undefined);
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  /** Removes and returns everything still queued, oldest first. */
  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  private handOff(item: T): boolean {
    const waiter = this.waiters.shift();
    if (!waiter) return false;
    this.detach(waiter);
    waiter.onTake?.(item);
    waiter.resolve(item);
    return true;
  }

  private detach(waiter: Waiter<T>): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener('abort', waiter.onAbort);
    }
  }
}
