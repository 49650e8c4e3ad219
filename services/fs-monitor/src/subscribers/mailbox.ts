/**
 * Bounded FIFO with non-blocking `offer`. Producers never wait: when the
 * mailbox is full the offered item is refused and counted as dropped.
 * `force` bypasses the bound for items that must not be lost.
 */
export class Mailbox<T> {
  readonly capacity: number;
  private readonly items: T[] = [];
  private readonly takers: Array<(item: T) => void> = [];
  private droppedCount = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Mailbox capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  offer(item: T): boolean {
    if (this.handOff(item)) {
      return true;
    }

    if (this.items.length >= this.capacity) {
      this.droppedCount++;
      return false;
    }

    this.items.push(item);
    return true;
  }

  /** Enqueue `item` even when the mailbox is full. */
  force(item: T): void {
    if (!this.handOff(item)) {
      this.items.push(item);
    }
  }

  /**
   * Wait for the next item. An aborted wait rejects with the signal's reason
   * and no longer claims an item.
   */
  take(signal?: AbortSignal): Promise<T> {
    if (this.items.length > 0) {
      const [next] = this.items.splice(0, 1);
      return Promise.resolve(next);
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.takers.indexOf(taker);
        if (index !== -1) {
          this.takers.splice(index, 1);
        }
        reject(signal?.reason);
      };
      const taker = (item: T): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve(item);
      };
      this.takers.push(taker);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  poll(): T | undefined {
    return this.items.shift();
  }

  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  private handOff(item: T): boolean {
    const taker = this.takers.shift();
    if (!taker) {
      return false;
    }
    taker(item);
    return true;
  }
}
