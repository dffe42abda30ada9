/**
 * Bounded FIFO message channel
 *
 * Producers either try to enqueue without waiting (`trySend`) or wait for room
 * (`send`) until an AbortSignal fires. The consumer takes everything that is
 * queued at once with `drain`.
 */

interface PendingSend<T> {
  value: T;
  resolve: (sent: boolean) => void;
  detach: () => void;
}

export class MessageChannel<T> {
  readonly capacity: number;
  private readonly buffer: T[] = [];
  private readonly pending: PendingSend<T>[] = [];
  private readonly listeners = new Set<() => void>();
  private closed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`channel capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.buffer.length;
  }

  get isFull(): boolean {
    return this.buffer.length >= this.capacity;
  }

  /**
   * Enqueue if there is room. Returns false when full or closed.
   */
  trySend(value: T): boolean {
    if (this.closed || this.isFull) {
      return false;
    }
    this.buffer.push(value);
    this.notify();
    return true;
  }

  /**
   * Enqueue, waiting for room. Resolves false if the signal aborts or the
   * channel closes first.
   */
  send(value: T, signal?: AbortSignal): Promise<boolean> {
    if (this.closed || signal?.aborted) {
      return Promise.resolve(false);
    }
    if (this.trySend(value)) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const entry: PendingSend<T> = {
        value,
        resolve,
        detach: () => signal?.removeEventListener('abort', onAbort)
      };
      const onAbort = (): void => {
        const index = this.pending.indexOf(entry);
        if (index !== -1) {
          this.pending.splice(index, 1);
        }
        resolve(false);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.pending.push(entry);
    });
  }

  /**
   * Take every queued message without waiting for more
   */
  drain(): T[] {
    const values = this.buffer.splice(0, this.buffer.length);
    if (values.length > 0) {
      this.admitPending();
    }
    return values;
  }

  /**
   * Called after each enqueue. Returns an unsubscribe function.
   */
  onMessage(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Refuse further sends and release waiting producers. Queued messages stay
   * readable.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const entry of this.pending.splice(0, this.pending.length)) {
      entry.detach();
      entry.resolve(false);
    }
  }

  private admitPending(): void {
    let admitted = false;
    while (!this.isFull && this.pending.length > 0) {
      const entry = this.pending.shift();
      if (!entry) break;
      entry.detach();
      this.buffer.push(entry.value);
      entry.resolve(true);
      admitted = true;
    }
    if (admitted) {
      this.notify();
    }
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener();
    }
  }
}
