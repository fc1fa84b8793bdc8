// Unbounded FIFO between one producer (the controller's observer) and one
// consumer (the transport). `push` never blocks and may be called from any
// callback; `poll` waits at most `timeoutMs` for the next item.

export class ProgressChannel<T> {
  private readonly items: T[] = [];
  private waiter: ((item: T | undefined) => void) | undefined;
  private closed = false;

  push(item: T): void {
    if (this.closed) return;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(item);
      return;
    }
    this.items.push(item);
  }

  /** Next item, or `undefined` once the timeout elapses or the channel closes */
  poll(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) return Promise.resolve(this.items.shift());
    if (this.closed) return Promise.resolve(undefined);
    if (this.waiter) throw new Error('ProgressChannel supports a single consumer');

    return new Promise<T | undefined>(resolve => {
      const timer = setTimeout(() => {
        if (this.waiter === settle) this.waiter = undefined;
        resolve(undefined);
      }, timeoutMs);
      const settle = (item: T | undefined) => {
        clearTimeout(timer);
        resolve(item);
      };
      this.waiter = settle;
    });
  }

  /** Remove and return everything queued */
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }

  /** Stop accepting items and release a waiting consumer. Queued items stay drainable. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.(undefined);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length;
  }
}
