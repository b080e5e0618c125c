/**
 * Outcome of one {@link AlbumBuffer.next} call.
 */
export type BufferRead<T> =
  | { status: 'item'; item: T }
  | { status: 'timeout' }
  | { status: 'aborted' };

type Waiter<T> = (read: BufferRead<T>) => void;

/**
 * Unbounded FIFO with a single consumer that reads with a deadline.
 *
 * Producers call {@link push}; the consumer awaits {@link next}, which
 * resolves with the oldest item, or with `timeout` once `timeoutMs` passes
 * without one, or with `aborted` when the signal fires. After {@link close}
 * the buffer rejects further pushes so nothing lands in a drained queue.
 */
export class AlbumBuffer<T> {
  private readonly items: T[] = [];
  private waiter: Waiter<T> | null = null;
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Appends an item, handing it straight to a waiting consumer if there is one.
   * Returns false when the buffer is closed and the item was not taken.
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter({ status: 'item', item });
      return true;
    }
    this.items.push(item);
    return true;
  }

  next(timeoutMs: number, signal?: AbortSignal): Promise<BufferRead<T>> {
    if (this.waiter) {
      return Promise.reject(
        new Error('AlbumBuffer supports a single pending reader'),
      );
    }

    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve({ status: 'item', item });
    }
    if (signal?.aborted) {
      return Promise.resolve({ status: 'aborted' });
    }

    return new Promise<BufferRead<T>>(resolve => {
      const settle = (read: BufferRead<T>) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.waiter = null;
        resolve(read);
      };
      const onAbort = () => settle({ status: 'aborted' });
      const timer = setTimeout(() => settle({ status: 'timeout' }), timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = settle;
    });
  }

  /**
   * Stops accepting items and returns whatever was never read.
   */
  close(): T[] {
    this.closed = true;
    return this.items.splice(0, this.items.length);
  }
}
