/**
 * Unbounded multi-producer, single-consumer async queue.
 *
 * Producers call `send()` from any callback without awaiting; the control
 * loop awaits `next()`. Events from one producer arrive in send order.
 */

export class EventChannel<T> implements AsyncIterable<T> {
  private queue: T[] = [];
  private waiting: ((value: T | null) => void) | null = null;
  private _closed = false;

  get closed(): boolean {
    return this._closed;
  }

  get pending(): number {
    return this.queue.length;
  }

  /** Enqueues an event. Returns false (and drops it) once the channel is closed. */
  send(event: T): boolean {
    if (this._closed) return false;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve(event);
    } else {
      this.queue.push(event);
    }
    return true;
  }

  /** Resolves with the next event, or null once the channel is closed and empty. */
  next(): Promise<T | null> {
    if (this.queue.length > 0) return Promise.resolve(this.queue.shift() ?? null);
    if (this._closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  /** Takes everything already queued without waiting. */
  drain(): T[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  /** Stops accepting events. Already queued events can still be read. */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve(null);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const event = await this.next();
      if (event === null) return;
      yield event;
    }
  }
}
