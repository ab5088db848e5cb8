/**
 * Unbounded single-consumer message channel
 *
 * Producers (watcher callbacks, debounce timers) only ever call `send()`.
 * The consumer awaits `receive()`, which hands messages out one at a time in
 * the order they were sent.
 */

export class EventChannel<T> {
  /** Messages sent but not yet received */
  private readonly buffer: T[] = [];
  /** Consumers waiting for the next message */
  private readonly waiters: Array<(message: T | undefined) => void> = [];
  private closed = false;

  /** Number of buffered messages */
  get size(): number {
    return this.buffer.length;
  }

  /** Whether `close()` has been called */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Send a message to the consumer
   * @returns False if the channel is closed and the message was dropped
   */
  send(message: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(message);
    } else {
      this.buffer.push(message);
    }
    return true;
  }

  /**
   * Receive the next message
   *
   * Buffered messages are still delivered after `close()`; once the buffer is
   * empty a closed channel resolves to `undefined`.
   */
  receive(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      return Promise.resolve(this.buffer.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Close the channel, releasing every pending `receive()` with `undefined`
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const message = await this.receive();
      if (message === undefined) {
        return;
      }
      yield message;
    }
  }
}
