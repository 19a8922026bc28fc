/**
 * Consumer side of a Channel.
 */
export interface ReadableChannel<T> extends AsyncIterable<T> {
  /** Resolves with the next value, or `done` once closed and drained */
  receive(): Promise<IteratorResult<T, undefined>>;
  readonly closed: boolean;
}

interface PendingSend<T> {
  value: T;
  delivered: () => void;
  dropped: (error: Error) => void;
}

/**
 * Single-writer queue with a fixed capacity. With capacity 0 every `send`
 * waits until a consumer has taken the value; with capacity N up to N
 * values wait in the buffer before senders start waiting.
 */
export default class Channel<T> implements ReadableChannel<T> {
  private readonly buffer: T[] = [];
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: ((result: IteratorResult<T, undefined>) => void)[] =
    [];
  private isClosed = false;

  constructor(private readonly capacity = 0) {}

  public get closed(): boolean {
    return this.isClosed;
  }

  /**
   * @throws {Error} If the channel is already closed
   */
  public send(value: T): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new Error("send on closed channel"));
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ done: false, value });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      this.senders.push({ value, delivered: resolve, dropped: reject });
    });
  }

  public receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      const waiting = this.senders.shift();
      if (waiting) {
        this.buffer.push(waiting.value);
        waiting.delivered();
      }
      return Promise.resolve({ done: false, value });
    }

    const waiting = this.senders.shift();
    if (waiting) {
      waiting.delivered();
      return Promise.resolve({ done: false, value: waiting.value });
    }

    if (this.isClosed) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Marks the channel closed. Buffered values stay readable; pending
   * receivers are released with `done`. Values of senders still waiting
   * are dropped and their `send` rejects.
   */
  public close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver({ done: true, value: undefined });
    }
    for (const sender of this.senders.splice(0)) {
      sender.dropped(new Error("channel closed before the value was received"));
    }
  }

  public [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
    };
  }
}
