import type { Job } from './jobs.js';

export class QueueFullError extends Error {
  readonly capacity: number;

  constructor(capacity: number) {
    super(`Job queue is full (capacity ${capacity})`);
    this.name = 'QueueFullError';
    this.capacity = capacity;
  }
}

export class QueueClosedError extends Error {
  constructor() {
    super('Job queue is closed');
    this.name = 'QueueClosedError';
  }
}

interface PendingSend<T> {
  job: T;
  resolve: () => void;
  reject: (error: unknown) => void;
  detach: () => void;
}

interface PendingReceive<T> {
  resolve: (job: T) => void;
  reject: (error: unknown) => void;
}

const abortReason = (signal: AbortSignal): unknown => signal.reason ?? new Error('Aborted');

/**
 * Bounded FIFO with any number of producers and a single consumer.
 *
 * Senders blocked on a full queue are admitted in call order as the consumer
 * frees slots. While anyone is waiting the buffer is full.
 */
export class JobQueue<T = Job> {
  private readonly buffer: T[] = [];
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingReceive<T>[] = [];
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  /** Senders blocked until a slot frees up. */
  get waiting(): number {
    return this.senders.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Enqueue without waiting. Throws {@link QueueFullError} and leaves the
   * queue untouched when no slot is free.
   */
  trySend(job: T): void {
    if (this.isClosed) {
      throw new QueueClosedError();
    }
    if (this.handOff(job)) {
      return;
    }
    if (this.buffer.length >= this.capacity) {
      throw new QueueFullError(this.capacity);
    }
    this.buffer.push(job);
  }

  /**
   * Enqueue, waiting for a free slot when the queue is full. Aborting the
   * signal withdraws a send that has not been admitted yet.
   */
  send(job: T, signal?: AbortSignal): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new QueueClosedError());
    }
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }
    if (this.handOff(job)) {
      return Promise.resolve();
    }
    if (this.buffer.length < this.capacity && this.senders.length === 0) {
      this.buffer.push(job);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const pending: PendingSend<T> = { job, resolve, reject, detach: () => undefined };

      if (signal) {
        const onAbort = () => {
          const index = this.senders.indexOf(pending);
          if (index !== -1) {
            this.senders.splice(index, 1);
          }
          reject(abortReason(signal));
        };
        signal.addEventListener('abort', onAbort, { once: true });
        pending.detach = () => signal.removeEventListener('abort', onAbort);
      }

      this.senders.push(pending);
    });
  }

  receive(): Promise<T> {
    if (this.buffer.length > 0) {
      const [job] = this.buffer.splice(0, 1);
      this.admitWaitingSender();
      return Promise.resolve(job);
    }
    if (this.isClosed) {
      return Promise.reject(new QueueClosedError());
    }
    return new Promise<T>((resolve, reject) => {
      this.receivers.push({ resolve, reject });
    });
  }

  /**
   * Drops buffered jobs and fails every waiting sender and receiver.
   *
   * @returns the number of buffered jobs dropped
   */
  close(): number {
    if (this.isClosed) {
      return 0;
    }
    this.isClosed = true;

    const dropped = this.buffer.length;
    this.buffer.length = 0;

    for (const sender of this.senders.splice(0)) {
      sender.detach();
      sender.reject(new QueueClosedError());
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver.reject(new QueueClosedError());
    }

    return dropped;
  }

  private handOff(job: T): boolean {
    const receiver = this.receivers.shift();
    if (!receiver) {
      return false;
    }
    receiver.resolve(job);
    return true;
  }

  private admitWaitingSender(): void {
    const sender = this.senders.shift();
    if (!sender) {
      return;
    }
    sender.detach();
    this.buffer.push(sender.job);
    sender.resolve();
  }
}
