import { JobEvent } from "../types/events";

export interface SubscriptionFilter {
  /**
   * Only events of this job. Omit for all jobs.
   */
  jobId?: string;

  /**
   * Only events of jobs deploying this target
   */
  target?: string;
}

/**
 * Live feed of job events with a bounded delivery queue.
 *
 * When the queue is full the oldest undelivered event is dropped and
 * `dropped` is incremented; delivery never waits for the consumer.
 * Consume with `for await`, `next()` or `take()`.
 */
export class Subscription implements AsyncIterableIterator<JobEvent> {
  private queue: JobEvent[] = [];
  private waiters: Array<(result: IteratorResult<JobEvent>) => void> = [];
  private closed = false;
  private droppedCount = 0;

  constructor(
    readonly id: string,
    readonly filter: SubscriptionFilter,
    readonly capacity: number,
    private readonly onClose: (subscription: Subscription) => void
  ) {}

  get dropped(): number {
    return this.droppedCount;
  }

  get pending(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  matches(event: JobEvent): boolean {
    if (this.filter.jobId !== undefined && this.filter.jobId !== event.jobId) {
      return false;
    }
    if (this.filter.target !== undefined && this.filter.target !== event.target) {
      return false;
    }
    return true;
  }

  deliver(event: JobEvent): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: event, done: false });
      return;
    }

    this.queue.push(event);
    if (this.queue.length > this.capacity) {
      this.queue.shift();
      this.droppedCount++;
    }
  }

  /**
   * Remove and return everything queued right now
   */
  take(): JobEvent[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  next(): Promise<IteratorResult<JobEvent>> {
    const event = this.queue.shift();
    if (event) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  async return(): Promise<IteratorResult<JobEvent>> {
    this.close();
    return { value: undefined, done: true };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue = [];

    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
    this.onClose(this);
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<JobEvent> {
    return this;
  }
}
