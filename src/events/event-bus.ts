import { JobEvent } from "../types/events";
import { Subscription, SubscriptionFilter } from "./subscription";

export interface EventBusOptions {
  /**
   * Default per-subscriber queue size
   */
  queueSize?: number;
}

export interface EventBusStats {
  published: number;
  subscribers: number;

  // summed over live subscribers
  dropped: number;
}

/**
 * Fan-out of job events to live subscribers.
 * Publishing never blocks: slow subscribers lose their oldest events.
 */
export class EventBus {
  private readonly subscriptions = new Map<string, Subscription>();
  private readonly queueSize: number;
  private nextId = 1;
  private publishedCount = 0;

  constructor(options: EventBusOptions = {}) {
    this.queueSize = options.queueSize ?? 256;
    if (!Number.isInteger(this.queueSize) || this.queueSize < 1) {
      throw new Error(`Invalid queue size: ${this.queueSize}`);
    }
  }

  publish(event: JobEvent): void {
    this.publishedCount++;

    for (const subscription of this.subscriptions.values()) {
      if (subscription.matches(event)) {
        subscription.deliver(event);
      }
    }
  }

  subscribe(
    filter: SubscriptionFilter = {},
    options: { queueSize?: number } = {}
  ): Subscription {
    const id = `sub-${this.nextId++}`;
    const subscription = new Subscription(
      id,
      { ...filter },
      options.queueSize ?? this.queueSize,
      (closed) => this.subscriptions.delete(closed.id)
    );

    this.subscriptions.set(id, subscription);
    return subscription;
  }

  unsubscribe(subscription: Subscription): void {
    subscription.close();
  }

  stats(): EventBusStats {
    let dropped = 0;
    for (const subscription of this.subscriptions.values()) {
      dropped += subscription.dropped;
    }

    return {
      published: this.publishedCount,
      subscribers: this.subscriptions.size,
      dropped,
    };
  }

  /**
   * Close every subscription, ending their iterators
   */
  closeAll(): void {
    for (const subscription of Array.from(this.subscriptions.values())) {
      subscription.close();
    }
  }
}
