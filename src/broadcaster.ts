import { Subscription } from "./subscription.js";

/**
 * Fans each value out to every live subscriber of one event class.
 *
 * `broadcast()` is synchronous and only enqueues: a subscriber that stops
 * reading grows its own queue and never holds up the producer or the other
 * subscribers. Iteration runs over a snapshot, so subscribing or closing a
 * subscription while a broadcast is under way is safe.
 */
export class Broadcaster<T> {
  private subscribers = new Set<Subscription<T>>();
  private closed = false;

  subscribe(): Subscription<T> {
    const subscription = new Subscription<T>((closedSub) => {
      this.subscribers.delete(closedSub);
    });

    if (this.closed) {
      subscription.end();
    } else {
      this.subscribers.add(subscription);
    }

    return subscription;
  }

  broadcast(value: T): void {
    for (const subscription of [...this.subscribers]) {
      subscription.push(value);
    }
  }

  /** Ends every subscription. Values already queued can still be read. */
  close(): void {
    this.closed = true;
    const subscribers = [...this.subscribers];
    this.subscribers.clear();
    for (const subscription of subscribers) {
      subscription.end();
    }
  }

  get size(): number {
    return this.subscribers.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
