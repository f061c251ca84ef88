import { normalizeError, type AppLogger } from "./logger";

export type EventQueueOptions<T> = {
  capacity: number;
  handler: (item: T) => Promise<void> | void;
  logger: AppLogger;
  /** Items that must never be dropped on overflow, e.g. ticket-bearing events. */
  retain?: (item: T) => boolean;
};

/**
 * Bounded FIFO drained by a single consumer. When full, the oldest droppable
 * item is discarded so the producer (the socket loop) never waits on the
 * consumer. Retained items are kept even past capacity.
 */
export class EventQueue<T> {
  private readonly items: T[] = [];
  private draining: Promise<void> | null = null;
  private droppedCount = 0;
  private closed = false;

  constructor(private readonly options: EventQueueOptions<T>) {}

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  /** Returns false when an item (an older one, or this one) had to be dropped. */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    let accepted = true;
    if (this.items.length >= this.options.capacity) {
      const room = this.makeRoom(item);
      if (room === "rejected") {
        return false;
      }
      accepted = room === "fits";
    }
    this.items.push(item);
    if (!this.draining) {
      this.draining = Promise.resolve().then(() => this.drain());
    }
    return accepted;
  }

  /** Resolves once every queued item has been handled. */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /** Stops accepting items and waits for the ones already queued. */
  async close(): Promise<void> {
    this.closed = true;
    await this.idle();
  }

  private makeRoom(incoming: T): "fits" | "dropped_oldest" | "rejected" {
    const retain = this.options.retain;
    const index = retain ? this.items.findIndex((queued) => !retain(queued)) : 0;
    if (index !== -1 && index < this.items.length) {
      this.items.splice(index, 1);
      this.noteDrop();
      return "dropped_oldest";
    }
    if (retain?.(incoming)) {
      this.options.logger.warn("event_queue_over_capacity", {
        capacity: this.options.capacity,
        size: this.items.length + 1,
      });
      return "fits";
    }
    // Only retained items are queued, so the newcomer is the oldest droppable one.
    this.noteDrop();
    return "rejected";
  }

  private noteDrop(): void {
    this.droppedCount += 1;
    this.options.logger.warn("event_queue_overflow", {
      capacity: this.options.capacity,
      dropped: this.droppedCount,
    });
  }

  private async drain(): Promise<void> {
    try {
      for (let item = this.items.shift(); item !== undefined; item = this.items.shift()) {
        try {
          await this.options.handler(item);
        } catch (error) {
          this.options.logger.error("event_handler_failed", normalizeError(error));
        }
      }
    } finally {
      this.draining = null;
    }
  }
}
