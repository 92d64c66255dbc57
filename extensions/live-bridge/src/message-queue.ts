/**
 * Ordered Message Queue with Watermarks
 *
 * Turns a socket's push-style message events into a pull-style next() for a
 * single consumer. Delivery is strictly FIFO. When the backlog reaches the
 * high watermark the owner is told to pause its socket, and told to resume
 * once the consumer has drained it to the low watermark.
 */

import type { Logger } from "./bridge.js";
import { onAbort } from "./cancellation-token.js";

/**
 * Options for creating a MessageQueue.
 */
export interface MessageQueueOptions {
  /** Logger for debug output */
  logger?: Logger;
  /** Tag used in log lines */
  name?: string;
  /** Backlog size that triggers onHigh (default: 64) */
  highWaterMark?: number;
  /** Backlog size that triggers onLow after onHigh (default: highWaterMark / 2) */
  lowWaterMark?: number;
  /** Called when the backlog reaches the high watermark */
  onHigh?: () => void;
  /** Called when the backlog drains back to the low watermark */
  onLow?: () => void;
}

export type QueueResult<T, E> =
  | { type: "item"; item: T }
  | { type: "ended"; final: E }
  | { type: "cancelled" };

/**
 * Queue metrics for monitoring.
 */
export interface MessageQueueMetrics {
  depth: number;
  paused: boolean;
  ended: boolean;
  delivered: number;
}

type Waiter<T, E> = (result: QueueResult<T, E>) => void;

/**
 * Single-consumer FIFO queue that ends with a final value.
 */
export class MessageQueue<T, E> {
  private readonly items: T[] = [];
  private waiter: Waiter<T, E> | null = null;
  private final: { value: E } | null = null;
  private paused = false;
  private delivered = 0;
  private readonly highWaterMark: number;
  private readonly lowWaterMark: number;
  private readonly options: MessageQueueOptions;

  constructor(options: MessageQueueOptions = {}) {
    this.options = options;
    this.highWaterMark = Math.max(1, options.highWaterMark ?? 64);
    this.lowWaterMark = Math.min(
      this.highWaterMark - 1,
      options.lowWaterMark ?? Math.floor(this.highWaterMark / 2),
    );
  }

  /**
   * Append an item. Ignored once the queue has ended.
   */
  push(item: T): void {
    if (this.final) return;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      this.delivered++;
      waiter({ type: "item", item });
      return;
    }

    this.items.push(item);
    if (!this.paused && this.items.length >= this.highWaterMark) {
      this.paused = true;
      this.options.logger?.debug(
        `[MessageQueue${this.tag()}] High watermark reached (${this.items.length}), pausing source`,
      );
      this.options.onHigh?.();
    }
  }

  /**
   * End the queue. Items already queued are still delivered first;
   * afterwards every next() resolves with the final value.
   * Only the first call has an effect.
   */
  end(final: E): void {
    if (this.final) return;
    this.final = { value: final };

    const waiter = this.waiter;
    if (waiter && this.items.length === 0) {
      this.waiter = null;
      waiter({ type: "ended", final });
    }
  }

  /**
   * Wait for the next item.
   *
   * Resolves "cancelled" if `signal` aborts while waiting; the item that
   * would have been delivered stays queued.
   */
  next(signal?: AbortSignal): Promise<QueueResult<T, E>> {
    if (this.items.length > 0) {
      const item = this.items[0];
      this.items.splice(0, 1);
      this.delivered++;
      this.maybeResume();
      return Promise.resolve({ type: "item", item });
    }
    if (this.final) {
      return Promise.resolve({ type: "ended", final: this.final.value });
    }
    if (signal?.aborted) {
      return Promise.resolve({ type: "cancelled" });
    }
    if (this.waiter) {
      return Promise.reject(new Error("MessageQueue supports a single consumer"));
    }

    return new Promise((resolve) => {
      const detach = onAbort(signal, () => {
        if (this.waiter === waiter) {
          this.waiter = null;
          resolve({ type: "cancelled" });
        }
      });
      const waiter: Waiter<T, E> = (result) => {
        detach();
        resolve(result);
      };
      this.waiter = waiter;
    });
  }

  getMetrics(): MessageQueueMetrics {
    return {
      depth: this.items.length,
      paused: this.paused,
      ended: this.final !== null,
      delivered: this.delivered,
    };
  }

  private maybeResume(): void {
    if (this.paused && this.items.length <= this.lowWaterMark) {
      this.paused = false;
      this.options.logger?.debug(
        `[MessageQueue${this.tag()}] Drained to ${this.items.length}, resuming source`,
      );
      this.options.onLow?.();
    }
  }

  private tag(): string {
    return this.options.name ? `:${this.options.name}` : "";
  }
}
