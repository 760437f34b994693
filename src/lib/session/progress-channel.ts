/**
 * Progress Channel
 * Bounded ring buffer of progress events with synchronous subscribers.
 * When full, the oldest event is dropped.
 */

import { ProgressEvent } from '../orchestration/orchestrator.types';

export type ProgressSubscriber = (event: ProgressEvent) => void;

export class ProgressChannel {
  private readonly capacity: number;
  private buffer: Array<ProgressEvent | undefined>;
  private head = 0;
  private count = 0;
  private dropped = 0;
  private subscribers = new Set<ProgressSubscriber>();

  constructor(capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity));
    this.buffer = new Array<ProgressEvent | undefined>(this.capacity);
  }

  /**
   * Buffer an event and notify subscribers. Never throws.
   */
  publish(event: ProgressEvent): void {
    const tail = (this.head + this.count) % this.capacity;
    this.buffer[tail] = event;

    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
      this.dropped++;
    }

    for (const subscriber of this.subscribers) {
      try {
        subscriber(event);
      } catch (error: unknown) {
        console.error(
          `Progress: subscriber failed on ${event.type}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
  }

  /**
   * Returns an unsubscribe function
   */
  subscribe(subscriber: ProgressSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  /**
   * Buffered events, oldest first; the buffer is emptied
   */
  drain(): ProgressEvent[] {
    const events: ProgressEvent[] = [];

    for (let i = 0; i < this.count; i++) {
      const index = (this.head + i) % this.capacity;
      const event = this.buffer[index];
      if (event) {
        events.push(event);
      }
      this.buffer[index] = undefined;
    }

    this.head = 0;
    this.count = 0;
    return events;
  }

  size(): number {
    return this.count;
  }

  droppedCount(): number {
    return this.dropped;
  }
}
