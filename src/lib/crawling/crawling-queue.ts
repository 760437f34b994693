/**
 * Crawling Queue
 * Breadth-first page queue that remembers every URL it has ever accepted
 */

import { PageTask, PageType } from './crawling.types';

export class CrawlingQueue {
  private queue: PageTask[] = [];
  private seen: Set<string> = new Set();
  private sequence: number = 0;

  /**
   * Add a URL to the queue (BFS order).
   * Returns the created task, or null when the URL was already accepted once.
   */
  enqueue(url: string, depth: number, parentUrl: string | null, pageTypeHint: PageType | null = null): PageTask | null {
    if (this.seen.has(url)) {
      return null;
    }

    const task: PageTask = {
      url,
      depth,
      parentUrl,
      pageTypeHint,
      sequence: this.sequence++,
    };

    this.queue.push(task);
    this.seen.add(url);
    return task;
  }

  /**
   * Get next page from queue (FIFO for BFS)
   */
  dequeue(): PageTask | null {
    return this.queue.shift() ?? null;
  }

  /**
   * Mark a URL as known without queueing it (e.g. a redirect target)
   */
  markSeen(url: string): void {
    this.seen.add(url);
  }

  /**
   * Whether the URL was ever accepted (queued, in flight, or processed)
   */
  hasSeen(url: string): boolean {
    return this.seen.has(url);
  }

  /**
   * Check if queue is empty
   */
  isEmpty(): boolean {
    return this.queue.length === 0;
  }

  /**
   * Pending tasks
   */
  size(): number {
    return this.queue.length;
  }

  /**
   * Total tasks ever enqueued
   */
  totalEnqueued(): number {
    return this.sequence;
  }

  /**
   * Drain remaining tasks without processing them
   */
  drain(): PageTask[] {
    const remaining = this.queue;
    this.queue = [];
    return remaining;
  }
}
