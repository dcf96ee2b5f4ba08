import { IUrlQueue, QueuedUrl } from '../interfaces/IUrlQueue';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * In-memory FIFO implementation of the URL queue.
 * URLs are compared through `keyOf`, which defaults to the URL itself.
 */
export class InMemoryUrlQueue implements IUrlQueue {
  private queue: QueuedUrl[] = [];
  private visited: Set<string> = new Set();
  private readonly logger = LoggingUtils.createTaggedLogger('service');

  constructor(private readonly keyOf: (url: string) => string = url => url) {}

  add(item: QueuedUrl): boolean {
    if (this.isVisited(item.url) || this.has(item.url)) {
      return false;
    }

    this.queue.push({ ...item });
    this.logger.debug(`Queued ${item.url} for ${item.extractor}`);
    return true;
  }

  getNext(): QueuedUrl | null {
    return this.queue.shift() ?? null;
  }

  has(url: string): boolean {
    const key = this.keyOf(url);
    return this.queue.some(item => this.keyOf(item.url) === key);
  }

  size(): number {
    return this.queue.length;
  }

  /**
   * Mark a URL as visited, removing it from the queue if present
   */
  markVisited(url: string): void {
    const key = this.keyOf(url);
    this.visited.add(key);

    const index = this.queue.findIndex(item => this.keyOf(item.url) === key);
    if (index !== -1) {
      this.queue.splice(index, 1);
    }
  }

  private isVisited(url: string): boolean {
    return this.visited.has(this.keyOf(url));
  }
}
