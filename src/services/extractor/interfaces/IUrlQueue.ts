import { RouteKind } from './types';

/**
 * A queued reference waiting to re-enter the pipeline
 */
export interface QueuedUrl {
  url: string;
  extractor: RouteKind;
}

/**
 * Interface for queued-reference management.
 * Implementations hold URLs emitted for later extraction and remember
 * which ones have already been processed.
 */
export interface IUrlQueue {
  /**
   * Add a URL unless it is already queued or visited
   * @returns True if the URL was added
   */
  add(item: QueuedUrl): boolean;

  /**
   * Remove and return the oldest queued URL, or null when the queue is empty
   */
  getNext(): QueuedUrl | null;

  has(url: string): boolean;

  size(): number;

  /**
   * Record a URL as processed; later `add` calls for it are refused
   */
  markVisited(url: string): void;
}
