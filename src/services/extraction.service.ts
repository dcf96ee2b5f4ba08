import config from '../config';
import logger from '../utils/logger';
import { IPageFetcher } from './extractor/interfaces/IPageFetcher';
import { ExtractionOptions, ExtractionStats, Message, MessageType } from './extractor/interfaces/types';
import { AxiosPageFetcher } from './extractor/implementations/AxiosPageFetcher';
import { InMemoryUrlQueue } from './extractor/implementations/InMemoryUrlQueue';
import { ExtractorFactory } from './extractor/factories/ExtractorFactory';
import { RouteMatcher } from './extractor/factories/RouteMatcher';

/**
 * Runs extractions for input URLs and, on request, re-enters the
 * pipeline for the entries that listing pages only summarise.
 */
export class ExtractionService {
  private readonly factory: ExtractorFactory;
  private readonly matcher = new RouteMatcher();
  private lastStats: ExtractionStats = ExtractionService.emptyStats();

  constructor(fetcher?: IPageFetcher) {
    this.factory = new ExtractorFactory(fetcher ?? new AxiosPageFetcher(config.http), this.matcher);
  }

  /**
   * Stream the messages for a URL.
   *
   * Without `followQueue` queued references are yielded to the caller.
   * With it they are collected and extracted one at a time, each as a
   * fresh entry target, after the current target is exhausted.
   */
  async *extract(url: string, options: ExtractionOptions = {}): AsyncGenerator<Message, void, undefined> {
    const stats = ExtractionService.emptyStats();
    const queue = new InMemoryUrlQueue(queued => this.targetKey(queued));
    const startTime = Date.now();

    logger.info(`Starting extraction for ${url}`);

    try {
      let current: string | null = url;
      while (current !== null) {
        queue.markVisited(current);
        const extractor = this.factory.fromUrl(current);

        try {
          for await (const message of extractor.items()) {
            if (message.type === MessageType.QUEUE) {
              stats.queued += 1;
              if (options.followQueue) {
                queue.add({ url: message.url, extractor: message.metadata.extractor });
                continue;
              }
            } else if (message.type === MessageType.DIRECTORY) {
              stats.directories += 1;
            } else {
              if (this.limitReached(stats, options)) {
                return;
              }
              stats.urls += 1;
            }

            yield message;

            // checked again here so the next page is not fetched once the limit is met
            if (message.type === MessageType.URL && this.limitReached(stats, options)) {
              return;
            }
          }
        } finally {
          stats.pagesFetched += extractor.pagesFetched();
        }

        current = queue.getNext()?.url ?? null;
      }
    } catch (error) {
      logger.error(`Extraction failed for ${url}: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    } finally {
      this.lastStats = stats;
      const { pagesFetched, directories, urls, queued } = stats;
      logger.info(
        `Extraction finished for ${url} in ${Date.now() - startTime}ms: ` +
        `${pagesFetched} page(s), ${directories} article(s), ${urls} image(s), ${queued} queued`
      );
    }
  }

  /**
   * Counters of the most recently finished run
   */
  getStats(): ExtractionStats {
    return { ...this.lastStats };
  }

  private limitReached(stats: ExtractionStats, options: ExtractionOptions): boolean {
    if (options.limit === undefined || stats.urls < options.limit) {
      return false;
    }
    logger.info(`Reached limit of ${options.limit} URL(s)`);
    return true;
  }

  /**
   * Identity of the blog page a URL points at, so that a plain entry URL
   * and its `hatenablog:`-prefixed form are visited once
   */
  private targetKey(url: string): string {
    const match = this.matcher.tryMatch(url);
    return match === null ? url : `${match.target.domain}${match.target.path}`;
  }

  private static emptyStats(): ExtractionStats {
    return { pagesFetched: 0, directories: 0, urls: 0, queued: 0 };
  }
}
