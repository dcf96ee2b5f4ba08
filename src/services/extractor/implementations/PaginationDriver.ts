import { IPageFetcher } from '../interfaces/IPageFetcher';
import { Message, Page, QueryParams, TargetReference } from '../interfaces/types';
import { LayoutDispatcher } from './LayoutDispatcher';
import { HtmlUtils } from '../utils/HtmlUtils';
import { UrlUtils } from '../utils/UrlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

const PAGER_NEXT = /<span class="pager-next">\s*<a href="(.+?)"/;

/**
 * Pagination state
 */
export enum PaginationState {
  FETCHING = 'FETCHING',
  DONE = 'DONE'
}

/**
 * Walks a listing by following its `pager-next` links.
 *
 * Only the first request carries the target's query; later pages are
 * requested exactly as linked, since the link already encodes the
 * pagination state. Each page is dispatched in full before the next
 * one is fetched.
 */
export class PaginationDriver {
  private readonly logger = LoggingUtils.createTaggedLogger('pagination');
  private state: PaginationState = PaginationState.FETCHING;
  private pages = 0;

  constructor(
    private readonly fetcher: IPageFetcher,
    private readonly dispatcher: LayoutDispatcher
  ) {}

  getState(): PaginationState {
    return this.state;
  }

  pagesFetched(): number {
    return this.pages;
  }

  /**
   * Fetch and dispatch every page of a listing target
   */
  async *run(target: TargetReference): AsyncGenerator<Message, void, undefined> {
    let url: string | null = `https://${target.domain}${target.path}`;
    let query: QueryParams | undefined = { ...target.query };
    this.state = PaginationState.FETCHING;

    while (url !== null) {
      const page = await this.fetcher.fetch(url, query);
      this.pages += 1;
      this.logger.debug(`Page ${this.pages}: ${page.url}`);

      yield* this.dispatcher.dispatch(page);

      url = PaginationDriver.nextPageUrl(page);
      query = undefined;
    }

    this.state = PaginationState.DONE;
    this.logger.debug(`Pagination done after ${this.pages} page(s)`);
  }

  /**
   * Target of the page's `pager-next` link, or null on the last page
   */
  static nextPageUrl(page: Page): string | null {
    const match = PAGER_NEXT.exec(page.body);
    if (!match) {
      return null;
    }
    return UrlUtils.resolveUrl(HtmlUtils.unescape(match[1]), page.url);
  }
}
