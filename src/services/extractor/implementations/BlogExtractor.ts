import { IExtractor } from '../interfaces/IExtractor';
import { IPageFetcher } from '../interfaces/IPageFetcher';
import { Message, TargetReference } from '../interfaces/types';
import { RouteDefinition } from '../factories/routes';
import { ArticleParser } from './ArticleParser';
import { LayoutDispatcher } from './LayoutDispatcher';
import { PaginationDriver } from './PaginationDriver';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * Extractor for every route. Paginated routes run the pagination driver
 * over listing pages; the entry route fetches its page once and parses
 * the first real article on it.
 */
export class BlogExtractor implements IExtractor {
  private readonly logger = LoggingUtils.createTaggedLogger('extractor');
  private readonly dispatcher: LayoutDispatcher;
  private readonly driver: PaginationDriver;
  private entryPages = 0;

  constructor(
    readonly route: RouteDefinition,
    readonly target: TargetReference,
    private readonly fetcher: IPageFetcher
  ) {
    this.dispatcher = new LayoutDispatcher(target.domain, new ArticleParser());
    this.driver = new PaginationDriver(fetcher, this.dispatcher);
  }

  async *items(): AsyncGenerator<Message, void, undefined> {
    this.logger.debug(`Extracting ${this.target.kind} ${this.target.domain}${this.target.path}`);

    if (this.route.paginated) {
      yield* this.driver.run(this.target);
      return;
    }

    const page = await this.fetcher.fetch(`https://${this.target.domain}${this.target.path}`);
    this.entryPages += 1;
    yield* this.dispatcher.firstArticle(page);
  }

  pagesFetched(): number {
    return this.entryPages + this.driver.pagesFetched();
  }
}
