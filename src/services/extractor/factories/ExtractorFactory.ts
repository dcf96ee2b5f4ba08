import { IExtractor } from '../interfaces/IExtractor';
import { IPageFetcher } from '../interfaces/IPageFetcher';
import { BlogExtractor } from '../implementations/BlogExtractor';
import { RouteMatcher } from './RouteMatcher';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * Builds the extractor for an input URL
 */
export class ExtractorFactory {
  private readonly logger = LoggingUtils.createTaggedLogger('extractor');

  constructor(
    private readonly fetcher: IPageFetcher,
    private readonly matcher: RouteMatcher = new RouteMatcher()
  ) {}

  /**
   * @throws NotFoundError when no route accepts the URL
   */
  fromUrl(url: string): IExtractor {
    const { route, target } = this.matcher.match(url);
    this.logger.debug(`Matched ${url} as ${route.kind}`, { domain: target.domain, path: target.path });
    return new BlogExtractor(route, target, this.fetcher);
  }
}
