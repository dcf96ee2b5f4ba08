import { Layout, Message, MessageType, Page, RouteKind, SYNTHETIC_PREFIX } from '../interfaces/types';
import { ArticleParser } from './ArticleParser';
import { MarkerCursor, extractBetween } from '../utils/MarkerCursor';
import { HtmlUtils } from '../utils/HtmlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { ParseError } from '../utils/errors';

const ARCHIVE_BODY_TOKEN = 'page-archive';
const NO_ENTRY_TOKEN = 'no-entry';

/**
 * Decides how a listing page renders its entries and turns the page into messages.
 *
 * Archive and search listings carry `page-archive` on `<body>` and only show
 * summaries: each summary becomes a queued entry URL. Every other page
 * renders full `<article>` elements, which are parsed in place.
 */
export class LayoutDispatcher {
  private readonly logger = LoggingUtils.createTaggedLogger('layout');

  constructor(
    private readonly domain: string,
    private readonly articleParser: ArticleParser = new ArticleParser()
  ) {}

  /**
   * Layout for the attribute string of a page's `<body>` tag
   */
  static detectLayout(bodyAttributes: string): Layout {
    return bodyAttributes.includes(ARCHIVE_BODY_TOKEN) ? Layout.PARTIAL : Layout.FULL;
  }

  /**
   * Emit the messages for every entry on a listing page
   */
  *dispatch(page: Page): Generator<Message, void, undefined> {
    const extr = new MarkerCursor(page.body);
    const layout = LayoutDispatcher.detectLayout(extr.extract('<body ', '>') ?? '');
    this.logger.debug(`Dispatching ${page.url} with ${layout} layout`);

    if (layout === Layout.PARTIAL) {
      yield* this.partialArticles(extr, page.url);
    } else {
      yield* this.fullArticles(extr, page.url);
    }
  }

  /**
   * Parse the first real article on an entry page
   */
  *firstArticle(page: Page): Generator<Message, void, undefined> {
    const extr = new MarkerCursor(page.body);
    const article = this.nextArticle(extr, page.url);
    if (article === null) {
      throw new ParseError('Entry page has no article', page.url);
    }
    yield* this.articleParser.emit(this.domain, this.articleParser.parse(article, page.url));
  }

  private *partialArticles(extr: MarkerCursor, pageUrl: string): Generator<Message, void, undefined> {
    let section: string | null;
    while ((section = extr.extract('<section class="archive-entry', '</section>')) !== null) {
      const link = extractBetween(section, '<a class="entry-title-link" href="', '"');
      if (link === null) {
        throw new ParseError('Archive entry has no entry link', pageUrl);
      }

      yield {
        type: MessageType.QUEUE,
        url: SYNTHETIC_PREFIX + HtmlUtils.unescape(link),
        metadata: { extractor: RouteKind.ENTRY },
      };
    }
  }

  private *fullArticles(extr: MarkerCursor, pageUrl: string): Generator<Message, void, undefined> {
    let article: string | null;
    while ((article = this.nextArticle(extr, pageUrl)) !== null) {
      yield* this.articleParser.emit(this.domain, this.articleParser.parse(article, pageUrl));
    }
  }

  /**
   * Body of the next `<article>` that is not a `no-entry` placeholder
   */
  private nextArticle(extr: MarkerCursor, pageUrl: string): string | null {
    let attributes: string | null;
    while ((attributes = extr.extract('<article ', '>')) !== null) {
      if (attributes.includes(NO_ENTRY_TOKEN)) {
        continue;
      }

      const article = extr.extract('', '</article>');
      if (article === null) {
        throw new ParseError('Unterminated article', pageUrl);
      }
      return article;
    }
    return null;
  }
}
