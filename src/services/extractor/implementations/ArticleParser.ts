import {
  ArticleMetadata,
  CATEGORY,
  Message,
  MessageType,
  ParsedArticle,
} from '../interfaces/types';
import { MarkerCursor } from '../utils/MarkerCursor';
import { HtmlUtils } from '../utils/HtmlUtils';
import { UrlUtils } from '../utils/UrlUtils';
import { ParseError } from '../utils/errors';

const DATE_START = '<time datetime="';
const DATE_END = '"';
const LINK_START = '<a href="';
const LINK_END = '" class="entry-title-link bookmark">';
const TITLE_END = '</a>';
const CONTENT_START = '<div class="entry-content hatenablog-entry">';
const CONTENT_END = '</div>';
const ENTRY_SEPARATOR = '/entry/';
const CONTENT_IMAGE_CLASS = 'hatena-fotolife';

/**
 * Parses a single `<article>` fragment into post metadata and the
 * full-size images embedded in its body.
 */
export class ArticleParser {
  /**
   * Read date, entry, title and images from an article fragment
   * @param fragment Text between the opening `<article ...>` tag and `</article>`
   * @param pageUrl URL of the page the fragment came from, for error messages
   */
  parse(fragment: string, pageUrl?: string): ParsedArticle {
    const extr = new MarkerCursor(fragment);

    const datetime = extr.extract(DATE_START, DATE_END);
    if (datetime === null) {
      throw new ParseError('Article has no publication date', pageUrl);
    }
    const date = this.parseDate(datetime, pageUrl);

    const link = extr.extract(LINK_START, LINK_END);
    if (link === null) {
      throw new ParseError('Article has no entry link', pageUrl);
    }
    const entry = ArticleParser.entryFromLink(HtmlUtils.unescape(link));
    if (!entry) {
      throw new ParseError(`Entry link '${link}' has no entry path`, pageUrl);
    }

    const title = extr.extract('', TITLE_END);
    if (title === null) {
      throw new ParseError(`Entry '${entry}' has no title`, pageUrl);
    }

    const content = extr.extract(CONTENT_START, CONTENT_END);
    if (content === null) {
      throw new ParseError(`Entry '${entry}' has no content`, pageUrl);
    }

    return { date, entry, title, images: this.findImages(content, entry, pageUrl) };
  }

  /**
   * Produce the directory message for an article followed by one URL message per image
   */
  *emit(domain: string, article: ParsedArticle): Generator<Message, void, undefined> {
    const metadata: ArticleMetadata = {
      category: CATEGORY,
      domain,
      date: article.date,
      entry: article.entry,
      title: article.title,
      count: article.images.length,
    };
    yield { type: MessageType.DIRECTORY, metadata };

    let num = 0;
    for (const url of article.images) {
      num += 1;
      yield {
        type: MessageType.URL,
        url,
        metadata: { ...metadata, num, ...UrlUtils.nameExtFromUrl(url) },
      };
    }
  }

  /**
   * Everything after the first `/entry/` of a canonical link
   */
  static entryFromLink(link: string): string {
    const index = link.indexOf(ENTRY_SEPARATOR);
    return index === -1 ? '' : link.slice(index + ENTRY_SEPARATOR.length);
  }

  /**
   * Only `hatena-fotolife` images are post content; icons, badges and
   * embedded widgets lack the class
   */
  static isContentImage(attributes: string): boolean {
    return HtmlUtils.hasAttribute(attributes, 'class', CONTENT_IMAGE_CLASS);
  }

  private findImages(content: string, entry: string, pageUrl?: string): string[] {
    const images: string[] = [];
    for (const match of content.matchAll(/<img +(.+?) *\/?>/g)) {
      const attributes = match[1];
      if (!ArticleParser.isContentImage(attributes)) {
        continue;
      }

      const src = HtmlUtils.getAttribute(attributes, 'src');
      if (src === null) {
        throw new ParseError(`Image in entry '${entry}' has no source`, pageUrl);
      }
      images.push(HtmlUtils.unescape(src));
    }
    return images;
  }

  private parseDate(datetime: string, pageUrl?: string): Date {
    const date = new Date(datetime);
    if (Number.isNaN(date.getTime())) {
      throw new ParseError(`Invalid publication date '${datetime}'`, pageUrl);
    }
    return date;
  }
}
