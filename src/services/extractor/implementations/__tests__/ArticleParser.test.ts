import { ArticleParser } from '../ArticleParser';
import { MessageType } from '../../interfaces/types';
import { ParseError } from '../../utils/errors';
import { articleBody, fotolifeImage, imageUrl, DOMAIN } from '../../test-utils/fixtures';

describe('ArticleParser', () => {
  let parser: ArticleParser;

  beforeEach(() => {
    parser = new ArticleParser();
  });

  describe('entryFromLink', () => {
    it('should keep everything after the first /entry/', () => {
      expect(ArticleParser.entryFromLink('https://h.example/entry/2024/01/02/1234')).toBe('2024/01/02/1234');
    });

    it('should only split on the first occurrence', () => {
      expect(ArticleParser.entryFromLink('https://h.example/entry/notes/entry/2')).toBe('notes/entry/2');
    });

    it('should return an empty string when the link has no entry path', () => {
      expect(ArticleParser.entryFromLink('https://h.example/about')).toBe('');
    });
  });

  describe('parse', () => {
    it('should extract date, entry, title and images', () => {
      const images = [imageUrl('2024/01/02/030405', 1), imageUrl('2024/01/02/030405', 2)];
      const fragment = articleBody({
        entry: '2024/01/02/030405',
        title: 'New Year',
        datetime: '2024-01-02T12:04:05+09:00',
        images,
      });

      const result = parser.parse(fragment);

      expect(result.date.toISOString()).toBe('2024-01-02T03:04:05.000Z');
      expect(result.entry).toBe('2024/01/02/030405');
      expect(result.title).toBe('New Year');
      expect(result.images).toEqual(images);
    });

    it('should keep only content images', () => {
      const kept = imageUrl('2024/01/02/030405', 1);
      const fragment = articleBody({
        entry: '2024/01/02/030405',
        images: [kept],
        extraContent: [
          '<img src="https://cdn.example.com/emoji/smile.gif" class="hatena-emoji" alt=":)" />',
          '<img src="https://cdn.example.com/badge.png" alt="badge">',
        ].join('\n'),
      });

      const result = parser.parse(fragment);

      expect(result.images).toEqual([kept]);
    });

    it('should unescape image sources and the entry link', () => {
      const fragment = articleBody({
        entry: '2024/01/02/a&amp;b',
        extraContent: fotolifeImage('https://cdn.example.com/i.jpg?a=1&amp;b=2'),
      });

      const result = parser.parse(fragment);

      expect(result.entry).toBe('2024/01/02/a&b');
      expect(result.images).toEqual(['https://cdn.example.com/i.jpg?a=1&b=2']);
    });

    it('should accept an article without images', () => {
      const result = parser.parse(articleBody({ entry: '2024/01/02/030405' }));

      expect(result.images).toEqual([]);
    });

    it('should fail when the date is missing', () => {
      const fragment = articleBody({ entry: '2024/01/02/030405' }).replace('<time datetime="', '<time data-x="');

      expect(() => parser.parse(fragment)).toThrow(ParseError);
      expect(() => parser.parse(fragment)).toThrow('Article has no publication date');
    });

    it('should fail when the date cannot be parsed', () => {
      const fragment = articleBody({ entry: '2024/01/02/030405', datetime: 'yesterday' });

      expect(() => parser.parse(fragment)).toThrow("Invalid publication date 'yesterday'");
    });

    it('should fail when the entry link is missing', () => {
      const fragment = articleBody({ entry: '2024/01/02/030405' }).replace('entry-title-link bookmark', 'entry-title-link');

      expect(() => parser.parse(fragment, 'https://example.hatenablog.com/')).toThrow(
        'Article has no entry link (https://example.hatenablog.com/)'
      );
    });

    it('should fail when the entry path is empty', () => {
      const fragment = articleBody({ entry: '' });

      expect(() => parser.parse(fragment)).toThrow(ParseError);
    });

    it('should fail when the content region is missing', () => {
      const fragment = articleBody({ entry: '2024/01/02/030405' }).replace('entry-content hatenablog-entry', 'entry-content');

      expect(() => parser.parse(fragment)).toThrow("Entry '2024/01/02/030405' has no content");
    });

    it('should fail when a content image has no source', () => {
      const fragment = articleBody({
        entry: '2024/01/02/030405',
        extraContent: '<img data-src="https://cdn.example.com/a.jpg" class="hatena-fotolife" />',
      });

      expect(() => parser.parse(fragment)).toThrow("Image in entry '2024/01/02/030405' has no source");
    });
  });

  describe('emit', () => {
    it('should yield a directory message followed by numbered url messages', () => {
      const date = new Date('2024-01-02T03:04:05Z');
      const messages = [...parser.emit(DOMAIN, {
        date,
        entry: '2024/01/02/030405',
        title: 'Post',
        images: ['https://cdn.example.com/a/first.jpg', 'https://cdn.example.com/a/second.PNG'],
      })];

      const metadata = {
        category: 'hatenablog',
        domain: DOMAIN,
        date,
        entry: '2024/01/02/030405',
        title: 'Post',
        count: 2,
      };
      expect(messages).toEqual([
        { type: MessageType.DIRECTORY, metadata },
        {
          type: MessageType.URL,
          url: 'https://cdn.example.com/a/first.jpg',
          metadata: { ...metadata, num: 1, filename: 'first', extension: 'jpg' },
        },
        {
          type: MessageType.URL,
          url: 'https://cdn.example.com/a/second.PNG',
          metadata: { ...metadata, num: 2, filename: 'second', extension: 'png' },
        },
      ]);
    });

    it('should yield only the directory message for an article without images', () => {
      const messages = [...parser.emit(DOMAIN, {
        date: new Date('2024-01-02T03:04:05Z'),
        entry: 'x',
        title: 'Empty',
        images: [],
      })];

      expect(messages).toHaveLength(1);
      expect(messages[0]).toMatchObject({ type: MessageType.DIRECTORY, metadata: { count: 0 } });
    });
  });
});
