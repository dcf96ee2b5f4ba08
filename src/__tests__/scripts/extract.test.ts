import { checkLimit, formatMessage, supportedUrlsHelp } from '../../scripts/extract';
import { CATEGORY, MessageType, RouteKind } from '../../services/extractor/interfaces/types';

describe('extract CLI', () => {
  describe('formatMessage', () => {
    it('should add the destination path and archive key to url lines', () => {
      const line = formatMessage({
        type: MessageType.URL,
        url: 'https://cdn.example.com/a/photo.jpg',
        metadata: {
          category: CATEGORY,
          domain: 'example.hatenablog.com',
          date: new Date('2024-01-02T03:04:05Z'),
          entry: '2024/01/02/030405',
          title: 'Post',
          count: 1,
          num: 1,
          filename: 'photo',
          extension: 'jpg',
        },
      });

      expect(JSON.parse(line)).toEqual({
        type: 'url',
        url: 'https://cdn.example.com/a/photo.jpg',
        metadata: {
          category: 'hatenablog',
          domain: 'example.hatenablog.com',
          date: '2024-01-02T03:04:05.000Z',
          entry: '2024/01/02/030405',
          title: 'Post',
          count: 1,
          num: 1,
          filename: 'photo',
          extension: 'jpg',
        },
        path: 'hatenablog/example.hatenablog.com/hatenablog_example.hatenablog.com_2024_01_02_030405_01.jpg',
        archiveKey: 'hatenablog_example.hatenablog.com_2024_01_02_030405_01.jpg',
      });
    });

    it('should print queue messages as they are', () => {
      const line = formatMessage({
        type: MessageType.QUEUE,
        url: 'hatenablog:https://example.hatenablog.com/entry/1',
        metadata: { extractor: RouteKind.ENTRY },
      });

      expect(line).toBe('{"type":"queue","url":"hatenablog:https://example.hatenablog.com/entry/1","metadata":{"extractor":"entry"}}');
    });
  });

  describe('checkLimit', () => {
    it('should accept zero, positive integers and an absent limit', () => {
      expect(checkLimit(undefined)).toBe(true);
      expect(checkLimit(0)).toBe(true);
      expect(checkLimit(20)).toBe(true);
    });

    it('should reject negative and fractional limits', () => {
      expect(() => checkLimit(-1)).toThrow('--limit must be a non-negative integer, got -1');
      expect(() => checkLimit(1.5)).toThrow('--limit must be a non-negative integer, got 1.5');
      expect(() => checkLimit(NaN)).toThrow('--limit must be a non-negative integer, got NaN');
    });
  });

  describe('supportedUrlsHelp', () => {
    it('should list a sample URL for every route', () => {
      expect(supportedUrlsHelp().split('\n')).toEqual([
        'Supported URLs:',
        '  entry   https://BLOG.hatenablog.com/entry/PATH',
        '  home    https://BLOG.hatenablog.com',
        '  archive https://BLOG.hatenablog.com/archive/2024',
        '  search  https://BLOG.hatenablog.com/search?q=QUERY',
      ]);
    });
  });
});
