import { InMemoryUrlQueue } from '../InMemoryUrlQueue';
import { RouteKind } from '../../interfaces/types';

describe('InMemoryUrlQueue', () => {
  let queue: InMemoryUrlQueue;
  const first = { url: 'hatenablog:https://example.hatenablog.com/entry/1', extractor: RouteKind.ENTRY };
  const second = { url: 'hatenablog:https://example.hatenablog.com/entry/2', extractor: RouteKind.ENTRY };

  beforeEach(() => {
    queue = new InMemoryUrlQueue();
  });

  describe('add', () => {
    it('should add URLs to the queue', () => {
      expect(queue.add(first)).toBe(true);
      expect(queue.size()).toBe(1);
      expect(queue.has(first.url)).toBe(true);
    });

    it('should not add duplicate URLs', () => {
      queue.add(first);

      expect(queue.add({ ...first })).toBe(false);
      expect(queue.size()).toBe(1);
    });

    it('should not add visited URLs', () => {
      queue.markVisited(first.url);

      expect(queue.add(first)).toBe(false);
      expect(queue.size()).toBe(0);
    });
  });

  describe('getNext', () => {
    it('should return URLs in insertion order', () => {
      queue.add(first);
      queue.add(second);

      expect(queue.getNext()).toEqual(first);
      expect(queue.getNext()).toEqual(second);
      expect(queue.getNext()).toBeNull();
    });
  });

  describe('markVisited', () => {
    it('should remove the URL from the queue and refuse it afterwards', () => {
      queue.add(first);
      queue.add(second);
      queue.markVisited(first.url);

      expect(queue.has(first.url)).toBe(false);
      expect(queue.size()).toBe(1);
      expect(queue.add(first)).toBe(false);
    });
  });

  describe('with a key function', () => {
    beforeEach(() => {
      queue = new InMemoryUrlQueue(url => url.replace(/^hatenablog:/, ''));
    });

    it('should refuse a prefixed URL once its plain form was visited', () => {
      queue.markVisited('https://example.hatenablog.com/entry/1');

      expect(queue.add(first)).toBe(false);
      expect(queue.size()).toBe(0);
    });

    it('should treat equal keys as duplicates', () => {
      queue.add(first);

      expect(queue.has('https://example.hatenablog.com/entry/1')).toBe(true);
      expect(queue.add({ ...first, url: 'https://example.hatenablog.com/entry/1' })).toBe(false);
    });
  });
});
