import { PathFormatter } from '../PathFormatter';
import { CATEGORY, ImageMetadata } from '../../interfaces/types';

describe('PathFormatter', () => {
  const metadata: ImageMetadata = {
    category: CATEGORY,
    domain: 'example.hatenablog.com',
    date: new Date('2024-01-02T03:04:05Z'),
    entry: '2024/01/02/123456',
    title: 'A post',
    count: 12,
    num: 3,
    filename: '20240102030405',
    extension: 'jpg',
  };

  it('should render the directory from category and domain', () => {
    expect(PathFormatter.directory(metadata)).toEqual(['hatenablog', 'example.hatenablog.com']);
  });

  it('should render a zero-padded filename with slashes in the entry replaced', () => {
    expect(PathFormatter.filename(metadata)).toBe('hatenablog_example.hatenablog.com_2024_01_02_123456_03.jpg');
  });

  it('should not pad numbers with two or more digits', () => {
    expect(PathFormatter.filename({ ...metadata, num: 12 })).toBe('hatenablog_example.hatenablog.com_2024_01_02_123456_12.jpg');
  });

  it('should omit the dot when there is no extension', () => {
    expect(PathFormatter.filename({ ...metadata, extension: '' })).toBe('hatenablog_example.hatenablog.com_2024_01_02_123456_03');
  });

  it('should join directory and filename into a relative path', () => {
    expect(PathFormatter.path(metadata)).toBe(
      'hatenablog/example.hatenablog.com/hatenablog_example.hatenablog.com_2024_01_02_123456_03.jpg'
    );
  });

  it('should use the filename as archive key', () => {
    expect(PathFormatter.archiveKey(metadata)).toBe(PathFormatter.filename(metadata));
  });
});
