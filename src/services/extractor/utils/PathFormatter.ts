import { ArticleMetadata, ImageMetadata } from '../interfaces/types';

/**
 * Renders the destination naming scheme consumers rely on:
 * `{category}/{domain}/{category}_{domain}_{entry}_{num:02}.{extension}`
 */
export class PathFormatter {
  /**
   * Directory segments for an article
   */
  static directory(metadata: ArticleMetadata): string[] {
    return [metadata.category, metadata.domain].map(segment => this.cleanSegment(segment));
  }

  /**
   * Filename for one image; doubles as the archive key
   */
  static filename(metadata: ImageMetadata): string {
    const num = String(metadata.num).padStart(2, '0');
    const name = `${metadata.category}_${metadata.domain}_${metadata.entry}_${num}`;
    return this.cleanSegment(metadata.extension ? `${name}.${metadata.extension}` : name);
  }

  /**
   * Relative path of an image, directory included
   */
  static path(metadata: ImageMetadata): string {
    return [...this.directory(metadata), this.filename(metadata)].join('/');
  }

  static archiveKey(metadata: ImageMetadata): string {
    return this.filename(metadata);
  }

  // Entry identifiers contain slashes (2024/01/02/123456)
  private static cleanSegment(segment: string): string {
    return segment.replace(/\//g, '_');
  }
}
