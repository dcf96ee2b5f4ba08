import { URL, URLSearchParams } from 'url';
import { QueryParams } from '../interfaces/types';

/**
 * Filename parts derived from a URL
 */
export interface NameExt {
  filename: string;
  extension: string;
}

// Longer "extensions" are treated as part of the name
const MAX_EXTENSION_LENGTH = 16;

/**
 * Utilities for handling URLs in the extractor
 */
export class UrlUtils {
  /**
   * Parse a query string into a flat map. The first occurrence of a key wins
   * and parameters with a blank value are dropped.
   * @param query Query string without the leading `?`
   */
  static parseQuery(query: string | undefined): QueryParams {
    const result: QueryParams = {};
    if (!query) {
      return result;
    }

    for (const [key, value] of new URLSearchParams(query)) {
      if (value && !(key in result)) {
        result[key] = value;
      }
    }
    return result;
  }

  /**
   * Resolves a possibly relative URL against a base URL
   * @returns The resolved absolute URL, or the input when it cannot be resolved
   */
  static resolveUrl(relativeUrl: string, baseUrl: string): string {
    try {
      return new URL(relativeUrl, baseUrl).toString();
    } catch (error) {
      return relativeUrl;
    }
  }

  /**
   * Last segment of the URL path, percent-decoded
   */
  static filenameFromUrl(url: string): string {
    let path: string;
    try {
      path = new URL(url).pathname;
    } catch (error) {
      path = url.split(/[?#]/, 1)[0];
    }

    const segment = path.slice(path.lastIndexOf('/') + 1);
    try {
      return decodeURIComponent(segment);
    } catch (error) {
      return segment;
    }
  }

  /**
   * Split the filename of a URL into name and lowercased extension
   */
  static nameExtFromUrl(url: string): NameExt {
    const filename = this.filenameFromUrl(url);
    const dot = filename.lastIndexOf('.');
    if (dot > 0) {
      const extension = filename.slice(dot + 1);
      if (extension.length <= MAX_EXTENSION_LENGTH) {
        return { filename: filename.slice(0, dot), extension: extension.toLowerCase() };
      }
    }
    return { filename, extension: '' };
  }
}
