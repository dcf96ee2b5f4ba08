import { decodeHTML } from 'entities';

/**
 * Utilities for handling raw HTML text
 */
export class HtmlUtils {
  /**
   * Replace character references (`&amp;`, `&#39;`, `&#x2F;`, ...) with the characters they stand for
   */
  static unescape(html: string): string {
    return decodeHTML(html);
  }

  /**
   * Check whether an attribute string carries `name="value"` as a whole attribute,
   * bounded by a space or the edge of the string
   */
  static hasAttribute(attributes: string, name: string, value: string): boolean {
    return this.attributeBoundary(`${name}="${this.escapeRegExp(value)}"`).test(attributes);
  }

  /**
   * Read the value of a double-quoted attribute, using the same boundary rule
   * as {@link hasAttribute}
   * @returns The raw attribute value, or null when the attribute is absent
   */
  static getAttribute(attributes: string, name: string): string | null {
    const match = this.attributeBoundary(`${this.escapeRegExp(name)}="(.+?)"`).exec(attributes);
    return match ? match[1] : null;
  }

  private static attributeBoundary(body: string): RegExp {
    return new RegExp(`(?: |^)${body}(?: |$)`);
  }

  private static escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  }
}
