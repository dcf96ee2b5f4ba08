/**
 * Forward-only scanner over a document string.
 *
 * Each call to {@link extract} looks for a start marker at or after the
 * current position and an end marker after it, returns the text between
 * them and moves past the end marker. A miss returns `null` and leaves the
 * position where it was, so callers loop until `null` to consume every
 * occurrence of a fragment on a page.
 */
export class MarkerCursor {
  private pos = 0;

  constructor(private readonly text: string) {}

  get position(): number {
    return this.pos;
  }

  /**
   * Extract the text between `start` and `end`
   * @param start Opening marker; empty means "from the current position"
   * @param end Closing marker
   * @returns The enclosed text, or null when either marker is missing
   */
  extract(start: string, end: string): string | null {
    const startIndex = this.text.indexOf(start, this.pos);
    if (startIndex === -1) {
      return null;
    }

    const first = startIndex + start.length;
    const endIndex = this.text.indexOf(end, first);
    if (endIndex === -1) {
      return null;
    }

    this.pos = endIndex + end.length;
    return this.text.slice(first, endIndex);
  }
}

/**
 * One-off extraction from the beginning of `text`
 */
export function extractBetween(text: string, start: string, end: string): string | null {
  return new MarkerCursor(text).extract(start, end);
}
