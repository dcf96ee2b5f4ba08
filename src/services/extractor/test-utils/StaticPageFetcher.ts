import { IPageFetcher } from '../interfaces/IPageFetcher';
import { Page, QueryParams } from '../interfaces/types';
import { HttpError } from '../utils/errors';

/**
 * A recorded fetch call
 */
export interface FetchCall {
  url: string;
  params?: QueryParams;
}

/**
 * In-memory fetcher serving canned bodies by URL.
 * Unknown URLs fail with a 404 the way the axios fetcher would.
 */
export class StaticPageFetcher implements IPageFetcher {
  readonly calls: FetchCall[] = [];
  private readonly pages = new Map<string, string>();

  constructor(pages: Record<string, string> = {}) {
    for (const [url, body] of Object.entries(pages)) {
      this.pages.set(url, body);
    }
  }

  set(url: string, body: string): this {
    this.pages.set(url, body);
    return this;
  }

  async fetch(url: string, params?: QueryParams): Promise<Page> {
    this.calls.push(params === undefined ? { url } : { url, params });
    const body = this.pages.get(url);
    if (body === undefined) {
      throw new HttpError(404, url);
    }
    return { url, body };
  }
}
