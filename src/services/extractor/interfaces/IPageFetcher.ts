import { Page, QueryParams } from './types';

/**
 * Interface for the network collaborator.
 * Implementations fetch a URL and hand back the response body as text;
 * failures propagate to the caller without retries.
 */
export interface IPageFetcher {
  /**
   * Fetch a page
   * @param url Absolute URL to request
   * @param params Query parameters appended to the request, if any
   */
  fetch(url: string, params?: QueryParams): Promise<Page>;
}
