import axios from 'axios';
import { IPageFetcher } from '../interfaces/IPageFetcher';
import { FetchOptions, Page, QueryParams } from '../interfaces/types';
import { LoggingUtils } from '../utils/LoggingUtils';
import { HttpError } from '../utils/errors';

/**
 * Page fetcher backed by axios. No retries: transport errors and
 * non-success statuses go straight back to the caller.
 */
export class AxiosPageFetcher implements IPageFetcher {
  private readonly logger = LoggingUtils.createTaggedLogger('http');

  constructor(private readonly options: FetchOptions = {}) {}

  async fetch(url: string, params?: QueryParams): Promise<Page> {
    const startTime = Date.now();
    this.logger.debug(`GET ${url}`, params ? { params } : undefined);

    try {
      const response = await axios.get<string>(url, {
        params,
        headers: {
          'User-Agent': this.options.userAgent || 'hatenablog-extractor/0.1',
          'Accept': 'text/html,application/xhtml+xml',
        },
        timeout: this.options.timeout || 30000,
        maxRedirects: this.options.maxRedirects ?? 5,
        responseType: 'text',
        // Non-2xx statuses become HttpError below
        validateStatus: () => true,
      });

      if (response.status < 200 || response.status >= 300) {
        throw new HttpError(response.status, url);
      }

      this.logger.debug(`Fetched ${url} in ${Date.now() - startTime}ms`);
      return { url, body: response.data };
    } catch (error) {
      this.logger.error(`Error fetching ${url}: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
  }
}
