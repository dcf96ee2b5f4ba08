import { Message, TargetReference } from './types';

/**
 * Interface for extractors bound to one target.
 * An extractor turns one target into a lazy, ordered stream of messages;
 * consumers may act on each message before the next page is fetched.
 */
export interface IExtractor {
  readonly target: TargetReference;

  /**
   * Produce the messages for the target, in document order
   */
  items(): AsyncGenerator<Message, void, undefined>;

  /**
   * Number of pages fetched so far by this extractor
   */
  pagesFetched(): number;
}
