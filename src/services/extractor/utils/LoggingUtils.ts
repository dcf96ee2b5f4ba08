import { Logger } from 'winston';
import logger from '../../../utils/logger';

/**
 * Component tags used by the extractor
 */
export type LogTag = 'extractor' | 'http' | 'pagination' | 'layout' | 'service';

/**
 * Leveled methods of a logger bound to one tag
 */
export type TaggedLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Tagged logging for the extractor components.
 *
 * Tagged loggers are winston children of the shared logger: they follow its
 * level (including `--verbose` and `LOG_LEVEL`) and its transports, and the
 * console format prints the tag in front of the message.
 */
export class LoggingUtils {
  /**
   * Create a logger whose entries carry a fixed tag
   * @param tag Component the entries belong to
   * @returns A child of the shared winston logger with `tag` in its metadata
   */
  static createTaggedLogger(tag: LogTag): TaggedLogger {
    return logger.child({ tag });
  }
}
