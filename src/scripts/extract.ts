#!/usr/bin/env node
/**
 * Extract CLI Script
 *
 * Streams the items found at a blog URL to stdout, one JSON object per line.
 * Image lines carry the rendered destination path and archive key.
 *
 * @example
 * ```
 * npm run extract -- https://BLOG.hatenablog.com/archive/2024 --follow --limit 20
 * ```
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import logger from '../utils/logger';
import { ExtractionService } from '../services/extraction.service';
import { Message, MessageType } from '../services/extractor/interfaces/types';
import { PathFormatter } from '../services/extractor/utils/PathFormatter';
import { ExtractorError } from '../services/extractor/utils/errors';
import { ROUTES } from '../services/extractor/factories/routes';

/**
 * Turn a message into the JSON line printed for it
 */
export function formatMessage(message: Message): string {
  if (message.type === MessageType.URL) {
    return JSON.stringify({
      ...message,
      path: PathFormatter.path(message.metadata),
      archiveKey: PathFormatter.archiveKey(message.metadata),
    });
  }
  return JSON.stringify(message);
}

/**
 * Validate the `--limit` option
 * @throws Error when the limit is negative or fractional
 */
export function checkLimit(limit: number | undefined): true {
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    throw new Error(`--limit must be a non-negative integer, got ${limit}`);
  }
  return true;
}

/**
 * Help text listing one sample URL per supported page kind
 */
export function supportedUrlsHelp(): string {
  return ['Supported URLs:', ...ROUTES.map(route => `  ${route.kind.padEnd(8)}${route.example}`)].join('\n');
}

async function main(): Promise<void> {
  const argv = yargs(hideBin(process.argv))
    .usage('Usage: $0 <url> [options]')
    .command('$0 <url>', 'Extract posts and images from a blog URL', builder =>
      builder.positional('url', {
        type: 'string',
        demandOption: true,
        describe: 'Entry, home, archive or search URL (prefix custom domains with "hatenablog:")'
      })
    )
    .option('follow', {
      type: 'boolean',
      default: false,
      describe: 'Extract entries queued by archive listings instead of printing them'
    })
    .option('limit', {
      type: 'number',
      describe: 'Stop after this many image URLs'
    })
    .option('verbose', {
      type: 'boolean',
      alias: 'v',
      default: false,
      describe: 'Enable more detailed logging'
    })
    .check(args => checkLimit(args.limit))
    .epilog(supportedUrlsHelp())
    .strict()
    .help()
    .alias('help', 'h')
    .parseSync();

  if (argv.verbose) {
    logger.level = 'debug';
    logger.debug('Verbose logging enabled');
  }

  const service = new ExtractionService();
  for await (const message of service.extract(argv.url, { followQueue: argv.follow, limit: argv.limit })) {
    process.stdout.write(`${formatMessage(message)}\n`);
  }
}

if (require.main === module) {
  main().catch(error => {
    if (error instanceof ExtractorError) {
      logger.error(`${error.name}: ${error.message}`);
    } else {
      logger.error(`Unexpected error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    }
    process.exit(1);
  });
}
