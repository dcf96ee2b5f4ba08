import * as dotenv from 'dotenv';
import { z } from 'zod';
import logger from '../utils/logger';

const result = dotenv.config();
if (result.error) {
  logger.debug(`No .env file loaded: ${result.error.message}`);
}

const envSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  HTTP_USER_AGENT: z.string().min(1).default('hatenablog-extractor/0.1'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  HTTP_MAX_REDIRECTS: z.coerce.number().int().min(0).default(5),
});

const parsed = envSchema.safeParse(process.env);
if (!parsed.success) {
  const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
  throw new Error(`Invalid environment configuration: ${issues.join(', ')}`);
}

const env = parsed.data;

const config = {
  logging: {
    level: env.LOG_LEVEL,
  },
  http: {
    userAgent: env.HTTP_USER_AGENT,
    timeout: env.HTTP_TIMEOUT_MS, // milliseconds
    maxRedirects: env.HTTP_MAX_REDIRECTS,
  },
};

logger.level = config.logging.level;

export type AppConfig = typeof config;

export default config;
