import * as dotenv from 'dotenv';
import { z } from 'zod';
import logger from '../utils/logger';

const result = dotenv.config();
if (result.error) {
  logger.debug(`No .env file loaded: ${result.error.message}`);
} else {
  logger.debug('Environment variables loaded from .env file');
}

const booleanString = (defaultValue: boolean) =>
  z
    .enum(['true', 'false'])
    .default(defaultValue ? 'true' : 'false')
    .transform(value => value === 'true');

const configSchema = z.object({
  projectName: z.string().min(1),
  nodeEnv: z.enum(['development', 'production', 'test']),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']),
  }),
  crawler: z.object({
    rootUrl: z.string().min(1),
    maxDepth: z.coerce.number().int().min(0).default(4),
    source: z.enum(['static', 'http']).default('static'),
    datasetPath: z.string().min(1).default('data/sample-site.json'),
    cacheLocking: z.enum(['global', 'per-key']).default('per-key'),
    lockTimeoutMs: z.coerce.number().int().positive().optional(),
    streamCapacity: z.coerce.number().int().min(0).optional(),
    dedupeTraversal: booleanString(false),
  }),
  http: z.object({
    userAgent: z.string().min(1),
    timeout: z.coerce.number().int().positive().default(10000),
    maxRetries: z.coerce.number().int().min(0).default(2),
    retryDelay: z.coerce.number().int().min(0).default(500),
    sameDomainOnly: booleanString(true),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;
export type CrawlerConfig = AppConfig['crawler'];
export type HttpConfig = AppConfig['http'];

/**
 * Build the application configuration from environment variables
 * @param env Variables to read, defaults to the process environment
 * @throws Error naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse({
    projectName: env.PROJECT_NAME || 'depth-crawler',
    nodeEnv: env.NODE_ENV || 'development',
    logging: {
      level: env.LOG_LEVEL || 'info',
    },
    crawler: {
      rootUrl: env.CRAWL_ROOT_URL || 'http://golang.org/',
      maxDepth: env.CRAWL_MAX_DEPTH,
      source: env.CRAWL_SOURCE,
      datasetPath: env.CRAWL_DATASET_PATH,
      cacheLocking: env.CRAWL_CACHE_LOCKING,
      lockTimeoutMs: env.CRAWL_LOCK_TIMEOUT_MS,
      streamCapacity: env.CRAWL_STREAM_CAPACITY,
      dedupeTraversal: env.CRAWL_DEDUPE_TRAVERSAL,
    },
    http: {
      userAgent: env.HTTP_USER_AGENT || 'depth-crawler/0.1',
      timeout: env.HTTP_TIMEOUT_MS,
      maxRetries: env.HTTP_MAX_RETRIES,
      retryDelay: env.HTTP_RETRY_DELAY_MS,
      sameDomainOnly: env.HTTP_SAME_DOMAIN_ONLY,
    },
  });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return parsed.data;
}

const config = loadConfig();

export default config;
