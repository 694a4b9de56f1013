/**
 * NewsScout — Configuration
 *
 * Reads settings from the environment. Only the CLI scripts call this;
 * the pipeline itself receives a plain RunConfig.
 */

import { z } from 'zod';

export const DEFAULT_FEED_URL = 'https://news.google.com/rss?hl=en-US&gl=US&ceid=US:en';
export const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

const feedList = z
  .string()
  .transform(value =>
    value
      .split(',')
      .map(url => url.trim())
      .filter(url => url.length > 0)
  )
  .pipe(z.array(z.string().url()).min(1, 'at least one feed URL is required'));

const optionalString = z
  .string()
  .trim()
  .transform(value => (value.length > 0 ? value : undefined))
  .optional();

const EnvSchema = z.object({
  FEED_URLS: feedList.default(DEFAULT_FEED_URL),
  SCORE_THRESHOLD: z.coerce.number().int().min(0).max(10).default(5),
  MAX_CLUSTERS: z.coerce.number().int().min(1).default(5),
  SIMILARITY_THRESHOLD: z.coerce.number().min(0).lt(1).default(0.5),
  SCORING_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SOURCE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_ITEMS_PER_SOURCE: z.coerce.number().int().positive().default(30),
  LINK_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  RESOLVE_LINKS: z
    .enum(['true', 'false', '1', '0'])
    .default('true')
    .transform(value => value === 'true' || value === '1'),
  RUN_INTERVAL_MINUTES: z.coerce.number().positive().default(60),
  REPORTS_DIR: z.string().min(1).default('reports'),
  EVALUATIONS_DIR: z.string().min(1).default('evaluations'),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
});

/**
 * Settings a single pipeline run consumes.
 */
export interface RunConfig {
  scoreThreshold: number;
  maxClusters: number;
  similarityThreshold: number;
  scoringTimeoutMs: number;
  sourceTimeoutMs: number;
  maxItemsPerSource: number;
  /** Per-link budget when resolving aggregator links */
  linkTimeoutMs: number;
}

export const DEFAULT_RUN_CONFIG: RunConfig = {
  scoreThreshold: 5,
  maxClusters: 5,
  similarityThreshold: 0.5,
  scoringTimeoutMs: 30_000,
  sourceTimeoutMs: 30_000,
  maxItemsPerSource: 30,
  linkTimeoutMs: 10_000,
};

export interface AppConfig {
  feedUrls: string[];
  run: RunConfig;
  runIntervalMinutes: number;
  /** Decode Google News redirect links in reports */
  resolveLinks: boolean;
  reportsDir: string;
  evaluationsDir: string;
  anthropic: {
    apiKey?: string;
    model: string;
  };
  supabase?: {
    url: string;
    serviceRoleKey: string;
  };
}

/**
 * Parse configuration from environment variables.
 * Throws one error naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;

  return {
    feedUrls: e.FEED_URLS,
    run: {
      scoreThreshold: e.SCORE_THRESHOLD,
      maxClusters: e.MAX_CLUSTERS,
      similarityThreshold: e.SIMILARITY_THRESHOLD,
      scoringTimeoutMs: e.SCORING_TIMEOUT_MS,
      sourceTimeoutMs: e.SOURCE_TIMEOUT_MS,
      maxItemsPerSource: e.MAX_ITEMS_PER_SOURCE,
      linkTimeoutMs: e.LINK_TIMEOUT_MS,
    },
    runIntervalMinutes: e.RUN_INTERVAL_MINUTES,
    resolveLinks: e.RESOLVE_LINKS,
    reportsDir: e.REPORTS_DIR,
    evaluationsDir: e.EVALUATIONS_DIR,
    anthropic: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.ANTHROPIC_MODEL,
    },
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
        ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
        : undefined,
  };
}
