import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './analysis/errors';
import type { Platform } from './analysis/engine';
import type { RunConfigInput } from './analysis/run-config';

dotenv.config({ path: path.join(__dirname, '..', '.env') });

export interface AppConfig {
  openRouter: {
    apiKey: string | undefined;
    baseURL: string;
    model: string;
    httpReferer: string | undefined;
    appName: string;
  };
  apifyToken: string | undefined;
  platform: Platform;
  userUsername: string;
  competitors: string[];
  autoDiscover: boolean;
  minCompetitors: number;
  reelsPerCompetitor: number;
  cacheHours: number;
  cacheDir: string;
  scrapeBaseDelayMs: number;
  scrapeStepDelayMs: number;
  outputDir: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => ['true', 'false', '1', '0', 'yes', 'no'].includes(value), 'expected true or false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const handleList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((handle) => handle.trim().replace(/^@+/, ''))
      .filter(Boolean)
  );

const EnvSchema = z.object({
  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  OPENROUTER_MODEL: z.string().default('anthropic/claude-3-haiku'),
  OPENROUTER_HTTP_REFERER: z.string().url().optional(),
  OPENROUTER_APP_NAME: z.string().default('Reel Pattern Analyzer'),
  APIFY_TOKEN: z.string().optional(),
  PLATFORM: z.enum(['instagram', 'twitter']).default('instagram'),
  USER_USERNAME: z.string().default(''),
  COMPETITORS: handleList.default(''),
  AUTO_DISCOVER: booleanFlag.default('true'),
  MIN_COMPETITORS: z.coerce.number().int().min(1).default(3),
  REELS_PER_COMPETITOR: z.coerce.number().int().min(1).default(20),
  CACHE_HOURS: z.coerce.number().min(0).default(24),
  CACHE_DIR: z.string().default('cache'),
  SCRAPE_BASE_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  SCRAPE_STEP_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  OUTPUT_DIR: z.string().default('output'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/**
 * Read the app configuration from the environment. Blank variables count as
 * unset. Credentials are optional here; use `requireCredential` at the point
 * where one is actually needed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value.trim();
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(env)'}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    openRouter: {
      apiKey: vars.OPENROUTER_API_KEY,
      baseURL: vars.OPENROUTER_BASE_URL,
      model: vars.OPENROUTER_MODEL,
      httpReferer: vars.OPENROUTER_HTTP_REFERER,
      appName: vars.OPENROUTER_APP_NAME,
    },
    apifyToken: vars.APIFY_TOKEN,
    platform: vars.PLATFORM,
    userUsername: vars.USER_USERNAME.replace(/^@+/, ''),
    competitors: vars.COMPETITORS,
    autoDiscover: vars.AUTO_DISCOVER,
    minCompetitors: vars.MIN_COMPETITORS,
    reelsPerCompetitor: vars.REELS_PER_COMPETITOR,
    cacheHours: vars.CACHE_HOURS,
    cacheDir: path.resolve(vars.CACHE_DIR),
    scrapeBaseDelayMs: vars.SCRAPE_BASE_DELAY_MS,
    scrapeStepDelayMs: vars.SCRAPE_STEP_DELAY_MS,
    outputDir: path.resolve(vars.OUTPUT_DIR),
    logLevel: vars.LOG_LEVEL,
  };
}

export function requireCredential(value: string | undefined, name: string): string {
  if (!value) {
    throw new ConfigurationError([`${name}: missing required environment variable`]);
  }
  return value;
}

export function toRunConfigInput(config: AppConfig): RunConfigInput {
  return {
    competitorUsernames: config.competitors,
    autoDiscoverCompetitors: config.autoDiscover,
    minCompetitors: config.minCompetitors,
    reelsPerCompetitor: config.reelsPerCompetitor,
  };
}
