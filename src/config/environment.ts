/**
 * Environment configuration for the topic ingestion run
 * Loads and validates required settings from CLI overrides and environment variables
 */

import path from 'path';
import { isLogLevel, type LogLevel } from '../utils/logger';

// Topic ingested when neither --topic-id nor TOPIC_ID is given
export const DEFAULT_TOPIC_ID = 'CAAqIggKIhxDQkFTRHdvSkwyMHZNRFF5Y214bUVnSmhjaWdBUAE';
export const DEFAULT_TOPIC_TITLE = 'alhilal';
export const DEFAULT_LIMIT = 50;
export const DEFAULT_FETCH_TIMEOUT_MS = 15000;
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36';

export interface EnvironmentConfig {
  supabase: {
    url: string;
    key: string;
    newsTable: string;
  };
  topic: {
    id: string;
    title: string;
    limit: number;
  };
  googleNews: {
    lang: string;
    country: string;
    outputDir: string;
  };
  browser: {
    executablePath: string | undefined;
    settleMs: number;
    navigationTimeoutMs: number;
  };
  extraction: {
    fetchTimeoutMs: number;
    userAgent: string;
  };
  logging: {
    level: LogLevel;
  };
}

/**
 * Values given on the command line; they win over the environment
 */
export interface ConfigOverrides {
  supabaseUrl?: string;
  supabaseKey?: string;
  topicId?: string;
  title?: string;
  limit?: number;
}

export class ConfigurationError extends Error {
  constructor(readonly missing: string[]) {
    super(
      `Missing required configuration: ${missing.join(', ')}\n` +
      'Provide via CLI flags or environment variables (.env supported).'
    );
    this.name = 'ConfigurationError';
  }
}

function intFromEnv(value: string | undefined, fallback: number): number {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Load and validate configuration
 * @throws ConfigurationError if Supabase credentials or the topic id are missing
 */
export function loadEnvironmentConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): EnvironmentConfig {
  // For server-side writes prefer the service role key so RLS does not block upserts
  const supabaseUrl = nonEmpty(overrides.supabaseUrl) ?? nonEmpty(env.SUPABASE_URL) ?? nonEmpty(env.NEXT_PUBLIC_SUPABASE_URL);
  const supabaseKey = nonEmpty(overrides.supabaseKey) ?? nonEmpty(env.SUPABASE_KEY) ?? nonEmpty(env.SUPABASE_SERVICE_ROLE_KEY);
  const topicId = nonEmpty(overrides.topicId) ?? nonEmpty(env.TOPIC_ID) ?? DEFAULT_TOPIC_ID;

  const requiredVars = [
    { name: 'SUPABASE_URL/--supabase-url', value: supabaseUrl },
    { name: 'SUPABASE_KEY/--supabase-key', value: supabaseKey },
    { name: 'TOPIC_ID/--topic-id', value: topicId }
  ];

  const missing = requiredVars.filter(varObj => !varObj.value).map(varObj => varObj.name);
  if (missing.length > 0 || !supabaseUrl || !supabaseKey) {
    throw new ConfigurationError(missing);
  }

  const logLevel = nonEmpty(env.LOG_LEVEL)?.toLowerCase();

  return {
    supabase: {
      url: supabaseUrl,
      key: supabaseKey,
      newsTable: nonEmpty(env.NEWS_TABLE) ?? 'news'
    },
    topic: {
      id: topicId,
      title: nonEmpty(overrides.title) ?? nonEmpty(env.TOPIC_TITLE) ?? DEFAULT_TOPIC_TITLE,
      limit: overrides.limit ?? intFromEnv(env.INGEST_LIMIT, DEFAULT_LIMIT)
    },
    googleNews: {
      lang: nonEmpty(env.GOOGLE_NEWS_LANG) ?? 'ar',
      country: nonEmpty(env.GOOGLE_NEWS_COUNTRY) ?? 'SA',
      outputDir: path.resolve(nonEmpty(env.HEADLINES_OUTPUT_DIR) ?? process.cwd())
    },
    browser: {
      executablePath: nonEmpty(env.CHROME_EXECUTABLE_PATH),
      settleMs: intFromEnv(env.REDIRECT_SETTLE_MS, 5000),
      navigationTimeoutMs: intFromEnv(env.REDIRECT_TIMEOUT_MS, 30000)
    },
    extraction: {
      fetchTimeoutMs: intFromEnv(env.FETCH_TIMEOUT_MS, DEFAULT_FETCH_TIMEOUT_MS),
      userAgent: nonEmpty(env.INGEST_USER_AGENT) ?? DEFAULT_USER_AGENT
    },
    logging: {
      level: isLogLevel(logLevel) ? logLevel : 'info'
    }
  };
}
