/**
 * Postwatch — Configuration
 *
 * Reads the environment (after dotenv has loaded .env) and validates it with
 * zod. An invalid configuration is the only process-fatal condition.
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import { TrackedAccountSchema, type TrackedAccount } from '../types';

// ============================================================
// DEFAULTS
// ============================================================

export const DEFAULT_MIRROR_ENDPOINTS = [
  'https://xcancel.com',
  'https://nitter.poast.org',
  'https://lightbrd.com',
  'https://nitter.kavin.rocks',
] as const;

export const DEFAULT_SERVERCHAN_URL_TEMPLATE = 'https://sctapi.ftqq.com/{key}.send';
export const DEFAULT_PUSHDEER_URL = 'https://api2.pushdeer.com/message/push';
export const DEFAULT_ANALYSIS_MODEL = 'claude-3-5-haiku-20241022';

// ============================================================
// PARSERS
// ============================================================

function splitList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0);
}

/**
 * Parse "Alias:handle,Other:other_handle". A bare "handle" uses the handle as alias.
 */
export function parseTrackedAccounts(raw: string): TrackedAccount[] {
  const seen = new Set<string>();
  const accounts: TrackedAccount[] = [];

  for (const entry of splitList(raw)) {
    const separator = entry.lastIndexOf(':');
    const alias = separator === -1 ? entry : entry.slice(0, separator).trim();
    const handle = (separator === -1 ? entry : entry.slice(separator + 1)).trim().replace(/^@/, '');

    const account = TrackedAccountSchema.parse({ alias: alias || handle, handle });
    const key = account.handle.toLowerCase();
    if (seen.has(key)) continue;

    seen.add(key);
    accounts.push(account);
  }

  return accounts;
}

export function normalizeEndpointAddress(address: string): string {
  return address.trim().replace(/\/+$/, '');
}

const intInRange = (min: number, max: number) =>
  z.coerce.number().int().min(min).max(max);

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value.trim() : undefined));

const httpUrl = z
  .string()
  .url()
  .refine(value => /^https?:\/\//.test(value), 'must use http or https');

// ============================================================
// SCHEMA
// ============================================================

const EnvSchema = z.object({
  TRACKED_ACCOUNTS: z
    .string({ required_error: 'TRACKED_ACCOUNTS is required' })
    .min(1, 'TRACKED_ACCOUNTS is required'),
  MIRROR_ENDPOINTS: optionalString,
  INSTANCE_LIST_URL: optionalString.pipe(httpUrl.optional()),

  CHECK_INTERVAL_SECONDS: intInRange(10, 86_400).default(300),
  MAX_ITEMS_PER_CHECK: intInRange(1, 50).default(3),
  MAX_CACHE_SIZE: intInRange(1, 1_000_000).default(1000),
  ACCOUNT_CONCURRENCY: intInRange(1, 32).default(2),
  FETCH_TIMEOUT_MS: intInRange(1000, 300_000).default(30_000),
  RECENT_WINDOW_HOURS: intInRange(1, 24 * 365).default(72),
  SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.85),
  SIMILARITY_WINDOW_MINUTES: intInRange(0, 24 * 60).default(30),

  ENDPOINT_FAILURE_THRESHOLD: intInRange(1, 100).default(5),
  ENDPOINT_BASE_DISABLE_MS: intInRange(1000, 86_400_000).default(60_000),
  ENDPOINT_MAX_DISABLE_MS: intInRange(1000, 7 * 86_400_000).default(3_600_000),

  DELIVERY_MAX_ATTEMPTS: intInRange(1, 20).default(3),
  DELIVERY_BASE_DELAY_MS: intInRange(100, 3_600_000).default(5000),
  DELIVERY_MAX_DELAY_MS: intInRange(100, 86_400_000).default(300_000),
  DRAIN_INTERVAL_MS: intInRange(50, 60_000).default(1000),
  SEND_TIMEOUT_MS: intInRange(1000, 120_000).default(15_000),

  RENDER_SERVICE_URL: httpUrl.default('http://localhost:3000'),
  ANTHROPIC_API_KEY: optionalString,
  ANALYSIS_MODEL: optionalString,
  ANALYSIS_TIMEOUT_MS: intInRange(1000, 300_000).default(30_000),

  ARCHIVE_DIR: z.string().min(1).default('archives'),
  SCREENSHOTS_DIR: z.string().min(1).default('data/screenshots'),
  IMAGE_BASE_URL: optionalString.pipe(httpUrl.optional()),
  STATUS_PORT: intInRange(0, 65_535).default(3005),

  SERVERCHAN_KEYS: optionalString,
  SERVERCHAN_TAGS: optionalString,
  SERVERCHAN_URL_TEMPLATE: optionalString,
  PUSHDEER_KEYS: optionalString,
  PUSHDEER_URL: optionalString.pipe(httpUrl.optional()),
  SLACK_WEBHOOK_URL: optionalString.pipe(httpUrl.optional()),

  SUPABASE_URL: optionalString.pipe(httpUrl.optional()),
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
});

type Env = z.infer<typeof EnvSchema>;

// ============================================================
// CONFIG SHAPE
// ============================================================

export type ChannelConfig =
  | { kind: 'serverchan'; name: string; key: string; urlTemplate: string; tags?: string }
  | { kind: 'pushdeer'; name: string; key: string; url: string }
  | { kind: 'slack'; name: string; webhookUrl: string }
  | { kind: 'console'; name: string };

export type ArchiveConfig =
  | { kind: 'supabase'; url: string; serviceRoleKey: string }
  | { kind: 'jsonl'; dir: string }
  | { kind: 'none' };

export interface PostwatchConfig {
  accounts: TrackedAccount[];
  mirrors: {
    endpoints: string[];
    instanceListUrl?: string;
    failureThreshold: number;
    baseDisableMs: number;
    maxDisableMs: number;
  };
  fetch: {
    renderServiceUrl: string;
    timeoutMs: number;
    maxItemsPerCheck: number;
  };
  dedup: {
    maxCacheSize: number;
    recentWindowMs: number;
    similarityThreshold: number;
    /** 0 disables near-duplicate detection */
    similarityWindowMs: number;
  };
  scheduler: {
    intervalMs: number;
    accountConcurrency: number;
  };
  analysis: {
    apiKey?: string;
    model: string;
    timeoutMs: number;
  };
  delivery: {
    channels: ChannelConfig[];
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    drainIntervalMs: number;
    sendTimeoutMs: number;
  };
  archive: ArchiveConfig;
  storage: {
    archiveDir: string;
    screenshotsDir: string;
  };
  server: {
    port: number;
    imageBaseUrl: string;
  };
}

function buildChannels(env: Env): ChannelConfig[] {
  const channels: ChannelConfig[] = [];

  splitList(env.SERVERCHAN_KEYS).forEach((key, index) => {
    channels.push({
      kind: 'serverchan',
      name: `serverchan-${index + 1}`,
      key,
      urlTemplate: env.SERVERCHAN_URL_TEMPLATE ?? DEFAULT_SERVERCHAN_URL_TEMPLATE,
      tags: env.SERVERCHAN_TAGS,
    });
  });

  splitList(env.PUSHDEER_KEYS).forEach((key, index) => {
    channels.push({
      kind: 'pushdeer',
      name: `pushdeer-${index + 1}`,
      key,
      url: env.PUSHDEER_URL ?? DEFAULT_PUSHDEER_URL,
    });
  });

  if (env.SLACK_WEBHOOK_URL) {
    channels.push({ kind: 'slack', name: 'slack', webhookUrl: env.SLACK_WEBHOOK_URL });
  }

  if (channels.length === 0) {
    channels.push({ kind: 'console', name: 'console' });
  }

  return channels;
}

function buildArchive(env: Env): ArchiveConfig {
  if (env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY) {
    return { kind: 'supabase', url: env.SUPABASE_URL, serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY };
  }
  return { kind: 'jsonl', dir: env.ARCHIVE_DIR };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.') || '(root)';
    return `${path}: ${issue.message}`;
  });
}

// ============================================================
// LOADER
// ============================================================

/**
 * Validate the environment and build the runtime configuration.
 * Throws ConfigError listing every problem at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PostwatchConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  const values = parsed.data;
  const issues: string[] = [];

  let accounts: TrackedAccount[] = [];
  try {
    accounts = parseTrackedAccounts(values.TRACKED_ACCOUNTS);
  } catch (error) {
    if (error instanceof z.ZodError) {
      issues.push(...formatIssues(error).map(issue => `TRACKED_ACCOUNTS: ${issue}`));
    } else {
      throw error;
    }
  }
  if (accounts.length === 0 && issues.length === 0) {
    issues.push('TRACKED_ACCOUNTS: no accounts configured');
  }

  const endpoints = Array.from(
    new Set(
      (values.MIRROR_ENDPOINTS ? splitList(values.MIRROR_ENDPOINTS) : [...DEFAULT_MIRROR_ENDPOINTS]).map(
        normalizeEndpointAddress
      )
    )
  );
  for (const endpoint of endpoints) {
    if (!httpUrl.safeParse(endpoint).success) {
      issues.push(`MIRROR_ENDPOINTS: invalid endpoint ${endpoint}`);
    }
  }

  if (values.ENDPOINT_MAX_DISABLE_MS < values.ENDPOINT_BASE_DISABLE_MS) {
    issues.push('ENDPOINT_MAX_DISABLE_MS: must be >= ENDPOINT_BASE_DISABLE_MS');
  }
  if (values.DELIVERY_MAX_DELAY_MS < values.DELIVERY_BASE_DELAY_MS) {
    issues.push('DELIVERY_MAX_DELAY_MS: must be >= DELIVERY_BASE_DELAY_MS');
  }
  if (values.SERVERCHAN_URL_TEMPLATE && !values.SERVERCHAN_URL_TEMPLATE.includes('{key}')) {
    issues.push('SERVERCHAN_URL_TEMPLATE: must contain {key}');
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return {
    accounts,
    mirrors: {
      endpoints,
      instanceListUrl: values.INSTANCE_LIST_URL,
      failureThreshold: values.ENDPOINT_FAILURE_THRESHOLD,
      baseDisableMs: values.ENDPOINT_BASE_DISABLE_MS,
      maxDisableMs: values.ENDPOINT_MAX_DISABLE_MS,
    },
    fetch: {
      renderServiceUrl: values.RENDER_SERVICE_URL,
      timeoutMs: values.FETCH_TIMEOUT_MS,
      maxItemsPerCheck: values.MAX_ITEMS_PER_CHECK,
    },
    dedup: {
      maxCacheSize: values.MAX_CACHE_SIZE,
      recentWindowMs: values.RECENT_WINDOW_HOURS * 3_600_000,
      similarityThreshold: values.SIMILARITY_THRESHOLD,
      similarityWindowMs: values.SIMILARITY_WINDOW_MINUTES * 60_000,
    },
    scheduler: {
      intervalMs: values.CHECK_INTERVAL_SECONDS * 1000,
      accountConcurrency: values.ACCOUNT_CONCURRENCY,
    },
    analysis: {
      apiKey: values.ANTHROPIC_API_KEY,
      model: values.ANALYSIS_MODEL ?? DEFAULT_ANALYSIS_MODEL,
      timeoutMs: values.ANALYSIS_TIMEOUT_MS,
    },
    delivery: {
      channels: buildChannels(values),
      maxAttempts: values.DELIVERY_MAX_ATTEMPTS,
      baseDelayMs: values.DELIVERY_BASE_DELAY_MS,
      maxDelayMs: values.DELIVERY_MAX_DELAY_MS,
      drainIntervalMs: values.DRAIN_INTERVAL_MS,
      sendTimeoutMs: values.SEND_TIMEOUT_MS,
    },
    archive: buildArchive(values),
    storage: {
      archiveDir: values.ARCHIVE_DIR,
      screenshotsDir: values.SCREENSHOTS_DIR,
    },
    server: {
      port: values.STATUS_PORT,
      imageBaseUrl: values.IMAGE_BASE_URL ?? `http://localhost:${values.STATUS_PORT}`,
    },
  };
}
