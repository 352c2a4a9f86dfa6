import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || undefined });

// z.coerce.boolean() treats any non-empty string (including "false") as true.
const envBool = z
  .union([z.boolean(), z.string()])
  .transform((v) => (typeof v === 'boolean' ? v : ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase())));

const schema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).optional().default('development'),
  HOST: z.string().optional().default('127.0.0.1'),
  PORT: z.coerce.number().int().positive().optional().default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // JSON file with `sources` and `servers`. Built-in defaults are used when empty.
  HUSHDNS_CONFIG_FILE: z.string().optional().default(''),

  // Blocklists
  BLOCKLIST_REFRESH_HOURS: z.coerce.number().positive().optional().default(24),
  BLOCKLIST_FETCH_TIMEOUT_MS: z.coerce.number().int().min(250).optional().default(15_000),
  BLOCKLIST_MAX_BYTES: z.coerce.number().int().positive().optional().default(25 * 1024 * 1024),
  BLOCKLIST_FETCH_RETRIES: z.coerce.number().int().min(0).max(10).optional().default(2),
  BLOCKLIST_RETRY_BASE_MS: z.coerce.number().int().min(0).optional().default(1000),
  BLOCKLIST_MAX_ENTRIES: z.coerce.number().int().positive().optional().default(2_000_000),
  BLOOM_FALSE_POSITIVE_RATE: z.coerce.number().gt(0).lt(1).optional().default(0.001),

  // Anonymous response cache
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().optional().default(10_000),
  CACHE_MIN_TTL_SECONDS: z.coerce.number().int().min(0).optional().default(0),
  CACHE_MAX_TTL_SECONDS: z.coerce.number().int().positive().optional().default(3600),
  CACHE_NEGATIVE_TTL_SECONDS: z.coerce.number().int().min(0).optional().default(60),
  CACHE_SWEEP_INTERVAL_MS: z.coerce.number().int().min(0).optional().default(30_000),

  // Upstream pool and circuit breaker
  POOL_MAX_PER_SERVER: z.coerce.number().int().positive().optional().default(4),
  POOL_IDLE_TIMEOUT_MS: z.coerce.number().int().min(1000).optional().default(30_000),
  POOL_ACQUIRE_TIMEOUT_MS: z.coerce.number().int().min(50).optional().default(2000),
  BREAKER_FAILURE_THRESHOLD: z.coerce.number().int().positive().optional().default(3),
  BREAKER_COOLDOWN_MS: z.coerce.number().int().positive().optional().default(30_000),
  BREAKER_MAX_COOLDOWN_MS: z.coerce.number().int().positive().optional().default(5 * 60_000),

  RESOLVE_DEADLINE_MS: z.coerce.number().int().min(100).optional().default(4000),

  // Connectivity test against the configured servers (on demand and at startup).
  SERVER_TEST_DOMAIN: z.string().trim().min(1).optional().default('example.com'),
  SERVER_TEST_TIMEOUT_MS: z.coerce.number().int().min(100).optional().default(3000),
  TEST_SERVERS_ON_START: envBool.optional().default(true),

  // Periodic blocklist refresh can be turned off (manual reloads only).
  ENABLE_BLOCKLIST_REFRESH: envBool.optional().default(true)
});

export type AppConfig = z.infer<typeof schema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return schema.parse(env);
}
