/**
 * Application Configuration
 * Loads .env and validates the environment once at startup
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

import type { FeePolicy } from '@/types/index.js';

const numeric = (fallback: string) =>
  z.string().regex(/^\d+$/).default(fallback).transform(Number);

const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('development'),
  PORT: numeric('3000'),

  CHAIN_ID: z.string().regex(/^\d+$/).transform(Number),

  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_KEY: z.string().min(1),

  UPSTASH_REDIS_URL: z.string().url(),
  UPSTASH_REDIS_TOKEN: z.string().min(1),

  RELAYER_API_KEYS: z
    .string()
    .default('')
    .transform((v) =>
      v
        .split(',')
        .map((k) => k.trim())
        .filter((k) => k !== '')
    ),
  ALLOWED_ORIGINS: z
    .string()
    .default('http://localhost:3000')
    .transform((v) => v.split(',').map((o) => o.trim())),

  RESERVATION_MAX_AGE_MS: numeric('900000'),
  SWEEP_INTERVAL_MS: numeric('60000'),
  OUTBOX_INTERVAL_MS: numeric('15000'),
  INBOX_INTERVAL_MS: numeric('5000'),
  APPLIED_MESSAGE_RETENTION_MS: numeric('2592000000'),

  ESTIMATE_BUFFER_BPS: numeric('10000'),
  FEE_GRANULARITY: z.string().regex(/^[1-9]\d*$/).default('1').transform(BigInt),

  RATE_LIMIT_PER_MINUTE: numeric('600'),
});

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  server: { port: number; allowedOrigins: string[] };
  chainId: number;
  supabase: { url: string; serviceKey: string };
  redis: { url: string; token: string };
  relayerApiKeys: string[];
  workers: {
    reservationMaxAgeMs: number;
    sweepIntervalMs: number;
    outboxIntervalMs: number;
    inboxIntervalMs: number;
    appliedMessageRetentionMs: number;
  };
  feePolicy: FeePolicy;
  rateLimit: { perMinute: number };
}

/**
 * Parse an environment record into AppConfig
 * Throws a ZodError listing every invalid key
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    env: parsed.NODE_ENV,
    server: { port: parsed.PORT, allowedOrigins: parsed.ALLOWED_ORIGINS },
    chainId: parsed.CHAIN_ID,
    supabase: {
      url: parsed.SUPABASE_URL,
      serviceKey: parsed.SUPABASE_SERVICE_KEY,
    },
    redis: {
      url: parsed.UPSTASH_REDIS_URL,
      token: parsed.UPSTASH_REDIS_TOKEN,
    },
    relayerApiKeys: parsed.RELAYER_API_KEYS,
    workers: {
      reservationMaxAgeMs: parsed.RESERVATION_MAX_AGE_MS,
      sweepIntervalMs: parsed.SWEEP_INTERVAL_MS,
      outboxIntervalMs: parsed.OUTBOX_INTERVAL_MS,
      inboxIntervalMs: parsed.INBOX_INTERVAL_MS,
      appliedMessageRetentionMs: parsed.APPLIED_MESSAGE_RETENTION_MS,
    },
    feePolicy: {
      estimateBufferBps: parsed.ESTIMATE_BUFFER_BPS,
      feeGranularity: parsed.FEE_GRANULARITY,
    },
    rateLimit: { perMinute: parsed.RATE_LIMIT_PER_MINUTE },
  };
}

/**
 * Load .env and parse process.env
 */
export function loadConfig(): AppConfig {
  loadEnv();
  return parseConfig(process.env);
}
