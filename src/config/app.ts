/**
 * Application Configuration
 *
 * Centralized configuration for app-wide settings. Values that can change
 * per deployment come from environment variables, validated with Zod when
 * this module loads.
 *
 * @module config/app
 */

import { z } from 'zod';

/**
 * Environment variables. Credentials are optional here so that tests and
 * builds load without them; the modules that need them check at use time.
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  NEXT_PUBLIC_APP_URL: z.string().url().default('http://localhost:3000'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  NEXT_PUBLIC_SUPABASE_URL: z.string().url().optional(),
  NEXT_PUBLIC_SUPABASE_ANON_KEY: z.string().min(1).optional(),
  MAX_BODY_CHARS: z.coerce.number().int().positive().default(16000),
  SYNC_RECENT_COUNT: z.coerce.number().int().positive().default(25),
  SYNC_IMPORTANT_COUNT: z.coerce.number().int().positive().default(10),
  SYNC_STARRED_COUNT: z.coerce.number().int().positive().default(10),
  GOOGLE_CLIENT_ID: z.string().optional(),
  GOOGLE_CLIENT_SECRET: z.string().optional(),
});

const env = envSchema.parse({
  NODE_ENV: process.env.NODE_ENV,
  NEXT_PUBLIC_APP_URL: process.env.NEXT_PUBLIC_APP_URL,
  LOG_LEVEL: process.env.LOG_LEVEL,
  NEXT_PUBLIC_SUPABASE_URL: process.env.NEXT_PUBLIC_SUPABASE_URL,
  NEXT_PUBLIC_SUPABASE_ANON_KEY: process.env.NEXT_PUBLIC_SUPABASE_ANON_KEY,
  MAX_BODY_CHARS: process.env.MAX_BODY_CHARS,
  SYNC_RECENT_COUNT: process.env.SYNC_RECENT_COUNT,
  SYNC_IMPORTANT_COUNT: process.env.SYNC_IMPORTANT_COUNT,
  SYNC_STARRED_COUNT: process.env.SYNC_STARRED_COUNT,
  GOOGLE_CLIENT_ID: process.env.GOOGLE_CLIENT_ID,
  GOOGLE_CLIENT_SECRET: process.env.GOOGLE_CLIENT_SECRET,
});

/**
 * Application configuration object.
 *
 * @example
 * ```typescript
 * import { appConfig } from '@/config/app';
 *
 * const recent = await gmail.listMessages({ maxResults: appConfig.sync.recentCount });
 * ```
 */
export const appConfig = {
  env,

  supabase: {
    url: env.NEXT_PUBLIC_SUPABASE_URL,
    anonKey: env.NEXT_PUBLIC_SUPABASE_ANON_KEY,
  },

  /** Google OAuth client and the scopes requested at sign-in */
  google: {
    clientId: env.GOOGLE_CLIENT_ID,
    clientSecret: env.GOOGLE_CLIENT_SECRET,
    scopes: [
      'openid',
      'https://www.googleapis.com/auth/gmail.readonly',
      'https://www.googleapis.com/auth/userinfo.email',
      'https://www.googleapis.com/auth/userinfo.profile',
    ],
  },

  /** Gmail fetch sizes per "fetch new emails" request */
  sync: {
    recentCount: env.SYNC_RECENT_COUNT,
    importantCount: env.SYNC_IMPORTANT_COUNT,
    starredCount: env.SYNC_STARRED_COUNT,
  },

  /** Email processing configuration */
  email: {
    /** Longer text bodies are truncated before annotation */
    maxBodyChars: env.MAX_BODY_CHARS,

    /** Emails annotated in parallel per chunk */
    batchSize: 10,

    /** Pause between chunks (ms) */
    batchDelayMs: 100,
  },

  pagination: {
    defaultPageSize: 50,
    maxPageSize: 100,
    /** Rows per request when reading a whole table; Supabase returns at most 1000 */
    scanPageSize: 1000,
  },

  /** Retry configuration for Gmail and token calls */
  retry: {
    maxAttempts: 3,
    baseDelayMs: 1000,
  },
} as const;

export type AppConfig = typeof appConfig;
