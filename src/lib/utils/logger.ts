/**
 * Centralized Logging Utility
 *
 * Structured logging for every module. Each log line carries a `context`
 * (the module or service name) so output can be filtered per component.
 *
 * USAGE:
 * ```typescript
 * import { createLogger } from '@/lib/utils/logger';
 *
 * const logger = createLogger('EmailProcessor');
 * logger.start('Processing email', { emailId: '123' });
 * logger.success('Email processed', { emailId: '123', durationMs: 42 });
 * logger.error('Processing failed', { error: err.message });
 * ```
 *
 * LOG LEVELS:
 * - debug: Detailed diagnostic info (not shown in production)
 * - info: Important events and state changes (start/success map here)
 * - warn: Warning conditions that don't stop execution
 * - error: Errors that need attention
 *
 * @module lib/utils/logger
 */

import pino from 'pino';

// ═══════════════════════════════════════════════════════════════════════════════
// BASE LOGGER
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Log level from LOG_LEVEL, else 'info' in production, 'silent' under test
 * and 'debug' everywhere else.
 */
function getLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL;
  if (envLevel) return envLevel;

  if (process.env.NODE_ENV === 'test') return 'silent';
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * pino-pretty for local development, raw JSON in production.
 * Tests run without a transport so no worker thread is spawned.
 */
function getTransport(): pino.TransportSingleOptions | undefined {
  if (process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'test') {
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

const baseLogger = pino({
  level: getLogLevel(),
  transport: getTransport(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Metadata that can be included with any log message.
 */
export interface LogMetadata {
  /** Email row or Gmail message id */
  emailId?: string;
  /** Session user id */
  userId?: string;
  /** Gmail account row id */
  accountId?: string;
  /** Error message for error logs */
  error?: string;
  /** Stack trace for debugging */
  stack?: string;
  /** Duration in milliseconds */
  durationMs?: number;
  [key: string]: unknown;
}

type LogFn = (message: string, meta?: LogMetadata) => void;

/**
 * Logger returned by createLogger().
 *
 * `start` and `success` bracket an operation; both log at info level with
 * a `phase` field so the pair can be found together.
 */
export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  start: LogFn;
  success: LogFn;
}

// ═══════════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Creates a contextual logger for a module or service.
 *
 * @example
 * ```typescript
 * const logger = createLogger('GmailService');
 * logger.info('Listing messages', { accountId: '123' });
 * // Output: [GmailService] Listing messages { accountId: '123' }
 * ```
 */
export function createLogger(context: string): Logger {
  return {
    debug: (message, meta) => baseLogger.debug({ context, ...meta }, message),
    info: (message, meta) => baseLogger.info({ context, ...meta }, message),
    warn: (message, meta) => baseLogger.warn({ context, ...meta }, message),
    error: (message, meta) => baseLogger.error({ context, ...meta }, message),
    start: (message, meta) =>
      baseLogger.info({ context, phase: 'start', ...meta }, message),
    success: (message, meta) =>
      baseLogger.info({ context, phase: 'success', ...meta }, message),
  };
}

/**
 * Default logger for quick one-off logging.
 * Prefer createLogger() for service/module code.
 */
export const logger = createLogger('App');

// ═══════════════════════════════════════════════════════════════════════════════
// DOMAIN HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

const emailLogger = createLogger('Email');
const authLogger = createLogger('Auth');
const pipelineLogger = createLogger('Pipeline');

/**
 * Gmail fetch events, logged with consistent messages.
 */
export const logEmail = {
  fetchStart: (meta: LogMetadata) => emailLogger.start('Fetching emails from Gmail', meta),
  fetchComplete: (meta: LogMetadata) => emailLogger.success('Fetched emails from Gmail', meta),
  fetchError: (meta: LogMetadata) => emailLogger.error('Failed to fetch emails from Gmail', meta),
};

/**
 * OAuth session and token events.
 */
export const logAuth = {
  loginStart: (meta: LogMetadata) => authLogger.start('Login started', meta),
  loginSuccess: (meta: LogMetadata) => authLogger.success('Login completed', meta),
  loginError: (meta: LogMetadata) => authLogger.error('Login failed', meta),
  tokenExpired: (meta: LogMetadata) => authLogger.info('Access token expired', meta),
  tokenRefreshed: (meta: LogMetadata) => authLogger.success('Access token refreshed', meta),
  logout: (meta: LogMetadata) => authLogger.info('User logged out', meta),
};

/**
 * Annotation pipeline events.
 */
export const logPipeline = {
  stageFailed: (stage: string, meta: LogMetadata) =>
    pipelineLogger.warn(`Pipeline stage failed: ${stage}`, { stage, ...meta }),
  emailProcessed: (meta: LogMetadata) => pipelineLogger.debug('Email annotated', meta),
  batchComplete: (meta: LogMetadata) => pipelineLogger.success('Batch annotated', meta),
};
