/**
 * 📋 API Validation Schemas
 *
 * Zod schemas for validating API request bodies and query parameters.
 * These schemas define the contract between the dashboard and the routes.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════════
 * ```typescript
 * import { emailListQuerySchema, actionItemUpdateSchema } from '@/lib/api/schemas';
 * import { validateQuery, validateBody } from '@/lib/api/utils';
 *
 * const query = validateQuery(request, emailListQuerySchema);
 * const body = await validateBody(request, actionItemUpdateSchema);
 * ```
 *
 * @module lib/api/schemas
 */

import { z } from 'zod';
import { EMAIL_CATEGORIES } from '@/config/pipeline';
import { SENTIMENT_LABELS } from '@/types/annotation';

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const uuidSchema = z.string().uuid('Invalid UUID format');

/**
 * Pagination query parameters. Out-of-range values are rejected here;
 * `getPagination` applies the defaults.
 */
export const paginationSchema = z.object({
  page: z.string().regex(/^\d+$/, 'page must be a positive integer').transform(Number).optional(),
  limit: z.string().regex(/^\d+$/, 'limit must be a positive integer').transform(Number).optional(),
});

/** Query-string booleans: only "true" and "false" */
export const booleanStringSchema = z.enum(['true', 'false']).transform((value) => value === 'true');

// ═══════════════════════════════════════════════════════════════════════════════
// EMAIL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const emailCategorySchema = z.enum(EMAIL_CATEGORIES);

export const sentimentLabelSchema = z.enum(SENTIMENT_LABELS);

/**
 * Inbox tabs.
 * - all: every email, newest first
 * - starred / important: Gmail starred, or important by flag or score
 * - followup: emails needing a reply, soonest follow-up date first
 */
export const emailFilterSchema = z.enum(['all', 'starred', 'important', 'followup']);

export type EmailFilter = z.infer<typeof emailFilterSchema>;

/**
 * GET /api/emails query parameters.
 */
export const emailListQuerySchema = paginationSchema.extend({
  filter: emailFilterSchema.default('all'),
  category: emailCategorySchema.optional(),
  sentiment: sentimentLabelSchema.optional(),
});

export type EmailListQuery = z.infer<typeof emailListQuerySchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// ACTION ITEM SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * GET /api/action-items query parameters.
 */
export const actionItemsQuerySchema = z.object({
  completed: booleanStringSchema.optional(),
});

export type ActionItemsQuery = z.infer<typeof actionItemsQuerySchema>;

/**
 * PATCH /api/action-items/[id] body.
 */
export const actionItemUpdateSchema = z
  .object({
    completed: z.boolean({
      required_error: 'completed is required',
      invalid_type_error: 'completed must be a boolean',
    }),
  })
  .strict();

export type ActionItemUpdate = z.infer<typeof actionItemUpdateSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// AUTH SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * GET /api/auth/callback query parameters. Google reports a denied
 * consent as `error`.
 */
export const authCallbackQuerySchema = z.object({
  code: z.string().min(1).optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});
