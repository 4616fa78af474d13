/**
 * 🪝 Hooks Barrel Export
 *
 * ```tsx
 * import { useEmails, useActionItems, useAuth } from '@/hooks';
 * ```
 *
 * @module hooks
 */

export { useAuth } from './useAuth';
export type { UseAuthReturn } from './useAuth';

export { useEmails } from './useEmails';
export type { UseEmailsReturn } from './useEmails';

export { useEmailDetail } from './useEmailDetail';
export type { UseEmailDetailReturn } from './useEmailDetail';

export { useActionItems, calculateStats } from './useActionItems';
export type { UseActionItemsOptions, UseActionItemsReturn, ActionItemStats } from './useActionItems';

export { useInsights } from './useInsights';
export type { UseInsightsReturn } from './useInsights';
