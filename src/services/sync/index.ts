/**
 * Sync Services Barrel Export
 *
 * @module services/sync
 *
 * @example
 * ```typescript
 * import { createEmailSyncService } from '@/services/sync';
 *
 * const result = await createEmailSyncService(supabase).fetchAndProcess(user.id);
 * ```
 */

export {
  EmailSyncService,
  createEmailSyncService,
  buildListings,
  mergeMessageIds,
  type SyncResult,
  type EmailSyncDependencies,
} from './email-sync-service';

export {
  SupabaseEmailRepository,
  buildEmailRow,
  buildChildRows,
  buildFlagUpdate,
  type EmailRepository,
  type EmailChildRows,
  type GmailFlags,
  type StoredMessage,
} from './email-repository';
