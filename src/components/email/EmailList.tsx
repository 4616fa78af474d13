/**
 * EmailList Component
 *
 * Inbox rows with loading, error and empty states.
 *
 * @module components/email/EmailList
 */

'use client';

import { Inbox } from 'lucide-react';
import { EmailListSkeleton } from '@/components/ui';
import type { EmailSummary } from '@/types/api';
import { EmailListItem } from './EmailListItem';

export interface EmailListProps {
  emails: EmailSummary[];
  isLoading: boolean;
  error: Error | null;
  emptyMessage?: string;
}

export function EmailList({ emails, isLoading, error, emptyMessage = 'No emails here yet.' }: EmailListProps) {
  if (isLoading && emails.length === 0) {
    return <EmailListSkeleton />;
  }

  if (error && emails.length === 0) {
    return (
      <p role="alert" className="p-6 text-sm text-red-600">
        {error.message}
      </p>
    );
  }

  if (emails.length === 0) {
    return (
      <div className="flex flex-col items-center gap-2 p-12 text-muted-foreground">
        <Inbox className="h-8 w-8" aria-hidden="true" />
        <p className="text-sm">{emptyMessage}</p>
      </div>
    );
  }

  return (
    <ul className="divide-y rounded-lg border">
      {emails.map((email) => (
        <EmailListItem key={email.id} email={email} />
      ))}
    </ul>
  );
}
