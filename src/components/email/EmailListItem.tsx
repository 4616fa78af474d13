/**
 * 📧 EmailListItem Component
 *
 * One row of the inbox: sender, subject, summary and annotation badges,
 * linking to the detail page.
 *
 * @module components/email/EmailListItem
 */

'use client';

import Link from 'next/link';
import { formatDistanceToNow } from 'date-fns';
import { Reply, Star } from 'lucide-react';
import { CategoryBadge, PriorityBadge, SentimentBadge } from '@/components/ui';
import { cn } from '@/lib/utils/cn';
import type { EmailSummary } from '@/types/api';

export interface EmailListItemProps {
  email: EmailSummary;
}

export function EmailListItem({ email }: EmailListItemProps) {
  const receivedAt = new Date(email.received_at);

  return (
    <li>
      <Link
        href={`/inbox/${email.id}`}
        className={cn(
          'flex flex-col gap-1.5 border-b px-4 py-3 transition-colors hover:bg-accent',
          email.is_important && 'border-l-4 border-l-red-400'
        )}
      >
        <div className="flex items-center justify-between gap-4">
          <span className="truncate text-sm font-semibold">{email.sender_name || email.sender_email}</span>
          <time className="shrink-0 text-xs text-muted-foreground" dateTime={email.received_at}>
            {formatDistanceToNow(receivedAt, { addSuffix: true })}
          </time>
        </div>

        <div className="flex items-center gap-2">
          {email.is_starred && <Star className="h-4 w-4 fill-amber-400 text-amber-400" aria-label="Starred" />}
          <span className="truncate text-sm">{email.subject || '(no subject)'}</span>
        </div>

        {email.summary && <p className="line-clamp-2 text-xs text-muted-foreground">{email.summary}</p>}

        <div className="flex flex-wrap items-center gap-2">
          {email.category && <CategoryBadge category={email.category} />}
          {email.sentiment_label && <SentimentBadge label={email.sentiment_label} />}
          {email.priority_score !== null && <PriorityBadge score={email.priority_score} />}
          {email.needs_followup && (
            <span className="inline-flex items-center gap-1 text-xs text-muted-foreground">
              <Reply className="h-3 w-3" aria-hidden="true" /> Follow up
            </span>
          )}
        </div>
      </Link>
    </li>
  );
}
