/**
 * 📧 EmailDetailView Component
 *
 * Full annotation view for one email.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * SECTIONS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Header      subject, sender, date, category/sentiment/priority badges
 * Summary     the extractive summary and follow-up date
 * Actions     toggleable action items
 * Entities    grouped by type
 * Keywords    sized by score
 * Contacts    details found in the message
 * Body        the cleaned text
 *
 * @module components/email/EmailDetailView
 */

'use client';

import type { ReactNode } from 'react';
import { format } from 'date-fns';
import { AlertTriangle, Reply, Star } from 'lucide-react';
import {
  Card,
  CardContent,
  CardHeader,
  CardTitle,
  CategoryBadge,
  PriorityBadge,
  SentimentBadge,
} from '@/components/ui';
import type { EmailDetail } from '@/types/api';
import { ActionItemList } from './ActionItemList';
import { ContactList } from './ContactList';
import { EntityList } from './EntityList';
import { KeywordList } from './KeywordList';

export interface EmailDetailViewProps {
  email: EmailDetail;
  onToggleActionItem: (id: string) => void;
}

function Section({ title, children }: { title: string; children: ReactNode }) {
  return (
    <Card>
      <CardHeader className="pb-3">
        <CardTitle className="text-base">{title}</CardTitle>
      </CardHeader>
      <CardContent>{children}</CardContent>
    </Card>
  );
}

export function EmailDetailView({ email, onToggleActionItem }: EmailDetailViewProps) {
  return (
    <article className="space-y-4">
      {/* ─── Header ─────────────────────────────────────────────────────── */}
      <header className="space-y-2">
        <h1 className="flex items-center gap-2 text-2xl font-semibold">
          {email.is_starred && <Star className="h-5 w-5 fill-amber-400 text-amber-400" aria-label="Starred" />}
          {email.subject || '(no subject)'}
        </h1>
        <p className="text-sm text-muted-foreground">
          {email.sender_name} &lt;{email.sender_email}&gt; · {format(new Date(email.received_at), 'PPpp')}
        </p>
        <div className="flex flex-wrap gap-2">
          {email.category && <CategoryBadge category={email.category} />}
          {email.sentiment_label && <SentimentBadge label={email.sentiment_label} />}
          {email.priority_score !== null && <PriorityBadge score={email.priority_score} />}
        </div>
      </header>

      {email.processing_error && (
        <p role="alert" className="flex items-center gap-2 rounded-md bg-amber-50 p-3 text-sm text-amber-800">
          <AlertTriangle className="h-4 w-4" aria-hidden="true" />
          Some annotations could not be computed for this email.
        </p>
      )}

      {/* ─── Summary ────────────────────────────────────────────────────── */}
      <Section title="Summary">
        <p className="text-sm">{email.summary ?? 'No summary available.'}</p>
        {email.needs_followup && (
          <p className="mt-3 flex items-center gap-1.5 text-sm text-muted-foreground">
            <Reply className="h-4 w-4" aria-hidden="true" />
            Follow up
            {email.followup_date && <> by {format(new Date(email.followup_date), 'EEE, MMM d')}</>}
          </p>
        )}
      </Section>

      <Section title="Action items">
        <ActionItemList items={email.action_items} onToggle={onToggleActionItem} />
      </Section>

      <div className="grid gap-4 md:grid-cols-2">
        <Section title="Entities">
          <EntityList entities={email.entities} />
        </Section>
        <Section title="Keywords">
          <KeywordList keywords={email.keywords} />
        </Section>
      </div>

      <Section title="Contacts">
        <ContactList contacts={email.contacts} />
      </Section>

      {/* ─── Body ───────────────────────────────────────────────────────── */}
      <Section title="Message">
        <div className="whitespace-pre-wrap text-sm leading-relaxed">
          {email.normalized_body || email.raw_body}
        </div>
      </Section>
    </article>
  );
}
