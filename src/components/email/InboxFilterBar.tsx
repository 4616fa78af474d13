/**
 * InboxFilterBar Component
 *
 * Category and sentiment selects for the inbox. An empty choice clears
 * the filter.
 *
 * @module components/email/InboxFilterBar
 */

'use client';

import { EMAIL_CATEGORIES } from '@/config/pipeline';
import { SENTIMENT_LABELS } from '@/types/annotation';
import type { EmailCategory, SentimentLabel } from '@/types/database';

export interface InboxFilters {
  category?: EmailCategory;
  sentiment?: SentimentLabel;
}

export interface InboxFilterBarProps {
  filters: InboxFilters;
  onChange: (filters: InboxFilters) => void;
}

function parseCategory(value: string): EmailCategory | undefined {
  return EMAIL_CATEGORIES.find((category) => category === value);
}

function parseSentiment(value: string): SentimentLabel | undefined {
  return SENTIMENT_LABELS.find((label) => label === value);
}

const selectClass = 'h-9 rounded-md border border-input bg-background px-3 text-sm';

export function InboxFilterBar({ filters, onChange }: InboxFilterBarProps) {
  return (
    <div className="flex flex-wrap items-center gap-3">
      <label className="flex items-center gap-2 text-sm">
        Category
        <select
          className={selectClass}
          value={filters.category ?? ''}
          onChange={(event) => onChange({ ...filters, category: parseCategory(event.target.value) })}
        >
          <option value="">All</option>
          {EMAIL_CATEGORIES.map((category) => (
            <option key={category} value={category}>
              {category}
            </option>
          ))}
        </select>
      </label>

      <label className="flex items-center gap-2 text-sm">
        Sentiment
        <select
          className={selectClass}
          value={filters.sentiment ?? ''}
          onChange={(event) => onChange({ ...filters, sentiment: parseSentiment(event.target.value) })}
        >
          <option value="">All</option>
          {SENTIMENT_LABELS.map((label) => (
            <option key={label} value={label}>
              {label}
            </option>
          ))}
        </select>
      </label>
    </div>
  );
}
