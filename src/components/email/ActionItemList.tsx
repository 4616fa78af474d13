/**
 * ✅ ActionItemList Component
 *
 * Checklist of action items with deadlines. Overdue open items are
 * highlighted; the optional source line links back to the email.
 *
 * ```tsx
 * <ActionItemList items={items} onToggle={toggleComplete} showSource />
 * ```
 *
 * @module components/email/ActionItemList
 */

'use client';

import Link from 'next/link';
import { format, isPast } from 'date-fns';
import { Clock } from 'lucide-react';
import { Checkbox } from '@/components/ui';
import { cn } from '@/lib/utils/cn';
import type { ActionItemRow } from '@/types/database';

interface ListedActionItem extends ActionItemRow {
  email?: { subject: string; sender_name: string } | null;
}

export interface ActionItemListProps {
  items: ListedActionItem[];
  onToggle: (id: string) => void;
  /** Show the subject and sender of the source email */
  showSource?: boolean;
  emptyMessage?: string;
}

export function ActionItemList({ items, onToggle, showSource = false, emptyMessage = 'No action items.' }: ActionItemListProps) {
  if (items.length === 0) {
    return <p className="text-sm text-muted-foreground">{emptyMessage}</p>;
  }

  return (
    <ul className="space-y-3">
      {items.map((item) => {
        const deadline = item.deadline ? new Date(item.deadline) : null;
        const overdue = deadline !== null && !item.completed && isPast(deadline);
        const checkboxId = `action-item-${item.id}`;

        return (
          <li key={item.id} className="flex items-start gap-3">
            <Checkbox
              id={checkboxId}
              checked={item.completed}
              onCheckedChange={() => onToggle(item.id)}
              className="mt-0.5"
            />
            <div className="min-w-0 flex-1">
              <label
                htmlFor={checkboxId}
                className={cn('text-sm', item.completed && 'text-muted-foreground line-through')}
              >
                {item.text}
              </label>

              <div className="mt-1 flex flex-wrap items-center gap-3 text-xs text-muted-foreground">
                {deadline && (
                  <span className={cn('inline-flex items-center gap-1', overdue && 'font-medium text-red-600')}>
                    <Clock className="h-3 w-3" aria-hidden="true" />
                    {format(deadline, 'EEE, MMM d')}
                  </span>
                )}
                {showSource && item.email && (
                  <Link href={`/inbox/${item.email_id}`} className="truncate hover:underline">
                    {item.email.subject || '(no subject)'} · {item.email.sender_name}
                  </Link>
                )}
              </div>
            </div>
          </li>
        );
      })}
    </ul>
  );
}
