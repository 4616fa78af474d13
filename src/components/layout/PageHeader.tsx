/**
 * PageHeader Component
 *
 * Title row for dashboard pages with an optional back link, description
 * and action buttons on the right.
 *
 * ```tsx
 * <PageHeader
 *   title="Inbox"
 *   description="Annotated emails from your Gmail account"
 *   actions={<Button onClick={syncEmails}>Fetch new emails</Button>}
 * />
 * ```
 *
 * @module components/layout/PageHeader
 */

import type { ReactNode } from 'react';
import Link from 'next/link';
import { ChevronLeft } from 'lucide-react';
import { cn } from '@/lib/utils/cn';

export interface PageHeaderProps {
  /** Omit when the page renders its own heading */
  title?: string;
  description?: string;
  /** Link shown above the title, e.g. back to the inbox */
  backLink?: { href: string; label: string };
  actions?: ReactNode;
  className?: string;
}

export function PageHeader({ title, description, backLink, actions, className }: PageHeaderProps) {
  return (
    <div className={cn('mb-6 space-y-2', className)}>
      {backLink && (
        <Link
          href={backLink.href}
          className="inline-flex items-center gap-1 text-sm text-muted-foreground hover:text-foreground"
        >
          <ChevronLeft className="h-4 w-4" aria-hidden="true" />
          {backLink.label}
        </Link>
      )}
      {(title || actions) && (
        <div className="flex flex-wrap items-start justify-between gap-4">
          <div>
            {title && <h1 className="text-2xl font-bold tracking-tight">{title}</h1>}
            {description && <p className="mt-1 text-sm text-muted-foreground">{description}</p>}
          </div>
          {actions && <div className="flex items-center gap-2">{actions}</div>}
        </div>
      )}
    </div>
  );
}
