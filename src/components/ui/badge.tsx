/**
 * 🏷️ Badge Component
 *
 * Small color-coded labels for categories, sentiment and priority.
 * `SentimentBadge`, `PriorityBadge` and `CategoryBadge` pick the variant
 * from the annotation value.
 *
 * ```tsx
 * <Badge variant="outline">PERSON</Badge>
 * <SentimentBadge label="Urgent" />
 * <PriorityBadge score={8.2} />
 * ```
 *
 * @module components/ui/badge
 */

import * as React from 'react';
import { cva, type VariantProps } from 'class-variance-authority';
import { cn } from '@/lib/utils/cn';
import { priorityBucket } from '@/services/classifiers/priority';
import type { EmailCategory, SentimentLabel } from '@/types/database';

// ═══════════════════════════════════════════════════════════════════════════════
// VARIANT DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

const badgeVariants = cva(
  [
    'inline-flex items-center rounded-full',
    'border px-2.5 py-0.5',
    'text-xs font-semibold',
    'transition-colors',
  ],
  {
    variants: {
      variant: {
        default: 'border-transparent bg-primary text-primary-foreground',
        secondary: 'border-transparent bg-secondary text-secondary-foreground',
        outline: 'text-foreground',
        red: 'border-red-200 bg-red-100 text-red-800 dark:border-red-800 dark:bg-red-900/30 dark:text-red-300',
        orange: 'border-orange-200 bg-orange-100 text-orange-800 dark:border-orange-800 dark:bg-orange-900/30 dark:text-orange-300',
        amber: 'border-amber-200 bg-amber-100 text-amber-800 dark:border-amber-800 dark:bg-amber-900/30 dark:text-amber-300',
        green: 'border-green-200 bg-green-100 text-green-800 dark:border-green-800 dark:bg-green-900/30 dark:text-green-300',
        blue: 'border-blue-200 bg-blue-100 text-blue-800 dark:border-blue-800 dark:bg-blue-900/30 dark:text-blue-300',
        purple: 'border-purple-200 bg-purple-100 text-purple-800 dark:border-purple-800 dark:bg-purple-900/30 dark:text-purple-300',
        teal: 'border-teal-200 bg-teal-100 text-teal-800 dark:border-teal-800 dark:bg-teal-900/30 dark:text-teal-300',
        gray: 'border-gray-200 bg-gray-100 text-gray-800 dark:border-gray-700 dark:bg-gray-800/50 dark:text-gray-300',
      },
    },
    defaultVariants: {
      variant: 'default',
    },
  }
);

type BadgeVariant = NonNullable<VariantProps<typeof badgeVariants>['variant']>;

export interface BadgeProps extends React.HTMLAttributes<HTMLDivElement>, VariantProps<typeof badgeVariants> {}

function Badge({ className, variant, ...props }: BadgeProps) {
  return <div className={cn(badgeVariants({ variant }), className)} {...props} />;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ANNOTATION BADGES
// ═══════════════════════════════════════════════════════════════════════════════

const SENTIMENT_VARIANTS: Record<SentimentLabel, BadgeVariant> = {
  Positive: 'green',
  Negative: 'orange',
  Neutral: 'gray',
  Urgent: 'red',
};

const CATEGORY_VARIANTS: Record<EmailCategory, BadgeVariant> = {
  Meeting: 'purple',
  Sales: 'orange',
  Update: 'blue',
  Personal: 'green',
  Finance: 'teal',
  Technical: 'amber',
  Promotional: 'secondary',
  Other: 'gray',
};

const PRIORITY_VARIANTS = { low: 'gray', medium: 'amber', high: 'red' } as const;

function SentimentBadge({ label, className }: { label: SentimentLabel; className?: string }) {
  return (
    <Badge variant={SENTIMENT_VARIANTS[label]} className={className}>
      {label}
    </Badge>
  );
}

function CategoryBadge({ category, className }: { category: EmailCategory; className?: string }) {
  return (
    <Badge variant={CATEGORY_VARIANTS[category]} className={className}>
      {category}
    </Badge>
  );
}

function PriorityBadge({ score, className }: { score: number; className?: string }) {
  const bucket = priorityBucket(score);
  return (
    <Badge variant={PRIORITY_VARIANTS[bucket]} className={className} title={`Priority ${bucket}`}>
      P {score.toFixed(1)}
    </Badge>
  );
}

export { Badge, badgeVariants, SentimentBadge, CategoryBadge, PriorityBadge };
