/**
 * Skeleton placeholders shown while data loads.
 *
 * @module components/ui/skeleton
 */

import type { HTMLAttributes } from 'react';
import { cn } from '@/lib/utils/cn';

export type SkeletonProps = HTMLAttributes<HTMLDivElement>;

function Skeleton({ className, ...props }: SkeletonProps) {
  return <div className={cn('animate-pulse rounded-md bg-muted', className)} {...props} />;
}

/** Placeholder for one inbox row */
function EmailRowSkeleton() {
  return (
    <div className="flex flex-col space-y-3 border-b p-4" aria-hidden="true">
      <div className="flex items-center justify-between">
        <Skeleton className="h-4 w-[140px]" />
        <Skeleton className="h-3 w-[60px]" />
      </div>
      <Skeleton className="h-4 w-[280px]" />
      <Skeleton className="h-3 w-full" />
      <div className="flex gap-2">
        <Skeleton className="h-5 w-[80px] rounded-full" />
        <Skeleton className="h-5 w-[60px] rounded-full" />
      </div>
    </div>
  );
}

function EmailListSkeleton({ count = 5 }: { count?: number }) {
  return (
    <div role="status" aria-label="Loading emails">
      {Array.from({ length: count }, (_, index) => (
        <EmailRowSkeleton key={index} />
      ))}
    </div>
  );
}

export { Skeleton, EmailRowSkeleton, EmailListSkeleton };
