/**
 * Keywords sized by score.
 *
 * @module components/email/KeywordList
 */

import { cn } from '@/lib/utils/cn';
import type { KeywordSummary } from '@/types/api';

function sizeClass(score: number, top: number): string {
  const ratio = top > 0 ? score / top : 0;
  if (ratio > 0.75) return 'text-base font-semibold';
  if (ratio > 0.4) return 'text-sm font-medium';
  return 'text-xs';
}

export function KeywordList({ keywords }: { keywords: KeywordSummary[] }) {
  if (keywords.length === 0) {
    return <p className="text-sm text-muted-foreground">No keywords found.</p>;
  }

  const top = Math.max(...keywords.map((keyword) => keyword.score));

  return (
    <ul className="flex flex-wrap items-baseline gap-x-3 gap-y-1">
      {keywords.map((keyword) => (
        <li key={keyword.word} className={cn(sizeClass(keyword.score, top))} title={keyword.score.toFixed(3)}>
          {keyword.word}
        </li>
      ))}
    </ul>
  );
}
