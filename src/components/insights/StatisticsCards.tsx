/**
 * 📊 StatisticsCards Component
 *
 * Headline numbers, the priority distribution and per-category and
 * per-sentiment counts for the insights page.
 *
 * @module components/insights/StatisticsCards
 */

import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui';
import type { EmailStatistics } from '@/types/api';

function Stat({ label, value }: { label: string; value: number | string }) {
  return (
    <Card>
      <CardContent className="p-5">
        <p className="text-xs font-medium uppercase text-muted-foreground">{label}</p>
        <p className="mt-1 text-2xl font-bold">{value}</p>
      </CardContent>
    </Card>
  );
}

/** Horizontal bars, widths relative to the total */
function CountBars({ counts, total }: { counts: Record<string, number>; total: number }) {
  const entries = Object.entries(counts).sort(([, a], [, b]) => b - a);
  if (entries.length === 0) {
    return <p className="text-sm text-muted-foreground">Nothing yet.</p>;
  }

  return (
    <ul className="space-y-2">
      {entries.map(([label, count]) => (
        <li key={label} className="text-sm">
          <div className="flex justify-between">
            <span>{label}</span>
            <span className="text-muted-foreground">{count}</span>
          </div>
          <div className="mt-1 h-2 rounded-full bg-muted">
            <div
              className="h-2 rounded-full bg-primary"
              style={{ width: `${total > 0 ? Math.round((count / total) * 100) : 0}%` }}
            />
          </div>
        </li>
      ))}
    </ul>
  );
}

export function StatisticsCards({ statistics }: { statistics: EmailStatistics }) {
  const { priorityDistribution: priority, actionItems } = statistics;
  const scored = priority.low + priority.medium + priority.high;

  return (
    <div className="space-y-4">
      <div className="grid gap-4 sm:grid-cols-2 lg:grid-cols-4">
        <Stat label="Emails" value={statistics.total} />
        <Stat label="Need follow-up" value={statistics.followupNeeded} />
        <Stat label="Action items" value={actionItems.total} />
        <Stat label="Completed" value={`${actionItems.completed}/${actionItems.total}`} />
      </div>

      <div className="grid gap-4 md:grid-cols-3">
        <Card>
          <CardHeader className="pb-3">
            <CardTitle className="text-base">Priority</CardTitle>
          </CardHeader>
          <CardContent>
            <CountBars
              counts={{ High: priority.high, Medium: priority.medium, Low: priority.low }}
              total={scored}
            />
          </CardContent>
        </Card>
        <Card>
          <CardHeader className="pb-3">
            <CardTitle className="text-base">Categories</CardTitle>
          </CardHeader>
          <CardContent>
            <CountBars counts={statistics.categories} total={statistics.total} />
          </CardContent>
        </Card>
        <Card>
          <CardHeader className="pb-3">
            <CardTitle className="text-base">Sentiment</CardTitle>
          </CardHeader>
          <CardContent>
            <CountBars counts={statistics.sentiments} total={statistics.total} />
          </CardContent>
        </Card>
      </div>
    </div>
  );
}
