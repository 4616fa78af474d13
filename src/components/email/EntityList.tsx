/**
 * Entities grouped by type, as outline badges.
 *
 * @module components/email/EntityList
 */

import { Badge } from '@/components/ui';
import { ENTITY_TYPES } from '@/types/annotation';
import type { EntitySummary } from '@/types/api';

const TYPE_LABELS: Record<(typeof ENTITY_TYPES)[number], string> = {
  PERSON: 'People',
  ORG: 'Organizations',
  LOC: 'Places',
  DATE: 'Dates',
  TIME: 'Times',
  MONEY: 'Amounts',
};

export function EntityList({ entities }: { entities: EntitySummary[] }) {
  const groups = ENTITY_TYPES.map((type) => ({
    type,
    items: entities.filter((entity) => entity.type === type),
  })).filter((group) => group.items.length > 0);

  if (groups.length === 0) {
    return <p className="text-sm text-muted-foreground">No entities found.</p>;
  }

  return (
    <dl className="space-y-3">
      {groups.map((group) => (
        <div key={group.type}>
          <dt className="mb-1 text-xs font-medium uppercase text-muted-foreground">{TYPE_LABELS[group.type]}</dt>
          <dd className="flex flex-wrap gap-1.5">
            {group.items.map((entity) => (
              <Badge key={`${entity.type}:${entity.text}`} variant="outline">
                {entity.text}
              </Badge>
            ))}
          </dd>
        </div>
      ))}
    </dl>
  );
}
