/**
 * ⏰ Deadline Parser
 *
 * Finds a "by …" deadline phrase in a sentence and resolves it against a
 * reference date. Day-level deadlines resolve to the end-of-day hour on
 * that day. Anything that does not resolve to a real calendar date yields
 * null; parsing never throws.
 *
 * Supported phrases (case-insensitive):
 *
 * | Phrase                       | Resolves to                                  |
 * |------------------------------|----------------------------------------------|
 * | by today / tonight / end of day | reference day                             |
 * | by tomorrow                  | reference day + 1                            |
 * | by friday                    | the next Friday after the reference day      |
 * | by this week / end of week   | the coming Friday (the reference day if it is one) |
 * | by next week                 | reference day + 7                            |
 * | by next friday               | Friday of the following calendar week        |
 * | by end of month / this month | last day of the reference month              |
 * | by next month                | last day of the following month              |
 * | by march 3 / by mar 3rd      | March 3 (next year if already past)          |
 * | by 3/14 or 3/14/2026         | month/day, US order                          |
 *
 * @module services/classifiers/deadline-parser
 */

import {
  addDays,
  addMonths,
  addWeeks,
  endOfMonth,
  isBefore,
  isFriday,
  isValid,
  nextDay,
  setHours,
  startOfDay,
  startOfWeek,
  type Day,
} from 'date-fns';
import { DEADLINE_CONFIG } from '@/config/pipeline';
import { createLogger } from '@/lib/utils/logger';

const logger = createLogger('DeadlineParser');

// ═══════════════════════════════════════════════════════════════════════════════
// VOCABULARY
// ═══════════════════════════════════════════════════════════════════════════════

const WEEKDAYS: Readonly<Record<string, Day>> = {
  sunday: 0,
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
};

const MONTHS: Readonly<Record<string, number>> = {
  jan: 0, january: 0,
  feb: 1, february: 1,
  mar: 2, march: 2,
  apr: 3, april: 3,
  may: 4,
  jun: 5, june: 5,
  jul: 6, july: 6,
  aug: 7, august: 7,
  sep: 8, sept: 8, september: 8,
  oct: 9, october: 9,
  nov: 10, november: 10,
  dec: 11, december: 11,
};

const WEEKDAY_NAMES = Object.keys(WEEKDAYS).join('|');
const MONTH_NAMES = Object.keys(MONTHS).join('|');

// ═══════════════════════════════════════════════════════════════════════════════
// RULES
// ═══════════════════════════════════════════════════════════════════════════════

interface DeadlineRule {
  readonly pattern: RegExp;
  readonly resolve: (match: RegExpMatchArray, reference: Date) => Date | null;
}

function atDeadlineHour(day: Date): Date {
  return setHours(startOfDay(day), DEADLINE_CONFIG.endOfDayHour);
}

function comingFriday(reference: Date): Date {
  return isFriday(reference) ? reference : nextDay(reference, 5);
}

function calendarDate(year: number, month: number, day: number): Date | null {
  const date = new Date(year, month, day);
  if (!isValid(date) || date.getMonth() !== month || date.getDate() !== day) return null;
  return date;
}

/** Ordered: the more specific phrases come first. */
const DEADLINE_RULES: readonly DeadlineRule[] = [
  {
    pattern: /\bby\s+(?:the\s+)?end\s+of\s+(?:the\s+)?(day|week|month)\b/i,
    resolve: (match, reference) => {
      const unit = match[1]?.toLowerCase();
      if (unit === 'day') return reference;
      if (unit === 'week') return comingFriday(reference);
      return endOfMonth(reference);
    },
  },
  {
    pattern: new RegExp(`\\bby\\s+(next|this)\\s+(week|month|${WEEKDAY_NAMES})\\b`, 'i'),
    resolve: (match, reference) => {
      const which = match[1]?.toLowerCase();
      const unit = match[2]?.toLowerCase() ?? '';

      if (unit === 'week') return which === 'next' ? addWeeks(reference, 1) : comingFriday(reference);
      if (unit === 'month') return endOfMonth(which === 'next' ? addMonths(reference, 1) : reference);

      const weekday = WEEKDAYS[unit];
      if (weekday === undefined) return null;
      if (which === 'this') return reference.getDay() === weekday ? reference : nextDay(reference, weekday);

      const followingWeek = startOfWeek(addWeeks(reference, 1), { weekStartsOn: 1 });
      const offset = (weekday + 6) % 7;
      return addDays(followingWeek, offset);
    },
  },
  {
    pattern: new RegExp(`\\bby\\s+(today|tonight|tomorrow|${WEEKDAY_NAMES})\\b`, 'i'),
    resolve: (match, reference) => {
      const word = match[1]?.toLowerCase() ?? '';
      if (word === 'today' || word === 'tonight') return reference;
      if (word === 'tomorrow') return addDays(reference, 1);

      const weekday = WEEKDAYS[word];
      return weekday === undefined ? null : nextDay(reference, weekday);
    },
  },
  {
    pattern: new RegExp(`\\bby\\s+(${MONTH_NAMES})\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?\\b`, 'i'),
    resolve: (match, reference) => {
      const month = MONTHS[match[1]?.toLowerCase() ?? ''];
      const day = Number(match[2]);
      if (month === undefined) return null;

      const thisYear = calendarDate(reference.getFullYear(), month, day);
      if (!thisYear) return null;
      return isBefore(thisYear, startOfDay(reference))
        ? calendarDate(reference.getFullYear() + 1, month, day)
        : thisYear;
    },
  },
  {
    pattern: /\bby\s+(\d{1,2})\/(\d{1,2})(?:\/(\d{2}|\d{4}))?\b/i,
    resolve: (match, reference) => {
      const month = Number(match[1]) - 1;
      const day = Number(match[2]);
      const rawYear = match[3];
      const year = rawYear === undefined
        ? reference.getFullYear()
        : rawYear.length === 2 ? 2000 + Number(rawYear) : Number(rawYear);

      return calendarDate(year, month, day);
    },
  },
];

// ═══════════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Resolves the first deadline phrase in the text.
 *
 * @returns The deadline at the end-of-day hour, or null
 *
 * @example
 * ```typescript
 * // reference: Monday 5 January 2026
 * findDeadline('Please send the report by Friday.', reference);
 * // => Friday 9 January 2026, 17:00 local time
 * ```
 */
export function findDeadline(text: string, reference: Date): Date | null {
  for (const rule of DEADLINE_RULES) {
    const match = text.match(rule.pattern);
    if (!match) continue;

    try {
      const resolved = rule.resolve(match, reference);
      return resolved && isValid(resolved) ? atDeadlineHour(resolved) : null;
    } catch (error) {
      logger.debug('Deadline phrase did not resolve', {
        phrase: match[0],
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  return null;
}
