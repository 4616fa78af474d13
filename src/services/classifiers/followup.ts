/**
 * 🔁 Follow-up Detector
 *
 * An email needs a follow-up when its subject or body contains a request
 * phrase ("let me know", "get back to", ...). The suggested date is the
 * first deadline written in the body, else the next business day.
 *
 * @module services/classifiers/followup
 */

import { addBusinessDays, format } from 'date-fns';
import { DEADLINE_CONFIG, FOLLOWUP_PHRASES } from '@/config/pipeline';
import type { FollowupResult } from '@/types/annotation';
import { findDeadline } from './deadline-parser';
import { countPhrases } from './rules';

const DATE_FORMAT = 'yyyy-MM-dd';

export function needsFollowup(subject: string, text: string): boolean {
  return countPhrases(`${subject} ${text}`, FOLLOWUP_PHRASES) > 0;
}

export function detectFollowup(subject: string, text: string, reference: Date): FollowupResult {
  if (!needsFollowup(subject, text)) {
    return { needsFollowup: false, followupDate: null };
  }

  const date =
    findDeadline(text, reference) ??
    addBusinessDays(reference, DEADLINE_CONFIG.followupDefaultBusinessDays);

  return { needsFollowup: true, followupDate: format(date, DATE_FORMAT) };
}
