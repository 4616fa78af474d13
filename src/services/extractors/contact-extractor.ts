/**
 * 📇 Contact Extractor
 *
 * One contact per distinct email address found in the body, usually from a
 * signature. Details are looked up in a window of text around the address:
 *
 * - name:     closest "First Last" before the address, else after it, else
 *             the local part title-cased
 * - phone:    first phone number in the window
 * - company:  first ORG entity the engine finds in the window
 * - position: a short line in the window naming a known job title
 *
 * Contacts are not reconciled with the entity list.
 *
 * @module services/extractors/contact-extractor
 */

import { CONTACT_CONFIG, ENTITY_CONFIG } from '@/config/pipeline';
import type { Contact } from '@/types/annotation';
import type { NlpEngine } from '@/services/nlp';

const EMAIL_ADDRESS = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const PHONE = /(?:\+\d{1,3}[\s.-]?)?(?:\(\d{3}\)|\d{3})[\s.-]?\d{3}[\s.-]?\d{4}\b/;
const FULL_NAME = /\b([A-Z][a-z]+) ([A-Z][a-z]+)\b/g;
const NOT_A_FIRST_NAME = new Set(['Hi', 'Hello', 'Hey', 'Dear', 'Thanks', 'Best', 'Regards', 'Kind', 'Warm', 'From', 'To', 'Sent']);

const TITLE_PATTERN = new RegExp(`\\b(?:${CONTACT_CONFIG.jobTitles.join('|')})\\b`);

const ORG_SUFFIXES = new Set<string>(ENTITY_CONFIG.organizationSuffixes);

function lineAt(text: string, index: number): string {
  const start = text.lastIndexOf('\n', index) + 1;
  const end = text.indexOf('\n', index);
  return text.slice(start, end === -1 ? undefined : end);
}

/**
 * "First Last" pairs, skipping greetings, company names ("Acme Corp") and
 * pairs on a job-title line ("Senior Product Manager").
 */
function namesIn(text: string): string[] {
  return [...text.matchAll(FULL_NAME)]
    .filter((match) => {
      const [, first = '', last = ''] = match;
      if (NOT_A_FIRST_NAME.has(first) || ORG_SUFFIXES.has(last)) return false;
      return !TITLE_PATTERN.test(lineAt(text, match.index ?? 0));
    })
    .map((match) => match[0]);
}

function nameFromAddress(address: string): string {
  const localPart = address.split('@')[0] ?? address;
  return localPart
    .split(/[._-]+/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join(' ');
}

function findPosition(area: string): string | null {
  const line = area
    .split('\n')
    .map((candidate) => candidate.trim())
    .find(
      (candidate) =>
        candidate.length > 0 &&
        candidate.length <= 60 &&
        !candidate.includes('@') &&
        !/\d/.test(candidate) &&
        TITLE_PATTERN.test(candidate)
    );
  return line ?? null;
}

export function extractContacts(text: string, engine: NlpEngine): Contact[] {
  if (!text.trim()) return [];

  const contacts: Contact[] = [];
  const seen = new Set<string>();

  for (const match of text.matchAll(EMAIL_ADDRESS)) {
    const address = match[0];
    const index = match.index ?? text.indexOf(address);
    const key = address.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);

    const before = text.slice(Math.max(0, index - CONTACT_CONFIG.nameWindow), index);
    const after = text.slice(index + address.length, index + address.length + CONTACT_CONFIG.nameWindow);
    const name = namesIn(before).at(-1) ?? namesIn(after)[0] ?? nameFromAddress(address);

    const area = text.slice(
      Math.max(0, index - CONTACT_CONFIG.detailWindow),
      index + address.length + CONTACT_CONFIG.detailWindow
    );
    const withoutAddresses = area.replace(EMAIL_ADDRESS, ' ');

    contacts.push({
      name,
      email: address,
      phone: withoutAddresses.match(PHONE)?.[0]?.trim() ?? null,
      company: engine.entities(withoutAddresses).find((entity) => entity.type === 'ORG')?.text ?? null,
      position: findPosition(withoutAddresses),
    });
  }

  return contacts;
}
