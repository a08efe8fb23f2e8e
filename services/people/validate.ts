import { type Findings, isRecord, personLabel, recordsOf } from './types';

export const SUMMARY_MIN_WORDS = 140;
export const SUMMARY_MAX_WORDS = 220;

const WORD_RE = /[\p{L}\p{N}_]+/gu;
const ALLOWED_CONTACT_SCHEMES = ['https://', 'mailto:', 'tel:'];

export function countWords(text: unknown): number {
  if (typeof text !== 'string') return 0;
  return text.match(WORD_RE)?.length ?? 0;
}

export function summaryWarning(label: string, words: number): string | undefined {
  if (words >= SUMMARY_MIN_WORDS && words <= SUMMARY_MAX_WORDS) return undefined;
  return `${label}: summary_text words=${words} (expected ${SUMMARY_MIN_WORDS}–${SUMMARY_MAX_WORDS})`;
}

/**
 * Hard errors block the emit; warnings are advisory. `people_count` is
 * corrected in place when it disagrees with the array length.
 */
export function validatePeople(doc: unknown): Findings {
  const errors: string[] = [];
  const warnings: string[] = [];
  if (!isRecord(doc)) {
    return { errors: ['Top-level must be JSON object'], warnings };
  }

  const people = doc.people;
  if (!Array.isArray(people) || people.length === 0) {
    errors.push('`people` must be a non-empty array.');
  }
  if (!Array.isArray(people)) return { errors, warnings };

  const count = doc.people_count;
  if (count !== undefined && count !== null && count !== people.length) {
    warnings.push(
      `\`people_count\` != len(people) (${String(count)} vs ${people.length}). Updated automatically.`,
    );
    doc.people_count = people.length;
  }

  const ids: string[] = [];
  const order: unknown[] = [];
  people.forEach((person: unknown, idx) => {
    const i = idx + 1;
    if (!isRecord(person)) {
      errors.push(`person[${i}]: must be an object`);
      order.push(undefined);
      return;
    }
    const pid = personLabel(person, i);
    if (person.id === undefined || person.id === null || person.id === '') {
      errors.push(`person[${i}]: missing id`);
    } else {
      ids.push(String(person.id));
    }
    order.push(person.original_order);

    const summary = summaryWarning(`person[${i}]/${pid}`, countWords(person.summary_text));
    if (summary) warnings.push(summary);

    for (const c of recordsOf(person.contacts)) {
      const u = c.url;
      if (typeof u !== 'string') {
        errors.push(`person[${i}]/${pid}/contacts: url missing`);
      } else if (!ALLOWED_CONTACT_SCHEMES.some((scheme) => u.startsWith(scheme))) {
        errors.push(`person[${i}]/${pid}/contacts: bad url \`${u}\``);
      }
    }
    for (const ev of recordsOf(person.evidence)) {
      const cu = ev.canonical_url;
      if (typeof cu !== 'string' || !cu.startsWith('https://')) {
        errors.push(`person[${i}]/${pid}/evidence: canonical_url invalid`);
      }
    }
  });

  if (new Set(ids).size !== ids.length) {
    errors.push('Duplicate `id` values found.');
  }
  if (!isContiguousOrder(order)) {
    warnings.push('`original_order` not contiguous 1..N (will not auto-fix here).');
  }
  return { errors, warnings };
}

/** True when the values are exactly the integers 1..N in any order. */
export function isContiguousOrder(values: unknown[]): boolean {
  if (!values.every((v): v is number => Number.isInteger(v))) return false;
  const sorted = [...values].sort((a, b) => a - b);
  return sorted.every((v, idx) => v === idx + 1);
}
