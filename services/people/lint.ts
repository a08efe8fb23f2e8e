/**
 * Strict people linter.
 *
 * Unlike the emit action this checks the controlled vocabularies (sections,
 * evidence tags), canonicalizes URLs instead of extracting them, and
 * repairs ordering. Every check appends to the error or warning list; the
 * input document is never mutated.
 */

import vocabulary from './vocabulary.json';
import { peopleToCsv } from './csv';
import { PeopleParseError, type ParseTextOptions, parsePeopleText } from './text';
import {
  type CheckStatus,
  type Findings,
  type JsonObject,
  type PeopleDocument,
  isRecord,
  personLabel,
  recordsOf,
} from './types';
import {
  EMAIL_RE,
  HTTPS_URL_RE,
  extractHttpsUrls,
  normalizeCtgovUrl,
  preprintToDoi,
  purifyLink,
} from './urls';
import { isContiguousOrder, summaryWarning } from './validate';

export const ALLOWED_SECTIONS: ReadonlySet<string> = new Set(vocabulary.sections);
export const ALLOWED_TAGS: ReadonlySet<string> = new Set(vocabulary.evidenceTags);

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const URL_DEBRIS_RE = /[[\]()]/;

export interface LintReport extends Findings {
  status: CheckStatus;
  people_count: number;
}

export interface LintResult {
  report: LintReport;
  /** Cleaned document; null when the report failed. */
  cleaned: PeopleDocument | null;
}

export function countWhitespaceWords(text: unknown): number {
  if (typeof text !== 'string') return 0;
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

function canonicalize(url: string): string {
  return normalizeCtgovUrl(purifyLink(url));
}

// ============================================================================
// Person checks
// ============================================================================

function lintEvidence(person: JsonObject, at: string, findings: Findings): void {
  recordsOf(person.evidence).forEach((e, j) => {
    const tag = e.tag;
    if (typeof tag !== 'string' || !ALLOWED_TAGS.has(tag)) {
      findings.errors.push(`${at}/evidence[${j}]: invalid tag '${String(tag ?? '')}'`);
    }
    if (typeof e.canonical_url === 'string') {
      const cu = canonicalize(e.canonical_url);
      e.canonical_url = tag === 'preprint' ? preprintToDoi(cu) : cu;
    }
    if (typeof e.pdf_url === 'string') {
      e.pdf_url = purifyLink(e.pdf_url);
    }
    const cu = e.canonical_url;
    if (typeof cu !== 'string' || !HTTPS_URL_RE.test(cu)) {
      findings.errors.push(`${at}/evidence[${j}]: invalid canonical_url '${String(cu ?? '')}'`);
    }
  });
}

/** Pick the first https URL out of markdown debris or otherwise malformed text. */
function unwrapContactUrl(url: string): string {
  const asHttps = url.replaceAll('mailto:', 'https://').replaceAll('tel:', 'https://');
  if (!URL_DEBRIS_RE.test(url) && HTTPS_URL_RE.test(asHttps)) return url;
  return extractHttpsUrls(url)[0] ?? url;
}

function lintContacts(person: JsonObject, at: string, findings: Findings): void {
  recordsOf(person.contacts).forEach((c, j) => {
    const type = c.type ?? 'page';
    let url = typeof c.url === 'string' ? canonicalize(unwrapContactUrl(c.url)) : '';

    if (type === 'email') {
      if (!url.startsWith('mailto:') && EMAIL_RE.test(url)) url = `mailto:${url}`;
      const email = url.startsWith('mailto:') ? url.slice('mailto:'.length) : url;
      if (!EMAIL_RE.test(email)) findings.errors.push(`${at}/contacts[${j}]: invalid mailto`);
    } else if (type === 'phone') {
      if (!url.startsWith('tel:')) {
        findings.errors.push(`${at}/contacts[${j}]: invalid phone URL (must start 'tel:')`);
      }
    } else if (!HTTPS_URL_RE.test(url)) {
      findings.errors.push(`${at}/contacts[${j}]: invalid URL '${url}' for page`);
    }

    const verified = c.verified_date;
    if (typeof verified !== 'string' || !ISO_DATE_RE.test(verified)) {
      findings.warnings.push(`${at}/contacts[${j}]: missing or non-ISO verified_date`);
    }
    c.url = url;
  });
}

function lintKeyLinks(person: JsonObject, at: string, findings: Findings): void {
  recordsOf(person.key_links).forEach((k, j) => {
    if (typeof k.url !== 'string') return;
    const url = canonicalize(k.url);
    k.url = url;
    if (!HTTPS_URL_RE.test(url)) findings.errors.push(`${at}/key_links[${j}]: invalid url '${url}'`);
  });
}

function lintTrials(person: JsonObject, at: string, findings: Findings): void {
  recordsOf(person.trials).forEach((t, j) => {
    const su = t.source_urls;
    let urls: unknown[] = [];
    if (Array.isArray(su)) {
      urls = su;
    } else if (typeof su === 'string') {
      urls = extractHttpsUrls(su);
    } else {
      findings.errors.push(
        `${at}/trials[${j}]: source_urls must be an array or string with https URLs`,
      );
    }
    const clean = urls
      .filter((u): u is string => typeof u === 'string')
      .map(canonicalize)
      .filter((u) => HTTPS_URL_RE.test(u));
    if (clean.length === 0) {
      findings.errors.push(`${at}/trials[${j}]: no valid https URLs in source_urls`);
    }
    t.source_urls = clean;
    if (typeof t.nct_id === 'string') t.nct_id = t.nct_id.toUpperCase();
  });
}

export function lintPerson(person: JsonObject, index: number, findings: Findings): void {
  const at = `person[${index}]/${personLabel(person, index)}`;
  const section = person.section;
  if (typeof section !== 'string' || !ALLOWED_SECTIONS.has(section)) {
    findings.errors.push(`${at}: invalid section '${String(section ?? '')}'`);
  }
  const summary = summaryWarning(at, countWhitespaceWords(person.summary_text));
  if (summary) findings.warnings.push(summary);
  lintEvidence(person, at, findings);
  lintContacts(person, at, findings);
  lintKeyLinks(person, at, findings);
  lintTrials(person, at, findings);
}

// ============================================================================
// Document
// ============================================================================

export function lintPeople(data: unknown): LintResult {
  const findings: Findings = { errors: [], warnings: [] };
  if (!isRecord(data)) {
    findings.errors.push('Top-level must be a JSON object');
    return { report: { status: 'fail', ...findings, people_count: 0 }, cleaned: null };
  }

  const cleaned: PeopleDocument = structuredClone(data);
  if (!Array.isArray(cleaned.people)) {
    findings.errors.push("Top-level 'people' must be an array");
  }
  const people: unknown[] = Array.isArray(cleaned.people) ? cleaned.people : [];

  people.forEach((person, idx) => {
    const i = idx + 1;
    if (!isRecord(person)) {
      findings.errors.push(`person[${i}]: must be an object`);
      return;
    }
    if (!Number.isInteger(person.original_order)) person.original_order = i;
    lintPerson(person, i, findings);
  });

  cleaned.people_count = people.length;
  const persons = people.filter(isRecord);
  if (!isContiguousOrder(persons.map((p) => p.original_order))) {
    persons.forEach((p, idx) => {
      p.original_order = idx + 1;
    });
  }

  const status: CheckStatus = findings.errors.length ? 'fail' : 'pass';
  return {
    report: { status, ...findings, people_count: people.length },
    cleaned: status === 'pass' ? cleaned : null,
  };
}

export interface TextLintResult extends LintResult {
  csv: string | null;
}

/** Parse raw generator text, lint it and render the CSV pivot on pass. */
export function lintPeopleText(raw: string, options: ParseTextOptions = {}): TextLintResult {
  let data: unknown;
  try {
    data = parsePeopleText(raw, options);
  } catch (err) {
    if (!(err instanceof PeopleParseError)) throw err;
    return {
      report: {
        status: 'fail',
        errors: [err.message, `around: ${err.snippet}`],
        warnings: [],
        people_count: 0,
      },
      cleaned: null,
      csv: null,
    };
  }
  const result = lintPeople(data);
  return { ...result, csv: result.cleaned ? peopleToCsv(result.cleaned.people) : null };
}
