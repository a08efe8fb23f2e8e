import {
  type CleanContact,
  type JsonObject,
  type PeopleDocument,
  isRecord,
  recordsOf,
} from './types';
import {
  EMAIL_RE,
  ctgovStudyUrl,
  extractHttpsUrls,
  findNctId,
  isPreprintHost,
  preprintToDoi,
  purifyUrl,
} from './urls';

/**
 * Field-aware preclean used by the emit action. Keeps only plain https
 * tokens in URL fields, repairs contacts and fills ClinicalTrials.gov
 * source URLs. Mutates and returns `doc`.
 */
export function precleanPeople(doc: PeopleDocument): PeopleDocument {
  const people: unknown[] = Array.isArray(doc.people) ? doc.people : [];
  for (const person of people) {
    if (!isRecord(person)) continue;
    if (Array.isArray(person.key_links) && person.key_links.length > 0) {
      person.key_links = cleanKeyLinks(person.key_links);
    }
    person.contacts = cleanContacts(person.contacts);
    person.evidence = cleanEvidence(person.evidence);
    person.trials = cleanTrials(person.trials);
  }
  doc.people = people;
  return doc;
}

export function cleanKeyLinks(links: unknown): JsonObject[] {
  const out: JsonObject[] = [];
  for (const link of recordsOf(links)) {
    const url = purifyUrl(link.url);
    if (url) out.push({ label: link.label ?? null, url });
  }
  return out;
}

export function cleanContacts(contacts: unknown): CleanContact[] {
  const out: CleanContact[] = [];
  for (const c of recordsOf(contacts)) {
    const label = c.label ?? null;
    const verified_date = c.verified_date ?? null;
    const url = c.url;
    if (c.type === 'email' && typeof url === 'string' && url.startsWith('mailto:')) {
      if (EMAIL_RE.test(url.slice('mailto:'.length))) {
        out.push({ label, type: 'email', url, verified_date });
      }
      continue;
    }
    if (c.type === 'phone' && typeof url === 'string' && url.startsWith('tel:')) {
      out.push({ label, type: 'phone', url, verified_date });
      continue;
    }
    const page = purifyUrl(url);
    if (page) out.push({ label, type: 'page', url: page, verified_date });
  }
  return out;
}

export function cleanEvidence(evidence: unknown): JsonObject[] {
  const out: JsonObject[] = [];
  for (const e of recordsOf(evidence)) {
    let canonical = purifyUrl(e.canonical_url);
    if (!canonical) continue;
    if (isPreprintHost(canonical)) canonical = preprintToDoi(canonical);
    const cleaned: JsonObject = { ...e, canonical_url: canonical };
    const pdf = e.pdf_url ? purifyUrl(e.pdf_url) : null;
    if (pdf) cleaned.pdf_url = pdf;
    out.push(cleaned);
  }
  return out;
}

export function cleanTrials(trials: unknown): JsonObject[] {
  return recordsOf(trials).map((t) => {
    const cleaned: JsonObject = { ...t };
    const sources = sourceUrlsOf(t.source_urls);
    let nct = typeof t.nct_id === 'string' && t.nct_id ? t.nct_id : null;
    if (!nct) {
      for (const u of sources) {
        nct = findNctId(u);
        if (nct) break;
      }
    }
    if (nct) cleaned.nct_id = nct;
    const purified = sources.map((u) => purifyUrl(u)).filter((u): u is string => Boolean(u));
    cleaned.source_urls = purified.length ? purified : nct ? [ctgovStudyUrl(nct)] : [];
    return cleaned;
  });
}

/** source_urls may arrive as an array of strings or one string of URLs. */
export function sourceUrlsOf(value: unknown): string[] {
  if (Array.isArray(value)) return value.filter((u): u is string => typeof u === 'string');
  if (typeof value === 'string') return extractHttpsUrls(value);
  return [];
}
