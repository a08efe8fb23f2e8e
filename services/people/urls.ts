/**
 * URL hygiene for generator output.
 *
 * There are two purifiers. `purifyUrl` is the lenient
 * extractor used by the HTTP actions (pull the last https token out of any
 * debris), `purifyLink` is the strict linter's canonicalizer (keep the URL,
 * drop tracking parameters and fragments).
 */

const HTTPS_TOKEN_RE = /https:\/\/[^\s[\]()"]+/g;
const NCT_RE = /NCT\d{8}/;
const CTGOV_SHOW_RE = /^https:\/\/clinicaltrials\.gov\/ct2\/show\/(NCT[0-9]{8})$/i;
const PREPRINT_CONTENT_RE =
  /https?:\/\/(?:www\.)?(?:bio|med)rxiv\.org\/content\/(10\.1101\/[^\/\s#?]+?)(?:v\d+)?(?:\.full(?:\.pdf)?)?(?=$|[\/?#\s])/i;
const URL_PARTS_RE = /^(https:\/\/[^\/?#]*)([^?#]*)(?:\?([^#]*))?(?:#.*)?$/;

/** Markers that make the action purifier cut query and fragment. */
const TRACKING_MARKERS = ['utm_', 'gclid', 'fbclid', '#:~:text='];

/** Query keys (lowercased prefix match) dropped by the linter purifier. */
const TRACKING_PARAM_PREFIXES = ['utm_', 'gclid', 'fbclid', 'mc_cid', 'mc_eid', 'igshid', 'ref'];

export const HTTPS_URL_RE = /^https:\/\/[^\s[\]()]+$/;
export const EMAIL_RE = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

export function extractHttpsUrls(text: unknown): string[] {
  if (typeof text !== 'string') return [];
  return text.match(HTTPS_TOKEN_RE) ?? [];
}

export function lastHttpsToken(text: unknown): string | null {
  const matches = extractHttpsUrls(text);
  return matches.length ? (matches[matches.length - 1] ?? null) : null;
}

export function findNctId(text: unknown): string | null {
  if (typeof text !== 'string') return null;
  return NCT_RE.exec(text)?.[0] ?? null;
}

export function ctgovStudyUrl(nctId: string): string {
  return `https://clinicaltrials.gov/study/${nctId}`;
}

/**
 * Lenient purifier: keeps only the last plain https token, strips query and
 * fragment when they carry tracking markers and rewrites legacy
 * ClinicalTrials.gov `/ct2/show/` paths to `/study/`.
 */
export function purifyUrl(text: unknown): string | null {
  let token = lastHttpsToken(text);
  if (!token) return null;
  for (const marker of TRACKING_MARKERS) {
    if (token.includes(marker)) {
      token = (token.split('?')[0] ?? '').split('#')[0] ?? '';
    }
  }
  return token.replaceAll('/ct2/show/', '/study/');
}

/**
 * Strict purifier: upgrades http to https, drops tracking query keys and
 * the fragment, and trims markdown closers. Non-https input is returned
 * unchanged.
 */
export function purifyLink(url: string): string {
  let u = url;
  if (u.startsWith('http://')) u = `https://${u.slice('http://'.length)}`;
  if (!u.startsWith('https://')) return u;
  const parts = URL_PARTS_RE.exec(u);
  if (!parts) return u;
  const [, origin = '', path = '', query = ''] = parts;
  const kept = query
    .split('&')
    .filter(Boolean)
    .filter((pair) => {
      const key = (pair.split('=')[0] ?? '').toLowerCase();
      return !TRACKING_PARAM_PREFIXES.some((prefix) => key.startsWith(prefix));
    });
  const purified = `${origin}${path}${kept.length ? `?${kept.join('&')}` : ''}`;
  return purified.replace(/[)\]]+$/, '');
}

export function normalizeCtgovUrl(url: string): string {
  const nctId = CTGOV_SHOW_RE.exec(url)?.[1];
  return nctId ? ctgovStudyUrl(nctId) : url;
}

/** bioRxiv/medRxiv content URL → DOI landing page, version suffix dropped. */
export function preprintToDoi(url: string): string {
  const m = PREPRINT_CONTENT_RE.exec(url);
  return m?.[1] ? `https://doi.org/${m[1]}` : url;
}

export function isPreprintHost(url: string): boolean {
  return url.includes('medrxiv.org') || url.includes('biorxiv.org');
}
