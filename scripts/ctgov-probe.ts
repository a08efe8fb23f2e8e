/**
 * ClinicalTrials.gov reachability probe.
 *
 *   tsx scripts/ctgov-probe.ts [term]
 *
 * Calls the v2 and v1 APIs independently (no fallback) and prints what each
 * returned.
 */

import 'dotenv/config';
import { type ApiAttempt, CtgovClient } from '../services/ctgov/client';

const PAGE_SIZE = 20;
const SHOWN_IDS = 5;

function describeAttempt(attempt: ApiAttempt): string[] {
  const tag = `[${attempt.version}]`;
  const countLabel = attempt.version === 'v2' ? 'totalCount' : 'NStudiesFound';
  const lines = [`${tag} HTTP ${attempt.status}`];
  if (attempt.ok) {
    const ids = attempt.nctIds.slice(0, SHOWN_IDS);
    lines.push(`${tag} ${countLabel}=${attempt.totalCount ?? 'n/a'}, first IDs=${JSON.stringify(ids)}`);
  } else if (attempt.status === 0) {
    lines.push(`${tag} request failed: ${attempt.error ?? 'unknown error'}`);
  } else {
    lines.push(`${tag} body (truncated): ${attempt.bodyPreview}`);
  }
  return lines;
}

export async function probeCtgov(term: string, client: CtgovClient = new CtgovClient()): Promise<string[]> {
  const v2 = await client.queryV2(term, PAGE_SIZE);
  const v1 = await client.queryV1(term, PAGE_SIZE);
  return [`Query: ${term}`, '', ...describeAttempt(v2), '', ...describeAttempt(v1), '', 'Done.'];
}

/* c8 ignore start */
if (process.argv[1]?.endsWith('ctgov-probe.ts')) {
  probeCtgov(process.argv[2] || 'STXBP1')
    .then((lines) => {
      // eslint-disable-next-line no-console
      console.log(lines.join('\n'));
    })
    .catch((err) => {
      // eslint-disable-next-line no-console
      console.error(err);
      process.exit(1);
    });
}
/* c8 ignore stop */
