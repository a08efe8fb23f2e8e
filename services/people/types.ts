/**
 * People document shapes as produced by the generator.
 *
 * Input arrives as arbitrary JSON, so every field is optional and every
 * record keeps unknown keys. Cleaning code narrows with the guards below
 * instead of trusting these types.
 */

export type JsonObject = Record<string, unknown>;

export type ContactType = 'email' | 'phone' | 'page';

export interface Contact extends JsonObject {
  label?: unknown;
  type?: unknown;
  url?: unknown;
  verified_date?: unknown;
}

export interface CleanContact {
  label: unknown;
  type: ContactType;
  url: string;
  verified_date: unknown;
}

export interface KeyLink extends JsonObject {
  label?: unknown;
  url?: unknown;
}

export interface Evidence extends JsonObject {
  tag?: unknown;
  canonical_url?: unknown;
  pdf_url?: unknown;
}

export interface Trial extends JsonObject {
  nct_id?: unknown;
  source_urls?: unknown;
}

export interface Affiliation extends JsonObject {
  name?: unknown;
  country?: unknown;
  type?: unknown;
}

export interface Person extends JsonObject {
  id?: unknown;
  full_name?: unknown;
  section?: unknown;
  role?: unknown;
  summary_text?: unknown;
  original_order?: unknown;
  pins?: unknown;
  score_breakdown?: unknown;
  affiliations?: unknown;
  contacts?: unknown;
  evidence?: unknown;
  trials?: unknown;
  key_links?: unknown;
}

export interface PeopleDocument extends JsonObject {
  people?: unknown;
  people_count?: unknown;
}

export type CheckStatus = 'pass' | 'fail';

export interface Findings {
  errors: string[];
  warnings: string[];
}

// ============================================================================
// Guards
// ============================================================================

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Object entries of an array field; anything else yields []. */
export function recordsOf(value: unknown): JsonObject[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

export function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/** Label used in findings: the person id, or `?<index>` when absent. */
export function personLabel(person: JsonObject, index: number): string {
  const id = person.id;
  if (typeof id === 'string' && id) return id;
  if (typeof id === 'number') return String(id);
  return `?${index}`;
}
