import { type JsonObject, isRecord, recordsOf } from './types';

export const CSV_HEADERS = [
  'full_name',
  'section',
  'role',
  'primary_affiliation',
  'country',
  'pins',
  'score_total',
  'contact_labels',
  'trial_ncts',
] as const;

function cell(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function joinCells(values: unknown[]): string {
  return values.map(cell).join(';');
}

function primaryAffiliation(person: JsonObject): JsonObject | undefined {
  const affiliations = recordsOf(person.affiliations);
  return affiliations.find((a) => a.type === 'Primary') ?? affiliations[0];
}

export function personRow(person: JsonObject): string[] {
  const affiliation = primaryAffiliation(person);
  const score = isRecord(person.score_breakdown) ? person.score_breakdown.total : undefined;
  return [
    cell(person.full_name),
    cell(person.section),
    cell(person.role),
    cell(affiliation?.name),
    cell(affiliation?.country),
    Array.isArray(person.pins) ? joinCells(person.pins) : '',
    cell(score),
    joinCells(recordsOf(person.contacts).map((c) => c.label)),
    joinCells(recordsOf(person.trials).map((t) => t.nct_id)),
  ];
}

/** One header row plus one row per person, CRLF-terminated. */
export function peopleToCsv(people: unknown): string {
  const rows: string[][] = [[...CSV_HEADERS], ...recordsOf(people).map(personRow)];
  return rows.map((row) => `${row.map(escapeCsvField).join(',')}\r\n`).join('');
}
