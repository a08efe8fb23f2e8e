import { peopleToCsv } from './csv';
import { precleanPeople } from './preclean';
import type { CheckStatus, PeopleDocument } from './types';
import { validatePeople } from './validate';

export interface EmitResult {
  status: CheckStatus;
  cleaned_json: PeopleDocument | null;
  csv_base64: string | null;
  errors: string[];
  warnings: string[];
}

export function encodeCsvBase64(csv: string): string {
  return Buffer.from(csv, 'utf-8').toString('base64');
}

/** Preclean, validate, and on pass attach the cleaned document and its CSV. */
export function emitPeopleJson(payload: PeopleDocument): EmitResult {
  const cleaned = precleanPeople(payload);
  const { errors, warnings } = validatePeople(cleaned);
  if (errors.length > 0) {
    return { status: 'fail', cleaned_json: null, csv_base64: null, errors, warnings };
  }
  return {
    status: 'pass',
    cleaned_json: cleaned,
    csv_base64: encodeCsvBase64(peopleToCsv(cleaned.people)),
    errors,
    warnings,
  };
}
