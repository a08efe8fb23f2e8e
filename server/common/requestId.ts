import { randomUUID } from 'crypto';
import type { IncomingHttpHeaders } from 'http';

export const REQUEST_ID_HEADER = 'x-request-id';

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Reuses a caller-supplied x-request-id (first value when repeated) or
 * mints a UUID. Oversized or blank ids are replaced.
 */
export function resolveRequestId(headers: IncomingHttpHeaders): string {
  const raw = headers[REQUEST_ID_HEADER];
  const existing = (Array.isArray(raw) ? raw[0] : raw)?.trim();
  if (existing && existing.length <= MAX_REQUEST_ID_LENGTH) return existing;
  return randomUUID();
}
