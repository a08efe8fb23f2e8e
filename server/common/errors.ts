/** An error that carries the HTTP status the error handler should answer with. */
export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

const ERROR_CODES: Record<number, string> = {
  400: 'invalid_input',
  401: 'unauthorized',
  404: 'not_found',
  413: 'payload_too_large',
  415: 'unsupported_media_type',
  429: 'rate_limited',
};

/** Wire error code for a client-error status; anything else is internal. */
export function errorCodeFor(statusCode: number): string {
  return ERROR_CODES[statusCode] ?? (statusCode < 500 ? 'bad_request' : 'internal_error');
}
