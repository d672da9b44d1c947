import { NO_RESPONSE_STATUS } from './errors';
import type { HeaderMap, ResponseEnvelope } from './types';

export const emptyEnvelope = (): ResponseEnvelope => ({
  body: undefined,
  headers: {},
  statusCode: NO_RESPONSE_STATUS,
});

export const isSuccessStatus = (status: number): boolean => status >= 200 && status < 400;

/**
 * Releases the body stream of an envelope. Safe to call more than once and on
 * envelopes that never carried a body.
 */
export function releaseEnvelope(envelope: ResponseEnvelope | undefined): void {
  const body = envelope?.body;
  if (body && !body.destroyed) {
    body.destroy();
  }
}

/** First value of a header, looked up case-insensitively. */
export function headerValue(headers: HeaderMap, name: string): string | undefined {
  return headers[name.toLowerCase()]?.[0];
}
