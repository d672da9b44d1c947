// ============================================================================
// Standard Interceptors
// ============================================================================

import type { BeforeSendContext, RequestInterceptor } from './types';

// ============================================================================
// Payload Content-Type Interceptor
// ============================================================================

export interface PayloadContentTypeInterceptorOptions {
  defaultContentType?: string; // default: "text/plain"
}

const PAYLOAD_METHODS = new Set(['POST', 'PUT']);

/**
 * Creates an interceptor that guarantees POST and PUT requests carry a body
 * and a Content-Type. An absent body becomes an empty payload; an absent
 * Content-Type becomes `text/plain`.
 *
 * @example
 * ```typescript
 * const client = new EngineClient({
 *   endpoint,
 *   transport,
 *   interceptors: [createPayloadContentTypeInterceptor({ defaultContentType: 'application/octet-stream' })],
 * });
 * ```
 */
export function createPayloadContentTypeInterceptor(
  opts?: PayloadContentTypeInterceptorOptions,
): RequestInterceptor {
  const contentType = opts?.defaultContentType ?? 'text/plain';

  return {
    beforeSend: ({ request }: BeforeSendContext) => {
      if (!PAYLOAD_METHODS.has(request.method)) return;
      if (request.body === undefined) {
        request.body = new Uint8Array(0);
      }
      if (!request.headers['content-type']) {
        request.headers['content-type'] = [contentType];
      }
    },
  };
}

// ============================================================================
// User-Agent Override Interceptor
// ============================================================================

/**
 * Creates an interceptor that replaces the client's User-Agent. An empty
 * override strips the header; `undefined` leaves the request untouched.
 */
export function createUserAgentOverrideInterceptor(override: string | undefined): RequestInterceptor {
  return {
    beforeSend: ({ request }: BeforeSendContext) => {
      if (override === undefined) return;
      if (override === '') {
        delete request.headers['user-agent'];
      } else {
        request.headers['user-agent'] = [override];
      }
    },
  };
}
