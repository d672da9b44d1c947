import { RequestBuildError } from './errors';
import type {
  EngineEndpoint,
  HeaderMap,
  HeaderOverlay,
  HttpMethod,
  PathBuilder,
  QueryParams,
  TransportRequest,
} from './types';

const HTTP_METHODS = new Set<string>(['HEAD', 'GET', 'POST', 'PUT', 'DELETE']);

// Origin used for unix sockets; the transport dials the socket path instead.
const UNIX_SOCKET_ORIGIN = 'http://localhost';

// encodeURIComponent escapes these, but RFC 3986 allows them in a path segment.
const SEGMENT_SAFE_ESCAPES = /%(24|26|2B|2C|3B|3D|3A|40)/g;

const encodeSegment = (segment: string): string =>
  encodeURIComponent(segment).replace(SEGMENT_SAFE_ESCAPES, (escape) => decodeURIComponent(escape));

const encodePath = (path: string): string => path.split('/').map(encodeSegment).join('/');

/**
 * Default request target: `<basePath>/v<apiVersion><path>?<query>`.
 * Query parameters keep insertion order; multi-valued keys repeat.
 */
export const buildApiPath: PathBuilder = (path, query, apiVersion, basePath = '') => {
  const versioned = apiVersion ? `${basePath}/v${apiVersion}${path}` : `${basePath}${path}`;
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(query ?? {})) {
    if (typeof value === 'string') {
      search.append(key, value);
    } else {
      for (const entry of value) {
        search.append(key, entry);
      }
    }
  }
  const encoded = encodePath(versioned);
  const qs = search.toString();
  return qs ? `${encoded}?${qs}` : encoded;
};

export function resolveOrigin(endpoint: EngineEndpoint): string {
  if (endpoint.protocol === 'unix') {
    return UNIX_SOCKET_ORIGIN;
  }
  let url: URL;
  try {
    url = new URL(`${endpoint.scheme}://${endpoint.address}`);
  } catch (error) {
    throw new RequestBuildError(`invalid daemon address "${endpoint.address}"`, { cause: error });
  }
  if (url.pathname !== '/' || url.search || url.hash) {
    throw new RequestBuildError(`invalid daemon address "${endpoint.address}"`);
  }
  return url.origin;
}

export function normalizeHeaders(source?: HeaderOverlay): HeaderMap {
  const result: HeaderMap = {};
  applyHeaders(result, source);
  return result;
}

/** Copies `source` over `target`; keys in `source` replace existing values. */
export function applyHeaders(target: HeaderMap, source?: HeaderOverlay): void {
  if (!source) return;
  for (const [name, value] of Object.entries(source)) {
    target[name.toLowerCase()] = typeof value === 'string' ? [value] : [...value];
  }
}

export interface BuildRequestInput {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  body?: Uint8Array;
  headers?: HeaderOverlay;
}

/**
 * Assembles a host- and scheme-qualified request. Client headers go first,
 * the caller's overlay is applied on top and may replace any of them.
 */
export function buildRequest(
  input: BuildRequestInput,
  endpoint: EngineEndpoint,
  options: { customHeaders?: HeaderOverlay; pathBuilder: PathBuilder },
): TransportRequest {
  if (!HTTP_METHODS.has(input.method)) {
    throw new RequestBuildError(`unsupported method "${input.method}"`);
  }
  if (!input.path.startsWith('/')) {
    throw new RequestBuildError(`request path must start with "/": "${input.path}"`);
  }

  const headers: HeaderMap = {};
  applyHeaders(headers, options.customHeaders);
  applyHeaders(headers, input.headers);

  return {
    method: input.method,
    origin: resolveOrigin(endpoint),
    path: options.pathBuilder(input.path, input.query, endpoint.apiVersion, endpoint.basePath),
    headers,
    body: input.body,
  };
}
