import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { Agent, request, type Dispatcher } from 'undici';
import type { EngineEndpoint, EngineTransport, HeaderMap, TransportRequest, TransportResponse } from '../types';

export interface TlsMaterial {
  ca?: string;
  cert?: string;
  key?: string;
  rejectUnauthorized?: boolean;
}

export interface UndiciTransportOptions {
  endpoint: Pick<EngineEndpoint, 'protocol' | 'address' | 'scheme'>;
  tls?: TlsMaterial;
  /** Bring your own dispatcher; it is not closed by the transport. */
  dispatcher?: Dispatcher;
}

export function toHeaderMap(headers: Record<string, string | string[] | undefined>): HeaderMap {
  const result: HeaderMap = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    result[name.toLowerCase()] = Array.isArray(value) ? [...value] : [value];
  }
  return result;
}

// undici takes repeated headers as a flat [name, value, name, value] list.
export function toRawHeaders(headers: HeaderMap): string[] {
  const raw: string[] = [];
  for (const [name, values] of Object.entries(headers)) {
    for (const value of values) {
      raw.push(name, value);
    }
  }
  return raw;
}

export function createAgent(options: UndiciTransportOptions): Agent {
  const { endpoint, tls } = options;
  if (endpoint.protocol === 'unix') {
    return new Agent({ connect: { socketPath: endpoint.address } });
  }
  if (endpoint.scheme === 'https' && tls) {
    return new Agent({
      connect: {
        ca: tls.ca,
        cert: tls.cert,
        key: tls.key,
        rejectUnauthorized: tls.rejectUnauthorized ?? true,
      },
    });
  }
  return new Agent();
}

/**
 * undici-based transport for TCP, TLS and unix socket daemons. Bodies are
 * handed back unread.
 */
export function createUndiciTransport(options: UndiciTransportOptions): EngineTransport {
  const ownsDispatcher = options.dispatcher === undefined;
  const dispatcher = options.dispatcher ?? createAgent(options);

  const transport: EngineTransport = async (req: TransportRequest, signal: AbortSignal): Promise<TransportResponse> => {
    const response = await request(`${req.origin}${req.path}`, {
      method: req.method,
      headers: toRawHeaders(req.headers),
      body: req.body,
      signal,
      dispatcher,
    });

    return {
      status: response.statusCode,
      headers: toHeaderMap(response.headers),
      body: response.body,
    };
  };

  transport.close = async () => {
    if (ownsDispatcher) {
      await dispatcher.close();
    }
  };

  return transport;
}

const readOptional = async (file: string): Promise<string | undefined> => {
  try {
    return await readFile(file, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
};

/**
 * Loads `ca.pem`, `cert.pem` and `key.pem` from a directory. Missing files
 * are left undefined.
 */
export async function readTlsMaterial(dir: string, rejectUnauthorized = true): Promise<TlsMaterial> {
  const [ca, cert, key] = await Promise.all([
    readOptional(path.join(dir, 'ca.pem')),
    readOptional(path.join(dir, 'cert.pem')),
    readOptional(path.join(dir, 'key.pem')),
  ]);
  return { ca, cert, key, rejectUnauthorized };
}
