import { EngineClient } from './EngineClient';
import { loadEngineConfig } from './config';
import { HttpProxyUnlockProbe } from './proxyUnlock';
import { createUndiciTransport, readTlsMaterial, type TlsMaterial } from './transport/undiciTransport';
import type { EngineClientConfig, Logger } from './types';

export const DEFAULT_USER_AGENT = 'engine-client/0.1.0';

/**
 * Console logger implementation for use with createEngineClient.
 * Logs to console.debug, console.info, console.warn, and console.error.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: Record<string, unknown>): void {
    console.debug(message, meta);
  }
  info(message: string, meta?: Record<string, unknown>): void {
    console.info(message, meta);
  }
  warn(message: string, meta?: Record<string, unknown>): void {
    console.warn(message, meta);
  }
  error(message: string, meta?: Record<string, unknown>): void {
    console.error(message, meta);
  }
}

export type CreateEngineClientOptions = Omit<EngineClientConfig, 'transport'> &
  Partial<Pick<EngineClientConfig, 'transport'>> & {
    tls?: TlsMaterial;
  };

/**
 * Creates an EngineClient with the stock pieces filled in.
 *
 * Defaults applied:
 * - Transport: undici agent for the endpoint (unix socket, tcp or tls)
 * - Proxy unlock probe: plain requests through the environment proxy settings
 * - User-Agent: `engine-client/<version>`
 * - Logger: console logger
 *
 * @example
 * ```typescript
 * const client = createEngineClient({
 *   endpoint: { protocol: 'tcp', address: '127.0.0.1:2375', scheme: 'http', apiVersion: '1.24' },
 *   retries: 2,
 * });
 * const envelope = await client.get('/info');
 * ```
 */
export function createEngineClient(options: CreateEngineClientOptions): EngineClient {
  const { tls, ...config } = options;
  const logger = config.logger ?? new ConsoleLogger();
  return new EngineClient({
    ...config,
    transport: config.transport ?? createUndiciTransport({ endpoint: config.endpoint, tls }),
    proxyProbe: config.proxyProbe ?? new HttpProxyUnlockProbe({ logger }),
    userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
    logger,
  });
}

/**
 * Builds a client from `ENGINE_*` environment variables, loading TLS
 * material from `ENGINE_CERT_PATH` when set.
 */
export async function createEngineClientFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<CreateEngineClientOptions> = {},
): Promise<EngineClient> {
  const config = loadEngineConfig(env);
  const tls =
    config.endpoint.scheme === 'https'
      ? config.certPath
        ? await readTlsMaterial(config.certPath, config.tlsVerify)
        : { rejectUnauthorized: config.tlsVerify }
      : undefined;

  return createEngineClient({
    endpoint: config.endpoint,
    retries: config.retries,
    userAgentOverride: config.userAgentOverride,
    tls,
    ...overrides,
  });
}
