import { buffer, text } from 'node:stream/consumers';
import { setTimeout as sleep } from 'timers/promises';
import { DefaultErrorClassifier } from './errorClassifier';
import { emptyEnvelope, isSuccessStatus } from './envelope';
import { EngineRequestError, NO_RESPONSE_STATUS } from './errors';
import { createPayloadContentTypeInterceptor, createUserAgentOverrideInterceptor } from './interceptors';
import { buildApiPath, buildRequest } from './requestBuilder';
import type {
  DispatchRequest,
  EngineClientConfig,
  EngineEndpoint,
  EngineTransport,
  ErrorClassifier,
  HeaderOverlay,
  HttpMethod,
  Logger,
  PathBuilder,
  ProxyUnlockProbe,
  QueryParams,
  RequestBody,
  RequestInterceptor,
  ResponseEnvelope,
  Sleeper,
  TransportRequest,
  TransportResponse,
} from './types';

const DEFAULT_RETRY_DELAY_MS = 1_000;

// Statuses an intercepting proxy produces while it waits to be unlocked.
const PROXY_RETRY_STATUSES = new Set([407, 403, NO_RESPONSE_STATUS]);

const defaultSleep: Sleeper = (ms, signal) => sleep(ms, undefined, { signal });

interface PreparedDispatch {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  body?: Uint8Array;
  headers?: HeaderOverlay;
  signal?: AbortSignal;
}

async function bufferBody(body: RequestBody | undefined): Promise<Uint8Array | undefined> {
  if (body === undefined) return undefined;
  if (typeof body === 'string') return Buffer.from(body, 'utf8');
  if (body instanceof Uint8Array) return body;
  return buffer(body);
}

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

// Anything but a finite non-negative number means no retries.
const normalizeRetries = (retries: number | undefined): number =>
  retries !== undefined && Number.isFinite(retries) && retries >= 0 ? Math.floor(retries) : 0;

/**
 * Request dispatcher for the daemon API.
 *
 * Each dispatch is a chain of sequential attempts. Only the failures an
 * intercepting proxy causes (403, 407 and "no response") are retried, with a
 * proxy unlock call and a fixed delay before the next attempt; everything
 * else is returned on the first failure.
 */
export class EngineClient {
  private readonly endpoint: EngineEndpoint;
  private readonly transport: EngineTransport;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly customHeaders: HeaderOverlay;
  private readonly interceptors: RequestInterceptor[];
  private readonly errorClassifier: ErrorClassifier;
  private readonly proxyProbe?: ProxyUnlockProbe;
  private readonly pathBuilder: PathBuilder;
  private readonly logger?: Logger;
  private readonly sleep: Sleeper;

  constructor(config: EngineClientConfig) {
    this.endpoint = config.endpoint;
    this.transport = config.transport;
    this.retries = normalizeRetries(config.retries);
    this.retryDelayMs = config.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.customHeaders =
      config.userAgent === undefined
        ? { ...config.customHeaders }
        : { 'User-Agent': config.userAgent, ...config.customHeaders };
    this.interceptors = [
      createPayloadContentTypeInterceptor(),
      createUserAgentOverrideInterceptor(config.userAgentOverride),
      ...(config.interceptors ?? []),
    ];
    this.errorClassifier = config.errorClassifier ?? new DefaultErrorClassifier();
    this.proxyProbe = config.proxyProbe;
    this.pathBuilder = config.pathBuilder ?? buildApiPath;
    this.logger = config.logger;
    this.sleep = config.sleep ?? defaultSleep;
  }

  head(path: string, query?: QueryParams, headers?: HeaderOverlay): Promise<ResponseEnvelope> {
    return this.dispatch({ method: 'HEAD', path, query, headers });
  }

  get(path: string, query?: QueryParams, headers?: HeaderOverlay): Promise<ResponseEnvelope> {
    return this.dispatch({ method: 'GET', path, query, headers });
  }

  /** JSON-encodes `body` and sends it with `Content-Type: application/json`. */
  post(path: string, query?: QueryParams, body?: unknown, headers?: HeaderOverlay): Promise<ResponseEnvelope> {
    return this.dispatchJson('POST', path, query, body, headers);
  }

  postRaw(path: string, query?: QueryParams, body?: RequestBody, headers?: HeaderOverlay): Promise<ResponseEnvelope> {
    return this.dispatch({ method: 'POST', path, query, body, headers });
  }

  put(path: string, query?: QueryParams, body?: unknown, headers?: HeaderOverlay): Promise<ResponseEnvelope> {
    return this.dispatchJson('PUT', path, query, body, headers);
  }

  putRaw(path: string, query?: QueryParams, body?: RequestBody, headers?: HeaderOverlay): Promise<ResponseEnvelope> {
    return this.dispatch({ method: 'PUT', path, query, body, headers });
  }

  delete(path: string, query?: QueryParams, headers?: HeaderOverlay): Promise<ResponseEnvelope> {
    return this.dispatch({ method: 'DELETE', path, query, headers });
  }

  /**
   * Sends a request, retrying proxy-related failures up to the configured
   * budget. Rejects with the last attempt's error.
   */
  async dispatch(request: DispatchRequest): Promise<ResponseEnvelope> {
    const prepared: PreparedDispatch = { ...request, body: await bufferBody(request.body) };
    const maxAttempts = this.retries + 1;
    let lastError: unknown = new Error('no requests made');

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        return await this.sendOnce(prepared, attempt, maxAttempts);
      } catch (error) {
        lastError = error;
        if (!(error instanceof EngineRequestError) || prepared.signal?.aborted) {
          throw error;
        }

        const logMeta = { ...this.baseLogMeta(prepared), attempt, maxAttempts, statusCode: error.statusCode };
        this.logger?.debug('engine.request.failed', { ...logMeta, kind: error.kind, error: error.message });

        if (!PROXY_RETRY_STATUSES.has(error.statusCode)) {
          this.logger?.debug('engine.request.not_retryable', logMeta);
          throw error;
        }
        if (attempt === maxAttempts) {
          break;
        }

        await this.tryProxyUnlock();
        this.logger?.debug('engine.request.retry', { ...logMeta, delayMs: this.retryDelayMs });
        try {
          await this.sleep(this.retryDelayMs, prepared.signal);
        } catch (sleepError) {
          // Aborted during the backoff: the caller gets the failure that caused it.
          if (prepared.signal?.aborted) {
            this.logger?.debug('engine.request.aborted', logMeta);
            throw error;
          }
          throw sleepError;
        }
      }
    }

    throw lastError;
  }

  async close(): Promise<void> {
    await this.transport.close?.();
    await this.proxyProbe?.close?.();
  }

  private dispatchJson(
    method: HttpMethod,
    path: string,
    query: QueryParams | undefined,
    body: unknown,
    headers: HeaderOverlay | undefined,
  ): Promise<ResponseEnvelope> {
    if (body === undefined) {
      return this.dispatch({ method, path, query, headers });
    }
    return this.dispatch({
      method,
      path,
      query,
      body: `${JSON.stringify(body)}\n`,
      headers: { ...headers, 'Content-Type': 'application/json' },
    });
  }

  private async sendOnce(prepared: PreparedDispatch, attempt: number, maxAttempts: number): Promise<ResponseEnvelope> {
    const request = buildRequest(prepared, this.endpoint, {
      customHeaders: this.customHeaders,
      pathBuilder: this.pathBuilder,
    });
    await this.applyBeforeSendInterceptors(request, attempt);

    const url = `${request.origin}${request.path}`;
    this.logger?.debug('engine.request.attempt', { ...this.baseLogMeta(prepared), url, attempt, maxAttempts });

    const signal = prepared.signal ?? new AbortController().signal;
    let response: TransportResponse;
    try {
      response = await this.transport(request, signal);
    } catch (error) {
      const classified = this.errorClassifier.classify({
        method: request.method,
        url,
        scheme: this.endpoint.scheme,
        address: this.endpoint.address,
        statusCode: NO_RESPONSE_STATUS,
        error,
      });
      throw new EngineRequestError(classified.message, {
        kind: classified.kind,
        envelope: emptyEnvelope(),
        method: request.method,
        url,
        cause: error,
      });
    }

    const envelope: ResponseEnvelope = {
      body: undefined,
      headers: response.headers,
      statusCode: response.status,
    };

    if (!isSuccessStatus(response.status)) {
      let body: string;
      try {
        body = await text(response.body);
      } catch (error) {
        throw new EngineRequestError(`An error occurred reading the daemon response: ${describeError(error)}`, {
          kind: 'transport',
          envelope,
          method: request.method,
          url,
          cause: error,
        });
      }
      const classified = this.errorClassifier.classify({
        method: request.method,
        url,
        scheme: this.endpoint.scheme,
        address: this.endpoint.address,
        statusCode: response.status,
        body,
      });
      throw new EngineRequestError(classified.message, {
        kind: classified.kind,
        envelope,
        method: request.method,
        url,
      });
    }

    this.logger?.debug('engine.request.success', {
      ...this.baseLogMeta(prepared),
      url,
      attempt,
      statusCode: response.status,
    });
    return { ...envelope, body: response.body };
  }

  private async applyBeforeSendInterceptors(request: TransportRequest, attempt: number): Promise<void> {
    for (const interceptor of this.interceptors) {
      await interceptor.beforeSend?.({ request, attempt });
    }
  }

  private async tryProxyUnlock(): Promise<void> {
    if (!this.proxyProbe) return;
    try {
      await this.proxyProbe.unlock({
        protocol: this.endpoint.protocol,
        scheme: this.endpoint.scheme,
        address: this.endpoint.address,
        apiVersion: this.endpoint.apiVersion,
      });
    } catch (error) {
      this.logger?.warn('engine.proxy.failed', { error: describeError(error) });
    }
  }

  private baseLogMeta(request: Pick<PreparedDispatch, 'method' | 'path'>) {
    return {
      method: request.method,
      path: request.path,
      address: this.endpoint.address,
    };
  }
}
