import type { Readable } from 'node:stream';

export type HttpMethod = 'HEAD' | 'GET' | 'POST' | 'PUT' | 'DELETE';

export type HttpScheme = 'http' | 'https';

export type EngineProtocol = 'tcp' | 'unix';

/**
 * Header names are lower-cased; values keep arrival order.
 */
export type HeaderMap = Record<string, string[]>;

export type HeaderOverlay = Record<string, string | readonly string[]>;

export type QueryParams = Record<string, string | readonly string[]>;

export type RequestBody = string | Uint8Array | Readable | AsyncIterable<Uint8Array>;

/**
 * Where the daemon lives. `address` is `host:port` for tcp and the socket
 * path for unix.
 */
export interface EngineEndpoint {
  protocol: EngineProtocol;
  address: string;
  scheme: HttpScheme;
  apiVersion: string;
  basePath?: string;
}

export interface DispatchRequest {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  body?: RequestBody;
  headers?: HeaderOverlay;
  signal?: AbortSignal;
}

/**
 * Normalized result of a dispatch. `statusCode` is -1 until a response
 * arrives. The body stream is open and belongs to the caller.
 */
export interface ResponseEnvelope {
  body?: Readable;
  headers: HeaderMap;
  statusCode: number;
}

export interface TransportRequest {
  method: HttpMethod;
  origin: string;
  path: string;
  headers: HeaderMap;
  body?: Uint8Array;
}

export interface TransportResponse {
  status: number;
  headers: HeaderMap;
  body: Readable;
}

export interface EngineTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<TransportResponse>;
  close?: () => Promise<void>;
}

export type PathBuilder = (
  path: string,
  query: QueryParams | undefined,
  apiVersion: string,
  basePath?: string,
) => string;

export type ErrorKind =
  | 'connection_failed'
  | 'tls_mismatch'
  | 'client_cert_rejected'
  | 'daemon_error'
  | 'empty_error_status'
  | 'transport';

export interface ClassifiedFailure {
  kind: ErrorKind;
  message: string;
}

export interface ErrorClassifierContext {
  method: HttpMethod;
  url: string;
  scheme: HttpScheme;
  address: string;
  statusCode: number;
  /** Set when the transport itself failed. */
  error?: unknown;
  /** Body text of a failing response. */
  body?: string;
}

export interface ErrorClassifier {
  classify(ctx: ErrorClassifierContext): ClassifiedFailure;
}

export interface ProxyProbeTarget {
  protocol: EngineProtocol;
  scheme: HttpScheme;
  address: string;
  apiVersion: string;
}

export interface ProxyUnlockProbe {
  /** Resolves true when an unlock call was made. Never rejects. */
  unlock(target: ProxyProbeTarget): Promise<boolean>;
  close?(): Promise<void>;
}

export interface BeforeSendContext {
  request: TransportRequest;
  attempt: number;
}

export interface RequestInterceptor {
  beforeSend?: (ctx: BeforeSendContext) => void | Promise<void>;
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

export interface EngineClientConfig {
  endpoint: EngineEndpoint;
  transport: EngineTransport;
  /** Extra attempts after the first for proxy-related failures. */
  retries?: number;
  retryDelayMs?: number;
  customHeaders?: HeaderOverlay;
  /** Client default User-Agent, applied as a persistent header. */
  userAgent?: string;
  /** `undefined` keeps the default, `''` removes the header. */
  userAgentOverride?: string;
  interceptors?: RequestInterceptor[];
  errorClassifier?: ErrorClassifier;
  proxyProbe?: ProxyUnlockProbe;
  pathBuilder?: PathBuilder;
  logger?: Logger;
  sleep?: Sleeper;
}
