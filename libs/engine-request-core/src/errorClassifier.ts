import { STATUS_CODES } from 'node:http';
import type { ClassifiedFailure, ErrorClassifier, ErrorClassifierContext } from './types';

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const TIMEOUT_NAMES = new Set(['TimeoutError', 'ConnectTimeoutError', 'HeadersTimeoutError', 'BodyTimeoutError']);

const BAD_CERTIFICATE_CODES = new Set([
  'ERR_SSL_SSLV3_ALERT_BAD_CERTIFICATE',
  'ERR_SSL_TLSV13_ALERT_CERTIFICATE_REQUIRED',
]);

interface ErrorFacts {
  names: string[];
  codes: string[];
  syscalls: string[];
  messages: string[];
}

const readString = (value: object, key: string): string | undefined => {
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
};

/**
 * Flattens an error and its `cause` chain. Node and undici report the same
 * failure at different depths depending on where it was raised.
 */
function collectFacts(error: unknown): ErrorFacts {
  const facts: ErrorFacts = { names: [], codes: [], syscalls: [], messages: [] };
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current !== undefined && current !== null; depth += 1) {
    if (typeof current !== 'object') {
      facts.messages.push(String(current));
      break;
    }
    const name = readString(current, 'name');
    const code = readString(current, 'code');
    const syscall = readString(current, 'syscall');
    const message = readString(current, 'message');
    if (name) facts.names.push(name);
    if (code) facts.codes.push(code);
    if (syscall) facts.syscalls.push(syscall);
    if (message) facts.messages.push(message.toLowerCase());
    current = Reflect.get(current, 'cause');
  }
  return facts;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export function isTimeout(error: unknown): boolean {
  const facts = collectFacts(error);
  return facts.codes.some((code) => TIMEOUT_CODES.has(code)) || facts.names.some((name) => TIMEOUT_NAMES.has(name));
}

function isConnectionFailure(facts: ErrorFacts): boolean {
  if (facts.codes.includes('ECONNREFUSED')) return true;
  if (facts.messages.some((m) => m.includes('connection refused') || m.includes('dial unix'))) return true;
  // A missing or unreadable unix socket fails in connect().
  return (
    facts.syscalls.includes('connect') && facts.codes.some((code) => code === 'ENOENT' || code === 'EACCES')
  );
}

function isMalformedResponse(facts: ErrorFacts): boolean {
  return (
    facts.names.includes('HTTPParserError') ||
    facts.codes.some((code) => code.startsWith('HPE_')) ||
    facts.messages.some((m) => m.includes('malformed http response'))
  );
}

function isBadCertificate(facts: ErrorFacts): boolean {
  return (
    facts.codes.some((code) => BAD_CERTIFICATE_CODES.has(code)) ||
    facts.messages.some((m) => m.includes('bad certificate'))
  );
}

export const statusText = (status: number): string => STATUS_CODES[status] ?? `status ${status}`;

/**
 * Maps a transport failure or a failing daemon response onto an error kind
 * with a message an operator can act on.
 */
export class DefaultErrorClassifier implements ErrorClassifier {
  classify(ctx: ErrorClassifierContext): ClassifiedFailure {
    if (ctx.error !== undefined) {
      return this.classifyTransportError(ctx);
    }
    return this.classifyStatus(ctx);
  }

  private classifyTransportError(ctx: ErrorClassifierContext): ClassifiedFailure {
    const facts = collectFacts(ctx.error);
    const detail = errorMessage(ctx.error);

    if (isTimeout(ctx.error) || isConnectionFailure(facts)) {
      return {
        kind: 'connection_failed',
        message: `Cannot connect to the daemon at ${ctx.address}. Is the daemon running on this host?`,
      };
    }
    if (ctx.scheme === 'http' && isMalformedResponse(facts)) {
      return {
        kind: 'tls_mismatch',
        message: `${detail}.\n* Are you trying to connect to a TLS-enabled daemon without TLS?`,
      };
    }
    if (ctx.scheme === 'https' && isBadCertificate(facts)) {
      return {
        kind: 'client_cert_rejected',
        message:
          'The server probably has client authentication (--tlsverify) enabled. ' +
          `Please check your TLS client certification settings: ${detail}`,
      };
    }
    return {
      kind: 'transport',
      message: `An error occurred trying to connect: ${detail}`,
    };
  }

  private classifyStatus(ctx: ErrorClassifierContext): ClassifiedFailure {
    const body = (ctx.body ?? '').trim();
    if (!body) {
      return {
        kind: 'empty_error_status',
        message:
          `Error: request returned ${statusText(ctx.statusCode)} for API route and version ${ctx.url}, ` +
          'check if the server supports the requested API version',
      };
    }
    return { kind: 'daemon_error', message: body };
  }
}
