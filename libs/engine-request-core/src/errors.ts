import type { ErrorKind, HttpMethod, ResponseEnvelope } from './types';

export const NO_RESPONSE_STATUS = -1;

/**
 * Failure of a dispatch attempt. The retry loop only looks at `statusCode`;
 * `kind` is for callers that want to react to the failure mode.
 */
export class EngineRequestError extends Error {
  kind: ErrorKind;
  statusCode: number;
  envelope: ResponseEnvelope;
  method: HttpMethod;
  url: string;

  constructor(
    message: string,
    options: {
      kind: ErrorKind;
      envelope: ResponseEnvelope;
      method: HttpMethod;
      url: string;
      cause?: unknown;
    },
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'EngineRequestError';
    this.kind = options.kind;
    this.envelope = options.envelope;
    this.statusCode = options.envelope.statusCode;
    this.method = options.method;
    this.url = options.url;
  }
}

export class RequestBuildError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RequestBuildError';
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class EngineConfigError extends Error {
  issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = []) {
    super(message);
    this.name = 'EngineConfigError';
    this.issues = issues;
  }
}
