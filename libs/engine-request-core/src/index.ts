export * from './types';
export { EngineClient } from './EngineClient';
export { EngineRequestError, RequestBuildError, EngineConfigError, NO_RESPONSE_STATUS } from './errors';
export type { ConfigIssue } from './errors';
export { emptyEnvelope, headerValue, isSuccessStatus, releaseEnvelope } from './envelope';
export { buildApiPath, buildRequest, normalizeHeaders } from './requestBuilder';
export { DefaultErrorClassifier, isTimeout, statusText } from './errorClassifier';
export * from './proxyUnlock';
export * from './interceptors';
export * from './config';
export * from './factories';
export * from './transport/undiciTransport';
