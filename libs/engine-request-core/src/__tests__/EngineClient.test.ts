import { Readable } from 'node:stream';
import { text } from 'node:stream/consumers';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EngineClient } from '../EngineClient';
import { releaseEnvelope } from '../envelope';
import { EngineRequestError, RequestBuildError } from '../errors';
import type {
  EngineClientConfig,
  EngineEndpoint,
  HeaderMap,
  Logger,
  ProxyProbeTarget,
  TransportRequest,
  TransportResponse,
} from '../types';

const respond = (status: number, body = '', headers: HeaderMap = {}): TransportResponse => ({
  status,
  headers,
  body: Readable.from([Buffer.from(body)]),
});

const connectionRefused = () =>
  Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:2375'), { code: 'ECONNREFUSED' });

const bodyText = (req: TransportRequest) => Buffer.from(req.body ?? new Uint8Array(0)).toString('utf8');

describe('EngineClient', () => {
  let logger: Logger;
  let transport: ReturnType<typeof createTransport>;
  let sleep: ReturnType<typeof createSleep>;
  let probe: { unlock: ReturnType<typeof createUnlock> };

  const endpoint: EngineEndpoint = {
    protocol: 'tcp',
    address: '127.0.0.1:2375',
    scheme: 'http',
    apiVersion: '1.24',
  };

  function createTransport() {
    return vi.fn(async (_req: TransportRequest, _signal: AbortSignal): Promise<TransportResponse> => respond(200, '{}'));
  }

  function createSleep() {
    return vi.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => undefined);
  }

  function createUnlock() {
    return vi.fn(async (_target: ProxyProbeTarget): Promise<boolean> => true);
  }

  beforeEach(() => {
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    transport = createTransport();
    sleep = createSleep();
    probe = { unlock: createUnlock() };
  });

  afterEach(() => {
    vi.clearAllMocks();
    vi.restoreAllMocks();
  });

  const createClient = (overrides: Partial<EngineClientConfig> = {}) =>
    new EngineClient({
      endpoint,
      transport,
      logger,
      sleep,
      proxyProbe: probe,
      userAgent: 'engine-test/1.0',
      ...overrides,
    });

  const sentRequest = (index = 0): TransportRequest => transport.mock.calls[index][0];

  describe('dispatch', () => {
    it('returns the envelope of a successful response on the first attempt', async () => {
      transport.mockResolvedValueOnce(respond(200, '{"ID":"abc"}', { 'content-type': ['application/json'] }));
      const client = createClient({ retries: 3 });

      const envelope = await client.get('/info');

      expect(envelope.statusCode).toBe(200);
      expect(envelope.headers).toEqual({ 'content-type': ['application/json'] });
      expect(envelope.body).toBeDefined();
      expect(await text(envelope.body ?? Readable.from([]))).toBe('{"ID":"abc"}');
      expect(transport).toHaveBeenCalledTimes(1);
      expect(probe.unlock).not.toHaveBeenCalled();
      expect(sleep).not.toHaveBeenCalled();
    });

    it('treats 3xx statuses as success', async () => {
      transport.mockResolvedValueOnce(respond(304));
      const client = createClient();

      const envelope = await client.get('/images/json');

      expect(envelope.statusCode).toBe(304);
    });

    it('retries proxy statuses with an unlock call and a fixed delay between attempts', async () => {
      transport
        .mockResolvedValueOnce(respond(403, 'blocked'))
        .mockResolvedValueOnce(respond(407, 'proxy auth'))
        .mockResolvedValueOnce(respond(200, 'ok'));
      const client = createClient({ retries: 2 });

      const envelope = await client.get('/version');

      expect(envelope.statusCode).toBe(200);
      expect(transport).toHaveBeenCalledTimes(3);
      expect(probe.unlock).toHaveBeenCalledTimes(2);
      expect(probe.unlock).toHaveBeenCalledWith({
        protocol: 'tcp',
        scheme: 'http',
        address: '127.0.0.1:2375',
        apiVersion: '1.24',
      });
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenNthCalledWith(1, 1000, undefined);
      expect(sleep).toHaveBeenNthCalledWith(2, 1000, undefined);
    });

    it('makes exactly retries + 1 attempts when every attempt hits the proxy', async () => {
      transport.mockImplementation(async () => respond(403, 'blocked'));
      const client = createClient({ retries: 3 });

      const error = await client.get('/info').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(EngineRequestError);
      expect(error).toMatchObject({ statusCode: 403, kind: 'daemon_error', message: 'blocked' });
      expect(transport).toHaveBeenCalledTimes(4);
      expect(probe.unlock).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledTimes(3);
    });

    it('stops after one attempt for statuses outside the proxy set', async () => {
      transport.mockImplementation(async () => respond(500, 'server error'));
      const client = createClient({ retries: 1 });

      await expect(client.get('/info')).rejects.toMatchObject({
        statusCode: 500,
        kind: 'daemon_error',
        message: 'server error',
      });
      expect(transport).toHaveBeenCalledTimes(1);
      expect(probe.unlock).not.toHaveBeenCalled();
      expect(sleep).not.toHaveBeenCalled();
      expect(logger.debug).toHaveBeenCalledWith(
        'engine.request.not_retryable',
        expect.objectContaining({ statusCode: 500, attempt: 1 }),
      );
    });

    it('does not retry a proxy status when the budget is zero', async () => {
      transport.mockResolvedValueOnce(respond(407));
      const client = createClient();

      await expect(client.get('/info')).rejects.toMatchObject({ statusCode: 407 });
      expect(transport).toHaveBeenCalledTimes(1);
      expect(probe.unlock).not.toHaveBeenCalled();
    });

    it('retries transport failures as "no response received"', async () => {
      transport.mockRejectedValueOnce(connectionRefused()).mockRejectedValueOnce(connectionRefused());
      const client = createClient({ retries: 1 });

      const error = await client.get('/_ping').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(EngineRequestError);
      expect(error).toMatchObject({
        statusCode: -1,
        kind: 'connection_failed',
        message: 'Cannot connect to the daemon at 127.0.0.1:2375. Is the daemon running on this host?',
        envelope: { body: undefined, headers: {}, statusCode: -1 },
      });
      expect(transport).toHaveBeenCalledTimes(2);
      expect(probe.unlock).toHaveBeenCalledTimes(1);
    });

    it('recovers when a later attempt reaches the daemon', async () => {
      transport.mockRejectedValueOnce(connectionRefused()).mockResolvedValueOnce(respond(200, 'OK'));
      const client = createClient({ retries: 1 });

      const envelope = await client.get('/_ping');

      expect(envelope.statusCode).toBe(200);
      expect(transport).toHaveBeenCalledTimes(2);
    });

    it('keeps retrying when the proxy probe itself fails', async () => {
      probe.unlock.mockRejectedValueOnce(new Error('probe exploded'));
      transport.mockResolvedValueOnce(respond(403)).mockResolvedValueOnce(respond(200));
      const client = createClient({ retries: 1 });

      const envelope = await client.get('/info');

      expect(envelope.statusCode).toBe(200);
      expect(logger.warn).toHaveBeenCalledWith('engine.proxy.failed', { error: 'probe exploded' });
    });

    it('retries without a probe when none is configured', async () => {
      transport.mockResolvedValueOnce(respond(403)).mockResolvedValueOnce(respond(200));
      const client = createClient({ retries: 1, proxyProbe: undefined });

      const envelope = await client.get('/info');

      expect(envelope.statusCode).toBe(200);
      expect(sleep).toHaveBeenCalledTimes(1);
    });

    it('uses the configured retry delay', async () => {
      transport.mockResolvedValueOnce(respond(403)).mockResolvedValueOnce(respond(200));
      const client = createClient({ retries: 1, retryDelayMs: 25 });

      await client.get('/info');

      expect(sleep).toHaveBeenCalledWith(25, undefined);
    });

    it('stops retrying once the caller aborts', async () => {
      const controller = new AbortController();
      transport.mockImplementationOnce(async () => {
        controller.abort();
        throw Object.assign(new Error('Request aborted'), { name: 'AbortError', code: 'UND_ERR_ABORTED' });
      });
      const client = createClient({ retries: 3 });

      await expect(client.dispatch({ method: 'GET', path: '/events', signal: controller.signal })).rejects.toMatchObject(
        { statusCode: -1, kind: 'transport' },
      );
      expect(transport).toHaveBeenCalledTimes(1);
      expect(probe.unlock).not.toHaveBeenCalled();
    });

    it('hands the caller signal to the transport', async () => {
      const controller = new AbortController();
      const client = createClient();

      await client.dispatch({ method: 'GET', path: '/events', signal: controller.signal });

      expect(transport.mock.calls[0][1]).toBe(controller.signal);
    });

    it('hands the caller signal to the backoff sleep', async () => {
      transport.mockResolvedValueOnce(respond(403, 'blocked'));
      const controller = new AbortController();
      const client = createClient({ retries: 1 });

      await client.dispatch({ method: 'GET', path: '/info', signal: controller.signal });

      expect(sleep).toHaveBeenCalledWith(1000, controller.signal);
    });

    it('reports the failure that started the backoff when the caller aborts during it', async () => {
      const controller = new AbortController();
      transport.mockImplementation(async () => {
        setTimeout(() => controller.abort(), 10);
        return respond(403, 'blocked');
      });
      const client = createClient({ retries: 2, retryDelayMs: 10_000, sleep: undefined });

      const error = await client
        .dispatch({ method: 'GET', path: '/info', signal: controller.signal })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(EngineRequestError);
      expect(error).toMatchObject({ statusCode: 403, kind: 'daemon_error', message: 'blocked' });
      expect(transport).toHaveBeenCalledTimes(1);
      expect(probe.unlock).toHaveBeenCalledTimes(1);
      expect(logger.debug).toHaveBeenCalledWith('engine.request.aborted', {
        method: 'GET',
        path: '/info',
        address: '127.0.0.1:2375',
        attempt: 1,
        maxAttempts: 3,
        statusCode: 403,
      });
    });

    it('propagates sleeper failures that are not aborts', async () => {
      transport.mockResolvedValueOnce(respond(407, 'proxy auth'));
      sleep.mockRejectedValueOnce(new Error('timer failure'));
      const client = createClient({ retries: 1 });

      await expect(client.get('/info')).rejects.toThrow('timer failure');
      expect(transport).toHaveBeenCalledTimes(1);
    });

    it.each([Number.NaN, Number.POSITIVE_INFINITY, -2])('treats a retry budget of %s as no retries', async (retries) => {
      transport.mockImplementation(async () => respond(403, 'blocked'));
      const client = createClient({ retries });

      await expect(client.get('/info')).rejects.toMatchObject({ statusCode: 403 });
      expect(transport).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('rounds a fractional retry budget down', async () => {
      transport.mockImplementation(async () => respond(403, 'blocked'));
      const client = createClient({ retries: 1.7 });

      await expect(client.get('/info')).rejects.toMatchObject({ statusCode: 403 });
      expect(transport).toHaveBeenCalledTimes(2);
    });

    it('surfaces request construction errors without sending or retrying', async () => {
      const client = createClient({ retries: 2 });

      await expect(client.get('containers/json')).rejects.toBeInstanceOf(RequestBuildError);
      expect(transport).not.toHaveBeenCalled();
      expect(probe.unlock).not.toHaveBeenCalled();
    });
  });

  describe('error responses', () => {
    it('reports empty error bodies with the status text and requested route', async () => {
      transport.mockResolvedValueOnce(respond(404));
      const client = createClient();

      await expect(client.get('/containers/abc/json')).rejects.toMatchObject({
        kind: 'empty_error_status',
        statusCode: 404,
        message:
          'Error: request returned Not Found for API route and version ' +
          'http://127.0.0.1:2375/v1.24/containers/abc/json, check if the server supports the requested API version',
      });
    });

    it('uses the trimmed daemon body as the message', async () => {
      transport.mockResolvedValueOnce(respond(409, '  conflict: name "web" is already in use \n'));
      const client = createClient();

      await expect(client.post('/containers/create', { name: 'web' }, { Image: 'nginx' })).rejects.toMatchObject({
        kind: 'daemon_error',
        statusCode: 409,
        message: 'conflict: name "web" is already in use',
      });
    });

    it('keeps the failing response headers on the error envelope', async () => {
      transport.mockResolvedValueOnce(respond(500, 'oops', { 'api-version': ['1.24'] }));
      const client = createClient();

      const error = await client.get('/info').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(EngineRequestError);
      expect(error).toMatchObject({
        envelope: { body: undefined, headers: { 'api-version': ['1.24'] }, statusCode: 500 },
        method: 'GET',
        url: 'http://127.0.0.1:2375/v1.24/info',
      });
    });
  });

  describe('request construction', () => {
    it('qualifies the path with origin, version and query', async () => {
      const client = createClient();

      await client.get('/images/json', { all: '1', filters: ['dangling=true', 'label=app'] });

      const req = sentRequest();
      expect(req.origin).toBe('http://127.0.0.1:2375');
      expect(req.path).toBe('/v1.24/images/json?all=1&filters=dangling%3Dtrue&filters=label%3Dapp');
      expect(req.method).toBe('GET');
      expect(req.body).toBeUndefined();
    });

    it('targets localhost when talking over a unix socket', async () => {
      const client = createClient({
        endpoint: { protocol: 'unix', address: '/var/run/engine.sock', scheme: 'http', apiVersion: '1.24' },
      });

      await client.get('/_ping');

      expect(sentRequest().origin).toBe('http://localhost');
    });

    it('lets caller headers replace client headers', async () => {
      const client = createClient({
        customHeaders: { 'X-Registry-Auth': 'client-token', 'X-Meta': 'kept' },
      });

      await client.get('/info', undefined, { 'x-registry-auth': 'caller-token' });

      expect(sentRequest().headers).toEqual({
        'user-agent': ['engine-test/1.0'],
        'x-registry-auth': ['caller-token'],
        'x-meta': ['kept'],
      });
    });

    it('defaults the content type and body of payload requests', async () => {
      const client = createClient();

      await client.postRaw('/containers/abc/start');

      const req = sentRequest();
      expect(req.headers['content-type']).toEqual(['text/plain']);
      expect(req.body).toEqual(new Uint8Array(0));
    });

    it('keeps a caller supplied content type on raw payloads', async () => {
      const client = createClient();

      await client.putRaw('/containers/abc/archive', { path: '/tmp' }, 'tar-bytes', {
        'Content-Type': 'application/x-tar',
      });

      const req = sentRequest();
      expect(req.headers['content-type']).toEqual(['application/x-tar']);
      expect(bodyText(req)).toBe('tar-bytes');
    });

    it('does not add a content type to requests without a payload', async () => {
      const client = createClient();

      await client.delete('/containers/abc', { force: '1' });

      expect(sentRequest().headers['content-type']).toBeUndefined();
      expect(sentRequest().path).toBe('/v1.24/containers/abc?force=1');
    });

    it('encodes JSON bodies and forces the JSON content type', async () => {
      const client = createClient();

      await client.post('/containers/create', undefined, { Image: 'nginx' }, { 'Content-Type': 'text/plain' });

      const req = sentRequest();
      expect(req.headers['content-type']).toEqual(['application/json']);
      expect(bodyText(req)).toBe('{"Image":"nginx"}\n');
    });

    it('sends an empty payload for a JSON verb without a body', async () => {
      const client = createClient();

      await client.put('/containers/abc/update');

      const req = sentRequest();
      expect(req.body).toEqual(new Uint8Array(0));
      expect(req.headers['content-type']).toEqual(['text/plain']);
    });

    it('replays a streamed body on every attempt', async () => {
      transport.mockResolvedValueOnce(respond(403)).mockResolvedValueOnce(respond(201));
      const client = createClient({ retries: 1 });

      const envelope = await client.postRaw(
        '/build',
        undefined,
        Readable.from([Buffer.from('FROM '), Buffer.from('scratch')]),
      );

      expect(envelope.statusCode).toBe(201);
      expect(bodyText(sentRequest(0))).toBe('FROM scratch');
      expect(bodyText(sentRequest(1))).toBe('FROM scratch');
    });

    it('sends HEAD requests without a body', async () => {
      const client = createClient();

      await client.head('/containers/abc/archive', { path: '/etc' });

      expect(sentRequest().method).toBe('HEAD');
      expect(sentRequest().body).toBeUndefined();
    });
  });

  describe('user agent override', () => {
    it('keeps the client default when no override is set', async () => {
      const client = createClient();

      await client.get('/info');

      expect(sentRequest().headers['user-agent']).toEqual(['engine-test/1.0']);
    });

    it('removes the header when the override is empty', async () => {
      const client = createClient({ userAgentOverride: '' });

      await client.get('/info');

      expect(sentRequest().headers).not.toHaveProperty('user-agent');
    });

    it('sets the header to exactly the override value', async () => {
      const client = createClient({ userAgentOverride: 'X' });

      await client.get('/info', undefined, { 'User-Agent': 'caller-agent' });

      expect(sentRequest().headers['user-agent']).toEqual(['X']);
    });
  });

  describe('interceptors', () => {
    it('runs caller interceptors after the built-in ones on every attempt', async () => {
      transport.mockResolvedValueOnce(respond(407)).mockResolvedValueOnce(respond(200));
      const seen: Array<{ attempt: number; contentType?: string[] }> = [];
      const client = createClient({
        retries: 1,
        interceptors: [
          {
            beforeSend: ({ request, attempt }) => {
              seen.push({ attempt, contentType: request.headers['content-type'] });
              request.headers['x-attempt'] = [String(attempt)];
            },
          },
        ],
      });

      await client.postRaw('/containers/abc/kill');

      expect(seen).toEqual([
        { attempt: 1, contentType: ['text/plain'] },
        { attempt: 2, contentType: ['text/plain'] },
      ]);
      expect(sentRequest(1).headers['x-attempt']).toEqual(['2']);
    });
  });

  describe('lifecycle', () => {
    it('closes the transport and the probe', async () => {
      const close = vi.fn(async () => undefined);
      const probeClose = vi.fn(async () => undefined);
      const closable = Object.assign(createTransport(), { close });
      const client = createClient({ transport: closable, proxyProbe: { unlock: createUnlock(), close: probeClose } });

      await client.close();

      expect(close).toHaveBeenCalledTimes(1);
      expect(probeClose).toHaveBeenCalledTimes(1);
    });

    it('releases an open response body', async () => {
      const client = createClient();
      const envelope = await client.get('/events');

      releaseEnvelope(envelope);

      expect(envelope.body?.destroyed).toBe(true);
      expect(() => releaseEnvelope(envelope)).not.toThrow();
      expect(() => releaseEnvelope(undefined)).not.toThrow();
    });
  });
});
