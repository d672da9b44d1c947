import { EnvHttpProxyAgent, request, type Dispatcher } from 'undici';
import type { Logger, ProxyProbeTarget, ProxyUnlockProbe } from './types';

export interface PlainResponse {
  status: number;
  text(): Promise<string>;
  discard(): Promise<void>;
}

export type PlainGet = (url: string) => Promise<PlainResponse>;

export type UnlockUrlExtractor = (body: string) => string | undefined;

const UNLOCK_URL_PATTERN = /.*"(http:\/\/.*http:\/\/.*)".*/;

/**
 * Pulls the unlock link out of an intercepting proxy's 403 page. The link is
 * a quoted URL that itself embeds the original target URL.
 */
export const extractUnlockUrl: UnlockUrlExtractor = (body) => UNLOCK_URL_PATTERN.exec(body)?.[1];

export const probeUrl = (target: ProxyProbeTarget): string =>
  `${target.scheme}://${target.address}/v${target.apiVersion}/info`;

export function createPlainGet(dispatcher: Dispatcher): PlainGet {
  return async (url) => {
    const response = await request(url, { method: 'GET', dispatcher });
    return {
      status: response.statusCode,
      text: () => response.body.text(),
      discard: async () => {
        await response.body.dump();
      },
    };
  };
}

export interface HttpProxyUnlockProbeOptions {
  get?: PlainGet;
  extractUrl?: UnlockUrlExtractor;
  logger?: Logger;
}

/**
 * Best-effort workaround for proxies that hold the daemon connection until a
 * side-channel URL has been visited. Every failure is logged and absorbed.
 */
export class HttpProxyUnlockProbe implements ProxyUnlockProbe {
  private readonly get: PlainGet;
  private readonly extractUrl: UnlockUrlExtractor;
  private readonly logger?: Logger;
  private readonly ownedDispatcher?: Dispatcher;

  constructor(options: HttpProxyUnlockProbeOptions = {}) {
    if (options.get) {
      this.get = options.get;
    } else {
      // Plain requests go through HTTP_PROXY/HTTPS_PROXY like any other client.
      this.ownedDispatcher = new EnvHttpProxyAgent();
      this.get = createPlainGet(this.ownedDispatcher);
    }
    this.extractUrl = options.extractUrl ?? extractUnlockUrl;
    this.logger = options.logger;
  }

  async unlock(target: ProxyProbeTarget): Promise<boolean> {
    if (target.protocol === 'unix') {
      this.logger?.debug('engine.proxy.skipped', { protocol: target.protocol });
      return false;
    }

    const url = probeUrl(target);
    try {
      this.logger?.debug('engine.proxy.probe', { url });
      const response = await this.get(url);
      this.logger?.debug('engine.proxy.probe', { url, status: response.status });

      if (response.status !== 403) {
        await response.discard();
        this.logger?.debug('engine.proxy.skipped', { url, status: response.status, reason: 'not_intercepted' });
        return false;
      }

      const unlockUrl = this.extractUrl(await response.text());
      if (!unlockUrl) {
        this.logger?.debug('engine.proxy.skipped', { url, status: response.status, reason: 'no_unlock_url' });
        return false;
      }

      this.logger?.debug('engine.proxy.unlock', { unlockUrl });
      const unlockResponse = await this.get(unlockUrl);
      await unlockResponse.discard();
      this.logger?.debug('engine.proxy.unlock', { unlockUrl, status: unlockResponse.status });
      return true;
    } catch (error) {
      this.logger?.debug('engine.proxy.failed', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.ownedDispatcher?.close();
  }
}
