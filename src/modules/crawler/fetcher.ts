/**
 * Page Fetcher
 * HTTP GET through an identity's proxy and header set.
 * Non-2xx responses are returned, not thrown; only transport failures throw.
 */

import { Dispatcher, ProxyAgent, fetch } from 'undici';
import { RawPage } from '../../lib/crawling/crawling.types';
import { isValidUrl } from '../../lib/crawling/url-normalizer';
import { Identity } from '../../lib/proxy/identity.types';
import { buildHeaders, withReferer } from '../../lib/proxy/headers';
import { errorCode, FetchError, FetchErrorCode } from '../../lib/scraping/errors';
import { env } from '../../config/env';

export interface FetchRequest {
  url: string;
  identity: Identity;
  timeoutMs: number;
  referer?: string;
}

export interface PageFetcher {
  fetch(request: FetchRequest): Promise<RawPage>;
  close(): Promise<void>;
}

export interface HttpFetcherOptions {
  /**
   * Dispatcher for direct identities (defaults to undici's global one)
   */
  dispatcher?: Dispatcher;
}

function causeCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'cause' in error) {
    return errorCode(error.cause);
  }
  return undefined;
}

export class HttpFetcher implements PageFetcher {
  private readonly proxyAgents: Map<string, ProxyAgent> = new Map();

  constructor(private readonly options: HttpFetcherOptions = {}) {}

  async fetch(request: FetchRequest): Promise<RawPage> {
    const { url, identity, timeoutMs } = request;
    if (!isValidUrl(url)) {
      throw new FetchError(`Invalid URL: ${url}`, FetchErrorCode.INVALID_URL);
    }

    let headers = buildHeaders(identity.fingerprint);
    if (request.referer) {
      headers = withReferer(headers, request.referer);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const startedAt = Date.now();

    try {
      const dispatcher = this.dispatcherFor(identity);
      const response = await fetch(url, {
        method: 'GET',
        headers,
        redirect: 'follow',
        signal: controller.signal,
        ...(dispatcher ? { dispatcher } : {}),
      });
      const body = await response.text();

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key] = value;
      });

      return {
        url,
        finalUrl: response.url || url,
        statusCode: response.status,
        headers: responseHeaders,
        body,
        fetchTime: startedAt,
        latencyMs: Date.now() - startedAt,
      };
    } catch (error: unknown) {
      if (controller.signal.aborted) {
        throw new FetchError(`Request to ${url} timed out after ${timeoutMs}ms`, FetchErrorCode.TIMEOUT, error);
      }
      const code = causeCode(error);
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError(
        code ? `Network error for ${url} (${code})` : `Network error for ${url}: ${message}`,
        FetchErrorCode.NETWORK,
        error
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async close(): Promise<void> {
    const agents = Array.from(this.proxyAgents.values());
    this.proxyAgents.clear();
    await Promise.all(agents.map((agent) => agent.close()));
  }

  private dispatcherFor(identity: Identity): Dispatcher | undefined {
    if (!identity.proxy) {
      return this.options.dispatcher;
    }

    const existing = this.proxyAgents.get(identity.id);
    if (existing) {
      return existing;
    }
    const agent = new ProxyAgent({ uri: identity.proxy.url, connectTimeout: env.FETCH_TIMEOUT });
    this.proxyAgents.set(identity.id, agent);
    return agent;
  }
}
