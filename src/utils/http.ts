import axios, { type AxiosInstance, type AxiosProxyConfig, type AxiosResponse } from 'axios';
import type { ServiceId } from '../types/session';
import type { CookieJar } from './cookie-jar';
import { BaseError, ProxyAuthenticationError, SessionExpiredError } from './errors';
import { getLogger, type Logger } from './logger';
import { getMetricsCollector, type MetricsCollector } from './metrics';

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_MAX_REDIRECTS = 5;
const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36';
const DEFAULT_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
const DEFAULT_ACCEPT_LANGUAGE = 'ja,en-US;q=0.9,en;q=0.8';

export class HttpRequestError extends BaseError {
  constructor(
    public readonly url: string,
    public readonly status: number,
    public readonly statusText: string,
    public readonly method: string
  ) {
    super(`HTTP ${method} ${url} failed with ${status} ${statusText}`, {
      url,
      status,
      statusText,
      method
    });
  }
}

export interface ProxySettings {
  url: string;
  username: string;
  password: string;
}

export interface HttpClientOptions {
  serviceId: ServiceId;
  timeoutMs?: number;
  maxRedirects?: number;
  proxy?: ProxySettings;
  headers?: Record<string, string>;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export interface HttpResponse {
  status: number;
  /** URL of the last hop after redirects */
  url: string;
  body: string;
}

type Method = 'GET' | 'POST';

/**
 * Cookie-aware HTML client. Redirects are followed by hand so every hop's
 * Set-Cookie headers land in the jar.
 *
 * Status mapping: 407 → ProxyAuthenticationError, 401/403 → SessionExpiredError,
 * any other status ≥ 400 → HttpRequestError.
 */
export class HttpClient {
  readonly serviceId: ServiceId;
  private readonly client: AxiosInstance;
  private readonly maxRedirects: number;
  private readonly proxyUrl?: string;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(options: HttpClientOptions) {
    this.serviceId = options.serviceId;
    this.maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
    this.proxyUrl = options.proxy?.url;
    this.logger = (options.logger ?? getLogger()).child({ service: `http:${options.serviceId}` });
    this.metrics = options.metrics ?? getMetricsCollector();

    this.client = axios.create({
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRedirects: 0,
      responseType: 'text',
      validateStatus: () => true,
      proxy: options.proxy ? toAxiosProxy(options.proxy) : false,
      headers: {
        Accept: DEFAULT_ACCEPT,
        'Accept-Language': DEFAULT_ACCEPT_LANGUAGE,
        'User-Agent': DEFAULT_USER_AGENT,
        ...options.headers
      }
    });
  }

  async get(url: string, jar: CookieJar, query?: Record<string, string>): Promise<HttpResponse> {
    return this.send('GET', withQuery(url, query), jar);
  }

  async postForm(url: string, form: Record<string, string>, jar: CookieJar): Promise<HttpResponse> {
    return this.send('POST', url, jar, new URLSearchParams(form).toString());
  }

  private async send(method: Method, url: string, jar: CookieJar, body?: string): Promise<HttpResponse> {
    let currentUrl = url;
    let currentMethod: Method = method;
    let currentBody = body;

    for (let hop = 0; hop <= this.maxRedirects; hop++) {
      const response = await this.request(currentMethod, currentUrl, jar, currentBody);
      jar.setFromHeaders(readSetCookie(response), currentUrl);

      const location = readHeader(response, 'location');
      if (response.status >= 300 && response.status < 400 && location) {
        currentUrl = new URL(location, currentUrl).toString();
        if (response.status !== 307 && response.status !== 308) {
          currentMethod = 'GET';
          currentBody = undefined;
        }
        continue;
      }

      this.assertStatus(response, currentMethod, currentUrl);

      return {
        status: response.status,
        url: currentUrl,
        body: typeof response.data === 'string' ? response.data : ''
      };
    }

    throw new HttpRequestError(currentUrl, 310, 'Too many redirects', currentMethod);
  }

  private async request(
    method: Method,
    url: string,
    jar: CookieJar,
    body?: string
  ): Promise<AxiosResponse<string>> {
    const headers: Record<string, string> = {};
    const cookie = jar.headerFor(url);
    if (cookie) {
      headers.Cookie = cookie;
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    const started = Date.now();
    try {
      const response = await this.client.request<string>({ method, url, headers, data: body });
      const duration = Date.now() - started;
      this.metrics.trackApiCall(`${this.serviceId}:http`, duration, response.status < 400);
      this.logger.logApiCall(this.serviceId, method, url, duration, response.status);
      return response;
    } catch (error) {
      const duration = Date.now() - started;
      this.metrics.trackApiCall(`${this.serviceId}:http`, duration, false);
      this.logger.logApiCall(
        this.serviceId,
        method,
        url,
        duration,
        undefined,
        error instanceof Error ? error : undefined
      );
      throw error;
    }
  }

  private assertStatus(response: AxiosResponse<string>, method: Method, url: string): void {
    if (response.status === 407) {
      throw new ProxyAuthenticationError('proxy returned 407', this.proxyUrl);
    }

    if (response.status === 401 || response.status === 403) {
      throw new SessionExpiredError(this.serviceId, response.status);
    }

    if (response.status >= 400) {
      throw new HttpRequestError(url, response.status, response.statusText, method);
    }
  }
}

/**
 * Network-level failure (no HTTP response at all)
 */
export function isNetworkError(error: unknown): boolean {
  return axios.isAxiosError(error) && error.response === undefined;
}

function toAxiosProxy(proxy: ProxySettings): AxiosProxyConfig {
  const parsed = new URL(proxy.url);
  const protocol = parsed.protocol.replace(':', '');
  const defaultPort = protocol === 'https' ? 443 : 80;

  return {
    protocol,
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : defaultPort,
    auth: { username: proxy.username, password: proxy.password }
  };
}

function withQuery(url: string, query?: Record<string, string>): string {
  if (!query) {
    return url;
  }

  const parsed = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    parsed.searchParams.set(key, value);
  }
  return parsed.toString();
}

function readHeader(response: AxiosResponse<string>, name: string): string | undefined {
  const value: unknown = response.headers[name];
  return typeof value === 'string' ? value : undefined;
}

function readSetCookie(response: AxiosResponse<string>): string[] {
  const value: unknown = response.headers['set-cookie'];
  if (Array.isArray(value)) {
    return value.filter((entry): entry is string => typeof entry === 'string');
  }
  return typeof value === 'string' ? [value] : [];
}
