import type { SessionState, StoredCookie } from '../types/session';

/**
 * Minimal cookie jar: enough of RFC 6265 to carry login cookies between requests
 * and into the session store.
 */
export class CookieJar {
  private readonly cookies = new Map<string, StoredCookie>();

  constructor(
    initial: StoredCookie[] = [],
    private readonly now: () => number = Date.now
  ) {
    for (const cookie of initial) {
      this.put(cookie);
    }
  }

  static fromState(state: SessionState): CookieJar {
    return new CookieJar(state.cookies);
  }

  setFromHeaders(headers: string[], requestUrl: string): void {
    const host = new URL(requestUrl).hostname.toLowerCase();

    for (const header of headers) {
      const parsed = this.parse(header, host);
      if (!parsed) {
        continue;
      }

      if (parsed.expires !== undefined && parsed.expires * 1000 <= this.now()) {
        this.cookies.delete(keyOf(parsed));
        continue;
      }

      this.put(parsed);
    }
  }

  /**
   * Cookie header value for a request, undefined when nothing matches
   */
  headerFor(url: string): string | undefined {
    const target = new URL(url);
    const host = target.hostname.toLowerCase();
    const requestPath = target.pathname || '/';

    const matching = [...this.cookies.values()].filter(
      (cookie) =>
        !this.isExpired(cookie) &&
        domainMatches(host, cookie.domain ?? host) &&
        requestPath.startsWith(cookie.path ?? '/')
    );

    if (matching.length === 0) {
      return undefined;
    }

    return matching.map((cookie) => `${cookie.name}=${cookie.value}`).join('; ');
  }

  get(name: string): StoredCookie | undefined {
    return [...this.cookies.values()].find((cookie) => cookie.name === name);
  }

  get size(): number {
    return this.cookies.size;
  }

  toState(): SessionState {
    return {
      cookies: [...this.cookies.values()].filter((cookie) => !this.isExpired(cookie))
    };
  }

  private put(cookie: StoredCookie): void {
    this.cookies.set(keyOf(cookie), cookie);
  }

  private isExpired(cookie: StoredCookie): boolean {
    return cookie.expires !== undefined && cookie.expires * 1000 <= this.now();
  }

  private parse(header: string, host: string): StoredCookie | undefined {
    const [pair, ...attributes] = header.split(';');
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      return undefined;
    }

    const cookie: StoredCookie = {
      name: pair.slice(0, separator).trim(),
      value: pair.slice(separator + 1).trim(),
      domain: host,
      path: '/'
    };

    for (const attribute of attributes) {
      const [rawName, ...rest] = attribute.split('=');
      const name = rawName.trim().toLowerCase();
      const value = rest.join('=').trim();

      switch (name) {
        case 'domain':
          if (value) {
            cookie.domain = value.replace(/^\./, '').toLowerCase();
          }
          break;
        case 'path':
          if (value.startsWith('/')) {
            cookie.path = value;
          }
          break;
        case 'expires': {
          const timestamp = Date.parse(value);
          // Max-Age wins over Expires
          if (!Number.isNaN(timestamp) && cookie.expires === undefined) {
            cookie.expires = Math.floor(timestamp / 1000);
          }
          break;
        }
        case 'max-age': {
          const seconds = Number.parseInt(value, 10);
          if (!Number.isNaN(seconds)) {
            cookie.expires = Math.floor(this.now() / 1000) + seconds;
          }
          break;
        }
        default:
          break;
      }
    }

    return cookie;
  }
}

function keyOf(cookie: StoredCookie): string {
  return `${cookie.domain ?? ''}|${cookie.path ?? '/'}|${cookie.name}`;
}

function domainMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}
