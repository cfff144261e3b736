import type { CheerioAPI } from 'cheerio';
import type { AuthClient } from '../session/types';
import type { SessionHandle, SessionState } from '../types/session';
import { CookieJar } from '../utils/cookie-jar';
import {
  AuthenticationError,
  ProxyAuthenticationError,
  SessionExpiredError,
  toError
} from '../utils/errors';
import { type HttpClient, isNetworkError } from '../utils/http';
import type { Logger } from '../utils/logger';
import { AbstractSiteConnector } from './base';
import type { Fetcher, SellerPage } from './types';

export const YAHOO_SERVICE_ID = 'yahoo';
export const LOGIN_HOST = 'login.yahoo.co.jp';
export const UNKNOWN_SELLER = '不明なセラー';

const SELLER_NAME_SELECTORS = ['h1[class*="seller"]', 'h1'];
const PRODUCT_TITLE_SELECTORS = ['a[class*="product-title"]', 'div[class*="title"]'];
const LOGGED_IN_SELECTORS = ['a[href*="logout"]', 'a[href*="myauctions"]', 'a[href*="account"]'];

/**
 * Asks the operator for the code Yahoo sent by SMS
 */
export type SmsCodePrompt = () => Promise<string>;

export interface YahooEndpoints {
  loginUrl: string;
  auctionsUrl: string;
  proxyCheckUrl: string;
}

export function isLoginUrl(url: string): boolean {
  try {
    return new URL(url).hostname === LOGIN_HOST;
  } catch {
    return false;
  }
}

/**
 * SMS login for Yahoo Auctions. Every request goes through the authenticated proxy.
 */
export class YahooAuthClient extends AbstractSiteConnector implements AuthClient {
  readonly serviceId = YAHOO_SERVICE_ID;

  constructor(
    http: HttpClient,
    private readonly phoneNumber: string,
    private readonly promptSmsCode: SmsCodePrompt,
    private readonly endpoints: YahooEndpoints,
    logger: Logger
  ) {
    super(http, logger.child({ service: YAHOO_SERVICE_ID }));
  }

  async login(): Promise<SessionState> {
    await this.verifyProxy();

    const jar = this.newJar();
    const loginPage = await this.http.get(this.endpoints.loginUrl, jar);
    const idForm = this.extractForm(this.parse(loginPage.body), loginPage.url, 'input[name="login"]');
    if (!idForm) {
      throw new AuthenticationError(YAHOO_SERVICE_ID, 'login form not found');
    }

    const codePage = await this.http.postForm(
      idForm.action,
      { ...idForm.fields, login: this.phoneNumber },
      jar
    );
    // Phone number is never logged
    this.logger.info('Phone number submitted, waiting for SMS code');

    const codeForm = this.extractForm(this.parse(codePage.body), codePage.url, 'input[name="code"]');
    if (!codeForm) {
      throw new AuthenticationError(YAHOO_SERVICE_ID, 'SMS code form not found');
    }

    const code = (await this.promptSmsCode()).trim();
    if (!code) {
      throw new AuthenticationError(YAHOO_SERVICE_ID, 'SMS code cannot be empty');
    }

    const result = await this.http.postForm(codeForm.action, { ...codeForm.fields, code }, jar);
    if (isLoginUrl(result.url)) {
      throw new AuthenticationError(YAHOO_SERVICE_ID, 'SMS code was not accepted');
    }

    this.logger.info('Logged in to Yahoo Auctions');
    return jar.toState();
  }

  async validate(state: SessionState): Promise<boolean> {
    try {
      const response = await this.http.get(this.endpoints.auctionsUrl, CookieJar.fromState(state));
      if (isLoginUrl(response.url)) {
        this.logger.debug('Redirected to login page, session is not valid');
        return false;
      }
      return looksLoggedIn(this.parse(response.body));
    } catch (error) {
      if (error instanceof SessionExpiredError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * One request through the proxy before any login traffic. A 407 or an
   * unreachable proxy is a configuration problem.
   */
  async verifyProxy(): Promise<void> {
    try {
      await this.http.get(this.endpoints.proxyCheckUrl, this.newJar());
      this.logger.info('Proxy connection verified');
    } catch (error) {
      if (error instanceof ProxyAuthenticationError) {
        throw error;
      }
      if (isNetworkError(error)) {
        throw new ProxyAuthenticationError(`proxy unreachable: ${toError(error).message}`);
      }
      // The proxy answered; the check page itself failing is not a proxy problem
      this.logger.warn('Proxy check page returned an error', { error: toError(error).message });
    }
  }
}

function looksLoggedIn($: CheerioAPI): boolean {
  if (LOGGED_IN_SELECTORS.some((selector) => $(selector).length > 0)) {
    return true;
  }
  return $('input[name="login"]').length === 0;
}

/**
 * Reads a seller page: the seller's name and up to maxItems product titles
 */
export class YahooSellerFetcher extends AbstractSiteConnector implements Fetcher {
  readonly serviceId = YAHOO_SERVICE_ID;

  constructor(http: HttpClient, logger: Logger) {
    super(http, logger.child({ service: YAHOO_SERVICE_ID, operation: 'fetch-seller' }));
  }

  async fetch(locator: string, maxItems: number, session: SessionHandle): Promise<SellerPage> {
    const response = await this.http.get(locator, CookieJar.fromState(session.state));
    if (isLoginUrl(response.url)) {
      throw new SessionExpiredError(YAHOO_SERVICE_ID);
    }

    const $ = this.parse(response.body);
    const displayName = this.extractSellerName($);
    const titles = this.extractProductTitles($, maxItems);

    this.logger.info(`Fetched ${titles.length} product titles from ${displayName}`, {
      locator
    });

    return {
      displayName,
      items: titles.map((label) => ({ label }))
    };
  }

  private extractSellerName($: CheerioAPI): string {
    for (const selector of SELLER_NAME_SELECTORS) {
      const text = this.normalizeWhitespace($(selector).first().text());
      if (text) {
        return text;
      }
    }
    return UNKNOWN_SELLER;
  }

  private extractProductTitles($: CheerioAPI, maxItems: number): string[] {
    for (const selector of PRODUCT_TITLE_SELECTORS) {
      const elements = $(selector);
      if (elements.length === 0) {
        continue;
      }

      return elements
        .toArray()
        .map((element) => this.normalizeWhitespace($(element).text()))
        .filter((title) => title.length > 0)
        .slice(0, maxItems);
    }
    return [];
  }
}
