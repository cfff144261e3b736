import { type CollectionTarget, isAdmitted } from '../types/collection';
import type { SessionHandle, SessionState } from '../types/session';
import type { AuthClient, Credentials } from '../session/types';
import { CookieJar } from '../utils/cookie-jar';
import { AuthenticationError, SessionExpiredError } from '../utils/errors';
import type { HttpClient } from '../utils/http';
import type { Logger } from '../utils/logger';
import { AbstractSiteConnector } from './base';

export const RAPRAS_SERVICE_ID = 'rapras';

const SUMMARY_PATH = 'sum_analyse';

export interface SellerListingQuery {
  startDate: string;
  endDate: string;
  /** Total winning-bid amount a seller must reach, in yen */
  minPrice: number;
}

/**
 * Parse a Rapras price cell such as "150,000円"
 */
export function parsePrice(text: string): number | undefined {
  const digits = text.replace(/[,，円\s]/g, '');
  if (!/^\d+$/.test(digits)) {
    return undefined;
  }
  return Number.parseInt(digits, 10);
}

/**
 * Stable id for a seller link: the last path segment, or the whole URL
 */
export function sellerIdFromUrl(url: string): string {
  try {
    const segments = new URL(url).pathname.split('/').filter(Boolean);
    return segments[segments.length - 1] ?? url;
  } catch {
    return url;
  }
}

export class RaprasConnector extends AbstractSiteConnector implements AuthClient {
  readonly serviceId = RAPRAS_SERVICE_ID;
  private readonly baseUrl: string;

  constructor(
    http: HttpClient,
    private readonly credentials: Credentials,
    baseUrl: string,
    logger: Logger
  ) {
    super(http, logger.child({ service: RAPRAS_SERVICE_ID }));
    this.baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  }

  async login(): Promise<SessionState> {
    const jar = this.newJar();

    const landing = await this.http.get(this.baseUrl, jar);
    const form = this.extractForm(this.parse(landing.body), landing.url, 'input[name="password"]');
    if (!form) {
      throw new AuthenticationError(RAPRAS_SERVICE_ID, 'login form not found');
    }

    await this.http.postForm(
      form.action,
      {
        ...form.fields,
        username: this.credentials.username,
        password: this.credentials.password
      },
      jar
    );

    const check = await this.http.get(this.baseUrl, jar);
    if (!this.hasLogoutLink(this.parse(check.body))) {
      throw new AuthenticationError(RAPRAS_SERVICE_ID, 'credentials were not accepted');
    }

    this.logger.info('Logged in to Rapras');
    return jar.toState();
  }

  async validate(state: SessionState): Promise<boolean> {
    try {
      const response = await this.http.get(this.baseUrl, CookieJar.fromState(state));
      return this.hasLogoutLink(this.parse(response.body));
    } catch (error) {
      if (error instanceof SessionExpiredError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Read the seller aggregation table for a date window. Every parsable row
   * becomes a target carrying its total and the admission threshold.
   */
  async fetchSellerLinks(
    session: SessionHandle,
    query: SellerListingQuery
  ): Promise<CollectionTarget[]> {
    const jar = CookieJar.fromState(session.state);
    const response = await this.http.get(`${this.baseUrl}${SUMMARY_PATH}`, jar, {
      target: 'epsum',
      updown: 'down',
      genre: 'all',
      sdate: query.startDate,
      edate: query.endDate
    });

    const $ = this.parse(response.body);
    if (!this.hasLogoutLink($) && $('input[name="password"]').length > 0) {
      throw new SessionExpiredError(RAPRAS_SERVICE_ID);
    }

    const rows = $('table tbody tr');
    this.logger.info(`Found ${rows.length} seller rows`, {
      startDate: query.startDate,
      endDate: query.endDate
    });

    const targets: CollectionTarget[] = [];
    const seen = new Set<string>();

    rows.each((index, row) => {
      const nameCell = $(row).find('td:nth-child(2)');
      const priceCell = $(row).find('td:nth-child(5)');
      const href = nameCell.find('a').attr('href');
      const name = this.normalizeWhitespace(nameCell.text());

      if (!name || !href) {
        this.logger.warn('Skipping seller row without name or link', { row: index });
        return;
      }

      const price = parsePrice(priceCell.text());
      if (price === undefined) {
        this.logger.warn('Skipping seller row with unparsable price', {
          row: index,
          price: priceCell.text().trim()
        });
        return;
      }

      const locator = this.resolveUrl(href, response.url);
      const entityId = sellerIdFromUrl(locator);
      if (seen.has(entityId)) {
        this.logger.debug(`Duplicate seller row for ${entityId}`);
        return;
      }
      seen.add(entityId);

      targets.push({
        entityId,
        name,
        locator,
        aggregateValue: price,
        threshold: query.minPrice
      });
    });

    this.logger.info(`Collected ${targets.length} sellers`, {
      admitted: targets.filter(isAdmitted).length,
      minPrice: query.minPrice
    });

    return targets;
  }
}
