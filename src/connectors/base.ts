import { type CheerioAPI, load as loadHtml } from 'cheerio';
import type { ServiceId } from '../types/session';
import { CookieJar } from '../utils/cookie-jar';
import type { HttpClient } from '../utils/http';
import type { Logger } from '../utils/logger';

export abstract class AbstractSiteConnector {
  abstract readonly serviceId: ServiceId;

  constructor(
    protected readonly http: HttpClient,
    protected readonly logger: Logger
  ) {}

  protected newJar(): CookieJar {
    return new CookieJar();
  }

  protected parse(html: string): CheerioAPI {
    return loadHtml(html);
  }

  protected hasLogoutLink($: CheerioAPI): boolean {
    return $('a[href*="logout"]').length > 0;
  }

  /**
   * Fields of the first form that contains the given input, hidden values included
   */
  protected extractForm(
    $: CheerioAPI,
    pageUrl: string,
    inputSelector: string
  ): { action: string; fields: Record<string, string> } | undefined {
    const form = $('form').filter((_, element) => $(element).find(inputSelector).length > 0).first();
    if (form.length === 0) {
      return undefined;
    }

    const fields: Record<string, string> = {};
    form.find('input[name]').each((_, element) => {
      const input = $(element);
      const name = input.attr('name');
      const type = (input.attr('type') ?? 'text').toLowerCase();
      if (!name || type === 'submit' || type === 'button') {
        return;
      }
      fields[name] = input.attr('value') ?? '';
    });

    const action = form.attr('action');
    return {
      action: action ? this.resolveUrl(action, pageUrl) : pageUrl,
      fields
    };
  }

  protected normalizeWhitespace(value: string): string {
    return value.replace(/\s+/g, ' ').trim();
  }

  protected resolveUrl(href: string, base: string): string {
    try {
      return new URL(href, base).toString();
    } catch {
      return href;
    }
  }
}
