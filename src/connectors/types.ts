import type { SubRecord } from '../types/collection';
import type { ServiceId, SessionHandle } from '../types/session';

/**
 * What a seller page yields: its own display name, when present, and up to
 * maxItems product labels in page order
 */
export interface SellerPage {
  displayName?: string;
  items: SubRecord[];
}

/**
 * Reads the sub-records of one entity. Throws SessionExpiredError when the
 * service answers 401/403 or bounces to its login page; any other failure is
 * a transient connection problem the caller may retry.
 */
export interface Fetcher {
  readonly serviceId: ServiceId;
  fetch(locator: string, maxItems: number, session: SessionHandle): Promise<SellerPage>;
}
