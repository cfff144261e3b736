/**
 * Entity Collection Task: fetches one seller's sub-records and classifies them
 * with early termination. Both phases return values instead of throwing so a
 * single seller can never take the run down.
 */

import type { TitleKeyDeriver } from '../analyzers/title-key';
import type { Classifier } from '../analyzers/types';
import type { Fetcher, SellerPage } from '../connectors/types';
import type { SessionProvider } from '../session/types';
import {
  Classification,
  type CollectionFailure,
  type CollectionResult,
  type CollectionTarget,
  type ErrorKind,
  type FetchedEntity
} from '../types/collection';
import { err, ok, type Result } from '../types/result';
import type { SessionHandle } from '../types/session';
import { withTimeout } from '../utils/concurrency';
import {
  AuthenticationError,
  BaseError,
  ConnectionError,
  isServiceFatal,
  ProxyAuthenticationError,
  SessionExpiredError,
  toError
} from '../utils/errors';
import { getLogger, type Logger } from '../utils/logger';
import { getMetricsCollector, type MetricsCollector } from '../utils/metrics';
import { BackoffPolicies, type BackoffPolicy, retry } from '../utils/retry';

export const DEFAULT_MAX_ITEMS = 12;
export const DEFAULT_CALL_TIMEOUT_MS = 30000;

/**
 * Failure of one entity's task. `fatal` marks errors that doom every task of the service.
 */
export class EntityTaskError extends BaseError {
  constructor(
    public readonly entityId: string,
    public readonly errorKind: ErrorKind,
    public readonly fatal: boolean,
    public readonly originalError: Error
  ) {
    super(`Entity ${entityId} failed: ${originalError.message}`, { entityId, errorKind, fatal });
  }

  toFailure(): CollectionFailure {
    return {
      entityId: this.entityId,
      errorKind: this.errorKind,
      message: this.originalError.message
    };
  }
}

export function errorKindOf(error: unknown): ErrorKind {
  if (error instanceof ConnectionError) return 'ConnectionError';
  if (error instanceof SessionExpiredError) return 'SessionExpiredError';
  if (error instanceof AuthenticationError) return 'AuthenticationError';
  if (error instanceof ProxyAuthenticationError) return 'ProxyAuthenticationError';
  return 'UnexpectedError';
}

export interface EntityCollectorOptions {
  sessions: SessionProvider;
  fetcher: Fetcher;
  classifier: Classifier;
  keyDeriver: TitleKeyDeriver;
  maxItems?: number;
  fetchPolicy?: BackoffPolicy;
  callTimeoutMs?: number;
  logger?: Logger;
  metrics?: MetricsCollector;
  sleep?: (ms: number) => Promise<void>;
}

export class EntityCollector {
  readonly maxItems: number;
  private readonly sessions: SessionProvider;
  private readonly fetcher: Fetcher;
  private readonly classifier: Classifier;
  private readonly keyDeriver: TitleKeyDeriver;
  private readonly fetchPolicy: BackoffPolicy;
  private readonly callTimeoutMs: number;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(options: EntityCollectorOptions) {
    this.sessions = options.sessions;
    this.fetcher = options.fetcher;
    this.classifier = options.classifier;
    this.keyDeriver = options.keyDeriver;
    this.maxItems = options.maxItems ?? DEFAULT_MAX_ITEMS;
    this.fetchPolicy = options.fetchPolicy ?? BackoffPolicies.fetch;
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.logger = (options.logger ?? getLogger()).child({ service: 'entity-collector' });
    this.metrics = options.metrics ?? getMetricsCollector();
    this.sleep = options.sleep;
  }

  /**
   * Phase 1: up to maxItems sub-records for the target
   */
  async fetch(target: CollectionTarget): Promise<Result<FetchedEntity, EntityTaskError>> {
    const log = this.logger.forOperation('fetch', { entityId: target.entityId });

    try {
      const page = await this.fetchWithSession(target, log);
      const subRecords = page.items.slice(0, this.maxItems);
      const partial = subRecords.length < this.maxItems;

      if (partial) {
        log.warn(`Fewer than ${this.maxItems} sub-records fetched`, {
          fetched: subRecords.length,
          locator: target.locator
        });
      }

      log.debug(`Fetched ${subRecords.length} sub-records`, { displayName: page.displayName });
      return ok({ target, subRecords, partial });
    } catch (error) {
      const cause = toError(error);
      const failure = new EntityTaskError(
        target.entityId,
        errorKindOf(error),
        isServiceFatal(error),
        cause
      );
      log.error('Fetch failed', cause, { errorKind: failure.errorKind, fatal: failure.fatal });
      return err(failure);
    }
  }

  /**
   * Phase 2: classify sub-records in order, stopping at the first POSITIVE
   */
  async classify(fetched: FetchedEntity): Promise<CollectionResult> {
    const { target, subRecords } = fetched;
    const log = this.logger.forOperation('classify', { entityId: target.entityId });

    let examined = 0;
    let unknown = 0;
    let calls = 0;
    let positiveIndex: number | undefined;

    for (const [index, record] of subRecords.entries()) {
      examined++;
      const key = this.keyDeriver.derive(record.label);

      let outcome: Classification;
      if (key.length === 0) {
        outcome = Classification.NEGATIVE;
      } else {
        calls++;
        outcome = await this.classifyKey(key, log);
      }

      if (outcome === Classification.POSITIVE) {
        positiveIndex = index;
        break;
      }

      if (outcome === Classification.UNKNOWN) {
        unknown++;
      }
    }

    const skippedCount = positiveIndex !== undefined ? subRecords.length - positiveIndex - 1 : 0;
    const classification = this.decide(positiveIndex, examined, unknown);

    this.metrics.trackClassification(calls, skippedCount);

    if (positiveIndex !== undefined) {
      log.info(`POSITIVE at sub-record ${positiveIndex + 1}, skipped ${skippedCount}`);
    } else {
      log.info(`Classified as ${classification}`, { examined, unknown });
    }

    return {
      entityId: target.entityId,
      name: target.name,
      locator: target.locator,
      subRecords,
      classification,
      partial: fetched.partial || unknown > 0,
      skippedCount,
      examinedCount: examined,
      unknownCount: unknown,
      positiveIndex
    };
  }

  private decide(
    positiveIndex: number | undefined,
    examined: number,
    unknown: number
  ): Classification {
    if (positiveIndex !== undefined) {
      return Classification.POSITIVE;
    }
    if (examined > 0 && unknown === examined) {
      return Classification.UNKNOWN;
    }
    return Classification.NEGATIVE;
  }

  private async classifyKey(key: string, log: Logger): Promise<Classification> {
    try {
      const outcome = await withTimeout(
        this.classifier.classify(key),
        this.callTimeoutMs,
        `classify "${key}"`
      );
      if (outcome === Classification.UNKNOWN) {
        log.warn(`Classifier returned UNKNOWN for "${key}"`);
      }
      return outcome;
    } catch (error) {
      log.warn(`Classifier gave no answer for "${key}", continuing`, {
        error: toError(error).message
      });
      return Classification.UNKNOWN;
    }
  }

  private async fetchWithSession(target: CollectionTarget, log: Logger): Promise<SellerPage> {
    const serviceId = this.fetcher.serviceId;
    let session = await this.sessions.ensureValid(serviceId);
    let page: SellerPage;

    try {
      page = await this.fetchWithRetry(target, session, log);
    } catch (error) {
      if (!(error instanceof SessionExpiredError)) {
        throw error;
      }

      log.warn('Session rejected during fetch, re-authenticating once', {
        statusCode: error.statusCode
      });
      await this.sessions.invalidate(serviceId, session);
      session = await this.sessions.ensureValid(serviceId);
      page = await this.fetchWithRetry(target, session, log);
    }

    await this.sessions.markUsed(serviceId, session);
    return page;
  }

  private async fetchWithRetry(
    target: CollectionTarget,
    session: SessionHandle,
    log: Logger
  ): Promise<SellerPage> {
    const metricName = `${this.fetcher.serviceId}:fetch`;
    let attempts = 0;

    try {
      return await retry(
        async (attempt) => {
          attempts = attempt;
          const started = Date.now();
          try {
            const page = await this.fetcher.fetch(target.locator, this.maxItems, session);
            this.metrics.trackApiCall(metricName, Date.now() - started, true);
            return page;
          } catch (error) {
            this.metrics.trackApiCall(metricName, Date.now() - started, false);
            throw error;
          }
        },
        {
          ...this.fetchPolicy,
          isRetryable: (error) => !(error instanceof SessionExpiredError) && !isServiceFatal(error),
          onRetry: (attempt, error, nextDelay) => {
            log.warn(`Fetch attempt ${attempt} failed, retrying in ${nextDelay}ms`, {
              error: toError(error).message
            });
          },
          sleep: this.sleep
        }
      );
    } catch (error) {
      if (error instanceof SessionExpiredError || isServiceFatal(error)) {
        throw error;
      }
      throw new ConnectionError(target.locator, toError(error).message, attempts, error);
    }
  }
}
