/**
 * Session lifecycle: decides when a stored session can be reused and when a
 * service must be logged into again.
 *
 * Ladder, cheapest first:
 *   1. in-memory VALID session, no I/O
 *   2. stored expiresAt already passed, EXPIRED without a network call
 *   3. authenticated check through AuthClient.validate
 *   4. reactive: a task saw 401/403 and called invalidate()
 *
 * Logins and record writes are serialized per service; callers waiting on the lock reuse the
 * session the first caller produced.
 */

import {
  deriveExpiry,
  type ServiceId,
  type SessionHandle,
  type SessionRecord,
  type SessionState,
  SessionStatus
} from '../types/session';
import { KeyedMutex } from '../utils/concurrency';
import {
  AuthenticationError,
  ProxyAuthenticationError,
  SessionCorruptionError,
  toError
} from '../utils/errors';
import { getLogger, type Logger } from '../utils/logger';
import { getMetricsCollector, type MetricsCollector } from '../utils/metrics';
import { BackoffPolicies, type BackoffPolicy, retry } from '../utils/retry';
import type { SessionStore } from './session-store';
import type { AuthClient, SessionProvider } from './types';

export interface SessionManagerOptions {
  store: SessionStore;
  clients: Partial<Record<string, AuthClient>>;
  loginPolicy?: BackoffPolicy;
  logger?: Logger;
  metrics?: MetricsCollector;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

interface LiveSession {
  record: SessionRecord;
  handle: SessionHandle;
}

export class SessionLifecycleManager implements SessionProvider {
  private readonly store: SessionStore;
  private readonly clients: Partial<Record<string, AuthClient>>;
  private readonly loginPolicy: BackoffPolicy;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly now: () => Date;
  private readonly sleep?: (ms: number) => Promise<void>;

  private readonly live = new Map<ServiceId, LiveSession>();
  private readonly fatal = new Map<ServiceId, Error>();
  private readonly loginLock = new KeyedMutex();

  constructor(options: SessionManagerOptions) {
    this.store = options.store;
    this.clients = options.clients;
    this.loginPolicy = options.loginPolicy ?? BackoffPolicies.login;
    this.logger = (options.logger ?? getLogger()).child({ service: 'session-manager' });
    this.metrics = options.metrics ?? getMetricsCollector();
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep;
  }

  /**
   * Return a usable session for the service, logging in when needed
   */
  async ensureValid(serviceId: ServiceId): Promise<SessionHandle> {
    const fast = this.usableLiveSession(serviceId);
    if (fast) {
      return fast;
    }

    return this.loginLock.runExclusive(serviceId, async () => {
      // Another caller may have finished a login while this one waited
      const settled = this.usableLiveSession(serviceId);
      if (settled) {
        return settled;
      }

      const previousFailure = this.fatal.get(serviceId);
      if (previousFailure) {
        throw previousFailure;
      }

      try {
        return await this.resolve(serviceId);
      } catch (error) {
        if (error instanceof AuthenticationError || error instanceof ProxyAuthenticationError) {
          this.fatal.set(serviceId, error);
        }
        throw error;
      }
    });
  }

  /**
   * Mark the service's session EXPIRED so the next ensureValid logs in again.
   * When the caller passes the handle it was using, a session that has already
   * been replaced since is left alone.
   */
  async invalidate(serviceId: ServiceId, staleHandle?: SessionHandle): Promise<void> {
    await this.loginLock.runExclusive(serviceId, async () => {
      const current = this.live.get(serviceId);
      if (!current) {
        return;
      }

      if (staleHandle && current.handle !== staleHandle) {
        this.logger.debug(`Session for ${serviceId} already replaced, skipping invalidation`);
        return;
      }

      if (current.record.status === SessionStatus.EXPIRED) {
        return;
      }

      current.record = { ...current.record, status: SessionStatus.EXPIRED };
      this.logger.info(`Session for ${serviceId} invalidated`);
      await this.persist(current.record);
    });
  }

  /**
   * Record a successful authenticated use of the handle. Ignored once the
   * handle has been replaced or invalidated.
   */
  async markUsed(serviceId: ServiceId, handle: SessionHandle): Promise<void> {
    await this.loginLock.runExclusive(serviceId, async () => {
      const current = this.live.get(serviceId);
      if (!current || current.handle !== handle || current.record.status !== SessionStatus.VALID) {
        return;
      }

      current.record = { ...current.record, lastValidatedAt: this.now().toISOString() };
      await this.persist(current.record);
    });
  }

  getStatus(serviceId: ServiceId): SessionStatus {
    return this.live.get(serviceId)?.record.status ?? SessionStatus.UNKNOWN;
  }

  private usableLiveSession(serviceId: ServiceId): SessionHandle | undefined {
    const current = this.live.get(serviceId);
    if (!current || current.record.status !== SessionStatus.VALID) {
      return undefined;
    }

    if (this.isPastExpiry(current.record)) {
      current.record = { ...current.record, status: SessionStatus.EXPIRED };
      return undefined;
    }

    return current.handle;
  }

  private async resolve(serviceId: ServiceId): Promise<SessionHandle> {
    const client = this.clientFor(serviceId);
    const current = this.live.get(serviceId);

    // An in-memory session is only here when it is EXPIRED; skip straight to login
    if (current) {
      this.logger.info(`Session for ${serviceId} is ${current.record.status}, logging in`);
      return this.login(serviceId, client);
    }

    const stored = await this.loadStored(serviceId);
    if (!stored) {
      return this.login(serviceId, client);
    }

    if (this.isPastExpiry(stored) || stored.status === SessionStatus.EXPIRED) {
      this.logger.info(`Stored session for ${serviceId} has expired`, {
        expiresAt: stored.expiresAt
      });
      return this.login(serviceId, client);
    }

    if (await this.checkStored(serviceId, client, stored.credential)) {
      const refreshed: SessionRecord = {
        ...stored,
        lastValidatedAt: this.now().toISOString(),
        status: SessionStatus.VALID
      };
      await this.persist(refreshed);
      return this.activate(refreshed);
    }

    this.logger.info(`Stored session for ${serviceId} was rejected by the service`);
    return this.login(serviceId, client);
  }

  private async loadStored(serviceId: ServiceId): Promise<SessionRecord | undefined> {
    try {
      return await this.store.load(serviceId);
    } catch (error) {
      if (!(error instanceof SessionCorruptionError)) {
        throw error;
      }

      this.logger.warn(`Discarding corrupted session for ${serviceId}`, { reason: error.message });
      try {
        await this.store.delete(serviceId);
      } catch (deleteError) {
        this.logger.error(
          `Failed to delete corrupted session for ${serviceId}`,
          toError(deleteError)
        );
      }
      return undefined;
    }
  }

  private async checkStored(serviceId: ServiceId, client: AuthClient, state: SessionState): Promise<boolean> {
    const started = Date.now();
    try {
      const valid = await client.validate(state);
      this.metrics.trackApiCall(`${serviceId}:validate`, Date.now() - started, true);
      return valid;
    } catch (error) {
      this.metrics.trackApiCall(`${serviceId}:validate`, Date.now() - started, false);
      if (error instanceof ProxyAuthenticationError) {
        throw error;
      }
      this.logger.warn(`Session check for ${serviceId} failed, treating as expired`, {
        error: toError(error).message
      });
      return false;
    }
  }

  private async login(serviceId: ServiceId, client: AuthClient): Promise<SessionHandle> {
    const log = this.logger.forOperation('login', { serviceId });
    let attempts = 0;

    let state: SessionState;
    try {
      state = await retry(
        async (attempt) => {
          attempts = attempt;
          const started = Date.now();
          try {
            const result = await client.login();
            this.metrics.trackApiCall(`${serviceId}:login`, Date.now() - started, true);
            return result;
          } catch (error) {
            this.metrics.trackApiCall(`${serviceId}:login`, Date.now() - started, false);
            throw error;
          }
        },
        {
          ...this.loginPolicy,
          isRetryable: (error) => !(error instanceof ProxyAuthenticationError),
          onRetry: (attempt, error, nextDelay) => {
            log.warn(`Login attempt ${attempt} failed, retrying in ${nextDelay}ms`, {
              error: toError(error).message
            });
          },
          sleep: this.sleep
        }
      );
    } catch (error) {
      if (error instanceof ProxyAuthenticationError) {
        log.error('Proxy rejected credentials, not retrying', error);
        throw error;
      }

      const failure = new AuthenticationError(
        serviceId,
        `${attempts} attempt(s) failed, last error: ${toError(error).message}`,
        attempts
      );
      log.error('Login retries exhausted', failure);
      throw failure;
    }

    log.info('Login succeeded', { attempts });

    const record: SessionRecord = {
      serviceId,
      credential: state,
      expiresAt: deriveExpiry(state),
      lastValidatedAt: this.now().toISOString(),
      status: SessionStatus.VALID
    };

    await this.persist(record);
    return this.activate(record);
  }

  private activate(record: SessionRecord): SessionHandle {
    const handle: SessionHandle = {
      serviceId: record.serviceId,
      state: record.credential,
      validatedAt: new Date(record.lastValidatedAt)
    };
    this.live.set(record.serviceId, { record, handle });
    return handle;
  }

  /**
   * Write-through to the store. A failed write keeps the session in memory only.
   */
  private async persist(record: SessionRecord): Promise<void> {
    try {
      await this.store.save(record);
    } catch (error) {
      this.logger.error(
        `Failed to persist session for ${record.serviceId}, keeping it in memory`,
        toError(error)
      );
    }
  }

  private isPastExpiry(record: SessionRecord): boolean {
    if (!record.expiresAt) {
      return false;
    }
    return new Date(record.expiresAt).getTime() <= this.now().getTime();
  }

  private clientFor(serviceId: ServiceId): AuthClient {
    const client = this.clients[serviceId];
    if (!client) {
      throw new AuthenticationError(serviceId, 'no auth client registered');
    }
    return client;
  }
}
