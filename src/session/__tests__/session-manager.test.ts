import { type SessionRecord, type SessionState, SessionStatus } from '../../types/session';
import {
  AuthenticationError,
  ProxyAuthenticationError,
  SessionCorruptionError
} from '../../utils/errors';
import { createCapturingLogger, Logger } from '../../utils/logger';
import { MetricsCollector } from '../../utils/metrics';
import { SessionLifecycleManager } from '../session-manager';
import type { SessionStore } from '../session-store';
import type { AuthClient } from '../types';

const NOW = new Date('2024-05-01T12:00:00.000Z');

class MemoryStore implements SessionStore {
  records = new Map<string, SessionRecord>();
  corrupted = new Set<string>();
  failWrites = false;
  deleted: string[] = [];
  saves = 0;

  async load(serviceId: string): Promise<SessionRecord | undefined> {
    if (this.corrupted.has(serviceId)) {
      throw new SessionCorruptionError(serviceId, 'bad tag');
    }
    return this.records.get(serviceId);
  }

  async save(record: SessionRecord): Promise<void> {
    if (this.failWrites) {
      throw new Error('disk full');
    }
    this.saves++;
    this.records.set(record.serviceId, record);
  }

  async delete(serviceId: string): Promise<void> {
    this.deleted.push(serviceId);
    this.corrupted.delete(serviceId);
    this.records.delete(serviceId);
  }
}

function state(value: string): SessionState {
  return { cookies: [{ name: 'sid', value }] };
}

function fakeClient() {
  return {
    login: jest.fn<Promise<SessionState>, []>().mockResolvedValue(state('fresh')),
    validate: jest.fn<Promise<boolean>, [SessionState]>().mockResolvedValue(true)
  };
}

function setup(client: AuthClient, store = new MemoryStore()) {
  const sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
  const manager = new SessionLifecycleManager({
    store,
    clients: { rapras: client },
    logger: Logger.silent(),
    metrics: new MetricsCollector(Logger.silent()),
    now: () => NOW,
    sleep
  });
  return { manager, store, sleep };
}

describe('SessionLifecycleManager', () => {
  it('logs in when nothing is stored and persists the new session', async () => {
    const client = fakeClient();
    const { manager, store } = setup(client);

    const handle = await manager.ensureValid('rapras');

    expect(handle.state).toEqual(state('fresh'));
    expect(client.login).toHaveBeenCalledTimes(1);
    expect(client.validate).not.toHaveBeenCalled();
    expect(store.records.get('rapras')).toEqual({
      serviceId: 'rapras',
      credential: state('fresh'),
      expiresAt: undefined,
      lastValidatedAt: NOW.toISOString(),
      status: SessionStatus.VALID
    });
  });

  it('reuses a valid in-memory session without any network call', async () => {
    const client = fakeClient();
    const { manager } = setup(client);

    const first = await manager.ensureValid('rapras');
    const second = await manager.ensureValid('rapras');

    expect(second).toBe(first);
    expect(client.login).toHaveBeenCalledTimes(1);
    expect(client.validate).not.toHaveBeenCalled();
  });

  it('checks a stored session and reuses it when the service accepts it', async () => {
    const client = fakeClient();
    const store = new MemoryStore();
    store.records.set('rapras', {
      serviceId: 'rapras',
      credential: state('stored'),
      lastValidatedAt: '2024-04-30T00:00:00.000Z',
      status: SessionStatus.VALID
    });
    const { manager } = setup(client, store);

    const handle = await manager.ensureValid('rapras');

    expect(handle.state).toEqual(state('stored'));
    expect(client.validate).toHaveBeenCalledTimes(1);
    expect(client.login).not.toHaveBeenCalled();
    expect(store.records.get('rapras')?.lastValidatedAt).toBe(NOW.toISOString());
  });

  it('treats a stored expiresAt in the past as expired without probing', async () => {
    const client = fakeClient();
    const store = new MemoryStore();
    store.records.set('rapras', {
      serviceId: 'rapras',
      credential: state('stored'),
      expiresAt: '2024-05-01T11:59:59.000Z',
      lastValidatedAt: '2024-04-30T00:00:00.000Z',
      status: SessionStatus.VALID
    });
    const { manager } = setup(client, store);

    const handle = await manager.ensureValid('rapras');

    expect(client.validate).not.toHaveBeenCalled();
    expect(client.login).toHaveBeenCalledTimes(1);
    expect(handle.state).toEqual(state('fresh'));
  });

  it('logs in when the service rejects the stored session', async () => {
    const client = fakeClient();
    client.validate.mockResolvedValue(false);
    const store = new MemoryStore();
    store.records.set('rapras', {
      serviceId: 'rapras',
      credential: state('stored'),
      lastValidatedAt: '2024-04-30T00:00:00.000Z',
      status: SessionStatus.VALID
    });
    const { manager } = setup(client, store);

    const handle = await manager.ensureValid('rapras');

    expect(handle.state).toEqual(state('fresh'));
  });

  it('deletes a corrupted record with a warning and logs in', async () => {
    const client = fakeClient();
    const store = new MemoryStore();
    store.corrupted.add('rapras');
    const { logger, entries } = createCapturingLogger();
    const manager = new SessionLifecycleManager({
      store,
      clients: { rapras: client },
      logger,
      metrics: new MetricsCollector(Logger.silent()),
      now: () => NOW
    });

    await manager.ensureValid('rapras');

    expect(store.deleted).toEqual(['rapras']);
    expect(client.login).toHaveBeenCalledTimes(1);
    expect(entries.filter((entry) => entry.level === 'WARN').map((entry) => entry.message)).toEqual([
      'Discarding corrupted session for rapras'
    ]);
  });

  it('logs in again after invalidate', async () => {
    const client = fakeClient();
    client.login.mockResolvedValueOnce(state('first')).mockResolvedValueOnce(state('second'));
    const { manager, store } = setup(client);

    const first = await manager.ensureValid('rapras');
    await manager.invalidate('rapras', first);
    expect(manager.getStatus('rapras')).toBe(SessionStatus.EXPIRED);
    expect(store.records.get('rapras')?.status).toBe(SessionStatus.EXPIRED);

    const second = await manager.ensureValid('rapras');

    expect(second.state).toEqual(state('second'));
    expect(client.login).toHaveBeenCalledTimes(2);
    expect(client.validate).not.toHaveBeenCalled();
  });

  it('ignores invalidation with a handle that was already replaced', async () => {
    const client = fakeClient();
    const { manager } = setup(client);

    const first = await manager.ensureValid('rapras');
    await manager.invalidate('rapras', first);
    await manager.ensureValid('rapras');
    await manager.invalidate('rapras', first);

    expect(manager.getStatus('rapras')).toBe(SessionStatus.VALID);
  });

  it('writes an invalidation once for repeated calls with the same handle', async () => {
    const client = fakeClient();
    const { manager, store } = setup(client);

    const first = await manager.ensureValid('rapras');
    await Promise.all([
      manager.invalidate('rapras', first),
      manager.invalidate('rapras', first),
      manager.invalidate('rapras', first)
    ]);

    // login save + one EXPIRED save
    expect(store.saves).toBe(2);
    expect(store.records.get('rapras')?.status).toBe(SessionStatus.EXPIRED);
  });

  it('keeps a fresh login when a stale invalidation arrives during it', async () => {
    let finishLogin: (value: SessionState) => void = () => {};
    const client = fakeClient();
    const { manager, store } = setup(client);

    const first = await manager.ensureValid('rapras');
    await manager.invalidate('rapras', first);

    client.login.mockImplementation(
      () =>
        new Promise<SessionState>((resolve) => {
          finishLogin = resolve;
        })
    );
    const relogin = manager.ensureValid('rapras');
    await new Promise((resolve) => setImmediate(resolve));
    const lateInvalidation = manager.invalidate('rapras', first);
    finishLogin(state('second'));

    const second = await relogin;
    await lateInvalidation;

    expect(second.state).toEqual(state('second'));
    expect(manager.getStatus('rapras')).toBe(SessionStatus.VALID);
    expect(store.records.get('rapras')).toEqual(
      expect.objectContaining({ credential: state('second'), status: SessionStatus.VALID })
    );
  });

  it('refreshes lastValidatedAt when a handle is used successfully', async () => {
    const client = fakeClient();
    const store = new MemoryStore();
    let clock = new Date('2024-05-01T12:00:00.000Z');
    const manager = new SessionLifecycleManager({
      store,
      clients: { rapras: client },
      logger: Logger.silent(),
      metrics: new MetricsCollector(Logger.silent()),
      now: () => clock
    });

    const handle = await manager.ensureValid('rapras');
    clock = new Date('2024-05-01T12:05:00.000Z');
    await manager.markUsed('rapras', handle);

    expect(store.records.get('rapras')?.lastValidatedAt).toBe('2024-05-01T12:05:00.000Z');
    expect(client.validate).not.toHaveBeenCalled();
  });

  it('ignores markUsed for a handle that is no longer current', async () => {
    const client = fakeClient();
    const { manager, store } = setup(client);

    const first = await manager.ensureValid('rapras');
    await manager.invalidate('rapras', first);
    const savesBefore = store.saves;

    await manager.markUsed('rapras', first);

    expect(store.saves).toBe(savesBefore);
    expect(store.records.get('rapras')?.status).toBe(SessionStatus.EXPIRED);
  });

  it('performs a single login for concurrent callers', async () => {
    let finishLogin: (value: SessionState) => void = () => {};
    const client = fakeClient();
    client.login.mockImplementation(
      () =>
        new Promise<SessionState>((resolve) => {
          finishLogin = resolve;
        })
    );
    const { manager } = setup(client);

    const callers = Promise.all([
      manager.ensureValid('rapras'),
      manager.ensureValid('rapras'),
      manager.ensureValid('rapras')
    ]);
    await new Promise((resolve) => setImmediate(resolve));
    finishLogin(state('shared'));
    const handles = await callers;

    expect(client.login).toHaveBeenCalledTimes(1);
    expect(handles[1]).toBe(handles[0]);
    expect(handles[2]).toBe(handles[0]);
  });

  it('retries login with the 2s/4s backoff and raises AuthenticationError when exhausted', async () => {
    const client = fakeClient();
    client.login.mockRejectedValue(new Error('bad password'));
    const { manager, sleep } = setup(client);

    const failure = manager.ensureValid('rapras');

    await expect(failure).rejects.toBeInstanceOf(AuthenticationError);
    await expect(failure).rejects.toMatchObject({ attempts: 3, serviceId: 'rapras' });
    expect(client.login).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
  });

  it('does not retry a proxy authentication failure', async () => {
    const client = fakeClient();
    client.login.mockRejectedValue(new ProxyAuthenticationError('407 from proxy'));
    const { manager, sleep } = setup(client);

    await expect(manager.ensureValid('rapras')).rejects.toBeInstanceOf(ProxyAuthenticationError);
    expect(client.login).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('keeps failing fast for a service whose login was exhausted', async () => {
    const client = fakeClient();
    client.login.mockRejectedValue(new Error('bad password'));
    const { manager } = setup(client);

    await expect(manager.ensureValid('rapras')).rejects.toBeInstanceOf(AuthenticationError);
    await expect(manager.ensureValid('rapras')).rejects.toBeInstanceOf(AuthenticationError);
    expect(client.login).toHaveBeenCalledTimes(3);
  });

  it('keeps the session in memory when the store write fails', async () => {
    const client = fakeClient();
    const store = new MemoryStore();
    store.failWrites = true;
    const { manager } = setup(client, store);

    const first = await manager.ensureValid('rapras');
    const second = await manager.ensureValid('rapras');

    expect(second).toBe(first);
    expect(client.login).toHaveBeenCalledTimes(1);
  });

  it('fails for a service with no registered client', async () => {
    const { manager } = setup(fakeClient());

    await expect(manager.ensureValid('yahoo')).rejects.toThrow('no auth client registered');
  });
});
