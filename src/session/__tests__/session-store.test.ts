import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { type SessionRecord, SessionStatus } from '../../types/session';
import { SessionCorruptionError } from '../../utils/errors';
import { Logger } from '../../utils/logger';
import { SecretKeyProvider } from '../key-provider';
import { EncryptedFileSessionStore } from '../session-store';

const HEX_KEY = 'a'.repeat(64);

function makeRecord(overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    serviceId: 'rapras',
    credential: {
      cookies: [{ name: 'sid', value: 'test-session', domain: 'www.rapras.jp', path: '/' }]
    },
    lastValidatedAt: '2024-05-01T10:00:00.000Z',
    status: SessionStatus.VALID,
    ...overrides
  };
}

describe('EncryptedFileSessionStore', () => {
  let dir: string;
  let store: EncryptedFileSessionStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'session-store-'));
    store = new EncryptedFileSessionStore({
      directory: dir,
      keyProvider: new SecretKeyProvider(HEX_KEY),
      logger: Logger.silent()
    });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns undefined when no record exists', async () => {
    await expect(store.load('rapras')).resolves.toBeUndefined();
  });

  it('writes one file per service', async () => {
    await store.save(makeRecord());
    await store.save(makeRecord({ serviceId: 'yahoo' }));

    const files = (await fs.readdir(dir)).sort();
    expect(files).toEqual(['rapras_session.enc', 'yahoo_session.enc']);
  });

  it('loads what it saved', async () => {
    const record = makeRecord({ expiresAt: '2024-06-01T00:00:00.000Z' });
    await store.save(record);

    await expect(store.load('rapras')).resolves.toEqual(record);
  });

  it('keeps every concurrent save for the same service', async () => {
    const saves = Array.from({ length: 10 }, (_, i) =>
      store.save(makeRecord({ lastValidatedAt: `2024-05-01T10:00:0${i}.000Z` }))
    );

    const outcomes = await Promise.allSettled(saves);

    expect(outcomes.filter((outcome) => outcome.status === 'rejected')).toHaveLength(0);
    expect(await fs.readdir(dir)).toEqual(['rapras_session.enc']);
    const loaded = await store.load('rapras');
    expect(loaded?.status).toBe(SessionStatus.VALID);
  });

  it('does not write the credential in clear text', async () => {
    await store.save(makeRecord());

    const raw = await fs.readFile(path.join(dir, 'rapras_session.enc'), 'utf-8');
    expect(raw).not.toContain('test-session');
  });

  it('reports a record encrypted with another key as corrupted', async () => {
    await store.save(makeRecord());

    const otherKeyStore = new EncryptedFileSessionStore({
      directory: dir,
      keyProvider: new SecretKeyProvider('b'.repeat(64)),
      logger: Logger.silent()
    });

    await expect(otherKeyStore.load('rapras')).rejects.toBeInstanceOf(SessionCorruptionError);
  });

  it('reports a truncated file as corrupted', async () => {
    await fs.writeFile(path.join(dir, 'rapras_session.enc'), '{"v":1,"iv":');

    await expect(store.load('rapras')).rejects.toBeInstanceOf(SessionCorruptionError);
  });

  it('deletes a record and tolerates deleting a missing one', async () => {
    await store.save(makeRecord());
    await store.delete('rapras');
    await store.delete('rapras');

    await expect(store.load('rapras')).resolves.toBeUndefined();
  });

  it('rejects service ids that would escape the directory', () => {
    expect(() => store.filePath('../etc')).toThrow(RangeError);
  });
});

describe('SecretKeyProvider', () => {
  it('decodes a hex key', async () => {
    const key = await new SecretKeyProvider(HEX_KEY).getKey();
    expect(key).toEqual(Buffer.alloc(32, 0xaa));
  });

  it('decodes a base64 key', async () => {
    const encoded = Buffer.alloc(32, 7).toString('base64');
    const key = await new SecretKeyProvider(encoded).getKey();
    expect(key).toEqual(Buffer.alloc(32, 7));
  });

  it('hashes a passphrase to 32 bytes', async () => {
    const key = await new SecretKeyProvider('test-secret').getKey();
    expect(key).toHaveLength(32);
  });

  it('rejects an empty key', () => {
    expect(() => new SecretKeyProvider('  ')).toThrow('Session encryption key is empty');
  });
});
