/**
 * Encrypted per-service session persistence
 */

import { createCipheriv, createDecipheriv, randomBytes, randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import {
  type ServiceId,
  type SessionRecord,
  SessionRecordSchema,
  SessionStatus
} from '../types/session';
import { SessionCorruptionError, toError } from '../utils/errors';
import { getLogger, type Logger } from '../utils/logger';
import type { KeyProvider } from './key-provider';

export interface SessionStore {
  /**
   * Load the record for a service. Resolves undefined when none exists,
   * rejects with SessionCorruptionError when one exists but cannot be read.
   */
  load(serviceId: ServiceId): Promise<SessionRecord | undefined>;
  save(record: SessionRecord): Promise<void>;
  delete(serviceId: ServiceId): Promise<void>;
}

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;

const EnvelopeSchema = z.object({
  v: z.literal(1),
  iv: z.string().min(1),
  tag: z.string().min(1),
  data: z.string().min(1)
});

export interface FileSessionStoreOptions {
  directory: string;
  keyProvider: KeyProvider;
  logger?: Logger;
}

/**
 * One AES-256-GCM encrypted file per service: `<directory>/<serviceId>_session.enc`
 */
export class EncryptedFileSessionStore implements SessionStore {
  private readonly directory: string;
  private readonly keyProvider: KeyProvider;
  private readonly logger: Logger;

  constructor(options: FileSessionStoreOptions) {
    this.directory = options.directory;
    this.keyProvider = options.keyProvider;
    this.logger = (options.logger ?? getLogger()).child({ service: 'session-store' });
  }

  filePath(serviceId: ServiceId): string {
    if (!/^[A-Za-z0-9_-]+$/.test(serviceId)) {
      throw new RangeError(`Invalid service id: ${serviceId}`);
    }
    return path.join(this.directory, `${serviceId}_session.enc`);
  }

  async load(serviceId: ServiceId): Promise<SessionRecord | undefined> {
    const file = this.filePath(serviceId);

    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        this.logger.info(`No session file found for ${serviceId}`);
        return undefined;
      }
      throw new SessionCorruptionError(serviceId, toError(error).message);
    }

    const plaintext = await this.decrypt(serviceId, raw);

    let parsed: unknown;
    try {
      parsed = JSON.parse(plaintext);
    } catch (error) {
      throw new SessionCorruptionError(serviceId, `invalid JSON: ${toError(error).message}`);
    }

    const result = SessionRecordSchema.safeParse(parsed);
    if (!result.success) {
      throw new SessionCorruptionError(serviceId, result.error.issues[0]?.message ?? 'invalid record');
    }

    if (result.data.serviceId !== serviceId) {
      throw new SessionCorruptionError(serviceId, `record belongs to ${result.data.serviceId}`);
    }

    if (result.data.status === SessionStatus.CORRUPTED) {
      throw new SessionCorruptionError(serviceId, 'record was marked corrupted');
    }

    this.logger.info(`Session loaded for ${serviceId}`);
    return result.data;
  }

  async save(record: SessionRecord): Promise<void> {
    const file = this.filePath(record.serviceId);
    await fs.mkdir(this.directory, { recursive: true });

    const envelope = await this.encrypt(JSON.stringify(record));
    const tmp = `${file}.${randomUUID()}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(envelope), { encoding: 'utf-8', mode: 0o600 });
    await fs.rename(tmp, file);

    this.logger.info(`Session saved for ${record.serviceId}`);
  }

  async delete(serviceId: ServiceId): Promise<void> {
    try {
      await fs.unlink(this.filePath(serviceId));
      this.logger.info(`Session deleted for ${serviceId}`);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }
  }

  private async encrypt(plaintext: string): Promise<z.infer<typeof EnvelopeSchema>> {
    const key = await this.keyProvider.getKey();
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, key, iv);
    const data = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);

    return {
      v: 1,
      iv: iv.toString('base64'),
      tag: cipher.getAuthTag().toString('base64'),
      data: data.toString('base64')
    };
  }

  private async decrypt(serviceId: ServiceId, raw: string): Promise<string> {
    let envelope: z.infer<typeof EnvelopeSchema>;
    try {
      envelope = EnvelopeSchema.parse(JSON.parse(raw));
    } catch {
      throw new SessionCorruptionError(serviceId, 'unreadable envelope');
    }

    try {
      const key = await this.keyProvider.getKey();
      const decipher = createDecipheriv(ALGORITHM, key, Buffer.from(envelope.iv, 'base64'));
      decipher.setAuthTag(Buffer.from(envelope.tag, 'base64'));
      return Buffer.concat([
        decipher.update(Buffer.from(envelope.data, 'base64')),
        decipher.final()
      ]).toString('utf8');
    } catch (error) {
      throw new SessionCorruptionError(serviceId, `decryption failed: ${toError(error).message}`);
    }
  }
}
