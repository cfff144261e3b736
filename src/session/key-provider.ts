import { createHash } from 'node:crypto';
import { ConfigurationError } from '../utils/errors';

const KEY_LENGTH = 32;

/**
 * Source of the symmetric key used to encrypt session records.
 * The key never travels with the records themselves.
 */
export interface KeyProvider {
  getKey(): Promise<Buffer>;
}

/**
 * Key taken from a secret injected into the process environment by the host's
 * secret store. Accepts 64 hex chars or base64 of 32 bytes; any other value is
 * treated as a passphrase and hashed to 32 bytes.
 */
export class SecretKeyProvider implements KeyProvider {
  private readonly key: Buffer;

  constructor(secret: string) {
    const trimmed = secret.trim();
    if (trimmed.length === 0) {
      throw new ConfigurationError('Session encryption key is empty', ['SESSION_ENCRYPTION_KEY']);
    }
    this.key = SecretKeyProvider.decode(trimmed);
  }

  async getKey(): Promise<Buffer> {
    return this.key;
  }

  private static decode(secret: string): Buffer {
    if (/^[0-9a-fA-F]{64}$/.test(secret)) {
      return Buffer.from(secret, 'hex');
    }

    if (/^[A-Za-z0-9+/]{43}=$/.test(secret)) {
      const decoded = Buffer.from(secret, 'base64');
      if (decoded.length === KEY_LENGTH) {
        return decoded;
      }
    }

    return createHash('sha256').update(secret, 'utf8').digest();
  }
}
