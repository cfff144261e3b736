/**
 * Session record types shared by the store and the lifecycle manager
 */

import { z } from 'zod';

export type ServiceId = 'rapras' | 'yahoo' | (string & {});

export enum SessionStatus {
  UNKNOWN = 'UNKNOWN',
  VALID = 'VALID',
  EXPIRED = 'EXPIRED',
  CORRUPTED = 'CORRUPTED'
}

/**
 * One cookie as captured from a Set-Cookie header
 */
export interface StoredCookie {
  name: string;
  value: string;
  domain?: string;
  path?: string;
  /** Unix seconds, absent for session cookies */
  expires?: number;
}

/**
 * Opaque authentication state. Only the store and the service's own client look inside.
 */
export interface SessionState {
  cookies: StoredCookie[];
  /** Provider-reported expiry, when the provider gives one */
  expiresAt?: string;
}

export interface SessionRecord {
  serviceId: ServiceId;
  credential: SessionState;
  expiresAt?: string;
  lastValidatedAt: string;
  status: SessionStatus;
}

export const StoredCookieSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
  domain: z.string().optional(),
  path: z.string().optional(),
  expires: z.number().optional()
});

export const SessionStateSchema = z.object({
  cookies: z.array(StoredCookieSchema),
  expiresAt: z.string().datetime().optional()
});

export const SessionRecordSchema = z.object({
  serviceId: z.string().min(1),
  credential: SessionStateSchema,
  expiresAt: z.string().datetime().optional(),
  lastValidatedAt: z.string().datetime(),
  status: z.nativeEnum(SessionStatus)
});

/**
 * What a task holds while it works against a service
 */
export interface SessionHandle {
  readonly serviceId: ServiceId;
  readonly state: SessionState;
  readonly validatedAt: Date;
}

/**
 * Earliest expiry among the session's cookies, if any cookie carries one
 */
export function deriveExpiry(state: SessionState): string | undefined {
  if (state.expiresAt) {
    return state.expiresAt;
  }

  const expiries = state.cookies
    .map((cookie) => cookie.expires)
    .filter((value): value is number => typeof value === 'number' && value > 0);

  if (expiries.length === 0) {
    return undefined;
  }

  return new Date(Math.min(...expiries) * 1000).toISOString();
}
