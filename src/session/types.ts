import type { ServiceId, SessionHandle, SessionState } from '../types/session';

/**
 * Per-service authentication capability. Credentials are bound at construction.
 */
export interface AuthClient {
  /**
   * Perform a full login and return the new session state.
   * Throws AuthenticationError on rejected credentials, ProxyAuthenticationError
   * when the outbound proxy refuses the connection.
   */
  login(): Promise<SessionState>;

  /** Cheap authenticated check; false when the service no longer accepts the state */
  validate(state: SessionState): Promise<boolean>;
}

export interface Credentials {
  username: string;
  password: string;
}

/**
 * What a collection task needs from the session layer
 */
export interface SessionProvider {
  ensureValid(serviceId: ServiceId): Promise<SessionHandle>;
  invalidate(serviceId: ServiceId, staleHandle?: SessionHandle): Promise<void>;
  /** Refresh lastValidatedAt after the service accepted the handle */
  markUsed(serviceId: ServiceId, handle: SessionHandle): Promise<void>;
}
