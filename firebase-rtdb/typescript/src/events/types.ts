import type { FirebaseError } from '../errors/index.js';

/**
 * A change notification from the database.
 */
export interface DatabaseEvent {
  /** `put`, `patch`, `keep-alive`, `cancel`, `auth_revoked`, ... */
  eventType: string;
  /** JSON text of the payload. Absent when the server sent `null`. */
  data?: string;
  id?: string;
}

/**
 * Receives the events of one stream. Implementations may keep state.
 */
export interface EventHandler {
  onEvent(event: DatabaseEvent): void | Promise<void>;
  onError(error: FirebaseError): void | Promise<void>;
}

export interface StreamOptions {
  /** Deliver `keep-alive` events instead of dropping them. */
  keepAliveFriendly?: boolean;
  /** Aborting closes the connection. */
  signal?: AbortSignal;
}
