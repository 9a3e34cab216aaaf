/**
 * Firebase Realtime Database REST client.
 *
 * @example
 * ```typescript
 * import { FirebaseClient } from 'firebase-rtdb';
 *
 * const client = FirebaseClient.fromEnv();
 * const users = client.ref('users');
 *
 * const created = await client.push(users, { name: 'Ada' });
 * if (!created.success) {
 *   console.error(created.error.code, created.error.message);
 * }
 *
 * for await (const event of client.stream(users)) {
 *   if (!event.success) break;
 *   console.log(event.data.eventType, event.data.data);
 * }
 * ```
 */

// Client
export { FirebaseClient, FirebaseClientBuilder } from './client/index.js';
export type { FirebaseClientOptions } from './client/index.js';

// Configuration
export { FirebaseConfig, FirebaseConfigBuilder, DEFAULT_TIMEOUT, DEFAULT_USER_AGENT } from './config/index.js';
export type { FirebaseConfigOptions } from './config/index.js';

// Errors
export { FirebaseError, FirebaseErrorCode, isFirebaseError, ok, err } from './errors/index.js';
export type { Result } from './errors/index.js';

// Addressing
export { Reference } from './reference/index.js';
export { QueryParams } from './query/index.js';
export type { QueryValue } from './query/index.js';
export { QueryParam, EXPORT_FORMAT } from './constants.js';
export type { QueryKey } from './constants.js';

// Requests
export { RequestDispatcher } from './dispatcher/index.js';
export type { DatabaseResponse, SendOptions } from './dispatcher/index.js';
export { AtomicUpdater, checkBounds, parseCounter } from './atomic/index.js';
export type { ApplyDeltaOptions, KnownState } from './atomic/index.js';
export { FetchTransport } from './transport/index.js';
export type { HttpMethod, HttpTransport, TransportRequest, TransportResponse } from './transport/index.js';

// Events
export * from './events/index.js';

// Observability
export * from './observability/index.js';
