import { FirebaseError, type Result, err, ok } from '../errors/index.js';
import type { DatabaseEvent, EventHandler } from './types.js';

export type EventCallback = (event: DatabaseEvent) => void | Promise<void>;
export type ErrorCallback = (error: FirebaseError) => void | Promise<void>;

/**
 * Dispatches events to one callback per event type.
 *
 * @example
 * ```typescript
 * const router = new EventRouter({ onError: (error) => console.error(error.message) });
 * router.register('put', (event) => apply(event.data));
 * await client.listen(ref, router);
 * ```
 */
export class EventRouter implements EventHandler {
  private readonly handlers = new Map<string, EventCallback>();
  private fallback: EventCallback | undefined;
  private readonly errorCallback: ErrorCallback | undefined;

  constructor(options: { onAny?: EventCallback; onError?: ErrorCallback } = {}) {
    this.fallback = options.onAny;
    this.errorCallback = options.onError;
  }

  /**
   * Registers the callback for `eventType`. Only one callback per type.
   */
  register(eventType: string, callback: EventCallback): Result<void> {
    if (this.handlers.has(eventType)) {
      return err(FirebaseError.eventExists(eventType));
    }
    this.handlers.set(eventType, callback);
    return ok(undefined);
  }

  unregister(eventType: string): boolean {
    return this.handlers.delete(eventType);
  }

  /**
   * Receives events whose type has no registered callback.
   */
  onAny(callback: EventCallback): this {
    this.fallback = callback;
    return this;
  }

  async onEvent(event: DatabaseEvent): Promise<void> {
    const callback = this.handlers.get(event.eventType) ?? this.fallback;
    if (callback) {
      await callback(event);
    }
  }

  async onError(error: FirebaseError): Promise<void> {
    if (this.errorCallback) {
      await this.errorCallback(error);
    }
  }
}
