/**
 * Event stream adapter.
 *
 * Turns the raw SSE items of a reference's URL into database events,
 * dropping what consumers never want to see.
 */

import { KEEP_ALIVE_EVENT, NULL_PAYLOAD } from '../constants.js';
import { FirebaseError, type Result, err, isFirebaseError, ok, toError } from '../errors/index.js';
import type { Logger } from '../observability/logging.js';
import { MetricNames, type MetricsCollector } from '../observability/metrics.js';
import type { Reference } from '../reference/index.js';
import type { SseItem } from './sse-parser.js';
import type { EventSourceTransport } from './transport.js';
import type { DatabaseEvent, EventHandler, StreamOptions } from './types.js';

export class EventStreamAdapter {
  constructor(
    private readonly transport: EventSourceTransport,
    private readonly logger: Logger,
    private readonly metrics: MetricsCollector
  ) {}

  /**
   * Streams the events of `ref`.
   *
   * Each call opens its own connection. The first error is yielded as a
   * failed result and ends the sequence. Breaking out of the loop closes
   * the connection.
   */
  async *stream(
    ref: Reference,
    options: StreamOptions = {}
  ): AsyncGenerator<Result<DatabaseEvent>, void, undefined> {
    const keepAliveFriendly = options.keepAliveFriendly ?? false;
    this.logger.debug('Opening event stream', { url: ref.toString(), keepAliveFriendly });

    const items = this.transport.connect(ref.getUri(), options.signal);
    try {
      for await (const item of items) {
        const event = this.toEvent(item, keepAliveFriendly);
        if (event === undefined) {
          this.metrics.incrementCounter(MetricNames.EVENTS_DROPPED);
          continue;
        }
        this.metrics.incrementCounter(MetricNames.EVENTS_RECEIVED, 1, { type: event.eventType });
        yield ok(event);
      }
    } catch (error) {
      const failure = isFirebaseError(error)
        ? error
        : FirebaseError.connection(toError(error).message, { cause: toError(error) });
      this.metrics.incrementCounter(MetricNames.STREAM_ERRORS);
      this.logger.warn('Event stream failed', { url: ref.toString(), code: failure.code });
      yield err(failure);
      return;
    }

    this.logger.debug('Event stream ended', { url: ref.toString() });
  }

  /**
   * Drives {@link stream} and hands every item to `handler`. Resolves once
   * the stream ends or fails.
   */
  async listen(ref: Reference, handler: EventHandler, options: StreamOptions = {}): Promise<void> {
    for await (const result of this.stream(ref, options)) {
      if (result.success) {
        await handler.onEvent(result.data);
      } else {
        await handler.onError(result.error);
      }
    }
  }

  private toEvent(item: SseItem, keepAliveFriendly: boolean): DatabaseEvent | undefined {
    if (item.kind === 'comment') {
      return undefined;
    }
    if (item.eventType === KEEP_ALIVE_EVENT && !keepAliveFriendly) {
      return undefined;
    }

    const event: DatabaseEvent = { eventType: item.eventType };
    if (item.data !== '' && item.data !== NULL_PAYLOAD) {
      event.data = item.data;
    }
    if (item.id !== undefined) {
      event.id = item.id;
    }
    return event;
  }
}
