/**
 * Event stream transports.
 */

import { FirebaseError, isFirebaseError, toError } from '../errors/index.js';
import { SseParser, type SseItem } from './sse-parser.js';

/**
 * Opens an SSE connection and yields its parsed items.
 *
 * Implementations throw {@link FirebaseError} with code `connection` when
 * the stream cannot be opened or breaks. Returning from the generator
 * releases the connection.
 */
export interface EventSourceTransport {
  connect(url: string, signal?: AbortSignal): AsyncGenerator<SseItem, void, undefined>;
}

/**
 * Fetch-based SSE transport.
 */
export class FetchEventSource implements EventSourceTransport {
  private readonly headers: Record<string, string>;

  constructor(options: { headers?: Record<string, string> } = {}) {
    this.headers = options.headers ?? {};
  }

  async *connect(url: string, signal?: AbortSignal): AsyncGenerator<SseItem, void, undefined> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: { ...this.headers, Accept: 'text/event-stream' },
        signal,
      });
    } catch (error) {
      throw FirebaseError.connection(toError(error).message, { cause: toError(error) });
    }

    if (response.status !== 200) {
      await response.body?.cancel();
      throw FirebaseError.connection(`unexpected status ${response.status}`, { status: response.status });
    }
    if (!response.body) {
      throw FirebaseError.connection('response has no body');
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder('utf-8');
    const parser = new SseParser();
    let finished = false;

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          finished = true;
          yield* parser.feed(decoder.decode());
          yield* parser.flush();
          return;
        }
        yield* parser.feed(decoder.decode(value, { stream: true }));
      }
    } catch (error) {
      finished = true;
      if (isFirebaseError(error)) throw error;
      throw FirebaseError.connection(toError(error).message, { cause: toError(error) });
    } finally {
      // The consumer stopped early: close the connection.
      if (!finished) {
        await reader.cancel();
      }
    }
  }
}
