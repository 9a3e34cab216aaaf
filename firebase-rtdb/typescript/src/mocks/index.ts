/**
 * Mock implementations for testing.
 */

import { FirebaseError } from '../errors/index.js';
import type { SseItem } from '../events/sse-parser.js';
import type { EventSourceTransport } from '../events/transport.js';
import type { HttpTransport, TransportRequest, TransportResponse } from '../transport/index.js';

/**
 * A mock response to return. `body` is sent verbatim when it is a string
 * and JSON-encoded otherwise.
 */
export interface MockResponse {
  status: number;
  body: unknown;
  headers?: Record<string, string>;
}

/**
 * Creates a JSON response.
 */
export function jsonResponse(body: unknown, status = 200, etag?: string): MockResponse {
  const headers: Record<string, string> = { 'content-type': 'application/json' };
  if (etag !== undefined) {
    headers.etag = etag;
  }
  return { status, body, headers };
}

/**
 * Creates the response a conditional write gets when the stored ETag moved.
 */
export function preconditionFailed(current: unknown, etag: string): MockResponse {
  return jsonResponse(current, 412, etag);
}

/**
 * Creates an error response.
 */
export function errorResponse(status: number, message: string): MockResponse {
  return jsonResponse({ error: message }, status);
}

/**
 * Mock transport for testing.
 */
export class MockTransport implements HttpTransport {
  private queue: Array<MockResponse | FirebaseError> = [];
  private requests: TransportRequest[] = [];

  /**
   * Adds a response to the queue.
   */
  enqueue(response: MockResponse): this {
    this.queue.push(response);
    return this;
  }

  /**
   * Makes the next request fail as if no response arrived.
   */
  enqueueError(error: FirebaseError = FirebaseError.network('connection refused')): this {
    this.queue.push(error);
    return this;
  }

  getRequests(): TransportRequest[] {
    return [...this.requests];
  }

  lastRequest(): TransportRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  requestCount(): number {
    return this.requests.length;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push({ ...request, headers: { ...request.headers } });

    const next = this.queue.shift();
    if (next === undefined) {
      throw FirebaseError.network(`no mock response configured for ${request.method} ${request.url}`);
    }
    if (next instanceof FirebaseError) {
      throw next;
    }

    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(next.headers ?? {})) {
      headers[key.toLowerCase()] = value;
    }

    return {
      status: next.status,
      headers,
      body: typeof next.body === 'string' ? next.body : JSON.stringify(next.body),
    };
  }
}

/**
 * Creates an SSE event item.
 */
export function sseEvent(eventType: string, data: string, id?: string): SseItem {
  return id === undefined ? { kind: 'event', eventType, data } : { kind: 'event', eventType, data, id };
}

/**
 * Creates an SSE comment item.
 */
export function sseComment(text: string): SseItem {
  return { kind: 'comment', text };
}

/**
 * Scripted SSE transport. Every connection replays the same items, then
 * ends or fails with the configured error.
 */
export class MockEventSource implements EventSourceTransport {
  private readonly items: SseItem[];
  private failure?: FirebaseError;
  private readonly urls: string[] = [];
  private open = 0;

  constructor(items: SseItem[] = []) {
    this.items = [...items];
  }

  /**
   * Makes every connection fail after the scripted items.
   */
  failWith(error: FirebaseError): this {
    this.failure = error;
    return this;
  }

  /**
   * URLs of every connection attempt, in order.
   */
  getConnections(): string[] {
    return [...this.urls];
  }

  /**
   * Connections not yet released.
   */
  openConnections(): number {
    return this.open;
  }

  async *connect(url: string, signal?: AbortSignal): AsyncGenerator<SseItem, void, undefined> {
    this.urls.push(url);
    this.open++;
    try {
      for (const item of this.items) {
        if (signal?.aborted) {
          return;
        }
        yield item;
      }
      if (this.failure) {
        throw this.failure;
      }
    } finally {
      this.open--;
    }
  }
}
