/**
 * HTTP transport for the Firebase client.
 *
 * The transport performs exactly one HTTPS exchange and reports the raw
 * outcome. Status classification belongs to the request dispatcher.
 */

import { FirebaseError, isFirebaseError, toError } from '../errors/index.js';
import type { FirebaseConfig } from '../config/index.js';

/**
 * HTTP verbs used by the REST API.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * A single outbound request.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * The raw response of one request. Header names are lower-case.
 */
export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * HTTP transport interface.
 *
 * Implementations throw {@link FirebaseError} with code `network` when no
 * response was received and `utf8` when the body cannot be decoded.
 */
export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

/**
 * Collects response headers into a plain object.
 */
export function headersToRecord(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key.toLowerCase()] = value;
  });
  return result;
}

/**
 * Fetch-based HTTP transport.
 */
export class FetchTransport implements HttpTransport {
  private readonly timeout: number;
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(config: Pick<FirebaseConfig, 'timeout'>) {
    this.timeout = config.timeout;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const bytes = new Uint8Array(await response.arrayBuffer());

      let body: string;
      try {
        body = this.decoder.decode(bytes);
      } catch (error) {
        throw FirebaseError.utf8(toError(error));
      }

      return {
        status: response.status,
        headers: headersToRecord(response.headers),
        body,
      };
    } catch (error) {
      if (isFirebaseError(error)) throw error;
      const cause = toError(error);
      if (cause.name === 'AbortError') {
        throw FirebaseError.network(`Request timed out after ${this.timeout}ms`, { cause });
      }
      throw FirebaseError.network(cause.message, { cause });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
