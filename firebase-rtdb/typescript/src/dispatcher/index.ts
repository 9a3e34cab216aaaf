/**
 * Request dispatcher.
 *
 * Maps one logical operation onto one HTTPS call and classifies the
 * response. There are no retries at this layer; the atomic updater is the
 * only component that loops.
 */

import {
  ETAG_REQUEST_HEADER,
  ETAG_RESPONSE_HEADER,
  IF_MATCH_HEADER,
  NULL_PAYLOAD,
  PRECONDITION_FAILED,
} from '../constants.js';
import { FirebaseError, type Result, err, isFirebaseError, ok, toError } from '../errors/index.js';
import type { Logger } from '../observability/logging.js';
import { MetricNames, type MetricsCollector } from '../observability/metrics.js';
import type { Reference } from '../reference/index.js';
import type { HttpMethod, HttpTransport, TransportRequest, TransportResponse } from '../transport/index.js';

/**
 * Outcome of a successful request.
 */
export interface DatabaseResponse {
  /** HTTP status code. */
  status: number;
  /** Response body text, verbatim. Empty for deletes. */
  data: string;
  /**
   * ETag of the stored value. Present when one was requested, or when a
   * conditional write was rejected with 412.
   */
  etag?: string;
}

/**
 * Per-request options.
 */
export interface SendOptions {
  /** JSON-serializable payload. Required for POST, PUT and PATCH. */
  body?: unknown;
  /** Ask the server to return the current ETag. */
  requestEtag?: boolean;
  /** Only apply the write if the stored ETag still matches. */
  ifMatchEtag?: string;
}

const WRITE_METHODS: ReadonlySet<HttpMethod> = new Set(['POST', 'PUT', 'PATCH']);

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function encodeBody(body: unknown): Result<string> {
  if (body === undefined) {
    return err(FirebaseError.serialize('a body is required for this request'));
  }

  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(body);
  } catch (error) {
    return err(FirebaseError.serialize('body is not JSON-serializable', toError(error)));
  }

  // JSON.stringify returns undefined for functions and symbols.
  if (encoded === undefined) {
    return err(FirebaseError.serialize('body is not JSON-serializable'));
  }
  return ok(encoded);
}

export class RequestDispatcher {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: {
    transport: HttpTransport;
    logger: Logger;
    metrics: MetricsCollector;
    headers?: Record<string, string>;
  }) {
    this.transport = options.transport;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.defaultHeaders = options.headers ?? {};
  }

  /**
   * Sends one request for `ref`.
   */
  async send(ref: Reference, method: HttpMethod, options: SendOptions = {}): Promise<Result<DatabaseResponse>> {
    const request: TransportRequest = {
      method,
      url: ref.getUri(),
      headers: { Accept: 'application/json', ...this.defaultHeaders },
    };

    if (WRITE_METHODS.has(method)) {
      const encoded = encodeBody(options.body);
      if (!encoded.success) {
        this.logger.warn('Refusing to send request without a body', { method, url: request.url });
        return encoded;
      }
      request.body = encoded.data;
      request.headers['Content-Type'] = 'application/json';
    }

    if (options.requestEtag) {
      request.headers[ETAG_REQUEST_HEADER] = 'true';
    }
    if (options.ifMatchEtag !== undefined) {
      request.headers[IF_MATCH_HEADER] = options.ifMatchEtag;
    }

    const labels = { method };
    const startTime = Date.now();
    this.metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, 1, labels);
    this.logger.debug('Sending request', { method, url: request.url, conditional: options.ifMatchEtag !== undefined });

    let response: TransportResponse;
    try {
      response = await this.transport.send(request);
    } catch (error) {
      const failure = isFirebaseError(error)
        ? error
        : FirebaseError.network(toError(error).message, { cause: toError(error) });
      return this.fail(failure, labels, startTime, request.url);
    }

    const result = this.classify(ref, method, options, response);
    if (!result.success) {
      return this.fail(result.error, labels, startTime, request.url);
    }

    this.metrics.incrementCounter(MetricNames.REQUESTS_SUCCESS, 1, labels);
    this.metrics.recordHistogram(MetricNames.REQUEST_LATENCY, (Date.now() - startTime) / 1000, labels);
    this.logger.debug('Request completed', { method, url: request.url, status: response.status });
    return result;
  }

  private classify(
    ref: Reference,
    method: HttpMethod,
    options: SendOptions,
    response: TransportResponse
  ): Result<DatabaseResponse> {
    const { status, body } = response;
    const etagHeader = response.headers[ETAG_RESPONSE_HEADER];

    if (status === PRECONDITION_FAILED && options.ifMatchEtag !== undefined) {
      // A concurrent writer won: the body is the stored value, the header its ETag.
      return ok({ status, data: body, etag: etagHeader });
    }

    if (!isSuccess(status)) {
      return err(FirebaseError.network(`unexpected status ${status} for ${method} ${ref.path}`, { status }));
    }

    const etag = options.requestEtag ? etagHeader : undefined;

    switch (method) {
      case 'GET':
        if (body === NULL_PAYLOAD) {
          return err(FirebaseError.notFoundOrNull(ref.path));
        }
        return ok({ status, data: body, etag });
      case 'DELETE':
        return ok({ status, data: '', etag });
      default:
        return ok({ status, data: body, etag });
    }
  }

  private fail(
    error: FirebaseError,
    labels: Record<string, string>,
    startTime: number,
    url: string
  ): Result<never> {
    this.metrics.incrementCounter(MetricNames.REQUESTS_FAILED, 1, { ...labels, code: error.code });
    this.metrics.recordHistogram(MetricNames.REQUEST_LATENCY, (Date.now() - startTime) / 1000, labels);
    this.logger.debug('Request failed', { ...labels, url, code: error.code, status: error.status });
    return err(error);
  }
}
