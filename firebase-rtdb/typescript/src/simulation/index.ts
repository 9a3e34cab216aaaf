/**
 * In-process database for tests.
 *
 * Serves the REST protocol from a plain JSON tree: `.json` addressing,
 * ETags on request, conditional writes through `If-Match` and push keys
 * on POST. Every request is applied atomically, which makes it a faithful
 * stand-in for concurrent writers racing on the same value.
 */

import { createHash } from 'node:crypto';
import {
  ADDRESSING_SUFFIX,
  ETAG_REQUEST_HEADER,
  ETAG_RESPONSE_HEADER,
  IF_MATCH_HEADER,
  PRECONDITION_FAILED,
  QueryParam,
} from '../constants.js';
import type { HttpTransport, TransportRequest, TransportResponse } from '../transport/index.js';

type DataNode = Record<string, unknown>;

const NULL_ETAG = 'null_etag';

const isRecord = (value: unknown): value is DataNode =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

const normalizePath = (path: string): string[] =>
  path.split('/').filter((segment) => segment.length > 0);

function header(request: TransportRequest, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(request.headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

/**
 * Computes the ETag of a stored value.
 */
export function computeEtag(value: unknown): string {
  if (value === null || value === undefined) {
    return NULL_ETAG;
  }
  return createHash('sha1').update(JSON.stringify(value)).digest('base64');
}

export class InMemoryDatabase implements HttpTransport {
  private root: unknown = null;
  private pushCount = 0;
  private readonly requiredAuth?: string;
  private readonly log: TransportRequest[] = [];

  /**
   * @param options.auth - when set, requests without this `auth` value get 401
   */
  constructor(options: { auth?: string; initial?: unknown } = {}) {
    this.requiredAuth = options.auth;
    this.root = options.initial ?? null;
  }

  /**
   * Reads the value at `path` directly, bypassing HTTP.
   */
  get(path: string): unknown {
    let node: unknown = this.root;
    for (const segment of normalizePath(path)) {
      if (!isRecord(node) || !(segment in node)) {
        return null;
      }
      node = node[segment];
    }
    return node ?? null;
  }

  /**
   * Writes the value at `path` directly. `null` removes it.
   */
  set(path: string, value: unknown): void {
    const segments = normalizePath(path);
    if (segments.length === 0) {
      this.root = value;
      return;
    }

    if (!isRecord(this.root)) {
      this.root = {};
    }

    let parent: unknown = this.root;
    const last = segments[segments.length - 1];
    for (const segment of segments.slice(0, -1)) {
      if (!isRecord(parent)) {
        return;
      }
      if (!isRecord(parent[segment])) {
        parent[segment] = {};
      }
      parent = parent[segment];
    }

    if (!isRecord(parent)) {
      return;
    }
    if (value === null) {
      delete parent[last];
    } else {
      parent[last] = value;
    }
  }

  /**
   * Every request received, in order.
   */
  getRequests(): TransportRequest[] {
    return [...this.log];
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    this.log.push(request);

    const url = new URL(request.url);
    if (this.requiredAuth !== undefined && url.searchParams.get(QueryParam.AUTH) !== this.requiredAuth) {
      return this.respond(401, { error: 'Permission denied' });
    }

    const path = this.toPath(url.pathname);
    const current = this.get(path);
    const currentEtag = computeEtag(current);
    const wantsEtag = header(request, ETAG_REQUEST_HEADER) === 'true';

    const ifMatch = header(request, IF_MATCH_HEADER);
    if (ifMatch !== undefined && ifMatch !== currentEtag) {
      return this.respond(PRECONDITION_FAILED, current, currentEtag);
    }

    let body: unknown;
    if (request.method !== 'GET' && request.method !== 'DELETE') {
      try {
        body = JSON.parse(request.body ?? '');
      } catch {
        return this.respond(400, { error: 'Invalid data; couldn\'t parse JSON object' });
      }
    }

    switch (request.method) {
      case 'GET':
        return this.respond(200, current, wantsEtag ? currentEtag : undefined);

      case 'PUT':
        this.set(path, body);
        return this.respond(200, body, wantsEtag ? computeEtag(body) : undefined);

      case 'POST': {
        const name = this.nextPushKey();
        this.set(`${path}/${name}`, body);
        return this.respond(200, { name });
      }

      case 'PATCH': {
        if (!isRecord(body)) {
          return this.respond(400, { error: 'Invalid data; couldn\'t parse JSON object' });
        }
        for (const [key, value] of Object.entries(body)) {
          this.set(`${path}/${key}`, value);
        }
        return this.respond(200, body);
      }

      case 'DELETE':
        this.set(path, null);
        return this.respond(200, null);
    }
  }

  private toPath(pathname: string): string {
    const segments = normalizePath(pathname).map((segment) => decodeURIComponent(segment));
    const last = segments.pop();
    if (last !== undefined && last !== ADDRESSING_SUFFIX) {
      segments.push(last.endsWith(ADDRESSING_SUFFIX) ? last.slice(0, -ADDRESSING_SUFFIX.length) : last);
    }
    return segments.join('/');
  }

  private nextPushKey(): string {
    this.pushCount++;
    return `-N${this.pushCount.toString(36).padStart(8, '0')}`;
  }

  private respond(status: number, value: unknown, etag?: string): TransportResponse {
    const headers: Record<string, string> = { 'content-type': 'application/json; charset=utf-8' };
    if (etag !== undefined) {
      headers[ETAG_RESPONSE_HEADER] = etag;
    }
    return { status, headers, body: JSON.stringify(value ?? null) };
  }
}
