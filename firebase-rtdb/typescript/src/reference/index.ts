/**
 * References into the remote document tree.
 *
 * A reference wraps a validated `https` URL of the shape
 * `<base>/<path>.json[?<query>]`. References are immutable: descending with
 * {@link Reference.at} or composing query parameters always produces a new
 * value, so a reference can be shared freely between concurrent tasks.
 */

import { ADDRESSING_SUFFIX, QueryParam } from '../constants.js';
import { FirebaseError, type Result, err, ok, toError } from '../errors/index.js';
import { redactUrl } from '../observability/logging.js';
import { QueryParams } from '../query/index.js';

/**
 * Removes every trailing addressing suffix (`x.json.json` becomes `x`).
 */
export function stripSuffix(segment: string): string {
  let result = segment;
  while (result.endsWith(ADDRESSING_SUFFIX)) {
    result = result.slice(0, -ADDRESSING_SUFFIX.length);
  }
  return result;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Parses and validates a raw URL.
 */
function checkUrl(rawUrl: string): Result<URL> {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch (error) {
    return err(FirebaseError.invalidUrl(rawUrl, toError(error)));
  }

  if (url.protocol !== 'https:') {
    return err(FirebaseError.notHttps(url.protocol.replace(/:$/, '')));
  }

  // The root path is always "/", anything deeper loses its trailing slashes.
  if (url.pathname.length > 1 && url.pathname.endsWith('/')) {
    url.pathname = url.pathname.replace(/\/+$/, '') || '/';
  }
  url.hash = '';

  return ok(url);
}

export class Reference {
  private readonly url: URL;

  private constructor(url: URL) {
    this.url = url;
  }

  /**
   * Creates a reference from a user-supplied URL.
   */
  static create(rawUrl: string): Result<Reference> {
    const checked = checkUrl(rawUrl);
    if (!checked.success) {
      return checked;
    }
    return ok(new Reference(checked.data));
  }

  /**
   * Creates a reference carrying a single `auth=<key>` query parameter.
   * Any query string already present on `rawUrl` is discarded.
   */
  static createWithAuth(rawUrl: string, authKey: string): Result<Reference> {
    const checked = checkUrl(rawUrl);
    if (!checked.success) {
      return checked;
    }
    const url = checked.data;
    url.search = '';
    url.searchParams.set(QueryParam.AUTH, authKey);
    return ok(new Reference(url));
  }

  /**
   * Wraps a URL already known to be valid. Used by the query composer.
   * @internal
   */
  static fromUrl(url: URL): Reference {
    return new Reference(new URL(url.href));
  }

  /**
   * Descends into `path`, returning a new reference addressing
   * `<current path>/<path>.json`. The receiver is left untouched.
   */
  at(path: string): Reference {
    const segments = this.url.pathname.split('/').filter((segment) => segment.length > 0);
    const last = segments.pop();
    if (last !== undefined) {
      const stripped = stripSuffix(last);
      if (stripped.length > 0) {
        segments.push(stripped);
      }
    }

    const added = path.split('/').filter((segment) => segment.length > 0);
    segments.push(...added);

    const joined = stripSuffix(segments.join('/'));
    const url = new URL(this.url.href);
    url.pathname = `/${joined}${ADDRESSING_SUFFIX}`;
    return new Reference(url);
  }

  /**
   * Starts composing query parameters on top of this reference.
   */
  withParams(): QueryParams {
    return new QueryParams(new URL(this.url.href));
  }

  /**
   * The full URL, query string included.
   */
  getUri(): string {
    return this.url.href;
  }

  /**
   * The decoded path without the addressing suffix, e.g. `/users/ada`.
   */
  get path(): string {
    const segments = this.url.pathname
      .split('/')
      .filter((segment) => segment.length > 0)
      .map(decodeSegment);
    const last = segments.pop();
    if (last !== undefined) {
      const stripped = stripSuffix(last);
      if (stripped.length > 0) {
        segments.push(stripped);
      }
    }
    return `/${segments.join('/')}`;
  }

  /**
   * The last path segment, or `null` at the root.
   */
  get key(): string | null {
    const segments = this.path.split('/').filter((segment) => segment.length > 0);
    return segments.length > 0 ? segments[segments.length - 1] : null;
  }

  equals(other: Reference): boolean {
    return this.url.href === other.url.href;
  }

  /**
   * The URL with the `auth` value redacted, safe for logs.
   */
  toString(): string {
    return redactUrl(this.url.href);
  }
}
