/**
 * Query parameter composition.
 *
 * ```typescript
 * const top10 = ref
 *   .withParams()
 *   .orderBy('score')
 *   .limitToLast(10)
 *   .finish();
 * ```
 */

import { EXPORT_FORMAT, type QueryKey, QueryParam } from '../constants.js';
import { Reference } from '../reference/index.js';

/** Values accepted by the filtering parameters. */
export type QueryValue = string | number | boolean;

/**
 * Immutable query parameter builder. Every call returns a new composer.
 */
export class QueryParams {
  private readonly base: URL;
  private readonly params: ReadonlyMap<QueryKey, string>;

  constructor(base: URL, params: ReadonlyMap<QueryKey, string> = new Map()) {
    this.base = base;
    this.params = params;
  }

  orderBy(key: string): QueryParams {
    return this.add(QueryParam.ORDER_BY, key);
  }

  limitToFirst(count: number): QueryParams {
    return this.add(QueryParam.LIMIT_TO_FIRST, count);
  }

  limitToLast(count: number): QueryParams {
    return this.add(QueryParam.LIMIT_TO_LAST, count);
  }

  startAt(value: QueryValue): QueryParams {
    return this.add(QueryParam.START_AT, value);
  }

  endAt(value: QueryValue): QueryParams {
    return this.add(QueryParam.END_AT, value);
  }

  equalTo(value: QueryValue): QueryParams {
    return this.add(QueryParam.EQUAL_TO, value);
  }

  shallow(flag: boolean): QueryParams {
    return this.add(QueryParam.SHALLOW, flag);
  }

  /**
   * Requests `format=export`, which includes priority metadata.
   */
  format(): QueryParams {
    return this.add(QueryParam.FORMAT, EXPORT_FORMAT);
  }

  /**
   * The accumulated parameters in serialization order.
   */
  entries(): Array<[QueryKey, string]> {
    return [...this.params.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  /**
   * Materializes the reference. Parameters are appended after any existing
   * query pairs (such as `auth`) in lexical key order.
   */
  finish(): Reference {
    const url = new URL(this.base.href);
    for (const [key, value] of this.entries()) {
      url.searchParams.set(key, value);
    }
    return Reference.fromUrl(url);
  }

  private add(key: QueryKey, value: QueryValue): QueryParams {
    const params = new Map(this.params);
    params.set(key, String(value));
    return new QueryParams(this.base, params);
  }
}
