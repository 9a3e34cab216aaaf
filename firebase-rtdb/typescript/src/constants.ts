/**
 * Wire-level constants of the Realtime Database REST protocol.
 */

/** Suffix appended to the last path segment to address data. */
export const ADDRESSING_SUFFIX = '.json';

/** Query parameter tokens (case-sensitive). */
export const QueryParam = {
  AUTH: 'auth',
  ORDER_BY: 'orderBy',
  LIMIT_TO_FIRST: 'limitToFirst',
  LIMIT_TO_LAST: 'limitToLast',
  START_AT: 'startAt',
  END_AT: 'endAt',
  EQUAL_TO: 'equalTo',
  SHALLOW: 'shallow',
  FORMAT: 'format',
} as const;

/** Keys a query composer may set. `auth` is attached by the reference itself. */
export type QueryKey = Exclude<(typeof QueryParam)[keyof typeof QueryParam], 'auth'>;

/** Value of the `format` parameter. */
export const EXPORT_FORMAT = 'export';

/** Request header asking the server to return the current ETag. */
export const ETAG_REQUEST_HEADER = 'X-Firebase-ETag';

/** Conditional write header. */
export const IF_MATCH_HEADER = 'If-Match';

/** Response header carrying the ETag. */
export const ETAG_RESPONSE_HEADER = 'etag';

/** Event type the server sends periodically to keep the stream open. */
export const KEEP_ALIVE_EVENT = 'keep-alive';

/** Payload text meaning "no data". */
export const NULL_PAYLOAD = 'null';

/** HTTP 412, returned when an If-Match precondition fails. */
export const PRECONDITION_FAILED = 412;
