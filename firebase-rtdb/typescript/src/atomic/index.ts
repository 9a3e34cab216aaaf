/**
 * Optimistic-concurrency counter updates.
 *
 * Reads the current number with its ETag, checks the bounds, then writes
 * `current + delta` conditionally on that ETag. When a concurrent writer
 * got there first the server answers 412 with the fresh value and ETag and
 * the loop starts over from them.
 */

import { FirebaseError, type Result, err, ok, toError } from '../errors/index.js';
import type { DatabaseResponse, RequestDispatcher } from '../dispatcher/index.js';
import type { Logger } from '../observability/logging.js';
import { MetricNames, type MetricsCollector } from '../observability/metrics.js';
import type { Reference } from '../reference/index.js';
import { NULL_PAYLOAD, PRECONDITION_FAILED } from '../constants.js';

/**
 * A previously observed counter state. Passing it skips the initial read.
 */
export interface KnownState {
  etag: string;
  value: number;
}

export interface ApplyDeltaOptions {
  /** The update is refused once the current value equals this bound. */
  minBound?: number;
  /**
   * The update is refused when the current value has reached this bound
   * in the direction of `delta`.
   */
  maxBound?: number;
  known?: KnownState;
}

/**
 * Parses a response body as a finite number.
 */
export function parseCounter(body: string): Result<number> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    return err(FirebaseError.notJson(`counter value is not JSON: ${body}`, toError(error)));
  }
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    return err(FirebaseError.notJson(`counter value is not a number: ${body}`));
  }
  return ok(parsed);
}

function toState(ref: Reference, response: DatabaseResponse): Result<KnownState> {
  if (response.etag === undefined) {
    return err(FirebaseError.network('response carries no ETag', { status: response.status }));
  }
  // A conflict can report the counter as deleted by another writer.
  if (response.data === NULL_PAYLOAD) {
    return err(FirebaseError.notFoundOrNull(ref.path));
  }
  const value = parseCounter(response.data);
  if (!value.success) {
    return value;
  }
  return ok({ etag: response.etag, value: value.data });
}

/**
 * Checks the bounds against the current value. Returns the violated bound.
 */
export function checkBounds(
  current: number,
  delta: number,
  bounds: Pick<ApplyDeltaOptions, 'minBound' | 'maxBound'>
): FirebaseError | undefined {
  const { minBound, maxBound } = bounds;
  if (maxBound !== undefined && ((delta > 0 && current >= maxBound) || (delta < 0 && current <= maxBound))) {
    return FirebaseError.limitExceeded(current, maxBound, 'max');
  }
  if (minBound !== undefined && current === minBound) {
    return FirebaseError.limitExceeded(current, minBound, 'min');
  }
  return undefined;
}

export class AtomicUpdater {
  constructor(
    private readonly dispatcher: RequestDispatcher,
    private readonly logger: Logger,
    private readonly metrics: MetricsCollector
  ) {}

  /**
   * Adds `delta` to the number stored at `ref`. The success value is the
   * response of the winning conditional write.
   *
   * Retries without limit while other writers win the race. Every failure
   * other than a conflict ends the loop.
   */
  async applyDelta(ref: Reference, delta: number, options: ApplyDeltaOptions = {}): Promise<Result<DatabaseResponse>> {
    if (!Number.isFinite(delta)) {
      return err(FirebaseError.serialize(`delta is not a finite number: ${delta}`));
    }

    let state: KnownState;
    if (options.known !== undefined) {
      state = options.known;
    } else {
      const read = await this.dispatcher.send(ref, 'GET', { requestEtag: true });
      if (!read.success) {
        return read;
      }
      const parsed = toState(ref, read.data);
      if (!parsed.success) {
        return parsed;
      }
      state = parsed.data;
    }

    let attempt = 0;
    while (true) {
      attempt++;

      const violation = checkBounds(state.value, delta, options);
      if (violation) {
        this.metrics.incrementCounter(MetricNames.ATOMIC_LIMIT_EXCEEDED);
        this.logger.debug('Atomic update refused by bound', { path: ref.path, current: state.value, delta });
        return err(violation);
      }

      const next = state.value + delta;
      if (!Number.isFinite(next)) {
        return err(FirebaseError.serialize(`${state.value} + ${delta} is not a finite number`));
      }
      const write = await this.dispatcher.send(ref, 'PUT', { body: next, ifMatchEtag: state.etag });
      if (!write.success) {
        return write;
      }

      if (write.data.status !== PRECONDITION_FAILED) {
        this.logger.debug('Atomic update applied', { path: ref.path, value: next, attempts: attempt });
        return ok(write.data);
      }

      this.metrics.incrementCounter(MetricNames.ATOMIC_CONFLICTS);
      this.logger.debug('Atomic update conflict, retrying', { path: ref.path, attempt });

      const fresh = toState(ref, write.data);
      if (!fresh.success) {
        return fresh;
      }
      state = fresh.data;
    }
  }
}
