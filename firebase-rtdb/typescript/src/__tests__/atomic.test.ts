/**
 * Tests for atomic counter updates.
 */

import {
  AtomicUpdater,
  FirebaseErrorCode,
  InMemoryLogger,
  InMemoryMetricsCollector,
  MetricNames,
  NoopLogger,
  NoopMetricsCollector,
  Reference,
  RequestDispatcher,
  checkBounds,
  parseCounter,
  type HttpTransport,
} from '../index.js';
import { MockTransport, jsonResponse, preconditionFailed } from '../mocks/index.js';
import { InMemoryDatabase } from '../simulation/index.js';

function counterRef(): Reference {
  const result = Reference.create('https://db.example.com');
  if (!result.success) {
    throw result.error;
  }
  return result.data.at('stats/visits');
}

function createUpdater(transport: HttpTransport, metrics = new InMemoryMetricsCollector()): AtomicUpdater {
  const logger = new InMemoryLogger();
  const dispatcher = new RequestDispatcher({ transport, logger, metrics });
  return new AtomicUpdater(dispatcher, logger, metrics);
}

describe('checkBounds', () => {
  it('should refuse growth at or past the max bound', () => {
    expect(checkBounds(5, 1, { maxBound: 5 })?.code).toBe(FirebaseErrorCode.LimitExceeded);
    expect(checkBounds(6, 1, { maxBound: 5 })?.code).toBe(FirebaseErrorCode.LimitExceeded);
    expect(checkBounds(4, 1, { maxBound: 5 })).toBeUndefined();
  });

  it('should apply the max bound to negative deltas from below', () => {
    expect(checkBounds(0, -1, { maxBound: 0 })?.code).toBe(FirebaseErrorCode.LimitExceeded);
    expect(checkBounds(3, -1, { maxBound: 0 })).toBeUndefined();
  });

  it('should ignore the max bound for a zero delta', () => {
    expect(checkBounds(5, 0, { maxBound: 5 })).toBeUndefined();
  });

  it('should refuse once the min bound is reached', () => {
    const error = checkBounds(0, -1, { minBound: 0 });
    expect(error?.message).toBe('Value 0 has reached the min bound 0');
    expect(checkBounds(1, -1, { minBound: 0 })).toBeUndefined();
  });
});

describe('parseCounter', () => {
  it('should accept finite numbers', () => {
    expect(parseCounter('42')).toEqual({ success: true, data: 42 });
    expect(parseCounter('-1.5')).toEqual({ success: true, data: -1.5 });
  });

  it.each(['"5"', '{"n":5}', 'true', 'five'])('should reject %s', (body) => {
    const result = parseCounter(body);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(FirebaseErrorCode.NotJson);
    }
  });
});

describe('AtomicUpdater', () => {
  let transport: MockTransport;

  beforeEach(() => {
    transport = new MockTransport();
  });

  it('should read, then write the incremented value conditionally', async () => {
    transport.enqueue(jsonResponse(5, 200, 'etag-5'));
    transport.enqueue(jsonResponse(6));

    const result = await createUpdater(transport).applyDelta(counterRef(), 1);

    expect(result).toEqual({ success: true, data: { status: 200, data: '6', etag: undefined } });
    const [read, write] = transport.getRequests();
    expect(read.method).toBe('GET');
    expect(read.headers['X-Firebase-ETag']).toBe('true');
    expect(write.method).toBe('PUT');
    expect(write.body).toBe('6');
    expect(write.headers['If-Match']).toBe('etag-5');
    expect(transport.requestCount()).toBe(2);
  });

  it('should not write when the max bound is reached', async () => {
    const metrics = new InMemoryMetricsCollector();
    transport.enqueue(jsonResponse(5, 200, 'etag-5'));

    const result = await createUpdater(transport, metrics).applyDelta(counterRef(), 1, { maxBound: 5 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(FirebaseErrorCode.LimitExceeded);
      expect(result.error.message).toBe('Value 5 has reached the max bound 5');
    }
    expect(transport.requestCount()).toBe(1);
    expect(metrics.getCounter(MetricNames.ATOMIC_LIMIT_EXCEEDED)).toBe(1);
  });

  it('should not write when the min bound is reached', async () => {
    transport.enqueue(jsonResponse(0, 200, 'etag-0'));

    const result = await createUpdater(transport).applyDelta(counterRef(), -1, { minBound: 0 });

    expect(result.success).toBe(false);
    expect(transport.requestCount()).toBe(1);
  });

  it('should retry from the fresh value after a conflict', async () => {
    const metrics = new InMemoryMetricsCollector();
    transport.enqueue(jsonResponse(5, 200, 'etag-5'));
    transport.enqueue(preconditionFailed(7, 'etag-7'));
    transport.enqueue(jsonResponse(8));

    const result = await createUpdater(transport, metrics).applyDelta(counterRef(), 1);

    expect(result.success && result.data.data).toBe('8');
    const writes = transport.getRequests().filter((request) => request.method === 'PUT');
    expect(writes.map((request) => [request.body, request.headers['If-Match']])).toEqual([
      ['6', 'etag-5'],
      ['8', 'etag-7'],
    ]);
    expect(metrics.getCounter(MetricNames.ATOMIC_CONFLICTS)).toBe(1);
  });

  it('should re-check bounds after a conflict', async () => {
    transport.enqueue(jsonResponse(4, 200, 'etag-4'));
    transport.enqueue(preconditionFailed(5, 'etag-5'));

    const result = await createUpdater(transport).applyDelta(counterRef(), 1, { maxBound: 5 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(FirebaseErrorCode.LimitExceeded);
    }
    expect(transport.requestCount()).toBe(2);
  });

  it('should skip the read when the state is known', async () => {
    transport.enqueue(jsonResponse(4));

    const result = await createUpdater(transport).applyDelta(counterRef(), 1, { known: { etag: 'etag-3', value: 3 } });

    expect(result.success).toBe(true);
    expect(transport.requestCount()).toBe(1);
    expect(transport.lastRequest()?.headers['If-Match']).toBe('etag-3');
    expect(transport.lastRequest()?.body).toBe('4');
  });

  it('should fail when the stored value is not a number', async () => {
    transport.enqueue({ status: 200, body: '"five"', headers: { etag: 'etag-s' } });

    const result = await createUpdater(transport).applyDelta(counterRef(), 1);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(FirebaseErrorCode.NotJson);
    }
    expect(transport.requestCount()).toBe(1);
  });

  it('should fail when the counter does not exist', async () => {
    transport.enqueue(jsonResponse(null, 200, 'null_etag'));

    const result = await createUpdater(transport).applyDelta(counterRef(), 1);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(FirebaseErrorCode.NotFoundOrNull);
    }
  });

  it('should fail when the server sends no ETag', async () => {
    transport.enqueue(jsonResponse(5));

    const result = await createUpdater(transport).applyDelta(counterRef(), 1);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(FirebaseErrorCode.Network);
      expect(result.error.message).toBe('Network error: response carries no ETag');
    }
  });

  it('should refuse a non-finite delta without any request', async () => {
    const result = await createUpdater(transport).applyDelta(counterRef(), Number.NaN);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(FirebaseErrorCode.Serialize);
      expect(result.error.message).toBe('Serialize error: delta is not a finite number: NaN');
    }
    expect(transport.requestCount()).toBe(0);
  });

  it('should not write a sum that overflows', async () => {
    transport.enqueue(jsonResponse(Number.MAX_VALUE, 200, 'etag-max'));

    const result = await createUpdater(transport).applyDelta(counterRef(), Number.MAX_VALUE);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(FirebaseErrorCode.Serialize);
    }
    expect(transport.getRequests().map((request) => request.method)).toEqual(['GET']);
  });

  it('should report a counter deleted during a conflict as missing', async () => {
    transport.enqueue(jsonResponse(5, 200, 'etag-5'));
    transport.enqueue(preconditionFailed(null, 'null_etag'));

    const result = await createUpdater(transport).applyDelta(counterRef(), 1);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(FirebaseErrorCode.NotFoundOrNull);
      expect(result.error.message).toBe('Body is null or record is not found: /stats/visits');
    }
    expect(transport.requestCount()).toBe(2);
  });

  it('should stop on a failed write', async () => {
    transport.enqueue(jsonResponse(5, 200, 'etag-5'));
    transport.enqueueError();

    const result = await createUpdater(transport).applyDelta(counterRef(), 1);

    expect(result.success).toBe(false);
    expect(transport.requestCount()).toBe(2);
  });

  describe('against an in-process database', () => {
    it('should leave 6 after incrementing 5 with a single write', async () => {
      const database = new InMemoryDatabase();
      database.set('stats/visits', 5);

      const result = await createUpdater(database).applyDelta(counterRef(), 1);

      expect(result.success).toBe(true);
      expect(database.get('stats/visits')).toBe(6);
      expect(database.getRequests().filter((request) => request.method === 'PUT')).toHaveLength(1);
    });

    it('should serialize concurrent writers through ETags', async () => {
      const database = new InMemoryDatabase();
      database.set('stats/visits', 5);
      const updater = new AtomicUpdater(
        new RequestDispatcher({ transport: database, logger: new NoopLogger(), metrics: new NoopMetricsCollector() }),
        new NoopLogger(),
        new NoopMetricsCollector()
      );

      const results = await Promise.all([
        updater.applyDelta(counterRef(), 1),
        updater.applyDelta(counterRef(), 1),
        updater.applyDelta(counterRef(), 1),
        updater.applyDelta(counterRef(), 1),
        updater.applyDelta(counterRef(), 1),
      ]);

      expect(results.every((result) => result.success)).toBe(true);
      expect(database.get('stats/visits')).toBe(10);
    });

    it('should let exactly the allowed number of writers through a bound', async () => {
      const database = new InMemoryDatabase();
      database.set('stats/visits', 0);
      const updater = createUpdater(database);

      const results = await Promise.all(
        Array.from({ length: 4 }, () => updater.applyDelta(counterRef(), 1, { maxBound: 2 }))
      );

      expect(results.filter((result) => result.success)).toHaveLength(2);
      expect(database.get('stats/visits')).toBe(2);
    });
  });
});
