/**
 * Tests for references and query composition.
 */

import { FirebaseErrorCode, Reference, type Result } from '../index.js';

const BASE = 'https://db.example.com';

function unwrap<T>(result: Result<T>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

describe('Reference', () => {
  describe('create', () => {
    it('should keep the root path', () => {
      expect(unwrap(Reference.create(`${BASE}/`)).getUri()).toBe('https://db.example.com/');
      expect(unwrap(Reference.create(BASE)).getUri()).toBe('https://db.example.com/');
    });

    it('should strip trailing slashes from deeper paths', () => {
      expect(unwrap(Reference.create(`${BASE}/users/`)).getUri()).toBe('https://db.example.com/users');
      expect(unwrap(Reference.create(`${BASE}/users//`)).getUri()).toBe('https://db.example.com/users');
    });

    it('should drop the fragment', () => {
      expect(unwrap(Reference.create(`${BASE}/users#top`)).getUri()).toBe('https://db.example.com/users');
    });

    it.each([
      'http://db.example.com',
      'http://db.example.com/users/ada',
      'ftp://db.example.com/',
    ])('should reject %s with NotHttps', (url) => {
      const result = Reference.create(url);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(FirebaseErrorCode.NotHttps);
      }
    });

    it('should reject unparsable input with InvalidUrl', () => {
      const result = Reference.create('not a url');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(FirebaseErrorCode.InvalidUrl);
        expect(result.error.message).toBe('Error while parsing the URL: not a url');
      }
    });
  });

  describe('createWithAuth', () => {
    it('should replace any query string with the auth parameter', () => {
      const ref = unwrap(Reference.createWithAuth(`${BASE}/?print=pretty&x=1`, 'test-secret'));
      expect(ref.getUri()).toBe('https://db.example.com/?auth=test-secret');
    });

    it('should validate the scheme', () => {
      const result = Reference.createWithAuth('http://db.example.com', 'test-secret');
      expect(result.success).toBe(false);
    });
  });

  describe('at', () => {
    const root = unwrap(Reference.create(BASE));

    it('should append the addressing suffix once', () => {
      expect(root.at('users').getUri()).toBe('https://db.example.com/users.json');
      expect(root.at('users').at('ada').getUri()).toBe('https://db.example.com/users/ada.json');
    });

    it('should treat a segment with the suffix like one without', () => {
      expect(root.at('x.json').equals(root.at('x'))).toBe(true);
      expect(root.at('x.json.json').getUri()).toBe('https://db.example.com/x.json');
      expect(root.at('users').at('ada.json').getUri()).toBe('https://db.example.com/users/ada.json');
    });

    it('should keep segments in call order', () => {
      const ref = root.at('a').at('b').at('c');
      expect(ref.getUri()).toBe('https://db.example.com/a/b/c.json');
    });

    it('should ignore empty pieces of a multi-segment path', () => {
      expect(root.at('a/b//c/').getUri()).toBe('https://db.example.com/a/b/c.json');
    });

    it('should address the root document with an empty path', () => {
      expect(root.at('').getUri()).toBe('https://db.example.com/.json');
    });

    it('should not mutate the receiver', () => {
      const users = root.at('users');
      users.at('ada');
      expect(users.getUri()).toBe('https://db.example.com/users.json');
      expect(root.getUri()).toBe('https://db.example.com/');
    });

    it('should carry the auth parameter', () => {
      const authed = unwrap(Reference.createWithAuth(BASE, 'test-secret'));
      expect(authed.at('users').getUri()).toBe('https://db.example.com/users.json?auth=test-secret');
    });
  });

  describe('path and key', () => {
    const root = unwrap(Reference.create(BASE));

    it('should expose the decoded path without the suffix', () => {
      expect(root.at('users').at('ada').path).toBe('/users/ada');
      expect(root.at('hello world').path).toBe('/hello world');
      expect(root.path).toBe('/');
      expect(root.at('').path).toBe('/');
    });

    it('should expose the last segment as key', () => {
      expect(root.at('users/ada').key).toBe('ada');
      expect(root.key).toBeNull();
      expect(root.at('').key).toBeNull();
    });
  });

  describe('toString', () => {
    it('should redact the auth value', () => {
      const ref = unwrap(Reference.createWithAuth(BASE, 'test-secret')).at('users');
      expect(ref.toString()).toBe('https://db.example.com/users.json?auth=[REDACTED]');
      expect(ref.getUri()).toContain('test-secret');
    });
  });
});

describe('QueryParams', () => {
  const users = unwrap(Reference.create(BASE)).at('users');

  it('should serialize keys in lexical order regardless of call order', () => {
    const a = users.withParams().orderBy('name').limitToFirst(10).finish();
    const b = users.withParams().limitToFirst(10).orderBy('name').finish();
    expect(a.getUri()).toBe('https://db.example.com/users.json?limitToFirst=10&orderBy=name');
    expect(b.equals(a)).toBe(true);
  });

  it('should append after the auth parameter', () => {
    const authed = unwrap(Reference.createWithAuth(BASE, 'test-secret')).at('users');
    const ref = authed.withParams().orderBy('age').equalTo(5).finish();
    expect(ref.getUri()).toBe('https://db.example.com/users.json?auth=test-secret&equalTo=5&orderBy=age');
  });

  it('should form-encode values', () => {
    const ref = users.withParams().orderBy('"name"').startAt('a b').finish();
    expect(ref.getUri()).toBe('https://db.example.com/users.json?orderBy=%22name%22&startAt=a+b');
  });

  it('should stringify numbers and booleans', () => {
    const ref = users.withParams().limitToLast(3).shallow(true).endAt(2.5).finish();
    expect(ref.getUri()).toBe('https://db.example.com/users.json?endAt=2.5&limitToLast=3&shallow=true');
  });

  it('should request the export format', () => {
    expect(users.withParams().format().finish().getUri()).toBe('https://db.example.com/users.json?format=export');
  });

  it('should keep the last value of a repeated key', () => {
    const ref = users.withParams().limitToFirst(1).limitToFirst(5).finish();
    expect(ref.getUri()).toBe('https://db.example.com/users.json?limitToFirst=5');
  });

  it('should return a new composer on every call', () => {
    const base = users.withParams();
    const ordered = base.orderBy('name');
    expect(base.entries()).toEqual([]);
    expect(ordered.entries()).toEqual([['orderBy', 'name']]);
  });

  it('should leave the source reference untouched', () => {
    users.withParams().orderBy('name').finish();
    expect(users.getUri()).toBe('https://db.example.com/users.json');
  });

  it('should keep query parameters when descending', () => {
    const ref = users.withParams().shallow(true).finish().at('ada');
    expect(ref.getUri()).toBe('https://db.example.com/users/ada.json?shallow=true');
  });
});
