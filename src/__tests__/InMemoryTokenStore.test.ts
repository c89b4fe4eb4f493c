import { describe, it, expect } from 'vitest';
import { InMemoryTokenStore } from '../token/InMemoryTokenStore.js';
import type { CachedToken } from '../token/tokenTypes.js';

function token(value: string, expiresAt: number = Date.now() + 3600_000): CachedToken {
  return { value, tokenType: 'Bearer', expiresAt };
}

describe('InMemoryTokenStore', () => {
  it('should return undefined for an unknown key', () => {
    const store = new InMemoryTokenStore({ maxEntries: 10 });

    expect(store.get('missing')).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it('should return the last token written for a key', () => {
    const store = new InMemoryTokenStore({ maxEntries: 10 });
    const first = token('first');
    const second = token('second');

    store.set('key', first);
    store.set('key', second);

    expect(store.get('key')).toBe(second);
    expect(store.size).toBe(1);
  });

  it('should keep returning a token after it expired', () => {
    const store = new InMemoryTokenStore({ maxEntries: 10 });
    const stale = token('stale', Date.now() - 1000);

    store.set('key', stale);

    expect(store.get('key')).toBe(stale);
  });

  it('should evict the oldest-written entry when full', () => {
    const store = new InMemoryTokenStore({ maxEntries: 2 });

    store.set('a', token('a'));
    store.set('b', token('b'));
    store.set('c', token('c'));

    expect(store.get('a')).toBeUndefined();
    expect(store.get('b')?.value).toBe('b');
    expect(store.get('c')?.value).toBe('c');
    expect(store.size).toBe(2);
  });

  it('should treat a rewrite as the newest entry', () => {
    const store = new InMemoryTokenStore({ maxEntries: 2 });

    store.set('a', token('a1'));
    store.set('b', token('b'));
    store.set('a', token('a2'));
    store.set('c', token('c'));

    expect(store.get('a')?.value).toBe('a2');
    expect(store.get('b')).toBeUndefined();
    expect(store.get('c')?.value).toBe('c');
  });

  it('should reject a capacity below one', () => {
    expect(() => new InMemoryTokenStore({ maxEntries: 0 })).toThrow(RangeError);
  });
});
