import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { SimpleCacheImpl } from './simple-cache';

describe('SimpleCacheImpl', (): void => {
  beforeEach((): void => {
    vi.useFakeTimers();
  });

  afterEach((): void => {
    vi.useRealTimers();
  });

  it('returns undefined for missing key', (): void => {
    const cache: SimpleCacheImpl<string> = new SimpleCacheImpl<string>({ ttlSec: 60 });

    expect(cache.get('missing')).toBeUndefined();
  });

  it('stores and deletes a value', (): void => {
    const cache: SimpleCacheImpl<string> = new SimpleCacheImpl<string>({ ttlSec: 60 });

    cache.set('key', 'value');
    expect(cache.get('key')).toBe('value');

    cache.del('key');
    expect(cache.get('key')).toBeUndefined();
  });

  it('expires entries after the configured ttl', (): void => {
    const cache: SimpleCacheImpl<string> = new SimpleCacheImpl<string>({ ttlSec: 10 });

    cache.set('key', 'value');

    vi.advanceTimersByTime(9_999);
    expect(cache.get('key')).toBe('value');

    vi.advanceTimersByTime(2);
    expect(cache.get('key')).toBeUndefined();
  });

  it('evicts the oldest key when maxKeys is reached', (): void => {
    const cache: SimpleCacheImpl<string> = new SimpleCacheImpl<string>({ ttlSec: 60, maxKeys: 2 });

    cache.set('a', '1');
    cache.set('b', '2');
    cache.set('a', 'updated');
    cache.set('c', '3');

    expect(cache.get('a')).toBeUndefined();
    expect(cache.get('b')).toBe('2');
    expect(cache.get('c')).toBe('3');
  });

  it('overwrites an existing key at capacity without evicting', (): void => {
    const cache: SimpleCacheImpl<string> = new SimpleCacheImpl<string>({ ttlSec: 60, maxKeys: 2 });

    cache.set('a', '1');
    cache.set('b', '2');
    cache.set('b', 'updated');

    expect(cache.get('a')).toBe('1');
    expect(cache.get('b')).toBe('updated');
  });
});
