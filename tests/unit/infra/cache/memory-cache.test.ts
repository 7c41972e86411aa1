import { describe, expect, it } from 'vitest';

import { utcDate } from '@/common/types/temporal.js';
import { createMemoryCache } from '@/infra/cache/adapters/memory-cache.js';

import type { TabularResult } from '@/common/types/tabular.js';

const makeClock = (start = 0) => {
  let time = start;
  return {
    now: () => time,
    advance: (ms: number) => {
      time += ms;
    },
  };
};

describe('MemoryCache', () => {
  it('reads a miss as undefined', async () => {
    const cache = createMemoryCache<string>();

    expect((await cache.get('missing'))._unsafeUnwrap()).toBeUndefined();
  });

  it('returns stored tables with their dates intact', async () => {
    const cache = createMemoryCache<TabularResult>();
    const table: TabularResult = [{ Mes: utcDate(2024, 3, 1), TaxaJurosAoAno: 12.5 }];

    await cache.set('rates', table);
    const cached = (await cache.get('rates'))._unsafeUnwrap();

    expect(cached).toEqual(table);
    expect(cached?.[0]?.['Mes']).toBeInstanceOf(Date);
  });

  it('hands out copies, not the stored instance', async () => {
    const cache = createMemoryCache<{ values: number[] }>();
    const value = { values: [1] };

    await cache.set('key', value);
    value.values.push(2);

    expect((await cache.get('key'))._unsafeUnwrap()).toEqual({ values: [1] });
  });

  it('expires entries after the default TTL', async () => {
    const clock = makeClock();
    const cache = createMemoryCache<string>({ defaultTtlMs: 1000, now: clock.now });

    await cache.set('key', 'value');
    clock.advance(999);
    expect((await cache.get('key'))._unsafeUnwrap()).toBe('value');

    clock.advance(1);
    expect((await cache.get('key'))._unsafeUnwrap()).toBeUndefined();
  });

  it('honours a TTL given on set', async () => {
    const clock = makeClock();
    const cache = createMemoryCache<string>({ defaultTtlMs: 1000, now: clock.now });

    await cache.set('short', 'value', { ttlMs: 10 });
    await cache.set('long', 'value');
    clock.advance(50);

    expect((await cache.get('short'))._unsafeUnwrap()).toBeUndefined();
    expect((await cache.get('long'))._unsafeUnwrap()).toBe('value');
  });

  it('evicts the least recently used entry at capacity', async () => {
    const cache = createMemoryCache<string>({ maxEntries: 2 });

    await cache.set('a', '1');
    await cache.set('b', '2');
    await cache.get('a');
    await cache.set('c', '3');

    expect((await cache.get('a'))._unsafeUnwrap()).toBe('1');
    expect((await cache.get('b'))._unsafeUnwrap()).toBeUndefined();
    expect((await cache.get('c'))._unsafeUnwrap()).toBe('3');
  });

  it('overwrites without evicting', async () => {
    const cache = createMemoryCache<string>({ maxEntries: 2 });

    await cache.set('a', '1');
    await cache.set('b', '2');
    await cache.set('a', '3');

    expect((await cache.get('a'))._unsafeUnwrap()).toBe('3');
    expect((await cache.get('b'))._unsafeUnwrap()).toBe('2');
  });

  it('clears a namespace by prefix', async () => {
    const cache = createMemoryCache<number>();

    await cache.set('app:bcb:sgs:1', 1);
    await cache.set('app:bcb:sgs:2', 2);
    await cache.set('app:bcb:ifdata:1', 3);

    expect((await cache.clearByPrefix('app:bcb:sgs:'))._unsafeUnwrap()).toBe(2);
    expect((await cache.get('app:bcb:ifdata:1'))._unsafeUnwrap()).toBe(3);
  });

  it('deletes single keys', async () => {
    const cache = createMemoryCache<number>();
    await cache.set('key', 1);

    expect((await cache.delete('key'))._unsafeUnwrap()).toBe(true);
    expect((await cache.delete('key'))._unsafeUnwrap()).toBe(false);
  });

  it('counts hits and misses until cleared', async () => {
    const cache = createMemoryCache<number>();
    await cache.set('key', 1);
    await cache.get('key');
    await cache.get('other');

    expect(await cache.stats()).toEqual({ hits: 1, misses: 1, size: 1 });

    await cache.clear();
    expect(await cache.stats()).toEqual({ hits: 0, misses: 0, size: 0 });
  });
});
