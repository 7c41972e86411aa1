import { err, ok, type Result } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import { createNetworkError, type FetchError } from '@/common/types/errors.js';
import { createSilentCache } from '@/infra/cache/wrappers/silent-cache.js';
import { withCacheResult } from '@/infra/cache/with-cache.js';

import { makeTestLogger } from '../../../fixtures/builders.js';
import { makeFakeCachePort } from '../../../fixtures/fakes.js';

import type { TabularResult } from '@/common/types/tabular.js';

type FetchRates = (modality: string) => Promise<Result<TabularResult, FetchError>>;

const makeCache = () => createSilentCache(makeFakeCachePort(), { logger: makeTestLogger() });

describe('withCacheResult', () => {
  it('calls through once and serves repeats from the cache', async () => {
    const fetchRates = vi.fn<FetchRates>(async () => ok([{ TaxaJurosAoAno: 120 }]));
    const cached = withCacheResult(fetchRates, makeCache(), {
      keyGenerator: ([modality]) => `rates:${modality}`,
    });

    const first = await cached('Cheque especial');
    const second = await cached('Cheque especial');
    await cached('Cartão de crédito');

    expect(first._unsafeUnwrap()).toEqual([{ TaxaJurosAoAno: 120 }]);
    expect(second._unsafeUnwrap()).toEqual([{ TaxaJurosAoAno: 120 }]);
    expect(fetchRates).toHaveBeenCalledTimes(2);
  });

  it('does not remember failures', async () => {
    const fetchRates = vi
      .fn<FetchRates>()
      .mockResolvedValueOnce(err(createNetworkError('connection reset')))
      .mockResolvedValueOnce(ok([]));
    const cached = withCacheResult(fetchRates, makeCache(), {
      keyGenerator: ([modality]) => modality,
    });

    expect((await cached('Cheque especial'))._unsafeUnwrapErr().type).toBe('NetworkError');
    expect((await cached('Cheque especial'))._unsafeUnwrap()).toEqual([]);
    expect(fetchRates).toHaveBeenCalledTimes(2);
  });
});
