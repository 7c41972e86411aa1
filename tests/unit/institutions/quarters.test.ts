import { describe, expect, it } from 'vitest';

import {
  MAX_RANGE_MONTHS,
  latestQuarterCandidates,
  quarterRange,
  splitPeriod,
  toPeriod,
} from '@/modules/institutions/index.js';

describe('latestQuarterCandidates', () => {
  it('starts at the quarter containing today and walks back', () => {
    const today = new Date(Date.UTC(2026, 9, 19));

    expect(latestQuarterCandidates(today)).toEqual([
      202612, 202609, 202606, 202603, 202512, 202509,
    ]);
  });

  it('honours the requested count', () => {
    const today = new Date(Date.UTC(2024, 2, 31));

    expect(latestQuarterCandidates(today, 2)).toEqual([202403, 202312]);
  });
});

describe('quarterRange', () => {
  it('lists every quarter end, both ends included', () => {
    expect(quarterRange(202303, 202312)._unsafeUnwrap()).toEqual([
      202303, 202306, 202309, 202312,
    ]);
  });

  it('accepts a single quarter', () => {
    expect(quarterRange(202406, 202406)._unsafeUnwrap()).toEqual([202406]);
  });

  it('crosses year boundaries', () => {
    expect(quarterRange(202309, 202403)._unsafeUnwrap()).toEqual([202309, 202312, 202403]);
  });

  it('accepts a range of exactly the limit', () => {
    expect(quarterRange(202303, 202503)._unsafeUnwrap()).toHaveLength(MAX_RANGE_MONTHS / 3 + 1);
  });

  it('rejects ranges beyond the limit', () => {
    expect(quarterRange(202303, 202506)._unsafeUnwrapErr()).toEqual({
      type: 'INVALID_QUARTER_RANGE',
      message: 'Range spans 27 months; the limit is 24',
    });
  });

  it('rejects an end before the start', () => {
    expect(quarterRange(202312, 202306)._unsafeUnwrapErr().message).toBe(
      'End period must not precede the start period'
    );
  });

  it('rejects months that do not end a quarter', () => {
    expect(quarterRange(202302, 202306)._unsafeUnwrapErr().message).toBe(
      'Periods must end a quarter (months 03, 06, 09 or 12)'
    );
  });
});

describe('period helpers', () => {
  it('round-trips year and month', () => {
    expect(toPeriod(2024, 9)).toBe(202409);
    expect(splitPeriod(202409)).toEqual({ year: 2024, month: 9 });
  });
});
