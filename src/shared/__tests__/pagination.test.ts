import {
  getPaginationParams,
  parsePositiveInt,
  resolvePagination,
  resolvePaginationWithDefault,
} from '../pagination.js';

describe('parsePositiveInt', () => {
  it.each<[unknown, number]>([
    ['3', 3],
    [' 12 ', 12],
    ['+4', 4],
    [7, 7],
    [['2', '9'], 2],
  ])('parses %p as %p', (raw, expected) => {
    expect(parsePositiveInt(raw)).toBe(expected);
  });

  it.each<unknown>([undefined, null, '', 'abc', '2.5', '1e3', '0', '-3', 0, -1, 1.5, Number.NaN, '99999999999999999999', {}])(
    'rejects %p',
    (raw) => {
      expect(parsePositiveInt(raw)).toBeUndefined();
    }
  );
});

describe('resolvePaginationWithDefault', () => {
  it('keeps valid parameters unchanged', () => {
    expect(resolvePaginationWithDefault(3, 25, 1, 10)).toEqual({ page: 3, perPage: 25 });
    expect(resolvePaginationWithDefault('3', '25', 1, 10)).toEqual({ page: 3, perPage: 25 });
  });

  it('replaces zero and negative values with the defaults', () => {
    expect(resolvePaginationWithDefault(0, -5, 1, 10)).toEqual({ page: 1, perPage: 10 });
  });

  it('falls back per field', () => {
    expect(resolvePaginationWithDefault('abc', '50', 2, 20)).toEqual({ page: 2, perPage: 50 });
    expect(resolvePaginationWithDefault('4', undefined, 2, 20)).toEqual({ page: 4, perPage: 20 });
  });
});

describe('resolvePagination', () => {
  it('uses page 1 and 10 items per page by default', () => {
    expect(resolvePagination(undefined, undefined)).toEqual({ page: 1, perPage: 10 });
  });

  it('does not cap large page sizes', () => {
    expect(resolvePagination('1', '5000')).toEqual({ page: 1, perPage: 5000 });
  });
});

describe('getPaginationParams', () => {
  it('reads page and per_page from a decoded query', () => {
    expect(getPaginationParams({ page: '2', per_page: '15', city: 'KYIV' })).toEqual({ page: 2, perPage: 15 });
  });

  it('ignores perPage spelled in camelCase', () => {
    expect(getPaginationParams({ page: '2', perPage: '15' })).toEqual({ page: 2, perPage: 10 });
  });

  it('applies the given defaults', () => {
    expect(getPaginationParams({}, { page: 1, perPage: 25 })).toEqual({ page: 1, perPage: 25 });
  });

  it('treats a missing query as empty', () => {
    expect(getPaginationParams(undefined)).toEqual({ page: 1, perPage: 10 });
    expect(getPaginationParams('page=2')).toEqual({ page: 1, perPage: 10 });
  });
});
