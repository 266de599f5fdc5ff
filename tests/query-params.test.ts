import { describe, it, expect } from 'vitest';
import { SEARCH_PARAM_NAMES, buildSearchParams, hasParams } from '../src/query-params';
import type { QueryParams, SearchFilters } from '../src/types';

describe('buildSearchParams', () => {
  it('should return an empty object when no filter is set', () => {
    expect(buildSearchParams({})).toEqual({});
  });

  it('should skip filters that are null or undefined', () => {
    const params = buildSearchParams({ from_score: null, vendor: undefined, text: null });
    expect(params).toEqual({});
    expect(hasParams(params)).toBe(false);
  });

  const singleFilterCases: Array<[string, SearchFilters, QueryParams]> = [
    ['from_score', { from_score: 7.5 }, { fromScore: 7.5 }],
    ['to_score', { to_score: 10 }, { toScore: 10 }],
    ['from_epss', { from_epss: 50 }, { fromEpss: 50 }],
    ['to_epss', { to_epss: 100 }, { toEpss: 100 }],
    ['from_date', { from_date: '2024-01-01' }, { fromDate: '2024-01-01' }],
    ['to_date', { to_date: '2024-12-31' }, { toDate: '2024-12-31' }],
    ['from_updated_date', { from_updated_date: '2024-06-01' }, { fromUpdatedDate: '2024-06-01' }],
    ['to_updated_date', { to_updated_date: '2024-06-30' }, { toUpdatedDate: '2024-06-30' }],
    ['product', { product: 'Windows' }, { product: 'Windows' }],
    ['vendor', { vendor: 'Microsoft' }, { vendor: 'Microsoft' }],
    ['assigner', { assigner: 'mitre' }, { assigner: 'mitre' }],
    ['text', { text: 'remote code execution' }, { text: 'remote code execution' }],
    ['page', { page: 1 }, { page: 1 }],
    ['size', { size: 20 }, { size: 20 }],
  ];

  it.each(singleFilterCases)('should map %s to a single parameter', (_name, filters, expected) => {
    expect(buildSearchParams(filters)).toEqual(expected);
  });

  it('should serialize exploited as a lowercase string', () => {
    expect(buildSearchParams({ exploited: true })).toEqual({ exploited: 'true' });
    expect(buildSearchParams({ exploited: false })).toEqual({ exploited: 'false' });
  });

  it('should pass numbers through without clamping or rounding', () => {
    expect(buildSearchParams({ from_score: 12.345, to_score: -1, page: 0 })).toEqual({
      fromScore: 12.345,
      toScore: -1,
      page: 0,
    });
  });

  it('should not reject conflicting ranges', () => {
    expect(buildSearchParams({ from_date: '2025-01-01', to_date: '2024-01-01' })).toEqual({
      fromDate: '2025-01-01',
      toDate: '2024-01-01',
    });
  });

  it('should keep empty strings since they are present values', () => {
    expect(buildSearchParams({ product: '' })).toEqual({ product: '' });
  });

  it('should combine every filter', () => {
    const params = buildSearchParams({
      from_score: 7.5,
      to_score: 10,
      from_epss: 50,
      to_epss: 100,
      from_date: '2024-01-01',
      to_date: '2024-12-31',
      from_updated_date: '2024-06-01',
      to_updated_date: '2024-06-30',
      product: 'Windows',
      vendor: 'Microsoft',
      assigner: 'mitre',
      exploited: true,
      text: 'kernel',
      page: 2,
      size: 50,
    });

    expect(Object.keys(params).sort()).toEqual(Object.values(SEARCH_PARAM_NAMES).sort());
    expect(params.exploited).toBe('true');
    expect(params.size).toBe(50);
  });
});
