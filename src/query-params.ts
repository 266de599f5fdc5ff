import type { QueryParams, SearchFilterName, SearchFilters } from './types';

/**
 * Wire names used by `/api/search`, keyed by filter name.
 */
export const SEARCH_PARAM_NAMES = {
  from_score: 'fromScore',
  to_score: 'toScore',
  from_epss: 'fromEpss',
  to_epss: 'toEpss',
  from_date: 'fromDate',
  to_date: 'toDate',
  from_updated_date: 'fromUpdatedDate',
  to_updated_date: 'toUpdatedDate',
  product: 'product',
  vendor: 'vendor',
  assigner: 'assigner',
  exploited: 'exploited',
  text: 'text',
  page: 'page',
  size: 'size',
} as const satisfies Record<SearchFilterName, string>;

const FILTER_NAMES: readonly SearchFilterName[] = [
  'from_score',
  'to_score',
  'from_epss',
  'to_epss',
  'from_date',
  'to_date',
  'from_updated_date',
  'to_updated_date',
  'product',
  'vendor',
  'assigner',
  'exploited',
  'text',
  'page',
  'size',
];

/**
 * Builds the query parameters for a vulnerability search.
 *
 * Absent filters are left out entirely, so an empty filter set gives an
 * empty object. Numbers are passed through untouched; range checks belong
 * to the EUVD API. `exploited` becomes the literal `"true"` or `"false"`.
 */
export function buildSearchParams(filters: SearchFilters): QueryParams {
  const params: QueryParams = {};

  for (const name of FILTER_NAMES) {
    const value = filters[name];
    if (value === undefined || value === null) {
      continue;
    }
    params[SEARCH_PARAM_NAMES[name]] = typeof value === 'boolean' ? String(value) : value;
  }

  return params;
}

export function hasParams(params: QueryParams | undefined): params is QueryParams {
  return params !== undefined && Object.keys(params).length > 0;
}
