/**
 * Search criteria accepted by the `search_vulnerabilities` tool. Every field
 * is optional; `null` and `undefined` both mean "not filtered".
 */
export interface SearchFilters {
  /** Minimum CVSS base score (0-10). */
  from_score?: number | null;
  /** Maximum CVSS base score (0-10). */
  to_score?: number | null;
  /** Minimum EPSS score (0-100). */
  from_epss?: number | null;
  /** Maximum EPSS score (0-100). */
  to_epss?: number | null;
  /** Published on or after, YYYY-MM-DD. */
  from_date?: string | null;
  /** Published on or before, YYYY-MM-DD. */
  to_date?: string | null;
  /** Updated on or after, YYYY-MM-DD. */
  from_updated_date?: string | null;
  /** Updated on or before, YYYY-MM-DD. */
  to_updated_date?: string | null;
  product?: string | null;
  vendor?: string | null;
  assigner?: string | null;
  exploited?: boolean | null;
  /** Free-text keyword search. */
  text?: string | null;
  /** 0-based page index. */
  page?: number | null;
  /** Page size (upstream default 10, max 100). */
  size?: number | null;
}

export type SearchFilterName = keyof SearchFilters;

/** Query string values handed to the transport, keyed by wire name. */
export type QueryParams = Record<string, string | number>;
