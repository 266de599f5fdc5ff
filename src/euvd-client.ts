import { setTimeout as sleep } from 'node:timers/promises';
import type { Settings } from './config';
import { TransportError, errorMessage } from './errors';
import { logDebug, logWarn } from './logger';
import {
  type Advisory,
  type SearchResponse,
  type Vulnerability,
  type VulnerabilityList,
  parseAdvisory,
  parseSearchResponse,
  parseVulnerability,
  parseVulnerabilityList,
} from './models';
import { buildSearchParams, hasParams } from './query-params';
import type { QueryParams, SearchFilters } from './types';

const EUVD_SITE = 'https://euvdservices.enisa.europa.eu';

/** Statuses worth another attempt: rate limiting and gateway trouble. */
export const RETRY_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export interface EuvdClientOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Retries after the first attempt. */
  maxRetries: number;
  userAgent: string;
  /** First backoff delay; doubles on each retry. */
  retryBaseDelayMs?: number;
  fetch?: typeof fetch;
  /** Waits between attempts. */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Client for the public EUVD API. No endpoint needs authentication; every
 * call is a GET returning JSON.
 */
export class EuvdClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: EuvdClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.maxRetries = options.maxRetries;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? (ms => sleep(ms));
    this.headers = {
      'User-Agent': options.userAgent,
      Accept: 'application/json, text/plain, */*',
      'Accept-Language': 'en-US,en;q=0.9',
      Referer: `${EUVD_SITE}/`,
      Origin: EUVD_SITE,
    };
  }

  static fromSettings(settings: Settings, fetchImpl?: typeof fetch): EuvdClient {
    return new EuvdClient({
      baseUrl: settings.euvdBaseUrl,
      timeoutMs: settings.euvdTimeout * 1000,
      maxRetries: settings.euvdMaxRetries,
      userAgent: settings.userAgent,
      fetch: fetchImpl,
    });
  }

  get apiBaseUrl(): string {
    return this.baseUrl;
  }

  /** Up to 8 of the most recently published vulnerabilities. */
  async getLastVulnerabilities(): Promise<VulnerabilityList> {
    return parseVulnerabilityList(await this.request('/api/lastvulnerabilities'));
  }

  /** Up to 8 of the most recently exploited vulnerabilities. */
  async getExploitedVulnerabilities(): Promise<VulnerabilityList> {
    return parseVulnerabilityList(await this.request('/api/exploitedvulnerabilities'));
  }

  /** Up to 8 of the most recent critical vulnerabilities. */
  async getCriticalVulnerabilities(): Promise<VulnerabilityList> {
    return parseVulnerabilityList(await this.request('/api/criticalvulnerabilities'));
  }

  /**
   * Search with any combination of filters. The API returns at most 100
   * records per page.
   */
  async searchVulnerabilities(filters: SearchFilters = {}): Promise<SearchResponse> {
    return parseSearchResponse(await this.request('/api/search', buildSearchParams(filters)));
  }

  /** Look up a vulnerability by EUVD id, e.g. `EUVD-2024-45012`. */
  async getVulnerabilityById(enisaId: string): Promise<Vulnerability> {
    return parseVulnerability(await this.request('/api/enisaid', { id: enisaId }));
  }

  /** Look up an advisory by id, e.g. `cisco-sa-ata19x-multi-RDTEqRsy`. */
  async getAdvisoryById(advisoryId: string): Promise<Advisory> {
    return parseAdvisory(await this.request('/api/advisory', { id: advisoryId }));
  }

  /**
   * GET an endpoint and decode its JSON body.
   *
   * Network errors, timeouts and the statuses in {@link RETRY_STATUSES} are
   * retried with exponential backoff (or the server's `Retry-After`). Any
   * other non-success status fails at once.
   */
  async request(endpoint: string, params?: QueryParams): Promise<unknown> {
    const url = this.buildUrl(endpoint, params);
    let lastError: TransportError | null = null;
    let retryAfterMs: number | undefined;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0 && lastError) {
        const delayMs = retryAfterMs ?? this.retryBaseDelayMs * 2 ** (attempt - 1);
        logWarn(`[EuvdClient] Attempt ${attempt} failed, retrying in ${delayMs}ms`, {
          url,
          error: lastError.message,
        });
        await this.sleep(delayMs);
      }

      logDebug('[EuvdClient] GET', { url, attempt: attempt + 1 });

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: 'GET',
          headers: this.headers,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (error) {
        lastError = new TransportError(url, errorMessage(error), { cause: error });
        retryAfterMs = undefined;
        continue;
      }

      if (!response.ok) {
        const detail = `${response.status} ${response.statusText}`.trim();
        lastError = new TransportError(url, detail, { status: response.status });
        retryAfterMs = parseRetryAfter(response.headers.get('retry-after'));
        await response.body?.cancel();
        if (RETRY_STATUSES.has(response.status)) {
          continue;
        }
        throw lastError;
      }

      try {
        return await response.json();
      } catch (error) {
        throw new TransportError(url, `Invalid JSON response: ${errorMessage(error)}`, {
          status: response.status,
          cause: error,
        });
      }
    }

    throw lastError ?? new TransportError(url, 'No attempt was made');
  }

  private buildUrl(endpoint: string, params?: QueryParams): string {
    const url = `${this.baseUrl}${endpoint}`;
    if (!hasParams(params)) {
      return url;
    }
    const query = new URLSearchParams();
    for (const [name, value] of Object.entries(params)) {
      query.append(name, String(value));
    }
    return `${url}?${query.toString()}`;
  }
}

function parseRetryAfter(header: string | null): number | undefined {
  if (header === null) {
    return undefined;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}
