import { z } from 'zod';
import { ValidationError } from './errors';

// Upstream records are not contractually stable: every schema passes unknown
// keys through, and optional fields also accept null.

const crossReferenceList = z.array(z.record(z.string(), z.unknown()));

export const vulnerabilitySchema = z
  .object({
    id: z.string(),
    enisaUuid: z.string().nullish(),
    description: z.string().nullish(),
    datePublished: z.string().nullish(),
    dateUpdated: z.string().nullish(),
    baseScore: z.number().nullish(),
    baseScoreVersion: z.string().nullish(),
    baseScoreVector: z.string().nullish(),
    references: z.string().nullish(),
    aliases: z.string().nullish(),
    assigner: z.string().nullish(),
    epss: z.number().nullish(),
    exploitedSince: z.string().nullish(),
    enisaIdProduct: crossReferenceList.nullish(),
    enisaIdVendor: crossReferenceList.nullish(),
    enisaIdVulnerability: crossReferenceList.nullish(),
    enisaIdAdvisory: crossReferenceList.nullish(),
  })
  .passthrough();

export type Vulnerability = z.infer<typeof vulnerabilitySchema>;

export const advisorySourceSchema = z
  .object({
    id: z.number(),
    name: z.string(),
  })
  .passthrough();

export type AdvisorySource = z.infer<typeof advisorySourceSchema>;

export const advisorySchema = z
  .object({
    id: z.string(),
    description: z.string().nullish(),
    summary: z.string().nullish(),
    datePublished: z.string().nullish(),
    dateUpdated: z.string().nullish(),
    baseScore: z.number().nullish(),
    references: z.string().nullish(),
    aliases: z.string().nullish(),
    source: advisorySourceSchema.nullish(),
    advisoryProduct: crossReferenceList.nullish(),
    enisaIdAdvisories: crossReferenceList.nullish(),
    vulnerabilityAdvisory: crossReferenceList.nullish(),
  })
  .passthrough();

export type Advisory = z.infer<typeof advisorySchema>;

export const ITEM_KEYS = ['content', 'data'] as const;
export const TOTAL_KEYS = ['totalElements', 'total'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the value of the first key that is present (not undefined or null).
 */
export function firstPresent(record: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = record[key];
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return undefined;
}

/**
 * Maps the alternative page shapes onto `content` / `totalElements` and fills
 * pagination defaults. Non-objects are returned as is so the schema rejects
 * them.
 */
function normalizePage(input: unknown): unknown {
  if (!isRecord(input)) {
    return input;
  }

  const content = firstPresent(input, ITEM_KEYS) ?? [];
  const itemCount = Array.isArray(content) ? content.length : 0;
  const totalElements = firstPresent(input, TOTAL_KEYS) ?? itemCount;
  const size = input.size ?? itemCount;
  const page = input.page ?? 0;
  const totalPages =
    input.totalPages ??
    (typeof totalElements === 'number' && typeof size === 'number' && size > 0
      ? Math.ceil(totalElements / size)
      : 0);

  return { content, totalElements, totalPages, page, size };
}

const searchPageSchema = z.preprocess(
  normalizePage,
  z.object({
    content: z.array(vulnerabilitySchema),
    totalElements: z.number().int().nonnegative(),
    totalPages: z.number().int().nonnegative(),
    page: z.number().int(),
    size: z.number().int(),
  }),
);

export type SearchPage = z.infer<typeof searchPageSchema>;

function validate<T extends z.ZodTypeAny>(schema: T, data: unknown, target: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(target, result.error.issues);
  }
  return result.data;
}

/**
 * Read-only view over an ordered list of records.
 */
export abstract class RecordSequence<T> implements Iterable<T> {
  protected readonly items: readonly T[];

  protected constructor(items: readonly T[]) {
    this.items = Object.freeze([...items]);
  }

  get length(): number {
    return this.items.length;
  }

  at(index: number): T | undefined {
    return this.items.at(index);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}

/**
 * Unpaginated list returned by the latest, exploited and critical endpoints.
 * The upstream caps these at 8 records; no cap is applied here.
 */
export class VulnerabilityList extends RecordSequence<Vulnerability> {
  constructor(list: readonly Vulnerability[]) {
    super(list);
  }

  get list(): readonly Vulnerability[] {
    return this.items;
  }

  toJSON(): { list: Vulnerability[] } {
    return { list: [...this.items] };
  }
}

/**
 * One page of `/api/search` results.
 */
export class SearchResponse extends RecordSequence<Vulnerability> {
  readonly totalElements: number;
  readonly totalPages: number;
  readonly page: number;
  readonly size: number;

  constructor(searchPage: SearchPage) {
    super(searchPage.content);
    this.totalElements = searchPage.totalElements;
    this.totalPages = searchPage.totalPages;
    this.page = searchPage.page;
    this.size = searchPage.size;
  }

  get content(): readonly Vulnerability[] {
    return this.items;
  }

  toJSON(): SearchPage {
    return {
      content: [...this.items],
      totalElements: this.totalElements,
      totalPages: this.totalPages,
      page: this.page,
      size: this.size,
    };
  }
}

export function parseVulnerability(data: unknown): Vulnerability {
  return validate(vulnerabilitySchema, data, 'vulnerability');
}

export function parseAdvisory(data: unknown): Advisory {
  return validate(advisorySchema, data, 'advisory');
}

export function parseVulnerabilityList(data: unknown): VulnerabilityList {
  return new VulnerabilityList(validate(z.array(vulnerabilitySchema), data, 'vulnerability list'));
}

export function parseSearchResponse(data: unknown): SearchResponse {
  return new SearchResponse(validate(searchPageSchema, data, 'search response'));
}
