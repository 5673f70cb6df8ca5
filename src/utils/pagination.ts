export interface PageRequest {
  page: number;
  pageSize: number;
}

export interface Page<T> {
  count: number;
  page: number;
  pageSize: number;
  results: T[];
}

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;
/** Highest page whose offset stays a safe integer at any page size. */
export const MAX_PAGE = Math.floor(Number.MAX_SAFE_INTEGER / MAX_PAGE_SIZE);

const positiveInt = (value: unknown): number | undefined => {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) return undefined;
  const parsed = parseInt(value, 10);
  return parsed > 0 ? parsed : undefined;
};

/**
 * Reads `page` and `pageSize`; malformed values fall back to the defaults.
 * Oversized pages are capped at MAX_PAGE, which is always past the last row.
 */
export function parsePageRequest(query: Record<string, unknown>): PageRequest {
  const page = Math.min(positiveInt(query.page) ?? 1, MAX_PAGE);
  const pageSize = Math.min(positiveInt(query.pageSize) ?? DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);
  return { page, pageSize };
}

export const toLimitOffset = ({ page, pageSize }: PageRequest) => ({
  limit: pageSize,
  offset: (page - 1) * pageSize,
});

export const mapPage = <T, U>(page: Page<T>, mapper: (item: T) => U): Page<U> => ({
  ...page,
  results: page.results.map(mapper),
});
