/**
 * Pagination Types
 * Page-number pagination used by list endpoints
 */

/**
 * Parameters for paginated queries
 */
export interface PageParams {
  page: number; // 1-based
  size: number; // Items per page (default: 10, max: 100)
}

/**
 * Envelope for one page of a collection
 */
export interface PageEnvelope<T> {
  items: T[];
  total: number;
  page: number;
  size: number;
}

/**
 * Default pagination values
 */
export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

/**
 * Normalize pagination params with defaults
 */
export function normalizePageParams(params: Partial<PageParams>): PageParams {
  const page = Math.max(Math.trunc(params.page ?? DEFAULT_PAGE), 1);
  const size = Math.min(
    Math.max(Math.trunc(params.size ?? DEFAULT_PAGE_SIZE), 1),
    MAX_PAGE_SIZE
  );
  return { page, size };
}

/**
 * Zero-based inclusive row range covered by a page
 */
export function pageRange(params: PageParams): { from: number; to: number } {
  const from = (params.page - 1) * params.size;
  return { from, to: from + params.size - 1 };
}

/**
 * Wrap a slice of items in a page envelope
 */
export function toPageEnvelope<T>(
  items: T[],
  total: number,
  params: PageParams
): PageEnvelope<T> {
  return { items, total, page: params.page, size: params.size };
}
