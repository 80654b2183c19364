/** Page size used when the caller sends none, zero or a negative value */
export const DEFAULT_PAGE_SIZE = 20;

/** Upper bound for a single page; larger requests are clamped silently */
export const MAX_PAGE_SIZE = 100;

export interface PageWindow {
  page: number;
  pageSize: number;
  offset: number;
}

/**
 * Normalises a 1-based page request into an offset/limit window.
 *
 * - page absent or ≤ 0 → 1
 * - pageSize absent or ≤ 0 → DEFAULT_PAGE_SIZE
 * - pageSize > MAX_PAGE_SIZE → MAX_PAGE_SIZE
 */
export function toPageWindow(page?: number, pageSize?: number): PageWindow {
  const normalizedPage =
    page !== undefined && Number.isFinite(page) && page > 0
      ? Math.floor(page)
      : 1;

  const requestedSize =
    pageSize !== undefined && Number.isFinite(pageSize) && pageSize > 0
      ? Math.floor(pageSize)
      : DEFAULT_PAGE_SIZE;
  const normalizedSize = Math.min(requestedSize, MAX_PAGE_SIZE);

  return {
    page: normalizedPage,
    pageSize: normalizedSize,
    offset: (normalizedPage - 1) * normalizedSize,
  };
}
