export const QUESTIONS_PER_PAGE = 10;

/**
 * 1-based page slice. No clamping: a page past the end is just empty,
 * and what that means is up to the caller.
 */
export function paginate<T>(items: readonly T[], page: number, pageSize = QUESTIONS_PER_PAGE): T[] {
  const start = (page - 1) * pageSize;
  const end = start + pageSize;
  return items.slice(start, end);
}

export function isValidPage(page: number, pageSize: number): boolean {
  return Number.isInteger(page) && page >= 1 && Number.isInteger(pageSize) && pageSize > 0;
}
