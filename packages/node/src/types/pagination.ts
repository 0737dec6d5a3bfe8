/**
 * Position-based pagination.
 *
 * Clients pass the last position they have seen (`afterPosition` or
 * `afterVersion`); list endpoints return
 * { data, pagination: { next, hasMore } } where `next` is the value to
 * pass for the following page.
 */

// =============================================================================
// Types
// =============================================================================

export interface PaginationMeta {
  readonly next: number | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// =============================================================================
// Pagination
// =============================================================================

/**
 * Take the first `limit` items of an ascending sequence.
 */
export function paginate<T>(
  items: readonly T[],
  limit: number,
  position: (item: T) => number,
): PaginatedResponse<T> {
  const hasMore = items.length > limit;
  const data = items.slice(0, limit);
  const last = data.at(-1);

  return {
    data,
    pagination: {
      next: hasMore && last !== undefined ? position(last) : null,
      hasMore,
    },
  };
}
