/**
 * Pagination Types
 * Common pagination structures used across services
 */

/**
 * Parameters for paginated queries
 */
export interface PaginationParams {
  cursor?: string; // id of last item (cursor-based)
  limit: number; // Max items per page (default: 20, max: 100)
}

/**
 * Result wrapper for paginated data
 */
export interface PaginatedResult<T> {
  items: T[];
  nextCursor?: string; // Undefined if no more items
  hasMore: boolean;
}
