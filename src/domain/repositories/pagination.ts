/**
 * Offset/limit pagination shared by every list query.
 */
export interface PageOptions {
  skip?: number;
  limit?: number;
}

export const DEFAULT_PAGE_LIMIT = 100;

export interface ResolvedPage {
  skip: number;
  limit: number;
}

/**
 * Apply defaults and clamp negatives to zero.
 *
 * A resolved `limit` of 0 means "no rows". Both storage drivers treat 0 as
 * unlimited, so implementations must short-circuit it before querying.
 */
export function resolvePage(page?: PageOptions): ResolvedPage {
  return {
    skip: clampCount(page?.skip, 0),
    limit: clampCount(page?.limit, DEFAULT_PAGE_LIMIT),
  };
}

/** Non-finite input (NaN, Infinity) falls back to the default. */
function clampCount(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : fallback;
}
