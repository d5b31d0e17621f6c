/**
 * A listing element that mentions the unit category being watched.
 * Produced by a single scan and never persisted.
 */
export interface ListingMatch {
  category: string;
  isAvailable: boolean;
  excerpt: string;
  observedAt: Date;
}

/**
 * Outcome of a fallible step that should not throw
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string; error?: unknown };
