/**
 * Fuzzy matcher constants
 */

/**
 * Number of ranked candidates returned when the caller gives none.
 * The first is the primary match, the rest are suggestions.
 */
export const DEFAULT_TOP_K = 4;

export const LOOKUP_TOP_K_ENV = "LOOKUP_TOP_K";

/**
 * Distance contributed by a missing field (no resemblance)
 */
export const MAX_DISTANCE = 1;

/**
 * Candidate strings at least this long get popular-character pruning
 * when seeding matching blocks
 */
export const AUTOJUNK_MIN_LENGTH = 200;
