/**
 * pagewise - Constants
 * Default values in one place
 */

// =============================================================================
// Paging
// =============================================================================

/** Default position a pagination starts from */
export const DEFAULT_OFFSET = 0;

/** Default number of items requested per page */
export const DEFAULT_PAGE_SIZE = 20;

// =============================================================================
// Scrolling
// =============================================================================

/**
 * Default scroll settle delay in ms.
 * 0 reports on every scroll event.
 */
export const DEFAULT_IDLE_TIMEOUT = 0;

// =============================================================================
// Diagnostics
// =============================================================================

/** Prefix for console output */
export const LOG_PREFIX = "[pagewise]";
