/**
 * Shared constants used across the codebase.
 *
 * Centralizes magic numbers so they can be tuned in one place
 * and carry semantic meaning at every call site.
 */

// ---------------------------------------------------------------------------
// Durations (milliseconds)
// ---------------------------------------------------------------------------

export const SECOND_MS = 1_000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;

// ---------------------------------------------------------------------------
// Shell command timeouts (milliseconds)
// ---------------------------------------------------------------------------

/** Standard git operations: rev-parse, show-ref, checkout, merge */
export const TIMEOUT_GIT_CMD_MS = 60_000;

/** Full test suite */
export const TIMEOUT_TEST_SUITE_MS = 30 * MINUTE_MS;

// ---------------------------------------------------------------------------
// Queue
// ---------------------------------------------------------------------------

/** Claimed MR with no update for this long is eligible for re-claim */
export const DEFAULT_STALE_CLAIM_TIMEOUT_MS = 30 * MINUTE_MS;

export const DEFAULT_POLL_INTERVAL_MS = 30 * SECOND_MS;

/** Issue type carrying merge requests */
export const MERGE_REQUEST_TYPE = "merge-request";

/** Label that keeps an MR out of the queue */
export const QUEUE_EXEMPT_LABEL = "mq:exempt";

export const DEFAULT_REMOTE = "origin";

// ---------------------------------------------------------------------------
// Merge slot
// ---------------------------------------------------------------------------

export const SLOT_MAX_RETRIES = 10;
export const SLOT_INITIAL_BACKOFF_MS = 500;
export const SLOT_MAX_BACKOFF_MS = 10 * SECOND_MS;

// ---------------------------------------------------------------------------
// Anomaly thresholds
// ---------------------------------------------------------------------------

export const STALE_CLAIM_WARNING_AFTER_MS = 2 * HOUR_MS;
export const STALE_CLAIM_CRITICAL_AFTER_MS = 6 * HOUR_MS;

// ---------------------------------------------------------------------------
// File lock retry configuration
// ---------------------------------------------------------------------------

/** Maximum retry attempts for file lock acquisition */
export const MAX_FILE_LOCK_RETRIES = 5;

/** Minimum delay between lock retries (milliseconds) */
export const FILE_LOCK_MIN_DELAY_MS = 50;

/** Maximum delay between lock retries (milliseconds) */
export const FILE_LOCK_MAX_DELAY_MS = 1000;

/** Exponential backoff multiplier for lock retries */
export const FILE_LOCK_BACKOFF_FACTOR = 2;

/** Directory under the rig root holding queue state */
export const STATE_DIR = ".slipway";
