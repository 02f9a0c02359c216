/**
 * Custom Error Classes
 *
 * Domain-specific error types with proper Error subclassing and context properties.
 * All custom error classes extend the base AppError class.
 *
 * SlotContentionTimeoutError: the slot stayed busy for the whole retry budget.
 * SlotStoreError: the backing store itself failed.
 */

/**
 * Base application error class
 *
 * Uses Object.setPrototypeOf() to ensure instanceof checks work correctly
 * after TypeScript transpilation.
 *
 * @example
 * ```typescript
 * throw new AppError('Something went wrong', 'GENERIC_ERROR');
 * ```
 */
export class AppError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "AppError";
		// Critical for instanceof checks in transpiled code
		Object.setPrototypeOf(this, AppError.prototype);
	}
}

/**
 * Validation error for invalid input or state
 *
 * @example
 * ```typescript
 * if (!command.trim()) {
 *   throw new ValidationError('test command must not be empty', 'test_command');
 * }
 * ```
 */
export class ValidationError extends AppError {
	constructor(
		message: string,
		public readonly field: string,
		public readonly validationErrors?: string[],
	) {
		super(message, "VALIDATION_ERROR");
		this.name = "ValidationError";
		Object.setPrototypeOf(this, ValidationError.prototype);
	}
}

/**
 * Invalid rig configuration (bad JSON, out-of-range values, unparsable durations)
 */
export class ConfigError extends AppError {
	constructor(
		message: string,
		public readonly filePath: string,
		public readonly issues?: string[],
	) {
		super(message, "CONFIG_ERROR");
		this.name = "ConfigError";
		Object.setPrototypeOf(this, ConfigError.prototype);
	}
}

/**
 * Timeout error for operations that exceed time limits
 *
 * @param operation - The operation that timed out (e.g., 'git push', 'test command')
 */
export class TimeoutError extends AppError {
	constructor(
		message: string,
		public readonly operation: string,
		public readonly timeoutMs: number,
	) {
		super(message, "TIMEOUT_ERROR");
		this.name = "TimeoutError";
		Object.setPrototypeOf(this, TimeoutError.prototype);
	}
}

/**
 * Git operation error
 *
 * Carries the command that failed and its exit code so callers can tell
 * "ref missing" (exit 1 on show-ref) apart from a broken repository.
 */
export class GitError extends AppError {
	constructor(
		message: string,
		public readonly command: string,
		public readonly exitCode?: number,
	) {
		super(message, "GIT_ERROR");
		this.name = "GitError";
		Object.setPrototypeOf(this, GitError.prototype);
	}
}

/**
 * Thrown when an awaited operation is aborted through its AbortSignal.
 */
export class OperationCancelledError extends AppError {
	constructor(
		message: string,
		public readonly operation: string,
	) {
		super(message, "CANCELLED");
		this.name = "OperationCancelledError";
		Object.setPrototypeOf(this, OperationCancelledError.prototype);
	}
}

/**
 * Merge slot stayed held by another holder for the whole retry budget.
 *
 * Transient: the MR stays queued and is retried on the next cycle, nobody is paged.
 */
export class SlotContentionTimeoutError extends AppError {
	constructor(
		public readonly slotId: string,
		public readonly retries: number,
		public readonly lastHolder: string,
	) {
		super(`merge slot ${slotId}: contention timeout after ${retries} retries (held by ${lastHolder})`, "SLOT_TIMEOUT");
		this.name = "SlotContentionTimeoutError";
		Object.setPrototypeOf(this, SlotContentionTimeoutError.prototype);
	}
}

/**
 * Slot backing store failed (unavailable, permission denied, malformed response).
 *
 * Never raised for contention. Surfaces through the normal failure path so an
 * operator sees it.
 */
export class SlotStoreError extends AppError {
	constructor(
		message: string,
		public readonly operation: "ensure" | "acquire" | "release",
		options?: { cause?: unknown },
	) {
		super(message, "SLOT_STORE_ERROR", options);
		this.name = "SlotStoreError";
		Object.setPrototypeOf(this, SlotStoreError.prototype);
	}
}

/**
 * Issue id not present in the store
 */
export class IssueNotFoundError extends AppError {
	constructor(public readonly issueId: string) {
		super(`issue not found: ${issueId}`, "ISSUE_NOT_FOUND");
		this.name = "IssueNotFoundError";
		Object.setPrototypeOf(this, IssueNotFoundError.prototype);
	}
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
