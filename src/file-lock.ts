/**
 * File Lock Utility
 *
 * File-level locking for JSON state files that use read-modify-write cycles.
 * Serializes writers from separate processes (the queue actor, CLI commands,
 * agents submitting MRs) that touch the same rig state.
 *
 * Uses proper-lockfile with stale lock eviction.
 *
 * Used by:
 * - slot-store.ts (merge-slot.json)
 * - issue-store.ts (issues.json)
 * - notifications.ts (mail/*.jsonl)
 */

import { lock } from "proper-lockfile";
import {
	FILE_LOCK_BACKOFF_FACTOR,
	FILE_LOCK_MAX_DELAY_MS,
	FILE_LOCK_MIN_DELAY_MS,
	MAX_FILE_LOCK_RETRIES,
} from "./constants.js";
import { storeLogger } from "./logger.js";

const logger = storeLogger.child({ component: "file-lock" });

/**
 * Options for file locking
 */
export interface FileLockOptions {
	/** Maximum number of retry attempts (default: 5) */
	maxRetries?: number;
	/** Minimum delay between retries in ms (default: 50) */
	minDelayMs?: number;
	/** Maximum delay between retries in ms (default: 1000) */
	maxDelayMs?: number;
	/** Exponential backoff multiplier (default: 2) */
	exponentialFactor?: number;
	/** Stale lock threshold in ms (default: 30000) */
	stale?: number;
}

const DEFAULT_OPTIONS: Required<FileLockOptions> = {
	maxRetries: MAX_FILE_LOCK_RETRIES,
	minDelayMs: FILE_LOCK_MIN_DELAY_MS,
	maxDelayMs: FILE_LOCK_MAX_DELAY_MS,
	exponentialFactor: FILE_LOCK_BACKOFF_FACTOR,
	stale: 30000,
};

/**
 * Execute an async function while holding a file lock.
 *
 * Critical pattern: acquire lock -> re-read fresh state -> mutate -> save -> release.
 * The callback should re-read the file inside the lock to see the latest state.
 *
 * Lock acquisition failure propagates; fn never runs unlocked.
 *
 * @param filePath - Path to the file to lock (lockfile created at filePath.lock)
 * @param fn - Async function to execute while holding the lock
 * @returns The return value of fn
 */
export async function withFileLock<T>(filePath: string, fn: () => Promise<T>, options?: FileLockOptions): Promise<T> {
	const opts = { ...DEFAULT_OPTIONS, ...options };

	const release = await lock(filePath, {
		retries: {
			retries: opts.maxRetries,
			minTimeout: opts.minDelayMs,
			maxTimeout: opts.maxDelayMs,
			factor: opts.exponentialFactor,
			randomize: true,
		},
		stale: opts.stale,
		realpath: false,
	});

	try {
		return await fn();
	} finally {
		try {
			await release();
		} catch (error) {
			logger.debug({ filePath, error: String(error) }, "Failed to release file lock");
		}
	}
}
