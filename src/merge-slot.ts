/**
 * Merge Slot
 *
 * Per-rig mutual exclusion over writes to the protected branch. Two roles
 * contend for it: the push step of a merge attempt (one unique token per
 * attempt) and conflict resolution (the fixed `<rig>/merge-queue` identity,
 * one resolution at a time per rig).
 *
 * Error contract:
 * - SlotContentionTimeoutError: busy for the whole retry budget
 * - SlotStoreError: ensure/acquire failed or returned nothing usable
 * - OperationCancelledError: the signal aborted a backoff wait
 */

import { randomBytes } from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";
import { SLOT_INITIAL_BACKOFF_MS, SLOT_MAX_BACKOFF_MS, SLOT_MAX_RETRIES } from "./constants.js";
import { OperationCancelledError, SlotContentionTimeoutError, SlotStoreError, errorMessage } from "./errors.js";
import { slotLogger } from "./logger.js";
import type { SlotStore } from "./slot-store.js";

/**
 * Source of the per-attempt component of push holder tokens
 */
export interface HolderSequence {
	next(): number;
}

/**
 * Monotonic counter starting at 1
 */
export class CounterSequence implements HolderSequence {
	private value = 0;

	next(): number {
		this.value++;
		return this.value;
	}
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Wait `ms`, rejecting with OperationCancelledError as soon as the signal aborts
 */
export const sleep: Sleep = async (ms, signal) => {
	if (signal?.aborted) {
		throw new OperationCancelledError("merge slot wait canceled", "merge slot backoff");
	}
	try {
		await delay(ms, undefined, { signal });
	} catch (error) {
		if (signal?.aborted) {
			throw new OperationCancelledError("merge slot wait canceled", "merge slot backoff");
		}
		throw error;
	}
};

export interface MergeSlotOptions {
	rig: string;
	store: SlotStore;
	/** Acquire attempts after the first (default: 10) */
	maxRetries?: number;
	initialBackoffMs?: number;
	maxBackoffMs?: number;
	sequence?: HolderSequence;
	/** Distinguishes this client's tokens from other clients on the same store (default: `<pid>.<random hex>`) */
	clientId?: string;
	/** Epoch milliseconds for holder tokens */
	clock?: () => number;
	sleep?: Sleep;
}

export type ConflictSlotResult =
	| { kind: "acquired"; holder: string }
	| { kind: "deferred"; holder: string }
	| { kind: "unavailable"; error: Error };

/**
 * Fixed slot identity used while a conflict resolution is in progress
 */
export function conflictHolderFor(rig: string): string {
	return `${rig}/merge-queue`;
}

function defaultClientId(): string {
	return `${process.pid}.${randomBytes(4).toString("hex")}`;
}

export class MergeSlot {
	readonly conflictHolder: string;
	private readonly store: SlotStore;
	private readonly maxRetries: number;
	private readonly initialBackoffMs: number;
	private readonly maxBackoffMs: number;
	private readonly sequence: HolderSequence;
	private readonly clientId: string;
	private readonly clock: () => number;
	private readonly sleep: Sleep;

	constructor(options: MergeSlotOptions) {
		this.conflictHolder = conflictHolderFor(options.rig);
		this.store = options.store;
		this.maxRetries = options.maxRetries ?? SLOT_MAX_RETRIES;
		this.initialBackoffMs = options.initialBackoffMs ?? SLOT_INITIAL_BACKOFF_MS;
		this.maxBackoffMs = options.maxBackoffMs ?? SLOT_MAX_BACKOFF_MS;
		this.sequence = options.sequence ?? new CounterSequence();
		this.clientId = options.clientId ?? defaultClientId();
		this.clock = options.clock ?? Date.now;
		this.sleep = options.sleep ?? sleep;
	}

	/**
	 * Unique token for one push attempt: `<rig>/merge-queue/push/<client>/<epochMs>-<seq>`
	 */
	newPushHolder(): string {
		return `${this.conflictHolder}/push/${this.clientId}/${this.clock()}-${this.sequence.next()}`;
	}

	/**
	 * Acquire the slot for a push.
	 *
	 * Returns the holder token to release afterwards, or "" when the slot is
	 * held by this rig's own conflict resolution (nothing to release).
	 */
	async acquirePushSlot(signal?: AbortSignal): Promise<string> {
		const holder = this.newPushHolder();
		const slotId = await this.ensure();

		let backoff = this.initialBackoffMs;
		let lastHolder = "";

		for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
			if (attempt > 0) {
				slotLogger.debug({ slot: slotId, holder: lastHolder, attempt, backoffMs: backoff }, "Merge slot busy, backing off");
				await this.sleep(backoff, signal);
				backoff = Math.min(backoff * 2, this.maxBackoffMs);
			} else if (signal?.aborted) {
				throw new OperationCancelledError("merge slot acquire canceled", "acquire merge slot");
			}

			let status: Awaited<ReturnType<SlotStore["acquire"]>>;
			try {
				status = await this.store.acquire(holder, false);
			} catch (error) {
				throw this.storeError(error, "acquire");
			}
			if (!status) {
				throw new SlotStoreError(`merge slot ${slotId}: acquire returned no status`, "acquire");
			}

			if (status.available || status.holder === holder) {
				slotLogger.debug({ slot: slotId, holder, attempt }, "Acquired merge slot");
				return holder;
			}

			// Same actor; waiting on ourselves would never end
			if (status.holder === this.conflictHolder) {
				slotLogger.info({ slot: slotId }, "Merge slot held by conflict resolution, pushing without it");
				return "";
			}

			lastHolder = status.holder;
		}

		throw new SlotContentionTimeoutError(slotId, this.maxRetries, lastHolder);
	}

	/**
	 * Single acquire attempt under the conflict identity, queueing as a waiter when busy
	 */
	async acquireConflictSlot(): Promise<ConflictSlotResult> {
		try {
			await this.ensure();
			const status = await this.store.acquire(this.conflictHolder, true);
			if (!status) {
				return { kind: "unavailable", error: new SlotStoreError("acquire returned no status", "acquire") };
			}
			if (status.available || status.holder === this.conflictHolder) {
				return { kind: "acquired", holder: this.conflictHolder };
			}
			return { kind: "deferred", holder: status.holder };
		} catch (error) {
			return { kind: "unavailable", error: this.storeError(error, "acquire") };
		}
	}

	/**
	 * Release a holder token; "" is a no-op
	 */
	async release(holder: string): Promise<void> {
		if (holder === "") {
			return;
		}
		try {
			await this.store.release(holder);
		} catch (error) {
			throw this.storeError(error, "release");
		}
	}

	private async ensure(): Promise<string> {
		try {
			return await this.store.ensureExists();
		} catch (error) {
			throw this.storeError(error, "ensure");
		}
	}

	private storeError(error: unknown, operation: SlotStoreError["operation"]): SlotStoreError {
		if (error instanceof SlotStoreError) {
			return error;
		}
		return new SlotStoreError(`merge slot ${operation} failed: ${errorMessage(error)}`, operation, { cause: error });
	}
}
