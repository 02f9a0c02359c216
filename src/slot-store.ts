/**
 * Merge slot backing stores.
 *
 * A slot is `{ id, holder, waiters }`. Acquire grants a free slot, is
 * idempotent for the current holder, and otherwise reports who holds it
 * (optionally queueing the caller as a waiter). Releasing requires the
 * current holder.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { STATE_DIR } from "./constants.js";
import { SlotStoreError, errorMessage } from "./errors.js";
import { withFileLock } from "./file-lock.js";
import { slotLogger } from "./logger.js";
import type { MergeSlotStatus } from "./types.js";

export interface SlotStore {
	/** Create the slot if missing; idempotent. Returns the slot id. */
	ensureExists(): Promise<string>;
	/**
	 * Try to take the slot. The caller holds it when the result is
	 * `available` or names the caller as holder. null means the store
	 * returned nothing usable.
	 */
	acquire(holder: string, addWaiter: boolean): Promise<MergeSlotStatus | null>;
	release(holder: string): Promise<void>;
	/** Current state, null when the slot was never created */
	status(): Promise<MergeSlotStatus | null>;
}

export interface SlotState {
	id: string;
	holder: string;
	waiters: string[];
}

const SlotStateSchema = z.object({
	id: z.string().min(1),
	holder: z.string(),
	waiters: z.array(z.string()),
});

function toStatus(state: SlotState, available: boolean): MergeSlotStatus {
	return { id: state.id, available, holder: state.holder, waiters: [...state.waiters] };
}

/**
 * Apply an acquire to slot state in place
 */
export function applyAcquire(state: SlotState, holder: string, addWaiter: boolean): MergeSlotStatus {
	if (state.holder === "") {
		state.holder = holder;
		state.waiters = state.waiters.filter((w) => w !== holder);
		return toStatus(state, true);
	}
	if (state.holder !== holder && addWaiter && !state.waiters.includes(holder)) {
		state.waiters.push(holder);
	}
	return toStatus(state, false);
}

/**
 * Apply a release to slot state in place
 *
 * @throws SlotStoreError when the slot is held by someone else
 */
export function applyRelease(state: SlotState, holder: string): void {
	if (state.holder === "") {
		slotLogger.debug({ slot: state.id, holder }, "Release of a free slot ignored");
		return;
	}
	if (state.holder !== holder) {
		throw new SlotStoreError(`merge slot ${state.id} is held by ${state.holder}, not ${holder}`, "release");
	}
	state.holder = "";
}

export function slotIdForRig(rigName: string): string {
	return `${rigName}/merge-slot`;
}

/**
 * Slot state held in memory
 */
export class MemorySlotStore implements SlotStore {
	private state: SlotState | undefined;

	constructor(private readonly slotId: string) {}

	async ensureExists(): Promise<string> {
		this.state ??= { id: this.slotId, holder: "", waiters: [] };
		return this.state.id;
	}

	async acquire(holder: string, addWaiter: boolean): Promise<MergeSlotStatus | null> {
		if (!this.state) {
			throw new SlotStoreError(`merge slot ${this.slotId} does not exist`, "acquire");
		}
		return applyAcquire(this.state, holder, addWaiter);
	}

	async release(holder: string): Promise<void> {
		if (!this.state) {
			throw new SlotStoreError(`merge slot ${this.slotId} does not exist`, "release");
		}
		applyRelease(this.state, holder);
	}

	async status(): Promise<MergeSlotStatus | null> {
		return this.state ? toStatus(this.state, this.state.holder === "") : null;
	}
}

/**
 * Slot state in `<rig>/.slipway/merge-slot.json`, updated under a file lock
 * so separate processes see one holder.
 */
export class FileSlotStore implements SlotStore {
	readonly filePath: string;

	constructor(
		rigPath: string,
		private readonly slotId: string,
	) {
		this.filePath = path.join(rigPath, STATE_DIR, "merge-slot.json");
	}

	private read(operation: SlotStoreError["operation"]): SlotState | undefined {
		if (!fs.existsSync(this.filePath)) {
			return undefined;
		}
		let raw: unknown;
		try {
			raw = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
		} catch (error) {
			throw new SlotStoreError(`merge slot file ${this.filePath} is unreadable: ${errorMessage(error)}`, operation, {
				cause: error,
			});
		}
		const result = SlotStateSchema.safeParse(raw);
		if (!result.success) {
			throw new SlotStoreError(`merge slot file ${this.filePath} is malformed`, operation);
		}
		return result.data;
	}

	private write(state: SlotState): void {
		const tmp = `${this.filePath}.tmp`;
		fs.writeFileSync(tmp, JSON.stringify(state, null, 2));
		fs.renameSync(tmp, this.filePath);
	}

	private async locked<T>(operation: SlotStoreError["operation"], fn: () => T): Promise<T> {
		try {
			fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
			return await withFileLock(this.filePath, async () => fn());
		} catch (error) {
			if (error instanceof SlotStoreError) throw error;
			throw new SlotStoreError(`merge slot ${operation} failed: ${errorMessage(error)}`, operation, { cause: error });
		}
	}

	async ensureExists(): Promise<string> {
		return this.locked("ensure", () => {
			const existing = this.read("ensure");
			if (existing) {
				return existing.id;
			}
			this.write({ id: this.slotId, holder: "", waiters: [] });
			slotLogger.info({ slot: this.slotId, filePath: this.filePath }, "Created merge slot");
			return this.slotId;
		});
	}

	async acquire(holder: string, addWaiter: boolean): Promise<MergeSlotStatus | null> {
		return this.locked("acquire", () => {
			const state = this.read("acquire");
			if (!state) {
				throw new SlotStoreError(`merge slot ${this.slotId} does not exist`, "acquire");
			}
			const before = JSON.stringify(state);
			const status = applyAcquire(state, holder, addWaiter);
			if (JSON.stringify(state) !== before) {
				this.write(state);
			}
			return status;
		});
	}

	async release(holder: string): Promise<void> {
		await this.locked("release", () => {
			const state = this.read("release");
			if (!state) {
				throw new SlotStoreError(`merge slot ${this.slotId} does not exist`, "release");
			}
			applyRelease(state, holder);
			this.write(state);
		});
	}

	async status(): Promise<MergeSlotStatus | null> {
		const state = this.read("acquire");
		return state ? toStatus(state, state.holder === "") : null;
	}
}
