/**
 * Merge Slot Tests
 *
 * Push-slot acquisition with backoff, the conflict-holder bypass,
 * conflict-slot acquisition, and store failure mapping.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { OperationCancelledError, SlotContentionTimeoutError, SlotStoreError } from "../errors.js";
import { CounterSequence, conflictHolderFor, MergeSlot, type MergeSlotOptions, sleep } from "../merge-slot.js";
import { MemorySlotStore, type SlotStore } from "../slot-store.js";
import { recordingSleep } from "./helpers.js";

const SLOT_ID = "harbor/merge-slot";
const CONFLICT_HOLDER = "harbor/merge-queue";
const CLOCK = 1_772_366_400_000;

describe("MergeSlot", () => {
	let store: MemorySlotStore;
	let delays: number[];
	let options: MergeSlotOptions;

	beforeEach(() => {
		store = new MemorySlotStore(SLOT_ID);
		const recorder = recordingSleep();
		delays = recorder.delays;
		options = {
			rig: "harbor",
			store,
			maxRetries: 3,
			initialBackoffMs: 500,
			maxBackoffMs: 10_000,
			sequence: new CounterSequence(),
			clientId: "c1",
			clock: () => CLOCK,
			sleep: recorder.sleep,
		};
	});

	describe("holder identities", () => {
		it("uses the rig's merge-queue identity for conflicts", () => {
			expect(conflictHolderFor("harbor")).toBe(CONFLICT_HOLDER);
			expect(new MergeSlot(options).conflictHolder).toBe(CONFLICT_HOLDER);
		});

		it("makes a unique push holder per attempt", () => {
			const slot = new MergeSlot(options);

			expect(slot.newPushHolder()).toBe(`harbor/merge-queue/push/c1/${CLOCK}-1`);
			expect(slot.newPushHolder()).toBe(`harbor/merge-queue/push/c1/${CLOCK}-2`);
		});
	});

	describe("acquirePushSlot", () => {
		it("acquires a free slot on the first attempt", async () => {
			const slot = new MergeSlot(options);

			const holder = await slot.acquirePushSlot();

			expect(holder).toBe(`harbor/merge-queue/push/c1/${CLOCK}-1`);
			expect((await store.status())?.holder).toBe(holder);
			expect(delays).toEqual([]);
		});

		it("gives clients on the same clock distinct push holders", () => {
			const first = new MergeSlot({ ...options, clientId: undefined, sequence: undefined });
			const second = new MergeSlot({ ...options, clientId: undefined, sequence: undefined });

			expect(first.newPushHolder()).not.toBe(second.newPushHolder());
			expect(first.newPushHolder()).toMatch(new RegExp(`^harbor/merge-queue/push/${process.pid}\\.[0-9a-f]{8}/${CLOCK}-2$`));
		});

		it("lets exactly one of several concurrent clients acquire", async () => {
			const clients = Array.from(
				{ length: 5 },
				() => new MergeSlot({ ...options, clientId: undefined, sequence: undefined, maxRetries: 0 }),
			);

			const results = await Promise.allSettled(clients.map((client) => client.acquirePushSlot()));
			const acquired = results.flatMap((r) => (r.status === "fulfilled" ? [r.value] : []));
			const timedOut = results.filter((r) => r.status === "rejected" && r.reason instanceof SlotContentionTimeoutError);

			expect(acquired).toHaveLength(1);
			expect(timedOut).toHaveLength(4);
			expect((await store.status())?.holder).toBe(acquired[0]);
		});

		it("is exclusive between two push attempts", async () => {
			const first = await new MergeSlot(options).acquirePushSlot();
			const second = new MergeSlot({ ...options, sequence: new CounterSequence(), clientId: "c2" });

			const error = await second.acquirePushSlot().catch((e: unknown) => e);

			expect(error).toBeInstanceOf(SlotContentionTimeoutError);
			expect(error).toMatchObject({ slotId: SLOT_ID, retries: 3, lastHolder: first, code: "SLOT_TIMEOUT" });
			expect((await store.status())?.holder).toBe(first);
		});

		it("makes maxRetries + 1 attempts with doubling backoff up to the cap", async () => {
			await store.ensureExists();
			await store.acquire("harbor/other", false);
			const acquire = vi.spyOn(store, "acquire");
			const slot = new MergeSlot({ ...options, maxRetries: 5, maxBackoffMs: 2_000 });

			await expect(slot.acquirePushSlot()).rejects.toBeInstanceOf(SlotContentionTimeoutError);

			expect(acquire).toHaveBeenCalledTimes(6);
			expect(delays).toEqual([500, 1_000, 2_000, 2_000, 2_000]);
		});

		it("succeeds once the holder releases during backoff", async () => {
			await store.ensureExists();
			await store.acquire("harbor/other", false);
			const slot = new MergeSlot({
				...options,
				sleep: async (ms) => {
					delays.push(ms);
					await store.release("harbor/other");
				},
			});

			const holder = await slot.acquirePushSlot();

			expect(holder).toBe(`harbor/merge-queue/push/c1/${CLOCK}-1`);
			expect(delays).toEqual([500]);
		});

		it("converges after k busy responses with k + 1 acquire calls", async () => {
			await store.ensureExists();
			await store.acquire("harbor/other", false);
			const acquire = vi.spyOn(store, "acquire");
			let waits = 0;
			const slot = new MergeSlot({
				...options,
				maxRetries: 5,
				maxBackoffMs: 1_000,
				sleep: async (ms) => {
					delays.push(ms);
					waits++;
					if (waits === 3) {
						await store.release("harbor/other");
					}
				},
			});

			const holder = await slot.acquirePushSlot();

			expect(holder).toBe(`harbor/merge-queue/push/c1/${CLOCK}-1`);
			expect(acquire).toHaveBeenCalledTimes(4);
			expect(delays).toEqual([500, 1_000, 1_000]);
		});

		it("returns an empty holder when conflict resolution holds the slot", async () => {
			await store.ensureExists();
			await store.acquire(CONFLICT_HOLDER, true);
			const acquire = vi.spyOn(store, "acquire");

			const holder = await new MergeSlot(options).acquirePushSlot();

			expect(holder).toBe("");
			expect(acquire).toHaveBeenCalledTimes(1);
			expect(delays).toEqual([]);
			expect((await store.status())?.holder).toBe(CONFLICT_HOLDER);
		});

		it("does not touch the store when already cancelled", async () => {
			const acquire = vi.spyOn(store, "acquire");
			const controller = new AbortController();
			controller.abort();

			await expect(new MergeSlot(options).acquirePushSlot(controller.signal)).rejects.toBeInstanceOf(
				OperationCancelledError,
			);
			expect(acquire).not.toHaveBeenCalled();
		});

		it("propagates cancellation from the backoff wait", async () => {
			await store.ensureExists();
			await store.acquire("harbor/other", false);
			const slot = new MergeSlot({
				...options,
				sleep: async () => {
					throw new OperationCancelledError("merge slot wait canceled", "merge slot backoff");
				},
			});

			await expect(slot.acquirePushSlot()).rejects.toBeInstanceOf(OperationCancelledError);
		});

		it("wraps store failures as SlotStoreError", async () => {
			const broken: SlotStore = {
				ensureExists: async () => SLOT_ID,
				acquire: async () => {
					throw new Error("disk full");
				},
				release: async () => {},
				status: async () => null,
			};

			const error = await new MergeSlot({ ...options, store: broken }).acquirePushSlot().catch((e: unknown) => e);

			expect(error).toBeInstanceOf(SlotStoreError);
			expect(error).toMatchObject({ operation: "acquire", message: "merge slot acquire failed: disk full" });
			expect(delays).toEqual([]);
		});

		it("treats a missing status as a store failure", async () => {
			const empty: SlotStore = {
				ensureExists: async () => SLOT_ID,
				acquire: async () => null,
				release: async () => {},
				status: async () => null,
			};

			await expect(new MergeSlot({ ...options, store: empty }).acquirePushSlot()).rejects.toThrow(
				"merge slot harbor/merge-slot: acquire returned no status",
			);
		});

		it("reports ensure failures with the ensure operation", async () => {
			const broken: SlotStore = {
				ensureExists: async () => {
					throw new Error("permission denied");
				},
				acquire: async () => null,
				release: async () => {},
				status: async () => null,
			};

			await expect(new MergeSlot({ ...options, store: broken }).acquirePushSlot()).rejects.toMatchObject({
				name: "SlotStoreError",
				operation: "ensure",
			});
		});
	});

	describe("acquireConflictSlot", () => {
		it("acquires a free slot under the conflict identity", async () => {
			expect(await new MergeSlot(options).acquireConflictSlot()).toEqual({ kind: "acquired", holder: CONFLICT_HOLDER });
			expect((await store.status())?.holder).toBe(CONFLICT_HOLDER);
		});

		it("is idempotent for the conflict holder", async () => {
			const slot = new MergeSlot(options);
			await slot.acquireConflictSlot();

			expect(await slot.acquireConflictSlot()).toEqual({ kind: "acquired", holder: CONFLICT_HOLDER });
		});

		it("defers and queues as a waiter when a push holds the slot", async () => {
			const slot = new MergeSlot(options);
			const pusher = await slot.acquirePushSlot();

			expect(await slot.acquireConflictSlot()).toEqual({ kind: "deferred", holder: pusher });
			expect((await store.status())?.waiters).toEqual([CONFLICT_HOLDER]);
		});

		it("reports an unavailable store instead of throwing", async () => {
			const broken: SlotStore = {
				ensureExists: async () => {
					throw new Error("offline");
				},
				acquire: async () => null,
				release: async () => {},
				status: async () => null,
			};

			const result = await new MergeSlot({ ...options, store: broken }).acquireConflictSlot();

			expect(result.kind).toBe("unavailable");
		});
	});

	describe("release", () => {
		it("frees the slot for the current holder", async () => {
			const slot = new MergeSlot(options);
			const holder = await slot.acquirePushSlot();

			await slot.release(holder);

			expect(await store.status()).toEqual({ id: SLOT_ID, available: true, holder: "", waiters: [] });
		});

		it("ignores the empty holder", async () => {
			const release = vi.spyOn(store, "release");

			await new MergeSlot(options).release("");

			expect(release).not.toHaveBeenCalled();
		});

		it("rejects a release by someone other than the holder", async () => {
			const slot = new MergeSlot(options);
			await slot.acquirePushSlot();

			await expect(slot.release("harbor/other")).rejects.toBeInstanceOf(SlotStoreError);
		});
	});
});

describe("sleep", () => {
	it("rejects at once for an aborted signal", async () => {
		const controller = new AbortController();
		controller.abort();

		await expect(sleep(10_000, controller.signal)).rejects.toBeInstanceOf(OperationCancelledError);
	});

	it("rejects when aborted mid-wait", async () => {
		const controller = new AbortController();
		const waiting = sleep(10_000, controller.signal);
		controller.abort();

		await expect(waiting).rejects.toBeInstanceOf(OperationCancelledError);
	});

	it("resolves after the delay", async () => {
		await expect(sleep(1)).resolves.toBeUndefined();
	});
});
