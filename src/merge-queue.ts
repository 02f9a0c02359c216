/**
 * Merge Queue
 *
 * The per-rig queue actor. Each cycle:
 * 1. List ready MRs (ranked)
 * 2. Claim the first one
 * 3. Run the merge pipeline
 * 4. Apply the outcome; failed MRs are released back to the queue
 *
 * One actor per rig is assumed; the merge slot serializes pushes against
 * conflict resolution, not against a second actor.
 */

import { type CommandRunner, ShellCommandRunner } from "./command-runner.js";
import type { RigConfig } from "./config.js";
import { type ConvoyObserver, CommandConvoyObserver, NoopConvoyObserver } from "./convoy.js";
import { OperationCancelledError, errorMessage } from "./errors.js";
import { Git, type GitClient } from "./git.js";
import { type IssueStore, JsonIssueStore } from "./issue-store.js";
import { queueLogger } from "./logger.js";
import { CounterSequence, type HolderSequence, MergeSlot, type Sleep, sleep as defaultSleep } from "./merge-slot.js";
import { MergeProcessor } from "./merge-processor.js";
import { MailboxNotifier, type Notifier } from "./notifications.js";
import { type FailureOutcome, OutcomeHandler } from "./outcome-handler.js";
import { QueueLister } from "./queue-lister.js";
import { FileSlotStore, type SlotStore, slotIdForRig } from "./slot-store.js";
import type { MergeRequest, ProcessResult } from "./types.js";

export interface ProcessedMergeRequest {
	mr: MergeRequest;
	result: ProcessResult;
	/** Set for failed attempts */
	outcome?: FailureOutcome;
}

/**
 * Collaborators of a queue; everything not given is built from the rig config
 */
export interface MergeQueueDeps {
	store: IssueStore;
	git: GitClient;
	slotStore: SlotStore;
	notifier: Notifier;
	convoy: ConvoyObserver;
	runner: CommandRunner;
	sequence: HolderSequence;
	sleep: Sleep;
	now: () => Date;
}

export class MergeQueue {
	readonly lister: QueueLister;
	readonly slot: MergeSlot;
	readonly processor: MergeProcessor;
	readonly outcomes: OutcomeHandler;
	private processing = false;
	private readonly sleep: Sleep;

	constructor(
		readonly rig: RigConfig,
		deps: MergeQueueDeps,
	) {
		const config = rig.mergeQueue;
		this.sleep = deps.sleep;
		this.lister = new QueueLister({
			store: deps.store,
			defaultBranch: rig.defaultBranch,
			staleClaimTimeoutMs: config.staleClaimTimeoutMs,
			git: deps.git,
			remote: config.remote,
			now: deps.now,
		});
		this.slot = new MergeSlot({
			rig: rig.name,
			store: deps.slotStore,
			maxRetries: config.slotMaxRetries,
			initialBackoffMs: config.slotInitialBackoffMs,
			maxBackoffMs: config.slotMaxBackoffMs,
			sequence: deps.sequence,
			clock: () => deps.now().getTime(),
			sleep: deps.sleep,
		});
		this.processor = new MergeProcessor({
			rig,
			git: deps.git,
			slot: this.slot,
			runner: deps.runner,
			config,
		});
		this.outcomes = new OutcomeHandler({
			rig,
			store: deps.store,
			git: deps.git,
			slot: this.slot,
			notifier: deps.notifier,
			convoy: deps.convoy,
			config,
		});
	}

	/**
	 * Process the highest-ranked ready MR not in `skip`. Null when there is
	 * nothing to do or a cycle is already running.
	 */
	async processNext(signal?: AbortSignal, skip: ReadonlySet<string> = new Set()): Promise<ProcessedMergeRequest | null> {
		if (this.processing) return null;
		this.processing = true;

		try {
			const ready = await this.lister.listReady();
			const mr = ready.find((candidate) => !skip.has(candidate.id));
			if (!mr) return null;

			await this.lister.claim(mr.id, this.slot.conflictHolder);

			let result: ProcessResult;
			try {
				result = await this.processor.process(mr, signal);
			} catch (error) {
				// The pipeline reports failures as results; anything thrown is unexpected
				result = {
					success: false,
					mergeCommit: "",
					error: errorMessage(error),
					conflict: false,
					testsFailed: false,
					slotTimeout: false,
				};
			}

			if (result.success) {
				await this.outcomes.handleSuccess(mr, result);
				return { mr, result };
			}

			const outcome = await this.outcomes.handleFailure(mr, result);
			await this.lister.release(mr.id).catch((error: unknown) => {
				queueLogger.warn({ id: mr.id, error: errorMessage(error) }, "Failed to release claim");
			});
			return { mr, result, outcome };
		} finally {
			this.processing = false;
		}
	}

	/**
	 * Drain one cycle: every ready MR at most once
	 */
	async processAll(signal?: AbortSignal): Promise<ProcessedMergeRequest[]> {
		const results: ProcessedMergeRequest[] = [];
		const seen = new Set<string>();

		while (!signal?.aborted) {
			let processed: ProcessedMergeRequest | null;
			try {
				processed = await this.processNext(signal, seen);
			} catch (error) {
				queueLogger.error({ rig: this.rig.name, error: errorMessage(error) }, "Queue cycle failed");
				break;
			}
			if (!processed) break;

			seen.add(processed.mr.id);
			results.push(processed);
			if (!processed.result.success) {
				queueLogger.warn(
					{ id: processed.mr.id, failureType: processed.outcome?.failureType, error: processed.result.error },
					"Merge failed, continuing with next MR",
				);
			}
		}

		return results;
	}

	/**
	 * Poll until the signal aborts
	 */
	async run(signal: AbortSignal): Promise<void> {
		if (!this.rig.mergeQueue.enabled) {
			queueLogger.info({ rig: this.rig.name }, "Merge queue disabled");
			return;
		}
		queueLogger.info({ rig: this.rig.name, pollIntervalMs: this.rig.mergeQueue.pollIntervalMs }, "Merge queue started");

		while (!signal.aborted) {
			const results = await this.processAll(signal);
			if (results.length > 0) {
				const merged = results.filter((r) => r.result.success).length;
				queueLogger.info({ processed: results.length, merged }, "Queue cycle complete");
			}
			try {
				await this.sleep(this.rig.mergeQueue.pollIntervalMs, signal);
			} catch (error) {
				if (error instanceof OperationCancelledError) break;
				throw error;
			}
		}
		queueLogger.info({ rig: this.rig.name }, "Merge queue stopped");
	}
}

/**
 * Build a queue over the rig's on-disk state and working tree
 */
export function createMergeQueue(rig: RigConfig, overrides: Partial<MergeQueueDeps> = {}): MergeQueue {
	const config = rig.mergeQueue;
	const now = overrides.now ?? (() => new Date());
	const runner = overrides.runner ?? new ShellCommandRunner();
	const convoy =
		overrides.convoy ??
		(config.convoyCheckCommand !== ""
			? new CommandConvoyObserver(runner, config.convoyCheckCommand, rig.path, config.gitTimeoutMs)
			: new NoopConvoyObserver());

	return new MergeQueue(rig, {
		store: overrides.store ?? new JsonIssueStore(rig.path, { now }),
		git: overrides.git ?? new Git(rig.workDir, { timeoutMs: config.gitTimeoutMs }),
		slotStore: overrides.slotStore ?? new FileSlotStore(rig.path, slotIdForRig(rig.name)),
		notifier: overrides.notifier ?? new MailboxNotifier(rig.path, now),
		convoy,
		runner,
		sequence: overrides.sequence ?? new CounterSequence(),
		sleep: overrides.sleep ?? defaultSleep,
		now,
	});
}
