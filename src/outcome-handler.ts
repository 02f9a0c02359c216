/**
 * Outcome Handler
 *
 * Applies the result of a merge attempt to persisted state.
 *
 * Success: close the MR and its source issue, clean up references and the branch.
 * Failure: notify the watcher role; on conflict, hand the rebase to a new task
 * and block the MR on it. Slot timeouts are silent and leave the MR queued.
 */

import type { MergeQueueConfig } from "./config.js";
import type { ConvoyObserver } from "./convoy.js";
import { errorMessage } from "./errors.js";
import type { GitClient } from "./git.js";
import { getIssue, type IssueStore } from "./issue-store.js";
import { queueLogger } from "./logger.js";
import type { MergeSlot } from "./merge-slot.js";
import { setFields, updateMRFields } from "./mr-fields.js";
import { mergeFailedMessage, type Notifier } from "./notifications.js";
import type { FailureType, MergeRequest, ProcessResult, Rig } from "./types.js";

const logger = queueLogger.child({ component: "outcome" });

export interface FailureOutcome {
	failureType: FailureType;
	notified: boolean;
	/** Conflict-resolution task the MR is now blocked on */
	taskId?: string;
	/** Conflict resolution postponed: the slot is busy elsewhere */
	deferred: boolean;
}

export type OutcomeConfig = Pick<MergeQueueConfig, "deleteMergedBranches" | "notifyRecipient" | "remote">;

export interface OutcomeHandlerOptions {
	rig: Rig;
	store: IssueStore;
	git: GitClient;
	slot: MergeSlot;
	notifier: Notifier;
	convoy: ConvoyObserver;
	config: OutcomeConfig;
}

/**
 * Failure class by priority: conflict, tests, build, slot timeout.
 * Only a result whose sole flag is slotTimeout counts as a slot timeout.
 */
export function classifyFailure(result: ProcessResult): FailureType {
	if (result.conflict) return "conflict";
	if (result.testsFailed) return "tests";
	if (!result.slotTimeout) return "build";
	return "slot-timeout";
}

export function conflictTaskDescription(mr: MergeRequest, remote: string, mainSHA: string, retryCount: number): string {
	return `Resolve merge conflicts for branch ${mr.branch}

## Metadata
- Original MR: ${mr.id}
- Branch: ${mr.branch}
- Conflict with: ${mr.target}@${mainSHA.slice(0, 8)}
- Original issue: ${mr.sourceIssue}
- Retry count: ${retryCount}

## Instructions
1. Check out the branch: git checkout ${mr.branch}
2. Rebase onto target: git rebase ${remote}/${mr.target}
3. Resolve conflicts in your editor
4. Complete the rebase: git add . && git rebase --continue
5. Force-push the resolved branch: git push -f
6. Close this task

The merge queue retries the MR once this task is closed.`;
}

export class OutcomeHandler {
	private readonly rig: Rig;
	private readonly store: IssueStore;
	private readonly git: GitClient;
	private readonly slot: MergeSlot;
	private readonly notifier: Notifier;
	private readonly convoy: ConvoyObserver;
	private readonly config: OutcomeConfig;

	constructor(options: OutcomeHandlerOptions) {
		this.rig = options.rig;
		this.store = options.store;
		this.git = options.git;
		this.slot = options.slot;
		this.notifier = options.notifier;
		this.convoy = options.convoy;
		this.config = options.config;
	}

	/**
	 * Every step is best-effort: a failed step is logged and the rest still run.
	 */
	async handleSuccess(mr: MergeRequest, result: ProcessResult): Promise<void> {
		// A merged conflict resolution frees the slot for the next one
		try {
			await this.slot.release(this.slot.conflictHolder);
		} catch (error) {
			logger.debug({ error: errorMessage(error) }, "Conflict slot not released");
		}

		try {
			const issue = await getIssue(this.store, mr.id);
			const description = updateMRFields(issue.description, {
				mergeCommit: result.mergeCommit,
				closeReason: "merged",
			});
			await this.store.update(mr.id, { description });
		} catch (error) {
			logger.warn({ id: mr.id, error: errorMessage(error) }, "Failed to record merge commit");
		}
		try {
			await this.store.close(mr.id, "merged");
			logger.info({ id: mr.id }, "Closed merge request");
		} catch (error) {
			logger.warn({ id: mr.id, error: errorMessage(error) }, "Failed to close merge request");
		}

		let sourceClosed = false;
		if (mr.sourceIssue !== "") {
			try {
				await this.store.close(mr.sourceIssue, `Merged in ${mr.id}`);
				sourceClosed = true;
				logger.info({ issue: mr.sourceIssue }, "Closed source issue");
			} catch (error) {
				logger.warn({ issue: mr.sourceIssue, error: errorMessage(error) }, "Failed to close source issue");
			}
		}
		if (sourceClosed) {
			try {
				await this.convoy.checkConvoysForIssue(mr.sourceIssue);
			} catch (error) {
				logger.warn({ issue: mr.sourceIssue, error: errorMessage(error) }, "Convoy check failed");
			}
		}

		if (mr.agentBead !== "") {
			try {
				const agent = await getIssue(this.store, mr.agentBead);
				await this.store.update(mr.agentBead, { description: setFields(agent.description, { active_mr: "" }) });
			} catch (error) {
				logger.warn({ agent: mr.agentBead, error: errorMessage(error) }, "Failed to clear agent active_mr");
			}
		}

		if (this.config.deleteMergedBranches && mr.branch !== "") {
			try {
				await this.git.deleteBranch(mr.branch, true);
				logger.info({ branch: mr.branch }, "Deleted merged branch");
			} catch (error) {
				logger.warn({ branch: mr.branch, error: errorMessage(error) }, "Failed to delete branch");
			}
		}

		logger.info({ id: mr.id, commit: result.mergeCommit }, "Merge complete");
	}

	async handleFailure(mr: MergeRequest, result: ProcessResult): Promise<FailureOutcome> {
		const failureType = classifyFailure(result);

		if (failureType === "slot-timeout") {
			logger.info({ id: mr.id, error: result.error }, "Merge slot contention, MR stays queued for retry");
			return { failureType, notified: false, deferred: false };
		}

		const message = mergeFailedMessage(
			{
				branch: mr.branch,
				issue: mr.sourceIssue,
				worker: mr.worker,
				rig: this.rig.name,
				target: mr.target,
				failureType,
				error: result.error,
			},
			this.slot.conflictHolder,
			this.config.notifyRecipient,
		);
		let notified = false;
		try {
			await this.notifier.send(message);
			notified = true;
		} catch (error) {
			logger.warn({ id: mr.id, error: errorMessage(error) }, "Failed to send MERGE_FAILED");
		}

		if (failureType !== "conflict") {
			logger.info({ id: mr.id, failureType, error: result.error }, "Merge failed, MR stays queued");
			return { failureType, notified, deferred: false };
		}

		try {
			const escalation = await this.escalateConflict(mr);
			return { failureType, notified, ...escalation };
		} catch (error) {
			logger.warn({ id: mr.id, error: errorMessage(error) }, "Failed to create conflict resolution task");
			return { failureType, notified, deferred: false };
		}
	}

	/**
	 * Create the conflict-resolution task and block the MR on it, holding the
	 * slot under the conflict identity until the resolution merges.
	 *
	 * Returns deferred when another holder has the slot; no task is created then.
	 */
	async escalateConflict(mr: MergeRequest): Promise<{ taskId?: string; deferred: boolean }> {
		const slot = await this.slot.acquireConflictSlot();
		let held = "";
		switch (slot.kind) {
			case "deferred":
				logger.info({ id: mr.id, holder: slot.holder }, "Merge slot busy, deferring conflict resolution");
				return { deferred: true };
			case "unavailable":
				logger.warn({ id: mr.id, error: slot.error.message }, "Merge slot unavailable, escalating without it");
				break;
			case "acquired":
				held = slot.holder;
				break;
		}

		let taskId: string;
		try {
			taskId = await this.createConflictTask(mr);
			await this.store.addDependency(mr.id, taskId);
		} catch (error) {
			if (held !== "") {
				await this.slot.release(held).catch((releaseError: unknown) => {
					logger.warn({ error: errorMessage(releaseError) }, "Failed to release conflict slot");
				});
			}
			throw error;
		}
		logger.info({ id: mr.id, taskId }, "MR blocked on conflict resolution task");

		try {
			const issue = await getIssue(this.store, mr.id);
			await this.store.update(mr.id, {
				description: updateMRFields(issue.description, { retryCount: mr.retryCount + 1 }),
			});
		} catch (error) {
			logger.warn({ id: mr.id, error: errorMessage(error) }, "Failed to bump retry_count");
		}

		return { taskId, deferred: false };
	}

	private async createConflictTask(mr: MergeRequest): Promise<string> {
		let mainSHA: string;
		try {
			mainSHA = await this.git.rev(`${this.config.remote}/${mr.target}`);
		} catch {
			mainSHA = "unknown-sha";
		}

		let originalTitle = mr.sourceIssue;
		if (mr.sourceIssue !== "") {
			const source = (await this.store.show([mr.sourceIssue])).get(mr.sourceIssue);
			if (source) {
				originalTitle = source.title;
			}
		}

		const retryCount = mr.retryCount + 1;
		const task = await this.store.create({
			title: `Resolve merge conflicts: ${originalTitle}`,
			type: "task",
			priority: Math.max(0, mr.priority - 1),
			description: conflictTaskDescription(mr, this.config.remote, mainSHA, retryCount),
			actor: this.slot.conflictHolder,
		});
		logger.info({ taskId: task.id, priority: task.priority }, "Created conflict resolution task");
		return task.id;
	}
}
