/**
 * Merge Processor
 *
 * One merge attempt for one MR:
 *
 *   verify branch → checkout target (+ pull) → conflict probe → submodule sync
 *     → tests → squash merge → [merge slot] → push
 *
 * Every exit before the push leaves the target branch either untouched or
 * hard-reset to its remote state, so the next attempt can start from the top.
 */

import type { CommandRunner } from "./command-runner.js";
import type { MergeQueueConfig } from "./config.js";
import { OperationCancelledError, SlotContentionTimeoutError, ValidationError, errorMessage } from "./errors.js";
import type { GitClient, SubmoduleChange } from "./git.js";
import { queueLogger } from "./logger.js";
import type { MergeSlot } from "./merge-slot.js";
import type { MergeRequest, ProcessResult, Rig } from "./types.js";

const logger = queueLogger.child({ component: "processor" });

export type ProcessorConfig = Pick<
	MergeQueueConfig,
	"runTests" | "testCommand" | "retryFlakyTests" | "testTimeoutMs" | "remote"
>;

export interface MergeProcessorOptions {
	rig: Rig;
	git: GitClient;
	slot: MergeSlot;
	runner: CommandRunner;
	config: ProcessorConfig;
}

function failure(error: string, flags: Partial<Pick<ProcessResult, "conflict" | "testsFailed" | "slotTimeout">> = {}): ProcessResult {
	return {
		success: false,
		mergeCommit: "",
		error,
		conflict: flags.conflict ?? false,
		testsFailed: flags.testsFailed ?? false,
		slotTimeout: flags.slotTimeout ?? false,
	};
}

/**
 * @throws ValidationError for an empty or whitespace-only command
 */
export function validateTestCommand(command: string): void {
	if (command.trim() === "") {
		throw new ValidationError("test command must not be empty", "test_command");
	}
}

export class MergeProcessor {
	private readonly rig: Rig;
	private readonly git: GitClient;
	private readonly slot: MergeSlot;
	private readonly runner: CommandRunner;
	private readonly config: ProcessorConfig;

	constructor(options: MergeProcessorOptions) {
		this.rig = options.rig;
		this.git = options.git;
		this.slot = options.slot;
		this.runner = options.runner;
		this.config = options.config;
	}

	async process(mr: Pick<MergeRequest, "id" | "branch" | "target" | "sourceIssue">, signal?: AbortSignal): Promise<ProcessResult> {
		logger.info({ id: mr.id, branch: mr.branch, target: mr.target }, "Processing merge request");
		const result = await this.doMerge(mr.branch, mr.target, mr.sourceIssue, signal);
		if (result.success) {
			logger.info({ id: mr.id, commit: result.mergeCommit.slice(0, 8) }, "Merged");
		} else {
			logger.warn({ id: mr.id, error: result.error }, "Merge attempt failed");
		}
		return result;
	}

	async doMerge(branch: string, target: string, sourceIssue: string, signal?: AbortSignal): Promise<ProcessResult> {
		const remote = this.config.remote;

		// 1. Verify
		try {
			if (!(await this.git.branchExists(branch, signal))) {
				return failure(`branch ${branch} not found locally`);
			}
		} catch (error) {
			return failure(`failed to check branch ${branch}: ${errorMessage(error)}`);
		}

		// 2. Checkout target, then best-effort pull
		try {
			await this.git.checkout(target, signal);
		} catch (error) {
			return failure(`failed to checkout target ${target}: ${errorMessage(error)}`);
		}
		try {
			await this.git.pull(remote, target, signal);
		} catch (error) {
			logger.warn({ remote, target, error: errorMessage(error) }, "Pull failed, continuing with local state");
		}

		// 3. Conflict probe
		let conflicts: string[];
		try {
			conflicts = await this.git.checkConflicts(branch, target, signal);
		} catch (error) {
			return failure(`conflict check failed: ${errorMessage(error)}`, { conflict: true });
		}
		if (conflicts.length > 0) {
			return failure(`merge conflicts in: ${conflicts.join(", ")}`, { conflict: true });
		}

		// 4. Submodule commits land before the parent pointer does
		const submoduleFailure = await this.syncSubmodules(branch, target, signal);
		if (submoduleFailure) {
			return submoduleFailure;
		}

		// 5. Tests
		if (this.config.runTests && this.config.testCommand !== "") {
			const testFailure = await this.runTests(signal);
			if (testFailure) {
				return testFailure;
			}
		}

		// 6. Squash merge
		let message: string;
		try {
			message = await this.git.getBranchCommitMessage(branch, signal);
		} catch (error) {
			message = sourceIssue
				? `Squash merge ${branch} into ${target} (${sourceIssue})`
				: `Squash merge ${branch} into ${target}`;
			logger.warn({ branch, error: errorMessage(error) }, "Could not read branch commit message, using fallback");
		}
		try {
			await this.git.mergeSquash(branch, message, signal);
		} catch (error) {
			const conflicted = await this.git.getConflictingFiles(signal).catch(() => []);
			if (conflicted.length > 0) {
				try {
					await this.git.abortMerge(signal);
				} catch (abortError) {
					logger.warn({ error: errorMessage(abortError) }, "Failed to abort conflicted merge");
				}
				return failure("merge conflict during actual merge", { conflict: true });
			}
			return failure(`merge failed: ${errorMessage(error)}`);
		}

		// 7. Merge commit
		let mergeCommit: string;
		try {
			mergeCommit = await this.git.rev("HEAD", signal);
		} catch (error) {
			return failure(`failed to get merge commit SHA: ${errorMessage(error)}`);
		}

		// 8. Serialize pushes to the protected branch
		let pushHolder = "";
		if (target === this.rig.defaultBranch) {
			try {
				pushHolder = await this.slot.acquirePushSlot(signal);
			} catch (error) {
				await this.resetToRemote(target, "slot failure");
				return failure(`failed to acquire merge slot before push: ${errorMessage(error)}`, {
					slotTimeout: error instanceof SlotContentionTimeoutError,
				});
			}
		}

		// 9. Push
		try {
			await this.git.push(remote, target, signal);
		} catch (error) {
			await this.resetToRemote(target, "push failure");
			return failure(`failed to push to ${remote}: ${errorMessage(error)}`);
		} finally {
			if (pushHolder !== "") {
				await this.slot.release(pushHolder).catch((releaseError: unknown) => {
					logger.warn({ holder: pushHolder, error: errorMessage(releaseError) }, "Failed to release merge slot after push");
				});
			}
		}

		return { success: true, mergeCommit, error: "", conflict: false, testsFailed: false, slotTimeout: false };
	}

	private async syncSubmodules(branch: string, target: string, signal?: AbortSignal): Promise<ProcessResult | undefined> {
		let changes: SubmoduleChange[];
		try {
			changes = await this.git.submoduleChanges(target, branch, signal);
		} catch (error) {
			logger.warn({ branch, error: errorMessage(error) }, "Could not check submodule changes");
			return undefined;
		}
		if (changes.length === 0) {
			return undefined;
		}

		try {
			await this.git.initSubmodules(signal);
		} catch (error) {
			return failure(`failed to init submodules: ${errorMessage(error)}`);
		}
		let pushed = 0;
		for (const change of changes) {
			if (change.newSHA === "") {
				continue;
			}
			try {
				await this.git.pushSubmoduleCommit(change.path, change.newSHA, this.config.remote, signal);
				pushed++;
			} catch (error) {
				return failure(`failed to push submodule ${change.path}: ${errorMessage(error)}`);
			}
		}
		logger.info({ count: pushed }, "Pushed submodule commits");
		return undefined;
	}

	private async runTests(signal?: AbortSignal): Promise<ProcessResult | undefined> {
		const command = this.config.testCommand;
		try {
			validateTestCommand(command);
		} catch (error) {
			return failure(`invalid test command: ${errorMessage(error)}`);
		}

		const attempts = Math.max(1, this.config.retryFlakyTests);
		let lastError = "";
		for (let attempt = 1; attempt <= attempts; attempt++) {
			if (attempt > 1) {
				logger.info({ attempt, attempts }, "Retrying tests");
			}
			try {
				const result = await this.runner.run(command, {
					cwd: this.rig.workDir,
					timeoutMs: this.config.testTimeoutMs,
					signal,
				});
				if (result.exitCode === 0 && !result.timedOut) {
					return undefined;
				}
				lastError = result.timedOut
					? `timed out after ${this.config.testTimeoutMs}ms`
					: `exit code ${result.exitCode ?? "none"}`;
			} catch (error) {
				if (error instanceof OperationCancelledError) {
					return failure("test run canceled");
				}
				lastError = errorMessage(error);
			}
			if (signal?.aborted) {
				return failure("test run canceled");
			}
		}
		return failure(`tests failed after ${attempts} attempts: ${lastError}`, { testsFailed: true });
	}

	private async resetToRemote(target: string, reason: string): Promise<void> {
		const ref = `${this.config.remote}/${target}`;
		try {
			await this.git.resetHard(ref);
		} catch (error) {
			logger.warn({ ref, reason, error: errorMessage(error) }, "Failed to reset target branch");
		}
	}
}
