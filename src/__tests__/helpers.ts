/**
 * Test Helpers
 *
 * In-process fakes for the queue's capabilities and factories for issues,
 * merge requests and rig config.
 */

import type { CommandOptions, CommandResult, CommandRunner } from "../command-runner.js";
import { defaultMergeQueueConfig, type MergeQueueConfig, type RigConfig } from "../config.js";
import { MERGE_REQUEST_TYPE } from "../constants.js";
import { GitError } from "../errors.js";
import type { GitClient, SubmoduleChange } from "../git.js";
import type { Sleep } from "../merge-slot.js";
import { formatMRFields, type MRFields } from "../mr-fields.js";
import type { MailMessage, Notifier } from "../notifications.js";
import type { Issue, MergeRequest } from "../types.js";

/** Fixed "current time" for deterministic tests */
export const NOW = new Date("2026-03-01T12:00:00.000Z");

export const HEAD_SHA = "0123456789abcdef0123456789abcdef01234567";
export const REMOTE_MAIN_SHA = "fedcba9876543210fedcba9876543210fedcba98";

/**
 * ISO timestamp `ms` before NOW
 */
export const ago = (ms: number): string => new Date(NOW.getTime() - ms).toISOString();

/**
 * Create a mock Issue with sensible defaults
 */
export const createMockIssue = (overrides: Partial<Issue> = {}): Issue => ({
	id: "src-1",
	title: "Test issue",
	type: "task",
	status: "open",
	priority: 2,
	description: "",
	assignee: "",
	labels: [],
	blockedBy: [],
	createdAt: ago(60 * 60 * 1000),
	updatedAt: ago(60 * 60 * 1000),
	...overrides,
});

/**
 * Create a merge-request issue carrying the given MR fields
 */
export const createMRIssue = (id: string, fields: Partial<MRFields>, overrides: Partial<Issue> = {}): Issue =>
	createMockIssue({
		id,
		title: `Merge ${fields.branch ?? id}`,
		type: MERGE_REQUEST_TYPE,
		description: formatMRFields(fields),
		...overrides,
	});

/**
 * Create a mock MergeRequest with sensible defaults
 */
export const createMockMergeRequest = (overrides: Partial<MergeRequest> = {}): MergeRequest => ({
	id: "mr-1",
	branch: "feature/x",
	target: "main",
	sourceIssue: "src-1",
	worker: "worker-1",
	rig: "harbor",
	title: "Merge feature/x",
	priority: 2,
	agentBead: "",
	retryCount: 0,
	convoyId: "",
	assignee: "",
	blockedBy: "",
	...overrides,
});

/**
 * Rig "harbor" at /tmp/harbor with default queue settings
 */
export const createTestRig = (overrides: Partial<MergeQueueConfig> = {}): RigConfig => ({
	name: "harbor",
	path: "/tmp/harbor",
	workDir: "/tmp/harbor",
	defaultBranch: "main",
	mergeQueue: { ...defaultMergeQueueConfig("harbor"), ...overrides },
});

/**
 * Sleep that returns at once and records the requested delays
 */
export function recordingSleep(): { sleep: Sleep; delays: number[] } {
	const delays: number[] = [];
	return {
		delays,
		sleep: async (ms) => {
			delays.push(ms);
		},
	};
}

/**
 * Git double: branches and outcomes are plain fields, every call is recorded
 */
export class FakeGit implements GitClient {
	readonly localBranches = new Set<string>();
	/** `<remote>/<branch>` */
	readonly remoteBranches = new Set<string>();
	/** `<remote>/<branch>` → SHA */
	readonly remoteHeads = new Map<string, string>();
	readonly failures = new Map<keyof GitClient, Error>();
	readonly calls: string[] = [];
	readonly mergeMessages: string[] = [];
	conflicts: string[] = [];
	submodules: SubmoduleChange[] = [];
	unmergedFiles: string[] = [];
	commitMessage = "Add feature";
	head = HEAD_SHA;

	constructor(...branches: string[]) {
		for (const branch of branches) {
			this.localBranches.add(branch);
		}
		this.remoteHeads.set("origin/main", REMOTE_MAIN_SHA);
	}

	private step(name: keyof GitClient, detail = ""): void {
		this.calls.push(detail === "" ? name : `${name} ${detail}`);
		const failure = this.failures.get(name);
		if (failure) {
			throw failure;
		}
	}

	async branchExists(branch: string): Promise<boolean> {
		this.step("branchExists", branch);
		return this.localBranches.has(branch);
	}

	async remoteTrackingBranchExists(remote: string, branch: string): Promise<boolean> {
		this.step("remoteTrackingBranchExists", `${remote}/${branch}`);
		return this.remoteBranches.has(`${remote}/${branch}`);
	}

	async checkout(ref: string): Promise<void> {
		this.step("checkout", ref);
	}

	async pull(remote: string, branch: string): Promise<void> {
		this.step("pull", `${remote} ${branch}`);
	}

	async checkConflicts(source: string, target: string): Promise<string[]> {
		this.step("checkConflicts", `${source} ${target}`);
		return [...this.conflicts];
	}

	async submoduleChanges(base: string, branch: string): Promise<SubmoduleChange[]> {
		this.step("submoduleChanges", `${base}...${branch}`);
		return [...this.submodules];
	}

	async initSubmodules(): Promise<void> {
		this.step("initSubmodules");
	}

	async pushSubmoduleCommit(submodulePath: string, sha: string, remote: string): Promise<void> {
		this.step("pushSubmoduleCommit", `${submodulePath} ${sha} ${remote}`);
	}

	async mergeSquash(branch: string, message: string): Promise<void> {
		this.step("mergeSquash", branch);
		this.mergeMessages.push(message);
	}

	async abortMerge(): Promise<void> {
		this.step("abortMerge");
	}

	async getConflictingFiles(): Promise<string[]> {
		this.step("getConflictingFiles");
		return [...this.unmergedFiles];
	}

	async push(remote: string, branch: string): Promise<void> {
		this.step("push", `${remote} ${branch}`);
	}

	async resetHard(ref: string): Promise<void> {
		this.step("resetHard", ref);
	}

	async rev(ref: string): Promise<string> {
		this.step("rev", ref);
		if (ref === "HEAD") {
			return this.head;
		}
		const sha = this.remoteHeads.get(ref);
		if (sha === undefined) {
			throw new GitError(`unknown revision ${ref}`, `git rev-parse ${ref}`, 128);
		}
		return sha;
	}

	async getBranchCommitMessage(branch: string): Promise<string> {
		this.step("getBranchCommitMessage", branch);
		return this.commitMessage;
	}

	async deleteBranch(branch: string, force: boolean): Promise<void> {
		this.step("deleteBranch", `${branch} ${force ? "-D" : "-d"}`);
		this.localBranches.delete(branch);
	}
}

/**
 * Notifier that keeps sent messages, or fails every send when `failure` is set
 */
export class RecordingNotifier implements Notifier {
	readonly messages: MailMessage[] = [];
	failure: Error | undefined;

	async send(message: MailMessage): Promise<void> {
		if (this.failure) {
			throw this.failure;
		}
		this.messages.push(message);
	}
}

export const exitWith = (exitCode: number | null, output = ""): CommandResult => ({
	exitCode,
	output,
	timedOut: false,
});

/**
 * Command runner replaying queued results (errors are thrown); exit 0 once the queue is empty
 */
export class FakeCommandRunner implements CommandRunner {
	readonly calls: Array<{ command: string; options: CommandOptions }> = [];
	private readonly results: Array<CommandResult | Error> = [];

	enqueue(...results: Array<CommandResult | Error>): this {
		this.results.push(...results);
		return this;
	}

	async run(command: string, options: CommandOptions): Promise<CommandResult> {
		this.calls.push({ command, options });
		const next = this.results.shift();
		if (next instanceof Error) {
			throw next;
		}
		return next ?? exitWith(0);
	}
}
