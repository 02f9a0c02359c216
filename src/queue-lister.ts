/**
 * Queue Lister
 *
 * Builds MergeRequest views over the issue store:
 * - listReady: unclaimed (or stale-claimed), unblocked, ranked by score
 * - listBlocked: MRs waiting on an open dependency
 * - listAllOpen: everything open, with branch presence filled in
 */

import { MERGE_REQUEST_TYPE, QUEUE_EXEMPT_LABEL } from "./constants.js";
import type { GitClient } from "./git.js";
import type { IssueStore } from "./issue-store.js";
import { queueLogger } from "./logger.js";
import { type MRFields, parseMRFields } from "./mr-fields.js";
import { DEFAULT_SCORE_WEIGHTS, type ScoreWeights, scoreMergeRequest } from "./scoring.js";
import type { Issue, MergeRequest } from "./types.js";

const RFC3339 = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/i;

/**
 * Parse an RFC 3339 timestamp, undefined when empty or malformed
 */
export function parseTimestamp(value: string | undefined): Date | undefined {
	if (!value || !RFC3339.test(value)) {
		return undefined;
	}
	const date = new Date(value);
	return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Whether a claim last refreshed at `updatedAt` has expired.
 *
 * A missing or unparsable timestamp keeps the claim valid.
 */
export function isClaimStale(updatedAt: string, timeoutMs: number, now: Date): boolean {
	if (updatedAt === "") {
		return false;
	}
	const refreshed = parseTimestamp(updatedAt);
	if (!refreshed) {
		queueLogger.warn({ updatedAt }, "Unparsable claim timestamp, treating claim as valid");
		return false;
	}
	return now.getTime() - refreshed.getTime() >= timeoutMs;
}

export function issueToMergeRequest(issue: Issue, fields: MRFields, defaultTarget: string): MergeRequest {
	return {
		id: issue.id,
		branch: fields.branch,
		target: fields.target || defaultTarget,
		sourceIssue: fields.sourceIssue,
		worker: fields.worker,
		rig: fields.rig,
		title: issue.title,
		priority: issue.priority,
		agentBead: fields.agentBead,
		retryCount: fields.retryCount,
		convoyId: fields.convoyId,
		convoyCreatedAt: parseTimestamp(fields.convoyCreatedAt),
		createdAt: parseTimestamp(issue.createdAt),
		updatedAt: parseTimestamp(issue.updatedAt),
		assignee: issue.assignee,
		blockedBy: "",
	};
}

export interface QueueListerOptions {
	store: IssueStore;
	/** Target for MRs that name none */
	defaultBranch: string;
	staleClaimTimeoutMs: number;
	/** Needed by listAllOpen only */
	git?: GitClient;
	remote?: string;
	weights?: ScoreWeights;
	now?: () => Date;
}

interface OpenMR {
	issue: Issue;
	mr: MergeRequest;
}

export class QueueLister {
	private readonly store: IssueStore;
	private readonly now: () => Date;

	constructor(private readonly options: QueueListerOptions) {
		this.store = options.store;
		this.now = options.now ?? (() => new Date());
	}

	/**
	 * Open, non-exempt MR issues that carry MR fields, in store order
	 */
	private async openMergeRequests(): Promise<OpenMR[]> {
		const issues = await this.store.list({ type: MERGE_REQUEST_TYPE, status: "open" });
		const result: OpenMR[] = [];
		for (const issue of issues) {
			if (issue.labels.includes(QUEUE_EXEMPT_LABEL)) {
				continue;
			}
			const fields = parseMRFields(issue.description);
			if (!fields) {
				queueLogger.debug({ id: issue.id }, "Skipping merge request without MR fields");
				continue;
			}
			result.push({ issue, mr: issueToMergeRequest(issue, fields, this.options.defaultBranch) });
		}
		return result;
	}

	/**
	 * Map each issue to its first open blocker, "" when unblocked
	 */
	private async firstOpenBlockers(issues: Issue[]): Promise<Map<string, string>> {
		const ids = [...new Set(issues.flatMap((i) => i.blockedBy))];
		const blockers = ids.length > 0 ? await this.store.show(ids) : new Map<string, Issue>();
		const result = new Map<string, string>();
		for (const issue of issues) {
			const open = issue.blockedBy.find((id) => {
				const blocker = blockers.get(id);
				return blocker !== undefined && blocker.status !== "closed";
			});
			result.set(issue.id, open ?? "");
		}
		return result;
	}

	/**
	 * MRs ready to process, highest score first (ties keep store order)
	 */
	async listReady(now: Date = this.now()): Promise<MergeRequest[]> {
		const open = await this.openMergeRequests();
		const unclaimed = open.filter(
			({ mr, issue }) => mr.assignee === "" || isClaimStale(issue.updatedAt, this.options.staleClaimTimeoutMs, now),
		);
		const blockers = await this.firstOpenBlockers(unclaimed.map((o) => o.issue));
		const ready = unclaimed.filter(({ mr }) => blockers.get(mr.id) === "").map(({ mr }) => mr);

		const weights = this.options.weights ?? DEFAULT_SCORE_WEIGHTS;
		const scored = ready.map((mr) => ({
			mr,
			score: scoreMergeRequest(
				{
					priority: mr.priority,
					createdAt: mr.createdAt,
					now,
					retryCount: mr.retryCount,
					convoyCreatedAt: mr.convoyCreatedAt,
				},
				weights,
			),
		}));
		scored.sort((a, b) => b.score - a.score);
		return scored.map((s) => s.mr);
	}

	/**
	 * MRs with at least one open blocker; blockedBy names the first
	 */
	async listBlocked(): Promise<MergeRequest[]> {
		const open = await this.openMergeRequests();
		const blockers = await this.firstOpenBlockers(open.map((o) => o.issue));
		return open
			.map(({ mr }) => ({ ...mr, blockedBy: blockers.get(mr.id) ?? "" }))
			.filter((mr) => mr.blockedBy !== "");
	}

	/**
	 * Every open MR, unfiltered, with blocker and branch presence filled in.
	 * Branch checks that fail leave the flags unset.
	 */
	async listAllOpen(): Promise<MergeRequest[]> {
		const open = await this.openMergeRequests();
		const blockers = await this.firstOpenBlockers(open.map((o) => o.issue));
		const result: MergeRequest[] = [];
		for (const { mr } of open) {
			const view: MergeRequest = { ...mr, blockedBy: blockers.get(mr.id) ?? "" };
			const git = this.options.git;
			if (git && mr.branch !== "") {
				try {
					view.branchExistsLocal = await git.branchExists(mr.branch);
					view.branchExistsRemote = await git.remoteTrackingBranchExists(this.options.remote ?? "origin", mr.branch);
				} catch (error) {
					queueLogger.warn({ id: mr.id, branch: mr.branch, error: String(error) }, "Branch check failed");
				}
			}
			result.push(view);
		}
		return result;
	}

	/**
	 * Whether an issue is still open. Unknown ids count as not open.
	 */
	async isOpen(id: string): Promise<boolean> {
		const issue = (await this.store.show([id])).get(id);
		return issue !== undefined && issue.status !== "closed";
	}

	async claim(id: string, worker: string): Promise<void> {
		await this.store.update(id, { assignee: worker });
		queueLogger.debug({ id, worker }, "Claimed merge request");
	}

	async release(id: string): Promise<void> {
		await this.store.update(id, { assignee: "" });
		queueLogger.debug({ id }, "Released merge request claim");
	}

	/**
	 * Open MR by id, or by branch name
	 */
	async find(idOrBranch: string): Promise<MergeRequest | null> {
		const open = await this.openMergeRequests();
		const match = open.find(({ mr }) => mr.id === idOrBranch) ?? open.find(({ mr }) => mr.branch === idOrBranch);
		return match ? match.mr : null;
	}
}
