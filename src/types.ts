/**
 * Slipway Types
 *
 * Core type definitions for the merge queue engine.
 */

/**
 * Issue status in the tracking store
 */
export type IssueStatus = "open" | "in_progress" | "closed";

/**
 * A record in the issue/dependency store. Merge requests, source issues,
 * conflict-resolution tasks and agent records are all issues.
 */
export interface Issue {
	id: string;
	title: string;
	type: string;
	status: IssueStatus;
	/** 0 is the most urgent */
	priority: number;
	description: string;
	/** Empty string when unclaimed */
	assignee: string;
	labels: string[];
	/** Ids of issues this one depends on */
	blockedBy: string[];
	/** RFC 3339 */
	createdAt: string;
	/** RFC 3339 */
	updatedAt: string;
	closeReason?: string;
	createdBy?: string;
}

/**
 * A queued merge request, built from an issue plus its embedded MR fields
 */
export interface MergeRequest {
	id: string;
	branch: string;
	target: string;
	sourceIssue: string;
	worker: string;
	rig: string;
	title: string;
	priority: number;
	/** Issue id of the agent that submitted this MR */
	agentBead: string;
	retryCount: number;
	convoyId: string;
	convoyCreatedAt?: Date;
	createdAt?: Date;
	updatedAt?: Date;
	/** Empty string when unclaimed */
	assignee: string;
	/** Id of the first open blocker, empty when not blocked */
	blockedBy: string;
	/** Only filled by the unfiltered all-open view */
	branchExistsLocal?: boolean;
	branchExistsRemote?: boolean;
}

/**
 * Outcome of one pass through the merge pipeline. Never persisted.
 */
export interface ProcessResult {
	success: boolean;
	mergeCommit: string;
	error: string;
	conflict: boolean;
	testsFailed: boolean;
	/** Merge slot contention timeout (distinct from build/test failure) */
	slotTimeout: boolean;
}

export type FailureType = "conflict" | "tests" | "slot-timeout" | "build";

export type AnomalyType = "stale-claim" | "orphaned-branch";
export type AnomalySeverity = "warning" | "critical";

/**
 * MR queue health problem that can stall processing
 */
export interface MRAnomaly {
	id: string;
	branch: string;
	type: AnomalyType;
	severity: AnomalySeverity;
	assignee?: string;
	ageMs?: number;
	detail: string;
}

/**
 * Slot state as reported by the backing store
 */
export interface MergeSlotStatus {
	id: string;
	available: boolean;
	/** Empty string when free */
	holder: string;
	waiters: string[];
}

/**
 * A managed repository instance with its own protected branch
 */
export interface Rig {
	name: string;
	/** Rig root: holds config.json and the .slipway state directory */
	path: string;
	/** Git working tree the queue merges in */
	workDir: string;
	defaultBranch: string;
}
