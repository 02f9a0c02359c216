/**
 * Queue anomaly scan: claims that stopped moving and MRs whose branch is gone.
 * Read-only; nothing here changes queue state.
 */

import { MERGE_REQUEST_TYPE, STALE_CLAIM_CRITICAL_AFTER_MS, STALE_CLAIM_WARNING_AFTER_MS } from "./constants.js";
import type { GitClient } from "./git.js";
import type { IssueStore } from "./issue-store.js";
import { queueLogger } from "./logger.js";
import { parseMRFields } from "./mr-fields.js";
import { parseTimestamp } from "./queue-lister.js";
import type { Issue, MRAnomaly } from "./types.js";

export interface BranchPresence {
	local: boolean;
	remoteTracking: boolean;
}

export type BranchPresenceCheck = (branch: string) => Promise<BranchPresence>;

/**
 * Scan open MR issues. A branch check that throws skips the orphan signal
 * for that MR only.
 */
export async function detectQueueAnomalies(
	issues: readonly Issue[],
	now: Date,
	branchPresence: BranchPresenceCheck,
): Promise<MRAnomaly[]> {
	const anomalies: MRAnomaly[] = [];

	for (const issue of issues) {
		if (issue.status !== "open") continue;
		const fields = parseMRFields(issue.description);
		if (!fields || fields.branch === "") continue;

		if (issue.assignee !== "") {
			const updatedAt = parseTimestamp(issue.updatedAt);
			if (updatedAt) {
				const ageMs = now.getTime() - updatedAt.getTime();
				if (ageMs >= STALE_CLAIM_WARNING_AFTER_MS) {
					anomalies.push({
						id: issue.id,
						branch: fields.branch,
						type: "stale-claim",
						severity: ageMs >= STALE_CLAIM_CRITICAL_AFTER_MS ? "critical" : "warning",
						assignee: issue.assignee,
						ageMs,
						detail: "MR is claimed but not progressing",
					});
				}
			}
		}

		let presence: BranchPresence;
		try {
			presence = await branchPresence(fields.branch);
		} catch (error) {
			queueLogger.debug({ id: issue.id, branch: fields.branch, error: String(error) }, "Branch check failed");
			continue;
		}
		if (!presence.local && !presence.remoteTracking) {
			anomalies.push({
				id: issue.id,
				branch: fields.branch,
				type: "orphaned-branch",
				severity: "critical",
				detail: "MR branch is missing locally and in remote tracking refs",
			});
		}
	}

	return anomalies;
}

/**
 * Anomalies across all open MRs of a rig
 */
export async function listQueueAnomalies(
	store: IssueStore,
	git: GitClient,
	remote: string,
	now: Date = new Date(),
): Promise<MRAnomaly[]> {
	const issues = await store.list({ type: MERGE_REQUEST_TYPE, status: "open" });
	return detectQueueAnomalies(issues, now, async (branch) => ({
		local: await git.branchExists(branch),
		remoteTracking: await git.remoteTrackingBranchExists(remote, branch),
	}));
}
