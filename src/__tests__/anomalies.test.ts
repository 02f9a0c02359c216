/**
 * Queue Anomaly Tests
 */

import { describe, expect, it } from "vitest";
import { type BranchPresence, detectQueueAnomalies, listQueueAnomalies } from "../anomalies.js";
import { MemoryIssueStore } from "../issue-store.js";
import { ago, createMRIssue, FakeGit, NOW } from "./helpers.js";

const HOUR = 60 * 60 * 1000;
const present = async (): Promise<BranchPresence> => ({ local: true, remoteTracking: false });
const missing = async (): Promise<BranchPresence> => ({ local: false, remoteTracking: false });

describe("detectQueueAnomalies", () => {
	it("flags a claim idle for two hours as a warning", async () => {
		const issue = createMRIssue("mr-1", { branch: "feature/x" }, { assignee: "worker-1", updatedAt: ago(2 * HOUR) });

		expect(await detectQueueAnomalies([issue], NOW, present)).toEqual([
			{
				id: "mr-1",
				branch: "feature/x",
				type: "stale-claim",
				severity: "warning",
				assignee: "worker-1",
				ageMs: 2 * HOUR,
				detail: "MR is claimed but not progressing",
			},
		]);
	});

	it("escalates a claim idle for six hours to critical", async () => {
		const issue = createMRIssue("mr-1", { branch: "feature/x" }, { assignee: "worker-1", updatedAt: ago(6 * HOUR) });

		const [anomaly] = await detectQueueAnomalies([issue], NOW, present);

		expect(anomaly?.severity).toBe("critical");
	});

	it("ignores claims younger than the warning threshold and unclaimed MRs", async () => {
		const young = createMRIssue("mr-1", { branch: "a" }, { assignee: "worker-1", updatedAt: ago(2 * HOUR - 1) });
		const unclaimed = createMRIssue("mr-2", { branch: "b" }, { updatedAt: ago(10 * HOUR) });

		expect(await detectQueueAnomalies([young, unclaimed], NOW, present)).toEqual([]);
	});

	it("flags a branch missing locally and remotely as orphaned", async () => {
		const issue = createMRIssue("mr-1", { branch: "feature/gone" });

		expect(await detectQueueAnomalies([issue], NOW, missing)).toEqual([
			{
				id: "mr-1",
				branch: "feature/gone",
				type: "orphaned-branch",
				severity: "critical",
				detail: "MR branch is missing locally and in remote tracking refs",
			},
		]);
	});

	it("accepts a branch present only as a remote tracking ref", async () => {
		const issue = createMRIssue("mr-1", { branch: "feature/x" });

		expect(await detectQueueAnomalies([issue], NOW, async () => ({ local: false, remoteTracking: true }))).toEqual([]);
	});

	it("reports both signals for one MR, stale claim first", async () => {
		const issue = createMRIssue("mr-1", { branch: "feature/x" }, { assignee: "worker-1", updatedAt: ago(3 * HOUR) });

		const anomalies = await detectQueueAnomalies([issue], NOW, missing);

		expect(anomalies.map((a) => a.type)).toEqual(["stale-claim", "orphaned-branch"]);
	});

	it("skips only the orphan signal when the branch check fails", async () => {
		const issue = createMRIssue("mr-1", { branch: "feature/x" }, { assignee: "worker-1", updatedAt: ago(3 * HOUR) });

		const anomalies = await detectQueueAnomalies([issue], NOW, async () => {
			throw new Error("git unavailable");
		});

		expect(anomalies.map((a) => a.type)).toEqual(["stale-claim"]);
	});

	it("ignores closed issues and issues without a branch", async () => {
		const closed = createMRIssue("mr-1", { branch: "a" }, { status: "closed" });
		const noBranch = createMRIssue("mr-2", { target: "main" });

		expect(await detectQueueAnomalies([closed, noBranch], NOW, missing)).toEqual([]);
	});
});

describe("listQueueAnomalies", () => {
	it("checks local and remote tracking refs in the rig repository", async () => {
		const store = new MemoryIssueStore();
		store.seed(createMRIssue("mr-1", { branch: "feature/here" }));
		store.seed(createMRIssue("mr-2", { branch: "feature/remote" }));
		store.seed(createMRIssue("mr-3", { branch: "feature/gone" }));
		const git = new FakeGit("feature/here");
		git.remoteBranches.add("origin/feature/remote");

		const anomalies = await listQueueAnomalies(store, git, "origin", NOW);

		expect(anomalies.map((a) => [a.id, a.type])).toEqual([["mr-3", "orphaned-branch"]]);
		expect(git.calls).toContain("remoteTrackingBranchExists origin/feature/gone");
	});
});
