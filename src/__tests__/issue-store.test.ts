/**
 * Issue Store Tests
 */

import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AppError, IssueNotFoundError } from "../errors.js";
import { getIssue, JsonIssueStore, MemoryIssueStore } from "../issue-store.js";
import { createMockIssue, NOW } from "./helpers.js";

describe("MemoryIssueStore", () => {
	let store: MemoryIssueStore;

	beforeEach(() => {
		store = new MemoryIssueStore({ now: () => NOW });
	});

	it("assigns sequential ids with the store prefix", async () => {
		const first = await store.create({ title: "One", type: "task", priority: 2, actor: "harbor/merge-queue" });
		const second = await store.create({ title: "Two", type: "task", priority: 1 });

		expect(first).toEqual({
			id: "sw-1",
			title: "One",
			type: "task",
			status: "open",
			priority: 2,
			description: "",
			assignee: "",
			labels: [],
			blockedBy: [],
			createdAt: NOW.toISOString(),
			updatedAt: NOW.toISOString(),
			createdBy: "harbor/merge-queue",
		});
		expect(second.id).toBe("sw-2");
	});

	it("lists open issues by default and filters by type", async () => {
		store.seed(createMockIssue({ id: "a", type: "task" }));
		store.seed(createMockIssue({ id: "b", type: "merge-request" }));
		store.seed(createMockIssue({ id: "c", type: "task", status: "closed" }));

		expect((await store.list()).map((i) => i.id)).toEqual(["a", "b"]);
		expect((await store.list({ type: "task" })).map((i) => i.id)).toEqual(["a"]);
		expect((await store.list({ status: "all" })).map((i) => i.id)).toEqual(["a", "b", "c"]);
		expect((await store.list({ status: "closed" })).map((i) => i.id)).toEqual(["c"]);
	});

	it("returns copies", async () => {
		store.seed(createMockIssue({ id: "a" }));

		const [listed] = await store.list();
		if (listed) listed.labels.push("edited");

		expect((await getIssue(store, "a")).labels).toEqual([]);
	});

	it("updates fields and bumps updatedAt", async () => {
		store.seed(createMockIssue({ id: "a", updatedAt: "2026-01-01T00:00:00.000Z" }));

		const updated = await store.update("a", { assignee: "worker-1", description: "branch: x" });

		expect(updated).toMatchObject({ assignee: "worker-1", description: "branch: x", updatedAt: NOW.toISOString() });
	});

	it("closes with a reason", async () => {
		store.seed(createMockIssue({ id: "a" }));

		await store.close("a", "merged");

		expect(await getIssue(store, "a")).toMatchObject({ status: "closed", closeReason: "merged" });
	});

	it("batch-shows known ids only", async () => {
		store.seed(createMockIssue({ id: "a" }));
		store.seed(createMockIssue({ id: "b" }));

		const found = await store.show(["a", "missing"]);

		expect([...found.keys()]).toEqual(["a"]);
	});

	it("records dependencies once", async () => {
		store.seed(createMockIssue({ id: "mr-1" }));
		store.seed(createMockIssue({ id: "task-1" }));

		await store.addDependency("mr-1", "task-1");
		await store.addDependency("mr-1", "task-1");

		expect((await getIssue(store, "mr-1")).blockedBy).toEqual(["task-1"]);
	});

	it("rejects dependencies on unknown issues", async () => {
		store.seed(createMockIssue({ id: "mr-1" }));

		await expect(store.addDependency("mr-1", "nope")).rejects.toBeInstanceOf(IssueNotFoundError);
	});

	it("throws IssueNotFoundError for unknown ids", async () => {
		await expect(getIssue(store, "nope")).rejects.toThrow("issue not found: nope");
		await expect(store.update("nope", { assignee: "x" })).rejects.toBeInstanceOf(IssueNotFoundError);
		await expect(store.close("nope", "done")).rejects.toBeInstanceOf(IssueNotFoundError);
	});
});

describe("JsonIssueStore", () => {
	let rigDir: string;

	beforeEach(() => {
		rigDir = mkdtempSync(join(tmpdir(), "slipway-issues-"));
	});

	afterEach(() => {
		rmSync(rigDir, { recursive: true, force: true });
	});

	it("starts empty without a file", async () => {
		const store = new JsonIssueStore(rigDir);

		expect(store.filePath).toBe(join(rigDir, ".slipway", "issues.json"));
		expect(await store.list({ status: "all" })).toEqual([]);
	});

	it("persists changes across instances", async () => {
		const writer = new JsonIssueStore(rigDir, { now: () => NOW });
		const mr = await writer.create({ title: "Merge feature/x", type: "merge-request", priority: 1, description: "branch: feature/x" });
		const task = await writer.create({ title: "Resolve", type: "task", priority: 0 });
		await writer.addDependency(mr.id, task.id);
		await writer.update(mr.id, { assignee: "worker-1" });

		const reader = new JsonIssueStore(rigDir);

		expect(await getIssue(reader, "sw-1")).toMatchObject({
			title: "Merge feature/x",
			description: "branch: feature/x",
			assignee: "worker-1",
			blockedBy: ["sw-2"],
		});
		expect((await reader.create({ title: "Third", type: "task", priority: 2 })).id).toBe("sw-3");
	});

	it("uses the configured prefix", async () => {
		const store = new JsonIssueStore(rigDir, { prefix: "hb" });

		expect((await store.create({ title: "One", type: "task", priority: 2 })).id).toBe("hb-1");
		const raw: unknown = JSON.parse(readFileSync(store.filePath, "utf-8"));
		expect(raw).toMatchObject({ prefix: "hb", nextId: 2 });
	});

	it("reports a file that fails validation", async () => {
		const store = new JsonIssueStore(rigDir);
		mkdirSync(dirname(store.filePath), { recursive: true });
		writeFileSync(store.filePath, JSON.stringify({ prefix: "sw" }));

		const error = await store.list().catch((e: unknown) => e);

		expect(error).toBeInstanceOf(AppError);
		expect(error).toMatchObject({ code: "STORE_CORRUPT" });
	});

	it("reports a truncated file as corrupt", async () => {
		const store = new JsonIssueStore(rigDir);
		mkdirSync(dirname(store.filePath), { recursive: true });
		writeFileSync(store.filePath, '{"prefix": "sw", "nextId": 3, "iss');

		const error = await store.list().catch((e: unknown) => e);

		expect(error).toBeInstanceOf(AppError);
		expect(error).toMatchObject({ code: "STORE_CORRUPT" });
		expect(String(error)).toContain("is unreadable");
	});
});
