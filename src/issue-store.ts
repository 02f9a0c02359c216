/**
 * Issue Store
 *
 * The issue/dependency store the queue reads MRs from and writes outcomes to.
 *
 * - MemoryIssueStore: process-local, for embedding and tests
 * - JsonIssueStore: `<rig>/.slipway/issues.json`, read-modify-write under a file lock
 *
 * Both share IssueTable for the actual mutations.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { STATE_DIR } from "./constants.js";
import { AppError, errorMessage, IssueNotFoundError } from "./errors.js";
import { withFileLock } from "./file-lock.js";
import { storeLogger } from "./logger.js";
import type { Issue, IssueStatus } from "./types.js";

export interface IssueListFilter {
	type?: string;
	/** Default "open" */
	status?: IssueStatus | "all";
}

export interface IssueUpdate {
	assignee?: string;
	description?: string;
	labels?: string[];
	status?: IssueStatus;
}

export interface NewIssue {
	title: string;
	type: string;
	priority: number;
	description?: string;
	labels?: string[];
	/** Recorded as createdBy */
	actor?: string;
}

export interface IssueStore {
	list(filter?: IssueListFilter): Promise<Issue[]>;
	/** Batch lookup; unknown ids are absent from the result */
	show(ids: readonly string[]): Promise<Map<string, Issue>>;
	update(id: string, changes: IssueUpdate): Promise<Issue>;
	close(id: string, reason: string): Promise<void>;
	create(issue: NewIssue): Promise<Issue>;
	/** Make `issueId` depend on (be blocked by) `dependsOnId` */
	addDependency(issueId: string, dependsOnId: string): Promise<void>;
}

/**
 * Look up one issue
 *
 * @throws IssueNotFoundError
 */
export async function getIssue(store: IssueStore, id: string): Promise<Issue> {
	const issue = (await store.show([id])).get(id);
	if (!issue) {
		throw new IssueNotFoundError(id);
	}
	return issue;
}

const IssueSchema = z.object({
	id: z.string(),
	title: z.string(),
	type: z.string(),
	status: z.enum(["open", "in_progress", "closed"]),
	priority: z.number(),
	description: z.string().default(""),
	assignee: z.string().default(""),
	labels: z.array(z.string()).default([]),
	blockedBy: z.array(z.string()).default([]),
	createdAt: z.string(),
	updatedAt: z.string(),
	closeReason: z.string().optional(),
	createdBy: z.string().optional(),
});

const IssueFileSchema = z.object({
	prefix: z.string().min(1),
	nextId: z.number().int().positive(),
	issues: z.array(IssueSchema),
});

export type IssueData = z.infer<typeof IssueFileSchema>;

/**
 * In-place mutations over an issue list
 */
export class IssueTable {
	constructor(
		readonly data: IssueData,
		private readonly now: () => Date,
	) {}

	static empty(prefix: string): IssueData {
		return { prefix, nextId: 1, issues: [] };
	}

	private find(id: string): Issue {
		const issue = this.data.issues.find((i) => i.id === id);
		if (!issue) {
			throw new IssueNotFoundError(id);
		}
		return issue;
	}

	list(filter: IssueListFilter = {}): Issue[] {
		const status = filter.status ?? "open";
		return this.data.issues
			.filter((i) => (filter.type === undefined || i.type === filter.type) && (status === "all" || i.status === status))
			.map((i) => structuredClone(i));
	}

	show(ids: readonly string[]): Map<string, Issue> {
		const wanted = new Set(ids);
		const found = new Map<string, Issue>();
		for (const issue of this.data.issues) {
			if (wanted.has(issue.id)) {
				found.set(issue.id, structuredClone(issue));
			}
		}
		return found;
	}

	update(id: string, changes: IssueUpdate): Issue {
		const issue = this.find(id);
		if (changes.assignee !== undefined) issue.assignee = changes.assignee;
		if (changes.description !== undefined) issue.description = changes.description;
		if (changes.labels !== undefined) issue.labels = [...changes.labels];
		if (changes.status !== undefined) issue.status = changes.status;
		issue.updatedAt = this.now().toISOString();
		return structuredClone(issue);
	}

	close(id: string, reason: string): void {
		const issue = this.find(id);
		issue.status = "closed";
		issue.closeReason = reason;
		issue.updatedAt = this.now().toISOString();
	}

	create(input: NewIssue): Issue {
		const timestamp = this.now().toISOString();
		const issue: Issue = {
			id: `${this.data.prefix}-${this.data.nextId}`,
			title: input.title,
			type: input.type,
			status: "open",
			priority: input.priority,
			description: input.description ?? "",
			assignee: "",
			labels: [...(input.labels ?? [])],
			blockedBy: [],
			createdAt: timestamp,
			updatedAt: timestamp,
			createdBy: input.actor,
		};
		this.data.nextId++;
		this.data.issues.push(issue);
		return structuredClone(issue);
	}

	addDependency(issueId: string, dependsOnId: string): void {
		const issue = this.find(issueId);
		this.find(dependsOnId);
		if (!issue.blockedBy.includes(dependsOnId)) {
			issue.blockedBy.push(dependsOnId);
			issue.updatedAt = this.now().toISOString();
		}
	}
}

export interface IssueStoreOptions {
	/** Id prefix for created issues (default: "sw") */
	prefix?: string;
	now?: () => Date;
}

/**
 * Issue store held in memory
 */
export class MemoryIssueStore implements IssueStore {
	private readonly table: IssueTable;

	constructor(options: IssueStoreOptions = {}) {
		this.table = new IssueTable(IssueTable.empty(options.prefix ?? "sw"), options.now ?? (() => new Date()));
	}

	/**
	 * Insert a fully formed issue, replacing any with the same id
	 */
	seed(issue: Issue): void {
		const issues = this.table.data.issues;
		const index = issues.findIndex((i) => i.id === issue.id);
		if (index >= 0) {
			issues[index] = structuredClone(issue);
		} else {
			issues.push(structuredClone(issue));
		}
	}

	async list(filter?: IssueListFilter): Promise<Issue[]> {
		return this.table.list(filter);
	}

	async show(ids: readonly string[]): Promise<Map<string, Issue>> {
		return this.table.show(ids);
	}

	async update(id: string, changes: IssueUpdate): Promise<Issue> {
		return this.table.update(id, changes);
	}

	async close(id: string, reason: string): Promise<void> {
		this.table.close(id, reason);
	}

	async create(issue: NewIssue): Promise<Issue> {
		return this.table.create(issue);
	}

	async addDependency(issueId: string, dependsOnId: string): Promise<void> {
		this.table.addDependency(issueId, dependsOnId);
	}
}

/**
 * Issue store persisted as JSON under the rig's state directory
 */
export class JsonIssueStore implements IssueStore {
	readonly filePath: string;
	private readonly prefix: string;
	private readonly now: () => Date;

	constructor(rigPath: string, options: IssueStoreOptions = {}) {
		this.filePath = path.join(rigPath, STATE_DIR, "issues.json");
		this.prefix = options.prefix ?? "sw";
		this.now = options.now ?? (() => new Date());
	}

	private load(): IssueData {
		if (!fs.existsSync(this.filePath)) {
			return IssueTable.empty(this.prefix);
		}
		let raw: unknown;
		try {
			raw = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
		} catch (error) {
			throw new AppError(`Issue store ${this.filePath} is unreadable: ${errorMessage(error)}`, "STORE_CORRUPT");
		}
		const result = IssueFileSchema.safeParse(raw);
		if (!result.success) {
			const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
			throw new AppError(`Invalid issue store ${this.filePath}: ${issues}`, "STORE_CORRUPT");
		}
		return result.data;
	}

	private save(data: IssueData): void {
		const tmp = `${this.filePath}.tmp`;
		fs.writeFileSync(tmp, JSON.stringify(data, null, 2));
		fs.renameSync(tmp, this.filePath);
	}

	private async read<T>(fn: (table: IssueTable) => T): Promise<T> {
		return fn(new IssueTable(this.load(), this.now));
	}

	private async mutate<T>(fn: (table: IssueTable) => T): Promise<T> {
		fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
		return withFileLock(this.filePath, async () => {
			const table = new IssueTable(this.load(), this.now);
			const result = fn(table);
			this.save(table.data);
			return result;
		});
	}

	async list(filter?: IssueListFilter): Promise<Issue[]> {
		return this.read((t) => t.list(filter));
	}

	async show(ids: readonly string[]): Promise<Map<string, Issue>> {
		return this.read((t) => t.show(ids));
	}

	async update(id: string, changes: IssueUpdate): Promise<Issue> {
		return this.mutate((t) => t.update(id, changes));
	}

	async close(id: string, reason: string): Promise<void> {
		await this.mutate((t) => t.close(id, reason));
	}

	async create(issue: NewIssue): Promise<Issue> {
		const created = await this.mutate((t) => t.create(issue));
		storeLogger.debug({ id: created.id, type: created.type }, "Created issue");
		return created;
	}

	async addDependency(issueId: string, dependsOnId: string): Promise<void> {
		await this.mutate((t) => t.addDependency(issueId, dependsOnId));
	}
}
