/**
 * Merge request commands: submit, claim, release, reject, close
 */
import chalk from "chalk";
import { MERGE_REQUEST_TYPE } from "../constants.js";
import { ValidationError } from "../errors.js";
import { JsonIssueStore } from "../issue-store.js";
import { formatMRFields } from "../mr-fields.js";
import { QueueLister } from "../queue-lister.js";
import type { CommandModule } from "./types.js";
import { fail, loadRig, type RigOption } from "./utils.js";

interface SubmitOptions extends RigOption {
	branch: string;
	target?: string;
	sourceIssue?: string;
	worker?: string;
	title?: string;
	priority: string;
	agentBead?: string;
	convoyId?: string;
	convoyCreatedAt?: string;
}

interface ReasonOption extends RigOption {
	reason?: string;
}

function parsePriority(value: string): number {
	const priority = Number.parseInt(value, 10);
	if (Number.isNaN(priority) || priority < 0) {
		throw new ValidationError(`priority must be a non-negative integer, got "${value}"`, "priority");
	}
	return priority;
}

export const mrCommands: CommandModule = {
	register(program) {
		program
			.command("submit")
			.description("Queue a branch for merging")
			.requiredOption("-b, --branch <branch>", "Branch to merge")
			.option("--rig <path>", "Rig directory (default: current directory)")
			.option("-t, --target <branch>", "Target branch (default: the rig's default branch)")
			.option("-i, --source-issue <id>", "Issue the branch resolves")
			.option("-w, --worker <name>", "Worker that produced the branch")
			.option("--title <title>", "MR title")
			.option("-p, --priority <n>", "Priority, 0 is most urgent", "2")
			.option("--agent-bead <id>", "Issue id of the submitting agent")
			.option("--convoy-id <id>", "Convoy the source issue belongs to")
			.option("--convoy-created-at <timestamp>", "Convoy creation time (RFC 3339)")
			.action(async (options: SubmitOptions) => {
				try {
					const rig = loadRig(options);
					const store = new JsonIssueStore(rig.path);
					const target = options.target ?? rig.defaultBranch;
					const description = formatMRFields({
						branch: options.branch,
						target,
						sourceIssue: options.sourceIssue ?? "",
						worker: options.worker ?? "",
						rig: rig.name,
						agentBead: options.agentBead ?? "",
						retryCount: 0,
						convoyId: options.convoyId ?? "",
						convoyCreatedAt: options.convoyCreatedAt ?? "",
					});
					const mr = await store.create({
						title: options.title ?? `Merge ${options.branch}`,
						type: MERGE_REQUEST_TYPE,
						priority: parsePriority(options.priority),
						description,
						actor: options.worker,
					});
					console.log(`${chalk.green("Queued")} ${chalk.cyan(mr.id)}: ${options.branch} → ${target}`);
				} catch (error) {
					fail(error);
				}
			});

		program
			.command("claim <id> <worker>")
			.description("Claim an MR for processing")
			.option("--rig <path>", "Rig directory (default: current directory)")
			.action(async (id: string, worker: string, options: RigOption) => {
				try {
					const rig = loadRig(options);
					const lister = new QueueLister({
						store: new JsonIssueStore(rig.path),
						defaultBranch: rig.defaultBranch,
						staleClaimTimeoutMs: rig.mergeQueue.staleClaimTimeoutMs,
					});
					const mr = await lister.find(id);
					if (!mr) {
						throw new ValidationError(`no open merge request matches ${id}`, "id");
					}
					await lister.claim(mr.id, worker);
					console.log(`${chalk.green("Claimed")} ${chalk.cyan(mr.id)} for ${worker}`);
				} catch (error) {
					fail(error);
				}
			});

		program
			.command("release <id>")
			.description("Release an MR claim back to the queue")
			.option("--rig <path>", "Rig directory (default: current directory)")
			.action(async (id: string, options: RigOption) => {
				try {
					const rig = loadRig(options);
					const lister = new QueueLister({
						store: new JsonIssueStore(rig.path),
						defaultBranch: rig.defaultBranch,
						staleClaimTimeoutMs: rig.mergeQueue.staleClaimTimeoutMs,
					});
					const mr = await lister.find(id);
					if (!mr) {
						throw new ValidationError(`no open merge request matches ${id}`, "id");
					}
					await lister.release(mr.id);
					console.log(`${chalk.green("Released")} ${chalk.cyan(mr.id)}`);
				} catch (error) {
					fail(error);
				}
			});

		program
			.command("reject <id>")
			.description("Remove an MR from the queue without merging")
			.option("--rig <path>", "Rig directory (default: current directory)")
			.option("-r, --reason <reason>", "Why the MR is rejected")
			.action(async (id: string, options: ReasonOption) => {
				try {
					const rig = loadRig(options);
					const store = new JsonIssueStore(rig.path);
					const lister = new QueueLister({
						store,
						defaultBranch: rig.defaultBranch,
						staleClaimTimeoutMs: rig.mergeQueue.staleClaimTimeoutMs,
					});
					const mr = await lister.find(id);
					if (!mr) {
						throw new ValidationError(`no open merge request matches ${id}`, "id");
					}
					const reason = options.reason ? `rejected: ${options.reason}` : "rejected";
					await store.close(mr.id, reason);
					console.log(`${chalk.yellow("Rejected")} ${chalk.cyan(mr.id)} (${reason})`);
				} catch (error) {
					fail(error);
				}
			});

		program
			.command("close <id>")
			.description("Close an issue, such as a finished conflict-resolution task")
			.option("--rig <path>", "Rig directory (default: current directory)")
			.option("-r, --reason <reason>", "Close reason", "done")
			.action(async (id: string, options: ReasonOption) => {
				try {
					const rig = loadRig(options);
					const store = new JsonIssueStore(rig.path);
					const lister = new QueueLister({
						store,
						defaultBranch: rig.defaultBranch,
						staleClaimTimeoutMs: rig.mergeQueue.staleClaimTimeoutMs,
					});
					if (!(await lister.isOpen(id))) {
						throw new ValidationError(`issue ${id} is not open`, "id");
					}
					await store.close(id, options.reason ?? "done");
					console.log(`${chalk.green("Closed")} ${chalk.cyan(id)}`);
				} catch (error) {
					fail(error);
				}
			});
	},
};
