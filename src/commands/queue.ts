/**
 * Queue commands: list, anomalies, slot, process
 */
import chalk from "chalk";
import { listQueueAnomalies } from "../anomalies.js";
import { Git } from "../git.js";
import { JsonIssueStore } from "../issue-store.js";
import { createMergeQueue } from "../merge-queue.js";
import { QueueLister } from "../queue-lister.js";
import { FileSlotStore, slotIdForRig } from "../slot-store.js";
import type { MergeRequest } from "../types.js";
import type { CommandModule } from "./types.js";
import { fail, formatAge, formatMergeRequestLine, loadRig, type RigOption, severityColor } from "./utils.js";

interface ListOptions extends RigOption {
	blocked?: boolean;
	all?: boolean;
	json?: boolean;
}

interface JsonOption extends RigOption {
	json?: boolean;
}

interface ProcessOptions extends RigOption {
	once?: boolean;
}

export const queueCommands: CommandModule = {
	register(program) {
		program
			.command("list")
			.description("Show the merge queue")
			.option("--rig <path>", "Rig directory (default: current directory)")
			.option("--blocked", "Show MRs waiting on an open dependency")
			.option("--all", "Show every open MR with branch status")
			.option("--json", "Output as JSON")
			.action(async (options: ListOptions) => {
				try {
					const rig = loadRig(options);
					const lister = new QueueLister({
						store: new JsonIssueStore(rig.path),
						defaultBranch: rig.defaultBranch,
						staleClaimTimeoutMs: rig.mergeQueue.staleClaimTimeoutMs,
						git: new Git(rig.workDir, { timeoutMs: rig.mergeQueue.gitTimeoutMs }),
						remote: rig.mergeQueue.remote,
					});

					let mrs: MergeRequest[];
					let heading: string;
					if (options.all) {
						mrs = await lister.listAllOpen();
						heading = "Open merge requests";
					} else if (options.blocked) {
						mrs = await lister.listBlocked();
						heading = "Blocked merge requests";
					} else {
						mrs = await lister.listReady();
						heading = "Ready merge requests";
					}

					if (options.json) {
						console.log(JSON.stringify(mrs, null, 2));
						return;
					}

					console.log(chalk.bold(`${heading} (${rig.name})`));
					if (mrs.length === 0) {
						console.log(chalk.gray("  Queue is empty"));
						return;
					}
					const now = new Date();
					for (const mr of mrs) {
						console.log(formatMergeRequestLine(mr, now));
					}
				} catch (error) {
					fail(error);
				}
			});

		program
			.command("anomalies")
			.description("Scan open MRs for stale claims and orphaned branches")
			.option("--rig <path>", "Rig directory (default: current directory)")
			.option("--json", "Output as JSON")
			.action(async (options: JsonOption) => {
				try {
					const rig = loadRig(options);
					const anomalies = await listQueueAnomalies(
						new JsonIssueStore(rig.path),
						new Git(rig.workDir, { timeoutMs: rig.mergeQueue.gitTimeoutMs }),
						rig.mergeQueue.remote,
					);

					if (options.json) {
						console.log(JSON.stringify(anomalies, null, 2));
						return;
					}
					if (anomalies.length === 0) {
						console.log(chalk.green("No queue anomalies"));
						return;
					}
					console.log(chalk.bold(`Queue anomalies (${anomalies.length})`));
					for (const anomaly of anomalies) {
						const age = anomaly.ageMs !== undefined ? chalk.gray(` ${formatAge(anomaly.ageMs)}`) : "";
						const who = anomaly.assignee ? chalk.yellow(` @${anomaly.assignee}`) : "";
						console.log(
							`  ${severityColor(anomaly.severity)} ${anomaly.type} ${chalk.cyan(anomaly.id)} ${anomaly.branch}${who}${age}`,
						);
						console.log(chalk.gray(`    ${anomaly.detail}`));
					}
					if (anomalies.some((a) => a.severity === "critical")) {
						process.exitCode = 2;
					}
				} catch (error) {
					fail(error);
				}
			});

		program
			.command("slot")
			.description("Show the merge slot holder and waiters")
			.option("--rig <path>", "Rig directory (default: current directory)")
			.option("--json", "Output as JSON")
			.action(async (options: JsonOption) => {
				try {
					const rig = loadRig(options);
					const status = await new FileSlotStore(rig.path, slotIdForRig(rig.name)).status();
					if (options.json) {
						console.log(JSON.stringify(status, null, 2));
						return;
					}
					if (!status) {
						console.log(chalk.gray("Merge slot not created yet"));
						return;
					}
					console.log(chalk.bold(`Merge slot ${status.id}`));
					console.log(`  Holder:  ${status.holder === "" ? chalk.green("free") : chalk.yellow(status.holder)}`);
					console.log(`  Waiters: ${status.waiters.length === 0 ? chalk.gray("none") : status.waiters.join(", ")}`);
				} catch (error) {
					fail(error);
				}
			});

		program
			.command("process")
			.description("Run the merge queue (polls until interrupted)")
			.option("--rig <path>", "Rig directory (default: current directory)")
			.option("--once", "Drain the queue once and exit")
			.action(async (options: ProcessOptions) => {
				try {
					const rig = loadRig(options);
					const queue = createMergeQueue(rig);
					const controller = new AbortController();
					const stop = (): void => controller.abort();
					process.once("SIGINT", stop);
					process.once("SIGTERM", stop);

					try {
						if (options.once) {
							const results = await queue.processAll(controller.signal);
							for (const { mr, result, outcome } of results) {
								if (result.success) {
									console.log(`${chalk.green("✓")} ${mr.id} ${mr.branch} ${chalk.gray(result.mergeCommit.slice(0, 8))}`);
								} else {
									const kind = outcome?.failureType ?? "build";
									console.log(`${chalk.red("✗")} ${mr.id} ${mr.branch} ${chalk.yellow(kind)}: ${result.error}`);
								}
							}
							if (results.length === 0) {
								console.log(chalk.gray("Nothing ready to merge"));
							}
						} else {
							await queue.run(controller.signal);
						}
					} finally {
						process.off("SIGINT", stop);
						process.off("SIGTERM", stop);
					}
				} catch (error) {
					fail(error);
				}
			});
	},
};
