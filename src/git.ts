/**
 * Git Operations Module
 *
 * Git access for the merge pipeline:
 * - Branch and ref checks
 * - Conflict probing without touching the working tree
 * - Submodule pointer detection and pushes
 * - Squash merge, push, and hard-reset recovery
 *
 * Every command runs under a timeout and an optional AbortSignal.
 */

import { execFile } from "node:child_process";
import * as path from "node:path";
import { TIMEOUT_GIT_CMD_MS } from "./constants.js";
import { GitError, OperationCancelledError, TimeoutError } from "./errors.js";
import { gitLogger } from "./logger.js";

/**
 * A submodule whose recorded commit differs between two refs
 */
export interface SubmoduleChange {
	path: string;
	oldSHA: string;
	/** Empty when the submodule was removed */
	newSHA: string;
}

/**
 * Version control operations the merge queue depends on
 */
export interface GitClient {
	branchExists(branch: string, signal?: AbortSignal): Promise<boolean>;
	remoteTrackingBranchExists(remote: string, branch: string, signal?: AbortSignal): Promise<boolean>;
	checkout(ref: string, signal?: AbortSignal): Promise<void>;
	pull(remote: string, branch: string, signal?: AbortSignal): Promise<void>;
	/** Files that would conflict when merging source into target; the working tree is untouched */
	checkConflicts(source: string, target: string, signal?: AbortSignal): Promise<string[]>;
	submoduleChanges(base: string, branch: string, signal?: AbortSignal): Promise<SubmoduleChange[]>;
	initSubmodules(signal?: AbortSignal): Promise<void>;
	pushSubmoduleCommit(submodulePath: string, sha: string, remote: string, signal?: AbortSignal): Promise<void>;
	mergeSquash(branch: string, message: string, signal?: AbortSignal): Promise<void>;
	abortMerge(signal?: AbortSignal): Promise<void>;
	/** Paths with unmerged entries in the index */
	getConflictingFiles(signal?: AbortSignal): Promise<string[]>;
	push(remote: string, branch: string, signal?: AbortSignal): Promise<void>;
	resetHard(ref: string, signal?: AbortSignal): Promise<void>;
	rev(ref: string, signal?: AbortSignal): Promise<string>;
	getBranchCommitMessage(branch: string, signal?: AbortSignal): Promise<string>;
	deleteBranch(branch: string, force: boolean, signal?: AbortSignal): Promise<void>;
}

export interface GitOptions {
	/** Per-command timeout (default: 60s) */
	timeoutMs?: number;
}

interface GitResult {
	stdout: string;
	stderr: string;
	exitCode: number;
}

const ZERO_SHA = /^0+$/;
const SUBMODULE_MODE = "160000";

/**
 * Git client bound to a working tree
 */
export class Git implements GitClient {
	private readonly timeoutMs: number;

	constructor(
		readonly workDir: string,
		options: GitOptions = {},
	) {
		this.timeoutMs = options.timeoutMs ?? TIMEOUT_GIT_CMD_MS;
	}

	/**
	 * Run git and report the exit code. Rejects only on cancellation,
	 * timeout, or when git cannot be started.
	 */
	private exec(args: string[], signal?: AbortSignal, cwd: string = this.workDir): Promise<GitResult> {
		const command = `git ${args.join(" ")}`;
		return new Promise((resolve, reject) => {
			execFile(
				"git",
				args,
				{ cwd, timeout: this.timeoutMs, signal, encoding: "utf8", maxBuffer: 16 * 1024 * 1024 },
				(error, stdout, stderr) => {
					if (!error) {
						resolve({ stdout, stderr, exitCode: 0 });
						return;
					}
					if (error.name === "AbortError") {
						reject(new OperationCancelledError(`${command} canceled`, command));
						return;
					}
					if (error.killed) {
						reject(new TimeoutError(`${command} timed out after ${this.timeoutMs}ms`, command, this.timeoutMs));
						return;
					}
					if (typeof error.code === "number") {
						resolve({ stdout, stderr, exitCode: error.code });
						return;
					}
					reject(new GitError(error.message, command));
				},
			);
		});
	}

	/**
	 * Run git, returning trimmed stdout; non-zero exit throws GitError
	 */
	private async git(args: string[], signal?: AbortSignal, cwd?: string): Promise<string> {
		const result = await this.exec(args, signal, cwd);
		if (result.exitCode !== 0) {
			const command = `git ${args.join(" ")}`;
			gitLogger.debug({ command, exitCode: result.exitCode, stderr: result.stderr.trim() }, "Git command failed");
			throw new GitError(result.stderr.trim() || `${command} failed`, command, result.exitCode);
		}
		return result.stdout.trim();
	}

	private async refExists(ref: string, signal?: AbortSignal): Promise<boolean> {
		const args = ["show-ref", "--verify", "--quiet", ref];
		const result = await this.exec(args, signal);
		if (result.exitCode === 0) return true;
		if (result.exitCode === 1) return false;
		throw new GitError(result.stderr.trim() || "show-ref failed", `git ${args.join(" ")}`, result.exitCode);
	}

	async branchExists(branch: string, signal?: AbortSignal): Promise<boolean> {
		return this.refExists(`refs/heads/${branch}`, signal);
	}

	async remoteTrackingBranchExists(remote: string, branch: string, signal?: AbortSignal): Promise<boolean> {
		return this.refExists(`refs/remotes/${remote}/${branch}`, signal);
	}

	async checkout(ref: string, signal?: AbortSignal): Promise<void> {
		await this.git(["checkout", ref], signal);
	}

	async pull(remote: string, branch: string, signal?: AbortSignal): Promise<void> {
		await this.git(["pull", "--ff-only", remote, branch], signal);
	}

	async checkConflicts(source: string, target: string, signal?: AbortSignal): Promise<string[]> {
		const args = ["merge-tree", "--write-tree", "--name-only", "--no-messages", target, source];
		const result = await this.exec(args, signal);
		if (result.exitCode === 0) {
			return [];
		}
		if (result.exitCode !== 1) {
			throw new GitError(result.stderr.trim() || "merge-tree failed", `git ${args.join(" ")}`, result.exitCode);
		}
		// First line is the tree OID, the conflicted paths follow
		const files = result.stdout
			.split("\n")
			.slice(1)
			.map((line) => line.trim())
			.filter((line) => line !== "");
		return [...new Set(files)];
	}

	async submoduleChanges(base: string, branch: string, signal?: AbortSignal): Promise<SubmoduleChange[]> {
		const output = await this.git(["diff", "--raw", "--no-abbrev", `${base}...${branch}`], signal);
		const changes: SubmoduleChange[] = [];
		for (const line of output.split("\n")) {
			// :<old mode> <new mode> <old sha> <new sha> <status>\t<path>
			const match = /^:(\d{6}) (\d{6}) ([0-9a-f]+) ([0-9a-f]+) [A-Z]\d*\t(.+)$/.exec(line);
			if (!match) continue;
			const [, oldMode, newMode, oldSHA = "", newSHA = "", filePath = ""] = match;
			if (oldMode !== SUBMODULE_MODE && newMode !== SUBMODULE_MODE) continue;
			changes.push({
				path: filePath,
				oldSHA: ZERO_SHA.test(oldSHA) ? "" : oldSHA,
				newSHA: ZERO_SHA.test(newSHA) ? "" : newSHA,
			});
		}
		return changes;
	}

	async initSubmodules(signal?: AbortSignal): Promise<void> {
		await this.git(["submodule", "update", "--init", "--recursive"], signal);
	}

	async pushSubmoduleCommit(submodulePath: string, sha: string, remote: string, signal?: AbortSignal): Promise<void> {
		const cwd = path.join(this.workDir, submodulePath);
		const branch = await this.submoduleDefaultBranch(cwd, remote, signal);
		gitLogger.info({ submodule: submodulePath, sha, branch }, "Pushing submodule commit");
		await this.git(["push", remote, `${sha}:refs/heads/${branch}`], signal, cwd);
	}

	private async submoduleDefaultBranch(cwd: string, remote: string, signal?: AbortSignal): Promise<string> {
		const result = await this.exec(["symbolic-ref", `refs/remotes/${remote}/HEAD`], signal, cwd);
		if (result.exitCode === 0) {
			return result.stdout.trim().replace(`refs/remotes/${remote}/`, "");
		}
		return "main";
	}

	async mergeSquash(branch: string, message: string, signal?: AbortSignal): Promise<void> {
		await this.git(["merge", "--squash", branch], signal);
		await this.git(["commit", "-m", message], signal);
	}

	async abortMerge(signal?: AbortSignal): Promise<void> {
		// A squash merge leaves no MERGE_HEAD, so `merge --abort` has nothing to act on
		await this.git(["reset", "--hard", "HEAD"], signal);
	}

	async getConflictingFiles(signal?: AbortSignal): Promise<string[]> {
		const output = await this.git(["diff", "--name-only", "--diff-filter=U"], signal);
		return output === "" ? [] : output.split("\n");
	}

	async push(remote: string, branch: string, signal?: AbortSignal): Promise<void> {
		await this.git(["push", remote, branch], signal);
	}

	async resetHard(ref: string, signal?: AbortSignal): Promise<void> {
		await this.git(["reset", "--hard", ref], signal);
	}

	async rev(ref: string, signal?: AbortSignal): Promise<string> {
		return this.git(["rev-parse", ref], signal);
	}

	async getBranchCommitMessage(branch: string, signal?: AbortSignal): Promise<string> {
		return this.git(["log", "-1", "--format=%B", branch], signal);
	}

	async deleteBranch(branch: string, force: boolean, signal?: AbortSignal): Promise<void> {
		await this.git(["branch", force ? "-D" : "-d", branch], signal);
	}
}
