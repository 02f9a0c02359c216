/**
 * Shared utilities for command modules
 */
import * as path from "node:path";
import chalk from "chalk";
import { loadRigConfig, type RigConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import type { AnomalySeverity, MergeRequest } from "../types.js";

export interface RigOption {
	rig?: string;
}

/**
 * Load the rig named by --rig (default: current directory)
 */
export function loadRig(options: RigOption): RigConfig {
	return loadRigConfig(path.resolve(options.rig ?? process.cwd()));
}

/**
 * Print an error and set a failing exit code
 */
export function fail(error: unknown): void {
	console.error(chalk.red(`Error: ${errorMessage(error)}`));
	process.exitCode = 1;
}

/**
 * Compact age: 45s, 12m, 3h, 2d
 */
export function formatAge(ms: number): string {
	const seconds = Math.max(0, Math.floor(ms / 1000));
	if (seconds < 60) return `${seconds}s`;
	const minutes = Math.floor(seconds / 60);
	if (minutes < 60) return `${minutes}m`;
	const hours = Math.floor(minutes / 60);
	if (hours < 24) return `${hours}h`;
	return `${Math.floor(hours / 24)}d`;
}

export function severityColor(severity: AnomalySeverity): string {
	return severity === "critical" ? chalk.red(severity) : chalk.yellow(severity);
}

export function formatMergeRequestLine(mr: MergeRequest, now: Date): string {
	const age = mr.createdAt ? formatAge(now.getTime() - mr.createdAt.getTime()) : "?";
	const parts = [
		chalk.cyan(mr.id),
		chalk.gray(`P${mr.priority}`),
		`${mr.branch} → ${mr.target}`,
		chalk.gray(age),
	];
	if (mr.assignee !== "") parts.push(chalk.yellow(`@${mr.assignee}`));
	if (mr.retryCount > 0) parts.push(chalk.magenta(`retry ${mr.retryCount}`));
	if (mr.blockedBy !== "") parts.push(chalk.red(`blocked by ${mr.blockedBy}`));
	if (mr.branchExistsLocal === false && mr.branchExistsRemote === false) parts.push(chalk.red("branch missing"));
	return `  ${parts.join("  ")}`;
}
