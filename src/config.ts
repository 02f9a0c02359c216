/**
 * Rig Configuration
 *
 * Loads `<rig>/config.json`. The `merge_queue` section drives the queue:
 *
 * ```json
 * {
 *   "name": "harbor",
 *   "default_branch": "main",
 *   "merge_queue": {
 *     "test_command": "npm test",
 *     "retry_flaky_tests": 2,
 *     "stale_claim_timeout": "45m"
 *   }
 * }
 * ```
 *
 * Durations are strings such as "500ms", "30s", "1h30m". A missing file or
 * section means defaults.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import {
	DEFAULT_POLL_INTERVAL_MS,
	DEFAULT_REMOTE,
	DEFAULT_STALE_CLAIM_TIMEOUT_MS,
	HOUR_MS,
	MINUTE_MS,
	SECOND_MS,
	SLOT_INITIAL_BACKOFF_MS,
	SLOT_MAX_BACKOFF_MS,
	SLOT_MAX_RETRIES,
	TIMEOUT_GIT_CMD_MS,
	TIMEOUT_TEST_SUITE_MS,
} from "./constants.js";
import { ConfigError } from "./errors.js";
import { configLogger } from "./logger.js";
import type { Rig } from "./types.js";

export const CONFIG_FILE = "config.json";

/**
 * Merge queue settings, durations in milliseconds
 */
export interface MergeQueueConfig {
	enabled: boolean;
	runTests: boolean;
	/** Empty disables the test step */
	testCommand: string;
	deleteMergedBranches: boolean;
	/** Test attempts per merge; values below 1 still run once */
	retryFlakyTests: number;
	pollIntervalMs: number;
	staleClaimTimeoutMs: number;
	slotMaxRetries: number;
	slotInitialBackoffMs: number;
	slotMaxBackoffMs: number;
	gitTimeoutMs: number;
	testTimeoutMs: number;
	/** Receives MERGE_FAILED messages */
	notifyRecipient: string;
	/** Run after each merge with SLIPWAY_ISSUE_ID set; empty disables */
	convoyCheckCommand: string;
	remote: string;
}

export interface RigConfig extends Rig {
	mergeQueue: MergeQueueConfig;
}

const UNIT_MS: Record<string, number> = {
	ms: 1,
	s: SECOND_MS,
	m: MINUTE_MS,
	h: HOUR_MS,
};

/**
 * Parse a duration such as "1h30m" or "250ms" into milliseconds, null if malformed
 */
export function parseDuration(input: string): number | null {
	const text = input.trim();
	if (text === "") {
		return null;
	}
	if (/^\d+$/.test(text)) {
		return text === "0" ? 0 : null;
	}
	const part = /(\d+(?:\.\d+)?)(ms|h|m|s)/y;
	let total = 0;
	part.lastIndex = 0;
	while (part.lastIndex < text.length) {
		const match = part.exec(text);
		if (!match) {
			return null;
		}
		total += Number.parseFloat(match[1] ?? "0") * (UNIT_MS[match[2] ?? ""] ?? 0);
	}
	return Math.round(total);
}

/**
 * Render milliseconds the way parseDuration reads them
 */
export function formatDuration(ms: number): string {
	if (ms === 0) return "0s";
	const parts: string[] = [];
	let rest = ms;
	for (const [unit, size] of [
		["h", HOUR_MS],
		["m", MINUTE_MS],
		["s", SECOND_MS],
	] as const) {
		if (rest >= size) {
			parts.push(`${Math.floor(rest / size)}${unit}`);
			rest %= size;
		}
	}
	if (rest > 0) parts.push(`${rest}ms`);
	return parts.join("");
}

const DurationSchema = z.union([
	z.number().int().nonnegative(),
	z.string().transform((value, ctx) => {
		const ms = parseDuration(value);
		if (ms === null) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid duration "${value}"` });
			return z.NEVER;
		}
		return ms;
	}),
]);

export const MergeQueueSectionSchema = z.object({
	enabled: z.boolean().optional(),
	run_tests: z.boolean().optional(),
	test_command: z.string().optional(),
	delete_merged_branches: z.boolean().optional(),
	retry_flaky_tests: z.number().int().nonnegative().optional(),
	poll_interval: DurationSchema.refine((ms) => ms > 0, "must be positive").optional(),
	stale_claim_timeout: DurationSchema.refine((ms) => ms > 0, "must be positive").optional(),
	slot_max_retries: z.number().int().nonnegative().optional(),
	slot_initial_backoff: DurationSchema.optional(),
	slot_max_backoff: DurationSchema.optional(),
	git_timeout: DurationSchema.refine((ms) => ms > 0, "must be positive").optional(),
	test_timeout: DurationSchema.refine((ms) => ms > 0, "must be positive").optional(),
	notify_recipient: z.string().min(1).optional(),
	convoy_check_command: z.string().optional(),
	remote: z.string().min(1).optional(),
});

export const RigConfigFileSchema = z.object({
	name: z.string().min(1).optional(),
	default_branch: z.string().min(1).optional(),
	work_dir: z.string().min(1).optional(),
	merge_queue: MergeQueueSectionSchema.optional(),
});

export type RigConfigFile = z.infer<typeof RigConfigFileSchema>;

/**
 * Default merge queue settings for a rig
 */
export function defaultMergeQueueConfig(rigName: string): MergeQueueConfig {
	return {
		enabled: true,
		runTests: true,
		testCommand: "",
		deleteMergedBranches: true,
		retryFlakyTests: 1,
		pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
		staleClaimTimeoutMs: DEFAULT_STALE_CLAIM_TIMEOUT_MS,
		slotMaxRetries: SLOT_MAX_RETRIES,
		slotInitialBackoffMs: SLOT_INITIAL_BACKOFF_MS,
		slotMaxBackoffMs: SLOT_MAX_BACKOFF_MS,
		gitTimeoutMs: TIMEOUT_GIT_CMD_MS,
		testTimeoutMs: TIMEOUT_TEST_SUITE_MS,
		notifyRecipient: `${rigName}/witness`,
		convoyCheckCommand: "",
		remote: DEFAULT_REMOTE,
	};
}

/**
 * Apply a validated config file on top of defaults
 */
export function resolveRigConfig(rigPath: string, file: RigConfigFile): RigConfig {
	const name = file.name ?? path.basename(path.resolve(rigPath));
	const defaults = defaultMergeQueueConfig(name);
	const mq = file.merge_queue ?? {};

	return {
		name,
		path: rigPath,
		workDir: file.work_dir ? path.resolve(rigPath, file.work_dir) : rigPath,
		defaultBranch: file.default_branch ?? "main",
		mergeQueue: {
			enabled: mq.enabled ?? defaults.enabled,
			runTests: mq.run_tests ?? defaults.runTests,
			testCommand: mq.test_command ?? defaults.testCommand,
			deleteMergedBranches: mq.delete_merged_branches ?? defaults.deleteMergedBranches,
			retryFlakyTests: mq.retry_flaky_tests ?? defaults.retryFlakyTests,
			pollIntervalMs: mq.poll_interval ?? defaults.pollIntervalMs,
			staleClaimTimeoutMs: mq.stale_claim_timeout ?? defaults.staleClaimTimeoutMs,
			slotMaxRetries: mq.slot_max_retries ?? defaults.slotMaxRetries,
			slotInitialBackoffMs: mq.slot_initial_backoff ?? defaults.slotInitialBackoffMs,
			slotMaxBackoffMs: mq.slot_max_backoff ?? defaults.slotMaxBackoffMs,
			gitTimeoutMs: mq.git_timeout ?? defaults.gitTimeoutMs,
			testTimeoutMs: mq.test_timeout ?? defaults.testTimeoutMs,
			notifyRecipient: mq.notify_recipient ?? defaults.notifyRecipient,
			convoyCheckCommand: mq.convoy_check_command ?? defaults.convoyCheckCommand,
			remote: mq.remote ?? defaults.remote,
		},
	};
}

/**
 * Load a rig's configuration from disk.
 *
 * @throws ConfigError when the file is not valid JSON or fails validation
 */
export function loadRigConfig(rigPath: string): RigConfig {
	const filePath = path.join(rigPath, CONFIG_FILE);

	if (!fs.existsSync(filePath)) {
		configLogger.debug({ filePath }, "No rig config, using defaults");
		return resolveRigConfig(rigPath, {});
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (error) {
		throw new ConfigError(`Failed to parse ${filePath}: ${String(error)}`, filePath);
	}

	const result = RigConfigFileSchema.safeParse(parsed);
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
		throw new ConfigError(`Invalid rig config ${filePath}:\n${issues.map((i) => `  - ${i}`).join("\n")}`, filePath, issues);
	}

	const config = resolveRigConfig(rigPath, result.data);
	configLogger.debug({ rig: config.name, filePath }, "Loaded rig config");
	return config;
}
