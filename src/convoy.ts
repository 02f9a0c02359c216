/**
 * Convoy continuation hook, run after a source issue closes so that queued
 * work tracked with it can be dispatched without waiting for the next poll.
 */

import type { CommandRunner } from "./command-runner.js";
import { errorMessage } from "./errors.js";
import { queueLogger } from "./logger.js";

const logger = queueLogger.child({ component: "convoy" });

export interface ConvoyObserver {
	checkConvoysForIssue(issueId: string): Promise<void>;
}

export class NoopConvoyObserver implements ConvoyObserver {
	async checkConvoysForIssue(): Promise<void> {}
}

/**
 * Runs the rig's configured convoy check command with SLIPWAY_ISSUE_ID set
 */
export class CommandConvoyObserver implements ConvoyObserver {
	constructor(
		private readonly runner: CommandRunner,
		private readonly command: string,
		private readonly cwd: string,
		private readonly timeoutMs: number,
	) {}

	async checkConvoysForIssue(issueId: string): Promise<void> {
		try {
			const result = await this.runner.run(this.command, {
				cwd: this.cwd,
				env: { SLIPWAY_ISSUE_ID: issueId },
				timeoutMs: this.timeoutMs,
			});
			if (result.exitCode !== 0) {
				logger.warn({ issueId, exitCode: result.exitCode, output: result.output.trim() }, "Convoy check command failed");
			}
		} catch (error) {
			logger.warn({ issueId, error: errorMessage(error) }, "Convoy check command could not run");
		}
	}
}
