/**
 * Shell command execution for operator-configured commands (test suite,
 * convoy hook). Extra environment goes to the child only; process.env is
 * never written.
 */

import { spawn } from "node:child_process";
import { OperationCancelledError, ValidationError } from "./errors.js";

export interface CommandOptions {
	cwd: string;
	/** Merged over process.env for the child */
	env?: Readonly<Record<string, string>>;
	timeoutMs?: number;
	signal?: AbortSignal;
}

export interface CommandResult {
	exitCode: number | null;
	/** stdout and stderr interleaved */
	output: string;
	timedOut: boolean;
}

export interface CommandRunner {
	/**
	 * @throws OperationCancelledError when the signal aborts the command
	 */
	run(command: string, options: CommandOptions): Promise<CommandResult>;
}

/**
 * Runs commands through `sh -c`
 */
export class ShellCommandRunner implements CommandRunner {
	run(command: string, options: CommandOptions): Promise<CommandResult> {
		if (command.trim() === "") {
			return Promise.reject(new ValidationError("command must not be empty", "command"));
		}
		if (options.signal?.aborted) {
			return Promise.reject(new OperationCancelledError(`${command} canceled`, command));
		}

		return new Promise((resolve, reject) => {
			const child = spawn("sh", ["-c", command], {
				cwd: options.cwd,
				env: { ...process.env, ...options.env },
				stdio: ["ignore", "pipe", "pipe"],
			});

			let output = "";
			let timedOut = false;
			let cancelled = false;

			const onAbort = (): void => {
				cancelled = true;
				child.kill("SIGTERM");
			};
			options.signal?.addEventListener("abort", onAbort, { once: true });

			const timer =
				options.timeoutMs !== undefined
					? setTimeout(() => {
							timedOut = true;
							child.kill("SIGTERM");
						}, options.timeoutMs)
					: undefined;

			const cleanup = (): void => {
				if (timer) clearTimeout(timer);
				options.signal?.removeEventListener("abort", onAbort);
			};

			child.stdout.on("data", (data: Buffer) => {
				output += data.toString();
			});
			child.stderr.on("data", (data: Buffer) => {
				output += data.toString();
			});

			child.on("close", (code) => {
				cleanup();
				if (cancelled) {
					reject(new OperationCancelledError(`${command} canceled`, command));
					return;
				}
				resolve({ exitCode: code, output, timedOut });
			});

			child.on("error", (error) => {
				cleanup();
				resolve({ exitCode: null, output: error.message, timedOut });
			});
		});
	}
}
