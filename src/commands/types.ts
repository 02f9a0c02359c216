/**
 * Command module contract for the slipway CLI
 *
 * Each module (queue inspection, merge request handling) adds its
 * subcommands to the shared commander program, with `--rig` selecting
 * the rig directory.
 */
import type { Command } from "commander";

export interface CommandModule {
	/** Add this module's subcommands to the program */
	register(program: Command): void;
}
