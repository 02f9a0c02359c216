#!/usr/bin/env node

/**
 * Slipway CLI
 *
 * Merge queue for rigs of collaborating coding agents.
 *
 * Commands:
 *   list        Show ready (or --blocked / --all) merge requests
 *   anomalies   Report stale claims and orphaned branches
 *   slot        Show the merge slot holder
 *   process     Run the queue (--once to drain and exit)
 *   submit      Queue a branch
 *   claim       Claim an MR
 *   release     Release an MR claim
 *   reject      Drop an MR from the queue
 *   close       Close an issue
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { mrCommands } from "./commands/mr.js";
import { queueCommands } from "./commands/queue.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

// Get version from package.json
function getVersion(): string {
	try {
		const pkg: unknown = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8"));
		if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
	} catch {
		// Fall through to the default
	}
	return "0.1.0";
}

const program = new Command();

program.name("slipway").description("Merge queue for rigs of collaborating coding agents").version(getVersion());

for (const module of [queueCommands, mrCommands]) {
	module.register(program);
}

await program.parseAsync();
