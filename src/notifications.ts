/**
 * Notifications
 *
 * MERGE_FAILED messages to the rig's watcher role, and the mailbox
 * transport that carries them (one JSON line per message under
 * `<rig>/.slipway/mail/`).
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { STATE_DIR } from "./constants.js";
import { withFileLock } from "./file-lock.js";
import { notifyLogger } from "./logger.js";
import type { FailureType } from "./types.js";

export interface MailMessage {
	from: string;
	to: string;
	subject: string;
	body: string;
	/** RFC 3339, filled in by the transport when absent */
	sentAt?: string;
}

export interface Notifier {
	send(message: MailMessage): Promise<void>;
}

export interface MergeFailedPayload {
	branch: string;
	issue: string;
	worker: string;
	rig: string;
	target: string;
	failureType: FailureType;
	error: string;
}

export const MERGE_FAILED_SUBJECT_PREFIX = "MERGE_FAILED";

const BODY_KEYS: ReadonlyArray<readonly [keyof MergeFailedPayload, string]> = [
	["branch", "Branch"],
	["issue", "Issue"],
	["worker", "Worker"],
	["rig", "Rig"],
	["target", "Target"],
	["failureType", "Failure-Type"],
	["error", "Error"],
];

export function mergeFailedMessage(payload: MergeFailedPayload, from: string, to: string): MailMessage {
	// Error text is flattened so every field stays on its own line
	const body = BODY_KEYS.map(([key, label]) => `${label}: ${String(payload[key]).replace(/\s*\n\s*/g, " ")}`).join("\n");
	return {
		from,
		to,
		subject: `${MERGE_FAILED_SUBJECT_PREFIX} ${payload.worker}`,
		body,
	};
}

const FAILURE_TYPES: ReadonlySet<string> = new Set<FailureType>(["conflict", "tests", "slot-timeout", "build"]);

function isFailureType(value: string): value is FailureType {
	return FAILURE_TYPES.has(value);
}

/**
 * Read a MERGE_FAILED message back, null for any other message
 */
export function parseMergeFailedPayload(message: Pick<MailMessage, "subject" | "body">): MergeFailedPayload | null {
	if (!message.subject.startsWith(`${MERGE_FAILED_SUBJECT_PREFIX} `)) {
		return null;
	}
	const values = new Map<string, string>();
	for (const line of message.body.split("\n")) {
		const colon = line.indexOf(":");
		if (colon > 0) {
			values.set(line.slice(0, colon).trim(), line.slice(colon + 1).trim());
		}
	}
	const failureType = values.get("Failure-Type") ?? "";
	if (!isFailureType(failureType)) {
		return null;
	}
	return {
		branch: values.get("Branch") ?? "",
		issue: values.get("Issue") ?? "",
		worker: values.get("Worker") ?? "",
		rig: values.get("Rig") ?? "",
		target: values.get("Target") ?? "",
		failureType,
		error: values.get("Error") ?? "",
	};
}

const MailMessageSchema = z.object({
	from: z.string(),
	to: z.string(),
	subject: z.string(),
	body: z.string(),
	sentAt: z.string().optional(),
});

/**
 * Mailbox per recipient: `<rig>/.slipway/mail/<recipient>.jsonl`
 */
export class MailboxNotifier implements Notifier {
	readonly mailDir: string;

	constructor(
		rigPath: string,
		private readonly now: () => Date = () => new Date(),
	) {
		this.mailDir = path.join(rigPath, STATE_DIR, "mail");
	}

	mailboxPath(recipient: string): string {
		return path.join(this.mailDir, `${recipient.replaceAll("/", "__")}.jsonl`);
	}

	async send(message: MailMessage): Promise<void> {
		const filePath = this.mailboxPath(message.to);
		fs.mkdirSync(this.mailDir, { recursive: true });
		const entry: MailMessage = { ...message, sentAt: message.sentAt ?? this.now().toISOString() };
		await withFileLock(filePath, async () => {
			fs.appendFileSync(filePath, `${JSON.stringify(entry)}\n`);
		});
		notifyLogger.debug({ to: message.to, subject: message.subject }, "Delivered message");
	}

	/**
	 * Messages for a recipient, oldest first. Malformed lines are skipped.
	 */
	read(recipient: string): MailMessage[] {
		const filePath = this.mailboxPath(recipient);
		if (!fs.existsSync(filePath)) {
			return [];
		}
		const messages: MailMessage[] = [];
		for (const line of fs.readFileSync(filePath, "utf-8").split("\n")) {
			if (line.trim() === "") continue;
			try {
				const result = MailMessageSchema.safeParse(JSON.parse(line));
				if (result.success) {
					messages.push(result.data);
				} else {
					notifyLogger.warn({ filePath }, "Skipping malformed mailbox entry");
				}
			} catch (error) {
				notifyLogger.warn({ filePath, error: String(error) }, "Skipping unparsable mailbox line");
			}
		}
		return messages;
	}
}
