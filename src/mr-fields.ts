/**
 * MR Fields
 *
 * Structured `key: value` lines embedded in an issue's free-text description.
 * Merge requests carry their routing data this way; agent records use the same
 * format for `active_mr`.
 *
 * Keys match case-insensitively and accept `-` for `_`. Rewriting a description
 * only touches the lines of the keys being written; prose is preserved as-is.
 */

/**
 * Structured fields of a merge request
 */
export interface MRFields {
	branch: string;
	target: string;
	sourceIssue: string;
	worker: string;
	rig: string;
	agentBead: string;
	retryCount: number;
	convoyId: string;
	/** RFC 3339 */
	convoyCreatedAt: string;
	mergeCommit: string;
	closeReason: string;
}

const MR_FIELD_SPECS: ReadonlyArray<readonly [keyof MRFields, string]> = [
	["branch", "branch"],
	["target", "target"],
	["sourceIssue", "source_issue"],
	["worker", "worker"],
	["rig", "rig"],
	["agentBead", "agent_bead"],
	["retryCount", "retry_count"],
	["convoyId", "convoy_id"],
	["convoyCreatedAt", "convoy_created_at"],
	["mergeCommit", "merge_commit"],
	["closeReason", "close_reason"],
];

const MR_FIELD_KEYS: ReadonlySet<string> = new Set(MR_FIELD_SPECS.map(([, key]) => key));

const FIELD_LINE = /^\s*([A-Za-z][A-Za-z0-9_-]*)\s*:[ \t]*(.*?)\s*$/;

/**
 * Canonical form of a field key: lower case, underscores
 */
export function normalizeFieldKey(key: string): string {
	return key.trim().toLowerCase().replaceAll("-", "_");
}

function fieldOf(line: string, keys: ReadonlySet<string>): { key: string; value: string } | undefined {
	const match = FIELD_LINE.exec(line);
	if (!match) {
		return undefined;
	}
	const key = normalizeFieldKey(match[1] ?? "");
	if (!keys.has(key)) {
		return undefined;
	}
	return { key, value: match[2] ?? "" };
}

/**
 * Read the given keys from a description. The first occurrence of a key wins.
 */
export function parseFields(description: string, keys: Iterable<string>): Map<string, string> {
	const wanted = new Set([...keys].map(normalizeFieldKey));
	const found = new Map<string, string>();
	for (const line of description.split("\n")) {
		const field = fieldOf(line, wanted);
		if (field && !found.has(field.key)) {
			found.set(field.key, field.value);
		}
	}
	return found;
}

/**
 * Read a single field, "" when absent
 */
export function getField(description: string, key: string): string {
	return parseFields(description, [key]).get(normalizeFieldKey(key)) ?? "";
}

/**
 * Write fields into a description.
 *
 * Existing lines are rewritten in place, an empty value removes the field,
 * and new fields go after the last field line (or on top, separated from
 * prose by a blank line, when the description has none).
 */
export function setFields(description: string, updates: Readonly<Record<string, string>>): string {
	const values = new Map<string, string>();
	for (const [key, value] of Object.entries(updates)) {
		values.set(normalizeFieldKey(key), value);
	}
	const known = new Set([...MR_FIELD_KEYS, ...values.keys()]);

	const out: string[] = [];
	const written = new Set<string>();
	let lastFieldLine = -1;

	for (const line of description === "" ? [] : description.split("\n")) {
		const field = fieldOf(line, known);
		if (!field) {
			out.push(line);
			continue;
		}
		const value = values.get(field.key);
		if (value === undefined) {
			out.push(line);
		} else {
			// Duplicates of a rewritten key are dropped
			if (written.has(field.key)) continue;
			written.add(field.key);
			if (value === "") continue;
			out.push(`${field.key}: ${value}`);
		}
		lastFieldLine = out.length - 1;
	}

	const appended: string[] = [];
	for (const [key, value] of values) {
		if (!written.has(key) && value !== "") {
			appended.push(`${key}: ${value}`);
		}
	}
	if (appended.length === 0) {
		return out.join("\n");
	}

	if (lastFieldLine >= 0) {
		out.splice(lastFieldLine + 1, 0, ...appended);
	} else if (out.length > 0) {
		out.unshift(...appended, "");
	} else {
		out.push(...appended);
	}
	return out.join("\n");
}

/**
 * Parse the MR fields of a description, null when it carries none
 */
export function parseMRFields(description: string): MRFields | null {
	const raw = parseFields(description, MR_FIELD_KEYS);
	if (raw.size === 0) {
		return null;
	}
	const get = (key: string): string => raw.get(key) ?? "";
	const retryCount = Number.parseInt(get("retry_count"), 10);

	return {
		branch: get("branch"),
		target: get("target"),
		sourceIssue: get("source_issue"),
		worker: get("worker"),
		rig: get("rig"),
		agentBead: get("agent_bead"),
		retryCount: Number.isNaN(retryCount) ? 0 : retryCount,
		convoyId: get("convoy_id"),
		convoyCreatedAt: get("convoy_created_at"),
		mergeCommit: get("merge_commit"),
		closeReason: get("close_reason"),
	};
}

/**
 * Write MR fields into a description; see setFields for placement rules
 */
export function updateMRFields(description: string, updates: Partial<MRFields>): string {
	const raw: Record<string, string> = {};
	for (const [name, key] of MR_FIELD_SPECS) {
		const value = updates[name];
		if (value !== undefined) {
			raw[key] = String(value);
		}
	}
	return setFields(description, raw);
}

/**
 * Render MR fields as a standalone description block
 */
export function formatMRFields(fields: Partial<MRFields>): string {
	return updateMRFields("", fields);
}

/**
 * Description with the MR field lines stripped
 */
export function descriptionWithoutMRFields(description: string): string {
	return description
		.split("\n")
		.filter((line) => fieldOf(line, MR_FIELD_KEYS) === undefined)
		.join("\n")
		.trim();
}
