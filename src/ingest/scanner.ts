import { LookupError, ParseError } from '../errors.js';

// ─── Markers ─────────────────────────────────────────────────────────────────

export const RULE_MARKER = '-[ Rule: ';
const RULE_NAME_END = ' ]-';
export const POLICY_END_MARKER = '=[ Advanced Settings ]=';
const MISSING_OBJECT_MARKER = 'Object missing: ';
// Terminal captures carry escape sequences on lines of their own.
const ESCAPE = '\u001b';
const GROUP_SUFFIX = '(group)';

export const ANALYSED_FIELDS = ['Source Networks', 'Destination Networks', 'Source Ports', 'Destination Ports'] as const;

export type FieldName = (typeof ANALYSED_FIELDS)[number];

// Keywords the export prints inside a rule that close the field before them.
const OTHER_FIELDS = [
	'Logging Configuration',
	'Logging',
	'Users',
	'URLs',
	'Safe Search',
	'Applications',
	'Source Zones',
	'Destination Zones',
	'VLAN Tags',
	'Comments',
	'Action',
	'Intrusion Policy',
	'Variable Set',
	'File Policy',
	'Time Range',
];

// ─── Line Preparation ────────────────────────────────────────────────────────

function parenDepth(line: string): number {
	let depth = 0;
	for (const char of line) {
		if (char === '(') depth++;
		else if (char === ')') depth--;
	}
	return depth;
}

/**
 * Rejoin values the export wrapped across lines: while a line leaves a
 * parenthesis open, the next physical line is appended with its indentation
 * removed and no separator.
 */
export function joinContinuations(lines: ReadonlyArray<string>): Array<string> {
	const joined: Array<string> = [];
	let pending: string | undefined;
	let depth = 0;

	for (const line of lines) {
		if (pending === undefined) {
			pending = line;
			depth = parenDepth(line);
		} else {
			const continuation = line.trimStart();
			pending += continuation;
			depth += parenDepth(continuation);
		}
		if (depth <= 0) {
			joined.push(pending);
			pending = undefined;
			depth = 0;
		}
	}

	if (pending !== undefined) {
		throw new ParseError(`Unclosed parenthesis in: ${pending.trim()}`);
	}
	return joined;
}

/**
 * Keep the rule section of an export: from the first rule marker up to the
 * advanced-settings terminator, without lines reporting missing objects or
 * carrying terminal escapes. Wrapped values are rejoined per field by
 * `sliceFields`, so free text such as a rule name never spans lines.
 */
export function extractPolicyLines(text: string): Array<string> {
	const lines = text.split(/\r?\n/);
	const first = lines.findIndex((line) => line.includes(RULE_MARKER));
	if (first === -1) return [];

	const section: Array<string> = [];
	for (const line of lines.slice(first)) {
		if (line.includes(POLICY_END_MARKER)) break;
		if (line.includes(MISSING_OBJECT_MARKER) || line.includes(ESCAPE)) continue;
		section.push(line);
	}
	return section;
}

// ─── Rules ───────────────────────────────────────────────────────────────────

export function splitRules(lines: ReadonlyArray<string>): Array<Array<string>> {
	const blocks: Array<Array<string>> = [];
	for (const line of lines) {
		if (line.includes(RULE_MARKER)) {
			blocks.push([line]);
		} else {
			blocks.at(-1)?.push(line);
		}
	}
	return blocks;
}

/** `----[ Rule: Allow_DNS | FM-1 ]----` gives `Allow_DNS | FM-1`. */
export function ruleName(line: string): string {
	const start = line.indexOf(RULE_MARKER);
	if (start === -1) {
		throw new ParseError(`Line with rule name not found: ${line.trim()}`);
	}
	const rest = line.slice(start + RULE_MARKER.length);
	const end = rest.indexOf(RULE_NAME_END);
	return end === -1 ? rest.trim() : rest.slice(0, end);
}

export function findRuleBlock(text: string, name: string): Array<string> {
	const block = splitRules(extractPolicyLines(text)).find(
		([header]) => header !== undefined && ruleName(header) === name,
	);
	if (!block) {
		throw new LookupError(`No rule found with name: ${name}`);
	}
	return block;
}

// ─── Fields ──────────────────────────────────────────────────────────────────

function keywordPattern(keyword: string): RegExp {
	return new RegExp(`^\\s*${keyword}\\s*(:|$)`);
}

const ANALYSED_PATTERNS = ANALYSED_FIELDS.map((field) => ({ field, pattern: keywordPattern(field) }));
const OTHER_PATTERNS = OTHER_FIELDS.map(keywordPattern);

export type RuleFields = Partial<Record<FieldName, Array<string>>>;

/**
 * Cut a rule block into the lines of each analysed field. A field runs from
 * its keyword line to the next keyword line of any kind, or the end of the
 * block; values wrapped inside a field are rejoined.
 */
export function sliceFields(block: ReadonlyArray<string>): RuleFields {
	const fields: RuleFields = {};
	let current: Array<string> | undefined;

	for (const line of block) {
		const analysed = ANALYSED_PATTERNS.find(({ pattern }) => pattern.test(line));
		if (analysed) {
			current = [line];
			fields[analysed.field] = current;
		} else if (line.includes(RULE_MARKER) || OTHER_PATTERNS.some((pattern) => pattern.test(line))) {
			current = undefined;
		} else if (current && line.trim() !== '') {
			current.push(line);
		}
	}
	for (const field of ANALYSED_FIELDS) {
		const lines = fields[field];
		if (lines) fields[field] = joinContinuations(lines);
	}
	return fields;
}

/**
 * Split `Source Networks   : Internal (group)` into the field name and the
 * text of its first object.
 */
export function splitFieldHeader(line: string): { field: string; first: string } {
	const parts = line.split(': ');
	const [field, first] = parts;
	if (parts.length !== 2 || field === undefined || first === undefined) {
		throw new ParseError(`Incorrect first line format, expected '<field> : <group or object>' in: ${line.trim()}`);
	}
	return { field: field.trim(), first };
}

/**
 * Object lines of a field: the header's object text followed by the
 * remaining lines, indentation kept for group detection.
 */
export function fieldObjectLines(lines: ReadonlyArray<string>): { field: string; objects: Array<string> } {
	const [header, ...rest] = lines;
	if (header === undefined) {
		throw new ParseError('Input lines are empty');
	}
	const { field, first } = splitFieldHeader(header);
	return { field, objects: [first, ...rest] };
}

// ─── Groups ──────────────────────────────────────────────────────────────────

export function isGroupLine(line: string): boolean {
	return line.includes(GROUP_SUFFIX);
}

export function groupLabel(line: string): string {
	return (line.split('(')[0] ?? '').trim();
}

function indentation(line: string): number {
	return line.length - line.trimStart().length;
}

/**
 * Number of lines belonging to the group that starts at `index`: the group
 * line plus every following line indented like its first child, stopping at
 * another group line or a change of indentation.
 */
export function groupExtent(lines: ReadonlyArray<string>, index: number): number {
	const child = lines[index + 1];
	if (child === undefined) return 1;

	const reference = indentation(child);
	let end = index + 1;
	while (end < lines.length) {
		const line = lines[end] ?? '';
		if (isGroupLine(line) || indentation(line) !== reference) break;
		end++;
	}
	return end - index;
}
