import { ParseError, withContext } from '../errors.js';
import { type PrefixListItem, parsePrefixListItem } from './prefix-list-item.js';
import type { HostResolver } from './resolver.js';

export type PrefixList = {
	readonly label: string;
	readonly items: ReadonlyArray<PrefixListItem>;
};

/** Raw block count: overlaps and shadowed entries are all counted. */
export function prefixListCapacity(list: PrefixList): number {
	return list.items.reduce((sum, item) => sum + item.capacity, 0);
}

/**
 * Split a `NAME (item, item, ...)` line into its label and item texts.
 * A line without parentheses is a single item labelled by itself.
 */
export function splitListLine(line: string, kind: string): { label: string; entries: Array<string> } {
	const text = line.trim();
	if (text.includes('()')) {
		throw new ParseError(`Empty ${kind} list: ${text}`);
	}

	const open = text.indexOf('(');
	const close = text.indexOf(')', open + 1);
	const hasOpen = open !== -1;
	const hasClose = text.includes(')');

	if (hasOpen && hasClose) {
		if (close === -1) {
			throw new ParseError(`Invalid ${kind} list format ${text}`);
		}
		const label = text.slice(0, open).trim();
		const entries = text
			.slice(open + 1, close)
			.split(',')
			.map((entry) => entry.trim());
		return { label, entries };
	}
	if (!hasOpen && !hasClose) {
		return { label: text, entries: [text] };
	}
	throw new ParseError(`Invalid ${kind} list format ${text}`);
}

export async function parsePrefixList(line: string, resolver: HostResolver): Promise<PrefixList> {
	const { label, entries } = splitListLine(line, 'prefix');
	const items: Array<PrefixListItem> = [];
	for (const entry of entries) {
		try {
			items.push(await parsePrefixListItem(entry, resolver));
		} catch (err) {
			throw withContext(`(${line.trim()})`, err);
		}
	}
	return { label, items };
}
