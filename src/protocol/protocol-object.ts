import { ParseError, withContext } from '../errors.js';
import { fieldObjectLines, groupExtent, groupLabel, isGroupLine } from '../ingest/scanner.js';
import { type MergeSource, collectMerges } from '../merge/buffer.js';
import {
	type L3Item,
	type ProtocolListItem,
	type TcpUdpItem,
	isL4,
	parseProtocolEntry,
	semanticKey,
	splitNameAndBody,
} from './protocol-list-item.js';

// ─── Tree ────────────────────────────────────────────────────────────────────

/** One protocol line; `protocol any, port N` lines hold a TCP and a UDP item. */
export type ProtocolList = {
	readonly label: string;
	readonly items: ReadonlyArray<ProtocolListItem>;
};

export type ProtocolGroup = {
	readonly label: string;
	readonly lists: ReadonlyArray<ProtocolList>;
};

export type ProtocolObjectItem =
	| { readonly kind: 'group'; readonly group: ProtocolGroup }
	| { readonly kind: 'protocol-list'; readonly list: ProtocolList };

export type OptimizedProtocolEntry =
	| { readonly kind: 'l3'; readonly label: string; readonly protocol: number; readonly item: L3Item }
	| {
			readonly kind: 'l4';
			readonly label: string;
			readonly protocol: number;
			readonly portStart: number;
			readonly portEnd: number;
			readonly members: ReadonlyArray<TcpUdpItem>;
	  };

// ─── Optimization ────────────────────────────────────────────────────────────

const portSource: MergeSource<TcpUdpItem> = {
	spanOf: (item) => ({ start: item.portStart, end: item.portEnd }),
	labelOf: (item) => item.label,
};

/** First occurrence of every distinct L3 entry, in input order. */
export function dedupeL3(items: ReadonlyArray<L3Item>): Array<L3Item> {
	const seen = new Map<string, L3Item>();
	for (const item of items) {
		const key = semanticKey(item);
		if (!seen.has(key)) seen.set(key, item);
	}
	return [...seen.values()];
}

/**
 * Merge overlapping or adjacent port ranges of the same protocol. Every run
 * becomes one entry: a merged port range always counts as a single unit.
 */
export function mergeL4(items: ReadonlyArray<TcpUdpItem>): Array<OptimizedProtocolEntry> {
	const sorted = [...items].sort((a, b) => a.protocol - b.protocol || a.portStart - b.portStart);

	const byProtocol = new Map<number, Array<TcpUdpItem>>();
	for (const item of sorted) {
		const bucket = byProtocol.get(item.protocol) ?? [];
		bucket.push(item);
		byProtocol.set(item.protocol, bucket);
	}

	return [...byProtocol.entries()].flatMap(([protocol, bucket]) =>
		collectMerges(bucket, portSource).map(
			(merge): OptimizedProtocolEntry => ({
				kind: 'l4',
				label: merge.label,
				protocol,
				portStart: merge.span.start,
				portEnd: merge.span.end,
				members: merge.members,
			}),
		),
	);
}

export function optimizeProtocols(items: ReadonlyArray<ProtocolListItem>): Array<OptimizedProtocolEntry> {
	const l3: Array<L3Item> = [];
	const l4: Array<TcpUdpItem> = [];
	for (const item of items) {
		if (isL4(item)) l4.push(item);
		else l3.push(item);
	}

	const l3Entries = dedupeL3(l3).map(
		(item): OptimizedProtocolEntry => ({ kind: 'l3', label: item.label, protocol: item.protocol, item }),
	);
	return [...l3Entries, ...mergeL4(l4)];
}

/**
 * The source or destination ports field of a rule. It has no capacity of
 * its own: protocols only count when paired across both directions.
 */
export class ProtocolObject {
	readonly label: string;
	readonly items: ReadonlyArray<ProtocolObjectItem>;

	constructor(label: string, items: ReadonlyArray<ProtocolObjectItem>) {
		this.label = label;
		this.items = items;
	}

	leaves(): Array<ProtocolListItem> {
		return this.items
			.flatMap((item) => (item.kind === 'group' ? item.group.lists : [item.list]))
			.flatMap((list) => [...list.items]);
	}

	optimize(): Array<OptimizedProtocolEntry> {
		return optimizeProtocols(this.leaves());
	}
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

export function parseProtocolList(line: string): ProtocolList {
	const text = line.trim();
	return { label: splitNameAndBody(text).label, items: parseProtocolEntry(text) };
}

/**
 * Example:
 *   HTTP-HTTPS (group)
 *     HTTP (protocol 6, port 80)
 *     HTTPS (protocol 6, port 443)
 */
export function parseProtocolGroup(lines: ReadonlyArray<string>): ProtocolGroup {
	const [title, ...children] = lines;
	if (title === undefined || !isGroupLine(title)) {
		throw new ParseError(`Invalid group format, should contain (group): ${title ?? '<empty>'}`);
	}

	const label = groupLabel(title);
	const lists: Array<ProtocolList> = [];
	for (const child of children) {
		if (child.trim() === '') continue;
		try {
			lists.push(parseProtocolList(child));
		} catch (err) {
			throw withContext(`group ${label}`, err);
		}
	}
	return { label, lists };
}

/**
 * Build a ports field from its lines; the first line carries the field
 * name, e.g. `Destination Ports     : HTTP-HTTPS (group)`.
 */
export function parseProtocolObject(lines: ReadonlyArray<string>): ProtocolObject {
	const { field, objects } = fieldObjectLines(lines);
	const items: Array<ProtocolObjectItem> = [];

	let index = 0;
	while (index < objects.length) {
		const line = objects[index] ?? '';
		if (isGroupLine(line)) {
			const extent = groupExtent(objects, index);
			items.push({ kind: 'group', group: parseProtocolGroup(objects.slice(index, index + extent)) });
			index += extent;
		} else {
			if (line.trim() !== '' || index === 0) {
				try {
					items.push({ kind: 'protocol-list', list: parseProtocolList(line) });
				} catch (err) {
					throw withContext(`(${line.trim()})`, err);
				}
			}
			index++;
		}
	}
	return new ProtocolObject(field, items);
}
