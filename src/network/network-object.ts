import type { Logger } from 'pino';

import { ParseError, withContext } from '../errors.js';
import { fieldObjectLines, groupExtent, groupLabel, isGroupLine } from '../ingest/scanner.js';
import { type OptimizedPrefixEntry, optimizePrefixes, optimizedCapacity } from './network-merge.js';
import type { PrefixListItem } from './prefix-list-item.js';
import { type PrefixList, parsePrefixList, prefixListCapacity } from './prefix-list.js';
import type { HostResolver } from './resolver.js';

// ─── Tree ────────────────────────────────────────────────────────────────────

/** A named set of prefix lists. Groups never contain groups. */
export type NetworkGroup = {
	readonly label: string;
	readonly lists: ReadonlyArray<PrefixList>;
};

export type NetworkObjectItem =
	| { readonly kind: 'group'; readonly group: NetworkGroup }
	| { readonly kind: 'prefix-list'; readonly list: PrefixList };

export type OptimizedNetworkObject = {
	readonly label: string;
	readonly entries: ReadonlyArray<OptimizedPrefixEntry>;
	readonly capacity: number;
};

export function networkGroupCapacity(group: NetworkGroup): number {
	return group.lists.reduce((sum, list) => sum + prefixListCapacity(list), 0);
}

function listsOf(item: NetworkObjectItem): ReadonlyArray<PrefixList> {
	return item.kind === 'group' ? item.group.lists : [item.list];
}

/**
 * The source or destination network field of a rule.
 */
export class NetworkObject {
	readonly label: string;
	readonly items: ReadonlyArray<NetworkObjectItem>;

	constructor(label: string, items: ReadonlyArray<NetworkObjectItem>) {
		this.label = label;
		this.items = items;
	}

	/** Every prefix-list item in the field, groups flattened, in source order. */
	leaves(): Array<PrefixListItem> {
		return this.items.flatMap(listsOf).flatMap((list) => [...list.items]);
	}

	capacity(): number {
		return this.items.reduce(
			(sum, item) => sum + (item.kind === 'group' ? networkGroupCapacity(item.group) : prefixListCapacity(item.list)),
			0,
		);
	}

	optimize(logger?: Logger): OptimizedNetworkObject {
		const entries = optimizePrefixes(this.leaves(), logger);
		return { label: this.label, entries, capacity: optimizedCapacity(entries) };
	}
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

/**
 * Example:
 *   Internal (group)
 *     OBJ-157.121.0.0 (157.121.0.0/16)
 *     10.0.0.0/8
 */
export async function parseNetworkGroup(lines: ReadonlyArray<string>, resolver: HostResolver): Promise<NetworkGroup> {
	const [title, ...children] = lines;
	if (title === undefined || !isGroupLine(title)) {
		throw new ParseError(`Invalid group format: ${title ?? '<empty>'}`);
	}

	const label = groupLabel(title);
	const lists: Array<PrefixList> = [];
	for (const child of children) {
		if (child.trim() === '') continue;
		try {
			lists.push(await parsePrefixList(child, resolver));
		} catch (err) {
			throw withContext(`group ${label}`, err);
		}
	}
	return { label, lists };
}

/**
 * Build a network field from its lines; the first line carries the field
 * name, e.g. `Source Networks       : Internal (group)`.
 */
export async function parseNetworkObject(lines: ReadonlyArray<string>, resolver: HostResolver): Promise<NetworkObject> {
	const { field, objects } = fieldObjectLines(lines);
	const items: Array<NetworkObjectItem> = [];

	let index = 0;
	while (index < objects.length) {
		const line = objects[index] ?? '';
		if (isGroupLine(line)) {
			const extent = groupExtent(objects, index);
			items.push({ kind: 'group', group: await parseNetworkGroup(objects.slice(index, index + extent), resolver) });
			index += extent;
		} else {
			if (line.trim() !== '' || index === 0) {
				items.push({ kind: 'prefix-list', list: await parsePrefixList(line, resolver) });
			}
			index++;
		}
	}
	return new NetworkObject(field, items);
}
