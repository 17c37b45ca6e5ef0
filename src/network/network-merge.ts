import type { Logger } from 'pino';

import { MergeInvariantError } from '../errors.js';
import { type ClosedMerge, type MergeSource, collectMerges } from '../merge/buffer.js';
import { Address, decomposeRange } from './address.js';
import type { PrefixListItem } from './prefix-list-item.js';

/**
 * One entry of an optimized network field. `members` holds the original
 * items the entry stands for; a single member means nothing was merged.
 */
export type OptimizedPrefixEntry = {
	readonly label: string;
	readonly start: Address;
	readonly end: Address;
	readonly capacity: number;
	readonly members: ReadonlyArray<PrefixListItem>;
};

const prefixSource: MergeSource<PrefixListItem> = {
	spanOf: (item) => ({ start: item.start.value, end: item.end.value }),
	labelOf: (item) => item.label,
};

function single(item: PrefixListItem): OptimizedPrefixEntry {
	return { label: item.label, start: item.start, end: item.end, capacity: item.capacity, members: [item] };
}

/**
 * Keep a merge only when the merged span decomposes into fewer blocks than
 * its members counted separately; otherwise hand the members back untouched.
 */
export function closeNetworkMerge(merge: ClosedMerge<PrefixListItem>, logger?: Logger): Array<OptimizedPrefixEntry> {
	const [first, ...rest] = merge.members;
	if (!first) throw new MergeInvariantError(`closed merge ${merge.label} has no members`);
	if (rest.length === 0) return [single(first)];

	const start = new Address(merge.span.start);
	const end = new Address(merge.span.end);
	const merged = decomposeRange(start, end).length;
	const separate = merge.members.reduce((sum, item) => sum + item.capacity, 0);

	if (merged < separate) {
		logger?.debug({ label: merge.label, merged, separate }, 'Network merge committed');
		return [{ label: merge.label, start, end, capacity: merged, members: merge.members }];
	}

	logger?.debug({ label: merge.label, merged, separate }, 'Network merge reverted');
	return merge.members.map(single);
}

/** Sort by start address, merge overlapping or adjacent items, and close each run. */
export function optimizePrefixes(
	items: ReadonlyArray<PrefixListItem>,
	logger?: Logger,
): Array<OptimizedPrefixEntry> {
	const sorted = [...items].sort((a, b) => a.start.compare(b.start));
	return collectMerges(sorted, prefixSource).flatMap((merge) => closeNetworkMerge(merge, logger));
}

export function optimizedCapacity(entries: ReadonlyArray<OptimizedPrefixEntry>): number {
	return entries.reduce((sum, entry) => sum + entry.capacity, 0);
}
