import { describe, expect, it } from 'vitest';

import { MergeInvariantError } from '../errors.js';
import { MergeBuffer, type MergeSource, collectMerges } from './buffer.js';
import { classify, touches } from './relation.js';

type Interval = { name: string; start: number; end: number };

const source: MergeSource<Interval> = {
	spanOf: (item) => ({ start: item.start, end: item.end }),
	labelOf: (item) => item.name,
};

describe('classify', () => {
	it('reports ADJOINS for an item starting right after the end', () => {
		expect(classify(82, { start: 83, end: 90 })).toBe('ADJOINS');
	});

	it('reports SHADOWS for an item inside the span', () => {
		expect(classify(82, { start: 81, end: 82 })).toBe('SHADOWS');
	});

	it('reports PARTIALLY OVERLAPS for an item running past the end', () => {
		expect(classify(82, { start: 81, end: 90 })).toBe('PARTIALLY OVERLAPS');
	});
});

describe('touches', () => {
	it('accepts overlap and adjacency but not a gap', () => {
		expect(touches(10, { start: 5, end: 20 })).toBe(true);
		expect(touches(10, { start: 11, end: 20 })).toBe(true);
		expect(touches(10, { start: 12, end: 20 })).toBe(false);
	});

	it('does not overflow at the top of the address space', () => {
		expect(touches(0xffffffff, { start: 0xffffffff, end: 0xffffffff })).toBe(true);
	});
});

describe('MergeBuffer', () => {
	it('grows its label with each relation', () => {
		const buffer = new MergeBuffer(source);
		buffer.seed({ name: 'A', start: 0, end: 9 });
		expect(buffer.add({ name: 'B', start: 10, end: 19 })).toBe('ADJOINS');
		expect(buffer.add({ name: 'C', start: 12, end: 15 })).toBe('SHADOWS');
		expect(buffer.add({ name: 'D', start: 18, end: 30 })).toBe('PARTIALLY OVERLAPS');

		expect(buffer.label).toBe('A ADJOINS B SHADOWS C PARTIALLY OVERLAPS D');
		expect(buffer.span).toEqual({ start: 0, end: 30 });
		expect(buffer.members).toHaveLength(4);
	});

	it('measures against the furthest end seen, not the seed', () => {
		const buffer = new MergeBuffer(source);
		buffer.seed({ name: 'short', start: 0, end: 2 });
		buffer.add({ name: 'long', start: 1, end: 100 });

		expect(buffer.accepts({ name: 'late', start: 50, end: 60 })).toBe(true);
		expect(buffer.add({ name: 'late', start: 50, end: 60 })).toBe('SHADOWS');
	});

	it('empties on close', () => {
		const buffer = new MergeBuffer(source);
		buffer.seed({ name: 'A', start: 1, end: 1 });
		const closed = buffer.close();

		expect(closed).toEqual({ label: 'A', span: { start: 1, end: 1 }, members: [{ name: 'A', start: 1, end: 1 }] });
		expect(buffer.isEmpty).toBe(true);
	});

	it('refuses to report on an empty accumulation', () => {
		const buffer = new MergeBuffer(source);
		expect(() => buffer.span).toThrow(MergeInvariantError);
		expect(() => buffer.close()).toThrow('Merge invariant violated: close on an empty merge buffer');
	});

	it('refuses an item that does not touch the span', () => {
		const buffer = new MergeBuffer(source);
		buffer.seed({ name: 'A', start: 0, end: 5 });
		expect(() => buffer.add({ name: 'far', start: 10, end: 12 })).toThrow(MergeInvariantError);
	});

	it('refuses a second seed', () => {
		const buffer = new MergeBuffer(source);
		buffer.seed({ name: 'A', start: 0, end: 5 });
		expect(() => buffer.seed({ name: 'B', start: 6, end: 7 })).toThrow(MergeInvariantError);
	});
});

describe('collectMerges', () => {
	it('splits sorted items at gaps', () => {
		const merges = collectMerges(
			[
				{ name: 'A', start: 0, end: 4 },
				{ name: 'B', start: 5, end: 8 },
				{ name: 'C', start: 20, end: 21 },
			],
			source,
		);

		expect(merges.map((merge) => merge.label)).toEqual(['A ADJOINS B', 'C']);
		expect(merges.map((merge) => merge.span)).toEqual([
			{ start: 0, end: 8 },
			{ start: 20, end: 21 },
		]);
	});

	it('returns nothing for no items', () => {
		expect(collectMerges([], source)).toEqual([]);
	});
});
