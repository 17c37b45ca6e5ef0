import { MergeInvariantError } from '../errors.js';
import { type Relation, type Span, classify, touches } from './relation.js';

export type MergeSource<T> = {
	spanOf: (item: T) => Span;
	labelOf: (item: T) => string;
};

export type ClosedMerge<T> = {
	label: string;
	span: Span;
	members: ReadonlyArray<T>;
};

/**
 * Accumulates items sorted by start while each one touches the running
 * span. `close()` hands the accumulation back and empties the buffer; what
 * to emit for it is the caller's decision.
 */
export class MergeBuffer<T> {
	private items: Array<T> = [];
	private description = '';
	private start = 0;
	private end = 0;
	private readonly source: MergeSource<T>;

	constructor(source: MergeSource<T>) {
		this.source = source;
	}

	get isEmpty(): boolean {
		return this.items.length === 0;
	}

	get members(): ReadonlyArray<T> {
		return this.items;
	}

	get label(): string {
		this.assertSeeded('label');
		return this.description;
	}

	/** Lowest start and highest end over every member. */
	get span(): Span {
		this.assertSeeded('span');
		return { start: this.start, end: this.end };
	}

	seed(item: T): void {
		if (!this.isEmpty) {
			throw new MergeInvariantError('seed called on a non-empty buffer');
		}
		const span = this.source.spanOf(item);
		this.items = [item];
		this.description = this.source.labelOf(item);
		this.start = span.start;
		this.end = span.end;
	}

	accepts(item: T): boolean {
		this.assertSeeded('accepts');
		return touches(this.end, this.source.spanOf(item));
	}

	add(item: T): Relation {
		if (!this.accepts(item)) {
			throw new MergeInvariantError(`${this.source.labelOf(item)} does not touch ${this.description}`);
		}
		const span = this.source.spanOf(item);
		const relation = classify(this.end, span);

		this.items.push(item);
		this.description = `${this.description} ${relation} ${this.source.labelOf(item)}`;
		this.start = Math.min(this.start, span.start);
		this.end = Math.max(this.end, span.end);
		return relation;
	}

	close(): ClosedMerge<T> {
		this.assertSeeded('close');
		const closed = { label: this.description, span: this.span, members: this.items };
		this.items = [];
		this.description = '';
		return closed;
	}

	private assertSeeded(operation: string): void {
		if (this.isEmpty) {
			throw new MergeInvariantError(`${operation} on an empty merge buffer`);
		}
	}
}

/**
 * Feed `items` (already sorted by start) through a buffer and return every
 * closed accumulation in order.
 */
export function collectMerges<T>(items: Iterable<T>, source: MergeSource<T>): Array<ClosedMerge<T>> {
	const buffer = new MergeBuffer(source);
	const merges: Array<ClosedMerge<T>> = [];

	for (const item of items) {
		if (buffer.isEmpty) {
			buffer.seed(item);
		} else if (buffer.accepts(item)) {
			buffer.add(item);
		} else {
			merges.push(buffer.close());
			buffer.seed(item);
		}
	}
	if (!buffer.isEmpty) {
		merges.push(buffer.close());
	}
	return merges;
}
