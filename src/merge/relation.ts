/** Inclusive numeric interval: addresses as unsigned values, or port numbers. */
export type Span = {
	start: number;
	end: number;
};

export const RELATIONS = ['ADJOINS', 'SHADOWS', 'PARTIALLY OVERLAPS'] as const;

export type Relation = (typeof RELATIONS)[number];

/** `next` overlaps or immediately follows an accumulation ending at `currEnd`. */
export function touches(currEnd: number, next: Span): boolean {
	return next.start <= currEnd + 1;
}

/**
 * How `next` relates to an accumulation ending at `currEnd`. Only meaningful
 * when `touches(currEnd, next)` holds and items arrive sorted by start.
 */
export function classify(currEnd: number, next: Span): Relation {
	if (currEnd + 1 === next.start) return 'ADJOINS';
	if (next.end <= currEnd) return 'SHADOWS';
	return 'PARTIALLY OVERLAPS';
}
