import { describe, expect, it } from 'vitest';

import { classify, touches } from './relation.js';

describe('touches', () => {
	it('accepts overlapping and immediately following spans', () => {
		expect(touches(10, { start: 5, end: 20 })).toBe(true);
		expect(touches(10, { start: 11, end: 20 })).toBe(true);
		expect(touches(10, { start: 12, end: 20 })).toBe(false);
	});
});

describe('classify', () => {
	it('names the relation to the accumulated end', () => {
		expect(classify(10, { start: 11, end: 15 })).toBe('ADJOINS');
		expect(classify(10, { start: 4, end: 10 })).toBe('SHADOWS');
		expect(classify(10, { start: 8, end: 12 })).toBe('PARTIALLY OVERLAPS');
	});
});
