import { ValueError } from '../errors.js';

export const MAX_ADDRESS = 0xffffffff;
export const MAX_MASK = 32;

function maskBits(mask: number): number {
	return mask === 0 ? 0 : (~0 << (MAX_MASK - mask)) >>> 0;
}

function assertMask(mask: number): void {
	if (!Number.isInteger(mask) || mask < 0 || mask > MAX_MASK) {
		throw new ValueError(`Mask length must be within 0-32, got ${mask}`);
	}
}

/**
 * An IPv4 address held as an unsigned 32-bit number.
 */
export class Address {
	readonly value: number;

	constructor(value: number) {
		if (!Number.isInteger(value) || value < 0 || value > MAX_ADDRESS) {
			throw new ValueError(`Address value out of range: ${value}`);
		}
		this.value = value;
	}

	/**
	 * Parse dotted-decimal text. Every octet must be a decimal number in 0-255.
	 */
	static parse(text: string): Address {
		const parts = text.trim().split('.');
		if (parts.length !== 4) {
			throw new ValueError(`Invalid IP format (expected IPv4) in ${text}`);
		}

		let result = 0;
		for (const part of parts) {
			if (!/^\d{1,3}$/.test(part)) {
				throw new ValueError(`Invalid IP octet "${part}" in ${text}`);
			}
			const octet = Number.parseInt(part, 10);
			if (octet > 255) {
				throw new ValueError(`IP parts must be in the range 0-255 in ${text}`);
			}
			result = (result << 8) | octet;
		}

		return new Address(result >>> 0);
	}

	network(mask: number): Address {
		assertMask(mask);
		return new Address((this.value & maskBits(mask)) >>> 0);
	}

	broadcast(mask: number): Address {
		assertMask(mask);
		return new Address((this.value | ~maskBits(mask)) >>> 0);
	}

	isMax(): boolean {
		return this.value === MAX_ADDRESS;
	}

	/**
	 * The next address. There is none after 255.255.255.255.
	 */
	successor(): Address {
		if (this.isMax()) {
			throw new ValueError('255.255.255.255 has no successor');
		}
		return new Address(this.value + 1);
	}

	compare(other: Address): number {
		return this.value - other.value;
	}

	equals(other: Address): boolean {
		return this.value === other.value;
	}

	toString(): string {
		return [this.value >>> 24, (this.value >>> 16) & 255, (this.value >>> 8) & 255, this.value & 255].join('.');
	}
}

export type CidrBlock = {
	network: Address;
	broadcast: Address;
	mask: number;
};

/**
 * Split the inclusive range [start, end] into the fewest CIDR blocks covering it.
 * At each step the widest block that is aligned on the cursor and still ends
 * inside the range is taken.
 */
export function decomposeRange(start: Address, end: Address): Array<CidrBlock> {
	if (start.compare(end) > 0) {
		throw new ValueError(`Start IP must be less than or equal to end IP in ${start}-${end}`);
	}

	const blocks: Array<CidrBlock> = [];
	let cursor = start;

	for (;;) {
		let mask = 0;
		while (!(cursor.network(mask).equals(cursor) && cursor.broadcast(mask).compare(end) <= 0)) {
			mask++;
		}

		const broadcast = cursor.broadcast(mask);
		blocks.push({ network: cursor, broadcast, mask });

		if (broadcast.compare(end) >= 0) break;
		cursor = broadcast.successor();
	}

	return blocks;
}

export function formatBlock(block: CidrBlock): string {
	return `${block.network}/${block.mask}`;
}
