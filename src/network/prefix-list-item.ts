import { ParseError, ValueError } from '../errors.js';
import { Address, MAX_MASK, decomposeRange } from './address.js';
import type { HostResolver } from './resolver.js';

// ─── Item Variants ───────────────────────────────────────────────────────────
// Every variant exposes the same span accessors. `capacity` counts CIDR blocks.

type ItemSpan = {
	readonly label: string;
	readonly start: Address;
	readonly end: Address;
	readonly capacity: number;
};

export type PrefixItem = ItemSpan & { readonly kind: 'prefix'; readonly mask: number };
export type IpRangeItem = ItemSpan & { readonly kind: 'ip-range' };
export type HostnameItem = ItemSpan & { readonly kind: 'hostname' };

export type PrefixListItem = PrefixItem | IpRangeItem | HostnameItem;

export function prefixItem(label: string, address: Address, mask: number): PrefixItem {
	const start = address.network(mask);
	return { kind: 'prefix', label, start, end: start.broadcast(mask), mask, capacity: 1 };
}

export function ipRangeItem(label: string, start: Address, end: Address): IpRangeItem {
	if (start.compare(end) > 0) {
		throw new ValueError(`Start IP must be less than or equal to end IP in ${label}`);
	}
	return { kind: 'ip-range', label, start, end, capacity: decomposeRange(start, end).length };
}

export function hostnameItem(label: string, address: Address): HostnameItem {
	return { kind: 'hostname', label, start: address, end: address, capacity: 1 };
}

// ─── Detection ───────────────────────────────────────────────────────────────

function count(text: string, char: string): number {
	return text.split(char).length - 1;
}

export function looksLikeRange(text: string): boolean {
	return /^[\d.-]+$/.test(text) && count(text, '-') === 1 && count(text, '.') === 6;
}

export function looksLikePrefix(text: string): boolean {
	return /^[\d.]+(\/\d{1,2})?$/.test(text) && count(text, '.') === 3;
}

export function looksLikeHostname(text: string): boolean {
	return /^[A-Za-z0-9.-]+$/.test(text);
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

function parsePrefix(text: string): PrefixItem {
	const [addressText = '', maskText] = text.split('/');
	const address = Address.parse(addressText);
	if (maskText === undefined) {
		return prefixItem(text, address, MAX_MASK);
	}
	const mask = Number.parseInt(maskText, 10);
	if (mask > MAX_MASK) {
		throw new ValueError(`Invalid prefix mask length (expected 0 to 32) in ${text}`);
	}
	return prefixItem(text, address, mask);
}

function parseRange(text: string): IpRangeItem {
	const [startText = '', endText = ''] = text.split('-');
	return ipRangeItem(text, Address.parse(startText.trim()), Address.parse(endText.trim()));
}

/**
 * Parse one element of a prefix list: `10.0.0.0/8`, `10.0.0.1`,
 * `10.11.12.13-10.11.12.18` or a hostname, which is resolved immediately.
 */
export async function parsePrefixListItem(text: string, resolver: HostResolver): Promise<PrefixListItem> {
	const item = text.trim();
	if (item === '') {
		throw new ParseError('Empty prefix list item');
	}
	if (looksLikeRange(item)) return parseRange(item);
	if (looksLikePrefix(item)) return parsePrefix(item);
	if (looksLikeHostname(item)) {
		return hostnameItem(item, await resolver.resolve(item));
	}
	throw new ParseError(`Unknown type of prefix list item: ${item}`);
}
