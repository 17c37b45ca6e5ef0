import { z } from 'zod';

import { ParseError, ValueError } from '../errors.js';

// ─── Protocol Numbers ────────────────────────────────────────────────────────

export const ICMP = 1;
export const TCP = 6;
export const UDP = 17;
export const ICMPV6 = 58;

export const MAX_PORT = 65535;

const ProtocolNumber = z.coerce.number().int().min(0).max(255);
const PortNumber = z.coerce.number().int().min(0).max(MAX_PORT);
const IcmpField = z.coerce.number().int().min(0).max(255);

// ─── Item Variants ───────────────────────────────────────────────────────────

export type TcpUdpItem = {
	readonly kind: 'tcp-udp';
	readonly label: string;
	readonly protocol: number;
	readonly portStart: number;
	readonly portEnd: number;
};

/** `type` and `code` are absent when the entry matches any of them. */
export type IcmpItem = {
	readonly kind: 'icmp';
	readonly label: string;
	readonly protocol: number;
	readonly type?: number;
	readonly code?: number;
};

export type OtherProtocolItem = {
	readonly kind: 'other';
	readonly label: string;
	readonly protocol: number;
};

export type ProtocolListItem = TcpUdpItem | IcmpItem | OtherProtocolItem;

export type L3Item = IcmpItem | OtherProtocolItem;

export function isL4(item: ProtocolListItem): item is TcpUdpItem {
	return item.kind === 'tcp-udp';
}

/**
 * Identity used for deduplication. Labels never take part: two entries
 * matching the same traffic are the same entry.
 */
export function semanticKey(item: ProtocolListItem): string {
	switch (item.kind) {
		case 'tcp-udp':
			return `${item.protocol}:${item.portStart}-${item.portEnd}`;
		case 'icmp':
			return `${item.protocol}:type=${item.type ?? 'any'}:code=${item.code ?? 'any'}`;
		case 'other':
			return `${item.protocol}`;
	}
}

/** The entry as the export prints it, e.g. `HTTP (protocol 6, port 80)`. */
export function describeProtocolItem(item: ProtocolListItem): string {
	switch (item.kind) {
		case 'tcp-udp': {
			const ports = item.portStart === item.portEnd ? `${item.portStart}` : `${item.portStart}-${item.portEnd}`;
			return `${item.label} (protocol ${item.protocol}, port ${ports})`;
		}
		case 'icmp': {
			const parts = [`protocol ${item.protocol}`];
			if (item.type !== undefined) parts.push(`type ${item.type}`);
			if (item.code !== undefined) parts.push(`code ${item.code}`);
			return `${item.label} (${parts.join(', ')})`;
		}
		case 'other':
			return `${item.label} (protocol ${item.protocol})`;
	}
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

function parseNumber(schema: z.ZodNumber, token: string, what: string, text: string): number {
	const result = schema.safeParse(token);
	if (!/^\d+$/.test(token) || !result.success) {
		throw new ValueError(`Invalid ${what} ${token} in ${text}`);
	}
	return result.data;
}

/**
 * `HTTP (protocol 6, port 80)` gives label `HTTP` and body `protocol 6, port 80`.
 * Without parentheses the whole text is both label and body.
 */
export function splitNameAndBody(text: string): { label: string; body: string } {
	const parts = text.split('(');
	const [name = '', rest] = parts;

	if (rest === undefined) {
		if (name.includes(')')) {
			throw new ParseError(`Missing opening parenthesis in port list: ${text}`);
		}
		return { label: name.trim(), body: name.trim() };
	}
	if (parts.length > 2) {
		throw new ParseError(`Invalid port list ${text}`);
	}

	const body = rest.trim();
	if (!body.endsWith(')')) {
		throw new ParseError(`Missing closing parenthesis in port list: ${text}`);
	}
	return { label: name.trim(), body: body.slice(0, -1).trim() };
}

function parseTcpUdp(label: string, protocol: number, options: Array<string>, text: string): TcpUdpItem {
	const [port, ...extra] = options;
	if (port === undefined) {
		return { kind: 'tcp-udp', label, protocol, portStart: 0, portEnd: MAX_PORT };
	}

	const match = /^port\s+(\d+)(?:\s*-\s*(\d+))?$/.exec(port);
	if (!match || extra.length > 0) {
		throw new ValueError(`Invalid port specification "${options.join(', ')}" in ${text}`);
	}
	const [, startToken = '', endToken] = match;
	const portStart = parseNumber(PortNumber, startToken, 'port', text);
	const portEnd = endToken === undefined ? portStart : parseNumber(PortNumber, endToken, 'port', text);
	if (portStart > portEnd) {
		throw new ValueError(`Port range start must not exceed its end in ${text}`);
	}
	return { kind: 'tcp-udp', label, protocol, portStart, portEnd };
}

function parseIcmp(label: string, protocol: number, options: Array<string>, text: string): IcmpItem {
	const [typePart, codePart, ...extra] = options;
	if (extra.length > 0) {
		throw new ValueError(`Invalid ICMP: ${text}`);
	}
	if (typePart === undefined) {
		return { kind: 'icmp', label, protocol };
	}

	const typeMatch = /^type\s+(\S+)$/.exec(typePart);
	const type = parseNumber(IcmpField, typeMatch?.[1] ?? typePart, 'ICMP type', text);
	if (codePart === undefined) {
		return { kind: 'icmp', label, protocol, type };
	}

	const codeMatch = /^code\s+(\S+)$/.exec(codePart);
	const codeToken = codeMatch?.[1] ?? codePart;
	if (codeToken.toLowerCase() === 'any') {
		return { kind: 'icmp', label, protocol, type };
	}
	return { kind: 'icmp', label, protocol, type, code: parseNumber(IcmpField, codeToken, 'ICMP code', text) };
}

/**
 * Parse one protocol entry. The variant follows the protocol number: 6 and 17
 * carry ports, 1 and 58 carry ICMP type and code, anything else is bare.
 */
export function parseProtocolListItem(text: string): ProtocolListItem {
	const { label, body } = splitNameAndBody(text.trim());
	const [head = '', ...options] = body.split(',').map((part) => part.trim());

	const protocolMatch = /^protocol\s+(\S+)$/.exec(head);
	if (!protocolMatch) {
		throw new ValueError(`Missing 'protocol' prefix in: ${text.trim()}`);
	}
	const protocol = parseNumber(ProtocolNumber, protocolMatch[1] ?? '', 'protocol number', text.trim());

	switch (protocol) {
		case TCP:
		case UDP:
			return parseTcpUdp(label, protocol, options, text.trim());
		case ICMP:
		case ICMPV6:
			return parseIcmp(label, protocol, options, text.trim());
		default:
			// Options after the protocol number carry no meaning here and are dropped.
			return { kind: 'other', label, protocol };
	}
}

const ANY_WITH_PORT = 'protocol any, port ';

/** Parse a protocol line, expanding `protocol any, port ...` into TCP and UDP entries. */
export function parseProtocolEntry(text: string): Array<ProtocolListItem> {
	if (!text.includes(ANY_WITH_PORT)) {
		return [parseProtocolListItem(text)];
	}
	return [TCP, UDP].map((protocol) => parseProtocolListItem(text.replace(ANY_WITH_PORT, `protocol ${protocol}, port `)));
}
