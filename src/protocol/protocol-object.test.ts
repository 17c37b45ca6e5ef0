import { describe, expect, it } from 'vitest';

import { type ProtocolListItem, parseProtocolListItem } from './protocol-list-item.js';
import { optimizeProtocols, parseProtocolGroup, parseProtocolObject } from './protocol-object.js';

function items(...lines: Array<string>): Array<ProtocolListItem> {
	return lines.map((line) => parseProtocolListItem(line));
}

describe('optimizeProtocols', () => {
	it('merges a shadowed port range into one entry', () => {
		const entries = optimizeProtocols(items('WEB (protocol 6, port 80-82)', 'ALT (protocol 6, port 81-82)'));
		expect(entries).toEqual([
			{
				kind: 'l4',
				label: 'WEB SHADOWS ALT',
				protocol: 6,
				portStart: 80,
				portEnd: 82,
				members: items('WEB (protocol 6, port 80-82)', 'ALT (protocol 6, port 81-82)'),
			},
		]);
	});

	it('merges adjacent and overlapping ports regardless of input order', () => {
		const entries = optimizeProtocols(
			items('C (protocol 6, port 90-100)', 'A (protocol 6, port 80-85)', 'B (protocol 6, port 86-95)'),
		);
		expect(entries).toHaveLength(1);
		expect(entries[0]).toMatchObject({ label: 'A ADJOINS B PARTIALLY OVERLAPS C', portStart: 80, portEnd: 100 });
	});

	it('never merges across protocols', () => {
		const entries = optimizeProtocols(items('DNS-U (protocol 17, port 53)', 'DNS-T (protocol 6, port 53)'));
		expect(entries.map((entry) => entry.protocol)).toEqual([6, 17]);
	});

	it('keeps separated ports apart', () => {
		const entries = optimizeProtocols(items('HTTPS (protocol 6, port 443)', 'HTTP (protocol 6, port 80)'));
		expect(entries.map((entry) => entry.label)).toEqual(['HTTP', 'HTTPS']);
	});

	it('deduplicates L3 entries on protocol, type and code', () => {
		const entries = optimizeProtocols(
			items(
				'PING (protocol 1, type 8)',
				'ECHO (protocol 1, type 8)',
				'UNREACH (protocol 1, type 3, code 4)',
				'GRE (protocol 47)',
				'TUNNEL (protocol 47)',
			),
		);
		expect(entries.map((entry) => entry.label)).toEqual(['PING', 'UNREACH', 'GRE']);
	});

	it('deduplicates to the same set whatever the order', () => {
		const forward = items('A (protocol 2)', 'B (protocol 47)', 'C (protocol 2)', 'D (protocol 1)');
		const backward = [...forward].reverse();

		const protocols = (list: Array<ProtocolListItem>) =>
			optimizeProtocols(list)
				.map((entry) => entry.protocol)
				.sort((a, b) => a - b);

		expect(protocols(forward)).toEqual([1, 2, 47]);
		expect(protocols(backward)).toEqual([1, 2, 47]);
	});

	it('lists L3 entries before L4 entries', () => {
		const entries = optimizeProtocols(items('SSH (protocol 6, port 22)', 'IGMP (protocol 2)'));
		expect(entries.map((entry) => entry.kind)).toEqual(['l3', 'l4']);
	});
});

describe('parseProtocolGroup', () => {
	it('reads its member lines', () => {
		const group = parseProtocolGroup([
			'HTTP-HTTPS_1 (group)',
			'  HTTP (protocol 6, port 80)',
			'  HTTPS (protocol 6, port 443)',
		]);
		expect(group.label).toBe('HTTP-HTTPS_1');
		expect(group.lists.map((list) => list.label)).toEqual(['HTTP', 'HTTPS']);
	});

	it('names the group when a member fails', () => {
		expect(() => parseProtocolGroup(['WEB (group)', '  BAD (protocol 6, port 99999)'])).toThrow(
			'group WEB: Invalid port 99999 in BAD (protocol 6, port 99999)',
		);
	});
});

describe('parseProtocolObject', () => {
	it('reads groups and loose entries', () => {
		const object = parseProtocolObject([
			'  Destination Ports     : HTTP-HTTPS_1 (group)',
			'    HTTP (protocol 6, port 80)',
			'    HTTPS (protocol 6, port 443)',
			'  TCP-8080 (protocol 6, port 8080)',
			'  protocol 6, port 33434',
		]);

		expect(object.label).toBe('Destination Ports');
		expect(object.items.map((item) => item.kind)).toEqual(['group', 'protocol-list', 'protocol-list']);
		expect(object.leaves()).toHaveLength(4);
		expect(object.optimize()).toHaveLength(4);
	});

	it('expands protocol any entries', () => {
		const object = parseProtocolObject(['Source Ports : DNS (protocol any, port 53)']);
		expect(object.leaves().map((item) => item.protocol)).toEqual([6, 17]);
	});

	it('collapses ports 21 and 22 into one entry', () => {
		const object = parseProtocolObject([
			'    Destination Ports  : HTTPS (protocol 6, port 443)',
			'       FTP (protocol 6, port 21)',
			'       SSH (protocol 6, port 22)',
		]);
		expect(object.optimize().map((entry) => entry.label)).toEqual(['FTP ADJOINS SSH', 'HTTPS']);
	});
});
