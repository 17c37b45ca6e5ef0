import { readFileSync } from 'node:fs';
import pino from 'pino';
import { describe, expect, it, vi } from 'vitest';

import { LookupError, ParseError, ValueError } from '../errors.js';
import { StaticHostResolver } from '../network/resolver.js';
import { readNamedRule, readPolicy, readRule } from './reader.js';

const EXPORT = readFileSync(new URL('./fixtures/corp-edge.txt', import.meta.url), 'utf8');
const resolver = new StaticHostResolver({ 'web01.corp.test': '192.0.2.10' });

describe('readPolicy', () => {
	it('reads every rule in export order', async () => {
		const policy = await readPolicy(EXPORT, resolver);
		expect(policy.rules.map((rule) => rule.label)).toEqual(['Allow_Web | FM-10', 'Allow_Mgmt', 'Deny_Rest']);
	});

	it('computes capacities from the parsed fields', async () => {
		const policy = await readPolicy(EXPORT, resolver);
		expect(policy.rules.map((rule) => [rule.capacity(), rule.optimizedCapacity()])).toEqual([
			[4, 2],
			[10, 5],
			[1, 1],
		]);
		expect(policy.capacity()).toBe(15);
		expect(policy.optimizedCapacity()).toBe(8);
	});

	it('keeps groups and rejoins wrapped lists', async () => {
		const policy = await readPolicy(EXPORT, resolver);
		const web = policy.requireRule('Allow_Web | FM-10');
		expect(web.srcNetworks?.items[0]).toMatchObject({ kind: 'group', group: { label: 'Internal' } });
		expect(web.dstNetworks?.leaves().map((item) => item.start.toString())).toEqual(['192.0.2.10']);

		const mgmt = policy.requireRule('Allow_Mgmt');
		expect(mgmt.dstNetworks?.leaves().map((item) => item.label)).toEqual(['10.20.0.0/24', '10.20.1.0/24']);
		expect(mgmt.srcProtocols).toBeUndefined();
	});

	it('is empty for an export without rules', async () => {
		expect((await readPolicy('Access Control Policy: empty\n', resolver)).size).toBe(0);
	});

	it('reads rules whose free text leaves a parenthesis open', async () => {
		const text = [
			'---[ Rule: Allow (legacy ]---',
			'    Source Networks : 10.0.0.0/8',
			'    Comments : temporary :(',
			'---[ Rule: B ]---',
			'    Source Networks : 10.1.0.0/16',
		].join('\n');
		const policy = await readPolicy(text, resolver);
		expect(policy.rules.map((rule) => rule.label)).toEqual(['Allow (legacy', 'B']);
		expect(policy.capacity()).toBe(2);
	});

	it('skips terminal escape lines inside a field', async () => {
		const text = ['---[ Rule: A ]---', '    Source Networks : 10.0.0.0/24', '\u001b[K', '      10.0.1.0/24'].join('\n');
		const policy = await readPolicy(text, resolver);
		expect(policy.requireRule('A').srcNetworks?.capacity()).toBe(2);
	});

	it('names the rule of a value left open', async () => {
		const text = ['--[ Rule: C ]--', '  Source Networks : OBJ (10.0.0.0/8'].join('\n');
		await expect(readPolicy(text, resolver)).rejects.toThrow(
			'Rule "C": Unclosed parenthesis in: Source Networks : OBJ (10.0.0.0/8',
		);
	});

	it('names the rule and field of a failure', async () => {
		const text = ['--[ Rule: Bad ]--', '  Source Networks : 10.0.0.0/33'].join('\n');
		const failure = readPolicy(text, resolver);
		await expect(failure).rejects.toThrow(ValueError);
		await expect(readPolicy(text, resolver)).rejects.toThrow(
			'Rule "Bad": Source Networks: (10.0.0.0/33): Invalid prefix mask length (expected 0 to 32) in 10.0.0.0/33',
		);
	});

	it('fails when a hostname does not resolve', async () => {
		await expect(readPolicy(EXPORT, new StaticHostResolver({}))).rejects.toThrow(
			'Rule "Allow_Web | FM-10": Destination Networks: (web01 (web01.corp.test)): Fail to resolve name: web01.corp.test',
		);
	});

	it('logs each parsed rule', async () => {
		const logger = pino({ level: 'silent' });
		const debug = vi.spyOn(logger, 'debug');
		await readPolicy(EXPORT, resolver, logger);
		expect(debug).toHaveBeenCalledWith({ rule: 'Allow_Mgmt' }, 'Rule parsed');
		expect(debug).toHaveBeenCalledWith({ rules: 3 }, 'Policy parsed');
	});
});

describe('readRule', () => {
	it('requires a rule marker in the block', async () => {
		await expect(readRule(['  Action : Allow'], resolver)).rejects.toThrow(ParseError);
	});
});

describe('readNamedRule', () => {
	it('parses only the named rule', async () => {
		const rule = await readNamedRule(EXPORT, 'Allow_Mgmt', new StaticHostResolver({}));
		expect(rule.capacity()).toBe(10);
	});

	it('fails for a missing rule', async () => {
		await expect(readNamedRule(EXPORT, 'Allow', resolver)).rejects.toThrow(LookupError);
	});
});
