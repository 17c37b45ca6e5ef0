import type { Logger } from 'pino';

import { ParseError, withContext } from '../errors.js';
import { type NetworkObject, parseNetworkObject } from '../network/network-object.js';
import type { HostResolver } from '../network/resolver.js';
import { AccessControlPolicy } from '../policy/policy.js';
import { Rule } from '../policy/rule.js';
import { type ProtocolObject, parseProtocolObject } from '../protocol/protocol-object.js';
import { RULE_MARKER, extractPolicyLines, findRuleBlock, ruleName, sliceFields, splitRules } from './scanner.js';

async function readNetworks(
	label: string,
	lines: ReadonlyArray<string> | undefined,
	resolver: HostResolver,
): Promise<NetworkObject | undefined> {
	if (!lines) return undefined;
	try {
		return await parseNetworkObject(lines, resolver);
	} catch (err) {
		throw withContext(label, err);
	}
}

function readProtocols(label: string, lines: ReadonlyArray<string> | undefined): ProtocolObject | undefined {
	if (!lines) return undefined;
	try {
		return parseProtocolObject(lines);
	} catch (err) {
		throw withContext(label, err);
	}
}

/**
 * Build a rule from its block: the marker line followed by the field lines.
 * A field the block does not carry matches everything.
 */
export async function readRule(block: ReadonlyArray<string>, resolver: HostResolver, logger?: Logger): Promise<Rule> {
	const header = block.find((line) => line.includes(RULE_MARKER));
	if (header === undefined) {
		throw new ParseError(`Line with rule name not found in block starting ${block[0]?.trim() ?? '<empty>'}`);
	}
	const label = ruleName(header);

	try {
		const fields = sliceFields(block);
		const rule = new Rule(label, {
			srcNetworks: await readNetworks('Source Networks', fields['Source Networks'], resolver),
			dstNetworks: await readNetworks('Destination Networks', fields['Destination Networks'], resolver),
			srcProtocols: readProtocols('Source Ports', fields['Source Ports']),
			dstProtocols: readProtocols('Destination Ports', fields['Destination Ports']),
		});
		logger?.debug({ rule: label }, 'Rule parsed');
		return rule;
	} catch (err) {
		throw withContext(`Rule "${label}"`, err);
	}
}

/** Parse a whole export. One malformed rule fails the policy. */
export async function readPolicy(text: string, resolver: HostResolver, logger?: Logger): Promise<AccessControlPolicy> {
	const rules: Array<Rule> = [];
	for (const block of splitRules(extractPolicyLines(text))) {
		rules.push(await readRule(block, resolver, logger));
	}
	logger?.debug({ rules: rules.length }, 'Policy parsed');
	return new AccessControlPolicy(rules);
}

/** Parse only the rule labelled `name`; the others are never resolved. */
export async function readNamedRule(
	text: string,
	name: string,
	resolver: HostResolver,
	logger?: Logger,
): Promise<Rule> {
	return readRule(findRuleBlock(text, name), resolver, logger);
}
