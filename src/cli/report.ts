import type { Logger } from 'pino';

import { LookupError } from '../errors.js';
import type { NetworkObject } from '../network/network-object.js';
import type { AccessControlPolicy, RankedRule } from '../policy/policy.js';
import type { Rule } from '../policy/rule.js';
import { describeProtocolItem } from '../protocol/protocol-list-item.js';
import type { ProtocolObject } from '../protocol/protocol-object.js';
import {
	type NetworkFieldReport,
	type PolicyAnalysis,
	PolicyAnalysisSchema,
	type PolicyCapacityReport,
	PolicyCapacityReportSchema,
	type PolicyTotals,
	type ProtocolEntryReport,
	type ProtocolFieldReport,
	type Ranking,
	type RuleAnalysis,
	RuleAnalysisSchema,
	type RuleReport,
	type TopKReport,
	TopKReportSchema,
} from '../types/report.js';

// ─── Building ────────────────────────────────────────────────────────────────

/** Percentage of `capacity` removed by optimization; 0 for an empty rule. */
export function optimizationRatio(capacity: number, optimizedCapacity: number): number {
	if (capacity === 0) return 0;
	return 100 - (optimizedCapacity / capacity) * 100;
}

function fromRanked({ rule, capacity, optimizedCapacity }: RankedRule): RuleReport {
	return { name: rule.label, capacity, optimizedCapacity, ratio: optimizationRatio(capacity, optimizedCapacity) };
}

export function ruleReport(rule: Rule, logger?: Logger): RuleReport {
	return fromRanked({ rule, capacity: rule.capacity(), optimizedCapacity: rule.optimizedCapacity(logger) });
}

function networkField(object: NetworkObject | undefined, logger?: Logger): Array<NetworkFieldReport> {
	if (!object) return [];
	const optimized = object.optimize(logger);
	return [
		{
			field: object.label,
			capacity: object.capacity(),
			optimizedCapacity: optimized.capacity,
			entries: optimized.entries.map((entry) => ({
				label: entry.label,
				start: entry.start.toString(),
				end: entry.end.toString(),
				capacity: entry.capacity,
			})),
		},
	];
}

function protocolField(object: ProtocolObject | undefined): Array<ProtocolFieldReport> {
	if (!object) return [];
	return [
		{
			field: object.label,
			entries: object.optimize().map(
				(entry): ProtocolEntryReport =>
					entry.kind === 'l3'
						? {
								kind: 'l3',
								label: entry.label,
								description: describeProtocolItem(entry.item),
								protocol: entry.protocol,
							}
						: {
								kind: 'l4',
								label: entry.label,
								description: describeProtocolItem({
									kind: 'tcp-udp',
									label: entry.label,
									protocol: entry.protocol,
									portStart: entry.portStart,
									portEnd: entry.portEnd,
								}),
								protocol: entry.protocol,
								portStart: entry.portStart,
								portEnd: entry.portEnd,
							},
			),
		},
	];
}

export function ruleAnalysis(rule: Rule, logger?: Logger): RuleAnalysis {
	return RuleAnalysisSchema.parse({
		...ruleReport(rule, logger),
		protocolFactor: rule.protocolFactor(),
		networks: [...networkField(rule.srcNetworks, logger), ...networkField(rule.dstNetworks, logger)],
		protocols: [...protocolField(rule.srcProtocols), ...protocolField(rule.dstProtocols)],
	});
}

function measureNonEmpty(policy: AccessControlPolicy, logger?: Logger): Array<RankedRule> {
	if (policy.size === 0) {
		throw new LookupError('No rules found');
	}
	return policy.measure(logger);
}

function totalsOf(measured: ReadonlyArray<RankedRule>): PolicyTotals {
	const capacity = measured.reduce((sum, entry) => sum + entry.capacity, 0);
	const optimizedCapacity = measured.reduce((sum, entry) => sum + entry.optimizedCapacity, 0);
	return { rules: measured.length, capacity, optimizedCapacity, ratio: optimizationRatio(capacity, optimizedCapacity) };
}

export function policyCapacity(policy: AccessControlPolicy, logger?: Logger): PolicyCapacityReport {
	const measured = measureNonEmpty(policy, logger);
	return PolicyCapacityReportSchema.parse({ totals: totalsOf(measured), rules: measured.map(fromRanked) });
}

function firstBy(measured: ReadonlyArray<RankedRule>, score: (entry: RankedRule) => number): RankedRule {
	const [first, ...rest] = measured;
	if (!first) throw new LookupError('No rules found');
	return rest.reduce((best, entry) => (score(entry) > score(best) ? entry : best), first);
}

export function policyAnalysis(policy: AccessControlPolicy, logger?: Logger): PolicyAnalysis {
	const measured = measureNonEmpty(policy, logger);
	return PolicyAnalysisSchema.parse({
		totals: totalsOf(measured),
		reducibleRules: measured.filter((entry) => entry.optimizedCapacity < entry.capacity).length,
		largest: fromRanked(firstBy(measured, (entry) => entry.capacity)),
		mostReducible: fromRanked(firstBy(measured, (entry) => entry.capacity - entry.optimizedCapacity)),
	});
}

export function topK(policy: AccessControlPolicy, ranking: Ranking, k: number, logger?: Logger): TopKReport {
	if (policy.size === 0) {
		throw new LookupError('No rules found');
	}
	const ranked = ranking === 'by-capacity' ? policy.rankByCapacity(logger) : policy.rankByOptimization(logger);
	return TopKReportSchema.parse({ ranking, rules: ranked.slice(0, k).map(fromRanked) });
}

// ─── Text Output ─────────────────────────────────────────────────────────────

function percent(ratio: number): string {
	return `${ratio.toFixed(2)}%`;
}

function ruleLines(report: RuleReport): Array<string> {
	return [
		`Rule name: ${report.name}`,
		`\t capacity:           ${report.capacity}`,
		`\t optimized capacity: ${report.optimizedCapacity}`,
		`\t optimization ratio: ${percent(report.ratio)}`,
	];
}

export function formatRuleReport(report: RuleReport): string {
	return ruleLines(report).join('\n');
}

export function formatRuleAnalysis(analysis: RuleAnalysis): string {
	const lines = [...ruleLines(analysis), `\t protocol factor:    ${analysis.protocolFactor}`];
	for (const network of analysis.networks) {
		lines.push(`${network.field} (${network.capacity} -> ${network.optimizedCapacity}):`);
		for (const entry of network.entries) {
			lines.push(`\t${entry.label} [${entry.start} - ${entry.end}] capacity ${entry.capacity}`);
		}
	}
	for (const protocols of analysis.protocols) {
		lines.push(`${protocols.field}:`);
		for (const entry of protocols.entries) {
			lines.push(`\t${entry.description}`);
		}
	}
	return lines.join('\n');
}

function totalsLines(totals: PolicyTotals): Array<string> {
	return [
		`# of rules found: ${totals.rules}`,
		`rule capacity: ${totals.capacity}`,
		`optimized capacity: ${totals.optimizedCapacity}`,
		`optimization ratio: ${percent(totals.ratio)}`,
	];
}

export function formatPolicyCapacity(report: PolicyCapacityReport): string {
	return [...totalsLines(report.totals), ...report.rules.flatMap(ruleLines)].join('\n');
}

export function formatPolicyAnalysis(analysis: PolicyAnalysis): string {
	return [
		...totalsLines(analysis.totals),
		`rules with optimization opportunity: ${analysis.reducibleRules}`,
		`largest rule: ${analysis.largest.name} (${analysis.largest.capacity})`,
		`most reducible rule: ${analysis.mostReducible.name} (${analysis.mostReducible.capacity} -> ${analysis.mostReducible.optimizedCapacity})`,
	].join('\n');
}

export function formatTopK(report: TopKReport): string {
	return [`Top ${report.rules.length} rules ${report.ranking}:`, ...report.rules.flatMap(ruleLines)].join('\n');
}
