import type { Logger } from 'pino';

import { readNamedRule, readPolicy } from '../ingest/reader.js';
import type { HostResolver } from '../network/resolver.js';
import type { CliArgs } from './args.js';
import {
	formatPolicyAnalysis,
	formatPolicyCapacity,
	formatRuleAnalysis,
	formatRuleReport,
	formatTopK,
	policyAnalysis,
	policyCapacity,
	ruleAnalysis,
	ruleReport,
	topK,
} from './report.js';

export type CommandOptions = {
	resolver: HostResolver;
	logger: Logger;
	/** Rules listed by top-k when `--top` is absent. */
	defaultTopK: number;
};

function render<T>(report: T, json: boolean, format: (report: T) => string): string {
	return json ? JSON.stringify(report, null, 2) : format(report);
}

/** Run one command against the text of an export and return what to print. */
export async function runCommand(args: CliArgs, text: string, options: CommandOptions): Promise<string> {
	const { command, json } = args;
	const { resolver, logger } = options;

	switch (command.entity) {
		case 'rule': {
			const rule = await readNamedRule(text, command.name, resolver, logger);
			return command.view === 'capacity'
				? render(ruleReport(rule, logger), json, formatRuleReport)
				: render(ruleAnalysis(rule, logger), json, formatRuleAnalysis);
		}
		case 'top-k': {
			const policy = await readPolicy(text, resolver, logger);
			return render(topK(policy, command.ranking, args.top ?? options.defaultTopK, logger), json, formatTopK);
		}
		case 'acp': {
			const policy = await readPolicy(text, resolver, logger);
			return command.view === 'capacity'
				? render(policyCapacity(policy, logger), json, formatPolicyCapacity)
				: render(policyAnalysis(policy, logger), json, formatPolicyAnalysis);
		}
	}
}
