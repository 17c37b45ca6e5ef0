import type { Logger } from 'pino';

import { LookupError } from '../errors.js';
import type { Rule } from './rule.js';

export type RankedRule = {
	rule: Rule;
	capacity: number;
	optimizedCapacity: number;
};

/**
 * Ordered rule set of one access-control policy. Labels are not required to
 * be unique; lookups return the first match.
 */
export class AccessControlPolicy {
	readonly rules: ReadonlyArray<Rule>;

	constructor(rules: ReadonlyArray<Rule>) {
		this.rules = rules;
	}

	get size(): number {
		return this.rules.length;
	}

	capacity(): number {
		return this.rules.reduce((sum, rule) => sum + rule.capacity(), 0);
	}

	optimizedCapacity(logger?: Logger): number {
		return this.rules.reduce((sum, rule) => sum + rule.optimizedCapacity(logger), 0);
	}

	ruleByName(label: string): Rule | undefined {
		return this.rules.find((rule) => rule.label === label);
	}

	ruleByIndex(index: number): Rule | undefined {
		return this.rules[index];
	}

	requireRule(label: string): Rule {
		const rule = this.ruleByName(label);
		if (!rule) {
			throw new LookupError(`No rule found with name: ${label}`);
		}
		return rule;
	}

	/** Every rule with both capacities, in policy order. */
	measure(logger?: Logger): Array<RankedRule> {
		return this.rules.map((rule) => ({
			rule,
			capacity: rule.capacity(),
			optimizedCapacity: rule.optimizedCapacity(logger),
		}));
	}

	/** Widest rules first. Equal capacities keep policy order. */
	rankByCapacity(logger?: Logger): Array<RankedRule> {
		return this.measure(logger).sort((a, b) => b.capacity - a.capacity);
	}

	/** Rules that lose the most capacity to optimization first. */
	rankByOptimization(logger?: Logger): Array<RankedRule> {
		return this.measure(logger).sort(
			(a, b) => b.capacity - b.optimizedCapacity - (a.capacity - a.optimizedCapacity),
		);
	}
}
