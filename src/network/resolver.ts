import { lookup } from 'node:dns/promises';
import type { Logger } from 'pino';

import { ValueError } from '../errors.js';
import { Address } from './address.js';

// ─── Resolver Interface ──────────────────────────────────────────────────────
// Hostname items are resolved once while a policy is parsed.

export interface HostResolver {
	resolve(name: string): Promise<Address>;
}

// ─── DNS ─────────────────────────────────────────────────────────────────────

export class DnsHostResolver implements HostResolver {
	private readonly cache = new Map<string, Promise<Address>>();
	private readonly logger: Logger;

	constructor(logger: Logger) {
		this.logger = logger;
	}

	resolve(name: string): Promise<Address> {
		const cached = this.cache.get(name);
		if (cached) return cached;

		const pending = this.lookupIPv4(name);
		this.cache.set(name, pending);
		return pending;
	}

	private async lookupIPv4(name: string): Promise<Address> {
		let answers: Array<{ address: string; family: number }>;
		try {
			answers = await lookup(name, { all: true });
		} catch (err) {
			throw new ValueError(`Fail to resolve name: ${name}`, { cause: err });
		}

		const v4 = answers.find((answer) => answer.family === 4);
		if (!v4) {
			const first = answers[0];
			if (first) {
				throw new ValueError(`IPv6 not supported: ${first.address} for ${name}`);
			}
			throw new ValueError(`Fail to resolve name: ${name}`);
		}

		this.logger.debug({ name, address: v4.address }, 'Hostname resolved');
		return Address.parse(v4.address);
	}
}

// ─── Static Map ──────────────────────────────────────────────────────────────

export class StaticHostResolver implements HostResolver {
	private readonly table: ReadonlyMap<string, Address>;

	constructor(entries: Record<string, string>) {
		this.table = new Map(Object.entries(entries).map(([name, address]) => [name, Address.parse(address)]));
	}

	async resolve(name: string): Promise<Address> {
		const address = this.table.get(name);
		if (!address) {
			throw new ValueError(`Fail to resolve name: ${name}`);
		}
		return address;
	}
}
