import type { Logger } from 'pino';

import type { NetworkObject, OptimizedNetworkObject } from '../network/network-object.js';
import type { OptimizedProtocolEntry, ProtocolObject } from '../protocol/protocol-object.js';

export type RuleFields = {
	srcNetworks?: NetworkObject;
	dstNetworks?: NetworkObject;
	srcProtocols?: ProtocolObject;
	dstProtocols?: ProtocolObject;
};

/** Protocol number → how many optimized entries carry it. */
export function protocolFrequencies(entries: ReadonlyArray<OptimizedProtocolEntry>): Map<number, number> {
	const frequencies = new Map<number, number>();
	for (const entry of entries) {
		frequencies.set(entry.protocol, (frequencies.get(entry.protocol) ?? 0) + 1);
	}
	return frequencies;
}

function signature(frequencies: Map<number, number>): string {
	return [...frequencies.entries()]
		.sort(([a], [b]) => a - b)
		.map(([protocol, count]) => `${protocol}:${count}`)
		.join(',');
}

// Tables of equal size are ordered by content, never by direction, so the
// factor does not change when source and destination swap.
function longestFirst(a: Map<number, number>, b: Map<number, number>): [Map<number, number>, Map<number, number>] {
	if (a.size !== b.size) return a.size > b.size ? [a, b] : [b, a];
	return signature(a) >= signature(b) ? [a, b] : [b, a];
}

/**
 * Number of protocol pairings between source and destination. Each protocol
 * of the table with more distinct protocols is multiplied by its count on
 * the other side, or by 1 where the other side does not name it.
 *
 * src {6:2, 17:1}, dst {6:2, 17:1} gives 2·2 + 1·1 = 5.
 */
export function protocolFactor(
	src: ReadonlyArray<OptimizedProtocolEntry> | undefined,
	dst: ReadonlyArray<OptimizedProtocolEntry> | undefined,
): number {
	const srcFrequencies = protocolFrequencies(src ?? []);
	const dstFrequencies = protocolFrequencies(dst ?? []);
	if (srcFrequencies.size === 0 && dstFrequencies.size === 0) return 1;

	const [long, short] = longestFirst(srcFrequencies, dstFrequencies);

	let factor = 0;
	for (const [protocol, count] of long) {
		factor += count * (short.get(protocol) ?? 1);
	}
	return factor;
}

export class Rule {
	readonly label: string;
	readonly srcNetworks: NetworkObject | undefined;
	readonly dstNetworks: NetworkObject | undefined;
	readonly srcProtocols: ProtocolObject | undefined;
	readonly dstProtocols: ProtocolObject | undefined;

	constructor(label: string, fields: RuleFields = {}) {
		this.label = label;
		this.srcNetworks = fields.srcNetworks;
		this.dstNetworks = fields.dstNetworks;
		this.srcProtocols = fields.srcProtocols;
		this.dstProtocols = fields.dstProtocols;
	}

	/**
	 * Pairing factor of the ports fields. Both capacities use the optimized
	 * protocol entries: the firewall already collapses port objects itself.
	 */
	protocolFactor(): number {
		return protocolFactor(this.srcProtocols?.optimize(), this.dstProtocols?.optimize());
	}

	/** Raw networks × protocol factor. An absent field counts as 1. */
	capacity(): number {
		const src = this.srcNetworks?.capacity() ?? 1;
		const dst = this.dstNetworks?.capacity() ?? 1;
		return src * dst * this.protocolFactor();
	}

	optimizedNetworks(logger?: Logger): { src?: OptimizedNetworkObject; dst?: OptimizedNetworkObject } {
		return {
			src: this.srcNetworks?.optimize(logger),
			dst: this.dstNetworks?.optimize(logger),
		};
	}

	optimizedCapacity(logger?: Logger): number {
		const { src, dst } = this.optimizedNetworks(logger);
		return (src?.capacity ?? 1) * (dst?.capacity ?? 1) * this.protocolFactor();
	}
}
