import { z } from 'zod';

// Zod schemas - shapes printed by --json

const Count = z.number().int().nonnegative();

export const RuleReportSchema = z.object({
	name: z.string(),
	capacity: Count,
	optimizedCapacity: Count,
	// percentage of the raw capacity that optimization removes
	ratio: z.number(),
});
export type RuleReport = z.infer<typeof RuleReportSchema>;

export const NetworkEntryReportSchema = z.object({
	label: z.string(),
	start: z.string(),
	end: z.string(),
	capacity: Count,
});
export type NetworkEntryReport = z.infer<typeof NetworkEntryReportSchema>;

export const NetworkFieldReportSchema = z.object({
	field: z.string(),
	capacity: Count,
	optimizedCapacity: Count,
	entries: z.array(NetworkEntryReportSchema),
});
export type NetworkFieldReport = z.infer<typeof NetworkFieldReportSchema>;

export const ProtocolEntryReportSchema = z.discriminatedUnion('kind', [
	z.object({ kind: z.literal('l3'), label: z.string(), description: z.string(), protocol: z.number().int() }),
	z.object({
		kind: z.literal('l4'),
		label: z.string(),
		description: z.string(),
		protocol: z.number().int(),
		portStart: z.number().int(),
		portEnd: z.number().int(),
	}),
]);
export type ProtocolEntryReport = z.infer<typeof ProtocolEntryReportSchema>;

export const ProtocolFieldReportSchema = z.object({
	field: z.string(),
	entries: z.array(ProtocolEntryReportSchema),
});
export type ProtocolFieldReport = z.infer<typeof ProtocolFieldReportSchema>;

export const RuleAnalysisSchema = RuleReportSchema.extend({
	protocolFactor: z.number().int().positive(),
	networks: z.array(NetworkFieldReportSchema),
	protocols: z.array(ProtocolFieldReportSchema),
});
export type RuleAnalysis = z.infer<typeof RuleAnalysisSchema>;

export const PolicyTotalsSchema = z.object({
	rules: Count,
	capacity: Count,
	optimizedCapacity: Count,
	ratio: z.number(),
});
export type PolicyTotals = z.infer<typeof PolicyTotalsSchema>;

export const PolicyCapacityReportSchema = z.object({
	totals: PolicyTotalsSchema,
	rules: z.array(RuleReportSchema),
});
export type PolicyCapacityReport = z.infer<typeof PolicyCapacityReportSchema>;

export const PolicyAnalysisSchema = z.object({
	totals: PolicyTotalsSchema,
	// rules whose optimized capacity is below their capacity
	reducibleRules: Count,
	largest: RuleReportSchema,
	mostReducible: RuleReportSchema,
});
export type PolicyAnalysis = z.infer<typeof PolicyAnalysisSchema>;

export const RANKINGS = ['by-capacity', 'by-optimization'] as const;
export type Ranking = (typeof RANKINGS)[number];

export const TopKReportSchema = z.object({
	ranking: z.enum(RANKINGS),
	rules: z.array(RuleReportSchema),
});
export type TopKReport = z.infer<typeof TopKReportSchema>;
