import { parseArgs } from 'node:util';
import { z } from 'zod';

import { ParseError } from '../errors.js';
import { RANKINGS } from '../types/report.js';

export const USAGE = `Usage: acp-capacity --file <path> [--top <k>] [--json] get <command>

Commands:
  rule capacity <name>      capacity and optimized capacity of one rule
  rule analysis <name>      optimized entries of one rule
  top-k by-capacity         widest rules
  top-k by-optimization     rules with the largest optimization gain
  acp capacity              capacity of every rule and the totals
  acp analysis              policy totals and optimization summary`;

const VIEWS = ['capacity', 'analysis'] as const;

const optionsSchema = z.object({
	file: z.string().min(1),
	top: z.coerce.number().int().positive().optional(),
	json: z.boolean().default(false),
});

// Rule labels may contain spaces; unquoted words after the view are rejoined.
const commandSchema = z.union([
	z
		.tuple([z.literal('get'), z.literal('rule'), z.enum(VIEWS), z.string()])
		.rest(z.string())
		.transform(([, , view, ...name]) => ({ entity: 'rule' as const, view, name: name.join(' ') })),
	z
		.tuple([z.literal('get'), z.literal('top-k'), z.enum(RANKINGS)])
		.transform(([, , ranking]) => ({ entity: 'top-k' as const, ranking })),
	z.tuple([z.literal('get'), z.literal('acp'), z.enum(VIEWS)]).transform(([, , view]) => ({ entity: 'acp' as const, view })),
]);

export type Command = z.infer<typeof commandSchema>;

export type CliArgs = z.infer<typeof optionsSchema> & { command: Command };

export function parseCliArgs(argv: ReadonlyArray<string>): CliArgs {
	let parsed: ReturnType<typeof readArgv>;
	try {
		parsed = readArgv(argv);
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		throw new ParseError(`CLI parsing error: ${message}`, { cause: err });
	}

	const options = optionsSchema.safeParse(parsed.values);
	if (!options.success) {
		const issues = options.error.issues.map((issue) => `--${issue.path.join('.')} ${issue.message.toLowerCase()}`);
		throw new ParseError(`Invalid arguments: ${issues.join(', ')}`);
	}

	const command = commandSchema.safeParse(parsed.positionals);
	if (!command.success) {
		throw new ParseError(`Unknown command: ${parsed.positionals.join(' ') || '<none>'}`);
	}

	return { ...options.data, command: command.data };
}

function readArgv(argv: ReadonlyArray<string>) {
	return parseArgs({
		args: [...argv],
		options: {
			file: { type: 'string', short: 'f' },
			top: { type: 'string', short: 'k' },
			json: { type: 'boolean' },
		},
		allowPositionals: true,
		strict: true,
	});
}
