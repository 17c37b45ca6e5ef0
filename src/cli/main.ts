#!/usr/bin/env node
import { readFile } from 'node:fs/promises';

import { loadConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { DnsHostResolver } from '../network/resolver.js';
import { type CliArgs, USAGE, parseCliArgs } from './args.js';
import { runCommand } from './commands.js';

const config = loadConfig();
const logger = createLogger('acp-capacity');

function messageOf(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

async function main(argv: ReadonlyArray<string>): Promise<number> {
	let args: CliArgs;
	try {
		args = parseCliArgs(argv);
	} catch (err) {
		process.stderr.write(`${messageOf(err)}\n\n${USAGE}\n`);
		return 2;
	}

	try {
		const text = await readFile(args.file, 'utf8');
		const output = await runCommand(args, text, {
			resolver: new DnsHostResolver(logger.child({ module: 'resolver' })),
			logger: logger.child({ module: 'policy' }),
			defaultTopK: config.ACP_TOP_K,
		});
		process.stdout.write(`${output}\n`);
		return 0;
	} catch (err) {
		logger.debug({ err }, 'Command failed');
		process.stderr.write(`${messageOf(err)}\n`);
		return 1;
	}
}

process.exitCode = await main(process.argv.slice(2));
