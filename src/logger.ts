import pino from 'pino';
import type { Logger } from 'pino';

import { loadConfig } from './config.js';

export type { Logger };

// Reports own stdout, so every logger writes to stderr.
const STDERR = 2;

export function createLogger(name: string): Logger {
	const config = loadConfig();
	const baseOptions = {
		name,
		level: config.LOG_LEVEL,
	};
	if (config.NODE_ENV === 'development') {
		return pino({ ...baseOptions, transport: { target: 'pino-pretty', options: { destination: STDERR } } });
	}
	return pino(baseOptions, pino.destination(STDERR));
}
