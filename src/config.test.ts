import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
	const originalEnv = process.env;

	beforeEach(() => {
		process.env = { ...originalEnv };
		delete process.env.LOG_LEVEL;
		delete process.env.ACP_TOP_K;
	});

	afterEach(() => {
		process.env = originalEnv;
	});

	it('returns default config when no env vars set', () => {
		const config = loadConfig();
		expect(config.NODE_ENV).toBe('test');
		expect(config.LOG_LEVEL).toBe('info');
		expect(config.ACP_TOP_K).toBe(5);
	});

	it('coerces ACP_TOP_K from the environment', () => {
		process.env.ACP_TOP_K = '12';
		expect(loadConfig().ACP_TOP_K).toBe(12);
	});

	it('rejects a non-positive ACP_TOP_K', () => {
		process.env.ACP_TOP_K = '0';
		expect(() => loadConfig()).toThrow('Invalid environment configuration');
	});

	it('rejects an unknown LOG_LEVEL', () => {
		process.env.LOG_LEVEL = 'verbose';
		expect(() => loadConfig()).toThrow('LOG_LEVEL');
	});
});
