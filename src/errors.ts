/**
 * Failures raised while reading or analysing an access-control policy.
 * Each layer wraps the failure below it and prefixes its own context, so the
 * outermost message names the rule, field and line that broke.
 */
export abstract class AcpError extends Error {
	abstract readonly kind: 'parse' | 'value' | 'lookup';

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Structural problem in the exported text: markers, separators, parentheses. */
export class ParseError extends AcpError {
	override readonly kind = 'parse';
}

/** Well-formed text carrying a value that is out of range or unresolvable. */
export class ValueError extends AcpError {
	override readonly kind = 'value';
}

/** A rule (or any rule at all) that the policy does not contain. */
export class LookupError extends AcpError {
	override readonly kind = 'lookup';
}

/** Broken merge accumulator. A logic error, never an input condition. */
export class MergeInvariantError extends Error {
	constructor(message: string) {
		super(`Merge invariant violated: ${message}`);
		this.name = 'MergeInvariantError';
	}
}

/**
 * Re-throw `err` with `context` prepended, keeping its class so callers can
 * still tell a parse failure from a value failure.
 */
export function withContext(context: string, err: unknown): AcpError {
	if (err instanceof ValueError) {
		return new ValueError(`${context}: ${err.message}`, { cause: err });
	}
	if (err instanceof LookupError) {
		return new LookupError(`${context}: ${err.message}`, { cause: err });
	}
	if (err instanceof ParseError) {
		return new ParseError(`${context}: ${err.message}`, { cause: err });
	}
	const message = err instanceof Error ? err.message : String(err);
	return new ParseError(`${context}: ${message}`, { cause: err });
}
