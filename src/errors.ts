export type Pattern = string | RegExp;

const TAIL_LENGTH = 200;

function describe(patterns: Pattern[]): string {
	return patterns.map((p) => (typeof p === "string" ? JSON.stringify(p) : p.toString())).join(", ");
}

function tail(buffer: string): string {
	return buffer.length > TAIL_LENGTH ? buffer.slice(-TAIL_LENGTH) : buffer;
}

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

/**
 * None of the patterns showed up before the deadline.
 */
export class ExpectTimeoutError extends Error {
	readonly pending: string;

	constructor(
		readonly patterns: Pattern[],
		readonly timeoutMs: number,
		buffer: string
	) {
		super(`Timed out after ${timeoutMs}ms waiting for ${describe(patterns)}`);
		this.name = "ExpectTimeoutError";
		this.pending = tail(buffer);
	}
}

/**
 * The connection ended before any of the patterns showed up.
 */
export class EndOfStreamError extends Error {
	readonly pending: string;

	constructor(
		readonly patterns: Pattern[],
		buffer: string
	) {
		super(`Connection closed while waiting for ${describe(patterns)}`);
		this.name = "EndOfStreamError";
		this.pending = tail(buffer);
	}
}

export class CommandFailedError extends Error {
	constructor(
		readonly tag: string,
		readonly status: string,
		readonly response: string
	) {
		super(`Command ${tag} failed: ${response}`);
		this.name = "CommandFailedError";
	}
}
