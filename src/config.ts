import { ConfigError } from "./errors";
import { type Config } from "./types";

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 10000;
export const DEFAULT_LOCK_PATH = "../maildir/.lock";

function readInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
	const raw = env[name];
	if (raw === undefined || raw === "") return fallback;

	const value = Number(raw);
	if (!Number.isInteger(value) || value <= 0) {
		throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
	}
	return value;
}

function readRequired(env: NodeJS.ProcessEnv, name: string): string {
	const value = env[name];
	if (!value) {
		throw new ConfigError(`${name} is not set`);
	}
	return value;
}

/**
 * Build a session config from environment variables.
 *
 * IMAP_USER and IMAP_PASS are required. An empty IMAP_LOCK_PATH skips lock removal.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const port = readInteger(env, "IMAP_PORT", DEFAULT_PORT);
	if (port > 65535) {
		throw new ConfigError(`IMAP_PORT must be at most 65535, got ${port}`);
	}

	const lockPath = env.IMAP_LOCK_PATH;

	return {
		host: env.IMAP_HOST || DEFAULT_HOST,
		port,
		email: readRequired(env, "IMAP_USER"),
		password: readRequired(env, "IMAP_PASS"),
		mailbox: env.IMAP_MAILBOX || "INBOX",
		lockPath: lockPath === undefined ? DEFAULT_LOCK_PATH : lockPath || null,
		fetch: {
			sequence: env.IMAP_FETCH_SET || undefined,
			item: env.IMAP_FETCH_ITEM || undefined,
		},
		timeoutMs: readInteger(env, "IMAP_TIMEOUT_MS", 30000),
		debug: {
			enabled: env.IMAP_DEBUG === "1" || env.IMAP_DEBUG === "true",
		},
	};
}
