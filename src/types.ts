import { type EmailAddress } from "mailparser";

export interface DebugOptions {
	enabled?: boolean;
	logger?: (info: string, ...args: unknown[]) => void;
	connectionDebug?: boolean; // Raw chunks read from and written to the socket
}

export interface FetchOptions {
	sequence: string;
	item: string;
}

/**
 * Substrings the tagged OK line of each command must contain.
 */
export interface Markers {
	login: string;
	select: string;
	fetch: string;
}

export interface Config {
	host: string;
	port: number;
	email: string;
	password: string;
	mailbox?: string;
	/** Lock file removed before connecting; `null` skips the step. */
	lockPath?: string | null;
	fetch?: Partial<FetchOptions>;
	markers?: Partial<Markers>;
	timeoutMs?: number;
	/** Where the session transcript is echoed; `null` disables the echo. */
	output?: NodeJS.WritableStream | null;
	debug?: DebugOptions;
}

export type FetchValue = number | string | Buffer | null | FetchValue[];

export interface FetchRecord {
	seq: number;
	attributes: Map<string, FetchValue>;
}

export interface Mail {
	seq: number;
	uid: number;
	from: EmailAddress[];
	to: EmailAddress[];
	subject: string;
	date: Date;
	size: number;
	plain?: Buffer;
	html?: Buffer;
}

export interface FetchResult {
	records: FetchRecord[];
	mails: Mail[];
}

export interface SessionReport extends FetchResult {
	greeting: string;
	commands: string[];
	transcript: string;
}
