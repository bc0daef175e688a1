import { type Duplex } from "stream";
import { EndOfStreamError, ExpectTimeoutError, type Pattern } from "./errors";

export type Direction = "read" | "write";

export interface ExpectMatch {
	/** Position of the matched pattern in the list passed to `expect`. */
	index: number;
	/** Consumed output that came before the match. */
	before: string;
	match: string;
}

export interface ExpecterOptions {
	timeoutMs: number;
	/** Never match inside IMAP `{n}` literal data, or past an incomplete literal. */
	skipLiterals?: boolean;
	onChunk?: (chunk: Buffer, direction: Direction) => void;
}

type Region = [start: number, end: number];

const LITERAL_HEADER = /\{(\d+)\+?\}\r\n/;

interface Waiter {
	patterns: Pattern[];
	timer: NodeJS.Timeout;
	resolve: (match: ExpectMatch) => void;
	reject: (err: Error) => void;
}

/**
 * Send/expect driver over a duplex byte stream.
 *
 * Output is kept as latin1 text, so string offsets are byte offsets.
 */
export class Expecter {
	private buffer = "";
	private ended = false;
	private failure: Error | null = null;
	private waiter: Waiter | null = null;

	constructor(
		private stream: Duplex,
		private options: ExpecterOptions
	) {
		stream.on("data", (chunk: Buffer) => {
			this.options.onChunk?.(chunk, "read");
			this.buffer += chunk.toString("latin1");
			this.check();
		});
		stream.once("end", () => this.finish(null));
		stream.once("close", () => this.finish(null));
		stream.once("error", (err: Error) => this.finish(err));
	}

	/**
	 * Wait until one of the patterns appears in the output.
	 * @param patterns - Literal substrings or regular expressions
	 * @param timeoutMs - Overrides the default timeout
	 * @returns The earliest match; a tie goes to the pattern listed first
	 */
	public expect(patterns: Pattern | Pattern[], timeoutMs = this.options.timeoutMs): Promise<ExpectMatch> {
		const list = Array.isArray(patterns) ? patterns : [patterns];

		if (this.waiter) {
			return Promise.reject(new Error("Another expect is already pending"));
		}

		const found = this.search(list);
		if (found) {
			return Promise.resolve(found);
		}
		if (this.ended) {
			return Promise.reject(this.failure ?? new EndOfStreamError(list, this.buffer));
		}

		return new Promise((resolve, reject) => {
			const timer = setTimeout(() => {
				this.waiter = null;
				reject(new ExpectTimeoutError(list, timeoutMs, this.buffer));
			}, timeoutMs);
			this.waiter = { patterns: list, timer, resolve, reject };
		});
	}

	/**
	 * Write a CRLF-terminated line.
	 * @param display - Text passed to the chunk listener instead of the real line
	 */
	public sendLine(line: string, display?: string): Promise<void> {
		const data = Buffer.from(`${line}\r\n`, "utf8");
		this.options.onChunk?.(display === undefined ? data : Buffer.from(`${display}\r\n`, "utf8"), "write");

		return new Promise((resolve, reject) => {
			if (this.ended || this.stream.destroyed) {
				reject(this.failure ?? new Error("Cannot send on a closed connection"));
				return;
			}
			this.stream.write(data, (err) => {
				if (err) {
					reject(err);
					return;
				}
				resolve();
			});
		});
	}

	/**
	 * Output received but not yet consumed by a match.
	 */
	public pending(): string {
		return this.buffer;
	}

	/**
	 * Whether the stream has ended or failed.
	 */
	public isEnded(): boolean {
		return this.ended;
	}

	private check(): void {
		if (!this.waiter) return;

		const found = this.search(this.waiter.patterns);
		if (!found) return;

		const { timer, resolve } = this.waiter;
		clearTimeout(timer);
		this.waiter = null;
		resolve(found);
	}

	private search(patterns: Pattern[]): ExpectMatch | null {
		let best: { index: number; start: number; text: string } | null = null;
		const literals = this.options.skipLiterals ? this.literals() : [];

		for (let index = 0; index < patterns.length; index++) {
			const hit = this.locate(patterns[index], literals);
			if (hit && (!best || hit.start < best.start)) {
				best = { index, ...hit };
			}
		}

		if (!best) return null;

		const { index, start, text } = best;
		const before = this.buffer.slice(0, start);
		this.buffer = this.buffer.slice(start + text.length);
		return { index, before, match: text };
	}

	/**
	 * Byte ranges of literal data in the buffer; an incomplete literal runs past its end.
	 */
	private literals(): Region[] {
		const regions: Region[] = [];
		const header = new RegExp(LITERAL_HEADER.source, "g");

		let match: RegExpExecArray | null;
		while ((match = header.exec(this.buffer)) !== null) {
			const start = match.index + match[0].length;
			const end = start + Number(match[1]);
			regions.push([start, end]);
			if (end >= this.buffer.length) break;
			header.lastIndex = end;
		}
		return regions;
	}

	private locate(pattern: Pattern, literals: Region[]): { start: number; text: string } | null {
		const inLiteral = (pos: number) => literals.some(([start, end]) => pos >= start && pos < end);

		if (typeof pattern === "string") {
			let start = this.buffer.indexOf(pattern);
			while (start !== -1 && inLiteral(start)) {
				start = this.buffer.indexOf(pattern, start + 1);
			}
			return start === -1 ? null : { start, text: pattern };
		}

		// Own global copy, so the caller's lastIndex never matters
		const re = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, "") + "g");
		let result: RegExpExecArray | null;
		while ((result = re.exec(this.buffer)) !== null) {
			if (!inLiteral(result.index)) {
				return { start: result.index, text: result[0] };
			}
			if (result[0] === "") re.lastIndex++;
		}
		return null;
	}

	private finish(err: Error | null): void {
		if (this.ended) {
			if (err && !this.failure) this.failure = err;
			return;
		}
		this.ended = true;
		this.failure = err;

		if (!this.waiter) return;

		const { patterns, timer, reject } = this.waiter;
		clearTimeout(timer);
		this.waiter = null;
		reject(err ?? new EndOfStreamError(patterns, this.buffer));
	}
}
