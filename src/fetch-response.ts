import { type FetchRecord, type FetchValue } from "./types";

const BODY_ATTRIBUTES = ["BODY[]", "RFC822", "BINARY[]"];

/**
 * Cursor over latin1 text holding IMAP response data.
 */
class Reader {
	constructor(
		private text: string,
		public pos: number
	) {}

	readAttributes(): Map<string, FetchValue> {
		const attributes = new Map<string, FetchValue>();

		for (;;) {
			this.skipSpaces();
			if (this.peek() === ")") {
				this.pos++;
				return attributes;
			}
			const name = this.readName();
			this.skipSpaces();
			// Some servers echo an item name with no value after it
			attributes.set(name, this.peek() === ")" ? null : this.readValue());
		}
	}

	private readName(): string {
		const start = this.pos;
		let depth = 0;

		while (this.pos < this.text.length) {
			const ch = this.text[this.pos];
			if (ch === "[") depth++;
			else if (ch === "]") depth--;
			else if (depth === 0 && (ch === " " || ch === ")")) break;
			else if (ch === "\r" || ch === "\n") break;
			this.pos++;
		}

		if (this.pos === start || this.pos >= this.text.length) {
			this.fail("attribute name");
		}
		return this.text.slice(start, this.pos).toUpperCase();
	}

	private readValue(): FetchValue {
		switch (this.peek()) {
			case "(":
				return this.readList();
			case '"':
				return this.readQuoted();
			case "{":
				return this.readLiteral();
			default:
				return this.readAtom();
		}
	}

	private readList(): FetchValue[] {
		const items: FetchValue[] = [];
		this.pos++;

		for (;;) {
			this.skipSpaces();
			const ch = this.peek();
			if (ch === ")") {
				this.pos++;
				return items;
			}
			if (ch === undefined) this.fail("closing parenthesis");
			items.push(this.readValue());
		}
	}

	private readQuoted(): string {
		let value = "";
		this.pos++;

		while (this.pos < this.text.length) {
			const ch = this.text[this.pos++];
			if (ch === '"') {
				return Buffer.from(value, "latin1").toString("utf8");
			}
			if (ch === "\\" && this.pos < this.text.length) {
				value += this.text[this.pos++];
			} else {
				value += ch;
			}
		}
		return this.fail("closing quote");
	}

	private readLiteral(): Buffer {
		const header = /^\{(\d+)\+?\}\r\n/.exec(this.text.slice(this.pos, this.pos + 24));
		if (!header) return this.fail("literal header");

		const size = Number(header[1]);
		const start = this.pos + header[0].length;
		if (start + size > this.text.length) {
			this.fail(`${size} byte literal`);
		}

		this.pos = start + size;
		return Buffer.from(this.text.slice(start, this.pos), "latin1");
	}

	private readAtom(): number | string | null {
		const start = this.pos;
		while (this.pos < this.text.length && !" ()\r\n".includes(this.text[this.pos])) {
			this.pos++;
		}
		if (this.pos === start) this.fail("value");

		const atom = this.text.slice(start, this.pos);
		if (/^\d+$/.test(atom)) return Number(atom);
		if (atom.toUpperCase() === "NIL") return null;
		return atom;
	}

	private skipSpaces(): void {
		while (this.text[this.pos] === " ") this.pos++;
	}

	private peek(): string | undefined {
		return this.pos < this.text.length ? this.text[this.pos] : undefined;
	}

	private fail(expected: string): never {
		throw new Error(`Malformed FETCH response: expected ${expected} at offset ${this.pos}`);
	}
}

/**
 * Decode every untagged FETCH response in a chunk of server output.
 *
 * A response that cannot be decoded is passed to `onError` and skipped; the
 * scan resumes after its `* n FETCH (` prefix.
 * @param text - Server output decoded as latin1, so literal sizes line up
 * @returns One record per decodable `* n FETCH (...)` response, in order of arrival
 */
export function parseFetchResponses(
	text: string,
	onError: (err: Error, seq: number) => void = (err) => {
		throw err;
	}
): FetchRecord[] {
	const start = /^\* (\d+) FETCH \(/gim;
	const records: FetchRecord[] = [];

	let match: RegExpExecArray | null;
	while ((match = start.exec(text)) !== null) {
		const seq = Number(match[1]);
		const reader = new Reader(text, match.index + match[0].length);
		try {
			records.push({ seq, attributes: reader.readAttributes() });
			start.lastIndex = reader.pos;
		} catch (err) {
			onError(err instanceof Error ? err : new Error(String(err)), seq);
			start.lastIndex = match.index + match[0].length;
		}
	}

	return records;
}

/**
 * Full message source carried by a record, if one was fetched.
 */
export function messageSource(record: FetchRecord): Buffer | null {
	for (const name of BODY_ATTRIBUTES) {
		const value = record.attributes.get(name);
		if (Buffer.isBuffer(value)) return value;
		if (typeof value === "string") return Buffer.from(value, "utf8");
	}
	return null;
}
