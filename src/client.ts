import { connect, type Socket } from "net";
import { simpleParser, type EmailAddress, type AddressObject } from "mailparser";
import { EventEmitter } from "events";
import { CommandFailedError, type Pattern } from "./errors";
import { Expecter, type Direction, type ExpectMatch } from "./expect";
import { messageSource, parseFetchResponses } from "./fetch-response";
import {
	type Config,
	type DebugOptions,
	type FetchOptions,
	type FetchRecord,
	type FetchResult,
	type Mail,
	type Markers,
} from "./types";

const GREETING = /^\* (OK|PREAUTH)\b[^\r\n]*\r?\n/m;
const BYE = /^\* BYE\b[^\r\n]*\r?\n/m;
const MASK = "****";

export const DEFAULT_FETCH: FetchOptions = { sequence: "1:3", item: "BODY.PEEK[]" };

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Server output is matched as latin1, so UTF-8 text must be spelled the same way.
 */
function wireText(text: string): string {
	return Buffer.from(text, "utf8").toString("latin1");
}

/**
 * Render a LOGIN argument as an IMAP astring, quoting only when needed.
 */
export function astring(value: string): string {
	if (/^[\x21-\x7e]+$/.test(value) && !/[(){%*"\\\]]/.test(value)) {
		return value;
	}
	return `"${value.replace(/[\\"]/g, "\\$&")}"`;
}

/**
 * Scripted IMAP session over a plaintext connection.
 *
 * Every command is sent only after the previous one was answered.
 */
export class Client extends EventEmitter {
	private socket: Socket | null = null;
	private expecter: Expecter | null = null;
	private tag = 0;
	private greeting = "";
	private currentMailbox: string | null = null;
	private commands: string[] = [];
	private transcript: Buffer[] = [];
	private debugOptions: Required<DebugOptions>;
	private markers: Markers;
	private timeoutMs: number;

	constructor(private config: Config) {
		super();
		this.debugOptions = {
			enabled: config.debug?.enabled ?? false,
			logger: config.debug?.logger ?? console.log,
			connectionDebug: config.debug?.connectionDebug ?? false,
		};
		this.debug("Client initialized with config", {
			host: config.host,
			port: config.port,
			email: config.email,
			mailbox: config.mailbox,
		});
		this.config.mailbox = config.mailbox || "INBOX";
		this.markers = {
			login: config.markers?.login ?? `logged in successfully as ${config.email}`,
			select: config.markers?.select ?? "successful",
			fetch: config.markers?.fetch ?? "completed",
		};
		this.timeoutMs = config.timeoutMs ?? 30000;
	}

	/**
	 * Connect and wait for the server greeting
	 * @param config - Session configuration
	 * @returns Connected client, not yet logged in
	 */
	public static async create(config: Config): Promise<Client> {
		const client = new Client(config);
		await client.connect();
		return client;
	}

	private debug(message: string, ...args: unknown[]): void {
		if (this.debugOptions.enabled) {
			const logger = this.debugOptions.logger;

			if (args.length > 0) {
				logger(message, ...args);
			} else {
				logger(message);
			}
		}
	}

	/**
	 * Greeting line sent by the server on connect
	 */
	public getGreeting(): string {
		return this.greeting;
	}

	/**
	 * Mailbox of the last successful SELECT, or null
	 */
	public getCurrentMailbox(): string | null {
		return this.currentMailbox;
	}

	/**
	 * Command lines sent so far, password masked
	 */
	public getCommands(): string[] {
		return [...this.commands];
	}

	/**
	 * Everything read and written on the connection, in order
	 */
	public getTranscript(): string {
		return Buffer.concat(this.transcript).toString("utf8");
	}

	private record(chunk: Buffer, direction: Direction): void {
		this.transcript.push(chunk);
		const output = this.config.output === undefined ? process.stdout : this.config.output;
		output?.write(chunk);

		if (this.debugOptions.connectionDebug) {
			const arrow = direction === "read" ? "<=" : "=>";
			this.debug(`IMAP Connection: ${arrow} ${JSON.stringify(chunk.toString("utf8"))}`);
		}
	}

	/**
	 * Open the connection and block until the greeting line arrives
	 */
	private async connect(): Promise<void> {
		this.debug(`Connecting to IMAP server ${this.config.host}:${this.config.port}`);

		const socket = await new Promise<Socket>((resolve, reject) => {
			const sock = connect({ host: this.config.host, port: this.config.port });

			const errorHandler = (err: Error) => {
				this.debug("IMAP connection error", err);
				reject(err);
			};

			sock.once("error", errorHandler);
			sock.once("connect", () => {
				sock.removeListener("error", errorHandler);
				resolve(sock);
			});
		});

		this.socket = socket;
		this.expecter = new Expecter(socket, {
			timeoutMs: this.timeoutMs,
			skipLiterals: true,
			onChunk: (chunk, direction) => this.record(chunk, direction),
		});
		socket.on("error", (err) => this.debug("IMAP socket error", err));

		let greeting: ExpectMatch;
		try {
			greeting = await this.expecter.expect([GREETING, BYE]);
		} catch (err) {
			this.debug("No greeting from IMAP server", err);
			socket.destroy();
			throw err;
		}
		if (greeting.index === 1) {
			socket.destroy();
			throw new CommandFailedError("*", "BYE", greeting.match.trim());
		}

		this.greeting = greeting.match.trim();
		this.debug("Connected to IMAP server successfully", { greeting: this.greeting });
	}

	/**
	 * Send one tagged command and wait for its OK line carrying `marker`
	 * @param display - Replaces the arguments in the transcript and command log
	 */
	private async command(verb: string, args: string, marker: string, display = args): Promise<ExpectMatch> {
		if (!this.expecter) {
			this.debug(`Attempted to send ${verb} with no connection`);
			throw new Error("Client not connected");
		}

		const tag = String(++this.tag);
		const line = `${tag} ${verb} ${args}`;
		const shown = `${tag} ${verb} ${display}`;
		this.commands.push(shown);
		this.debug(`Sending command: ${shown}`);

		await this.expecter.sendLine(line, shown);

		const t = escapeRegExp(tag);
		const patterns: Pattern[] = [
			new RegExp(`^${t} OK\\b[^\\r\\n]*${escapeRegExp(wireText(marker))}[^\\r\\n]*\\r?\\n`, "m"),
			new RegExp(`^${t} (NO|BAD)\\b[^\\r\\n]*\\r?\\n`, "m"),
			BYE,
		];

		const result = await this.expecter.expect(patterns);
		if (result.index !== 0) {
			const response = result.match.trim();
			const [responseTag, status] = response.split(" ", 2);
			this.debug(`Command ${tag} failed`, { status, response });
			throw new CommandFailedError(responseTag, status, response);
		}

		this.debug(`Command ${tag} completed`, { response: result.match.trim() });
		return result;
	}

	/**
	 * Authenticate with the configured credentials
	 */
	public async login(): Promise<void> {
		const user = astring(this.config.email);
		await this.command("login", `${user} ${astring(this.config.password)}`, this.markers.login, `${user} ${MASK}`);
	}

	/**
	 * Select a mailbox
	 * @param mailboxName - Defaults to the configured mailbox
	 */
	public async select(mailboxName = this.config.mailbox ?? "INBOX"): Promise<void> {
		this.debug(`Selecting mailbox: ${mailboxName}`);
		await this.command("select", astring(mailboxName), this.markers.select);
		this.currentMailbox = mailboxName;
	}

	/**
	 * Fetch a message range and decode any full message bodies.
	 * Responses that fail to decode are logged and left out of the result.
	 * @param sequence - Sequence set, e.g. `1:3`
	 * @param item - Data item or parenthesised item list
	 * @returns Decoded FETCH records and the mails parsed from them
	 */
	public async fetch(
		sequence = this.config.fetch?.sequence ?? DEFAULT_FETCH.sequence,
		item = this.config.fetch?.item ?? DEFAULT_FETCH.item
	): Promise<FetchResult> {
		const { before } = await this.command("fetch", `${sequence} ${item}`, this.markers.fetch);

		const records = parseFetchResponses(before, (err, seq) => {
			this.debug(`Skipping undecodable FETCH response for message ${seq}: ${err.message}`, err);
		});
		this.debug(`Received ${records.length} FETCH responses`, {
			sequences: records.map((r) => r.seq),
		});

		const mails: Mail[] = [];
		for (const record of records) {
			const source = messageSource(record);
			if (!source) continue;

			try {
				mails.push(await this.processSingleMessage(record, source));
			} catch (error) {
				this.debug(`Error processing message ${record.seq}: ${error}`, error);
			}
		}

		mails.forEach((mail) => this.emit("mail", mail));

		return { records, mails };
	}

	/**
	 * Parse the raw source of one fetched message
	 */
	private async processSingleMessage(record: FetchRecord, source: Buffer): Promise<Mail> {
		const parsed = await simpleParser(source);
		const uid = record.attributes.get("UID");

		const mail: Mail = {
			seq: record.seq,
			uid: typeof uid === "number" ? uid : 0,
			from: this.extractAddresses(parsed.from),
			to: this.extractAddresses(parsed.to),
			subject: parsed.subject || "",
			date: parsed.date ? new Date(parsed.date) : new Date(),
			size: source.length,
			plain: Buffer.from(parsed.text || ""),
			html: parsed.html ? Buffer.from(parsed.html) : undefined,
		};

		this.debug("Parsed mail message", {
			seq: mail.seq,
			from: mail.from.map((f) => f.address).join(", "),
			subject: mail.subject,
			date: mail.date.toISOString(),
		});

		return mail;
	}

	/**
	 * Add an event listener for mail events
	 * @param event - Event name (currently only 'mail')
	 */
	public on(event: "mail", listener: (mail: Mail) => void): this {
		return super.on(event, listener);
	}

	public removeMailListener(listener: (mail: Mail) => void): this {
		return this.removeListener("mail", listener);
	}

	private extractAddresses = (addressObj?: AddressObject | AddressObject[]): EmailAddress[] => {
		if (!addressObj) return [];

		if (Array.isArray(addressObj)) {
			return addressObj.flatMap((obj) => obj.value);
		}

		return addressObj.value;
	};

	/**
	 * Close the connection without logging out
	 */
	public async close(): Promise<void> {
		this.debug("Closing IMAP connection");
		const socket = this.socket;
		this.socket = null;
		this.expecter = null;

		if (!socket || socket.destroyed) return;

		await new Promise<void>((resolve) => {
			socket.once("close", () => resolve());
			socket.end(() => socket.destroy());
		});
	}
}
