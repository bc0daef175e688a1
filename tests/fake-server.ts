import { createServer, type Server, type Socket } from "net";

export interface FakeServerOptions {
	greeting?: string | null;
	user?: string;
	password?: string;
	/** Commands the server reads but never answers */
	silentOn?: string[];
	messages?: string[];
	/** Raw reply to FETCH, tagged completion included */
	fetchResponse?: (tag: string) => string;
}

export const USER = "user@example.com";
export const PASSWORD = "test-password";

export const MESSAGES = [
	"From: Alice <alice@example.com>\r\n" +
		"To: bob@example.com\r\n" +
		"Subject: First\r\n" +
		"Date: Mon, 15 Dec 2024 10:00:00 +0000\r\n" +
		"\r\n" +
		"Hello Bob\r\n",
	"From: carol@example.com\r\n" +
		"To: bob@example.com\r\n" +
		"Subject: Second\r\n" +
		"Date: Tue, 16 Dec 2024 11:30:00 +0000\r\n" +
		"\r\n" +
		"Lunch at noon?\r\n",
	"From: dave@example.com\r\n" +
		"To: bob@example.com, erin@example.com\r\n" +
		"Subject: Third\r\n" +
		"Date: Wed, 17 Dec 2024 09:15:00 +0000\r\n" +
		"\r\n" +
		"Minutes attached.\r\n",
];

function unquote(arg: string): string {
	return arg.startsWith('"') && arg.endsWith('"') ? arg.slice(1, -1).replace(/\\(.)/g, "$1") : arg;
}

function sequenceNumbers(set: string, total: number): number[] {
	const result: number[] = [];
	for (const part of set.split(",")) {
		const [from, to = from] = part.split(":");
		const start = from === "*" ? total : Number(from);
		const end = to === "*" ? total : Number(to);
		for (let seq = Math.min(start, end); seq <= Math.max(start, end); seq++) {
			if (seq >= 1 && seq <= total) result.push(seq);
		}
	}
	return result;
}

/**
 * Line-based IMAP stand-in answering LOGIN, SELECT and FETCH.
 */
export class FakeImapServer {
	readonly received: string[] = [];
	private server: Server;
	private sockets = new Set<Socket>();

	constructor(private options: FakeServerOptions = {}) {
		this.server = createServer((socket) => this.handle(socket));
	}

	async start(): Promise<number> {
		await new Promise<void>((resolve) => this.server.listen(0, "127.0.0.1", resolve));
		const address = this.server.address();
		if (!address || typeof address === "string") {
			throw new Error("Fake server is not listening on TCP");
		}
		return address.port;
	}

	async stop(): Promise<void> {
		this.sockets.forEach((socket) => socket.destroy());
		await new Promise<void>((resolve) => this.server.close(() => resolve()));
	}

	private handle(socket: Socket): void {
		this.sockets.add(socket);
		socket.on("close", () => this.sockets.delete(socket));
		socket.on("error", () => socket.destroy());

		const greeting = this.options.greeting === undefined ? "* OK Server ready.\r\n" : this.options.greeting;
		if (greeting !== null) socket.write(greeting);

		let pending = "";
		socket.on("data", (chunk: Buffer) => {
			pending += chunk.toString("latin1");
			let end: number;
			while ((end = pending.indexOf("\r\n")) !== -1) {
				const line = Buffer.from(pending.slice(0, end), "latin1").toString("utf8");
				pending = pending.slice(end + 2);
				this.received.push(line);
				this.respond(socket, line);
			}
		});
	}

	private respond(socket: Socket, line: string): void {
		const [tag, command = "", ...args] = line.split(" ");
		const verb = command.toLowerCase();
		const messages = this.options.messages ?? MESSAGES;

		if (this.options.silentOn?.includes(verb)) return;

		switch (verb) {
			case "login":
				if (
					unquote(args[0] ?? "") === (this.options.user ?? USER) &&
					unquote(args[1] ?? "") === (this.options.password ?? PASSWORD)
				) {
					socket.write(`${tag} OK logged in successfully as ${unquote(args[0] ?? "")}\r\n`);
				} else {
					socket.write(`${tag} NO invalid credentials\r\n`);
				}
				return;
			case "select":
				socket.write(
					`* ${messages.length} EXISTS\r\n` +
						"* 0 RECENT\r\n" +
						"* FLAGS (\\Answered \\Deleted \\Draft \\Flagged \\Seen)\r\n" +
						`${tag} OK ${tag} SELECT command was successful\r\n`
				);
				return;
			case "fetch": {
				if (this.options.fetchResponse) {
					socket.write(this.options.fetchResponse(tag));
					return;
				}
				const item = args.slice(1).join(" ");
				for (const seq of sequenceNumbers(args[0] ?? "", messages.length)) {
					const body = Buffer.from(messages[seq - 1], "utf8");
					const uid = item.includes("UID") ? `UID ${100 + seq} ` : "";
					socket.write(
						Buffer.concat([
							Buffer.from(`* ${seq} FETCH (${uid}BODY[] {${body.length}}\r\n`),
							body,
							Buffer.from(")\r\n"),
						])
					);
				}
				socket.write(`${tag} OK FETCH completed\r\n`);
				return;
			}
			default:
				socket.write(`${tag} BAD unknown command\r\n`);
		}
	}
}
