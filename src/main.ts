import { loadConfig } from "./config";
import { runSession } from "./session";
import { type Config } from "./types";

/**
 * Run one session from environment settings and print a summary.
 * @param env - Source of the IMAP_* settings
 * @param overrides - Applied on top of the loaded config
 * @returns Process exit code: 0 on success, 1 on any failure
 */
export async function main(env: NodeJS.ProcessEnv = process.env, overrides: Partial<Config> = {}): Promise<number> {
	try {
		const config = { ...loadConfig(env), ...overrides };
		const report = await runSession(config);

		console.log(`\n=== ${report.records.length} FETCH responses, ${report.mails.length} messages ===`);
		for (const mail of report.mails) {
			console.log(`#${mail.seq} From: ${mail.from.map((f) => f.address).join(", ")} Subject: ${mail.subject}`);
		}
		return 0;
	} catch (err) {
		console.error("\nSession failed:", err instanceof Error ? err.message : err);
		return 1;
	}
}
