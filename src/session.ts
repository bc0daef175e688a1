import { Client } from "./client";
import { DEFAULT_LOCK_PATH } from "./config";
import { removeLock } from "./lock";
import { type Config, type SessionReport } from "./types";

/**
 * Run the scripted session: clear the lock file, connect, log in, select the
 * mailbox and issue a single FETCH.
 *
 * Any failed step rejects and no later command is sent.
 */
export async function runSession(config: Config): Promise<SessionReport> {
	const log = config.debug?.enabled ? config.debug.logger ?? console.log : () => {};

	if (config.lockPath !== null) {
		await removeLock(config.lockPath ?? DEFAULT_LOCK_PATH, log);
	}

	const client = await Client.create(config);
	try {
		await client.login();
		await client.select();
		const { records, mails } = await client.fetch();

		return {
			greeting: client.getGreeting(),
			commands: client.getCommands(),
			transcript: client.getTranscript(),
			records,
			mails,
		};
	} finally {
		await client.close();
	}
}
