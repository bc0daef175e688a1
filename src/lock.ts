import { rm } from "fs/promises";

/**
 * Remove a stale mailbox lock file left behind by an earlier session.
 * Failures of any kind are reported to `log` and otherwise ignored.
 * @returns Whether the call completed without an error
 */
export async function removeLock(
	path: string,
	log: (message: string, ...args: unknown[]) => void = () => {}
): Promise<boolean> {
	try {
		await rm(path, { force: true });
		log(`Removed lock file ${path}`);
		return true;
	} catch (err) {
		log(`Could not remove lock file ${path}`, err);
		return false;
	}
}
