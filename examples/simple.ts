import { Client, Config } from "../src";

async function simpleExample() {
	const config: Config = {
		host: "127.0.0.1",
		port: 10000,
		email: "user@example.com",
		password: "test-password",
		lockPath: null,
		debug: {
			enabled: true,
			logger: (message, ...args) => {
				console.log(`[${new Date().toISOString()}] ${message}`, ...args);
			},
		},
	};

	const client = await Client.create(config);

	client.on("mail", (mail) => {
		console.log("Fetched email:");
		console.log(`From: ${mail.from[0]?.address}`);
		console.log(`Subject: ${mail.subject}`);
		console.log(`Date: ${mail.date}`);
		console.log(`Content: ${mail.plain?.toString("utf-8").substring(0, 100)}...`);
	});

	try {
		await client.login();
		await client.select("INBOX");
		await client.fetch("1:2", "(FLAGS RFC822.SIZE BODY.PEEK[])");
	} finally {
		await client.close();
	}
}

simpleExample().catch((err) => {
	console.error(err);
	process.exitCode = 1;
});
