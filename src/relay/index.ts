#!/usr/bin/env -S npx tsx
import "dotenv/config";
import { errorMessage } from "../utils.ts";
import { DedupCache } from "./cache.ts";
import { loadConfig } from "./config.ts";
import { createLogger } from "./log.ts";
import { Notifier } from "./notifier.ts";
import { Poller } from "./poller.ts";
import { exitOnFatal, selectGame } from "./startup.ts";
import { STREAMS_PAGE_SIZE, acquireToken, fetchBroadcasts } from "./twitch.ts";

const logger = createLogger("relay");

async function main() {
	const config = await loadConfig();
	logger.log(`Target: ${new URL(config.webhookUrl).host}`);

	const getToken = () => acquireToken(config.clientId, config.clientSecret);
	const initialToken = await getToken();
	logger.log("Got initial Twitch OAuth token");

	const game = await selectGame(config, initialToken, { logger });

	const notifier = new Notifier({
		webhookUrl: config.webhookUrl,
		cache: new DedupCache(config.cacheSize),
		logger,
		onFatal: exitOnFatal(logger),
	});

	const poller = new Poller({
		game,
		pollIntervalSeconds: config.pollIntervalSeconds,
		pageSize: STREAMS_PAGE_SIZE,
		initialToken,
		acquireToken: getToken,
		fetchBroadcasts: (token, gameId) =>
			fetchBroadcasts({ clientId: config.clientId, token }, gameId),
		notify: (gameName, broadcasts) => notifier.notify(gameName, broadcasts),
		logger,
	});

	for (const signal of ["SIGINT", "SIGTERM"] as const) {
		process.on(signal, () => {
			poller.stop();
			process.exit(0);
		});
	}

	await poller.run();
}

main().catch((err) => {
	logger.error(`Fatal: ${errorMessage(err)}`);
	process.exit(1);
});
