import chalk from "chalk";
import { AmbiguousGameError } from "./errors.ts";
import { formatGameTable } from "./mapper.ts";
import { resolveGame } from "./twitch.ts";
import type { Fetch, GameRef, Logger, RelayConfig, Token } from "./types.ts";

export interface SelectGameOptions {
	fetch?: Fetch;
	logger?: Logger;
}

/**
 * Settles which game to poll. A configured id is used as is; a name is looked
 * up once, and an ambiguous name prints the candidates and exits 1.
 */
export async function selectGame(
	config: RelayConfig,
	token: Token,
	options: SelectGameOptions = {},
): Promise<GameRef> {
	if (config.game.kind === "id") {
		return { id: config.game.id, name: config.game.name ?? config.game.id };
	}

	const logger = options.logger ?? console;
	try {
		const game = await resolveGame(
			{ clientId: config.clientId, token: token.value, fetch: options.fetch },
			config.game.name,
		);
		logger.log(`Game ID: ${game.id}`);
		return game;
	} catch (err) {
		if (err instanceof AmbiguousGameError) {
			const [heading, ...rows] = formatGameTable(
				err.gameName,
				err.candidates,
			).split("\n");
			console.log(chalk.bold(heading));
			for (const row of rows) console.log(row);
			process.exit(1);
		}
		throw err;
	}
}

export function exitOnFatal(logger: Logger): (err: Error) => void {
	return (err) => {
		logger.error(`Fatal: ${err.message}`);
		process.exit(1);
	};
}
