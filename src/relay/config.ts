import { readFile } from "node:fs/promises";
import { z } from "zod";
import { errorMessage } from "../utils.ts";
import { DEFAULT_CACHE_SIZE } from "./cache.ts";
import { ConfigError } from "./errors.ts";
import type { GameSelector, RelayConfig } from "./types.ts";

export const DEFAULT_SECRET_FILE = ".streamrelay.secret";

const optionalText = z
	.string()
	.trim()
	.optional()
	.transform((v) => v || undefined);

const EnvSchema = z
	.object({
		TWITCH_CLIENT_ID: optionalText.pipe(
			z.string({ required_error: "TWITCH_CLIENT_ID is required" }),
		),
		TWITCH_CLIENT_SECRET: optionalText,
		TWITCH_SECRET_FILE: optionalText,
		GAME_NAME: optionalText,
		GAME_ID: optionalText.pipe(
			z.string().regex(/^\d+$/, "GAME_ID must be numeric").optional(),
		),
		DISCORD_WEBHOOK_URL: optionalText.pipe(
			z
				.string({ required_error: "DISCORD_WEBHOOK_URL is required" })
				.url("DISCORD_WEBHOOK_URL must be a URL"),
		),
		POLL_INTERVAL_SECONDS: optionalText.pipe(
			z.coerce
				.number()
				.positive("POLL_INTERVAL_SECONDS must be positive")
				.default(30),
		),
		DEDUP_CACHE_SIZE: optionalText.pipe(
			z.coerce
				.number()
				.int("DEDUP_CACHE_SIZE must be an integer")
				.positive("DEDUP_CACHE_SIZE must be positive")
				.default(DEFAULT_CACHE_SIZE),
		),
	})
	.refine((env) => env.GAME_ID || env.GAME_NAME, {
		message: "either GAME_ID or GAME_NAME is required",
		path: ["GAME_NAME"],
	});

type ReadSecret = (path: string) => Promise<string>;

const readSecretFile: ReadSecret = (path) => readFile(path, "utf8");

/**
 * Builds the relay settings from the environment. The client secret comes
 * from TWITCH_CLIENT_SECRET when set, otherwise from TWITCH_SECRET_FILE.
 */
export async function loadConfig(
	env: NodeJS.ProcessEnv = process.env,
	readSecret: ReadSecret = readSecretFile,
): Promise<RelayConfig> {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		throw new ConfigError(parsed.error.issues.map((i) => i.message));
	}
	const vars = parsed.data;

	let clientSecret = vars.TWITCH_CLIENT_SECRET;
	if (!clientSecret) {
		const file = vars.TWITCH_SECRET_FILE ?? DEFAULT_SECRET_FILE;
		let contents: string;
		try {
			contents = await readSecret(file);
		} catch (err) {
			throw new ConfigError([
				`Error reading Twitch API secret from ${file}: ${errorMessage(err)}`,
			]);
		}
		clientSecret = contents.trim();
		if (!clientSecret) {
			throw new ConfigError([`No Twitch API secret read from ${file}`]);
		}
	}

	const game: GameSelector = vars.GAME_ID
		? { kind: "id", id: vars.GAME_ID, name: vars.GAME_NAME }
		: { kind: "name", name: vars.GAME_NAME ?? "" };

	return {
		clientId: vars.TWITCH_CLIENT_ID,
		clientSecret,
		game,
		webhookUrl: vars.DISCORD_WEBHOOK_URL,
		pollIntervalSeconds: vars.POLL_INTERVAL_SECONDS,
		cacheSize: vars.DEDUP_CACHE_SIZE,
	};
}
