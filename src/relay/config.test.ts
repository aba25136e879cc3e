import { describe, it, expect, vi } from "vitest";
import { DEFAULT_SECRET_FILE, loadConfig } from "./config";
import { ConfigError } from "./errors";

const baseEnv = {
	TWITCH_CLIENT_ID: "test-client",
	TWITCH_CLIENT_SECRET: "test-secret",
	GAME_NAME: "Minecraft",
	DISCORD_WEBHOOK_URL: "https://discord.test/api/webhooks/1/test-token",
};

const noFile = vi.fn(async (_path: string): Promise<string> => {
	throw new Error("should not be read");
});

describe("loadConfig", () => {
	it("reads settings from the environment with defaults", async () => {
		const config = await loadConfig(baseEnv, noFile);

		expect(config).toEqual({
			clientId: "test-client",
			clientSecret: "test-secret",
			game: { kind: "name", name: "Minecraft" },
			webhookUrl: "https://discord.test/api/webhooks/1/test-token",
			pollIntervalSeconds: 30,
			cacheSize: 10_240,
		});
		expect(noFile).not.toHaveBeenCalled();
	});

	it("prefers a numeric game id and keeps the name for messages", async () => {
		const config = await loadConfig(
			{ ...baseEnv, GAME_ID: "27471", POLL_INTERVAL_SECONDS: "45", DEDUP_CACHE_SIZE: "500" },
			noFile,
		);

		expect(config.game).toEqual({ kind: "id", id: "27471", name: "Minecraft" });
		expect(config.pollIntervalSeconds).toBe(45);
		expect(config.cacheSize).toBe(500);
	});

	it("accepts a game id on its own", async () => {
		const { GAME_NAME: _, ...env } = baseEnv;
		const config = await loadConfig({ ...env, GAME_ID: "27471" }, noFile);

		expect(config.game).toEqual({ kind: "id", id: "27471", name: undefined });
	});

	it("reads and trims the secret from the default file", async () => {
		const { TWITCH_CLIENT_SECRET: _, ...env } = baseEnv;
		const readSecret = vi.fn(async (_path: string) => "  file-secret\n");

		const config = await loadConfig(env, readSecret);

		expect(config.clientSecret).toBe("file-secret");
		expect(readSecret).toHaveBeenCalledWith(DEFAULT_SECRET_FILE);
	});

	it("reads the secret from TWITCH_SECRET_FILE", async () => {
		const { TWITCH_CLIENT_SECRET: _, ...env } = baseEnv;
		const readSecret = vi.fn(async (_path: string) => "file-secret");

		await loadConfig({ ...env, TWITCH_SECRET_FILE: "/etc/relay/secret" }, readSecret);

		expect(readSecret).toHaveBeenCalledWith("/etc/relay/secret");
	});

	it("rejects an empty secret file", async () => {
		const { TWITCH_CLIENT_SECRET: _, ...env } = baseEnv;

		await expect(loadConfig(env, async () => " \n")).rejects.toMatchObject({
			problems: [`No Twitch API secret read from ${DEFAULT_SECRET_FILE}`],
		});
	});

	it("rejects an unreadable secret file", async () => {
		const { TWITCH_CLIENT_SECRET: _, ...env } = baseEnv;

		await expect(
			loadConfig({ ...env, TWITCH_SECRET_FILE: "/missing" }, async () => {
				throw new Error("ENOENT: no such file or directory");
			}),
		).rejects.toMatchObject({
			problems: [
				"Error reading Twitch API secret from /missing: ENOENT: no such file or directory",
			],
		});
	});

	it("requires a client id", async () => {
		const err = await loadConfig({ ...baseEnv, TWITCH_CLIENT_ID: "" }, noFile).catch(
			(e: unknown) => e,
		);

		expect(err).toBeInstanceOf(ConfigError);
		expect(err).toMatchObject({ problems: ["TWITCH_CLIENT_ID is required"] });
	});

	it("requires a webhook URL", async () => {
		const { DISCORD_WEBHOOK_URL: _, ...env } = baseEnv;

		await expect(loadConfig(env, noFile)).rejects.toMatchObject({
			problems: ["DISCORD_WEBHOOK_URL is required"],
		});
	});

	it("requires a game selector", async () => {
		const { GAME_NAME: _, ...env } = baseEnv;

		await expect(loadConfig(env, noFile)).rejects.toMatchObject({
			problems: ["either GAME_ID or GAME_NAME is required"],
		});
	});

	it("rejects a non-numeric game id", async () => {
		await expect(
			loadConfig({ ...baseEnv, GAME_ID: "minecraft" }, noFile),
		).rejects.toMatchObject({ problems: ["GAME_ID must be numeric"] });
	});

	it("rejects a non-positive poll interval", async () => {
		await expect(
			loadConfig({ ...baseEnv, POLL_INTERVAL_SECONDS: "0" }, noFile),
		).rejects.toMatchObject({ problems: ["POLL_INTERVAL_SECONDS must be positive"] });
	});
});
