import { describe, it, expect } from "vitest";
import { describeBroadcast, formatAnnouncement, formatGameTable } from "./mapper";
import type { Broadcast } from "./types";

function makeBroadcast(overrides: Partial<Broadcast> = {}): Broadcast {
	return {
		id: "40123456789",
		broadcasterName: "CoolStreamer",
		broadcasterLogin: "coolstreamer",
		title: "Speedrun practice",
		language: "en",
		...overrides,
	};
}

describe("formatAnnouncement", () => {
	it("formats a stream as a code block followed by the channel link", () => {
		const message = formatAnnouncement("Minecraft", makeBroadcast());

		expect(message).toBe(
			[
				"```",
				"Game:      Minecraft",
				"Streamer:  CoolStreamer",
				'Title:     "Speedrun practice"',
				"Language:  en```https://twitch.tv/coolstreamer",
			].join("\n"),
		);
	});

	it("quotes titles containing quotes", () => {
		const message = formatAnnouncement(
			"Minecraft",
			makeBroadcast({ title: 'Building a "castle"' }),
		);

		expect(message).toContain('Title:     "Building a \\"castle\\""\n');
	});

	it("links to the login, not the display name", () => {
		const message = formatAnnouncement(
			"Minecraft",
			makeBroadcast({ broadcasterName: "配信者", broadcasterLogin: "haishinsha" }),
		);

		expect(message.endsWith("```https://twitch.tv/haishinsha")).toBe(true);
		expect(message).toContain("Streamer:  配信者\n");
	});
});

describe("describeBroadcast", () => {
	it("summarises a stream for the log", () => {
		expect(describeBroadcast("Minecraft", makeBroadcast({ title: "Hello" }))).toBe(
			'[Game:Minecraft] [ID:40123456789] [User:"CoolStreamer"] [Title:"Hello"]',
		);
	});
});

describe("formatGameTable", () => {
	it("aligns ids and names in two columns", () => {
		const table = formatGameTable("Portal", [
			{ id: "6187", name: "Portal" },
			{ id: "1234567", name: "Portal 2" },
		]);

		expect(table.split("\n")).toEqual([
			"Found multiple possible Game IDs for Portal.",
			"ID       Name",
			"--       ----",
			"6187     Portal",
			"1234567  Portal 2",
		]);
	});
});
