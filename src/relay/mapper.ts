import { getStreamUrl } from "../utils.ts";
import type { Broadcast, GameRef } from "./types.ts";

const FENCE = "```";

/** The Discord message for one new stream: a code block, then the link. */
export function formatAnnouncement(
	gameName: string,
	broadcast: Broadcast,
): string {
	const lines = [
		"",
		`Game:      ${gameName}`,
		`Streamer:  ${broadcast.broadcasterName}`,
		`Title:     ${JSON.stringify(broadcast.title)}`,
		`Language:  ${broadcast.language}`,
	];
	return `${FENCE}${lines.join("\n")}${FENCE}${getStreamUrl(broadcast)}`;
}

export function describeBroadcast(
	gameName: string,
	broadcast: Broadcast,
): string {
	const user = JSON.stringify(broadcast.broadcasterName);
	const title = JSON.stringify(broadcast.title);
	return (
		`[Game:${gameName}] [ID:${broadcast.id}] ` +
		`[User:${user}] [Title:${title}]`
	);
}

/**
 * Lists every candidate for an ambiguous game name so the user can pick an
 * id and pass it as GAME_ID.
 */
export function formatGameTable(
	gameName: string,
	candidates: GameRef[],
): string {
	const rows: Array<[string, string]> = [
		["ID", "Name"],
		["--", "----"],
		...candidates.map((c): [string, string] => [c.id, c.name]),
	];
	const width = Math.max(...rows.map(([id]) => id.length)) + 2;

	return [
		`Found multiple possible Game IDs for ${gameName}.`,
		...rows.map(([id, name]) => `${id.padEnd(width)}${name}`),
	].join("\n");
}
