import { z } from "zod";

export const TokenResponseSchema = z.object({
	access_token: z.string().min(1),
	// Twitch sends a number, but a numeric string is accepted too
	expires_in: z.union([
		z.number(),
		z.string().regex(/^\d+$/).transform(Number),
	]),
});

export const GamesResponseSchema = z.object({
	data: z.array(
		z.object({
			id: z.string(),
			name: z.string(),
		}),
	),
});

export const StreamsResponseSchema = z.object({
	data: z.array(
		z.object({
			id: z.string(),
			user_name: z.string(),
			user_login: z.string().optional(),
			title: z.string(),
			language: z.string(),
		}),
	),
});

export type HelixStream = z.infer<typeof StreamsResponseSchema>["data"][0];

export interface Broadcast {
	readonly id: string;
	readonly broadcasterName: string;
	readonly broadcasterLogin: string;
	readonly title: string;
	readonly language: string;
}

export interface Token {
	readonly value: string;
	/** Epoch milliseconds. */
	readonly expiresAt: number;
}

export interface GameRef {
	readonly name: string;
	readonly id: string;
}

export type GameSelector =
	| { kind: "id"; id: string; name?: string }
	| { kind: "name"; name: string };

export interface RelayConfig {
	clientId: string;
	clientSecret: string;
	game: GameSelector;
	webhookUrl: string;
	pollIntervalSeconds: number;
	cacheSize: number;
}

export type Logger = Pick<Console, "log" | "warn" | "error">;

export type Fetch = typeof fetch;

export type Sleep = (ms: number) => Promise<void>;
