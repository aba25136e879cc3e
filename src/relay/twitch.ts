import type { z } from "zod";
import { discardBody, errorMessage } from "../utils.ts";
import {
	AmbiguousGameError,
	AuthError,
	DecodeError,
	GameNotFoundError,
	RateLimitedError,
	TransportError,
	UpstreamError,
} from "./errors.ts";
import {
	GamesResponseSchema,
	StreamsResponseSchema,
	TokenResponseSchema,
	type Broadcast,
	type Fetch,
	type GameRef,
	type HelixStream,
	type Token,
} from "./types.ts";

export const TOKEN_URL = "https://id.twitch.tv/oauth2/token";
export const HELIX_URL = "https://api.twitch.tv/helix";

/** Helix caps a single page of streams at this many. */
export const STREAMS_PAGE_SIZE = 100;

const BODY_PREFIX_LENGTH = 256;

export interface RequestOptions {
	url: string;
	clientId?: string;
	token?: string;
	method: "GET" | "POST";
	params: Record<string, string>;
	fetch?: Fetch;
}

export interface HelixContext {
	clientId: string;
	token: string;
	fetch?: Fetch;
}

/**
 * Sends a form-style request to Twitch and decodes the JSON reply. GET params
 * go in the query string, POST params in the body. Errors are typed, never
 * logged or retried here.
 */
export async function request<S extends z.ZodTypeAny>(
	schema: S,
	options: RequestOptions,
): Promise<z.output<S>> {
	const { method, clientId, token } = options;
	const doFetch = options.fetch ?? fetch;
	const form = new URLSearchParams(options.params).toString();

	const url = method === "GET" ? `${options.url}?${form}` : options.url;
	const headers: Record<string, string> = {
		"Content-Type": "application/x-www-form-urlencoded",
	};
	if (clientId) headers["Client-ID"] = clientId;
	if (token) headers.Authorization = `Bearer ${token}`;

	let response: Response;
	try {
		response = await doFetch(url, {
			method,
			headers,
			body: method === "POST" ? form : undefined,
		});
	} catch (err) {
		throw new TransportError(
			`${method} ${options.url}: ${errorMessage(err)}`,
			{ cause: err },
		);
	}

	if (response.status === 429) {
		await discardBody(response);
		throw new RateLimitedError();
	}

	if (!response.ok) {
		const body = await readPrefix(response, BODY_PREFIX_LENGTH).catch(
			() => "",
		);
		throw new UpstreamError(response.status, response.statusText, body);
	}

	let json: unknown;
	try {
		json = await response.json();
	} catch (err) {
		throw new DecodeError(`unmarshalling response: ${errorMessage(err)}`, {
			cause: err,
		});
	}

	const parsed = schema.safeParse(json);
	if (!parsed.success) {
		throw new DecodeError(
			`unexpected response shape: ${parsed.error.issues
				.map((i) => `${i.path.join(".") || "<root>"} ${i.message}`)
				.join(", ")}`,
			{ cause: parsed.error },
		);
	}
	return parsed.data;
}

/** Reads at most `limit` bytes of the body, then drops the rest unread. */
async function readPrefix(response: Response, limit: number): Promise<string> {
	if (!response.body) return "";
	const reader = response.body.getReader();
	const chunks: Uint8Array[] = [];
	let size = 0;
	try {
		while (size < limit) {
			const { done, value } = await reader.read();
			if (done) break;
			chunks.push(value);
			size += value.byteLength;
		}
	} finally {
		await reader.cancel().catch(() => undefined);
	}
	return Buffer.concat(chunks).subarray(0, limit).toString("utf8");
}

/**
 * Client-credentials exchange. Holds no state; callers decide when to renew.
 */
export async function acquireToken(
	clientId: string,
	clientSecret: string,
	options: { fetch?: Fetch; now?: () => number } = {},
): Promise<Token> {
	const now = options.now ?? Date.now;
	try {
		const data = await request(TokenResponseSchema, {
			url: TOKEN_URL,
			clientId,
			method: "POST",
			params: {
				client_id: clientId,
				client_secret: clientSecret,
				grant_type: "client_credentials",
			},
			fetch: options.fetch,
		});
		return {
			value: data.access_token,
			expiresAt: now() + data.expires_in * 1000,
		};
	} catch (err) {
		throw new AuthError(`requesting OAuth token: ${errorMessage(err)}`, {
			cause: err,
		});
	}
}

/** Maps a game name to its Twitch id. More than one match is an error. */
export async function resolveGame(
	ctx: HelixContext,
	name: string,
): Promise<GameRef> {
	const { data } = await request(GamesResponseSchema, {
		url: `${HELIX_URL}/games`,
		clientId: ctx.clientId,
		token: ctx.token,
		method: "GET",
		params: { name },
		fetch: ctx.fetch,
	});

	switch (data.length) {
		case 0:
			throw new GameNotFoundError(name);
		case 1:
			return { id: data[0].id, name: data[0].name };
		default:
			throw new AmbiguousGameError(
				name,
				data.map((g) => ({ id: g.id, name: g.name })),
			);
	}
}

export async function fetchBroadcasts(
	ctx: HelixContext,
	gameId: string,
): Promise<Broadcast[]> {
	const { data } = await request(StreamsResponseSchema, {
		url: `${HELIX_URL}/streams`,
		clientId: ctx.clientId,
		token: ctx.token,
		method: "GET",
		params: { game_id: gameId, first: String(STREAMS_PAGE_SIZE) },
		fetch: ctx.fetch,
	});
	return data.map(toBroadcast);
}

function toBroadcast(stream: HelixStream): Broadcast {
	return {
		id: stream.id,
		broadcasterName: stream.user_name,
		broadcasterLogin: stream.user_login || stream.user_name.toLowerCase(),
		title: stream.title,
		language: stream.language,
	};
}
