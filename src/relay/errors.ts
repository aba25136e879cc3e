import type { GameRef } from "./types.ts";

export class RelayError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Missing or invalid settings. Fatal before the poll loop starts. */
export class ConfigError extends RelayError {
	constructor(readonly problems: string[]) {
		super(`invalid configuration: ${problems.join("; ")}`);
	}
}

export class AuthError extends RelayError {}

/** HTTP 429 from Twitch. The body is never read. */
export class RateLimitedError extends RelayError {
	constructor() {
		super("HTTP requests are being made too frequently");
	}
}

export class UpstreamError extends RelayError {
	constructor(
		readonly status: number,
		readonly statusText: string,
		readonly bodyPrefix: string,
	) {
		super(
			bodyPrefix
				? `non-OK response ${status} ${statusText}: ${JSON.stringify(bodyPrefix)}`
				: `non-OK response ${status} ${statusText}`,
		);
	}
}

export class DecodeError extends RelayError {}

export class TransportError extends RelayError {}

export class GameNotFoundError extends RelayError {
	constructor(readonly gameName: string) {
		super(`no game found named ${JSON.stringify(gameName)}`);
	}
}

export class AmbiguousGameError extends RelayError {
	constructor(
		readonly gameName: string,
		readonly candidates: GameRef[],
	) {
		super(
			`found ${candidates.length} games matching ${JSON.stringify(gameName)}`,
		);
	}
}

/** The webhook answered in a way its rate-limit contract does not allow. */
export class ProtocolViolationError extends RelayError {}
