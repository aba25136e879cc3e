import { errorMessage, sleep } from "../utils.ts";
import { RateLimitedError } from "./errors.ts";
import type { Broadcast, GameRef, Logger, Sleep, Token } from "./types.ts";

/** How long before expiry a token is replaced. */
export const TOKEN_RENEWAL_MARGIN_MS = 60_000;

export interface PollerOptions {
	game: GameRef;
	pollIntervalSeconds: number;
	/** Streams per page; a full page triggers the "may be more" warning. */
	pageSize: number;
	acquireToken: () => Promise<Token>;
	fetchBroadcasts: (token: string, gameId: string) => Promise<Broadcast[]>;
	notify: (gameName: string, broadcasts: Broadcast[]) => unknown;
	/** Token obtained during startup, if any. */
	initialToken?: Token;
	now?: () => number;
	sleep?: Sleep;
	logger?: Logger;
}

export type CycleOutcome =
	| "dispatched"
	| "auth-failed"
	| "rate-limited"
	| "fetch-failed";

export class Poller {
	private token: Token | undefined;
	private warnedAboutMaxStreams = false;
	private stopped = false;
	private readonly now: () => number;
	private readonly sleep: Sleep;
	private readonly logger: Logger;

	constructor(private readonly options: PollerOptions) {
		this.token = options.initialToken;
		this.now = options.now ?? Date.now;
		this.sleep = options.sleep ?? sleep;
		this.logger = options.logger ?? console;
	}

	get currentToken(): Token | undefined {
		return this.token;
	}

	needsToken(): boolean {
		return (
			this.token === undefined ||
			this.now() >= this.token.expiresAt - TOKEN_RENEWAL_MARGIN_MS
		);
	}

	/** One fetch-and-dispatch pass. Never throws. */
	async cycle(): Promise<CycleOutcome> {
		const { game, pageSize } = this.options;

		let token = this.token;
		if (token === undefined || this.needsToken()) {
			try {
				token = await this.options.acquireToken();
			} catch (err) {
				this.logger.error(`Error getting OAuth token: ${errorMessage(err)}`);
				return "auth-failed";
			}
			this.token = token;
			this.logger.log("Got new OAuth token");
		}

		let broadcasts: Broadcast[];
		try {
			broadcasts = await this.options.fetchBroadcasts(token.value, game.id);
		} catch (err) {
			if (err instanceof RateLimitedError) {
				this.logger.warn(
					"Rate-limiting in effect: " +
						"increase the poll interval (POLL_INTERVAL_SECONDS)",
				);
				return "rate-limited";
			}
			this.logger.error(`Error getting streams: ${errorMessage(err)}`);
			return "fetch-failed";
		}

		this.options.notify(game.name, broadcasts);

		if (broadcasts.length >= pageSize && !this.warnedAboutMaxStreams) {
			this.warnedAboutMaxStreams = true;
			this.logger.warn(
				`Got ${broadcasts.length} streams, but there may be more`,
			);
		}
		return "dispatched";
	}

	async run(): Promise<void> {
		const { game, pollIntervalSeconds } = this.options;
		this.logger.log(
			`Polling every ${pollIntervalSeconds}s for ${game.name} (${game.id})`,
		);
		while (!this.stopped) {
			await this.cycle();
			if (this.stopped) break;
			await this.sleep(pollIntervalSeconds * 1000);
		}
	}

	stop(): void {
		this.stopped = true;
	}
}
