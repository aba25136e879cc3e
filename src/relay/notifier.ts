import PQueue from "p-queue";
import { z } from "zod";
import { discardBody, errorMessage, sleep } from "../utils.ts";
import type { DedupCache } from "./cache.ts";
import { ProtocolViolationError } from "./errors.ts";
import { describeBroadcast, formatAnnouncement } from "./mapper.ts";
import type { Broadcast, Fetch, Logger, Sleep } from "./types.ts";

const RateLimitBodySchema = z.object({
	retry_after: z.union([z.number(), z.string()]),
});

/**
 * Reads the wait, in milliseconds, out of a Discord 429 body. Anything that is
 * not a non-negative number means the contract changed under us.
 */
export function parseRetryAfter(body: string): number {
	let json: unknown;
	try {
		json = JSON.parse(body);
	} catch (err) {
		throw new ProtocolViolationError(
			`Error parsing Discord rate-limiting message: ${errorMessage(err)}`,
			{ cause: err },
		);
	}

	const parsed = RateLimitBodySchema.safeParse(json);
	if (!parsed.success) {
		throw new ProtocolViolationError(
			`Error parsing Discord rate-limiting message: ${body.slice(0, 256)}`,
			{ cause: parsed.error },
		);
	}

	const raw = parsed.data.retry_after;
	const wait =
		typeof raw === "number"
			? raw
			: /^\d+(\.\d+)?$/.test(raw.trim())
				? Number(raw.trim())
				: Number.NaN;
	if (!Number.isFinite(wait) || wait < 0) {
		throw new ProtocolViolationError(
			`Error parsing Discord rate-limit wait time ${JSON.stringify(raw)}`,
		);
	}
	return Math.ceil(wait);
}

export interface NotifierOptions {
	webhookUrl: string;
	cache: DedupCache;
	/**
	 * Called when the webhook breaks its rate-limit contract. Expected to end
	 * the process.
	 */
	onFatal: (err: ProtocolViolationError) => void;
	fetch?: Fetch;
	sleep?: Sleep;
	logger?: Logger;
}

export class Notifier {
	private readonly webhookUrl: string;
	private readonly cache: DedupCache;
	private readonly onFatal: (err: ProtocolViolationError) => void;
	private readonly fetch: Fetch;
	private readonly sleep: Sleep;
	private readonly logger: Logger;
	// One delivery at a time, across every batch
	private readonly queue = new PQueue({ concurrency: 1 });

	constructor(options: NotifierOptions) {
		this.webhookUrl = options.webhookUrl;
		this.cache = options.cache;
		this.onFatal = options.onFatal;
		this.fetch = options.fetch ?? fetch;
		this.sleep = options.sleep ?? sleep;
		this.logger = options.logger ?? console;
	}

	/**
	 * Queues an announcement for every stream not seen before and returns how
	 * many were queued. Does not wait for delivery.
	 */
	notify(gameName: string, broadcasts: Broadcast[]): number {
		// Mark the whole batch before queueing anything
		const fresh = broadcasts.filter((b) => !this.cache.checkAndMark(b.id));

		for (const broadcast of fresh) {
			this.logger.log(`New stream: ${describeBroadcast(gameName, broadcast)}`);
			const message = formatAnnouncement(gameName, broadcast);
			void this.queue.add(async () => {
				try {
					await this.deliver(broadcast.id, message);
				} catch (err) {
					this.fail(err);
				}
			});
		}
		return fresh.length;
	}

	/** Resolves once every queued delivery has finished. */
	onIdle(): Promise<void> {
		return this.queue.onIdle();
	}

	get pending(): number {
		return this.queue.size + this.queue.pending;
	}

	private async deliver(streamId: string, message: string): Promise<void> {
		const body = new URLSearchParams({ content: message }).toString();
		let wait = 0;

		for (;;) {
			if (wait > 0) await this.sleep(wait);

			let response: Response;
			try {
				response = await this.fetch(this.webhookUrl, {
					method: "POST",
					headers: { "Content-Type": "application/x-www-form-urlencoded" },
					body,
				});
			} catch (err) {
				this.logger.error(
					`Error sending stream ${streamId} to Discord: ${errorMessage(err)}`,
				);
				return;
			}

			if (response.ok) {
				await discardBody(response);
				return;
			}

			if (response.status === 429) {
				wait = parseRetryAfter(await response.text());
				this.logger.warn(
					`Discord rate limit hit sending stream ${streamId}, retrying in ${wait}ms`,
				);
				continue;
			}

			await discardBody(response);
			this.logger.error(
				`Unexpected Discord response: ${response.status} ${response.statusText}`,
			);
			return;
		}
	}

	private fail(err: unknown): void {
		if (err instanceof ProtocolViolationError) {
			this.onFatal(err);
			return;
		}
		this.logger.error(`Delivery failed: ${errorMessage(err)}`);
	}
}
