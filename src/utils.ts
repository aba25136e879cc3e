interface StreamChannel {
	broadcasterLogin: string;
}

/** setTimeout fires at once for any delay above this. */
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

export const getStreamUrl = (channel: StreamChannel): string => {
	// A display-name fallback may carry upper case or spaces
	const login = channel.broadcasterLogin.toLowerCase();
	return `https://twitch.tv/${encodeURIComponent(login)}`;
};

export const sleep = async (ms: number): Promise<void> => {
	let remaining = ms;
	do {
		const chunk = Math.min(remaining, MAX_TIMEOUT_MS);
		await new Promise((resolve) => setTimeout(resolve, chunk));
		remaining -= chunk;
	} while (remaining > 0);
};

/** Releases the connection behind a response whose body is not needed. */
export const discardBody = async (response: Response): Promise<void> => {
	await response.body?.cancel().catch(() => undefined);
};

export const errorMessage = (err: unknown): string =>
	err instanceof Error ? err.message : String(err);
