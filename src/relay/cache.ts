export const DEFAULT_CACHE_SIZE = 10_240;

/**
 * Bounded set of stream ids already announced. A Map keeps insertion order,
 * so re-inserting a key on access makes the first key the least recently used.
 */
export class DedupCache {
	private readonly entries = new Map<string, true>();

	constructor(readonly capacity: number = DEFAULT_CACHE_SIZE) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(
				`cache capacity must be a positive integer, got ${capacity}`,
			);
		}
	}

	get size(): number {
		return this.entries.size;
	}

	/**
	 * Returns true if `id` was already present. Otherwise records it. Either
	 * way `id` becomes the most recently used entry.
	 */
	checkAndMark(id: string): boolean {
		if (this.entries.delete(id)) {
			this.entries.set(id, true);
			return true;
		}

		if (this.entries.size >= this.capacity) {
			const oldest = this.entries.keys().next();
			if (!oldest.done) this.entries.delete(oldest.value);
		}
		this.entries.set(id, true);
		return false;
	}

	has(id: string): boolean {
		return this.entries.has(id);
	}
}
