/**
 * Bounded least-recently-used memo table.
 *
 * Statements with unsafe substitutions are recompiled for every distinct set of
 * substituted values; the compiled forms are kept here so repeated calls with
 * the same values skip interpolation, parsing and translation.
 */
export class StatementCache<V>
{
	private readonly entries = new Map<string, V>();

	/**
	 * @param maxEntries Entries kept before the least recently used one is evicted; 0 disables caching
	 */
	constructor(readonly maxEntries = 64)
	{
	}

	get size(): number
	{
		return this.entries.size;
	}

	get(key: string): V | undefined
	{
		const value = this.entries.get(key);
		if (value !== undefined)
		{
			// Map iteration order is insertion order, so re-inserting marks the entry as most recent
			this.entries.delete(key);
			this.entries.set(key, value);
		}
		return value;
	}

	set(key: string, value: V): void
	{
		if (this.maxEntries <= 0) return;

		this.entries.delete(key);
		this.entries.set(key, value);
		while (this.entries.size > this.maxEntries)
		{
			const oldest = this.entries.keys().next();
			if (oldest.done) break;
			this.entries.delete(oldest.value);
		}
	}

	/**
	 * Returns the cached value for `key`, computing and storing it on a miss.
	 */
	getOrCompute(key: string, compute: () => V): V
	{
		const cached = this.get(key);
		if (cached !== undefined) return cached;

		const value = compute();
		this.set(key, value);
		return value;
	}

	clear(): void
	{
		this.entries.clear();
	}
}
