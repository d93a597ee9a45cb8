/**
 * Per-key async mutex
 *
 * Callers holding different keys never wait on each other. Each key keeps a
 * promise chain; the entry is dropped once its queue drains.
 */
export class KeyedMutex {
	private tails = new Map<string, Promise<void>>()

	async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve()
		let release: () => void = () => {}
		const current = new Promise<void>(resolve => {
			release = resolve
		})
		const tail = previous.then(() => current)
		this.tails.set(key, tail)

		await previous
		try {
			return await task()
		} finally {
			release()
			if (this.tails.get(key) === tail) this.tails.delete(key)
		}
	}

	/** Number of keys with a holder or waiters. */
	get activeKeys(): number {
		return this.tails.size
	}
}
