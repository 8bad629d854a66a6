/**
 * Push-based async iterable with a final result.
 *
 * Producers `push()` events and settle with `end(result)` or `fail(error)`.
 * Consumers iterate with `for await...of` and/or await `result()`.
 * Iteration ends normally either way; only `result()` rejects.
 */
export class EventStream<T, R> implements AsyncIterable<T> {
	private queue: T[] = []
	private readIndex = 0
	private wake: ((value: IteratorResult<T>) => void) | null = null
	private outcome: { ok: true; value: R } | { ok: false; error: Error } | undefined
	private waiters: Array<{ resolve: (value: R) => void; reject: (error: Error) => void }> = []
	private iterating = false

	get settled(): boolean {
		return this.outcome !== undefined
	}

	push(event: T): void {
		if (this.outcome) return

		if (this.wake) {
			const wake = this.wake
			this.wake = null
			wake({ value: event, done: false })
		} else {
			this.queue.push(event)
		}
	}

	end(result: R): void {
		this.settle({ ok: true, value: result })
	}

	fail(error: Error): void {
		this.settle({ ok: false, error })
	}

	/**
	 * Final result. The promise is created on demand, so a stream that fails
	 * without anyone asking for its result leaves no rejection unobserved.
	 */
	result(): Promise<R> {
		return new Promise<R>((resolve, reject) => {
			if (!this.outcome) {
				this.waiters.push({ resolve, reject })
			} else if (this.outcome.ok) {
				resolve(this.outcome.value)
			} else {
				reject(this.outcome.error)
			}
		})
	}

	async *[Symbol.asyncIterator](): AsyncIterator<T> {
		if (this.iterating) {
			throw new Error('EventStream does not support concurrent consumers')
		}
		this.iterating = true
		try {
			while (true) {
				if (this.readIndex < this.queue.length) {
					const event = this.queue[this.readIndex++]
					// Compact when >50% consumed and enough items read
					if (this.readIndex > 64 && this.readIndex > this.queue.length / 2) {
						this.queue = this.queue.slice(this.readIndex)
						this.readIndex = 0
					}
					yield event
				} else if (this.outcome) {
					return
				} else {
					const next = await new Promise<IteratorResult<T>>((resolve) => {
						this.wake = resolve
					})
					if (next.done) return
					yield next.value
				}
			}
		} finally {
			this.iterating = false
		}
	}

	private settle(outcome: { ok: true; value: R } | { ok: false; error: Error }): void {
		if (this.outcome) return
		this.outcome = outcome

		for (const waiter of this.waiters.splice(0)) {
			if (outcome.ok) waiter.resolve(outcome.value)
			else waiter.reject(outcome.error)
		}

		if (this.wake) {
			const wake = this.wake
			this.wake = null
			wake({ done: true, value: undefined })
		}
	}
}
