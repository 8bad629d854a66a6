/**
 * Cancellation plumbing shared by the agent loop and tool dispatch.
 *
 * One run owns one `LinkedSignal`: it aborts when any parent aborts or
 * when its deadline passes, and `dispose()` detaches it from the parents
 * so a finished run leaves no listeners or timers behind.
 */

import { TimeoutError } from './timeout'

export interface LinkedSignal {
	signal: AbortSignal
	abort(reason?: unknown): void
	dispose(): void
}

export interface LinkOptions {
	/** Abort automatically after this many milliseconds. */
	timeoutMs?: number
}

export function linkSignals(
	parents: ReadonlyArray<AbortSignal | undefined>,
	options: LinkOptions = {}
): LinkedSignal {
	const controller = new AbortController()
	const cleanups: Array<() => void> = []

	const dispose = () => {
		for (const cleanup of cleanups.splice(0)) cleanup()
	}

	const abort = (reason?: unknown) => {
		if (controller.signal.aborted) return
		controller.abort(reason)
		dispose()
	}

	for (const parent of parents) {
		if (!parent) continue
		if (parent.aborted) {
			abort(parent.reason)
			break
		}
		const onAbort = () => abort(parent.reason)
		parent.addEventListener('abort', onAbort, { once: true })
		cleanups.push(() => parent.removeEventListener('abort', onAbort))
	}

	const { timeoutMs } = options
	if (!controller.signal.aborted && timeoutMs !== undefined) {
		const timer = setTimeout(() => abort(new TimeoutError(timeoutMs)), timeoutMs)
		cleanups.push(() => clearTimeout(timer))
	}

	return { signal: controller.signal, abort, dispose }
}

/** Error used when an operation is cut short by an abort signal without a reason of its own. */
export class AbortError extends Error {
	constructor(message = 'The operation was aborted') {
		super(message)
		this.name = 'AbortError'
	}
}

export function abortReason(signal: AbortSignal): Error {
	const reason: unknown = signal.reason
	if (reason instanceof Error) return reason
	return new AbortError()
}

/**
 * Resolve or reject with `promise`, or reject with the abort reason as
 * soon as `signal` fires, whichever comes first.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
	if (signal.aborted) {
		// The losing promise may still reject later; observe it.
		promise.catch(() => undefined)
		return Promise.reject(abortReason(signal))
	}

	return new Promise<T>((resolve, reject) => {
		const onAbort = () => reject(abortReason(signal))
		signal.addEventListener('abort', onAbort, { once: true })
		promise.then(
			(value) => {
				signal.removeEventListener('abort', onAbort)
				resolve(value)
			},
			(error: unknown) => {
				signal.removeEventListener('abort', onAbort)
				reject(error)
			}
		)
	})
}

/**
 * Iterate `source`, rejecting with the abort reason as soon as `signal`
 * fires, even while the source is blocked waiting for its next item.
 * The source iterator is closed on early exit.
 */
export async function* abortable<T>(
	source: AsyncIterable<T>,
	signal: AbortSignal
): AsyncGenerator<T, void, undefined> {
	const iterator = source[Symbol.asyncIterator]()
	let finished = false
	let pending = false
	try {
		while (true) {
			pending = true
			const next = await raceAbort(iterator.next(), signal)
			pending = false
			if (next.done) {
				finished = true
				return
			}
			yield next.value
		}
	} finally {
		if (!finished && pending) {
			// The source is still suspended in its own await; closing it only
			// settles once that await does, so don't block on it.
			iterator.return?.()?.catch(() => undefined)
		} else if (!finished) {
			await iterator.return?.()
		}
	}
}
