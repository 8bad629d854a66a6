export class TimeoutError extends Error {
	readonly ms: number

	constructor(ms: number) {
		super(`Timed out after ${ms}ms`)
		this.name = 'TimeoutError'
		this.ms = ms
	}
}

/**
 * Race a promise against a timeout. Rejects with `TimeoutError` if the
 * timeout fires first.
 *
 * ```ts
 * const data = await withTimeout(fetchData(), 5000)
 * ```
 *
 * Also accepts a function, which lets you use the internal `AbortSignal`.
 * Pass `parent` to abort that signal early as well:
 *
 * ```ts
 * const data = await withTimeout(
 *   (signal) => fetch(url, { signal }),
 *   5000,
 *   runSignal,
 * )
 * ```
 */
export async function withTimeout<T>(
	input: Promise<T> | ((signal: AbortSignal) => Promise<T>),
	ms: number,
	parent?: AbortSignal
): Promise<T> {
	const controller = new AbortController()
	const onParentAbort = () => controller.abort(parent?.reason)
	if (parent?.aborted) controller.abort(parent.reason)
	else parent?.addEventListener('abort', onParentAbort, { once: true })

	const promise = typeof input === 'function' ? input(controller.signal) : input

	let timer: ReturnType<typeof setTimeout> | undefined

	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			const error = new TimeoutError(ms)
			controller.abort(error)
			reject(error)
		}, ms)
	})

	try {
		return await Promise.race([promise, timeout])
	} finally {
		clearTimeout(timer)
		parent?.removeEventListener('abort', onParentAbort)
	}
}
