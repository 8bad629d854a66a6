import { JsonParseError } from './errors'
import { repairJson } from './json-repair'

/**
 * - `undefined`: empty or whitespace-only input
 * - `successful`: parsed as-is
 * - `repaired`: parsed after `repairJson`
 * - `failed`: neither
 */
export type ParseState = 'undefined' | 'successful' | 'repaired' | 'failed'

export type RecoverResult =
	| { state: 'undefined'; value: undefined }
	| { state: 'successful' | 'repaired'; value: unknown }
	| { state: 'failed'; value: undefined; error: JsonParseError }

function parseStrict(text: string): { ok: true; value: unknown } | { ok: false } {
	try {
		return { ok: true, value: JSON.parse(text) }
	} catch (error) {
		if (error instanceof SyntaxError) return { ok: false }
		throw error
	}
}

/**
 * Best-effort parse of possibly incomplete JSON, e.g. tool-call arguments
 * that are still streaming or a truncated structured response.
 */
export function recoverJson(text: string): RecoverResult {
	if (text.trim() === '') {
		return { state: 'undefined', value: undefined }
	}

	const strict = parseStrict(text)
	if (strict.ok) {
		return { state: 'successful', value: strict.value }
	}

	try {
		return { state: 'repaired', value: JSON.parse(repairJson(text)) }
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error)
		return {
			state: 'failed',
			value: undefined,
			error: new JsonParseError(`could not recover JSON: ${message}`, { cause: error })
		}
	}
}
