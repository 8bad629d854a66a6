import type { Usage } from './types'

export function createUsage(
	tokens: {
		input?: number
		output?: number
		cacheRead?: number
		cacheWrite?: number
		reasoning?: number
		totalTokens?: number
	} = {}
): Usage {
	const input = tokens.input ?? 0
	const output = tokens.output ?? 0
	return {
		input,
		output,
		cacheRead: tokens.cacheRead ?? 0,
		cacheWrite: tokens.cacheWrite ?? 0,
		reasoning: tokens.reasoning ?? 0,
		totalTokens: tokens.totalTokens ?? input + output
	}
}

/** Sum two usage records field by field. */
export function addUsage(a: Usage, b: Usage): Usage {
	return {
		input: a.input + b.input,
		output: a.output + b.output,
		cacheRead: a.cacheRead + b.cacheRead,
		cacheWrite: a.cacheWrite + b.cacheWrite,
		reasoning: a.reasoning + b.reasoning,
		totalTokens: a.totalTokens + b.totalTokens
	}
}
