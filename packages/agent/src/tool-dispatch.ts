/**
 * Tool dispatch. Every failure mode ends up as a `ToolResultMessage` with
 * an error output, so one bad tool call never ends the run.
 */

import {
	parseAndValidate,
	type ToolCallContent,
	type ToolErrorKind,
	type ToolResultMessage
} from '@strand/ai'
import { raceAbort, TimeoutError, withTimeout } from '@strand/utils'
import { toolResultMessage } from './messages'
import type { AgentTool, ToolResponse } from './types'

export interface DispatchOptions {
	/** Per-invocation limit in milliseconds. */
	timeoutMs?: number
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

function invoke(
	tool: AgentTool,
	call: ToolCallContent,
	params: unknown,
	signal: AbortSignal,
	timeoutMs: number | undefined
): Promise<ToolResponse> {
	if (timeoutMs === undefined) {
		return raceAbort(tool.execute(call.id, params, signal), signal)
	}
	return withTimeout(
		(inner) => raceAbort(tool.execute(call.id, params, inner), inner),
		timeoutMs,
		signal
	)
}

/**
 * Validate a completed tool call's arguments and run the tool.
 * Arguments get no repair pass: they parse and validate, or the call fails.
 */
export async function dispatchToolCall(
	call: ToolCallContent,
	tools: ReadonlyMap<string, AgentTool>,
	signal: AbortSignal,
	options: DispatchOptions = {}
): Promise<ToolResultMessage> {
	const fail = (kind: ToolErrorKind, message: string) =>
		toolResultMessage(call, { type: 'error', kind, message })

	const tool = tools.get(call.name)
	if (!tool) {
		return fail('not-found', `Tool "${call.name}" not found`)
	}

	const parsed = parseAndValidate(call.input.trim() === '' ? '{}' : call.input, tool.parameters)
	if (!parsed.success) {
		return fail('invalid-input', `Invalid arguments for "${call.name}": ${parsed.error.reason.message}`)
	}

	if (signal.aborted) {
		return fail('cancelled', 'Tool call cancelled')
	}

	try {
		const response = await invoke(tool, call, parsed.value, signal, options.timeoutMs)
		if (response.isError) {
			return fail('tool-error', response.content)
		}
		return toolResultMessage(call, { type: 'text', text: response.content })
	} catch (error) {
		if (signal.aborted) {
			return fail('cancelled', 'Tool call cancelled')
		}
		if (error instanceof TimeoutError) {
			return fail('timeout', `Tool "${call.name}" timed out after ${error.ms}ms`)
		}
		return fail('tool-error', errorMessage(error))
	}
}
