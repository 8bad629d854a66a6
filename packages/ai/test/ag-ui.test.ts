import { describe, expect, test } from 'vitest'
import { ProtocolViolationError, VendorStreamError } from '../src/errors'
import type { ModelStreamEvent } from '../src/events'
import { createNormalizer } from '../src/normalizers'
import { createUsage } from '../src/usage'

function run(chunks: unknown[]): ModelStreamEvent[] {
	const normalizer = createNormalizer('ag-ui')
	return chunks.flatMap((chunk) => normalizer.normalize(chunk))
}

describe('ag-ui normalizer', () => {
	test('maps steps, text and tool calls', () => {
		const events = run([
			{ type: 'RUN_STARTED', runId: 'run_1' },
			{ type: 'STEP_STARTED', stepName: 'thinking' },
			{ type: 'STEP_FINISHED', stepName: 'thinking', delta: 'plan' },
			{ type: 'TEXT_MESSAGE_START', messageId: 'msg_1', role: 'assistant' },
			{ type: 'TEXT_MESSAGE_CONTENT', messageId: 'msg_1', delta: 'Hi' },
			{ type: 'TEXT_MESSAGE_END', messageId: 'msg_1' },
			{ type: 'TOOL_CALL_START', toolCallId: 'tc_1', toolName: 'search' },
			{ type: 'TOOL_CALL_ARGS', toolCallId: 'tc_1', delta: '{"q":"cats"}' },
			{ type: 'TOOL_CALL_END', toolCallId: 'tc_1' },
			{ type: 'TOOL_CALL_END', toolCallId: 'tc_1', result: 'already ran' },
			{
				type: 'RUN_FINISHED',
				runId: 'run_1',
				finishReason: 'tool_calls',
				usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 }
			}
		])
		expect(events).toEqual([
			{ type: 'reasoning-start', id: 'reasoning#1' },
			{ type: 'reasoning-delta', id: 'reasoning#1', delta: 'plan' },
			{ type: 'reasoning-end', id: 'reasoning#1' },
			{ type: 'text-delta', id: 'text#1', delta: 'Hi' },
			{ type: 'tool-call-start', id: 'tc_1', toolName: 'search' },
			{ type: 'tool-call-delta', id: 'tc_1', delta: '{"q":"cats"}' },
			{ type: 'tool-call-end', id: 'tc_1', toolName: 'search', input: '{"q":"cats"}' },
			{
				type: 'finish',
				finishReason: 'tool-calls',
				usage: createUsage({ input: 10, output: 5, totalTokens: 15 })
			}
		])
	})

	test('a new step starts a new reasoning block', () => {
		const events = run([
			{ type: 'STEP_FINISHED', delta: 'a' },
			{ type: 'STEP_STARTED' },
			{ type: 'STEP_FINISHED', delta: 'b' }
		])
		expect(events).toEqual([
			{ type: 'reasoning-start', id: 'reasoning#1' },
			{ type: 'reasoning-delta', id: 'reasoning#1', delta: 'a' },
			{ type: 'reasoning-end', id: 'reasoning#1' },
			{ type: 'reasoning-start', id: 'reasoning#2' },
			{ type: 'reasoning-delta', id: 'reasoning#2', delta: 'b' }
		])
	})

	test('uses the end event input when no arguments streamed', () => {
		const events = run([
			{ type: 'TOOL_CALL_START', toolCallId: 'tc_1', toolName: 'search' },
			{ type: 'TOOL_CALL_END', toolCallId: 'tc_1', input: { q: 'dogs' } }
		])
		expect(events.at(-1)).toEqual({
			type: 'tool-call-end',
			id: 'tc_1',
			toolName: 'search',
			input: '{"q":"dogs"}'
		})
	})

	test('a call that already ran upstream gets no end event', () => {
		const events = run([
			{ type: 'TOOL_CALL_START', toolCallId: 'c1', toolName: 'echo' },
			{ type: 'TOOL_CALL_ARGS', toolCallId: 'c1', delta: '{}' },
			{ type: 'TOOL_CALL_END', toolCallId: 'c1', result: 'done upstream' },
			{ type: 'RUN_FINISHED', finishReason: 'stop' }
		])
		expect(events).toEqual([
			{ type: 'tool-call-start', id: 'c1', toolName: 'echo' },
			{ type: 'tool-call-delta', id: 'c1', delta: '{}' },
			{ type: 'finish', finishReason: 'stop', usage: createUsage() }
		])
	})

	test('vendor ids never collide with generated block ids', () => {
		const events = run([
			{ type: 'TEXT_MESSAGE_CONTENT', messageId: 'msg_1', delta: 'Hi' },
			{ type: 'TOOL_CALL_START', toolCallId: 'text-1', toolName: 'search' },
			{ type: 'TOOL_CALL_END', toolCallId: 'text-1' },
			{ type: 'TOOL_CALL_START', toolCallId: 'text#2', toolName: 'search' },
			{ type: 'TOOL_CALL_END', toolCallId: 'text#2' },
			{ type: 'TEXT_MESSAGE_CONTENT', messageId: 'msg_2', delta: 'Bye' }
		])
		expect(events).toEqual([
			{ type: 'text-delta', id: 'text#1', delta: 'Hi' },
			{ type: 'tool-call-start', id: 'text-1', toolName: 'search' },
			{ type: 'tool-call-end', id: 'text-1', toolName: 'search', input: '' },
			{ type: 'tool-call-start', id: 'text#2', toolName: 'search' },
			{ type: 'tool-call-end', id: 'text#2', toolName: 'search', input: '' },
			{ type: 'text-delta', id: 'text#3', delta: 'Bye' }
		])
	})

	test('ignores unknown event types', () => {
		expect(run([{ type: 'STATE_SNAPSHOT', snapshot: {} }])).toEqual([])
	})

	test('RUN_ERROR becomes an error event', () => {
		const [event] = run([{ type: 'RUN_ERROR', error: { message: 'boom' } }])
		if (event?.type !== 'error') throw new Error('expected an error event')
		expect(event.error).toBeInstanceOf(VendorStreamError)
		expect(event.error.message).toBe('ag-ui: boom')
	})

	test('arguments for an unknown call are a protocol violation', () => {
		const [event] = run([{ type: 'TOOL_CALL_ARGS', toolCallId: 'tc_9', delta: '{}' }])
		if (event?.type !== 'error') throw new Error('expected an error event')
		expect(event.error).toBeInstanceOf(ProtocolViolationError)
		expect(event.error.message).toBe('block tc_9: delta for unknown block')
	})

	test('emits nothing after finish', () => {
		const normalizer = createNormalizer('ag-ui')
		normalizer.normalize({ type: 'RUN_FINISHED', finishReason: 'stop' })
		expect(normalizer.terminated).toBe(true)
		expect(normalizer.normalize({ type: 'TEXT_MESSAGE_CONTENT', delta: 'late' })).toEqual([])
		expect(normalizer.flush()).toEqual([])
	})
})

describe('createNormalizer', () => {
	test('returns an independent instance per call', () => {
		const first = createNormalizer('ag-ui')
		const second = createNormalizer('ag-ui')
		first.normalize({ type: 'RUN_ERROR', error: { message: 'boom' } })
		expect(first.terminated).toBe(true)
		expect(second.terminated).toBe(false)
		expect(second.vendor).toBe('ag-ui')
	})
})
