import { describe, expect, test } from 'vitest'
import { ProtocolViolationError, VendorStreamError } from '../src/errors'
import type { ModelStreamEvent } from '../src/events'
import { createNormalizer } from '../src/normalizers'
import { createUsage } from '../src/usage'

function run(chunks: unknown[]): ModelStreamEvent[] {
	const normalizer = createNormalizer('anthropic')
	return chunks.flatMap((chunk) => normalizer.normalize(chunk))
}

const blockStart = (index: number, block: Record<string, unknown>) => ({
	type: 'content_block_start',
	index,
	content_block: block
})
const blockDelta = (index: number, delta: Record<string, unknown>) => ({
	type: 'content_block_delta',
	index,
	delta
})
const blockStop = (index: number) => ({ type: 'content_block_stop', index })

describe('anthropic normalizer', () => {
	test('maps a thinking, text and tool_use response', () => {
		const events = run([
			{ type: 'message_start', message: { id: 'msg_1', usage: { input_tokens: 25, output_tokens: 1 } } },
			blockStart(0, { type: 'thinking', thinking: '' }),
			blockDelta(0, { type: 'thinking_delta', thinking: 'Let me think' }),
			blockDelta(0, { type: 'signature_delta', signature: 'sig' }),
			blockStop(0),
			blockStart(1, { type: 'text', text: '' }),
			{ type: 'ping' },
			blockDelta(1, { type: 'text_delta', text: 'Sunny' }),
			blockStop(1),
			blockStart(2, { type: 'tool_use', id: 'toolu_1', name: 'lookup', input: {} }),
			blockDelta(2, { type: 'input_json_delta', partial_json: '{"q":' }),
			blockDelta(2, { type: 'input_json_delta', partial_json: '"x"}' }),
			blockStop(2),
			{ type: 'message_delta', delta: { stop_reason: 'tool_use' }, usage: { output_tokens: 40 } },
			{ type: 'message_stop' }
		])
		expect(events).toEqual([
			{ type: 'reasoning-start', id: 'reasoning#1' },
			{ type: 'reasoning-delta', id: 'reasoning#1', delta: 'Let me think' },
			{ type: 'reasoning-end', id: 'reasoning#1' },
			{ type: 'text-delta', id: 'text#1', delta: 'Sunny' },
			{ type: 'tool-call-start', id: 'toolu_1', toolName: 'lookup' },
			{ type: 'tool-call-delta', id: 'toolu_1', delta: '{"q":' },
			{ type: 'tool-call-delta', id: 'toolu_1', delta: '"x"}' },
			{ type: 'tool-call-end', id: 'toolu_1', toolName: 'lookup', input: '{"q":"x"}' },
			{
				type: 'finish',
				finishReason: 'tool-calls',
				usage: createUsage({ input: 25, output: 40 })
			}
		])
	})

	test('thinking without tokens emits nothing', () => {
		const events = run([
			blockStart(0, { type: 'redacted_thinking', data: 'opaque' }),
			blockStop(0),
			blockStart(1, { type: 'thinking', thinking: '' }),
			blockDelta(1, { type: 'thinking_delta', thinking: '' }),
			blockStop(1)
		])
		expect(events).toEqual([])
	})

	test('skips unknown block types and their deltas', () => {
		const events = run([
			blockStart(0, { type: 'server_tool_use', id: 'srv_1', name: 'web_search' }),
			blockDelta(0, { type: 'input_json_delta', partial_json: '{}' }),
			blockStop(0),
			blockStart(1, { type: 'text', text: 'ok' })
		])
		expect(events).toEqual([{ type: 'text-delta', id: 'text#1', delta: 'ok' }])
	})

	test('maps stop reasons', () => {
		const finish = (reason: string) =>
			run([{ type: 'message_delta', delta: { stop_reason: reason } }, { type: 'message_stop' }]).at(-1)
		expect(finish('end_turn')).toMatchObject({ finishReason: 'stop' })
		expect(finish('max_tokens')).toMatchObject({ finishReason: 'length' })
		expect(finish('refusal')).toMatchObject({ finishReason: 'content-filter' })
		expect(finish('pause_turn')).toMatchObject({ finishReason: 'other' })
	})

	test('an error event ends the stream', () => {
		const normalizer = createNormalizer('anthropic')
		const [event] = normalizer.normalize({
			type: 'error',
			error: { type: 'overloaded_error', message: 'Overloaded' }
		})
		if (event?.type !== 'error') throw new Error('expected an error event')
		expect(event.error).toBeInstanceOf(VendorStreamError)
		expect(event.error.message).toBe('anthropic overloaded_error: Overloaded')
		expect(normalizer.terminated).toBe(true)
	})

	test('a delta for an unknown index is a protocol violation', () => {
		const [event] = run([blockDelta(3, { type: 'text_delta', text: 'x' })])
		if (event?.type !== 'error') throw new Error('expected an error event')
		expect(event.error).toBeInstanceOf(ProtocolViolationError)
		expect(event.error.message).toBe('block #3: event for unknown block index')
	})

	test('starting an index twice is a protocol violation', () => {
		const events = run([blockStart(0, { type: 'text', text: '' }), blockStart(0, { type: 'text', text: '' })])
		expect(events).toHaveLength(1)
		expect(events[0]).toMatchObject({ type: 'error' })
	})

	test('a delta of the wrong kind is a protocol violation', () => {
		const [event] = run([
			blockStart(0, { type: 'text', text: '' }),
			blockDelta(0, { type: 'input_json_delta', partial_json: '{}' })
		])
		if (event?.type !== 'error') throw new Error('expected an error event')
		expect(event.error.message).toBe('block #0: input_json_delta for a text block')
	})

	test('flush without message_stop closes open blocks', () => {
		const normalizer = createNormalizer('anthropic')
		normalizer.normalize(blockStart(0, { type: 'tool_use', id: 'toolu_1', name: 'lookup' }))
		expect(normalizer.flush()).toEqual([
			{ type: 'tool-call-end', id: 'toolu_1', toolName: 'lookup', input: '' },
			{ type: 'finish', finishReason: 'unknown', usage: createUsage() }
		])
	})
})
