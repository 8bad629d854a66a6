/**
 * Anthropic Messages API stream events.
 *
 * Blocks have explicit boundaries (`content_block_start` / `_stop`),
 * keyed by index. Thinking blocks still start lazily: nothing is emitted
 * until the first non-empty `thinking_delta`, so redacted or empty
 * thinking produces no events. Block types this normalizer doesn't know
 * (server tools, citations) are skipped along with their deltas.
 */

import * as v from 'valibot'
import { ProtocolViolationError, VendorStreamError } from '../errors'
import type { FinishReason, Usage } from '../types'
import { createUsage } from '../usage'
import type { BlockEmitter } from './block-emitter'
import { decodeChunk } from './decode'
import type { VendorAdapter } from './types'

const UsageSchema = v.looseObject({
	input_tokens: v.nullish(v.number()),
	output_tokens: v.nullish(v.number()),
	cache_creation_input_tokens: v.nullish(v.number()),
	cache_read_input_tokens: v.nullish(v.number())
})

const TypedSchema = v.looseObject({ type: v.string() })

const AnthropicEventSchema = v.variant('type', [
	v.looseObject({
		type: v.literal('message_start'),
		message: v.looseObject({ usage: v.nullish(UsageSchema) })
	}),
	v.looseObject({
		type: v.literal('content_block_start'),
		index: v.number(),
		content_block: TypedSchema
	}),
	v.looseObject({
		type: v.literal('content_block_delta'),
		index: v.number(),
		delta: TypedSchema
	}),
	v.looseObject({ type: v.literal('content_block_stop'), index: v.number() }),
	v.looseObject({
		type: v.literal('message_delta'),
		delta: v.looseObject({ stop_reason: v.nullish(v.string()) }),
		usage: v.nullish(UsageSchema)
	}),
	v.looseObject({ type: v.literal('message_stop') }),
	v.looseObject({ type: v.literal('ping') }),
	v.looseObject({
		type: v.literal('error'),
		error: v.looseObject({ type: v.optional(v.string()), message: v.string() })
	})
])

type AnthropicEvent = v.InferOutput<typeof AnthropicEventSchema>

const ContentBlockSchema = v.variant('type', [
	v.looseObject({ type: v.literal('text'), text: v.optional(v.string(), '') }),
	v.looseObject({ type: v.literal('thinking'), thinking: v.optional(v.string(), '') }),
	v.looseObject({ type: v.literal('redacted_thinking') }),
	v.looseObject({ type: v.literal('tool_use'), id: v.string(), name: v.string() })
])

const BlockDeltaSchema = v.variant('type', [
	v.looseObject({ type: v.literal('text_delta'), text: v.string() }),
	v.looseObject({ type: v.literal('thinking_delta'), thinking: v.string() }),
	v.looseObject({ type: v.literal('input_json_delta'), partial_json: v.string() }),
	v.looseObject({ type: v.literal('signature_delta') })
])

const KNOWN_BLOCKS = new Set(['text', 'thinking', 'redacted_thinking', 'tool_use'])
const KNOWN_DELTAS = new Set(['text_delta', 'thinking_delta', 'input_json_delta', 'signature_delta'])

type IndexedBlock =
	| { kind: 'text' | 'tool-call'; id: string }
	| { kind: 'reasoning'; id: string; started: boolean }
	| { kind: 'ignored' }

function mismatch(index: number, deltaType: string, kind: string): ProtocolViolationError {
	return new ProtocolViolationError(`#${index}`, `${deltaType} for a ${kind} block`)
}

function mapAnthropicStopReason(reason: string): FinishReason {
	switch (reason) {
		case 'end_turn':
		case 'stop_sequence':
			return 'stop'
		case 'max_tokens':
			return 'length'
		case 'tool_use':
			return 'tool-calls'
		case 'refusal':
			return 'content-filter'
		default:
			return 'other'
	}
}

export class AnthropicAdapter implements VendorAdapter<typeof AnthropicEventSchema> {
	readonly vendor = 'anthropic'
	readonly schema = AnthropicEventSchema

	private readonly indexes = new Map<number, IndexedBlock>()
	private finishReason: FinishReason | undefined
	private usage = { input: 0, output: 0, cacheRead: 0, cacheWrite: 0 }

	handle(event: AnthropicEvent, out: BlockEmitter): void {
		switch (event.type) {
			case 'message_start':
				if (event.message.usage) this.recordUsage(event.message.usage)
				break
			case 'content_block_start':
				this.startBlock(event.index, event.content_block, out)
				break
			case 'content_block_delta':
				this.blockDelta(event.index, event.delta, out)
				break
			case 'content_block_stop': {
				const block = this.block(event.index)
				if (block.kind === 'ignored') break
				if (block.kind === 'reasoning' && !block.started) break
				out.close(block.id)
				break
			}
			case 'message_delta':
				if (event.delta.stop_reason) {
					this.finishReason = mapAnthropicStopReason(event.delta.stop_reason)
				}
				if (event.usage) this.recordUsage(event.usage)
				break
			case 'message_stop':
				this.end(out)
				break
			case 'ping':
				break
			case 'error':
				throw new VendorStreamError(this.vendor, event.error.message, event.error.type)
		}
	}

	end(out: BlockEmitter): void {
		out.finish(this.finishReason ?? 'unknown', this.currentUsage())
	}

	private currentUsage(): Usage {
		return createUsage(this.usage)
	}

	private recordUsage(usage: v.InferOutput<typeof UsageSchema>): void {
		this.usage = {
			input: usage.input_tokens ?? this.usage.input,
			output: usage.output_tokens ?? this.usage.output,
			cacheRead: usage.cache_read_input_tokens ?? this.usage.cacheRead,
			cacheWrite: usage.cache_creation_input_tokens ?? this.usage.cacheWrite
		}
	}

	private block(index: number): IndexedBlock {
		const block = this.indexes.get(index)
		if (!block) throw new ProtocolViolationError(`#${index}`, 'event for unknown block index')
		return block
	}

	private startBlock(index: number, raw: { type: string }, out: BlockEmitter): void {
		if (this.indexes.has(index)) {
			throw new ProtocolViolationError(`#${index}`, 'block index started twice')
		}
		if (!KNOWN_BLOCKS.has(raw.type)) {
			this.indexes.set(index, { kind: 'ignored' })
			return
		}

		const block = decodeChunk(this.vendor, ContentBlockSchema, raw)
		switch (block.type) {
			case 'text': {
				const id = out.nextId('text')
				this.indexes.set(index, { kind: 'text', id })
				out.open(id, 'text')
				if (block.text) out.append(id, block.text)
				break
			}
			case 'thinking':
			case 'redacted_thinking': {
				const entry = { kind: 'reasoning' as const, id: out.nextId('reasoning'), started: false }
				this.indexes.set(index, entry)
				if (block.type === 'thinking') this.thinking(entry, block.thinking, out)
				break
			}
			case 'tool_use':
				this.indexes.set(index, { kind: 'tool-call', id: block.id })
				out.open(block.id, 'tool-call', block.name)
				break
		}
	}

	private blockDelta(index: number, raw: { type: string }, out: BlockEmitter): void {
		const block = this.block(index)
		if (block.kind === 'ignored' || !KNOWN_DELTAS.has(raw.type)) return

		const delta = decodeChunk(this.vendor, BlockDeltaSchema, raw)
		switch (delta.type) {
			case 'text_delta':
				if (block.kind !== 'text') throw mismatch(index, delta.type, block.kind)
				if (delta.text) out.append(block.id, delta.text)
				break
			case 'thinking_delta':
				if (block.kind !== 'reasoning') throw mismatch(index, delta.type, block.kind)
				this.thinking(block, delta.thinking, out)
				break
			case 'input_json_delta':
				if (block.kind !== 'tool-call') throw mismatch(index, delta.type, block.kind)
				if (delta.partial_json) out.append(block.id, delta.partial_json)
				break
			case 'signature_delta':
				break
		}
	}

	private thinking(
		block: { kind: 'reasoning'; id: string; started: boolean },
		text: string,
		out: BlockEmitter
	): void {
		if (text === '') return
		if (!block.started) {
			out.open(block.id, 'reasoning')
			block.started = true
		}
		out.append(block.id, text)
	}
}
