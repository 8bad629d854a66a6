/**
 * OpenAI-compatible chat-completion chunks.
 *
 * Covers OpenAI itself plus the servers that mimic it (Ollama, vLLM,
 * LM Studio, Groq, DeepSeek, ...). Reasoning arrives interleaved in
 * `reasoning_content` (or `reasoning`) with no block boundaries, so
 * reasoning is closed as soon as text or a tool call shows up.
 *
 * Tool calls are keyed by `index`; the first fragment of a call must
 * carry its id and function name. Calls are closed on `finish_reason`.
 * The `finish` event waits for `[DONE]` (or end of stream) because usage
 * may come in a trailing chunk with no choices.
 */

import * as v from 'valibot'
import { ProtocolViolationError } from '../errors'
import type { FinishReason, Usage } from '../types'
import { createUsage } from '../usage'
import type { BlockEmitter } from './block-emitter'
import type { VendorAdapter } from './types'

const ToolCallDeltaSchema = v.looseObject({
	index: v.number(),
	id: v.nullish(v.string()),
	function: v.nullish(
		v.looseObject({
			name: v.nullish(v.string()),
			arguments: v.nullish(v.string())
		})
	)
})

const UsageSchema = v.looseObject({
	prompt_tokens: v.nullish(v.number()),
	completion_tokens: v.nullish(v.number()),
	total_tokens: v.nullish(v.number()),
	prompt_tokens_details: v.nullish(v.looseObject({ cached_tokens: v.nullish(v.number()) })),
	completion_tokens_details: v.nullish(v.looseObject({ reasoning_tokens: v.nullish(v.number()) }))
})

const OpenAIChunkSchema = v.looseObject({
	choices: v.optional(
		v.array(
			v.looseObject({
				delta: v.nullish(
					v.looseObject({
						content: v.nullish(v.string()),
						reasoning_content: v.nullish(v.string()),
						reasoning: v.nullish(v.string()),
						tool_calls: v.nullish(v.array(ToolCallDeltaSchema))
					})
				),
				finish_reason: v.nullish(v.string())
			})
		),
		[]
	),
	usage: v.nullish(UsageSchema)
})

type OpenAIChunk = v.InferOutput<typeof OpenAIChunkSchema>

type OpenAIToolCallDelta = v.InferOutput<typeof ToolCallDeltaSchema>

function mapOpenAIFinishReason(reason: string): FinishReason {
	switch (reason) {
		case 'stop':
			return 'stop'
		case 'length':
			return 'length'
		case 'tool_calls':
		case 'function_call':
			return 'tool-calls'
		case 'content_filter':
			return 'content-filter'
		default:
			return 'other'
	}
}

function mapUsage(usage: v.InferOutput<typeof UsageSchema>): Usage {
	return createUsage({
		input: usage.prompt_tokens ?? 0,
		output: usage.completion_tokens ?? 0,
		cacheRead: usage.prompt_tokens_details?.cached_tokens ?? 0,
		reasoning: usage.completion_tokens_details?.reasoning_tokens ?? 0,
		totalTokens: usage.total_tokens ?? undefined
	})
}

export class OpenAICompatibleAdapter implements VendorAdapter<typeof OpenAIChunkSchema> {
	readonly vendor = 'openai-compatible'
	readonly schema = OpenAIChunkSchema
	readonly doneSentinel = '[DONE]'

	/** choice tool-call index → call id */
	private readonly toolCalls = new Map<number, string>()
	private finishReason: FinishReason | undefined
	private usage: Usage = createUsage()

	handle(chunk: OpenAIChunk, out: BlockEmitter): void {
		if (chunk.usage) this.usage = mapUsage(chunk.usage)

		for (const choice of chunk.choices) {
			const delta = choice.delta
			if (delta) {
				const reasoning = delta.reasoning_content ?? delta.reasoning
				if (reasoning) out.reasoning(reasoning)
				if (delta.content) out.text(delta.content)
				for (const call of delta.tool_calls ?? []) {
					this.toolCallDelta(call, out)
				}
			}

			if (choice.finish_reason) {
				this.finishReason = mapOpenAIFinishReason(choice.finish_reason)
				out.closeAll()
				this.toolCalls.clear()
			}
		}
	}

	end(out: BlockEmitter): void {
		out.finish(this.finishReason ?? 'unknown', this.usage)
	}

	private toolCallDelta(call: OpenAIToolCallDelta, out: BlockEmitter): void {
		const known = this.toolCalls.get(call.index)
		let id = known
		if (call.id && call.id !== known) {
			// A new id at a known index starts another call.
			if (known !== undefined && out.isOpen(known)) out.close(known)
			const name = call.function?.name
			if (!name) {
				throw new ProtocolViolationError(call.id, 'tool call started without a function name')
			}
			out.closeCurrent()
			out.open(call.id, 'tool-call', name)
			this.toolCalls.set(call.index, call.id)
			id = call.id
		}
		if (id === undefined) {
			throw new ProtocolViolationError(`#${call.index}`, 'tool call fragment before its id')
		}

		const args = call.function?.arguments
		if (args) out.append(id, args)
	}
}
