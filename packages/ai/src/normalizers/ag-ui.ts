/**
 * AG-UI protocol events (`RUN_*`, `TEXT_MESSAGE_*`, `TOOL_CALL_*`, `STEP_*`).
 *
 * Reasoning comes through `STEP_FINISHED` events carrying a `delta`; a
 * `STEP_STARTED` begins a new reasoning block. As with OpenAI-compatible
 * streams, reasoning is closed when text or a tool call appears. A
 * `TOOL_CALL_END` that carries a `result` reports a tool that already ran
 * upstream; its block is dropped without a `tool-call-end`. Unknown event
 * types are skipped.
 */

import * as v from 'valibot'
import { VendorStreamError } from '../errors'
import type { FinishReason } from '../types'
import { createUsage } from '../usage'
import type { BlockEmitter } from './block-emitter'
import { decodeChunk } from './decode'
import type { VendorAdapter } from './types'

const AgUiEnvelopeSchema = v.looseObject({ type: v.string() })

const AgUiEventSchema = v.variant('type', [
	v.looseObject({ type: v.literal('RUN_STARTED') }),
	v.looseObject({ type: v.literal('TEXT_MESSAGE_START') }),
	v.looseObject({ type: v.literal('TEXT_MESSAGE_CONTENT'), delta: v.string() }),
	v.looseObject({ type: v.literal('TEXT_MESSAGE_END') }),
	v.looseObject({ type: v.literal('STEP_STARTED') }),
	v.looseObject({ type: v.literal('STEP_FINISHED'), delta: v.optional(v.string(), '') }),
	v.looseObject({
		type: v.literal('TOOL_CALL_START'),
		toolCallId: v.string(),
		toolName: v.string()
	}),
	v.looseObject({ type: v.literal('TOOL_CALL_ARGS'), toolCallId: v.string(), delta: v.string() }),
	v.looseObject({
		type: v.literal('TOOL_CALL_END'),
		toolCallId: v.string(),
		input: v.optional(v.unknown()),
		result: v.optional(v.unknown())
	}),
	v.looseObject({
		type: v.literal('RUN_FINISHED'),
		finishReason: v.nullish(v.string()),
		usage: v.nullish(
			v.looseObject({
				promptTokens: v.nullish(v.number()),
				completionTokens: v.nullish(v.number()),
				totalTokens: v.nullish(v.number())
			})
		)
	}),
	v.looseObject({
		type: v.literal('RUN_ERROR'),
		error: v.nullish(v.looseObject({ message: v.nullish(v.string()), code: v.nullish(v.string()) }))
	})
])

const KNOWN_EVENTS = new Set<string>(AgUiEventSchema.options.map((option) => option.entries.type.literal))

function mapFinishReason(reason: string | null | undefined): FinishReason {
	switch (reason) {
		case 'stop':
			return 'stop'
		case 'length':
			return 'length'
		case 'tool_calls':
			return 'tool-calls'
		case 'content_filter':
			return 'content-filter'
		case null:
		case undefined:
			return 'unknown'
		default:
			return 'other'
	}
}

export class AgUiAdapter implements VendorAdapter<typeof AgUiEnvelopeSchema> {
	readonly vendor = 'ag-ui'
	readonly schema = AgUiEnvelopeSchema

	handle(envelope: v.InferOutput<typeof AgUiEnvelopeSchema>, out: BlockEmitter): void {
		if (!KNOWN_EVENTS.has(envelope.type)) return

		const event = decodeChunk(this.vendor, AgUiEventSchema, envelope)
		switch (event.type) {
			case 'RUN_STARTED':
			case 'TEXT_MESSAGE_START':
				break
			case 'TEXT_MESSAGE_CONTENT':
				out.text(event.delta)
				break
			case 'TEXT_MESSAGE_END':
				out.closeCurrent()
				break
			case 'STEP_STARTED':
				out.closeCurrentReasoning()
				break
			case 'STEP_FINISHED':
				out.reasoning(event.delta)
				break
			case 'TOOL_CALL_START':
				out.closeCurrent()
				out.open(event.toolCallId, 'tool-call', event.toolName)
				break
			case 'TOOL_CALL_ARGS':
				if (event.delta) out.append(event.toolCallId, event.delta)
				break
			case 'TOOL_CALL_END':
				if (event.result !== undefined) {
					out.discard(event.toolCallId)
					break
				}
				if (event.input !== undefined && !out.hasInput(event.toolCallId)) {
					out.append(event.toolCallId, JSON.stringify(event.input))
				}
				out.close(event.toolCallId)
				break
			case 'RUN_FINISHED':
				out.finish(
					mapFinishReason(event.finishReason),
					createUsage({
						input: event.usage?.promptTokens ?? 0,
						output: event.usage?.completionTokens ?? 0,
						totalTokens: event.usage?.totalTokens ?? undefined
					})
				)
				break
			case 'RUN_ERROR':
				throw new VendorStreamError(
					this.vendor,
					event.error?.message ?? 'unknown error',
					event.error?.code ?? undefined
				)
		}
	}

	end(out: BlockEmitter): void {
		out.finish('unknown', createUsage())
	}
}
