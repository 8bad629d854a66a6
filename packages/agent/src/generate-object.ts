/**
 * Structured output from a single model call.
 *
 * The object is read from the first completed call of `toolName` when one
 * is configured (the schema is advertised as that tool), otherwise from the
 * response text. Either way it goes through JSON recovery and validation,
 * with one optional caller-supplied repair pass.
 */

import { isDeepStrictEqual } from 'node:util'
import {
	createNormalizer,
	ModelCallError,
	parseAndValidate,
	parseAndValidateWithRepair,
	type AssistantMessage,
	type FinishReason,
	type Message,
	type ModelCallRequest,
	type ModelStreamEvent,
	type ModelTransport,
	type RepairTextFunction,
	type Usage
} from '@strand/ai'
import { abortable, abortReason, linkSignals } from '@strand/utils'
import type { GenericSchema, InferOutput } from 'valibot'
import { EventStream } from './event-stream'
import { AssistantMessageBuilder, userMessage } from './messages'

export interface GenerateObjectOptions<TSchema extends GenericSchema> {
	transport: ModelTransport
	schema: TSchema
	prompt: string
	system?: string
	history?: readonly Message[]
	signal?: AbortSignal
	timeoutMs?: number
	/** Called at most once when the first candidate fails to parse or validate. */
	repair?: RepairTextFunction
	/** Advertise the schema as a tool with this name and read the object from its call. */
	toolName?: string
	toolDescription?: string
}

export interface GenerateObjectResult<T> {
	object: T
	finishReason: FinishReason
	usage: Usage
	/** Candidate text the object was parsed from, before any repair. */
	rawText: string
}

export type ObjectStreamPart<T> =
	| { type: 'text-delta'; delta: string }
	| { type: 'object'; object: T }

/**
 * Make one model call and return the validated object.
 * Throws `NoObjectGeneratedError` when no valid object can be recovered.
 */
export async function generateObject<TSchema extends GenericSchema>(
	options: GenerateObjectOptions<TSchema>
): Promise<GenerateObjectResult<InferOutput<TSchema>>> {
	const run = linkSignals([options.signal], { timeoutMs: options.timeoutMs })
	try {
		const builder = new AssistantMessageBuilder()
		for await (const event of modelEvents(options.transport, buildRequest(options), run.signal)) {
			builder.add(event)
		}
		const message = builder.build()
		return await finishObject(candidateText(builder, options.toolName), message, options)
	} finally {
		run.dispose()
	}
}

/**
 * Streaming form of `generateObject`. Emits an `object` part for every
 * partial candidate that validates and differs from the last one emitted;
 * `result()` settles like `generateObject`.
 */
export function streamObject<TSchema extends GenericSchema>(
	options: GenerateObjectOptions<TSchema>
): EventStream<ObjectStreamPart<InferOutput<TSchema>>, GenerateObjectResult<InferOutput<TSchema>>> {
	const stream = new EventStream<
		ObjectStreamPart<InferOutput<TSchema>>,
		GenerateObjectResult<InferOutput<TSchema>>
	>()

	void (async () => {
		const run = linkSignals([options.signal], { timeoutMs: options.timeoutMs })
		try {
			const builder = new AssistantMessageBuilder()
			const partial = new PartialCandidate(options.toolName)
			let last: { value: InferOutput<TSchema> } | undefined

			for await (const event of modelEvents(options.transport, buildRequest(options), run.signal)) {
				builder.add(event)
				if (event.type === 'text-delta') stream.push({ type: 'text-delta', delta: event.delta })
				if (!partial.add(event)) continue

				const parsed = parseAndValidate(partial.text, options.schema)
				if (!parsed.success) continue
				if (last && isDeepStrictEqual(last.value, parsed.value)) continue
				last = { value: parsed.value }
				stream.push({ type: 'object', object: parsed.value })
			}

			const message = builder.build()
			stream.end(await finishObject(candidateText(builder, options.toolName), message, options))
		} catch (err) {
			stream.fail(err instanceof Error ? err : new Error(String(err)))
		} finally {
			run.dispose()
		}
	})()

	return stream
}

// ============================================================================
// Internal
// ============================================================================

function buildRequest<TSchema extends GenericSchema>(
	options: GenerateObjectOptions<TSchema>
): ModelCallRequest {
	const { toolName } = options
	return {
		system: options.system,
		messages: [...(options.history ?? []), userMessage(options.prompt)],
		tools:
			toolName === undefined
				? []
				: [
						{
							name: toolName,
							description: options.toolDescription ?? 'Respond with the requested object',
							parameters: options.schema
						}
					]
	}
}

function candidateText(builder: AssistantMessageBuilder, toolName: string | undefined): string {
	if (toolName !== undefined) {
		const call = builder.toolCalls.find((c) => c.name === toolName)
		if (call) return call.input
	}
	return builder.text
}

async function finishObject<TSchema extends GenericSchema>(
	rawText: string,
	message: AssistantMessage,
	options: GenerateObjectOptions<TSchema>
): Promise<GenerateObjectResult<InferOutput<TSchema>>> {
	const parsed = options.repair
		? await parseAndValidateWithRepair(rawText, options.schema, options.repair)
		: parseAndValidate(rawText, options.schema)

	if (!parsed.success) {
		parsed.error.finishReason = message.finishReason
		parsed.error.usage = message.usage
		throw parsed.error
	}
	return {
		object: parsed.value,
		finishReason: message.finishReason,
		usage: message.usage,
		rawText
	}
}

/** Running text of the object candidate while the response streams. */
class PartialCandidate {
	text = ''
	private callId: string | undefined

	constructor(private readonly toolName: string | undefined) {}

	/** Returns true when the candidate text changed. */
	add(event: ModelStreamEvent): boolean {
		if (this.toolName === undefined) {
			if (event.type !== 'text-delta') return false
			this.text += event.delta
			return true
		}
		switch (event.type) {
			case 'tool-call-start':
				if (this.callId === undefined && event.toolName === this.toolName) this.callId = event.id
				return false
			case 'tool-call-delta':
				if (event.id !== this.callId) return false
				this.text += event.delta
				return true
			default:
				return false
		}
	}
}

/**
 * Canonical events of one model call. A normalizer `error` event is thrown
 * as-is; transport failures are wrapped in `ModelCallError`.
 */
async function* modelEvents(
	transport: ModelTransport,
	request: ModelCallRequest,
	signal: AbortSignal
): AsyncGenerator<ModelStreamEvent, void, undefined> {
	const normalizer = createNormalizer(transport.vendor)
	const failure = (error: unknown) => (signal.aborted ? abortReason(signal) : new ModelCallError(error))

	let chunks: AsyncGenerator<unknown, void, undefined>
	try {
		chunks = abortable(transport.stream(request, signal), signal)
	} catch (error) {
		throw failure(error)
	}

	try {
		while (!normalizer.terminated) {
			let next: IteratorResult<unknown, void>
			try {
				next = await chunks.next()
			} catch (error) {
				throw failure(error)
			}

			const batch = next.done ? normalizer.flush() : normalizer.normalize(next.value)
			for (const event of batch) {
				if (event.type === 'error') throw event.error
				yield event
			}
			if (next.done) return
		}
	} finally {
		await chunks.return(undefined)
	}
}
