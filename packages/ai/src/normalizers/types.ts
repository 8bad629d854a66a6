import type { GenericSchema, InferOutput } from 'valibot'
import type { ModelStreamEvent } from '../events'
import type { BlockEmitter } from './block-emitter'

/** Wire formats a normalizer exists for. */
export type Vendor = 'anthropic' | 'openai-compatible' | 'ag-ui'

/**
 * Converts one response's raw vendor chunks into canonical events.
 * Instances are single-use: create one per model call.
 */
export interface StreamNormalizer {
	readonly vendor: Vendor
	/** True once an `error` or `finish` event has been emitted. */
	readonly terminated: boolean
	normalize(rawChunk: unknown): ModelStreamEvent[]
	/** Signal end of transport; closes whatever is still open. */
	flush(): ModelStreamEvent[]
}

/** Per-vendor chunk handling plugged into `VendorStreamNormalizer`. */
export interface VendorAdapter<TSchema extends GenericSchema> {
	readonly vendor: Vendor
	readonly schema: TSchema
	/** SSE payload that marks the end of the stream, if the vendor sends one. */
	readonly doneSentinel?: string
	handle(chunk: InferOutput<TSchema>, out: BlockEmitter): void
	/** End of stream without a vendor finish. */
	end(out: BlockEmitter): void
}
