import type { Vendor } from './normalizers'
import type { Message, ToolDescriptor } from './types'

export interface ModelCallRequest {
	system?: string
	messages: Message[]
	tools: ToolDescriptor[]
}

/**
 * The HTTP side of a model call. Implementations own authentication,
 * request shapes and retry; they yield the vendor's raw stream chunks
 * (decoded objects or SSE `data:` payload strings) and must stop when
 * `signal` aborts.
 */
export interface ModelTransport {
	readonly vendor: Vendor
	stream(request: ModelCallRequest, signal: AbortSignal): AsyncIterable<unknown>
}
