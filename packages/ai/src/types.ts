import type { GenericSchema } from 'valibot'

// ============================================================================
// Usage & finish reasons
// ============================================================================

/** Token counts reported by the vendor for one response, or summed over a run. */
export interface Usage {
	input: number
	output: number
	cacheRead: number
	cacheWrite: number
	/** Reasoning tokens, when the vendor reports them separately. */
	reasoning: number
	totalTokens: number
}

export type FinishReason =
	| 'stop'
	| 'length'
	| 'tool-calls'
	| 'content-filter'
	| 'error'
	| 'other'
	| 'unknown'

// ============================================================================
// Content blocks
// ============================================================================

export interface TextContent {
	type: 'text'
	text: string
}

export interface ReasoningContent {
	type: 'reasoning'
	text: string
}

/** A completed tool call. `input` is the raw argument text as streamed. */
export interface ToolCallContent {
	type: 'toolCall'
	id: string
	name: string
	input: string
}

export type ToolErrorKind =
	| 'invalid-input'
	| 'not-found'
	| 'tool-error'
	| 'timeout'
	| 'cancelled'

export type ToolOutput =
	| { type: 'text'; text: string }
	| { type: 'error'; kind: ToolErrorKind; message: string }

// ============================================================================
// Messages
// ============================================================================

export interface UserMessage {
	role: 'user'
	content: TextContent[]
	timestamp: number
}

export interface AssistantMessage {
	role: 'assistant'
	content: (TextContent | ReasoningContent | ToolCallContent)[]
	finishReason: FinishReason
	usage: Usage
	timestamp: number
}

export interface ToolResultMessage {
	role: 'toolResult'
	toolCallId: string
	toolName: string
	output: ToolOutput
	timestamp: number
}

export type Message = UserMessage | AssistantMessage | ToolResultMessage

// ============================================================================
// Tools as seen by the model
// ============================================================================

/** What the transport needs to advertise a tool to the model. */
export interface ToolDescriptor {
	name: string
	description: string
	parameters: GenericSchema
}
