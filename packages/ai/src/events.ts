/**
 * Canonical stream events.
 *
 * Every vendor stream is normalized into this one protocol. All events
 * except `finish` and `error` carry the id of the content block they
 * belong to; for a given id, start precedes every delta, which precede
 * end. Events of different blocks may interleave.
 */

import type { FinishReason, ToolOutput, Usage } from './types'

export interface TextDeltaEvent {
	type: 'text-delta'
	id: string
	delta: string
}

export interface ReasoningStartEvent {
	type: 'reasoning-start'
	id: string
}

export interface ReasoningDeltaEvent {
	type: 'reasoning-delta'
	id: string
	delta: string
}

export interface ReasoningEndEvent {
	type: 'reasoning-end'
	id: string
}

export interface ToolCallStartEvent {
	type: 'tool-call-start'
	id: string
	toolName: string
}

export interface ToolCallDeltaEvent {
	type: 'tool-call-delta'
	id: string
	delta: string
}

export interface ToolCallEndEvent {
	type: 'tool-call-end'
	id: string
	toolName: string
	/** Accumulated argument text. */
	input: string
}

export interface ToolResultEvent {
	type: 'tool-result'
	/** Tool call id this result answers. */
	id: string
	toolName: string
	output: ToolOutput
}

export interface StepFinishEvent {
	type: 'step-finish'
	id: string
	step: number
	finishReason: FinishReason
	usage: Usage
	toolCalls: number
}

export interface ErrorEvent {
	type: 'error'
	error: Error
}

export interface FinishEvent {
	type: 'finish'
	finishReason: FinishReason
	usage: Usage
}

export type StreamEvent =
	| TextDeltaEvent
	| ReasoningStartEvent
	| ReasoningDeltaEvent
	| ReasoningEndEvent
	| ToolCallStartEvent
	| ToolCallDeltaEvent
	| ToolCallEndEvent
	| ToolResultEvent
	| StepFinishEvent
	| ErrorEvent
	| FinishEvent

export type StreamEventType = StreamEvent['type']

/** Events a normalizer produces from vendor chunks. */
export type ModelStreamEvent = Exclude<StreamEvent, ToolResultEvent | StepFinishEvent>
