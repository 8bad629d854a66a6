/**
 * Conversation message helpers.
 */

import { createUsage } from '@strand/ai'
import type {
	AssistantMessage,
	FinishReason,
	Message,
	ReasoningContent,
	StreamEvent,
	TextContent,
	ToolCallContent,
	ToolOutput,
	ToolResultMessage,
	Usage,
	UserMessage
} from '@strand/ai'

export function userMessage(text: string): UserMessage {
	return { role: 'user', content: [{ type: 'text', text }], timestamp: Date.now() }
}

export function toolResultMessage(call: ToolCallContent, output: ToolOutput): ToolResultMessage {
	return {
		role: 'toolResult',
		toolCallId: call.id,
		toolName: call.name,
		output,
		timestamp: Date.now()
	}
}

/** Text a transport can send back to the model for a tool result. */
export function toolOutputText(output: ToolOutput): string {
	return output.type === 'text' ? output.text : `Error (${output.kind}): ${output.message}`
}

/** Concatenated text content of a message. Reasoning is left out. */
export function messageText(message: Message): string {
	switch (message.role) {
		case 'user':
			return message.content.map((c) => c.text).join('')
		case 'assistant':
			return message.content
				.filter((c): c is TextContent => c.type === 'text')
				.map((c) => c.text)
				.join('')
		case 'toolResult':
			return toolOutputText(message.output)
	}
}

// ============================================================================
// Assistant message assembly
// ============================================================================

/**
 * Folds one response's events into an `AssistantMessage`. Content keeps
 * block order; a tool call is added only once its `tool-call-end` arrives.
 */
export class AssistantMessageBuilder {
	private readonly content: AssistantMessage['content'] = []
	private readonly open = new Map<string, TextContent | ReasoningContent>()
	private readonly calls: ToolCallContent[] = []
	private finishReason: FinishReason = 'unknown'
	private usage: Usage = createUsage()

	add(event: StreamEvent): void {
		switch (event.type) {
			case 'text-delta':
				this.block(event.id, 'text').text += event.delta
				break
			case 'reasoning-start':
				this.block(event.id, 'reasoning')
				break
			case 'reasoning-delta':
				this.block(event.id, 'reasoning').text += event.delta
				break
			case 'tool-call-end': {
				const call: ToolCallContent = {
					type: 'toolCall',
					id: event.id,
					name: event.toolName,
					input: event.input
				}
				this.calls.push(call)
				this.content.push(call)
				break
			}
			case 'finish':
				this.finishReason = event.finishReason
				this.usage = event.usage
				break
		}
	}

	/** Completed tool calls, in the order they completed. */
	get toolCalls(): readonly ToolCallContent[] {
		return this.calls
	}

	get text(): string {
		return this.content
			.filter((c): c is TextContent => c.type === 'text')
			.map((c) => c.text)
			.join('')
	}

	build(): AssistantMessage {
		return {
			role: 'assistant',
			content: this.content.map((c) => ({ ...c })),
			finishReason: this.finishReason,
			usage: this.usage,
			timestamp: Date.now()
		}
	}

	private block(id: string, type: 'text' | 'reasoning'): TextContent | ReasoningContent {
		const existing = this.open.get(id)
		if (existing) return existing
		const created: TextContent | ReasoningContent =
			type === 'text' ? { type: 'text', text: '' } : { type: 'reasoning', text: '' }
		this.open.set(id, created)
		this.content.push(created)
		return created
	}
}
