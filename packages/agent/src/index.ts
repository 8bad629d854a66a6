// Core Agent
export { Agent } from './agent'
export type { AgentListener, AgentOptions } from './agent'

// Loop functions
export { agentEvents, runAgent, streamAgent } from './agent-loop'
export type { AgentPrompt } from './agent-loop'

// Structured output
export { generateObject, streamObject } from './generate-object'
export type {
	GenerateObjectOptions,
	GenerateObjectResult,
	ObjectStreamPart
} from './generate-object'

// Event stream
export { EventStream } from './event-stream'

// Messages
export {
	AssistantMessageBuilder,
	messageText,
	toolOutputText,
	toolResultMessage,
	userMessage
} from './messages'

// Tools
export { defineTool, indexTools, toToolDescriptors } from './tool'
export { dispatchToolCall } from './tool-dispatch'
export type { DispatchOptions } from './tool-dispatch'

// Types
export type {
	// Tools
	ToolResponse,
	AgentTool,

	// Observers
	ObserverVerdict,
	EventObserver,
	EventObservers,

	// Steps & runs
	StepOutcome,
	AgentStep,
	TerminalReason,
	AgentRunResult,
	AgentRunConfig
} from './types'
