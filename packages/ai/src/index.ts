export type {
	AssistantMessage,
	FinishReason,
	Message,
	ReasoningContent,
	TextContent,
	ToolCallContent,
	ToolDescriptor,
	ToolErrorKind,
	ToolOutput,
	ToolResultMessage,
	Usage,
	UserMessage
} from './types'

export type {
	ErrorEvent,
	FinishEvent,
	ModelStreamEvent,
	ReasoningDeltaEvent,
	ReasoningEndEvent,
	ReasoningStartEvent,
	StepFinishEvent,
	StreamEvent,
	StreamEventType,
	TextDeltaEvent,
	ToolCallDeltaEvent,
	ToolCallEndEvent,
	ToolCallStartEvent,
	ToolResultEvent
} from './events'

export {
	ChunkDecodeError,
	classifyError,
	classifyErrorMessage,
	isTransientHttpError,
	JsonParseError,
	ModelCallError,
	NoObjectGeneratedError,
	ProtocolViolationError,
	SchemaValidationError,
	VendorStreamError,
	type ClassifiedError,
	type ErrorClass,
	type NoObjectGeneratedDetails,
	type SchemaIssue
} from './errors'

export { addUsage, createUsage } from './usage'
export { repairJson } from './json-repair'
export { recoverJson, type ParseState, type RecoverResult } from './partial-json'
export { validateAgainstSchema, type ValidationResult } from './validate'
export {
	parseAndValidate,
	parseAndValidateWithRepair,
	type ObjectResult,
	type RepairTextFunction
} from './object'
export type { ModelCallRequest, ModelTransport } from './transport'
export {
	AgUiAdapter,
	AnthropicAdapter,
	BlockEmitter,
	createNormalizer,
	OpenAICompatibleAdapter,
	VendorStreamNormalizer,
	type StreamNormalizer,
	type Vendor,
	type VendorAdapter
} from './normalizers'
