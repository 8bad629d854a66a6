import type {
	AssistantMessage,
	FinishReason,
	Message,
	ModelTransport,
	StreamEvent,
	StreamEventType,
	ToolCallContent,
	ToolResultMessage,
	Usage,
} from "@strand/ai";
import type { GenericSchema, InferOutput } from "valibot";

// ============================================================================
// Tools
// ============================================================================

export interface ToolResponse {
	content: string;
	/** Report a failure to the model without throwing. */
	isError?: boolean;
}

export interface AgentTool<TParameters extends GenericSchema = GenericSchema> {
	name: string;
	description: string;
	parameters: TParameters;
	execute(
		toolCallId: string,
		params: InferOutput<TParameters>,
		signal: AbortSignal,
	): Promise<ToolResponse>;
}

// ============================================================================
// Observers
// ============================================================================

/** Returning `"stop"` from an observer ends the run after the current step. */
export type ObserverVerdict = "stop" | void;

export type EventObserver<TEvent extends StreamEvent = StreamEvent> = (
	event: TEvent,
) => ObserverVerdict;

/** One optional callback per event kind. */
export type EventObservers = {
	[K in StreamEventType]?: EventObserver<Extract<StreamEvent, { type: K }>>;
};

// ============================================================================
// Steps & runs
// ============================================================================

export type StepOutcome = "finish" | "tool-calls-pending" | "error";

export interface AgentStep {
	/** 1-based */
	index: number;
	events: StreamEvent[];
	toolCalls: ToolCallContent[];
	toolResults: ToolResultMessage[];
	message: AssistantMessage;
	finishReason: FinishReason;
	usage: Usage;
	outcome: StepOutcome;
}

export type TerminalReason =
	| "finished"
	| "max-steps"
	| "cancelled"
	| "errored"
	| "stopped";

export interface AgentRunResult {
	/** History, prompt and every fully applied step. */
	conversation: Message[];
	steps: AgentStep[];
	reason: TerminalReason;
	/** First fatal error, when `reason` is `"errored"`. */
	error?: Error;
	/** Summed over all steps. */
	usage: Usage;
}

// ============================================================================
// Run configuration
// ============================================================================

export interface AgentRunConfig {
	transport: ModelTransport;
	systemPrompt?: string;
	tools?: readonly AgentTool[];
	/** Upper bound on model calls. Defaults to `STRAND_MAX_STEPS`. */
	maxSteps?: number;
	observers?: EventObservers;
	/** Catch-all observer, called after the per-kind one. */
	onEvent?: EventObserver;
	signal?: AbortSignal;
	/** Deadline for the whole run. Defaults to `STRAND_RUN_TIMEOUT_MS`. */
	timeoutMs?: number;
	/** Per tool invocation. Defaults to `STRAND_TOOL_TIMEOUT_MS`. */
	toolTimeoutMs?: number;
	/** Earlier turns to send ahead of the prompt. */
	history?: readonly Message[];
}
