/**
 * Agent loop: model call → normalized events → tool dispatch → next step.
 *
 * Steps run strictly one after another; the tool calls of one step run
 * concurrently. A step is applied to the conversation all at once (the
 * assistant message, then its tool results in call order) or not at all.
 */

import {
	addUsage,
	createNormalizer,
	createUsage,
	ModelCallError,
	type Message,
	type ModelCallRequest,
	type StreamEvent,
	type UserMessage,
} from "@strand/ai";
import { env } from "@strand/env";
import { abortable, linkSignals } from "@strand/utils";
import { EventStream } from "./event-stream";
import { AssistantMessageBuilder, userMessage } from "./messages";
import { indexTools, toToolDescriptors } from "./tool";
import { dispatchToolCall } from "./tool-dispatch";
import type {
	AgentRunConfig,
	AgentRunResult,
	AgentStep,
	AgentTool,
	EventObservers,
	ObserverVerdict,
	TerminalReason,
} from "./types";

export type AgentPrompt = string | UserMessage;

/**
 * Run the agent to a terminal reason and return the final conversation.
 * Fatal errors and cancellation are reported in the result, not thrown;
 * only an invalid configuration rejects.
 */
export function runAgent(
	prompt: AgentPrompt,
	config: AgentRunConfig,
): Promise<AgentRunResult> {
	return executeRun(prompt, config);
}

/** Like `runAgent`, for callers that consume everything through observers. */
export async function streamAgent(
	prompt: AgentPrompt,
	config: AgentRunConfig,
): Promise<{ reason: TerminalReason; error?: Error }> {
	const { reason, error } = await executeRun(prompt, config);
	return error ? { reason, error } : { reason };
}

/**
 * Async-iterable form: yields every event the observers would see and
 * settles `result()` with the run result.
 */
export function agentEvents(
	prompt: AgentPrompt,
	config: AgentRunConfig,
): EventStream<StreamEvent, AgentRunResult> {
	const stream = new EventStream<StreamEvent, AgentRunResult>();

	void (async () => {
		try {
			stream.end(await executeRun(prompt, config, (event) => stream.push(event)));
		} catch (err) {
			stream.fail(err instanceof Error ? err : new Error(String(err)));
		}
	})();

	return stream;
}

// ============================================================================
// Internal
// ============================================================================

type Sink = (event: StreamEvent) => void;

interface RunContext {
	config: AgentRunConfig;
	tools: ReadonlyMap<string, AgentTool>;
	signal: AbortSignal;
	toolTimeoutMs: number | undefined;
	sink: Sink | undefined;
}

type StepOutcome =
	| { kind: "applied"; step: AgentStep; stopped: boolean }
	| { kind: "errored"; step: AgentStep; error: Error }
	| { kind: "cancelled" };

function resolveMaxSteps(value: number | undefined): number {
	const maxSteps = value ?? env.STRAND_MAX_STEPS;
	if (!Number.isInteger(maxSteps) || maxSteps < 1) {
		throw new RangeError(`maxSteps must be a positive integer, got ${maxSteps}`);
	}
	return maxSteps;
}

async function executeRun(
	prompt: AgentPrompt,
	config: AgentRunConfig,
	sink?: Sink,
): Promise<AgentRunResult> {
	const maxSteps = resolveMaxSteps(config.maxSteps);
	const tools = indexTools(config.tools ?? []);
	const run = linkSignals([config.signal], {
		timeoutMs: config.timeoutMs ?? env.STRAND_RUN_TIMEOUT_MS,
	});
	const ctx: RunContext = {
		config,
		tools,
		signal: run.signal,
		toolTimeoutMs: config.toolTimeoutMs ?? env.STRAND_TOOL_TIMEOUT_MS,
		sink,
	};

	const conversation: Message[] = [
		...(config.history ?? []),
		typeof prompt === "string" ? userMessage(prompt) : prompt,
	];
	const steps: AgentStep[] = [];
	let usage = createUsage();

	const result = (reason: TerminalReason, error?: Error): AgentRunResult =>
		error
			? { conversation, steps, reason, error, usage }
			: { conversation, steps, reason, usage };

	try {
		for (let index = 1; ; index++) {
			if (run.signal.aborted) return result("cancelled");

			const outcome = await runStep(index, conversation, ctx);
			if (outcome.kind === "cancelled") return result("cancelled");

			steps.push(outcome.step);
			usage = addUsage(usage, outcome.step.usage);
			if (outcome.kind === "errored") return result("errored", outcome.error);

			const { step } = outcome;
			conversation.push(step.message, ...step.toolResults);

			if (outcome.stopped) return result("stopped");
			if (step.toolCalls.length === 0) return result("finished");
			if (index >= maxSteps) return result("max-steps");
		}
	} finally {
		run.dispose();
	}
}

async function runStep(
	index: number,
	conversation: readonly Message[],
	ctx: RunContext,
): Promise<StepOutcome> {
	const { config, signal } = ctx;
	const normalizer = createNormalizer(config.transport.vendor);
	const builder = new AssistantMessageBuilder();
	const events: StreamEvent[] = [];
	let stopped = false;
	let fatal: Error | undefined;

	const deliver = (event: StreamEvent) => {
		events.push(event);
		if (stopped) return;
		if (notify(event, ctx) === "stop") stopped = true;
	};

	const consume = (batch: StreamEvent[]) => {
		for (const event of batch) {
			builder.add(event);
			if (event.type === "error") fatal ??= event.error;
			deliver(event);
			if (stopped || fatal) return;
		}
	};

	const request: ModelCallRequest = {
		system: config.systemPrompt,
		messages: [...conversation],
		tools: toToolDescriptors(ctx.tools.values()),
	};

	try {
		for await (const chunk of abortable(config.transport.stream(request, signal), signal)) {
			consume(normalizer.normalize(chunk));
			if (stopped || fatal || normalizer.terminated) break;
		}
		if (!stopped && !fatal && !normalizer.terminated) {
			consume(normalizer.flush());
		}
	} catch (err) {
		if (signal.aborted) return { kind: "cancelled" };
		fatal = new ModelCallError(err);
		deliver({ type: "error", error: fatal });
	}

	if (signal.aborted) return { kind: "cancelled" };

	const message = builder.build();
	const toolCalls = [...builder.toolCalls];

	if (fatal) {
		return {
			kind: "errored",
			error: fatal,
			step: {
				index,
				events,
				toolCalls,
				toolResults: [],
				message,
				finishReason: "error",
				usage: message.usage,
				outcome: "error",
			},
		};
	}

	const toolResults = await Promise.all(
		toolCalls.map(async (call) => {
			const result = await dispatchToolCall(call, ctx.tools, signal, {
				timeoutMs: ctx.toolTimeoutMs,
			});
			if (!signal.aborted) {
				deliver({
					type: "tool-result",
					id: call.id,
					toolName: call.name,
					output: result.output,
				});
			}
			return result;
		}),
	);

	if (signal.aborted) return { kind: "cancelled" };

	deliver({
		type: "step-finish",
		id: `step-${index}`,
		step: index,
		finishReason: message.finishReason,
		usage: message.usage,
		toolCalls: toolCalls.length,
	});

	return {
		kind: "applied",
		stopped,
		step: {
			index,
			events,
			toolCalls,
			toolResults,
			message,
			finishReason: message.finishReason,
			usage: message.usage,
			outcome: toolCalls.length > 0 ? "tool-calls-pending" : "finish",
		},
	};
}

// ============================================================================
// Observer delivery
// ============================================================================

/**
 * Hand one event to the sink, the per-kind observer and `onEvent`.
 * A throwing observer is logged and treated as having returned nothing.
 */
function notify(event: StreamEvent, ctx: RunContext): ObserverVerdict {
	ctx.sink?.(event);
	const byKind = guard(() => observe(ctx.config.observers, event));
	const catchAll = guard(() => ctx.config.onEvent?.(event));
	return byKind === "stop" || catchAll === "stop" ? "stop" : undefined;
}

function guard(fn: () => ObserverVerdict): ObserverVerdict {
	try {
		return fn();
	} catch (err) {
		console.error("[agent-loop] observer error:", err);
		return undefined;
	}
}

function observe(observers: EventObservers | undefined, event: StreamEvent): ObserverVerdict {
	if (!observers) return;
	switch (event.type) {
		case "text-delta":
			return observers["text-delta"]?.(event);
		case "reasoning-start":
			return observers["reasoning-start"]?.(event);
		case "reasoning-delta":
			return observers["reasoning-delta"]?.(event);
		case "reasoning-end":
			return observers["reasoning-end"]?.(event);
		case "tool-call-start":
			return observers["tool-call-start"]?.(event);
		case "tool-call-delta":
			return observers["tool-call-delta"]?.(event);
		case "tool-call-end":
			return observers["tool-call-end"]?.(event);
		case "tool-result":
			return observers["tool-result"]?.(event);
		case "step-finish":
			return observers["step-finish"]?.(event);
		case "error":
			return observers.error?.(event);
		case "finish":
			return observers.finish?.(event);
	}
}
