import type { ModelCallRequest, ModelTransport, Vendor } from "@strand/ai";

// ============================================================================
// Scripted transports
// ============================================================================

export interface ScriptedTransport extends ModelTransport {
	/** Every request received, in call order. */
	requests: ModelCallRequest[];
}

/** Replays one scripted response per model call. */
export function scriptedTransport(
	responses: unknown[][],
	vendor: Vendor = "ag-ui",
): ScriptedTransport {
	const requests: ModelCallRequest[] = [];
	return {
		vendor,
		requests,
		async *stream(request) {
			requests.push({ ...request, messages: [...request.messages] });
			const chunks = responses[requests.length - 1];
			if (!chunks) throw new Error(`no scripted response for call ${requests.length}`);
			for (const chunk of chunks) {
				yield chunk;
			}
		},
	};
}

export interface StallingTransport extends ScriptedTransport {
	/** Resolves once the transport has sent its chunks and is waiting. */
	stalled: Promise<void>;
}

/** Sends `chunks`, then hangs until the request signal aborts. */
export function stallingTransport(chunks: unknown[]): StallingTransport {
	const requests: ModelCallRequest[] = [];
	let markStalled = () => {};
	const stalled = new Promise<void>((resolve) => {
		markStalled = resolve;
	});
	return {
		vendor: "ag-ui",
		requests,
		stalled,
		async *stream(request, signal) {
			requests.push(request);
			for (const chunk of chunks) {
				yield chunk;
			}
			markStalled();
			await new Promise<void>((resolve) => {
				signal.addEventListener("abort", () => resolve(), { once: true });
			});
		},
	};
}

/** Throws `error` on the first read. */
export function failingTransport(error: unknown): ScriptedTransport {
	const requests: ModelCallRequest[] = [];
	return {
		vendor: "ag-ui",
		requests,
		async *stream(request) {
			requests.push(request);
			throw error;
		},
	};
}

// ============================================================================
// AG-UI responses
// ============================================================================

export function textResponse(text: string): unknown[] {
	return [
		{ type: "RUN_STARTED", runId: "run_1" },
		{ type: "TEXT_MESSAGE_START", messageId: "msg_1", role: "assistant" },
		{ type: "TEXT_MESSAGE_CONTENT", messageId: "msg_1", delta: text },
		{ type: "TEXT_MESSAGE_END", messageId: "msg_1" },
		{
			type: "RUN_FINISHED",
			runId: "run_1",
			finishReason: "stop",
			usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
		},
	];
}

export interface ScriptedCall {
	id: string;
	name: string;
	args: Record<string, unknown>;
}

export function toolCallResponse(calls: ScriptedCall[]): unknown[] {
	return [
		{ type: "RUN_STARTED", runId: "run_1" },
		...calls.flatMap(({ id, name, args }) => [
			{ type: "TOOL_CALL_START", toolCallId: id, toolName: name },
			{ type: "TOOL_CALL_ARGS", toolCallId: id, delta: JSON.stringify(args) },
			{ type: "TOOL_CALL_END", toolCallId: id, input: args },
		]),
		{
			type: "RUN_FINISHED",
			runId: "run_1",
			finishReason: "tool_calls",
			usage: { promptTokens: 10, completionTokens: 15, totalTokens: 25 },
		},
	];
}
