/**
 * Agent class: stateful wrapper around the agent loop.
 *
 * Keeps the conversation across runs and fans events out to subscribers.
 */

import type { Message, ModelTransport, StreamEvent } from "@strand/ai";
import { runAgent } from "./agent-loop";
import type {
	AgentRunConfig,
	AgentRunResult,
	AgentTool,
	EventObservers,
	TerminalReason,
} from "./types";

export interface AgentOptions {
	transport: ModelTransport;
	systemPrompt?: string;
	tools?: readonly AgentTool[];
	maxSteps?: number;
	/** Per tool invocation, in milliseconds. */
	toolTimeoutMs?: number;
	/** Deadline for each run, in milliseconds. */
	timeoutMs?: number;
	/** Conversation to start from. */
	history?: readonly Message[];
}

export type AgentListener = (event: StreamEvent) => void;

export class Agent {
	private conversation: Message[];
	private listeners = new Set<AgentListener>();
	private abortController?: AbortController;
	/** Bumped by `reset()` so a run it interrupted does not write back. */
	private generation = 0;

	constructor(private readonly options: AgentOptions) {
		this.conversation = [...(options.history ?? [])];
	}

	get messages(): readonly Message[] {
		return this.conversation;
	}

	get isRunning(): boolean {
		return this.abortController !== undefined;
	}

	subscribe(listener: AgentListener): () => void {
		this.listeners.add(listener);
		return () => this.listeners.delete(listener);
	}

	// --- Lifecycle ---

	abort() {
		this.abortController?.abort();
	}

	reset() {
		this.abort();
		this.generation += 1;
		this.conversation = [];
	}

	// --- Prompting ---

	/** Run one prompt to completion and keep the resulting conversation. */
	generate(prompt: string): Promise<AgentRunResult> {
		return this.run(prompt);
	}

	/** Like `generate`, delivering events to `observers` as they arrive. */
	async stream(
		prompt: string,
		observers: EventObservers = {},
	): Promise<{ reason: TerminalReason; error?: Error }> {
		const { reason, error } = await this.run(prompt, observers);
		return error ? { reason, error } : { reason };
	}

	// --- Internal ---

	private async run(prompt: string, observers?: EventObservers): Promise<AgentRunResult> {
		if (this.abortController) {
			throw new Error(
				"Agent is already processing a prompt. Wait for completion or call abort().",
			);
		}

		const controller = new AbortController();
		this.abortController = controller;
		const generation = this.generation;

		const config: AgentRunConfig = {
			transport: this.options.transport,
			systemPrompt: this.options.systemPrompt,
			tools: this.options.tools,
			maxSteps: this.options.maxSteps,
			toolTimeoutMs: this.options.toolTimeoutMs,
			timeoutMs: this.options.timeoutMs,
			history: this.conversation,
			observers,
			onEvent: (event) => this.emit(event),
			signal: controller.signal,
		};

		try {
			const result = await runAgent(prompt, config);
			if (generation === this.generation) this.conversation = result.conversation;
			return result;
		} finally {
			this.abortController = undefined;
		}
	}

	private emit(event: StreamEvent) {
		for (const listener of this.listeners) {
			try {
				listener(event);
			} catch (err) {
				console.error("[agent] listener error:", err);
			}
		}
	}
}
