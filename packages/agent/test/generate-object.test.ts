import { describe, expect, test, vi } from "vitest";
import * as v from "valibot";
import {
	ChunkDecodeError,
	JsonParseError,
	ModelCallError,
	NoObjectGeneratedError,
	SchemaValidationError,
	type ModelTransport,
} from "@strand/ai";
import { generateObject, streamObject, type ObjectStreamPart } from "../src/generate-object";
import { failingTransport, scriptedTransport } from "./helpers";

// ============================================================================
// Test helpers
// ============================================================================

const PersonSchema = v.object({ name: v.string(), age: v.number() });

type Person = v.InferOutput<typeof PersonSchema>;

const usageChunk = {
	choices: [{ delta: {}, finish_reason: "stop" }],
	usage: { prompt_tokens: 7, completion_tokens: 3, total_tokens: 10 },
};

/** OpenAI-compatible SSE payloads streaming `parts` as text. */
function textStream(parts: string[]): unknown[] {
	return [
		...parts.map((content) =>
			JSON.stringify({ choices: [{ delta: { content }, finish_reason: null }] }),
		),
		JSON.stringify(usageChunk),
		"[DONE]",
	];
}

function textTransport(parts: string[]) {
	return scriptedTransport([textStream(parts)], "openai-compatible");
}

// ============================================================================
// generateObject
// ============================================================================

describe("generateObject", () => {
	test("parses and validates the response text", async () => {
		const transport = textTransport(['{"name":"Ada",', '"age":36}']);

		const result = await generateObject({
			transport,
			schema: PersonSchema,
			prompt: "Describe Ada",
			system: "Reply with JSON",
		});

		expect(result.object).toEqual({ name: "Ada", age: 36 });
		expect(result.rawText).toBe('{"name":"Ada","age":36}');
		expect(result.finishReason).toBe("stop");
		expect(result.usage).toEqual({
			input: 7,
			output: 3,
			cacheRead: 0,
			cacheWrite: 0,
			reasoning: 0,
			totalTokens: 10,
		});
		expect(transport.requests[0].system).toBe("Reply with JSON");
		expect(transport.requests[0].tools).toEqual([]);
	});

	test("recovers an object from a fenced reply", async () => {
		const transport = textTransport(['```json\n{"name":"Ada","age":36}\n```']);

		const result = await generateObject({ transport, schema: PersonSchema, prompt: "Describe Ada" });
		expect(result.object).toEqual({ name: "Ada", age: 36 });
	});

	test("throws NoObjectGeneratedError with finish reason and usage", async () => {
		const transport = textTransport(['{"name":"Ada"}']);

		const error = await generateObject({
			transport,
			schema: PersonSchema,
			prompt: "Describe Ada",
		}).catch((err: unknown) => err);

		expect(error).toBeInstanceOf(NoObjectGeneratedError);
		if (!(error instanceof NoObjectGeneratedError)) return;
		expect(error.rawText).toBe('{"name":"Ada"}');
		expect(error.validationError).toBeInstanceOf(SchemaValidationError);
		expect(error.parseError).toBeUndefined();
		expect(error.finishReason).toBe("stop");
		expect(error.usage?.totalTokens).toBe(10);
	});

	test("calls repair once and uses its answer", async () => {
		const transport = textTransport(["Sorry, I cannot answer in JSON."]);
		const repair = vi.fn(async () => '{"name":"Ada","age":36}');

		const result = await generateObject({
			transport,
			schema: PersonSchema,
			prompt: "Describe Ada",
			repair,
		});

		expect(result.object).toEqual({ name: "Ada", age: 36 });
		expect(result.rawText).toBe("Sorry, I cannot answer in JSON.");
		expect(repair).toHaveBeenCalledTimes(1);
		expect(repair).toHaveBeenCalledWith(
			"Sorry, I cannot answer in JSON.",
			expect.any(JsonParseError),
		);
	});

	test("reads the object from the named tool call", async () => {
		const transport = scriptedTransport(
			[
				[
					{
						choices: [
							{
								delta: {
									tool_calls: [
										{
											index: 0,
											id: "call_1",
											function: { name: "person", arguments: '{"name":"Ada",' },
										},
									],
								},
								finish_reason: null,
							},
						],
					},
					{
						choices: [
							{
								delta: { tool_calls: [{ index: 0, function: { arguments: '"age":36}' } }] },
								finish_reason: "tool_calls",
							},
						],
					},
				],
			],
			"openai-compatible",
		);

		const result = await generateObject({
			transport,
			schema: PersonSchema,
			prompt: "Describe Ada",
			toolName: "person",
		});

		expect(result.object).toEqual({ name: "Ada", age: 36 });
		expect(result.finishReason).toBe("tool-calls");
		expect(transport.requests[0].tools).toEqual([
			{ name: "person", description: "Respond with the requested object", parameters: PersonSchema },
		]);
	});

	test("wraps transport failures in ModelCallError", async () => {
		await expect(
			generateObject({
				transport: failingTransport(new Error("401 Unauthorized")),
				schema: PersonSchema,
				prompt: "Describe Ada",
			}),
		).rejects.toBeInstanceOf(ModelCallError);
	});

	test("wraps a transport that throws before streaming in ModelCallError", async () => {
		const transport: ModelTransport = {
			vendor: "openai-compatible",
			stream() {
				throw new Error("connection refused");
			},
		};

		const failure = generateObject({ transport, schema: PersonSchema, prompt: "Describe Ada" });

		await expect(failure).rejects.toBeInstanceOf(ModelCallError);
		await expect(failure).rejects.toThrow("model call failed: connection refused");
	});

	test("throws the normalizer's error for an undecodable chunk", async () => {
		const transport = scriptedTransport([["{not json"]], "openai-compatible");

		await expect(
			generateObject({ transport, schema: PersonSchema, prompt: "Describe Ada" }),
		).rejects.toBeInstanceOf(ChunkDecodeError);
	});

	test("rejects with the abort reason when cancelled", async () => {
		const transport = textTransport(['{"name":"Ada","age":36}']);

		await expect(
			generateObject({
				transport,
				schema: PersonSchema,
				prompt: "Describe Ada",
				signal: AbortSignal.abort(new Error("caller gave up")),
			}),
		).rejects.toThrow("caller gave up");
	});
});

// ============================================================================
// streamObject
// ============================================================================

describe("streamObject", () => {
	test("emits each new valid partial object", async () => {
		const stream = streamObject({
			transport: textTransport(['{"name":"A', 'da","age":3', "6}", " "]),
			schema: PersonSchema,
			prompt: "Describe Ada",
		});

		const parts: ObjectStreamPart<Person>[] = [];
		for await (const part of stream) {
			parts.push(part);
		}
		const result = await stream.result();

		expect(parts).toEqual([
			{ type: "text-delta", delta: '{"name":"A' },
			{ type: "text-delta", delta: 'da","age":3' },
			{ type: "object", object: { name: "Ada", age: 3 } },
			{ type: "text-delta", delta: "6}" },
			{ type: "object", object: { name: "Ada", age: 36 } },
			{ type: "text-delta", delta: " " },
		]);
		expect(result.object).toEqual({ name: "Ada", age: 36 });
	});

	test("rejects result() when the final text holds no valid object", async () => {
		const stream = streamObject({
			transport: textTransport(['{"name":', '"Ada"}']),
			schema: PersonSchema,
			prompt: "Describe Ada",
		});

		const parts: ObjectStreamPart<Person>[] = [];
		for await (const part of stream) {
			parts.push(part);
		}

		expect(parts.every((part) => part.type === "text-delta")).toBe(true);
		await expect(stream.result()).rejects.toBeInstanceOf(NoObjectGeneratedError);
	});
});
