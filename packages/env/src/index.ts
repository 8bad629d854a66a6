import * as v from 'valibot'

// ============================================================================
// Schema
// ============================================================================

const positiveInteger = v.pipe(
	v.string(),
	v.trim(),
	v.digits('must be a whole number'),
	v.transform(Number),
	v.integer(),
	v.minValue(1)
)

const EnvSchema = v.object({
	/** Upper bound on model calls per agent run (default: 10). */
	STRAND_MAX_STEPS: v.optional(positiveInteger, '10'),

	/** Per-invocation tool timeout in milliseconds. Unset means tools run until they settle or the run is cancelled. */
	STRAND_TOOL_TIMEOUT_MS: v.optional(positiveInteger),

	/** Deadline for a whole agent run in milliseconds. */
	STRAND_RUN_TIMEOUT_MS: v.optional(positiveInteger)
})

// ============================================================================
// Parse & export
// ============================================================================

export type Env = v.InferOutput<typeof EnvSchema>

/**
 * Validate an environment record. Empty strings count as unset.
 * Throws a `ValiError` when a variable is malformed.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
	const pick = (key: keyof v.InferInput<typeof EnvSchema>) => {
		const value = source[key]
		return value === undefined || value.trim() === '' ? undefined : value
	}

	return v.parse(EnvSchema, {
		STRAND_MAX_STEPS: pick('STRAND_MAX_STEPS'),
		STRAND_TOOL_TIMEOUT_MS: pick('STRAND_TOOL_TIMEOUT_MS'),
		STRAND_RUN_TIMEOUT_MS: pick('STRAND_RUN_TIMEOUT_MS')
	})
}

/**
 * Validated process environment.
 *
 * Parsed eagerly on first import; throws at startup if a variable is
 * malformed.
 */
export const env: Env = parseEnv(process.env)
