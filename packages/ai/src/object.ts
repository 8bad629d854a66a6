import type { GenericSchema, InferOutput } from 'valibot'
import { type JsonParseError, NoObjectGeneratedError, type SchemaValidationError } from './errors'
import { recoverJson } from './partial-json'
import { validateAgainstSchema } from './validate'

export type ObjectResult<T> =
	| { success: true; value: T }
	| { success: false; error: NoObjectGeneratedError }

/**
 * Caller-supplied second chance: receives the text and the reason it was
 * rejected, returns replacement text. Called at most once per parse.
 */
export type RepairTextFunction = (
	text: string,
	error: JsonParseError | SchemaValidationError
) => string | Promise<string>

/** Recover JSON from `text`, then validate it. */
export function parseAndValidate<TSchema extends GenericSchema>(
	text: string,
	schema: TSchema
): ObjectResult<InferOutput<TSchema>> {
	const recovered = recoverJson(text)
	if (recovered.state === 'failed') {
		return {
			success: false,
			error: new NoObjectGeneratedError({ rawText: text, parseError: recovered.error })
		}
	}

	const validated = validateAgainstSchema(recovered.value, schema)
	if (!validated.success) {
		return {
			success: false,
			error: new NoObjectGeneratedError({ rawText: text, validationError: validated.error })
		}
	}
	return validated
}

/**
 * Like `parseAndValidate`, but on failure hands the text to `repair` once
 * and parses its answer. A second failure is reported as-is. If `repair`
 * itself throws, the first failure is returned with the thrown value as
 * its cause.
 */
export async function parseAndValidateWithRepair<TSchema extends GenericSchema>(
	text: string,
	schema: TSchema,
	repair: RepairTextFunction
): Promise<ObjectResult<InferOutput<TSchema>>> {
	const first = parseAndValidate(text, schema)
	if (first.success) return first

	let repaired: string
	try {
		repaired = await repair(text, first.error.reason)
	} catch (cause) {
		const { parseError, validationError } = first.error
		const error = parseError
			? new NoObjectGeneratedError({ rawText: text, parseError, cause })
			: validationError
				? new NoObjectGeneratedError({ rawText: text, validationError, cause })
				: first.error
		return { success: false, error }
	}

	return parseAndValidate(repaired, schema)
}
