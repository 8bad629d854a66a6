import * as v from 'valibot'
import { type SchemaIssue, SchemaValidationError } from './errors'

export type ValidationResult<T> =
	| { success: true; value: T }
	| { success: false; error: SchemaValidationError }

function toSchemaIssue(issue: v.BaseIssue<unknown>): SchemaIssue {
	return { path: v.getDotPath(issue) ?? '$', message: issue.message }
}

/**
 * Validate `value` against a valibot schema, collecting every issue.
 * Issues keep valibot's order, which follows the schema's entry order.
 */
export function validateAgainstSchema<TSchema extends v.GenericSchema>(
	value: unknown,
	schema: TSchema
): ValidationResult<v.InferOutput<TSchema>> {
	const result = v.safeParse(schema, value)
	if (result.success) {
		return { success: true, value: result.output }
	}
	return { success: false, error: new SchemaValidationError(result.issues.map(toSchemaIssue)) }
}
