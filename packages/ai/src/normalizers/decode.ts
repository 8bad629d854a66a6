import type { GenericSchema, InferOutput } from 'valibot'
import { ChunkDecodeError } from '../errors'
import { validateAgainstSchema } from '../validate'

/** Decode a raw chunk (object or JSON text) and check it against `schema`. */
export function decodeChunk<TSchema extends GenericSchema>(
	vendor: string,
	schema: TSchema,
	raw: unknown
): InferOutput<TSchema> {
	let value = raw
	if (typeof raw === 'string') {
		try {
			value = JSON.parse(raw)
		} catch (error) {
			throw new ChunkDecodeError(vendor, 'chunk is not valid JSON', { cause: error })
		}
	}

	const result = validateAgainstSchema(value, schema)
	if (!result.success) {
		throw new ChunkDecodeError(vendor, `unexpected chunk shape (${result.error.message})`, {
			cause: result.error
		})
	}
	return result.value
}
