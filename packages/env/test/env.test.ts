import { describe, expect, test } from 'vitest'
import * as v from 'valibot'
import { parseEnv } from '../src/index'

describe('parseEnv', () => {
	test('applies defaults when nothing is set', () => {
		expect(parseEnv({})).toEqual({
			STRAND_MAX_STEPS: 10,
			STRAND_TOOL_TIMEOUT_MS: undefined,
			STRAND_RUN_TIMEOUT_MS: undefined
		})
	})

	test('converts numeric strings', () => {
		const parsed = parseEnv({
			STRAND_MAX_STEPS: '3',
			STRAND_TOOL_TIMEOUT_MS: ' 2500 ',
			STRAND_RUN_TIMEOUT_MS: '60000'
		})
		expect(parsed.STRAND_MAX_STEPS).toBe(3)
		expect(parsed.STRAND_TOOL_TIMEOUT_MS).toBe(2500)
		expect(parsed.STRAND_RUN_TIMEOUT_MS).toBe(60000)
	})

	test('treats empty strings as unset', () => {
		expect(parseEnv({ STRAND_MAX_STEPS: '' }).STRAND_MAX_STEPS).toBe(10)
	})

	test('rejects malformed values', () => {
		expect(() => parseEnv({ STRAND_MAX_STEPS: 'many' })).toThrow(v.ValiError)
		expect(() => parseEnv({ STRAND_MAX_STEPS: '0' })).toThrow(v.ValiError)
		expect(() => parseEnv({ STRAND_TOOL_TIMEOUT_MS: '1.5' })).toThrow(v.ValiError)
	})
})
