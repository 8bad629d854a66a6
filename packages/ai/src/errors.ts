/**
 * Error taxonomy.
 *
 * Fatal to a run: `ModelCallError`, `ChunkDecodeError`,
 * `ProtocolViolationError`. Recoverable through the repair pipeline:
 * `JsonParseError`, `SchemaValidationError`, both surfacing as
 * `NoObjectGeneratedError` when object generation gives up.
 */

import type { FinishReason, Usage } from './types'

// ============================================================================
// JSON & schema
// ============================================================================

/** Text could not be turned into a JSON value, even after repair. */
export class JsonParseError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'JsonParseError'
	}
}

export interface SchemaIssue {
	/** Dot path of the offending field, `$` for the value itself. */
	path: string
	message: string
}

export class SchemaValidationError extends Error {
	readonly issues: SchemaIssue[]

	constructor(issues: SchemaIssue[]) {
		super(
			`validation failed: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ')}`
		)
		this.name = 'SchemaValidationError'
		this.issues = issues
	}
}

type NoObjectGeneratedReason =
	| { parseError: JsonParseError; validationError?: never }
	| { validationError: SchemaValidationError; parseError?: never }

export type NoObjectGeneratedDetails = NoObjectGeneratedReason & {
	rawText: string
	finishReason?: FinishReason
	usage?: Usage
	cause?: unknown
}

/**
 * No valid object could be extracted from model output. Carries the raw
 * text and exactly one of `parseError` / `validationError`.
 */
export class NoObjectGeneratedError extends Error {
	readonly rawText: string
	readonly parseError?: JsonParseError
	readonly validationError?: SchemaValidationError
	finishReason?: FinishReason
	usage?: Usage

	/** Whichever of the two errors applies. */
	readonly reason: JsonParseError | SchemaValidationError

	constructor(details: NoObjectGeneratedDetails) {
		const reason = details.parseError === undefined ? details.validationError : details.parseError
		super(
			`no object generated: ${reason.message}`,
			details.cause === undefined ? undefined : { cause: details.cause }
		)
		this.name = 'NoObjectGeneratedError'
		this.reason = reason
		this.rawText = details.rawText
		this.parseError = details.parseError
		this.validationError = details.validationError
		this.finishReason = details.finishReason
		this.usage = details.usage
	}
}

// ============================================================================
// Stream protocol
// ============================================================================

/** A vendor chunk could not be decoded or did not match the vendor's chunk shape. */
export class ChunkDecodeError extends Error {
	readonly vendor: string

	constructor(vendor: string, message: string, options?: { cause?: unknown }) {
		super(`${vendor}: ${message}`, options)
		this.name = 'ChunkDecodeError'
		this.vendor = vendor
	}
}

/** Content-block bookkeeping was violated (reopened id, delta for an unknown block, ...). */
export class ProtocolViolationError extends Error {
	readonly blockId: string

	constructor(blockId: string, message: string) {
		super(`block ${blockId}: ${message}`)
		this.name = 'ProtocolViolationError'
		this.blockId = blockId
	}
}

/** The vendor reported an error inside the stream. */
export class VendorStreamError extends Error {
	readonly vendor: string
	readonly type?: string

	constructor(vendor: string, message: string, type?: string) {
		super(type ? `${vendor} ${type}: ${message}` : `${vendor}: ${message}`)
		this.name = 'VendorStreamError'
		this.vendor = vendor
		this.type = type
	}
}

// ============================================================================
// Model-call failures
// ============================================================================

export type ErrorClass =
	| 'rate_limit'
	| 'overloaded'
	| 'timeout'
	| 'context_overflow'
	| 'auth'
	| 'billing'
	| 'transient'
	| null

export interface ClassifiedError {
	errorClass: ErrorClass
	/** Whether the transport's retry layer may try again */
	retryable: boolean
	message: string
	statusCode?: number
}

type ErrorPattern = RegExp | string

const ERROR_PATTERNS = {
	contextOverflow: [
		/context length exceeded/i,
		/maximum context length/i,
		/prompt is too long/i,
		/exceeds the context window/i,
		/request_too_large/i
	],
	rateLimit: [/rate[_ ]limit|too many requests|\b429\b/i, 'quota exceeded', 'resource_exhausted'],
	overloaded: [/overloaded_error/i, 'overloaded'],
	billing: [/\bhttp\s*402\b/i, 'payment required', 'insufficient credits', 'insufficient balance'],
	timeout: ['timeout', 'timed out', 'deadline exceeded'],
	auth: [/invalid[_ ]?api[_ ]?key/i, 'unauthorized', 'forbidden', 'authentication', /\b40[13]\b/]
} satisfies Record<string, ErrorPattern[]>

const TRANSIENT_HTTP_ERROR_CODES = new Set([429, 500, 502, 503, 504, 521, 522, 523, 524, 529])

const HTTP_STATUS_PREFIX_RE = /^(?:http\s*)?(\d{3})\s*[:\s]/i

function matches(message: string, patterns: readonly ErrorPattern[]): boolean {
	if (!message) return false
	const lower = message.toLowerCase()
	return patterns.some((pattern) =>
		pattern instanceof RegExp ? pattern.test(lower) : lower.includes(pattern)
	)
}

export function isTransientHttpError(statusOrMessage: number | string): boolean {
	if (typeof statusOrMessage === 'number') {
		return TRANSIENT_HTTP_ERROR_CODES.has(statusOrMessage)
	}
	const match = HTTP_STATUS_PREFIX_RE.exec(statusOrMessage)
	return match ? TRANSIENT_HTTP_ERROR_CODES.has(Number.parseInt(match[1], 10)) : false
}

/** Classify an error message. Order matters: the first family that matches wins. */
export function classifyErrorMessage(message: string): ErrorClass {
	if (!message) return null
	if (isTransientHttpError(message)) return 'transient'
	if (matches(message, ERROR_PATTERNS.contextOverflow)) return 'context_overflow'
	if (matches(message, ERROR_PATTERNS.rateLimit)) return 'rate_limit'
	if (matches(message, ERROR_PATTERNS.overloaded)) return 'overloaded'
	if (matches(message, ERROR_PATTERNS.billing)) return 'billing'
	if (matches(message, ERROR_PATTERNS.timeout)) return 'timeout'
	if (matches(message, ERROR_PATTERNS.auth)) return 'auth'
	return null
}

function readStatus(error: object): number | undefined {
	if ('status' in error && typeof error.status === 'number') return error.status
	if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode
	return undefined
}

/**
 * Classify an error from any source: SDK errors with a `status`, plain
 * `Error`s, strings, or unknown shapes.
 */
export function classifyError(error: unknown): ClassifiedError {
	let message: string
	let statusCode: number | undefined

	if (typeof error === 'string') {
		message = error
	} else if (error instanceof Error) {
		message = error.message
		statusCode = readStatus(error)
	} else if (error !== null && typeof error === 'object') {
		message = 'message' in error && typeof error.message === 'string' ? error.message : String(error)
		statusCode = readStatus(error)
	} else {
		message = String(error)
	}

	let errorClass: ErrorClass = null
	if (statusCode !== undefined) {
		if (statusCode === 429) errorClass = 'rate_limit'
		else if (statusCode === 401 || statusCode === 403) errorClass = 'auth'
		else if (statusCode === 402) errorClass = 'billing'
		else if (TRANSIENT_HTTP_ERROR_CODES.has(statusCode)) errorClass = 'transient'
	}
	if (errorClass === null) {
		errorClass = classifyErrorMessage(message)
	}

	const retryable =
		errorClass === 'rate_limit' ||
		errorClass === 'overloaded' ||
		errorClass === 'timeout' ||
		errorClass === 'transient'

	return { errorClass, retryable, message, statusCode }
}

/** The transport failed to produce (or finish) a model response. */
export class ModelCallError extends Error {
	readonly errorClass: ErrorClass
	readonly retryable: boolean
	readonly statusCode?: number

	constructor(cause: unknown) {
		const classified = classifyError(cause)
		super(`model call failed: ${classified.message}`, { cause })
		this.name = 'ModelCallError'
		this.errorClass = classified.errorClass
		this.retryable = classified.retryable
		this.statusCode = classified.statusCode
	}
}
