/**
 * Lenient JSON repair.
 *
 * Rebuilds the first JSON value found in `text` as compact JSON, closing
 * whatever the input left open: unterminated strings, objects and arrays.
 * Tokens that cannot be completed without guessing (partial literals,
 * keys without a value, a lone `-`) are dropped instead. Output of
 * `repairJson` is already compact JSON, so repairing it again is a no-op.
 */

import { JsonParseError } from './errors'

const LITERALS = ['true', 'false', 'null'] as const

const SIMPLE_ESCAPES = new Set(['"', '\\', '/', 'b', 'f', 'n', 'r', 't'])

const HEX_RE = /^[0-9a-fA-F]{4}$/

const NUMBER_PREFIX_RE = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/

interface ScannedString {
	json: string
	complete: boolean
}

/** Remove a Markdown code fence and any prose in front of the value. */
function extractCandidate(text: string): string {
	let body = text.trim()
	if (body.startsWith('```')) {
		body = body.replace(/^```[\w-]*/, '')
		const close = body.lastIndexOf('```')
		if (close !== -1) body = body.slice(0, close)
		body = body.trim()
	}
	if (startsValue(body)) return body

	const brace = body.indexOf('{')
	const bracket = body.indexOf('[')
	const starts = [brace, bracket].filter((index) => index !== -1)
	if (starts.length === 0) {
		throw new JsonParseError('no JSON value found in text')
	}
	return body.slice(Math.min(...starts))
}

function startsValue(body: string): boolean {
	const first = body.charAt(0)
	if (first === '') return false
	if ('{["-'.includes(first) || (first >= '0' && first <= '9')) return true
	const word = /^[a-z]+/.exec(body)
	return word !== null && LITERALS.some((literal) => literal.startsWith(word[0]))
}

class Repairer {
	private pos = 0

	constructor(private readonly text: string) {}

	run(): string {
		const value = this.value()
		if (value === undefined) {
			throw new JsonParseError('input ends before any complete value')
		}
		return value
	}

	private get done(): boolean {
		return this.pos >= this.text.length
	}

	private peek(): string {
		return this.text.charAt(this.pos)
	}

	private skipWhitespace(): void {
		while (!this.done && /\s/.test(this.peek())) this.pos++
	}

	private unexpected(): JsonParseError {
		return new JsonParseError(
			`unexpected character ${JSON.stringify(this.peek())} at position ${this.pos}`
		)
	}

	/** Returns undefined when the input ends before a value can be completed. */
	private value(): string | undefined {
		this.skipWhitespace()
		if (this.done) return undefined
		const c = this.peek()
		if (c === '{') return this.object()
		if (c === '[') return this.array()
		if (c === '"') return this.string().json
		if (c === '-' || (c >= '0' && c <= '9')) return this.number()
		if (c >= 'a' && c <= 'z') return this.literal()
		throw this.unexpected()
	}

	private object(): string {
		this.pos++
		const members: string[] = []
		while (true) {
			this.skipWhitespace()
			if (this.done) break
			const c = this.peek()
			if (c === '}') {
				this.pos++
				break
			}
			if (c === ',') {
				this.pos++
				continue
			}
			if (c !== '"') throw this.unexpected()

			const key = this.string()
			if (!key.complete) break
			this.skipWhitespace()
			if (this.done) break
			if (this.peek() !== ':') throw this.unexpected()
			this.pos++

			const value = this.value()
			if (value === undefined) break
			members.push(`${key.json}:${value}`)

			this.skipWhitespace()
			if (this.done) break
			if (this.peek() !== ',' && this.peek() !== '}') throw this.unexpected()
		}
		return `{${members.join(',')}}`
	}

	private array(): string {
		this.pos++
		const items: string[] = []
		while (true) {
			this.skipWhitespace()
			if (this.done) break
			const c = this.peek()
			if (c === ']') {
				this.pos++
				break
			}
			if (c === ',') {
				this.pos++
				continue
			}

			const value = this.value()
			if (value === undefined) break
			items.push(value)

			this.skipWhitespace()
			if (this.done) break
			if (this.peek() !== ',' && this.peek() !== ']') throw this.unexpected()
		}
		return `[${items.join(',')}]`
	}

	private string(): ScannedString {
		this.pos++
		let json = '"'
		while (!this.done) {
			const c = this.peek()
			if (c === '"') {
				this.pos++
				return { json: `${json}"`, complete: true }
			}
			if (c === '\\') {
				const escape = this.escape()
				if (escape === undefined) break
				json += escape
				continue
			}
			json += escapeControl(c)
			this.pos++
		}
		return { json: `${json}"`, complete: false }
	}

	/** A partial escape at end of input yields undefined and is dropped. */
	private escape(): string | undefined {
		const next = this.text.charAt(this.pos + 1)
		if (next === '') {
			this.pos = this.text.length
			return undefined
		}
		if (next === 'u') {
			const hex = this.text.slice(this.pos + 2, this.pos + 6)
			if (HEX_RE.test(hex)) {
				this.pos += 6
				return `\\u${hex}`
			}
			if (this.pos + 6 > this.text.length && /^[0-9a-fA-F]*$/.test(hex)) {
				this.pos = this.text.length
				return undefined
			}
			throw new JsonParseError(`invalid unicode escape at position ${this.pos}`)
		}
		if (SIMPLE_ESCAPES.has(next)) {
			this.pos += 2
			return `\\${next}`
		}
		// Unknown escape: keep the backslash as a literal character.
		this.pos++
		return '\\\\'
	}

	private number(): string | undefined {
		const start = this.pos
		while (!this.done && /[0-9eE+\-.]/.test(this.peek())) this.pos++
		const token = this.text.slice(start, this.pos)
		const prefix = NUMBER_PREFIX_RE.exec(token)
		if (prefix === null) {
			if (this.done) return undefined
			throw new JsonParseError(`invalid number ${JSON.stringify(token)} at position ${start}`)
		}
		return prefix[0]
	}

	private literal(): string | undefined {
		const start = this.pos
		while (!this.done && /[a-zA-Z]/.test(this.peek())) this.pos++
		const word = this.text.slice(start, this.pos)
		if (LITERALS.some((literal) => literal === word)) return word
		if (this.done && LITERALS.some((literal) => literal.startsWith(word))) return undefined
		throw new JsonParseError(`invalid literal ${JSON.stringify(word)} at position ${start}`)
	}
}

function escapeControl(c: string): string {
	switch (c) {
		case '\n':
			return '\\n'
		case '\r':
			return '\\r'
		case '\t':
			return '\\t'
		case '\b':
			return '\\b'
		case '\f':
			return '\\f'
	}
	const code = c.charCodeAt(0)
	return code < 0x20 ? `\\u${code.toString(16).padStart(4, '0')}` : c
}

/**
 * Repair possibly truncated or malformed JSON text.
 *
 * Throws `JsonParseError` when the text holds no value or contains a
 * character that cannot start or continue one.
 */
export function repairJson(text: string): string {
	return new Repairer(extractCandidate(text)).run()
}
