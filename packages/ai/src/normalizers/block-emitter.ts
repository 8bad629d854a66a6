import { ChunkDecodeError, ProtocolViolationError, VendorStreamError } from '../errors'
import type { ModelStreamEvent } from '../events'
import type { FinishReason, Usage } from '../types'

export type BlockKind = 'text' | 'reasoning' | 'tool-call'

type BlockState = 'open' | 'accumulating' | 'closed'

interface Block {
	kind: BlockKind
	state: BlockState
	toolName: string
	input: string
}

/**
 * Content-block table and event buffer for one response.
 *
 * Adapters drive blocks through `open → append* → close`; each transition
 * emits the matching canonical event. Text blocks emit only deltas.
 * Violations throw `ProtocolViolationError`, which `collect` turns into
 * a terminal `error` event.
 */
export class BlockEmitter {
	private batch: ModelStreamEvent[] = []
	private readonly blocks = new Map<string, Block>()
	private readonly counters = { text: 0, reasoning: 0 }
	private current: { kind: 'text' | 'reasoning'; id: string } | undefined
	private done = false

	get terminated(): boolean {
		return this.done
	}

	/**
	 * Run `work` and return the events it emitted. Decode, protocol and
	 * vendor errors become a single `error` event.
	 */
	collect(work: () => void): ModelStreamEvent[] {
		try {
			if (!this.done) work()
		} catch (error) {
			if (
				!(error instanceof ChunkDecodeError) &&
				!(error instanceof ProtocolViolationError) &&
				!(error instanceof VendorStreamError)
			) {
				throw error
			}
			this.fail(error)
		}
		const events = this.batch
		this.batch = []
		return events
	}

	/**
	 * Fresh id for a text or reasoning block, such as `text#1`. Vendor ids
	 * do not contain `#`; an id already in the table is skipped.
	 */
	nextId(kind: 'text' | 'reasoning'): string {
		let id: string
		do {
			this.counters[kind] += 1
			id = `${kind}#${this.counters[kind]}`
		} while (this.blocks.has(id))
		return id
	}

	/**
	 * Close a block without emitting anything. Unknown and already closed
	 * ids are ignored.
	 */
	discard(id: string): void {
		const block = this.blocks.get(id)
		if (!block || block.state === 'closed') return
		block.state = 'closed'
		if (this.current?.id === id) this.current = undefined
	}

	isOpen(id: string): boolean {
		const block = this.blocks.get(id)
		return block !== undefined && block.state !== 'closed'
	}

	/** Whether a tool-call block has received any argument text. */
	hasInput(id: string): boolean {
		return (this.blocks.get(id)?.input ?? '') !== ''
	}

	open(id: string, kind: BlockKind, toolName = ''): void {
		const existing = this.blocks.get(id)
		if (existing) {
			throw new ProtocolViolationError(
				id,
				existing.state === 'closed' ? 'reopened after close' : 'started twice'
			)
		}
		this.blocks.set(id, { kind, state: 'open', toolName, input: '' })
		if (kind === 'reasoning') this.push({ type: 'reasoning-start', id })
		else if (kind === 'tool-call') this.push({ type: 'tool-call-start', id, toolName })
	}

	append(id: string, delta: string): void {
		const block = this.live(id, 'delta')
		block.state = 'accumulating'
		switch (block.kind) {
			case 'text':
				this.push({ type: 'text-delta', id, delta })
				break
			case 'reasoning':
				this.push({ type: 'reasoning-delta', id, delta })
				break
			case 'tool-call':
				block.input += delta
				this.push({ type: 'tool-call-delta', id, delta })
				break
		}
	}

	close(id: string): void {
		const block = this.live(id, 'end')
		block.state = 'closed'
		if (this.current?.id === id) this.current = undefined
		if (block.kind === 'reasoning') this.push({ type: 'reasoning-end', id })
		else if (block.kind === 'tool-call') {
			this.push({ type: 'tool-call-end', id, toolName: block.toolName, input: block.input })
		}
	}

	/**
	 * Text without explicit block boundaries. Ends open reasoning first;
	 * empty deltas are dropped.
	 */
	text(delta: string): void {
		this.segment('text', delta)
	}

	/**
	 * Reasoning without explicit block boundaries. The block starts on the
	 * first non-empty token, so an empty block is never emitted.
	 */
	reasoning(delta: string): void {
		this.segment('reasoning', delta)
	}

	/** Close the current implicit text or reasoning block, if any. */
	closeCurrent(): void {
		if (this.current) this.close(this.current.id)
	}

	closeCurrentReasoning(): void {
		if (this.current?.kind === 'reasoning') this.close(this.current.id)
	}

	closeAll(): void {
		for (const [id, block] of this.blocks) {
			if (block.state !== 'closed') this.close(id)
		}
		this.current = undefined
	}

	finish(finishReason: FinishReason, usage: Usage): void {
		this.closeAll()
		this.push({ type: 'finish', finishReason, usage })
		this.done = true
	}

	fail(error: Error): void {
		this.push({ type: 'error', error })
		this.done = true
	}

	private segment(kind: 'text' | 'reasoning', delta: string): void {
		if (delta === '') return
		let current = this.current
		if (current?.kind !== kind) {
			this.closeCurrent()
			current = { kind, id: this.nextId(kind) }
			this.open(current.id, kind)
			this.current = current
		}
		this.append(current.id, delta)
	}

	private live(id: string, action: string): Block {
		const block = this.blocks.get(id)
		if (!block) throw new ProtocolViolationError(id, `${action} for unknown block`)
		if (block.state === 'closed') throw new ProtocolViolationError(id, `${action} after close`)
		return block
	}

	private push(event: ModelStreamEvent): void {
		if (!this.done) this.batch.push(event)
	}
}
