import type { GenericSchema } from 'valibot'
import type { ModelStreamEvent } from '../events'
import { BlockEmitter } from './block-emitter'
import { decodeChunk } from './decode'
import type { StreamNormalizer, Vendor, VendorAdapter } from './types'

/** Shared decode/terminate logic around a vendor adapter. */
export class VendorStreamNormalizer<TSchema extends GenericSchema> implements StreamNormalizer {
	private readonly out = new BlockEmitter()

	constructor(private readonly adapter: VendorAdapter<TSchema>) {}

	get vendor(): Vendor {
		return this.adapter.vendor
	}

	get terminated(): boolean {
		return this.out.terminated
	}

	normalize(rawChunk: unknown): ModelStreamEvent[] {
		return this.out.collect(() => {
			if (typeof rawChunk === 'string') {
				const payload = rawChunk.trim()
				if (payload === '') return
				if (payload === this.adapter.doneSentinel) {
					this.adapter.end(this.out)
					return
				}
			}
			this.adapter.handle(decodeChunk(this.adapter.vendor, this.adapter.schema, rawChunk), this.out)
		})
	}

	flush(): ModelStreamEvent[] {
		return this.out.collect(() => this.adapter.end(this.out))
	}
}
