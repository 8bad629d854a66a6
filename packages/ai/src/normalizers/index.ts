import { AgUiAdapter } from './ag-ui'
import { AnthropicAdapter } from './anthropic'
import { VendorStreamNormalizer } from './normalizer'
import { OpenAICompatibleAdapter } from './openai-compatible'
import type { StreamNormalizer, Vendor } from './types'

export { BlockEmitter, type BlockKind } from './block-emitter'
export { VendorStreamNormalizer } from './normalizer'
export { AgUiAdapter } from './ag-ui'
export { AnthropicAdapter } from './anthropic'
export { OpenAICompatibleAdapter } from './openai-compatible'
export type { StreamNormalizer, Vendor, VendorAdapter } from './types'

/** A fresh normalizer for one response from `vendor`. */
export function createNormalizer(vendor: Vendor): StreamNormalizer {
	switch (vendor) {
		case 'anthropic':
			return new VendorStreamNormalizer(new AnthropicAdapter())
		case 'openai-compatible':
			return new VendorStreamNormalizer(new OpenAICompatibleAdapter())
		case 'ag-ui':
			return new VendorStreamNormalizer(new AgUiAdapter())
	}
}
