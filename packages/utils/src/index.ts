export { TimeoutError, withTimeout } from './timeout'
export {
	AbortError,
	abortReason,
	abortable,
	linkSignals,
	raceAbort
} from './abort'
export type { LinkOptions, LinkedSignal } from './abort'
