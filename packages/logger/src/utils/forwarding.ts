import type { ConsolaInstance } from './consola'
import { isLoggerEnabled } from './toggles'

type LoggerFactory = (tag: string) => ConsolaInstance

const FORWARDED_METHODS = new Set([
	'trace',
	'debug',
	'info',
	'log',
	'success',
	'warn',
	'error',
	'fatal',
	'start',
])

type LogForwarderEntry = {
	tag: string
	level: string
	args: unknown[]
}

type LogForwarder = (entry: LogForwarderEntry) => void

let logForwarder: LogForwarder | undefined

const createForwardingProxy = (
	instance: ConsolaInstance,
	tag: string,
	createOrGetLogger: LoggerFactory
): ConsolaInstance => {
	return new Proxy(instance, {
		get(target, prop, receiver) {
			if (prop === 'withTag') {
				return (childTag: unknown) => {
					if (typeof childTag !== 'string') {
						throw new Error(
							`logger.withTag expects a string, received "${typeof childTag}".`
						)
					}
					const normalizedChild = childTag.trim()
					if (!normalizedChild) {
						throw new Error('logger.withTag requires a non-empty tag.')
					}
					return createOrGetLogger(`${tag}:${normalizedChild}`)
				}
			}

			const value: unknown = Reflect.get(target, prop, receiver)
			if (typeof value !== 'function') return value

			if (typeof prop === 'string' && FORWARDED_METHODS.has(prop)) {
				return (...args: unknown[]) => {
					if (!isLoggerEnabled(tag)) {
						return receiver
					}

					const forwarder = logForwarder
					if (forwarder) {
						try {
							forwarder({ tag, level: prop, args })
						} catch (error) {
							// A failing forwarder is detached so it cannot fail every log call
							logForwarder = undefined
							target.warn('Log forwarder threw and was removed:', error)
						}
					}

					return value.apply(target, args)
				}
			}

			return value.bind(target)
		},
	})
}

const setLogForwarder = (forwarder?: LogForwarder) => {
	logForwarder = forwarder
}

export { createForwardingProxy, setLogForwarder }
export type { LogForwarder, LogForwarderEntry }
