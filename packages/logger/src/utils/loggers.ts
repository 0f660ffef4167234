import { consola, type ConsolaInstance } from './consola'
import { definitionEntries, type LoggerName } from './definitions'
import { createForwardingProxy } from './forwarding'
import { buildTag, type LoggerScope } from './tags'
import { ensureLoggerToggleState } from './toggles'

type Logger = ConsolaInstance

const instances = new Map<string, Logger>()

const getLoggerInstance = (tag: string): Logger => {
	ensureLoggerToggleState(tag)

	const existing = instances.get(tag)
	if (existing) return existing

	const proxied = createForwardingProxy(
		consola.withTag(tag),
		tag,
		getLoggerInstance
	)
	instances.set(tag, proxied)
	return proxied
}

const createLogger = (...scopes: LoggerScope[]): Logger =>
	getLoggerInstance(buildTag(scopes))

const loggers: Readonly<Record<LoggerName, Logger>> = Object.freeze(
	Object.fromEntries(
		definitionEntries.map(([name, definition]) => [
			name,
			createLogger(...definition.scopes),
		])
	) as Record<LoggerName, Logger>
)

type LoggerMap = typeof loggers
type LoggerKey = LoggerName

const getLogger = (key: LoggerKey): Logger => loggers[key]

const logger = loggers.app

export { createLogger, getLogger, loggers, logger }
export type { Logger, LoggerKey, LoggerMap }
