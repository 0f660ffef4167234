import type { LoggerScope } from './tags'

type LoggerDefinition = {
	scopes: readonly LoggerScope[]
	enabled: boolean
}

const LOGGER_DEFINITIONS = {
	app: {
		scopes: [],
		enabled: true,
	},
	cli: {
		scopes: ['cli'],
		enabled: true,
	},
} as const satisfies Record<string, LoggerDefinition>

type LoggerName = keyof typeof LOGGER_DEFINITIONS

const definitionEntries = Object.entries(LOGGER_DEFINITIONS) as [
	LoggerName,
	LoggerDefinition,
][]

export { LOGGER_DEFINITIONS, definitionEntries }
export type { LoggerDefinition, LoggerName }
