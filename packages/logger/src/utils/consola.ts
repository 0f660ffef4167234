import { createConsola, type ConsolaInstance } from 'consola'
import { loggerEnv } from '../env'

const consola = createConsola({ fancy: true })

const DEFAULT_LEVEL = loggerEnv.loggerLevel ?? (loggerEnv.isDev ? 4 : 3)
consola.level = DEFAULT_LEVEL

export { consola }
export type { ConsolaInstance }
