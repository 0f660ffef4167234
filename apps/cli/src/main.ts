#!/usr/bin/env tsx
import { loggers } from '@cashlex/logger'
import { runCli } from './cli'

runCli(process.argv.slice(2))
	.then((code) => {
		process.exitCode = code
	})
	.catch((error: unknown) => {
		loggers.cli.fatal(error)
		process.exitCode = 1
	})
