import { readFile as readFileFromDisk } from 'node:fs/promises'
import { Lexer } from '@cashlex/lexer'
import { loggers } from '@cashlex/logger'
import { CliUsageError, USAGE, parseCliArgs, type ParsedArgs } from './args'
import { formatSpanRecords, toSpanRecords } from './format'

const log = loggers.cli

export type CliIo = {
	readFile: (path: string) => Promise<string>
	stdout: (text: string) => void
	stderr: (text: string) => void
}

const defaultIo: CliIo = {
	readFile: (path) => readFileFromDisk(path, 'utf8'),
	stdout: (text) => {
		process.stdout.write(text)
	},
	stderr: (text) => {
		process.stderr.write(text)
	},
}

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

/**
 * Run `cash-lex` and resolve to its exit code.
 */
export const runCli = async (
	argv: readonly string[],
	io: CliIo = defaultIo
): Promise<number> => {
	let args: ParsedArgs
	try {
		args = parseCliArgs(argv)
	} catch (error) {
		if (!(error instanceof CliUsageError)) throw error
		io.stderr(`cash-lex: ${error.message}\n\n${USAGE}\n`)
		return EXIT_USAGE
	}

	if (args.help) {
		io.stdout(`${USAGE}\n`)
		return EXIT_OK
	}

	let content: string
	try {
		content = await io.readFile(args.file)
	} catch (error) {
		log.error(`Cannot read ${args.file}:`, error)
		return EXIT_FAILURE
	}

	const lexer = Lexer.create()
	const records = toSpanRecords(content, lexer.classifyDocument(content))
	log.debug(`Classified ${records.length} spans in ${args.file}`)

	io.stdout(formatSpanRecords(records, args.format))
	return EXIT_OK
}
