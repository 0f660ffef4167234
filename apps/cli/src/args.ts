import { z } from 'zod'

export const OUTPUT_FORMATS = ['text', 'json'] as const

export type OutputFormat = (typeof OUTPUT_FORMATS)[number]

export const USAGE = `Usage: cash-lex [--format text|json] <file>

Classify a cash ledger file and print its highlight spans.

Options:
  -f, --format <format>  output format: text (default) or json
  -h, --help             show this message`

export class CliUsageError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'CliUsageError'
	}
}

const optionsSchema = z.object({
	file: z.string().min(1, 'a ledger file is required'),
	format: z.enum(OUTPUT_FORMATS).default('text'),
})

export type CliOptions = z.infer<typeof optionsSchema>

export type ParsedArgs = { help: true } | ({ help: false } & CliOptions)

/**
 * Parse `cash-lex` arguments. Throws CliUsageError on anything it does not accept.
 */
export const parseCliArgs = (argv: readonly string[]): ParsedArgs => {
	if (argv.includes('-h') || argv.includes('--help')) {
		return { help: true }
	}

	const positional: string[] = []
	let format: string | undefined

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? ''

		if (arg === '-f' || arg === '--format') {
			format = argv[i + 1]
			if (format === undefined) {
				throw new CliUsageError(`${arg} expects a value`)
			}
			i++
			continue
		}

		if (arg.startsWith('--format=')) {
			format = arg.slice('--format='.length)
			continue
		}

		if (arg.startsWith('-') && arg !== '-') {
			throw new CliUsageError(`unknown option ${arg}`)
		}

		positional.push(arg)
	}

	if (positional.length > 1) {
		throw new CliUsageError(`expected one file, got ${positional.length}`)
	}

	const result = optionsSchema.safeParse({ file: positional[0] ?? '', format })
	if (!result.success) {
		throw new CliUsageError(
			result.error.issues
				.map((issue) =>
					issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
				)
				.join('; ')
		)
	}

	return { help: false, ...result.data }
}
