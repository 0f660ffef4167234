import { describe, test, expect } from 'vitest'
import { CliUsageError, parseCliArgs } from './args'

describe('parseCliArgs', () => {
	test('defaults to text output', () => {
		expect(parseCliArgs(['ledger.cash'])).toEqual({
			help: false,
			file: 'ledger.cash',
			format: 'text',
		})
	})

	test('accepts the format as a separate or inline value', () => {
		expect(parseCliArgs(['--format', 'json', 'ledger.cash'])).toMatchObject({
			format: 'json',
		})
		expect(parseCliArgs(['-f', 'json', 'ledger.cash'])).toMatchObject({
			format: 'json',
		})
		expect(parseCliArgs(['ledger.cash', '--format=json'])).toMatchObject({
			format: 'json',
		})
	})

	test('help wins over everything else', () => {
		expect(parseCliArgs(['--bogus', '-h'])).toEqual({ help: true })
	})

	test('rejects bad input', () => {
		expect(() => parseCliArgs([])).toThrow('file: a ledger file is required')
		expect(() => parseCliArgs(['a.cash', 'b.cash'])).toThrow(
			'expected one file, got 2'
		)
		expect(() => parseCliArgs(['--format'])).toThrow('--format expects a value')
		expect(() => parseCliArgs(['--color', 'a.cash'])).toThrow(
			'unknown option --color'
		)
		expect(() => parseCliArgs(['--format=xml', 'a.cash'])).toThrow(
			CliUsageError
		)
	})
})
