import { describe, test, expect } from 'vitest'
import { Lexer } from '@cashlex/lexer'
import { formatSpanRecords, toSpanRecords } from './format'

const recordsOf = (content: string) =>
	toSpanRecords(content, Lexer.create().classifyDocument(content))

describe('toSpanRecords', () => {
	test('uses 1-based lines and columns', () => {
		expect(recordsOf('rev 5\n  e:tax 1.5')).toEqual([
			{ line: 1, startColumn: 1, endColumn: 4, category: 'Keyword', text: 'rev' },
			{ line: 1, startColumn: 5, endColumn: 6, category: 'Number', text: '5' },
			{
				line: 2,
				startColumn: 3,
				endColumn: 8,
				category: 'NegativeRef',
				text: 'e:tax',
			},
			{ line: 2, startColumn: 9, endColumn: 12, category: 'Number', text: '1.5' },
		])
	})

	test('columns come from each span, not from lexer state', () => {
		const content = 'rate\nrev\n# x'
		const lexer = Lexer.create()
		const spans = [...lexer.classifyDocument(content)].slice(0, 2).reverse()
		lexer.setLineStates([])

		expect(toSpanRecords(content, spans)).toEqual([
			{ line: 2, startColumn: 1, endColumn: 4, category: 'Keyword', text: 'rev' },
			{ line: 1, startColumn: 1, endColumn: 5, category: 'Keyword', text: 'rate' },
		])
	})
})

describe('formatSpanRecords', () => {
	test('prints one tab-separated line per span', () => {
		expect(formatSpanRecords(recordsOf('rate # "fx"'), 'text')).toBe(
			'1:1-5\tKeyword\t"rate"\n1:6-12\tComment\t"# \\"fx\\""\n'
		)
	})

	test('prints JSON records', () => {
		expect(formatSpanRecords(recordsOf('rev'), 'json')).toBe(
			'[\n  {\n    "line": 1,\n    "startColumn": 1,\n    "endColumn": 4,\n    "category": "Keyword",\n    "text": "rev"\n  }\n]\n'
		)
	})

	test('prints nothing for an empty document', () => {
		expect(formatSpanRecords(recordsOf(''), 'text')).toBe('')
		expect(formatSpanRecords(recordsOf(''), 'json')).toBe('[]\n')
	})
})
