import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { classify } from './tokenizer'
import { CATEGORIES } from './consts'

// Characters that show up in ledger files, plus a few that never match
const ledgerText = fc
	.array(
		fc.constantFrom(
			...'0123456789aeilrtv:.-#jJLE+ \t\n\rxyz_USD'.split(''),
			'rate',
			'rev',
			'2024-01-15',
			'a:',
			'e:'
		),
		{ maxLength: 60 }
	)
	.map((parts) => parts.join(''))

describe('classify properties', () => {
	it('is deterministic', () => {
		fc.assert(
			fc.property(fc.oneof(ledgerText, fc.string()), (text) => {
				expect([...classify(text)]).toEqual([...classify(text)])
			})
		)
	})

	it('yields sorted, non-empty, non-overlapping spans inside the input', () => {
		fc.assert(
			fc.property(fc.oneof(ledgerText, fc.string()), (text) => {
				let previousEnd = 0
				for (const span of classify(text)) {
					expect(span.start).toBeGreaterThanOrEqual(previousEnd)
					expect(span.end).toBeGreaterThan(span.start)
					expect(span.end).toBeLessThanOrEqual(text.length)
					expect(CATEGORIES).toContain(span.category)
					previousEnd = span.end
				}
			})
		)
	})

	it('comments start at a hash and run to the end of their line', () => {
		fc.assert(
			fc.property(ledgerText, (text) => {
				for (const span of classify(text)) {
					if (span.category !== 'Comment') continue
					expect(text[span.start]).toBe('#')
					const after = text[span.end]
					expect(after === undefined || after === '\n' || after === '\r').toBe(
						true
					)
					expect(text.slice(span.start, span.end)).not.toMatch(/[\r\n]/)
				}
			})
		)
	})

	it('no span starts inside a comment', () => {
		fc.assert(
			fc.property(ledgerText, (text) => {
				const spans = [...classify(text)]
				for (const comment of spans.filter((s) => s.category === 'Comment')) {
					const inside = spans.filter(
						(s) => s.start > comment.start && s.start < comment.end
					)
					expect(inside).toEqual([])
				}
			})
		)
	})
})
