/**
 * Core Lexer Tokenization Logic
 *
 * Pure functional classification over the ordered pattern table.
 */

import type { LineState, Pattern, Span, TokenizeResult } from './types'
import { PATTERNS } from './consts'

/**
 * Try every pattern at `index` in priority order and return the first hit.
 * Sticky patterns are shared, so `lastIndex` is always set right before `exec`.
 * A pattern without the `y` flag may search ahead; only a match at `index` counts.
 */
export const matchAt = (
	text: string,
	index: number,
	patterns: readonly Pattern[] = PATTERNS
): Span | null => {
	for (const { category, pattern } of patterns) {
		pattern.lastIndex = index
		const match = pattern.exec(text)
		if (match && match.index === index && match[0].length > 0) {
			return { start: index, end: index + match[0].length, category }
		}
	}
	return null
}

/**
 * Lazily classify `text`. Spans come out sorted and never overlap;
 * anything between them is unstyled.
 */
export function* classify(text: string): IterableIterator<Span> {
	const len = text.length
	let i = 0

	while (i < len) {
		const span = matchAt(text, i)
		if (span) {
			yield span
			i = span.end
			continue
		}
		i++
	}
}

/**
 * State of the line following `line`
 */
export const advanceState = (state: LineState, line: string): LineState => ({
	offset: state.offset + line.length + 1,
})

/**
 * Tokenize a single line with the given starting state
 */
export const tokenizeLine = (
	line: string,
	state: LineState
): TokenizeResult => {
	return {
		spans: [...classify(line)],
		endState: advanceState(state, line),
	}
}
