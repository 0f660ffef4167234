/**
 * Lexer Types
 */

/**
 * Highlighting class of a matched span
 */
export type Category =
	| 'Keyword'
	| 'Number'
	| 'Date'
	| 'Comment'
	| 'PositiveRef'
	| 'NegativeRef'

/**
 * A single entry of the ordered pattern table
 */
export type Pattern = {
	category: Category
	/** Sticky expression, matched at an explicit position */
	pattern: RegExp
}

/**
 * Classified range of text. `end` is exclusive, offsets are UTF-16 units.
 */
export type Span = {
	start: number
	end: number
	category: Category
}

/**
 * Span with document offsets, its zero-based line and that line's start offset
 */
export type DocumentSpan = Span & {
	line: number
	lineStart: number
}

/**
 * State at the start of a line, used for incremental lexing.
 * Nothing lexical carries over a line break, so only the offset is tracked.
 */
export type LineState = {
	offset: number // document offset at line start
}

/**
 * Result of tokenizing a line
 */
export type TokenizeResult = {
	spans: Span[]
	endState: LineState
}

export type AccountSense = 'positive' | 'negative'

export type AccountRoot = 'assets' | 'income' | 'expenses' | 'liabilities'

/**
 * Structural description of an account reference such as `e:food:lunch`
 */
export type AccountRef = {
	root: AccountRoot
	sense: AccountSense
	/** Colon-joined path with empty segments removed */
	qname: string
	segments: string[]
	title: string
	parent?: string
}
