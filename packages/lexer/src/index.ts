/**
 * @cashlex/lexer
 *
 * Highlighting classifier for the cash ledger language.
 */

// Main class export
export { Lexer, type LineHighlightSegment } from './lexer'

// Type exports
export type {
	AccountRef,
	AccountRoot,
	AccountSense,
	Category,
	DocumentSpan,
	LineState,
	Pattern,
	Span,
	TokenizeResult,
} from './types'

export {
	ACCOUNT_ROOTS,
	CATEGORIES,
	CATEGORY_SCOPES,
	KEYWORDS,
	PATTERNS,
	type AccountPrefix,
	type Keyword,
} from './consts'

export { describeAccountRef } from './accounts'

// Tokenizer exports (for advanced use)
export { advanceState, classify, matchAt, tokenizeLine } from './tokenizer'
