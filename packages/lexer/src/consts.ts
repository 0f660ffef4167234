/**
 * Lexer Constants
 */

import type { AccountRoot, AccountSense, Category, Pattern } from './types'

export const KEYWORDS = ['currency', 'initial', 'rate', 'split', 'rev'] as const

export type Keyword = (typeof KEYWORDS)[number]

// Account prefix → root account
export const ACCOUNT_ROOTS = {
	a: { root: 'assets', sense: 'positive' },
	i: { root: 'income', sense: 'positive' },
	e: { root: 'expenses', sense: 'negative' },
	l: { root: 'liabilities', sense: 'negative' },
} as const satisfies Record<string, { root: AccountRoot; sense: AccountSense }>

export type AccountPrefix = keyof typeof ACCOUNT_ROOTS

// Theme scope per category, resolved to a class by the renderer
export const CATEGORY_SCOPES = {
	Keyword: 'keyword',
	Number: 'constant.numeric',
	Date: 'constant.date',
	Comment: 'comment.line',
	PositiveRef: 'variable.account.positive',
	NegativeRef: 'variable.account.negative',
} as const satisfies Record<Category, string>

export const CATEGORIES: readonly Category[] = [
	'Keyword',
	'Number',
	'Date',
	'Comment',
	'PositiveRef',
	'NegativeRef',
]

const EXPONENT = '(?:[eE][+-]?\\d+)?'
const IMAGINARY = '[jJ]?'

// Word characters in any script, so `ærate` is not the keyword `rate`
const WORD = '\\p{L}\\p{N}_'
const WORD_START = `(?<![${WORD}])`
const WORD_END = `(?![${WORD}])`

// Alternatives are ordered longest form first: regex alternation is ordered,
// so `3.14e10j` must not stop at the integer `3`.
const NUMBER_SOURCE = [
	// point decimals: 3.14, .5, .5e-3j
	`(?<![${WORD}.])\\d*\\.\\d+${EXPONENT}${IMAGINARY}${WORD_END}`,
	// trailing-dot decimals: 3., 3.e5
	`${WORD_START}\\d+\\.${EXPONENT}${IMAGINARY}(?![${WORD}.])`,
	// exponential: 1e10, 1e-3j
	`${WORD_START}\\d+[eE][+-]?\\d+${IMAGINARY}${WORD_END}`,
	// imaginary: 12j
	`${WORD_START}\\d+[jJ]${WORD_END}`,
	// integer with optional long suffix: 42, 42L
	`${WORD_START}\\d+[lL]?${WORD_END}`,
].join('|')

const ACCOUNT_BODY = '[\\-0-9a-zA-Z:]+'
const ACCOUNT_START = `(?<![${WORD}:\\-])`

/**
 * Ordered pattern table. The first pattern matching at a position wins,
 * so comments swallow the rest of their line.
 */
export const PATTERNS: readonly Pattern[] = [
	{ category: 'Comment', pattern: /#[^\r\n]*/uy },
	{
		category: 'Date',
		pattern: new RegExp(`${WORD_START}\\d{4}-\\d{2}-\\d{2}${WORD_END}`, 'uy'),
	},
	{
		category: 'PositiveRef',
		pattern: new RegExp(`${ACCOUNT_START}[ai]:${ACCOUNT_BODY}`, 'uy'),
	},
	{
		category: 'NegativeRef',
		pattern: new RegExp(`${ACCOUNT_START}[el]:${ACCOUNT_BODY}`, 'uy'),
	},
	{
		category: 'Keyword',
		pattern: new RegExp(`${WORD_START}(?:${KEYWORDS.join('|')})${WORD_END}`, 'uy'),
	},
	{ category: 'Number', pattern: new RegExp(`(?:${NUMBER_SOURCE})`, 'uy') },
]

export const ACCOUNT_REF = new RegExp(`^([aiel]):(${ACCOUNT_BODY})$`, 'u')
