/**
 * Unified Lexer Class
 *
 * Manages state for incremental highlighting, delegating core logic to tokenizer.ts.
 */

import { advanceState, tokenizeLine } from './tokenizer'
import { CATEGORY_SCOPES } from './consts'
import type {
	Category,
	DocumentSpan,
	LineState,
	Span,
	TokenizeResult,
} from './types'

/**
 * Line highlight segment for rendering
 */
export type LineHighlightSegment = {
	start: number
	end: number
	className: string
	category: Category
	scope: string
}

/**
 * Lexer class that provides state management around the pure tokenizer.
 */
export class Lexer {
	private lineStates: LineState[] = []

	private constructor() {}

	static create(): Lexer {
		return new Lexer()
	}

	/**
	 * Get the initial state for line 0
	 */
	static initialState(): LineState {
		return { offset: 0 }
	}

	static statesEqual(a: LineState, b: LineState): boolean {
		return a.offset === b.offset
	}

	/**
	 * Tokenize a single line with the given starting state
	 */
	tokenizeLine(
		line: string,
		state: LineState = Lexer.initialState()
	): TokenizeResult {
		return tokenizeLine(line, state)
	}

	/**
	 * Compute line-start states for entire content.
	 * Stores results internally and returns the states array.
	 */
	computeAllStates(content: string): LineState[] {
		const states: LineState[] = []
		let state = Lexer.initialState()

		for (const lineText of content.split('\n')) {
			states.push(state)
			state = advanceState(state, lineText)
		}

		this.lineStates = states
		return states
	}

	/**
	 * Lazily classify a whole document, line by line, with document offsets.
	 * The cached line states are replaced only once every line is consumed.
	 */
	*classifyDocument(content: string): IterableIterator<DocumentSpan> {
		const lines = content.split('\n')
		const states: LineState[] = []
		let state = Lexer.initialState()

		for (let line = 0; line < lines.length; line++) {
			states.push(state)
			const result = this.tokenizeLine(lines[line] ?? '', state)

			for (const span of result.spans) {
				yield {
					line,
					lineStart: state.offset,
					start: state.offset + span.start,
					end: state.offset + span.end,
					category: span.category,
				}
			}

			state = result.endState
		}

		this.lineStates = states
	}

	getLineState(lineIndex: number): LineState | undefined {
		return this.lineStates[lineIndex]
	}

	getAllLineStates(): LineState[] {
		return this.lineStates
	}

	/**
	 * Set line states directly (e.g., from external cache)
	 */
	setLineStates(states: LineState[]): void {
		this.lineStates = states
	}

	/**
	 * Incrementally update line states after an edit.
	 */
	updateStatesFromEdit(
		editedLineIndex: number,
		getLineText: (index: number) => string,
		lineCount: number
	): LineState[] {
		const oldLineCount = this.lineStates.length
		if (oldLineCount === 0) {
			return this.recomputeAll(getLineText, lineCount)
		}

		const newStates = [...this.lineStates]
		const insertedLineCount = Math.max(0, lineCount - oldLineCount)

		if (lineCount > oldLineCount) {
			// Lines were inserted - add placeholder states
			const insertAt = editedLineIndex + 1
			for (let i = 0; i < insertedLineCount; i++) {
				newStates.splice(insertAt, 0, Lexer.initialState())
			}
		} else if (lineCount < oldLineCount) {
			// Lines were deleted
			const deleteCount = oldLineCount - lineCount
			newStates.splice(editedLineIndex + 1, deleteCount)
		}

		// Lines past the old end only have placeholders; start from the last real state
		const startLine = Math.min(editedLineIndex, oldLineCount - 1, lineCount)
		const startState =
			startLine === 0 ? Lexer.initialState() : newStates[startLine]

		if (!startState) {
			return this.recomputeAll(getLineText, lineCount)
		}

		const firstUntouchedLine = editedLineIndex + 1 + insertedLineCount
		let currentLine = startLine
		let state = startState

		while (currentLine < lineCount) {
			newStates[currentLine] = state
			const nextState = advanceState(state, getLineText(currentLine))
			currentLine++

			const cachedNext =
				currentLine === firstUntouchedLine && currentLine < lineCount
					? newStates[currentLine]
					: undefined

			if (cachedNext) {
				// Untouched lines only moved: shift them and stop
				const offsetDelta = nextState.offset - cachedNext.offset
				if (offsetDelta !== 0) {
					for (let i = currentLine; i < lineCount; i++) {
						const cached = newStates[i]
						if (cached) newStates[i] = { offset: cached.offset + offsetDelta }
					}
				}
				break
			}

			state = nextState
		}

		newStates.length = lineCount
		this.lineStates = newStates
		return newStates
	}

	/**
	 * Convert spans to LineHighlightSegment format
	 */
	tokensToSegments(
		spans: Span[],
		getClass: (scope: string) => string | undefined
	): LineHighlightSegment[] {
		const segments: LineHighlightSegment[] = []
		for (const span of spans) {
			const scope = CATEGORY_SCOPES[span.category]
			const className = getClass(scope)
			if (className) {
				segments.push({
					start: span.start,
					end: span.end,
					className,
					category: span.category,
					scope,
				})
			}
		}
		return segments
	}

	private recomputeAll(
		getLineText: (index: number) => string,
		lineCount: number
	): LineState[] {
		const states: LineState[] = []
		let state = Lexer.initialState()
		for (let i = 0; i < lineCount; i++) {
			states.push(state)
			state = advanceState(state, getLineText(i))
		}
		this.lineStates = states
		return states
	}
}
