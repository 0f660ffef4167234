import type { Category, DocumentSpan } from '@cashlex/lexer'
import type { OutputFormat } from './args'

/**
 * One printed span. Line and columns are 1-based, `endColumn` is exclusive.
 */
export type SpanRecord = {
	line: number
	startColumn: number
	endColumn: number
	category: Category
	text: string
}

export const toSpanRecords = (
	content: string,
	spans: Iterable<DocumentSpan>
): SpanRecord[] => {
	const records: SpanRecord[] = []
	for (const span of spans) {
		records.push({
			line: span.line + 1,
			startColumn: span.start - span.lineStart + 1,
			endColumn: span.end - span.lineStart + 1,
			category: span.category,
			text: content.slice(span.start, span.end),
		})
	}
	return records
}

const formatTextRecord = (record: SpanRecord): string =>
	`${record.line}:${record.startColumn}-${record.endColumn}\t${record.category}\t${JSON.stringify(record.text)}`

export const formatSpanRecords = (
	records: SpanRecord[],
	format: OutputFormat
): string => {
	switch (format) {
		case 'json':
			return `${JSON.stringify(records, null, 2)}\n`
		case 'text':
			return records.map((record) => `${formatTextRecord(record)}\n`).join('')
	}
}
