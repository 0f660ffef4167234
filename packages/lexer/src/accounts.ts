import { ACCOUNT_REF, ACCOUNT_ROOTS, type AccountPrefix } from './consts'
import type { AccountRef } from './types'

const isAccountPrefix = (value: string): value is AccountPrefix =>
	Object.prototype.hasOwnProperty.call(ACCOUNT_ROOTS, value)

/**
 * Describe an account reference token (`a:bank:checking`, `e:food`).
 * Returns undefined for anything the reference patterns would not match.
 */
export const describeAccountRef = (text: string): AccountRef | undefined => {
	const match = ACCOUNT_REF.exec(text)
	if (!match) return undefined

	const [, prefix = '', body = ''] = match
	if (!isAccountPrefix(prefix)) return undefined

	const { root, sense } = ACCOUNT_ROOTS[prefix]
	const segments = [prefix, ...body.split(':').filter((part) => part.length > 0)]
	const qname = segments.join(':')

	if (segments.length === 1) {
		return { root, sense, qname, segments, title: root }
	}

	return {
		root,
		sense,
		qname,
		segments,
		title: segments[segments.length - 1] ?? root,
		parent: segments.slice(0, -1).join(':'),
	}
}
