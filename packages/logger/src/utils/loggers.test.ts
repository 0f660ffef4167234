import { describe, test, expect, afterEach, vi } from 'vitest'
import { createLogger, getLogger, logger, loggers } from './loggers'
import { setLogForwarder, type LogForwarderEntry } from './forwarding'
import {
	configureLoggers,
	getRegisteredLoggers,
	resetLoggerToggles,
	setLoggerEnabled,
} from './toggles'

describe('loggers', () => {
	afterEach(() => {
		setLogForwarder()
		resetLoggerToggles()
	})

	const captureLogs = (): LogForwarderEntry[] => {
		const entries: LogForwarderEntry[] = []
		setLogForwarder((entry) => {
			entries.push(entry)
		})
		return entries
	}

	test('registers every defined logger', () => {
		expect(getRegisteredLoggers()).toEqual([
			{ tag: 'app', enabled: true },
			{ tag: 'cli', enabled: true },
		])
		expect(getLogger('app')).toBe(logger)
		expect(getLogger('cli')).toBe(loggers.cli)
	})

	test('forwards enabled calls with their tag', () => {
		const entries = captureLogs()
		loggers.cli.info('reading', 'ledger.cash')

		expect(entries).toEqual([
			{ tag: 'cli', level: 'info', args: ['reading', 'ledger.cash'] },
		])
	})

	test('disabled loggers are silent', () => {
		const entries = captureLogs()
		configureLoggers({ cli: false })
		loggers.cli.error('hidden')

		expect(entries).toEqual([])
	})

	test('withTag creates a child that inherits its parent toggle', () => {
		const entries = captureLogs()
		const child = loggers.cli.withTag('read')
		child.warn('slow')

		expect(entries).toEqual([{ tag: 'cli:read', level: 'warn', args: ['slow'] }])
		expect(getRegisteredLoggers()).toContainEqual({
			tag: 'cli:read',
			enabled: true,
		})

		setLoggerEnabled('cli', false, { includeChildren: true })
		child.warn('muted')
		expect(entries).toHaveLength(1)
	})

	test('rejects empty child tags', () => {
		expect(() => loggers.cli.withTag('  ')).toThrow(
			'logger.withTag requires a non-empty tag.'
		)
	})

	test('rejects unknown tags', () => {
		expect(() => createLogger('ledger')).toThrow('Unknown logger tag "ledger"')
	})

	test('detaches a forwarder that throws', () => {
		const forwarder = vi.fn(() => {
			throw new Error('boom')
		})
		setLogForwarder(forwarder)

		logger.info('first')
		logger.info('second')

		expect(forwarder).toHaveBeenCalledTimes(1)
	})
})
