/**
 * Logger functionality tests
 */

import { createLogger } from '@nextnode/logger'
import { describe, expect, it, vi } from 'vitest'

import { httpLogger, logger, webhookLogger } from '../utils/logger.js'

vi.mock('@nextnode/logger', () => ({
	createLogger: vi.fn(() => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	})),
}))

describe('Logger Utilities', () => {
	it('should export the library loggers', () => {
		expect(logger).toBeDefined()
		expect(httpLogger).toBeDefined()
		expect(webhookLogger).toBeDefined()
	})

	it('should prefix the scoped loggers', () => {
		expect(createLogger).toHaveBeenCalledTimes(3)
		expect(createLogger).toHaveBeenCalledWith({ prefix: 'HTTP' })
		expect(createLogger).toHaveBeenCalledWith({ prefix: 'WEBHOOK' })
	})
})
