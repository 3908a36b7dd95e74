/**
 * Logger utility for mailgun-v3
 * Centralized logging with @nextnode/logger
 */

import { createLogger } from '@nextnode/logger'

/** Main library logger */
export const logger = createLogger()

/** HTTP request logger */
export const httpLogger = createLogger({
	prefix: 'HTTP',
})

/** Webhook operations logger */
export const webhookLogger = createLogger({
	prefix: 'WEBHOOK',
})
