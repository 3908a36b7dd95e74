/**
 * Base provider utilities
 * Shared functionality for email providers (composition pattern)
 */

import { MAILGUN_LIMITS } from '../lib/constants.js'
import { formatAddresses } from '../lib/email-address.js'
import type { EmailRecipient } from '../types/index.js'

/**
 * Base provider options
 */
export interface BaseProviderOptions {
	/** Provider name */
	name: string
	/** Max messages per sendBatch call */
	maxBatchSize?: number
}

/**
 * Provider utilities returned by createProviderUtils
 */
export interface ProviderUtils {
	name: string
	maxBatchSize: number
	normalizeRecipients: (
		recipients: EmailRecipient | EmailRecipient[],
	) => string[]
}

/**
 * Create common provider utilities (composition helper)
 */
export const createProviderUtils = (
	options: BaseProviderOptions,
): ProviderUtils => {
	const { name, maxBatchSize = MAILGUN_LIMITS.maxBatchSize } = options

	return {
		name,
		maxBatchSize,
		normalizeRecipients: formatAddresses,
	}
}
