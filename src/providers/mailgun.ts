/**
 * Mailgun email provider
 * Implementation of EmailProvider on top of the v3 messages and domains
 * endpoints
 */

import { getDomain } from '../api/domains.js'
import { sendMessage } from '../api/messages.js'
import type { HttpClient } from '../http/client.js'
import { PROVIDER_NAME } from '../lib/constants.js'
import type { Credentials } from '../lib/credentials.js'
import type {
	BatchSendResult,
	BatchSendSuccess,
	EmailMessage,
	EmailProvider,
	SendResult,
} from '../types/index.js'
import { mailgunFail, ok } from '../types/index.js'
import { logger } from '../utils/logger.js'
import { createProviderUtils } from './base.js'

/**
 * Mailgun provider configuration
 */
export interface MailgunProviderConfig {
	/** Credentials the HTTP client was built with */
	credentials: Credentials
	/** Max messages per sendBatch call (default: 100) */
	maxBatchSize?: number | undefined
}

/**
 * Create Mailgun email provider
 *
 * @param http - axios instance from createHttpClient
 * @param config - Provider configuration
 */
export const createMailgunProvider = (
	http: HttpClient,
	config: MailgunProviderConfig,
): EmailProvider => {
	const { credentials } = config
	const utils = createProviderUtils({
		name: PROVIDER_NAME,
		...(config.maxBatchSize !== undefined && {
			maxBatchSize: config.maxBatchSize,
		}),
	})

	const send = (message: EmailMessage): Promise<SendResult> =>
		sendMessage(http, credentials, message)

	return {
		name: utils.name,

		send,

		async sendBatch(messages: EmailMessage[]): Promise<BatchSendResult> {
			if (messages.length > utils.maxBatchSize) {
				return mailgunFail(
					'VALIDATION_ERROR',
					`Batch size ${messages.length} exceeds maximum ${utils.maxBatchSize}`,
				)
			}

			const startTime = Date.now()
			const results: BatchSendSuccess['results'] = []

			// One request per message; a failure does not stop the rest
			for (const [index, message] of messages.entries()) {
				const result = await send(message)
				results.push({
					index,
					result,
					recipient: message.to
						? utils.normalizeRecipients(message.to)[0]
						: undefined,
				})
			}

			const successful = results.filter(r => r.result.success).length
			const failed = results.length - successful

			if (failed > 0) {
				logger.warn('Batch finished with failures', {
					details: { total: messages.length, failed },
				})
			}

			return ok({
				total: messages.length,
				successful,
				failed,
				durationMs: Date.now() - startTime,
				results,
			})
		},

		async validateConfig(): Promise<boolean> {
			const result = await getDomain(http, credentials)
			return result.success
		},
	}
}
