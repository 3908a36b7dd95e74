/**
 * Mailer
 * Main facade for Mailgun operations - the primary public API
 */

import { getDomain } from './api/domains.js'
import { validateAddress } from './api/validation.js'
import type { HttpClient } from './http/client.js'
import { createHttpClient } from './http/client.js'
import type { MailerConfig } from './lib/config.js'
import { MAILGUN_LIMITS } from './lib/constants.js'
import type { Credentials } from './lib/credentials.js'
import { createCredentials } from './lib/credentials.js'
import { formatAddresses } from './lib/email-address.js'
import { createMailgunProvider } from './providers/mailgun.js'
import type {
	AddressValidation,
	BatchSendResult,
	BatchSendSuccess,
	EmailMessage,
	EmailProvider,
	EmailRecipient,
	MailgunDomain,
	MailgunError,
	Result,
	SendResult,
	TemplatedEmailMessage,
	ValidateAddressOptions,
} from './types/index.js'
import { mailgunFail, ok } from './types/index.js'
import type {
	WebhookHandlerConfig,
	WebhookHandlerInstance,
} from './webhooks/handler.js'
import { createWebhookHandler } from './webhooks/handler.js'

/**
 * Message accepted by the mailer; `from` may come from `defaultFrom`
 */
export type MailerMessage = Omit<EmailMessage, 'from'> & {
	from?: EmailRecipient | undefined
}

/**
 * Templated message accepted by the mailer
 */
export type MailerTemplatedMessage = Omit<TemplatedEmailMessage, 'from'> & {
	from?: EmailRecipient | undefined
}

/**
 * Collaborators that can be swapped in, mainly for tests
 */
export interface MailerDependencies {
	/** Pre-built axios instance, used instead of createHttpClient */
	http?: HttpClient
}

/**
 * Mailer instance interface
 */
export interface Mailer {
	/** Get the underlying provider */
	readonly provider: EmailProvider
	/** Sending domain */
	readonly domain: string
	/** Send a single email */
	send: (message: MailerMessage) => Promise<SendResult>
	/** Send email rendered from a stored Mailgun template */
	sendTemplate: (message: MailerTemplatedMessage) => Promise<SendResult>
	/** Send several emails, one request each */
	sendBatch: (messages: MailerMessage[]) => Promise<BatchSendResult>
	/** Validate a single address */
	validateAddress: (
		address: string,
		options?: ValidateAddressOptions,
	) => Promise<Result<AddressValidation, MailgunError>>
	/** Fetch the sending domain */
	getDomain: () => Promise<Result<MailgunDomain, MailgunError>>
	/** Validate provider configuration */
	validateConfig: () => Promise<boolean>
	/** Webhook handler using the configured signing key */
	createWebhookHandler: (
		options?: Omit<WebhookHandlerConfig, 'signingKey'>,
	) => WebhookHandlerInstance
}

/**
 * Create a mailer instance
 *
 * @param config - Mailer configuration
 * @param dependencies - Optional collaborators
 * @returns Mailer instance
 * @throws Error when the credentials are malformed
 *
 * @example
 * ```typescript
 * const mailer = createMailer({
 *   credentials: {
 *     apiKey: process.env.MAILGUN_API_KEY ?? '',
 *     domain: 'mg.example.com',
 *   },
 *   defaultFrom: 'Example <noreply@mg.example.com>',
 * })
 *
 * // Send simple email
 * await mailer.send({
 *   to: 'user@example.com',
 *   subject: 'Hello',
 *   html: '<h1>Welcome</h1>',
 * })
 *
 * // Send with a stored template
 * await mailer.sendTemplate({
 *   to: 'user@example.com',
 *   subject: 'Welcome!',
 *   template: { name: 'welcome', variables: { name: 'Jane' } },
 * })
 * ```
 */
export const createMailer = (
	config: MailerConfig,
	dependencies: MailerDependencies = {},
): Mailer => {
	const credentials: Credentials = createCredentials(config.credentials)
	const http =
		dependencies.http ??
		createHttpClient(credentials, { timeout: config.timeout })

	const provider = createMailgunProvider(http, { credentials })

	/**
	 * Apply default values to message
	 */
	const applyDefaults = (
		message: MailerMessage,
	): Result<EmailMessage, MailgunError> => {
		const from = message.from ?? config.defaultFrom
		if (!from) {
			return mailgunFail('VALIDATION_ERROR', 'Missing required field: from')
		}
		return ok({
			...message,
			from,
			testMode: message.testMode ?? config.testMode,
		})
	}

	const send = async (message: MailerMessage): Promise<SendResult> => {
		const prepared = applyDefaults(message)
		if (!prepared.success) return prepared
		return provider.send(prepared.data)
	}

	const sendTemplate = async (
		message: MailerTemplatedMessage,
	): Promise<SendResult> => send(message)

	const sendBatch = async (
		messages: MailerMessage[],
	): Promise<BatchSendResult> => {
		if (messages.length > MAILGUN_LIMITS.maxBatchSize) {
			return mailgunFail(
				'VALIDATION_ERROR',
				`Batch size ${messages.length} exceeds maximum ${MAILGUN_LIMITS.maxBatchSize}`,
			)
		}

		const results: BatchSendSuccess['results'] = []
		const sendable: Array<{ index: number; message: EmailMessage }> = []
		for (const [index, message] of messages.entries()) {
			const prepared = applyDefaults(message)
			if (prepared.success) {
				sendable.push({ index, message: prepared.data })
			} else {
				// Reported at its own index; the rest of the batch still goes out
				results.push({
					index,
					result: prepared,
					recipient: formatAddresses(message.to)[0],
				})
			}
		}

		const sent = await provider.sendBatch(sendable.map(entry => entry.message))
		if (!sent.success) return sent

		for (const entry of sent.data.results) {
			const original = sendable[entry.index]
			results.push({ ...entry, index: original ? original.index : entry.index })
		}
		results.sort((a, b) => a.index - b.index)

		const successful = results.filter(r => r.result.success).length
		return ok({
			total: messages.length,
			successful,
			failed: results.length - successful,
			durationMs: sent.data.durationMs,
			results,
		})
	}

	const createHandler = (
		options: Omit<WebhookHandlerConfig, 'signingKey'> = {},
	): WebhookHandlerInstance => {
		if (!config.webhookSigningKey) {
			throw new Error('Webhook signing key is not configured')
		}
		return createWebhookHandler({
			...options,
			signingKey: config.webhookSigningKey,
		})
	}

	return {
		get provider(): EmailProvider {
			return provider
		},
		get domain(): string {
			return credentials.domain
		},
		send,
		sendTemplate,
		sendBatch,
		validateAddress: (address, options) =>
			validateAddress(http, address, options),
		getDomain: () => getDomain(http, credentials),
		validateConfig: () => provider.validateConfig(),
		createWebhookHandler: createHandler,
	}
}
