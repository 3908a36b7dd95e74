/**
 * Webhook handler
 * Framework-agnostic webhook event handling
 */

import { DEFAULT_WEBHOOK_TOLERANCE } from '../lib/constants.js'
import type {
	Result,
	WebhookError,
	WebhookEvent,
	WebhookEventOf,
	WebhookEventType,
	WebhookHandler,
} from '../types/index.js'
import { ok, webhookFail } from '../types/index.js'
import { getErrorMessage } from '../utils/index.js'
import { webhookLogger } from '../utils/logger.js'
import { parseWebhookPayload, verifyWebhookSignature } from './parser.js'

/**
 * Webhook handler configuration
 */
export interface WebhookHandlerConfig {
	/** Webhook signing key */
	signingKey: string
	/** Verify signatures (recommended for production) */
	verifySignature?: boolean
	/** Signature tolerance in seconds */
	signatureTolerance?: number
	/** Reject a signature token that was already accepted */
	rejectReplayedTokens?: boolean
	/**
	 * Upper bound on remembered tokens. Tokens leave once their timestamp is
	 * older than `signatureTolerance`; past this bound the oldest go first,
	 * so more deliveries than this inside one tolerance window can replay.
	 */
	maxTrackedTokens?: number
}

/**
 * Process result
 */
export interface ProcessResult {
	processed: boolean
	event?: WebhookEvent | undefined
}

/**
 * Webhook handler instance interface
 */
export interface WebhookHandlerInstance {
	on: <K extends WebhookEventType>(
		event: K,
		handler: WebhookHandler<WebhookEventOf<K>>,
	) => void
	off: (event: WebhookEventType) => void
	process: (body: string) => Promise<Result<ProcessResult, WebhookError>>
	hasHandler: (event: WebhookEventType) => boolean
	getRegisteredEvents: () => WebhookEventType[]
}

const isEventOf = <K extends WebhookEventType>(
	event: WebhookEvent,
	type: K,
): event is WebhookEventOf<K> => event.event === type

/**
 * Create a webhook handler instance
 *
 * @param config - Handler configuration
 * @returns Webhook handler with event registration and processing
 *
 * @example
 * ```typescript
 * const webhooks = createWebhookHandler({
 *   signingKey: process.env.MAILGUN_WEBHOOK_SIGNING_KEY ?? '',
 *   rejectReplayedTokens: true,
 * })
 *
 * webhooks.on('delivered', async event => {
 *   console.log('Delivered to', event.recipient)
 * })
 *
 * webhooks.on('failed', async event => {
 *   if (event.severity === 'permanent') {
 *     // Stop mailing this address
 *   }
 * })
 *
 * // In your route handler (any framework)
 * const result = await webhooks.process(requestBody)
 * ```
 */
export const createWebhookHandler = (
	config: WebhookHandlerConfig,
): WebhookHandlerInstance => {
	const handlers = new Map<
		WebhookEventType,
		(event: WebhookEvent) => Promise<void>
	>()
	/** token -> signature timestamp in seconds */
	const seenTokens = new Map<string, number>()
	const {
		signingKey,
		verifySignature = true,
		signatureTolerance = DEFAULT_WEBHOOK_TOLERANCE,
		rejectReplayedTokens = false,
		maxTrackedTokens = 1000,
	} = config

	/**
	 * Register event handler
	 */
	const on = <K extends WebhookEventType>(
		event: K,
		handler: WebhookHandler<WebhookEventOf<K>>,
	): void => {
		handlers.set(event, async payload => {
			if (isEventOf(payload, event)) await handler(payload)
		})
	}

	/**
	 * Remove event handler
	 */
	const off = (event: WebhookEventType): void => {
		handlers.delete(event)
	}

	const pruneTokens = (): void => {
		const now = Math.floor(Date.now() / 1000)
		for (const [token, timestamp] of seenTokens) {
			if (Math.abs(now - timestamp) > signatureTolerance) {
				seenTokens.delete(token)
			}
		}
	}

	const rememberToken = (token: string, timestamp: string): void => {
		const seconds = Number.parseInt(timestamp, 10)
		seenTokens.set(
			token,
			Number.isNaN(seconds) ? Math.floor(Date.now() / 1000) : seconds,
		)
		// Maps iterate in insertion order, so the first entry is the oldest
		for (const oldest of seenTokens.keys()) {
			if (seenTokens.size <= maxTrackedTokens) break
			seenTokens.delete(oldest)
		}
	}

	/**
	 * Process incoming webhook
	 *
	 * @param body - Raw request body string
	 * @returns Result with processing status
	 */
	const process = async (
		body: string,
	): Promise<Result<ProcessResult, WebhookError>> => {
		const parseResult = parseWebhookPayload(body)
		if (!parseResult.success) {
			webhookLogger.warn('Rejected webhook payload', {
				details: { code: parseResult.error.code },
			})
			return parseResult
		}

		const { signature, 'event-data': event } = parseResult.data

		if (verifySignature) {
			const verifyResult = verifyWebhookSignature({
				signingKey,
				signature,
				tolerance: signatureTolerance,
			})
			if (!verifyResult.success) {
				webhookLogger.warn('Rejected webhook signature', {
					details: { code: verifyResult.error.code, id: event.id },
				})
				return verifyResult
			}
		}

		if (rejectReplayedTokens) {
			pruneTokens()
			if (seenTokens.has(signature.token)) {
				return webhookFail(
					'REPLAYED_TOKEN',
					'Webhook token has already been used',
				)
			}
			rememberToken(signature.token, signature.timestamp)
		}

		const handler = handlers.get(event.event)
		if (!handler) {
			// No handler registered for this event type - not an error
			return ok({ processed: false, event })
		}

		try {
			await handler(event)
			webhookLogger.info('Webhook processed', {
				details: { event: event.event, id: event.id },
			})
			return ok({ processed: true, event })
		} catch (error) {
			// Mailgun retries a failed delivery with the same token
			seenTokens.delete(signature.token)
			return webhookFail(
				'HANDLER_ERROR',
				getErrorMessage(error, 'Handler error'),
			)
		}
	}

	/**
	 * Check if a handler is registered for an event type
	 */
	const hasHandler = (event: WebhookEventType): boolean => handlers.has(event)

	/**
	 * Get list of registered event types
	 */
	const getRegisteredEvents = (): WebhookEventType[] => [...handlers.keys()]

	return {
		on,
		off,
		process,
		hasHandler,
		getRegisteredEvents,
	}
}
