/**
 * Webhook parser and signature verification
 * Handles Mailgun webhook payload parsing and signature validation
 */

import { createHmac, timingSafeEqual } from 'node:crypto'

import { DEFAULT_WEBHOOK_TOLERANCE } from '../lib/constants.js'
import type {
	Result,
	WebhookError,
	WebhookEventType,
	WebhookPayload,
	WebhookVerifyOptions,
} from '../types/index.js'
import { ok, webhookFail } from '../types/index.js'
import { isRecord } from '../utils/index.js'
import { webhookPayloadSchema } from './schemas.js'

/**
 * Valid webhook event types
 */
export const VALID_EVENT_TYPES: readonly WebhookEventType[] = [
	'accepted',
	'rejected',
	'delivered',
	'failed',
	'opened',
	'clicked',
	'unsubscribed',
	'complained',
	'stored',
]

const validEventTypes = new Set<string>(VALID_EVENT_TYPES)

/**
 * Check if an event type is valid
 */
export const isValidEventType = (type: string): type is WebhookEventType =>
	validEventTypes.has(type)

/**
 * Compute the hex signature Mailgun sends for a timestamp and token
 */
export const signWebhook = (
	signingKey: string,
	timestamp: string,
	token: string,
): string =>
	createHmac('sha256', signingKey).update(`${timestamp}${token}`).digest('hex')

/**
 * Verify webhook signature
 *
 * Mailgun signs `timestamp + token` with HMAC-SHA256 using the webhook
 * signing key and sends the hex digest alongside.
 *
 * @example
 * ```typescript
 * const result = verifyWebhookSignature({
 *   signingKey: process.env.MAILGUN_WEBHOOK_SIGNING_KEY ?? '',
 *   signature: payload.signature,
 * })
 *
 * if (!result.success) {
 *   return { status: 406, error: result.error.message }
 * }
 * ```
 */
export const verifyWebhookSignature = (
	options: WebhookVerifyOptions,
): Result<boolean, WebhookError> => {
	const {
		signingKey,
		signature,
		tolerance = DEFAULT_WEBHOOK_TOLERANCE,
	} = options
	const { timestamp, token } = signature

	const timestampNum = Number.parseInt(timestamp, 10)
	if (Number.isNaN(timestampNum)) {
		return webhookFail('INVALID_SIGNATURE', 'Invalid signature timestamp')
	}

	const now = Math.floor(Date.now() / 1000)
	if (Math.abs(now - timestampNum) > tolerance) {
		return webhookFail('EXPIRED_TIMESTAMP', 'Webhook timestamp is too old')
	}

	const expected = Buffer.from(signWebhook(signingKey, timestamp, token), 'hex')
	const received = Buffer.from(signature.signature, 'hex')

	if (
		received.length !== expected.length ||
		!timingSafeEqual(received, expected)
	) {
		return webhookFail('INVALID_SIGNATURE', 'Signature mismatch')
	}

	return ok(true)
}

/**
 * Parse webhook payload
 *
 * @param body - Raw request body string
 * @returns Result with the parsed payload or error
 *
 * @example
 * ```typescript
 * const result = parseWebhookPayload(rawBody)
 *
 * if (result.success) {
 *   console.log('Event type:', result.data['event-data'].event)
 * }
 * ```
 */
export const parseWebhookPayload = (
	body: string,
): Result<WebhookPayload, WebhookError> => {
	let raw: unknown
	try {
		raw = JSON.parse(body)
	} catch {
		return webhookFail('PARSE_ERROR', 'Failed to parse webhook payload')
	}

	const eventData = isRecord(raw) ? raw['event-data'] : undefined
	const eventName = isRecord(eventData) ? eventData['event'] : undefined
	if (typeof eventName === 'string' && !isValidEventType(eventName)) {
		return webhookFail('INVALID_PAYLOAD', `Unknown event type: ${eventName}`)
	}

	const parsed = webhookPayloadSchema.safeParse(raw)
	if (!parsed.success) {
		const fields = parsed.error.issues.map(issue => issue.path.join('.'))
		return webhookFail(
			'INVALID_PAYLOAD',
			`Missing or invalid webhook fields: ${fields.join(', ')}`,
		)
	}

	return ok(parsed.data)
}
