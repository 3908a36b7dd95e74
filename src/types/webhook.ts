/**
 * Webhook type definitions
 * Types for Mailgun event webhooks (delivery, failures, opens, clicks)
 */

import type { z } from 'zod'

import type {
	webhookEventSchema,
	webhookPayloadSchema,
	webhookSignatureSchema,
} from '../webhooks/schemas.js'

/**
 * Webhook event types sent by Mailgun
 */
export type WebhookEventType =
	| 'accepted'
	| 'rejected'
	| 'delivered'
	| 'failed'
	| 'opened'
	| 'clicked'
	| 'unsubscribed'
	| 'complained'
	| 'stored'

/**
 * Signature block of a webhook body
 */
export type WebhookSignature = z.infer<typeof webhookSignatureSchema>

/**
 * Union of all webhook events (the `event-data` object)
 */
export type WebhookEvent = z.infer<typeof webhookEventSchema>

/**
 * Whole webhook body
 */
export type WebhookPayload = z.infer<typeof webhookPayloadSchema>

/**
 * Event of one type, narrowed from the union
 */
export type WebhookEventOf<K extends WebhookEventType> = Extract<
	WebhookEvent,
	{ event: K }
>

export type EmailAcceptedEvent = WebhookEventOf<'accepted'>
export type EmailRejectedEvent = WebhookEventOf<'rejected'>
export type EmailDeliveredEvent = WebhookEventOf<'delivered'>
export type EmailFailedEvent = WebhookEventOf<'failed'>
export type EmailOpenedEvent = WebhookEventOf<'opened'>
export type EmailClickedEvent = WebhookEventOf<'clicked'>
export type EmailUnsubscribedEvent = WebhookEventOf<'unsubscribed'>
export type EmailComplainedEvent = WebhookEventOf<'complained'>
export type EmailStoredEvent = WebhookEventOf<'stored'>

/**
 * Webhook handler function type
 */
export type WebhookHandler<T extends WebhookEvent = WebhookEvent> = (
	event: T,
) => Promise<void> | void

/**
 * Webhook verification options
 */
export interface WebhookVerifyOptions {
	/** Webhook signing key from the Mailgun control panel */
	signingKey: string
	/** Signature block taken from the webhook body */
	signature: WebhookSignature
	/** Tolerance window in seconds (default: 300) */
	tolerance?: number
}

/**
 * Webhook error codes
 */
export type WebhookErrorCode =
	| 'INVALID_SIGNATURE'
	| 'INVALID_PAYLOAD'
	| 'EXPIRED_TIMESTAMP'
	| 'REPLAYED_TOKEN'
	| 'PARSE_ERROR'
	| 'HANDLER_ERROR'

/**
 * Webhook processing error
 */
export interface WebhookError {
	code: WebhookErrorCode
	message: string
}

/**
 * Create a WebhookError failure result
 */
export const webhookFail = (
	code: WebhookErrorCode,
	message: string,
): { success: false; error: WebhookError } => ({
	success: false,
	error: { code, message },
})
