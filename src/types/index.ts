/**
 * Type definitions for mailgun-v3
 * Barrel export for all type definitions
 */

// Domain types
export type { MailgunDomain } from './domain.js'
// Email types
export type {
	ClickTracking,
	EmailAddress,
	EmailAttachment,
	EmailHeader,
	EmailMessage,
	EmailRecipient,
	EmailTemplate,
	TemplatedEmailMessage,
} from './email.js'
// Provider types (Strategy pattern)
export type { EmailProvider } from './provider.js'
// Result types (discriminated unions)
export type {
	BatchSendResult,
	BatchSendSuccess,
	MailgunError,
	MailgunErrorCode,
	Result,
	SendResult,
	SendSuccess,
} from './result.js'
// Result factory functions
export { fail, mailgunError, mailgunFail, ok } from './result.js'
// Validation types
export type {
	AddressParts,
	AddressValidation,
	ValidateAddressOptions,
} from './validation.js'
// Webhook types
export type {
	EmailAcceptedEvent,
	EmailClickedEvent,
	EmailComplainedEvent,
	EmailDeliveredEvent,
	EmailFailedEvent,
	EmailOpenedEvent,
	EmailRejectedEvent,
	EmailStoredEvent,
	EmailUnsubscribedEvent,
	WebhookError,
	WebhookErrorCode,
	WebhookEvent,
	WebhookEventOf,
	WebhookEventType,
	WebhookHandler,
	WebhookPayload,
	WebhookSignature,
	WebhookVerifyOptions,
} from './webhook.js'
// Webhook factory functions
export { webhookFail } from './webhook.js'
