/**
 * mailgun-v3
 * Typed bindings for Mailgun's v3 HTTP API
 *
 * Features:
 * - Message sending with attachments, templates and delivery options
 * - Address validation and domain lookup
 * - Typed transport / HTTP / payload errors
 * - Framework-agnostic webhook handling
 */

// Endpoint exports (for advanced usage)
export { getDomain } from './api/domains.js'
export type { FormField } from './api/messages.js'
export {
	buildMessageFields,
	sendMessage,
	toFormData,
	validateMessage,
} from './api/messages.js'
export { validateAddress } from './api/validation.js'
export type { HttpClient, HttpClientOptions } from './http/client.js'
// HTTP exports
export { createHttpClient } from './http/client.js'
export type {
	Credentials,
	CredentialsInput,
	MailerConfig,
	MailgunRegion,
} from './lib/index.js'
// Core exports
export {
	createCredentials,
	emailAddress,
	formatAddress,
	loadMailerConfig,
	MAILGUN_API_BASES,
	MAILGUN_DEFAULT_API,
	MAILGUN_LIMITS,
	namedAddress,
	parseEmailAddress,
} from './lib/index.js'
export type {
	Mailer,
	MailerDependencies,
	MailerMessage,
	MailerTemplatedMessage,
} from './mailer.js'
// Main API exports
export { createMailer } from './mailer.js'
export type { MailgunProviderConfig } from './providers/mailgun.js'
// Provider exports
export { createMailgunProvider } from './providers/mailgun.js'
// Type exports
export type {
	AddressParts,
	AddressValidation,
	BatchSendResult,
	BatchSendSuccess,
	ClickTracking,
	EmailAcceptedEvent,
	EmailAddress,
	EmailAttachment,
	EmailClickedEvent,
	EmailComplainedEvent,
	EmailDeliveredEvent,
	EmailFailedEvent,
	EmailHeader,
	EmailMessage,
	EmailOpenedEvent,
	EmailProvider,
	EmailRecipient,
	EmailRejectedEvent,
	EmailStoredEvent,
	EmailTemplate,
	EmailUnsubscribedEvent,
	MailgunDomain,
	MailgunError,
	MailgunErrorCode,
	Result,
	SendResult,
	SendSuccess,
	TemplatedEmailMessage,
	ValidateAddressOptions,
	WebhookError,
	WebhookErrorCode,
	WebhookEvent,
	WebhookEventType,
	WebhookHandler,
	WebhookPayload,
	WebhookSignature,
	WebhookVerifyOptions,
} from './types/index.js'
export type {
	ProcessResult,
	WebhookHandlerConfig,
	WebhookHandlerInstance,
} from './webhooks/handler.js'
// Webhook exports
export { createWebhookHandler } from './webhooks/handler.js'
export {
	isValidEventType,
	parseWebhookPayload,
	signWebhook,
	verifyWebhookSignature,
} from './webhooks/parser.js'
