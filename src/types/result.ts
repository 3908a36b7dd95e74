/**
 * Result type definitions
 * Discriminated unions for type-safe error handling
 */

/**
 * Base result type - discriminated union for success/error
 */
export type Result<T, E = Error> =
	| { success: true; data: T }
	| { success: false; error: E }

/**
 * Mailgun error codes
 *
 * Transport, HTTP status and payload failures each get their own code so
 * callers can tell "never reached Mailgun" from "Mailgun said no" from
 * "Mailgun answered with something unreadable".
 */
export type MailgunErrorCode =
	| 'VALIDATION_ERROR'
	| 'AUTHENTICATION_ERROR'
	| 'RATE_LIMIT_ERROR'
	| 'NOT_FOUND_ERROR'
	| 'HTTP_ERROR'
	| 'TRANSPORT_ERROR'
	| 'PAYLOAD_ERROR'
	| 'UNKNOWN_ERROR'

/**
 * Mailgun call error with details
 */
export interface MailgunError {
	/** Error code */
	code: MailgunErrorCode
	/** Human-readable message */
	message: string
	/** HTTP status, when Mailgun answered */
	status?: number
	/** Original error if available */
	cause?: Error
	/** Parsed Mailgun error body */
	providerError?: Record<string, unknown>
}

/**
 * Successful send response
 */
export interface SendSuccess {
	/** Message ID assigned by Mailgun, e.g. `<20240101.1@mg.example.com>` */
	id: string
	/** Mailgun's status text, usually "Queued. Thank you." */
	message: string
	/** Provider name */
	provider: string
	/** Timestamp of send */
	sentAt: Date
}

/**
 * Single email send result
 */
export type SendResult = Result<SendSuccess, MailgunError>

/**
 * Batch send result with per-email status
 */
export interface BatchSendSuccess {
	/** Total emails processed */
	total: number
	/** Successfully sent count */
	successful: number
	/** Failed count */
	failed: number
	/** Processing duration in milliseconds */
	durationMs: number
	/** Individual results, in input order */
	results: Array<{
		index: number
		result: SendResult
		recipient?: string | undefined
	}>
}

export type BatchSendResult = Result<BatchSendSuccess, MailgunError>

// ============================================
// Result Factory Functions
// ============================================

/**
 * Create a success result
 */
export const ok = <T>(data: T): { success: true; data: T } => ({
	success: true,
	data,
})

/**
 * Create a failure result with the given error
 */
export const fail = <E>(error: E): { success: false; error: E } => ({
	success: false,
	error,
})

interface MailgunErrorOptions {
	status?: number
	cause?: Error
	providerError?: Record<string, unknown>
}

/**
 * Create a MailgunError object
 */
export const mailgunError = (
	code: MailgunErrorCode,
	message: string,
	options?: MailgunErrorOptions,
): MailgunError => ({
	code,
	message,
	...options,
})

/**
 * Create a failure result with a MailgunError
 */
export const mailgunFail = (
	code: MailgunErrorCode,
	message: string,
	options?: MailgunErrorOptions,
): { success: false; error: MailgunError } =>
	fail(mailgunError(code, message, options))
