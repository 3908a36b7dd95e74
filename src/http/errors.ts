/**
 * HTTP error mapping
 * Turns axios failures and non-2xx answers into MailgunError values
 */

import { isAxiosError } from 'axios'

import type { MailgunError, MailgunErrorCode } from '../types/index.js'
import { mailgunError } from '../types/index.js'
import { isRecord } from '../utils/index.js'

/**
 * Error code for a non-2xx status
 */
export const codeForStatus = (status: number): MailgunErrorCode => {
	switch (status) {
		case 401:
		case 403:
			return 'AUTHENTICATION_ERROR'
		case 404:
			return 'NOT_FOUND_ERROR'
		case 429:
			return 'RATE_LIMIT_ERROR'
		default:
			return 'HTTP_ERROR'
	}
}

/**
 * Best-effort read of an error body: JSON object, or the raw text
 */
const readErrorBody = (body: unknown): Record<string, unknown> | undefined => {
	if (isRecord(body)) return body
	if (typeof body !== 'string' || body.length === 0) return undefined

	try {
		const parsed: unknown = JSON.parse(body)
		return isRecord(parsed) ? parsed : { raw: body }
	} catch {
		return { raw: body }
	}
}

/**
 * Map a non-2xx response to a MailgunError
 *
 * Mailgun error bodies look like `{ "message": "Invalid private key" }`;
 * that message is used when present.
 */
export const mapHttpError = (status: number, body: unknown): MailgunError => {
	const providerError = readErrorBody(body)
	const providerMessage = providerError?.['message']

	return mailgunError(
		codeForStatus(status),
		typeof providerMessage === 'string' && providerMessage.length > 0
			? providerMessage
			: `HTTP ${status}`,
		{ status, ...(providerError && { providerError }) },
	)
}

/**
 * Map a rejected request to a MailgunError
 *
 * An axios error without a response never reached Mailgun (DNS, refused
 * connection, timeout) and is a transport failure.
 */
export const mapRequestError = (error: unknown): MailgunError => {
	if (isAxiosError(error)) {
		if (error.response) {
			return {
				...mapHttpError(error.response.status, error.response.data),
				cause: error,
			}
		}

		return mailgunError(
			'TRANSPORT_ERROR',
			`Request to Mailgun failed: ${error.message}`,
			{ cause: error },
		)
	}

	if (error instanceof Error) {
		return mailgunError('UNKNOWN_ERROR', error.message, { cause: error })
	}

	return mailgunError('UNKNOWN_ERROR', 'An unknown error occurred', {
		providerError: { raw: error },
	})
}
