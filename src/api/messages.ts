/**
 * Messages endpoint
 * Maps EmailMessage to Mailgun's multipart form and the JSON answer back to
 * a SendResult
 */

import FormData from 'form-data'
import { z } from 'zod'

import type { HttpClient } from '../http/client.js'
import { requestJson } from '../http/client.js'
import { ENDPOINTS, MAILGUN_LIMITS, PROVIDER_NAME } from '../lib/constants.js'
import type { Credentials } from '../lib/credentials.js'
import {
	formatAddress,
	formatAddresses,
	toEmailAddress,
} from '../lib/email-address.js'
import type {
	EmailAttachment,
	EmailMessage,
	EmailRecipient,
	MailgunError,
	Result,
	SendResult,
} from '../types/index.js'
import { mailgunFail, ok } from '../types/index.js'
import { toRfc2822, yesNo } from '../utils/index.js'
import { logger } from '../utils/logger.js'

/**
 * One multipart form field
 */
export type FormField =
	| { kind: 'text'; name: string; value: string }
	| {
			kind: 'file'
			name: 'attachment' | 'inline'
			filename: string
			content: Buffer
			contentType?: string | undefined
	  }

const sendResponseSchema = z.object({
	id: z.string(),
	message: z.string(),
})

const text = (name: string, value: string): FormField => ({
	kind: 'text',
	name,
	value,
})

const toList = (
	recipients: EmailRecipient | EmailRecipient[] | undefined,
): EmailRecipient[] => {
	if (recipients === undefined) return []
	return Array.isArray(recipients) ? recipients : [recipients]
}

const recipientEmail = (recipient: EmailRecipient): string | undefined => {
	const parsed = toEmailAddress(recipient)
	return parsed.success ? parsed.data.email : undefined
}

/**
 * Check the structure of a message before any request is made
 */
export const validateMessage = (
	message: EmailMessage,
): Result<void, MailgunError> => {
	const to = toList(message.to)

	const requiredChecks = [
		{ check: !message.from, msg: 'Missing required field: from' },
		{ check: to.length === 0, msg: 'Missing required field: to' },
		{ check: !message.subject, msg: 'Missing required field: subject' },
		{
			check: !message.html && !message.text && !message.template,
			msg: 'Either html, text or template content is required',
		},
	]

	for (const { check, msg } of requiredChecks) {
		if (check) return mailgunFail('VALIDATION_ERROR', msg)
	}

	const addressFields: Array<[string, EmailRecipient[]]> = [
		['from', toList(message.from)],
		['to', to],
		['cc', toList(message.cc)],
		['bcc', toList(message.bcc)],
		['replyTo', toList(message.replyTo)],
	]

	for (const [field, recipients] of addressFields) {
		for (const recipient of recipients) {
			const parsed = toEmailAddress(recipient)
			if (!parsed.success) {
				return mailgunFail(
					'VALIDATION_ERROR',
					`${field}: ${parsed.error.message} (${formatAddress(recipient)})`,
				)
			}
		}
	}

	if (to.length > MAILGUN_LIMITS.maxRecipients) {
		return mailgunFail(
			'VALIDATION_ERROR',
			`Too many recipients: ${to.length} exceeds maximum ${MAILGUN_LIMITS.maxRecipients}`,
		)
	}

	const tagCount = message.tags?.length ?? 0
	if (tagCount > MAILGUN_LIMITS.maxTags) {
		return mailgunFail(
			'VALIDATION_ERROR',
			`Too many tags: ${tagCount} exceeds maximum ${MAILGUN_LIMITS.maxTags}`,
		)
	}

	if (message.recipientVariables) {
		const known = new Set(to.map(recipientEmail))
		const unknown = Object.keys(message.recipientVariables).find(
			address => !known.has(address),
		)
		if (unknown !== undefined) {
			return mailgunFail(
				'VALIDATION_ERROR',
				`Recipient variables given for unknown recipient: ${unknown}`,
			)
		}
	}

	return ok(undefined)
}

const mapRecipients = (message: EmailMessage): FormField[] => [
	text('from', formatAddress(message.from)),
	...formatAddresses(message.to).map(value => text('to', value)),
	...toList(message.cc).map(r => text('cc', formatAddress(r))),
	...toList(message.bcc).map(r => text('bcc', formatAddress(r))),
]

const mapContent = (message: EmailMessage): FormField[] => {
	const fields: FormField[] = []
	if (message.text) fields.push(text('text', message.text))
	if (message.html) fields.push(text('html', message.html))

	const { template } = message
	if (template) {
		fields.push(text('template', template.name))
		if (template.version) fields.push(text('t:version', template.version))
		if (template.renderText) fields.push(text('t:text', 'yes'))
		if (template.variables) {
			fields.push(
				text('h:X-Mailgun-Variables', JSON.stringify(template.variables)),
			)
		}
	}
	return fields
}

const mapHeaders = (message: EmailMessage): FormField[] => {
	const fields: FormField[] = []
	const replyTo = toList(message.replyTo)
	if (replyTo.length > 0) {
		fields.push(text('h:Reply-To', replyTo.map(formatAddress).join(', ')))
	}
	for (const header of message.headers ?? []) {
		fields.push(text(`h:${header.name}`, header.value))
	}
	return fields
}

const mapOptions = (message: EmailMessage): FormField[] => {
	const fields: FormField[] = (message.tags ?? []).map(tag =>
		text('o:tag', tag),
	)

	if (message.scheduledAt) {
		fields.push(
			text(
				'o:deliverytime',
				message.scheduledAt instanceof Date
					? toRfc2822(message.scheduledAt)
					: message.scheduledAt,
			),
		)
	}

	const flags: Array<[string, boolean | undefined]> = [
		['o:testmode', message.testMode],
		['o:tracking', message.tracking],
		['o:tracking-opens', message.trackingOpens],
		['o:dkim', message.dkim],
		['o:require-tls', message.requireTls],
		['o:skip-verification', message.skipVerification],
	]
	for (const [name, flag] of flags) {
		if (flag !== undefined) fields.push(text(name, yesNo(flag)))
	}

	if (message.trackingClicks !== undefined) {
		fields.push(
			text(
				'o:tracking-clicks',
				message.trackingClicks === 'htmlonly'
					? 'htmlonly'
					: yesNo(message.trackingClicks),
			),
		)
	}
	return fields
}

const mapVariables = (message: EmailMessage): FormField[] => {
	const fields = Object.entries(message.variables ?? {}).map(([key, value]) =>
		text(`v:${key}`, typeof value === 'string' ? value : JSON.stringify(value)),
	)
	if (message.recipientVariables) {
		fields.push(
			text('recipient-variables', JSON.stringify(message.recipientVariables)),
		)
	}
	return fields
}

const mapFiles = (
	name: 'attachment' | 'inline',
	files: EmailAttachment[] | undefined,
): FormField[] =>
	(files ?? []).map((file): FormField => ({
		kind: 'file',
		name,
		filename: file.filename,
		content:
			typeof file.content === 'string'
				? Buffer.from(file.content, 'utf8')
				: file.content,
		contentType: file.contentType,
	}))

/**
 * Map a message to Mailgun form fields, in send order
 *
 * @example
 * ```typescript
 * buildMessageFields({
 *   from: 'Shop <noreply@mg.example.com>',
 *   to: ['a@example.com', 'b@example.com'],
 *   subject: 'Hi',
 *   text: 'Hello',
 *   tags: ['welcome'],
 * })
 * // from, to, to, subject, text, o:tag
 * ```
 */
export const buildMessageFields = (message: EmailMessage): FormField[] => [
	...mapRecipients(message),
	text('subject', message.subject),
	...mapContent(message),
	...mapHeaders(message),
	...mapOptions(message),
	...mapVariables(message),
	...mapFiles('attachment', message.attachments),
	...mapFiles('inline', message.inline),
]

/**
 * Encode form fields as multipart/form-data
 */
export const toFormData = (fields: FormField[]): FormData => {
	const form = new FormData()
	for (const field of fields) {
		if (field.kind === 'file') {
			form.append(field.name, field.content, {
				filename: field.filename,
				...(field.contentType && { contentType: field.contentType }),
			})
		} else {
			form.append(field.name, field.value)
		}
	}
	return form
}

/**
 * Send a message through `POST /{domain}/messages`
 *
 * No request is made for a message that fails validateMessage.
 */
export const sendMessage = async (
	http: HttpClient,
	credentials: Credentials,
	message: EmailMessage,
): Promise<SendResult> => {
	const validation = validateMessage(message)
	if (!validation.success) return validation

	const form = toFormData(buildMessageFields(message))
	const result = await requestJson(
		http,
		{
			method: 'post',
			url: ENDPOINTS.messages(credentials.domain),
			data: form,
			headers: form.getHeaders(),
		},
		sendResponseSchema,
	)
	if (!result.success) return result

	logger.info('Message queued', {
		details: {
			id: result.data.id,
			domain: credentials.domain,
			recipients: toList(message.to).length,
		},
	})

	return ok({
		id: result.data.id,
		message: result.data.message,
		provider: PROVIDER_NAME,
		sentAt: new Date(),
	})
}
