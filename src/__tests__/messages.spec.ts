/**
 * Messages endpoint tests
 * Form mapping, local validation and response handling
 */

import { AxiosError } from 'axios'
import { beforeEach, describe, expect, it, vi } from 'vitest'

import type { FormField } from '../api/messages.js'
import {
	buildMessageFields,
	sendMessage,
	toFormData,
	validateMessage,
} from '../api/messages.js'

import {
	createMockHttp,
	createTestCredentials,
	createTestMessage,
	jsonResponse,
	queuedResponse,
	sentForm,
} from './helpers/test-utils.js'

vi.mock('../utils/logger.js', () => ({
	logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
	httpLogger: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}))

const pairs = (fields: FormField[]): Array<[string, string]> =>
	fields.map(field => [
		field.name,
		field.kind === 'text' ? field.value : field.filename,
	])

describe('Messages endpoint', () => {
	beforeEach(() => {
		vi.clearAllMocks()
	})

	describe('buildMessageFields', () => {
		it('should map a full message in send order', () => {
			const fields = buildMessageFields({
				from: { email: 'noreply@mg.example.com', name: 'Example Shop' },
				to: ['alice@example.com', { email: 'bob@example.com', name: 'Bob' }],
				cc: 'carol@example.com',
				bcc: ['audit@example.com'],
				subject: 'Order shipped',
				text: 'Your order shipped',
				html: '<p>Your order shipped</p>',
				replyTo: ['support@example.com', 'Sales <sales@example.com>'],
				headers: [{ name: 'X-Campaign', value: 'spring' }],
				tags: ['orders', 'shipping'],
				scheduledAt: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
				testMode: true,
				trackingOpens: false,
				trackingClicks: 'htmlonly',
				variables: { orderId: 'A-100', meta: { items: 2 } },
			})

			expect(pairs(fields)).toEqual([
				['from', 'Example Shop <noreply@mg.example.com>'],
				['to', 'alice@example.com'],
				['to', 'Bob <bob@example.com>'],
				['cc', 'carol@example.com'],
				['bcc', 'audit@example.com'],
				['subject', 'Order shipped'],
				['text', 'Your order shipped'],
				['html', '<p>Your order shipped</p>'],
				['h:Reply-To', 'support@example.com, Sales <sales@example.com>'],
				['h:X-Campaign', 'spring'],
				['o:tag', 'orders'],
				['o:tag', 'shipping'],
				['o:deliverytime', 'Tue, 02 Jan 2024 03:04:05 GMT'],
				['o:testmode', 'yes'],
				['o:tracking-opens', 'no'],
				['o:tracking-clicks', 'htmlonly'],
				['v:orderId', 'A-100'],
				['v:meta', '{"items":2}'],
			])
		})

		it('should map a stored template', () => {
			const fields = buildMessageFields(
				createTestMessage({
					html: undefined,
					template: {
						name: 'welcome',
						version: 'v2',
						renderText: true,
						variables: { name: 'Jane' },
					},
				}),
			)

			expect(pairs(fields).slice(3)).toEqual([
				['template', 'welcome'],
				['t:version', 'v2'],
				['t:text', 'yes'],
				['h:X-Mailgun-Variables', '{"name":"Jane"}'],
			])
		})

		it('should pass a pre-formatted delivery time through', () => {
			const fields = buildMessageFields(
				createTestMessage({ scheduledAt: 'Fri, 14 Oct 2011 23:10:10 -0000' }),
			)

			expect(pairs(fields)).toContainEqual([
				'o:deliverytime',
				'Fri, 14 Oct 2011 23:10:10 -0000',
			])
		})

		it('should map boolean click tracking and recipient variables', () => {
			const fields = buildMessageFields(
				createTestMessage({
					to: ['a@example.com', 'b@example.com'],
					trackingClicks: false,
					recipientVariables: {
						'a@example.com': { first: 'A' },
						'b@example.com': { first: 'B' },
					},
				}),
			)

			expect(pairs(fields).slice(-2)).toEqual([
				['o:tracking-clicks', 'no'],
				[
					'recipient-variables',
					'{"a@example.com":{"first":"A"},"b@example.com":{"first":"B"}}',
				],
			])
		})

		it('should map attachments and inline images as file fields', () => {
			const logo = Buffer.from([0x89, 0x50, 0x4e, 0x47])
			const fields = buildMessageFields(
				createTestMessage({
					attachments: [
						{ filename: 'notes.txt', content: 'hello', contentType: 'text/plain' },
					],
					inline: [{ filename: 'logo.png', content: logo }],
				}),
			)

			expect(fields.slice(-2)).toEqual([
				{
					kind: 'file',
					name: 'attachment',
					filename: 'notes.txt',
					content: Buffer.from('hello', 'utf8'),
					contentType: 'text/plain',
				},
				{
					kind: 'file',
					name: 'inline',
					filename: 'logo.png',
					content: logo,
					contentType: undefined,
				},
			])
		})
	})

	describe('toFormData', () => {
		it('should encode text and file fields', () => {
			const form = toFormData([
				{ kind: 'text', name: 'subject', value: 'Hi' },
				{
					kind: 'file',
					name: 'attachment',
					filename: 'notes.txt',
					content: Buffer.from('hello'),
					contentType: 'text/plain',
				},
			])
			const body = form.getBuffer().toString('utf8')

			expect(body).toContain(
				'Content-Disposition: form-data; name="subject"\r\n\r\nHi\r\n',
			)
			expect(body).toContain(
				'Content-Disposition: form-data; name="attachment"; filename="notes.txt"\r\nContent-Type: text/plain\r\n\r\nhello\r\n',
			)
		})
	})

	describe('validateMessage', () => {
		it('should accept a minimal message', () => {
			expect(validateMessage(createTestMessage())).toEqual({
				success: true,
				data: undefined,
			})
		})

		it.each([
			[{ subject: '' }, 'Missing required field: subject'],
			[{ to: [] }, 'Missing required field: to'],
			[
				{ html: undefined },
				'Either html, text or template content is required',
			],
			[
				{ to: 'not-an-address' },
				'to: Invalid email address (not-an-address)',
			],
			[
				{ cc: ['<Ops> <ops@example.com>'] },
				'cc: Invalid display name (<Ops> <ops@example.com>)',
			],
			[
				{ tags: ['a', 'b', 'c', 'd'] },
				'Too many tags: 4 exceeds maximum 3',
			],
			[
				{ recipientVariables: { 'other@example.com': { first: 'O' } } },
				'Recipient variables given for unknown recipient: other@example.com',
			],
		])('should reject %o', (overrides, message) => {
			const result = validateMessage(createTestMessage(overrides))

			expect(result).toEqual({
				success: false,
				error: { code: 'VALIDATION_ERROR', message },
			})
		})

		it('should reject more than 1000 recipients', () => {
			const to = Array.from({ length: 1001 }, (_, i) => `user${i}@example.com`)

			const result = validateMessage(createTestMessage({ to }))

			expect(result.success).toBe(false)
			if (!result.success) {
				expect(result.error.message).toBe(
					'Too many recipients: 1001 exceeds maximum 1000',
				)
			}
		})

		it('should match recipient variables against named recipients', () => {
			const result = validateMessage(
				createTestMessage({
					to: 'Alice <alice@example.com>',
					recipientVariables: { 'alice@example.com': { first: 'Alice' } },
				}),
			)

			expect(result.success).toBe(true)
		})
	})

	describe('sendMessage', () => {
		const credentials = createTestCredentials()

		it('should post the form and return the queued id', async () => {
			const { request, http } = createMockHttp()
			request.mockResolvedValue(queuedResponse('<msg.1@mg.example.com>'))

			const result = await sendMessage(
				http,
				credentials,
				createTestMessage({ subject: 'Hi' }),
			)

			expect(result.success).toBe(true)
			if (result.success) {
				expect(result.data.id).toBe('<msg.1@mg.example.com>')
				expect(result.data.message).toBe('Queued. Thank you.')
				expect(result.data.provider).toBe('mailgun')
				expect(result.data.sentAt).toBeInstanceOf(Date)
			}

			expect(request).toHaveBeenCalledTimes(1)
			expect(request).toHaveBeenCalledWith(
				expect.objectContaining({
					method: 'post',
					url: 'mg.example.com/messages',
					headers: {
						'content-type': expect.stringMatching(
							/^multipart\/form-data; boundary=/,
						),
					},
				}),
			)
			expect(sentForm(request)).toContain('name="subject"\r\n\r\nHi\r\n')
		})

		it('should not call Mailgun for an invalid message', async () => {
			const { request, http } = createMockHttp()

			const result = await sendMessage(
				http,
				credentials,
				createTestMessage({ from: 'nobody' }),
			)

			expect(result.success).toBe(false)
			expect(request).not.toHaveBeenCalled()
		})

		it('should map a rejected key to an authentication error', async () => {
			const { request, http } = createMockHttp()
			request.mockResolvedValue({ status: 401, data: 'Forbidden' })

			const result = await sendMessage(http, credentials, createTestMessage())

			expect(result).toEqual({
				success: false,
				error: {
					code: 'AUTHENTICATION_ERROR',
					message: 'HTTP 401',
					status: 401,
					providerError: { raw: 'Forbidden' },
				},
			})
		})

		it('should surface Mailgun error messages', async () => {
			const { request, http } = createMockHttp()
			request.mockResolvedValue(
				jsonResponse(400, { message: "'to' parameter is not a valid address" }),
			)

			const result = await sendMessage(http, credentials, createTestMessage())

			expect(result.success).toBe(false)
			if (!result.success) {
				expect(result.error.code).toBe('HTTP_ERROR')
				expect(result.error.status).toBe(400)
				expect(result.error.message).toBe(
					"'to' parameter is not a valid address",
				)
			}
		})

		it('should report a body that is not JSON as a payload error', async () => {
			const { request, http } = createMockHttp()
			request.mockResolvedValue({ status: 200, data: '<html>maintenance</html>' })

			const result = await sendMessage(http, credentials, createTestMessage())

			expect(result.success).toBe(false)
			if (!result.success) {
				expect(result.error.code).toBe('PAYLOAD_ERROR')
				expect(result.error.message).toBe('Response body is not valid JSON')
				expect(result.error.providerError).toEqual({
					raw: '<html>maintenance</html>',
				})
			}
		})

		it('should report an unexpected body shape as a payload error', async () => {
			const { request, http } = createMockHttp()
			request.mockResolvedValue(jsonResponse(200, { message: 'Queued' }))

			const result = await sendMessage(http, credentials, createTestMessage())

			expect(result).toEqual({
				success: false,
				error: {
					code: 'PAYLOAD_ERROR',
					message: 'Unexpected response shape: id: Required',
					status: 200,
				},
			})
		})

		it('should report a timeout as a transport error', async () => {
			const { request, http } = createMockHttp()
			const timeout = new AxiosError(
				'timeout of 30000ms exceeded',
				'ECONNABORTED',
			)
			request.mockRejectedValue(timeout)

			const result = await sendMessage(http, credentials, createTestMessage())

			expect(result).toEqual({
				success: false,
				error: {
					code: 'TRANSPORT_ERROR',
					message: 'Request to Mailgun failed: timeout of 30000ms exceeded',
					cause: timeout,
				},
			})
		})
	})
})
