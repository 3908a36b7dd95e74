/**
 * Shared test utilities
 * Common test helpers used across endpoint, provider and mailer tests
 */

import FormData from 'form-data'
import type { Mock } from 'vitest'
import { vi } from 'vitest'

import type { HttpClient } from '../../http/client.js'
import type { Credentials } from '../../lib/credentials.js'
import { createCredentials } from '../../lib/credentials.js'
import type { EmailMessage } from '../../types/index.js'
import { isRecord } from '../../utils/index.js'

/** Placeholder key long enough to pass the credential checks */
export const TEST_API_KEY = 'test-api-key'.padEnd(40, '0')

export const TEST_DOMAIN = 'mg.example.com'

/**
 * Credentials for the default US API base
 */
export const createTestCredentials = (): Credentials =>
	createCredentials({ apiKey: TEST_API_KEY, domain: TEST_DOMAIN })

/**
 * Mock axios instance; only `request` is used by the library
 */
export interface MockHttp {
	request: Mock
	/** Same mock, typed for the code under test */
	http: HttpClient
}

export const createMockHttp = (): MockHttp => {
	const request = vi.fn()
	return { request, http: { request } }
}

/**
 * Response as the text-mode axios instance returns it
 */
export const jsonResponse = (
	status: number,
	body: unknown,
): { status: number; data: string } => ({
	status,
	data: JSON.stringify(body),
})

/**
 * Mailgun's answer to an accepted message
 */
export const queuedResponse = (
	id = '<20240102030405.1.ABCDEF@mg.example.com>',
): { status: number; data: string } =>
	jsonResponse(200, { id, message: 'Queued. Thank you.' })

/**
 * Create a test email message with optional overrides
 *
 * @param overrides - Optional partial message to merge
 * @returns Complete test email message
 */
export const createTestMessage = (
	overrides: Partial<EmailMessage> = {},
): EmailMessage => ({
	from: 'sender@mg.example.com',
	to: 'recipient@example.com',
	subject: 'Test Email',
	html: '<h1>Hello</h1>',
	...overrides,
})

/**
 * Multipart body of the nth request made through a mock, as text
 */
export const sentForm = (request: Mock, call = 0): string => {
	const config: unknown = request.mock.calls[call]?.[0]
	const data = isRecord(config) ? config['data'] : undefined
	if (!(data instanceof FormData)) {
		throw new Error(`Request ${call} carried no form body`)
	}
	return data.getBuffer().toString('utf8')
}
