/**
 * HTTP client
 * axios instance bound to one set of credentials, plus the JSON call helper
 * every endpoint goes through
 */

import type { AxiosInstance, AxiosRequestConfig } from 'axios'
import axios from 'axios'
import type { z } from 'zod'

import { DEFAULT_TIMEOUT } from '../lib/constants.js'
import type { Credentials } from '../lib/credentials.js'
import type { MailgunError, Result } from '../types/index.js'
import { fail, mailgunFail, ok } from '../types/index.js'
import { httpLogger } from '../utils/logger.js'
import { mapHttpError, mapRequestError } from './errors.js'

/**
 * The part of an axios instance the endpoints call
 */
export type HttpClient = Pick<AxiosInstance, 'request'>

/**
 * HTTP client options
 */
export interface HttpClientOptions {
	/** Request timeout in ms (default: 30000) */
	timeout?: number | undefined
}

/**
 * Create the axios instance used for Mailgun calls
 *
 * Every status is accepted and bodies are read as text, so status handling
 * and JSON decoding happen in requestJson where each failure gets its own
 * error code.
 */
export const createHttpClient = (
	credentials: Credentials,
	options: HttpClientOptions = {},
): AxiosInstance =>
	axios.create({
		baseURL: credentials.apiBase,
		auth: { username: 'api', password: credentials.apiKey },
		timeout: options.timeout ?? DEFAULT_TIMEOUT,
		headers: { Accept: 'application/json' },
		responseType: 'text',
		validateStatus: () => true,
	})

const isSuccessStatus = (status: number): boolean =>
	status >= 200 && status < 300

const decodeBody = (body: unknown): Result<unknown, MailgunError> => {
	if (typeof body !== 'string') return ok(body)

	try {
		return ok(JSON.parse(body))
	} catch (error) {
		return mailgunFail('PAYLOAD_ERROR', 'Response body is not valid JSON', {
			...(error instanceof Error && { cause: error }),
			providerError: { raw: body },
		})
	}
}

/**
 * Issue a request and decode the JSON answer against a schema
 *
 * @param http - axios instance from createHttpClient
 * @param config - Request config; url is relative to the API base
 * @param schema - Shape expected of a 2xx body
 */
export const requestJson = async <T>(
	http: HttpClient,
	config: AxiosRequestConfig,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<Result<T, MailgunError>> => {
	const method = (config.method ?? 'get').toUpperCase()
	const target = config.url ?? ''

	let status: number
	let body: unknown
	try {
		const response = await http.request<unknown>(config)
		status = response.status
		body = response.data
	} catch (error) {
		const mapped = mapRequestError(error)
		httpLogger.error(`${method} ${target} failed`, {
			details: { code: mapped.code, message: mapped.message },
		})
		return fail(mapped)
	}

	if (!isSuccessStatus(status)) {
		const mapped = mapHttpError(status, body)
		httpLogger.warn(`${method} ${target} returned ${status}`, {
			details: { code: mapped.code, message: mapped.message },
		})
		return fail(mapped)
	}

	const decoded = decodeBody(body)
	if (!decoded.success) return decoded

	const parsed = schema.safeParse(decoded.data)
	if (!parsed.success) {
		const reasons = parsed.error.issues.map(
			issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
		)
		return mailgunFail(
			'PAYLOAD_ERROR',
			`Unexpected response shape: ${reasons.join('; ')}`,
			{ status },
		)
	}

	return ok(parsed.data)
}
