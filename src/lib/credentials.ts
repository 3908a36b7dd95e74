/**
 * Mailgun credentials
 * API base, private API key and sending domain
 */

import { z } from 'zod'

import type { MailgunRegion } from './constants.js'
import { MAILGUN_API_BASES, MAILGUN_LIMITS } from './constants.js'

/**
 * Validated credentials, bound to one sending domain
 */
export interface Credentials {
	readonly apiBase: string
	readonly apiKey: string
	readonly domain: string
}

/**
 * Credentials input
 */
export interface CredentialsInput {
	/** Private API key */
	apiKey: string
	/** Sending domain, e.g. `mg.example.com` */
	domain: string
	/** Region, ignored when apiBase is given (default: 'us') */
	region?: MailgunRegion | undefined
	/** API base override, e.g. a local mock server */
	apiBase?: string | undefined
}

const credentialsSchema = z.object({
	apiBase: z
		.string()
		.refine(value => value.startsWith('http'), {
			message: 'apiBase does not start with http',
		})
		.refine(value => value.includes('.'), {
			message: 'apiBase does not contain any dots',
		})
		.transform(value => value.replace(/\/+$/, '')),
	apiKey: z.string().min(MAILGUN_LIMITS.minApiKeyLength, {
		message: 'apiKey is too short',
	}),
	domain: z.string().refine(value => value.includes('.'), {
		message: 'domain does not contain any dots',
	}),
})

/**
 * Create credentials, checking their structure
 *
 * @throws Error listing every failed check
 *
 * @example
 * ```typescript
 * const credentials = createCredentials({
 *   apiKey: process.env.MAILGUN_API_KEY ?? '',
 *   domain: 'mg.example.com',
 *   region: 'eu',
 * })
 * ```
 */
export const createCredentials = (input: CredentialsInput): Credentials => {
	const parsed = credentialsSchema.safeParse({
		apiBase: input.apiBase ?? MAILGUN_API_BASES[input.region ?? 'us'],
		apiKey: input.apiKey,
		domain: input.domain,
	})

	if (!parsed.success) {
		const reasons = parsed.error.issues.map(issue => issue.message)
		throw new Error(`Invalid Mailgun credentials: ${reasons.join('; ')}`)
	}

	return Object.freeze(parsed.data)
}
