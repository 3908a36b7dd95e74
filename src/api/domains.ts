/**
 * Domains endpoint
 */

import { z } from 'zod'

import type { HttpClient } from '../http/client.js'
import { requestJson } from '../http/client.js'
import { ENDPOINTS } from '../lib/constants.js'
import type { Credentials } from '../lib/credentials.js'
import type { MailgunDomain, MailgunError, Result } from '../types/index.js'

const domainResponseSchema = z
	.object({
		domain: z.object({
			name: z.string(),
			state: z.string(),
			type: z.string().default('custom'),
			// RFC 2822, e.g. "Thu, 13 Oct 2011 18:02:00 GMT"
			created_at: z.string().refine(value => !Number.isNaN(Date.parse(value)), {
				message: 'Invalid date',
			}),
			spam_action: z.string().nullish(),
			wildcard: z.boolean().default(false),
			smtp_login: z.string().nullish(),
			require_tls: z.boolean().default(false),
			skip_verification: z.boolean().default(false),
		}),
	})
	.transform(
		({ domain }): MailgunDomain => ({
			name: domain.name,
			state: domain.state,
			type: domain.type,
			createdAt: new Date(domain.created_at),
			spamAction: domain.spam_action ?? null,
			wildcard: domain.wildcard,
			smtpLogin: domain.smtp_login ?? null,
			requireTls: domain.require_tls,
			skipVerification: domain.skip_verification,
		}),
	)

/**
 * Fetch the sending domain through `GET /domains/{domain}`
 */
export const getDomain = async (
	http: HttpClient,
	credentials: Credentials,
): Promise<Result<MailgunDomain, MailgunError>> =>
	requestJson(
		http,
		{ method: 'get', url: ENDPOINTS.domain(credentials.domain) },
		domainResponseSchema,
	)
