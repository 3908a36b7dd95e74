/**
 * Mailer configuration
 * Programmatic shape plus loading from `MAILGUN_*` environment variables
 */

import { z } from 'zod'

import type { EmailRecipient } from '../types/index.js'
import { DEFAULT_TIMEOUT } from './constants.js'
import type { CredentialsInput } from './credentials.js'

/**
 * Mailer configuration
 */
export interface MailerConfig {
	/** API key, sending domain and region or API base */
	credentials: CredentialsInput
	/** Request timeout in ms (default: 30000) */
	timeout?: number | undefined
	/** Sender used when a message has none */
	defaultFrom?: EmailRecipient | undefined
	/** Send every message in test mode unless it says otherwise */
	testMode?: boolean | undefined
	/** Key used to verify webhook signatures */
	webhookSigningKey?: string | undefined
}

const booleanFlag = z
	.enum(['true', 'false', '1', '0', 'yes', 'no'])
	.transform(value => value === 'true' || value === '1' || value === 'yes')

/**
 * Environment variables read by loadMailerConfig
 */
export const mailerEnvSchema = z.object({
	MAILGUN_API_KEY: z.string().min(1, 'MAILGUN_API_KEY is required'),
	MAILGUN_DOMAIN: z.string().min(1, 'MAILGUN_DOMAIN is required'),
	MAILGUN_REGION: z.enum(['us', 'eu']).optional(),
	MAILGUN_API_BASE: z.string().url().optional(),
	MAILGUN_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT),
	MAILGUN_DEFAULT_FROM: z.string().min(1).optional(),
	MAILGUN_TEST_MODE: booleanFlag.optional(),
	MAILGUN_WEBHOOK_SIGNING_KEY: z.string().min(1).optional(),
})

export type MailerEnv = z.infer<typeof mailerEnvSchema>

/**
 * Build a MailerConfig from environment variables
 *
 * @param env - Variables to read (default: process.env)
 * @throws Error naming every missing or malformed variable
 *
 * @example
 * ```typescript
 * const mailer = createMailer(loadMailerConfig())
 * ```
 */
export const loadMailerConfig = (
	env: Record<string, string | undefined> = process.env,
): MailerConfig => {
	const parsed = mailerEnvSchema.safeParse(env)

	if (!parsed.success) {
		const reasons = parsed.error.issues.map(
			issue => `${issue.path.join('.')}: ${issue.message}`,
		)
		throw new Error(`Invalid Mailgun configuration: ${reasons.join('; ')}`)
	}

	const vars = parsed.data

	return {
		credentials: {
			apiKey: vars.MAILGUN_API_KEY,
			domain: vars.MAILGUN_DOMAIN,
			region: vars.MAILGUN_REGION,
			apiBase: vars.MAILGUN_API_BASE,
		},
		timeout: vars.MAILGUN_TIMEOUT_MS,
		defaultFrom: vars.MAILGUN_DEFAULT_FROM,
		testMode: vars.MAILGUN_TEST_MODE,
		webhookSigningKey: vars.MAILGUN_WEBHOOK_SIGNING_KEY,
	}
}
