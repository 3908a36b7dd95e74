/**
 * Mailgun API constants
 */

/**
 * API base URL per region
 */
export const MAILGUN_API_BASES = {
	us: 'https://api.mailgun.net/v3',
	eu: 'https://api.eu.mailgun.net/v3',
} as const

export type MailgunRegion = keyof typeof MAILGUN_API_BASES

/** Default API base (US region) */
export const MAILGUN_DEFAULT_API = MAILGUN_API_BASES.us

/**
 * Endpoint paths, relative to the API base
 */
export const ENDPOINTS = {
	messages: (domain: string): string => `${domain}/messages`,
	domain: (domain: string): string => `domains/${domain}`,
	addressValidation: 'address/private/validate',
} as const

/**
 * Request and message limits
 */
export const MAILGUN_LIMITS = {
	/** Recipients in a single `to` list (batch sending) */
	maxRecipients: 1000,
	/** Tags per message */
	maxTags: 3,
	/** Messages per provider sendBatch call */
	maxBatchSize: 100,
	/** Shortest API key accepted */
	minApiKeyLength: 35,
} as const

/** Default request timeout in milliseconds */
export const DEFAULT_TIMEOUT = 30_000

/** Default webhook timestamp tolerance in seconds */
export const DEFAULT_WEBHOOK_TOLERANCE = 300

/** Provider name reported in send results */
export const PROVIDER_NAME = 'mailgun'
