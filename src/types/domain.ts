/**
 * Domain type definitions
 */

/**
 * Sending domain as registered with Mailgun
 */
export interface MailgunDomain {
	name: string
	/** `active`, `unverified` or `disabled` */
	state: string
	/** `custom` or `sandbox` */
	type: string
	createdAt: Date
	spamAction: string | null
	wildcard: boolean
	smtpLogin: string | null
	requireTls: boolean
	skipVerification: boolean
}
