/**
 * Email type definitions
 * Core types for outbound messages, recipients, and attachments
 */

/**
 * Email address with an optional display name
 */
export interface EmailAddress {
	email: string
	name?: string | undefined
}

/**
 * Email recipient - string (`addr` or `Name <addr>`) or address object
 */
export type EmailRecipient = string | EmailAddress

/**
 * Email attachment
 */
export interface EmailAttachment {
	/** Filename with extension; for inline images this is the `cid` */
	filename: string
	/** Raw content; strings are sent as UTF-8 */
	content: Buffer | string
	/** Optional content type (e.g., 'application/pdf') */
	contentType?: string | undefined
}

/**
 * Custom MIME header, sent as `h:<name>`
 */
export interface EmailHeader {
	name: string
	value: string
}

/**
 * Stored Mailgun template reference
 */
export interface EmailTemplate {
	/** Template name as stored on the domain */
	name: string
	/** Template version tag, active version when omitted */
	version?: string | undefined
	/** Variables substituted into the template */
	variables?: Record<string, unknown> | undefined
	/** Also render a text/plain part from the template */
	renderText?: boolean | undefined
}

/** Click tracking accepts an HTML-only mode on top of on/off */
export type ClickTracking = boolean | 'htmlonly'

/**
 * Core email message interface
 */
export interface EmailMessage {
	/** Sender address */
	from: EmailRecipient
	/** Primary recipient(s) - max 1000 */
	to: EmailRecipient | EmailRecipient[]
	/** Email subject */
	subject: string
	/** CC recipients */
	cc?: EmailRecipient | EmailRecipient[] | undefined
	/** BCC recipients */
	bcc?: EmailRecipient | EmailRecipient[] | undefined
	/** Reply-to address(es) */
	replyTo?: EmailRecipient | EmailRecipient[] | undefined
	/** HTML content */
	html?: string | undefined
	/** Plain text content */
	text?: string | undefined
	/** Stored template, in place of html/text */
	template?: EmailTemplate | undefined
	/** File attachments */
	attachments?: EmailAttachment[] | undefined
	/** Inline images, referenced from HTML as `cid:<filename>` */
	inline?: EmailAttachment[] | undefined
	/** Custom headers */
	headers?: EmailHeader[] | undefined
	/** Tags for tracking - max 3 */
	tags?: string[] | undefined
	/** Custom data attached to the message, sent as `v:<key>` */
	variables?: Record<string, unknown> | undefined
	/** Per-recipient substitutions for batch sending, keyed by address */
	recipientVariables?: Record<string, Record<string, unknown>> | undefined
	/** Schedule send time (RFC 2822 string or Date) */
	scheduledAt?: string | Date | undefined
	/** Accept the message without delivering it */
	testMode?: boolean | undefined
	/** Toggle all tracking */
	tracking?: boolean | undefined
	/** Toggle click tracking */
	trackingClicks?: ClickTracking | undefined
	/** Toggle open tracking */
	trackingOpens?: boolean | undefined
	/** Require TLS to the receiving server */
	requireTls?: boolean | undefined
	/** Skip certificate and hostname checks when TLS is required */
	skipVerification?: boolean | undefined
	/** Toggle DKIM signing */
	dkim?: boolean | undefined
}

/**
 * Message sent with a stored template; html/text come from the template
 */
export interface TemplatedEmailMessage
	extends Omit<EmailMessage, 'html' | 'text' | 'template'> {
	template: EmailTemplate
}
