/**
 * Email address parsing and formatting
 *
 * Parsing follows a minimal subset of RFC 5322: either a bare address or
 * `Display Name <address>`. It checks structure only; deliverability is what
 * the address validation endpoint is for.
 */

import type {
	EmailAddress,
	EmailRecipient,
	MailgunError,
	Result,
} from '../types/index.js'
import { mailgunFail, ok } from '../types/index.js'

const NAME_ADDRESS_PATTERN = /^(.*) <([^>]+)>$/
const DISPLAY_NAME_PATTERN = /^[^<>]+$/
const ADDRESS_PATTERN = /^[^<> ]+@[^<> ]+\.[^<> ]+$/

/**
 * Address without a display name
 */
export const emailAddress = (address: string): EmailAddress => ({
	email: address,
})

/**
 * Address with a display name
 */
export const namedAddress = (name: string, address: string): EmailAddress => ({
	email: address,
	name,
})

/**
 * Display form: `Name <address>` or just `address`
 */
export const formatAddress = (recipient: EmailRecipient): string => {
	if (typeof recipient === 'string') return recipient
	return recipient.name
		? `${recipient.name} <${recipient.email}>`
		: recipient.email
}

/**
 * Flatten one-or-many recipients into display forms
 */
export const formatAddresses = (
	recipients: EmailRecipient | EmailRecipient[],
): string[] => {
	const list = Array.isArray(recipients) ? recipients : [recipients]
	return list.map(formatAddress)
}

export const isValidDisplayName = (name: string): boolean =>
	DISPLAY_NAME_PATTERN.test(name)

export const isValidAddress = (address: string): boolean =>
	ADDRESS_PATTERN.test(address)

const checkAddress = (
	address: EmailAddress,
): Result<EmailAddress, MailgunError> => {
	// An empty name means no name, as in formatAddress
	if (address.name && !isValidDisplayName(address.name)) {
		return mailgunFail('VALIDATION_ERROR', 'Invalid display name')
	}
	if (!isValidAddress(address.email)) {
		return mailgunFail('VALIDATION_ERROR', 'Invalid email address')
	}
	return ok(address)
}

/**
 * Parse `address` or `Display Name <address>`
 *
 * @example
 * ```typescript
 * parseEmailAddress('Bob Test <bob@example.com>')
 * // { success: true, data: { name: 'Bob Test', email: 'bob@example.com' } }
 * ```
 */
export const parseEmailAddress = (
	input: string,
): Result<EmailAddress, MailgunError> => {
	const match = NAME_ADDRESS_PATTERN.exec(input)
	const name = match?.[1]
	const address = match?.[2]

	const parsed =
		name !== undefined && address !== undefined
			? namedAddress(name, address)
			: emailAddress(input)

	return checkAddress(parsed)
}

/**
 * Parse a string recipient or check an address object
 */
export const toEmailAddress = (
	recipient: EmailRecipient,
): Result<EmailAddress, MailgunError> =>
	typeof recipient === 'string'
		? parseEmailAddress(recipient)
		: checkAddress(recipient)
