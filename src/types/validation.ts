/**
 * Address validation type definitions
 */

/**
 * Parts of a parsed address
 */
export interface AddressParts {
	displayName: string | null
	domain: string | null
	localPart: string | null
}

/**
 * Address validation outcome
 */
export interface AddressValidation {
	/** Address as submitted */
	address: string
	/** Suggested correction for a likely typo */
	didYouMean: string | null
	isDisposableAddress: boolean
	isRoleAddress: boolean
	isValid: boolean
	/** `true`, `false` or `unknown`; null when not requested */
	mailboxVerification: string | null
	parts: AddressParts
	/** Why the address was judged invalid */
	reason: string | null
}

/**
 * Address validation request options
 */
export interface ValidateAddressOptions {
	/** Ask Mailgun to probe the mailbox as well */
	mailboxVerification?: boolean
}
