/**
 * Library core modules
 * Barrel export for lib utilities
 */

export { loadMailerConfig, type MailerConfig, type MailerEnv } from './config.js'
export {
	DEFAULT_TIMEOUT,
	ENDPOINTS,
	MAILGUN_API_BASES,
	MAILGUN_DEFAULT_API,
	MAILGUN_LIMITS,
	type MailgunRegion,
} from './constants.js'
export {
	createCredentials,
	type Credentials,
	type CredentialsInput,
} from './credentials.js'
export {
	emailAddress,
	formatAddress,
	formatAddresses,
	namedAddress,
	parseEmailAddress,
	toEmailAddress,
} from './email-address.js'
