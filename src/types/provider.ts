/**
 * Provider type definitions
 * Strategy pattern interface for email providers
 */

import type { EmailMessage } from './email.js'
import type { BatchSendResult, SendResult } from './result.js'

/**
 * Email provider interface - Strategy pattern
 */
export interface EmailProvider {
	/** Provider name identifier */
	readonly name: string

	/**
	 * Send a single email
	 */
	send(message: EmailMessage): Promise<SendResult>

	/**
	 * Send multiple emails, one request each
	 */
	sendBatch(messages: EmailMessage[]): Promise<BatchSendResult>

	/**
	 * Validate provider configuration
	 */
	validateConfig(): Promise<boolean>
}
