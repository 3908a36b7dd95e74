/**
 * Utility functions for the library
 */

/**
 * Extract error message from unknown error
 * Standardizes error message extraction across the codebase
 *
 * @param error - Unknown error value
 * @param fallback - Fallback message if error is not an Error instance
 * @returns Error message string
 */
export const getErrorMessage = (
	error: unknown,
	fallback = 'Unknown error',
): string => (error instanceof Error ? error.message : fallback)

/**
 * Format a date the way Mailgun expects it (RFC 2822, UTC)
 *
 * @example
 * ```typescript
 * toRfc2822(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))
 * // 'Tue, 02 Jan 2024 03:04:05 GMT'
 * ```
 */
export const toRfc2822 = (date: Date): string => date.toUTCString()

/**
 * Mailgun's boolean form field values
 */
export const yesNo = (flag: boolean): 'yes' | 'no' => (flag ? 'yes' : 'no')

/**
 * Narrow an unknown value to a plain object
 */
export const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value)
