/**
 * Address validation endpoint
 */

import { z } from 'zod'

import type { HttpClient } from '../http/client.js'
import { requestJson } from '../http/client.js'
import { ENDPOINTS } from '../lib/constants.js'
import type {
	AddressValidation,
	MailgunError,
	Result,
	ValidateAddressOptions,
} from '../types/index.js'
import { mailgunFail } from '../types/index.js'

const nullableString = z
	.string()
	.nullish()
	.transform(value => value ?? null)

const validationResponseSchema = z
	.object({
		address: z.string(),
		did_you_mean: nullableString,
		is_disposable_address: z.boolean().default(false),
		is_role_address: z.boolean().default(false),
		is_valid: z.boolean(),
		mailbox_verification: nullableString,
		parts: z
			.object({
				display_name: nullableString,
				domain: nullableString,
				local_part: nullableString,
			})
			.default({}),
		reason: nullableString,
	})
	.transform(
		(body): AddressValidation => ({
			address: body.address,
			didYouMean: body.did_you_mean,
			isDisposableAddress: body.is_disposable_address,
			isRoleAddress: body.is_role_address,
			isValid: body.is_valid,
			mailboxVerification: body.mailbox_verification,
			parts: {
				displayName: body.parts.display_name,
				domain: body.parts.domain,
				localPart: body.parts.local_part,
			},
			reason: body.reason,
		}),
	)

/**
 * Validate one address through `GET /address/private/validate`
 *
 * @example
 * ```typescript
 * const result = await validateAddress(http, 'alice@exmaple.com')
 * if (result.success && result.data.didYouMean) {
 *   console.log('Did you mean', result.data.didYouMean)
 * }
 * ```
 */
export const validateAddress = async (
	http: HttpClient,
	address: string,
	options: ValidateAddressOptions = {},
): Promise<Result<AddressValidation, MailgunError>> => {
	if (address.trim().length === 0) {
		return mailgunFail('VALIDATION_ERROR', 'Missing required field: address')
	}

	return requestJson(
		http,
		{
			method: 'get',
			url: ENDPOINTS.addressValidation,
			params: {
				address,
				...(options.mailboxVerification && { mailbox_verification: true }),
			},
		},
		validationResponseSchema,
	)
}
