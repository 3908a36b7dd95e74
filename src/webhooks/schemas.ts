/**
 * Webhook payload schemas
 *
 * Mailgun posts `{ signature, "event-data" }`. Objects pass unknown keys
 * through since Mailgun adds fields over time.
 */

import { z } from 'zod'

export const webhookSignatureSchema = z.object({
	timestamp: z.union([z.string(), z.number()]).transform(String),
	token: z.string().min(1),
	signature: z.string().min(1),
})

const deliveryStatusSchema = z
	.object({
		code: z.number().optional(),
		message: z.string().optional(),
		description: z.string().optional(),
		'attempt-no': z.number().optional(),
		'mx-host': z.string().optional(),
		tls: z.boolean().optional(),
	})
	.passthrough()

const clientInfoSchema = z
	.object({
		'client-name': z.string().optional(),
		'client-os': z.string().optional(),
		'client-type': z.string().optional(),
		'device-type': z.string().optional(),
		'user-agent': z.string().optional(),
	})
	.passthrough()

const geolocationSchema = z
	.object({
		country: z.string().optional(),
		region: z.string().optional(),
		city: z.string().optional(),
	})
	.passthrough()

const eventBase = z.object({
	id: z.string(),
	/** Seconds since epoch, with fraction */
	timestamp: z.number(),
	recipient: z.string().optional(),
	tags: z.array(z.string()).default([]),
	'user-variables': z.record(z.unknown()).default({}),
	message: z
		.object({
			headers: z
				.object({
					'message-id': z.string().optional(),
					from: z.string().optional(),
					to: z.string().optional(),
					subject: z.string().optional(),
				})
				.passthrough(),
		})
		.passthrough()
		.optional(),
})

const trackingFields = {
	ip: z.string().optional(),
	'client-info': clientInfoSchema.optional(),
	geolocation: geolocationSchema.optional(),
}

export const webhookEventSchema = z.discriminatedUnion('event', [
	eventBase.extend({ event: z.literal('accepted') }).passthrough(),
	eventBase
		.extend({
			event: z.literal('rejected'),
			reject: z
				.object({
					reason: z.string().optional(),
					description: z.string().optional(),
				})
				.passthrough()
				.optional(),
		})
		.passthrough(),
	eventBase
		.extend({
			event: z.literal('delivered'),
			'delivery-status': deliveryStatusSchema.optional(),
		})
		.passthrough(),
	eventBase
		.extend({
			event: z.literal('failed'),
			severity: z.enum(['temporary', 'permanent']),
			reason: z.string().optional(),
			'delivery-status': deliveryStatusSchema.optional(),
		})
		.passthrough(),
	eventBase
		.extend({ event: z.literal('opened'), ...trackingFields })
		.passthrough(),
	eventBase
		.extend({
			event: z.literal('clicked'),
			url: z.string(),
			...trackingFields,
		})
		.passthrough(),
	eventBase
		.extend({ event: z.literal('unsubscribed'), ...trackingFields })
		.passthrough(),
	eventBase.extend({ event: z.literal('complained') }).passthrough(),
	eventBase
		.extend({
			event: z.literal('stored'),
			storage: z
				.object({ url: z.string(), key: z.string() })
				.passthrough()
				.optional(),
		})
		.passthrough(),
])

export const webhookPayloadSchema = z.object({
	signature: webhookSignatureSchema,
	'event-data': webhookEventSchema,
})
