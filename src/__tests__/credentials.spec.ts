/**
 * Credentials tests
 */

import { describe, expect, it } from 'vitest'

import { createCredentials } from '../lib/credentials.js'

import { TEST_API_KEY } from './helpers/test-utils.js'

describe('createCredentials', () => {
	it('should default to the US API base', () => {
		const credentials = createCredentials({
			apiKey: TEST_API_KEY,
			domain: 'mg.example.com',
		})

		expect(credentials).toEqual({
			apiBase: 'https://api.mailgun.net/v3',
			apiKey: TEST_API_KEY,
			domain: 'mg.example.com',
		})
		expect(Object.isFrozen(credentials)).toBe(true)
	})

	it('should use the EU API base for the eu region', () => {
		const credentials = createCredentials({
			apiKey: TEST_API_KEY,
			domain: 'mg.example.com',
			region: 'eu',
		})

		expect(credentials.apiBase).toBe('https://api.eu.mailgun.net/v3')
	})

	it('should prefer an explicit API base and drop trailing slashes', () => {
		const credentials = createCredentials({
			apiKey: TEST_API_KEY,
			domain: 'mg.example.com',
			region: 'eu',
			apiBase: 'http://mailgun.local.test:3000/v3/',
		})

		expect(credentials.apiBase).toBe('http://mailgun.local.test:3000/v3')
	})

	it('should reject an API base without http', () => {
		expect(() =>
			createCredentials({
				apiKey: TEST_API_KEY,
				domain: 'mg.example.com',
				apiBase: 'ftp.example.com',
			}),
		).toThrow('Invalid Mailgun credentials: apiBase does not start with http')
	})

	it('should reject an API base without dots', () => {
		expect(() =>
			createCredentials({
				apiKey: TEST_API_KEY,
				domain: 'mg.example.com',
				apiBase: 'http://localhost',
			}),
		).toThrow('Invalid Mailgun credentials: apiBase does not contain any dots')
	})

	it('should report every failed check', () => {
		expect(() =>
			createCredentials({ apiKey: 'short', domain: 'localhost' }),
		).toThrow(
			'Invalid Mailgun credentials: apiKey is too short; domain does not contain any dots',
		)
	})
})
