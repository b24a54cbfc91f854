import bcrypt from 'bcryptjs'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { FIXED_NOW } from '../../helpers.js'
import { openDatabase, type SqliteDatabase } from '../../../src/db/database.js'
import { UserRepository } from '../../../src/db/userRepository.js'
import { AuthService, DEMO_USER } from '../../../src/services/authService.js'
import { SessionService } from '../../../src/services/sessionService.js'
import { ConflictError, UnauthorizedError, ValidationError } from '../../../src/utils/errors.js'

describe('AuthService', () => {
	let db: SqliteDatabase
	let users: UserRepository
	let sessions: SessionService
	let auth: AuthService

	beforeEach(() => {
		db = openDatabase(':memory:')
		users = new UserRepository(db)
		sessions = new SessionService(3600)
		auth = new AuthService(users, sessions, 4, () => FIXED_NOW)
	})

	afterEach(() => {
		sessions.close()
		db.close()
	})

	describe('register', () => {
		it('stores a bcrypt hash, never the password', async () => {
			const result = await auth.register({ username: 'alice', password: 'secret1', email: 'alice@example.com' })

			expect(result).toEqual({ username: 'alice', message: 'User created successfully!' })
			const user = users.findByUsername('alice')
			expect(user?.passwordHash).not.toBe('secret1')
			expect(user?.passwordHash).toMatch(/^\$2[aby]\$04\$/)
			expect(user?.email).toBe('alice@example.com')
			expect(user?.createdAt).toBe(FIXED_NOW.toISOString())
		})

		it('rejects missing fields', async () => {
			await expect(auth.register({ username: '', password: 'secret1' })).rejects.toThrow('Username and password are required!')
		})

		it('rejects short passwords', async () => {
			await expect(auth.register({ username: 'bob', password: '12345' })).rejects.toThrow(
				'Password must be at least 6 characters long!'
			)
		})

		it('rejects a confirmation that does not match', async () => {
			await expect(auth.register({ username: 'bob', password: 'secret1', confirmPassword: 'secret2' })).rejects.toThrow(
				ValidationError
			)
		})

		it('rejects a taken username', async () => {
			await auth.register({ username: 'alice', password: 'secret1' })

			await expect(auth.register({ username: 'alice', password: 'other12' })).rejects.toThrow(ConflictError)
		})
	})

	describe('login', () => {
		beforeEach(async () => {
			await auth.register({ username: 'alice', password: 'secret1' })
		})

		it('issues a session token and records the login time', async () => {
			const result = await auth.login('alice', 'secret1')

			expect(result.username).toBe('alice')
			expect(result.message).toBe('Login successful!')
			expect(result.token).toMatch(/^[0-9a-f]{64}$/)
			expect(auth.authenticate(result.token)).toBe('alice')
			expect(users.findByUsername('alice')?.lastLogin).toBe(FIXED_NOW.toISOString())
		})

		it('gives the same error for a wrong password and an unknown user', async () => {
			await expect(auth.login('alice', 'wrong-pass')).rejects.toThrow('Invalid username or password!')
			await expect(auth.login('nobody', 'secret1')).rejects.toThrow('Invalid username or password!')
		})

		it('runs a hash comparison for unknown usernames too', async () => {
			const compare = vi.spyOn(bcrypt, 'compare')

			await expect(auth.login('nobody', 'secret1')).rejects.toThrow(UnauthorizedError)

			expect(compare).toHaveBeenCalledTimes(1)
			expect(compare).toHaveBeenCalledWith('secret1', expect.stringMatching(/^\$2[aby]\$04\$/))
			compare.mockRestore()
		})

		it('asks for both fields', async () => {
			await expect(auth.login('alice', '')).rejects.toThrow('Please enter both username and password!')
		})

		it('invalidates the token on logout', async () => {
			const { token } = await auth.login('alice', 'secret1')

			expect(auth.logout(token)).toBe(true)
			expect(() => auth.authenticate(token)).toThrow(UnauthorizedError)
			expect(auth.logout(token)).toBe(false)
		})
	})

	it('rejects a missing token', () => {
		expect(() => auth.authenticate(undefined)).toThrow('Not logged in.')
	})

	it('creates the demo user once', async () => {
		await auth.ensureDemoUser()
		await auth.ensureDemoUser()

		const result = await auth.login(DEMO_USER.username, DEMO_USER.password)
		expect(result.username).toBe('demo')
	})
})
