import bcrypt from 'bcryptjs'
import type { SessionService } from './sessionService.js'
import type { UserRepository } from '../db/userRepository.js'
import { ConflictError, UnauthorizedError, ValidationError } from '../utils/errors.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('AUTH')

export const MIN_PASSWORD_LENGTH = 6

export const DEMO_USER = { username: 'demo', password: 'demo123' }

export interface RegisterInput {
	username: string
	password: string
	confirmPassword?: string
	email?: string
}

export interface LoginResult {
	token: string
	username: string
	message: string
}

export class AuthService {
	private dummyHash: Promise<string> | null = null

	constructor(
		private readonly users: UserRepository,
		private readonly sessions: SessionService,
		private readonly bcryptRounds: number = 10,
		private readonly now: () => Date = () => new Date()
	) {}

	async register(input: RegisterInput): Promise<{ username: string; message: string }> {
		const { username, password, confirmPassword, email } = input

		if (!username || !password) {
			throw new ValidationError('Username and password are required!')
		}
		if (password.length < MIN_PASSWORD_LENGTH) {
			throw new ValidationError(`Password must be at least ${MIN_PASSWORD_LENGTH} characters long!`)
		}
		if (confirmPassword !== undefined && confirmPassword !== password) {
			throw new ValidationError('Passwords do not match!')
		}
		if (this.users.exists(username)) {
			throw new ConflictError('Username already exists!')
		}

		const hash = await bcrypt.hash(password, this.bcryptRounds)
		this.users.create(username, hash, email || null, this.now().toISOString())
		log.info('User registered', { username })

		return { username, message: 'User created successfully!' }
	}

	async login(username: string, password: string): Promise<LoginResult> {
		if (!username || !password) {
			throw new ValidationError('Please enter both username and password!')
		}

		// Unknown usernames are compared against a dummy hash; login time must not reveal them
		const user = this.users.findByUsername(username)
		const valid = await bcrypt.compare(password, user ? user.passwordHash : await this.unknownUserHash())
		if (!user || !valid) {
			log.warn('Failed login', { username })
			throw new UnauthorizedError('Invalid username or password!')
		}

		this.users.updateLastLogin(username, this.now().toISOString())
		const token = this.sessions.create(username)
		log.info('User logged in', { username })

		return { token, username, message: 'Login successful!' }
	}

	private unknownUserHash(): Promise<string> {
		if (!this.dummyHash) {
			this.dummyHash = bcrypt.hash('unknown-user-password', this.bcryptRounds)
		}
		return this.dummyHash
	}

	logout(token: string): boolean {
		return this.sessions.destroy(token)
	}

	/** Resolves a bearer token to its username, or throws when the session is unknown or expired. */
	authenticate(token: string | undefined): string {
		const username = token ? this.sessions.getUsername(token) : null
		if (!username) {
			throw new UnauthorizedError()
		}
		return username
	}

	async ensureDemoUser(): Promise<void> {
		if (this.users.exists(DEMO_USER.username)) return
		await this.register({ username: DEMO_USER.username, password: DEMO_USER.password })
		log.info('Demo user created', { username: DEMO_USER.username })
	}
}
