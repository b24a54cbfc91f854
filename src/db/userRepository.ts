import type { SqliteDatabase } from './database.js'
import type { User } from '../types/news.js'

interface UserRow {
	id: number
	username: string
	password: string
	email: string | null
	created_at: string | null
	last_login: string | null
}

function toUser(row: UserRow): User {
	return {
		id: row.id,
		username: row.username,
		passwordHash: row.password,
		email: row.email,
		createdAt: row.created_at,
		lastLogin: row.last_login
	}
}

export class UserRepository {
	constructor(private readonly db: SqliteDatabase) {}

	findByUsername(username: string): User | null {
		const row = this.db.prepare<[string], UserRow>('SELECT * FROM users WHERE username = ?').get(username)
		return row ? toUser(row) : null
	}

	exists(username: string): boolean {
		const row = this.db
			.prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM users WHERE username = ?')
			.get(username)
		return (row?.total ?? 0) > 0
	}

	create(username: string, passwordHash: string, email: string | null, createdAt: string): User {
		const result = this.db
			.prepare<[string, string, string | null, string]>(
				'INSERT INTO users (username, password, email, created_at) VALUES (?, ?, ?, ?)'
			)
			.run(username, passwordHash, email, createdAt)

		return {
			id: Number(result.lastInsertRowid),
			username,
			passwordHash,
			email,
			createdAt,
			lastLogin: null
		}
	}

	updateLastLogin(username: string, lastLogin: string): void {
		this.db.prepare<[string, string]>('UPDATE users SET last_login = ? WHERE username = ?').run(lastLogin, username)
	}
}
