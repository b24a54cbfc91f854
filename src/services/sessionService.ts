import NodeCache from 'node-cache'
import crypto from 'crypto'

/**
 * Opaque bearer tokens mapped to usernames. Tokens expire after the TTL.
 */
export class SessionService {
	private sessions: NodeCache

	constructor(ttlSeconds: number = 86400) {
		this.sessions = new NodeCache({ stdTTL: ttlSeconds, checkperiod: Math.min(ttlSeconds, 600), useClones: false })
	}

	create(username: string): string {
		const token = crypto.randomBytes(32).toString('hex')
		this.sessions.set(token, username)
		return token
	}

	getUsername(token: string): string | null {
		return this.sessions.get<string>(token) ?? null
	}

	destroy(token: string): boolean {
		return this.sessions.del(token) > 0
	}

	close(): void {
		this.sessions.close()
	}
}
