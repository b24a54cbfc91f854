import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from 'axios'
import type { Services } from '../src/bootstrap.js'
import { openDatabase } from '../src/db/database.js'
import { ArticleRepository } from '../src/db/articleRepository.js'
import { UserRepository } from '../src/db/userRepository.js'
import { AuthService } from '../src/services/authService.js'
import { CacheService } from '../src/services/cacheService.js'
import { NewsService } from '../src/services/newsService.js'
import { SentimentService } from '../src/services/sentimentService.js'
import { SessionService } from '../src/services/sessionService.js'
import { setLogLevel } from '../src/utils/logger.js'

setLogLevel('ERROR')

export const FIXED_NOW = new Date(2024, 0, 5, 10, 0, 0)

export interface FakeResponse {
	status: number
	data: unknown
}

/**
 * Real axios instance whose adapter answers in-process and records every request.
 */
export function fakeHttp(respond: (config: InternalAxiosRequestConfig) => FakeResponse) {
	const calls: InternalAxiosRequestConfig[] = []
	const http = axios.create({
		adapter: async (config) => {
			calls.push(config)
			const { status, data } = respond(config)
			return { data, status, statusText: String(status), headers: {}, config }
		}
	})
	return { http, calls }
}

export function gnewsArticle(slug: string, overrides: Record<string, unknown> = {}) {
	return {
		title: `Headline ${slug}`,
		description: `Description ${slug}`,
		content: `Content ${slug}`,
		url: `https://news.example.com/${slug}`,
		image: `https://img.example.com/${slug}.jpg`,
		publishedAt: '2024-01-05T15:04:00Z',
		source: { name: `Source ${slug}`, url: 'https://news.example.com' },
		...overrides
	}
}

export function createTestServices(http: AxiosInstance): Services {
	const db = openDatabase(':memory:')
	const sessions = new SessionService(3600)
	const cache = new CacheService(300)
	const auth = new AuthService(new UserRepository(db), sessions, 4, () => FIXED_NOW)
	const news = new NewsService({ apiKey: 'test-key', http, cache, now: () => FIXED_NOW })

	return {
		db,
		auth,
		sessions,
		articles: new ArticleRepository(db, () => FIXED_NOW),
		news,
		cache,
		sentiment: new SentimentService(null),
		close() {
			sessions.close()
			cache.close()
			db.close()
		}
	}
}
