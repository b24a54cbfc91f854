import type { AppConfig } from './config.js'
import { openDatabase, type SqliteDatabase } from './db/database.js'
import { ArticleRepository } from './db/articleRepository.js'
import { UserRepository } from './db/userRepository.js'
import { AuthService } from './services/authService.js'
import { CacheService } from './services/cacheService.js'
import { NewsService } from './services/newsService.js'
import { createSentimentService, type SentimentService } from './services/sentimentService.js'
import { SessionService } from './services/sessionService.js'
import { setLogLevel } from './utils/logger.js'

export interface Services {
	db: SqliteDatabase
	auth: AuthService
	sessions: SessionService
	articles: ArticleRepository
	news: NewsService
	cache: CacheService
	sentiment: SentimentService
	close(): void
}

/**
 * Wires every service from the configuration. Shared by the HTTP and MCP entry points.
 */
export async function createServices(config: AppConfig): Promise<Services> {
	setLogLevel(config.logLevel)

	const db = openDatabase(config.databasePath)
	const sessions = new SessionService(config.auth.sessionTtlSeconds)
	const auth = new AuthService(new UserRepository(db), sessions, config.auth.bcryptRounds)
	const cache = new CacheService(config.news.cacheTtlSeconds)
	const news = new NewsService({
		apiKey: config.news.apiKey,
		baseUrl: config.news.baseUrl,
		lang: config.news.lang,
		country: config.news.country,
		timeoutMs: config.news.timeoutMs,
		cache
	})
	const sentiment = await createSentimentService(config.sentimentEngine)

	if (config.auth.seedDemoUser) {
		await auth.ensureDemoUser()
	}

	return {
		db,
		auth,
		sessions,
		articles: new ArticleRepository(db),
		news,
		cache,
		sentiment,
		close() {
			sessions.close()
			cache.close()
			db.close()
		}
	}
}
