import NodeCache from 'node-cache'
import type { NewsArticle } from '../types/news.js'

export interface CacheStats {
	keys: number
	hits: number
	misses: number
	hitRate: number
}

const ARTICLE_PREFIX = 'news:id:'

/**
 * TTL cache for news API responses and the articles they contained.
 */
export class CacheService {
	private cache: NodeCache
	private stats: { hits: number; misses: number }

	constructor(
		private readonly ttlSeconds: number = 300,
		checkPeriod: number = 60
	) {
		this.cache = new NodeCache({
			stdTTL: ttlSeconds,
			checkperiod: checkPeriod,
			useClones: false
		})
		this.stats = { hits: 0, misses: 0 }
	}

	get<T>(key: string): T | undefined {
		const value = this.cache.get<T>(key)
		if (value !== undefined) {
			this.stats.hits++
		} else {
			this.stats.misses++
		}
		return value
	}

	set<T>(key: string, value: T, ttl?: number): boolean {
		return this.cache.set(key, value, ttl ?? this.ttlSeconds)
	}

	/**
	 * Returns the cached value or runs the loader. Results the `shouldCache` predicate rejects are handed back uncached.
	 */
	async getOrLoad<T>(key: string, loader: () => Promise<T>, shouldCache: (value: T) => boolean = () => true): Promise<T> {
		const cached = this.get<T>(key)
		if (cached !== undefined) return cached

		const value = await loader()
		if (shouldCache(value)) {
			this.set(key, value)
		}
		return value
	}

	rememberArticles(articles: NewsArticle[]): void {
		for (const article of articles) {
			this.set(`${ARTICLE_PREFIX}${article.id}`, article)
		}
	}

	getArticle(id: string): NewsArticle | undefined {
		return this.get<NewsArticle>(`${ARTICLE_PREFIX}${id}`)
	}

	flush(): void {
		this.cache.flushAll()
		this.stats = { hits: 0, misses: 0 }
	}

	getStats(): CacheStats {
		const total = this.stats.hits + this.stats.misses
		const hitRate = total > 0 ? (this.stats.hits / total) * 100 : 0

		return {
			keys: this.cache.keys().length,
			hits: this.stats.hits,
			misses: this.stats.misses,
			hitRate: parseFloat(hitRate.toFixed(2))
		}
	}

	close(): void {
		this.cache.close()
	}
}
