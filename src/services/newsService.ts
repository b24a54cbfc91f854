import axios, { type AxiosInstance, type AxiosResponse } from 'axios'
import crypto from 'crypto'
import { CacheService } from './cacheService.js'
import type { NewsArticle, TimeFilter } from '../types/news.js'
import { NewsApiError, getErrorMessage } from '../utils/errors.js'
import { formatApiTimestamp } from '../utils/format.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('NEWS')

export const MIN_ARTICLES = 5
export const MAX_ARTICLES = 20
export const DEFAULT_ARTICLES = 10

export const TIME_FILTER_LABELS: Record<TimeFilter, string> = {
	anytime: 'Anytime',
	day: 'Past 24h',
	week: 'Past week'
}

const TIME_FILTER_DAYS: Record<TimeFilter, number | null> = {
	anytime: null,
	day: 1,
	week: 7
}

export const HEADLINE_CATEGORIES = [
	'general',
	'world',
	'nation',
	'business',
	'technology',
	'entertainment',
	'sports',
	'science',
	'health'
] as const

export type HeadlineCategory = (typeof HEADLINE_CATEGORIES)[number]

export interface NewsServiceOptions {
	apiKey?: string
	baseUrl?: string
	lang?: string
	country?: string
	timeoutMs?: number
	http?: AxiosInstance
	cache?: CacheService
	now?: () => Date
}

interface GNewsArticle {
	title?: string | null
	description?: string | null
	content?: string | null
	url?: string | null
	image?: string | null
	publishedAt?: string | null
	source?: { name?: string | null; url?: string | null } | null
}

interface GNewsResponse {
	totalArticles?: number
	articles?: GNewsArticle[]
}

type QueryParams = Record<string, string | number>

export function clampArticleCount(max: number = DEFAULT_ARTICLES): number {
	if (!Number.isFinite(max)) return DEFAULT_ARTICLES
	return Math.min(MAX_ARTICLES, Math.max(MIN_ARTICLES, Math.round(max)))
}

export function articleId(url: string, title: string): string {
	return crypto
		.createHash('md5')
		.update(url || title)
		.digest('hex')
}

/**
 * GNews v4 client. Responses are cached for the configured TTL.
 */
export class NewsService {
	private readonly http: AxiosInstance
	private readonly cache: CacheService
	private readonly now: () => Date
	private readonly baseUrl: string
	private readonly lang: string
	private readonly country: string
	private readonly timeoutMs: number
	private readonly apiKey?: string

	constructor(options: NewsServiceOptions = {}) {
		this.http = options.http ?? axios.create()
		this.cache = options.cache ?? new CacheService()
		this.now = options.now ?? (() => new Date())
		this.baseUrl = (options.baseUrl ?? 'https://gnews.io/api/v4').replace(/\/+$/, '')
		this.lang = options.lang ?? 'en'
		this.country = options.country ?? 'us'
		this.timeoutMs = options.timeoutMs ?? 10000
		this.apiKey = options.apiKey
	}

	get cacheService(): CacheService {
		return this.cache
	}

	/**
	 * Keyword search, optionally limited to the last day or week.
	 */
	async search(query: string, timeFilter: TimeFilter = 'anytime', max: number = DEFAULT_ARTICLES): Promise<NewsArticle[]> {
		const params: QueryParams = {
			q: query,
			lang: this.lang,
			max: clampArticleCount(max)
		}

		const days = TIME_FILTER_DAYS[timeFilter]
		if (days !== null) {
			const from = new Date(this.now().getTime() - days * 24 * 60 * 60 * 1000)
			params.from = formatApiTimestamp(from)
		}

		const cacheKey = `news:search:${query.toLowerCase()}|${timeFilter}|${params.max}`
		return this.cachedRequest(cacheKey, '/search', params)
	}

	/**
	 * Top headlines for the configured country, optionally narrowed by category or keyword.
	 */
	async topHeadlines(category?: HeadlineCategory, max: number = DEFAULT_ARTICLES, query?: string): Promise<NewsArticle[]> {
		const params: QueryParams = {
			lang: this.lang,
			country: this.country,
			max: clampArticleCount(max)
		}
		if (category) params.category = category
		if (query) params.q = query

		const cacheKey = `news:headlines:${category ?? 'all'}|${query?.toLowerCase() ?? ''}|${params.max}`
		return this.cachedRequest(cacheKey, '/top-headlines', params)
	}

	getCachedArticle(id: string): NewsArticle | undefined {
		return this.cache.getArticle(id)
	}

	private async cachedRequest(cacheKey: string, path: string, params: QueryParams): Promise<NewsArticle[]> {
		const articles = await this.cache.getOrLoad(cacheKey, () => this.request(path, params), (result) => result.length > 0)
		this.cache.rememberArticles(articles)
		return articles
	}

	private async request(path: string, params: QueryParams): Promise<NewsArticle[]> {
		if (!this.apiKey) {
			throw new NewsApiError('GNews API key is not configured (set GNEWS_API_KEY)')
		}

		let response: AxiosResponse<GNewsResponse>
		try {
			response = await this.http.get<GNewsResponse>(`${this.baseUrl}${path}`, {
				params: { ...params, apikey: this.apiKey },
				timeout: this.timeoutMs,
				validateStatus: () => true
			})
		} catch (error) {
			log.error('News request failed', error, { path })
			throw new NewsApiError(`News API request failed: ${getErrorMessage(error)}`, { path })
		}

		if (response.status !== 200) {
			log.warn('News API returned an error status', { path, status: response.status })
			return []
		}

		const articles = response.data?.articles ?? []
		log.debug('Fetched articles', { path, count: articles.length })
		return articles.map((article) => this.toNewsArticle(article))
	}

	private toNewsArticle(article: GNewsArticle): NewsArticle {
		const url = article.url ?? ''
		const title = article.title || 'No Title'

		return {
			id: articleId(url, title),
			title,
			description: article.description ?? undefined,
			content: article.content ?? undefined,
			url,
			imageUrl: article.image ?? undefined,
			publishedAt: article.publishedAt ?? undefined,
			source: article.source?.name || 'Unknown Source',
			sourceUrl: article.source?.url ?? undefined
		}
	}
}
