import { buildSentimentChart, type SentimentChartSpec } from './chartService.js'
import { TIME_FILTER_LABELS } from './newsService.js'
import { badge, type SentimentService } from './sentimentService.js'
import type {
	NewsArticle,
	SavedArticle,
	SentimentBadge,
	SentimentCounts,
	SentimentResult,
	TimeFilter,
	Topic
} from '../types/news.js'
import { formatPublishedDate, formatSaveDay, savedDay, truncateDescription } from '../utils/format.js'

export const TRENDING_TOPICS: Topic[] = [
	{ name: 'AI', icon: '🤖' },
	{ name: 'Tesla', icon: '🚗' },
	{ name: 'iPhone', icon: '📱' },
	{ name: 'Cricket', icon: '🏏' },
	{ name: 'Startups', icon: '🚀' },
	{ name: 'SpaceX', icon: '🛸' },
	{ name: 'Bitcoin', icon: '₿' },
	{ name: 'Climate', icon: '🌍' }
]

export const SUGGESTED_TOPICS: Topic[] = [
	{ name: 'Technology', icon: '💻' },
	{ name: 'Sports', icon: '⚽' },
	{ name: 'Business', icon: '💼' },
	{ name: 'Science', icon: '🔬' }
]

export const QUICK_SEARCHES: Topic[] = [
	{ name: 'technology', icon: '🔍' },
	{ name: 'artificial intelligence', icon: '📱' },
	{ name: 'world news', icon: '🌍' }
]

export interface AnalyzedArticle extends NewsArticle {
	sentiment: SentimentResult
	badge: SentimentBadge
	displayDate: string
	excerpt?: string
}

export interface SearchResultsView {
	query: string
	stats: {
		articlesFound: number
		sources: number
		timeFilter: string
	}
	articles: AnalyzedArticle[]
	counts: SentimentCounts
	chart: SentimentChartSpec
}

export interface SavedArticleView extends SavedArticle {
	sentiment: SentimentResult
	badge: SentimentBadge
	savedDay: string
}

export interface SavedArticlesView {
	stats: {
		totalSaved: number
		latestSave: string
		sources: number
	}
	articles: SavedArticleView[]
	counts: SentimentCounts
	chart: SentimentChartSpec
}

function distinctCount(values: (string | undefined)[]): number {
	return new Set(values.filter((value): value is string => Boolean(value))).size
}

export function presentSearchResults(
	sentiment: SentimentService,
	query: string,
	timeFilter: TimeFilter,
	articles: NewsArticle[]
): SearchResultsView {
	const analyzed = articles.map((article): AnalyzedArticle => {
		const result = sentiment.analyzeArticle(article)
		return {
			...article,
			sentiment: result,
			badge: badge(result.label),
			displayDate: formatPublishedDate(article.publishedAt),
			excerpt: article.description ? truncateDescription(article.description) : undefined
		}
	})
	const counts = sentiment.countLabels(analyzed.map((article) => article.sentiment))

	return {
		query,
		stats: {
			articlesFound: articles.length,
			sources: distinctCount(articles.map((article) => article.source)),
			timeFilter: TIME_FILTER_LABELS[timeFilter]
		},
		articles: analyzed,
		counts,
		chart: buildSentimentChart(counts, 'Results Sentiment')
	}
}

/**
 * Saved rows arrive newest first, so the first row carries the latest save day.
 */
export function presentSavedArticles(sentiment: SentimentService, rows: SavedArticle[]): SavedArticlesView {
	const articles = rows.map((row): SavedArticleView => {
		const result = sentiment.analyze(row.title)
		return {
			...row,
			sentiment: result,
			badge: badge(result.label),
			savedDay: savedDay(row.savedAt)
		}
	})
	const counts = sentiment.countLabels(articles.map((article) => article.sentiment))

	return {
		stats: {
			totalSaved: rows.length,
			latestSave: rows.length > 0 ? formatSaveDay(rows[0].savedAt) : 'N/A',
			sources: distinctCount(rows.map((row) => row.source))
		},
		articles,
		counts,
		chart: buildSentimentChart(counts, 'Saved Articles Sentiment')
	}
}
