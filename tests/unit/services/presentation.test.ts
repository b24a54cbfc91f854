import { describe, it, expect } from 'vitest'
import { presentSavedArticles, presentSearchResults, TRENDING_TOPICS } from '../../../src/services/presentation.js'
import { SentimentService } from '../../../src/services/sentimentService.js'
import type { NewsArticle, SavedArticle } from '../../../src/types/news.js'

const sentiment = new SentimentService(null)

function article(id: string, overrides: Partial<NewsArticle> = {}): NewsArticle {
	return {
		id,
		title: `Title ${id}`,
		url: `https://news.example.com/${id}`,
		source: 'Wire',
		publishedAt: '2024-01-05T15:04:00Z',
		...overrides
	}
}

function saved(id: number, overrides: Partial<SavedArticle> = {}): SavedArticle {
	return {
		id,
		title: `Saved ${id}`,
		link: `https://news.example.com/saved-${id}`,
		publishedAt: '2024-01-01T00:00:00Z',
		imageUrl: '',
		source: 'Wire',
		category: 'bitcoin',
		savedAt: '2024-01-05 10:00:00',
		username: 'alice',
		...overrides
	}
}

describe('presentSearchResults', () => {
	const view = presentSearchResults(sentiment, 'markets', 'day', [
		article('a', { description: 'Record growth for exporters' }),
		article('b', { title: 'Bank fraud lawsuit widens', source: 'Daily' }),
		article('c', { description: 'x'.repeat(200), publishedAt: undefined })
	])

	it('summarises sources and the time filter', () => {
		expect(view.query).toBe('markets')
		expect(view.stats).toEqual({ articlesFound: 3, sources: 2, timeFilter: 'Past 24h' })
	})

	it('scores description first, then title', () => {
		expect(view.articles.map((item) => item.sentiment.label)).toEqual(['positive', 'negative', 'neutral'])
		expect(view.counts).toEqual({ positive: 1, neutral: 1, negative: 1 })
		expect(view.articles[1].badge.label).toBe('Negative')
	})

	it('formats dates and truncates long descriptions', () => {
		expect(view.articles[0].displayDate).toBe('January 05, 2024 at 03:04 PM')
		expect(view.articles[2].displayDate).toBe('Unknown')
		expect(view.articles[2].excerpt).toBe(`${'x'.repeat(150)}...`)
		expect(view.articles[1].excerpt).toBeUndefined()
	})

	it('attaches the results chart', () => {
		expect(view.chart.title).toBe('Results Sentiment')
		expect(view.chart.data.values.map((row) => row.count)).toEqual([1, 1, 1])
	})
})

describe('presentSavedArticles', () => {
	it('reports N/A for an empty list', () => {
		const view = presentSavedArticles(sentiment, [])

		expect(view.stats).toEqual({ totalSaved: 0, latestSave: 'N/A', sources: 0 })
		expect(view.chart.title).toBe('Saved Articles Sentiment')
	})

	it('takes the latest save day from the first row and scores titles', () => {
		const view = presentSavedArticles(sentiment, [
			saved(2, { title: 'Best quarter on record', savedAt: '2024-02-10 08:00:00' }),
			saved(1, { title: 'Weak demand', source: '', savedAt: null })
		])

		expect(view.stats).toEqual({ totalSaved: 2, latestSave: 'Feb 10', sources: 1 })
		expect(view.articles.map((item) => item.savedDay)).toEqual(['2024-02-10', 'Unknown'])
		expect(view.counts).toEqual({ positive: 1, neutral: 0, negative: 1 })
	})
})

it('lists eight trending topics', () => {
	expect(TRENDING_TOPICS.map((topic) => topic.name)).toEqual(['AI', 'Tesla', 'iPhone', 'Cricket', 'Startups', 'SpaceX', 'Bitcoin', 'Climate'])
})
