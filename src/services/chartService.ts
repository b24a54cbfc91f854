import type { SentimentCounts, SentimentLabel } from '../types/news.js'

const ORDER: SentimentLabel[] = ['positive', 'neutral', 'negative']
const DOMAIN = ['Positive', 'Neutral', 'Negative']
const RANGE = ['#10b981', '#6b7280', '#ef4444']

export interface ChartRow {
	sentiment: string
	count: number
}

export interface SentimentChartSpec {
	$schema: string
	title: string
	data: { values: ChartRow[] }
	mark: { type: 'bar'; tooltip: boolean }
	encoding: {
		x: { field: 'sentiment'; type: 'nominal'; sort: string[]; title: string }
		y: { field: 'count'; type: 'quantitative'; title: string }
		color: { field: 'sentiment'; type: 'nominal'; scale: { domain: string[]; range: string[] }; legend: null }
		tooltip: { field: string; type: 'nominal' | 'quantitative' }[]
	}
	params: { name: string; select: 'interval'; bind: 'scales' }[]
}

export function chartRows(counts: Partial<SentimentCounts>): ChartRow[] {
	return ORDER.map((label, index) => ({ sentiment: DOMAIN[index], count: counts[label] ?? 0 }))
}

/**
 * Vega-Lite bar chart of label counts, rendered by the frontend with vega-embed.
 */
export function buildSentimentChart(counts: Partial<SentimentCounts>, title: string = 'Sentiment Analysis'): SentimentChartSpec {
	return {
		$schema: 'https://vega.github.io/schema/vega-lite/v5.json',
		title,
		data: { values: chartRows(counts) },
		mark: { type: 'bar', tooltip: true },
		encoding: {
			x: { field: 'sentiment', type: 'nominal', sort: DOMAIN, title: 'sentiment' },
			y: { field: 'count', type: 'quantitative', title: 'count' },
			color: { field: 'sentiment', type: 'nominal', scale: { domain: DOMAIN, range: RANGE }, legend: null },
			tooltip: [
				{ field: 'sentiment', type: 'nominal' },
				{ field: 'count', type: 'quantitative' }
			]
		},
		params: [{ name: 'zoom', select: 'interval', bind: 'scales' }]
	}
}

/**
 * Plain-text version of the same chart, one bar per label scaled to `width` characters.
 */
export function renderTextChart(counts: Partial<SentimentCounts>, title: string = 'Sentiment Analysis', width: number = 20): string {
	const rows = chartRows(counts)
	const highest = Math.max(...rows.map((row) => row.count))
	const labelWidth = Math.max(...rows.map((row) => row.sentiment.length))

	const lines = rows.map((row) => {
		const length = highest > 0 ? Math.round((row.count / highest) * width) : 0
		return `${row.sentiment.padEnd(labelWidth)} | ${'█'.repeat(length)} ${row.count}`.trimEnd()
	})

	return [title, ...lines].join('\n')
}
