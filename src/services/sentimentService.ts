import natural from 'natural'
import type { SentimentEngineMode } from '../config.js'
import type { NewsArticle, SentimentBadge, SentimentCounts, SentimentLabel, SentimentResult } from '../types/news.js'
import { ConfigurationError, getErrorMessage } from '../utils/errors.js'
import { titleCase } from '../utils/format.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('SENTIMENT')

// VADER's conventional cut-offs on the compound score
const POSITIVE_THRESHOLD = 0.05
const NEGATIVE_THRESHOLD = -0.05

const POSITIVE_WORDS = ['good', 'great', 'excellent', 'positive', 'growth', 'win', 'success', 'benefit', 'surge', 'record', 'best', 'strong']

const NEGATIVE_WORDS = ['bad', 'poor', 'terrible', 'negative', 'loss', 'fail', 'decline', 'drop', 'worst', 'weak', 'fraud', 'lawsuit']

const BADGES: Record<SentimentLabel, { emoji: string; color: string }> = {
	positive: { emoji: '😊', color: '#10b981' },
	neutral: { emoji: '😐', color: '#6b7280' },
	negative: { emoji: '☹️', color: '#ef4444' }
}

export interface PolarityScorer {
	polarityScores(text: string): { compound: number }
}

/**
 * Loads the VADER lexicon. Resolves to null when the package cannot be loaded.
 */
export async function loadVaderScorer(): Promise<PolarityScorer | null> {
	try {
		const vader = (await import('vader-sentiment')).default
		const analyzer = vader.SentimentIntensityAnalyzer
		return {
			polarityScores: (text) => analyzer.polarity_scores(text)
		}
	} catch (error) {
		log.warn('VADER unavailable', { error: getErrorMessage(error) })
		return null
	}
}

export function emptyCounts(): SentimentCounts {
	return { positive: 0, neutral: 0, negative: 0 }
}

export function badge(label: SentimentLabel): SentimentBadge {
	const { emoji, color } = BADGES[label]
	return {
		label: titleCase(label),
		emoji,
		color,
		background: `${color}1A`
	}
}

export class SentimentService {
	private tokenizer = new natural.WordTokenizer()
	private positiveStems: Map<string, string>
	private negativeStems: Map<string, string>

	constructor(private readonly scorer: PolarityScorer | null = null) {
		this.positiveStems = new Map(POSITIVE_WORDS.map((word) => [natural.PorterStemmer.stem(word), word]))
		this.negativeStems = new Map(NEGATIVE_WORDS.map((word) => [natural.PorterStemmer.stem(word), word]))
	}

	get engine(): SentimentResult['engine'] {
		return this.scorer ? 'vader' : 'keyword'
	}

	/**
	 * Scores a text with VADER, or with the keyword lists when VADER is absent or fails.
	 */
	analyze(text: string): SentimentResult {
		const trimmed = text?.trim() ?? ''
		if (trimmed.length === 0) {
			return { label: 'neutral', score: 0, engine: this.engine, positiveWords: [], negativeWords: [] }
		}

		if (this.scorer) {
			try {
				const { compound } = this.scorer.polarityScores(trimmed)
				return {
					label: compound >= POSITIVE_THRESHOLD ? 'positive' : compound <= NEGATIVE_THRESHOLD ? 'negative' : 'neutral',
					score: compound,
					engine: 'vader',
					positiveWords: [],
					negativeWords: []
				}
			} catch (error) {
				log.warn('VADER scoring failed, using keyword lists', { error: getErrorMessage(error) })
			}
		}

		return this.keywordAnalyze(trimmed)
	}

	/** Description when there is one, headline otherwise. */
	analyzeArticle(article: Pick<NewsArticle, 'title' | 'description'>): SentimentResult {
		return this.analyze(article.description || article.title || '')
	}

	countLabels(results: Pick<SentimentResult, 'label'>[]): SentimentCounts {
		const counts = emptyCounts()
		for (const result of results) {
			counts[result.label]++
		}
		return counts
	}

	private keywordAnalyze(text: string): SentimentResult {
		const stems = new Set(this.tokenizer.tokenize(text.toLowerCase()).map((token) => natural.PorterStemmer.stem(token)))

		const positiveWords = [...this.positiveStems].filter(([stem]) => stems.has(stem)).map(([, word]) => word)
		const negativeWords = [...this.negativeStems].filter(([stem]) => stems.has(stem)).map(([, word]) => word)
		const pos = positiveWords.length
		const neg = negativeWords.length

		let label: SentimentLabel = 'neutral'
		let score = 0
		if (pos > neg) {
			label = 'positive'
			score = (pos - neg) / 10
		} else if (neg > pos) {
			label = 'negative'
			score = -(neg - pos) / 10
		}

		return { label, score, engine: 'keyword', positiveWords, negativeWords }
	}
}

/**
 * `auto` prefers VADER and falls back to the keyword lists, `vader` insists on it, `keyword` never loads it.
 */
export async function createSentimentService(mode: SentimentEngineMode = 'auto'): Promise<SentimentService> {
	if (mode === 'keyword') {
		return new SentimentService(null)
	}

	const scorer = await loadVaderScorer()
	if (!scorer && mode === 'vader') {
		throw new ConfigurationError('SENTIMENT_ENGINE=vader but the vader-sentiment package could not be loaded')
	}
	if (!scorer) {
		log.warn('Falling back to keyword sentiment')
	}
	return new SentimentService(scorer)
}
