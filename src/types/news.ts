export type SentimentLabel = 'positive' | 'neutral' | 'negative'

export type SentimentEngine = 'vader' | 'keyword'

export type TimeFilter = 'anytime' | 'day' | 'week'

export interface NewsArticle {
	id: string
	title: string
	description?: string
	content?: string
	url: string
	imageUrl?: string
	publishedAt?: string
	source: string
	sourceUrl?: string
}

export interface SentimentResult {
	label: SentimentLabel
	score: number
	engine: SentimentEngine
	positiveWords: string[]
	negativeWords: string[]
}

export type SentimentCounts = Record<SentimentLabel, number>

export interface SentimentBadge {
	label: string
	emoji: string
	color: string
	background: string
}

export interface User {
	id: number
	username: string
	passwordHash: string
	email: string | null
	createdAt: string | null
	lastLogin: string | null
}

export interface SavedArticle {
	id: number
	title: string
	link: string
	publishedAt: string
	imageUrl: string
	source: string
	category: string
	savedAt: string | null
	username: string
}

export interface SaveArticleInput {
	title?: string | null
	link?: string | null
	publishedAt?: string | null
	imageUrl?: string | null
	source?: string | null
	category?: string | null
}

export type SaveArticleResult =
	| { saved: true; message: 'Article saved successfully!' }
	| { saved: false; message: 'Article already saved!' }

export interface Topic {
	name: string
	icon: string
}
