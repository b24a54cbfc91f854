import type { SqliteDatabase } from './database.js'
import type { SavedArticle, SaveArticleInput, SaveArticleResult } from '../types/news.js'
import { formatTimestamp } from '../utils/format.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('ARTICLES')

interface ArticleRow {
	id: number
	title: string | null
	link: string | null
	published_at: string | null
	image_url: string | null
	source: string | null
	category: string | null
	saved_at: string | null
	username: string
}

type InsertParams = [string, string, string, string, string, string, string, string]

function toSavedArticle(row: ArticleRow): SavedArticle {
	return {
		id: row.id,
		title: row.title ?? 'No Title',
		link: row.link ?? '',
		publishedAt: row.published_at ?? 'Unknown',
		imageUrl: row.image_url ?? '',
		source: row.source ?? '',
		category: row.category ?? '',
		savedAt: row.saved_at,
		username: row.username
	}
}

function isUniqueViolation(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'SQLITE_CONSTRAINT_UNIQUE'
}

/**
 * Per-user saved articles. A link is stored at most once per user.
 */
export class ArticleRepository {
	constructor(
		private readonly db: SqliteDatabase,
		private readonly now: () => Date = () => new Date()
	) {}

	save(username: string, input: SaveArticleInput): SaveArticleResult {
		const link = input.link || ''

		// Duplicates are rejected by idx_user_link_unique
		try {
			this.db
				.prepare<InsertParams>(
					`INSERT INTO articles (title, link, published_at, image_url, source, category, saved_at, username)
					 VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
				)
				.run(
					input.title || 'No Title',
					link,
					input.publishedAt || 'Unknown',
					input.imageUrl || '',
					input.source || 'Unknown',
					input.category || 'General',
					formatTimestamp(this.now()),
					username
				)
		} catch (error) {
			if (isUniqueViolation(error)) {
				return { saved: false, message: 'Article already saved!' }
			}
			throw error
		}

		log.info('Article saved', { username, link })
		return { saved: true, message: 'Article saved successfully!' }
	}

	list(username: string): SavedArticle[] {
		return this.db
			.prepare<[string], ArticleRow>('SELECT * FROM articles WHERE username = ? ORDER BY id DESC')
			.all(username)
			.map(toSavedArticle)
	}

	count(username: string): number {
		const row = this.db
			.prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM articles WHERE username = ?')
			.get(username)
		return row?.total ?? 0
	}

	remove(username: string, link: string): boolean {
		const result = this.db.prepare<[string, string]>('DELETE FROM articles WHERE username = ? AND link = ?').run(username, link)
		if (result.changes > 0) {
			log.info('Article deleted', { username, link })
		}
		return result.changes > 0
	}
}
