import Database from 'better-sqlite3'
import { createLogger } from '../utils/logger.js'
import { DatabaseError, getErrorMessage } from '../utils/errors.js'

const log = createLogger('DATABASE')

export type SqliteDatabase = Database.Database

// Columns added after the first release of the articles table
const ARTICLE_COLUMNS: Record<string, string> = {
	image_url: 'TEXT',
	source: 'TEXT',
	category: 'TEXT',
	saved_at: 'TEXT DEFAULT CURRENT_TIMESTAMP',
	username: 'TEXT'
}

interface ColumnInfo {
	name: string
}

/**
 * Opens (or creates) the SQLite file and brings its schema up to date.
 */
export function openDatabase(path: string): SqliteDatabase {
	try {
		const db = new Database(path)
		if (path !== ':memory:') {
			db.pragma('journal_mode = WAL')
		}
		migrate(db)
		log.info('Database ready', { path })
		return db
	} catch (error) {
		log.error('Database open failed', error, { path })
		throw new DatabaseError(`Could not open database: ${getErrorMessage(error)}`, { path })
	}
}

export function migrate(db: SqliteDatabase): void {
	db.exec(`
		CREATE TABLE IF NOT EXISTS users (
			id INTEGER PRIMARY KEY AUTOINCREMENT,
			username TEXT UNIQUE NOT NULL,
			password TEXT NOT NULL,
			email TEXT,
			created_at TEXT,
			last_login TEXT
		)
	`)

	db.exec(`
		CREATE TABLE IF NOT EXISTS articles (
			id INTEGER PRIMARY KEY AUTOINCREMENT,
			title TEXT,
			link TEXT,
			published_at TEXT,
			image_url TEXT,
			source TEXT,
			category TEXT,
			saved_at TEXT DEFAULT CURRENT_TIMESTAMP,
			username TEXT
		)
	`)

	const existing = new Set(db.prepare<[], ColumnInfo>('PRAGMA table_info(articles)').all().map((column) => column.name))

	for (const [name, type] of Object.entries(ARTICLE_COLUMNS)) {
		if (!existing.has(name)) {
			// SQLite refuses a non-constant default on ALTER TABLE
			const definition = type.includes('CURRENT_TIMESTAMP') ? 'TEXT' : type
			db.exec(`ALTER TABLE articles ADD COLUMN ${name} ${definition}`)
			log.info('Added missing column', { table: 'articles', column: name })
		}
	}

	db.exec('CREATE UNIQUE INDEX IF NOT EXISTS idx_user_link_unique ON articles(username, link)')
}
