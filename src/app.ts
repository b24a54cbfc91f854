import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express'
import cors from 'cors'
import { fileURLToPath } from 'url'
import { ZodError } from 'zod'
import type { Services } from './bootstrap.js'
import {
	deleteArticleSchema,
	headlinesSchema,
	loginSchema,
	registerSchema,
	saveArticleSchema,
	searchSchema,
	sentimentSchema,
	toValidationIssues
} from './middleware/validation.js'
import { badge } from './services/sentimentService.js'
import { presentSavedArticles, presentSearchResults, QUICK_SEARCHES, SUGGESTED_TOPICS, TRENDING_TOPICS } from './services/presentation.js'
import { NotFoundError, UnauthorizedError, getErrorMessage, isAppError } from './utils/errors.js'
import { createLogger } from './utils/logger.js'

const log = createLogger('API')

const FRONTEND_PATH = fileURLToPath(new URL('./frontend.html', import.meta.url))

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>

function asyncHandler(handler: AsyncHandler): RequestHandler {
	return (req, res, next) => {
		handler(req, res, next).catch(next)
	}
}

function bearerToken(req: Request): string | undefined {
	const match = req.headers.authorization?.match(/^Bearer\s+(\S+)$/i)
	return match?.[1]
}

interface ClientError {
	status: number
	type?: unknown
}

/** 4xx errors raised by express middleware such as the JSON body parser. */
function isClientError(error: unknown): error is ClientError {
	if (typeof error !== 'object' || error === null || !('status' in error)) return false
	return typeof error.status === 'number' && error.status >= 400 && error.status < 500
}

function currentUser(res: Response): string {
	const username: unknown = res.locals.username
	if (typeof username !== 'string') {
		throw new UnauthorizedError()
	}
	return username
}

/**
 * Builds the express application. The caller decides whether and where it listens.
 */
export function createApp(services: Services): express.Express {
	const { auth, articles, news, sentiment } = services
	const app = express()

	app.use(cors())
	app.use(express.json())

	const requireAuth: RequestHandler = (req, res, next) => {
		try {
			res.locals.username = auth.authenticate(bearerToken(req))
			next()
		} catch (error) {
			next(error)
		}
	}

	app.get('/', (_req, res) => {
		res.sendFile(FRONTEND_PATH)
	})

	app.get('/api/health', (_req, res) => {
		res.json({ success: true, data: { status: 'ok', sentimentEngine: sentiment.engine } })
	})

	app.get('/api/topics', (_req, res) => {
		res.json({
			success: true,
			data: { trending: TRENDING_TOPICS, suggestions: SUGGESTED_TOPICS, quickSearches: QUICK_SEARCHES }
		})
	})

	// Auth
	app.post(
		'/api/auth/register',
		asyncHandler(async (req, res) => {
			const body = registerSchema.parse(req.body ?? {})
			const result = await auth.register({ ...body, email: body.email || undefined })
			res.status(201).json({ success: true, data: result })
		})
	)

	app.post(
		'/api/auth/login',
		asyncHandler(async (req, res) => {
			const { username, password } = loginSchema.parse(req.body ?? {})
			const result = await auth.login(username, password)
			res.json({ success: true, data: result })
		})
	)

	app.post('/api/auth/logout', requireAuth, (req, res) => {
		const token = bearerToken(req)
		if (token) auth.logout(token)
		res.json({ success: true, data: { message: 'Logged out.' } })
	})

	app.get('/api/me', requireAuth, (_req, res) => {
		const username = currentUser(res)
		res.json({ success: true, data: { username, savedCount: articles.count(username) } })
	})

	// News
	app.get(
		'/api/news/search',
		requireAuth,
		asyncHandler(async (req, res) => {
			const { q, timeFilter, max } = searchSchema.parse(req.query)
			const results = await news.search(q, timeFilter, max)
			res.json({ success: true, data: presentSearchResults(sentiment, q, timeFilter, results) })
		})
	)

	app.get(
		'/api/news/headlines',
		requireAuth,
		asyncHandler(async (req, res) => {
			const { category, q, max } = headlinesSchema.parse(req.query)
			const results = await news.topHeadlines(category, max, q)
			res.json({ success: true, data: presentSearchResults(sentiment, q ?? category ?? 'top headlines', 'anytime', results) })
		})
	)

	// Sentiment
	app.post('/api/sentiment', (req, res) => {
		const { text } = sentimentSchema.parse(req.body ?? {})
		const result = sentiment.analyze(text)
		res.json({ success: true, data: { ...result, badge: badge(result.label) } })
	})

	// Saved articles
	app.get('/api/articles', requireAuth, (_req, res) => {
		const username = currentUser(res)
		res.json({ success: true, data: presentSavedArticles(sentiment, articles.list(username)) })
	})

	app.post('/api/articles', requireAuth, (req, res) => {
		const username = currentUser(res)
		const input = saveArticleSchema.parse(req.body ?? {})
		const result = articles.save(username, input)
		if (!result.saved) {
			res.status(409).json({ success: false, error: result.message })
			return
		}
		res.status(201).json({ success: true, data: result })
	})

	app.delete('/api/articles', requireAuth, (req, res) => {
		const username = currentUser(res)
		const { link } = deleteArticleSchema.parse(req.query)
		if (!articles.remove(username, link)) {
			throw new NotFoundError('Saved article not found')
		}
		res.json({ success: true, data: { message: 'Article deleted successfully!' } })
	})

	app.use('/api', (_req, _res, next) => {
		next(new NotFoundError('Route not found'))
	})

	// express recognises error handlers by their four parameters
	app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
		if (error instanceof ZodError) {
			res.status(400).json({ success: false, error: 'Validation failed', details: toValidationIssues(error.issues) })
			return
		}
		if (isClientError(error)) {
			res.status(error.status).json({
				success: false,
				error: error.type === 'entity.parse.failed' ? 'Invalid JSON body' : getErrorMessage(error)
			})
			return
		}
		if (isAppError(error)) {
			if (error.statusCode >= 500) {
				log.error('Request failed', error, { path: req.path, code: error.code, ...error.context })
			}
			res.status(error.statusCode).json({ success: false, error: error.message })
			return
		}

		log.error('Unhandled request error', error, { path: req.path })
		res.status(500).json({ success: false, error: 'Internal server error' })
	})

	return app
}
