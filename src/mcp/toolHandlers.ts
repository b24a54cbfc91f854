import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'
import type { Services } from '../bootstrap.js'
import { headlinesSchema, httpUrl, loginSchema, registerSchema, searchSchema, sentimentSchema } from '../middleware/validation.js'
import { renderTextChart } from '../services/chartService.js'
import { badge } from '../services/sentimentService.js'
import { presentSavedArticles, presentSearchResults, type SearchResultsView } from '../services/presentation.js'
import type { SaveArticleInput } from '../types/news.js'
import { NotFoundError, UnauthorizedError, ValidationError, getErrorMessage } from '../utils/errors.js'

export interface ToolContent {
	type: 'text'
	text: string
}

type ToolArgs = Record<string, unknown> | undefined

const saveToolSchema = z
	.object({
		articleId: z.string().min(1).optional(),
		url: httpUrl.optional(),
		title: z.string().optional(),
		publishedAt: z.string().optional(),
		imageUrl: z.string().optional(),
		source: z.string().optional(),
		category: z.string().optional()
	})
	.refine((value) => value.articleId || value.url, { message: 'articleId or url is required' })

const deleteToolSchema = z.object({ url: z.string().min(1) })

export const TOOL_DEFINITIONS: Tool[] = [
	{
		name: 'register',
		description: 'Creates a News Pulse account',
		inputSchema: {
			type: 'object',
			properties: {
				username: { type: 'string', description: 'Username' },
				password: { type: 'string', description: 'Password, at least 6 characters' },
				email: { type: 'string', description: 'Email address (optional)' }
			},
			required: ['username', 'password']
		}
	},
	{
		name: 'login',
		description: 'Signs in; saved-article tools act on behalf of this user',
		inputSchema: {
			type: 'object',
			properties: {
				username: { type: 'string', description: 'Username' },
				password: { type: 'string', description: 'Password' }
			},
			required: ['username', 'password']
		}
	},
	{
		name: 'logout',
		description: 'Signs the current user out',
		inputSchema: { type: 'object', properties: {} }
	},
	{
		name: 'whoami',
		description: 'Shows the signed-in user and their saved-article count',
		inputSchema: { type: 'object', properties: {} }
	},
	{
		name: 'search_news',
		description: 'Searches GNews headlines and scores each one for sentiment',
		inputSchema: {
			type: 'object',
			properties: {
				q: { type: 'string', description: 'Keyword (default: technology)' },
				timeFilter: {
					type: 'string',
					enum: ['anytime', 'day', 'week'],
					description: 'Anytime, past 24h or past week (default: anytime)'
				},
				max: { type: 'number', description: 'Number of articles, 5-20 (default: 10)', default: 10 }
			}
		}
	},
	{
		name: 'top_headlines',
		description: 'Fetches top headlines, optionally for one category, and scores them for sentiment',
		inputSchema: {
			type: 'object',
			properties: {
				category: {
					type: 'string',
					enum: ['general', 'world', 'nation', 'business', 'technology', 'entertainment', 'sports', 'science', 'health']
				},
				q: { type: 'string', description: 'Keyword filter (optional)' },
				max: { type: 'number', description: 'Number of articles, 5-20 (default: 10)', default: 10 }
			}
		}
	},
	{
		name: 'analyze_sentiment',
		description: 'Labels a text positive, neutral or negative',
		inputSchema: {
			type: 'object',
			properties: {
				text: { type: 'string', description: 'Text to analyse' }
			},
			required: ['text']
		}
	},
	{
		name: 'save_article',
		description: 'Saves an article for the signed-in user, by id from an earlier search or by url',
		inputSchema: {
			type: 'object',
			properties: {
				articleId: { type: 'string', description: 'Article id returned by search_news or top_headlines' },
				url: { type: 'string', description: 'Article url' },
				title: { type: 'string' },
				publishedAt: { type: 'string' },
				imageUrl: { type: 'string' },
				source: { type: 'string' },
				category: { type: 'string', description: 'Category label (default: General)' }
			}
		}
	},
	{
		name: 'list_saved_articles',
		description: "Lists the signed-in user's saved articles with a sentiment chart",
		inputSchema: { type: 'object', properties: {} }
	},
	{
		name: 'delete_saved_article',
		description: 'Deletes a saved article by its url',
		inputSchema: {
			type: 'object',
			properties: {
				url: { type: 'string', description: 'Url of the saved article' }
			},
			required: ['url']
		}
	}
]

function text(value: string): ToolContent {
	return { type: 'text', text: value }
}

function json(value: unknown): ToolContent {
	return text(JSON.stringify(value, null, 2))
}

function summarizeResults(view: SearchResultsView): ToolContent[] {
	const lines = view.articles.map(
		(article, index) => `${index + 1}. [${article.badge.emoji} ${article.badge.label}] ${article.title} (${article.source}) id=${article.id}`
	)
	return [
		text(`${view.stats.articlesFound} articles for "${view.query}" from ${view.stats.sources} sources (${view.stats.timeFilter})`),
		text(lines.join('\n')),
		text(renderTextChart(view.counts, view.chart.title)),
		json(
			view.articles.map((article) => ({
				id: article.id,
				title: article.title,
				url: article.url,
				source: article.source,
				publishedAt: article.displayDate,
				sentiment: { label: article.sentiment.label, score: article.sentiment.score }
			}))
		)
	]
}

/**
 * MCP tool dispatch. One stdio connection serves one user, so the signed-in user lives on the instance.
 */
export class ToolHandlers {
	private username: string | null = null
	private token: string | null = null
	private lastQuery: string | null = null

	constructor(private readonly services: Services) {}

	get currentUser(): string | null {
		return this.username
	}

	async call(name: string, args: ToolArgs): Promise<CallToolResult> {
		try {
			return { content: await this.dispatch(name, args ?? {}) }
		} catch (error) {
			const message = error instanceof z.ZodError ? error.issues.map((issue) => issue.message).join('; ') : getErrorMessage(error)
			return { content: [text(`Error: ${message}`)], isError: true }
		}
	}

	private requireUser(): string {
		if (!this.username) {
			throw new UnauthorizedError('Not logged in.')
		}
		return this.username
	}

	private async dispatch(name: string, args: Record<string, unknown>): Promise<ToolContent[]> {
		const { auth, articles, news, sentiment } = this.services

		switch (name) {
			case 'register': {
				const input = registerSchema.parse(args)
				const result = await auth.register({ ...input, email: input.email || undefined })
				return [text(result.message)]
			}

			case 'login': {
				const { username, password } = loginSchema.parse(args)
				const result = await auth.login(username, password)
				if (this.token) auth.logout(this.token)
				this.username = result.username
				this.token = result.token
				return [text(`${result.message} Signed in as ${result.username}.`)]
			}

			case 'logout': {
				if (this.token) auth.logout(this.token)
				const previous = this.username
				this.username = null
				this.token = null
				return [text(previous ? `Signed out ${previous}.` : 'Nobody was signed in.')]
			}

			case 'whoami': {
				const username = this.requireUser()
				return [text(`${username} (${articles.count(username)} saved articles)`)]
			}

			case 'search_news': {
				this.requireUser()
				const { q, timeFilter, max } = searchSchema.parse(args)
				const results = await news.search(q, timeFilter, max)
				this.lastQuery = q
				if (results.length === 0) {
					return [text(`No articles found for "${q}". Try different keywords.`)]
				}
				return summarizeResults(presentSearchResults(sentiment, q, timeFilter, results))
			}

			case 'top_headlines': {
				this.requireUser()
				const { category, q, max } = headlinesSchema.parse(args)
				const results = await news.topHeadlines(category, max, q)
				const label = q ?? category ?? 'top headlines'
				this.lastQuery = label
				if (results.length === 0) {
					return [text(`No headlines found for "${label}".`)]
				}
				return summarizeResults(presentSearchResults(sentiment, label, 'anytime', results))
			}

			case 'analyze_sentiment': {
				const { text: input } = sentimentSchema.parse(args)
				const result = sentiment.analyze(input)
				const view = badge(result.label)
				return [text(`${view.emoji} ${view.label} (score ${result.score}, engine ${result.engine})`), json(result)]
			}

			case 'save_article': {
				const username = this.requireUser()
				const input = saveToolSchema.parse(args)
				const result = articles.save(username, this.resolveArticle(input))
				return [text(result.message)]
			}

			case 'list_saved_articles': {
				const username = this.requireUser()
				const view = presentSavedArticles(sentiment, articles.list(username))
				if (view.articles.length === 0) {
					return [text('No saved articles yet.')]
				}
				const lines = view.articles.map(
					(article) => `- [${article.badge.emoji} ${article.badge.label}] ${article.title} (${article.source || 'Unknown Source'}, saved ${article.savedDay}) ${article.link}`
				)
				return [
					text(`${view.stats.totalSaved} saved, latest ${view.stats.latestSave}, ${view.stats.sources} sources`),
					text(lines.join('\n')),
					text(renderTextChart(view.counts, view.chart.title))
				]
			}

			case 'delete_saved_article': {
				const username = this.requireUser()
				const { url } = deleteToolSchema.parse(args)
				if (!articles.remove(username, url)) {
					throw new NotFoundError('Saved article not found')
				}
				return [text('Article deleted successfully!')]
			}

			default:
				throw new ValidationError(`Unknown tool: ${name}`)
		}
	}

	private resolveArticle(input: z.infer<typeof saveToolSchema>): SaveArticleInput {
		const cached = input.articleId ? this.services.news.getCachedArticle(input.articleId) : undefined
		if (input.articleId && !cached && !input.url) {
			throw new NotFoundError(`Article ${input.articleId} is no longer cached; search again or pass its url`)
		}

		// The query that found the article doubles as its category
		return {
			title: input.title ?? cached?.title,
			link: input.url ?? cached?.url,
			publishedAt: input.publishedAt ?? cached?.publishedAt,
			imageUrl: input.imageUrl ?? cached?.imageUrl,
			source: input.source ?? cached?.source,
			category: input.category ?? (cached ? this.lastQuery : null)
		}
	}
}
