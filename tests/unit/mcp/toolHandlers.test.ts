import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js'
import { createTestServices, fakeHttp, gnewsArticle, type FakeResponse } from '../../helpers.js'
import type { Services } from '../../../src/bootstrap.js'
import { TOOL_DEFINITIONS, ToolHandlers } from '../../../src/mcp/toolHandlers.js'
import { articleId } from '../../../src/services/newsService.js'

function texts(result: CallToolResult): string[] {
	return result.content.map((item) => (item.type === 'text' ? item.text : ''))
}

describe('ToolHandlers', () => {
	let services: Services
	let tools: ToolHandlers
	let response: FakeResponse

	beforeEach(() => {
		response = {
			status: 200,
			data: {
				articles: [
					gnewsArticle('a', { description: 'Record growth ahead' }),
					gnewsArticle('b', { description: 'Fraud probe widens' })
				]
			}
		}
		services = createTestServices(fakeHttp(() => response).http)
		tools = new ToolHandlers(services)
	})

	afterEach(() => {
		services.close()
	})

	async function signIn() {
		await tools.call('register', { username: 'alice', password: 'secret1' })
		return tools.call('login', { username: 'alice', password: 'secret1' })
	}

	it('declares every tool once', () => {
		expect(TOOL_DEFINITIONS.map((tool) => tool.name)).toEqual([
			'register',
			'login',
			'logout',
			'whoami',
			'search_news',
			'top_headlines',
			'analyze_sentiment',
			'save_article',
			'list_saved_articles',
			'delete_saved_article'
		])
	})

	it('registers, signs in and reports the user', async () => {
		expect(texts(await tools.call('register', { username: 'alice', password: 'secret1' }))).toEqual([
			'User created successfully!'
		])
		expect(texts(await tools.call('login', { username: 'alice', password: 'secret1' }))).toEqual([
			'Login successful! Signed in as alice.'
		])
		expect(tools.currentUser).toBe('alice')
		expect(texts(await tools.call('whoami', {}))).toEqual(['alice (0 saved articles)'])
	})

	it('returns errors as tool results', async () => {
		const result = await tools.call('whoami', {})

		expect(result.isError).toBe(true)
		expect(texts(result)).toEqual(['Error: Not logged in.'])
	})

	it('reports a bad login', async () => {
		await tools.call('register', { username: 'alice', password: 'secret1' })

		expect(texts(await tools.call('login', { username: 'alice', password: 'nope123' }))).toEqual([
			'Error: Invalid username or password!'
		])
	})

	it('searches and scores headlines', async () => {
		await signIn()

		const result = await tools.call('search_news', { q: 'markets' })
		const [summary, lines, chart] = texts(result)

		expect(summary).toBe('2 articles for "markets" from 2 sources (Anytime)')
		expect(lines.split('\n')).toEqual([
			`1. [😊 Positive] Headline a (Source a) id=${articleId('https://news.example.com/a', 'Headline a')}`,
			`2. [☹️ Negative] Headline b (Source b) id=${articleId('https://news.example.com/b', 'Headline b')}`
		])
		expect(chart.split('\n')[0]).toBe('Results Sentiment')
	})

	it('says so when nothing is found', async () => {
		await signIn()
		response = { status: 200, data: { articles: [] } }

		expect(texts(await tools.call('search_news', { q: 'zzz' }))).toEqual([
			'No articles found for "zzz". Try different keywords.'
		])
	})

	it('saves a searched article by id under the search keyword', async () => {
		await signIn()
		await tools.call('search_news', { q: 'markets' })
		const id = articleId('https://news.example.com/a', 'Headline a')

		expect(texts(await tools.call('save_article', { articleId: id }))).toEqual(['Article saved successfully!'])
		expect(texts(await tools.call('save_article', { articleId: id }))).toEqual(['Article already saved!'])

		const [saved] = services.articles.list('alice')
		expect(saved).toMatchObject({
			title: 'Headline a',
			link: 'https://news.example.com/a',
			source: 'Source a',
			category: 'markets'
		})
	})

	it('requires an id or a url to save', async () => {
		await signIn()

		expect(texts(await tools.call('save_article', {}))).toEqual(['Error: articleId or url is required'])
		expect(texts(await tools.call('save_article', { url: 'javascript:alert(1)' }))).toEqual([
			'Error: Only http and https links are allowed'
		])
		expect(texts(await tools.call('save_article', { articleId: 'gone' }))).toEqual([
			'Error: Article gone is no longer cached; search again or pass its url'
		])
	})

	it('lists and deletes saved articles', async () => {
		await signIn()
		expect(texts(await tools.call('list_saved_articles', {}))).toEqual(['No saved articles yet.'])

		await tools.call('save_article', { url: 'https://news.example.com/x', title: 'Strong quarter', source: 'Wire' })
		const [summary, lines] = texts(await tools.call('list_saved_articles', {}))

		expect(summary).toBe('1 saved, latest Jan 05, 1 sources')
		expect(lines).toBe('- [😊 Positive] Strong quarter (Wire, saved 2024-01-05) https://news.example.com/x')

		expect(texts(await tools.call('delete_saved_article', { url: 'https://news.example.com/x' }))).toEqual([
			'Article deleted successfully!'
		])
		expect(texts(await tools.call('delete_saved_article', { url: 'https://news.example.com/x' }))).toEqual([
			'Error: Saved article not found'
		])
	})

	it('analyses text without signing in', async () => {
		const [summary] = texts(await tools.call('analyze_sentiment', { text: 'Strong growth' }))

		expect(summary).toBe('😊 Positive (score 0.2, engine keyword)')
	})

	it('signs out', async () => {
		await signIn()

		expect(texts(await tools.call('logout', {}))).toEqual(['Signed out alice.'])
		expect(tools.currentUser).toBeNull()
		expect(texts(await tools.call('logout', {}))).toEqual(['Nobody was signed in.'])
	})

	it('rejects unknown tools', async () => {
		expect(texts(await tools.call('nope', {}))).toEqual(['Error: Unknown tool: nope'])
	})
})
