#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import {
	CallToolRequestSchema,
	GetPromptRequestSchema,
	ListPromptsRequestSchema,
	ListResourcesRequestSchema,
	ListToolsRequestSchema,
	ReadResourceRequestSchema
} from '@modelcontextprotocol/sdk/types.js'
import { createServices } from './bootstrap.js'
import { loadConfigFromEnvironment } from './config.js'
import { TOOL_DEFINITIONS, ToolHandlers } from './mcp/toolHandlers.js'
import { presentSavedArticles, QUICK_SEARCHES, SUGGESTED_TOPICS, TRENDING_TOPICS } from './services/presentation.js'
import { ValidationError } from './utils/errors.js'
import { createLogger } from './utils/logger.js'

const log = createLogger('MCP')

async function main() {
	const config = loadConfigFromEnvironment()
	const services = await createServices(config)
	const tools = new ToolHandlers(services)

	const server = new Server(
		{ name: config.mcp.name, version: config.mcp.version },
		{ capabilities: { tools: {}, resources: {}, prompts: {} } }
	)

	server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }))

	server.setRequestHandler(CallToolRequestSchema, async (request) => tools.call(request.params.name, request.params.arguments))

	server.setRequestHandler(ListResourcesRequestSchema, async () => ({
		resources: [
			{
				uri: 'news://trending-topics',
				name: 'Trending topics',
				description: 'Trending topics, suggested searches and quick searches',
				mimeType: 'application/json'
			},
			{
				uri: 'news://cache-stats',
				name: 'Cache statistics',
				description: 'News response cache hit rate and key count',
				mimeType: 'application/json'
			},
			{
				uri: 'news://saved-articles',
				name: 'Saved articles',
				description: 'Saved articles of the signed-in user with sentiment counts',
				mimeType: 'application/json'
			}
		]
	}))

	server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
		const { uri } = request.params
		let payload: unknown

		switch (uri) {
			case 'news://trending-topics':
				payload = { trending: TRENDING_TOPICS, suggestions: SUGGESTED_TOPICS, quickSearches: QUICK_SEARCHES }
				break
			case 'news://cache-stats':
				payload = services.cache.getStats()
				break
			case 'news://saved-articles': {
				const username = tools.currentUser
				if (!username) {
					throw new ValidationError('Not logged in.')
				}
				const view = presentSavedArticles(services.sentiment, services.articles.list(username))
				payload = { stats: view.stats, counts: view.counts, articles: view.articles }
				break
			}
			default:
				throw new ValidationError(`Unknown resource: ${uri}`)
		}

		return {
			contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(payload, null, 2) }]
		}
	})

	server.setRequestHandler(ListPromptsRequestSchema, async () => ({
		prompts: [
			{
				name: 'sentiment_briefing',
				description: 'Searches a topic, scores the headlines and writes a short sentiment briefing',
				arguments: [
					{ name: 'topic', description: 'Topic to search, e.g. Bitcoin', required: true },
					{ name: 'timeFilter', description: 'anytime, day or week (default: day)', required: false }
				]
			}
		]
	}))

	server.setRequestHandler(GetPromptRequestSchema, async (request) => {
		const { name, arguments: args } = request.params
		if (name !== 'sentiment_briefing') {
			throw new ValidationError(`Unknown prompt: ${name}`)
		}

		const topic = args?.topic
		if (!topic) {
			throw new ValidationError('topic is required')
		}
		const timeFilter = args?.timeFilter || 'day'

		return {
			description: `Sentiment briefing for "${topic}"`,
			messages: [
				{
					role: 'user',
					content: {
						type: 'text',
						text: `Write a short sentiment briefing about "${topic}".

1. Call search_news with q="${topic}" and timeFilter="${timeFilter}".
2. Report how many headlines are positive, neutral and negative.
3. Quote the most positive and the most negative headline with their sources.
4. Close with one sentence on the overall tone.`
					}
				}
			]
		}
	})

	const transport = new StdioServerTransport()
	await server.connect(transport)

	log.info('MCP server started', {
		name: config.mcp.name,
		version: config.mcp.version,
		sentimentEngine: services.sentiment.engine,
		cacheTtl: config.news.cacheTtlSeconds
	})

	process.on('SIGINT', () => {
		services.close()
		process.exit(0)
	})
}

process.on('unhandledRejection', (error) => {
	log.error('Unhandled rejection', error)
	process.exit(1)
})

main().catch((error) => {
	log.error('MCP server failed to start', error)
	process.exit(1)
})
