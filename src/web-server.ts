import { createApp } from './app.js'
import { createServices } from './bootstrap.js'
import { loadConfigFromEnvironment } from './config.js'
import { createLogger } from './utils/logger.js'

const log = createLogger('WEB')

async function main() {
	const config = loadConfigFromEnvironment()
	const services = await createServices(config)
	const app = createApp(services)

	const server = app.listen(config.port, () => {
		log.info(`Web server listening on http://localhost:${config.port}`, {
			sentimentEngine: services.sentiment.engine,
			database: config.databasePath
		})
		if (!config.news.apiKey) {
			log.warn('GNEWS_API_KEY is not set; news search will fail until it is configured')
		}
	})

	const shutdown = () => {
		server.close(() => {
			services.close()
			process.exit(0)
		})
	}
	process.on('SIGINT', shutdown)
	process.on('SIGTERM', shutdown)
}

main().catch((error) => {
	log.error('Web server failed to start', error)
	process.exit(1)
})
