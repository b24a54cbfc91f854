import dotenv from 'dotenv'
import { z } from 'zod'
import { ConfigurationError } from './utils/errors.js'

const booleanFlag = z
	.enum(['true', 'false'])
	.default('false')
	.transform((value) => value === 'true')

const envSchema = z.object({
	PORT: z.coerce.number().int().positive().default(3000),
	DATABASE_PATH: z.string().min(1).default('news_pulse.db'),
	GNEWS_API_KEY: z.string().min(1).optional(),
	GNEWS_BASE_URL: z.string().url().default('https://gnews.io/api/v4'),
	NEWS_LANG: z.string().length(2).default('en'),
	NEWS_COUNTRY: z.string().length(2).default('us'),
	NEWS_CACHE_TTL: z.coerce.number().int().positive().default(300),
	HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
	SESSION_TTL: z.coerce.number().int().positive().default(86400),
	BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
	SENTIMENT_ENGINE: z.enum(['auto', 'vader', 'keyword']).default('auto'),
	SEED_DEMO_USER: booleanFlag,
	LOG_LEVEL: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']).default('INFO'),
	MCP_SERVER_NAME: z.string().min(1).default('news-pulse'),
	MCP_SERVER_VERSION: z.string().min(1).default('0.1.0')
})

export type SentimentEngineMode = z.infer<typeof envSchema>['SENTIMENT_ENGINE']

export interface AppConfig {
	port: number
	databasePath: string
	news: {
		apiKey?: string
		baseUrl: string
		lang: string
		country: string
		cacheTtlSeconds: number
		timeoutMs: number
	}
	auth: {
		sessionTtlSeconds: number
		bcryptRounds: number
		seedDemoUser: boolean
	}
	sentimentEngine: SentimentEngineMode
	logLevel: 'DEBUG' | 'INFO' | 'WARN' | 'ERROR'
	mcp: {
		name: string
		version: string
	}
}

/**
 * Builds the typed configuration from environment variables.
 * Empty strings count as unset so that a blank `.env` entry falls back to its default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''))
	const parsed = envSchema.safeParse(cleaned)

	if (!parsed.success) {
		const fields = parsed.error.issues.map((issue) => issue.path.join('.'))
		throw new ConfigurationError(`Invalid configuration: ${fields.join(', ')}`, {
			issues: parsed.error.issues.map((issue) => ({ field: issue.path.join('.'), message: issue.message }))
		})
	}

	const values = parsed.data
	return {
		port: values.PORT,
		databasePath: values.DATABASE_PATH,
		news: {
			apiKey: values.GNEWS_API_KEY,
			baseUrl: values.GNEWS_BASE_URL,
			lang: values.NEWS_LANG,
			country: values.NEWS_COUNTRY,
			cacheTtlSeconds: values.NEWS_CACHE_TTL,
			timeoutMs: values.HTTP_TIMEOUT_MS
		},
		auth: {
			sessionTtlSeconds: values.SESSION_TTL,
			bcryptRounds: values.BCRYPT_ROUNDS,
			seedDemoUser: values.SEED_DEMO_USER
		},
		sentimentEngine: values.SENTIMENT_ENGINE,
		logLevel: values.LOG_LEVEL,
		mcp: {
			name: values.MCP_SERVER_NAME,
			version: values.MCP_SERVER_VERSION
		}
	}
}

/** Reads `.env` into `process.env`, then loads the configuration. */
export function loadConfigFromEnvironment(): AppConfig {
	dotenv.config()
	return loadConfig(process.env)
}
