/**
 * Zod schemas for request bodies, query strings and MCP tool arguments.
 */

import { z } from 'zod'
import { DEFAULT_ARTICLES, HEADLINE_CATEGORIES, clampArticleCount } from '../services/newsService.js'

export interface ValidationIssue {
	field: string
	message: string
}

export function toValidationIssues(issues: z.ZodIssue[]): ValidationIssue[] {
	return issues.map((issue) => ({
		field: issue.path.join('.'),
		message: issue.message
	}))
}

// Out-of-range counts are pulled into 5..20 rather than rejected
const articleCount = z.coerce
	.number()
	.default(DEFAULT_ARTICLES)
	.transform((max) => clampArticleCount(max))

export const httpUrl = z.string().regex(/^https?:\/\/[^\s"'<>]+$/i, 'Only http and https links are allowed')

export const registerSchema = z.object({
	username: z.string().trim().default(''),
	password: z.string().default(''),
	confirmPassword: z.string().optional(),
	email: z.string().email().optional().or(z.literal(''))
})

export const loginSchema = z.object({
	username: z.string().trim().default(''),
	password: z.string().default('')
})

export const searchSchema = z.object({
	q: z.string().trim().min(1, 'Enter a keyword').default('technology'),
	timeFilter: z.enum(['anytime', 'day', 'week']).default('anytime'),
	max: articleCount
})

export const headlinesSchema = z.object({
	category: z.enum(HEADLINE_CATEGORIES).optional(),
	q: z.string().trim().min(1).optional(),
	max: articleCount
})

export const sentimentSchema = z.object({
	text: z.string().trim().min(1, 'Text is required')
})

export const saveArticleSchema = z.object({
	title: z.string().nullish(),
	link: httpUrl,
	publishedAt: z.string().nullish(),
	imageUrl: z.string().nullish(),
	source: z.string().nullish(),
	category: z.string().nullish()
})

export const deleteArticleSchema = z.object({
	link: z.string().min(1)
})

export type SearchParams = z.infer<typeof searchSchema>
export type HeadlineParams = z.infer<typeof headlinesSchema>
