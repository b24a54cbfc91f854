/**
 * Application error hierarchy. Each error carries the HTTP status the API answers with.
 */

export class AppError extends Error {
	readonly code: string
	readonly statusCode: number
	readonly context?: Record<string, unknown>

	constructor(message: string, code: string, statusCode: number = 500, context?: Record<string, unknown>) {
		super(message)
		this.name = this.constructor.name
		this.code = code
		this.statusCode = statusCode
		this.context = context
		Error.captureStackTrace?.(this, this.constructor)
	}
}

export class ValidationError extends AppError {
	constructor(message: string, context?: Record<string, unknown>) {
		super(message, 'VALIDATION_ERROR', 400, context)
	}
}

export class UnauthorizedError extends AppError {
	constructor(message: string = 'Not logged in.', context?: Record<string, unknown>) {
		super(message, 'UNAUTHORIZED', 401, context)
	}
}

export class NotFoundError extends AppError {
	constructor(message: string, context?: Record<string, unknown>) {
		super(message, 'NOT_FOUND', 404, context)
	}
}

export class ConflictError extends AppError {
	constructor(message: string, context?: Record<string, unknown>) {
		super(message, 'CONFLICT', 409, context)
	}
}

export class NewsApiError extends AppError {
	constructor(message: string, context?: Record<string, unknown>) {
		super(message, 'NEWS_API_ERROR', 502, context)
	}
}

export class ConfigurationError extends AppError {
	constructor(message: string, context?: Record<string, unknown>) {
		super(message, 'CONFIGURATION_ERROR', 500, context)
	}
}

export class DatabaseError extends AppError {
	constructor(message: string, context?: Record<string, unknown>) {
		super(message, 'DATABASE_ERROR', 500, context)
	}
}

export function isAppError(error: unknown): error is AppError {
	return error instanceof AppError
}

export function getErrorMessage(error: unknown): string {
	if (error instanceof Error) return error.message
	return String(error)
}
