/**
 * Category-scoped, levelled logger.
 * Everything goes to stderr: stdout belongs to the MCP transport.
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR'

const LEVELS: LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR']

let globalLevel: LogLevel = 'INFO'

export function setLogLevel(level: LogLevel): void {
	globalLevel = level
}

export class Logger {
	constructor(private readonly category: string) {}

	private shouldLog(level: LogLevel): boolean {
		return LEVELS.indexOf(level) >= LEVELS.indexOf(globalLevel)
	}

	format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
		const contextStr = context ? ` ${JSON.stringify(context)}` : ''
		return `[${new Date().toISOString()}] [${level}] [${this.category}] ${message}${contextStr}`
	}

	private write(level: LogLevel, message: string, context?: Record<string, unknown>, error?: unknown): void {
		if (!this.shouldLog(level)) return

		console.error(this.format(level, message, context))
		if (error instanceof Error && error.stack && globalLevel === 'DEBUG') {
			console.error(error.stack)
		}
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.write('DEBUG', message, context)
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.write('INFO', message, context)
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.write('WARN', message, context)
	}

	error(message: string, error?: unknown, context?: Record<string, unknown>): void {
		const errorContext = error instanceof Error ? { error: error.message } : error !== undefined ? { error: String(error) } : {}
		this.write('ERROR', message, { ...errorContext, ...context }, error)
	}
}

export function createLogger(category: string): Logger {
	return new Logger(category)
}
