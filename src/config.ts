/**
 * Shared contracts for text2sql-engine
 *
 * Includes:
 * - Logger shape injected into every service
 * - Structured error type
 * - Prompt template names understood by the completion sidecar
 * - Defaults that are not part of the YAML config
 */

// ============================================================================
// Logging
// ============================================================================

export type LogMeta = Record<string, unknown>

export interface Logger {
	info(message: string, meta?: LogMeta): void
	warn(message: string, meta?: LogMeta): void
	error(message: string, meta?: LogMeta): void
	debug(message: string, meta?: LogMeta): void
}

// ============================================================================
// Errors
// ============================================================================

export type Text2SqlErrorType =
	| "schema"
	| "retrieval"
	| "completion"
	| "execution"
	| "timeout"
	| "cancelled"
	| "validation"
	| "configuration"

/**
 * Error types for structured error handling
 */
export class Text2SqlError extends Error {
	constructor(
		public type: Text2SqlErrorType,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "Text2SqlError"
	}
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

// ============================================================================
// Prompt Templates
// ============================================================================

/**
 * Template names the completion sidecar renders.
 *
 * generate_sql_query: { schemaInfo, userMessage }
 * optimize_sql_query: { schemaInfo, userMessage, originalSql, errorMessage }
 */
export const PROMPT_TEMPLATES = {
	generateSql: "generate_sql_query",
	optimizeSql: "optimize_sql_query",
} as const

export type PromptTemplateName = (typeof PROMPT_TEMPLATES)[keyof typeof PROMPT_TEMPLATES]

/**
 * Sidecar endpoints
 */
export const SIDECAR_ENDPOINTS = {
	complete: "/complete",
	embed: "/embed",
	health: "/health",
} as const

/**
 * Default configuration values not covered by config.yaml
 */
export const DEFAULTS = {
	healthCheckTimeoutMs: 5000,
	circuitBreakerCooldownMs: 10000,
}
