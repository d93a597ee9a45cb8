/**
 * Completion Sidecar HTTP Client
 *
 * Talks to the model-hosting sidecar service.
 *
 * Responsibilities:
 * - Render a named prompt template and return the completion (/complete)
 * - Embed text for the vector store (/embed)
 * - Timeouts, caller cancellation and a fail-fast circuit breaker
 */

import { z } from "zod"
import {
	DEFAULTS,
	SIDECAR_ENDPOINTS,
	Text2SqlError,
	type Logger,
	type PromptTemplateName,
} from "./config.js"
import type { CallOptions, CompletionOptions, Embedder, TemplateArgs, TextCompleter } from "./collaborators.js"

const completeResponseSchema = z.object({
	text: z.string(),
	model: z.string().optional(),
})

const embedResponseSchema = z.object({
	embedding: z.array(z.number()).min(1),
	model: z.string().optional(),
	dimensions: z.number().optional(),
})

export interface SidecarClientOptions {
	baseUrl: string
	timeoutMs: number
	temperature: number
	logger: Logger
}

export class SidecarClient implements TextCompleter, Embedder {
	/** Circuit breaker: calls fail fast until this time (ms since epoch). */
	private unhealthyUntil = 0

	constructor(private options: SidecarClientOptions) {}

	async complete(template: PromptTemplateName, args: TemplateArgs, options: CompletionOptions = {}): Promise<string> {
		const data = await this.post(
			SIDECAR_ENDPOINTS.complete,
			{ template, args, temperature: options.temperature ?? this.options.temperature },
			completeResponseSchema,
			"completion",
			options.signal,
		)
		return data.text
	}

	async embedText(text: string, options: CallOptions = {}): Promise<number[]> {
		const data = await this.post(SIDECAR_ENDPOINTS.embed, { text }, embedResponseSchema, "retrieval", options.signal)
		return data.embedding
	}

	/**
	 * Returns true if the sidecar is reachable and healthy. A healthy answer
	 * closes the circuit breaker, an unhealthy one opens it.
	 */
	async healthCheck(): Promise<boolean> {
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), DEFAULTS.healthCheckTimeoutMs)
		try {
			const response = await fetch(`${this.options.baseUrl}${SIDECAR_ENDPOINTS.health}`, {
				method: "GET",
				signal: controller.signal,
			})
			this.unhealthyUntil = response.ok ? 0 : Date.now() + DEFAULTS.circuitBreakerCooldownMs
			return response.ok
		} catch (error) {
			this.options.logger.warn("Sidecar health check failed", { error: String(error) })
			this.unhealthyUntil = Date.now() + DEFAULTS.circuitBreakerCooldownMs
			return false
		} finally {
			clearTimeout(timeoutId)
		}
	}

	private async post<T>(
		endpoint: string,
		body: unknown,
		schema: z.ZodType<T>,
		errorType: "completion" | "retrieval",
		external?: AbortSignal,
	): Promise<T> {
		// Circuit breaker: if the sidecar is unhealthy, fail fast
		if (Date.now() < this.unhealthyUntil) {
			throw new Text2SqlError(errorType, "Sidecar service is unavailable. Please try again later.", true, {
				baseUrl: this.options.baseUrl,
			})
		}
		if (external?.aborted) throw new Text2SqlError("cancelled", "Sidecar request cancelled")

		const url = `${this.options.baseUrl}${endpoint}`
		const controller = new AbortController()
		const onAbort = () => controller.abort()
		external?.addEventListener("abort", onAbort, { once: true })
		const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs)

		try {
			const response = await fetch(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					"Accept": "application/json",
				},
				body: JSON.stringify(body),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new Text2SqlError(
					errorType,
					`Sidecar returned error: ${response.status} ${errorText}`,
					response.status >= 500, // 5xx errors are recoverable
					{ statusCode: response.status, responseBody: errorText },
				)
			}

			const parsed = schema.safeParse(await response.json())
			if (!parsed.success) {
				throw new Text2SqlError(errorType, `Unexpected sidecar response from ${endpoint}: ${parsed.error.message}`)
			}
			return parsed.data
		} catch (error) {
			if (error instanceof Text2SqlError) throw error

			if (error instanceof Error && error.name === "AbortError") {
				if (external?.aborted) throw new Text2SqlError("cancelled", "Sidecar request cancelled", false, { url })
				throw new Text2SqlError("timeout", `Sidecar request timed out after ${this.options.timeoutMs}ms`, true, {
					timeout: this.options.timeoutMs,
					url,
				})
			}

			// Network errors open the breaker
			if (error instanceof TypeError) {
				this.unhealthyUntil = Date.now() + DEFAULTS.circuitBreakerCooldownMs
				this.options.logger.error("Cannot reach sidecar", { baseUrl: this.options.baseUrl, error: error.message })
				throw new Text2SqlError(errorType, `Cannot connect to sidecar at ${this.options.baseUrl}. Is it running?`, true, {
					baseUrl: this.options.baseUrl,
					originalError: error.message,
				})
			}

			throw new Text2SqlError(errorType, `Unexpected error communicating with sidecar: ${String(error)}`, false, {
				originalError: String(error),
			})
		} finally {
			clearTimeout(timeoutId)
			external?.removeEventListener("abort", onAbort)
		}
	}
}
