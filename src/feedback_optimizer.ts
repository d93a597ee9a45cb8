/**
 * Execution-Feedback Optimizer
 *
 * Execute → validate → repair loop. Each iteration runs the current SQL:
 * - execution error: classify it and ask the completer for a repaired query
 * - valid result: accept and stop
 * - implausible result: describe the issues and ask for a refined query
 *
 * Bounded by `maxIterations`. Faults inside an iteration (completer failure,
 * executor throw, timeout, cancellation) end the loop with an aborted step.
 */

import { v4 as uuidv4 } from "uuid"
import { PROMPT_TEMPLATES, Text2SqlError, describeError, type Logger } from "./config.js"
import type { Row, SqlExecutor, TextCompleter } from "./collaborators.js"
import {
	classifyError,
	formatRepairMessage,
	systemErrorAnalysis,
	type ErrorAnalysis,
} from "./error_classifier.js"
import type { ResultValidator, ValidationResult } from "./result_validator.js"

// ============================================================================
// Types
// ============================================================================

export type StepOutcome = "accepted" | "result_refinement" | "error_repair" | "aborted"

export interface ExecutionSummary {
	success: boolean
	errorMessage: string | null
	rowCount: number
	durationMs: number
}

export interface OptimizationStep {
	iteration: number
	inputSql: string
	outputSql: string
	outcome: StepOutcome
	execution?: ExecutionSummary
	validation?: ValidationResult
	errorAnalysis?: ErrorAnalysis
	feedback?: string
}

export interface OptimizationResult {
	runId: string
	originalSql: string
	finalSql: string
	success: boolean
	steps: OptimizationStep[]
	finalRows?: Row[]
	errorMessage?: string
}

export interface OptimizeOptions {
	signal?: AbortSignal
	iterationTimeoutMs?: number
}

export interface FeedbackOptimizerDefaults {
	maxIterations: number
	iterationTimeoutMs: number
	temperature: number
}

const DEFAULTS: FeedbackOptimizerDefaults = {
	maxIterations: 3,
	iterationTimeoutMs: 60000,
	temperature: 0.1,
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Strip code fences and blank lines from a completion.
 */
export function cleanSqlCompletion(text: string): string {
	return text
		.replace(/```sql/gi, "")
		.replace(/```/g, "")
		.split("\n")
		.filter(line => line.trim() !== "")
		.join("\n")
		.trim()
}

export function buildResultFeedback(validation: ValidationResult, question: string): string {
	return [
		"Result validation found the following issues:",
		...validation.issues.map(issue => `- ${issue}`),
		"",
		`Original request: ${question}`,
		"Adjust the SQL so the result matches the request.",
	].join("\n")
}

/**
 * Run `task` with a signal that aborts on the caller's signal or after
 * `timeoutMs`, whichever comes first. Rejects with a timeout or cancelled
 * error even when the task ignores its signal.
 */
async function runWithDeadline<T>(
	task: (signal: AbortSignal) => Promise<T>,
	timeoutMs: number,
	external?: AbortSignal,
): Promise<T> {
	if (external?.aborted) throw new Text2SqlError("cancelled", "Optimization cancelled")

	const controller = new AbortController()
	const onExternalAbort = () => controller.abort()
	external?.addEventListener("abort", onExternalAbort, { once: true })

	let timer: NodeJS.Timeout | undefined
	const deadline = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			reject(new Text2SqlError("timeout", `Iteration exceeded ${timeoutMs}ms`, true, { timeoutMs }))
			controller.abort()
		}, timeoutMs)
		controller.signal.addEventListener("abort", () => reject(new Text2SqlError("cancelled", "Optimization cancelled")), {
			once: true,
		})
	})

	try {
		return await Promise.race([task(controller.signal), deadline])
	} finally {
		clearTimeout(timer)
		external?.removeEventListener("abort", onExternalAbort)
	}
}

// ============================================================================
// Optimizer
// ============================================================================

interface IterationContext {
	connectionId: string
	question: string
	schemaInfo: string
}

export class FeedbackOptimizer {
	private defaults: FeedbackOptimizerDefaults

	constructor(
		private executor: SqlExecutor,
		private completer: TextCompleter,
		private validator: ResultValidator,
		private logger: Logger,
		defaults: Partial<FeedbackOptimizerDefaults> = {},
	) {
		this.defaults = { ...DEFAULTS, ...defaults }
	}

	async optimizeWithFeedback(
		connectionId: string,
		question: string,
		schemaInfo: string,
		initialSql: string,
		maxIterations: number = this.defaults.maxIterations,
		options: OptimizeOptions = {},
	): Promise<OptimizationResult> {
		if (!Number.isInteger(maxIterations) || maxIterations < 1) {
			throw new Text2SqlError("validation", `maxIterations must be a positive integer, got ${maxIterations}`)
		}

		const result: OptimizationResult = {
			runId: uuidv4(),
			originalSql: initialSql,
			finalSql: initialSql,
			success: false,
			steps: [],
		}
		const ctx: IterationContext = { connectionId, question, schemaInfo }
		const timeoutMs = options.iterationTimeoutMs ?? this.defaults.iterationTimeoutMs
		let currentSql = initialSql

		for (let iteration = 1; iteration <= maxIterations; iteration++) {
			const step: OptimizationStep = { iteration, inputSql: currentSql, outputSql: currentSql, outcome: "aborted" }
			this.logger.debug("Optimization iteration", { runId: result.runId, iteration })

			try {
				const rows = await runWithDeadline(signal => this.runIteration(ctx, step, signal), timeoutMs, options.signal)
				result.steps.push(step)
				if (rows) {
					result.success = true
					result.finalSql = step.outputSql
					result.finalRows = rows
					break
				}
				currentSql = step.outputSql
				result.finalSql = currentSql
			} catch (error) {
				const message = describeError(error)
				this.logger.error("Optimization iteration failed", { runId: result.runId, iteration, error: message })
				// fresh record: a timed-out task may still be writing to `step`
				result.steps.push({
					iteration,
					inputSql: step.inputSql,
					outputSql: step.inputSql,
					outcome: "aborted",
					execution: step.execution,
					errorAnalysis: systemErrorAnalysis(message),
				})
				result.finalSql = step.inputSql
				result.errorMessage = message
				break
			}
		}

		this.logger.info("Optimization complete", {
			runId: result.runId,
			connectionId,
			success: result.success,
			iterations: result.steps.length,
		})
		return result
	}

	/**
	 * One pass over `step.inputSql`. Fills in the step and returns the rows
	 * when the result is accepted, null when another pass is needed.
	 */
	private async runIteration(ctx: IterationContext, step: OptimizationStep, signal: AbortSignal): Promise<Row[] | null> {
		const started = Date.now()
		const execution = await this.executor.executeQuery(ctx.connectionId, step.inputSql, { signal })
		step.execution = {
			success: execution.error === null,
			errorMessage: execution.error,
			rowCount: execution.rows.length,
			durationMs: Date.now() - started,
		}

		if (execution.error !== null) {
			const analysis = classifyError(execution.error)
			step.errorAnalysis = analysis
			step.outcome = "error_repair"
			step.outputSql = await this.requestRevision(ctx, step.inputSql, formatRepairMessage(analysis), signal)
			return null
		}

		const validation = this.validator.validate(execution.rows, ctx.question)
		step.validation = validation
		if (validation.isValid) {
			step.outcome = "accepted"
			return execution.rows
		}

		const feedback = buildResultFeedback(validation, ctx.question)
		step.feedback = feedback
		step.outcome = "result_refinement"
		step.outputSql = await this.requestRevision(ctx, step.inputSql, `Result validation issues: ${feedback}`, signal)
		return null
	}

	private async requestRevision(
		ctx: IterationContext,
		currentSql: string,
		errorMessage: string,
		signal: AbortSignal,
	): Promise<string> {
		const completion = await this.completer.complete(
			PROMPT_TEMPLATES.optimizeSql,
			{ schemaInfo: ctx.schemaInfo, userMessage: ctx.question, originalSql: currentSql, errorMessage },
			{ signal, temperature: this.defaults.temperature },
		)
		const cleaned = cleanSqlCompletion(completion)
		if (cleaned === "") {
			this.logger.warn("Empty SQL revision, keeping current query", { connectionId: ctx.connectionId })
			return currentSql
		}
		return cleaned
	}
}
