/**
 * Text-to-SQL Pipeline
 *
 * End-to-end flow for one question:
 * 1. Classify against the conversation and rewrite into a standalone question
 * 2. Link the relevant schema
 * 3. Draft SQL with the `generate_sql_query` template
 * 4. Execute / validate / repair
 * 5. Record the turn (and persist it when a chat history store is present)
 */

import { v4 as uuidv4 } from "uuid"
import { PROMPT_TEMPLATES, Text2SqlError, describeError, type Logger } from "./config.js"
import type { ChatHistoryStore, Row, TextCompleter } from "./collaborators.js"
import { summarizeResult, type ConversationContextManager } from "./conversation_context.js"
import type { FollowupQueryType } from "./conversation_strategies.js"
import { cleanSqlCompletion, type FeedbackOptimizer, type OptimizationResult } from "./feedback_optimizer.js"
import type { SchemaLinker } from "./schema_linker.js"
import type { SchemaLinkingResult } from "./schema_types.js"

export interface AskOptions {
	signal?: AbortSignal
	maxIterations?: number
}

export interface AskResult {
	queryId: string
	question: string
	rewrittenQuestion: string
	queryType: FollowupQueryType
	sql: string
	success: boolean
	rows: Row[]
	schema: SchemaLinkingResult
	optimization: OptimizationResult
}

export interface Text2SqlPipelineDeps {
	linker: SchemaLinker
	optimizer: FeedbackOptimizer
	conversation: ConversationContextManager
	completer: TextCompleter
	logger: Logger
	history?: ChatHistoryStore
	temperature?: number
	maxIterations?: number
}

export class Text2SqlPipeline {
	constructor(private deps: Text2SqlPipelineDeps) {}

	async ask(connectionId: string, question: string, options: AskOptions = {}): Promise<AskResult> {
		const { linker, optimizer, conversation, logger } = this.deps
		const queryId = uuidv4()
		const startTime = Date.now()

		logger.info("Processing question", { queryId, connectionId, question })

		// Step 1: rewrite against the conversation
		await conversation.getContext(connectionId)
		const queryType = await conversation.analyzeFollowupQuery(connectionId, question)
		const rewrittenQuestion = queryType === "new_query"
			? await conversation.resolveCoreferences(connectionId, question)
			: await conversation.processIncrementalQuery(connectionId, question, queryType)

		// Step 2: schema
		const schema = await linker.getRelevantSchema(connectionId, rewrittenQuestion, { signal: options.signal })

		// Step 3: draft
		const draft = await this.draftSql(rewrittenQuestion, schema.schemaJson, options.signal)

		// Step 4: execute / validate / repair
		const optimization = await optimizer.optimizeWithFeedback(
			connectionId,
			rewrittenQuestion,
			schema.schemaJson,
			draft,
			options.maxIterations ?? this.deps.maxIterations,
			{ signal: options.signal },
		)
		const rows = optimization.finalRows ?? []

		// Step 5: record
		const assistantMessage = optimization.success
			? `Query returned ${summarizeResult(rows)}`
			: `Query could not be validated: ${optimization.errorMessage ?? "iteration limit reached"}`
		await conversation.updateContext(connectionId, question, assistantMessage, optimization.finalSql, rows)
		await this.persistTurn(connectionId, question, assistantMessage, optimization.finalSql)

		logger.info("Question processed", {
			queryId,
			queryType,
			success: optimization.success,
			iterations: optimization.steps.length,
			usedFallback: schema.usedFallback,
			latencyMs: Date.now() - startTime,
		})

		return {
			queryId,
			question,
			rewrittenQuestion,
			queryType,
			sql: optimization.finalSql,
			success: optimization.success,
			rows,
			schema,
			optimization,
		}
	}

	private async draftSql(question: string, schemaInfo: string, signal?: AbortSignal): Promise<string> {
		let completion: string
		try {
			completion = await this.deps.completer.complete(
				PROMPT_TEMPLATES.generateSql,
				{ schemaInfo, userMessage: question },
				{ signal, temperature: this.deps.temperature },
			)
		} catch (error) {
			if (error instanceof Text2SqlError) throw error
			throw new Text2SqlError("completion", `SQL generation failed: ${describeError(error)}`, true)
		}

		const sql = cleanSqlCompletion(completion)
		if (sql === "") {
			throw new Text2SqlError("completion", "SQL generation returned an empty query", true)
		}
		return sql
	}

	private async persistTurn(connectionId: string, question: string, answer: string, sql: string): Promise<void> {
		const history = this.deps.history
		if (!history) return
		try {
			await history.append({ connectionId, role: "user", message: question, sqlQuery: null })
			await history.append({ connectionId, role: "assistant", message: answer, sqlQuery: sql })
		} catch (error) {
			this.deps.logger.warn("Failed to persist chat history", { connectionId, error: describeError(error) })
		}
	}
}
