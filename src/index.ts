/**
 * text2sql-engine MCP server
 *
 * Tools:
 * - nl_query: answer a question against a trained connection
 * - train_schema: (re)train a connection from a table list
 * - clear_conversation: drop a connection's conversation context
 * - get_all_tables: list a connection's trained tables
 * - get_table_structure: columns and foreign keys of one trained table
 * - get_chat_history: recent persisted messages of a connection
 * - execute_sql: run a read-only statement as written
 *
 * Tool handlers are plain functions over `ToolDeps` so they can be used
 * without a transport.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { z } from "zod"
import { Text2SqlError, describeError, type Logger } from "./config.js"
import type { ChatHistoryStore, SqlExecutor } from "./collaborators.js"
import type { ConversationContextManager } from "./conversation_context.js"
import type { SchemaCatalog } from "./schema_catalog.js"
import type { SchemaTrainer } from "./schema_trainer.js"
import { enabledColumns, findTable, validateTableList } from "./schema_types.js"
import type { Text2SqlPipeline } from "./text2sql_pipeline.js"

export { Text2SqlError } from "./config.js"
export type { Logger } from "./config.js"
export type * from "./collaborators.js"
export { loadConfig, getConfig, resetConfig, type Text2SqlConfig } from "./config/loadConfig.js"
export { createEngine, type Text2SqlEngine } from "./engine.js"
export { SchemaLinker, inferRelatedTables } from "./schema_linker.js"
export { buildSchemaGraph } from "./schema_graph.js"
export { SchemaCatalog } from "./schema_catalog.js"
export { SchemaTrainer } from "./schema_trainer.js"
export { FeedbackOptimizer } from "./feedback_optimizer.js"
export { ResultValidator } from "./result_validator.js"
export { classifyError } from "./error_classifier.js"
export { ConversationContextManager } from "./conversation_context.js"
export { Text2SqlPipeline } from "./text2sql_pipeline.js"
export { loadLexicon } from "./lexicon.js"

export const SERVER_NAME = "text2sql-engine"
export const SERVER_VERSION = "0.1.0"

/** Rows returned to the client per nl_query / execute_sql call */
const MAX_ROWS_IN_RESPONSE = 200

const DEFAULT_HISTORY_LIMIT = 20
const MAX_HISTORY_LIMIT = 100

const READ_ONLY_STATEMENT = /^\s*(select|with)\b/i

export interface ToolDeps {
	pipeline: Text2SqlPipeline
	trainer: SchemaTrainer
	conversation: ConversationContextManager
	catalog: SchemaCatalog
	executor: SqlExecutor
	/** Absent when chat messages are not persisted. */
	history?: ChatHistoryStore
	logger: Logger
}

export interface ToolResult {
	[key: string]: unknown
	content: Array<{ type: "text"; text: string }>
	isError?: boolean
}

function jsonResult(payload: unknown): ToolResult {
	return { content: [{ type: "text", text: JSON.stringify(payload, null, 2) }] }
}

function errorResult(error: unknown, logger: Logger, tool: string): ToolResult {
	const payload = error instanceof Text2SqlError
		? { error: error.message, error_type: error.type, recoverable: error.recoverable }
		: { error: describeError(error), error_type: "internal", recoverable: false }
	logger.error(`${tool} failed`, payload)
	return { content: [{ type: "text", text: JSON.stringify(payload, null, 2) }], isError: true }
}

// ── Tool Schemas ─────────────────────────────────────────────────────

export const nlQueryInput = {
	connection_id: z.string().min(1).describe("Connection id the schema was trained under"),
	question: z.string().min(1).describe("Natural-language question"),
}

export const trainSchemaInput = {
	connection_id: z.string().min(1).describe("Connection id to train"),
	tables: z.array(z.unknown()).describe("Table list: [{ tableName, description, columns, foreignKeys }]"),
}

export const clearConversationInput = {
	connection_id: z.string().min(1).describe("Connection id whose conversation context is dropped"),
}

export const getAllTablesInput = {
	connection_id: z.string().min(1).describe("Connection id the schema was trained under"),
}

export const getTableStructureInput = {
	connection_id: z.string().min(1).describe("Connection id the schema was trained under"),
	table_name: z.string().min(1).describe("Table name (case-insensitive)"),
}

export const getChatHistoryInput = {
	connection_id: z.string().min(1).describe("Connection id whose messages are returned"),
	limit: z.number().int().min(1).max(MAX_HISTORY_LIMIT).default(DEFAULT_HISTORY_LIMIT).describe("Most recent messages to return"),
}

export const executeSqlInput = {
	connection_id: z.string().min(1).describe("Connection id to run the statement on"),
	sql: z.string().min(1).describe("A SELECT (or WITH ... SELECT) statement"),
}

// ── Handlers ─────────────────────────────────────────────────────────

export async function handleNlQuery(
	deps: ToolDeps,
	args: { connection_id: string; question: string },
	signal?: AbortSignal,
): Promise<ToolResult> {
	try {
		const result = await deps.pipeline.ask(args.connection_id, args.question, { signal })
		return jsonResult({
			query_id: result.queryId,
			question: result.question,
			rewritten_question: result.rewrittenQuestion,
			query_type: result.queryType,
			sql: result.sql,
			success: result.success,
			rows_returned: result.rows.length,
			rows: result.rows.slice(0, MAX_ROWS_IN_RESPONSE),
			tables: result.schema.tables.map(t => t.tableName),
			used_fallback: result.schema.usedFallback,
			iterations: result.optimization.steps.length,
			error: result.optimization.errorMessage ?? null,
		})
	} catch (error) {
		return errorResult(error, deps.logger, "nl_query")
	}
}

export async function handleTrainSchema(
	deps: ToolDeps,
	args: { connection_id: string; tables: unknown[] },
): Promise<ToolResult> {
	try {
		const tables = validateTableList(args.tables)
		const result = await deps.trainer.trainSchema(args.connection_id, tables)
		return jsonResult({ connection_id: args.connection_id, trained: result.trained, skipped: result.skipped })
	} catch (error) {
		return errorResult(error, deps.logger, "train_schema")
	}
}

export async function handleClearConversation(deps: ToolDeps, args: { connection_id: string }): Promise<ToolResult> {
	const cleared = await deps.conversation.clearContext(args.connection_id)
	return jsonResult({ connection_id: args.connection_id, cleared })
}

export async function handleGetAllTables(deps: ToolDeps, args: { connection_id: string }): Promise<ToolResult> {
	try {
		const tables = await deps.catalog.requireTables(args.connection_id)
		return jsonResult({
			connection_id: args.connection_id,
			tables: tables.map(t => ({
				table_name: t.tableName,
				description: t.description,
				column_count: enabledColumns(t).length,
				foreign_key_count: t.foreignKeys.length,
			})),
		})
	} catch (error) {
		return errorResult(error, deps.logger, "get_all_tables")
	}
}

export async function handleGetTableStructure(
	deps: ToolDeps,
	args: { connection_id: string; table_name: string },
): Promise<ToolResult> {
	try {
		const table = findTable(await deps.catalog.requireTables(args.connection_id), args.table_name)
		if (!table) {
			throw new Text2SqlError("schema", `Table ${args.table_name} is not trained for connection ${args.connection_id}`, false, {
				connectionId: args.connection_id,
				tableName: args.table_name,
			})
		}
		return jsonResult({
			connection_id: args.connection_id,
			table_name: table.tableName,
			description: table.description,
			columns: table.columns.map(c => ({
				column_name: c.columnName,
				data_type: c.dataType,
				is_primary_key: c.isPrimaryKey,
				is_nullable: c.isNullable,
				is_enabled: c.isEnabled,
				description: c.description,
			})),
			foreign_keys: table.foreignKeys.map(fk => ({
				column_name: fk.columnName,
				referenced_table: fk.referencedTableName,
				referenced_column: fk.referencedColumnName,
				relationship: fk.relationship,
			})),
		})
	} catch (error) {
		return errorResult(error, deps.logger, "get_table_structure")
	}
}

export async function handleGetChatHistory(
	deps: ToolDeps,
	args: { connection_id: string; limit?: number },
): Promise<ToolResult> {
	try {
		const messages = deps.history
			? await deps.history.getRecentByConnectionId(args.connection_id, args.limit ?? DEFAULT_HISTORY_LIMIT)
			: []
		return jsonResult({
			connection_id: args.connection_id,
			messages: messages.map(m => ({
				id: m.id,
				role: m.role,
				message: m.message,
				sql_query: m.sqlQuery,
				created_at: m.createdAt.toISOString(),
			})),
		})
	} catch (error) {
		return errorResult(error, deps.logger, "get_chat_history")
	}
}

export async function handleExecuteSql(
	deps: ToolDeps,
	args: { connection_id: string; sql: string },
	signal?: AbortSignal,
): Promise<ToolResult> {
	try {
		if (!READ_ONLY_STATEMENT.test(args.sql)) {
			throw new Text2SqlError("validation", "Only SELECT statements can be executed", false, { connectionId: args.connection_id })
		}
		const result = await deps.executor.executeQuery(args.connection_id, args.sql, { signal })
		return jsonResult({
			connection_id: args.connection_id,
			success: result.error === null,
			rows_returned: result.rows.length,
			rows: result.rows.slice(0, MAX_ROWS_IN_RESPONSE),
			error: result.error,
		})
	} catch (error) {
		return errorResult(error, deps.logger, "execute_sql")
	}
}

// ── Server ───────────────────────────────────────────────────────────

export default function createServer(deps: ToolDeps): McpServer {
	const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })

	server.registerTool(
		"nl_query",
		{
			title: "Natural-language query",
			description: "Turn a question into validated SQL for a trained connection, run it and return the rows. Follow-up questions are resolved against the connection's conversation.",
			inputSchema: nlQueryInput,
		},
		(args, extra) => handleNlQuery(deps, args, extra.signal),
	)

	server.registerTool(
		"train_schema",
		{
			title: "Train schema",
			description: "Store a connection's table list and rebuild its table embeddings.",
			inputSchema: trainSchemaInput,
		},
		args => handleTrainSchema(deps, args),
	)

	server.registerTool(
		"clear_conversation",
		{
			title: "Clear conversation",
			description: "Forget the conversation context of a connection.",
			inputSchema: clearConversationInput,
		},
		args => handleClearConversation(deps, args),
	)

	server.registerTool(
		"get_all_tables",
		{
			title: "List tables",
			description: "List the trained tables of a connection with their descriptions and column counts.",
			inputSchema: getAllTablesInput,
		},
		args => handleGetAllTables(deps, args),
	)

	server.registerTool(
		"get_table_structure",
		{
			title: "Table structure",
			description: "Columns and foreign keys of one trained table.",
			inputSchema: getTableStructureInput,
		},
		args => handleGetTableStructure(deps, args),
	)

	server.registerTool(
		"get_chat_history",
		{
			title: "Chat history",
			description: "Recent persisted questions and answers of a connection, oldest first.",
			inputSchema: getChatHistoryInput,
		},
		args => handleGetChatHistory(deps, args),
	)

	server.registerTool(
		"execute_sql",
		{
			title: "Execute SQL",
			description: "Run a SELECT statement on a connection and return its rows, or the database error.",
			inputSchema: executeSqlInput,
		},
		(args, extra) => handleExecuteSql(deps, args, extra.signal),
	)

	return server
}
