/**
 * Collaborator interfaces
 *
 * The engine talks to the database, the completion model, the vector index
 * and the stores only through these. Concrete implementations live in
 * pg_sql_executor.ts, sidecar_client.ts, pg_vector_store.ts and
 * pg_repositories.ts; tests use the fakes in test_helpers.ts.
 */

import type { PromptTemplateName } from "./config.js"

export type Row = Record<string, unknown>

export interface ExecutionResult {
	rows: Row[]
	/** Database error message, or null when the statement ran. */
	error: string | null
}

export interface CallOptions {
	signal?: AbortSignal
}

export interface SqlExecutor {
	executeQuery(connectionId: string, sql: string, options?: CallOptions): Promise<ExecutionResult>
}

export interface CompletionOptions extends CallOptions {
	temperature?: number
}

export type TemplateArgs = Record<string, string>

export interface TextCompleter {
	complete(template: PromptTemplateName, args: TemplateArgs, options?: CompletionOptions): Promise<string>
}

export interface VectorSearchHit {
	text: string
	relevance: number
}

export interface VectorStore {
	save(collection: string, id: string, text: string, options?: CallOptions): Promise<void>
	search(
		collection: string,
		query: string,
		limit: number,
		minRelevance: number,
		options?: CallOptions,
	): AsyncIterable<VectorSearchHit>
	remove(collection: string, id: string): Promise<void>
	clear(collection: string): Promise<void>
}

export interface SchemaStore {
	getByConnectionId(connectionId: string): Promise<string | null>
	upsert(connectionId: string, serialized: string): Promise<void>
}

export type ChatRole = "user" | "assistant"

export interface ChatMessage {
	id: string
	connectionId: string
	role: ChatRole
	message: string
	sqlQuery: string | null
	createdAt: Date
}

export interface ChatHistoryStore {
	/** Most recent messages, returned oldest first. */
	getRecentByConnectionId(connectionId: string, limit: number): Promise<ChatMessage[]>
	append(message: Omit<ChatMessage, "id" | "createdAt">): Promise<ChatMessage>
}

export interface Embedder {
	embedText(text: string, options?: CallOptions): Promise<number[]>
}
