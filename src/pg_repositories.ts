/**
 * Postgres stores for trained schemas and chat history.
 * Tables: text2sql.database_schemas, text2sql.chat_messages.
 */

import type { Pool } from "pg"
import { v4 as uuidv4 } from "uuid"
import type { ChatHistoryStore, ChatMessage, ChatRole, SchemaStore } from "./collaborators.js"

export class PgSchemaStore implements SchemaStore {
	constructor(private pool: Pool) {}

	async getByConnectionId(connectionId: string): Promise<string | null> {
		const result = await this.pool.query<{ schema_content: string }>(
			"SELECT schema_content FROM text2sql.database_schemas WHERE connection_id = $1",
			[connectionId],
		)
		return result.rows.length > 0 ? result.rows[0].schema_content : null
	}

	async upsert(connectionId: string, serialized: string): Promise<void> {
		await this.pool.query(
			`
			INSERT INTO text2sql.database_schemas (connection_id, schema_content)
			VALUES ($1, $2)
			ON CONFLICT (connection_id)
			DO UPDATE SET schema_content = EXCLUDED.schema_content, updated_at = now()
		`,
			[connectionId, serialized],
		)
	}
}

interface ChatMessageRow {
	id: string
	connection_id: string
	role: ChatRole
	message: string
	sql_query: string | null
	created_at: Date
}

function toChatMessage(row: ChatMessageRow): ChatMessage {
	return {
		id: row.id,
		connectionId: row.connection_id,
		role: row.role,
		message: row.message,
		sqlQuery: row.sql_query,
		createdAt: row.created_at,
	}
}

export class PgChatHistoryStore implements ChatHistoryStore {
	constructor(private pool: Pool) {}

	async getRecentByConnectionId(connectionId: string, limit: number): Promise<ChatMessage[]> {
		const result = await this.pool.query<ChatMessageRow>(
			`
			SELECT id, connection_id, role, message, sql_query, created_at
			FROM text2sql.chat_messages
			WHERE connection_id = $1
			ORDER BY created_at DESC
			LIMIT $2
		`,
			[connectionId, limit],
		)
		return result.rows.map(toChatMessage).reverse()
	}

	async append(message: Omit<ChatMessage, "id" | "createdAt">): Promise<ChatMessage> {
		const result = await this.pool.query<ChatMessageRow>(
			`
			INSERT INTO text2sql.chat_messages (id, connection_id, role, message, sql_query)
			VALUES ($1, $2, $3, $4, $5)
			RETURNING id, connection_id, role, message, sql_query, created_at
		`,
			[uuidv4(), message.connectionId, message.role, message.message, message.sqlQuery],
		)
		return toChatMessage(result.rows[0])
	}
}
