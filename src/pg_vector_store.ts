/**
 * pgvector-backed vector store
 *
 * Items live in text2sql.vector_items (see sql/text2sql_store.sql), grouped
 * by collection. Embeddings come from the sidecar; relevance is cosine
 * similarity, `1 - (embedding <=> query)`.
 */

import type { Pool } from "pg"
import type { Logger } from "./config.js"
import type { CallOptions, Embedder, VectorSearchHit, VectorStore } from "./collaborators.js"

function toVectorLiteral(embedding: number[]): string {
	return `[${embedding.join(",")}]`
}

export class PgVectorStore implements VectorStore {
	constructor(
		private pool: Pool,
		private embedder: Embedder,
		private logger: Logger,
	) {}

	async save(collection: string, id: string, text: string, options: CallOptions = {}): Promise<void> {
		const embedding = await this.embedder.embedText(text, options)
		await this.pool.query(
			`
			INSERT INTO text2sql.vector_items (collection, item_id, content, embedding, updated_at)
			VALUES ($1, $2, $3, $4::vector, now())
			ON CONFLICT (collection, item_id)
			DO UPDATE SET content = EXCLUDED.content, embedding = EXCLUDED.embedding, updated_at = now()
		`,
			[collection, id, text, toVectorLiteral(embedding)],
		)
		this.logger.debug("Vector item saved", { collection, id, dimensions: embedding.length })
	}

	async *search(
		collection: string,
		query: string,
		limit: number,
		minRelevance: number,
		options: CallOptions = {},
	): AsyncIterable<VectorSearchHit> {
		const embedding = await this.embedder.embedText(query, options)
		const vectorLiteral = toVectorLiteral(embedding)

		const result = await this.pool.query<{ content: string; relevance: number }>(
			`
			SELECT
				content,
				1 - (embedding <=> $1::vector) AS relevance
			FROM text2sql.vector_items
			WHERE collection = $2
				AND 1 - (embedding <=> $1::vector) >= $3
			ORDER BY embedding <=> $1::vector
			LIMIT $4
		`,
			[vectorLiteral, collection, minRelevance, limit],
		)

		for (const row of result.rows) {
			yield { text: row.content, relevance: Number(row.relevance) }
		}
	}

	async remove(collection: string, id: string): Promise<void> {
		await this.pool.query("DELETE FROM text2sql.vector_items WHERE collection = $1 AND item_id = $2", [collection, id])
	}

	async clear(collection: string): Promise<void> {
		const result = await this.pool.query("DELETE FROM text2sql.vector_items WHERE collection = $1", [collection])
		this.logger.debug("Vector collection cleared", { collection, removed: result.rowCount })
	}
}
