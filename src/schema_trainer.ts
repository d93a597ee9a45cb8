/**
 * Schema Trainer
 *
 * Builds one table-level embedding per trained table and keeps the vector
 * collection (named by the connection id) in step with the stored table list.
 * Only enabled columns reach the retrieval text.
 */

import { describeError, type Logger } from "./config.js"
import type { VectorStore } from "./collaborators.js"
import type { SchemaCatalog } from "./schema_catalog.js"
import {
	embeddingId,
	enabledColumns,
	sameTableName,
	type SchemaEmbedding,
	type TableInfo,
} from "./schema_types.js"

export interface TrainingResult {
	trained: string[]
	/** Tables stored without an embedding because every column is disabled. */
	skipped: string[]
}

/**
 * Retrieval text for a table: name, description, enabled columns, FKs.
 */
export function describeTable(table: TableInfo): string {
	const lines = [`Table: ${table.tableName}`, `Description: ${table.description || "No description"}`, "Columns:"]
	for (const column of enabledColumns(table)) {
		const flags = [column.dataType || "unknown", column.isPrimaryKey ? "primary key" : null, column.isNullable ? "nullable" : "not null"]
			.filter((f): f is string => f !== null)
			.join(", ")
		lines.push(`  - ${column.columnName} (${flags})${column.description ? `: ${column.description}` : ""}`)
	}
	if (table.foreignKeys.length > 0) {
		lines.push("Foreign keys:")
		for (const fk of table.foreignKeys) lines.push(`  - ${fk.relationship}`)
	}
	return lines.join("\n")
}

/** Fill empty FK relationship sentences. */
export function normalizeTable(table: TableInfo): TableInfo {
	return {
		...table,
		foreignKeys: table.foreignKeys.map(fk => ({
			...fk,
			relationship:
				fk.relationship.trim() ||
				`${table.tableName}.${fk.columnName} references ${fk.referencedTableName}.${fk.referencedColumnName}`,
		})),
	}
}

export function buildTableEmbedding(connectionId: string, table: TableInfo): SchemaEmbedding {
	return {
		connectionId,
		tableName: table.tableName,
		columnName: null,
		description: describeTable(table),
		embeddingType: "table",
	}
}

export class SchemaTrainer {
	constructor(
		private catalog: SchemaCatalog,
		private vectors: VectorStore,
		private logger: Logger,
	) {}

	/**
	 * Full retrain: stores the whole list, then clears the collection and
	 * embeds every table that has at least one enabled column. A failed embed
	 * leaves the new list stored with the embeddings written so far.
	 */
	async trainSchema(connectionId: string, tables: TableInfo[]): Promise<TrainingResult> {
		const normalized = tables.map(normalizeTable)
		const result: TrainingResult = { trained: [], skipped: [] }

		await this.catalog.saveTables(connectionId, normalized)
		await this.vectors.clear(connectionId)

		try {
			for (const table of normalized) {
				if (await this.saveEmbedding(connectionId, table)) {
					result.trained.push(table.tableName)
				} else {
					result.skipped.push(table.tableName)
				}
			}
		} catch (error) {
			this.logger.error("Schema embedding failed; tables stored with partial embeddings", {
				connectionId,
				embedded: result.trained.length,
				error: describeError(error),
			})
			throw error
		}

		this.logger.info("Schema trained", { connectionId, trained: result.trained.length, skipped: result.skipped.length })
		return result
	}

	/**
	 * Replace one table's embedding and its entry in the stored list.
	 * Returns false when the table was stored without an embedding.
	 */
	async retrainTable(connectionId: string, table: TableInfo): Promise<boolean> {
		const normalized = normalizeTable(table)
		await this.vectors.remove(connectionId, embeddingId(connectionId, normalized.tableName))
		const embedded = await this.saveEmbedding(connectionId, normalized)

		const existing = (await this.catalog.getTables(connectionId)) ?? []
		const index = existing.findIndex(t => sameTableName(t.tableName, normalized.tableName))
		const updated = index >= 0
			? existing.map((t, i) => (i === index ? normalized : t))
			: [...existing, normalized]
		await this.catalog.saveTables(connectionId, updated)

		this.logger.info("Table retrained", { connectionId, table: normalized.tableName, embedded })
		return embedded
	}

	/** Drop a table from training. Returns false when it was not stored. */
	async removeTable(connectionId: string, tableName: string): Promise<boolean> {
		await this.vectors.remove(connectionId, embeddingId(connectionId, tableName))

		const existing = (await this.catalog.getTables(connectionId)) ?? []
		const remaining = existing.filter(t => !sameTableName(t.tableName, tableName))
		if (remaining.length === existing.length) return false

		await this.catalog.saveTables(connectionId, remaining)
		this.logger.info("Table removed from training", { connectionId, table: tableName })
		return true
	}

	private async saveEmbedding(connectionId: string, table: TableInfo): Promise<boolean> {
		if (enabledColumns(table).length === 0) return false
		const record = buildTableEmbedding(connectionId, table)
		await this.vectors.save(connectionId, embeddingId(connectionId, table.tableName), JSON.stringify(record))
		return true
	}
}
