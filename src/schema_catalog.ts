/**
 * Schema Catalog
 *
 * Typed view over the schema store. Parsed table lists are cached per
 * connection and refreshed on every write through the catalog.
 */

import { Text2SqlError, type Logger } from "./config.js"
import type { SchemaStore } from "./collaborators.js"
import { parseTableList, serializeTableList, type TableInfo } from "./schema_types.js"

export interface SchemaCatalogOptions {
	cacheEnabled?: boolean
	logger?: Logger
}

export class SchemaCatalog {
	private cache = new Map<string, TableInfo[]>()
	private cacheEnabled: boolean
	private logger?: Logger

	constructor(private store: SchemaStore, options: SchemaCatalogOptions = {}) {
		this.cacheEnabled = options.cacheEnabled ?? true
		this.logger = options.logger
	}

	/** Stored tables for the connection, or null when none were trained. */
	async getTables(connectionId: string): Promise<TableInfo[] | null> {
		const cached = this.cache.get(connectionId)
		if (cached) return cached

		const serialized = await this.store.getByConnectionId(connectionId)
		if (serialized === null || serialized.trim() === "") return null

		const tables = parseTableList(serialized)
		if (this.cacheEnabled) this.cache.set(connectionId, tables)
		this.logger?.debug("Loaded schema", { connectionId, tables: tables.length })
		return tables
	}

	async requireTables(connectionId: string): Promise<TableInfo[]> {
		const tables = await this.getTables(connectionId)
		if (!tables) {
			throw new Text2SqlError("schema", `No schema has been trained for connection ${connectionId}`, false, {
				connectionId,
			})
		}
		return tables
	}

	async saveTables(connectionId: string, tables: TableInfo[]): Promise<void> {
		await this.store.upsert(connectionId, serializeTableList(tables))
		if (this.cacheEnabled) {
			this.cache.set(connectionId, tables)
		} else {
			this.cache.delete(connectionId)
		}
	}

	invalidate(connectionId: string): void {
		this.cache.delete(connectionId)
	}
}
