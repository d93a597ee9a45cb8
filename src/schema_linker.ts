/**
 * Schema Linker
 *
 * Picks the tables a question needs before SQL is drafted:
 * 1. Dynamic-threshold vector search over table embeddings, lowering the
 *    relevance threshold one step at a time until enough tables resolve
 * 2. FK-graph expansion (outbound, inbound, junction) of the resolved set
 * 3. Full-schema fallback when nothing resolves, so the generator always
 *    sees some schema
 *
 * Disabled columns never leave this module.
 */

import { describeError, type Logger } from "./config.js"
import type { CallOptions, VectorStore } from "./collaborators.js"
import type { SchemaCatalog } from "./schema_catalog.js"
import { buildSchemaGraph, type SchemaGraph } from "./schema_graph.js"
import {
	findTable,
	sameTableName,
	schemaEmbeddingSchema,
	withEnabledColumnsOnly,
	type RelatedTable,
	type SchemaLinkingResult,
	type TableInfo,
	type TableMatchDetail,
} from "./schema_types.js"

// ============================================================================
// Options
// ============================================================================

export interface SchemaLinkerOptions {
	relevanceThreshold: number
	thresholdFloor: number
	thresholdStep: number
	minTablesRequired: number
	maxTables: number
	maxRelatedTables: number
}

export const DEFAULT_LINKER_OPTIONS: SchemaLinkerOptions = {
	relevanceThreshold: 0.7,
	thresholdFloor: 0.4,
	thresholdStep: 0.1,
	minTablesRequired: 1,
	maxTables: 5,
	maxRelatedTables: 10,
}

export interface RelevantSchemaRequest extends CallOptions {
	relevanceThreshold?: number
	maxTables?: number
}

interface ResolvedHit {
	table: TableInfo
	relevance: number
}

/** Thresholds are kept to 6 decimals so 0.7 - 0.1 steps stay exact. */
function roundThreshold(value: number): number {
	return Math.round(value * 1e6) / 1e6
}

// ============================================================================
// Relationship Expansion
// ============================================================================

/**
 * Tables related to `sources` through foreign keys, at most `maxRelated`.
 *
 * Pass 1 adds tables the sources reference, pass 2 tables that reference a
 * source, pass 3 tables referencing two or more distinct tables of the set
 * expanded so far. Within a pass, ties follow source then schema order.
 */
export function inferRelatedTables(sources: TableInfo[], allTables: TableInfo[], maxRelated: number): RelatedTable[] {
	const included = new Set(sources.map(t => t.tableName.toLowerCase()))
	const related: RelatedTable[] = []
	const full = () => related.length >= maxRelated

	const add = (table: TableInfo, reason: RelatedTable["reason"], via: string) => {
		included.add(table.tableName.toLowerCase())
		related.push({ table, reason, via })
	}

	// Pass 1: outbound
	outbound: for (const source of sources) {
		for (const fk of source.foreignKeys) {
			if (full()) break outbound
			const referenced = findTable(allTables, fk.referencedTableName)
			if (referenced && !included.has(referenced.tableName.toLowerCase())) {
				add(referenced, "outbound_fk", source.tableName)
			}
		}
	}

	// Pass 2: inbound
	for (const table of allTables) {
		if (full()) break
		if (included.has(table.tableName.toLowerCase())) continue
		const source = sources.find(s => table.foreignKeys.some(fk => sameTableName(fk.referencedTableName, s.tableName)))
		if (source) add(table, "inbound_fk", source.tableName)
	}

	// Pass 3: junction
	const expanded = new Set(included)
	for (const table of allTables) {
		if (full()) break
		if (expanded.has(table.tableName.toLowerCase())) continue
		const targets = new Set(
			table.foreignKeys
				.map(fk => fk.referencedTableName.toLowerCase())
				.filter(name => expanded.has(name)),
		)
		if (targets.size >= 2) add(table, "junction", [...targets].join(", "))
	}

	return related
}

// ============================================================================
// Linker
// ============================================================================

export class SchemaLinker {
	private options: SchemaLinkerOptions

	constructor(
		private catalog: SchemaCatalog,
		private vectors: VectorStore,
		private logger: Logger,
		options: Partial<SchemaLinkerOptions> = {},
	) {
		this.options = { ...DEFAULT_LINKER_OPTIONS, ...options }
	}

	/**
	 * Relevant tables for a question. Throws a schema error when the
	 * connection has no trained schema; otherwise always returns tables.
	 */
	async getRelevantSchema(
		connectionId: string,
		question: string,
		request: RelevantSchemaRequest = {},
	): Promise<SchemaLinkingResult> {
		const allTables = await this.catalog.requireTables(connectionId)
		const maxTables = request.maxTables ?? this.options.maxTables
		const floor = this.options.thresholdFloor
		let threshold = roundThreshold(Math.max(request.relevanceThreshold ?? this.options.relevanceThreshold, floor))

		const thresholdsTried: number[] = []
		let hits: ResolvedHit[] = []

		try {
			for (;;) {
				thresholdsTried.push(threshold)
				hits = await this.searchTables(connectionId, question, allTables, maxTables, threshold, request.signal)
				this.logger.debug("Threshold search", { connectionId, threshold, resolved: hits.length })
				if (hits.length >= this.options.minTablesRequired) break

				const next = roundThreshold(threshold - this.options.thresholdStep)
				if (next < floor) break
				threshold = next
			}
		} catch (error) {
			if (request.signal?.aborted) throw error
			this.logger.error("Schema vector search failed, using full schema", {
				connectionId,
				error: describeError(error),
			})
			return this.fallback(allTables, thresholdsTried)
		}

		if (hits.length === 0) {
			this.logger.warn("No relevant tables found, using full schema", { connectionId, thresholdsTried })
			return this.fallback(allTables, thresholdsTried)
		}

		const sources = hits.map(h => h.table)
		const related = inferRelatedTables(sources, allTables, this.options.maxRelatedTables)
		const tables = [...sources, ...related.map(r => r.table)].map(withEnabledColumnsOnly)

		const matchDetails: TableMatchDetail[] = [
			...hits.map(h => ({
				tableName: h.table.tableName,
				source: "semantic" as const,
				relevance: h.relevance,
				threshold,
			})),
			...related.map(r => ({
				tableName: r.table.tableName,
				source: "expansion" as const,
				reason: r.reason,
				via: r.via,
			})),
		]

		this.logger.info("Schema linking complete", {
			connectionId,
			threshold,
			semantic: sources.length,
			expanded: related.length,
		})

		return {
			tables,
			matchDetails,
			usedFallback: false,
			thresholdsTried,
			schemaJson: JSON.stringify(tables, null, 2),
		}
	}

	async buildSchemaGraph(connectionId: string): Promise<SchemaGraph> {
		return buildSchemaGraph(await this.catalog.requireTables(connectionId))
	}

	private async searchTables(
		connectionId: string,
		question: string,
		allTables: TableInfo[],
		limit: number,
		threshold: number,
		signal?: AbortSignal,
	): Promise<ResolvedHit[]> {
		const resolved: ResolvedHit[] = []
		for await (const hit of this.vectors.search(connectionId, question, limit, threshold, { signal })) {
			const table = this.resolveHit(connectionId, hit.text, allTables)
			if (!table) continue
			if (resolved.some(r => sameTableName(r.table.tableName, table.tableName))) continue
			resolved.push({ table, relevance: hit.relevance })
		}
		return resolved
	}

	private resolveHit(connectionId: string, text: string, allTables: TableInfo[]): TableInfo | undefined {
		let raw: unknown
		try {
			raw = JSON.parse(text)
		} catch (error) {
			this.logger.warn("Skipping unparseable schema embedding", { connectionId, error: describeError(error) })
			return undefined
		}
		const parsed = schemaEmbeddingSchema.safeParse(raw)
		if (!parsed.success) {
			this.logger.warn("Skipping malformed schema embedding", { connectionId, issue: parsed.error.issues[0].message })
			return undefined
		}
		if (parsed.data.embeddingType !== "table") return undefined
		return findTable(allTables, parsed.data.tableName)
	}

	private fallback(allTables: TableInfo[], thresholdsTried: number[]): SchemaLinkingResult {
		const tables = allTables.map(withEnabledColumnsOnly)
		return {
			tables,
			matchDetails: tables.map(t => ({ tableName: t.tableName, source: "fallback" as const })),
			usedFallback: true,
			thresholdsTried,
			schemaJson: JSON.stringify(tables, null, 2),
		}
	}
}
