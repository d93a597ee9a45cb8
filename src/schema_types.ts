/**
 * Schema Types for Table Retrieval
 *
 * Defines types for:
 * - Serialized table list (TableInfo / ColumnInfo / ForeignKeyInfo)
 * - Table embeddings stored in the vector index
 * - Schema linking results and match details
 */

import { z } from "zod"
import { Text2SqlError } from "./config.js"

// ============================================================================
// Table List
// ============================================================================

export const columnInfoSchema = z.object({
	columnName: z.string().min(1),
	dataType: z.string().default(""),
	isNullable: z.boolean().default(true),
	isPrimaryKey: z.boolean().default(false),
	description: z.string().default(""),
	isEnabled: z.boolean().default(true),
})

export const foreignKeyInfoSchema = z.object({
	foreignKeyName: z.string().default(""),
	columnName: z.string().min(1),
	referencedTableName: z.string().min(1),
	referencedColumnName: z.string().min(1),
	relationship: z.string().default(""),
})

export const tableInfoSchema = z.object({
	tableName: z.string().min(1),
	description: z.string().default(""),
	columns: z.array(columnInfoSchema).default([]),
	foreignKeys: z.array(foreignKeyInfoSchema).default([]),
})

export const tableListSchema = z.array(tableInfoSchema)

export type ColumnInfo = z.infer<typeof columnInfoSchema>
export type ForeignKeyInfo = z.infer<typeof foreignKeyInfoSchema>
export type TableInfo = z.infer<typeof tableInfoSchema>

/**
 * Parse a stored or user-supplied table list.
 * Throws a schema error when the blob is not valid JSON or does not match.
 */
export function parseTableList(serialized: string): TableInfo[] {
	let raw: unknown
	try {
		raw = JSON.parse(serialized)
	} catch (error) {
		throw new Text2SqlError("schema", `Stored schema is not valid JSON: ${error instanceof Error ? error.message : String(error)}`)
	}
	return validateTableList(raw)
}

export function validateTableList(raw: unknown): TableInfo[] {
	const parsed = tableListSchema.safeParse(raw)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		throw new Text2SqlError(
			"schema",
			`Invalid table list at ${issue.path.join(".") || "<root>"}: ${issue.message}`,
			false,
			{ issueCount: parsed.error.issues.length },
		)
	}
	return parsed.data
}

export function serializeTableList(tables: TableInfo[]): string {
	return JSON.stringify(tables)
}

export function sameTableName(a: string, b: string): boolean {
	return a.toLowerCase() === b.toLowerCase()
}

export function findTable(tables: TableInfo[], tableName: string): TableInfo | undefined {
	return tables.find(t => sameTableName(t.tableName, tableName))
}

export function enabledColumns(table: TableInfo): ColumnInfo[] {
	return table.columns.filter(c => c.isEnabled)
}

/** Copy of the table with disabled columns removed. */
export function withEnabledColumnsOnly(table: TableInfo): TableInfo {
	return { ...table, columns: enabledColumns(table) }
}

// ============================================================================
// Embeddings
// ============================================================================

export const schemaEmbeddingSchema = z.object({
	connectionId: z.string(),
	tableName: z.string().min(1),
	columnName: z.string().nullable().default(null),
	description: z.string(),
	embeddingType: z.string(),
})

/**
 * Record stored as the text of a vector item, one per trained table.
 */
export type SchemaEmbedding = z.infer<typeof schemaEmbeddingSchema>

export function embeddingId(connectionId: string, tableName: string): string {
	return `${connectionId}_${tableName.toLowerCase()}`
}

// ============================================================================
// Schema Linking Results
// ============================================================================

export type ExpansionReason = "outbound_fk" | "inbound_fk" | "junction"

/**
 * Why a returned table is in the result
 */
export type TableMatchDetail =
	| { tableName: string; source: "semantic"; relevance: number; threshold: number }
	| { tableName: string; source: "expansion"; reason: ExpansionReason; via: string }
	| { tableName: string; source: "fallback" }

export interface RelatedTable {
	table: TableInfo
	reason: ExpansionReason
	via: string
}

export interface SchemaLinkingResult {
	tables: TableInfo[]
	matchDetails: TableMatchDetail[]
	usedFallback: boolean
	thresholdsTried: number[]
	/** JSON of `tables`, ready to pass to prompt templates. */
	schemaJson: string
}
