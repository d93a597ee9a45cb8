/**
 * Schema Graph Builder
 *
 * Turns a flat table list into a typed graph: table and column nodes,
 * `contains` edges from tables to their columns and `foreign_key` edges
 * between columns. Tags (table type, column semantic type) are name-based
 * heuristics meant for diagnostics, not for retrieval.
 */

import type { ColumnInfo, TableInfo } from "./schema_types.js"

// ============================================================================
// Types
// ============================================================================

export type TableType = "log_table" | "config_table" | "junction_table" | "fact_table" | "dimension_table"

export type ColumnSemanticType =
	| "primary_key"
	| "foreign_key_candidate"
	| "name_field"
	| "temporal_field"
	| "monetary_field"
	| "numeric_field"
	| "general_field"

export interface TableNodeFeatures {
	name: string
	description: string
	columnCount: number
	foreignKeyCount: number
	hasPrimaryKey: boolean
	tableType: TableType
}

export interface ColumnNodeFeatures {
	name: string
	dataType: string
	isPrimaryKey: boolean
	isNullable: boolean
	isEnabled: boolean
	description: string
	semanticType: ColumnSemanticType
}

export type SchemaGraphNode =
	| { id: string; kind: "table"; features: TableNodeFeatures }
	| { id: string; kind: "column"; table: string; features: ColumnNodeFeatures }

export type SchemaGraphEdge =
	| { kind: "contains"; from: string; to: string }
	| { kind: "foreign_key"; from: string; to: string; constraintName: string }

export interface SchemaGraph {
	nodes: Map<string, SchemaGraphNode>
	edges: SchemaGraphEdge[]
}

// ============================================================================
// Heuristics
// ============================================================================

export function inferTableType(table: TableInfo): TableType {
	const name = table.tableName.toLowerCase()
	if (name.includes("log") || name.includes("audit")) return "log_table"
	if (name.includes("config") || name.includes("setting")) return "config_table"
	if (table.foreignKeys.length >= 2 && table.columns.length <= 5) return "junction_table"
	if (table.columns.length > 20) return "fact_table"
	return "dimension_table"
}

export function inferSemanticType(column: ColumnInfo): ColumnSemanticType {
	const name = column.columnName.toLowerCase()
	const dataType = column.dataType.toLowerCase()

	if (name.includes("id")) return column.isPrimaryKey ? "primary_key" : "foreign_key_candidate"
	if (name.includes("name") || name.includes("title")) return "name_field"
	if (name.includes("date") || name.includes("time") || dataType.includes("date")) return "temporal_field"
	if (name.includes("amount") || name.includes("price") || name.includes("cost")) return "monetary_field"
	if (name.includes("count") || name.includes("number") || name.includes("qty")) return "numeric_field"
	return "general_field"
}

// ============================================================================
// Builder
// ============================================================================

export function buildSchemaGraph(tables: TableInfo[]): SchemaGraph {
	const nodes = new Map<string, SchemaGraphNode>()
	const edges: SchemaGraphEdge[] = []

	for (const table of tables) {
		nodes.set(table.tableName, {
			id: table.tableName,
			kind: "table",
			features: {
				name: table.tableName,
				description: table.description,
				columnCount: table.columns.length,
				foreignKeyCount: table.foreignKeys.length,
				hasPrimaryKey: table.columns.some(c => c.isPrimaryKey),
				tableType: inferTableType(table),
			},
		})

		for (const column of table.columns) {
			const id = `${table.tableName}.${column.columnName}`
			nodes.set(id, {
				id,
				kind: "column",
				table: table.tableName,
				features: {
					name: column.columnName,
					dataType: column.dataType,
					isPrimaryKey: column.isPrimaryKey,
					isNullable: column.isNullable,
					isEnabled: column.isEnabled,
					description: column.description,
					semanticType: inferSemanticType(column),
				},
			})
			edges.push({ kind: "contains", from: table.tableName, to: id })
		}
	}

	// FK edges go in after all nodes so forward references resolve
	for (const table of tables) {
		for (const fk of table.foreignKeys) {
			edges.push({
				kind: "foreign_key",
				from: `${table.tableName}.${fk.columnName}`,
				to: `${fk.referencedTableName}.${fk.referencedColumnName}`,
				constraintName: fk.foreignKeyName,
			})
		}
	}

	return { nodes, edges }
}
