import { describe, it, expect } from "vitest"
import { buildSchemaGraph, inferSemanticType, inferTableType } from "./schema_graph.js"
import { column, shopSchema, table } from "./test_helpers.js"

describe("inferTableType", () => {
	it("tags log and config tables by name", () => {
		expect(inferTableType(table("audit_log", ["id"]))).toBe("log_table")
		expect(inferTableType(table("user_settings", ["id"]))).toBe("config_table")
	})

	it("tags small tables with two or more FKs as junctions", () => {
		const [, , , orderItems] = shopSchema()
		expect(inferTableType(orderItems)).toBe("junction_table")
	})

	it("tags wide tables as facts and everything else as dimensions", () => {
		const wide = table("events", Array.from({ length: 21 }, (_, i) => `c${i}`))
		expect(inferTableType(wide)).toBe("fact_table")
		expect(inferTableType(table("customers", ["id", "name"]))).toBe("dimension_table")
	})
})

describe("inferSemanticType", () => {
	it.each([
		[column("id", { isPrimaryKey: true }), "primary_key"],
		[column("customer_id"), "foreign_key_candidate"],
		[column("title", { dataType: "text" }), "name_field"],
		[column("shipped", { dataType: "date" }), "temporal_field"],
		[column("updated_time", { dataType: "timestamp" }), "temporal_field"],
		[column("shipped", { dataType: "timestamp" }), "general_field"],
		[column("total_amount", { dataType: "numeric" }), "monetary_field"],
		[column("qty"), "numeric_field"],
		[column("status", { dataType: "text" }), "general_field"],
	])("classifies %o", (col, expected) => {
		expect(inferSemanticType(col)).toBe(expected)
	})
})

describe("buildSchemaGraph", () => {
	it("creates table and column nodes with contains edges", () => {
		const graph = buildSchemaGraph([table("customers", ["id", column("name", { dataType: "text" })])])

		expect([...graph.nodes.keys()]).toEqual(["customers", "customers.id", "customers.name"])
		expect(graph.edges).toEqual([
			{ kind: "contains", from: "customers", to: "customers.id" },
			{ kind: "contains", from: "customers", to: "customers.name" },
		])
		const node = graph.nodes.get("customers")
		expect(node?.kind === "table" && node.features).toEqual({
			name: "customers",
			description: "",
			columnCount: 2,
			foreignKeyCount: 0,
			hasPrimaryKey: true,
			tableType: "dimension_table",
		})
	})

	it("links FK columns even when the referenced table comes later", () => {
		const graph = buildSchemaGraph(shopSchema())
		const fkEdges = graph.edges.filter(e => e.kind === "foreign_key")
		expect(fkEdges).toEqual([
			{ kind: "foreign_key", from: "orders.customer_id", to: "customers.id", constraintName: "fk_orders_customer_id" },
			{ kind: "foreign_key", from: "order_items.order_id", to: "orders.id", constraintName: "fk_order_items_order_id" },
			{ kind: "foreign_key", from: "order_items.product_id", to: "products.id", constraintName: "fk_order_items_product_id" },
		])
	})

	it("keeps disabled columns as nodes with their flag", () => {
		const graph = buildSchemaGraph([table("customers", ["id", column("email", { isEnabled: false })])])
		const node = graph.nodes.get("customers.email")
		expect(node?.kind === "column" && node.features.isEnabled).toBe(false)
	})
})
